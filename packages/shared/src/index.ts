// Constants & enums
export {
  VmPowerState,
  TaskState,
  AUTO_THIN_STORAGE,
  DEFAULT_VM_BASE_ID,
  DEFAULT_TEMPLATE_BASE_ID,
  TEMPLATE_NAME_SUFFIX,
  PRIMARY_DISK_SLOT,
  STOP_POLL_ATTEMPTS,
  STOP_POLL_INTERVAL_MS,
  DISK_POLL_ATTEMPTS,
  DISK_POLL_INTERVAL_MS,
  TASK_POLL_ATTEMPTS,
  TASK_POLL_INTERVAL_MS,
  DEFAULT_API_PORT,
  DEFAULT_SSH_PORT,
  BYTES_PER_GIB,
} from './types/common.js';

// Types: Cluster API
export type {
  ClusterApi,
  ClusterVm,
  StorageInfo,
  TaskStatus,
  VmConfig,
  VmStatus,
} from './types/cluster.js';

// Types: collaborators
export type {
  CredentialProvider,
  ExecFn,
  FetchFn,
  Prompter,
  RemoteExec,
} from './types/collaborators.js';

// Schemas
export { VmOptionValue, KnownVmFields, VmOptions, isDiskSlot } from './schemas/vm-options.js';
export {
  type CredentialRecord,
  CredentialRecordSchema,
  CredentialFile,
} from './schemas/credentials.js';

// Errors
export {
  ProvisionError,
  ConfigurationError,
  IdentityConflictError,
  CapacityError,
  RemoteOperationError,
  type RemoteOperationDetails,
  PollTimeoutError,
  AuthenticationError,
  ImageResolutionError,
} from './errors.js';

// Polling
export { poll, defaultSleep, type PollOptions, type PollResult, type SleepFn } from './poll.js';
