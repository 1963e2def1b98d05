/** Base class for every fatal provisioning failure */
export class ProvisionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProvisionError';
  }
}

/** Missing or invalid VM options, config files or settings */
export class ConfigurationError extends ProvisionError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** Explicit VM ID already in use and replace was not requested */
export class IdentityConflictError extends ProvisionError {
  readonly vmid: number;

  constructor(message: string, vmid: number) {
    super(message);
    this.name = 'IdentityConflictError';
    this.vmid = vmid;
  }
}

/** No storage can hold a disk slot's declared size */
export class CapacityError extends ProvisionError {
  readonly slot: string;

  constructor(message: string, slot: string) {
    super(message);
    this.name = 'CapacityError';
    this.slot = slot;
  }
}

export interface RemoteOperationDetails {
  /** HTTP status of a failed API call */
  status?: number;
  /** Exit status reported by a failed cluster task */
  exitStatus?: string;
  /** Exit code of a failed remote command */
  exitCode?: number;
}

/** Cluster API call, cluster task or remote command failed */
export class RemoteOperationError extends ProvisionError {
  readonly status?: number;
  readonly exitStatus?: string;
  readonly exitCode?: number;

  constructor(message: string, details: RemoteOperationDetails = {}) {
    super(message);
    this.name = 'RemoteOperationError';
    this.status = details.status;
    this.exitStatus = details.exitStatus;
    this.exitCode = details.exitCode;
  }
}

/** A bounded polling loop ran out of attempts */
export class PollTimeoutError extends ProvisionError {
  readonly attempts: number;

  constructor(message: string, attempts: number) {
    super(message);
    this.name = 'PollTimeoutError';
    this.attempts = attempts;
  }
}

/** Credentials were rejected by the cluster */
export class AuthenticationError extends ProvisionError {
  constructor(message: string) {
    super(message);
    this.name = 'AuthenticationError';
  }
}

/** Remote image unreachable or local image path missing */
export class ImageResolutionError extends ProvisionError {
  constructor(message: string) {
    super(message);
    this.name = 'ImageResolutionError';
  }
}
