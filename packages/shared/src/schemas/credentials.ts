import { z } from 'zod';

export interface CredentialRecord {
  username?: string;
  password?: string;
}

/**
 * One cached credential per host.
 * Older files store a bare password string; it loads as `{ password }`.
 */
export const CredentialRecordSchema = z.union([
  z.string().transform((password): CredentialRecord => ({ password })),
  z.object({
    username: z.string().optional(),
    password: z.string().optional(),
  }),
]);

export const CredentialFile = z.record(CredentialRecordSchema);
export type CredentialFile = z.infer<typeof CredentialFile>;
