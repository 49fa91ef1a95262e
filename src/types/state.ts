/**
 * Remote state record types
 */

import type { LockInfo } from '../utils/errors.js';
import type { RepositoryRef } from './config.js';

export const STATE_FORMAT_VERSION = 1;

export interface SecretRecord {
  name: string;
  updatedAt: string;
}

/**
 * What a successful apply leaves behind. Holds identifiers only; secret
 * values stay in the credentials secret and the repository.
 */
export interface ProvisioningState {
  version: number;
  serial: number;
  lineage: string;
  stackName: string;
  region: string;
  userName: string;
  userArn: string;
  policyArn: string;
  accessKeyId: string;
  credentialsSecretArn: string;
  repository: RepositoryRef;
  secrets: SecretRecord[];
  appliedAt: string;
}

export interface LockHandle {
  info: LockInfo;
}

export interface StateBackend {
  /** Human-readable location, e.g. s3://bucket/key */
  readonly location: string;
  read(): Promise<ProvisioningState | null>;
  write(state: ProvisioningState): Promise<void>;
  delete(): Promise<void>;
  lock(operation: string): Promise<LockHandle>;
  unlock(handle: LockHandle): Promise<void>;
  forceUnlock(lockId: string): Promise<boolean>;
}
