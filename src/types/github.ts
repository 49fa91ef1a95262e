/**
 * GitHub secret store types
 */

import type { Sensitive } from '../utils/sensitive.js';
import type { RepositoryRef } from './config.js';

/**
 * Response from GET /repos/{owner}/{repo}/actions/secrets/public-key
 */
export interface RepositoryPublicKey {
  key_id: string;
  key: string;
}

/**
 * Item of GET /repos/{owner}/{repo}/actions/secrets
 */
export interface RepositorySecretMetadata {
  name: string;
  created_at: string;
  updated_at: string;
}

export interface RepositorySecretList {
  total_count: number;
  secrets: RepositorySecretMetadata[];
}

/**
 * Operations the provisioning flow needs from the secret store
 */
export interface SecretStore {
  verifyAccess(repository: RepositoryRef): Promise<void>;
  listSecrets(repository: RepositoryRef): Promise<RepositorySecretMetadata[]>;
  putSecret(repository: RepositoryRef, name: string, value: string | Sensitive<string>): Promise<void>;
  deleteSecret(repository: RepositoryRef, name: string): Promise<boolean>;
}

export function formatRepository(repository: RepositoryRef): string {
  return `${repository.owner}/${repository.name}`;
}
