/**
 * Custom error types for better error handling
 */

export class KeybridgeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'KeybridgeError';
  }
}

export class ConfigError extends KeybridgeError {
  configPath: string;

  constructor(configPath: string, cause: string) {
    super(`Invalid configuration in ${configPath}: ${cause}`);
    this.name = 'ConfigError';
    this.configPath = configPath;
  }
}

export class NoCredentialsError extends KeybridgeError {
  constructor() {
    super(
      'No AWS credentials found. Please configure AWS credentials using `aws configure` ' +
      'or set AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY environment variables.'
    );
    this.name = 'NoCredentialsError';
  }
}

export class AuthenticationError extends KeybridgeError {
  constructor(message: string) {
    super(`Authentication failed: ${message}`);
    this.name = 'AuthenticationError';
  }
}

export class AuthorizationError extends KeybridgeError {
  constructor(message: string) {
    super(`Not authorized: ${message}`);
    this.name = 'AuthorizationError';
  }
}

export class CloudFormationError extends KeybridgeError {
  stackName: string;
  accountId: string;

  constructor(stackName: string, accountId: string, cause: string) {
    super(`Failed to deploy stack '${stackName}' in account ${accountId}: ${cause}`);
    this.name = 'CloudFormationError';
    this.stackName = stackName;
    this.accountId = accountId;
  }
}

export class SecretStoreError extends KeybridgeError {
  repository: string;
  status: number;

  constructor(repository: string, status: number, cause: string) {
    super(`GitHub secrets request for ${repository} failed (${status}): ${cause}`);
    this.name = 'SecretStoreError';
    this.repository = repository;
    this.status = status;
  }
}

/**
 * Lock metadata written next to the state object
 */
export interface LockInfo {
  id: string;
  operation: string;
  who: string;
  createdAt: string;
}

export class StateLockError extends KeybridgeError {
  lockKey: string;
  holder: LockInfo | null;

  constructor(lockKey: string, holder: LockInfo | null) {
    const heldBy = holder
      ? ` Held by ${holder.who} for '${holder.operation}' since ${holder.createdAt} (lock id ${holder.id}).`
      : '';
    super(
      `State is locked at ${lockKey}.${heldBy} ` +
      'If no other run is in progress, release it with `keybridge unlock <lock-id>`.'
    );
    this.name = 'StateLockError';
    this.lockKey = lockKey;
    this.holder = holder;
  }
}

export class VerificationError extends KeybridgeError {
  constructor(message: string) {
    super(`Verification failed: ${message}`);
    this.name = 'VerificationError';
  }
}

/**
 * Render any thrown value as a message string
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
