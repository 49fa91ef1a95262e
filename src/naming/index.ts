/**
 * Resource naming utilities
 *
 * CloudFormation stack names allow letters, digits and hyphens only, so
 * names derived from bucket names are normalized first.
 */

/**
 * Normalize a name for use in resource identifiers
 * - Lowercase
 * - Replace non-alphanumeric with hyphens
 * - Remove consecutive hyphens
 * - Remove leading/trailing hyphens
 */
export function normalizeName(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9-]/g, '-')
    .replace(/-+/g, '-')
    .replace(/^-|-$/g, '');
}

// ============================================================================
// CloudFormation Stack Names
// ============================================================================

/**
 * Default credentials stack name. Independent of the IAM user name: a renamed
 * user is replaced inside the same stack.
 */
export const DEFAULT_CREDENTIALS_STACK_NAME = 'keybridge-credentials';

/**
 * State backend stack name, one per state bucket
 * Format: keybridge-<bucket>-backend
 */
export function getBackendStackName(bucketName: string): string {
  return `keybridge-${normalizeName(bucketName)}-backend`;
}

// ============================================================================
// Secrets Manager Names
// ============================================================================

/**
 * Secret holding the generated key pair, one per credentials stack
 * Format: keybridge/<stack_name>/access-key
 */
export function getCredentialsSecretName(stackName: string): string {
  return `keybridge/${stackName}/access-key`;
}

// ============================================================================
// State Objects
// ============================================================================

/**
 * Lock object key beside the state object
 */
export function getLockKey(stateKey: string): string {
  return `${stateKey}.lock`;
}
