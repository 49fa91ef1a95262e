/**
 * Input validation utilities for AWS and GitHub identifiers
 */

/**
 * AWS Region format: e.g., us-east-1, eu-west-2, ap-northeast-1, us-gov-west-1
 */
const AWS_REGION_REGEX = /^[a-z]{2}(-gov)?-[a-z]+-\d$/;

/**
 * IAM user names: 1-64 characters of alphanumerics and +=,.@_-
 */
const IAM_USER_NAME_REGEX = /^[\w+=,.@-]{1,64}$/;

/**
 * Managed policy ARN, AWS-managed (arn:aws:iam::aws:policy/...) or
 * customer-managed (arn:aws:iam::123456789012:policy/...), in any partition
 */
const POLICY_ARN_REGEX = /^arn:aws(-[a-z]+)*:iam::(aws|\d{12}):policy\/[\w+=,.@\/-]+$/;

/**
 * GitHub owner (user or organization): alphanumerics and single hyphens,
 * no leading/trailing hyphen, at most 39 characters
 */
const GITHUB_OWNER_REGEX = /^[A-Za-z0-9](?:[A-Za-z0-9]|-(?=[A-Za-z0-9])){0,38}$/;

/**
 * GitHub repository names: alphanumerics, hyphens, underscores and dots
 */
const GITHUB_REPO_REGEX = /^[A-Za-z0-9._-]{1,100}$/;

/**
 * Actions secret names: alphanumerics and underscores, not starting with a
 * digit or the reserved GITHUB_ prefix
 */
const SECRET_NAME_REGEX = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * S3 bucket names: 3-63 characters, lowercase, digits, dots and hyphens
 */
const S3_BUCKET_REGEX = /^[a-z0-9][a-z0-9.-]{1,61}[a-z0-9]$/;

/**
 * Long-term (AKIA) or temporary (ASIA) access key ids
 */
const ACCESS_KEY_ID_REGEX = /^(AKIA|ASIA)[A-Z0-9]{16}$/;

const CFN_STACK_NAME_REGEX = /^[A-Za-z][A-Za-z0-9-]{0,127}$/;

export function isValidAwsRegion(region: string): boolean {
  return AWS_REGION_REGEX.test(region);
}

export function isValidIamUserName(name: string): boolean {
  return IAM_USER_NAME_REGEX.test(name);
}

export function isValidPolicyArn(arn: string): boolean {
  return POLICY_ARN_REGEX.test(arn);
}

export function isValidGithubOwner(owner: string): boolean {
  return GITHUB_OWNER_REGEX.test(owner);
}

export function isValidGithubRepo(repo: string): boolean {
  return GITHUB_REPO_REGEX.test(repo) && repo !== '.' && repo !== '..';
}

export function isValidSecretName(name: string): boolean {
  return SECRET_NAME_REGEX.test(name) && !name.toUpperCase().startsWith('GITHUB_');
}

export function isValidBucketName(name: string): boolean {
  return S3_BUCKET_REGEX.test(name) && !name.includes('..');
}

export function isValidAccessKeyId(keyId: string): boolean {
  return ACCESS_KEY_ID_REGEX.test(keyId);
}

export function isValidStackName(name: string): boolean {
  return CFN_STACK_NAME_REGEX.test(name);
}

/**
 * Validate AWS region and throw if invalid
 * @param fieldName - Name of the field for error message
 */
export function validateAwsRegion(region: string, fieldName = 'AWS region'): void {
  if (!isValidAwsRegion(region)) {
    throw new Error(
      `Invalid ${fieldName}: "${region}". Expected a valid AWS region (e.g., us-east-1, eu-west-2).`
    );
  }
}

export function validateIamUserName(name: string, fieldName = 'IAM user name'): void {
  if (!isValidIamUserName(name)) {
    throw new Error(
      `Invalid ${fieldName}: "${name}". IAM user names are 1-64 characters of letters, digits and +=,.@_-.`
    );
  }
}

export function validatePolicyArn(arn: string, fieldName = 'policy ARN'): void {
  if (!isValidPolicyArn(arn)) {
    throw new Error(
      `Invalid ${fieldName}: "${arn}". Expected an IAM managed policy ARN (e.g., arn:aws:iam::aws:policy/AmazonS3ReadOnlyAccess).`
    );
  }
}
