import { describe, it, expect } from 'vitest';
import {
  isValidAccessKeyId,
  isValidAwsRegion,
  isValidBucketName,
  isValidGithubOwner,
  isValidGithubRepo,
  isValidIamUserName,
  isValidPolicyArn,
  isValidSecretName,
  isValidStackName,
  validateAwsRegion,
  validateIamUserName,
  validatePolicyArn,
} from '../utils/validation.js';

describe('isValidAwsRegion', () => {
  it('should accept valid AWS regions', () => {
    expect(isValidAwsRegion('us-east-1')).toBe(true);
    expect(isValidAwsRegion('us-west-2')).toBe(true);
    expect(isValidAwsRegion('eu-west-1')).toBe(true);
    expect(isValidAwsRegion('ap-northeast-1')).toBe(true);
    expect(isValidAwsRegion('us-gov-west-1')).toBe(true);
  });

  it('should accept the region format even for regions it does not know', () => {
    expect(isValidAwsRegion('xx-yyyy-1')).toBe(true);
  });

  it('should reject invalid region formats', () => {
    expect(isValidAwsRegion('')).toBe(false);
    expect(isValidAwsRegion('us-east')).toBe(false); // missing number
    expect(isValidAwsRegion('useast1')).toBe(false); // missing hyphens
    expect(isValidAwsRegion('US-EAST-1')).toBe(false); // uppercase
    expect(isValidAwsRegion('us-east-1a')).toBe(false); // has AZ suffix
  });

  it('should reject regions with injection attempts', () => {
    expect(isValidAwsRegion('us-east-1; rm -rf /')).toBe(false);
    expect(isValidAwsRegion('us-east-1\nmalicious')).toBe(false);
  });
});

describe('isValidIamUserName', () => {
  it('should accept IAM user names', () => {
    expect(isValidIamUserName('github-actions-user')).toBe(true);
    expect(isValidIamUserName('ci+deploy@example.com')).toBe(true);
    expect(isValidIamUserName('a'.repeat(64))).toBe(true);
  });

  it('should reject empty, long or malformed names', () => {
    expect(isValidIamUserName('')).toBe(false);
    expect(isValidIamUserName('a'.repeat(65))).toBe(false);
    expect(isValidIamUserName('has space')).toBe(false);
    expect(isValidIamUserName('slash/name')).toBe(false);
  });
});

describe('isValidPolicyArn', () => {
  it('should accept AWS managed and customer managed policy ARNs', () => {
    expect(isValidPolicyArn('arn:aws:iam::aws:policy/AmazonS3FullAccess')).toBe(true);
    expect(isValidPolicyArn('arn:aws:iam::aws:policy/AmazonS3ReadOnlyAccess')).toBe(true);
    expect(isValidPolicyArn('arn:aws:iam::123456789012:policy/team/ci-read')).toBe(true);
    expect(isValidPolicyArn('arn:aws-us-gov:iam::aws:policy/AmazonS3FullAccess')).toBe(true);
  });

  it('should reject other ARNs and plain names', () => {
    expect(isValidPolicyArn('AmazonS3FullAccess')).toBe(false);
    expect(isValidPolicyArn('arn:aws:iam::123456789012:role/ci')).toBe(false);
    expect(isValidPolicyArn('arn:aws:iam::12345:policy/short-account')).toBe(false);
  });
});

describe('GitHub identifiers', () => {
  it('should accept owners and reject leading, trailing or doubled hyphens', () => {
    expect(isValidGithubOwner('example-org')).toBe(true);
    expect(isValidGithubOwner('-org')).toBe(false);
    expect(isValidGithubOwner('org-')).toBe(false);
    expect(isValidGithubOwner('my--org')).toBe(false);
    expect(isValidGithubOwner('a'.repeat(40))).toBe(false);
  });

  it('should accept repository names and reject dot paths', () => {
    expect(isValidGithubRepo('example-repo')).toBe(true);
    expect(isValidGithubRepo('repo.name_2')).toBe(true);
    expect(isValidGithubRepo('.')).toBe(false);
    expect(isValidGithubRepo('..')).toBe(false);
    expect(isValidGithubRepo('a/b')).toBe(false);
  });

  it('should reject secret names GitHub reserves or disallows', () => {
    expect(isValidSecretName('AWS_ACCESS_KEY_ID')).toBe(true);
    expect(isValidSecretName('AWS_SECRET_ACCESS_KEY')).toBe(true);
    expect(isValidSecretName('GITHUB_TOKEN')).toBe(false);
    expect(isValidSecretName('github_anything')).toBe(false);
    expect(isValidSecretName('1_STARTS_WITH_DIGIT')).toBe(false);
    expect(isValidSecretName('HAS-HYPHEN')).toBe(false);
  });
});

describe('AWS resource names', () => {
  it('should validate bucket names', () => {
    expect(isValidBucketName('example-org-keybridge-state')).toBe(true);
    expect(isValidBucketName('ab')).toBe(false);
    expect(isValidBucketName('Upper-Case')).toBe(false);
    expect(isValidBucketName('double..dot')).toBe(false);
  });

  it('should validate access key ids', () => {
    expect(isValidAccessKeyId('AKIAEXAMPLE000000001')).toBe(true);
    expect(isValidAccessKeyId('ASIAEXAMPLE000000001')).toBe(true);
    expect(isValidAccessKeyId('AKIAEXAMPLE')).toBe(false);
    expect(isValidAccessKeyId('akiaexample000000001')).toBe(false);
  });

  it('should validate stack names', () => {
    expect(isValidStackName('keybridge-credentials')).toBe(true);
    expect(isValidStackName('1-starts-with-digit')).toBe(false);
    expect(isValidStackName('has_underscore')).toBe(false);
  });
});

describe('validate functions', () => {
  it('should not throw for valid values', () => {
    expect(() => validateAwsRegion('us-east-1')).not.toThrow();
    expect(() => validateIamUserName('github-actions-user')).not.toThrow();
    expect(() => validatePolicyArn('arn:aws:iam::aws:policy/AmazonS3FullAccess')).not.toThrow();
  });

  it('should throw with the field name in the message', () => {
    expect(() => validateAwsRegion('invalid', 'backend.region')).toThrow(
      'Invalid backend.region: "invalid". Expected a valid AWS region (e.g., us-east-1, eu-west-2).'
    );
    expect(() => validateIamUserName('has space', 'iam_user_name')).toThrow(/^Invalid iam_user_name: "has space"/);
    expect(() => validatePolicyArn('S3', 'policy_arn')).toThrow(/^Invalid policy_arn: "S3"/);
  });
});
