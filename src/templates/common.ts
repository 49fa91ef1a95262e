/**
 * Shared template utilities for CloudFormation template generation
 */

import type { CloudFormationTemplate, CloudFormationResource } from '../types/aws.js';

/**
 * Standard tags applied to all keybridge resources
 */
export const STANDARD_TAGS = [
  { Key: 'CreatedBy', Value: 'keybridge' },
  { Key: 'ManagedBy', Value: 'keybridge-cli' },
];

/**
 * Create a base CloudFormation template with standard structure
 */
export function createBaseTemplate(description: string): CloudFormationTemplate {
  return {
    AWSTemplateFormatVersion: '2010-09-09',
    Description: description,
    Resources: {},
    Outputs: {},
  };
}

/**
 * Create an IAM user resource with its managed policy attachments
 */
export function createIamUserResource(
  userName: string,
  managedPolicyArns: string[],
  additionalTags: Array<{ Key: string; Value: string }> = []
): CloudFormationResource {
  return {
    Type: 'AWS::IAM::User',
    Properties: {
      UserName: userName,
      ...(managedPolicyArns.length > 0 ? { ManagedPolicyArns: managedPolicyArns } : {}),
      Tags: [...STANDARD_TAGS, ...additionalTags],
    },
  };
}

/**
 * Create an access key bound to a user resource in the same template
 */
export function createAccessKeyResource(userLogicalId: string): CloudFormationResource {
  return {
    Type: 'AWS::IAM::AccessKey',
    DependsOn: userLogicalId,
    Properties: {
      UserName: { Ref: userLogicalId },
      Status: 'Active',
    },
  };
}

/**
 * Create a Secrets Manager secret holding an access key pair as JSON.
 * The secret access key is only reachable through GetAtt inside the
 * template, so it never shows up in stack outputs or events.
 */
export function createAccessKeySecretResource(
  secretName: string,
  accessKeyLogicalId: string,
  description: string
): CloudFormationResource {
  return {
    Type: 'AWS::SecretsManager::Secret',
    Properties: {
      Name: secretName,
      Description: description,
      SecretString: {
        'Fn::Sub': [
          '{"accessKeyId":"${AccessKeyId}","secretAccessKey":"${SecretAccessKey}"}',
          {
            AccessKeyId: { Ref: accessKeyLogicalId },
            SecretAccessKey: { 'Fn::GetAtt': [accessKeyLogicalId, 'SecretAccessKey'] },
          },
        ],
      },
      Tags: STANDARD_TAGS,
    },
  };
}

/**
 * Create an S3 bucket resource with standard security configuration
 */
export function createS3BucketResource(
  bucketName: string,
  additionalTags: Array<{ Key: string; Value: string }> = []
): CloudFormationResource {
  return {
    Type: 'AWS::S3::Bucket',
    DeletionPolicy: 'Retain',
    UpdateReplacePolicy: 'Retain',
    Properties: {
      BucketName: bucketName,
      VersioningConfiguration: { Status: 'Enabled' },
      BucketEncryption: {
        ServerSideEncryptionConfiguration: [
          {
            ServerSideEncryptionByDefault: {
              SSEAlgorithm: 'AES256',
            },
          },
        ],
      },
      PublicAccessBlockConfiguration: {
        BlockPublicAcls: true,
        BlockPublicPolicy: true,
        IgnorePublicAcls: true,
        RestrictPublicBuckets: true,
      },
      Tags: [...STANDARD_TAGS, ...additionalTags],
    },
  };
}
