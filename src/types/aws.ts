/**
 * AWS-related types
 */

import type { AwsCredentialIdentity } from '@aws-sdk/types';
import type { Sensitive } from '../utils/sensitive.js';

export interface CurrentIdentity {
  accountId: string;
  arn: string;
  userId: string;
}

export interface StackStatus {
  exists: boolean;
  status?: string;
  stackId?: string;
}

/**
 * Access key pair as read back from the credentials secret
 */
export interface AccessKeyPair {
  accessKeyId: string;
  secretAccessKey: Sensitive<string>;
}

export interface CloudFormationTemplate {
  AWSTemplateFormatVersion: string;
  Description: string;
  Resources: Record<string, CloudFormationResource>;
  Outputs?: Record<string, CloudFormationOutput>;
}

export interface CloudFormationResource {
  Type: string;
  Properties: Record<string, unknown>;
  DependsOn?: string | string[];
  DeletionPolicy?: 'Delete' | 'Retain';
  UpdateReplacePolicy?: 'Delete' | 'Retain';
}

export interface CloudFormationOutput {
  Description?: string;
  Value: unknown;
}

export interface DeployStackOptions {
  stackName: string;
  template: CloudFormationTemplate;
  accountId: string;
  region?: string;
  credentials?: AwsCredentialIdentity;
}

/**
 * CloudFormation operations the provisioning flow depends on
 */
export interface StackDeployer {
  getStackStatus(stackName: string): Promise<StackStatus>;
  previewStackChanges(options: DeployStackOptions): Promise<void>;
  deployStack(options: DeployStackOptions): Promise<void>;
  readStackOutputs(stackName: string): Promise<Record<string, string> | null>;
  deleteStack(stackName: string): Promise<void>;
}

/**
 * Reads the key pair held by the provisioning tool's own secret
 */
export interface CredentialVault {
  readAccessKeyPair(secretArn: string): Promise<AccessKeyPair>;
}

export interface IdentityResolver {
  getCurrentIdentity(): Promise<CurrentIdentity>;
}
