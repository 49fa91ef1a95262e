/**
 * Credentials Stack CloudFormation Template Generator
 *
 * The reusable unit of the provisioning flow. Creates:
 * - An IAM user with one managed policy attached
 * - An access key for that user
 * - A Secrets Manager secret holding the key pair, read back by the CLI
 *   to populate the repository secrets
 *
 * CloudFormation orders the resources through their references: the access
 * key and the secret only exist once the user does.
 */

import type { CloudFormationTemplate } from '../types/aws.js';
import {
  createBaseTemplate,
  createIamUserResource,
  createAccessKeyResource,
  createAccessKeySecretResource,
} from './common.js';
import { DEFAULT_CREDENTIALS_STACK_NAME, getCredentialsSecretName } from '../naming/index.js';

/**
 * Policy attached when the caller does not pass one. Read-only on purpose;
 * callers that need more must say so explicitly.
 */
export const DEFAULT_MODULE_POLICY_ARN = 'arn:aws:iam::aws:policy/AmazonS3ReadOnlyAccess';

export const USER_LOGICAL_ID = 'GithubActionsUser';
export const ACCESS_KEY_LOGICAL_ID = 'GithubActionsAccessKey';
export const CREDENTIALS_SECRET_LOGICAL_ID = 'GithubActionsCredentials';

/**
 * Output keys of the credentials stack
 */
export const CredentialsStackOutputs = {
  USER_NAME: 'UserName',
  USER_ARN: 'UserArn',
  ACCESS_KEY_ID: 'AccessKeyId',
  POLICY_ARN: 'PolicyArn',
  CREDENTIALS_SECRET_ARN: 'CredentialsSecretArn',
} as const;

export interface CredentialsStackOptions {
  userName: string;
  /** Names the credentials secret; DEFAULT_CREDENTIALS_STACK_NAME when omitted */
  stackName?: string;
  /** Managed policy to attach; DEFAULT_MODULE_POLICY_ARN when omitted */
  policyArn?: string;
  /** Tag value identifying the repository that consumes the key */
  repository?: string;
}

/**
 * Generate the CloudFormation template for the credentials stack
 */
export function generateCredentialsStackTemplate(options: CredentialsStackOptions): CloudFormationTemplate {
  const { userName, repository } = options;
  const policyArn = options.policyArn ?? DEFAULT_MODULE_POLICY_ARN;

  const template = createBaseTemplate(`keybridge credentials for IAM user ${userName}`);

  const tags = repository ? [{ Key: 'Repository', Value: repository }] : [];

  template.Resources[USER_LOGICAL_ID] = createIamUserResource(userName, [policyArn], tags);
  template.Resources[ACCESS_KEY_LOGICAL_ID] = createAccessKeyResource(USER_LOGICAL_ID);
  template.Resources[CREDENTIALS_SECRET_LOGICAL_ID] = createAccessKeySecretResource(
    getCredentialsSecretName(options.stackName ?? DEFAULT_CREDENTIALS_STACK_NAME),
    ACCESS_KEY_LOGICAL_ID,
    `Access key pair for IAM user ${userName}`
  );

  template.Outputs = {
    [CredentialsStackOutputs.USER_NAME]: {
      Description: 'Name of the IAM user',
      Value: { Ref: USER_LOGICAL_ID },
    },
    [CredentialsStackOutputs.USER_ARN]: {
      Description: 'ARN of the IAM user',
      Value: { 'Fn::GetAtt': [USER_LOGICAL_ID, 'Arn'] },
    },
    [CredentialsStackOutputs.ACCESS_KEY_ID]: {
      Description: 'Access key id (the secret part stays in Secrets Manager)',
      Value: { Ref: ACCESS_KEY_LOGICAL_ID },
    },
    [CredentialsStackOutputs.POLICY_ARN]: {
      Description: 'Managed policy attached to the user',
      Value: policyArn,
    },
    [CredentialsStackOutputs.CREDENTIALS_SECRET_ARN]: {
      Description: 'Secrets Manager secret holding the key pair',
      Value: { Ref: CREDENTIALS_SECRET_LOGICAL_ID },
    },
  };

  return template;
}
