/**
 * CLI configuration and options types
 */

export interface GlobalOptions {
  config?: string;
  tokenEnv?: string;
  verbose?: boolean;
}

export interface ProvisionOptions extends GlobalOptions {
  dryRun?: boolean;
  yes?: boolean;
}

export interface DestroyOptions extends GlobalOptions {
  yes?: boolean;
}

export interface WorkflowOptions extends GlobalOptions {
  output?: string;
  stdout?: boolean;
}

export interface VerifyOptions {
  region?: string;
  verbose?: boolean;
}

/**
 * Repository coordinate for the secret store
 */
export interface RepositoryRef {
  owner: string;
  name: string;
}

/**
 * Where the state record lives
 */
export interface BackendConfig {
  bucket: string;
  key: string;
  region: string;
}

export interface WorkflowConfig {
  /** Branch filters for push and pull_request triggers */
  branches: string[];
  /** Path of the generated workflow file, relative to the working directory */
  path: string;
  /** Region handed to configure-aws-credentials */
  awsRegion: string;
}

/**
 * Fully resolved configuration (defaults applied, values validated)
 */
export interface KeybridgeConfig {
  iamUserName: string;
  policyArn: string;
  region: string;
  stackName: string;
  repository: RepositoryRef;
  backend: BackendConfig;
  workflow: WorkflowConfig;
}

/**
 * Raw shape of keybridge.yaml before validation
 */
export interface RawConfigFile {
  iam_user_name?: unknown;
  policy_arn?: unknown;
  region?: unknown;
  stack_name?: unknown;
  repository?: {
    owner?: unknown;
    name?: unknown;
  };
  backend?: {
    bucket?: unknown;
    key?: unknown;
    region?: unknown;
  };
  workflow?: {
    branches?: unknown;
    path?: unknown;
    aws_region?: unknown;
  };
}

export const DEFAULT_CONFIG_FILE = 'keybridge.yaml';
export const DEFAULT_TOKEN_ENV = 'GITHUB_TOKEN';
export const DEFAULT_IAM_USER_NAME = 'github-actions-user';
export const DEFAULT_ROOT_POLICY_ARN = 'arn:aws:iam::aws:policy/AmazonS3FullAccess';
export const DEFAULT_REGION = 'us-east-1';
export const DEFAULT_STATE_KEY = 'keybridge/credentials.state.json';
export const DEFAULT_WORKFLOW_PATH = '.github/workflows/verify-aws-credentials.yml';
export const DEFAULT_WORKFLOW_BRANCHES = ['**'];

export const ACCESS_KEY_ID_SECRET = 'AWS_ACCESS_KEY_ID';
export const SECRET_ACCESS_KEY_SECRET = 'AWS_SECRET_ACCESS_KEY';
