/**
 * keybridge.yaml parser
 *
 * Reads the configuration file, applies the root defaults and validates every
 * value. The GitHub token is deliberately not part of the file; it is
 * resolved from the environment by resolveGithubToken().
 */

import { readFile } from 'node:fs/promises';
import { extname, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { AuthenticationError, ConfigError, errorMessage } from '../utils/errors.js';
import * as logger from '../utils/logger.js';
import { Sensitive } from '../utils/sensitive.js';
import {
  isValidBucketName,
  isValidGithubOwner,
  isValidGithubRepo,
  isValidStackName,
  validateAwsRegion,
  validateIamUserName,
  validatePolicyArn,
} from '../utils/validation.js';
import { DEFAULT_CREDENTIALS_STACK_NAME } from '../naming/index.js';
import {
  DEFAULT_REGION,
  DEFAULT_ROOT_POLICY_ARN,
  DEFAULT_IAM_USER_NAME,
  DEFAULT_STATE_KEY,
  DEFAULT_WORKFLOW_BRANCHES,
  DEFAULT_WORKFLOW_PATH,
  type KeybridgeConfig,
  type RawConfigFile,
} from '../types/config.js';

export async function loadConfig(configPath: string): Promise<KeybridgeConfig> {
  const absolutePath = resolve(configPath);

  logger.verbose(`Reading configuration: ${absolutePath}`);

  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(configPath, `Could not read file: ${errorMessage(error)}`);
  }

  let raw: unknown;
  try {
    raw = extname(absolutePath) === '.json' ? JSON.parse(content) : parseYaml(content);
  } catch (error) {
    throw new ConfigError(configPath, `Invalid ${extname(absolutePath) === '.json' ? 'JSON' : 'YAML'}: ${errorMessage(error)}`);
  }

  return parseConfig(raw, configPath);
}

/**
 * Turn a parsed document into a validated configuration
 */
export function parseConfig(raw: unknown, configPath = '<inline>'): KeybridgeConfig {
  if (raw === null || raw === undefined) {
    raw = {};
  }

  if (typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ConfigError(configPath, 'Top level must be a mapping');
  }

  const file = raw as RawConfigFile;

  const fail = (cause: string): never => {
    throw new ConfigError(configPath, cause);
  };

  const iamUserName = optionalString(file.iam_user_name, 'iam_user_name', fail) ?? DEFAULT_IAM_USER_NAME;
  const policyArn = optionalString(file.policy_arn, 'policy_arn', fail) ?? DEFAULT_ROOT_POLICY_ARN;
  const region = optionalString(file.region, 'region', fail) ?? DEFAULT_REGION;
  const stackName = optionalString(file.stack_name, 'stack_name', fail) ?? DEFAULT_CREDENTIALS_STACK_NAME;

  try {
    validateIamUserName(iamUserName, 'iam_user_name');
    validatePolicyArn(policyArn, 'policy_arn');
    validateAwsRegion(region, 'region');
  } catch (error) {
    fail(errorMessage(error));
  }

  if (!isValidStackName(stackName)) {
    fail(`Invalid stack_name: "${stackName}". Stack names start with a letter and contain only letters, digits and hyphens.`);
  }

  const repository = file.repository;
  if (!repository || typeof repository !== 'object') {
    return fail('Missing "repository" section (owner and name of the GitHub repository)');
  }

  const owner = optionalString(repository.owner, 'repository.owner', fail);
  const name = optionalString(repository.name, 'repository.name', fail);

  if (!owner || !isValidGithubOwner(owner)) {
    fail(`Invalid repository.owner: "${owner ?? ''}"`);
  }
  if (!name || !isValidGithubRepo(name)) {
    fail(`Invalid repository.name: "${name ?? ''}"`);
  }

  const backend = file.backend;
  if (!backend || typeof backend !== 'object') {
    return fail('Missing "backend" section (S3 bucket holding the state record)');
  }

  const bucket = optionalString(backend.bucket, 'backend.bucket', fail);
  if (!bucket || !isValidBucketName(bucket)) {
    fail(`Invalid backend.bucket: "${bucket ?? ''}"`);
  }

  const key = optionalString(backend.key, 'backend.key', fail) ?? DEFAULT_STATE_KEY;
  if (key.startsWith('/') || key.length === 0) {
    fail(`Invalid backend.key: "${key}". Keys are relative paths inside the bucket.`);
  }

  const backendRegion = optionalString(backend.region, 'backend.region', fail) ?? region;
  try {
    validateAwsRegion(backendRegion, 'backend.region');
  } catch (error) {
    fail(errorMessage(error));
  }

  const workflow: NonNullable<RawConfigFile['workflow']> = file.workflow ?? {};
  const branches = parseBranches(workflow.branches, fail);
  const workflowPath = optionalString(workflow.path, 'workflow.path', fail) ?? DEFAULT_WORKFLOW_PATH;
  const awsRegion = optionalString(workflow.aws_region, 'workflow.aws_region', fail) ?? region;
  try {
    validateAwsRegion(awsRegion, 'workflow.aws_region');
  } catch (error) {
    fail(errorMessage(error));
  }

  return {
    iamUserName,
    policyArn,
    region,
    stackName,
    repository: { owner: owner ?? '', name: name ?? '' },
    backend: { bucket: bucket ?? '', key, region: backendRegion },
    workflow: { branches, path: workflowPath, awsRegion },
  };
}

/**
 * Resolve the GitHub token from the environment. It is wrapped immediately
 * so it cannot be logged.
 */
export function resolveGithubToken(
  env: NodeJS.ProcessEnv,
  variableName: string
): Sensitive<string> {
  const token = env[variableName]?.trim();

  if (!token) {
    throw new AuthenticationError(
      `Environment variable ${variableName} is not set. ` +
      'Export a GitHub token with permission to manage Actions secrets before provisioning.'
    );
  }

  return new Sensitive(token);
}

function optionalString(
  value: unknown,
  field: string,
  fail: (cause: string) => never
): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    return fail(`"${field}" must be a string`);
  }
  return value.trim();
}

function parseBranches(value: unknown, fail: (cause: string) => never): string[] {
  if (value === undefined || value === null) {
    return [...DEFAULT_WORKFLOW_BRANCHES];
  }
  if (!Array.isArray(value) || value.length === 0) {
    return fail('"workflow.branches" must be a non-empty list of branch patterns');
  }

  const branches: string[] = [];
  for (const branch of value) {
    if (typeof branch !== 'string' || branch.trim().length === 0) {
      return fail('"workflow.branches" entries must be non-empty strings');
    }
    branches.push(branch.trim());
  }
  return branches;
}
