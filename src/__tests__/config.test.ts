import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadConfig, parseConfig, resolveGithubToken } from '../parsers/config.js';
import { AuthenticationError, ConfigError } from '../utils/errors.js';
import { Sensitive } from '../utils/sensitive.js';

vi.mock('../utils/logger.js', () => ({
  verbose: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  maskValue: vi.fn(),
}));

const minimal = {
  repository: { owner: 'example-org', name: 'example-repo' },
  backend: { bucket: 'example-org-keybridge-state' },
};

describe('parseConfig', () => {
  it('should apply the root defaults', () => {
    const config = parseConfig(minimal);

    expect(config).toEqual({
      iamUserName: 'github-actions-user',
      policyArn: 'arn:aws:iam::aws:policy/AmazonS3FullAccess',
      region: 'us-east-1',
      stackName: 'keybridge-credentials',
      repository: { owner: 'example-org', name: 'example-repo' },
      backend: {
        bucket: 'example-org-keybridge-state',
        key: 'keybridge/credentials.state.json',
        region: 'us-east-1',
      },
      workflow: {
        branches: ['**'],
        path: '.github/workflows/verify-aws-credentials.yml',
        awsRegion: 'us-east-1',
      },
    });
  });

  it('should keep the default stack name when the user is renamed', () => {
    const config = parseConfig({ ...minimal, iam_user_name: 'github-actions-user-2' });

    expect(config.iamUserName).toBe('github-actions-user-2');
    expect(config.stackName).toBe('keybridge-credentials');
  });

  it('should keep explicit values and inherit the region', () => {
    const config = parseConfig({
      ...minimal,
      iam_user_name: 'ci-reader',
      policy_arn: 'arn:aws:iam::aws:policy/AmazonS3ReadOnlyAccess',
      region: 'eu-west-1',
      workflow: { branches: ['main', 'release/*'] },
    });

    expect(config.iamUserName).toBe('ci-reader');
    expect(config.policyArn).toBe('arn:aws:iam::aws:policy/AmazonS3ReadOnlyAccess');
    expect(config.stackName).toBe('keybridge-credentials');
    expect(config.backend.region).toBe('eu-west-1');
    expect(config.workflow.awsRegion).toBe('eu-west-1');
    expect(config.workflow.branches).toEqual(['main', 'release/*']);
  });

  it('should reject a missing repository section', () => {
    expect(() => parseConfig({ backend: minimal.backend }, 'keybridge.yaml')).toThrow(
      'Invalid configuration in keybridge.yaml: Missing "repository" section (owner and name of the GitHub repository)'
    );
  });

  it('should reject a missing backend section', () => {
    expect(() => parseConfig({ repository: minimal.repository })).toThrow(/Missing "backend" section/);
  });

  it('should reject an invalid policy ARN with a ConfigError', () => {
    expect(() => parseConfig({ ...minimal, policy_arn: 'AmazonS3FullAccess' })).toThrow(ConfigError);
    expect(() => parseConfig({ ...minimal, policy_arn: 'AmazonS3FullAccess' })).toThrow(
      /Invalid policy_arn: "AmazonS3FullAccess"/
    );
  });

  it('should reject values of the wrong type', () => {
    expect(() => parseConfig({ ...minimal, region: 42 })).toThrow('Invalid configuration in <inline>: "region" must be a string');
  });

  it('should reject an empty branch list', () => {
    expect(() => parseConfig({ ...minimal, workflow: { branches: [] } })).toThrow(
      /"workflow.branches" must be a non-empty list/
    );
  });

  it('should reject a top level that is not a mapping', () => {
    expect(() => parseConfig(['a', 'b'])).toThrow(/Top level must be a mapping/);
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'keybridge-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should read a YAML file', async () => {
    const path = join(dir, 'keybridge.yaml');
    await writeFile(
      path,
      [
        'iam_user_name: yaml-user',
        'repository:',
        '  owner: example-org',
        '  name: example-repo',
        'backend:',
        '  bucket: example-org-keybridge-state',
      ].join('\n')
    );

    const config = await loadConfig(path);

    expect(config.iamUserName).toBe('yaml-user');
    expect(config.repository).toEqual({ owner: 'example-org', name: 'example-repo' });
  });

  it('should read a JSON file', async () => {
    const path = join(dir, 'keybridge.json');
    await writeFile(path, JSON.stringify({ ...minimal, region: 'us-west-2' }));

    const config = await loadConfig(path);

    expect(config.region).toBe('us-west-2');
  });

  it('should report a missing file as a ConfigError', async () => {
    await expect(loadConfig(join(dir, 'missing.yaml'))).rejects.toThrow(ConfigError);
  });

  it('should report unparseable YAML', async () => {
    const path = join(dir, 'broken.yaml');
    await writeFile(path, 'repository: [unclosed');

    await expect(loadConfig(path)).rejects.toThrow(/Invalid YAML/);
  });
});

describe('resolveGithubToken', () => {
  it('should wrap the token', () => {
    const token = resolveGithubToken({ GITHUB_TOKEN: 'test-token' }, 'GITHUB_TOKEN');

    expect(token).toBeInstanceOf(Sensitive);
    expect(token.reveal()).toBe('test-token');
    expect(String(token)).toBe('(sensitive)');
  });

  it('should read a custom variable name', () => {
    const token = resolveGithubToken({ KEYBRIDGE_TOKEN: 'test-token' }, 'KEYBRIDGE_TOKEN');
    expect(token.reveal()).toBe('test-token');
  });

  it('should fail with an AuthenticationError when the variable is unset or blank', () => {
    expect(() => resolveGithubToken({}, 'GITHUB_TOKEN')).toThrow(AuthenticationError);
    expect(() => resolveGithubToken({ GITHUB_TOKEN: '   ' }, 'GITHUB_TOKEN')).toThrow(
      /^Authentication failed: Environment variable GITHUB_TOKEN is not set\./
    );
  });
});
