/**
 * GitHub repository secrets client over the REST API (fetch)
 */

import { AuthenticationError, AuthorizationError, SecretStoreError } from '../utils/errors.js';
import * as logger from '../utils/logger.js';
import type { Sensitive } from '../utils/sensitive.js';
import { isValidSecretName } from '../utils/validation.js';
import type { RepositoryRef } from '../types/config.js';
import {
  formatRepository,
  type RepositoryPublicKey,
  type RepositorySecretList,
  type RepositorySecretMetadata,
  type SecretStore,
} from '../types/github.js';
import { encryptSecret } from './encrypt.js';

const DEFAULT_API_URL = 'https://api.github.com';
const API_VERSION = '2022-11-28';
const PAGE_SIZE = 100;

export interface GitHubClientOptions {
  token: Sensitive<string>;
  baseUrl?: string;
}

interface ApiResponse {
  status: number;
  body: unknown;
}

export class GitHubClient implements SecretStore {
  private readonly token: Sensitive<string>;
  private readonly baseUrl: string;
  private readonly publicKeys = new Map<string, RepositoryPublicKey>();

  constructor(options: GitHubClientOptions) {
    this.token = options.token;
    this.baseUrl = (options.baseUrl ?? DEFAULT_API_URL).replace(/\/+$/, '');
  }

  /**
   * Confirm the token is valid and may manage Actions secrets on the repository
   */
  async verifyAccess(repository: RepositoryRef): Promise<void> {
    const name = formatRepository(repository);

    logger.verbose(`Checking GitHub access to ${name}...`);

    const repo = await this.request('GET', this.repoPath(repository, ''), undefined, [200, 401, 403, 404]);
    this.raiseForAccess(repo.status, name, 'read the repository');

    const key = await this.request('GET', this.repoPath(repository, '/actions/secrets/public-key'), undefined, [200, 401, 403, 404]);
    this.raiseForAccess(key.status, name, 'manage Actions secrets');

    this.publicKeys.set(name, toPublicKey(key.body, name));

    logger.verbose(`GitHub token can manage secrets on ${name}`);
  }

  async listSecrets(repository: RepositoryRef): Promise<RepositorySecretMetadata[]> {
    const secrets: RepositorySecretMetadata[] = [];

    for (let page = 1; ; page++) {
      const response = await this.request(
        'GET',
        this.repoPath(repository, `/actions/secrets?per_page=${PAGE_SIZE}&page=${page}`)
      );
      const list = toSecretList(response.body, formatRepository(repository));

      secrets.push(...list.secrets);

      if (list.secrets.length < PAGE_SIZE || secrets.length >= list.total_count) {
        return secrets;
      }
    }
  }

  /**
   * Create or overwrite a repository secret
   */
  async putSecret(repository: RepositoryRef, name: string, value: string | Sensitive<string>): Promise<void> {
    if (!isValidSecretName(name)) {
      throw new SecretStoreError(formatRepository(repository), 0, `Invalid secret name: ${name}`);
    }

    const publicKey = await this.getPublicKey(repository);
    const encryptedValue = await encryptSecret(value, publicKey.key);

    const response = await this.request(
      'PUT',
      this.repoPath(repository, `/actions/secrets/${encodeURIComponent(name)}`),
      { encrypted_value: encryptedValue, key_id: publicKey.key_id },
      [201, 204]
    );

    logger.verbose(`${response.status === 201 ? 'Created' : 'Updated'} secret ${name} on ${formatRepository(repository)}`);
  }

  /**
   * Delete a repository secret; false when it did not exist
   */
  async deleteSecret(repository: RepositoryRef, name: string): Promise<boolean> {
    const response = await this.request(
      'DELETE',
      this.repoPath(repository, `/actions/secrets/${encodeURIComponent(name)}`),
      undefined,
      [204, 404]
    );
    return response.status === 204;
  }

  async getPublicKey(repository: RepositoryRef): Promise<RepositoryPublicKey> {
    const name = formatRepository(repository);
    const cached = this.publicKeys.get(name);
    if (cached) {
      return cached;
    }

    const response = await this.request('GET', this.repoPath(repository, '/actions/secrets/public-key'));
    const key = toPublicKey(response.body, name);
    this.publicKeys.set(name, key);
    return key;
  }

  private repoPath(repository: RepositoryRef, suffix: string): string {
    return `/repos/${encodeURIComponent(repository.owner)}/${encodeURIComponent(repository.name)}${suffix}`;
  }

  private raiseForAccess(status: number, repository: string, action: string): void {
    if (status === 401) {
      throw new AuthenticationError('GitHub rejected the token (401 Bad credentials)');
    }
    if (status === 403 || status === 404) {
      throw new AuthorizationError(
        `the GitHub token cannot ${action} on ${repository} (${status}). ` +
        'Check the repository name and that the token has admin or secrets write access.'
      );
    }
  }

  /**
   * Perform a request; statuses outside `expected` raise an error
   */
  private async request(
    method: string,
    path: string,
    body?: unknown,
    expected: number[] = [200]
  ): Promise<ApiResponse> {
    const headers: Record<string, string> = {
      Accept: 'application/vnd.github+json',
      Authorization: `Bearer ${this.token.reveal()}`,
      'X-GitHub-Api-Version': API_VERSION,
      'User-Agent': 'keybridge-cli',
    };
    if (body !== undefined) headers['Content-Type'] = 'application/json';

    const response = await fetch(`${this.baseUrl}${path}`, {
      method,
      headers,
      body: body !== undefined ? JSON.stringify(body) : undefined,
    });

    logger.verbose(`GitHub ${method} ${path}: ${response.status}`);

    if (!expected.includes(response.status)) {
      const text = await response.text();
      if (response.status === 401) {
        throw new AuthenticationError('GitHub rejected the token (401 Bad credentials)');
      }
      throw new SecretStoreError(repositoryFromPath(path), response.status, extractMessage(text));
    }

    if (response.status === 204) {
      return { status: response.status, body: null };
    }

    const text = await response.text();
    return { status: response.status, body: text.length > 0 ? safeJson(text) : null };
  }
}

function toPublicKey(body: unknown, repository: string): RepositoryPublicKey {
  if (body && typeof body === 'object') {
    const candidate = body as Partial<RepositoryPublicKey>;
    if (typeof candidate.key === 'string' && typeof candidate.key_id === 'string') {
      return { key: candidate.key, key_id: candidate.key_id };
    }
  }
  throw new SecretStoreError(repository, 200, 'Unexpected public key response');
}

function toSecretList(body: unknown, repository: string): RepositorySecretList {
  if (body && typeof body === 'object') {
    const candidate = body as Partial<RepositorySecretList>;
    if (typeof candidate.total_count === 'number' && Array.isArray(candidate.secrets)) {
      return { total_count: candidate.total_count, secrets: candidate.secrets };
    }
  }
  throw new SecretStoreError(repository, 200, 'Unexpected secrets list response');
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function extractMessage(text: string): string {
  const parsed = safeJson(text);
  if (parsed && typeof parsed === 'object' && 'message' in parsed && typeof parsed.message === 'string') {
    return parsed.message;
  }
  return text.length > 0 ? text : 'no response body';
}

function repositoryFromPath(path: string): string {
  const match = path.match(/^\/repos\/([^/]+)\/([^/?]+)/);
  return match ? `${decodeURIComponent(match[1])}/${decodeURIComponent(match[2])}` : path;
}
