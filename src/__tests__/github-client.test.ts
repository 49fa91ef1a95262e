import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import sodium from 'libsodium-wrappers';
import { GitHubClient } from '../github/client.js';
import { encryptSecret } from '../github/encrypt.js';
import { AuthenticationError, AuthorizationError, SecretStoreError } from '../utils/errors.js';
import { Sensitive } from '../utils/sensitive.js';

vi.mock('../utils/logger.js', () => ({
  verbose: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  maskValue: vi.fn(),
}));

const mockFetch = vi.fn<typeof fetch>();

const repository = { owner: 'example-org', name: 'example-repo' };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function emptyResponse(status: number): Response {
  return new Response(null, { status });
}

let keyPair: { publicKey: Uint8Array; privateKey: Uint8Array };
let publicKeyBase64: string;

function openSealed(ciphertext: string): string {
  const sealed = sodium.from_base64(ciphertext, sodium.base64_variants.ORIGINAL);
  return sodium.to_string(sodium.crypto_box_seal_open(sealed, keyPair.publicKey, keyPair.privateKey));
}

function requestOf(index: number): { url: string; init: RequestInit | undefined } {
  const [url, init] = mockFetch.mock.calls[index];
  return { url: String(url), init };
}

beforeEach(async () => {
  await sodium.ready;
  keyPair = sodium.crypto_box_keypair();
  publicKeyBase64 = sodium.to_base64(keyPair.publicKey, sodium.base64_variants.ORIGINAL);

  vi.stubGlobal('fetch', mockFetch);
  mockFetch.mockReset();
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('encryptSecret', () => {
  it('should produce a sealed box the repository key can open', async () => {
    const ciphertext = await encryptSecret(new Sensitive('test-secret-access-key'), publicKeyBase64);

    expect(ciphertext).not.toContain('test-secret-access-key');
    expect(openSealed(ciphertext)).toBe('test-secret-access-key');
  });

  it('should accept plain strings', async () => {
    const ciphertext = await encryptSecret('AKIAEXAMPLE000000001', publicKeyBase64);

    expect(openSealed(ciphertext)).toBe('AKIAEXAMPLE000000001');
  });
});

describe('GitHubClient', () => {
  let client: GitHubClient;

  beforeEach(() => {
    client = new GitHubClient({ token: new Sensitive('test-token') });
  });

  describe('verifyAccess', () => {
    it('should check the repository and its secrets public key', async () => {
      mockFetch
        .mockResolvedValueOnce(jsonResponse({ full_name: 'example-org/example-repo' }))
        .mockResolvedValueOnce(jsonResponse({ key_id: 'key-1', key: publicKeyBase64 }));

      await client.verifyAccess(repository);

      expect(requestOf(0).url).toBe('https://api.github.com/repos/example-org/example-repo');
      expect(requestOf(1).url).toBe('https://api.github.com/repos/example-org/example-repo/actions/secrets/public-key');
      expect(requestOf(0).init?.headers).toEqual({
        Accept: 'application/vnd.github+json',
        Authorization: 'Bearer test-token',
        'X-GitHub-Api-Version': '2022-11-28',
        'User-Agent': 'keybridge-cli',
      });
    });

    it('should raise AuthenticationError for a rejected token', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ message: 'Bad credentials' }, 401));

      await expect(client.verifyAccess(repository)).rejects.toThrow(AuthenticationError);
    });

    it('should raise AuthorizationError when the repository is not visible', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ message: 'Not Found' }, 404));

      await expect(client.verifyAccess(repository)).rejects.toThrow(AuthorizationError);
    });

    it('should raise AuthorizationError when secrets cannot be managed', async () => {
      mockFetch
        .mockResolvedValueOnce(jsonResponse({ full_name: 'example-org/example-repo' }))
        .mockResolvedValueOnce(jsonResponse({ message: 'Resource not accessible by integration' }, 403));

      await expect(client.verifyAccess(repository)).rejects.toThrow(
        /^Not authorized: the GitHub token cannot manage Actions secrets on example-org\/example-repo \(403\)/
      );
    });
  });

  describe('putSecret', () => {
    it('should encrypt the value with the repository key', async () => {
      mockFetch
        .mockResolvedValueOnce(jsonResponse({ key_id: 'key-1', key: publicKeyBase64 }))
        .mockResolvedValueOnce(emptyResponse(201));

      await client.putSecret(repository, 'AWS_SECRET_ACCESS_KEY', new Sensitive('test-secret-access-key'));

      const put = requestOf(1);
      expect(put.url).toBe('https://api.github.com/repos/example-org/example-repo/actions/secrets/AWS_SECRET_ACCESS_KEY');
      expect(put.init?.method).toBe('PUT');

      const payload: { encrypted_value: string; key_id: string } = JSON.parse(String(put.init?.body));
      expect(payload.key_id).toBe('key-1');
      expect(openSealed(payload.encrypted_value)).toBe('test-secret-access-key');
    });

    it('should fetch the public key once per repository', async () => {
      mockFetch
        .mockResolvedValueOnce(jsonResponse({ key_id: 'key-1', key: publicKeyBase64 }))
        .mockResolvedValueOnce(emptyResponse(201))
        .mockResolvedValueOnce(emptyResponse(204));

      await client.putSecret(repository, 'AWS_ACCESS_KEY_ID', 'AKIAEXAMPLE000000001');
      await client.putSecret(repository, 'AWS_SECRET_ACCESS_KEY', new Sensitive('test-secret-access-key'));

      expect(mockFetch).toHaveBeenCalledTimes(3);
    });

    it('should reject reserved secret names before any request', async () => {
      await expect(client.putSecret(repository, 'GITHUB_TOKEN', 'value')).rejects.toThrow(SecretStoreError);
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('should report API failures with status and message', async () => {
      mockFetch
        .mockResolvedValueOnce(jsonResponse({ key_id: 'key-1', key: publicKeyBase64 }))
        .mockResolvedValueOnce(jsonResponse({ message: 'Validation Failed' }, 422));

      await expect(client.putSecret(repository, 'AWS_ACCESS_KEY_ID', 'AKIAEXAMPLE000000001')).rejects.toThrow(
        'GitHub secrets request for example-org/example-repo failed (422): Validation Failed'
      );
    });
  });

  describe('listSecrets', () => {
    it('should follow pages until every secret is read', async () => {
      const page1 = Array.from({ length: 100 }, (_, i) => ({
        name: `SECRET_${i}`,
        created_at: '2026-01-01T00:00:00Z',
        updated_at: '2026-01-01T00:00:00Z',
      }));
      const page2 = [{ name: 'AWS_ACCESS_KEY_ID', created_at: '2026-01-01T00:00:00Z', updated_at: '2026-01-02T00:00:00Z' }];

      mockFetch
        .mockResolvedValueOnce(jsonResponse({ total_count: 101, secrets: page1 }))
        .mockResolvedValueOnce(jsonResponse({ total_count: 101, secrets: page2 }));

      const secrets = await client.listSecrets(repository);

      expect(secrets).toHaveLength(101);
      expect(secrets[100].name).toBe('AWS_ACCESS_KEY_ID');
      expect(requestOf(1).url).toBe(
        'https://api.github.com/repos/example-org/example-repo/actions/secrets?per_page=100&page=2'
      );
    });
  });

  describe('deleteSecret', () => {
    it('should report whether the secret existed', async () => {
      mockFetch.mockResolvedValueOnce(emptyResponse(204)).mockResolvedValueOnce(jsonResponse({ message: 'Not Found' }, 404));

      await expect(client.deleteSecret(repository, 'AWS_ACCESS_KEY_ID')).resolves.toBe(true);
      await expect(client.deleteSecret(repository, 'AWS_ACCESS_KEY_ID')).resolves.toBe(false);
      expect(requestOf(0).init?.method).toBe('DELETE');
    });
  });
});
