import { describe, it, expect, vi, beforeEach } from 'vitest';
import { DeleteObjectCommand, GetObjectCommand, PutObjectCommand } from '@aws-sdk/client-s3';
import { S3StateBackend } from '../state/s3-backend.js';
import { nextState, parseState, serializeState } from '../state/record.js';
import { KeybridgeError, StateLockError } from '../utils/errors.js';
import type { ProvisioningState } from '../types/state.js';

const { mockSend } = vi.hoisted(() => ({ mockSend: vi.fn() }));

vi.mock('@aws-sdk/client-s3', async (importOriginal) => {
  const mod = await importOriginal<typeof import('@aws-sdk/client-s3')>();
  return {
    ...mod,
    S3Client: class {
      send = mockSend;
    },
  };
});

vi.mock('../utils/logger.js', () => ({
  verbose: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

const backendConfig = {
  bucket: 'example-org-keybridge-state',
  key: 'keybridge/credentials.state.json',
  region: 'us-east-1',
};

function awsError(name: string, httpStatusCode: number): Error {
  return Object.assign(new Error(name), { name, $metadata: { httpStatusCode } });
}

function body(text: string) {
  return { Body: { transformToString: async () => text } };
}

const state: ProvisioningState = nextState(null, {
  stackName: 'keybridge-credentials',
  region: 'us-east-1',
  userName: 'github-actions-user',
  userArn: 'arn:aws:iam::123456789012:user/github-actions-user',
  policyArn: 'arn:aws:iam::aws:policy/AmazonS3FullAccess',
  accessKeyId: 'AKIAEXAMPLE000000001',
  credentialsSecretArn: 'arn:aws:secretsmanager:us-east-1:123456789012:secret:keybridge/keybridge-credentials/access-key',
  repository: { owner: 'example-org', name: 'example-repo' },
  secrets: [{ name: 'AWS_ACCESS_KEY_ID', updatedAt: '2026-03-01T12:00:00.000Z' }],
  appliedAt: '2026-03-01T12:00:00.000Z',
});

describe('S3StateBackend', () => {
  let backend: S3StateBackend;

  beforeEach(() => {
    mockSend.mockReset();
    backend = new S3StateBackend(backendConfig, { who: 'tester@localhost' });
  });

  it('should describe its location', () => {
    expect(backend.location).toBe('s3://example-org-keybridge-state/keybridge/credentials.state.json');
  });

  describe('read', () => {
    it('should return null when there is no state object', async () => {
      mockSend.mockRejectedValueOnce(awsError('NoSuchKey', 404));

      await expect(backend.read()).resolves.toBeNull();
    });

    it('should parse a stored record', async () => {
      mockSend.mockResolvedValueOnce(body(serializeState(state)));

      await expect(backend.read()).resolves.toEqual(state);

      const command = mockSend.mock.calls[0][0];
      expect(command).toBeInstanceOf(GetObjectCommand);
      expect(command.input).toEqual({
        Bucket: 'example-org-keybridge-state',
        Key: 'keybridge/credentials.state.json',
      });
    });

    it('should surface other S3 errors', async () => {
      mockSend.mockRejectedValueOnce(awsError('AccessDenied', 403));

      await expect(backend.read()).rejects.toThrow('AccessDenied');
    });
  });

  describe('write', () => {
    it('should write the record with server-side encryption', async () => {
      mockSend.mockResolvedValueOnce({});

      await backend.write(state);

      const command = mockSend.mock.calls[0][0];
      expect(command).toBeInstanceOf(PutObjectCommand);
      expect(command.input).toEqual({
        Bucket: 'example-org-keybridge-state',
        Key: 'keybridge/credentials.state.json',
        Body: serializeState(state),
        ContentType: 'application/json',
        ServerSideEncryption: 'AES256',
      });
    });
  });

  describe('lock', () => {
    it('should create the lock object only if none exists', async () => {
      mockSend.mockResolvedValueOnce({});

      const handle = await backend.lock('provision');

      expect(handle.info.operation).toBe('provision');
      expect(handle.info.who).toBe('tester@localhost');

      const command = mockSend.mock.calls[0][0];
      expect(command).toBeInstanceOf(PutObjectCommand);
      expect(command.input.Key).toBe('keybridge/credentials.state.json.lock');
      expect(command.input.IfNoneMatch).toBe('*');
      expect(JSON.parse(command.input.Body)).toEqual(handle.info);
    });

    it('should raise StateLockError with the holder when the lock exists', async () => {
      const holder = { id: 'lock-1', operation: 'provision', who: 'other@host', createdAt: '2026-03-01T12:00:00.000Z' };
      mockSend
        .mockRejectedValueOnce(awsError('PreconditionFailed', 412))
        .mockResolvedValueOnce(body(JSON.stringify(holder)));

      const error = await backend.lock('provision').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(StateLockError);
      expect(error).toMatchObject({
        lockKey: 's3://example-org-keybridge-state/keybridge/credentials.state.json.lock',
        holder,
      });
    });

    it('should pass on errors that are not lock conflicts', async () => {
      mockSend.mockRejectedValueOnce(awsError('AccessDenied', 403));

      await expect(backend.lock('provision')).rejects.toThrow('AccessDenied');
    });
  });

  describe('forceUnlock', () => {
    const held = { id: 'lock-1', operation: 'provision', who: 'other@host', createdAt: '2026-03-01T12:00:00.000Z' };

    it('should delete a lock with the matching id', async () => {
      mockSend.mockResolvedValueOnce(body(JSON.stringify(held))).mockResolvedValueOnce({});

      await expect(backend.forceUnlock('lock-1')).resolves.toBe(true);

      const command = mockSend.mock.calls[1][0];
      expect(command).toBeInstanceOf(DeleteObjectCommand);
      expect(command.input).toEqual({
        Bucket: 'example-org-keybridge-state',
        Key: 'keybridge/credentials.state.json.lock',
      });
    });

    it('should refuse a different lock id', async () => {
      mockSend.mockResolvedValueOnce(body(JSON.stringify(held)));

      await expect(backend.forceUnlock('lock-2')).rejects.toThrow(KeybridgeError);
      expect(mockSend).toHaveBeenCalledTimes(1);
    });

    it('should report false when nothing is locked', async () => {
      mockSend.mockRejectedValueOnce(awsError('NoSuchKey', 404));

      await expect(backend.forceUnlock('lock-1')).resolves.toBe(false);
    });
  });
});

describe('state record', () => {
  it('should increment the serial and keep the lineage', () => {
    const next = nextState(state, { ...state, accessKeyId: 'AKIAEXAMPLE000000002' });

    expect(next.serial).toBe(2);
    expect(next.lineage).toBe(state.lineage);
    expect(next.accessKeyId).toBe('AKIAEXAMPLE000000002');
  });

  it('should reject records of another format version', () => {
    const body = JSON.stringify({ ...state, version: 4 });

    expect(() => parseState(body, 's3://bucket/key')).toThrow(
      'State at s3://bucket/key has format version 4; this release reads version 1'
    );
  });

  it('should reject records that are not JSON', () => {
    expect(() => parseState('{', 's3://bucket/key')).toThrow('State at s3://bucket/key is not valid JSON');
  });

  it('should reject records missing fields', () => {
    const { accessKeyId: _omitted, ...partial } = state;

    expect(() => parseState(JSON.stringify(partial), 's3://bucket/key')).toThrow(
      'State at s3://bucket/key is missing "accessKeyId"'
    );
  });
});
