/**
 * S3 state backend
 *
 * The state record is one JSON object at a fixed key, written with
 * server-side encryption into a versioned bucket. Concurrent runs are kept
 * apart by a lock object beside it, created with a conditional write
 * (If-None-Match: *) so only one writer can hold it.
 */

import { randomUUID } from 'node:crypto';
import { hostname, userInfo } from 'node:os';
import {
  S3Client,
  GetObjectCommand,
  PutObjectCommand,
  DeleteObjectCommand,
} from '@aws-sdk/client-s3';
import type { AwsCredentialIdentity } from '@aws-sdk/types';
import { KeybridgeError, StateLockError, errorMessage, type LockInfo } from '../utils/errors.js';
import * as logger from '../utils/logger.js';
import { getLockKey } from '../naming/index.js';
import type { BackendConfig } from '../types/config.js';
import type { LockHandle, ProvisioningState, StateBackend } from '../types/state.js';
import { parseState, serializeState } from './record.js';

export interface S3StateBackendOptions {
  credentials?: AwsCredentialIdentity;
  /** Identifies the lock holder; defaults to user@host */
  who?: string;
}

export class S3StateBackend implements StateBackend {
  readonly location: string;

  private readonly client: S3Client;
  private readonly bucket: string;
  private readonly key: string;
  private readonly lockKey: string;
  private readonly who: string;

  constructor(config: BackendConfig, options: S3StateBackendOptions = {}) {
    this.bucket = config.bucket;
    this.key = config.key;
    this.lockKey = getLockKey(config.key);
    this.location = `s3://${config.bucket}/${config.key}`;
    this.who = options.who ?? defaultLockOwner();
    this.client = new S3Client({
      region: config.region,
      credentials: options.credentials,
    });
  }

  async read(): Promise<ProvisioningState | null> {
    const body = await this.getObjectText(this.key);
    if (body === null) {
      logger.verbose(`No state at ${this.location}`);
      return null;
    }

    return parseState(body, this.location);
  }

  async write(state: ProvisioningState): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: this.key,
        Body: serializeState(state),
        ContentType: 'application/json',
        ServerSideEncryption: 'AES256',
      })
    );

    logger.verbose(`Wrote state serial ${state.serial} to ${this.location}`);
  }

  async delete(): Promise<void> {
    await this.client.send(
      new DeleteObjectCommand({ Bucket: this.bucket, Key: this.key })
    );
    logger.verbose(`Deleted state at ${this.location}`);
  }

  async lock(operation: string): Promise<LockHandle> {
    const info: LockInfo = {
      id: randomUUID(),
      operation,
      who: this.who,
      createdAt: new Date().toISOString(),
    };

    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: this.lockKey,
          Body: JSON.stringify(info),
          ContentType: 'application/json',
          ServerSideEncryption: 'AES256',
          IfNoneMatch: '*',
        })
      );
    } catch (error) {
      if (isConditionalWriteConflict(error)) {
        throw new StateLockError(`s3://${this.bucket}/${this.lockKey}`, await this.readLockInfo());
      }
      throw error;
    }

    logger.verbose(`Acquired state lock ${info.id}`);
    return { info };
  }

  async unlock(handle: LockHandle): Promise<void> {
    await this.forceUnlock(handle.info.id);
    logger.verbose(`Released state lock ${handle.info.id}`);
  }

  /**
   * Remove the lock if it carries the given id; false when there was none
   */
  async forceUnlock(lockId: string): Promise<boolean> {
    const current = await this.readLockInfo();

    if (!current) {
      logger.verbose('No lock to release');
      return false;
    }

    if (current.id !== lockId) {
      throw new KeybridgeError(
        `Lock id mismatch: the state is locked with ${current.id}, not ${lockId}.`
      );
    }

    await this.client.send(
      new DeleteObjectCommand({ Bucket: this.bucket, Key: this.lockKey })
    );
    return true;
  }

  private async readLockInfo(): Promise<LockInfo | null> {
    const body = await this.getObjectText(this.lockKey);
    if (body === null) {
      return null;
    }

    try {
      const parsed: unknown = JSON.parse(body);
      if (isLockInfo(parsed)) {
        return parsed;
      }
    } catch (error) {
      logger.verbose(`Unreadable lock object: ${errorMessage(error)}`);
    }
    return null;
  }

  private async getObjectText(key: string): Promise<string | null> {
    try {
      const response = await this.client.send(
        new GetObjectCommand({ Bucket: this.bucket, Key: key })
      );
      if (!response.Body) {
        return null;
      }
      return await response.Body.transformToString('utf-8');
    } catch (error) {
      if (error instanceof Error && (error.name === 'NoSuchKey' || error.name === 'NotFound')) {
        return null;
      }
      throw error;
    }
  }
}

function isConditionalWriteConflict(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if (error.name === 'PreconditionFailed' || error.name === 'ConditionalRequestConflict') {
    return true;
  }
  const status = httpStatusOf(error);
  return status === 412 || status === 409;
}

function httpStatusOf(error: Error): number | undefined {
  if (!('$metadata' in error)) return undefined;
  const metadata = error.$metadata;
  if (metadata && typeof metadata === 'object' && 'httpStatusCode' in metadata &&
    typeof metadata.httpStatusCode === 'number') {
    return metadata.httpStatusCode;
  }
  return undefined;
}

function isLockInfo(value: unknown): value is LockInfo {
  if (!value || typeof value !== 'object') return false;
  const candidate: Record<string, unknown> = { ...value };
  return typeof candidate.id === 'string' &&
    typeof candidate.operation === 'string' &&
    typeof candidate.who === 'string' &&
    typeof candidate.createdAt === 'string';
}

function defaultLockOwner(): string {
  try {
    return `${userInfo().username}@${hostname()}`;
  } catch {
    return hostname();
  }
}
