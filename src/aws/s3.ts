/**
 * S3 operations used by the verification job
 */

import { S3Client, ListBucketsCommand } from '@aws-sdk/client-s3';
import type { AwsCredentialIdentity } from '@aws-sdk/types';
import * as logger from '../utils/logger.js';

export interface BucketSummary {
  name: string;
  createdAt?: Date;
}

/**
 * List every bucket visible to the credentials (the `aws s3 ls` call)
 */
export async function listBuckets(
  region: string,
  credentials?: AwsCredentialIdentity
): Promise<BucketSummary[]> {
  const client = new S3Client({ region, credentials });
  const buckets: BucketSummary[] = [];

  let continuationToken: string | undefined;
  do {
    const response = await client.send(
      new ListBucketsCommand({ ContinuationToken: continuationToken })
    );

    for (const bucket of response.Buckets ?? []) {
      if (bucket.Name) {
        buckets.push({ name: bucket.Name, createdAt: bucket.CreationDate });
      }
    }

    continuationToken = response.ContinuationToken;
  } while (continuationToken);

  logger.verbose(`Listed ${buckets.length} bucket(s)`);

  return buckets;
}

/**
 * Format a bucket the way `aws s3 ls` prints it: "YYYY-MM-DD HH:MM:SS name"
 */
export function formatBucketLine(bucket: BucketSummary): string {
  if (!bucket.createdAt) {
    return `                    ${bucket.name}`;
  }
  const iso = bucket.createdAt.toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, 19)} ${bucket.name}`;
}
