/**
 * Verify command implementation
 *
 * The in-job check: lists S3 buckets with the credentials in
 * AWS_ACCESS_KEY_ID / AWS_SECRET_ACCESS_KEY, printed the way `aws s3 ls`
 * prints them. The exit status is the result.
 */

import { formatBucketLine, listBuckets, type BucketSummary } from '../aws/s3.js';
import { VerificationError, errorMessage } from '../utils/errors.js';
import * as logger from '../utils/logger.js';
import { setVerbose } from '../utils/logger.js';
import { Sensitive } from '../utils/sensitive.js';
import { isValidAccessKeyId } from '../utils/validation.js';
import { ACCESS_KEY_ID_SECRET, DEFAULT_REGION, SECRET_ACCESS_KEY_SECRET, type VerifyOptions } from '../types/config.js';
import { handleCommandError } from './context.js';

export interface AmbientCredentials {
  accessKeyId: string;
  secretAccessKey: Sensitive<string>;
  sessionToken?: Sensitive<string>;
}

/**
 * Read the key pair the job's credential step exported
 */
export function readAmbientCredentials(env: NodeJS.ProcessEnv): AmbientCredentials {
  const accessKeyId = env[ACCESS_KEY_ID_SECRET]?.trim();
  const secretAccessKey = env[SECRET_ACCESS_KEY_SECRET]?.trim();

  if (!accessKeyId) {
    throw new VerificationError(`${ACCESS_KEY_ID_SECRET} is not set`);
  }
  if (!secretAccessKey) {
    throw new VerificationError(`${SECRET_ACCESS_KEY_SECRET} is not set`);
  }

  const wrapped = new Sensitive(secretAccessKey);

  if (!isValidAccessKeyId(accessKeyId)) {
    throw new VerificationError(`${ACCESS_KEY_ID_SECRET} is not a valid access key id`);
  }

  const sessionToken = env.AWS_SESSION_TOKEN?.trim();

  return {
    accessKeyId,
    secretAccessKey: wrapped,
    ...(sessionToken ? { sessionToken: new Sensitive(sessionToken) } : {}),
  };
}

/**
 * List buckets with the given credentials; any failure is a VerificationError
 */
export async function verifyCredentials(
  credentials: AmbientCredentials,
  region: string
): Promise<BucketSummary[]> {
  try {
    return await listBuckets(region, {
      accessKeyId: credentials.accessKeyId,
      secretAccessKey: credentials.secretAccessKey.reveal(),
      sessionToken: credentials.sessionToken?.reveal(),
    });
  } catch (error) {
    throw new VerificationError(`could not list S3 buckets: ${errorMessage(error)}`);
  }
}

export async function verifyCommand(options: VerifyOptions): Promise<void> {
  try {
    if (options.verbose) {
      setVerbose(true);
    }

    const region = options.region ?? process.env.AWS_REGION ?? DEFAULT_REGION;
    const credentials = readAmbientCredentials(process.env);

    logger.verbose(`Listing buckets as ${credentials.accessKeyId} in ${region}`);

    const buckets = await verifyCredentials(credentials, region);
    for (const bucket of buckets) {
      logger.line(formatBucketLine(bucket));
    }

    logger.success(`Credentials verified (${buckets.length} bucket${buckets.length === 1 ? '' : 's'} visible)`);
  } catch (error) {
    handleCommandError(error);
  }
}
