/**
 * Reads the access key pair stored by the credentials stack
 */

import { SecretsManagerClient, GetSecretValueCommand } from '@aws-sdk/client-secrets-manager';
import type { AwsCredentialIdentity } from '@aws-sdk/types';
import { VerificationError } from '../utils/errors.js';
import * as logger from '../utils/logger.js';
import { Sensitive } from '../utils/sensitive.js';
import { isValidAccessKeyId } from '../utils/validation.js';
import type { AccessKeyPair, CredentialVault } from '../types/aws.js';

export async function readAccessKeyPair(
  secretArn: string,
  region?: string,
  credentials?: AwsCredentialIdentity
): Promise<AccessKeyPair> {
  const client = new SecretsManagerClient({ region, credentials });

  logger.verbose(`Reading access key pair from ${secretArn}`);

  const response = await client.send(new GetSecretValueCommand({ SecretId: secretArn }));

  if (!response.SecretString) {
    throw new VerificationError(`Secret ${secretArn} has no string value`);
  }

  return parseAccessKeySecret(response.SecretString, secretArn);
}

/**
 * Parse the JSON document written by the credentials stack
 */
export function parseAccessKeySecret(secretString: string, source: string): AccessKeyPair {
  let parsed: unknown;
  try {
    parsed = JSON.parse(secretString);
  } catch {
    // The parser message may quote the input, so it is not passed on
    throw new VerificationError(`Secret ${source} does not contain a JSON key pair`);
  }

  if (!parsed || typeof parsed !== 'object') {
    throw new VerificationError(`Secret ${source} does not contain a JSON key pair`);
  }

  const { accessKeyId, secretAccessKey } = parsed as { accessKeyId?: unknown; secretAccessKey?: unknown };

  if (typeof secretAccessKey !== 'string' || secretAccessKey.length === 0) {
    throw new VerificationError(`Secret ${source} is missing secretAccessKey`);
  }

  // Wrap before anything else can print it
  const wrappedSecret = new Sensitive(secretAccessKey);

  if (typeof accessKeyId !== 'string' || !isValidAccessKeyId(accessKeyId)) {
    throw new VerificationError(`Secret ${source} has a missing or malformed accessKeyId`);
  }

  return { accessKeyId, secretAccessKey: wrappedSecret };
}

export function createCredentialVault(region?: string, credentials?: AwsCredentialIdentity): CredentialVault {
  return {
    readAccessKeyPair: (secretArn) => readAccessKeyPair(secretArn, region, credentials),
  };
}
