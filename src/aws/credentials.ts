/**
 * AWS credential detection and validation
 */

import { STSClient, GetCallerIdentityCommand } from '@aws-sdk/client-sts';
import { NoCredentialsError, errorMessage } from '../utils/errors.js';
import * as logger from '../utils/logger.js';
import type { CurrentIdentity, IdentityResolver } from '../types/aws.js';

// Default region for STS (global service, any region works)
const DEFAULT_REGION = 'us-east-1';

export async function getCurrentIdentity(region: string = DEFAULT_REGION): Promise<CurrentIdentity> {
  const client = new STSClient({ region });

  try {
    logger.verbose('Checking AWS credentials...');
    const response = await client.send(new GetCallerIdentityCommand({}));

    if (!response.Account || !response.Arn || !response.UserId) {
      throw new NoCredentialsError();
    }

    logger.verbose(`Authenticated as: ${response.Arn}`);
    logger.verbose(`Account ID: ${response.Account}`);

    return {
      accountId: response.Account,
      arn: response.Arn,
      userId: response.UserId,
    };
  } catch (error) {
    if (error instanceof NoCredentialsError) {
      throw error;
    }

    const message = errorMessage(error);

    if (
      message.includes('Could not load credentials') ||
      message.includes('Missing credentials') ||
      message.includes('ExpiredToken') ||
      message.includes('InvalidClientTokenId')
    ) {
      throw new NoCredentialsError();
    }

    throw error;
  }
}

export function createIdentityResolver(region?: string): IdentityResolver {
  return {
    getCurrentIdentity: () => getCurrentIdentity(region),
  };
}
