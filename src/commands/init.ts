/**
 * Init command implementation
 *
 * Deploys the state backend stack: the versioned, encrypted bucket that holds
 * the provisioning state record and its lock.
 */

import ora from 'ora';
import { getCurrentIdentity } from '../aws/credentials.js';
import { deployStack, previewStackChanges } from '../aws/cloudformation.js';
import { generateBackendStackTemplate, getBackendStackName } from '../templates/backend-stack.js';
import * as logger from '../utils/logger.js';
import type { DeployStackOptions } from '../types/aws.js';
import type { GlobalOptions } from '../types/config.js';
import { handleCommandError, loadCommandConfig } from './context.js';

export async function initCommand(options: GlobalOptions): Promise<void> {
  const spinner = ora();

  try {
    const config = await loadCommandConfig(options);
    const { bucket, region } = config.backend;

    logger.header('keybridge Init');

    spinner.start('Checking AWS credentials...');
    const identity = await getCurrentIdentity(region);
    spinner.succeed(`Authenticated as ${identity.arn}`);

    const deployOptions: DeployStackOptions = {
      stackName: getBackendStackName(bucket),
      template: generateBackendStackTemplate({ bucketName: bucket }),
      accountId: identity.accountId,
      region,
    };

    await previewStackChanges(deployOptions);

    spinner.start(`Deploying ${deployOptions.stackName}...`);
    await deployStack(deployOptions, (update) => {
      spinner.text = `Deploying ${update.stackName}: ${update.status} (${update.completed}/${update.total})`;
    });
    spinner.succeed(`State bucket s3://${bucket} ready in ${region}`);

    logger.info('Next: run `keybridge provision` to create the IAM user and repository secrets.');
  } catch (error) {
    handleCommandError(error, spinner);
  }
}
