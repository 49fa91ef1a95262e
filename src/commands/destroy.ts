/**
 * Destroy command implementation
 */

import ora from 'ora';
import { runDestroy } from '../provisioning/flow.js';
import * as logger from '../utils/logger.js';
import { confirmDestroy } from '../utils/prompts.js';
import type { DestroyOptions } from '../types/config.js';
import { createProvisioningDeps, handleCommandError, loadCommandConfig } from './context.js';

export async function destroyCommand(options: DestroyOptions): Promise<void> {
  const spinner = ora();

  try {
    const config = await loadCommandConfig(options);

    logger.header('keybridge Destroy');

    spinner.start('Starting...');
    const deps = createProvisioningDeps(config, options, spinner);

    const result = await runDestroy(config, deps, {
      confirm: options.yes
        ? undefined
        : async () => {
            spinner.stop();
            const proceed = await confirmDestroy(config);
            if (proceed) spinner.start('Destroying...');
            return proceed;
          },
    });

    if (result.status === 'cancelled') {
      logger.info('Destroy cancelled by user.');
      return;
    }

    spinner.succeed(`Stack ${result.stackName} deleted`);
    if (result.retiredStack) {
      logger.success(`Retired stack ${result.retiredStack} deleted`);
    }
    if (result.retiredSecrets.length > 0) {
      logger.success(`Deleted secrets from the previous repository: ${result.retiredSecrets.join(', ')}`);
    }
    if (result.deletedSecrets.length > 0) {
      logger.success(`Deleted secrets: ${result.deletedSecrets.join(', ')}`);
    } else {
      logger.info('No repository secrets were present.');
    }
    logger.success('State record removed.');
  } catch (error) {
    handleCommandError(error, spinner);
  }
}
