/**
 * Provision command implementation
 *
 * Creates or converges the IAM user, its access key and policy attachment
 * through the credentials stack, then writes the key pair into the
 * repository secrets AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY.
 */

import ora from 'ora';
import { runProvision } from '../provisioning/flow.js';
import { hasAwsChanges } from '../provisioning/plan.js';
import * as logger from '../utils/logger.js';
import { confirmPlan, showDryRun } from '../utils/prompts.js';
import { formatRepository } from '../types/github.js';
import type { ProvisionOptions } from '../types/config.js';
import { createProvisioningDeps, handleCommandError, loadCommandConfig } from './context.js';

export async function provisionCommand(options: ProvisionOptions): Promise<void> {
  const spinner = ora();

  try {
    const config = await loadCommandConfig(options);

    logger.header('keybridge Provision');

    spinner.start('Starting...');
    const deps = createProvisioningDeps(config, options, spinner);

    const result = await runProvision(config, deps, {
      dryRun: options.dryRun,
      confirm: options.yes
        ? undefined
        : async (plan) => {
            spinner.stop();
            const proceed = await confirmPlan(plan, config);
            if (proceed) spinner.start('Applying...');
            return proceed;
          },
    });

    if (result.status === 'planned') {
      spinner.succeed('Plan ready');
      showDryRun(result.plan, config);
      return;
    }

    if (result.status === 'cancelled') {
      logger.info('Provisioning cancelled by user.');
      return;
    }

    spinner.succeed(`State saved (serial ${result.state.serial})`);

    logger.newline();
    if (!hasAwsChanges(result.plan)) {
      logger.info('AWS resources were already up to date.');
    }
    logger.success(`IAM user ${result.state.userName} has access key ${result.state.accessKeyId}`);
    logger.success(`Policy attached: ${result.state.policyArn}`);
    logger.success(
      `Secrets ${result.state.secrets.map(secret => secret.name).join(' and ')} written to ` +
      formatRepository(result.state.repository)
    );
  } catch (error) {
    handleCommandError(error, spinner);
  }
}

/**
 * `keybridge plan` is a provision dry run
 */
export async function planCommand(options: ProvisionOptions): Promise<void> {
  await provisionCommand({ ...options, dryRun: true });
}
