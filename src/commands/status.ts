/**
 * Status command implementation
 */

import ora from 'ora';
import { CredentialsStackOutputs } from '../templates/credentials-stack.js';
import { readStatus } from '../provisioning/flow.js';
import * as logger from '../utils/logger.js';
import { formatRepository } from '../types/github.js';
import type { GlobalOptions } from '../types/config.js';
import { createProvisioningDeps, handleCommandError, loadCommandConfig } from './context.js';

export async function statusCommand(options: GlobalOptions): Promise<void> {
  const spinner = ora();

  try {
    const config = await loadCommandConfig(options);

    spinner.start('Reading status...');
    const report = await readStatus(config, createProvisioningDeps(config, options, spinner));
    spinner.stop();

    logger.header('keybridge Status');

    logger.line(`Account:    ${report.identity.accountId}`);
    logger.line(`Repository: ${formatRepository(config.repository)}`);
    logger.newline();

    const outputs = report.outputs ?? {};
    const rows: string[][] = [
      ['Item', 'Value'],
      ['Stack', report.stack.exists ? `${config.stackName} (${report.stack.status ?? 'unknown'})` : 'not deployed'],
      ['IAM user', outputs[CredentialsStackOutputs.USER_NAME] ?? '-'],
      ['Access key', outputs[CredentialsStackOutputs.ACCESS_KEY_ID] ?? '-'],
      ['Policy', outputs[CredentialsStackOutputs.POLICY_ARN] ?? '-'],
      ['State', report.state ? `serial ${report.state.serial}, applied ${report.state.appliedAt}` : 'none'],
    ];
    for (const secret of report.secrets) {
      rows.push([`Secret ${secret.name}`, `updated ${secret.updated_at}`]);
    }
    logger.table(rows);
    logger.newline();

    if (report.drift.length === 0) {
      logger.success('No drift detected.');
      return;
    }

    for (const finding of report.drift) {
      logger.warn(finding);
    }
    logger.info('Run `keybridge provision` to converge.');
  } catch (error) {
    handleCommandError(error, spinner);
  }
}
