/**
 * User prompts and confirmations
 */

import inquirer from 'inquirer';
import * as logger from './logger.js';
import { formatRepository } from '../types/github.js';
import type { KeybridgeConfig } from '../types/config.js';
import { summarizePlan, type ProvisioningPlan } from '../provisioning/plan.js';

function printPlan(plan: ProvisioningPlan, config: KeybridgeConfig): void {
  logger.line(`IAM user:   ${config.iamUserName}`);
  logger.line(`Policy:     ${config.policyArn}`);
  logger.line(`Repository: ${formatRepository(config.repository)}`);
  logger.line(`Stack:      ${plan.stackName} (${config.region})`);
  logger.newline();

  const tableRows: string[][] = [
    ['Resource', 'Address', 'Action'],
  ];

  for (const change of plan.changes) {
    tableRows.push([
      change.kind,
      change.address,
      change.reason ? `${change.action} (${change.reason})` : change.action,
    ]);
  }

  logger.table(tableRows);
  logger.newline();

  const summary = summarizePlan(plan);
  logger.info(
    `Plan: ${summary.create} to create, ${summary.update} to update, ` +
    `${summary.replace} to replace, ${summary.delete} to delete, ${summary['no-op']} unchanged.`
  );
}

export async function confirmPlan(plan: ProvisioningPlan, config: KeybridgeConfig): Promise<boolean> {
  logger.header('keybridge Provisioning Summary');
  printPlan(plan, config);
  logger.newline();

  const { proceed } = await inquirer.prompt<{ proceed: boolean }>([
    {
      type: 'confirm',
      name: 'proceed',
      message: 'Do you want to proceed?',
      default: false,
    },
  ]);

  return proceed;
}

export function showDryRun(plan: ProvisioningPlan, config: KeybridgeConfig): void {
  logger.header('keybridge Plan (Dry Run)');
  printPlan(plan, config);
  logger.newline();
  logger.info('Dry run complete. No changes were made.');
}

export async function confirmDestroy(config: KeybridgeConfig): Promise<boolean> {
  logger.header('keybridge Destroy');

  logger.line('The following will be removed:');
  logger.line(`  - Repository secrets AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY on ${formatRepository(config.repository)}`);
  logger.line(`  - Stack ${config.stackName}: IAM user ${config.iamUserName}, its access key and policy attachment`);
  logger.line(`  - State record s3://${config.backend.bucket}/${config.backend.key}`);
  logger.newline();

  const { proceed } = await inquirer.prompt<{ proceed: boolean }>([
    {
      type: 'confirm',
      name: 'proceed',
      message: 'Destroy these resources?',
      default: false,
    },
  ]);

  return proceed;
}
