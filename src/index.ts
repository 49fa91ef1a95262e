#!/usr/bin/env node

/**
 * keybridge CLI
 *
 * Provision an IAM user and access key for GitHub Actions and store the key
 * pair as repository secrets
 */

import { program } from 'commander';
import { destroyCommand } from './commands/destroy.js';
import { initCommand } from './commands/init.js';
import { planCommand, provisionCommand } from './commands/provision.js';
import { statusCommand } from './commands/status.js';
import { unlockCommand } from './commands/unlock.js';
import { verifyCommand } from './commands/verify.js';
import { workflowCommand } from './commands/workflow.js';
import { DEFAULT_CONFIG_FILE, DEFAULT_TOKEN_ENV } from './types/config.js';

program
  .name('keybridge')
  .description('keybridge - AWS access keys for GitHub Actions, provisioned and stored as repository secrets')
  .version('0.1.0');

const configOption = ['--config <path>', `Configuration file (default: ${DEFAULT_CONFIG_FILE})`] as const;
const tokenEnvOption = [
  '--token-env <name>',
  `Environment variable holding the GitHub token (default: ${DEFAULT_TOKEN_ENV})`,
] as const;
const verboseOption = ['--verbose', 'Enable verbose logging for debugging'] as const;

program
  .command('init')
  .description('Deploy the S3 bucket that holds the provisioning state')
  .option(...configOption)
  .option(...verboseOption)
  .action(initCommand);

program
  .command('plan')
  .description('Show what provision would change, without changing anything')
  .option(...configOption)
  .option(...tokenEnvOption)
  .option(...verboseOption)
  .action(planCommand);

program
  .command('provision')
  .description('Create or update the IAM user, access key and policy attachment, and write the repository secrets')
  .option(...configOption)
  .option(...tokenEnvOption)
  .option('--dry-run', 'Show what would be deployed without actually deploying')
  .option('--yes', 'Skip the confirmation prompt')
  .option(...verboseOption)
  .action(provisionCommand);

program
  .command('status')
  .description('Show the provisioned resources, repository secrets and drift')
  .option(...configOption)
  .option(...tokenEnvOption)
  .option(...verboseOption)
  .action(statusCommand);

program
  .command('destroy')
  .description('Delete the repository secrets, the IAM user and its access key, and the state record')
  .option(...configOption)
  .option(...tokenEnvOption)
  .option('--yes', 'Skip the confirmation prompt')
  .option(...verboseOption)
  .action(destroyCommand);

program
  .command('unlock')
  .description('Release a state lock left by an interrupted run')
  .argument('<lock-id>', 'Lock id reported by the failed run')
  .option(...configOption)
  .option(...verboseOption)
  .action(unlockCommand);

program
  .command('workflow')
  .description('Write the GitHub Actions workflow that verifies the stored credentials')
  .option(...configOption)
  .option('--output <path>', 'Where to write the workflow (default: workflow.path from the configuration)')
  .option('--stdout', 'Print the workflow instead of writing it')
  .option(...verboseOption)
  .action(workflowCommand);

program
  .command('verify')
  .description('List S3 buckets with AWS_ACCESS_KEY_ID / AWS_SECRET_ACCESS_KEY (run inside the workflow)')
  .option('--region <region>', 'Region for the S3 client (default: AWS_REGION or us-east-1)')
  .option(...verboseOption)
  .action(verifyCommand);

program.parse();
