/**
 * Wiring shared by the commands: configuration, live service clients and
 * the top-level error handler
 */

import type { Ora } from 'ora';
import { createStackDeployer } from '../aws/cloudformation.js';
import { createIdentityResolver } from '../aws/credentials.js';
import { createCredentialVault } from '../aws/secrets-manager.js';
import { GitHubClient } from '../github/client.js';
import { loadConfig } from '../parsers/config.js';
import type { ProvisioningDeps } from '../provisioning/flow.js';
import { S3StateBackend } from '../state/s3-backend.js';
import { KeybridgeError } from '../utils/errors.js';
import * as logger from '../utils/logger.js';
import { setVerbose } from '../utils/logger.js';
import {
  DEFAULT_CONFIG_FILE,
  DEFAULT_TOKEN_ENV,
  type GlobalOptions,
  type KeybridgeConfig,
} from '../types/config.js';

export async function loadCommandConfig(options: GlobalOptions): Promise<KeybridgeConfig> {
  if (options.verbose) {
    setVerbose(true);
  }

  return loadConfig(options.config ?? DEFAULT_CONFIG_FILE);
}

/**
 * Live collaborators for the provisioning flow; progress goes to `spinner`
 */
export function createProvisioningDeps(
  config: KeybridgeConfig,
  options: GlobalOptions,
  spinner: Ora
): ProvisioningDeps {
  return {
    env: process.env,
    tokenEnv: options.tokenEnv ?? DEFAULT_TOKEN_ENV,
    createSecretStore: (token) => new GitHubClient({ token, baseUrl: process.env.GITHUB_API_URL }),
    identity: createIdentityResolver(config.region),
    createStackDeployer: (identity) =>
      createStackDeployer(identity.accountId, config.region, (update) => {
        spinner.text = `Deploying ${update.stackName}: ${update.status} (${update.completed}/${update.total})`;
      }),
    vault: createCredentialVault(config.region),
    state: new S3StateBackend(config.backend),
    onStep: (message) => {
      spinner.text = message;
    },
  };
}

/**
 * Print a failure and exit 1
 */
export function handleCommandError(error: unknown, spinner?: Ora): never {
  if (spinner?.isSpinning) {
    spinner.fail();
  }

  if (error instanceof KeybridgeError) {
    logger.error(error.message);
    process.exit(1);
  }

  logger.error(`Unexpected error: ${error instanceof Error ? error.message : String(error)}`);
  if (logger.isVerbose() && error instanceof Error && error.stack) {
    console.error(logger.redact(error.stack));
  }
  process.exit(1);
}
