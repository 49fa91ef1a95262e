/**
 * Unlock command implementation
 *
 * Removes a state lock left behind by an interrupted run.
 */

import { S3StateBackend } from '../state/s3-backend.js';
import * as logger from '../utils/logger.js';
import type { GlobalOptions } from '../types/config.js';
import { handleCommandError, loadCommandConfig } from './context.js';

export async function unlockCommand(lockId: string, options: GlobalOptions): Promise<void> {
  try {
    const config = await loadCommandConfig(options);
    const backend = new S3StateBackend(config.backend);

    if (await backend.forceUnlock(lockId)) {
      logger.success(`Released lock ${lockId} on ${backend.location}`);
    } else {
      logger.info(`${backend.location} is not locked.`);
    }
  } catch (error) {
    handleCommandError(error);
  }
}
