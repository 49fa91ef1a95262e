/**
 * Workflow command implementation
 *
 * Writes the GitHub Actions workflow that checks the stored credentials.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { generateVerificationWorkflow, renderWorkflow } from '../workflow/generate.js';
import * as logger from '../utils/logger.js';
import type { WorkflowOptions } from '../types/config.js';
import { handleCommandError, loadCommandConfig } from './context.js';

export async function workflowCommand(options: WorkflowOptions): Promise<void> {
  try {
    const config = await loadCommandConfig(options);

    const content = renderWorkflow(
      generateVerificationWorkflow({
        branches: config.workflow.branches,
        awsRegion: config.workflow.awsRegion,
      })
    );

    if (options.stdout) {
      process.stdout.write(content);
      return;
    }

    const outputPath = resolve(options.output ?? config.workflow.path);
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, content, 'utf-8');

    logger.success(`Wrote ${outputPath}`);
    if (config.workflow.branches.includes('**')) {
      logger.info('The workflow runs on pushes and pull requests for every branch; narrow it with workflow.branches.');
    }
  } catch (error) {
    handleCommandError(error);
  }
}
