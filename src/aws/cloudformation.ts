/**
 * CloudFormation adapter: status, change-set preview, deploy and delete for
 * one stack at a time.
 */

import {
  CloudFormationClient,
  DescribeStacksCommand,
  DescribeStackEventsCommand,
  CreateStackCommand,
  UpdateStackCommand,
  DeleteStackCommand,
  CreateChangeSetCommand,
  DescribeChangeSetCommand,
  DeleteChangeSetCommand,
  waitUntilChangeSetCreateComplete,
  waitUntilStackDeleteComplete,
  ChangeSetType,
  type DescribeStacksOutput,
  type Change,
  type StackEvent,
} from '@aws-sdk/client-cloudformation';
import type { AwsCredentialIdentity } from '@aws-sdk/types';
import { CloudFormationError, errorMessage } from '../utils/errors.js';
import * as logger from '../utils/logger.js';
import { STANDARD_TAGS } from '../templates/common.js';
import type { StackStatus, DeployStackOptions, StackDeployer } from '../types/aws.js';

/**
 * Progress callback invoked on every poll while a stack operation runs
 */
export type StackProgressListener = (update: {
  stackName: string;
  status: string;
  completed: number;
  total: number;
  latestResourceId?: string;
}) => void;

export async function getStackStatus(
  stackName: string,
  credentials?: AwsCredentialIdentity,
  region?: string
): Promise<StackStatus> {
  const client = new CloudFormationClient({
    credentials,
    region,
  });

  try {
    const response: DescribeStacksOutput = await client.send(
      new DescribeStacksCommand({ StackName: stackName })
    );

    const stack = response.Stacks?.[0];

    if (!stack) {
      return { exists: false };
    }

    return {
      exists: true,
      status: stack.StackStatus,
      stackId: stack.StackId,
    };
  } catch (error) {
    if (errorMessage(error).includes('does not exist')) {
      return { exists: false };
    }

    throw error;
  }
}

/**
 * Print what an apply would change in an existing stack, through a throwaway
 * UPDATE change set. A stack that does not exist yet is reported as a create.
 */
export async function previewStackChanges(options: DeployStackOptions): Promise<void> {
  const { stackName, template, region, credentials } = options;

  const client = new CloudFormationClient({
    credentials,
    region,
  });

  const templateBody = JSON.stringify(template);
  const stackStatus = await getStackStatus(stackName, credentials, region);
  const changeSetName = `keybridge-preview-${Date.now()}`;

  // Creating a CREATE change set would leave the stack in REVIEW_IN_PROGRESS,
  // which blocks the real deployment
  if (!stackStatus.exists) {
    logger.info(`  ${stackName}: new stack in account ${options.accountId} (${region || 'default region'})`);
    return;
  }

  try {
    await client.send(
      new CreateChangeSetCommand({
        StackName: stackName,
        ChangeSetName: changeSetName,
        TemplateBody: templateBody,
        Capabilities: ['CAPABILITY_NAMED_IAM'],
        ChangeSetType: ChangeSetType.UPDATE,
      })
    );

    await waitUntilChangeSetCreateComplete(
      { client, maxWaitTime: 120 },
      { StackName: stackName, ChangeSetName: changeSetName }
    );

    const changeSetResponse = await client.send(
      new DescribeChangeSetCommand({
        StackName: stackName,
        ChangeSetName: changeSetName,
      })
    );

    logStackChanges(stackName, changeSetResponse.Changes || [], options.accountId, region);

    await client.send(
      new DeleteChangeSetCommand({
        StackName: stackName,
        ChangeSetName: changeSetName,
      })
    );
  } catch (error) {
    const message = errorMessage(error);

    if (message.includes('No updates are to be performed') ||
        message.includes("didn't contain changes")) {
      logger.verbose(`  ${stackName}: template unchanged`);
      await discardChangeSet(client, stackName, changeSetName);
      return;
    }

    await discardChangeSet(client, stackName, changeSetName);

    // A failed preview must not block the deployment itself
    logger.verbose(`  Could not preview changes for ${stackName}: ${message}`);
  }
}

async function discardChangeSet(
  client: CloudFormationClient,
  stackName: string,
  changeSetName: string
): Promise<void> {
  try {
    await client.send(
      new DeleteChangeSetCommand({
        StackName: stackName,
        ChangeSetName: changeSetName,
      })
    );
  } catch (error) {
    logger.verbose(`  Could not delete change set ${changeSetName}: ${errorMessage(error)}`);
  }
}

function logStackChanges(stackName: string, changes: Change[], accountId: string, region?: string): void {
  if (changes.length === 0) {
    logger.verbose(`  ${stackName}: template unchanged`);
    return;
  }

  logger.info(`  ${stackName}: ${changes.length} resource change(s) in account ${accountId} (${region || 'default region'})`);

  for (const change of changes) {
    const resourceChange = change.ResourceChange;
    if (!resourceChange) continue;

    const actionSymbol = getActionSymbol(resourceChange.Action);
    const resourceType = resourceChange.ResourceType || 'Unknown';
    const logicalId = resourceChange.LogicalResourceId || 'Unknown';
    const replacement = resourceChange.Replacement === 'True' ? ' (REPLACEMENT)' : '';

    logger.info(`    ${actionSymbol} ${resourceType} ${logicalId}${replacement}`);
  }
}

/** One-character marker for a change-set action, as the plan table prints it */
export function getActionSymbol(action: string | undefined): string {
  switch (action) {
    case 'Add':
      return '+';
    case 'Modify':
      return '~';
    case 'Remove':
      return '-';
    case 'Import':
      return '>';
    case 'Dynamic':
      return '?';
    default:
      return ' ';
  }
}

// Stack statuses after which CloudFormation stops working on the stack
const SETTLED_STATUSES = new Set([
  'CREATE_COMPLETE',
  'CREATE_FAILED',
  'DELETE_COMPLETE',
  'DELETE_FAILED',
  'ROLLBACK_COMPLETE',
  'ROLLBACK_FAILED',
  'UPDATE_COMPLETE',
  'UPDATE_FAILED',
  'UPDATE_ROLLBACK_COMPLETE',
  'UPDATE_ROLLBACK_FAILED',
]);

const APPLIED_STATUSES = new Set(['CREATE_COMPLETE', 'UPDATE_COMPLETE']);

const POLL_INTERVAL_MS = 2000;

/** A resource counts as done once it completes forward, never on a rollback */
function isResourceComplete(status: string | undefined): boolean {
  if (!status) return false;
  return status.includes('_COMPLETE') && !status.includes('ROLLBACK');
}

interface OperationTracker {
  stackName: string;
  since: Date;
  seenEventIds: Set<string>;
  completedResources: Set<string>;
  latestResourceId?: string;
  failureReason?: string;
}

/**
 * Fold the stack events raised since the operation began into the tracker,
 * oldest first. The stack's own events are skipped.
 */
async function trackNewEvents(client: CloudFormationClient, tracker: OperationTracker): Promise<void> {
  const response = await client.send(
    new DescribeStackEventsCommand({ StackName: tracker.stackName })
  );

  const unseen = (response.StackEvents ?? []).filter(
    (event): event is StackEvent & { EventId: string } =>
      event.EventId !== undefined &&
      !tracker.seenEventIds.has(event.EventId) &&
      event.Timestamp !== undefined &&
      event.Timestamp >= tracker.since
  );

  for (const event of unseen.reverse()) {
    tracker.seenEventIds.add(event.EventId);

    const resourceId = event.LogicalResourceId;
    if (!resourceId || resourceId === tracker.stackName) continue;

    const status = event.ResourceStatus ?? '';
    tracker.latestResourceId = resourceId;
    logger.verbose(`[${tracker.stackName}] ${resourceId} -> ${status}`);

    if (isResourceComplete(status)) {
      tracker.completedResources.add(resourceId);
    }
    if (status.includes('FAILED') && event.ResourceStatusReason) {
      tracker.failureReason = `${resourceId}: ${event.ResourceStatusReason}`;
    }
  }
}

/**
 * Poll a create or update until the stack settles. Resolves when the stack
 * lands in CREATE_COMPLETE or UPDATE_COMPLETE and throws on any other
 * settled status, quoting the last resource failure seen.
 */
async function waitForStack(
  client: CloudFormationClient,
  stackName: string,
  operationStartTime: Date,
  totalResources: number,
  onProgress?: StackProgressListener,
  maxWaitSeconds: number = 600
): Promise<void> {
  const deadline = Date.now() + maxWaitSeconds * 1000;
  const tracker: OperationTracker = {
    stackName,
    since: operationStartTime,
    seenEventIds: new Set(),
    completedResources: new Set(),
  };

  for (;;) {
    if (Date.now() > deadline) {
      throw new Error(`Gave up on ${stackName} after ${maxWaitSeconds} seconds`);
    }

    const described = await client.send(new DescribeStacksCommand({ StackName: stackName }));
    const status = described.Stacks?.[0]?.StackStatus;
    if (status === undefined) {
      throw new Error(`Stack ${stackName} disappeared while it was being deployed`);
    }

    await trackNewEvents(client, tracker);

    onProgress?.({
      stackName,
      status,
      completed: Math.min(tracker.completedResources.size, totalResources),
      total: totalResources,
      latestResourceId: tracker.latestResourceId,
    });

    if (SETTLED_STATUSES.has(status)) {
      if (APPLIED_STATUSES.has(status)) return;
      const reason = tracker.failureReason ? ` (${tracker.failureReason})` : '';
      throw new Error(`Stack settled in ${status}${reason}`);
    }

    await new Promise(resolve => setTimeout(resolve, POLL_INTERVAL_MS));
  }
}

export async function deployStack(
  options: DeployStackOptions,
  onProgress?: StackProgressListener
): Promise<void> {
  const { stackName, template, accountId, region = 'us-east-1', credentials } = options;

  const client = new CloudFormationClient({
    credentials,
    region,
  });

  const templateBody = JSON.stringify(template);
  const resourceCount = Object.keys(template.Resources || {}).length;

  try {
    const stackStatus = await getStackStatus(stackName, credentials, region);

    if (stackStatus.exists && stackStatus.status === 'ROLLBACK_COMPLETE') {
      // ROLLBACK_COMPLETE accepts no update
      logger.verbose(`${stackName} never finished its first create; replacing it`);
      await deleteStackAndWait(client, stackName);
      await createStack(client, stackName, templateBody, resourceCount, onProgress);
    } else if (stackStatus.exists) {
      logger.verbose(`Updating ${stackName}`);
      await updateStack(client, stackName, templateBody, resourceCount, onProgress);
    } else {
      logger.verbose(`Creating ${stackName}`);
      await createStack(client, stackName, templateBody, resourceCount, onProgress);
    }
  } catch (error) {
    const message = errorMessage(error);

    // An unchanged template is a successful, idempotent apply
    if (message.includes('No updates are to be performed')) {
      logger.verbose(`${stackName} already matches the template`);
      return;
    }

    throw new CloudFormationError(stackName, accountId, message);
  }
}

// Returns once CloudFormation reports DELETE_COMPLETE
async function deleteStackAndWait(
  client: CloudFormationClient,
  stackName: string
): Promise<void> {
  await client.send(
    new DeleteStackCommand({
      StackName: stackName,
    })
  );

  await waitUntilStackDeleteComplete(
    { client, maxWaitTime: 300 },
    { StackName: stackName }
  );
}

export async function deleteStack(
  stackName: string,
  accountId: string,
  credentials?: AwsCredentialIdentity,
  region?: string
): Promise<void> {
  const client = new CloudFormationClient({
    credentials,
    region,
  });

  const status = await getStackStatus(stackName, credentials, region);
  if (!status.exists) {
    logger.verbose(`${stackName} is already gone`);
    return;
  }

  try {
    await deleteStackAndWait(client, stackName);
  } catch (error) {
    throw new CloudFormationError(stackName, accountId, `Delete failed: ${errorMessage(error)}`);
  }
}

async function createStack(
  client: CloudFormationClient,
  stackName: string,
  templateBody: string,
  resourceCount: number,
  onProgress?: StackProgressListener
): Promise<void> {
  const operationStartTime = new Date();

  await client.send(
    new CreateStackCommand({
      StackName: stackName,
      TemplateBody: templateBody,
      Capabilities: ['CAPABILITY_NAMED_IAM'],
      Tags: STANDARD_TAGS,
    })
  );

  await waitForStack(client, stackName, operationStartTime, resourceCount, onProgress);
}

async function updateStack(
  client: CloudFormationClient,
  stackName: string,
  templateBody: string,
  resourceCount: number,
  onProgress?: StackProgressListener
): Promise<void> {
  const operationStartTime = new Date();

  await client.send(
    new UpdateStackCommand({
      StackName: stackName,
      TemplateBody: templateBody,
      Capabilities: ['CAPABILITY_NAMED_IAM'],
    })
  );

  await waitForStack(client, stackName, operationStartTime, resourceCount, onProgress);
}

/**
 * Read stack outputs as a key-value map, or null if the stack does not exist
 */
export async function readStackOutputs(
  stackName: string,
  credentials?: AwsCredentialIdentity,
  region?: string
): Promise<Record<string, string> | null> {
  const client = new CloudFormationClient({
    credentials,
    region,
  });

  try {
    const stacksResponse = await client.send(
      new DescribeStacksCommand({ StackName: stackName })
    );

    const stack = stacksResponse.Stacks?.[0];
    if (!stack) {
      return null;
    }

    const outputs: Record<string, string> = {};
    for (const output of stack.Outputs ?? []) {
      if (output.OutputKey && output.OutputValue) {
        outputs[output.OutputKey] = output.OutputValue;
      }
    }

    return outputs;
  } catch (error) {
    if (errorMessage(error).includes('does not exist')) {
      return null;
    }

    throw error;
  }
}

/**
 * Bind the stack operations to one account and region
 */
export function createStackDeployer(
  accountId: string,
  region: string,
  onProgress?: StackProgressListener,
  credentials?: AwsCredentialIdentity
): StackDeployer {
  return {
    getStackStatus: (stackName) => getStackStatus(stackName, credentials, region),
    previewStackChanges: (options) => previewStackChanges({ ...options, region, credentials }),
    deployStack: (options) => deployStack({ ...options, region, credentials }, onProgress),
    readStackOutputs: (stackName) => readStackOutputs(stackName, credentials, region),
    deleteStack: (stackName) => deleteStack(stackName, accountId, credentials, region),
  };
}
