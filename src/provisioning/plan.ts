/**
 * Provisioning plan: what an apply would do to each managed resource
 */

import { CredentialsStackOutputs } from '../templates/credentials-stack.js';
import {
  ACCESS_KEY_ID_SECRET,
  SECRET_ACCESS_KEY_SECRET,
  type KeybridgeConfig,
  type RepositoryRef,
} from '../types/config.js';
import type { StackStatus } from '../types/aws.js';
import type { ProvisioningState } from '../types/state.js';
import { formatRepository } from '../types/github.js';

export type ResourceKind =
  | 'credentials-stack'
  | 'iam-user'
  | 'access-key'
  | 'policy-attachment'
  | 'repository-secret';

export type ChangeAction = 'create' | 'update' | 'replace' | 'delete' | 'no-op';

export interface ResourceChange {
  kind: ResourceKind;
  /** Stable identifier, e.g. iam-user/github-actions-user */
  address: string;
  action: ChangeAction;
  reason?: string;
}

export interface ProvisioningPlan {
  stackName: string;
  changes: ResourceChange[];
}

/**
 * Everything observed about the current state before planning
 */
export interface ObservedState {
  stack: StackStatus;
  outputs: Record<string, string> | null;
  state: ProvisioningState | null;
  existingSecretNames: string[];
}

export const MANAGED_SECRET_NAMES = [ACCESS_KEY_ID_SECRET, SECRET_ACCESS_KEY_SECRET] as const;

// Stack statuses where none of the stack's resources exist any more
const EMPTY_STACK_STATES = new Set(['ROLLBACK_COMPLETE', 'DELETE_COMPLETE']);

/**
 * Stack recorded by the last apply when the configuration now names another
 * one. Its user and access key must go.
 */
export function findRetiredStack(config: KeybridgeConfig, state: ProvisioningState | null): string | null {
  return state && state.stackName !== config.stackName ? state.stackName : null;
}

/**
 * Repository that received the secrets on the last apply when the
 * configuration now names another one
 */
export function findRetiredRepository(
  config: KeybridgeConfig,
  state: ProvisioningState | null
): RepositoryRef | null {
  if (!state) return null;
  const { owner, name } = state.repository;
  return owner === config.repository.owner && name === config.repository.name ? null : state.repository;
}

/**
 * Compare the configuration with what exists and decide an action per resource
 */
export function buildPlan(config: KeybridgeConfig, observed: ObservedState): ProvisioningPlan {
  const { iamUserName, policyArn, repository } = config;
  const changes: ResourceChange[] = [];

  const userAddress = `iam-user/${iamUserName}`;
  const keyAddress = `access-key/${iamUserName}`;
  const attachmentAddress = `policy-attachment/${iamUserName}`;

  const retiredStack = findRetiredStack(config, observed.state);
  if (retiredStack) {
    changes.push({
      kind: 'credentials-stack',
      address: `credentials-stack/${retiredStack}`,
      action: 'delete',
      reason: `replaced by ${config.stackName}`,
    });
  }

  const stackLive = observed.stack.exists && !EMPTY_STACK_STATES.has(observed.stack.status ?? '');
  const outputs = observed.outputs ?? {};

  const currentUser = outputs[CredentialsStackOutputs.USER_NAME] ?? observed.state?.userName;
  const currentPolicy = outputs[CredentialsStackOutputs.POLICY_ARN] ?? observed.state?.policyArn;
  const currentKey = outputs[CredentialsStackOutputs.ACCESS_KEY_ID];

  if (!stackLive) {
    changes.push(
      { kind: 'iam-user', address: userAddress, action: 'create' },
      { kind: 'access-key', address: keyAddress, action: 'create' },
      { kind: 'policy-attachment', address: attachmentAddress, action: 'create', reason: policyArn }
    );
  } else if (currentUser !== iamUserName) {
    const reason = `user name changes from ${currentUser ?? '(unknown)'}`;
    changes.push(
      { kind: 'iam-user', address: userAddress, action: 'replace', reason },
      { kind: 'access-key', address: keyAddress, action: 'replace', reason: 'parent user is replaced' },
      { kind: 'policy-attachment', address: attachmentAddress, action: 'replace', reason: 'parent user is replaced' }
    );
  } else {
    changes.push({ kind: 'iam-user', address: userAddress, action: 'no-op' });
    changes.push(
      currentKey
        ? { kind: 'access-key', address: keyAddress, action: 'no-op' }
        : { kind: 'access-key', address: keyAddress, action: 'create' }
    );
    changes.push(
      currentPolicy === policyArn
        ? { kind: 'policy-attachment', address: attachmentAddress, action: 'no-op' }
        : {
            kind: 'policy-attachment',
            address: attachmentAddress,
            action: 'replace',
            reason: `${currentPolicy ?? '(none)'} -> ${policyArn}`,
          }
    );
  }

  // Secrets are rewritten on every apply so they always carry the live key
  const repo = formatRepository(repository);
  for (const name of MANAGED_SECRET_NAMES) {
    const exists = observed.existingSecretNames.includes(name);
    changes.push({
      kind: 'repository-secret',
      address: `repository-secret/${repo}/${name}`,
      action: exists ? 'update' : 'create',
    });
  }

  const retiredRepository = findRetiredRepository(config, observed.state);
  if (retiredRepository && observed.state) {
    const previous = formatRepository(retiredRepository);
    for (const secret of observed.state.secrets) {
      changes.push({
        kind: 'repository-secret',
        address: `repository-secret/${previous}/${secret.name}`,
        action: 'delete',
        reason: `secrets move to ${repo}`,
      });
    }
  }

  return { stackName: config.stackName, changes };
}

/**
 * True when the apply would create or change an AWS resource
 */
export function hasAwsChanges(plan: ProvisioningPlan): boolean {
  return plan.changes.some(change => change.kind !== 'repository-secret' && change.action !== 'no-op');
}

export function summarizePlan(plan: ProvisioningPlan): Record<ChangeAction, number> {
  const summary: Record<ChangeAction, number> = { create: 0, update: 0, replace: 0, delete: 0, 'no-op': 0 };
  for (const change of plan.changes) {
    summary[change.action]++;
  }
  return summary;
}

const ACTION_SYMBOLS: Record<ChangeAction, string> = {
  create: '+',
  update: '~',
  replace: '-/+',
  delete: '-',
  'no-op': ' ',
};

/**
 * One display line per change, e.g. "  + create   iam-user/github-actions-user"
 */
export function formatPlanLines(plan: ProvisioningPlan): string[] {
  return plan.changes.map(change => {
    const symbol = ACTION_SYMBOLS[change.action].padStart(3);
    const reason = change.reason ? ` (${change.reason})` : '';
    return `${symbol} ${change.action.padEnd(8)} ${change.address}${reason}`;
  });
}
