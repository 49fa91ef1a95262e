/**
 * Credential provisioning flow
 *
 * Apply order: GitHub token -> repository access -> AWS identity -> state
 * lock -> plan -> retired stack -> credentials stack -> key pair ->
 * repository secrets -> retired repository secrets -> state record. Nothing
 * in AWS is touched until the token has been resolved and shown to reach the
 * repository.
 */

import { resolveGithubToken } from '../parsers/config.js';
import {
  CredentialsStackOutputs,
  generateCredentialsStackTemplate,
} from '../templates/credentials-stack.js';
import { CloudFormationError, VerificationError, errorMessage } from '../utils/errors.js';
import * as logger from '../utils/logger.js';
import type { Sensitive } from '../utils/sensitive.js';
import { nextState } from '../state/record.js';
import {
  ACCESS_KEY_ID_SECRET,
  SECRET_ACCESS_KEY_SECRET,
  type KeybridgeConfig,
  type RepositoryRef,
} from '../types/config.js';
import type {
  CredentialVault,
  CurrentIdentity,
  DeployStackOptions,
  IdentityResolver,
  StackDeployer,
  StackStatus,
} from '../types/aws.js';
import {
  formatRepository,
  type RepositorySecretMetadata,
  type SecretStore,
} from '../types/github.js';
import type { LockHandle, ProvisioningState, StateBackend } from '../types/state.js';
import {
  MANAGED_SECRET_NAMES,
  buildPlan,
  findRetiredRepository,
  findRetiredStack,
  type ObservedState,
  type ProvisioningPlan,
} from './plan.js';

/**
 * Collaborators of the flow. The AWS and GitHub clients are built from
 * factories so nothing is constructed before the checks that guard it.
 */
export interface ProvisioningDeps {
  env: NodeJS.ProcessEnv;
  tokenEnv: string;
  createSecretStore: (token: Sensitive<string>) => SecretStore;
  identity: IdentityResolver;
  createStackDeployer: (identity: CurrentIdentity) => StackDeployer;
  vault: CredentialVault;
  state: StateBackend;
  /** Progress messages for a spinner */
  onStep?: (message: string) => void;
  now?: () => Date;
}

export interface ApplyOptions {
  dryRun?: boolean;
  /** Asked once the plan is known; returning false stops without changes */
  confirm?: (plan: ProvisioningPlan) => Promise<boolean>;
}

export interface RunDestroyOptions {
  confirm?: () => Promise<boolean>;
}

export type ApplyResult =
  | { status: 'planned'; plan: ProvisioningPlan }
  | { status: 'cancelled'; plan: ProvisioningPlan }
  | { status: 'applied'; plan: ProvisioningPlan; state: ProvisioningState };

export type DestroyResult =
  | { status: 'cancelled' }
  | {
      status: 'destroyed';
      deletedSecrets: string[];
      stackName: string;
      /** Stack recorded in state under another name, deleted as well */
      retiredStack: string | null;
      /** owner/repo/NAME of secrets deleted from a previously used repository */
      retiredSecrets: string[];
    };

export interface StatusReport {
  identity: CurrentIdentity;
  stack: StackStatus;
  outputs: Record<string, string> | null;
  state: ProvisioningState | null;
  secrets: RepositorySecretMetadata[];
  drift: string[];
}

interface Session {
  secretStore: SecretStore;
  identity: CurrentIdentity;
  stacks: StackDeployer;
}

/**
 * Token, repository access and AWS identity, in that order
 */
async function openSession(config: KeybridgeConfig, deps: ProvisioningDeps): Promise<Session> {
  const step = deps.onStep ?? (() => undefined);

  step('Resolving GitHub token...');
  const token = resolveGithubToken(deps.env, deps.tokenEnv);
  const secretStore = deps.createSecretStore(token);

  step(`Checking access to ${formatRepository(config.repository)}...`);
  await secretStore.verifyAccess(config.repository);

  step('Checking AWS credentials...');
  const identity = await deps.identity.getCurrentIdentity();

  return { secretStore, identity, stacks: deps.createStackDeployer(identity) };
}

/**
 * Run `fn` while holding the state lock
 */
async function withStateLock<T>(
  state: StateBackend,
  operation: string,
  fn: () => Promise<T>
): Promise<T> {
  const handle: LockHandle = await state.lock(operation);

  try {
    return await fn();
  } finally {
    try {
      await state.unlock(handle);
    } catch (error) {
      logger.warn(
        `Could not release state lock ${handle.info.id}: ${errorMessage(error)}. ` +
        `Run \`keybridge unlock ${handle.info.id}\` once no other run is active.`
      );
    }
  }
}

interface Observation extends ObservedState {
  secrets: RepositorySecretMetadata[];
}

async function observe(
  config: KeybridgeConfig,
  session: Session,
  state: StateBackend
): Promise<Observation> {
  const stack = await session.stacks.getStackStatus(config.stackName);
  const outputs = stack.exists ? await session.stacks.readStackOutputs(config.stackName) : null;
  const record = await state.read();
  const secrets = await session.secretStore.listSecrets(config.repository);

  return {
    stack,
    outputs,
    state: record,
    existingSecretNames: secrets.map(secret => secret.name),
    secrets,
  };
}

/**
 * Delete secrets left in a repository the configuration no longer names.
 * Returns the addresses of the secrets that existed.
 */
async function deleteRetiredSecrets(
  secretStore: SecretStore,
  repository: RepositoryRef,
  names: readonly string[],
  step: (message: string) => void
): Promise<string[]> {
  const previous = formatRepository(repository);
  const deleted: string[] = [];
  for (const name of names) {
    step(`Deleting secret ${name} from ${previous}...`);
    if (await secretStore.deleteSecret(repository, name)) {
      deleted.push(`${previous}/${name}`);
    }
  }
  return deleted;
}

function requireOutput(
  outputs: Record<string, string>,
  key: string,
  stackName: string,
  accountId: string
): string {
  const value = outputs[key];
  if (!value) {
    throw new CloudFormationError(stackName, accountId, `Stack output ${key} is missing`);
  }
  return value;
}

/**
 * Create or converge the IAM user, its access key and policy attachment, and
 * publish the key pair as repository secrets
 */
export async function runProvision(
  config: KeybridgeConfig,
  deps: ProvisioningDeps,
  options: ApplyOptions = {}
): Promise<ApplyResult> {
  const step = deps.onStep ?? (() => undefined);
  const now = deps.now ?? (() => new Date());

  const session = await openSession(config, deps);
  const { secretStore, identity, stacks } = session;

  return withStateLock<ApplyResult>(deps.state, options.dryRun ? 'plan' : 'provision', async () => {
    step('Reading current state...');
    const observed = await observe(config, session, deps.state);
    const plan = buildPlan(config, observed);

    if (options.dryRun) {
      return { status: 'planned', plan };
    }

    if (options.confirm && !(await options.confirm(plan))) {
      return { status: 'cancelled', plan };
    }

    // The retired stack goes first: its IAM user may carry the configured name
    const retiredStack = findRetiredStack(config, observed.state);
    if (retiredStack) {
      step(`Deleting retired stack ${retiredStack}...`);
      await stacks.deleteStack(retiredStack);
    }

    const repositoryName = formatRepository(config.repository);
    const deployOptions: DeployStackOptions = {
      stackName: config.stackName,
      template: generateCredentialsStackTemplate({
        userName: config.iamUserName,
        stackName: config.stackName,
        policyArn: config.policyArn,
        repository: repositoryName,
      }),
      accountId: identity.accountId,
      region: config.region,
    };

    step(`Deploying ${config.stackName}...`);
    await stacks.previewStackChanges(deployOptions);
    await stacks.deployStack(deployOptions);

    const outputs = await stacks.readStackOutputs(config.stackName);
    if (!outputs) {
      throw new CloudFormationError(config.stackName, identity.accountId, 'Stack not found after deployment');
    }

    const output = (key: string) => requireOutput(outputs, key, config.stackName, identity.accountId);
    const accessKeyId = output(CredentialsStackOutputs.ACCESS_KEY_ID);
    const secretArn = output(CredentialsStackOutputs.CREDENTIALS_SECRET_ARN);

    step('Reading access key pair...');
    const keyPair = await deps.vault.readAccessKeyPair(secretArn);
    if (keyPair.accessKeyId !== accessKeyId) {
      throw new VerificationError(
        `credentials secret holds key ${keyPair.accessKeyId} but the stack reports ${accessKeyId}`
      );
    }

    step(`Writing repository secrets to ${repositoryName}...`);
    await secretStore.putSecret(config.repository, ACCESS_KEY_ID_SECRET, keyPair.accessKeyId);
    await secretStore.putSecret(config.repository, SECRET_ACCESS_KEY_SECRET, keyPair.secretAccessKey);

    const retiredRepository = findRetiredRepository(config, observed.state);
    if (retiredRepository && observed.state) {
      await deleteRetiredSecrets(
        secretStore,
        retiredRepository,
        observed.state.secrets.map(secret => secret.name),
        step
      );
    }

    const appliedAt = now().toISOString();
    const state = nextState(observed.state, {
      stackName: config.stackName,
      region: config.region,
      userName: output(CredentialsStackOutputs.USER_NAME),
      userArn: output(CredentialsStackOutputs.USER_ARN),
      policyArn: output(CredentialsStackOutputs.POLICY_ARN),
      accessKeyId,
      credentialsSecretArn: secretArn,
      repository: config.repository,
      secrets: MANAGED_SECRET_NAMES.map(name => ({ name, updatedAt: appliedAt })),
      appliedAt,
    });

    step(`Saving state to ${deps.state.location}...`);
    await deps.state.write(state);

    return { status: 'applied', plan, state };
  });
}

/**
 * Remove the repository secrets, the credentials stack and the state record,
 * including a stack or repository recorded under an earlier configuration
 */
export async function runDestroy(
  config: KeybridgeConfig,
  deps: ProvisioningDeps,
  options: RunDestroyOptions = {}
): Promise<DestroyResult> {
  const step = deps.onStep ?? (() => undefined);

  const { secretStore, stacks } = await openSession(config, deps);

  return withStateLock<DestroyResult>(deps.state, 'destroy', async () => {
    if (options.confirm && !(await options.confirm())) {
      return { status: 'cancelled' };
    }

    const recorded = await deps.state.read();

    const deletedSecrets: string[] = [];
    for (const name of MANAGED_SECRET_NAMES) {
      step(`Deleting secret ${name}...`);
      if (await secretStore.deleteSecret(config.repository, name)) {
        deletedSecrets.push(name);
      } else {
        logger.verbose(`Secret ${name} was not present`);
      }
    }

    const retiredRepository = findRetiredRepository(config, recorded);
    const retiredSecrets = retiredRepository && recorded
      ? await deleteRetiredSecrets(secretStore, retiredRepository, recorded.secrets.map(secret => secret.name), step)
      : [];

    step(`Deleting ${config.stackName}...`);
    await stacks.deleteStack(config.stackName);

    const retiredStack = findRetiredStack(config, recorded);
    if (retiredStack) {
      step(`Deleting retired stack ${retiredStack}...`);
      await stacks.deleteStack(retiredStack);
    }

    step(`Removing state at ${deps.state.location}...`);
    await deps.state.delete();

    return {
      status: 'destroyed',
      deletedSecrets,
      stackName: config.stackName,
      retiredStack,
      retiredSecrets,
    };
  });
}

/**
 * Report what exists and where it has drifted from the last apply
 */
export async function readStatus(
  config: KeybridgeConfig,
  deps: ProvisioningDeps
): Promise<StatusReport> {
  const session = await openSession(config, deps);
  const observed = await observe(config, session, deps.state);
  const secrets = observed.secrets.filter(secret =>
    MANAGED_SECRET_NAMES.some(name => name === secret.name)
  );

  return {
    identity: session.identity,
    stack: observed.stack,
    outputs: observed.outputs,
    state: observed.state,
    secrets,
    drift: findDrift(config, observed),
  };
}

/**
 * Differences between the live resources, the state record and the configuration
 */
export function findDrift(config: KeybridgeConfig, observed: ObservedState): string[] {
  const drift: string[] = [];
  const { state } = observed;
  const outputs = observed.outputs ?? {};

  const retiredStack = findRetiredStack(config, state);
  if (retiredStack) {
    drift.push(`State records stack ${retiredStack} but the configuration names ${config.stackName}; run provision to retire it`);
  } else if (state && !observed.stack.exists) {
    drift.push(`Stack ${state.stackName} recorded in state no longer exists`);
  }

  const retiredRepository = findRetiredRepository(config, state);
  if (retiredRepository) {
    drift.push(
      `Secrets were last written to ${formatRepository(retiredRepository)}; run provision to move them to ` +
      formatRepository(config.repository)
    );
  }

  const liveKeyId = outputs[CredentialsStackOutputs.ACCESS_KEY_ID];
  if (state && liveKeyId && liveKeyId !== state.accessKeyId) {
    drift.push(
      `Access key ${liveKeyId} differs from recorded key ${state.accessKeyId}; the repository secrets may be stale`
    );
  }

  const livePolicy = outputs[CredentialsStackOutputs.POLICY_ARN];
  if (livePolicy && livePolicy !== config.policyArn) {
    drift.push(`Attached policy ${livePolicy} differs from configured ${config.policyArn}`);
  }

  if (observed.stack.exists || state) {
    for (const name of MANAGED_SECRET_NAMES) {
      if (!observed.existingSecretNames.includes(name)) {
        drift.push(`Repository secret ${name} is missing`);
      }
    }
  }

  return drift;
}
