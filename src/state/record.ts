/**
 * State record construction, parsing and serialization
 */

import { randomUUID } from 'node:crypto';
import { KeybridgeError } from '../utils/errors.js';
import { STATE_FORMAT_VERSION, type ProvisioningState, type SecretRecord } from '../types/state.js';
import type { RepositoryRef } from '../types/config.js';

/**
 * Fields the flow supplies for a new record; bookkeeping comes from the
 * previous record
 */
export type StateInput = Omit<ProvisioningState, 'version' | 'serial' | 'lineage'>;

/**
 * Build the next state record. The serial increases by one per write and the
 * lineage is kept for the lifetime of the state.
 */
export function nextState(previous: ProvisioningState | null, input: StateInput): ProvisioningState {
  return {
    ...input,
    version: STATE_FORMAT_VERSION,
    serial: previous ? previous.serial + 1 : 1,
    lineage: previous?.lineage ?? randomUUID(),
  };
}

export function serializeState(state: ProvisioningState): string {
  return JSON.stringify(state, null, 2) + '\n';
}

export function parseState(body: string, location: string): ProvisioningState {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    throw new KeybridgeError(`State at ${location} is not valid JSON`);
  }

  if (!parsed || typeof parsed !== 'object') {
    throw new KeybridgeError(`State at ${location} is not an object`);
  }

  const record: Record<string, unknown> = { ...parsed };

  if (record.version !== STATE_FORMAT_VERSION) {
    throw new KeybridgeError(
      `State at ${location} has format version ${String(record.version)}; this release reads version ${STATE_FORMAT_VERSION}`
    );
  }

  const text = (field: keyof ProvisioningState): string => {
    const value = record[field];
    if (typeof value !== 'string') {
      throw new KeybridgeError(`State at ${location} is missing "${field}"`);
    }
    return value;
  };

  const repository = toRepository(record.repository);
  const secrets = toSecretRecords(record.secrets);
  if (typeof record.serial !== 'number' || !repository || !secrets) {
    throw new KeybridgeError(`State at ${location} is incomplete`);
  }

  return {
    version: STATE_FORMAT_VERSION,
    serial: record.serial,
    lineage: text('lineage'),
    stackName: text('stackName'),
    region: text('region'),
    userName: text('userName'),
    userArn: text('userArn'),
    policyArn: text('policyArn'),
    accessKeyId: text('accessKeyId'),
    credentialsSecretArn: text('credentialsSecretArn'),
    repository,
    secrets,
    appliedAt: text('appliedAt'),
  };
}

function toRepository(value: unknown): RepositoryRef | null {
  if (!value || typeof value !== 'object') return null;
  const fields: Record<string, unknown> = { ...value };
  const { owner, name } = fields;
  return typeof owner === 'string' && typeof name === 'string' ? { owner, name } : null;
}

function toSecretRecords(value: unknown): SecretRecord[] | null {
  if (!Array.isArray(value)) return null;
  const records: SecretRecord[] = [];
  for (const entry of value) {
    if (!entry || typeof entry !== 'object') return null;
    const fields: Record<string, unknown> = { ...entry };
    const { name, updatedAt } = fields;
    if (typeof name !== 'string' || typeof updatedAt !== 'string') return null;
    records.push({ name, updatedAt });
  }
  return records;
}
