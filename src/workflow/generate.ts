/**
 * GitHub Actions workflow that proves the stored credentials work
 *
 * One job, three ordered steps: checkout, configure-aws-credentials fed by
 * the two repository secrets, and a read-only `aws s3 ls`. The job fails
 * when either secret is absent or the key cannot list buckets.
 */

import { stringify as stringifyYaml } from 'yaml';
import {
  ACCESS_KEY_ID_SECRET,
  DEFAULT_REGION,
  DEFAULT_WORKFLOW_BRANCHES,
  SECRET_ACCESS_KEY_SECRET,
} from '../types/config.js';

export const WORKFLOW_NAME = 'Verify AWS credentials';
export const JOB_ID = 'verify-aws-credentials';

export const CHECKOUT_ACTION = 'actions/checkout@v4';
export const CONFIGURE_CREDENTIALS_ACTION = 'aws-actions/configure-aws-credentials@v4';

export interface VerificationWorkflowOptions {
  /** Branch filters for push and pull_request; every branch by default */
  branches?: string[];
  awsRegion?: string;
  runsOn?: string;
}

export interface WorkflowStep {
  name: string;
  uses?: string;
  with?: Record<string, string>;
  run?: string;
}

export interface WorkflowJob {
  'runs-on': string;
  steps: WorkflowStep[];
}

export interface WorkflowDocument {
  name: string;
  on: {
    push: { branches: string[] };
    pull_request: { branches: string[] };
    workflow_dispatch: Record<string, never>;
  };
  jobs: Record<string, WorkflowJob>;
}

function secretExpression(name: string): string {
  return `\${{ secrets.${name} }}`;
}

export function generateVerificationWorkflow(options: VerificationWorkflowOptions = {}): WorkflowDocument {
  const branches = options.branches ?? [...DEFAULT_WORKFLOW_BRANCHES];

  return {
    name: WORKFLOW_NAME,
    on: {
      push: { branches: [...branches] },
      pull_request: { branches: [...branches] },
      workflow_dispatch: {},
    },
    jobs: {
      [JOB_ID]: {
        'runs-on': options.runsOn ?? 'ubuntu-latest',
        steps: [
          {
            name: 'Checkout',
            uses: CHECKOUT_ACTION,
          },
          {
            name: 'Configure AWS credentials',
            uses: CONFIGURE_CREDENTIALS_ACTION,
            with: {
              'aws-access-key-id': secretExpression(ACCESS_KEY_ID_SECRET),
              'aws-secret-access-key': secretExpression(SECRET_ACCESS_KEY_SECRET),
              'aws-region': options.awsRegion ?? DEFAULT_REGION,
            },
          },
          {
            name: 'List S3 buckets',
            run: 'aws s3 ls',
          },
        ],
      },
    },
  };
}

const HEADER = [
  '# Generated by keybridge. Re-run `keybridge workflow` after changing keybridge.yaml.',
  '',
].join('\n');

export function renderWorkflow(workflow: WorkflowDocument): string {
  return HEADER + stringifyYaml(workflow, { lineWidth: 0 });
}
