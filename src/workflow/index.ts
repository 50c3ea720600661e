/**
 * Workflow file builder
 *
 * Renders the trigger configuration (push branch, daily cron, manual
 * dispatch) and the job that runs this action.
 */

import { stringify } from 'yaml';
import {
  DEFAULT_BRANCH,
  DEFAULT_GENERATOR,
  DEFAULT_PYTHON_VERSION,
  DEFAULT_REQUIREMENTS,
  DEFAULT_SCHEDULE,
  isValidBranchName
} from '../shared/config.js';
import { RunnerError } from '../shared/errors.js';
import { validateCron } from '../triggers/cron.js';

export interface WorkflowOptions {
  name?: string;
  branch?: string;
  schedule?: string;
  pythonVersion?: string;
  requirements?: string;
  generator?: string;
  /** `uses:` reference of this action */
  actionRef?: string;
  /** Secret names, not values */
  accessTokenSecret?: string;
  userNameSecret?: string;
}

export const DEFAULT_ACTION_REF = 'readme-refresh-action@v1';

/**
 * Check the trigger knobs of a workflow
 * @throws RunnerError with category 'configuration'
 */
export function validateWorkflowOptions(options: WorkflowOptions): void {
  const branch = options.branch ?? DEFAULT_BRANCH;
  if (!isValidBranchName(branch)) {
    throw new RunnerError('configuration', `branch "${branch}" is not a valid branch name`);
  }
  const schedule = options.schedule ?? DEFAULT_SCHEDULE;
  const problem = validateCron(schedule);
  if (problem) {
    throw new RunnerError('configuration', `schedule "${schedule}": ${problem}`);
  }
}

/**
 * Build the workflow definition as a plain object
 * @param options - Trigger and step settings
 * @returns Object ready for YAML serialisation
 */
export function buildWorkflowDefinition(options: WorkflowOptions = {}) {
  validateWorkflowOptions(options);

  const branch = options.branch ?? DEFAULT_BRANCH;
  const pythonVersion = options.pythonVersion ?? DEFAULT_PYTHON_VERSION;
  const accessTokenSecret = options.accessTokenSecret ?? 'ACCESS_TOKEN';
  const userNameSecret = options.userNameSecret ?? 'USER_NAME';

  return {
    name: options.name ?? 'README build',
    on: {
      push: { branches: [branch] },
      schedule: [{ cron: options.schedule ?? DEFAULT_SCHEDULE }],
      workflow_dispatch: {}
    },
    jobs: {
      build: {
        'runs-on': 'ubuntu-latest',
        permissions: { contents: 'write' },
        steps: [
          { uses: 'actions/checkout@v4' },
          {
            uses: 'actions/setup-python@v5',
            with: { 'python-version': pythonVersion }
          },
          {
            name: 'Refresh README banner',
            uses: options.actionRef ?? DEFAULT_ACTION_REF,
            with: {
              access_token: `\${{ secrets.${accessTokenSecret} }}`,
              user_name: `\${{ secrets.${userNameSecret} }}`,
              branch,
              python_version: pythonVersion,
              requirements: options.requirements ?? DEFAULT_REQUIREMENTS,
              generator: options.generator ?? DEFAULT_GENERATOR
            }
          }
        ]
      }
    }
  };
}

/**
 * Render the workflow as YAML
 * @param options - Trigger and step settings
 * @returns Workflow file contents
 */
export function buildWorkflow(options: WorkflowOptions = {}): string {
  return stringify(buildWorkflowDefinition(options), { lineWidth: 0 });
}
