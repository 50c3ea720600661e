/**
 * Step sequence executor
 *
 * Runs the refresh steps once, in order, and stops at the first failing
 * step. Nothing is pushed unless every step before the commit gate
 * succeeded, so a failed run leaves the repository as it was.
 */

import * as core from '@actions/core';
import {
  exitCodeOf,
  toRunnerError,
  type FailureCategory,
  type RunnerError
} from '../shared/errors.js';
import { createCommandRunner, type CommandRunner } from '../shared/exec.js';
import { createGitOperations } from '../shared/git.js';
import type { RunnerConfig } from '../shared/config.js';
import { describeTrigger, type Trigger } from '../triggers/index.js';
import { formatDuration } from '../utils.js';
import { DependencyCache, type CacheBackend, type CacheRestoreResult } from './cache.js';
import type { CommitResult } from './commit-gate.js';
import {
  DEFAULT_POST_STEPS,
  DEFAULT_STEPS,
  type RunContext,
  type RunStep
} from './steps.js';

export type StepStatus = 'success' | 'failed' | 'tolerated' | 'skipped';

export interface StepOutcome {
  name: string;
  status: StepStatus;
  durationMs: number;
  error?: string;
}

export interface RunResult {
  trigger: Trigger;
  success: boolean;
  /** 0, or the exit code of the first failing step */
  exitCode: number;
  steps: StepOutcome[];
  failure?: RunnerError;
  cache?: CacheRestoreResult;
  commit?: CommitResult;
}

/**
 * Executes a fixed list of steps against one run context
 */
export class UpdateRunner {
  private steps: RunStep[];
  private postSteps: RunStep[];

  constructor(steps: RunStep[] = DEFAULT_STEPS, postSteps: RunStep[] = DEFAULT_POST_STEPS) {
    this.steps = steps;
    this.postSteps = postSteps;
  }

  /**
   * Run every step in order
   * @param ctx - Shared run context; steps record their products in ctx.state
   * @returns Outcome of every step and the run's exit code
   */
  async execute(ctx: RunContext): Promise<RunResult> {
    core.info(`Run triggered by ${describeTrigger(ctx.trigger)}`);
    core.info('Step timings:');

    const outcomes: StepOutcome[] = [];
    let failure: RunnerError | undefined;
    let exitCode = 0;

    // Post steps only follow a successful sequence, so one skip rule covers both
    for (const step of [...this.steps, ...this.postSteps]) {
      if (failure) {
        outcomes.push({ name: step.name, status: 'skipped', durationMs: 0 });
        continue;
      }

      const outcome = await this.runStep(step, ctx);
      outcomes.push(outcome.result);
      if (outcome.error) {
        failure = outcome.error;
        exitCode = exitCodeOf(outcome.error);
      }
    }

    return {
      trigger: ctx.trigger,
      success: failure === undefined,
      exitCode,
      steps: outcomes,
      failure,
      cache: ctx.state.cache,
      commit: ctx.state.commit
    };
  }

  private async runStep(
    step: RunStep,
    ctx: RunContext
  ): Promise<{ result: StepOutcome; error?: RunnerError }> {
    const started = Date.now();
    core.startGroup(step.name);
    try {
      await step.run(ctx);
      const durationMs = Date.now() - started;
      return { result: { name: step.name, status: 'success', durationMs } };
    } catch (error) {
      const durationMs = Date.now() - started;
      const runnerError = toRunnerError(categoryFor(step), `Step ${step.name} failed`, error);

      if (step.tolerant) {
        core.warning(`${step.name} skipped: ${runnerError.message}`);
        return {
          result: { name: step.name, status: 'tolerated', durationMs, error: runnerError.message }
        };
      }

      core.error(runnerError.message);
      return {
        result: { name: step.name, status: 'failed', durationMs, error: runnerError.message },
        error: runnerError
      };
    } finally {
      core.endGroup();
      core.info(formatDuration(step.name, Date.now() - started));
    }
  }
}

function categoryFor(step: RunStep): FailureCategory {
  switch (step.name) {
    case 'install':
      return 'install';
    case 'generate':
      return 'generator';
    case 'commit':
      return 'push';
    default:
      return 'provisioning';
  }
}

export interface RunDependencies {
  exec?: CommandRunner;
  cacheBackend?: CacheBackend;
  osLabel?: string;
  runner?: UpdateRunner;
}

/**
 * Wire the default collaborators and execute one run
 * @param config - Validated run configuration
 * @param trigger - Resolved trigger
 * @param deps - Replacements for the process runner, cache backend or step list
 */
export async function runUpdate(
  config: RunnerConfig,
  trigger: Trigger,
  deps: RunDependencies = {}
): Promise<RunResult> {
  const exec = deps.exec ?? createCommandRunner();
  const ctx: RunContext = {
    config,
    trigger,
    exec,
    git: createGitOperations(exec, config.workspace),
    cache: new DependencyCache(deps.cacheBackend, deps.osLabel),
    state: {}
  };

  return (deps.runner ?? new UpdateRunner()).execute(ctx);
}
