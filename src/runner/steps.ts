/**
 * The six steps of a refresh run, in execution order
 */

import * as core from '@actions/core';
import fs from 'fs-extra';
import path from 'path';
import { RunnerError, toRunnerError } from '../shared/errors.js';
import { runChecked, type CommandRunner } from '../shared/exec.js';
import type { GitOperations } from '../shared/git.js';
import type { RunnerConfig } from '../shared/config.js';
import type { Trigger } from '../triggers/index.js';
import type { CacheRestoreResult, DependencyCache } from './cache.js';
import { commitIfChanged, type CommitResult } from './commit-gate.js';

/**
 * Values produced by one step and read by later ones
 */
export interface RunState {
  python?: string;
  cache?: CacheRestoreResult;
  commit?: CommitResult;
}

export interface RunContext {
  config: RunnerConfig;
  trigger: Trigger;
  exec: CommandRunner;
  git: GitOperations;
  cache: DependencyCache;
  state: RunState;
}

export interface RunStep {
  name: string;
  /** A tolerant step logs its failure and the run continues */
  tolerant?: boolean;
  run(ctx: RunContext): Promise<void>;
}

/**
 * Authenticated remote URL for a repository
 */
export function remoteUrl(config: RunnerConfig): string {
  if (!config.repository) {
    throw new RunnerError(
      'provisioning',
      'Workspace is not a git repository and no repository (owner/repo) is configured'
    );
  }
  const server = new URL(config.serverUrl);
  if (config.githubToken) {
    server.username = 'x-access-token';
    server.password = config.githubToken;
  }
  server.pathname = `/${config.repository.owner}/${config.repository.repo}.git`;
  return server.toString();
}

export const checkoutStep: RunStep = {
  name: 'checkout',
  async run({ config, trigger, git }) {
    try {
      await fs.ensureDir(config.workspace);
      if (!(await git.isRepository())) {
        core.info(`Initialising repository in ${config.workspace}`);
        await git.init();
      }
      if ((await git.getRemoteUrl('origin')) === null) {
        await git.addRemote('origin', remoteUrl(config));
      }
      await git.fetch(trigger.branch);
      await git.checkoutRevision(trigger.branch, trigger.sha ?? 'FETCH_HEAD');
      await git.clean();
      core.info(`Checked out ${trigger.branch} at ${await git.getCurrentSha()}`);
    } catch (error) {
      throw toRunnerError('provisioning', 'Checkout failed', error);
    }
  }
};

/**
 * Check a `python --version` line against a pinned version.
 * Components must match exactly: 3.12 accepts 3.12.4 and rejects 3.1 and 3.120.
 * @param output - Combined stdout and stderr of `--version`
 * @param pinned - e.g. "3.12"
 * @returns The reported version when it satisfies the pin, otherwise null
 */
export function matchPythonVersion(output: string, pinned: string): string | null {
  const match = output.match(/Python\s+(\d+(?:\.\d+)*)/);
  if (!match) {
    return null;
  }
  const reported = match[1].split('.');
  const wanted = pinned.split('.');
  const ok = wanted.every((part, i) => reported[i] === part);
  return ok ? match[1] : null;
}

export const setupRuntimeStep: RunStep = {
  name: 'setup-runtime',
  async run(ctx) {
    const { pythonVersion } = ctx.config;
    const major = pythonVersion.split('.')[0];
    const candidates = [...new Set([`python${pythonVersion}`, `python${major}`, 'python'])];
    const seen: string[] = [];

    for (const candidate of candidates) {
      const result = await ctx.exec(candidate, ['--version'], { cwd: ctx.config.workspace });
      if (result.exitCode !== 0) {
        continue;
      }
      const output = `${result.stdout}\n${result.stderr}`;
      const version = matchPythonVersion(output, pythonVersion);
      if (version) {
        core.info(`Using ${candidate} (Python ${version})`);
        ctx.state.python = candidate;
        return;
      }
      seen.push(`${candidate}: ${output.trim()}`);
    }

    throw new RunnerError(
      'provisioning',
      `No Python ${pythonVersion} interpreter found` +
        (seen.length > 0 ? ` (found ${seen.join('; ')})` : '')
    );
  }
};

export const restoreCacheStep: RunStep = {
  name: 'restore-cache',
  tolerant: true,
  async run(ctx) {
    const manifest = path.join(ctx.config.workspace, ctx.config.requirementsPath);
    const restored = await ctx.cache.restore(manifest, ctx.config.pipCacheDir);
    ctx.state.cache = restored;

    if (restored.hit === 'miss') {
      core.info(`Cache not found for ${restored.key}`);
    } else {
      core.info(`Cache restored from ${restored.matchedKey} (${restored.hit})`);
    }
  }
};

function requireInterpreter(state: RunState): string {
  if (!state.python) {
    throw new RunnerError('provisioning', 'Python runtime was not set up');
  }
  return state.python;
}

export const installStep: RunStep = {
  name: 'install',
  async run(ctx) {
    const python = requireInterpreter(ctx.state);
    const options = {
      cwd: ctx.config.workspace,
      env: { PIP_CACHE_DIR: ctx.config.pipCacheDir }
    };

    try {
      await runChecked(ctx.exec, python, ['-m', 'pip', 'install', '--upgrade', 'pip'], options);
      const result = await runChecked(
        ctx.exec,
        python,
        ['-m', 'pip', 'install', '-r', ctx.config.requirementsPath],
        options
      );
      if (result.stdout.trim()) {
        core.info(result.stdout.trim());
      }
    } catch (error) {
      throw toRunnerError('install', 'Dependency installation failed', error);
    }
  }
};

export const generateStep: RunStep = {
  name: 'generate',
  async run(ctx) {
    const python = requireInterpreter(ctx.state);
    const script = path.join(ctx.config.workspace, ctx.config.generatorScript);
    if (!(await fs.pathExists(script))) {
      throw new RunnerError('generator', `Generator script not found: ${ctx.config.generatorScript}`);
    }

    const result = await ctx.exec(python, [ctx.config.generatorScript], {
      cwd: ctx.config.workspace,
      env: {
        ACCESS_TOKEN: ctx.config.secrets.accessToken,
        USER_NAME: ctx.config.secrets.userName
      }
    });

    if (result.stdout.trim()) {
      core.info(result.stdout.trim());
    }
    if (result.exitCode !== 0) {
      if (result.stderr.trim()) {
        core.error(result.stderr.trim());
      }
      throw new RunnerError(
        'generator',
        `Generator ${ctx.config.generatorScript} exited with code ${result.exitCode}`,
        { exitCode: result.exitCode }
      );
    }
  }
};

export const commitStep: RunStep = {
  name: 'commit',
  async run(ctx) {
    ctx.state.commit = await commitIfChanged(ctx.git, ctx.trigger.branch);
  }
};

/**
 * Runs after a successful sequence, like the post step of a cache action
 */
export const saveCacheStep: RunStep = {
  name: 'save-cache',
  tolerant: true,
  async run(ctx) {
    if (!ctx.state.cache) {
      return;
    }
    const saved = await ctx.cache.save(ctx.state.cache, ctx.config.pipCacheDir);
    core.info(saved ? `Cache saved as ${ctx.state.cache.key}` : 'Cache save skipped');
  }
};

export const DEFAULT_STEPS: RunStep[] = [
  checkoutStep,
  setupRuntimeStep,
  restoreCacheStep,
  installStep,
  generateStep,
  commitStep
];

export const DEFAULT_POST_STEPS: RunStep[] = [saveCacheStep];
