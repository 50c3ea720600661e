/**
 * Run configuration
 * Inputs come from action.yml (core.getInput) or from environment variables for local runs
 */

import os from 'os';
import path from 'path';
import { RunnerError } from './errors.js';
import { validateCron } from '../triggers/cron.js';

export const DEFAULT_BRANCH = 'main';
export const DEFAULT_SCHEDULE = '0 4 * * *';
export const DEFAULT_PYTHON_VERSION = '3.12';
export const DEFAULT_REQUIREMENTS = 'cache/requirements.txt';
export const DEFAULT_GENERATOR = 'readme_gen.py';

/**
 * Secrets handed to the generator. Opaque to the runner.
 */
export interface GeneratorSecrets {
  accessToken: string;
  userName: string;
}

export interface RunnerConfig {
  /** Absolute path of the repository work tree */
  workspace: string;
  /** owner/repo, used only when origin must be added */
  repository?: { owner: string; repo: string };
  serverUrl: string;
  githubToken?: string;
  /** Branch whose pushes trigger a run, and the default branch for other triggers */
  branch: string;
  schedule: string;
  pythonVersion: string;
  /** Dependency manifest, relative to workspace */
  requirementsPath: string;
  /** Generator script, relative to workspace */
  generatorScript: string;
  pipCacheDir: string;
  secrets: GeneratorSecrets;
}

/**
 * Reads one named input; returns '' when unset
 */
export type InputSource = (name: string) => string;

/**
 * Input source over environment variables: `access_token` reads ACCESS_TOKEN
 * @param env - Environment to read
 */
export function envInputSource(env: NodeJS.ProcessEnv = process.env): InputSource {
  return name => (env[name.toUpperCase()] ?? '').trim();
}

function parseRepository(value: string): { owner: string; repo: string } | undefined {
  const [owner, repo, ...rest] = value.split('/');
  if (!owner || !repo || rest.length > 0) {
    return undefined;
  }
  return { owner, repo };
}

/**
 * Build and validate a RunnerConfig
 * @param input - Source for named inputs
 * @param env - Process environment for GitHub-provided defaults
 * @returns Validated config
 * @throws RunnerError with category 'configuration'
 */
export function loadConfig(
  input: InputSource,
  env: NodeJS.ProcessEnv = process.env
): RunnerConfig {
  const workspace = path.resolve(
    input('working_directory') || env.GITHUB_WORKSPACE || process.cwd()
  );
  const repositoryInput = input('repository') || env.GITHUB_REPOSITORY || '';

  const config: RunnerConfig = {
    workspace,
    repository: repositoryInput ? parseRepository(repositoryInput) : undefined,
    serverUrl: env.GITHUB_SERVER_URL || 'https://github.com',
    githubToken: input('github_token') || undefined,
    branch: input('branch') || DEFAULT_BRANCH,
    schedule: input('schedule') || DEFAULT_SCHEDULE,
    pythonVersion: input('python_version') || DEFAULT_PYTHON_VERSION,
    requirementsPath: input('requirements') || DEFAULT_REQUIREMENTS,
    generatorScript: input('generator') || DEFAULT_GENERATOR,
    pipCacheDir: path.resolve(
      input('pip_cache_dir') || path.join(os.homedir(), '.cache', 'pip')
    ),
    secrets: {
      accessToken: input('access_token'),
      userName: input('user_name')
    }
  };

  if (repositoryInput && !config.repository) {
    throw new RunnerError(
      'configuration',
      `repository must look like owner/repo, got "${repositoryInput}"`
    );
  }

  validateConfig(config);
  return config;
}

/**
 * Check a branch name against the rules git enforces for refs
 * @param name - Candidate branch name
 * @returns true if git would accept it
 */
export function isValidBranchName(name: string): boolean {
  if (name.length === 0 || name === '@') return false;
  if (name.startsWith('/') || name.endsWith('/') || name.endsWith('.')) return false;
  if (name.startsWith('-')) return false;
  if (name.includes('..') || name.includes('//') || name.includes('@{')) return false;
  if (/[\s~^:?*[\\\x00-\x1f\x7f]/.test(name)) return false;
  return name.split('/').every(part => !part.startsWith('.') && !part.endsWith('.lock'));
}

/**
 * Validate a config
 * @param config - Config to validate
 * @returns true if valid
 * @throws RunnerError if invalid
 */
export function validateConfig(config: RunnerConfig): true {
  if (!isValidBranchName(config.branch)) {
    throw new RunnerError('configuration', `branch "${config.branch}" is not a valid branch name`);
  }

  const cronProblem = validateCron(config.schedule);
  if (cronProblem) {
    throw new RunnerError('configuration', `schedule "${config.schedule}": ${cronProblem}`);
  }

  if (!/^\d+(\.\d+){0,2}$/.test(config.pythonVersion)) {
    throw new RunnerError(
      'configuration',
      `python_version must be numeric like 3.12, got "${config.pythonVersion}"`
    );
  }

  if (config.requirementsPath.trim().length === 0) {
    throw new RunnerError('configuration', 'requirements path is empty');
  }

  if (config.generatorScript.trim().length === 0) {
    throw new RunnerError('configuration', 'generator path is empty');
  }

  return true;
}
