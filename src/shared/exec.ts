/**
 * Child process execution
 */

import { execa } from 'execa';
import { CommandFailedError } from './errors.js';

export interface CommandOptions {
  cwd?: string;
  /** Added on top of the parent environment */
  env?: Record<string, string>;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Runs a command to completion. Resolves for every exit code;
 * only the caller decides what a non-zero exit means.
 */
export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions
) => Promise<CommandResult>;

/**
 * Default runner backed by execa
 */
export function createCommandRunner(): CommandRunner {
  return async (command, args, options = {}) => {
    const result = await execa(command, args, {
      cwd: options.cwd,
      env: options.env,
      extendEnv: true,
      reject: false
    });

    const stderr = typeof result.stderr === 'string' ? result.stderr : '';
    // Spawn failures and signals carry no exit code
    const spawnFailed = result.failed && typeof result.exitCode !== 'number';

    return {
      exitCode: typeof result.exitCode === 'number' ? result.exitCode : 1,
      stdout: typeof result.stdout === 'string' ? result.stdout : '',
      stderr: stderr || (spawnFailed ? `failed to start ${command}` : '')
    };
  };
}

/**
 * Run a command and throw CommandFailedError on a non-zero exit
 * @returns The command result for a zero exit
 */
export async function runChecked(
  exec: CommandRunner,
  command: string,
  args: string[],
  options?: CommandOptions
): Promise<CommandResult> {
  const result = await exec(command, args, options);
  if (result.exitCode !== 0) {
    throw new CommandFailedError(
      [command, ...args].join(' '),
      result.exitCode,
      result.stderr
    );
  }
  return result;
}
