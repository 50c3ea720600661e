/**
 * Git operations for checkout and the commit gate
 */

import { runChecked, type CommandRunner } from './exec.js';

/**
 * One record of `git status --porcelain`
 */
export interface StatusEntry {
  /** Staged state (X column) */
  index: string;
  /** Unstaged state (Y column) */
  worktree: string;
  path: string;
}

/**
 * Identity used for automated commits
 */
export interface GitIdentity {
  name: string;
  email: string;
}

/**
 * Parse NUL-terminated porcelain v1 status (`git status --porcelain -z`).
 * Paths arrive unquoted; renames and copies report the destination path.
 * @param output - Raw stdout of the status command
 * @returns One entry per changed path
 */
export function parsePorcelainStatus(output: string): StatusEntry[] {
  const records = output.split('\0');
  const entries: StatusEntry[] = [];

  for (let i = 0; i < records.length; i++) {
    const record = records[i];
    if (record.length <= 3) {
      continue;
    }
    const index = record[0];
    const worktree = record[1];
    entries.push({ index, worktree, path: record.slice(3) });
    if ('RC'.includes(index) || 'RC'.includes(worktree)) {
      // the source path follows as its own record
      i++;
    }
  }

  return entries;
}

/**
 * Prefix a failure with the operation while keeping the original as the cause,
 * so the child's exit code survives the rethrow
 */
function wrapFailure(operation: string, error: unknown): Error {
  const reason = error instanceof Error ? error.message : String(error);
  return new Error(`${operation}: ${reason}`, { cause: error });
}

/**
 * Git operations bound to one working directory
 * @param exec - Command runner used for every git invocation
 * @param cwd - Repository working directory
 */
export function createGitOperations(exec: CommandRunner, cwd: string) {
  const git = (args: string[]) => runChecked(exec, 'git', args, { cwd });

  return {
    /**
     * Configure git identity (required for commits)
     * @param identity - Author and committer identity
     * @returns void
     */
    async configureIdentity(identity: GitIdentity): Promise<void> {
      try {
        await git(['config', 'user.name', identity.name]);
        await git(['config', 'user.email', identity.email]);
      } catch (error) {
        throw wrapFailure('Failed to configure git identity', error);
      }
    },

    /**
     * Check whether the working directory is inside a work tree
     * @returns true when git recognises a repository
     */
    async isRepository(): Promise<boolean> {
      const result = await exec('git', ['rev-parse', '--is-inside-work-tree'], { cwd });
      return result.exitCode === 0 && result.stdout.trim() === 'true';
    },

    /**
     * Create an empty repository in the working directory
     */
    async init(): Promise<void> {
      try {
        await git(['init', '--quiet']);
      } catch (error) {
        throw wrapFailure('Failed to init repository', error);
      }
    },

    /**
     * Read the URL of a remote
     * @param name - Remote name
     * @returns The URL, or null when the remote is not configured
     */
    async getRemoteUrl(name = 'origin'): Promise<string | null> {
      const result = await exec('git', ['remote', 'get-url', name], { cwd });
      if (result.exitCode !== 0) {
        return null;
      }
      const url = result.stdout.trim();
      return url.length > 0 ? url : null;
    },

    /**
     * Add a remote
     * @param name - Remote name
     * @param url - Remote URL
     */
    async addRemote(name: string, url: string): Promise<void> {
      try {
        await git(['remote', 'add', name, url]);
      } catch (error) {
        throw wrapFailure(`Failed to add remote ${name}`, error);
      }
    },

    /**
     * Fetch a branch from origin into FETCH_HEAD
     * @param branchName - Branch to fetch
     */
    async fetch(branchName: string): Promise<void> {
      try {
        await git(['fetch', '--no-tags', '--prune', 'origin', `refs/heads/${branchName}`]);
      } catch (error) {
        throw wrapFailure(`Failed to fetch ${branchName}`, error);
      }
    },

    /**
     * Force the work tree onto a revision, (re)creating a local branch there
     * @param branchName - Local branch to point at the revision
     * @param revision - Commit SHA or ref
     */
    async checkoutRevision(branchName: string, revision: string): Promise<void> {
      try {
        await git(['checkout', '--force', '-B', branchName, revision]);
      } catch (error) {
        throw wrapFailure(`Failed to checkout ${revision} as ${branchName}`, error);
      }
    },

    /**
     * Remove untracked files and directories (ignored files are kept)
     */
    async clean(): Promise<void> {
      try {
        await git(['clean', '-ffd']);
      } catch (error) {
        throw wrapFailure('Failed to clean work tree', error);
      }
    },

    /**
     * Read the working tree status in porcelain form, one NUL-terminated
     * record per file (untracked directories are listed file by file)
     * @returns Raw porcelain output
     */
    async getStatusPorcelain(): Promise<string> {
      try {
        const { stdout } = await git(['status', '--porcelain', '-z', '--untracked-files=all']);
        return stdout;
      } catch (error) {
        throw wrapFailure('Failed to check for uncommitted changes', error);
      }
    },

    /**
     * Stage every change, including new and deleted files
     */
    async stageAll(): Promise<void> {
      try {
        await git(['add', '-A']);
      } catch (error) {
        throw wrapFailure('Failed to stage changes', error);
      }
    },

    /**
     * Commit staged changes
     * @param message - Commit message
     */
    async commit(message: string): Promise<void> {
      try {
        await git(['commit', '-m', message]);
      } catch (error) {
        throw wrapFailure('Failed to commit', error);
      }
    },

    /**
     * Push HEAD to a branch on origin. No retry and no force.
     * @param branchName - Remote branch to update
     */
    async push(branchName: string): Promise<void> {
      await git(['push', 'origin', `HEAD:refs/heads/${branchName}`]);
    },

    /**
     * Get the current HEAD commit SHA
     * @returns Current commit SHA
     */
    async getCurrentSha(): Promise<string> {
      try {
        const { stdout } = await git(['rev-parse', 'HEAD']);
        return stdout.trim();
      } catch (error) {
        throw wrapFailure('Failed to get current SHA', error);
      }
    }
  };
}

export type GitOperations = ReturnType<typeof createGitOperations>;
