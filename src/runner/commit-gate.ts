/**
 * Conditional commit gate
 *
 * Commits and pushes only when the generator left the work tree dirty.
 * The emptiness check on porcelain status is what keeps the gate from
 * ever producing an empty commit.
 */

import * as core from '@actions/core';
import { toRunnerError } from '../shared/errors.js';
import { parsePorcelainStatus, type GitIdentity, type GitOperations } from '../shared/git.js';

export const BOT_IDENTITY: GitIdentity = {
  name: 'github-actions[bot]',
  email: '41898282+github-actions[bot]@users.noreply.github.com'
};

export const COMMIT_MESSAGE = 'chore: auto-update README/banner';

export type CommitResult =
  | { committed: true; sha: string; files: string[] }
  | { committed: false; files: string[] };

/**
 * Commit and push every change in the work tree, if there is any
 * @param git - Operations bound to the work tree
 * @param branch - Branch the run originated from
 * @returns What was committed
 * @throws RunnerError with category 'push'
 */
export async function commitIfChanged(
  git: GitOperations,
  branch: string
): Promise<CommitResult> {
  let status: string;
  try {
    status = await git.getStatusPorcelain();
  } catch (error) {
    throw toRunnerError('push', 'Could not read work tree status', error);
  }

  if (status.trim().length === 0) {
    core.info('Nothing to commit');
    return { committed: false, files: [] };
  }

  const files = parsePorcelainStatus(status).map(entry => entry.path);
  core.info(`Work tree changed (${files.length} file${files.length === 1 ? '' : 's'}):`);
  for (const file of files) {
    core.info(`  ${file}`);
  }

  let sha: string;
  try {
    await git.configureIdentity(BOT_IDENTITY);
    await git.stageAll();
    await git.commit(COMMIT_MESSAGE);
    sha = await git.getCurrentSha();
  } catch (error) {
    throw toRunnerError('push', 'Failed to commit changes', error);
  }

  try {
    await git.push(branch);
  } catch (error) {
    // Non-fast-forward from a concurrent run lands here; it is not retried
    throw toRunnerError('push', `Failed to push ${sha.slice(0, 7)} to ${branch}`, error);
  }

  core.info(`Pushed ${sha} to ${branch}`);
  return { committed: true, sha, files };
}
