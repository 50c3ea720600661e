/**
 * Unit tests for git operations
 */

import { describe, it, expect, vi } from 'vitest';
import { createGitOperations, parsePorcelainStatus } from '../../src/shared/git.js';
import { exitCodeOf } from '../../src/shared/errors.js';
import type { CommandResult, CommandRunner } from '../../src/shared/exec.js';

function fakeExec(result: Partial<CommandResult> = {}) {
  return vi.fn<CommandRunner>(async () => ({ exitCode: 0, stdout: '', stderr: '', ...result }));
}

describe('parsePorcelainStatus', () => {
  it('should parse modified, untracked and deleted entries', () => {
    const output = ' M README.md\0?? dark_mode.svg\0 D old.svg\0A  cache/loc.txt\0';

    expect(parsePorcelainStatus(output)).toEqual([
      { index: ' ', worktree: 'M', path: 'README.md' },
      { index: '?', worktree: '?', path: 'dark_mode.svg' },
      { index: ' ', worktree: 'D', path: 'old.svg' },
      { index: 'A', worktree: ' ', path: 'cache/loc.txt' }
    ]);
  });

  it('should report the new path of a rename and skip its source record', () => {
    expect(parsePorcelainStatus('R  light_mode.svg\0light.svg\0 M README.md\0')).toEqual([
      { index: 'R', worktree: ' ', path: 'light_mode.svg' },
      { index: ' ', worktree: 'M', path: 'README.md' }
    ]);
  });

  it('should keep spaces, quotes and non-ASCII characters verbatim', () => {
    expect(parsePorcelainStatus('?? my banner.svg\0?? résumé "v2".svg\0').map(e => e.path))
      .toEqual(['my banner.svg', 'résumé "v2".svg']);
  });

  it('should return nothing for a clean tree', () => {
    expect(parsePorcelainStatus('')).toEqual([]);
    expect(parsePorcelainStatus('\0')).toEqual([]);
  });
});

describe('createGitOperations', () => {
  it('should run every command in the work tree', async () => {
    const exec = fakeExec();
    const git = createGitOperations(exec, '/work');

    await git.stageAll();
    await git.commit('chore: auto-update README/banner');
    await git.push('main');

    expect(exec.mock.calls).toEqual([
      ['git', ['add', '-A'], { cwd: '/work' }],
      ['git', ['commit', '-m', 'chore: auto-update README/banner'], { cwd: '/work' }],
      ['git', ['push', 'origin', 'HEAD:refs/heads/main'], { cwd: '/work' }]
    ]);
  });

  it('should configure the identity', async () => {
    const exec = fakeExec();
    await createGitOperations(exec, '/work').configureIdentity({ name: 'bot', email: 'bot@example.com' });

    expect(exec.mock.calls.map(call => call[1])).toEqual([
      ['config', 'user.name', 'bot'],
      ['config', 'user.email', 'bot@example.com']
    ]);
  });

  it('should fetch the branch and force checkout the revision', async () => {
    const exec = fakeExec();
    const git = createGitOperations(exec, '/work');

    await git.fetch('main');
    await git.checkoutRevision('main', 'abc123');
    await git.clean();

    expect(exec.mock.calls.map(call => call[1])).toEqual([
      ['fetch', '--no-tags', '--prune', 'origin', 'refs/heads/main'],
      ['checkout', '--force', '-B', 'main', 'abc123'],
      ['clean', '-ffd']
    ]);
  });

  it('should read NUL-terminated status listing every untracked file', async () => {
    const exec = fakeExec({ stdout: ' M README.md\0' });
    const git = createGitOperations(exec, '/work');

    expect(await git.getStatusPorcelain()).toBe(' M README.md\0');
    expect(exec).toHaveBeenCalledWith(
      'git',
      ['status', '--porcelain', '-z', '--untracked-files=all'],
      { cwd: '/work' }
    );
  });

  it('should trim the HEAD sha', async () => {
    const git = createGitOperations(fakeExec({ stdout: 'abc123\n' }), '/work');

    expect(await git.getCurrentSha()).toBe('abc123');
  });

  it('should detect repositories', async () => {
    expect(await createGitOperations(fakeExec({ stdout: 'true' }), '/work').isRepository()).toBe(true);
    expect(
      await createGitOperations(fakeExec({ exitCode: 128, stderr: 'fatal: not a git repository' }), '/work').isRepository()
    ).toBe(false);
  });

  it('should return null for a missing remote', async () => {
    const git = createGitOperations(fakeExec({ exitCode: 2, stderr: "error: No such remote 'origin'" }), '/work');

    expect(await git.getRemoteUrl()).toBeNull();
  });

  it('should wrap failures with the operation name', async () => {
    const git = createGitOperations(fakeExec({ exitCode: 1, stderr: 'fatal: bad revision' }), '/work');

    await expect(git.checkoutRevision('main', 'nope')).rejects.toThrow(
      'Failed to checkout nope as main: git checkout --force -B main nope exited with code 1: fatal: bad revision'
    );
  });

  it('should keep the exit code of a wrapped failure', async () => {
    const git = createGitOperations(fakeExec({ exitCode: 128, stderr: "fatal: couldn't find remote ref refs/heads/main" }), '/work');

    const error = await git.fetch('main').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(Error);
    expect(error).toMatchObject({
      message:
        "Failed to fetch main: git fetch --no-tags --prune origin refs/heads/main exited with code 128: fatal: couldn't find remote ref refs/heads/main",
      cause: { name: 'CommandFailedError', exitCode: 128 }
    });
    expect(exitCodeOf(error)).toBe(128);
  });

  it('should keep the push exit code', async () => {
    const git = createGitOperations(fakeExec({ exitCode: 1, stderr: '! [rejected] (non-fast-forward)' }), '/work');

    await expect(git.push('main')).rejects.toMatchObject({
      name: 'CommandFailedError',
      exitCode: 1,
      command: 'git push origin HEAD:refs/heads/main'
    });
  });
});
