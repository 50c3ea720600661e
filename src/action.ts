/**
 * One refresh run, from raw inputs to action outputs
 */

import * as core from '@actions/core';
import { loadConfig, type InputSource } from './shared/config.js';
import { exitCodeOf } from './shared/errors.js';
import { resolveTrigger, type TriggerContext } from './triggers/index.js';
import { runUpdate, type RunDependencies } from './runner/index.js';
import { formatFileList } from './utils.js';

/**
 * Resolve config and trigger, run once, and publish the outputs
 * @param input - Source of named inputs
 * @param context - Event that started the job
 * @param deps - Collaborator overrides (tests)
 * @returns Process exit code: 0, or the first failing step's code
 */
export async function run(
  input: InputSource,
  context: TriggerContext,
  deps: RunDependencies = {}
): Promise<number> {
  try {
    const config = loadConfig(input);
    for (const secret of [config.secrets.accessToken, config.secrets.userName, config.githubToken]) {
      if (secret) {
        core.setSecret(secret);
      }
    }

    const resolution = resolveTrigger(context, { branch: config.branch });
    if (resolution.kind === 'skip') {
      core.notice(`Skipping run: ${resolution.reason}`);
      core.setOutput('committed', 'false');
      return 0;
    }

    const result = await runUpdate(config, resolution.trigger, deps);

    core.setOutput('committed', String(result.commit?.committed ?? false));
    core.setOutput('commit_sha', result.commit && result.commit.committed === true ? result.commit.sha : '');
    core.setOutput('changed_files', formatFileList(result.commit?.files ?? []));
    // true only for an exact key match, like actions/cache
    core.setOutput('cache_hit', String(result.cache?.hit === 'exact'));

    if (!result.success) {
      core.setFailed(result.failure?.message ?? 'Run failed');
      return result.exitCode;
    }
    return 0;
  } catch (error) {
    core.setFailed(error instanceof Error ? error.message : String(error));
    return exitCodeOf(error);
  }
}
