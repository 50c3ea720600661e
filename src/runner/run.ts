#!/usr/bin/env node
/**
 * Local entry point
 *
 * Same flow as the action, with inputs read from upper-case environment
 * variables (ACCESS_TOKEN, USER_NAME, BRANCH, ...). The event comes from
 * GITHUB_EVENT_NAME / GITHUB_REF / GITHUB_SHA and defaults to a manual run.
 */

import * as github from '@actions/github';
import { envInputSource } from '../shared/config.js';
import { triggerContextFrom } from '../triggers/index.js';
import { run } from '../action.js';

async function main() {
  const context = triggerContextFrom(github.context);

  console.log('README refresh starting...');
  console.log(`  Event: ${context.eventName}`);
  if (context.ref) console.log(`  Ref: ${context.ref}`);

  const exitCode = await run(envInputSource(), context);

  process.exit(exitCode);
}

main().catch(error => {
  console.error('README refresh failed:', error);
  process.exit(1);
});
