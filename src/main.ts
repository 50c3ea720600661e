import * as core from '@actions/core';
import * as github from '@actions/github';
import { triggerContextFrom } from './triggers/index.js';
import { run } from './action.js';

async function main() {
  const context = triggerContextFrom(github.context);
  console.log(`🔄 README refresh: ${context.eventName} on ${context.ref || 'default branch'}`);

  const exitCode = await run(name => core.getInput(name), context);
  process.exitCode = exitCode;
}

main().catch(error => {
  console.error(error);
  core.setFailed(error instanceof Error ? error.message : String(error));
});
