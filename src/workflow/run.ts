#!/usr/bin/env node
/**
 * Writes the refresh workflow file
 *
 * Usage: render-workflow [output-path]
 * Settings come from BRANCH, SCHEDULE, PYTHON_VERSION, REQUIREMENTS,
 * GENERATOR and ACTION_REF.
 */

import fs from 'fs-extra';
import path from 'path';
import { buildWorkflow } from './index.js';

async function main() {
  const output = path.resolve(process.argv[2] || '.github/workflows/readme-build.yml');

  const yaml = buildWorkflow({
    branch: process.env.BRANCH || undefined,
    schedule: process.env.SCHEDULE || undefined,
    pythonVersion: process.env.PYTHON_VERSION || undefined,
    requirements: process.env.REQUIREMENTS || undefined,
    generator: process.env.GENERATOR || undefined,
    actionRef: process.env.ACTION_REF || undefined
  });

  await fs.outputFile(output, yaml);
  console.log(`Wrote ${output}`);
}

main().catch(error => {
  console.error('Failed to render workflow:', error);
  process.exit(1);
});
