#!/usr/bin/env node

/**
 * gen-frameworks-baseline entry point
 */

import { spawnRunner } from './baseline/runner.js';
import { runCli } from './main.js';

process.exitCode = runCli(process.argv, {
  stdout: (chunk) => process.stdout.write(chunk),
  stderr: (chunk) => process.stderr.write(chunk),
  env: process.env,
  run: spawnRunner,
});
