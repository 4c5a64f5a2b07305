#!/usr/bin/env node
import { runCli } from './cli.js';
import { createLogger } from './logger.js';

const exitCode = await runCli(process.argv.slice(2), {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  createLogger: (verbose) => createLogger({ verbose }),
});
process.exitCode = exitCode;
