import path from 'node:path';
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import type { Logger } from 'pino';

import { DEFAULT_MAX_DEPTH, DEFAULT_RESULT_LIMIT } from './blame/defaults.js';
import { formatSummary } from './blame/format.js';
import { runBlame } from './blame/runBlame.js';
import { CsvSnapshotDatabase } from './packages/csvSnapshot.js';
import { DpkgDatabase } from './packages/dpkgDatabase.js';
import { asErrorText } from './packages/errors.js';
import type { PackageDatabase } from './packages/types.js';
import { createVarUsageProbe } from './packages/varUsage.js';

export type CliIo = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  createLogger: (verbose: boolean) => Logger;
};

type CliOptions = {
  debug?: boolean;
  n: number;
  exploreVar?: boolean;
  adminDir?: string;
  snapshot?: string;
  maxDepth: number;
};

function parseNonNegativeInt(value: string): number {
  const n = Number(value);
  if (value.trim() === '' || !Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return n;
}

export function createProgram(io: CliIo, onExitCode: (code: number) => void): Command {
  const program = new Command();

  program
    .name('pkg-blame')
    .description(
      'Estimate the amount of disk space used by installed packages, including their dependencies.',
    )
    .option('-d, --debug', 'Show debugging output')
    .option('-n <count>', 'Number of packages to display', parseNonNegativeInt, DEFAULT_RESULT_LIMIT)
    .option(
      '--explore-var',
      'Account for disk space used by /var/cache, /var/lib, /var/log. ' +
        'It requires read access to /var/* (e.g. running as root)',
    )
    .option('--admin-dir <dir>', 'dpkg administrative directory (default: /var/lib/dpkg)')
    .option('--snapshot <file>', 'Read package records from a CSV snapshot instead of dpkg')
    .option('--max-depth <n>', 'Dependency depth at which cycles are broken', parseNonNegativeInt, DEFAULT_MAX_DEPTH)
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr })
    .exitOverride()
    .action(async (options: CliOptions) => {
      const logger = io.createLogger(Boolean(options.debug));
      const database: PackageDatabase = options.snapshot
        ? new CsvSnapshotDatabase({ filePath: path.resolve(options.snapshot) })
        : new DpkgDatabase({ adminDir: options.adminDir });

      try {
        const result = await runBlame({
          database,
          limit: options.n,
          maxDepth: options.maxDepth,
          augmentSize: options.exploreVar ? createVarUsageProbe({ logger }) : undefined,
          logger,
        });
        io.stdout(formatSummary(result.ranked));
        onExitCode(0);
      } catch (error) {
        logger.error({ err: error }, asErrorText(error));
        onExitCode(1);
      }
    });

  return program;
}

export async function runCli(argv: string[], io: CliIo): Promise<number> {
  let exitCode = 0;
  const program = createProgram(io, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) return error.exitCode;
    throw error;
  }
  return exitCode;
}
