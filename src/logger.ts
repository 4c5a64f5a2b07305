import pino from 'pino';
import type { DestinationStream, Logger } from 'pino';
import pinoPretty from 'pino-pretty';

import { envOverride } from './packages/defaults.js';

export type CreateLoggerOptions = {
  verbose?: boolean;
  destination?: DestinationStream;
};

export type PrettyOptions = NonNullable<Parameters<typeof pinoPretty>[0]>;

// Logs go to stderr so the ranked list on stdout stays pipeable.
export function prettyOptions(stderr: { isTTY?: boolean } = process.stderr): PrettyOptions {
  return {
    destination: 2,
    sync: true,
    colorize: Boolean(stderr.isTTY),
    ignore: 'pid,hostname',
  };
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const level = options.verbose ? 'debug' : (envOverride('PKG_BLAME_LOG_LEVEL') ?? 'info');
  const destination = options.destination ?? pinoPretty(prettyOptions());
  return pino({ level }, destination);
}
