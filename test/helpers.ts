import pino from 'pino';
import type { Logger } from 'pino';

import type { PackageRecord } from '../src/blame/types.js';

export function rec(name: string, ownSize: number, ...dependencyGroups: string[][]): PackageRecord {
  return { name, ownSize, dependencyGroups };
}

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

export type CapturedLine = { level: number; msg: string } & Record<string, unknown>;

export function capturingLogger(level: string): { logger: Logger; lines: CapturedLine[] } {
  const lines: CapturedLine[] = [];
  const logger = pino(
    { level },
    {
      write(msg: string) {
        lines.push(JSON.parse(msg));
      },
    },
  );
  return { logger, lines };
}
