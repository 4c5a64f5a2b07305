import { execFile } from 'node:child_process';
import fs from 'node:fs/promises';
import path from 'node:path';
import type { Logger } from 'pino';

import { resolveDuBinPath, VAR_SUBTREES } from './defaults.js';
import { asErrorText } from './errors.js';
import type { SizeAugmenter } from './types.js';

export type CommandResult = {
  exitCode: number;
  output: string; // stdout followed by stderr
};

export type CommandRunner = (file: string, args: string[]) => Promise<CommandResult>;

export function runCommand(file: string, args: string[]): Promise<CommandResult> {
  return new Promise((resolve) => {
    execFile(file, args, { encoding: 'utf8', maxBuffer: 4 * 1024 * 1024 }, (err, stdout, stderr) => {
      const output = `${stdout}${stderr}`.trim();
      if (!err) {
        resolve({ exitCode: 0, output });
        return;
      }
      resolve({ exitCode: typeof err.code === 'number' ? err.code : 127, output: output || err.message });
    });
  });
}

const varSubtrees = new Set<string>(VAR_SUBTREES);

/**
 * True for /var/lib/<entry>, /var/cache/<entry> and /var/log/<entry>, which
 * hold state a package creates at run time and dpkg does not count.
 */
export function isVarSubtreeEntry(installedPath: string): boolean {
  const tok = installedPath.split('/');
  return tok.length === 4 && tok[0] === '' && tok[1] === 'var' && varSubtrees.has(tok[2] ?? '') && tok[3] !== '';
}

async function isDirectory(p: string): Promise<boolean> {
  try {
    const stat = await fs.stat(p);
    return stat.isDirectory();
  } catch {
    return false;
  }
}

export type VarUsageProbeOptions = {
  logger: Logger;
  duPath?: string;
  rootDir?: string;
  runCommand?: CommandRunner;
};

export function createVarUsageProbe(options: VarUsageProbeOptions): SizeAugmenter {
  const duPath = options.duPath ?? resolveDuBinPath();
  const rootDir = options.rootDir ?? '/';
  const run = options.runCommand ?? runCommand;
  const logger = options.logger;

  async function diskUsage(target: string): Promise<number> {
    if (!(await isDirectory(target))) return 0;

    const args = ['-bs', target];
    const cmd = [duPath, ...args].join(' ');
    let result: CommandResult;
    try {
      result = await run(duPath, args);
    } catch (error) {
      logger.warn({ cmd, output: asErrorText(error) }, 'disk usage probe failed');
      return 0;
    }

    if (result.exitCode !== 0) {
      logger.warn({ cmd, exitCode: result.exitCode, output: result.output }, 'disk usage probe failed');
      return 0;
    }

    const size = Number.parseInt(result.output.split(/\s+/u, 1)[0] ?? '', 10);
    if (!Number.isFinite(size) || size < 0) {
      logger.warn({ cmd, output: result.output }, 'disk usage probe returned no size');
      return 0;
    }
    return size;
  }

  return async (installedFiles) => {
    let total = 0;
    for (const installedPath of installedFiles) {
      if (!isVarSubtreeEntry(installedPath)) continue;
      total += await diskUsage(path.join(rootDir, installedPath));
    }
    return total;
  };
}
