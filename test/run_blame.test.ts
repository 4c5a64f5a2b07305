import { describe, expect, it, vi } from 'vitest';

import { runBlame } from '../src/blame/runBlame.js';
import type { PackageRecord } from '../src/blame/types.js';
import { PackageDatabaseError } from '../src/packages/errors.js';
import type { PackageDatabase, SizeAugmenter } from '../src/packages/types.js';

import { capturingLogger, rec, silentLogger } from './helpers.js';

function fakeDatabase(records: PackageRecord[], files: Record<string, string[]> = {}): PackageDatabase {
  return {
    label: 'fake',
    listInstalled: async () => records,
    listInstalledFiles: async (name) => files[name] ?? [],
  };
}

const RECORDS = [
  rec('A', 10, ['B'], ['C']),
  rec('B', 5, ['D']),
  rec('C', 5, ['D', 'missing']),
  rec('D', 8),
  rec('E', 3),
];

describe('runBlame', () => {
  it('ranks root packages by attributed size', async () => {
    const result = await runBlame({ database: fakeDatabase(RECORDS), logger: silentLogger() });

    expect(result.ranked).toEqual([
      { name: 'A', sizeBytes: 28 },
      { name: 'E', sizeBytes: 3 },
    ]);
    expect(result.packageCount).toBe(5);
    expect(result.rootCount).toBe(2);
    expect(result.totalBytes).toBe(31);
    expect(result.stats.collapsed).toBe(3);
  });

  it('adds augmented sizes before building the graph', async () => {
    const augmentSize = vi.fn<SizeAugmenter>(async (files) => (files.includes('/var/lib/e') ? 2 : 0));
    const database = fakeDatabase(RECORDS, { E: ['/var/lib/e'], D: ['/usr/lib/d.so'] });

    const result = await runBlame({ database, augmentSize, logger: silentLogger() });

    expect(augmentSize).toHaveBeenCalledTimes(5);
    expect(augmentSize).toHaveBeenCalledWith(['/usr/lib/d.so']);
    expect(result.ranked).toEqual([
      { name: 'A', sizeBytes: 28 },
      { name: 'E', sizeBytes: 5 },
    ]);
    expect(result.totalBytes).toBe(33);
  });

  it('truncates to the requested limit', async () => {
    const result = await runBlame({ database: fakeDatabase(RECORDS), limit: 1, logger: silentLogger() });
    expect(result.ranked).toEqual([{ name: 'A', sizeBytes: 28 }]);
  });

  it('warns about blame its dependents could not receive', async () => {
    const { logger, lines } = capturingLogger('warn');
    const database = fakeDatabase([rec('X', 6, ['Y']), rec('Y', 4, ['X'])]);

    const result = await runBlame({ database, logger });

    expect(result.ranked).toEqual([]);
    expect(result.stats.strandedBytes).toBe(10);
    expect(lines.map((l) => l.msg)).toEqual(['1 packages kept blame their dependents could not receive']);
    expect(lines[0]?.packages).toEqual(['X']);
  });

  it('surfaces database failures before building a graph', async () => {
    const database: PackageDatabase = {
      label: 'fake',
      listInstalled: async () => {
        throw new Error('database is locked');
      },
      listInstalledFiles: async () => [],
    };

    const run = runBlame({ database, logger: silentLogger() });
    await expect(run).rejects.toBeInstanceOf(PackageDatabaseError);
    await expect(run).rejects.toThrow('fake: database is locked');
  });
});
