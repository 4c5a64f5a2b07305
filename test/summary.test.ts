import { describe, expect, it } from 'vitest';

import { buildPackageGraph } from '../src/blame/buildGraph.js';
import { formatSizeMb, formatSummary, formatSummaryLine } from '../src/blame/format.js';
import { pickRootPackages } from '../src/blame/pickRoots.js';
import { reassignBlame } from '../src/blame/reassignBlame.js';
import { rankRootPackages } from '../src/blame/summary.js';

import { rec } from './helpers.js';

describe('rankRootPackages', () => {
  it('sorts by size descending with names breaking ties', () => {
    const graph = buildPackageGraph([rec('zsh', 50), rec('bash', 50), rec('vim', 80), rec('ed', 1)]);
    reassignBlame(graph);

    expect(rankRootPackages(pickRootPackages(graph))).toEqual([
      { name: 'vim', sizeBytes: 80 },
      { name: 'bash', sizeBytes: 50 },
      { name: 'zsh', sizeBytes: 50 },
      { name: 'ed', sizeBytes: 1 },
    ]);
  });

  it('truncates to the requested count', () => {
    const graph = buildPackageGraph([rec('a', 3), rec('b', 2), rec('c', 1)]);

    expect(rankRootPackages(pickRootPackages(graph), 2).map((r) => r.name)).toEqual(['a', 'b']);
    expect(rankRootPackages(pickRootPackages(graph), 0)).toEqual([]);
  });

  it('defaults to fifty entries', () => {
    const graph = buildPackageGraph(Array.from({ length: 60 }, (_, i) => rec(`pkg${i}`, i)));
    expect(rankRootPackages(pickRootPackages(graph))).toHaveLength(50);
  });

  it('keeps every root for an unbounded limit', () => {
    const graph = buildPackageGraph(Array.from({ length: 60 }, (_, i) => rec(`pkg${i}`, i)));
    const ranked = rankRootPackages(pickRootPackages(graph), Number.POSITIVE_INFINITY);

    expect(ranked).toHaveLength(60);
    expect(ranked[59]).toEqual({ name: 'pkg0', sizeBytes: 0 });
    expect(rankRootPackages(pickRootPackages(graph), Number.NEGATIVE_INFINITY)).toEqual([]);
  });
});

describe('formatSummary', () => {
  it('prints decimal megabytes with one decimal', () => {
    expect(formatSizeMb(1_500_000)).toBe('  1.5 MB');
    expect(formatSizeMb(123_456_789)).toBe('123.5 MB');
    expect(formatSizeMb(0)).toBe('  0.0 MB');
  });

  it('pads package names to a fixed column', () => {
    expect(formatSummaryLine({ name: 'curl', sizeBytes: 2_000_000 })).toBe(`curl${' '.repeat(31)}    2.0 MB`);
  });

  it('ends the listing with an empty line', () => {
    const text = formatSummary([
      { name: 'a', sizeBytes: 1_000_000 },
      { name: 'b', sizeBytes: 0 },
    ]);
    expect(text.split('\n')).toEqual([formatSummaryLine({ name: 'a', sizeBytes: 1_000_000 }), formatSummaryLine({ name: 'b', sizeBytes: 0 }), '', '']);
    expect(formatSummary([])).toBe('\n');
  });
});
