import { MB } from './defaults.js';
import type { RankedPackage } from './types.js';

const NAME_COLUMN_WIDTH = 35;

export function formatSizeMb(sizeBytes: number): string {
  return `${(sizeBytes / MB).toFixed(1).padStart(5, ' ')} MB`;
}

export function formatSummaryLine(entry: RankedPackage): string {
  return `${entry.name.padEnd(NAME_COLUMN_WIDTH, ' ')}  ${formatSizeMb(entry.sizeBytes)}`;
}

export function formatSummary(ranked: RankedPackage[]): string {
  const lines = ranked.map(formatSummaryLine);
  return `${lines.join('\n')}${lines.length > 0 ? '\n' : ''}\n`;
}
