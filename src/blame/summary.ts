import { DEFAULT_RESULT_LIMIT } from './defaults.js';
import { attributedSize, type PackageNode, type RankedPackage } from './types.js';

export function rankRootPackages(roots: PackageNode[], limit: number = DEFAULT_RESULT_LIMIT): RankedPackage[] {
  // Infinity keeps every root.
  const max = Number.isNaN(limit) ? DEFAULT_RESULT_LIMIT : Math.max(0, Math.floor(limit));

  const ranked = roots.map((p) => ({ name: p.name, sizeBytes: attributedSize(p) ?? 0 }));
  ranked.sort((a, b) => {
    if (a.sizeBytes !== b.sizeBytes) return b.sizeBytes - a.sizeBytes;
    if (a.name === b.name) return 0;
    return a.name < b.name ? -1 : 1;
  });

  return ranked.slice(0, max);
}
