import type { PackageGraph, PackageNode } from './types.js';

/**
 * Packages nothing else depends on. Edges never change after the build, so
 * this can run before or after blame reassignment.
 */
export function pickRootPackages(graph: PackageGraph): PackageNode[] {
  return Array.from(graph.values()).filter((p) => p.depParents.size === 0);
}
