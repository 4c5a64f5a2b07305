import { GraphBuildError } from './errors.js';
import type { PackageGraph, PackageRecord } from './types.js';

type MutableNode = {
  name: string;
  ownSize: number;
  blame: { kind: 'pending'; size: number };
  depChildren: Set<string>;
  depParents: Set<string>;
};

function assertOwnSize(record: PackageRecord): void {
  const size = record.ownSize;
  if (!Number.isFinite(size) || !Number.isInteger(size) || size < 0) {
    throw new GraphBuildError(record.name, `invalid own size ${String(size)}`);
  }
}

/**
 * Builds the dependency graph in two passes so that a dependency listed before
 * its own record is still linked. Alternatives that are not installed are
 * skipped; every installed alternative of a group gets an edge.
 */
export function buildPackageGraph(records: Iterable<PackageRecord>): PackageGraph {
  const list = Array.from(records);
  const nodes = new Map<string, MutableNode>();

  for (const record of list) {
    assertOwnSize(record);
    if (nodes.has(record.name)) throw new GraphBuildError(record.name, 'duplicate package record');
    nodes.set(record.name, {
      name: record.name,
      ownSize: record.ownSize,
      blame: { kind: 'pending', size: record.ownSize },
      depChildren: new Set(),
      depParents: new Set(),
    });
  }

  for (const record of list) {
    const node = nodes.get(record.name);
    if (!node) continue;
    for (const group of record.dependencyGroups) {
      for (const alternative of group) {
        if (alternative === record.name) continue;
        const dep = nodes.get(alternative);
        if (!dep) continue;
        node.depChildren.add(dep.name);
        dep.depParents.add(node.name);
      }
    }
  }

  return nodes;
}
