import type { Logger } from 'pino';

import { loadPackageRecords } from '../packages/loadRecords.js';
import type { PackageDatabase, SizeAugmenter } from '../packages/types.js';

import { buildPackageGraph } from './buildGraph.js';
import { DEFAULT_MAX_DEPTH, DEFAULT_RESULT_LIMIT } from './defaults.js';
import { pickRootPackages } from './pickRoots.js';
import { reassignBlame } from './reassignBlame.js';
import { rankRootPackages } from './summary.js';
import type { BlameStats, RankedPackage } from './types.js';

export type BlameRequest = {
  database: PackageDatabase;
  limit?: number;
  maxDepth?: number;
  augmentSize?: SizeAugmenter;
  logger: Logger;
};

export type BlameResponse = {
  ranked: RankedPackage[];
  stats: BlameStats;
  packageCount: number;
  rootCount: number;
  totalBytes: number;
};

export async function runBlame(req: BlameRequest): Promise<BlameResponse> {
  const logger = req.logger;
  const limit = req.limit ?? DEFAULT_RESULT_LIMIT;
  const maxDepth = req.maxDepth ?? DEFAULT_MAX_DEPTH;

  const records = await loadPackageRecords({ database: req.database, augmentSize: req.augmentSize, logger });
  const totalBytes = records.reduce((sum, r) => sum + r.ownSize, 0);

  const graph = buildPackageGraph(records);
  const stats = reassignBlame(graph, { maxDepth, logger });
  const roots = pickRootPackages(graph);

  logger.debug(
    { packages: graph.size, roots: roots.length, visits: stats.visits, cutoffs: stats.cutoffs },
    'blame reassigned',
  );
  if (stats.stranded.length > 0) {
    logger.warn(
      { packages: stats.stranded, bytes: stats.strandedBytes },
      `${stats.stranded.length} packages kept blame their dependents could not receive`,
    );
  }
  if (stats.droppedBytes > 0) {
    logger.debug({ bytes: stats.droppedBytes }, 'blame dropped on collapsed parents');
  }

  return {
    ranked: rankRootPackages(roots, limit),
    stats,
    packageCount: graph.size,
    rootCount: roots.length,
    totalBytes,
  };
}
