import type { Logger } from 'pino';

import type { PackageRecord } from '../blame/types.js';

import { asErrorText, PackageDatabaseError } from './errors.js';
import type { PackageDatabase, SizeAugmenter } from './types.js';

export type LoadPackageRecordsOptions = {
  database: PackageDatabase;
  augmentSize?: SizeAugmenter;
  logger: Logger;
};

/**
 * Resolves the complete record set up front; any database failure surfaces
 * here, before a graph exists.
 */
export async function loadPackageRecords(options: LoadPackageRecordsOptions): Promise<PackageRecord[]> {
  const { database, augmentSize, logger } = options;

  let records: PackageRecord[];
  try {
    records = await database.listInstalled();
  } catch (error) {
    if (error instanceof PackageDatabaseError) throw error;
    throw new PackageDatabaseError(database.label, asErrorText(error), { cause: error });
  }
  logger.debug({ database: database.label, packages: records.length }, 'loaded installed packages');

  if (!augmentSize) return records;

  const augmented: PackageRecord[] = [];
  let extraBytes = 0;
  for (const record of records) {
    const files = await database.listInstalledFiles(record.name);
    const extra = await augmentSize(files);
    extraBytes += extra;
    augmented.push(extra > 0 ? { ...record, ownSize: record.ownSize + extra } : record);
  }
  logger.info({ extraBytes }, 'measured package state under /var');
  return augmented;
}
