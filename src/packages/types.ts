import type { PackageRecord } from '../blame/types.js';

export type PackageDatabase = {
  readonly label: string;
  listInstalled(): Promise<PackageRecord[]>;
  listInstalledFiles(name: string): Promise<string[]>;
};

export type SizeAugmenter = (installedFiles: string[]) => Promise<number>;
