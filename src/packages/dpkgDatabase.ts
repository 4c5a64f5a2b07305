import fs from 'node:fs/promises';
import path from 'node:path';

import type { PackageRecord } from '../blame/types.js';

import { resolveDpkgAdminDir, resolveNativeArch } from './defaults.js';
import { parseDependsField } from './dependsField.js';
import { asErrorText, errorCode, PackageDatabaseError } from './errors.js';
import type { PackageDatabase } from './types.js';

export type ControlStanza = Map<string, string>;

// dpkg states in which a package version is on disk
const NOT_INSTALLED_STATES = new Set(['not-installed', 'config-files']);

/**
 * Splits a deb822 document into stanzas. Field names are lower-cased;
 * continuation lines are joined with "\n".
 */
export function parseControlStanzas(text: string): ControlStanza[] {
  const stanzas: ControlStanza[] = [];
  let current: ControlStanza = new Map();
  let lastKey: string | null = null;

  for (const line of text.split(/\r?\n/u)) {
    if (line.trim().length === 0) {
      if (current.size > 0) stanzas.push(current);
      current = new Map();
      lastKey = null;
      continue;
    }

    if (line.startsWith(' ') || line.startsWith('\t')) {
      if (lastKey === null) continue;
      current.set(lastKey, `${current.get(lastKey) ?? ''}\n${line.trim()}`);
      continue;
    }

    const colon = line.indexOf(':');
    if (colon <= 0) continue;
    lastKey = line.slice(0, colon).trim().toLowerCase();
    current.set(lastKey, line.slice(colon + 1).trim());
  }

  if (current.size > 0) stanzas.push(current);
  return stanzas;
}

function isInstalled(stanza: ControlStanza): boolean {
  const words = (stanza.get('status') ?? '').split(/\s+/u);
  const state = words[2];
  return state !== undefined && state.length > 0 && !NOT_INSTALLED_STATES.has(state);
}

// Installed-Size is in KiB
function installedSizeBytes(stanza: ControlStanza): number {
  const kib = Number.parseInt(stanza.get('installed-size') ?? '', 10);
  return Number.isFinite(kib) && kib > 0 ? kib * 1024 : 0;
}

export type DpkgDatabaseOptions = {
  adminDir?: string;
  nativeArch?: string;
};

type InstalledStanza = {
  pkg: string;
  arch: string | undefined;
  stanza: ControlStanza;
};

export class DpkgDatabase implements PackageDatabase {
  readonly label: string;
  private readonly adminDir: string;
  private readonly nativeArch: string;
  private readonly listFiles = new Map<string, string[]>();

  constructor(options: DpkgDatabaseOptions = {}) {
    this.adminDir = options.adminDir ?? resolveDpkgAdminDir();
    this.nativeArch = options.nativeArch ?? resolveNativeArch();
    this.label = `dpkg:${this.adminDir}`;
  }

  private isNativeArch(arch: string | undefined): boolean {
    return arch === this.nativeArch || arch === 'all';
  }

  // Which stanza of a multi-arch package answers to the plain name:
  // the native one when installed, otherwise the first.
  private plainNameOwners(installed: InstalledStanza[]): Map<string, InstalledStanza> {
    const owners = new Map<string, InstalledStanza>();
    for (const entry of installed) {
      const owner = owners.get(entry.pkg);
      if (!owner || (!this.isNativeArch(owner.arch) && this.isNativeArch(entry.arch))) {
        owners.set(entry.pkg, entry);
      }
    }
    return owners;
  }

  async listInstalled(): Promise<PackageRecord[]> {
    const statusPath = path.join(this.adminDir, 'status');
    let text: string;
    try {
      text = await fs.readFile(statusPath, 'utf8');
    } catch (error) {
      throw new PackageDatabaseError(this.label, `cannot read ${statusPath}: ${asErrorText(error)}`, { cause: error });
    }

    const installed: InstalledStanza[] = [];
    for (const stanza of parseControlStanzas(text)) {
      const pkg = stanza.get('package');
      if (!pkg || !isInstalled(stanza)) continue;
      installed.push({ pkg, arch: stanza.get('architecture'), stanza });
    }
    const owners = this.plainNameOwners(installed);

    this.listFiles.clear();
    const records: PackageRecord[] = [];
    for (const entry of installed) {
      const { pkg, arch, stanza } = entry;
      const qualifiedList = arch ? [`${pkg}:${arch}.list`] : [];
      let name = pkg;
      let candidates = [`${pkg}.list`, ...qualifiedList];
      if (owners.get(pkg) !== entry) {
        if (!arch) continue;
        name = `${pkg}:${arch}`;
        candidates = qualifiedList;
      }
      if (this.listFiles.has(name)) continue;
      this.listFiles.set(name, candidates);

      records.push({
        name,
        ownSize: installedSizeBytes(stanza),
        dependencyGroups: [
          ...parseDependsField(stanza.get('pre-depends')),
          ...parseDependsField(stanza.get('depends')),
        ],
      });
    }
    return records;
  }

  async listInstalledFiles(name: string): Promise<string[]> {
    const candidates = this.listFiles.get(name) ?? [`${name}.list`];
    for (const fileName of candidates) {
      const filePath = path.join(this.adminDir, 'info', fileName);
      let text: string;
      try {
        text = await fs.readFile(filePath, 'utf8');
      } catch (error) {
        if (errorCode(error) === 'ENOENT') continue;
        throw new PackageDatabaseError(this.label, `cannot read ${filePath}: ${asErrorText(error)}`, { cause: error });
      }
      return text
        .split(/\r?\n/u)
        .map((l) => l.trim())
        .filter((l) => l.length > 0);
    }
    return [];
  }
}
