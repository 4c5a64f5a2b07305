import fs from 'node:fs/promises';
import { parse } from 'csv-parse/sync';

import type { PackageRecord } from '../blame/types.js';

import { parseDependsField } from './dependsField.js';
import { asErrorText, PackageDatabaseError } from './errors.js';
import type { PackageDatabase } from './types.js';

type SnapshotRow = {
  name: string;
  record: PackageRecord;
  files: string[];
};

function stripBom(s: string): string {
  return s.charCodeAt(0) === 0xfeff ? s.slice(1) : s;
}

function readCell(row: object, column: string): string {
  const value: unknown = Reflect.get(row, column);
  return typeof value === 'string' ? value.trim() : '';
}

export type CsvSnapshotDatabaseOptions = {
  filePath: string;
};

/**
 * Package records captured as CSV, one package per line:
 *
 *   package,size,depends,files
 *   curl,512000,"libc6, libcurl4 (>= 8.0)",/usr/bin/curl /var/lib/curl
 *
 * size is in bytes, depends uses Debian relationship syntax and the optional
 * files column is a whitespace-separated list of installed paths.
 */
export class CsvSnapshotDatabase implements PackageDatabase {
  readonly label: string;
  private readonly filePath: string;
  private rows: Map<string, SnapshotRow> | null = null;

  constructor(options: CsvSnapshotDatabaseOptions) {
    this.filePath = options.filePath;
    this.label = `snapshot:${options.filePath}`;
  }

  async listInstalled(): Promise<PackageRecord[]> {
    const rows = await this.load();
    return Array.from(rows.values(), (r) => r.record);
  }

  async listInstalledFiles(name: string): Promise<string[]> {
    const rows = await this.load();
    return rows.get(name)?.files ?? [];
  }

  private async load(): Promise<Map<string, SnapshotRow>> {
    if (this.rows) return this.rows;

    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      throw new PackageDatabaseError(this.label, `cannot read snapshot: ${asErrorText(error)}`, { cause: error });
    }

    let parsed: unknown;
    try {
      parsed = parse(stripBom(text), {
        columns: true,
        relax_column_count: true,
        skip_empty_lines: true,
        trim: true,
      });
    } catch (error) {
      throw new PackageDatabaseError(this.label, `malformed CSV: ${asErrorText(error)}`, { cause: error });
    }
    if (!Array.isArray(parsed)) throw new PackageDatabaseError(this.label, 'malformed CSV');

    const rows = new Map<string, SnapshotRow>();
    parsed.forEach((row: unknown, index) => {
      const rowNo = index + 1;
      if (typeof row !== 'object' || row === null) {
        throw new PackageDatabaseError(this.label, `row ${rowNo}: not a record`);
      }
      const name = readCell(row, 'package');
      if (!name) throw new PackageDatabaseError(this.label, `row ${rowNo}: missing package name`);
      if (rows.has(name)) throw new PackageDatabaseError(this.label, `row ${rowNo}: duplicate package ${name}`);

      const sizeText = readCell(row, 'size');
      const size = sizeText ? Number(sizeText) : 0;
      if (!Number.isInteger(size) || size < 0) {
        throw new PackageDatabaseError(this.label, `row ${rowNo}: invalid size "${sizeText}" for ${name}`);
      }

      const filesText = readCell(row, 'files');
      rows.set(name, {
        name,
        record: { name, ownSize: size, dependencyGroups: parseDependsField(readCell(row, 'depends')) },
        files: filesText ? filesText.split(/\s+/u) : [],
      });
    });

    this.rows = rows;
    return rows;
  }
}
