export class PackageDatabaseError extends Error {
  database: string;

  constructor(database: string, message: string, options?: { cause?: unknown }) {
    super(`${database}: ${message}`, options);
    this.name = 'PackageDatabaseError';
    this.database = database;
  }
}

export function asErrorText(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function errorCode(error: unknown): string | undefined {
  return error && typeof error === 'object' && 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}
