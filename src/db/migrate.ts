import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { DbError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { getPackageRoot } from '../shared/utils.js';

/** Columns the cache store reads and writes. */
export const CACHE_COLUMNS = ['signature', 'published_at', 'is_miss', 'fetched_at'] as const;

/** Why a file cannot serve as the cache; `layout` means the file is usable once recreated. */
export type SchemaFailure = 'layout' | 'io';

interface SchemaStep {
  version: number;
  file: string;
}

function getMigrationsDir(): string {
  return path.join(getPackageRoot(), 'src', 'db', 'migrations');
}

/**
 * Schema steps from `NNN_name.sql` files. The number is the `user_version`
 * the file brings the database to.
 */
function listSteps(): SchemaStep[] {
  const dir = getMigrationsDir();
  if (!fs.existsSync(dir)) {
    throw new DbError(`Migrations directory not found: ${dir}`, { failure: 'io' });
  }

  const steps: SchemaStep[] = [];
  for (const file of fs.readdirSync(dir)) {
    const match = /^(\d+)_.+\.sql$/.exec(file);
    if (match) steps.push({ version: Number(match[1]), file });
  }
  return steps.sort((a, b) => a.version - b.version);
}

function userVersion(db: Database.Database): number {
  const value: unknown = db.pragma('user_version', { simple: true });
  return typeof value === 'number' ? value : 0;
}

function cacheTableColumns(db: Database.Database): string[] {
  const rows: unknown[] = db.prepare('PRAGMA table_info(publish_time_cache)').all();
  return rows.flatMap((row) =>
    row !== null && typeof row === 'object' && 'name' in row && typeof row.name === 'string'
      ? [row.name]
      : [],
  );
}

function layoutError(message: string, details: Record<string, unknown>): DbError {
  return new DbError(message, { failure: 'layout' satisfies SchemaFailure, ...details });
}

/** `layout` or `io`, for a DbError raised while preparing the cache schema. */
export function schemaFailure(err: unknown): SchemaFailure | null {
  if (!(err instanceof DbError)) return null;
  const failure = err.details?.['failure'];
  return failure === 'layout' || failure === 'io' ? failure : null;
}

/**
 * Bring the cache schema to the latest version, tracked in `user_version`.
 * A database written by a newer release, or holding a `publish_time_cache`
 * table this code cannot read, fails with a `layout` DbError.
 */
export function migrateCacheSchema(db: Database.Database): { from: number; to: number } {
  const steps = listSteps();
  const latest = steps.at(-1)?.version ?? 0;
  const from = userVersion(db);

  if (from > latest) {
    throw layoutError(`Cache schema version ${from} is newer than supported version ${latest}`, {
      version: from,
    });
  }

  const columns = cacheTableColumns(db);
  const missing = CACHE_COLUMNS.filter((c) => !columns.includes(c));
  if (columns.length > 0 && missing.length > 0) {
    throw layoutError('publish_time_cache has an unexpected layout', { columns, missing });
  }

  for (const step of steps) {
    if (step.version <= from) continue;
    const sql = fs.readFileSync(path.join(getMigrationsDir(), step.file), 'utf-8');

    try {
      db.transaction(() => {
        db.exec(sql);
        db.pragma(`user_version = ${step.version}`);
      })();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      // SQLITE_ERROR is a statement the existing tables reject; anything else is I/O or locking.
      const failure: SchemaFailure =
        err instanceof Database.SqliteError && err.code === 'SQLITE_ERROR' ? 'layout' : 'io';
      throw new DbError(`Cache schema step failed: ${step.file}`, { failure, step: step.file, cause: message });
    }
    logger.debug({ step: step.file, version: step.version }, 'Cache schema updated');
  }

  return { from, to: Math.max(from, latest) };
}
