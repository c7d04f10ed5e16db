import type Database from 'better-sqlite3';
import fs from 'node:fs';
import { openDb } from '../db/db.js';
import { migrateCacheSchema, schemaFailure } from '../db/migrate.js';
import { CacheError, DbError, errorMessage } from '../shared/errors.js';
import { resolvePath } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

/**
 * Outcome of one enrichment attempt for a signature. A hit is permanent;
 * a miss is retried once it is older than the miss TTL.
 */
export interface CacheEntry {
  published_at: string | null;
  fetched_at: string;
  is_miss: boolean;
}

/**
 * The get/put surface the enrichment service depends on.
 */
export interface PublishTimeCache {
  get(signature: string): CacheEntry | undefined;
  put(signature: string, entry: CacheEntry): void;
}

interface CacheRow {
  signature: unknown;
  published_at: unknown;
  is_miss: unknown;
  fetched_at: unknown;
}

const HOUR_MS = 3_600_000;

export function isExpired(entry: CacheEntry, now: Date, missTtlHours: number): boolean {
  if (!entry.is_miss) return false;
  const fetchedAt = Date.parse(entry.fetched_at);
  if (Number.isNaN(fetchedAt)) return true;
  return now.getTime() - fetchedAt > missTtlHours * HOUR_MS;
}

function rowToEntry(row: CacheRow): CacheEntry | null {
  if (typeof row.fetched_at !== 'string' || Number.isNaN(Date.parse(row.fetched_at))) return null;
  if (row.is_miss === 1) {
    return { published_at: null, fetched_at: row.fetched_at, is_miss: true };
  }
  if (row.is_miss === 0 && typeof row.published_at === 'string' && !Number.isNaN(Date.parse(row.published_at))) {
    return { published_at: row.published_at, fetched_at: row.fetched_at, is_miss: false };
  }
  return null;
}

/**
 * Durable signature → publish time map. Every row is loaded into memory when
 * the store is constructed; put() writes through to SQLite before the memory
 * map changes, so a failed write leaves both sides as they were.
 */
export class EnrichmentCacheStore implements PublishTimeCache {
  private readonly entries = new Map<string, CacheEntry>();

  constructor(private readonly db: Database.Database) {
    const rows = db
      .prepare('SELECT signature, published_at, is_miss, fetched_at FROM publish_time_cache')
      .all() as CacheRow[];

    let skipped = 0;
    for (const row of rows) {
      const entry = rowToEntry(row);
      if (typeof row.signature === 'string' && entry) {
        this.entries.set(row.signature, entry);
      } else {
        skipped++;
      }
    }

    if (skipped > 0) {
      logger.warn({ skipped }, 'Ignored unreadable publish time cache rows');
    }
    logger.debug({ entries: this.entries.size }, 'Publish time cache loaded');
  }

  get size(): number {
    return this.entries.size;
  }

  get(signature: string): CacheEntry | undefined {
    const entry = this.entries.get(signature);
    return entry ? { ...entry } : undefined;
  }

  put(signature: string, entry: CacheEntry): void {
    const stored: CacheEntry = entry.is_miss
      ? { published_at: null, fetched_at: entry.fetched_at, is_miss: true }
      : { ...entry };

    try {
      this.db
        .prepare(
          `INSERT INTO publish_time_cache (signature, published_at, is_miss, fetched_at)
           VALUES (?, ?, ?, ?)
           ON CONFLICT(signature) DO UPDATE SET
             published_at = excluded.published_at,
             is_miss = excluded.is_miss,
             fetched_at = excluded.fetched_at`,
        )
        .run(signature, stored.published_at, stored.is_miss ? 1 : 0, stored.fetched_at);
    } catch (err) {
      throw new CacheError(`Failed to write publish time cache entry: ${errorMessage(err)}`, {
        signature,
      });
    }

    this.entries.set(signature, stored);
  }

  stats(): { hits: number; misses: number } {
    let misses = 0;
    for (const entry of this.entries.values()) {
      if (entry.is_miss) misses++;
    }
    return { hits: this.entries.size - misses, misses };
  }

  /**
   * Delete misses older than the TTL. Returns how many were removed.
   */
  pruneExpiredMisses(now: Date, missTtlHours: number): number {
    const expired = [...this.entries.entries()]
      .filter(([, entry]) => isExpired(entry, now, missTtlHours))
      .map(([signature]) => signature);
    if (expired.length === 0) return 0;

    const remove = this.db.prepare('DELETE FROM publish_time_cache WHERE signature = ?');
    try {
      this.db.transaction((signatures: string[]) => {
        for (const signature of signatures) remove.run(signature);
      })(expired);
    } catch (err) {
      throw new CacheError(`Failed to prune publish time cache: ${errorMessage(err)}`);
    }

    for (const signature of expired) this.entries.delete(signature);
    logger.info({ removed: expired.length }, 'Pruned expired publish time misses');
    return expired.length;
  }

  close(): void {
    this.db.close();
  }
}

const CORRUPTION_PATTERN = /file is not a database|database disk image is malformed/i;

/** The file exists but cannot serve as this cache: unreadable, or another layout. */
function isUnusable(err: unknown): boolean {
  if (schemaFailure(err) === 'layout') return true;
  if (err instanceof DbError) {
    return CORRUPTION_PATTERN.test(`${err.message} ${String(err.details?.['cause'] ?? '')}`);
  }
  return err instanceof Error && CORRUPTION_PATTERN.test(err.message);
}

function loadStore(dbPath: string): EnrichmentCacheStore {
  const db = openDb(dbPath);
  try {
    migrateCacheSchema(db);
    return new EnrichmentCacheStore(db);
  } catch (err) {
    db.close();
    throw err;
  }
}

/**
 * Open the cache file. A file that is not a readable database, or whose
 * schema this code cannot use, is moved aside and replaced with an empty
 * store; any other failure is a CacheError.
 */
export function openCacheStore(dbPath: string): EnrichmentCacheStore {
  try {
    return loadStore(dbPath);
  } catch (err) {
    if (dbPath === ':memory:' || !isUnusable(err)) {
      throw new CacheError(`Publish time cache unavailable: ${errorMessage(err)}`, { path: dbPath });
    }

    const resolved = resolvePath(dbPath);
    const aside = `${resolved}.corrupt-${Date.now()}`;
    logger.warn({ path: resolved, movedTo: aside }, 'Publish time cache is unreadable, starting empty');

    try {
      fs.renameSync(resolved, aside);
      for (const suffix of ['-wal', '-shm']) {
        fs.rmSync(`${resolved}${suffix}`, { force: true });
      }
      return loadStore(dbPath);
    } catch (retryErr) {
      throw new CacheError(`Publish time cache unavailable: ${errorMessage(retryErr)}`, {
        path: dbPath,
      });
    }
  }
}
