import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { resolvePath } from '../shared/utils.js';
import { DbError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

/**
 * Open (creating if needed) a SQLite database file. `:memory:` is passed through.
 */
export function openDb(dbPath: string): Database.Database {
  const resolved = dbPath === ':memory:' ? ':memory:' : resolvePath(dbPath);
  let db: Database.Database | undefined;

  try {
    if (resolved !== ':memory:') {
      fs.mkdirSync(path.dirname(resolved), { recursive: true });
    }

    db = new Database(resolved);
    db.pragma('journal_mode = WAL');
    db.pragma('busy_timeout = 5000');

    logger.debug({ path: resolved }, 'Database opened');
    return db;
  } catch (err) {
    db?.close();
    throw new DbError(`Failed to open database at ${resolved}`, {
      path: resolved,
      cause: err instanceof Error ? err.message : String(err),
    });
  }
}
