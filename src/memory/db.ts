import { mkdirSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import Database from 'better-sqlite3';

const DEFAULT_DB_PATH = join(homedir(), '.assetpilot', 'assetpilot.sqlite');
const INSTANCES = new Map<string, Database.Database>();

function getSchemaSql(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  return readFileSync(join(here, 'schema.sql'), 'utf-8');
}

function expandHome(path: string): string {
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}

export function resolveDbPath(dbPath?: string): string {
  return expandHome(dbPath ?? process.env.ASSETPILOT_DB_PATH ?? DEFAULT_DB_PATH);
}

/**
 * Open (or reuse) the SQLite database at `dbPath` and make sure the schema exists.
 */
export function openDatabase(dbPath?: string): Database.Database {
  const resolvedPath = resolveDbPath(dbPath);

  const existing = INSTANCES.get(resolvedPath);
  if (existing) {
    return existing;
  }

  if (resolvedPath !== ':memory:') {
    mkdirSync(dirname(resolvedPath), { recursive: true });
  }

  const db = new Database(resolvedPath);
  db.pragma('journal_mode = WAL');
  db.exec(getSchemaSql());

  INSTANCES.set(resolvedPath, db);
  return db;
}

export function closeDatabase(dbPath?: string): void {
  const resolvedPath = resolveDbPath(dbPath);
  const db = INSTANCES.get(resolvedPath);
  if (!db) {
    return;
  }
  db.close();
  INSTANCES.delete(resolvedPath);
}
