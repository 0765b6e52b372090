import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema.js';
import path from 'path';
import fs from 'fs';

export { schema };

export type WorldDb = BetterSQLite3Database<typeof schema>;

export interface WorldDatabase {
  sqlite: Database.Database;
  db: WorldDb;
  close(): void;
}

export const DEFAULT_DB_PATH = path.join(process.cwd(), 'data', 'world.db');

// Optional object columns added after the first release. New columns are
// appended here and picked up by existing databases on the next start.
const OBJECT_COLUMNS: Array<[name: string, ddl: string]> = [
  ['grounding_height', 'REAL'],
  ['ar_origin_latitude', 'REAL'],
  ['ar_origin_longitude', 'REAL'],
  ['ar_offset_x', 'REAL'],
  ['ar_offset_y', 'REAL'],
  ['ar_offset_z', 'REAL'],
  ['ar_placement_timestamp', 'TEXT'],
  ['ar_anchor_transform', 'TEXT'],
  ['ar_placement_heading', 'REAL'],
  ['multifindable', 'INTEGER NOT NULL DEFAULT 0'],
];

/**
 * Open (or create) the world database. Pass ':memory:' for a throwaway
 * database, as the tests do.
 */
export function openDatabase(dbPath: string = DEFAULT_DB_PATH): WorldDatabase {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const sqlite = new Database(dbPath);
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');

  initializeDatabase(sqlite);

  return {
    sqlite,
    db: drizzle(sqlite, { schema }),
    close: () => sqlite.close(),
  };
}

// ─── Initialize tables ───
export function initializeDatabase(sqlite: Database.Database): void {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS objects (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      type TEXT NOT NULL,
      latitude REAL NOT NULL,
      longitude REAL NOT NULL,
      radius REAL NOT NULL,
      created_at TEXT NOT NULL,
      created_by TEXT,
      grounding_height REAL,
      ar_origin_latitude REAL,
      ar_origin_longitude REAL,
      ar_offset_x REAL,
      ar_offset_y REAL,
      ar_offset_z REAL,
      ar_placement_timestamp TEXT,
      ar_anchor_transform TEXT,
      ar_placement_heading REAL,
      multifindable INTEGER NOT NULL DEFAULT 0
    );

    CREATE TABLE IF NOT EXISTS finds (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      object_id TEXT NOT NULL REFERENCES objects(id),
      found_by TEXT NOT NULL,
      found_at TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS finds_object_idx ON finds(object_id);
    CREATE INDEX IF NOT EXISTS finds_found_by_idx ON finds(found_by);

    CREATE TABLE IF NOT EXISTS players (
      device_uuid TEXT PRIMARY KEY,
      player_name TEXT NOT NULL,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS user_last_locations (
      device_uuid TEXT PRIMARY KEY,
      latitude REAL NOT NULL,
      longitude REAL NOT NULL,
      updated_at TEXT NOT NULL
    );
  `);

  const added = addMissingColumns(sqlite, 'objects', OBJECT_COLUMNS);
  if (added.length > 0) {
    console.log(`[DB] Added object columns: ${added.join(', ')}`);
  }

  sqlite.exec(`
    CREATE INDEX IF NOT EXISTS objects_created_at_idx ON objects(created_at);
    CREATE INDEX IF NOT EXISTS objects_lat_lon_idx ON objects(latitude, longitude);
  `);
}

/**
 * Additive schema evolution: append any column the table does not have yet.
 * Existing rows take the column default (NULL unless the DDL says otherwise).
 */
export function addMissingColumns(
  sqlite: Database.Database,
  table: string,
  columns: Array<[name: string, ddl: string]>,
): string[] {
  const existing = sqlite.prepare(`PRAGMA table_info(${table})`).all() as { name: string }[];
  const present = new Set(existing.map((c) => c.name));
  const added: string[] = [];

  for (const [name, ddl] of columns) {
    if (present.has(name)) continue;
    sqlite.exec(`ALTER TABLE ${table} ADD COLUMN ${name} ${ddl}`);
    added.push(name);
  }

  return added;
}
