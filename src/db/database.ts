import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { createChildLogger } from '../logger.js';

const log = createChildLogger('db');

export type Db = Database.Database;

/**
 * SQLite 열기 + 스키마 초기화. ':memory:'는 테스트용
 */
export function openDatabase(path: string): Db {
  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true });
  }
  const db = new Database(path);
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  initSchema(db);
  log.info({ path }, 'Database initialized');
  return db;
}

function initSchema(db: Db): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS price_points (
      pair       TEXT NOT NULL,
      timestamp  INTEGER NOT NULL,
      price      REAL NOT NULL,
      bid        REAL,
      ask        REAL,
      PRIMARY KEY (pair, timestamp)
    );

    CREATE TABLE IF NOT EXISTS orders (
      id              TEXT PRIMARY KEY,
      mode            TEXT NOT NULL,
      pair            TEXT NOT NULL,
      side            TEXT NOT NULL,
      intent          TEXT NOT NULL,
      qty             REAL NOT NULL,
      requested_price REAL NOT NULL,
      status          TEXT NOT NULL,
      position_id     TEXT,
      fill_price      REAL,
      reason          TEXT,
      submitted_at    INTEGER NOT NULL,
      resolved_at     INTEGER
    );

    CREATE TABLE IF NOT EXISTS audit_log (
      id         INTEGER PRIMARY KEY AUTOINCREMENT,
      timestamp  INTEGER NOT NULL DEFAULT (strftime('%s','now') * 1000),
      level      TEXT NOT NULL,
      module     TEXT NOT NULL,
      action     TEXT NOT NULL,
      detail     TEXT,
      mode       TEXT
    );

    CREATE INDEX IF NOT EXISTS idx_orders_status ON orders(status);
    CREATE INDEX IF NOT EXISTS idx_audit_ts ON audit_log(timestamp);
  `);
}
