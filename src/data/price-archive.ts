import type { Db } from '../db/database.js';
import { createChildLogger } from '../logger.js';
import type { HistoricalSource } from '../market/gateway.js';
import { formatPair } from '../market/pair.js';
import type { CurrencyPair, PricePoint } from '../types/index.js';

const log = createChildLogger('price-archive');

interface PriceRow {
  timestamp: number;
  price: number;
  bid: number | null;
  ask: number | null;
}

/**
 * 수신한 시세의 SQLite 보관소 — 재시작 시 워밍업 소스로 사용
 */
export class PriceArchive implements HistoricalSource {
  readonly name = 'sqlite';
  private readonly db: Db;

  constructor(db: Db) {
    this.db = db;
  }

  /** 이미 있는 (pair, timestamp)는 무시 */
  record(point: PricePoint): void {
    this.db
      .prepare(
        `INSERT OR IGNORE INTO price_points (pair, timestamp, price, bid, ask)
         VALUES (?, ?, ?, ?, ?)`,
      )
      .run(formatPair(point.pair), point.timestamp, point.price, point.bid ?? null, point.ask ?? null);
  }

  async load(pair: CurrencyPair, fromTs: number, toTs: number): Promise<PricePoint[]> {
    const rows = this.db
      .prepare<[string, number, number], PriceRow>(
        `SELECT timestamp, price, bid, ask FROM price_points
         WHERE pair = ? AND timestamp >= ? AND timestamp <= ?
         ORDER BY timestamp ASC`,
      )
      .all(formatPair(pair), fromTs, toTs);
    log.debug({ pair: formatPair(pair), count: rows.length }, 'Archive loaded');
    return rows.map((r) => ({
      pair,
      timestamp: r.timestamp,
      price: r.price,
      ...(r.bid !== null ? { bid: r.bid } : {}),
      ...(r.ask !== null ? { ask: r.ask } : {}),
    }));
  }

  /** 보존 기간 밖 행 삭제, 삭제 건수 반환 */
  prune(olderThanTs: number): number {
    return this.db.prepare('DELETE FROM price_points WHERE timestamp < ?').run(olderThanTs).changes;
  }
}
