import type { Db } from '../db/database.js';
import type { TradeMode } from '../types/index.js';

export type AuditLevel = 'INFO' | 'WARN' | 'ERROR' | 'CRITICAL';

export interface AuditEntry {
  id: number;
  timestamp: number;
  level: AuditLevel;
  module: string;
  action: string;
  detail: string | null;
  mode: string | null;
}

/**
 * SQLite audit log — 결정(신호/주문)과 복구 가능한 오류를 모두 기록
 */
export class AuditLog {
  private readonly db: Db;
  private readonly mode: TradeMode;
  private readonly now: () => number;

  constructor(db: Db, mode: TradeMode, now: () => number = Date.now) {
    this.db = db;
    this.mode = mode;
    this.now = now;
  }

  log(level: AuditLevel, module: string, action: string, detail?: string): void {
    this.db
      .prepare(
        `INSERT INTO audit_log (timestamp, level, module, action, detail, mode)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(this.now(), level, module, action, detail ?? null, this.mode);
  }

  info(module: string, action: string, detail?: string): void {
    this.log('INFO', module, action, detail);
  }

  warn(module: string, action: string, detail?: string): void {
    this.log('WARN', module, action, detail);
  }

  error(module: string, action: string, detail?: string): void {
    this.log('ERROR', module, action, detail);
  }

  critical(module: string, action: string, detail?: string): void {
    this.log('CRITICAL', module, action, detail);
  }

  getRecent(limit: number = 50): AuditEntry[] {
    return this.db
      .prepare<[number], AuditEntry>('SELECT * FROM audit_log ORDER BY id DESC LIMIT ?')
      .all(limit);
  }

  /** 기간 내 레벨별 건수 — 일일 리포트용 */
  countSince(sinceTs: number): Record<AuditLevel, number> {
    const rows = this.db
      .prepare<[number], { level: AuditLevel; n: number }>(
        'SELECT level, COUNT(*) AS n FROM audit_log WHERE timestamp >= ? GROUP BY level',
      )
      .all(sinceTs);
    const out: Record<AuditLevel, number> = { INFO: 0, WARN: 0, ERROR: 0, CRITICAL: 0 };
    for (const r of rows) out[r.level] = r.n;
    return out;
  }
}
