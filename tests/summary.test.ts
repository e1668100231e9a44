import { describe, it, expect } from 'vitest';
import type { LedgerSummary } from '../src/ledger/ledger.js';
import { formatAmount, formatDailySummary } from '../src/report/summary.js';

const base: LedgerSummary = {
  initialBalance: 100_000,
  availableBalance: 99_000,
  openPositions: 1,
  closedPositions: 2,
  realizedPnl: { USD: 12.5, JPY: -1600 },
  orders: { PENDING: 1, FILLED: 3, REJECTED: 1, CANCELLED: 0 },
  unresolvedOrders: 1,
};

function row(key: string, value: string): string {
  return `  ${key.padEnd(22)} ${value}`;
}

describe('formatDailySummary', () => {
  it('should render every section with aligned rows', () => {
    const lines = formatDailySummary('2024-03-01', base, { INFO: 9, WARN: 2, ERROR: 1, CRITICAL: 1 }).split('\n');

    expect(lines).toContain('          DAILY SUMMARY 2024-03-01');
    expect(lines).toContain(row('Open', '1'));
    expect(lines).toContain(row('Available Balance', '99000.00'));
    expect(lines).toContain(row('Unresolved', '1'));
    expect(lines).toContain(row('Warnings', '2'));
    expect(lines).toContain(row('Errors', '2'));

    // 통화 코드 순
    const jpy = lines.indexOf(row('Realized PnL JPY', '-1600.00'));
    const usd = lines.indexOf(row('Realized PnL USD', '12.50'));
    expect(jpy).toBeGreaterThan(0);
    expect(usd).toBe(jpy + 1);
  });

  it('should omit the PnL section before any position closes', () => {
    const text = formatDailySummary('2024-03-01', { ...base, closedPositions: 0, realizedPnl: {} }, {
      INFO: 0,
      WARN: 0,
      ERROR: 0,
      CRITICAL: 0,
    });
    expect(text).not.toContain('── PnL');
  });
});

describe('formatAmount', () => {
  it('should use two decimals with a leading minus', () => {
    expect(formatAmount(1234.5)).toBe('1234.50');
    expect(formatAmount(-3.456)).toBe('-3.46');
    expect(formatAmount(0)).toBe('0.00');
  });
});
