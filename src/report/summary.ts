import type { LedgerSummary } from '../ledger/ledger.js';
import type { AuditLevel } from '../safety/audit-log.js';

/**
 * 일일 요약 — 콘솔/로그용 텍스트 테이블
 */
export function formatDailySummary(
  date: string,
  summary: LedgerSummary,
  auditCounts: Readonly<Record<AuditLevel, number>>,
): string {
  const lines: string[] = [];

  lines.push('');
  lines.push('═══════════════════════════════════════════');
  lines.push(`          DAILY SUMMARY ${date}`);
  lines.push('═══════════════════════════════════════════');
  lines.push('');

  lines.push(
    formatSection('Positions', [
      ['Open', String(summary.openPositions)],
      ['Closed', String(summary.closedPositions)],
      ['Available Balance', formatAmount(summary.availableBalance)],
      ['Initial Balance', formatAmount(summary.initialBalance)],
    ]),
  );

  const pnlRows: [string, string][] = Object.entries(summary.realizedPnl)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([ccy, pnl]) => [`Realized PnL ${ccy}`, formatAmount(pnl)]);
  if (pnlRows.length > 0) lines.push(formatSection('PnL', pnlRows));

  lines.push(
    formatSection('Orders', [
      ['Filled', String(summary.orders.FILLED)],
      ['Rejected', String(summary.orders.REJECTED)],
      ['Cancelled', String(summary.orders.CANCELLED)],
      ['Pending', String(summary.orders.PENDING)],
      ['Unresolved', String(summary.unresolvedOrders)],
    ]),
  );

  lines.push(
    formatSection('Audit (24h)', [
      ['Warnings', String(auditCounts.WARN)],
      ['Errors', String(auditCounts.ERROR + auditCounts.CRITICAL)],
    ]),
  );

  return lines.join('\n');
}

function formatSection(title: string, rows: [string, string][]): string {
  const lines: string[] = [];
  lines.push(`── ${title} ${'─'.repeat(38 - title.length)}`);
  for (const [key, value] of rows) {
    lines.push(`  ${key.padEnd(22)} ${value}`);
  }
  lines.push('');
  return lines.join('\n');
}

export function formatAmount(value: number): string {
  const sign = value < 0 ? '-' : '';
  return `${sign}${Math.abs(value).toFixed(2)}`;
}
