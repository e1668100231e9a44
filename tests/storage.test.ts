import { describe, it, expect, beforeEach } from 'vitest';
import { PriceArchive } from '../src/data/price-archive.js';
import { openDatabase, type Db } from '../src/db/database.js';
import { EventBus } from '../src/engine/event-bus.js';
import { Ledger } from '../src/ledger/ledger.js';
import { OrderJournal } from '../src/ledger/order-journal.js';
import { parsePair } from '../src/market/pair.js';
import { AuditLog } from '../src/safety/audit-log.js';

const USDJPY = parsePair('USD/JPY');
const EURUSD = parsePair('EUR/USD');

let db: Db;

beforeEach(() => {
  db = openDatabase(':memory:');
});

describe('AuditLog', () => {
  it('should return newest entries first with mode and detail', () => {
    let clock = 1000;
    const audit = new AuditLog(db, 'paper', () => clock);
    audit.info('bot', 'SIGNAL', 'BUY USD/JPY');
    clock = 2000;
    audit.warn('bot', 'STALE_DATA');

    const entries = audit.getRecent();
    expect(entries.map((e) => e.action)).toEqual(['STALE_DATA', 'SIGNAL']);
    expect(entries[0]).toMatchObject({ timestamp: 2000, level: 'WARN', module: 'bot', detail: null, mode: 'paper' });
    expect(entries[1]?.detail).toBe('BUY USD/JPY');
    expect(audit.getRecent(1)).toHaveLength(1);
  });

  it('should count entries by level since a timestamp', () => {
    let clock = 1000;
    const audit = new AuditLog(db, 'live', () => clock);
    audit.error('bot', 'OLD');
    clock = 5000;
    audit.warn('bot', 'A');
    audit.warn('bot', 'B');
    audit.critical('bot', 'C');

    expect(audit.countSince(5000)).toEqual({ INFO: 0, WARN: 2, ERROR: 0, CRITICAL: 1 });
    expect(audit.countSince(0)).toEqual({ INFO: 0, WARN: 2, ERROR: 1, CRITICAL: 1 });
  });
});

describe('PriceArchive', () => {
  it('should load recorded points in range and ignore duplicates', async () => {
    const archive = new PriceArchive(db);
    archive.record({ pair: USDJPY, timestamp: 3000, price: 110.3 });
    archive.record({ pair: USDJPY, timestamp: 1000, price: 110.1, bid: 110.09, ask: 110.11 });
    archive.record({ pair: USDJPY, timestamp: 1000, price: 999 });
    archive.record({ pair: USDJPY, timestamp: 9000, price: 110.9 });
    archive.record({ pair: EURUSD, timestamp: 2000, price: 1.08 });

    expect(await archive.load(USDJPY, 1000, 3000)).toEqual([
      { pair: USDJPY, timestamp: 1000, price: 110.1, bid: 110.09, ask: 110.11 },
      { pair: USDJPY, timestamp: 3000, price: 110.3 },
    ]);
  });

  it('should prune rows older than the cutoff', async () => {
    const archive = new PriceArchive(db);
    archive.record({ pair: USDJPY, timestamp: 1000, price: 110.1 });
    archive.record({ pair: EURUSD, timestamp: 1500, price: 1.08 });
    archive.record({ pair: USDJPY, timestamp: 2000, price: 110.2 });

    expect(archive.prune(2000)).toBe(2);
    expect((await archive.load(USDJPY, 0, 5000)).map((p) => p.timestamp)).toEqual([2000]);
  });
});

describe('OrderJournal', () => {
  it('should upsert orders as they move through the ledger', () => {
    const bus = new EventBus();
    const journal = new OrderJournal(db, 'paper');
    journal.attach(bus);
    const ledger = new Ledger({ initialBalance: 10_000, maxTradeAmount: 1000, maxPositionsPerPair: 1, idPrefix: 'j' }, bus);

    const res = ledger.submit({
      pair: USDJPY,
      side: 'BUY',
      intent: 'OPEN',
      quantity: 1000,
      requestedPrice: 110.5,
      timestamp: 100,
    });
    expect(res).toEqual({ ok: true, orderId: 'j-000001' });
    expect(journal.get('j-000001')).toMatchObject({ status: 'PENDING', pair: 'USD/JPY', fill_price: null });

    ledger.reconcile('j-000001', { status: 'FILLED', price: 110.52, timestamp: 200 });
    expect(journal.get('j-000001')).toEqual({
      id: 'j-000001',
      mode: 'paper',
      pair: 'USD/JPY',
      side: 'BUY',
      intent: 'OPEN',
      qty: 1000,
      requested_price: 110.5,
      status: 'FILLED',
      position_id: 'pos-000001',
      fill_price: 110.52,
      reason: null,
      submitted_at: 100,
      resolved_at: 200,
    });
    expect(journal.recent()).toHaveLength(1);
  });

  it('should stop writing after detach', () => {
    const bus = new EventBus();
    const journal = new OrderJournal(db, 'paper');
    journal.attach(bus);
    journal.detach();
    const ledger = new Ledger({ initialBalance: 10_000, maxTradeAmount: 1000, maxPositionsPerPair: 1, idPrefix: 'j' }, bus);
    ledger.submit({ pair: USDJPY, side: 'SELL', intent: 'OPEN', quantity: 500, requestedPrice: 110, timestamp: 1 });

    expect(journal.get('j-000001')).toBeUndefined();
  });
});
