import { describe, it, expect } from 'vitest';
import { EventBus } from '../src/engine/event-bus.js';
import { Ledger } from '../src/ledger/ledger.js';
import { parsePair } from '../src/market/pair.js';
import type { OrderRequest } from '../src/types/index.js';

const USDJPY = parsePair('USD/JPY');
const EURUSD = parsePair('EUR/USD');

function setup(maxPositionsPerPair = 1, initialBalance = 100_000) {
  const bus = new EventBus();
  const ledger = new Ledger({ initialBalance, maxTradeAmount: 5000, maxPositionsPerPair, idPrefix: 'test' }, bus);
  return { bus, ledger };
}

function open(side: 'BUY' | 'SELL' = 'BUY', quantity = 1000, pair = USDJPY): OrderRequest {
  return { pair, side, intent: 'OPEN', quantity, requestedPrice: 110, timestamp: 1000 };
}

function close(side: 'BUY' | 'SELL', positionId?: string): OrderRequest {
  return { pair: USDJPY, side, intent: 'CLOSE', quantity: 0, requestedPrice: 111, timestamp: 2000, positionId };
}

function submitOk(ledger: Ledger, req: OrderRequest): string {
  const res = ledger.submit(req);
  if (!res.ok) throw new Error(`unexpected rejection ${res.reason}`);
  return res.orderId;
}

describe('Ledger', () => {
  it('should submit a pending order with a sequential id', () => {
    const { bus, ledger } = setup();
    expect(ledger.submit(open())).toEqual({ ok: true, orderId: 'test-000001' });
    const order = ledger.getOrder('test-000001');
    expect(order?.status).toBe('PENDING');
    expect(order?.needsReconciliation).toBe(false);
    expect(bus.getLog().map((e) => e.type)).toEqual(['ORDER_SUBMITTED']);
  });

  it('should open a position on fill', () => {
    const { bus, ledger } = setup();
    const id = submitOk(ledger, open());
    const res = ledger.reconcile(id, { status: 'FILLED', price: 110.6, timestamp: 1500 });
    expect(res.applied).toBe(true);

    const [position] = ledger.openPositions(USDJPY);
    expect(position).toMatchObject({
      id: 'pos-000001',
      direction: 'BUY',
      quantity: 1000,
      entryPrice: 110.6,
      openedAt: 1500,
      status: 'OPEN',
    });
    expect(ledger.getOrder(id)).toMatchObject({ status: 'FILLED', fillPrice: 110.6, positionId: 'pos-000001' });
    expect(bus.getLog().map((e) => e.type)).toEqual(['ORDER_SUBMITTED', 'ORDER_FILLED', 'POSITION_OPENED']);
  });

  it('should apply a partial fill quantity', () => {
    const { ledger } = setup();
    const id = submitOk(ledger, open());
    ledger.reconcile(id, { status: 'FILLED', price: 110, quantity: 400, timestamp: 1500 });
    expect(ledger.openPositions()[0]?.quantity).toBe(400);
  });

  it('should resolve an order exactly once', () => {
    const { ledger } = setup();
    const id = submitOk(ledger, open());
    ledger.reconcile(id, { status: 'REJECTED', reason: 'broker said no', timestamp: 1500 });
    expect(ledger.reconcile(id, { status: 'FILLED', price: 110, timestamp: 1600 })).toEqual({
      applied: false,
      reason: 'ALREADY_RESOLVED',
    });
    expect(ledger.openPositions()).toHaveLength(0);
    expect(ledger.getOrder(id)).toMatchObject({ status: 'REJECTED', reason: 'broker said no' });
    expect(ledger.reconcile('nope', { status: 'CANCELLED', timestamp: 1 })).toEqual({
      applied: false,
      reason: 'UNKNOWN_ORDER',
    });
  });

  it('should block a second open while one is pending', () => {
    const { ledger } = setup();
    submitOk(ledger, open());
    expect(ledger.canOpen(USDJPY)).toBe(false);
    expect(ledger.submit(open())).toEqual({ ok: false, reason: 'ORDER_PENDING' });
    // 다른 통화쌍은 독립
    expect(ledger.submit(open('BUY', 1000, EURUSD)).ok).toBe(true);
  });

  it('should block a second open while a position is held', () => {
    const { ledger } = setup();
    const id = submitOk(ledger, open());
    ledger.reconcile(id, { status: 'FILLED', price: 110, timestamp: 1500 });
    expect(ledger.submit(open('SELL'))).toEqual({ ok: false, reason: 'POSITION_OPEN' });
  });

  it('should allow multiple positions when configured', () => {
    const { ledger } = setup(2);
    const a = submitOk(ledger, open());
    const b = submitOk(ledger, open());
    expect(ledger.submit(open())).toEqual({ ok: false, reason: 'ORDER_PENDING' });
    ledger.reconcile(a, { status: 'FILLED', price: 110, timestamp: 1500 });
    ledger.reconcile(b, { status: 'FILLED', price: 111, timestamp: 1600 });
    expect(ledger.openPositions(USDJPY).map((p) => p.entryPrice)).toEqual([110, 111]);
  });

  it('should validate quantity, cap and funds', () => {
    const { ledger } = setup(1, 1500);
    expect(ledger.submit(open('BUY', 0))).toEqual({ ok: false, reason: 'INVALID_QUANTITY' });
    expect(ledger.submit(open('BUY', 6000))).toEqual({ ok: false, reason: 'AMOUNT_EXCEEDS_CAP' });
    submitOk(ledger, open('BUY', 1000));
    expect(ledger.availableBalance).toBe(500);
    expect(ledger.submit(open('BUY', 1000, EURUSD))).toEqual({ ok: false, reason: 'INSUFFICIENT_FUNDS' });
  });

  it('should close a long position and realize PnL', () => {
    const { bus, ledger } = setup();
    const openId = submitOk(ledger, open('BUY', 1000));
    ledger.reconcile(openId, { status: 'FILLED', price: 110, timestamp: 1500 });

    const closeId = submitOk(ledger, close('SELL'));
    expect(ledger.getOrder(closeId)).toMatchObject({ quantity: 1000, positionId: 'pos-000001' });
    ledger.reconcile(closeId, { status: 'FILLED', price: 110.5, timestamp: 2500 });

    const [position] = ledger.positions();
    expect(position).toMatchObject({ status: 'CLOSED', exitPrice: 110.5, closedAt: 2500, realizedPnl: 500 });
    expect(ledger.openPositions()).toHaveLength(0);
    expect(ledger.canOpen(USDJPY)).toBe(true);
    expect(bus.getLog().at(-1)?.type).toBe('POSITION_CLOSED');
    expect(ledger.summary().realizedPnl).toEqual({ JPY: 500 });
  });

  it('should realize PnL for a short position', () => {
    const { ledger } = setup();
    const openId = submitOk(ledger, open('SELL', 1000));
    ledger.reconcile(openId, { status: 'FILLED', price: 110, timestamp: 1500 });
    const closeId = submitOk(ledger, close('BUY'));
    ledger.reconcile(closeId, { status: 'FILLED', price: 111, timestamp: 2500 });
    expect(ledger.positions()[0]?.realizedPnl).toBe(-1000);
  });

  it('should reduce the position on a partial close fill', () => {
    const { bus, ledger } = setup();
    const openId = submitOk(ledger, open('BUY', 1000));
    ledger.reconcile(openId, { status: 'FILLED', price: 110, timestamp: 1500 });

    const closeId = submitOk(ledger, close('SELL'));
    ledger.reconcile(closeId, { status: 'FILLED', price: 110.5, quantity: 400, timestamp: 2500 });

    expect(ledger.getOrder(closeId)).toMatchObject({ status: 'FILLED', filledQuantity: 400 });
    const [position] = ledger.positions();
    expect(position).toMatchObject({ status: 'OPEN', quantity: 600, realizedPnl: 200 });
    expect(position?.closedAt).toBeUndefined();
    expect(ledger.canOpen(USDJPY)).toBe(false);
    expect(ledger.availableBalance).toBe(99_400);
    expect(bus.getLog().at(-1)?.type).toBe('POSITION_REDUCED');
    expect(ledger.summary()).toMatchObject({ openPositions: 1, closedPositions: 0, realizedPnl: { JPY: 200 } });

    // 남은 600 청산
    const restId = submitOk(ledger, close('SELL'));
    expect(ledger.getOrder(restId)?.quantity).toBe(600);
    ledger.reconcile(restId, { status: 'FILLED', price: 111, timestamp: 3500 });
    expect(ledger.positions()[0]).toMatchObject({ status: 'CLOSED', exitPrice: 111, realizedPnl: 800 });
    expect(ledger.summary().realizedPnl).toEqual({ JPY: 800 });
  });

  it('should reject closes without an opposite position', () => {
    const { ledger } = setup();
    expect(ledger.submit(close('SELL'))).toEqual({ ok: false, reason: 'NO_OPEN_POSITION' });
    const id = submitOk(ledger, open('BUY'));
    ledger.reconcile(id, { status: 'FILLED', price: 110, timestamp: 1500 });
    expect(ledger.submit(close('BUY'))).toEqual({ ok: false, reason: 'NO_OPEN_POSITION' });
    expect(ledger.submit(close('SELL', 'pos-999999'))).toEqual({ ok: false, reason: 'NO_OPEN_POSITION' });
  });

  it('should not double-close a position', () => {
    const { ledger } = setup();
    const id = submitOk(ledger, open('BUY'));
    ledger.reconcile(id, { status: 'FILLED', price: 110, timestamp: 1500 });
    submitOk(ledger, close('SELL'));
    expect(ledger.submit(close('SELL'))).toEqual({ ok: false, reason: 'ORDER_PENDING' });
  });

  it('should keep an unresolved order pending and holding its slot', () => {
    const { ledger } = setup();
    const id = submitOk(ledger, open());
    expect(ledger.markUnresolved(id, 'timed out')).toBe(true);
    expect(ledger.unresolvedOrders().map((o) => o.id)).toEqual([id]);
    expect(ledger.canOpen(USDJPY)).toBe(false);
    expect(ledger.summary().unresolvedOrders).toBe(1);

    ledger.reconcile(id, { status: 'FILLED', price: 110, timestamp: 3000 });
    expect(ledger.unresolvedOrders()).toHaveLength(0);
    expect(ledger.getOrder(id)?.needsReconciliation).toBe(false);
    expect(ledger.markUnresolved(id, 'late')).toBe(false);
  });

  it('should summarize orders and balance', () => {
    const { ledger } = setup();
    const a = submitOk(ledger, open());
    ledger.reconcile(a, { status: 'FILLED', price: 110, timestamp: 1500 });
    const b = submitOk(ledger, open('BUY', 1000, EURUSD));
    ledger.reconcile(b, { status: 'CANCELLED', timestamp: 1600 });
    expect(ledger.summary()).toEqual({
      initialBalance: 100_000,
      availableBalance: 99_000,
      openPositions: 1,
      closedPositions: 0,
      realizedPnl: {},
      orders: { PENDING: 0, FILLED: 1, REJECTED: 0, CANCELLED: 1 },
      unresolvedOrders: 0,
    });
  });
});
