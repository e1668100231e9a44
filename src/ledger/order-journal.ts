import type { Db } from '../db/database.js';
import type { EventBus } from '../engine/event-bus.js';
import { createChildLogger } from '../logger.js';
import { formatPair } from '../market/pair.js';
import type { Order, TradeMode } from '../types/index.js';

const log = createChildLogger('order-journal');

export interface OrderRow {
  id: string;
  mode: string;
  pair: string;
  side: string;
  intent: string;
  qty: number;
  requested_price: number;
  status: string;
  position_id: string | null;
  fill_price: number | null;
  reason: string | null;
  submitted_at: number;
  resolved_at: number | null;
}

/**
 * 주문 이벤트 → SQLite orders 테이블 (상태 변경마다 upsert)
 * 원장은 메모리가 기준, 여기는 사후 조회용 기록
 */
export class OrderJournal {
  private readonly db: Db;
  private readonly mode: TradeMode;
  private unsubscribers: Array<() => void> = [];

  constructor(db: Db, mode: TradeMode) {
    this.db = db;
    this.mode = mode;
  }

  attach(bus: EventBus): void {
    const write = (event: { order: Order }) => this.safeWrite(event.order);
    this.unsubscribers.push(
      bus.on('ORDER_SUBMITTED', write),
      bus.on('ORDER_FILLED', write),
      bus.on('ORDER_REJECTED', write),
      bus.on('ORDER_CANCELLED', write),
    );
  }

  detach(): void {
    for (const off of this.unsubscribers) off();
    this.unsubscribers = [];
  }

  write(order: Order): void {
    this.db
      .prepare(
        `INSERT INTO orders (id, mode, pair, side, intent, qty, requested_price, status,
                             position_id, fill_price, reason, submitted_at, resolved_at)
         VALUES (@id, @mode, @pair, @side, @intent, @qty, @requested_price, @status,
                 @position_id, @fill_price, @reason, @submitted_at, @resolved_at)
         ON CONFLICT(id) DO UPDATE SET
           status = excluded.status,
           position_id = excluded.position_id,
           fill_price = excluded.fill_price,
           reason = excluded.reason,
           resolved_at = excluded.resolved_at`,
      )
      .run(toRow(order, this.mode));
  }

  get(id: string): OrderRow | undefined {
    return this.db.prepare<[string], OrderRow>('SELECT * FROM orders WHERE id = ?').get(id);
  }

  recent(limit: number = 50): OrderRow[] {
    return this.db
      .prepare<[number], OrderRow>('SELECT * FROM orders ORDER BY submitted_at DESC, id DESC LIMIT ?')
      .all(limit);
  }

  private safeWrite(order: Order): void {
    try {
      this.write(order);
    } catch (err) {
      log.error({ orderId: order.id, err }, 'Order journal write failed');
    }
  }
}

function toRow(order: Order, mode: TradeMode): OrderRow {
  return {
    id: order.id,
    mode,
    pair: formatPair(order.pair),
    side: order.side,
    intent: order.intent,
    qty: order.quantity,
    requested_price: order.requestedPrice,
    status: order.status,
    position_id: order.positionId,
    fill_price: order.fillPrice ?? null,
    reason: order.reason ?? null,
    submitted_at: order.submittedAt,
    resolved_at: order.resolvedAt ?? null,
  };
}
