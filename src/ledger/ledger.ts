import { randomUUID } from 'node:crypto';
import type { EventBus } from '../engine/event-bus.js';
import { createChildLogger } from '../logger.js';
import { formatPair, pairEquals } from '../market/pair.js';
import type {
  CurrencyPair,
  Order,
  OrderOutcome,
  OrderRequest,
  OrderStatus,
  Position,
  RejectedReason,
  SubmitResult,
} from '../types/index.js';

const log = createChildLogger('ledger');

export interface LedgerConfig {
  /** 주문 가능 잔고 (수량 단위) */
  readonly initialBalance: number;
  /** 주문 1건 최대 수량 */
  readonly maxTradeAmount: number;
  /** 통화쌍당 최대 보유 포지션 수 (기본 1 = 단일 포지션 규칙) */
  readonly maxPositionsPerPair: number;
  /** 주문 ID 접두어 — 재시작 간 중복 방지 */
  readonly idPrefix?: string;
}

export type ReconcileResult =
  | { readonly applied: true; readonly order: Order; readonly position?: Position }
  | { readonly applied: false; readonly reason: 'UNKNOWN_ORDER' | 'ALREADY_RESOLVED' };

export interface LedgerSummary {
  readonly initialBalance: number;
  readonly availableBalance: number;
  readonly openPositions: number;
  readonly closedPositions: number;
  /** 호가통화별 실현손익 */
  readonly realizedPnl: Readonly<Record<string, number>>;
  readonly orders: Readonly<Record<OrderStatus, number>>;
  readonly unresolvedOrders: number;
}

/**
 * 포지션 & 주문 원장 — 봇이 행동 전 참조하는 단일 진실 원천
 *
 * - 모든 메서드는 동기: 주문 상태와 포지션 변경이 한 번에 일어나며 중간 상태가 외부에 보이지 않음
 * - 대기 중인 OPEN 주문은 잔고를 예약하고 통화쌍 슬롯을 차지 → 동시 평가가 같은 통화쌍을 중복 진입할 수 없음
 * - 주문은 PENDING → (FILLED | REJECTED | CANCELLED) 정확히 한 번 전이
 * - CLOSE 부분 체결은 포지션 수량만 줄이고 슬롯은 계속 점유
 */
export class Ledger {
  private readonly config: LedgerConfig;
  private readonly bus: EventBus;
  private readonly idPrefix: string;
  private readonly orderMap = new Map<string, Order>();
  private readonly positionMap = new Map<string, Position>();
  private orderSeq = 0;
  private positionSeq = 0;

  constructor(config: LedgerConfig, bus: EventBus) {
    if (!(config.initialBalance > 0)) throw new Error('initialBalance must be > 0');
    if (!(config.maxTradeAmount > 0)) throw new Error('maxTradeAmount must be > 0');
    if (!Number.isInteger(config.maxPositionsPerPair) || config.maxPositionsPerPair < 1) {
      throw new Error('maxPositionsPerPair must be an integer >= 1');
    }
    this.config = config;
    this.bus = bus;
    this.idPrefix = config.idPrefix ?? randomUUID().slice(0, 8);
  }

  // ─── 조회 ─────────────────────────────────────────────────────────────

  canOpen(pair: CurrencyPair): boolean {
    return this.slotsUsed(pair) < this.config.maxPositionsPerPair;
  }

  getOrder(id: string): Order | undefined {
    return this.orderMap.get(id);
  }

  orders(): Order[] {
    return [...this.orderMap.values()];
  }

  pendingOrders(pair?: CurrencyPair): Order[] {
    return this.orders().filter((o) => o.status === 'PENDING' && (!pair || pairEquals(o.pair, pair)));
  }

  /** 실행 결과가 불명확해 외부 조회가 필요한 주문 */
  unresolvedOrders(): Order[] {
    return this.orders().filter((o) => o.status === 'PENDING' && o.needsReconciliation);
  }

  /** 통화쌍 지정 시 해당 쌍만, 오래된 순 */
  openPositions(pair?: CurrencyPair): Position[] {
    return [...this.positionMap.values()]
      .filter((p) => p.status === 'OPEN' && (!pair || pairEquals(p.pair, pair)))
      .sort((a, b) => a.openedAt - b.openedAt);
  }

  positions(): Position[] {
    return [...this.positionMap.values()];
  }

  /** 초기 잔고 − 보유 포지션 수량 − 대기 OPEN 주문 수량 */
  get availableBalance(): number {
    let used = 0;
    for (const p of this.positionMap.values()) {
      if (p.status === 'OPEN') used += p.quantity;
    }
    for (const o of this.orderMap.values()) {
      if (o.status === 'PENDING' && o.intent === 'OPEN') used += o.quantity;
    }
    return this.config.initialBalance - used;
  }

  summary(): LedgerSummary {
    const orders: Record<OrderStatus, number> = { PENDING: 0, FILLED: 0, REJECTED: 0, CANCELLED: 0 };
    for (const o of this.orderMap.values()) orders[o.status]++;
    const realizedPnl: Record<string, number> = {};
    let open = 0;
    let closed = 0;
    for (const p of this.positionMap.values()) {
      if (p.status === 'OPEN') open++;
      else closed++;
      // 부분 청산된 OPEN 포지션의 실현분 포함
      if (p.status === 'CLOSED' || p.realizedPnl !== undefined) {
        realizedPnl[p.pair.quote] = (realizedPnl[p.pair.quote] ?? 0) + (p.realizedPnl ?? 0);
      }
    }
    return {
      initialBalance: this.config.initialBalance,
      availableBalance: this.availableBalance,
      openPositions: open,
      closedPositions: closed,
      realizedPnl,
      orders,
      unresolvedOrders: this.unresolvedOrders().length,
    };
  }

  // ─── 주문 접수 ────────────────────────────────────────────────────────

  /**
   * 주문 접수 — 거부되면 실행 게이트웨이에 도달하지 않음
   * CLOSE 주문의 수량은 대상 포지션 수량으로 고정
   */
  submit(request: OrderRequest): SubmitResult {
    const check = request.intent === 'OPEN' ? this.checkOpen(request) : this.checkClose(request);
    if (!check.ok) {
      log.warn(
        { pair: formatPair(request.pair), side: request.side, intent: request.intent, reason: check.reason },
        'Order rejected by ledger',
      );
      return check;
    }

    const id = `${this.idPrefix}-${String(++this.orderSeq).padStart(6, '0')}`;
    const order: Order = Object.freeze({
      id,
      positionId: check.positionId,
      pair: request.pair,
      side: request.side,
      intent: request.intent,
      quantity: check.quantity,
      requestedPrice: request.requestedPrice,
      status: 'PENDING',
      submittedAt: request.timestamp,
      needsReconciliation: false,
    });
    this.orderMap.set(id, order);
    log.info(
      { orderId: id, pair: formatPair(order.pair), side: order.side, intent: order.intent, qty: order.quantity },
      'Order submitted',
    );
    this.bus.emit({ type: 'ORDER_SUBMITTED', timestamp: request.timestamp, order });
    return { ok: true, orderId: id };
  }

  private checkOpen(
    request: OrderRequest,
  ): { ok: true; quantity: number; positionId: null } | { ok: false; reason: RejectedReason } {
    if (!Number.isFinite(request.quantity) || request.quantity <= 0) {
      return { ok: false, reason: 'INVALID_QUANTITY' };
    }
    if (request.quantity > this.config.maxTradeAmount) {
      return { ok: false, reason: 'AMOUNT_EXCEEDS_CAP' };
    }
    const openCount = this.openPositions(request.pair).length;
    if (openCount >= this.config.maxPositionsPerPair) {
      return { ok: false, reason: 'POSITION_OPEN' };
    }
    if (this.slotsUsed(request.pair) >= this.config.maxPositionsPerPair) {
      return { ok: false, reason: 'ORDER_PENDING' };
    }
    if (request.quantity > this.availableBalance) {
      return { ok: false, reason: 'INSUFFICIENT_FUNDS' };
    }
    return { ok: true, quantity: request.quantity, positionId: null };
  }

  private checkClose(
    request: OrderRequest,
  ): { ok: true; quantity: number; positionId: string } | { ok: false; reason: RejectedReason } {
    // 청산은 반대 방향 주문으로만
    const candidates = this.openPositions(request.pair).filter(
      (p) => p.direction !== request.side && (request.positionId === undefined || p.id === request.positionId),
    );
    if (candidates.length === 0) {
      return { ok: false, reason: 'NO_OPEN_POSITION' };
    }
    const closing = new Set(
      this.pendingOrders(request.pair)
        .filter((o) => o.intent === 'CLOSE')
        .map((o) => o.positionId),
    );
    const target = candidates.find((p) => !closing.has(p.id));
    if (!target) {
      return { ok: false, reason: 'ORDER_PENDING' };
    }
    return { ok: true, quantity: target.quantity, positionId: target.id };
  }

  /** 보유 포지션 + 대기 OPEN 주문 */
  private slotsUsed(pair: CurrencyPair): number {
    const pendingOpens = this.pendingOrders(pair).filter((o) => o.intent === 'OPEN').length;
    return this.openPositions(pair).length + pendingOpens;
  }

  // ─── 정산 ─────────────────────────────────────────────────────────────

  /**
   * 실행 결과 반영 — 주문당 정확히 한 번
   * 체결 시 포지션 생성/청산과 주문 상태 변경을 한 번에 적용
   */
  reconcile(orderId: string, outcome: OrderOutcome): ReconcileResult {
    const order = this.orderMap.get(orderId);
    if (!order) {
      log.warn({ orderId }, 'Reconcile for unknown order');
      return { applied: false, reason: 'UNKNOWN_ORDER' };
    }
    if (order.status !== 'PENDING') {
      log.warn({ orderId, status: order.status }, 'Order already resolved, ignoring outcome');
      return { applied: false, reason: 'ALREADY_RESOLVED' };
    }

    if (outcome.status !== 'FILLED') {
      const resolved: Order = Object.freeze({
        ...order,
        status: outcome.status,
        resolvedAt: outcome.timestamp,
        reason: outcome.reason ?? order.reason,
        needsReconciliation: false,
      });
      this.orderMap.set(orderId, resolved);
      log.warn({ orderId, status: outcome.status, reason: resolved.reason }, 'Order not filled');
      this.bus.emit(
        outcome.status === 'REJECTED'
          ? { type: 'ORDER_REJECTED', timestamp: outcome.timestamp, order: resolved }
          : { type: 'ORDER_CANCELLED', timestamp: outcome.timestamp, order: resolved },
      );
      return { applied: true, order: resolved };
    }

    let position: Position;
    let filledQty: number;
    if (order.intent === 'OPEN') {
      filledQty = Math.min(outcome.quantity ?? order.quantity, order.quantity);
      position = Object.freeze({
        id: `pos-${String(++this.positionSeq).padStart(6, '0')}`,
        pair: order.pair,
        direction: order.side,
        quantity: filledQty,
        entryPrice: outcome.price,
        openedAt: outcome.timestamp,
        status: 'OPEN',
      });
    } else {
      const target = order.positionId !== null ? this.positionMap.get(order.positionId) : undefined;
      if (!target || target.status !== 'OPEN') {
        // checkClose + 대기 CLOSE 배타로 도달 불가
        throw new Error(`Close order ${orderId} has no open position`);
      }
      filledQty = Math.min(outcome.quantity ?? order.quantity, target.quantity);
      const dir = target.direction === 'BUY' ? 1 : -1;
      const realizedPnl = (target.realizedPnl ?? 0) + (outcome.price - target.entryPrice) * filledQty * dir;
      // 부분 청산: 남은 수량으로 OPEN 유지, 체결분만 손익 실현
      position =
        filledQty < target.quantity
          ? Object.freeze({ ...target, quantity: target.quantity - filledQty, realizedPnl })
          : Object.freeze({
              ...target,
              status: 'CLOSED',
              closedAt: outcome.timestamp,
              exitPrice: outcome.price,
              realizedPnl,
            });
    }

    const filled: Order = Object.freeze({
      ...order,
      positionId: position.id,
      status: 'FILLED',
      resolvedAt: outcome.timestamp,
      fillPrice: outcome.price,
      filledQuantity: filledQty,
      needsReconciliation: false,
    });
    this.orderMap.set(orderId, filled);
    this.positionMap.set(position.id, position);

    const positionEvent =
      order.intent === 'OPEN' ? 'POSITION_OPENED' : position.status === 'OPEN' ? 'POSITION_REDUCED' : 'POSITION_CLOSED';
    log.info(
      {
        orderId,
        positionId: position.id,
        pair: formatPair(order.pair),
        price: outcome.price,
        qty: filledQty,
        pnl: position.realizedPnl,
      },
      positionEvent === 'POSITION_OPENED'
        ? 'Position opened'
        : positionEvent === 'POSITION_REDUCED'
          ? 'Position partially closed'
          : 'Position closed',
    );
    this.bus.emit({ type: 'ORDER_FILLED', timestamp: outcome.timestamp, order: filled });
    this.bus.emit({ type: positionEvent, timestamp: outcome.timestamp, position });
    return { applied: true, order: filled, position };
  }

  /**
   * 실행 결과 불명 (타임아웃 등) — PENDING 유지 + 정산 필요 표시
   * 통화쌍 슬롯은 계속 점유됨
   */
  markUnresolved(orderId: string, note: string): boolean {
    const order = this.orderMap.get(orderId);
    if (!order || order.status !== 'PENDING') return false;
    this.orderMap.set(orderId, Object.freeze({ ...order, needsReconciliation: true, reason: note }));
    log.warn({ orderId, note }, 'Order outcome unknown, awaiting reconciliation');
    return true;
  }
}
