import type { CorrelationEngine } from '../correlation/engine.js';
import type { PriceArchive } from '../data/price-archive.js';
import {
  DataFetchError,
  ExecutionFailureError,
  GatewayTimeoutError,
  OrderRejectedError,
  StaleDataError,
  describeError,
} from '../errors.js';
import type { ExecutionGateway } from '../execution/gateway.js';
import type { Ledger } from '../ledger/ledger.js';
import { createChildLogger } from '../logger.js';
import type { HistoricalSource, MarketDataGateway } from '../market/gateway.js';
import { formatPair } from '../market/pair.js';
import type { PriceSeriesStore } from '../market/price-store.js';
import type { AuditLog } from '../safety/audit-log.js';
import { createContext } from '../strategy/factory.js';
import type { Strategy } from '../strategy/strategy.js';
import type { CurrencyPair, Order, OrderRequest, PricePoint, Signal, TradeMode } from '../types/index.js';
import { NO_RETRY, type RetryPolicy, retry, withTimeout } from '../util/async.js';
import type { EventBus } from './event-bus.js';
import { BotStateMachine, type BotState } from './state-machine.js';

const log = createChildLogger('trading-bot');

export interface TradingBotConfig {
  readonly tradeMode: TradeMode;
  /** OPEN 주문 수량 */
  readonly tradeAmount: number;
  readonly updateIntervalMs: number;
  readonly checkIntervalMs: number;
  /** 게이트웨이 호출 타임아웃 */
  readonly requestTimeoutMs: number;
  /** 마지막 수신 실패 시에도 이 나이 이내 시세면 평가에 사용 */
  readonly stalenessToleranceMs: number;
  readonly fetchRetry?: RetryPolicy;
  /** retryable 실행 실패(브로커 미접수 확실)에만 적용 */
  readonly orderRetry?: RetryPolicy;
}

export interface TradingBotDeps {
  readonly market: MarketDataGateway;
  readonly execution: ExecutionGateway;
  readonly store: PriceSeriesStore;
  readonly strategy: Strategy;
  readonly ledger: Ledger;
  readonly bus: EventBus;
  readonly correlation?: CorrelationEngine | null;
  readonly audit?: AuditLog | null;
  readonly archive?: PriceArchive | null;
  readonly now?: () => number;
}

/** 통화쌍별 마지막 수신 결과 — unchanged: 같은 timestamp 재수신 (최신 상태 유지) */
export type FetchStatus = 'fresh' | 'unchanged' | 'failed';

export interface UpdateCycleResult {
  readonly skipped: boolean;
  readonly asOf: number;
  readonly statuses: ReadonlyMap<string, FetchStatus>;
  readonly errors: readonly DataFetchError[];
}

export type CheckCycleResult =
  | { readonly outcome: 'SKIPPED'; readonly detail: string }
  | { readonly outcome: 'STALE'; readonly errors: readonly StaleDataError[] }
  | { readonly outcome: 'ERROR'; readonly error: Error }
  | { readonly outcome: 'HOLD'; readonly signal: Signal }
  | { readonly outcome: 'NO_ACTION'; readonly signal: Signal; readonly detail: string }
  | { readonly outcome: 'REJECTED'; readonly signal: Signal; readonly error: OrderRejectedError }
  | { readonly outcome: 'EXECUTED'; readonly signal: Signal; readonly order: Order }
  | { readonly outcome: 'FAILED'; readonly signal: Signal; readonly order: Order; readonly error: ExecutionFailureError }
  | { readonly outcome: 'UNRESOLVED'; readonly signal: Signal; readonly order: Order };

export interface StopReport {
  /** 정지 시점까지 확정되지 않은 주문 */
  readonly pendingOrders: readonly string[];
}

type CycleKind = 'update' | 'check';

/**
 * 트레이딩 봇 제어 루프
 *
 * IDLE → FETCHING → IDLE  (update_interval)
 * IDLE → EVALUATING → DECIDING → EXECUTING → IDLE  (check_interval)
 *
 * 두 주기의 작업은 하나의 FIFO 큐에서 직렬 실행 → 평가는 항상 직전 완료된 수신 이후의 데이터를 봄.
 * 큐에 같은 종류 작업이 이미 대기 중이면 타이머 틱은 합쳐짐.
 * 게이트웨이 오류는 로그 + audit 후 다음 주기로 (프로세스를 종료하지 않음)
 */
export class TradingBot {
  private readonly cfg: TradingBotConfig;
  private readonly deps: TradingBotDeps;
  private readonly now: () => number;
  private readonly sm: BotStateMachine;
  private readonly fetchRetry: RetryPolicy;
  private readonly orderRetry: RetryPolicy;

  private chain: Promise<unknown> = Promise.resolve();
  private readonly queued = new Set<CycleKind>();
  private timers: Array<ReturnType<typeof setInterval>> = [];
  private stopping = false;
  private lastFetch = new Map<string, FetchStatus>();
  private lastUpdateAt: number | null = null;

  constructor(cfg: TradingBotConfig, deps: TradingBotDeps) {
    if (cfg.tradeMode === 'paper' && deps.execution.name === 'live') {
      throw new Error('Paper mode must not use the live execution gateway');
    }
    this.cfg = cfg;
    this.deps = deps;
    this.now = deps.now ?? Date.now;
    this.sm = new BotStateMachine(this.now);
    this.fetchRetry = cfg.fetchRetry ?? NO_RETRY;
    this.orderRetry = cfg.orderRetry ?? NO_RETRY;
  }

  get state(): BotState {
    return this.sm.current;
  }

  get isRunning(): boolean {
    return this.timers.length > 0;
  }

  get stateHistory(): ReturnType<BotStateMachine['getHistory']> {
    return this.sm.getHistory();
  }

  /** 마지막 update 주기의 통화쌍별 결과 */
  fetchStatus(pair: CurrencyPair): FetchStatus | undefined {
    return this.lastFetch.get(formatPair(pair));
  }

  // ─── 공개 실행 API (모두 큐를 거침) ───────────────────────────────────

  runUpdateCycle(): Promise<UpdateCycleResult> {
    return this.enqueue(() => this.doUpdate());
  }

  runCheckCycle(): Promise<CheckCycleResult> {
    return this.enqueue(() => this.doCheck());
  }

  /** 수신 후 평가 — 필요한 통화쌍 수신이 하나라도 실패하면 평가하지 않음 */
  runOnce(): Promise<{ update: UpdateCycleResult; check: CheckCycleResult }> {
    return this.enqueue(async () => {
      const update = await this.doUpdate();
      if (update.skipped) {
        return { update, check: { outcome: 'SKIPPED', detail: 'bot stopped' } };
      }
      const failed = this.deps.strategy.pairs.filter((p) => update.statuses.get(formatPair(p)) === 'failed');
      if (failed.length > 0 && this.cfg.stalenessToleranceMs === 0) {
        const detail = `fetch failed for ${failed.map(formatPair).join(', ')}`;
        log.warn({ pairs: failed.map(formatPair) }, 'Skipping evaluation, incomplete data');
        return { update, check: { outcome: 'SKIPPED', detail } };
      }
      return { update, check: await this.doCheck() };
    });
  }

  /**
   * 과거 시세 워밍업 — 전략이 필요로 하는 구간만큼 스토어 적재
   * 소스 실패는 로그 후 다음 소스로
   */
  async warmUp(sources: readonly HistoricalSource[]): Promise<number> {
    return this.enqueue(async () => {
      const to = this.now();
      const from = to - this.deps.strategy.historyMs;
      let total = 0;
      for (const pair of this.deps.strategy.pairs) {
        const points: PricePoint[] = [];
        for (const source of sources) {
          try {
            points.push(...(await source.load(pair, from, to)));
          } catch (err) {
            log.warn({ pair: formatPair(pair), source: source.name, err: describeError(err) }, 'Warm-up source failed');
          }
        }
        points.sort((a, b) => a.timestamp - b.timestamp);
        const { accepted } = this.deps.store.seed(dedupe(points));
        total += accepted;
        log.info({ pair: formatPair(pair), points: accepted }, 'Warm-up loaded');
      }
      this.deps.correlation?.advance(this.deps.store, to);
      return total;
    });
  }

  start(): void {
    if (this.sm.isStopped() || this.stopping) throw new Error('Bot already stopped');
    if (this.timers.length > 0) return;
    log.info(
      {
        mode: this.cfg.tradeMode,
        strategy: this.deps.strategy.id,
        pairs: this.deps.strategy.pairs.map(formatPair),
        updateIntervalMs: this.cfg.updateIntervalMs,
        checkIntervalMs: this.cfg.checkIntervalMs,
      },
      'Trading bot started',
    );
    this.tick('update');
    this.timers.push(
      setInterval(() => this.tick('update'), this.cfg.updateIntervalMs),
      setInterval(() => this.tick('check'), this.cfg.checkIntervalMs),
    );
  }

  /**
   * 정지 — 타이머 해제, 진행 중 작업(실행 단계 포함)을 끝까지 기다린 뒤 STOPPED
   * 아직 시작하지 않은 대기 작업은 건너뜀
   */
  async stop(): Promise<StopReport> {
    if (this.sm.isStopped()) {
      return { pendingOrders: this.deps.ledger.pendingOrders().map((o) => o.id) };
    }
    this.stopping = true;
    for (const t of this.timers) clearInterval(t);
    this.timers = [];

    await this.chain;
    this.sm.transition('STOPPED');

    const pending = this.deps.ledger.pendingOrders();
    if (pending.length > 0) {
      log.warn({ orders: pending.map((o) => o.id) }, 'Stopped with unreconciled orders');
      this.auditSafe('WARN', 'STOPPED_WITH_PENDING', pending.map((o) => o.id).join(','));
    }
    log.info({ summary: this.deps.ledger.summary() }, 'Trading bot stopped');
    return { pendingOrders: pending.map((o) => o.id) };
  }

  // ─── 큐 ──────────────────────────────────────────────────────────────

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.chain.then(task);
    this.chain = run.catch(() => undefined);
    return run;
  }

  private tick(kind: CycleKind): void {
    if (this.queued.has(kind)) {
      log.debug({ kind }, 'Cycle already queued, coalescing');
      return;
    }
    this.queued.add(kind);
    this.enqueue(async () => {
      this.queued.delete(kind);
      if (kind === 'update') await this.doUpdate();
      else await this.doCheck();
    }).catch((err) => {
      log.error({ kind, err }, 'Cycle crashed');
    });
  }

  /** 예외로 중간 상태에 남지 않도록 */
  private toIdle(): void {
    if (!this.sm.isIdle() && !this.sm.isStopped()) this.sm.transition('IDLE');
  }

  // ─── Fetching ────────────────────────────────────────────────────────

  private async doUpdate(): Promise<UpdateCycleResult> {
    const asOf = this.now();
    if (this.stopping) {
      return { skipped: true, asOf, statuses: new Map(), errors: [] };
    }
    this.sm.transition('FETCHING');
    try {
      const pairs = this.deps.strategy.pairs;
      const settled = await Promise.allSettled(pairs.map((p) => this.fetchOne(p)));

      const statuses = new Map<string, FetchStatus>();
      const errors: DataFetchError[] = [];
      settled.forEach((res, i) => {
        const pair = pairs[i]!;
        const label = formatPair(pair);
        if (res.status === 'rejected') {
          const err = toFetchError(label, res.reason);
          errors.push(err);
          statuses.set(label, 'failed');
          log.warn({ pair: label, timestamp: asOf, timedOut: err.timedOut, err: err.message }, 'DataFetchError');
          this.auditSafe('WARN', err.code, `${label} @${asOf}: ${err.message}`);
          return;
        }
        statuses.set(label, this.store(res.value, label));
      });

      this.lastFetch = statuses;
      this.lastUpdateAt = asOf;
      this.deps.correlation?.advance(this.deps.store, asOf);
      return { skipped: false, asOf, statuses, errors };
    } finally {
      this.toIdle();
    }
  }

  private fetchOne(pair: CurrencyPair): Promise<PricePoint> {
    const label = formatPair(pair);
    return retry(this.fetchRetry, (attempt) => {
      if (attempt > 0) log.debug({ pair: label, attempt }, 'Retrying fetch');
      return withTimeout(`fetch ${label}`, this.cfg.requestTimeoutMs, () => this.deps.market.fetchLatest(pair));
    });
  }

  private store(point: PricePoint, label: string): FetchStatus {
    const res = this.deps.store.append(point);
    if (res.accepted) {
      if (this.deps.archive) {
        try {
          this.deps.archive.record(point);
        } catch (err) {
          log.error({ pair: label, err }, 'Price archive write failed');
        }
      }
      return 'fresh';
    }
    if (res.reason === 'STALE' && res.latestTimestamp === point.timestamp) {
      log.debug({ pair: label, timestamp: point.timestamp }, 'Quote unchanged');
      return 'unchanged';
    }
    const detail = res.reason === 'STALE' ? `older than latest ${res.latestTimestamp}` : res.detail;
    log.warn({ pair: label, timestamp: point.timestamp, detail }, 'Point rejected by store');
    this.auditSafe('WARN', 'POINT_REJECTED', `${label} @${point.timestamp}: ${detail}`);
    return 'failed';
  }

  // ─── Evaluating / Deciding / Executing ───────────────────────────────

  private async doCheck(): Promise<CheckCycleResult> {
    if (this.stopping) return { outcome: 'SKIPPED', detail: 'bot stopped' };

    await this.resolveUnresolved();

    this.sm.transition('EVALUATING');
    try {
      const asOf = this.now();
      const stale = this.staleness(asOf);
      if (stale.length > 0) {
        for (const err of stale) {
          log.warn({ pair: err.pair, timestamp: asOf, ageMs: err.ageMs }, 'StaleDataError, evaluation skipped');
          this.auditSafe('WARN', err.code, `${err.pair} @${asOf}: ${err.message}`);
        }
        return { outcome: 'STALE', errors: stale };
      }

      let signal: Signal;
      try {
        signal = this.deps.strategy.evaluate(createContext(this.deps.store, this.deps.correlation ?? null, asOf));
      } catch (err) {
        const error = err instanceof Error ? err : new Error(String(err));
        log.error({ strategy: this.deps.strategy.id, err: error }, 'Strategy evaluation failed');
        this.auditSafe('ERROR', 'STRATEGY_ERROR', error.message);
        return { outcome: 'ERROR', error };
      }

      if (signal.direction === 'HOLD') {
        log.debug({ reason: signal.reason }, 'Hold');
        return { outcome: 'HOLD', signal };
      }

      log.info(
        { pair: formatPair(signal.tradePair), direction: signal.direction, strength: signal.strength, reason: signal.reason },
        'Signal',
      );
      this.deps.bus.emit({ type: 'SIGNAL', timestamp: asOf, signal });
      this.auditSafe('INFO', 'SIGNAL', `${signal.direction} ${formatPair(signal.tradePair)}: ${signal.reason}`);

      if (this.stopping) return { outcome: 'SKIPPED', detail: 'stop requested before decision' };
      this.sm.transition('DECIDING');
      return await this.decideAndExecute(signal, asOf);
    } finally {
      this.toIdle();
    }
  }

  /**
   * 평가 대상 통화쌍 모두 신선해야 함:
   * 직전 update에서 수신 성공(또는 동일 시세) 했거나, 최신 포인트 나이가 허용치 이내
   */
  private staleness(asOf: number): StaleDataError[] {
    const errors: StaleDataError[] = [];
    for (const pair of this.deps.strategy.pairs) {
      const label = formatPair(pair);
      const latest = this.deps.store.latest(pair);
      if (!latest) {
        errors.push(new StaleDataError(label, null));
        continue;
      }
      const status = this.lastFetch.get(label);
      if (this.lastUpdateAt !== null && (status === 'fresh' || status === 'unchanged')) continue;
      const age = asOf - latest.timestamp;
      if (age <= this.cfg.stalenessToleranceMs) continue;
      errors.push(new StaleDataError(label, age));
    }
    return errors;
  }

  /** 신호 → 주문: 반대 포지션이 있으면 가장 오래된 것부터 청산, 없으면 (슬롯이 있을 때) 진입 */
  private async decideAndExecute(signal: Signal, asOf: number): Promise<CheckCycleResult> {
    const pair = signal.tradePair;
    const label = formatPair(pair);
    const side = signal.direction === 'BUY' ? 'BUY' : 'SELL';
    const latest = this.deps.store.latest(pair);
    if (!latest) {
      return { outcome: 'NO_ACTION', signal, detail: `no price for ${label}` };
    }

    const opposite = this.deps.ledger.openPositions(pair).find((p) => p.direction !== side);
    let request: OrderRequest;
    if (opposite) {
      request = {
        pair,
        side,
        intent: 'CLOSE',
        quantity: opposite.quantity,
        requestedPrice: latest.price,
        positionId: opposite.id,
        timestamp: asOf,
      };
    } else if (this.deps.ledger.canOpen(pair)) {
      request = { pair, side, intent: 'OPEN', quantity: this.cfg.tradeAmount, requestedPrice: latest.price, timestamp: asOf };
    } else {
      const detail = `${label} ${side}: position or order already open`;
      log.info({ pair: label, side }, 'No action, pair at position limit');
      return { outcome: 'NO_ACTION', signal, detail };
    }

    const submitted = this.deps.ledger.submit(request);
    if (!submitted.ok) {
      const error = new OrderRejectedError(label, submitted.reason);
      log.warn({ pair: label, timestamp: asOf, reason: submitted.reason }, 'OrderRejected');
      this.auditSafe('WARN', error.code, `${label} ${side} ${request.intent}: ${submitted.reason}`);
      return { outcome: 'REJECTED', signal, error };
    }

    this.sm.transition('EXECUTING');
    return await this.execute(submitted.orderId, request, signal);
  }

  /**
   * 실행 — 주문은 반드시 확정(FILLED/REJECTED/CANCELLED)되거나 정산 대기로 표시됨
   */
  private async execute(orderId: string, request: OrderRequest, signal: Signal): Promise<CheckCycleResult> {
    const label = formatPair(request.pair);
    const execRequest = {
      clientOrderId: orderId,
      pair: request.pair,
      side: request.side,
      quantity: request.quantity,
      price: request.requestedPrice,
      mode: this.cfg.tradeMode,
    };

    try {
      const outcome = await retry(
        this.orderRetry,
        (attempt) => {
          if (attempt > 0) log.info({ orderId, attempt }, 'Retrying order submission');
          return withTimeout(`submit ${orderId}`, this.cfg.requestTimeoutMs, () =>
            this.deps.execution.submitOrder(execRequest),
          );
        },
        (err) => err instanceof ExecutionFailureError && err.retryable,
      );
      const res = this.deps.ledger.reconcile(orderId, outcome);
      const order = this.deps.ledger.getOrder(orderId);
      if (!res.applied || !order) {
        throw new Error(`Reconcile of ${orderId} not applied`);
      }
      this.auditSafe(
        order.status === 'FILLED' ? 'INFO' : 'WARN',
        `ORDER_${order.status}`,
        `${orderId} ${label} ${order.side} ${order.intent} ${order.quantity}` +
          (order.fillPrice !== undefined ? ` @${order.fillPrice}` : ` (${order.reason ?? ''})`),
      );
      return { outcome: 'EXECUTED', signal, order };
    } catch (err) {
      const unknown =
        err instanceof GatewayTimeoutError || (err instanceof ExecutionFailureError && err.outcomeUnknown);
      if (unknown) {
        this.deps.ledger.markUnresolved(orderId, describeError(err));
        log.error({ orderId, pair: label, err: describeError(err) }, 'Execution outcome unknown');
        this.auditSafe('ERROR', 'ORDER_UNRESOLVED', `${orderId} ${label}: ${describeError(err)}`);
        const order = this.deps.ledger.getOrder(orderId);
        if (!order) throw err;
        return { outcome: 'UNRESOLVED', signal, order };
      }

      const error =
        err instanceof ExecutionFailureError
          ? err
          : new ExecutionFailureError(`Execution of ${orderId} failed: ${describeError(err)}`, { cause: err });
      this.deps.ledger.reconcile(orderId, { status: 'REJECTED', reason: error.message, timestamp: this.now() });
      log.error({ orderId, pair: label, err: error.message }, 'ExecutionFailure');
      this.auditSafe('ERROR', error.code, `${orderId} ${label}: ${error.message}`);
      const order = this.deps.ledger.getOrder(orderId);
      if (!order) throw error;
      return { outcome: 'FAILED', signal, order, error };
    }
  }

  /** 결과 불명 주문 조회 (RECONCILING) → 확정되면 원장 반영 */
  private async resolveUnresolved(): Promise<void> {
    const lookup = this.deps.execution.lookupOrder?.bind(this.deps.execution);
    const unresolved = this.deps.ledger.unresolvedOrders();
    if (!lookup || unresolved.length === 0) return;

    this.sm.transition('RECONCILING');
    try {
      for (const order of unresolved) {
        try {
          const outcome = await withTimeout(`lookup ${order.id}`, this.cfg.requestTimeoutMs, () => lookup(order.id));
          if (!outcome) {
            log.info({ orderId: order.id }, 'Order still unresolved');
            continue;
          }
          this.deps.ledger.reconcile(order.id, outcome);
          this.auditSafe('INFO', 'ORDER_RECONCILED', `${order.id} → ${outcome.status}`);
        } catch (err) {
          log.warn({ orderId: order.id, err: describeError(err) }, 'Order lookup failed');
        }
      }
    } finally {
      this.toIdle();
    }
  }

  private auditSafe(level: 'INFO' | 'WARN' | 'ERROR', action: string, detail: string): void {
    const audit = this.deps.audit;
    if (!audit) return;
    try {
      audit.log(level, 'trading-bot', action, detail);
    } catch (err) {
      log.error({ err, action }, 'Audit log write failed');
    }
  }
}

function toFetchError(pair: string, reason: unknown): DataFetchError {
  if (reason instanceof DataFetchError) return reason;
  return new DataFetchError(pair, describeError(reason), {
    cause: reason,
    timedOut: reason instanceof GatewayTimeoutError,
  });
}

/** 정렬된 입력에서 같은 timestamp 제거 (여러 소스 병합) */
function dedupe(points: readonly PricePoint[]): PricePoint[] {
  const out: PricePoint[] = [];
  for (const p of points) {
    const last = out[out.length - 1];
    if (!last || last.timestamp !== p.timestamp) out.push(p);
  }
  return out;
}
