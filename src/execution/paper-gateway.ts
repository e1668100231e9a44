import { ExecutionFailureError } from '../errors.js';
import { createChildLogger } from '../logger.js';
import { formatPair } from '../market/pair.js';
import type { PriceSeriesStore } from '../market/price-store.js';
import type { ExecutionRequest, OrderOutcome } from '../types/index.js';
import type { ExecutionGateway } from './gateway.js';

const log = createChildLogger('paper-exec');

/**
 * 페이퍼 체결 — 스토어의 최신 시세로 즉시 전량 체결 (결정적)
 * 실거래 게이트웨이에는 절대 도달하지 않음
 */
export class PaperExecutionGateway implements ExecutionGateway {
  readonly name = 'paper';
  private readonly store: PriceSeriesStore;
  private readonly now: () => number;
  private readonly fills = new Map<string, OrderOutcome>();

  constructor(store: PriceSeriesStore, now: () => number = Date.now) {
    this.store = store;
    this.now = now;
  }

  async submitOrder(request: ExecutionRequest): Promise<OrderOutcome> {
    if (request.mode !== 'paper') {
      throw new ExecutionFailureError(`Paper gateway cannot execute ${request.mode} orders`);
    }
    const latest = this.store.latest(request.pair);
    if (!latest) {
      return { status: 'REJECTED', reason: `no price for ${formatPair(request.pair)}`, timestamp: this.now() };
    }
    const outcome: OrderOutcome = {
      status: 'FILLED',
      price: latest.price,
      quantity: request.quantity,
      timestamp: this.now(),
      brokerOrderId: `paper-${request.clientOrderId}`,
    };
    this.fills.set(request.clientOrderId, outcome);
    log.info(
      { orderId: request.clientOrderId, pair: formatPair(request.pair), side: request.side, price: latest.price },
      'Paper fill',
    );
    return outcome;
  }

  async lookupOrder(clientOrderId: string): Promise<OrderOutcome | null> {
    return this.fills.get(clientOrderId) ?? null;
  }
}
