import { ExecutionFailureError, GatewayTimeoutError, describeError } from '../errors.js';
import { BrokerRestClient, RestRequestError } from '../exchange/rest/client.js';
import { TRADE, tradeStatusPath } from '../exchange/rest/endpoints.js';
import { parseTimestamp, tradeResponseSchema, tradeStatusSchema } from '../exchange/rest/schemas.js';
import { createChildLogger } from '../logger.js';
import { formatPair } from '../market/pair.js';
import type { ExecutionRequest, OrderOutcome } from '../types/index.js';
import type { ExecutionGateway } from './gateway.js';
import { RateLimiter } from './rate-limiter.js';

const log = createChildLogger('live-exec');

/**
 * 브로커 REST 주문
 *
 *   POST /v1/trade                      — 주문 (client_order_id로 멱등 식별)
 *   GET  /v1/trade/{client_order_id}    — 주문 상태 조회
 *
 * 인증: JWT HS256 (exchange/rest/auth.ts)
 */
export class LiveExecutionGateway implements ExecutionGateway {
  readonly name = 'live';
  private readonly client: BrokerRestClient;
  private readonly limiter: RateLimiter;
  private readonly now: () => number;

  constructor(client: BrokerRestClient, options?: { maxPerSec?: number; now?: () => number }) {
    if (!client.hasCredentials) {
      throw new ExecutionFailureError('Live execution requires API key and secret');
    }
    this.client = client;
    this.now = options?.now ?? Date.now;
    this.limiter = new RateLimiter(options?.maxPerSec ?? 10, this.now);
  }

  async submitOrder(request: ExecutionRequest): Promise<OrderOutcome> {
    if (request.mode !== 'live') {
      throw new ExecutionFailureError(`Live gateway refuses ${request.mode} order ${request.clientOrderId}`);
    }
    await this.limiter.acquire();

    const body = {
      action: request.side.toLowerCase(),
      currency_pair: formatPair(request.pair),
      amount: String(request.quantity),
      price: String(request.price),
      client_order_id: request.clientOrderId,
    };

    const res = await this.client
      .requestPrivate(TRADE, { method: 'POST', body }, tradeResponseSchema)
      .catch((err: unknown) => {
        throw toExecutionError(err, `submit ${request.clientOrderId}`);
      });

    const timestamp = parseTimestamp(res.timestamp, this.now());
    if (!res.success) {
      log.warn({ orderId: request.clientOrderId, error: res.error }, 'Order rejected by broker');
      return { status: 'REJECTED', reason: res.error ?? 'rejected by broker', timestamp };
    }
    log.info(
      { orderId: request.clientOrderId, transactionId: res.transaction_id, price: res.price ?? request.price },
      'Order filled',
    );
    return {
      status: 'FILLED',
      price: res.price ?? request.price,
      quantity: res.amount ?? request.quantity,
      timestamp,
      brokerOrderId: res.transaction_id,
    };
  }

  async lookupOrder(clientOrderId: string): Promise<OrderOutcome | null> {
    await this.limiter.acquire();
    const res = await this.client
      .requestPrivate(tradeStatusPath(clientOrderId), { method: 'GET' }, tradeStatusSchema)
      .catch((err: unknown) => {
        if (err instanceof RestRequestError && err.statusCode === 404) {
          // 브로커가 주문을 받은 적 없음
          return null;
        }
        throw toExecutionError(err, `lookup ${clientOrderId}`);
      });
    if (res === null) {
      return { status: 'REJECTED', reason: 'not found at broker', timestamp: this.now() };
    }

    const timestamp = parseTimestamp(res.timestamp, this.now());
    switch (res.status) {
      case 'pending':
        return null;
      case 'filled':
        if (res.price === undefined) {
          log.warn({ orderId: clientOrderId }, 'Filled order without price, retrying lookup later');
          return null;
        }
        return { status: 'FILLED', price: res.price, quantity: res.amount, timestamp };
      case 'rejected':
        return { status: 'REJECTED', reason: res.reason ?? 'rejected by broker', timestamp };
      case 'cancelled':
        return { status: 'CANCELLED', reason: res.reason, timestamp };
    }
  }
}

/** 전송 계층 오류 → 실행 오류 (타임아웃은 그대로 전달) */
function toExecutionError(err: unknown, operation: string): Error {
  if (err instanceof GatewayTimeoutError || err instanceof ExecutionFailureError) return err;
  if (err instanceof RestRequestError) {
    return new ExecutionFailureError(`${operation} failed: ${err.message}`, {
      cause: err,
      retryable: err.retryable,
      outcomeUnknown: err.outcomeUnknown,
    });
  }
  return new ExecutionFailureError(`${operation} failed: ${describeError(err)}`, {
    cause: err,
    outcomeUnknown: true,
  });
}
