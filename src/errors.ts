/**
 * 에러 분류
 * - ConfigError: 치명적, 기동 중단
 * - 나머지: 복구 가능, 로그 후 다음 주기에 재시도
 */

export type ErrorCode =
  | 'CONFIG_ERROR'
  | 'DATA_FETCH_ERROR'
  | 'STALE_DATA'
  | 'ORDER_REJECTED'
  | 'EXECUTION_FAILURE'
  | 'GATEWAY_TIMEOUT';

export abstract class FxTraderError extends Error {
  abstract readonly code: ErrorCode;
  readonly recoverable: boolean;

  protected constructor(message: string, recoverable: boolean, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.recoverable = recoverable;
  }
}

export class ConfigError extends FxTraderError {
  readonly code = 'CONFIG_ERROR';
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, false);
    this.issues = issues;
  }
}

export class GatewayTimeoutError extends FxTraderError {
  readonly code = 'GATEWAY_TIMEOUT';
  readonly operation: string;
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, true);
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

export class DataFetchError extends FxTraderError {
  readonly code = 'DATA_FETCH_ERROR';
  readonly pair: string;
  readonly timedOut: boolean;

  constructor(pair: string, message: string, options?: { cause?: unknown; timedOut?: boolean }) {
    super(`Fetch failed for ${pair}: ${message}`, true, options);
    this.pair = pair;
    this.timedOut = options?.timedOut ?? false;
  }
}

export class StaleDataError extends FxTraderError {
  readonly code = 'STALE_DATA';
  readonly pair: string;
  /** 마지막 포인트 경과 시간 (ms), 데이터가 없으면 null */
  readonly ageMs: number | null;

  constructor(pair: string, ageMs: number | null) {
    super(
      ageMs === null
        ? `No data for ${pair}`
        : `Data for ${pair} is stale (${ageMs}ms old)`,
      true,
    );
    this.pair = pair;
    this.ageMs = ageMs;
  }
}

export class OrderRejectedError extends FxTraderError {
  readonly code = 'ORDER_REJECTED';
  readonly pair: string;
  readonly reason: string;

  constructor(pair: string, reason: string) {
    super(`Order for ${pair} rejected: ${reason}`, true);
    this.pair = pair;
    this.reason = reason;
  }
}

export class ExecutionFailureError extends FxTraderError {
  readonly code = 'EXECUTION_FAILURE';
  /** true면 브로커가 주문을 받지 않은 것이 확실 → 즉시 재시도 가능 */
  readonly retryable: boolean;
  /** true면 브로커 측 체결 여부를 알 수 없음 → 주문은 PENDING으로 두고 조회로 정산 */
  readonly outcomeUnknown: boolean;

  constructor(
    message: string,
    options?: { cause?: unknown; retryable?: boolean; outcomeUnknown?: boolean },
  ) {
    super(message, true, options);
    this.retryable = options?.retryable ?? false;
    this.outcomeUnknown = options?.outcomeUnknown ?? false;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
