import { GatewayTimeoutError } from '../errors.js';

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * 외부 호출 타임아웃 — 초과 시 GatewayTimeoutError (원래 작업은 백그라운드에서 정리됨)
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  task: () => Promise<T>,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new GatewayTimeoutError(operation, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([task(), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export interface RetryPolicy {
  /** 첫 시도 이후 추가 시도 횟수 (0 = 다음 주기로 미룸) */
  readonly retries: number;
  readonly backoffMs: number;
}

export const NO_RETRY: RetryPolicy = { retries: 0, backoffMs: 0 };

/**
 * 제한된 즉시 재시도 — backoff * 2^attempt 대기
 * shouldRetry가 false를 반환하면 바로 throw
 */
export async function retry<T>(
  policy: RetryPolicy,
  task: (attempt: number) => Promise<T>,
  shouldRetry: (err: unknown) => boolean = () => true,
): Promise<T> {
  let attempt = 0;
  for (;;) {
    try {
      return await task(attempt);
    } catch (err) {
      if (attempt >= policy.retries || !shouldRetry(err)) throw err;
      await sleep(policy.backoffMs * Math.pow(2, attempt));
      attempt++;
    }
  }
}
