/**
 * 브로커 REST 엔드포인트 — 단일 정의.
 * 코드 어디에서도 문자열 URL을 직접 쓰지 않고 이 상수만 사용한다.
 */
import type { CurrencyPair } from '../../types/index.js';

export const DEFAULT_REST_BASE = 'https://api.example.com';

// ─── PUBLIC ─────────────────────────────────────────────────────────────

/** GET 현재 환율 */
export function exchangeRatePath(pair: CurrencyPair): string {
  return `/v1/exchange_rate/${pair.base}/${pair.quote}`;
}

/** GET 일별 과거 환율 (currency_pair, start_date, end_date, interval) */
export const HISTORICAL_RATES = '/v1/historical_rates';

// ─── PRIVATE ────────────────────────────────────────────────────────────

/** POST 주문 */
export const TRADE = '/v1/trade';

/** GET 주문 상태 조회 (client_order_id 기준) */
export function tradeStatusPath(clientOrderId: string): string {
  return `/v1/trade/${encodeURIComponent(clientOrderId)}`;
}
