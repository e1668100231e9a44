/** 통화쌍 (BASE/QUOTE) — parsePair()로만 생성, 불변 */
export interface CurrencyPair {
  readonly base: string;
  readonly quote: string;
}

/** 시세 포인트 — price는 mid (bid/ask 둘 다 있으면 평균, 없으면 단일 환율) */
export interface PricePoint {
  readonly pair: CurrencyPair;
  readonly timestamp: number;   // Unix ms
  readonly price: number;
  readonly bid?: number;
  readonly ask?: number;
}

export type TradeMode = 'paper' | 'live';
