import type { CurrencyPair, PricePoint } from '../types/index.js';

/**
 * 시세 게이트웨이 — 통화쌍의 최신 호가
 * 실패 시 DataFetchError를 throw (타임아웃은 호출 측에서 적용)
 */
export interface MarketDataGateway {
  readonly name: string;
  fetchLatest(pair: CurrencyPair): Promise<PricePoint>;
}

/** 워밍업용 과거 시세 소스 */
export interface HistoricalSource {
  readonly name: string;
  load(pair: CurrencyPair, fromTs: number, toTs: number): Promise<PricePoint[]>;
}

export function makePricePoint(
  pair: CurrencyPair,
  timestamp: number,
  quote: { rate?: number; bid?: number; ask?: number },
): PricePoint {
  const { bid, ask, rate } = quote;
  if (bid !== undefined && ask !== undefined) {
    return { pair, timestamp, bid, ask, price: (bid + ask) / 2 };
  }
  const price = rate ?? bid ?? ask;
  if (price === undefined) {
    throw new Error('Quote has neither rate nor bid/ask');
  }
  return { pair, timestamp, price, ...(bid !== undefined ? { bid } : {}), ...(ask !== undefined ? { ask } : {}) };
}
