import type { CurrencyPair } from './market.js';

export interface CorrelationEstimate {
  readonly pairs: readonly [CurrencyPair, CurrencyPair];
  /** 순서 무관 키 (pairKey) */
  readonly key: string;
  /** 유효하지 않으면 null — 0으로 대체하지 않음 */
  readonly coefficient: number | null;
  readonly valid: boolean;
  readonly sampleCount: number;
  readonly minSamples: number;
  readonly windowMs: number;
  readonly asOf: number;
}

export type CorrelationMatrix = ReadonlyMap<string, CorrelationEstimate>;
