import type { CurrencyPair } from './market.js';

export type SignalDirection = 'BUY' | 'SELL' | 'HOLD';

export interface Signal {
  /** 판단에 사용된 통화쌍 전부 (상관 전략이면 주 + 보조) */
  readonly pairs: readonly CurrencyPair[];
  /** 주문 대상 통화쌍 */
  readonly tradePair: CurrencyPair;
  readonly direction: SignalDirection;
  readonly strength: number;      // 0~1
  readonly timestamp: number;     // 평가 기준 시각 (Unix ms)
  readonly strategyId: string;
  readonly reason: string;
}
