import type { SimpleDirection } from '../config.js';
import { formatPair } from '../market/pair.js';
import type { CurrencyPair, Signal } from '../types/index.js';
import {
  type Strategy,
  type StrategyContext,
  exceedsThreshold,
  holdSignal,
  makeSignal,
  percentChange,
} from './strategy.js';

export interface SimpleThresholdParams {
  readonly pair: CurrencyPair;
  /** 변화율 임계값 (%) */
  readonly threshold: number;
  /** 변화율 측정 구간 (ms) */
  readonly lookbackMs: number;
  /** momentum: 상승 → BUY, reversal: 상승 → SELL */
  readonly direction: SimpleDirection;
}

/**
 * 단일 통화쌍 변화율 임계값 전략
 *
 * lookback 구간 첫 포인트 대비 마지막 포인트 변화율이 임계값을 넘으면 신호
 * 정확히 임계값이면 HOLD
 */
export class SimpleThresholdStrategy implements Strategy {
  readonly id = 'simple';
  readonly params: SimpleThresholdParams;
  readonly pairs: readonly CurrencyPair[];
  readonly tradePair: CurrencyPair;
  readonly historyMs: number;

  constructor(params: SimpleThresholdParams) {
    if (!(params.threshold > 0)) throw new Error('threshold must be > 0');
    this.params = params;
    this.tradePair = params.pair;
    this.pairs = [params.pair];
    this.historyMs = params.lookbackMs;
  }

  evaluate(ctx: StrategyContext): Signal {
    const w = ctx.series(this.tradePair, { durationMs: this.params.lookbackMs, endAt: ctx.asOf });
    const first = w.first;
    const last = w.last;
    if (!first || !last || w.length < 2) {
      return holdSignal(this, ctx.asOf, `insufficient data (${w.length} points)`);
    }

    const change = percentChange(first.price, last.price);
    const label = `${formatPair(this.tradePair)} ${first.price} → ${last.price} (${change.toFixed(4)}%)`;
    if (!exceedsThreshold(change, this.params.threshold)) {
      return holdSignal(this, ctx.asOf, `${label} within ±${this.params.threshold}%`);
    }

    const rising = change > 0;
    const buy = this.params.direction === 'momentum' ? rising : !rising;
    const strength = Math.abs(change) / (2 * this.params.threshold);
    return makeSignal(
      this,
      ctx.asOf,
      buy ? 'BUY' : 'SELL',
      strength,
      `${label} crossed ±${this.params.threshold}% (${this.params.direction})`,
    );
  }

  reset(): void {
    // 상태 없음
  }
}
