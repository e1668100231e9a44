import type { CombineRule, IndicatorName } from '../config.js';
import { EMA } from '../indicators/ema.js';
import { RSI } from '../indicators/rsi.js';
import { SMA } from '../indicators/sma.js';
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

export interface AdvancedParams {
  readonly pair: CurrencyPair;
  readonly threshold: number;
  readonly lookbackMs: number;
  readonly indicators: readonly IndicatorName[];
  readonly combine: CombineRule;
  /** indicators와 같은 순서 */
  readonly weights: readonly number[];
  /** weighted 점수 임계값 (0~1) */
  readonly voteThreshold: number;
  readonly emaFast: number;
  readonly emaSlow: number;
  readonly rsiPeriod: number;
  readonly rsiOversold: number;
  readonly rsiOverbought: number;
  readonly smaPeriod: number;
  /** 포인트 간격 (ms) — 워밍업 구간 계산용 */
  readonly sampleIntervalMs: number;
}

/** +1 매수, -1 매도, 0 중립 */
export type Vote = -1 | 0 | 1;

export interface IndicatorVote {
  readonly indicator: IndicatorName;
  readonly vote: Vote;
  readonly detail: string;
}

function sign(x: number): Vote {
  return x > 0 ? 1 : x < 0 ? -1 : 0;
}

/**
 * 복수 인디케이터 투표 전략
 *
 * 인디케이터마다 -1/0/+1 투표 → majority(과반) 또는 weighted(가중 평균) 결합
 * 준비되지 않은 인디케이터는 0
 */
export class AdvancedStrategy implements Strategy {
  readonly id = 'advanced';
  readonly params: AdvancedParams;
  readonly pairs: readonly CurrencyPair[];
  readonly tradePair: CurrencyPair;
  readonly historyMs: number;
  /** 인디케이터 계산에 쓰는 최근 포인트 수 */
  private readonly historyPoints: number;

  constructor(params: AdvancedParams) {
    if (params.indicators.length === 0) throw new Error('at least one indicator required');
    if (params.weights.length !== params.indicators.length) {
      throw new Error('weights must match indicators');
    }
    this.params = params;
    this.tradePair = params.pair;
    this.pairs = [params.pair];
    this.historyPoints = 3 * Math.max(params.emaSlow, params.rsiPeriod + 1, params.smaPeriod);
    this.historyMs = Math.max(params.lookbackMs, this.historyPoints * params.sampleIntervalMs);
  }

  evaluate(ctx: StrategyContext): Signal {
    const votes = this.params.indicators.map((name) => this.vote(name, ctx));
    const detail = votes.map((v) => `${v.indicator}=${v.vote}(${v.detail})`).join(', ');
    const label = formatPair(this.tradePair);

    if (this.params.combine === 'majority') {
      const n = votes.length;
      const buys = votes.filter((v) => v.vote === 1).length;
      const sells = votes.filter((v) => v.vote === -1).length;
      if (buys * 2 > n) return makeSignal(this, ctx.asOf, 'BUY', buys / n, `${label} majority buy: ${detail}`);
      if (sells * 2 > n) return makeSignal(this, ctx.asOf, 'SELL', sells / n, `${label} majority sell: ${detail}`);
      return holdSignal(this, ctx.asOf, `${label} no majority: ${detail}`);
    }

    let total = 0;
    let weighted = 0;
    votes.forEach((v, i) => {
      const w = this.params.weights[i] ?? 0;
      total += w;
      weighted += w * v.vote;
    });
    if (total === 0) return holdSignal(this, ctx.asOf, `${label} all weights zero`);
    const score = weighted / total;
    if (!exceedsThreshold(score, this.params.voteThreshold)) {
      return holdSignal(this, ctx.asOf, `${label} score ${score.toFixed(3)} within ±${this.params.voteThreshold}: ${detail}`);
    }
    return makeSignal(
      this,
      ctx.asOf,
      score > 0 ? 'BUY' : 'SELL',
      Math.abs(score),
      `${label} weighted score ${score.toFixed(3)}: ${detail}`,
    );
  }

  /** 인디케이터별 투표 — 매 평가마다 새 인스턴스로 계산 (호출 간 상태 없음) */
  vote(name: IndicatorName, ctx: StrategyContext): IndicatorVote {
    const p = this.params;
    switch (name) {
      case 'threshold': {
        const w = ctx.series(this.tradePair, { durationMs: p.lookbackMs, endAt: ctx.asOf });
        const first = w.first;
        const last = w.last;
        if (!first || !last || w.length < 2) return { indicator: name, vote: 0, detail: 'not ready' };
        const change = percentChange(first.price, last.price);
        const vote = exceedsThreshold(change, p.threshold) ? sign(change) : 0;
        return { indicator: name, vote, detail: `${change.toFixed(4)}%` };
      }
      case 'ema_cross': {
        const fast = new EMA(p.emaFast);
        const slow = new EMA(p.emaSlow);
        for (const price of this.prices(ctx)) {
          fast.update(price);
          slow.update(price);
        }
        if (!slow.isReady) return { indicator: name, vote: 0, detail: 'not ready' };
        return {
          indicator: name,
          vote: sign(fast.value - slow.value),
          detail: `${fast.value.toFixed(5)}/${slow.value.toFixed(5)}`,
        };
      }
      case 'rsi': {
        const rsi = new RSI(p.rsiPeriod);
        for (const price of this.prices(ctx)) rsi.update(price);
        if (!rsi.isReady) return { indicator: name, vote: 0, detail: 'not ready' };
        const v = rsi.value;
        const vote: Vote = v < p.rsiOversold ? 1 : v > p.rsiOverbought ? -1 : 0;
        return { indicator: name, vote, detail: v.toFixed(2) };
      }
      case 'sma_trend': {
        const sma = new SMA(p.smaPeriod);
        const prices = this.prices(ctx);
        for (const price of prices) sma.update(price);
        const last = prices[prices.length - 1];
        if (!sma.isReady || last === undefined) return { indicator: name, vote: 0, detail: 'not ready' };
        return { indicator: name, vote: sign(last - sma.value), detail: `${last}/${sma.value.toFixed(5)}` };
      }
    }
  }

  private prices(ctx: StrategyContext): number[] {
    return ctx
      .series(this.tradePair, { count: this.historyPoints })
      .toArray()
      .filter((p) => p.timestamp <= ctx.asOf)
      .map((p) => p.price);
  }

  reset(): void {
    // 상태 없음
  }
}
