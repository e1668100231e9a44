import { createChildLogger } from '../logger.js';
import { formatPair, pairKey } from '../market/pair.js';
import type { CorrelationEstimate, CurrencyPair, Signal, SignalDirection } from '../types/index.js';
import {
  type Strategy,
  type StrategyContext,
  exceedsThreshold,
  holdSignal,
  makeSignal,
  percentChange,
} from './strategy.js';

const log = createChildLogger('correlation-strategy');

/** 보조 통화쌍 하나에 대한 이번 평가 입력 */
export interface SecondaryReading {
  readonly pair: CurrencyPair;
  /** 항상 valid인 추정치만 전달됨 */
  readonly estimate: CorrelationEstimate & { readonly coefficient: number };
  /** lookback 구간 변화율 (%) */
  readonly primaryChange: number;
  readonly secondaryChange: number;
}

export interface PolicyDecision {
  readonly direction: Exclude<SignalDirection, 'HOLD'>;
  readonly strength: number;
  readonly reason: string;
}

/**
 * 상관 → 신호 변환 정책 (교체 가능)
 * 상태가 있으면 reset()으로 초기화할 수 있어야 함
 */
export interface CorrelationSignalPolicy {
  readonly name: string;
  decide(primary: CurrencyPair, readings: readonly SecondaryReading[]): PolicyDecision | null;
  reset(): void;
}

function sign(x: number): number {
  return x > 0 ? 1 : x < 0 ? -1 : 0;
}

/**
 * 괴리 정책 — divergence = 주 변화율 − sign(ρ) × 보조 변화율
 * |ρ| ≥ minCorrelation 인 보조쌍 중 |divergence| 최대값이 threshold를 넘으면 신호
 * ρ>0: divergence>0 → SELL (주 통화쌍 과열, 회귀 기대), 아니면 BUY. ρ<0이면 반대
 */
export class DivergencePolicy implements CorrelationSignalPolicy {
  readonly name = 'divergence';
  private readonly threshold: number;
  private readonly minCorrelation: number;

  constructor(params: { threshold: number; minCorrelation: number }) {
    this.threshold = params.threshold;
    this.minCorrelation = params.minCorrelation;
  }

  decide(primary: CurrencyPair, readings: readonly SecondaryReading[]): PolicyDecision | null {
    let best: { reading: SecondaryReading; divergence: number } | null = null;
    for (const r of readings) {
      const rho = r.estimate.coefficient;
      if (Math.abs(rho) < this.minCorrelation) continue;
      const divergence = r.primaryChange - sign(rho) * r.secondaryChange;
      if (!best || Math.abs(divergence) > Math.abs(best.divergence)) {
        best = { reading: r, divergence };
      }
    }
    if (!best || !exceedsThreshold(best.divergence, this.threshold)) return null;

    const rho = best.reading.estimate.coefficient;
    const d = best.divergence;
    const direction = rho > 0 ? (d > 0 ? 'SELL' : 'BUY') : d > 0 ? 'BUY' : 'SELL';
    return {
      direction,
      strength: Math.abs(d) / (2 * this.threshold),
      reason:
        `${formatPair(primary)} diverged ${d.toFixed(4)}% from ${formatPair(best.reading.pair)} ` +
        `(ρ=${rho.toFixed(3)}), threshold ${this.threshold}%`,
    };
  }

  reset(): void {
    // 상태 없음
  }
}

/**
 * 상관 붕괴 정책
 *
 * 상태: 보조쌍별 ρ 기준선 (EMA, 계수 smoothing). reset()으로 비움.
 * 기준선이 안정(|기준선| ≥ minCorrelation)한데 |ρ − 기준선| > deviation 이면,
 * 주 통화쌍이 보조쌍의 움직임(기준선 부호 반영) 쪽으로 되돌아간다는 방향으로 신호
 */
export class BreakdownPolicy implements CorrelationSignalPolicy {
  readonly name = 'breakdown';
  private readonly minCorrelation: number;
  private readonly deviation: number;
  private readonly smoothing: number;
  private readonly baselines = new Map<string, number>();

  constructor(params: { minCorrelation: number; deviation: number; smoothing?: number }) {
    this.minCorrelation = params.minCorrelation;
    this.deviation = params.deviation;
    this.smoothing = params.smoothing ?? 0.1;
  }

  baseline(primary: CurrencyPair, secondary: CurrencyPair): number | undefined {
    return this.baselines.get(pairKey(primary, secondary));
  }

  decide(primary: CurrencyPair, readings: readonly SecondaryReading[]): PolicyDecision | null {
    let best: { decision: PolicyDecision; dev: number } | null = null;
    for (const r of readings) {
      const key = pairKey(primary, r.pair);
      const rho = r.estimate.coefficient;
      const base = this.baselines.get(key);
      if (base === undefined) {
        this.baselines.set(key, rho);
        continue;
      }
      // 판정 후 기준선 갱신
      this.baselines.set(key, base + this.smoothing * (rho - base));

      const dev = Math.abs(rho - base);
      if (Math.abs(base) < this.minCorrelation || !exceedsThreshold(dev, this.deviation)) continue;

      const gap = r.primaryChange - sign(base) * r.secondaryChange;
      if (gap === 0) continue;
      if (!best || dev > best.dev) {
        best = {
          dev,
          decision: {
            direction: gap > 0 ? 'SELL' : 'BUY',
            strength: dev / (2 * this.deviation),
            reason:
              `${formatPair(primary)}~${formatPair(r.pair)} correlation broke down ` +
              `(ρ=${rho.toFixed(3)}, baseline ${base.toFixed(3)}), gap ${gap.toFixed(4)}%`,
          },
        };
      }
    }
    return best?.decision ?? null;
  }

  reset(): void {
    this.baselines.clear();
  }
}

export interface CorrelationStrategyParams {
  readonly primary: CurrencyPair;
  readonly secondaries: readonly CurrencyPair[];
  /** 변화율 측정 구간 (ms) */
  readonly lookbackMs: number;
  /** 상관 윈도우 (ms) — 워밍업 구간 */
  readonly windowMs: number;
  readonly policy: CorrelationSignalPolicy;
}

function isValid(e: CorrelationEstimate | undefined): e is CorrelationEstimate & { readonly coefficient: number } {
  return e !== undefined && e.valid && e.coefficient !== null;
}

/**
 * 다중 통화쌍 상관 전략 — 주 통화쌍만 거래
 * 유효한 상관 추정치가 하나도 없으면 HOLD
 */
export class CorrelationStrategy implements Strategy {
  readonly id = 'correlation';
  readonly params: CorrelationStrategyParams;
  readonly pairs: readonly CurrencyPair[];
  readonly tradePair: CurrencyPair;
  readonly historyMs: number;

  constructor(params: CorrelationStrategyParams) {
    if (params.secondaries.length === 0) throw new Error('at least one secondary pair required');
    this.params = params;
    this.tradePair = params.primary;
    this.pairs = [params.primary, ...params.secondaries];
    this.historyMs = Math.max(params.windowMs, params.lookbackMs);
  }

  evaluate(ctx: StrategyContext): Signal {
    const primaryChange = this.change(ctx, this.tradePair);
    if (primaryChange === null) {
      return holdSignal(this, ctx.asOf, `insufficient data for ${formatPair(this.tradePair)}`);
    }

    const readings: SecondaryReading[] = [];
    for (const pair of this.params.secondaries) {
      const estimate = ctx.correlation(this.tradePair, pair);
      if (!isValid(estimate)) {
        log.debug(
          { pair: formatPair(pair), samples: estimate?.sampleCount ?? 0 },
          'Correlation not valid yet, skipping',
        );
        continue;
      }
      const secondaryChange = this.change(ctx, pair);
      if (secondaryChange === null) continue;
      readings.push({ pair, estimate, primaryChange, secondaryChange });
    }

    if (readings.length === 0) {
      return holdSignal(this, ctx.asOf, 'no valid correlation');
    }

    const decision = this.params.policy.decide(this.tradePair, readings);
    if (!decision) {
      return holdSignal(this, ctx.asOf, `${this.params.policy.name}: no trigger`);
    }
    return makeSignal(this, ctx.asOf, decision.direction, decision.strength, decision.reason);
  }

  private change(ctx: StrategyContext, pair: CurrencyPair): number | null {
    const w = ctx.series(pair, { durationMs: this.params.lookbackMs, endAt: ctx.asOf });
    const first = w.first;
    const last = w.last;
    if (!first || !last || w.length < 2) return null;
    return percentChange(first.price, last.price);
  }

  reset(): void {
    this.params.policy.reset();
  }
}
