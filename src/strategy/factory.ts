import type { AppConfig } from '../config.js';
import type { CorrelationEngine } from '../correlation/engine.js';
import type { PriceSeriesStore } from '../market/price-store.js';
import { AdvancedStrategy } from './advanced.js';
import { BreakdownPolicy, CorrelationStrategy, DivergencePolicy } from './correlation.js';
import { SimpleThresholdStrategy } from './simple-threshold.js';
import type { Strategy, StrategyContext } from './strategy.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/** [Strategy] 섹션 → 전략 인스턴스 */
export function createStrategy(cfg: AppConfig['strategy']): Strategy {
  switch (cfg.name) {
    case 'simple':
      return new SimpleThresholdStrategy({
        pair: cfg.currency,
        threshold: cfg.threshold,
        lookbackMs: cfg.lookbackMs,
        direction: cfg.direction,
      });
    case 'advanced':
      return new AdvancedStrategy({
        pair: cfg.currency,
        threshold: cfg.threshold,
        lookbackMs: cfg.lookbackMs,
        indicators: cfg.indicators,
        combine: cfg.combine,
        weights: cfg.weights,
        voteThreshold: cfg.voteThreshold,
        emaFast: cfg.emaFast,
        emaSlow: cfg.emaSlow,
        rsiPeriod: cfg.rsiPeriod,
        rsiOversold: cfg.rsiOversold,
        rsiOverbought: cfg.rsiOverbought,
        smaPeriod: cfg.smaPeriod,
        sampleIntervalMs: cfg.sampleIntervalMs,
      });
    case 'correlation':
      return new CorrelationStrategy({
        primary: cfg.currency,
        secondaries: cfg.secondaryCurrencies,
        lookbackMs: cfg.lookbackMs,
        windowMs: correlationWindowMs(cfg),
        policy:
          cfg.signalPolicy === 'breakdown'
            ? new BreakdownPolicy({ minCorrelation: cfg.minCorrelation, deviation: cfg.breakdownDeviation })
            : new DivergencePolicy({ threshold: cfg.threshold, minCorrelation: cfg.minCorrelation }),
      });
  }
}

export function correlationWindowMs(cfg: AppConfig['strategy']): number {
  return cfg.correlationWindowDays * DAY_MS;
}

/** 스토어 + 상관 엔진 → 평가 컨텍스트 */
export function createContext(
  store: PriceSeriesStore,
  engine: CorrelationEngine | null,
  asOf: number,
): StrategyContext {
  return {
    asOf,
    series: (pair, query) => store.window(pair, query),
    correlation: (a, b) => engine?.get(a, b),
  };
}
