import type { PriceWindow, WindowQuery } from '../market/price-store.js';
import type { CorrelationEstimate, CurrencyPair, Signal, SignalDirection } from '../types/index.js';

/** 평가 입력 — 읽기 전용 */
export interface StrategyContext {
  /** 평가 기준 시각 (Unix ms) */
  readonly asOf: number;
  series(pair: CurrencyPair, query: WindowQuery): PriceWindow;
  /** 추적하지 않는 조합이면 undefined */
  correlation(a: CurrencyPair, b: CurrencyPair): CorrelationEstimate | undefined;
}

/**
 * 전략 공통 계약 — 봇은 이 인터페이스에만 의존
 * evaluate는 입력에 대해 순수해야 하며, 내부 상태가 있으면 reset()으로 초기화 가능해야 함
 */
export interface Strategy {
  readonly id: string;
  /** 평가에 필요한 모든 통화쌍 (주문 대상 포함) */
  readonly pairs: readonly CurrencyPair[];
  readonly tradePair: CurrencyPair;
  /** 워밍업에 필요한 과거 구간 (ms) */
  readonly historyMs: number;
  evaluate(ctx: StrategyContext): Signal;
  reset(): void;
}

/** 임계값 동률 판정 허용오차 */
export const TIE_EPSILON = 1e-9;

/** from → to 변화율 (%) */
export function percentChange(from: number, to: number): number {
  return ((to - from) * 100) / from;
}

/**
 * |value|가 threshold를 넘었는지 — 정확히 같으면(허용오차 내) false
 */
export function exceedsThreshold(value: number, threshold: number): boolean {
  return Math.abs(value) - threshold > TIE_EPSILON;
}

export function makeSignal(
  strategy: Pick<Strategy, 'id' | 'pairs' | 'tradePair'>,
  asOf: number,
  direction: SignalDirection,
  strength: number,
  reason: string,
): Signal {
  return Object.freeze({
    pairs: strategy.pairs,
    tradePair: strategy.tradePair,
    direction,
    strength: direction === 'HOLD' ? 0 : Math.min(1, Math.max(0, strength)),
    timestamp: asOf,
    strategyId: strategy.id,
    reason,
  });
}

export function holdSignal(
  strategy: Pick<Strategy, 'id' | 'pairs' | 'tradePair'>,
  asOf: number,
  reason: string,
): Signal {
  return makeSignal(strategy, asOf, 'HOLD', 0, reason);
}
