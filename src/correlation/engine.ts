import { createChildLogger } from '../logger.js';
import { formatPair, pairEquals, pairKey } from '../market/pair.js';
import type { PriceSeriesStore } from '../market/price-store.js';
import type { CorrelationEstimate, CorrelationMatrix, CurrencyPair } from '../types/index.js';

const log = createChildLogger('correlation');

export interface CorrelationEngineConfig {
  /** 롤링 윈도우 (ms) — correlation_window 일수 */
  readonly windowMs: number;
  /** 정렬 격자 간격 (ms) */
  readonly sampleIntervalMs: number;
  /** 유효 판정 최소 표본 수 */
  readonly minSamples: number;
  /** 격자 시각과 직전 포인트의 최대 허용 간격 (ms), 기본 2 × sampleIntervalMs */
  readonly maxGapMs?: number;
  /** 이만큼 제거될 때마다 누적합을 다시 계산 (부동소수 오차 누적 방지) */
  readonly resyncEvery?: number;
}

const DEFAULT_RESYNC_EVERY = 1000;

interface Sample {
  readonly ts: number;
  readonly x: number;
  readonly y: number;
}

/**
 * 통화쌍 조합별 롤링 상태
 * 표본은 head 인덱스 deque, 누적합은 추가/제거 시 증분 갱신
 */
class PairState {
  readonly a: CurrencyPair;
  readonly b: CurrencyPair;
  readonly key: string;

  samples: Sample[] = [];
  head = 0;
  n = 0;
  sx = 0;
  sy = 0;
  sxx = 0;
  syy = 0;
  sxy = 0;
  evictions = 0;

  /** 마지막으로 처리한 격자 시각 */
  lastGrid: number | null = null;
  /** 직전 격자의 정렬된 가격 (간격 초과 시 null) */
  prevA: number | null = null;
  prevB: number | null = null;
  /** 직전 격자에 쓰인 포인트의 timestamp */
  prevTsA: number | null = null;
  prevTsB: number | null = null;

  estimate: CorrelationEstimate;

  constructor(a: CurrencyPair, b: CurrencyPair, cfg: CorrelationEngineConfig) {
    this.a = a;
    this.b = b;
    this.key = pairKey(a, b);
    this.estimate = invalidEstimate(this, cfg, 0);
  }

  add(s: Sample): void {
    this.samples.push(s);
    this.n++;
    this.sx += s.x;
    this.sy += s.y;
    this.sxx += s.x * s.x;
    this.syy += s.y * s.y;
    this.sxy += s.x * s.y;
  }

  /** ts <= cutoff 인 표본 제거, 제거 건수 반환 */
  evictUpTo(cutoff: number): number {
    let removed = 0;
    while (this.head < this.samples.length && this.samples[this.head]!.ts <= cutoff) {
      const s = this.samples[this.head]!;
      this.n--;
      this.sx -= s.x;
      this.sy -= s.y;
      this.sxx -= s.x * s.x;
      this.syy -= s.y * s.y;
      this.sxy -= s.x * s.y;
      this.head++;
      removed++;
    }
    if (this.head > 0 && this.head * 2 >= this.samples.length) {
      this.samples = this.samples.slice(this.head);
      this.head = 0;
    }
    this.evictions += removed;
    return removed;
  }

  resync(): void {
    this.n = 0;
    this.sx = this.sy = this.sxx = this.syy = this.sxy = 0;
    const retained = this.samples.slice(this.head);
    this.samples = [];
    this.head = 0;
    for (const s of retained) this.add(s);
    this.evictions = 0;
  }

  clear(): void {
    this.samples = [];
    this.head = 0;
    this.n = 0;
    this.sx = this.sy = this.sxx = this.syy = this.sxy = 0;
    this.evictions = 0;
    this.lastGrid = null;
    this.cut();
  }

  /** 정렬 연속성 끊기 — 다음 격자는 기준 가격만 기록 */
  cut(): void {
    this.prevA = null;
    this.prevB = null;
    this.prevTsA = null;
    this.prevTsB = null;
  }
}

function invalidEstimate(s: PairState, cfg: CorrelationEngineConfig, asOf: number): CorrelationEstimate {
  return Object.freeze({
    pairs: [s.a, s.b] as const,
    key: s.key,
    coefficient: null,
    valid: false,
    sampleCount: s.n,
    minSamples: cfg.minSamples,
    windowMs: cfg.windowMs,
    asOf,
  });
}

/**
 * 누적합 → Pearson 상관계수
 * 표본 부족 또는 분산 0(상수 수익률)이면 null
 */
export function pearsonFromSums(
  n: number,
  sx: number,
  sy: number,
  sxx: number,
  syy: number,
  sxy: number,
): number | null {
  if (n < 2) return null;
  const vx = sxx - (sx * sx) / n;
  const vy = syy - (sy * sy) / n;
  // 상수 수익률의 상쇄 오차는 sxx 대비 상대값으로 걸러냄
  if (!(vx > 0 && vx > sxx * 1e-12) || !(vy > 0 && vy > syy * 1e-12)) return null;
  const cov = sxy - (sx * sy) / n;
  const r = cov / Math.sqrt(vx * vy);
  return Math.max(-1, Math.min(1, r));
}

/**
 * 롤링 상관 엔진
 *
 * 각 조합의 시계열을 sampleInterval 배수 격자에 직전 포인트로 정렬하고,
 * 연속 격자 간 단순 수익률로 Pearson 상관을 증분 계산한다.
 * 격자 시각과 직전 포인트 간격이 maxGap을 넘으면 그 격자는 버리고 직전 가격도 끊는다.
 * 두 시계열 모두 직전 격자 이후 새 포인트가 없으면 그 격자는 건너뛴다.
 */
export class CorrelationEngine {
  private readonly config: CorrelationEngineConfig;
  private readonly maxGapMs: number;
  private readonly resyncEvery: number;
  private readonly states = new Map<string, PairState>();

  constructor(config: CorrelationEngineConfig) {
    if (!(config.windowMs > 0)) throw new Error('windowMs must be > 0');
    if (!(config.sampleIntervalMs > 0)) throw new Error('sampleIntervalMs must be > 0');
    if (config.minSamples < 2) throw new Error('minSamples must be >= 2');
    this.config = config;
    this.maxGapMs = config.maxGapMs ?? config.sampleIntervalMs * 2;
    this.resyncEvery = config.resyncEvery ?? DEFAULT_RESYNC_EVERY;
  }

  track(a: CurrencyPair, b: CurrencyPair): void {
    if (pairEquals(a, b)) throw new Error('cannot correlate a pair with itself');
    const key = pairKey(a, b);
    if (!this.states.has(key)) {
      this.states.set(key, new PairState(a, b, this.config));
      log.debug({ key }, 'Tracking correlation');
    }
  }

  /**
   * asOf까지 격자를 진행하며 표본 추가 + 윈도우 밖 표본 제거
   */
  advance(store: PriceSeriesStore, asOf: number): void {
    const step = this.config.sampleIntervalMs;
    for (const s of this.states.values()) {
      const windowStart = asOf - this.config.windowMs;
      let t0: number;
      if (s.lastGrid === null || s.lastGrid + step <= windowStart) {
        const firstA = store.window(s.a, { count: store.size(s.a) }).first;
        const firstB = store.window(s.b, { count: store.size(s.b) }).first;
        if (!firstA || !firstB) {
          s.estimate = invalidEstimate(s, this.config, asOf);
          continue;
        }
        t0 = Math.ceil(Math.max(windowStart, firstA.timestamp, firstB.timestamp) / step) * step;
        s.cut();
      } else {
        t0 = s.lastGrid + step;
      }

      for (let t = t0; t <= asOf; t += step) {
        this.sampleAt(s, store, t);
        s.lastGrid = t;
      }

      s.evictUpTo(windowStart);
      if (s.evictions >= this.resyncEvery) s.resync();

      const r = pearsonFromSums(s.n, s.sx, s.sy, s.sxx, s.syy, s.sxy);
      s.estimate =
        s.n >= this.config.minSamples && r !== null
          ? Object.freeze({
              pairs: [s.a, s.b] as const,
              key: s.key,
              coefficient: r,
              valid: true,
              sampleCount: s.n,
              minSamples: this.config.minSamples,
              windowMs: this.config.windowMs,
              asOf,
            })
          : invalidEstimate(s, this.config, asOf);
    }
  }

  private sampleAt(s: PairState, store: PriceSeriesStore, t: number): void {
    const pa = store.priceAt(s.a, t);
    const pb = store.priceAt(s.b, t);
    if (!pa || !pb || t - pa.timestamp > this.maxGapMs || t - pb.timestamp > this.maxGapMs) {
      s.cut();
      return;
    }
    // 두 시계열 모두 새 관측이 없으면 표본 없음 (같은 포인트의 0 수익률 반복 방지)
    if (pa.timestamp === s.prevTsA && pb.timestamp === s.prevTsB) return;
    if (s.prevA !== null && s.prevB !== null) {
      s.add({ ts: t, x: pa.price / s.prevA - 1, y: pb.price / s.prevB - 1 });
    }
    s.prevA = pa.price;
    s.prevB = pb.price;
    s.prevTsA = pa.timestamp;
    s.prevTsB = pb.timestamp;
  }

  /** 추적하지 않는 조합이면 undefined */
  get(a: CurrencyPair, b: CurrencyPair): CorrelationEstimate | undefined {
    return this.states.get(pairKey(a, b))?.estimate;
  }

  matrix(): CorrelationMatrix {
    const out = new Map<string, CorrelationEstimate>();
    for (const [key, s] of this.states) out.set(key, s.estimate);
    return out;
  }

  /** 모든 누적 상태 초기화 (추적 목록은 유지) */
  reset(): void {
    for (const s of this.states.values()) {
      s.clear();
      s.estimate = invalidEstimate(s, this.config, 0);
    }
  }

  describe(): string {
    return [...this.states.values()]
      .map((s) => `${formatPair(s.a)}~${formatPair(s.b)}: ${s.estimate.coefficient?.toFixed(3) ?? 'n/a'} (n=${s.n})`)
      .join(', ');
  }
}
