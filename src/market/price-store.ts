import { createChildLogger } from '../logger.js';
import type { CurrencyPair, PricePoint } from '../types/index.js';
import { formatPair } from './pair.js';

const log = createChildLogger('price-store');

export interface PriceStoreConfig {
  /** 최신 포인트 기준 보존 기간 (ms) — 이보다 오래된 포인트는 head에서 제거 */
  readonly retentionMs: number;
  /** 통화쌍당 최대 포인트 수 (0이면 무제한) */
  readonly maxPoints: number;
}

export type AppendResult =
  | { readonly accepted: true }
  | { readonly accepted: false; readonly reason: 'STALE'; readonly latestTimestamp: number }
  | { readonly accepted: false; readonly reason: 'INVALID'; readonly detail: string };

export type WindowQuery =
  | { readonly count: number }
  | { readonly durationMs: number; readonly endAt?: number };

/** head 오프셋이 이 값을 넘고 배열 절반 이상이면 압축 */
const COMPACT_MIN_HEAD = 1024;

/**
 * 읽기 전용 윈도우 뷰
 * 생성 시점의 배열 참조 + 구간만 보관 — 이후 append/evict에 영향 없음
 * (압축은 새 배열을 만들기 때문에 기존 뷰의 배열은 변하지 않는다)
 */
export class PriceWindow implements Iterable<PricePoint> {
  private readonly points: readonly PricePoint[];
  private readonly start: number;
  private readonly end: number;

  constructor(points: readonly PricePoint[], start: number, end: number) {
    this.points = points;
    this.start = start;
    this.end = Math.max(start, end);
  }

  get length(): number {
    return this.end - this.start;
  }

  at(index: number): PricePoint | undefined {
    const i = index < 0 ? this.end + index : this.start + index;
    if (i < this.start || i >= this.end) return undefined;
    return this.points[i];
  }

  get first(): PricePoint | undefined {
    return this.at(0);
  }

  get last(): PricePoint | undefined {
    return this.at(-1);
  }

  prices(): number[] {
    const out: number[] = [];
    for (const p of this) out.push(p.price);
    return out;
  }

  toArray(): PricePoint[] {
    return this.points.slice(this.start, this.end);
  }

  *[Symbol.iterator](): Iterator<PricePoint> {
    for (let i = this.start; i < this.end; i++) {
      yield this.points[i]!;
    }
  }
}

class Series {
  points: PricePoint[] = [];
  head = 0;

  get size(): number {
    return this.points.length - this.head;
  }

  get latest(): PricePoint | undefined {
    return this.size > 0 ? this.points[this.points.length - 1] : undefined;
  }

  /** timestamp >= ts 인 첫 인덱스 */
  lowerBound(ts: number): number {
    let lo = this.head;
    let hi = this.points.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.points[mid]!.timestamp < ts) lo = mid + 1;
      else hi = mid;
    }
    return lo;
  }

  /** timestamp > ts 인 첫 인덱스 */
  upperBound(ts: number): number {
    let lo = this.head;
    let hi = this.points.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.points[mid]!.timestamp <= ts) lo = mid + 1;
      else hi = mid;
    }
    return lo;
  }
}

/**
 * 통화쌍별 시세 시계열 — append 전용, 보존 기간 초과분은 head에서 제거
 * 단조성: 최신 timestamp 이하의 포인트는 거부 (재정렬하지 않음)
 */
export class PriceSeriesStore {
  private readonly series = new Map<string, Series>();
  private readonly config: PriceStoreConfig;

  constructor(config: PriceStoreConfig) {
    if (!(config.retentionMs > 0)) throw new Error('retentionMs must be > 0');
    this.config = config;
  }

  append(point: PricePoint): AppendResult {
    if (!Number.isFinite(point.timestamp)) {
      return { accepted: false, reason: 'INVALID', detail: 'timestamp is not finite' };
    }
    if (!Number.isFinite(point.price) || point.price <= 0) {
      return { accepted: false, reason: 'INVALID', detail: `price must be > 0 (got ${point.price})` };
    }

    const key = formatPair(point.pair);
    let s = this.series.get(key);
    if (!s) {
      s = new Series();
      this.series.set(key, s);
    }

    const latest = s.latest;
    if (latest && point.timestamp <= latest.timestamp) {
      return { accepted: false, reason: 'STALE', latestTimestamp: latest.timestamp };
    }

    s.points.push(Object.freeze({ ...point }));
    this.evict(s, point.timestamp);
    return { accepted: true };
  }

  /**
   * 워밍업용 일괄 적재 — append와 동일한 검사, 거부 건수 반환
   */
  seed(points: Iterable<PricePoint>): { accepted: number; rejected: number } {
    let accepted = 0;
    let rejected = 0;
    for (const p of points) {
      if (this.append(p).accepted) accepted++;
      else rejected++;
    }
    if (rejected > 0) {
      log.warn({ accepted, rejected }, 'Seed dropped out-of-order or invalid points');
    }
    return { accepted, rejected };
  }

  window(pair: CurrencyPair, query: WindowQuery): PriceWindow {
    const s = this.series.get(formatPair(pair));
    if (!s || s.size === 0) return new PriceWindow([], 0, 0);

    const len = s.points.length;
    if ('count' in query) {
      const n = Math.max(0, Math.floor(query.count));
      return new PriceWindow(s.points, Math.max(s.head, len - n), len);
    }

    const endAt = query.endAt ?? s.points[len - 1]!.timestamp;
    const end = s.upperBound(endAt);
    const start = s.lowerBound(endAt - query.durationMs);
    return new PriceWindow(s.points, start, end);
  }

  latest(pair: CurrencyPair): PricePoint | undefined {
    return this.series.get(formatPair(pair))?.latest;
  }

  /** ts 이전(포함) 가장 가까운 포인트 */
  priceAt(pair: CurrencyPair, ts: number): PricePoint | undefined {
    const s = this.series.get(formatPair(pair));
    if (!s) return undefined;
    const idx = s.upperBound(ts) - 1;
    return idx >= s.head ? s.points[idx] : undefined;
  }

  size(pair: CurrencyPair): number {
    return this.series.get(formatPair(pair))?.size ?? 0;
  }

  pairs(): string[] {
    return [...this.series.keys()];
  }

  private evict(s: Series, latestTs: number): void {
    const cutoff = latestTs - this.config.retentionMs;
    while (s.head < s.points.length && s.points[s.head]!.timestamp < cutoff) {
      s.head++;
    }
    if (this.config.maxPoints > 0 && s.size > this.config.maxPoints) {
      s.head = s.points.length - this.config.maxPoints;
    }
    if (s.head >= COMPACT_MIN_HEAD && s.head * 2 >= s.points.length) {
      s.points = s.points.slice(s.head);
      s.head = 0;
    }
  }
}
