import { DataFetchError } from '../errors.js';
import { createChildLogger } from '../logger.js';
import type { CurrencyPair, PricePoint } from '../types/index.js';
import type { MarketDataGateway } from './gateway.js';
import { formatPair } from './pair.js';

const log = createChildLogger('replay-market');

/**
 * 기록된 시세 재생 — fetchLatest 호출마다 통화쌍별 다음 포인트를 반환
 * 소진되면 DataFetchError (드라이런/백테스트용)
 */
export class ReplayMarketDataGateway implements MarketDataGateway {
  readonly name = 'replay';
  private readonly queues = new Map<string, PricePoint[]>();
  private readonly cursors = new Map<string, number>();
  private clock: number;

  constructor(points: readonly PricePoint[]) {
    for (const p of points) {
      const key = formatPair(p.pair);
      const q = this.queues.get(key);
      if (q) q.push(p);
      else this.queues.set(key, [p]);
    }
    for (const q of this.queues.values()) q.sort((a, b) => a.timestamp - b.timestamp);
    this.clock = points.reduce((min, p) => Math.min(min, p.timestamp), Number.POSITIVE_INFINITY);
    if (!Number.isFinite(this.clock)) this.clock = 0;
    log.info({ pairs: [...this.queues.keys()], points: points.length }, 'Replay loaded');
  }

  async fetchLatest(pair: CurrencyPair): Promise<PricePoint> {
    const key = formatPair(pair);
    const q = this.queues.get(key);
    const cursor = this.cursors.get(key) ?? 0;
    const point = q?.[cursor];
    if (!point) {
      throw new DataFetchError(key, q ? 'replay exhausted' : 'no replay data');
    }
    this.cursors.set(key, cursor + 1);
    this.clock = Math.max(this.clock, point.timestamp);
    return point;
  }

  /** 재생 시각 — 지금까지 내보낸 포인트 중 최신 timestamp (봇의 now로 사용) */
  now(): number {
    return this.clock;
  }

  remaining(pair: CurrencyPair): number {
    const key = formatPair(pair);
    return (this.queues.get(key)?.length ?? 0) - (this.cursors.get(key) ?? 0);
  }
}
