import { DataFetchError, GatewayTimeoutError, describeError } from '../errors.js';
import { createChildLogger } from '../logger.js';
import { BrokerRestClient } from '../exchange/rest/client.js';
import { HISTORICAL_RATES, exchangeRatePath } from '../exchange/rest/endpoints.js';
import { exchangeRateSchema, historicalRatesSchema, parseTimestamp } from '../exchange/rest/schemas.js';
import type { CurrencyPair, PricePoint } from '../types/index.js';
import { type HistoricalSource, type MarketDataGateway, makePricePoint } from './gateway.js';
import { formatPair } from './pair.js';

const log = createChildLogger('rest-market');

const DAY_MS = 24 * 60 * 60 * 1000;

function isoDate(ts: number): string {
  return new Date(ts).toISOString().slice(0, 10);
}

/**
 * REST 시세 게이트웨이 — 모든 URL은 exchange/rest/endpoints.ts 상수만 사용
 * 응답에 timestamp가 없으면 수신 시각(now)을 사용
 */
export class RestMarketDataGateway implements MarketDataGateway, HistoricalSource {
  readonly name = 'rest';
  private readonly client: BrokerRestClient;
  private readonly now: () => number;

  constructor(client: BrokerRestClient, now: () => number = Date.now) {
    this.client = client;
    this.now = now;
  }

  async fetchLatest(pair: CurrencyPair): Promise<PricePoint> {
    const label = formatPair(pair);
    try {
      const data = await this.client.getPublic(exchangeRatePath(pair), {}, exchangeRateSchema);
      const received = this.now();
      return makePricePoint(pair, parseTimestamp(data.timestamp, received), data);
    } catch (err) {
      throw new DataFetchError(label, describeError(err), {
        cause: err,
        timedOut: err instanceof GatewayTimeoutError,
      });
    }
  }

  /**
   * 일별 과거 환율 — 날짜(UTC 자정)를 timestamp로 사용
   */
  async load(pair: CurrencyPair, fromTs: number, toTs: number): Promise<PricePoint[]> {
    const label = formatPair(pair);
    const query = {
      currency_pair: label,
      start_date: isoDate(fromTs),
      end_date: isoDate(toTs),
      interval: 'daily',
    };
    const data = await this.client
      .getPublic(HISTORICAL_RATES, query, historicalRatesSchema)
      .catch((err: unknown) => {
        throw new DataFetchError(label, `historical rates: ${describeError(err)}`, {
          cause: err,
          timedOut: err instanceof GatewayTimeoutError,
        });
      });

    const points: PricePoint[] = [];
    for (const item of data.rates) {
      const ts = Date.parse(`${item.date.slice(0, 10)}T00:00:00Z`);
      if (Number.isNaN(ts)) {
        log.warn({ pair: label, date: item.date }, 'Skipping historical rate with bad date');
        continue;
      }
      if (ts < fromTs - DAY_MS || ts > toTs) continue;
      points.push(makePricePoint(pair, ts, { rate: item.rate }));
    }
    points.sort((a, b) => a.timestamp - b.timestamp);
    log.info({ pair: label, count: points.length }, 'Historical rates loaded');
    return points;
  }
}
