import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { MockAgent } from 'undici';
import { DataFetchError } from '../src/errors.js';
import { BrokerRestClient } from '../src/exchange/rest/client.js';
import { parsePair } from '../src/market/pair.js';
import { RestMarketDataGateway } from '../src/market/rest-gateway.js';

const ORIGIN = 'https://api.test';
const USDJPY = parsePair('USD/JPY');
const EURUSD = parsePair('EUR/USD');

describe('RestMarketDataGateway', () => {
  let agent: MockAgent;
  let gateway: RestMarketDataGateway;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    const client = new BrokerRestClient({
      baseUrl: ORIGIN,
      accessKey: '',
      secretKey: '',
      timeoutMs: 1000,
      dispatcher: agent,
    });
    gateway = new RestMarketDataGateway(client, () => 5000);
  });

  afterEach(async () => {
    await agent.close();
  });

  it('should fetch the latest rate', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/v1/exchange_rate/USD/JPY', method: 'GET' })
      .reply(200, { rate: 110.5, timestamp: 1700000000 });

    expect(await gateway.fetchLatest(USDJPY)).toEqual({ pair: USDJPY, timestamp: 1700000000000, price: 110.5 });
  });

  it('should use bid/ask mid and the receive time when timestamp is missing', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/v1/exchange_rate/EUR/USD', method: 'GET' })
      .reply(200, { bid: 1.25, ask: 1.75 });

    expect(await gateway.fetchLatest(EURUSD)).toEqual({
      pair: EURUSD,
      timestamp: 5000,
      price: 1.5,
      bid: 1.25,
      ask: 1.75,
    });
  });

  it('should wrap HTTP errors in DataFetchError', async () => {
    agent.get(ORIGIN).intercept({ path: '/v1/exchange_rate/USD/JPY', method: 'GET' }).reply(503, {});

    const err = await gateway.fetchLatest(USDJPY).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(DataFetchError);
    expect(err).toMatchObject({
      pair: 'USD/JPY',
      timedOut: false,
      message: 'Fetch failed for USD/JPY: GET /v1/exchange_rate/USD/JPY returned HTTP 503',
    });
  });

  it('should reject malformed responses', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/v1/exchange_rate/USD/JPY', method: 'GET' })
      .reply(200, { rate: -1 });

    await expect(gateway.fetchLatest(USDJPY)).rejects.toBeInstanceOf(DataFetchError);
  });

  it('should load daily historical rates within range', async () => {
    let requested = '';
    agent
      .get(ORIGIN)
      .intercept({ path: (p) => p.startsWith('/v1/historical_rates'), method: 'GET' })
      .reply(200, (opts) => {
        requested = opts.path;
        return {
          rates: [
            { date: '2024-01-03', rate: 111 },
            { date: '2024-01-01', rate: 110 },
            { date: '2023-12-30', rate: 109 },
            { date: 'bad', rate: 1 },
          ],
        };
      });

    const from = Date.parse('2024-01-01T00:00:00Z');
    const to = Date.parse('2024-01-03T12:00:00Z');
    const points = await gateway.load(USDJPY, from, to);

    expect(points).toEqual([
      { pair: USDJPY, timestamp: from, price: 110 },
      { pair: USDJPY, timestamp: Date.parse('2024-01-03T00:00:00Z'), price: 111 },
    ]);
    const query = new URL(requested, ORIGIN).searchParams;
    expect(query.get('currency_pair')).toBe('USD/JPY');
    expect(query.get('start_date')).toBe('2024-01-01');
    expect(query.get('end_date')).toBe('2024-01-03');
    expect(query.get('interval')).toBe('daily');
  });
});
