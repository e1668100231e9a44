import { describe, it, expect } from 'vitest';
import { DataFetchError } from '../src/errors.js';
import { parsePair } from '../src/market/pair.js';
import { ReplayMarketDataGateway } from '../src/market/replay-gateway.js';

const USDJPY = parsePair('USD/JPY');
const EURUSD = parsePair('EUR/USD');

describe('ReplayMarketDataGateway', () => {
  it('should serve each pair in timestamp order and advance its clock', async () => {
    const replay = new ReplayMarketDataGateway([
      { pair: USDJPY, timestamp: 1000, price: 110.1 },
      { pair: USDJPY, timestamp: 3000, price: 110.3 },
      { pair: USDJPY, timestamp: 2000, price: 110.2 },
      { pair: EURUSD, timestamp: 500, price: 1.08 },
    ]);
    expect(replay.now()).toBe(500);

    expect((await replay.fetchLatest(USDJPY)).price).toBe(110.1);
    expect(replay.now()).toBe(1000);
    expect((await replay.fetchLatest(USDJPY)).price).toBe(110.2);
    expect(replay.remaining(USDJPY)).toBe(1);

    // 이미 지난 시각은 시계를 되돌리지 않음
    await replay.fetchLatest(EURUSD);
    expect(replay.now()).toBe(2000);
  });

  it('should fail once a pair is exhausted', async () => {
    const replay = new ReplayMarketDataGateway([{ pair: USDJPY, timestamp: 1000, price: 110.1 }]);
    await replay.fetchLatest(USDJPY);

    await expect(replay.fetchLatest(USDJPY)).rejects.toThrow('Fetch failed for USD/JPY: replay exhausted');
    await expect(replay.fetchLatest(EURUSD)).rejects.toBeInstanceOf(DataFetchError);
    await expect(replay.fetchLatest(EURUSD)).rejects.toThrow('no replay data');
  });

  it('should start its clock at zero without data', () => {
    expect(new ReplayMarketDataGateway([]).now()).toBe(0);
  });
});
