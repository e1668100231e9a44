import { describe, it, expect } from 'vitest';
import { EMA } from '../src/indicators/ema.js';
import { RSI } from '../src/indicators/rsi.js';
import { SMA } from '../src/indicators/sma.js';

describe('EMA', () => {
  it('should seed with SMA then apply the multiplier', () => {
    const ema = new EMA(3);
    ema.update(2);
    ema.update(4);
    expect(ema.isReady).toBe(false);
    expect(ema.value).toBe(3); // 부분 평균
    ema.update(6);
    expect(ema.isReady).toBe(true);
    expect(ema.value).toBe(4);
    // (10 - 4) * 0.5 + 4
    expect(ema.update(10)).toBe(7);
  });

  it('should reset properly', () => {
    const ema = new EMA(2);
    ema.update(1);
    ema.update(3);
    ema.reset();
    expect(ema.isReady).toBe(false);
    expect(ema.value).toBe(0);
  });

  it('should reject period < 1', () => {
    expect(() => new EMA(0)).toThrow('period');
  });
});

describe('RSI', () => {
  it('should stay neutral until ready', () => {
    const rsi = new RSI(3);
    expect(rsi.update(100)).toBe(50);
    rsi.update(101);
    rsi.update(102);
    expect(rsi.isReady).toBe(false);
    expect(rsi.value).toBe(50);
  });

  it('should return 100 when there are only gains', () => {
    const rsi = new RSI(3);
    for (const p of [100, 101, 102, 103]) rsi.update(p);
    expect(rsi.isReady).toBe(true);
    expect(rsi.value).toBe(100);
  });

  it('should compute Wilder-smoothed RSI', () => {
    const rsi = new RSI(2);
    rsi.update(10);
    rsi.update(12); // gain 2
    rsi.update(11); // loss 1 → avgGain 1, avgLoss 0.5
    expect(rsi.value).toBeCloseTo(100 - 100 / 3, 10);
    rsi.update(11); // avgGain 0.5, avgLoss 0.25 → RS 2
    expect(rsi.value).toBeCloseTo(100 - 100 / 3, 10);
    rsi.update(10); // avgGain 0.25, avgLoss 0.625 → RS 0.4
    expect(rsi.value).toBeCloseTo(100 - 100 / 1.4, 10);
  });

  it('should return 50 for a flat series', () => {
    const rsi = new RSI(2);
    for (const p of [5, 5, 5]) rsi.update(p);
    expect(rsi.value).toBe(50);
  });
});

describe('SMA', () => {
  it('should average the last N values', () => {
    const sma = new SMA(3);
    sma.update(1);
    sma.update(2);
    expect(sma.isReady).toBe(false);
    expect(sma.value).toBe(1.5);
    sma.update(3);
    expect(sma.value).toBe(2);
    expect(sma.update(10)).toBe(5); // (2 + 3 + 10) / 3
  });

  it('should reset properly', () => {
    const sma = new SMA(2);
    sma.update(4);
    sma.reset();
    expect(sma.value).toBe(0);
    expect(sma.isReady).toBe(false);
  });
});
