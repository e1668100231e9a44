import { describe, it, expect } from 'vitest';
import { formatPair, pairEquals, pairKey, parsePair, parsePairList } from '../src/market/pair.js';

describe('parsePair', () => {
  it('should normalize case and whitespace', () => {
    expect(parsePair(' usd / jpy ')).toEqual({ base: 'USD', quote: 'JPY' });
  });

  it('should return frozen pairs', () => {
    expect(Object.isFrozen(parsePair('EUR/USD'))).toBe(true);
  });

  it('should reject malformed pairs', () => {
    expect(() => parsePair('USDJPY')).toThrow('expected BASE/QUOTE');
    expect(() => parsePair('US/JPY')).toThrow('3 letters');
    expect(() => parsePair('USD/USD')).toThrow('base equals quote');
  });
});

describe('pair helpers', () => {
  const usdjpy = parsePair('USD/JPY');
  const eurusd = parsePair('EUR/USD');

  it('should format as BASE/QUOTE', () => {
    expect(formatPair(usdjpy)).toBe('USD/JPY');
  });

  it('should compare by value', () => {
    expect(pairEquals(usdjpy, parsePair('usd/jpy'))).toBe(true);
    expect(pairEquals(usdjpy, eurusd)).toBe(false);
  });

  it('should build an order-independent key', () => {
    expect(pairKey(usdjpy, eurusd)).toBe('EUR/USD|USD/JPY');
    expect(pairKey(eurusd, usdjpy)).toBe('EUR/USD|USD/JPY');
  });

  it('should parse lists and drop duplicates', () => {
    expect(parsePairList('EUR/USD, gbp/usd,,EUR/USD').map(formatPair)).toEqual(['EUR/USD', 'GBP/USD']);
    expect(parsePairList('')).toEqual([]);
  });
});
