import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CsvHistorySource, loadPriceCsv, parsePriceCsv } from '../src/data/csv-loader.js';
import { parsePair } from '../src/market/pair.js';

const USDJPY = parsePair('USD/JPY');
const EURUSD = parsePair('EUR/USD');

describe('parsePriceCsv', () => {
  it('should parse rate rows with a default pair', () => {
    const points = parsePriceCsv(['timestamp,rate', '1700000000,110.5', '1700000060,110.6'].join('\n'), USDJPY);
    expect(points).toHaveLength(2);
    expect(points[0]).toEqual({ pair: USDJPY, timestamp: 1700000000000, price: 110.5 });
    expect(points[1]!.timestamp).toBe(1700000060000);
  });

  it('should take mid price from bid/ask and keep both', () => {
    const points = parsePriceCsv(
      ['timestamp,pair,bid,ask', '2024-01-02T00:00:00Z,EUR/USD,1.1,1.3'].join('\n'),
    );
    expect(points[0]!.pair).toEqual(EURUSD);
    expect(points[0]!.timestamp).toBe(Date.parse('2024-01-02T00:00:00Z'));
    expect(points[0]!.price).toBeCloseTo(1.2, 12);
    expect(points[0]!.bid).toBe(1.1);
    expect(points[0]!.ask).toBe(1.3);
  });

  it('should sort by timestamp across pairs', () => {
    const points = parsePriceCsv(
      [
        'timestamp,pair,rate',
        '1700000120,USD/JPY,111',
        '1700000000,EUR/USD,1.1',
        '1700000060,USD/JPY,110',
      ].join('\n'),
    );
    expect(points.map((p) => p.timestamp)).toEqual([1700000000000, 1700000060000, 1700000120000]);
  });

  it('should handle quoted fields', () => {
    const points = parsePriceCsv(['"timestamp","pair","rate"', '"1700000000","usd/jpy","110.25"'].join('\n'));
    expect(points[0]!.pair).toEqual(USDJPY);
    expect(points[0]!.price).toBe(110.25);
  });

  it('should reject duplicate timestamps for the same pair', () => {
    const text = ['timestamp,rate', '1700000000,110', '1700000000,111'].join('\n');
    expect(() => parsePriceCsv(text, USDJPY)).toThrow('Duplicate timestamp for USD/JPY: 1700000000000');
  });

  it('should reject non-positive prices with the line number', () => {
    const text = ['timestamp,rate', '1700000000,110', '1700000060,-1'].join('\n');
    expect(() => parsePriceCsv(text, USDJPY)).toThrow('Line 3: rate must be a positive number (got "-1")');
  });

  it('should reject bid above ask', () => {
    const text = ['timestamp,bid,ask', '1700000000,1.3,1.1'].join('\n');
    expect(() => parsePriceCsv(text, EURUSD)).toThrow('Line 2: bid (1.3) > ask (1.1)');
  });

  it('should require a pair column or default pair', () => {
    expect(() => parsePriceCsv(['timestamp,rate', '1700000000,110'].join('\n'))).toThrow('no "pair" column');
  });

  it('should require a price column', () => {
    expect(() => parsePriceCsv(['timestamp,close', '1700000000,110'].join('\n'), USDJPY)).toThrow('"rate" column');
  });

  it('should require at least one data row', () => {
    expect(() => parsePriceCsv('timestamp,rate', USDJPY)).toThrow('header + at least 1 data row');
  });
});

describe('CsvHistorySource', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'fx-csv-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should filter by pair and time range', async () => {
    const path = join(dir, 'history.csv');
    writeFileSync(
      path,
      [
        'timestamp,pair,rate',
        '1700000000,USD/JPY,110',
        '1700000060,USD/JPY,111',
        '1700000120,USD/JPY,112',
        '1700000060,EUR/USD,1.1',
      ].join('\n'),
      'utf-8',
    );
    expect(loadPriceCsv(path)).toHaveLength(4);

    const source = new CsvHistorySource(path);
    const points = await source.load(USDJPY, 1700000060000, 1700000120000);
    expect(points.map((p) => p.price)).toEqual([111, 112]);
  });
});
