import { readFileSync } from 'node:fs';
import type { HistoricalSource } from '../market/gateway.js';
import { makePricePoint } from '../market/gateway.js';
import { formatPair, pairEquals, parsePair } from '../market/pair.js';
import type { CurrencyPair, PricePoint } from '../types/index.js';

export interface CsvLoaderOptions {
  readonly timestampCol?: string;
  readonly pairCol?: string;
  readonly rateCol?: string;
  readonly bidCol?: string;
  readonly askCol?: string;
}

const DEFAULTS: Required<CsvLoaderOptions> = {
  timestampCol: 'timestamp',
  pairCol: 'pair',
  rateCol: 'rate',
  bidCol: 'bid',
  askCol: 'ask',
};

function parseCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i]!;
    if (inQuotes) {
      if (ch === '"' && line[i + 1] === '"') {
        current += '"';
        i++;
      } else if (ch === '"') {
        inQuotes = false;
      } else {
        current += ch;
      }
    } else {
      if (ch === '"') {
        inQuotes = true;
      } else if (ch === ',') {
        fields.push(current.trim());
        current = '';
      } else {
        current += ch;
      }
    }
  }
  fields.push(current.trim());
  return fields;
}

function parseTimestamp(value: string, lineNum: number): number {
  const num = Number(value);
  if (value !== '' && !Number.isNaN(num)) {
    // 10자리 이하면 초 단위로 간주
    return value.length <= 10 ? num * 1000 : num;
  }
  const ms = Date.parse(value);
  if (Number.isNaN(ms)) {
    throw new Error(`Line ${lineNum}: invalid timestamp "${value}"`);
  }
  return ms;
}

function parsePrice(value: string | undefined, col: string, lineNum: number): number | undefined {
  if (value === undefined || value === '') return undefined;
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) {
    throw new Error(`Line ${lineNum}: ${col} must be a positive number (got "${value}")`);
  }
  return n;
}

/**
 * CSV 텍스트 → PricePoint[] (통화쌍별 시간순)
 * pair 컬럼이 없으면 모든 행이 defaultPair 소속
 * 같은 통화쌍의 중복 timestamp는 오류
 */
export function parsePriceCsv(
  text: string,
  defaultPair?: CurrencyPair,
  options?: CsvLoaderOptions,
): PricePoint[] {
  const opts = { ...DEFAULTS, ...options };
  const lines = text.split(/\r?\n/).filter((l) => l.trim().length > 0);

  if (lines.length < 2) {
    throw new Error('CSV must have header + at least 1 data row');
  }

  const header = parseCsvLine(lines[0]!);
  const ti = header.indexOf(opts.timestampCol);
  if (ti === -1) {
    throw new Error(`Column "${opts.timestampCol}" not found. Available: ${header.join(', ')}`);
  }
  const pi = header.indexOf(opts.pairCol);
  const ri = header.indexOf(opts.rateCol);
  const bi = header.indexOf(opts.bidCol);
  const ai = header.indexOf(opts.askCol);
  if (ri === -1 && (bi === -1 || ai === -1)) {
    throw new Error(`CSV needs a "${opts.rateCol}" column or both "${opts.bidCol}" and "${opts.askCol}"`);
  }
  if (pi === -1 && !defaultPair) {
    throw new Error(`CSV has no "${opts.pairCol}" column and no pair was given`);
  }

  const points: PricePoint[] = [];
  for (let i = 1; i < lines.length; i++) {
    const lineNum = i + 1;
    const fields = parseCsvLine(lines[i]!);
    let pair: CurrencyPair;
    if (pi !== -1) {
      try {
        pair = parsePair(fields[pi] ?? '');
      } catch (err) {
        throw new Error(`Line ${lineNum}: ${err instanceof Error ? err.message : String(err)}`);
      }
    } else if (defaultPair) {
      pair = defaultPair;
    } else {
      continue;
    }
    const quote = {
      rate: ri !== -1 ? parsePrice(fields[ri], opts.rateCol, lineNum) : undefined,
      bid: bi !== -1 ? parsePrice(fields[bi], opts.bidCol, lineNum) : undefined,
      ask: ai !== -1 ? parsePrice(fields[ai], opts.askCol, lineNum) : undefined,
    };
    if (quote.bid !== undefined && quote.ask !== undefined && quote.bid > quote.ask) {
      throw new Error(`Line ${lineNum}: bid (${quote.bid}) > ask (${quote.ask})`);
    }
    if (quote.rate === undefined && (quote.bid === undefined || quote.ask === undefined)) {
      throw new Error(`Line ${lineNum}: missing price`);
    }
    points.push(makePricePoint(pair, parseTimestamp(fields[ti] ?? '', lineNum), quote));
  }

  // 시간순 정렬
  points.sort((a, b) => a.timestamp - b.timestamp);

  // 통화쌍별 중복 타임스탬프 확인
  const lastSeen = new Map<string, number>();
  for (const p of points) {
    const key = formatPair(p.pair);
    if (lastSeen.get(key) === p.timestamp) {
      throw new Error(`Duplicate timestamp for ${key}: ${p.timestamp}`);
    }
    lastSeen.set(key, p.timestamp);
  }

  return points;
}

export function loadPriceCsv(
  filePath: string,
  defaultPair?: CurrencyPair,
  options?: CsvLoaderOptions,
): PricePoint[] {
  return parsePriceCsv(readFileSync(filePath, 'utf-8'), defaultPair, options);
}

/**
 * CSV 파일 기반 과거 시세 소스 (최초 load 시 한 번만 읽음)
 */
export class CsvHistorySource implements HistoricalSource {
  readonly name = 'csv';
  private readonly filePath: string;
  private readonly defaultPair?: CurrencyPair;
  private cache: PricePoint[] | null = null;

  constructor(filePath: string, defaultPair?: CurrencyPair) {
    this.filePath = filePath;
    this.defaultPair = defaultPair;
  }

  async load(pair: CurrencyPair, fromTs: number, toTs: number): Promise<PricePoint[]> {
    this.cache ??= loadPriceCsv(this.filePath, this.defaultPair);
    return this.cache.filter((p) => pairEquals(p.pair, pair) && p.timestamp >= fromTs && p.timestamp <= toTs);
  }
}
