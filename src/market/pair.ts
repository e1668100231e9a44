import type { CurrencyPair } from '../types/index.js';

const CODE = /^[A-Z]{3}$/;

/**
 * "USD/JPY" → CurrencyPair (대소문자/공백 허용, 결과는 대문자)
 * 형식이 틀리면 throw
 */
export function parsePair(text: string): CurrencyPair {
  const parts = text.trim().toUpperCase().split('/');
  if (parts.length !== 2) {
    throw new Error(`Invalid currency pair "${text}" (expected BASE/QUOTE)`);
  }
  const base = parts[0]!.trim();
  const quote = parts[1]!.trim();
  if (!CODE.test(base) || !CODE.test(quote)) {
    throw new Error(`Invalid currency pair "${text}" (codes must be 3 letters)`);
  }
  if (base === quote) {
    throw new Error(`Invalid currency pair "${text}" (base equals quote)`);
  }
  return Object.freeze({ base, quote });
}

export function formatPair(pair: CurrencyPair): string {
  return `${pair.base}/${pair.quote}`;
}

export function pairEquals(a: CurrencyPair, b: CurrencyPair): boolean {
  return a.base === b.base && a.quote === b.quote;
}

/** 두 통화쌍의 순서 무관 키 — 상관 행렬용 */
export function pairKey(a: CurrencyPair, b: CurrencyPair): string {
  const ka = formatPair(a);
  const kb = formatPair(b);
  return ka < kb ? `${ka}|${kb}` : `${kb}|${ka}`;
}

/** 쉼표 구분 목록 → 중복 제거된 통화쌍 배열 */
export function parsePairList(text: string): CurrencyPair[] {
  const out: CurrencyPair[] = [];
  for (const item of text.split(',')) {
    if (item.trim().length === 0) continue;
    const pair = parsePair(item);
    if (!out.some((p) => pairEquals(p, pair))) out.push(pair);
  }
  return out;
}
