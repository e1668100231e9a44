import { z } from 'zod';

const timestampSchema = z.union([z.number(), z.string()]);

// ─── PUBLIC 응답 ───────────────────────────────────────────────────────────

export const exchangeRateSchema = z
  .object({
    rate: z.number().positive().optional(),
    bid: z.number().positive().optional(),
    ask: z.number().positive().optional(),
    timestamp: timestampSchema.optional(),
  })
  .refine((v) => v.rate !== undefined || (v.bid !== undefined && v.ask !== undefined), {
    message: 'rate or bid/ask required',
  });
export type ExchangeRateResponse = z.infer<typeof exchangeRateSchema>;

export const historicalRateItemSchema = z.object({
  date: z.string(),
  rate: z.number().positive(),
});
export const historicalRatesSchema = z.object({
  rates: z.array(historicalRateItemSchema).default([]),
});

// ─── PRIVATE 응답 ───────────────────────────────────────────────────────────

export const tradeResponseSchema = z.object({
  success: z.boolean(),
  transaction_id: z.string().optional(),
  price: z.number().positive().optional(),
  amount: z.number().positive().optional(),
  timestamp: timestampSchema.optional(),
  error: z.string().optional(),
});
export type TradeResponse = z.infer<typeof tradeResponseSchema>;

export const tradeStatusSchema = z.object({
  status: z.enum(['pending', 'filled', 'rejected', 'cancelled']),
  price: z.number().positive().optional(),
  amount: z.number().positive().optional(),
  timestamp: timestampSchema.optional(),
  reason: z.string().optional(),
});
export type TradeStatusResponse = z.infer<typeof tradeStatusSchema>;

/**
 * 숫자(초/ms) 또는 ISO 문자열 → Unix ms
 * 10자리 이하 숫자는 초 단위로 간주
 */
export function parseTimestamp(value: number | string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  if (typeof value === 'number') {
    return value < 1e11 ? value * 1000 : value;
  }
  const num = Number(value);
  if (value.trim() !== '' && !Number.isNaN(num)) {
    return parseTimestamp(num, fallback);
  }
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? fallback : ms;
}
