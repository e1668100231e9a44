import dotenv from 'dotenv';
import ini from 'ini';
import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { normalizeLogLevel, type LogLevel } from './logger.js';
import { parsePair, parsePairList } from './market/pair.js';
import type { CurrencyPair, TradeMode } from './types/index.js';

export type StrategyName = 'simple' | 'advanced' | 'correlation';
export type SimpleDirection = 'momentum' | 'reversal';
export type IndicatorName = 'threshold' | 'ema_cross' | 'rsi' | 'sma_trend';
export type CombineRule = 'majority' | 'weighted';
export type CorrelationPolicyName = 'divergence' | 'breakdown';
export type DataSourceName = 'rest' | 'replay';

export interface AppConfig {
  readonly api: {
    readonly key: string;
    readonly secret: string;
    readonly baseUrl: string;
  };
  readonly settings: {
    readonly updateIntervalSec: number;
    readonly checkIntervalSec: number;
    readonly tradeMode: TradeMode;
    readonly requestTimeoutMs: number;
    readonly stalenessToleranceMs: number;
    readonly fetchRetries: number;
    readonly orderRetries: number;
    readonly retryBackoffMs: number;
    readonly dataSource: DataSourceName;
    readonly replayFile?: string;
  };
  readonly strategy: {
    readonly name: StrategyName;
    readonly currency: CurrencyPair;
    readonly threshold: number;
    readonly tradeAmount: number;
    readonly direction: SimpleDirection;
    readonly lookbackMs: number;
    readonly secondaryCurrencies: readonly CurrencyPair[];
    readonly correlationWindowDays: number;
    readonly minCorrelation: number;
    readonly minSamples: number;
    readonly sampleIntervalMs: number;
    readonly signalPolicy: CorrelationPolicyName;
    readonly breakdownDeviation: number;
    readonly indicators: readonly IndicatorName[];
    readonly combine: CombineRule;
    readonly weights: readonly number[];
    readonly voteThreshold: number;
    readonly emaFast: number;
    readonly emaSlow: number;
    readonly rsiPeriod: number;
    readonly rsiOversold: number;
    readonly rsiOverbought: number;
    readonly smaPeriod: number;
  };
  readonly risk: {
    readonly initialBalance: number;
    readonly maxTradeAmount: number;
    readonly maxPositionsPerPair: number;
  };
  readonly storage: {
    readonly dbPath: string;
    readonly historyFile?: string;
  };
  readonly logging: {
    readonly level: LogLevel;
    readonly file?: string;
  };
}

const DEFAULT_BASE_URL = 'https://api.example.com';
const DEFAULT_DB_PATH = './data/fx-trader.db';

// ─── 공용 필드 ──────────────────────────────────────────────────────────

const optionalText = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v.trim() === '' ? undefined : v.trim()));

const posInt = z.coerce.number().int().positive();
const nonNegInt = z.coerce.number().int().nonnegative();
const posNumber = z.coerce.number().positive();

const pairField = z.string().transform((v, ctx) => {
  try {
    return parsePair(v);
  } catch (err) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: err instanceof Error ? err.message : String(err) });
    return z.NEVER;
  }
});

const pairListField = z
  .string()
  .default('')
  .transform((v, ctx) => {
    try {
      return parsePairList(v);
    } catch (err) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: err instanceof Error ? err.message : String(err) });
      return z.NEVER;
    }
  });

function csvList(v: string): string[] {
  return v
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

// ─── 섹션 ──────────────────────────────────────────────────────────────

const apiSection = z.object({
  key: z.string().default(''),
  secret: z.string().default(''),
  base_url: z.string().url().default(DEFAULT_BASE_URL),
});

const settingsSection = z.object({
  update_interval: posInt,
  check_interval: posInt,
  trade_mode: z.enum(['paper', 'live']),
  request_timeout: posNumber.default(10),
  staleness_tolerance: z.coerce.number().nonnegative().default(0),
  fetch_retries: nonNegInt.default(0),
  order_retries: nonNegInt.default(0),
  retry_backoff_ms: nonNegInt.default(500),
  data_source: z.enum(['rest', 'replay']).default('rest'),
  replay_file: optionalText,
});

const strategySection = z.object({
  name: z.enum(['simple', 'advanced', 'correlation']),
  currency: pairField,
  threshold: posNumber,
  trade_amount: posNumber.default(1000),
  direction: z.enum(['momentum', 'reversal']).default('momentum'),
  lookback: posInt.optional(),
  secondary_currencies: pairListField,
  correlation_window: posInt.default(30),
  min_correlation: z.coerce.number().min(0).max(1).default(0.5),
  min_samples: z.coerce.number().int().min(3).default(20),
  sample_interval: posInt.optional(),
  signal_policy: z.enum(['divergence', 'breakdown']).default('divergence'),
  breakdown_deviation: z.coerce.number().positive().max(2).default(0.3),
  indicators: z
    .string()
    .default('threshold,ema_cross,rsi')
    .transform(csvList)
    .pipe(z.array(z.enum(['threshold', 'ema_cross', 'rsi', 'sma_trend'])).min(1)),
  combine: z.enum(['majority', 'weighted']).default('majority'),
  weights: z
    .string()
    .default('')
    .transform(csvList)
    .pipe(z.array(z.coerce.number().nonnegative())),
  vote_threshold: z.coerce.number().min(0).max(1).default(0.5),
  ema_fast: posInt.default(12),
  ema_slow: posInt.default(26),
  rsi_period: posInt.default(14),
  rsi_oversold: z.coerce.number().min(0).max(100).default(30),
  rsi_overbought: z.coerce.number().min(0).max(100).default(70),
  sma_period: posInt.default(20),
});

const riskSection = z.object({
  initial_balance: posNumber.default(100_000),
  max_trade_amount: posNumber.optional(),
  max_positions_per_pair: posInt.default(1),
});

const storageSection = z.object({
  db_path: z.string().min(1).default(DEFAULT_DB_PATH),
  history_file: optionalText,
});

const loggingSection = z.object({
  level: z
    .string()
    .default('info')
    .transform((v, ctx) => {
      const level = normalizeLogLevel(v);
      if (level === null) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown log level "${v}"` });
        return z.NEVER;
      }
      return level;
    }),
  file: optionalText,
});

const rawConfigSchema = z
  .object({
    API: apiSection.default({}),
    Settings: settingsSection,
    Strategy: strategySection,
    Risk: riskSection.default({}),
    Storage: storageSection.default({}),
    Logging: loggingSection.default({}),
  })
  .superRefine((c, ctx) => {
    const s = c.Strategy;
    if (s.name === 'correlation') {
      if (s.secondary_currencies.length === 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['Strategy', 'secondary_currencies'],
          message: 'required for the correlation strategy',
        });
      }
      if (s.secondary_currencies.some((p) => p.base === s.currency.base && p.quote === s.currency.quote)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['Strategy', 'secondary_currencies'],
          message: 'must not contain the primary currency pair',
        });
      }
    }
    if (s.name === 'advanced') {
      if (s.ema_fast >= s.ema_slow) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['Strategy', 'ema_fast'], message: 'must be < ema_slow' });
      }
      if (s.rsi_oversold >= s.rsi_overbought) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['Strategy', 'rsi_oversold'],
          message: 'must be < rsi_overbought',
        });
      }
      if (s.combine === 'weighted' && s.weights.length > 0 && s.weights.length !== s.indicators.length) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['Strategy', 'weights'],
          message: `expected ${s.indicators.length} weights (one per indicator)`,
        });
      }
    }
    const cap = c.Risk.max_trade_amount ?? s.trade_amount;
    if (s.trade_amount > cap) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['Strategy', 'trade_amount'],
        message: `exceeds Risk.max_trade_amount (${cap})`,
      });
    }
    if (c.Settings.trade_mode === 'live' && c.Settings.data_source === 'replay') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['Settings', 'data_source'],
        message: 'replay data cannot drive live trading',
      });
    }
    if (c.Settings.data_source === 'replay' && !c.Settings.replay_file) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['Settings', 'replay_file'],
        message: 'required when data_source = replay',
      });
    }
    if (c.Settings.trade_mode === 'live' && (!c.API.key || !c.API.secret)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['API'], message: 'key and secret required in live mode' });
    }
  });

type RawConfig = z.infer<typeof rawConfigSchema>;

function toAppConfig(raw: RawConfig): AppConfig {
  const s = raw.Strategy;
  const checkMs = raw.Settings.check_interval * 1000;
  const weights = s.weights.length > 0 ? s.weights : s.indicators.map(() => 1);
  return {
    api: { key: raw.API.key, secret: raw.API.secret, baseUrl: raw.API.base_url },
    settings: {
      updateIntervalSec: raw.Settings.update_interval,
      checkIntervalSec: raw.Settings.check_interval,
      tradeMode: raw.Settings.trade_mode,
      requestTimeoutMs: Math.round(raw.Settings.request_timeout * 1000),
      stalenessToleranceMs: Math.round(raw.Settings.staleness_tolerance * 1000),
      fetchRetries: raw.Settings.fetch_retries,
      orderRetries: raw.Settings.order_retries,
      retryBackoffMs: raw.Settings.retry_backoff_ms,
      dataSource: raw.Settings.data_source,
      replayFile: raw.Settings.replay_file,
    },
    strategy: {
      name: s.name,
      currency: s.currency,
      threshold: s.threshold,
      tradeAmount: s.trade_amount,
      direction: s.direction,
      lookbackMs: s.lookback !== undefined ? s.lookback * 1000 : checkMs,
      secondaryCurrencies: s.secondary_currencies,
      correlationWindowDays: s.correlation_window,
      minCorrelation: s.min_correlation,
      minSamples: s.min_samples,
      sampleIntervalMs: (s.sample_interval ?? raw.Settings.update_interval) * 1000,
      signalPolicy: s.signal_policy,
      breakdownDeviation: s.breakdown_deviation,
      indicators: s.indicators,
      combine: s.combine,
      weights,
      voteThreshold: s.vote_threshold,
      emaFast: s.ema_fast,
      emaSlow: s.ema_slow,
      rsiPeriod: s.rsi_period,
      rsiOversold: s.rsi_oversold,
      rsiOverbought: s.rsi_overbought,
      smaPeriod: s.sma_period,
    },
    risk: {
      initialBalance: raw.Risk.initial_balance,
      maxTradeAmount: raw.Risk.max_trade_amount ?? s.trade_amount,
      maxPositionsPerPair: raw.Risk.max_positions_per_pair,
    },
    storage: { dbPath: raw.Storage.db_path, historyFile: raw.Storage.history_file },
    logging: { level: raw.Logging.level, file: raw.Logging.file },
  };
}

function deepFreeze<T>(obj: T): T {
  if (obj !== null && typeof obj === 'object' && !Object.isFrozen(obj)) {
    Object.freeze(obj);
    for (const v of Object.values(obj)) deepFreeze(v);
  }
  return obj;
}

/** 환경변수 → [API] 덮어쓰기 */
function applyEnvOverrides(parsed: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const api: Record<string, unknown> = isRecord(parsed.API) ? { ...parsed.API } : {};
  if (env.FX_API_KEY) api.key = env.FX_API_KEY;
  if (env.FX_API_SECRET) api.secret = env.FX_API_SECRET;
  if (env.FX_API_BASE_URL) api.base_url = env.FX_API_BASE_URL;
  return { ...parsed, API: api };
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message));
}

/**
 * INI 텍스트 → 검증된 불변 설정
 * @throws ConfigError 누락/잘못된 설정
 */
export function parseConfig(text: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = applyEnvOverrides(ini.parse(text), env);
  const result = rawConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError('Invalid configuration', formatIssues(result.error));
  }
  return deepFreeze(toAppConfig(result.data));
}

/**
 * 설정 파일 로드. .env(있으면)를 먼저 읽어 API 키 덮어쓰기에 사용
 */
export function loadConfig(path: string): AppConfig {
  dotenv.config();
  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseConfig(text);
}

/** `fx-trader init` 이 쓰는 기본 설정 */
export function defaultConfigIni(): string {
  return ini.stringify({
    API: { key: 'demo', secret: 'demo' },
    Settings: { update_interval: 60, check_interval: 300, trade_mode: 'paper' },
    Strategy: { name: 'simple', currency: 'USD/JPY', threshold: 0.5, trade_amount: 1000 },
    Logging: { level: 'info' },
  });
}
