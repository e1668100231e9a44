import type { Dispatcher } from 'undici';
import type { AppConfig } from './config.js';
import { CorrelationEngine } from './correlation/engine.js';
import { CsvHistorySource, loadPriceCsv } from './data/csv-loader.js';
import { PriceArchive } from './data/price-archive.js';
import { openDatabase, type Db } from './db/database.js';
import { EventBus } from './engine/event-bus.js';
import { TradingBot } from './engine/trading-bot.js';
import { BrokerRestClient } from './exchange/rest/client.js';
import type { ExecutionGateway } from './execution/gateway.js';
import { LiveExecutionGateway } from './execution/live-gateway.js';
import { PaperExecutionGateway } from './execution/paper-gateway.js';
import { Ledger } from './ledger/ledger.js';
import { OrderJournal } from './ledger/order-journal.js';
import { configureLogging, createChildLogger } from './logger.js';
import type { HistoricalSource, MarketDataGateway } from './market/gateway.js';
import { PriceSeriesStore } from './market/price-store.js';
import { ReplayMarketDataGateway } from './market/replay-gateway.js';
import { RestMarketDataGateway } from './market/rest-gateway.js';
import { formatDailySummary } from './report/summary.js';
import { AuditLog } from './safety/audit-log.js';
import { correlationWindowMs, createStrategy } from './strategy/factory.js';
import type { Strategy } from './strategy/strategy.js';

const log = createChildLogger('app');

const DAY_MS = 24 * 60 * 60 * 1000;

export interface CreateBotOptions {
  /** 기본: storage.db_path */
  readonly db?: Db;
  /** 테스트에서 undici MockAgent 주입 */
  readonly dispatcher?: Dispatcher;
  /** 시세 게이트웨이 교체 (기본: data_source 설정) */
  readonly market?: MarketDataGateway;
  readonly now?: () => number;
}

export interface BotComponents {
  readonly config: AppConfig;
  readonly db: Db;
  readonly bus: EventBus;
  readonly store: PriceSeriesStore;
  readonly strategy: Strategy;
  readonly correlation: CorrelationEngine | null;
  readonly ledger: Ledger;
  readonly audit: AuditLog;
  readonly archive: PriceArchive;
  readonly journal: OrderJournal;
  readonly market: MarketDataGateway;
  readonly execution: ExecutionGateway;
  readonly historySources: readonly HistoricalSource[];
  readonly bot: TradingBot;
  /** 일일 요약 텍스트 + 오래된 시세 정리 */
  dailyMaintenance(date: Date): string;
  close(): void;
}

/**
 * 설정 → 봇 조립
 * 페이퍼 모드에서는 실거래 게이트웨이를 만들지 않음
 */
export function createBot(config: AppConfig, options: CreateBotOptions = {}): BotComponents {
  configureLogging(config.logging);

  const db = options.db ?? openDatabase(config.storage.dbPath);
  const mode = config.settings.tradeMode;
  const bus = new EventBus();
  const strategy = createStrategy(config.strategy);

  const client = new BrokerRestClient({
    baseUrl: config.api.baseUrl,
    accessKey: config.api.key,
    secretKey: config.api.secret,
    timeoutMs: config.settings.requestTimeoutMs,
    dispatcher: options.dispatcher,
  });

  // ── 시세 소스 + 시계 ──
  let market: MarketDataGateway;
  let now = options.now ?? Date.now;
  const historySources: HistoricalSource[] = [];
  if (options.market) {
    market = options.market;
  } else if (config.settings.dataSource === 'replay' && config.settings.replayFile) {
    const replay = new ReplayMarketDataGateway(loadPriceCsv(config.settings.replayFile, config.strategy.currency));
    market = replay;
    // 재생 모드: 봇 시계를 재생 시각에 맞춤
    now = options.now ?? (() => replay.now());
  } else {
    const rest = new RestMarketDataGateway(client, now);
    market = rest;
    // 일봉 과거 시세는 하루 이상 간격으로 표본을 뽑는 상관 전략에서만 실제 수익률이 됨
    if (config.strategy.name === 'correlation' && config.strategy.sampleIntervalMs >= DAY_MS) {
      historySources.push(rest);
    }
  }

  const archive = new PriceArchive(db);
  historySources.unshift(archive);
  if (config.storage.historyFile) {
    historySources.push(new CsvHistorySource(config.storage.historyFile, config.strategy.currency));
  }

  const store = new PriceSeriesStore({
    retentionMs: strategy.historyMs + 2 * config.settings.checkIntervalSec * 1000,
    maxPoints: 0,
  });

  let correlation: CorrelationEngine | null = null;
  if (config.strategy.name === 'correlation') {
    correlation = new CorrelationEngine({
      windowMs: correlationWindowMs(config.strategy),
      sampleIntervalMs: config.strategy.sampleIntervalMs,
      minSamples: config.strategy.minSamples,
    });
    for (const secondary of config.strategy.secondaryCurrencies) {
      correlation.track(config.strategy.currency, secondary);
    }
  }

  const ledger = new Ledger(
    {
      initialBalance: config.risk.initialBalance,
      maxTradeAmount: config.risk.maxTradeAmount,
      maxPositionsPerPair: config.risk.maxPositionsPerPair,
    },
    bus,
  );
  const audit = new AuditLog(db, mode, now);
  const journal = new OrderJournal(db, mode);
  journal.attach(bus);

  const execution: ExecutionGateway =
    mode === 'live' ? new LiveExecutionGateway(client, { now }) : new PaperExecutionGateway(store, now);

  const retry = (retries: number) => ({ retries, backoffMs: config.settings.retryBackoffMs });
  const bot = new TradingBot(
    {
      tradeMode: mode,
      tradeAmount: config.strategy.tradeAmount,
      updateIntervalMs: config.settings.updateIntervalSec * 1000,
      checkIntervalMs: config.settings.checkIntervalSec * 1000,
      requestTimeoutMs: config.settings.requestTimeoutMs,
      stalenessToleranceMs: config.settings.stalenessToleranceMs,
      fetchRetry: retry(config.settings.fetchRetries),
      orderRetry: retry(config.settings.orderRetries),
    },
    { market, execution, store, strategy, ledger, bus, correlation, audit, archive, now },
  );

  audit.info('app', 'BOT_CREATED', `${mode} ${strategy.id} via ${market.name}/${execution.name}`);
  log.info({ mode, strategy: strategy.id, market: market.name, execution: execution.name }, 'Bot assembled');

  // 아카이브는 워밍업 구간의 2배 또는 최소 7일 보관
  const archiveRetentionMs = Math.max(2 * strategy.historyMs, 7 * DAY_MS);

  return {
    config,
    db,
    bus,
    store,
    strategy,
    correlation,
    ledger,
    audit,
    archive,
    journal,
    market,
    execution,
    historySources,
    bot,
    dailyMaintenance(date: Date): string {
      const ts = date.getTime();
      const text = formatDailySummary(date.toISOString().slice(0, 10), ledger.summary(), audit.countSince(ts - DAY_MS));
      const pruned = archive.prune(ts - archiveRetentionMs);
      if (pruned > 0) log.info({ pruned }, 'Archive pruned');
      return text;
    },
    close(): void {
      journal.detach();
      if (!options.db) db.close();
    },
  };
}
