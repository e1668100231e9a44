#!/usr/bin/env node
import { existsSync, writeFileSync } from 'node:fs';
import { createBot, type BotComponents } from './app.js';
import { defaultConfigIni, loadConfig } from './config.js';
import { startDailySchedule } from './engine/scheduler.js';
import { ConfigError, describeError } from './errors.js';
import { USAGE, parseArgs } from './cli.js';
import { createChildLogger } from './logger.js';

const log = createChildLogger('main');

function init(path: string): number {
  if (existsSync(path)) {
    log.error({ path }, 'Config file already exists');
    return 1;
  }
  writeFileSync(path, defaultConfigIni(), 'utf8');
  log.info({ path }, 'Default config written');
  return 0;
}

async function runOnce(app: BotComponents): Promise<void> {
  await app.bot.warmUp(app.historySources);
  const { check } = await app.bot.runOnce();
  const report = await app.bot.stop();
  log.info({ outcome: check.outcome, pendingOrders: report.pendingOrders }, 'Single run finished');
  app.close();
}

async function runForever(app: BotComponents): Promise<void> {
  await app.bot.warmUp(app.historySources);
  const daily = startDailySchedule((date) => {
    log.info(app.dailyMaintenance(date));
  });
  app.bot.start();

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    log.info({ signal }, 'Shutting down');
    daily.stop();
    app.bot
      .stop()
      .then(() => {
        app.close();
        process.exit(0);
      })
      .catch((err) => {
        log.fatal({ err }, 'Shutdown failed');
        process.exit(1);
      });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

async function main(): Promise<void> {
  const cmd = parseArgs(process.argv.slice(2));
  if (cmd.kind === 'help') {
    console.log(USAGE);
    process.exitCode = 1;
    return;
  }
  if (cmd.kind === 'init') {
    process.exitCode = init(cmd.configPath);
    return;
  }

  // 설정 오류 → 게이트웨이를 만들기 전에 종료
  const config = loadConfig(cmd.configPath);
  log.info(
    { mode: config.settings.tradeMode, strategy: config.strategy.name, config: cmd.configPath },
    'Starting FX trader',
  );
  const app = createBot(config);
  if (cmd.once) {
    await runOnce(app);
    return;
  }
  await runForever(app);
}

main().catch((err) => {
  if (err instanceof ConfigError) {
    log.fatal({ issues: err.issues }, err.message);
  } else {
    log.fatal({ err: describeError(err) }, 'Fatal error');
  }
  process.exit(1);
});
