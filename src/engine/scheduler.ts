import cron from 'node-cron';
import { createChildLogger } from '../logger.js';

const log = createChildLogger('scheduler');

export type OnDailyTick = (date: Date) => void | Promise<void>;

export interface DailySchedule {
  stop(): void;
}

/** 매일 00:00 UTC */
export const DAILY_CRON = '0 0 * * *';

/**
 * 일일 작업 스케줄 (요약 리포트, 시세 아카이브 정리)
 * 콜백 오류는 로그만 남김
 */
export function startDailySchedule(onTick: OnDailyTick, expression: string = DAILY_CRON): DailySchedule {
  if (!cron.validate(expression)) {
    throw new Error(`Invalid cron expression: ${expression}`);
  }
  const task = cron.schedule(
    expression,
    () => {
      const now = new Date();
      log.info({ date: now.toISOString().slice(0, 10) }, 'Daily tick');
      Promise.resolve()
        .then(() => onTick(now))
        .catch((err) => {
          log.error({ err }, 'Daily callback error');
        });
    },
    { timezone: 'UTC' },
  );
  log.info({ expression }, 'Daily scheduler started');
  return {
    stop: () => {
      task.stop();
      log.info('Daily scheduler stopped');
    },
  };
}
