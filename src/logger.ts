import pino from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

/** INI 설정에서 흔히 쓰는 별칭 → pino 레벨 */
const LEVEL_ALIASES: Record<string, LogLevel> = {
  warning: 'warn',
  critical: 'fatal',
  err: 'error',
};

export function normalizeLogLevel(value: string): LogLevel | null {
  const v = value.trim().toLowerCase();
  const alias = LEVEL_ALIASES[v];
  if (alias) return alias;
  return LEVELS.find((l) => l === v) ?? null;
}

const streams = pino.multistream([
  { level: 'trace', stream: pino.destination(1) }, // stdout
]);

export const logger = pino(
  {
    level: normalizeLogLevel(process.env.LOG_LEVEL ?? 'info') ?? 'info',
    formatters: {
      level(label) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  streams,
);

// child는 생성 시점 레벨을 복사하므로 재설정 시 함께 갱신
const children = new Set<pino.Logger>();

export function createChildLogger(module: string): pino.Logger {
  const child = logger.child({ module });
  children.add(child);
  return child;
}

/**
 * [Logging] 섹션 적용 — 레벨 변경 + 파일 출력 추가
 */
export function configureLogging(options: { level: LogLevel; file?: string }): void {
  logger.level = options.level;
  for (const child of children) {
    child.level = options.level;
  }
  if (options.file) {
    streams.add({
      level: 'trace',
      stream: pino.destination({ dest: options.file, mkdir: true, sync: false }),
    });
  }
}
