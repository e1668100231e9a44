import type { TradingEvent, EventType } from '../types/index.js';

export type EventOf<T extends EventType> = Extract<TradingEvent, { type: T }>;

type EventHandler = (event: TradingEvent) => void;

function isEventOf<T extends EventType>(event: TradingEvent, type: T): event is EventOf<T> {
  return event.type === type;
}

const DEFAULT_MAX_LOG = 10_000;

/**
 * 타입드 이벤트 버스 — 최근 이벤트 로그 보관 (maxLog 초과분은 앞에서 버림)
 */
export class EventBus {
  private handlers: Map<EventType, EventHandler[]> = new Map();
  private log: TradingEvent[] = [];
  private readonly maxLog: number;

  constructor(maxLog: number = DEFAULT_MAX_LOG) {
    this.maxLog = maxLog;
  }

  /** @returns 구독 해제 함수 */
  on<T extends EventType>(type: T, handler: (event: EventOf<T>) => void): () => void {
    const wrapped: EventHandler = (event) => {
      if (isEventOf(event, type)) handler(event);
    };
    const list = this.handlers.get(type) ?? [];
    list.push(wrapped);
    this.handlers.set(type, list);
    return () => {
      const current = this.handlers.get(type);
      if (current) this.handlers.set(type, current.filter((h) => h !== wrapped));
    };
  }

  emit(event: TradingEvent): void {
    this.log.push(event);
    if (this.log.length > this.maxLog) {
      this.log.splice(0, this.log.length - this.maxLog);
    }
    const handlers = this.handlers.get(event.type);
    if (handlers) {
      for (const h of handlers) {
        h(event);
      }
    }
  }

  getLog(): readonly TradingEvent[] {
    return this.log;
  }

  clearLog(): void {
    this.log = [];
  }

  reset(): void {
    this.handlers.clear();
    this.log = [];
  }
}
