import { createChildLogger } from '../logger.js';

const log = createChildLogger('state-machine');

export type BotState = 'IDLE' | 'FETCHING' | 'RECONCILING' | 'EVALUATING' | 'DECIDING' | 'EXECUTING' | 'STOPPED';

type StateTransition = [BotState, BotState];

/** 허용된 상태 전이 */
const VALID_TRANSITIONS: StateTransition[] = [
  ['IDLE', 'FETCHING'],
  ['FETCHING', 'IDLE'],
  ['IDLE', 'RECONCILING'],             // 결과 불명 주문 조회
  ['RECONCILING', 'IDLE'],
  ['IDLE', 'EVALUATING'],
  ['EVALUATING', 'DECIDING'],
  ['EVALUATING', 'IDLE'],              // HOLD / 데이터 부족
  ['DECIDING', 'EXECUTING'],
  ['DECIDING', 'IDLE'],                // 할 일 없음 / 원장 거부
  ['EXECUTING', 'IDLE'],
  // 정지: 어디서든 STOPPED로 (종료 상태)
  ['IDLE', 'STOPPED'],
  ['FETCHING', 'STOPPED'],
  ['RECONCILING', 'STOPPED'],
  ['EVALUATING', 'STOPPED'],
  ['DECIDING', 'STOPPED'],
  ['EXECUTING', 'STOPPED'],
];

/**
 * 봇 제어 루프 상태 머신
 * 잘못된 전이 시도 시 에러 (안전장치)
 */
export class BotStateMachine {
  private state: BotState = 'IDLE';
  private stateEnteredAt: number;
  private history: Array<{ from: BotState; to: BotState; at: number }> = [];
  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
    this.stateEnteredAt = now();
  }

  get current(): BotState {
    return this.state;
  }

  get stateAge(): number {
    return this.now() - this.stateEnteredAt;
  }

  transition(to: BotState): void {
    if (this.state === to) return; // noop

    if (!this.canTransition(to)) {
      const msg = `Invalid state transition: ${this.state} → ${to}`;
      log.error({ from: this.state, to }, msg);
      throw new Error(msg);
    }

    log.debug({ from: this.state, to }, 'State transition');
    const at = this.now();
    this.history.push({ from: this.state, to, at });
    this.state = to;
    this.stateEnteredAt = at;

    // 히스토리 100개 제한
    if (this.history.length > 100) {
      this.history = this.history.slice(-50);
    }
  }

  canTransition(to: BotState): boolean {
    return VALID_TRANSITIONS.some(([from, target]) => from === this.state && target === to);
  }

  isStopped(): boolean {
    return this.state === 'STOPPED';
  }

  isIdle(): boolean {
    return this.state === 'IDLE';
  }

  getHistory(): ReadonlyArray<{ from: BotState; to: BotState; at: number }> {
    return this.history;
  }

  reset(): void {
    this.state = 'IDLE';
    this.stateEnteredAt = this.now();
    this.history = [];
  }
}
