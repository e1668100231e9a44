import type { Order } from './order.js';
import type { Position } from './position.js';
import type { Signal } from './signal.js';

export type EventType =
  | 'SIGNAL'
  | 'ORDER_SUBMITTED'
  | 'ORDER_FILLED'
  | 'ORDER_REJECTED'
  | 'ORDER_CANCELLED'
  | 'POSITION_OPENED'
  | 'POSITION_REDUCED'
  | 'POSITION_CLOSED';

export interface BaseEvent {
  readonly type: EventType;
  readonly timestamp: number;
}

export interface SignalEvent extends BaseEvent {
  readonly type: 'SIGNAL';
  readonly signal: Signal;
}

export interface OrderSubmittedEvent extends BaseEvent {
  readonly type: 'ORDER_SUBMITTED';
  readonly order: Order;
}

export interface OrderFilledEvent extends BaseEvent {
  readonly type: 'ORDER_FILLED';
  readonly order: Order;
}

export interface OrderRejectedEvent extends BaseEvent {
  readonly type: 'ORDER_REJECTED';
  readonly order: Order;
}

export interface OrderCancelledEvent extends BaseEvent {
  readonly type: 'ORDER_CANCELLED';
  readonly order: Order;
}

export interface PositionOpenedEvent extends BaseEvent {
  readonly type: 'POSITION_OPENED';
  readonly position: Position;
}

/** 부분 청산 — 포지션은 줄어든 수량으로 OPEN 유지 */
export interface PositionReducedEvent extends BaseEvent {
  readonly type: 'POSITION_REDUCED';
  readonly position: Position;
}

export interface PositionClosedEvent extends BaseEvent {
  readonly type: 'POSITION_CLOSED';
  readonly position: Position;
}

export type TradingEvent =
  | SignalEvent
  | OrderSubmittedEvent
  | OrderFilledEvent
  | OrderRejectedEvent
  | OrderCancelledEvent
  | PositionOpenedEvent
  | PositionReducedEvent
  | PositionClosedEvent;
