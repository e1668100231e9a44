export type { CurrencyPair, PricePoint, TradeMode } from './market.js';
export type { SignalDirection, Signal } from './signal.js';
export type {
  OrderSide,
  OrderIntent,
  OrderStatus,
  Order,
  OrderRequest,
  RejectedReason,
  SubmitResult,
  OrderOutcome,
  ExecutionRequest,
} from './order.js';
export type { PositionStatus, Position } from './position.js';
export type { CorrelationEstimate, CorrelationMatrix } from './correlation.js';
export type {
  EventType,
  BaseEvent,
  SignalEvent,
  OrderSubmittedEvent,
  OrderFilledEvent,
  OrderRejectedEvent,
  OrderCancelledEvent,
  PositionOpenedEvent,
  PositionReducedEvent,
  PositionClosedEvent,
  TradingEvent,
} from './event.js';
