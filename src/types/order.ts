import type { CurrencyPair, TradeMode } from './market.js';

export type OrderSide = 'BUY' | 'SELL';
export type OrderIntent = 'OPEN' | 'CLOSE';
export type OrderStatus = 'PENDING' | 'FILLED' | 'REJECTED' | 'CANCELLED';

export interface Order {
  readonly id: string;
  /** CLOSE 주문은 대상 포지션, OPEN 주문은 체결 후 생성된 포지션 */
  readonly positionId: string | null;
  readonly pair: CurrencyPair;
  readonly side: OrderSide;
  readonly intent: OrderIntent;
  readonly quantity: number;
  readonly requestedPrice: number;
  readonly status: OrderStatus;
  readonly submittedAt: number;
  readonly resolvedAt?: number;
  readonly fillPrice?: number;
  /** 체결 수량 (부분 체결이면 quantity보다 작음) */
  readonly filledQuantity?: number;
  readonly reason?: string;
  /** 실행 결과 불명 (타임아웃) → 외부 조회로 확정 필요 */
  readonly needsReconciliation: boolean;
}

export interface OrderRequest {
  readonly pair: CurrencyPair;
  readonly side: OrderSide;
  readonly intent: OrderIntent;
  readonly quantity: number;
  readonly requestedPrice: number;
  /** CLOSE 시 청산 대상 */
  readonly positionId?: string;
  readonly timestamp: number;
}

export type RejectedReason =
  | 'INVALID_QUANTITY'
  | 'AMOUNT_EXCEEDS_CAP'
  | 'POSITION_OPEN'
  | 'ORDER_PENDING'
  | 'INSUFFICIENT_FUNDS'
  | 'NO_OPEN_POSITION';

export type SubmitResult =
  | { readonly ok: true; readonly orderId: string }
  | { readonly ok: false; readonly reason: RejectedReason };

/** 실행 게이트웨이 응답 → 원장 정산 입력 */
export type OrderOutcome =
  | {
      readonly status: 'FILLED';
      readonly price: number;
      /** 생략 시 주문 수량 전량 */
      readonly quantity?: number;
      readonly timestamp: number;
      readonly brokerOrderId?: string;
    }
  | { readonly status: 'REJECTED'; readonly reason: string; readonly timestamp: number }
  | { readonly status: 'CANCELLED'; readonly reason?: string; readonly timestamp: number };

export interface ExecutionRequest {
  readonly clientOrderId: string;
  readonly pair: CurrencyPair;
  readonly side: OrderSide;
  readonly quantity: number;
  /** 주문 기준가 (최근 시세) */
  readonly price: number;
  readonly mode: TradeMode;
}
