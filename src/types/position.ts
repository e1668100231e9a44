import type { CurrencyPair } from './market.js';
import type { OrderSide } from './order.js';

export type PositionStatus = 'OPEN' | 'CLOSED';

export interface Position {
  readonly id: string;
  readonly pair: CurrencyPair;
  readonly direction: OrderSide;
  readonly quantity: number;      // 기준통화 수량
  readonly entryPrice: number;
  readonly openedAt: number;      // Unix ms
  readonly status: PositionStatus;
  readonly closedAt?: number;
  readonly exitPrice?: number;
  /** 호가통화 기준 실현손익 (부분 청산분 누적) */
  readonly realizedPnl?: number;
}
