import type { ExecutionRequest, OrderOutcome } from '../types/index.js';

/**
 * 실행 게이트웨이 — 브로커 주문
 * 확정 실패는 ExecutionFailureError, 결과 불명은 GatewayTimeoutError 또는 outcomeUnknown 플래그
 */
export interface ExecutionGateway {
  readonly name: string;
  submitOrder(request: ExecutionRequest): Promise<OrderOutcome>;
  /**
   * 결과 불명 주문 조회 — 아직 처리 중이면 null
   * 지원하지 않는 게이트웨이는 구현하지 않음
   */
  lookupOrder?(clientOrderId: string): Promise<OrderOutcome | null>;
}
