import type { Contract, ContractDetails, Order } from '@stoqey/ib';

/**
 * ドメイン層: ゲートウェイから届くコールバックの種類
 */
export type CallbackEvent =
  | 'connected'
  | 'disconnected'
  | 'error'
  | 'info'
  | 'currentTime'
  | 'nextValidId'
  | 'managedAccounts'
  | 'accountSummary'
  | 'accountSummaryEnd'
  | 'position'
  | 'positionEnd'
  | 'openOrder'
  | 'openOrderEnd'
  | 'contractDetails'
  | 'contractDetailsEnd'
  | 'orderStatus'
  | 'tickPrice'
  | 'tickSize';

/**
 * ライブラリが通知したエラー。error は受け取ったオブジェクトをそのまま保持する。
 */
export interface GatewayErrorEvent {
  error: Error;
  code: number;
  reqId: number;
}

export interface AccountSummaryEntry {
  reqId: number;
  account: string;
  tag: string;
  value: string;
  currency: string;
}

export interface PositionEntry {
  account: string;
  contract: Contract;
  position: number;
  avgCost?: number;
}

export interface OpenOrderEvent {
  orderId: number;
  contract: Contract;
  order: Order;
}

export interface ContractDetailsEvent {
  reqId: number;
  details: ContractDetails;
}

export interface OrderStatusUpdate {
  orderId: number;
  status: string;
  filled: number;
  remaining: number;
  avgFillPrice: number;
  permId?: number;
  lastFillPrice?: number;
}

/**
 * field は TWS の TickType 番号（例: 1 = BID, 2 = ASK, 4 = LAST）
 */
export interface TickPriceEvent {
  tickerId: number;
  field: number;
  price: number;
}

export interface TickSizeEvent {
  tickerId: number;
  field: number;
  size: number;
}
