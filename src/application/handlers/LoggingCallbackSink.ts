import type { CallbackSink } from '@/application/interfaces/CallbackSink';
import type { Logger } from '@/application/interfaces/Logger';
import type {
  AccountSummaryEntry,
  ContractDetailsEvent,
  GatewayErrorEvent,
  OpenOrderEvent,
  OrderStatusUpdate,
  PositionEntry,
  TickPriceEvent,
  TickSizeEvent,
} from '@/domain/types';

/**
 * 情報通知として扱うエラーコードの範囲（2104: market data farm connection is OK など）
 */
const INFO_CODE_MIN = 2100;
const INFO_CODE_MAX = 2169;

export function isInformationalCode(code: number): boolean {
  return code >= INFO_CODE_MIN && code <= INFO_CODE_MAX;
}

/**
 * アプリケーション層: CallbackSink の既定実装
 *
 * 責務: 受信したコールバックをログに記録するだけ。
 * 実際の処理が必要なハンドラはサブクラス（Connector の派生クラスなど）で上書きする。
 */
export class LoggingCallbackSink implements CallbackSink {
  constructor(protected readonly logger: Logger) {}

  onConnected(): void {
    this.logger.info('connected to gateway');
  }

  onDisconnected(): void {
    this.logger.info('disconnected from gateway');
  }

  onError({ error, code, reqId }: GatewayErrorEvent): void {
    if (isInformationalCode(code)) {
      this.logger.info(error.message, { code, reqId });
      return;
    }
    this.logger.error('gateway error', { err: error, code, reqId });
  }

  onCurrentTime(time: number): void {
    this.logger.debug('currentTime', { time });
  }

  onNextValidId(orderId: number): void {
    this.logger.debug('nextValidId', { orderId });
  }

  onManagedAccounts(accounts: string[]): void {
    this.logger.debug('managedAccounts', { accounts });
  }

  onAccountSummary(entry: AccountSummaryEntry): void {
    this.logger.debug('accountSummary', { ...entry });
  }

  onAccountSummaryEnd(reqId: number): void {
    this.logger.debug('accountSummaryEnd', { reqId });
  }

  onPosition({ account, contract, position, avgCost }: PositionEntry): void {
    this.logger.debug('position', { account, symbol: contract.symbol, position, avgCost });
  }

  onPositionEnd(): void {
    this.logger.debug('positionEnd');
  }

  onOpenOrder({ orderId, contract, order }: OpenOrderEvent): void {
    this.logger.debug('openOrder', { orderId, symbol: contract.symbol, action: order.action });
  }

  onOpenOrderEnd(): void {
    this.logger.debug('openOrderEnd');
  }

  onContractDetails({ reqId, details }: ContractDetailsEvent): void {
    this.logger.debug('contractDetails', { reqId, symbol: details.contract?.symbol });
  }

  onContractDetailsEnd(reqId: number): void {
    this.logger.debug('contractDetailsEnd', { reqId });
  }

  onOrderStatus(update: OrderStatusUpdate): void {
    this.logger.debug('orderStatus', { ...update });
  }

  onTickPrice(tick: TickPriceEvent): void {
    this.logger.debug('tickPrice', { ...tick });
  }

  onTickSize(tick: TickSizeEvent): void {
    this.logger.debug('tickSize', { ...tick });
  }
}
