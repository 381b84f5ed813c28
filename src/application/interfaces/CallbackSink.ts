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
 * アプリケーション層: ゲートウェイからの受信側の契約
 *
 * 責務: 外部ライブラリのトランスポートが呼び出すハンドラを定義する。
 * Requester から発行したリクエストの応答や、ゲートウェイ発のイベントはすべてここに届く。
 */
export interface CallbackSink {
  onConnected(): void;

  onDisconnected(): void;

  /**
   * ライブラリが通知したエラー（情報メッセージを含む）を受け取る。
   * @param event エラーオブジェクト・エラーコード・対象リクエスト ID（無い場合は -1）
   */
  onError(event: GatewayErrorEvent): void;

  /**
   * @param time ゲートウェイの現在時刻（UNIX 秒）
   */
  onCurrentTime(time: number): void;

  onNextValidId(orderId: number): void;

  onManagedAccounts(accounts: string[]): void;

  onAccountSummary(entry: AccountSummaryEntry): void;

  onAccountSummaryEnd(reqId: number): void;

  onPosition(entry: PositionEntry): void;

  onPositionEnd(): void;

  onOpenOrder(event: OpenOrderEvent): void;

  onOpenOrderEnd(): void;

  onContractDetails(event: ContractDetailsEvent): void;

  onContractDetailsEnd(reqId: number): void;

  onOrderStatus(update: OrderStatusUpdate): void;

  onTickPrice(tick: TickPriceEvent): void;

  onTickSize(tick: TickSizeEvent): void;
}
