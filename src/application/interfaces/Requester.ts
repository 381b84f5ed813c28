import type { Contract, Order } from '@stoqey/ib';

/**
 * アプリケーション層: ゲートウェイへの送信側の契約
 *
 * 責務: TWS / IB Gateway へ送るリクエストの一覧を定義する。
 * 各操作は外部ライブラリにそのまま委譲され、検証や応答の突き合わせは行わない。
 * 未接続時の失敗などはライブラリがエラーコールバックで通知する。
 */
export interface Requester {
  /**
   * 現在ゲートウェイと接続しているか
   */
  readonly isConnected: boolean;

  /**
   * ゲートウェイへの接続を開始する。結果は CallbackSink.onConnected / onError で届く。
   */
  connect(): void;

  disconnect(): void;

  reqCurrentTime(): void;

  /**
   * 次に使える注文 ID を要求する（応答は onNextValidId）。
   */
  reqIds(): void;

  reqManagedAccts(): void;

  /**
   * @param reqId リクエスト ID（応答の reqId と一致する）
   * @param group アカウントグループ（通常は 'All'）
   * @param tags カンマ区切りのタグ（例: 'NetLiquidation,TotalCashValue'）
   */
  reqAccountSummary(reqId: number, group: string, tags: string): void;

  cancelAccountSummary(reqId: number): void;

  reqPositions(): void;

  cancelPositions(): void;

  reqOpenOrders(): void;

  reqContractDetails(reqId: number, contract: Contract): void;

  /**
   * @param reqId ティッカー ID（onTickPrice / onTickSize の tickerId）
   * @param contract 対象の銘柄
   * @param genericTickList 追加で受け取るティック種別（カンマ区切り、不要なら空文字）
   * @param snapshot true の場合は一度だけ配信して終了する
   * @param regulatorySnapshot 規制スナップショット（有料）を要求するか
   */
  reqMktData(
    reqId: number,
    contract: Contract,
    genericTickList: string,
    snapshot: boolean,
    regulatorySnapshot: boolean
  ): void;

  cancelMktData(reqId: number): void;

  placeOrder(orderId: number, contract: Contract, order: Order): void;

  cancelOrder(orderId: number): void;
}
