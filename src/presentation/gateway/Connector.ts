import type { Contract, Order } from '@stoqey/ib';
import { LoggingCallbackSink } from '@/application/handlers/LoggingCallbackSink';
import type { CallbackSink } from '@/application/interfaces/CallbackSink';
import type { Requester } from '@/application/interfaces/Requester';
import { GatewayClient, type GatewayClientOptions } from '@/infra/gateway/GatewayClient';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

export type ConnectorOptions = GatewayClientOptions;

/**
 * プレゼンテーション層: ゲートウェイとのセッション
 *
 *                ----- Requester ------>
 *   アプリケーション                      TWS / IB Gateway
 *                <---- CallbackSink ----
 *
 * 責務: 1 つのオブジェクトで送信（Requester）と受信（CallbackSink）の両方を担う。
 * コンストラクタで自分自身を GatewayClient のコールバック先として登録するため、
 * このインスタンスが発行したリクエストの応答は必ずこのインスタンスのハンドラに届く。
 *
 * 受信時の処理はサブクラスでハンドラ（onTickPrice など）を上書きして実装する。
 */
export class Connector extends LoggingCallbackSink implements Requester {
  private readonly client: GatewayClient;

  /**
   * @param options 接続先（host, port, clientId）とロガー・メトリクス。省略時は既定値
   */
  constructor(options: ConnectorOptions = {}) {
    // 1. 受信側（CallbackSink）を先に初期化
    super((options.logger ?? LoggerFactory.create()).child({ component: 'Connector' }));
    // 2. 送信側を自分自身をコールバック先として生成
    this.client = new GatewayClient(this, options);
  }

  /**
   * 送信側に登録されているコールバック先（常にこのインスタンス自身）
   */
  get callbackTarget(): CallbackSink {
    return this.client.sink;
  }

  get isConnected(): boolean {
    return this.client.isConnected;
  }

  connect(): void {
    this.client.connect();
  }

  disconnect(): void {
    this.client.disconnect();
  }

  reqCurrentTime(): void {
    this.client.reqCurrentTime();
  }

  reqIds(): void {
    this.client.reqIds();
  }

  reqManagedAccts(): void {
    this.client.reqManagedAccts();
  }

  reqAccountSummary(reqId: number, group: string, tags: string): void {
    this.client.reqAccountSummary(reqId, group, tags);
  }

  cancelAccountSummary(reqId: number): void {
    this.client.cancelAccountSummary(reqId);
  }

  reqPositions(): void {
    this.client.reqPositions();
  }

  cancelPositions(): void {
    this.client.cancelPositions();
  }

  reqOpenOrders(): void {
    this.client.reqOpenOrders();
  }

  reqContractDetails(reqId: number, contract: Contract): void {
    this.client.reqContractDetails(reqId, contract);
  }

  reqMktData(
    reqId: number,
    contract: Contract,
    genericTickList: string,
    snapshot: boolean,
    regulatorySnapshot: boolean
  ): void {
    this.client.reqMktData(reqId, contract, genericTickList, snapshot, regulatorySnapshot);
  }

  cancelMktData(reqId: number): void {
    this.client.cancelMktData(reqId);
  }

  placeOrder(orderId: number, contract: Contract, order: Order): void {
    this.client.placeOrder(orderId, contract, order);
  }

  cancelOrder(orderId: number): void {
    this.client.cancelOrder(orderId);
  }
}
