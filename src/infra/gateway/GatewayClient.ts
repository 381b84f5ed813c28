import { type Contract, EventName, IBApi, type Order } from '@stoqey/ib';
import type { CallbackSink } from '@/application/interfaces/CallbackSink';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { Requester } from '@/application/interfaces/Requester';
import type { CallbackEvent } from '@/domain/types';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { DEFAULT_CLIENT_ID, DEFAULT_HOST, DEFAULT_PORT } from './defaults';
import { IbCallbackDecoder } from './IbCallbackDecoder';

/**
 * GatewayClient の初期化オプション
 */
export interface GatewayClientOptions {
  host?: string;
  port?: number;
  clientId?: number;
  logger?: Logger;
  metricsCollector?: MetricsCollector;
}

/**
 * インフラ層: Requester 実装（@stoqey/ib の IBApi をラップ）
 *
 * 責務: リクエストを IBApi にそのまま委譲し、IBApi が emit するイベントを
 * コンストラクタで受け取った CallbackSink に配送する。
 * 生成時はイベントの購読のみ行い、ゲートウェイには何も送信しない。
 */
export class GatewayClient implements Requester {
  private readonly api: IBApi;
  private readonly decoder = new IbCallbackDecoder();
  private readonly logger: Logger;
  private readonly metricsCollector?: MetricsCollector;
  private readonly clientId: number;
  private connected = false;

  /**
   * @param sink 応答・イベントの配送先
   * @param options 接続先とロガー・メトリクス（すべて任意）
   */
  constructor(
    readonly sink: CallbackSink,
    options: GatewayClientOptions = {}
  ) {
    const host = options.host ?? DEFAULT_HOST;
    const port = options.port ?? DEFAULT_PORT;
    this.clientId = options.clientId ?? DEFAULT_CLIENT_ID;
    this.logger = (options.logger ?? LoggerFactory.create()).child({
      component: 'GatewayClient',
      clientId: this.clientId,
    });
    this.metricsCollector = options.metricsCollector;

    this.api = new IBApi({ host, port, clientId: this.clientId });
    this.bindCallbacks();
  }

  get isConnected(): boolean {
    return this.connected;
  }

  connect(): void {
    this.request('connect');
    this.api.connect(this.clientId);
  }

  disconnect(): void {
    this.request('disconnect');
    this.api.disconnect();
  }

  reqCurrentTime(): void {
    this.request('reqCurrentTime');
    this.api.reqCurrentTime();
  }

  reqIds(): void {
    this.request('reqIds');
    this.api.reqIds();
  }

  reqManagedAccts(): void {
    this.request('reqManagedAccts');
    this.api.reqManagedAccts();
  }

  reqAccountSummary(reqId: number, group: string, tags: string): void {
    this.request('reqAccountSummary', { reqId, group, tags });
    this.api.reqAccountSummary(reqId, group, tags);
  }

  cancelAccountSummary(reqId: number): void {
    this.request('cancelAccountSummary', { reqId });
    this.api.cancelAccountSummary(reqId);
  }

  reqPositions(): void {
    this.request('reqPositions');
    this.api.reqPositions();
  }

  cancelPositions(): void {
    this.request('cancelPositions');
    this.api.cancelPositions();
  }

  reqOpenOrders(): void {
    this.request('reqOpenOrders');
    this.api.reqOpenOrders();
  }

  reqContractDetails(reqId: number, contract: Contract): void {
    this.request('reqContractDetails', { reqId, symbol: contract.symbol });
    this.api.reqContractDetails(reqId, contract);
  }

  reqMktData(
    reqId: number,
    contract: Contract,
    genericTickList: string,
    snapshot: boolean,
    regulatorySnapshot: boolean
  ): void {
    this.request('reqMktData', { reqId, symbol: contract.symbol, snapshot });
    this.api.reqMktData(reqId, contract, genericTickList, snapshot, regulatorySnapshot);
  }

  cancelMktData(reqId: number): void {
    this.request('cancelMktData', { reqId });
    this.api.cancelMktData(reqId);
  }

  placeOrder(orderId: number, contract: Contract, order: Order): void {
    this.request('placeOrder', { orderId, symbol: contract.symbol, action: order.action });
    this.api.placeOrder(orderId, contract, order);
  }

  cancelOrder(orderId: number): void {
    this.request('cancelOrder', { orderId });
    this.api.cancelOrder(orderId);
  }

  private request(operation: string, meta?: object): void {
    this.logger.debug('request', { operation, ...meta });
    this.metricsCollector?.incrementRequest(operation);
  }

  /**
   * IBApi のイベントを CallbackSink のハンドラに対応付ける。
   * Sink のハンドラが投げた例外は捕捉せず、ライブラリ側に伝播させる。
   */
  private bindCallbacks(): void {
    const { api, decoder, sink } = this;

    api.on(EventName.connected, () => {
      this.connected = true;
      this.metricsCollector?.setConnected(true);
      this.deliver('connected', undefined, () => sink.onConnected());
    });
    api.on(EventName.disconnected, () => {
      this.connected = false;
      this.metricsCollector?.setConnected(false);
      this.deliver('disconnected', undefined, () => sink.onDisconnected());
    });
    api.on(EventName.error, (...args: unknown[]) => {
      const event = decoder.error(args);
      this.metricsCollector?.incrementError(event.code);
      this.deliver('error', event, (e) => sink.onError(e));
    });
    api.on(EventName.info, (...args: unknown[]) => {
      const event = decoder.info(args);
      if (event !== null) {
        this.metricsCollector?.incrementError(event.code);
      }
      this.deliver('info', event, (e) => sink.onError(e));
    });
    api.on(EventName.currentTime, (...args: unknown[]) => {
      this.deliver('currentTime', decoder.currentTime(args), (time) => sink.onCurrentTime(time));
    });
    api.on(EventName.nextValidId, (...args: unknown[]) => {
      this.deliver('nextValidId', decoder.nextValidId(args), (orderId) => sink.onNextValidId(orderId));
    });
    api.on(EventName.managedAccounts, (...args: unknown[]) => {
      this.deliver('managedAccounts', decoder.managedAccounts(args), (accounts) => sink.onManagedAccounts(accounts));
    });
    api.on(EventName.accountSummary, (...args: unknown[]) => {
      this.deliver('accountSummary', decoder.accountSummary(args), (entry) => sink.onAccountSummary(entry));
    });
    api.on(EventName.accountSummaryEnd, (...args: unknown[]) => {
      this.deliver('accountSummaryEnd', decoder.reqId(args), (reqId) => sink.onAccountSummaryEnd(reqId));
    });
    api.on(EventName.position, (...args: unknown[]) => {
      this.deliver('position', decoder.position(args), (entry) => sink.onPosition(entry));
    });
    api.on(EventName.positionEnd, () => {
      this.deliver('positionEnd', undefined, () => sink.onPositionEnd());
    });
    api.on(EventName.openOrder, (...args: unknown[]) => {
      this.deliver('openOrder', decoder.openOrder(args), (event) => sink.onOpenOrder(event));
    });
    api.on(EventName.openOrderEnd, () => {
      this.deliver('openOrderEnd', undefined, () => sink.onOpenOrderEnd());
    });
    api.on(EventName.contractDetails, (...args: unknown[]) => {
      this.deliver('contractDetails', decoder.contractDetails(args), (event) => sink.onContractDetails(event));
    });
    api.on(EventName.contractDetailsEnd, (...args: unknown[]) => {
      this.deliver('contractDetailsEnd', decoder.reqId(args), (reqId) => sink.onContractDetailsEnd(reqId));
    });
    api.on(EventName.orderStatus, (...args: unknown[]) => {
      this.deliver('orderStatus', decoder.orderStatus(args), (update) => sink.onOrderStatus(update));
    });
    api.on(EventName.tickPrice, (...args: unknown[]) => {
      this.deliver('tickPrice', decoder.tickPrice(args), (tick) => sink.onTickPrice(tick));
    });
    api.on(EventName.tickSize, (...args: unknown[]) => {
      this.deliver('tickSize', decoder.tickSize(args), (tick) => sink.onTickSize(tick));
    });
  }

  /**
   * 変換済みのペイロードを Sink に渡す。null は解釈できなかった引数なので破棄する。
   */
  private deliver<T>(event: CallbackEvent, payload: T | null, handler: (payload: T) => void): void {
    if (payload === null) {
      this.logger.warn('undecodable callback dropped', { event });
      this.metricsCollector?.incrementDecodeFailure(event);
      return;
    }
    this.metricsCollector?.incrementCallback(event);
    handler(payload);
  }
}
