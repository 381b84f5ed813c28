import { EventName } from '@stoqey/ib';
import { FakeIBApi } from '@test/unit/helpers/mocks/FakeIBApi';
import { LoggerMock } from '@test/unit/helpers/mocks/LoggerMock';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { CallbackSink } from '@/application/interfaces/CallbackSink';
import type { Requester } from '@/application/interfaces/Requester';
import type { TickPriceEvent } from '@/domain/types';
import { Connector } from '@/presentation/gateway/Connector';

vi.mock('@stoqey/ib', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@stoqey/ib')>();
  const { FakeIBApi } = await import('@test/unit/helpers/mocks/FakeIBApi');
  return { ...actual, IBApi: FakeIBApi };
});

const REQUESTER_OPERATIONS = [
  'connect',
  'disconnect',
  'reqCurrentTime',
  'reqIds',
  'reqManagedAccts',
  'reqAccountSummary',
  'cancelAccountSummary',
  'reqPositions',
  'cancelPositions',
  'reqOpenOrders',
  'reqContractDetails',
  'reqMktData',
  'cancelMktData',
  'placeOrder',
  'cancelOrder',
] as const satisfies ReadonlyArray<keyof Requester>;

const SINK_HANDLERS = [
  'onConnected',
  'onDisconnected',
  'onError',
  'onCurrentTime',
  'onNextValidId',
  'onManagedAccounts',
  'onAccountSummary',
  'onAccountSummaryEnd',
  'onPosition',
  'onPositionEnd',
  'onOpenOrder',
  'onOpenOrderEnd',
  'onContractDetails',
  'onContractDetailsEnd',
  'onOrderStatus',
  'onTickPrice',
  'onTickSize',
] as const satisfies ReadonlyArray<keyof CallbackSink>;

/**
 * ティックを記録するだけのサブクラス（ハンドラ上書きの確認用）
 */
class RecordingConnector extends Connector {
  readonly ticks: TickPriceEvent[] = [];

  onTickPrice(tick: TickPriceEvent): void {
    this.ticks.push(tick);
  }
}

/**
 * 単体テスト: Connector
 *
 * - 送信側のコールバック先が自分自身であること
 * - 生成時に副作用が無いこと
 * - Requester と CallbackSink の両方を満たすこと
 * - リクエストの委譲と、応答が同じインスタンスに届くこと
 */
describe('Connector', () => {
  let loggerMock: LoggerMock;

  beforeEach(() => {
    FakeIBApi.reset();
    loggerMock = new LoggerMock();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('コンストラクタ', () => {
    it('送信側のコールバック先は自分自身である', () => {
      const connector = new Connector({ logger: loggerMock });

      expect(connector).toBeInstanceOf(Connector);
      expect(connector.callbackTarget).toBe(connector);
    });

    it('複数生成してもそれぞれが自分自身を登録する', () => {
      const first = new Connector({ logger: loggerMock });
      const second = new Connector({ logger: loggerMock });

      expect(first.callbackTarget).toBe(first);
      expect(second.callbackTarget).toBe(second);
      expect(first.callbackTarget).not.toBe(second);
    });

    it('生成しただけではリクエストを送信せず、例外も投げない', () => {
      expect(() => new Connector({ logger: loggerMock })).not.toThrow();

      expect(FakeIBApi.instances).toHaveLength(1);
      expect(FakeIBApi.latest().calls).toEqual([]);
      expect(loggerMock.info).not.toHaveBeenCalled();
      expect(loggerMock.error).not.toHaveBeenCalled();
    });

    it('接続先のオプションを IBApi に渡す', () => {
      new Connector({ host: '192.168.0.10', port: 4001, clientId: 3, logger: loggerMock });

      expect(FakeIBApi.latest().options).toEqual({ host: '192.168.0.10', port: 4001, clientId: 3 });
    });

    it('component を付けた子ロガーを使う', () => {
      new Connector({ logger: loggerMock });

      expect(loggerMock.child).toHaveBeenCalledWith({ component: 'Connector' });
    });
  });

  describe('型の形', () => {
    it('Requester と CallbackSink の両方として扱える', () => {
      const connector = new Connector({ logger: loggerMock });
      const requester: Requester = connector;
      const sink: CallbackSink = connector;

      for (const operation of REQUESTER_OPERATIONS) {
        expect(typeof requester[operation]).toBe('function');
      }
      for (const handler of SINK_HANDLERS) {
        expect(typeof sink[handler]).toBe('function');
      }
      expect(requester.isConnected).toBe(false);
    });
  });

  describe('リクエストの委譲', () => {
    it('各操作を IBApi にそのまま渡す', () => {
      const connector = new Connector({ clientId: 2, logger: loggerMock });
      const api = FakeIBApi.latest();
      const contract = { symbol: 'AAPL', exchange: 'SMART', currency: 'USD' };

      connector.connect();
      connector.reqIds();
      connector.reqContractDetails(5, contract);
      connector.reqMktData(1, contract, '', true, false);
      connector.cancelMktData(1);
      connector.reqOpenOrders();
      connector.reqCurrentTime();
      connector.disconnect();

      expect(api.calls).toEqual([
        { method: 'connect', args: [2] },
        { method: 'reqIds', args: [] },
        { method: 'reqContractDetails', args: [5, contract] },
        { method: 'reqMktData', args: [1, contract, '', true, false] },
        { method: 'cancelMktData', args: [1] },
        { method: 'reqOpenOrders', args: [] },
        { method: 'reqCurrentTime', args: [] },
        { method: 'disconnect', args: [] },
      ]);
    });
  });

  describe('コールバックの配送', () => {
    it('ゲートウェイからの応答は同じインスタンスのハンドラに届く', () => {
      const connector = new RecordingConnector({ logger: loggerMock });

      connector.reqMktData(1, { symbol: 'AAPL' }, '', false, false);
      FakeIBApi.latest().emit(EventName.tickPrice, 1, 1, 187.25, {});

      expect(connector.ticks).toEqual([{ tickerId: 1, field: 1, price: 187.25 }]);
    });

    it('上書きしていないハンドラは既定の実装でログを出す', () => {
      new Connector({ logger: loggerMock });

      FakeIBApi.latest().emit(EventName.connected);

      expect(loggerMock.info).toHaveBeenCalledWith('connected to gateway');
    });

    it('isConnected は接続イベントに追従する', () => {
      const connector = new Connector({ logger: loggerMock });

      FakeIBApi.latest().emit(EventName.connected);

      expect(connector.isConnected).toBe(true);
    });
  });
});
