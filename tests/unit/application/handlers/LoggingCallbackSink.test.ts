import { LoggerMock } from '@test/unit/helpers/mocks/LoggerMock';
import { beforeEach, describe, expect, it } from 'vitest';
import { isInformationalCode, LoggingCallbackSink } from '@/application/handlers/LoggingCallbackSink';

/**
 * 単体テスト: LoggingCallbackSink
 *
 * - 情報コード（2100-2169）は info、それ以外は error
 * - その他のハンドラは debug でペイロードを記録する
 */
describe('LoggingCallbackSink', () => {
  let loggerMock: LoggerMock;
  let sink: LoggingCallbackSink;

  beforeEach(() => {
    loggerMock = new LoggerMock();
    sink = new LoggingCallbackSink(loggerMock);
  });

  describe('isInformationalCode()', () => {
    it('2100 から 2169 を情報コードとして扱う', () => {
      expect(isInformationalCode(2099)).toBe(false);
      expect(isInformationalCode(2100)).toBe(true);
      expect(isInformationalCode(2104)).toBe(true);
      expect(isInformationalCode(2169)).toBe(true);
      expect(isInformationalCode(2170)).toBe(false);
      expect(isInformationalCode(-1)).toBe(false);
    });
  });

  describe('onError()', () => {
    it('情報コードはメッセージを info で出力する', () => {
      sink.onError({ error: new Error('Market data farm connection is OK:usfarm'), code: 2104, reqId: -1 });

      expect(loggerMock.info).toHaveBeenCalledWith('Market data farm connection is OK:usfarm', {
        code: 2104,
        reqId: -1,
      });
      expect(loggerMock.error).not.toHaveBeenCalled();
    });

    it('それ以外のコードは error で出力する', () => {
      const error = new Error('No security definition has been found for the request');

      sink.onError({ error, code: 200, reqId: 5 });

      expect(loggerMock.error).toHaveBeenCalledWith('gateway error', { err: error, code: 200, reqId: 5 });
    });
  });

  describe('接続イベント', () => {
    it('接続・切断を info で出力する', () => {
      sink.onConnected();
      sink.onDisconnected();

      expect(loggerMock.info).toHaveBeenNthCalledWith(1, 'connected to gateway');
      expect(loggerMock.info).toHaveBeenNthCalledWith(2, 'disconnected from gateway');
    });
  });

  describe('その他のハンドラ', () => {
    it('position は銘柄シンボルだけを記録する', () => {
      sink.onPosition({ account: 'DU111111', contract: { symbol: 'AAPL' }, position: 10, avgCost: 150.5 });

      expect(loggerMock.debug).toHaveBeenCalledWith('position', {
        account: 'DU111111',
        symbol: 'AAPL',
        position: 10,
        avgCost: 150.5,
      });
    });

    it('tickPrice をそのまま記録する', () => {
      sink.onTickPrice({ tickerId: 1, field: 2, price: 101.5 });

      expect(loggerMock.debug).toHaveBeenCalledWith('tickPrice', { tickerId: 1, field: 2, price: 101.5 });
    });

    it('終端イベントはメタデータなしで記録する', () => {
      sink.onPositionEnd();
      sink.onOpenOrderEnd();

      expect(loggerMock.debug).toHaveBeenNthCalledWith(1, 'positionEnd');
      expect(loggerMock.debug).toHaveBeenNthCalledWith(2, 'openOrderEnd');
    });
  });
});
