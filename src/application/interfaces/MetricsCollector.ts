import type { CallbackEvent } from '@/domain/types';

/**
 * メトリクスレジストリの最小インターフェース（prom-client の Registry を抽象化）
 */
export interface MetricsRegistry {
  contentType: string;
}

/**
 * メトリクス収集インターフェース
 *
 * 責務: ゲートウェイとのやり取り（送信・受信・エラー）の計数と公開
 */
export interface MetricsCollector {
  /**
   * 送信したリクエスト数をカウント
   * @param operation Requester の操作名（reqMktData, placeOrder など）
   */
  incrementRequest(operation: string): void;

  /**
   * Sink に配送したコールバック数をカウント
   */
  incrementCallback(event: CallbackEvent): void;

  /**
   * ゲートウェイが通知したエラー数をエラーコード別にカウント
   */
  incrementError(code: number): void;

  /**
   * 引数を解釈できずに破棄したコールバック数をカウント
   */
  incrementDecodeFailure(event: CallbackEvent): void;

  setConnected(connected: boolean): void;

  /**
   * Prometheus 形式のメトリクス文字列を取得
   */
  getMetrics(): Promise<string>;

  getRegistry(): MetricsRegistry;
}
