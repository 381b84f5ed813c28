/**
 * ロガーインターフェース
 *
 * 実装は pino（PinoLogger）。テストでは LoggerMock に差し替える。
 */
export interface Logger {
  debug(msg: string, meta?: object): void;

  info(msg: string, meta?: object): void;

  warn(msg: string, meta?: object): void;

  error(msg: string, meta?: object): void;

  /**
   * コンテキスト（component, clientId など）を付与した子ロガーを作成する。
   * @param bindings 子ロガーの全ログに付与される項目
   */
  child(bindings: object): Logger;
}
