import type { Logger } from '@/application/interfaces/Logger';
import { PinoLogger } from './PinoLogger';

/**
 * ロガーファクトリー
 *
 * アプリケーション全体で同じルートロガーを共有する（シングルトン）。
 * 各コンポーネントはここから child() で component を付与して使う。
 */
class LoggerFactory {
  private static instance: Logger | null = null;

  /**
   * 環境変数:
   * - `LOG_LEVEL`: debug, info, warn, error（デフォルト `info`）
   * - `NODE_ENV`: production の場合は JSON 形式、それ以外は pretty 形式
   */
  static create(): Logger {
    if (LoggerFactory.instance === null) {
      LoggerFactory.instance = new PinoLogger({
        level: process.env.LOG_LEVEL,
        pretty: process.env.NODE_ENV !== 'production',
      });
    }

    return LoggerFactory.instance;
  }

  /**
   * ロガーインスタンスをリセット（主にテスト用）
   */
  static reset(): void {
    LoggerFactory.instance = null;
  }
}

export { LoggerFactory };
