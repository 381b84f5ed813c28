import { DEFAULT_CLIENT_ID, DEFAULT_HOST, DEFAULT_PORT } from '@/infra/gateway/defaults';

/**
 * 起動時の設定値
 */
export interface GatewayConfig {
  host: string;
  port: number;
  clientId: number;
  /** 未設定の場合はメトリクスサーバーを起動しない */
  metricsPort: number | null;
}

/**
 * 環境変数の値が不正な場合に投げるエラー
 */
export class ConfigError extends Error {
  constructor(
    readonly variable: string,
    readonly value: string,
    reason: string
  ) {
    super(`Invalid ${variable}: "${value}" (${reason})`);
    this.name = 'ConfigError';
  }
}

function readInteger(env: NodeJS.ProcessEnv, key: string, fallback: number, min: number, max: number): number {
  const raw = env[key]?.trim();
  if (!raw) {
    return fallback;
  }
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(key, raw, 'expected a non-negative integer');
  }
  const value = Number(raw);
  if (value < min || value > max) {
    throw new ConfigError(key, raw, `expected ${min}-${max}`);
  }
  return value;
}

/**
 * 環境変数から接続設定を読み込む。
 *
 * - `IB_HOST`: TWS / IB Gateway のホスト（デフォルト 127.0.0.1）
 * - `IB_PORT`: ポート（デフォルト 7497。IB Gateway は 4001 / 4002）
 * - `IB_CLIENT_ID`: クライアント ID（デフォルト 0）
 * - `METRICS_PORT`: /metrics を公開するポート（任意）
 *
 * @throws {ConfigError} 値が整数でない、または範囲外の場合
 */
export function loadGatewayConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const host = env.IB_HOST?.trim() || DEFAULT_HOST;
  const port = readInteger(env, 'IB_PORT', DEFAULT_PORT, 1, 65535);
  const clientId = readInteger(env, 'IB_CLIENT_ID', DEFAULT_CLIENT_ID, 0, Number.MAX_SAFE_INTEGER);
  const metricsPort = env.METRICS_PORT?.trim() ? readInteger(env, 'METRICS_PORT', 0, 1, 65535) : null;

  return { host, port, clientId, metricsPort };
}
