import 'dotenv/config';
import process from 'node:process';
import { loadGatewayConfig } from '@/infra/config/GatewayConfig';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { MetricsServer } from '@/infra/metrics/MetricsServer';
import { PrometheusMetricsCollector } from '@/infra/metrics/PrometheusMetricsCollector';
import { Connector } from '@/presentation/gateway/Connector';

/**
 * 接続が確立したら時刻とアカウント一覧を問い合わせるセッション
 */
class SessionConnector extends Connector {
  onConnected(): void {
    super.onConnected();
    this.reqCurrentTime();
    this.reqManagedAccts();
  }

  onCurrentTime(time: number): void {
    this.logger.info('gateway time', { time: new Date(time * 1000).toISOString() });
  }

  onManagedAccounts(accounts: string[]): void {
    this.logger.info('managed accounts', { accounts });
  }
}

/**
 * エントリーポイント: 設定の読み込み、コンポーネントの生成と配線、シグナルハンドリング
 *
 * 注意: リクエストやコールバックの処理は Connector 側に置き、ここでは配線だけを行う。
 */
function bootstrap(): void {
  const config = loadGatewayConfig();
  const logger = LoggerFactory.create();
  const metricsCollector = new PrometheusMetricsCollector();

  const metricsServer =
    config.metricsPort === null ? null : new MetricsServer(metricsCollector, config.metricsPort, logger);
  metricsServer?.start();

  const connector = new SessionConnector({
    host: config.host,
    port: config.port,
    clientId: config.clientId,
    logger,
    metricsCollector,
  });

  logger.info('Connecting to gateway', { host: config.host, port: config.port, clientId: config.clientId });
  connector.connect();

  const shutdown = () => {
    logger.info('Shutting down connector...');
    connector.disconnect();
    metricsServer?.stop();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

try {
  bootstrap();
} catch (error) {
  console.error('Failed to bootstrap connector:', error);
  process.exit(1);
}
