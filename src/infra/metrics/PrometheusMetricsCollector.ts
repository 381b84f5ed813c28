import { Counter, Gauge, Registry } from 'prom-client';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { CallbackEvent } from '@/domain/types';

/**
 * Prometheus メトリクスコレクター実装
 * テストで別レジストリを使用するため、シングルトンにはしていない。
 *
 * 責務: prom-client を使用してゲートウェイとのやり取りを計数・保持
 */
export class PrometheusMetricsCollector implements MetricsCollector {
  private readonly register: Registry;
  private readonly requestCounter: Counter<'operation'>;
  private readonly callbackCounter: Counter<'event'>;
  private readonly errorCounter: Counter<'code'>;
  private readonly decodeFailureCounter: Counter<'event'>;
  private readonly connectedGauge: Gauge;

  constructor() {
    this.register = new Registry();

    this.requestCounter = new Counter({
      name: 'gateway_requests_total',
      help: 'Total number of requests sent to the gateway',
      labelNames: ['operation'],
      registers: [this.register],
    });

    this.callbackCounter = new Counter({
      name: 'gateway_callbacks_total',
      help: 'Total number of callbacks delivered to the sink',
      labelNames: ['event'],
      registers: [this.register],
    });

    this.errorCounter = new Counter({
      name: 'gateway_errors_total',
      help: 'Total number of errors reported by the gateway',
      labelNames: ['code'],
      registers: [this.register],
    });

    this.decodeFailureCounter = new Counter({
      name: 'gateway_decode_failures_total',
      help: 'Total number of callbacks dropped because their arguments could not be decoded',
      labelNames: ['event'],
      registers: [this.register],
    });

    // 1 = 接続中, 0 = 切断
    this.connectedGauge = new Gauge({
      name: 'gateway_connected',
      help: 'Whether the connector is currently connected to the gateway',
      registers: [this.register],
    });
  }

  incrementRequest(operation: string): void {
    this.requestCounter.inc({ operation });
  }

  incrementCallback(event: CallbackEvent): void {
    this.callbackCounter.inc({ event });
  }

  incrementError(code: number): void {
    this.errorCounter.inc({ code: String(code) });
  }

  incrementDecodeFailure(event: CallbackEvent): void {
    this.decodeFailureCounter.inc({ event });
  }

  setConnected(connected: boolean): void {
    this.connectedGauge.set(connected ? 1 : 0);
  }

  async getMetrics(): Promise<string> {
    return await this.register.metrics();
  }

  getRegistry() {
    return this.register;
  }
}
