/**
 * Prometheus metrics for Designate API usage
 */
import { Counter, Gauge, Registry, Summary } from 'prom-client';

/**
 * Capability the Designate transport reports its calls through
 */
export interface ApiCallRecorder {
  recordCall(method: string): void;
  recordFailure(method: string): void;
  observeLatency(method: string, seconds: number): void;
}

export const noopRecorder: ApiCallRecorder = {
  recordCall: () => undefined,
  recordFailure: () => undefined,
  observeLatency: () => undefined,
};

export class PrometheusRecorder implements ApiCallRecorder {
  readonly registry: Registry;
  private readonly totalCalls: Counter;
  private readonly failedCalls: Counter;
  private readonly latency: Summary<'method'>;
  private readonly connection: Gauge;

  constructor(registry: Registry = new Registry()) {
    this.registry = registry;

    this.connection = new Gauge({
      name: 'external_dns_webhook_openstack_connection',
      help: 'Indicates if the webhook has a connection to the OpenStack API (1 for connected, 0 for not connected)',
      registers: [registry],
    });
    this.failedCalls = new Counter({
      name: 'external_dns_webhook_failed_api_calls_total',
      help: 'Total number of failed API calls',
      registers: [registry],
    });
    this.totalCalls = new Counter({
      name: 'external_dns_webhook_total_api_calls',
      help: 'Total number of API calls',
      registers: [registry],
    });
    this.latency = new Summary({
      name: 'external_dns_webhook_api_call_latency_seconds',
      help: 'Latency of OpenStack API calls',
      labelNames: ['method'],
      registers: [registry],
    });
  }

  recordCall(_method: string): void {
    this.totalCalls.inc();
  }

  recordFailure(_method: string): void {
    this.failedCalls.inc();
  }

  observeLatency(method: string, seconds: number): void {
    this.latency.observe({ method }, seconds);
  }

  setConnected(connected: boolean): void {
    this.connection.set(connected ? 1 : 0);
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  metrics(): Promise<string> {
    return this.registry.metrics();
  }
}
