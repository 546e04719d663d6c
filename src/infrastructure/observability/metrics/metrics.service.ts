import { Injectable } from '@nestjs/common';
import { InjectMetric } from '@willsoto/nestjs-prometheus';
import { Counter, Gauge, Histogram } from 'prom-client';
import { METRICS } from './metrics.constants';

type HttpLabel = 'method' | 'path' | 'status';

export type OrderPlacementStatus = 'placed' | 'failed';

/**
 * Typed entry points for every metric the service records.
 */
@Injectable()
export class MetricsService {
  constructor(
    @InjectMetric(METRICS.HTTP_REQUESTS_TOTAL)
    private readonly httpRequests: Counter<HttpLabel>,
    @InjectMetric(METRICS.HTTP_REQUEST_DURATION)
    private readonly httpDuration: Histogram<HttpLabel>,
    @InjectMetric(METRICS.WEBHOOK_INTENTS_TOTAL)
    private readonly intents: Counter<'intent' | 'outcome'>,
    @InjectMetric(METRICS.ORDERS_TOTAL)
    private readonly orders: Counter<'status'>,
    @InjectMetric(METRICS.DB_QUERY_DURATION)
    private readonly dbDuration: Histogram<'operation' | 'collection'>,
    @InjectMetric(METRICS.ACTIVE_SESSIONS)
    private readonly activeSessions: Gauge,
  ) {}

  recordHttpRequest(method: string, path: string, status: number, durationSec: number): void {
    const labels = { method, path, status: String(status) };
    this.httpRequests.inc(labels);
    this.httpDuration.observe(labels, durationSec);
  }

  /** `outcome` is a fulfillment outcome on success, an error code otherwise */
  recordIntent(intent: string, outcome: string): void {
    this.intents.inc({ intent, outcome });
  }

  recordOrder(status: OrderPlacementStatus): void {
    this.orders.inc({ status });
  }

  recordDBQuery(operation: string, collection: string, durationSec: number): void {
    this.dbDuration.observe({ operation, collection }, durationSec);
  }

  setActiveSessions(count: number): void {
    this.activeSessions.set(count);
  }
}
