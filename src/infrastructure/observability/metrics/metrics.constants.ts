/**
 * Prometheus metric names and their definitions.
 */
export const METRICS = {
  HTTP_REQUESTS_TOTAL: 'http_requests_total',
  HTTP_REQUEST_DURATION: 'http_request_duration_seconds',
  WEBHOOK_INTENTS_TOTAL: 'webhook_intents_total',
  ORDERS_TOTAL: 'orders_total',
  DB_QUERY_DURATION: 'db_query_duration_seconds',
  ACTIVE_SESSIONS: 'active_sessions',
} as const;

const HTTP_LABELS = ['method', 'path', 'status'];

export const COUNTERS = [
  {
    name: METRICS.HTTP_REQUESTS_TOTAL,
    help: 'Total number of HTTP requests',
    labelNames: HTTP_LABELS,
  },
  {
    name: METRICS.WEBHOOK_INTENTS_TOTAL,
    help: 'Webhook events handled, by intent and outcome',
    labelNames: ['intent', 'outcome'],
  },
  {
    name: METRICS.ORDERS_TOTAL,
    help: 'Order placement attempts, by result',
    labelNames: ['status'],
  },
];

export const HISTOGRAMS = [
  {
    name: METRICS.HTTP_REQUEST_DURATION,
    help: 'HTTP request duration in seconds',
    labelNames: HTTP_LABELS,
    buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5],
  },
  {
    name: METRICS.DB_QUERY_DURATION,
    help: 'MongoDB query duration in seconds',
    labelNames: ['operation', 'collection'],
    buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1],
  },
];

export const GAUGES = [
  {
    name: METRICS.ACTIVE_SESSIONS,
    help: 'Sessions holding an in-progress order',
  },
];
