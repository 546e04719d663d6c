import { Module } from '@nestjs/common';
import {
  makeCounterProvider,
  makeGaugeProvider,
  makeHistogramProvider,
  PrometheusModule,
} from '@willsoto/nestjs-prometheus';
import { COUNTERS, GAUGES, HISTOGRAMS } from './metrics.constants';
import { MetricsService } from './metrics.service';
import { MetricsInterceptor } from './metrics.interceptor';

/**
 * Exposes `/metrics` with the process defaults plus the service's own
 * counters, histograms and gauges.
 */
@Module({
  imports: [
    PrometheusModule.register({
      path: '/metrics',
      defaultMetrics: { enabled: true },
    }),
  ],
  providers: [
    ...COUNTERS.map((definition) => makeCounterProvider(definition)),
    ...HISTOGRAMS.map((definition) => makeHistogramProvider(definition)),
    ...GAUGES.map((definition) => makeGaugeProvider(definition)),
    MetricsService,
    MetricsInterceptor,
  ],
  exports: [PrometheusModule, MetricsService, MetricsInterceptor],
})
export class MetricsModule {}
