export { MetricsModule } from './metrics.module';
export { MetricsService, OrderPlacementStatus } from './metrics.service';
export { MetricsInterceptor } from './metrics.interceptor';
export { METRICS } from './metrics.constants';
