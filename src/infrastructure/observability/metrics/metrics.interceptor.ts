import {
  CallHandler,
  ExecutionContext,
  HttpException,
  Injectable,
  NestInterceptor,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';
import { Request, Response } from 'express';
import { MetricsService } from './metrics.service';

@Injectable()
export class MetricsInterceptor implements NestInterceptor {
  constructor(private readonly metricsService: MetricsService) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const ctx = context.switchToHttp();
    const request = ctx.getRequest<Request>();
    const response = ctx.getResponse<Response>();

    const startTime = Date.now();

    return next.handle().pipe(
      tap({
        next: () => {
          const durationSec = (Date.now() - startTime) / 1000;
          const path = this.getRoutePath(request);

          this.metricsService.recordHttpRequest(
            request.method,
            path,
            response.statusCode,
            durationSec,
          );
        },
        // The exception filter has not set the status yet
        error: (error: unknown) => {
          const durationSec = (Date.now() - startTime) / 1000;
          const path = this.getRoutePath(request);
          const status = error instanceof HttpException ? error.getStatus() : 500;

          this.metricsService.recordHttpRequest(request.method, path, status, durationSec);
        },
      }),
    );
  }

  // Matched route template, e.g. /api/v1/orders/:id
  private getRoutePath(request: Request): string {
    const route: unknown = request.route;
    if (
      typeof route === 'object' &&
      route !== null &&
      'path' in route &&
      typeof route.path === 'string'
    ) {
      return route.path;
    }
    return request.path;
  }
}
