import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { Observable, finalize } from 'rxjs';

import { MetricsService } from '../../metrics/metrics.service';

const UNMATCHED_ROUTE = 'unmatched';

/**
 * Records request latency and count per route pattern, so that
 * `/rates/USD/EUR` and `/rates/GBP/JPY` share one series.
 */
@Injectable()
export class MetricsInterceptor implements NestInterceptor {
  constructor(private readonly metricsService: MetricsService) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    if (context.getType() !== 'http') {
      return next.handle();
    }

    const http = context.switchToHttp();
    const request = http.getRequest<Request>();
    const response = http.getResponse<Response>();
    const route = routePattern(request);

    if (route === '/metrics') {
      return next.handle();
    }

    const stopTimer = this.metricsService.requestLatency.startTimer();

    return next.handle().pipe(
      finalize(() => {
        // exception filters write the final status after the handler settles
        setImmediate(() => {
          const labels = {
            route,
            method: request.method,
            status: String(response.statusCode),
          };
          stopTimer(labels);
          this.metricsService.requestCount.labels(labels).inc();
        });
      }),
    );
  }
}

function routePattern(request: Request): string {
  const routePath: unknown = request.route?.path;
  if (typeof routePath !== 'string') {
    return UNMATCHED_ROUTE;
  }

  const fullPath =
    request.baseUrl && !routePath.startsWith(request.baseUrl)
      ? request.baseUrl + routePath
      : routePath;
  return fullPath.startsWith('/') ? fullPath : `/${fullPath}`;
}
