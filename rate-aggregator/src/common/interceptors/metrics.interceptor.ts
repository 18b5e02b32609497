import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { Observable, throwError } from 'rxjs';
import { catchError, tap } from 'rxjs/operators';

import { MetricsService } from '../../metrics/metrics.service';

@Injectable()
export class MetricsInterceptor implements NestInterceptor {
  constructor(private readonly metricsService: MetricsService) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const startTime = Date.now();
    const request = context.switchToHttp().getRequest<Request>();
    const response = context.switchToHttp().getResponse<Response>();

    return next.handle().pipe(
      tap(() => {
        this.recordMetrics(startTime, request, response);
      }),
      catchError((error: unknown) => {
        // The exception filter sets the final status after this operator runs
        setImmediate(() => {
          this.recordMetrics(startTime, request, response);
        });
        return throwError(() => error);
      }),
    );
  }

  private recordMetrics(
    startTime: number,
    request: Request,
    response: Response,
  ): void {
    const route = getRoutePattern(request);
    if (route === '/metrics') {
      return;
    }

    const labels = {
      route,
      method: request.method,
      status: response.statusCode.toString(),
    };
    this.metricsService.requestLatency
      .labels(labels)
      .observe((Date.now() - startTime) / 1000);
    this.metricsService.requestCount.labels(labels).inc();
  }
}

function getRoutePattern(request: Request): string {
  const routePath: unknown = request.route?.path;

  if (typeof routePath === 'string') {
    const baseUrl = request.baseUrl || '';
    const fullPath =
      baseUrl && !routePath.startsWith(baseUrl) ? baseUrl + routePath : routePath;
    return fullPath.startsWith('/') ? fullPath : `/${fullPath}`;
  }

  const path = (request.path || request.url).split('?')[0];
  return path.startsWith('/') ? path : `/${path}`;
}
