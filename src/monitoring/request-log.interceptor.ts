// src/monitoring/request-log.interceptor.ts
import {
  CallHandler,
  ExecutionContext,
  HttpException,
  Injectable,
  Logger,
  NestInterceptor,
  SetMetadata,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import type { Request, Response } from 'express';
import { performance } from 'node:perf_hooks';
import { Observable, catchError, tap, throwError } from 'rxjs';

import { messageOf } from '../common/error-message';
import { MetricsRegistry, type PredictionOutcome } from './metrics.registry';
import { RequestLogService } from './request-log.service';

const LOG_REQUESTS = 'monitoring:log-requests';

/** Mark a controller or handler whose requests go to the request log */
export const LogRequests = () => SetMetadata(LOG_REQUESTS, true);

/** Set by a handler on `res.locals.prediction` to enrich its log record */
export interface PredictionSummary {
  label: string;
  confidence: number;
}

/**
 * Counts every HTTP request in the metrics registry and appends a record to
 * the request log for handlers marked with `@LogRequests()`.
 * Errors pass through untouched.
 */
@Injectable()
export class RequestLogInterceptor implements NestInterceptor {
  private readonly logger = new Logger(RequestLogInterceptor.name);

  constructor(
    private readonly reflector: Reflector,
    private readonly metrics: MetricsRegistry,
    private readonly requestLog: RequestLogService,
  ) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    if (context.getType() !== 'http') return next.handle();

    const http = context.switchToHttp();
    const req = http.getRequest<Request>();
    const res = http.getResponse<Response>();
    const logged = this.reflector.getAllAndOverride<boolean | undefined>(
      LOG_REQUESTS,
      [context.getHandler(), context.getClass()],
    );

    const startedAt = new Date();
    const started = performance.now();
    const finish = (
      status: number,
      outcome: PredictionOutcome,
      errorKind?: string,
    ) => {
      const route = routeOf(req);
      this.countHttp(req.method, route, status);
      if (!logged) return;

      const prediction = predictionOf(res);
      this.requestLog.append({
        method: req.method,
        endpoint: route,
        status,
        startedAt,
        durationMs: performance.now() - started,
        outcome,
        label: prediction?.label,
        confidence: prediction?.confidence,
        errorKind,
      });
    };

    return next.handle().pipe(
      tap(() => {
        const status = res.statusCode;
        finish(status, status < 400 ? 'success' : 'failure');
      }),
      catchError((error: unknown) => {
        const status = error instanceof HttpException ? error.getStatus() : 500;
        const kind = errorKindOf(error);
        const cancelled = kind === 'PredictionCancelled';
        finish(status, cancelled ? 'cancelled' : 'failure', kind);
        return throwError(() => error);
      }),
    );
  }

  private countHttp(method: string, route: string, status: number): void {
    try {
      this.metrics.recordHttp({ method, route, status });
    } catch (error) {
      this.logger.warn(`Failed to record HTTP metrics: ${messageOf(error)}`);
    }
  }
}

/* ------------------------------- Helpers ------------------------------ */

/** Route template (`/api/v1/predict`), not the raw URL */
function routeOf(req: Request): string {
  const route: unknown = req.route;
  if (
    typeof route === 'object' &&
    route !== null &&
    'path' in route &&
    typeof route.path === 'string'
  ) {
    return route.path;
  }
  return req.path;
}

function predictionOf(res: Response): PredictionSummary | undefined {
  const value: unknown = res.locals.prediction;
  if (
    typeof value === 'object' &&
    value !== null &&
    'label' in value &&
    typeof value.label === 'string' &&
    'confidence' in value &&
    typeof value.confidence === 'number'
  ) {
    return { label: value.label, confidence: value.confidence };
  }
  return undefined;
}

/** `error` field of a Nest error body ('InvalidImage', 'Payload Too Large') */
function errorKindOf(error: unknown): string {
  if (error instanceof HttpException) {
    const body = error.getResponse();
    if (
      typeof body === 'object' &&
      body !== null &&
      'error' in body &&
      typeof body.error === 'string'
    ) {
      return body.error;
    }
    return error.name;
  }
  return 'InternalError';
}
