import { Injectable, LogLevel, NestMiddleware } from '@nestjs/common';
import { NextFunction, Request, Response } from 'express';
import { randomUUID } from 'node:crypto';
import { StructuredLoggerService } from '../logging/structured-logger.service';
import { MetricsService } from './metrics.service';

// successful calls here are logged at debug
const QUIET_PREFIXES = ['/v1/health', '/v1/metrics'];

export function accessLogLevel(path: string, statusCode: number): LogLevel {
  if (statusCode >= 500) {
    return 'error';
  }
  if (statusCode >= 400) {
    return 'warn';
  }
  return QUIET_PREFIXES.some((prefix) => path.startsWith(prefix)) ? 'debug' : 'log';
}

/** Access log with the request id and, on campaign routes, the campaign id. */
@Injectable()
export class RequestLoggingMiddleware implements NestMiddleware {
  constructor(
    private readonly metrics: MetricsService,
    private readonly logger: StructuredLoggerService
  ) {}

  use(req: Request, res: Response, next: NextFunction): void {
    const start = Date.now();
    const requestId = req.headers['x-request-id']?.toString() ?? randomUUID();
    res.setHeader('x-request-id', requestId);

    res.on('finish', () => {
      const path = req.originalUrl.split('?')[0] ?? req.originalUrl;
      const durationMs = Date.now() - start;
      const route = typeof req.route?.path === 'string' ? `${req.baseUrl}${req.route.path}` : path;
      this.metrics.record(route, req.method, res.statusCode, durationMs);

      const line = {
        type: 'http_access',
        method: req.method,
        route,
        statusCode: res.statusCode,
        durationMs,
        requestId,
        campaignId: req.params?.campaignId
      };
      const level = accessLogLevel(path, res.statusCode);
      if (level === 'error') {
        this.logger.error(line, undefined, RequestLoggingMiddleware.name);
      } else if (level === 'warn') {
        this.logger.warn(line, RequestLoggingMiddleware.name);
      } else if (level === 'debug') {
        this.logger.debug(line, RequestLoggingMiddleware.name);
      } else {
        this.logger.log(line, RequestLoggingMiddleware.name);
      }
    });

    next();
  }
}
