import { randomUUID } from 'crypto';
import { NextFunction, Request, RequestHandler, Response, ErrorRequestHandler } from 'express';
import { PrometheusMetrics } from '@/telemetry/metrics';
import { LoggerLike } from '@/utils/logger';
import { errorMessage } from '@/utils/errors';

function routeLabel(req: Request): string {
  const path: unknown = req.route?.path;
  return typeof path === 'string' ? `${req.baseUrl}${path}` : 'unmatched';
}

/**
 * Logs one line per inbound request (client IP, method, path, status,
 * duration) once the response has been sent, and records it in metrics.
 */
export function createRequestLogger(logger: LoggerLike, metrics: PrometheusMetrics): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const start = Date.now();
    const requestId = randomUUID();
    res.locals.requestId = requestId;
    res.setHeader('X-Request-Id', requestId);

    res.on('finish', () => {
      const duration = Date.now() - start;
      metrics.recordRequest(routeLabel(req), res.statusCode, duration);
      logger.info('HTTP request', {
        requestId,
        ip: req.ip,
        method: req.method,
        path: req.originalUrl,
        statusCode: res.statusCode,
        duration,
      });
    });

    next();
  };
}

export function createErrorLogger(logger: LoggerLike): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, next: NextFunction): void => {
    logger.error('Unhandled error while serving request', {
      requestId: res.locals.requestId,
      method: req.method,
      path: req.originalUrl,
      error: errorMessage(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
    next(err);
  };
}
