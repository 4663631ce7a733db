// src/api/middleware/request-context.middleware.ts
import { NextFunction, Request, Response } from 'express';
import { PerformanceMonitor } from '../../lib/billing/monitoring/performance.monitor';
import { RequestContext, createRequestContext } from '../../lib/billing/utils/request-context';

const REQUEST_ID_PATTERN = /^[a-zA-Z0-9_-]{8,100}$/;

function isRequestContext(value: unknown): value is RequestContext {
  return (
    typeof value === 'object' &&
    value !== null &&
    'requestId' in value &&
    typeof value.requestId === 'string' &&
    'marks' in value &&
    value.marks instanceof Map
  );
}

/**
 * The matched route template (e.g. /api/vault/:id), so metrics group by
 * endpoint rather than by entity id. Unmatched requests share one series.
 */
export function routeTemplate(req: Request): string {
  const route: unknown = req.route;
  if (typeof route === 'object' && route !== null && 'path' in route && typeof route.path === 'string') {
    return `${req.baseUrl}${route.path}`;
  }
  return 'unmatched';
}

/** The context attached by `requestContextMiddleware`, if any. */
export function getRequestContext(res: Response): RequestContext | undefined {
  const context: unknown = res.locals.requestContext;
  return isRequestContext(context) ? context : undefined;
}

export function getRequestId(res: Response): string | undefined {
  return getRequestContext(res)?.requestId;
}

/**
 * Starts a RequestContext for every request, echoes its id in X-Request-ID and
 * hands the finished request to the monitor.
 */
export const requestContextMiddleware = (monitor: PerformanceMonitor) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    const incoming = req.header('x-request-id');
    const context = createRequestContext(incoming && REQUEST_ID_PATTERN.test(incoming) ? incoming : undefined);

    res.locals.requestContext = context;
    res.setHeader('X-Request-ID', context.requestId);

    res.on('finish', () => {
      monitor.recordRequest(context, req.method, routeTemplate(req), res.statusCode);
    });

    next();
  };
};
