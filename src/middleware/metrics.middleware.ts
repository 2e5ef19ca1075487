import { Request, Response, NextFunction } from 'express';
import { httpRequestDuration, httpRequestTotal, isMetricsEnabled } from '../config/metrics';

const UNMATCHED_ROUTE = 'unmatched';

/** Route pattern label (`/api/runs/:id`), never the raw path. */
export function routeLabel(req: Request): string {
  const pattern: unknown = req.route?.path;
  return typeof pattern === 'string' ? `${req.baseUrl}${pattern}` : UNMATCHED_ROUTE;
}

export function metricsMiddleware(req: Request, res: Response, next: NextFunction) {
  if (!isMetricsEnabled()) {
    return next();
  }

  const endTimer = httpRequestDuration.startTimer();

  res.on('finish', () => {
    const labels = {
      method: req.method,
      route: routeLabel(req),
      status_code: res.statusCode.toString(),
    };

    endTimer(labels);
    httpRequestTotal.inc(labels);
  });

  next();
}
