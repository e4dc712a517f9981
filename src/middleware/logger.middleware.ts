import type { Request, Response, NextFunction } from 'express';
import { createComponentLogger } from '../config/logger';

const log = createComponentLogger('http');

/**
 * Request logging middleware
 *
 * One debug line per request, one info line per response with its duration.
 * Bodies are not logged; item names are user content.
 */
export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const startTime = process.hrtime.bigint();

  log.debug('Incoming request', {
    method: req.method,
    path: req.path,
    ip: req.ip,
  });

  res.on('finish', () => {
    const durationMs = Number(process.hrtime.bigint() - startTime) / 1e6;
    const level = res.statusCode >= 500 ? 'error' : 'info';

    log.log(level, `${req.method} ${req.originalUrl} ${res.statusCode}`, {
      duration: `${durationMs.toFixed(1)}ms`,
    });
  });

  next();
};
