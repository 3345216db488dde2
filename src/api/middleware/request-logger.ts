import type { Request, Response, NextFunction } from 'express';
import { logger } from '../../infrastructure/logger.js';

const log = logger.child({ module: 'http' });

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();

  res.on('finish', () => {
    const level = res.statusCode >= 500 ? 'error' : res.statusCode >= 400 ? 'warn' : 'info';
    log[level](
      {
        method: req.method,
        path: req.path,
        statusCode: res.statusCode,
        durationMs: Date.now() - start,
        requestBytes: Number(req.get('content-length') ?? 0),
      },
      'HTTP request',
    );
  });

  next();
}
