import { Request, Response, NextFunction } from 'express';
import { v4 as uuid } from 'uuid';

import { LogContext, runWithLogContext } from './log-context';
import { logger } from './logger';

const headerValue = (value: string | string[] | undefined): string | undefined =>
  Array.isArray(value) ? value[0] : value;

/**
 * Takes the caller's X-Correlation-ID (or X-Request-ID), else mints one, echoes
 * it back and opens the log context for the rest of the request.
 */
export const correlationMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const correlationId =
    headerValue(req.headers['x-correlation-id']) ||
    headerValue(req.headers['x-request-id']) ||
    uuid();
  const startedAt = process.hrtime.bigint();

  res.setHeader('x-correlation-id', correlationId);

  const context: LogContext = { correlationId };

  runWithLogContext(context, () => {
    logger.debug({ method: req.method, path: req.path }, 'Request started');

    res.on('finish', () => {
      const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
      const level = res.statusCode >= 500 ? 'error' : 'info';

      logger[level](
        {
          correlationId,
          actorId: context.actorId,
          entryId: context.entryId,
          method: req.method,
          path: req.originalUrl,
          statusCode: res.statusCode,
          durationMs: Math.round(durationMs),
        },
        'Request completed'
      );
    });

    next();
  });
};
