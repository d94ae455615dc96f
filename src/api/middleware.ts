/**
 * API middleware: request logging and error handling.
 */

import { Request, Response, NextFunction } from 'express';
import { apiError, createTypedError, errorMessage, ReconcilerError, TypedError } from '../domain/errors';
import { logger } from '../logger';

const log = logger.child({ component: 'api' });

/** Log each request once it has been answered. */
export function requestLogger() {
  return (req: Request, res: Response, next: NextFunction) => {
    const started = Date.now();
    res.on('finish', () => {
      log.debug('Request completed', {
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        durationMs: Date.now() - started,
      });
    });
    next();
  };
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (err instanceof ReconcilerError) {
    const status = getHttpStatus(err.typedError);
    log.warn('Request error', { code: err.typedError.code, status });
    res.status(status).json(apiError(err.typedError));
    return;
  }

  if (err instanceof SyntaxError) {
    // express.json() rejects malformed bodies with a SyntaxError
    res.status(400).json(apiError(createTypedError({ code: 'VALIDATION.BODY', message: err.message })));
    return;
  }

  log.error('Unhandled request error', {
    message: errorMessage(err),
    stack: err instanceof Error ? err.stack : undefined,
  });

  const typedError = createTypedError({
    code: 'SYSTEM.INTERNAL',
    message: errorMessage(err),
    retryable: false,
  });

  res.status(500).json(apiError(typedError));
}

export function getHttpStatus(error: TypedError): number {
  if (error.code.includes('NOT_FOUND')) return 404;
  if (error.code.startsWith('VALIDATION.')) return 400;
  if (error.code.startsWith('CONFIG.PARSE')) return 400;
  if (error.code.startsWith('SCHEMA.')) return 400;
  if (error.code === 'RECONCILE.ALREADY_RUNNING') return 409;
  if (error.code === 'SERVICE.UNREACHABLE') return 503;
  return 500;
}
