import type { ErrorHandler, NotFoundHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { httpLogger } from '../../logger';
import { captureException } from '../../sentry';
import type { AppEnv } from '../../types';
import { AppError } from './index';

export function createHonoErrorHandler(): ErrorHandler<AppEnv> {
  return (err, c) => {
    const requestId = c.get('requestId');

    if (err instanceof AppError) {
      const { code, message, statusCode } = err;
      const logMethod = statusCode >= 500 ? 'error' : 'warn';
      httpLogger[logMethod]({ err, statusCode, requestId, path: c.req.path }, `AppError: ${code}`);

      if (statusCode >= 500) {
        captureException(err, { requestId });
      }

      return c.json(err.toJSON(), statusCode as ContentfulStatusCode);
    }

    // Raised by hono's own middleware (body limit, cors preflight)
    if (err instanceof HTTPException) {
      httpLogger.warn({ status: err.status, requestId, path: c.req.path }, 'HTTPException');
      return c.json({ message: err.message || 'Request rejected', code: 'HTTP_ERROR' }, err.status);
    }

    httpLogger.error({ err, requestId, path: c.req.path }, 'Unhandled error');
    captureException(err, { requestId });

    return c.json({ message: 'Internal Server Error', code: 'INTERNAL_SERVER_ERROR' }, 500);
  };
}

export function createNotFoundHandler(): NotFoundHandler<AppEnv> {
  return (c) => c.json({ message: 'Not Found', code: 'NOT_FOUND' }, 404);
}
