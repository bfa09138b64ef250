/**
 * Final Express error handler.
 *
 * Renders every `AppError` as `{ error, error_description }` with its status. Infrastructure
 * failures and unknown errors are logged and answered without internal detail.
 */
import type { NextFunction, Request, Response } from 'express';

import { wwwAuthenticate } from '../auth/middleware';
import { AppError, AuthenticationError, InfrastructureError } from '../lib/errors';
import { logger } from '../lib/logger';

export const createErrorHandler = (resourceMetadataUrl: string) => {
  return (err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'invalid_request', error_description: 'Malformed JSON body' });
      return;
    }

    if (err instanceof InfrastructureError) {
      logger.error('Http', 'Request failed', { path: req.path, code: err.code, error: err });
      res.status(err.status).json({
        error: err.code,
        error_description: err.retryable ? 'Service temporarily unavailable' : 'Internal server error',
      });
      return;
    }

    if (err instanceof AppError) {
      if (err instanceof AuthenticationError) {
        res.setHeader('WWW-Authenticate', wwwAuthenticate(resourceMetadataUrl, err.code));
      }
      res.status(err.status).json({ error: err.code, error_description: err.message });
      return;
    }

    logger.error('Http', 'Unhandled error', { path: req.path, error: err });
    res.status(500).json({ error: 'internal_error', error_description: 'Internal server error' });
  };
};
