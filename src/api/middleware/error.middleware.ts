// src/api/middleware/error.middleware.ts
import { NextFunction, Request, Response } from 'express';
import { ValidationError, createErrorResponse, errorHandler } from '../../lib/billing/utils/error';
import { BillingLogger } from '../../lib/billing/utils/logger';
import { getRequestId } from './request-context.middleware';

const logger = new BillingLogger(undefined, 'ErrorMiddleware');

// express.json() flags unparseable bodies this way
function isBodyParseError(error: unknown): boolean {
  return error instanceof SyntaxError && 'type' in error && error.type === 'entity.parse.failed';
}

export const errorMiddleware = (error: unknown, req: Request, res: Response, _next: NextFunction): void => {
  const normalized = isBodyParseError(error)
    ? new ValidationError('Malformed JSON body', { _root: ['Request body is not valid JSON'] })
    : error;

  errorHandler.handleError(normalized);

  const { statusCode, body } = createErrorResponse(normalized, getRequestId(res));

  logger.warn('Request failed', {
    path: req.path,
    method: req.method,
    statusCode,
    code: body.error.code,
    category: errorHandler.categorizeError(normalized)
  });

  res.status(statusCode).json(body);
};

export const notFoundHandler = (req: Request, res: Response): void => {
  res.status(404).json({
    success: false,
    error: {
      code: 'not_found',
      message: `No route for ${req.method} ${req.path}`,
      requestId: getRequestId(res)
    }
  });
};
