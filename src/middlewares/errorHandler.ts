import { Request, Response, NextFunction } from 'express';
import { AppError, isDatabaseError } from '../utils/errors';
import { formatError } from '../utils/helpers';

const hasName = (error: unknown, name: string): boolean => error instanceof Error && error.name === name;

// http-errors raised by body-parser carry their own 4xx status and a dotted `type`
const clientError = (error: unknown): { status: number; code: string; message: string } | undefined => {
  if (!(error instanceof Error)) return undefined;

  const status = 'status' in error ? error.status : 'statusCode' in error ? error.statusCode : undefined;
  if (typeof status !== 'number' || status < 400 || status >= 500) return undefined;

  const code = 'type' in error && typeof error.type === 'string' ? error.type.replace(/\./g, '_').toUpperCase() : 'BAD_REQUEST';
  return { status, code, message: error.message };
};

/**
 * Global error handler
 */
export const createErrorHandler = (nodeEnv: string) => {
  // Express recognises error handlers by arity, so `next` must stay in the signature
  return (error: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (error instanceof AppError) {
      res.status(error.statusCode).json(formatError(error.message, error.code));
      return;
    }

    // Handle JWT errors
    if (hasName(error, 'TokenExpiredError')) {
      res.status(401).json(formatError('Token expired', 'TOKEN_EXPIRED'));
      return;
    }

    if (hasName(error, 'JsonWebTokenError') || hasName(error, 'NotBeforeError')) {
      res.status(401).json(formatError('Invalid token', 'INVALID_TOKEN'));
      return;
    }

    // Malformed JSON bodies from express.json()
    if (error instanceof SyntaxError && 'body' in error) {
      res.status(400).json(formatError('Malformed JSON body', 'VALIDATION_ERROR'));
      return;
    }

    const rejected = clientError(error);
    if (rejected) {
      res.status(rejected.status).json(formatError(rejected.message, rejected.code));
      return;
    }

    // Handle database errors
    if (isDatabaseError(error)) {
      if (error.code === '23505') {
        res.status(409).json(formatError('Resource already exists', 'DUPLICATE_RESOURCE'));
        return;
      }
      if (error.code === '23514') {
        res.status(400).json(formatError(`Constraint violated: ${error.constraint_name ?? 'check'}`, 'CONSTRAINT_VIOLATION'));
        return;
      }
    }

    console.error('Global error handler:', error);

    const message = error instanceof Error ? error.message : 'Unknown error';
    res.status(500).json({
      ...formatError(nodeEnv === 'production' ? 'Internal server error' : message, 'INTERNAL_SERVER_ERROR'),
      ...(nodeEnv === 'development' && error instanceof Error && { stack: error.stack }),
    });
  };
};
