import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';

export interface AppError extends Error {
  statusCode?: number;
  code?: string;
}

export const errorHandler: ErrorRequestHandler = (
  err: AppError,
  req: Request,
  res: Response,
  _next: NextFunction,
): void => {
  const statusCode = err.statusCode ?? 500;

  if (req.log) {
    if (statusCode >= 500) {
      req.log.error('Request error', err, { statusCode });
    } else {
      req.log.warn('Request error', { statusCode, message: err.message });
    }
  }

  const code = err.code ?? 'INTERNAL_ERROR';
  const message = statusCode === 500 ? 'Internal server error' : err.message;

  res.status(statusCode).json({
    error: {
      code,
      message,
    },
  });
};

export function createError(message: string, statusCode: number, code: string): AppError {
  return Object.assign(new Error(message), { statusCode, code });
}

export function notFound(message: string = 'Resource not found'): AppError {
  return createError(message, 404, 'NOT_FOUND');
}

export function serviceUnavailable(message: string, code: string = 'SERVICE_UNAVAILABLE'): AppError {
  return createError(message, 503, code);
}
