import { Request, Response, NextFunction } from 'express';
import { ValidationError } from '@/utils/errors';
import { ValidationIssue } from '@/types/detection.types';
import { logger } from '@/utils/logger';

interface IError extends Error {
  statusCode?: number;
  status?: number;
  code?: string;
  type?: string;           // set by body-parser
  details?: ValidationIssue[];
}

// Express recognises error middleware by its four parameters
export const errorHandler = (err: IError, req: Request, res: Response, next: NextFunction) => {
  let error: IError = { ...err, message: err.message };

  // Malformed JSON body
  if (err.type === 'entity.parse.failed') {
    error = { ...error, code: 'INVALID_JSON', message: 'Request body is not valid JSON', statusCode: 400 };
  }

  if (err.type === 'entity.too.large') {
    error = { ...error, code: 'PAYLOAD_TOO_LARGE', message: 'Request body exceeds the size limit', statusCode: 413 };
  }

  if (err instanceof ValidationError) {
    error = { ...error, code: err.code, statusCode: err.statusCode, details: err.details };
  }

  const statusCode = error.statusCode || error.status || 500;
  if (statusCode >= 500) {
    logger.error(`Unhandled error on ${req.method} ${req.originalUrl}: ${err.message}`);
  }

  res.status(statusCode).json({
    success: false,
    error: {
      code: error.code || 'SERVER_ERROR',
      message: statusCode >= 500 ? 'Server Error' : error.message,
      ...(error.details ? { details: error.details } : {}),
    },
  });
};
