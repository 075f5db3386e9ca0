import type { ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import { EtlError, HttpError } from '../errors.js';
import { errorMessage, type Logger } from '../utils/logger.js';

const STORE_UNAVAILABLE_CODES = new Set(['ECONNREFUSED', 'ENOTFOUND', '57P03', '53300']);

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export function createErrorHandler(logger: Logger): ErrorRequestHandler {
  return (err, _req, res, _next) => {
    if (err instanceof ZodError) {
      return res.status(400).json({
        message: 'validation_failed',
        issues: err.issues,
      });
    }

    if (err instanceof HttpError) {
      return res.status(err.statusCode).json({
        message: err.message,
        details: err.details,
      });
    }

    if (err instanceof EtlError) {
      return res.status(422).json({
        message: err.message,
        code: err.code,
      });
    }

    const code = errorCode(err);
    if (code && STORE_UNAVAILABLE_CODES.has(code)) {
      logger.error(`store unavailable: ${errorMessage(err)}`);
      return res.status(503).json({
        message: 'store_unavailable',
        code,
      });
    }

    logger.error(errorMessage(err));
    return res.status(500).json({
      message: err instanceof Error ? err.message : 'internal_error',
    });
  };
}
