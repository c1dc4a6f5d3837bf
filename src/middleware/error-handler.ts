import type { ErrorRequestHandler } from 'express';
import multer from 'multer';
import { ZodError } from 'zod';
import {
  HttpError,
  IngestionError,
  InvalidPeriodError,
  MalformedHeaderError,
  MissingIdentityError,
  PersistenceError,
} from '../errors.js';

function ingestionStatus(err: IngestionError): number {
  if (err instanceof InvalidPeriodError) return 400;
  if (err instanceof MalformedHeaderError || err instanceof MissingIdentityError) return 422;
  return 500;
}

function ingestionDetails(err: IngestionError): Record<string, unknown> | undefined {
  if (err instanceof InvalidPeriodError) return { period: err.period };
  if (err instanceof MalformedHeaderError && err.headerRow !== null) return { headerRow: err.headerRow };
  if (err instanceof MissingIdentityError) return { rowNumber: err.rowNumber };
  return undefined;
}

export const errorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
  if (err instanceof ZodError) {
    return res.status(400).json({
      message: 'validation_failed',
      issues: err.issues,
    });
  }

  if (err instanceof PersistenceError) {
    console.error('[ingest] upload failed', err.message, err.cause);
    return res.status(500).json({
      message: 'upload_failed',
      code: err.code,
    });
  }

  if (err instanceof IngestionError) {
    return res.status(ingestionStatus(err)).json({
      message: err.message,
      code: err.code,
      details: ingestionDetails(err),
    });
  }

  if (err instanceof HttpError) {
    return res.status(err.statusCode).json({
      message: err.message,
      details: err.details,
    });
  }

  if (err instanceof multer.MulterError) {
    return res.status(err.code === 'LIMIT_FILE_SIZE' ? 413 : 400).json({
      message: err.message,
      code: err.code,
    });
  }

  console.error('[api] unhandled error', err);

  if (err instanceof Error) {
    return res.status(500).json({
      message: err.message,
    });
  }

  return res.status(500).json({
    message: 'internal_error',
  });
};
