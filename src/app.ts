import express, { type ErrorRequestHandler } from 'express';
import cors from 'cors';
import morgan from 'morgan';
import multer from 'multer';
import { ZodError } from 'zod';
import { env } from './config/env';
import { AmbiguousDuplicateError, HttpError } from './errors';
import extractionRouter from './routes/extraction';
import type { ErrorResponse } from './types/extraction';

const SERVICE_NAME = 'Bill Data Extraction API';
const SERVICE_VERSION = '1.0.0';

const formatZodError = (error: ZodError) =>
  error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');

// body-parser raises http-errors instances (e.g. 413 entity.too.large)
const clientErrorStatus = (error: unknown): number | null => {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    const { status } = error;
    if (typeof status === 'number' && status >= 400 && status < 500) return status;
  }
  return null;
};

const toErrorResponse = (error: unknown): { status: number; body: ErrorResponse } => {
  if (error instanceof AmbiguousDuplicateError) {
    return {
      status: error.status,
      body: {
        is_success: false,
        error: error.message,
        data: null,
        conflicting_indices: error.conflictingIndices,
      },
    };
  }
  if (error instanceof HttpError) {
    return { status: error.status, body: { is_success: false, error: error.message, data: null } };
  }
  if (error instanceof ZodError) {
    return { status: 400, body: { is_success: false, error: formatZodError(error), data: null } };
  }
  if (error instanceof multer.MulterError) {
    const status = error.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
    return { status, body: { is_success: false, error: error.message, data: null } };
  }
  if (error instanceof SyntaxError) {
    return { status: 400, body: { is_success: false, error: 'Request must be valid JSON', data: null } };
  }
  const clientStatus = clientErrorStatus(error);
  if (clientStatus !== null && error instanceof Error) {
    return { status: clientStatus, body: { is_success: false, error: error.message, data: null } };
  }
  return {
    status: 500,
    body: {
      is_success: false,
      error: `Internal error: ${error instanceof Error ? error.message : 'Unexpected error'}`,
      data: null,
    },
  };
};

export const createApp = () => {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '70mb' }));
  app.use(morgan('dev', { skip: () => env.nodeEnv === 'test' }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'healthy',
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      model: env.geminiModel,
      timestamp: new Date().toISOString(),
    });
  });

  app.use(extractionRouter);

  app.use((_req, res) => {
    const body: ErrorResponse = { is_success: false, error: 'Endpoint not found', data: null };
    res.status(404).json(body);
  });

  const errorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
    const { status, body } = toErrorResponse(err);
    if (status >= 500) {
      // eslint-disable-next-line no-console
      console.error(err);
    } else {
      console.warn('[HTTP] Request rejected', { status, error: body.error });
    }
    res.status(status).json(body);
  };

  app.use(errorHandler);

  return app;
};
