import express from 'express';
import cors from 'cors';
import { join } from 'path';
import { AppError, ValidationError } from '@support-desk/shared';
import type { ApiErrorBody, HealthResponse } from '@support-desk/shared';
import type { StorageService } from './services/storageService.js';
import type { ClassifierService } from './services/classifierService.js';
import { createTicketsRouter } from './routes/tickets.js';

interface AppDependencies {
  storage: StorageService;
  classifier: ClassifierService;
  clientDistPath?: string;
}

function isBodyParseError(err: Error): boolean {
  return 'type' in err && err.type === 'entity.parse.failed';
}

// body-parser and friends tag request errors with an HTTP status
function clientErrorStatus(err: Error): number | null {
  const status =
    'status' in err && typeof err.status === 'number'
      ? err.status
      : 'statusCode' in err && typeof err.statusCode === 'number'
        ? err.statusCode
        : null;
  return status !== null && status >= 400 && status < 500 ? status : null;
}

export function toErrorResponse(err: Error): { status: number; body: ApiErrorBody } {
  if (err instanceof ValidationError) {
    return { status: err.statusCode, body: { error: err.message, code: err.code, fields: err.fields } };
  }
  if (err instanceof AppError) {
    return { status: err.statusCode, body: { error: err.message, code: err.code } };
  }
  if (isBodyParseError(err)) {
    return { status: 400, body: { error: 'Malformed JSON body', code: 'VALIDATION_ERROR' } };
  }
  const status = clientErrorStatus(err);
  if (status !== null) {
    return { status, body: { error: err.message, code: 'BAD_REQUEST' } };
  }
  return { status: 500, body: { error: 'Internal server error' } };
}

export function errorHandler(
  err: Error,
  req: express.Request,
  res: express.Response,
  _next: express.NextFunction
) {
  const { status, body } = toErrorResponse(err);
  if (status >= 500) {
    console.error('[server] Unhandled error:', err);
  }
  res.status(status).json(body);
}

export function createApp({ storage, classifier, clientDistPath }: AppDependencies) {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  // Routes
  app.use('/api/tickets', createTicketsRouter(storage, classifier));

  // Health check
  app.get('/api/health', (req, res) => {
    const response: HealthResponse = { status: 'ok', timestamp: new Date().toISOString() };
    res.json(response);
  });

  // Serve client static files in production
  if (clientDistPath) {
    app.use(express.static(clientDistPath));
    app.get('*', (req, res, next) => {
      if (req.path.startsWith('/api')) return next();
      res.sendFile(join(clientDistPath, 'index.html'));
    });
  }

  // Error handler
  app.use(errorHandler);

  return app;
}
