import cors from 'cors';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import multer from 'multer';
import type { MathSolvingService } from '../src/services/mathSolving';
import { ApiError, errorMessage, toErrorResponse } from '../src/utils/errorHandler';
import { formatBytes, MAX_UPLOAD_BYTES } from '../src/utils/imageValidation';
import type { AuthGateway } from './auth';
import type { AppConfig } from './config';
import { createApiRouter, UPLOAD_FIELD } from './routes';

export interface AppDeps {
  config: Pick<AppConfig, 'environment' | 'version' | 'allowedOrigins' | 'historyStore' | 'openai' | 'firebase' | 'firebaseProjectId'>;
  service: MathSolvingService;
  authGateway: AuthGateway;
  /** Disable per-request logging (tests). */
  quiet?: boolean;
}

function multerErrorMessage(error: multer.MulterError): string {
  switch (error.code) {
    case 'LIMIT_FILE_SIZE':
      return `File too large. Max: ${formatBytes(MAX_UPLOAD_BYTES)}`;
    case 'LIMIT_UNEXPECTED_FILE':
      return `Unexpected file field "${error.field ?? ''}". Send the image in the "${UPLOAD_FIELD}" field.`;
    case 'LIMIT_FILE_COUNT':
      return 'Only one file can be uploaded per request';
    default:
      return `Invalid upload: ${error.message}`;
  }
}

export function createApp({ config, service, authGateway, quiet = false }: AppDeps): Express {
  const app = express();
  app.disable('x-powered-by');

  // Health check first so it never waits on anything else.
  app.get('/health', (req, res) => {
    res.status(200).json({ status: 'healthy' });
  });

  if (!quiet) {
    app.use((req, res, next) => {
      const startedAt = Date.now();
      res.on('finish', () => {
        console.log(`➡️ ${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - startedAt}ms`);
      });
      next();
    });
  }

  app.use(cors({
    origin: config.allowedOrigins,
    credentials: true,
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  }));

  app.get('/', (req, res) => {
    res.json({
      message: 'Math Homework Solver API',
      version: config.version,
    });
  });

  // Shows what is configured without exposing keys.
  app.get('/api/v1/config-check', (req, res) => {
    res.json({
      environment: config.environment,
      apis: {
        openai: config.openai.apiKey ? 'configured' : 'missing (set OPENAI_API_KEY)',
        firebase: config.firebase
          ? 'configured'
          : config.firebaseProjectId
            ? 'application default credentials'
            : 'missing (set FIREBASE_PROJECT_ID, FIREBASE_CLIENT_EMAIL, FIREBASE_PRIVATE_KEY)',
      },
      model: config.openai.model,
      history_store: config.historyStore,
    });
  });

  app.use('/api/v1', createApiRouter({ service, authGateway }));

  app.use((req, res) => {
    res.status(404).json({ detail: 'Not Found' });
  });

  // Express recognises error handlers by arity, so `next` must stay.
  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (error instanceof multer.MulterError) {
      res.status(400).json({ detail: multerErrorMessage(error) });
      return;
    }

    const { statusCode, body } = toErrorResponse(error);
    if (statusCode === 401) {
      res.setHeader('WWW-Authenticate', 'Bearer');
    }
    if (!(error instanceof ApiError)) {
      console.error(`❌ Unhandled error on ${req.method} ${req.originalUrl}:`, errorMessage(error));
    }
    res.status(statusCode).json(body);
  });

  return app;
}
