import express from 'express';
import cors from 'cors';
import cookieParser from 'cookie-parser';
import { AuthGuard } from './middleware/auth';
import { createAdminRouter, createAnalyticsRouter } from './routes/analytics';
import { createAuthRouter } from './routes/auth';
import { createChatRouter } from './routes/chat';
import { createDocumentsRouter } from './routes/documents';
import { AppServices } from './services';
import { AppError, sendError } from './utils/errors';

export interface AppOptions {
  logRequests?: boolean;
}

export function createApp(services: AppServices, options: AppOptions = {}) {
  const app = express();
  const guard = new AuthGuard(services.sessions, services.credentials);

  // Middleware
  app.use(cors({ origin: true, credentials: true }));
  app.use(express.json({ limit: '100kb' }));
  app.use(express.urlencoded({ extended: true, limit: '100kb' }));
  app.use(cookieParser());

  // Request logging middleware
  if (options.logRequests ?? true) {
    app.use((req, res, next) => {
      console.log(`[${new Date().toISOString()}] ${req.method} ${req.path}`);
      next();
    });
  }

  // Routes
  app.use('/api', createAuthRouter({
    credentials: services.credentials,
    sessions: services.sessions,
    guard,
    cookieMaxAgeMs: services.cookieMaxAgeMs
  }));
  app.use('/api/chat', createChatRouter({ assistant: services.assistant, guard }));
  app.use('/api/documents', createDocumentsRouter({ documents: services.documents, guard }));
  app.use('/api/analytics', createAnalyticsRouter({ analytics: services.analytics, credentials: services.credentials, guard }));
  app.use('/api/admin', createAdminRouter({ analytics: services.analytics, credentials: services.credentials, guard }));

  // Health check
  app.get('/api/health', (req, res) => {
    res.json({ status: 'ok', message: 'Server is running' });
  });

  app.use('/api', (req, res) => {
    res.status(404).json({ error: `No route for ${req.method} ${req.path}` });
  });

  // Error handling middleware (malformed JSON, oversized bodies, anything thrown synchronously)
  app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    const status = typeof err === 'object' && err !== null ? Reflect.get(err, 'status') : undefined;
    if (!(err instanceof AppError) && typeof status === 'number' && status >= 400 && status < 500) {
      res.status(status).json({ error: err instanceof Error ? err.message : 'Bad request' });
      return;
    }
    sendError(res, err, 'server');
  });

  return app;
}
