/**
 * Express application setup for the parameter validation service.
 *
 * This module:
 * - Creates and configures the Express 5 app instance.
 * - Registers global middleware (correlation ids, JSON and url-encoded body parsing).
 * - Mounts the account routes, whose handlers run behind the parameter validation stage.
 * - Exposes a healthcheck endpoint for monitoring.
 */
import express, { Application, NextFunction, Request, Response } from 'express';

import type { AccountServicePort } from './http/routes/accountRoutes';
import type { ValidationPolicy } from './validation/application/ValidationSession';
import { AccountService } from './accounts/application/AccountService';
import { InMemoryAccountStore } from './accounts/infrastructure/InMemoryAccountStore';
import { createAccountRoutes } from './http/routes/accountRoutes';
import { correlationIdMiddleware } from './http/middleware/correlationId';
import { errorHandler } from './http/middleware/errorHandler';
import { notFound } from './http/middleware/notFound';
import { createUploadMiddleware } from './http/middleware/uploads';
import { config } from './shared/config/Config';
import { logger } from './shared/logging/Logger';
import type {} from './http/requestContext';

export type AppDeps = {
  accountService: AccountServicePort;
  validationPolicy: ValidationPolicy;
  maxUploadBytes: number;
};

export function createApp(deps: Partial<AppDeps> = {}): Application {
  const app = express();

  const accountService = deps.accountService ?? new AccountService(new InMemoryAccountStore());
  const validationPolicy = deps.validationPolicy ?? config.validationPolicy;
  const maxUploadBytes = deps.maxUploadBytes ?? config.maxUploadBytes;

  app.use(correlationIdMiddleware);

  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  // Simple request logging for visibility in development
  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.debug(
      { method: req.method, path: req.path, correlationId: req.correlationId },
      'Incoming request',
    );
    next();
  });

  // Basic healthcheck endpoint used by monitors
  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'ok',
      service: config.serviceName,
      timestamp: new Date().toISOString(),
    });
  });

  app.use(
    createAccountRoutes(accountService, {
      policy: validationPolicy,
      uploads: createUploadMiddleware(maxUploadBytes),
    }),
  );

  app.use(notFound);
  app.use(errorHandler);

  return app;
}
