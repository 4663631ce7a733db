// src/app.ts
import express, { Express } from 'express';
import cors from 'cors';
import { createPaymentRoutes } from './api/routes/payment.routes';
import { createSubscriptionRoutes } from './api/routes/subscription.routes';
import { createVaultRoutes } from './api/routes/vault.routes';
import { errorMiddleware, notFoundHandler } from './api/middleware/error.middleware';
import { rateLimitMiddleware } from './api/middleware/rate-limit.middleware';
import { requestContextMiddleware } from './api/middleware/request-context.middleware';
import { BillingContainer } from './lib/billing/container';

export function createApp(container: BillingContainer): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(requestContextMiddleware(container.performanceMonitor));
  app.use(express.json());
  app.use(rateLimitMiddleware(container.rateLimiter));

  // Routes
  app.use(
    '/api/subscriptions',
    createSubscriptionRoutes(container.scheduler, container.jobRunner, container.config.gateway.config.maxAmount)
  );
  app.use('/api/vault', createVaultRoutes(container.vault));
  app.use('/api/payments', createPaymentRoutes(container.gateway));

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({
      status: 'UP',
      timestamp: new Date(),
      storage: container.config.storage,
      gateway: container.gateway.name,
      jobs: container.jobRunner.isStarted() ? 'running' : 'stopped'
    });
  });

  app.use(notFoundHandler);
  app.use(errorMiddleware);

  return app;
}
