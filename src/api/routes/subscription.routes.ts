// src/api/routes/subscription.routes.ts
import { Router } from 'express';
import { BillingJobRunner } from '../../lib/billing/jobs/billing-job.runner';
import { BillingScheduler } from '../../lib/billing/subscription/billing.scheduler';
import { DecimalAmount } from '../../lib/billing/utils/money';
import { SubscriptionController } from '../controllers/subscription.controller';
import { asyncHandler } from '../middleware/async-handler';

export function createSubscriptionRoutes(
  scheduler: BillingScheduler,
  jobRunner: BillingJobRunner,
  maxAmount: DecimalAmount
): Router {
  const router = Router();
  const controller = new SubscriptionController(scheduler, jobRunner, maxAmount);

  router.get('/', asyncHandler(controller.listCustomerSubscriptions));
  router.post('/', asyncHandler(controller.createSubscription));

  // Fixed paths before /:id
  router.get('/statistics', asyncHandler(controller.getStatistics));
  router.post('/process-due', asyncHandler(controller.processDue));

  router.get('/:id', asyncHandler(controller.getSubscription));
  router.post('/:id/cancel', asyncHandler(controller.cancelSubscription));

  return router;
}
