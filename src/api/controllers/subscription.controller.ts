// src/api/controllers/subscription.controller.ts
import { Request, Response } from 'express';
import { BillingJobRunner } from '../../lib/billing/jobs/billing-job.runner';
import { BillingScheduler } from '../../lib/billing/subscription/billing.scheduler';
import { BillingError, ErrorCode } from '../../lib/billing/utils/error';
import { createSubscriptionSchema, parseOrThrow } from '../../lib/billing/utils/validation';
import { DecimalAmount } from '../../lib/billing/utils/money';
import { customerQuerySchema, idParamsSchema } from '../validation/request-schemas';
import { sendData } from '../responses';

export class SubscriptionController {
  constructor(
    private scheduler: BillingScheduler,
    private jobRunner: BillingJobRunner,
    private maxAmount: DecimalAmount
  ) {}

  createSubscription = async (req: Request, res: Response): Promise<void> => {
    const input = parseOrThrow(createSubscriptionSchema(this.maxAmount), req.body, 'Invalid subscription request');
    const subscription = await this.scheduler.createSubscription(input);
    sendData(res, subscription, 201);
  };

  getSubscription = async (req: Request, res: Response): Promise<void> => {
    const { id } = parseOrThrow(idParamsSchema, req.params, 'Invalid subscription ID');
    const subscription = await this.scheduler.getSubscription(id);

    if (!subscription) {
      throw new BillingError('Subscription not found', ErrorCode.SUBSCRIPTION_NOT_FOUND, { subscriptionId: id });
    }

    sendData(res, subscription);
  };

  listCustomerSubscriptions = async (req: Request, res: Response): Promise<void> => {
    const { customerId } = parseOrThrow(customerQuerySchema, req.query, 'Invalid subscription query');
    const subscriptions = await this.scheduler.getCustomerSubscriptions(customerId);
    sendData(res, subscriptions);
  };

  cancelSubscription = async (req: Request, res: Response): Promise<void> => {
    const { id } = parseOrThrow(idParamsSchema, req.params, 'Invalid subscription ID');
    const cancelled = await this.scheduler.cancelSubscription(id);

    if (!cancelled) {
      throw new BillingError('Subscription not found or already cancelled', ErrorCode.SUBSCRIPTION_INACTIVE, {
        subscriptionId: id
      });
    }

    sendData(res, { subscriptionId: id, cancelled: true });
  };

  // Shares the job runner's lock so a manual run never overlaps a scheduled one
  processDue = async (_req: Request, res: Response): Promise<void> => {
    if (this.jobRunner.isRunning('billing')) {
      throw new BillingError('A billing run is already in progress', ErrorCode.BILLING_IN_PROGRESS);
    }

    const results = await this.jobRunner.runBilling();
    if (!results) {
      throw new BillingError('Billing run failed', ErrorCode.INTERNAL_ERROR);
    }

    sendData(res, {
      processed: results.length,
      succeeded: results.filter(result => result.status === 'success').length,
      results
    });
  };

  getStatistics = async (_req: Request, res: Response): Promise<void> => {
    sendData(res, await this.scheduler.getStatistics());
  };
}
