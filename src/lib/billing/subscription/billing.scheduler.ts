// src/lib/billing/subscription/billing.scheduler.ts
import { v4 as uuidv4 } from 'uuid';
import { failed, failureFromError, isRetryableResult, isSuccess } from '../gateway/result';
import { PaymentGateway } from '../gateway/types';
import { ErrorCode } from '../utils/error';
import { BillingLogger } from '../utils/logger';
import { DecimalAmount } from '../utils/money';
import {
  DEFAULT_MAX_AMOUNT,
  createSubscriptionSchema,
  parseOrThrow,
  validateCustomerId,
  validateUuid
} from '../utils/validation';
import { addBillingInterval } from './billing-calendar';
import { SubscriptionStore } from './subscription.store';
import {
  ActiveSubscription,
  BillingResult,
  CreateSubscriptionInput,
  NewSubscription,
  Subscription,
  SubscriptionStatistics,
  SubscriptionStatus,
  isActive
} from './types';

export interface BillingSchedulerOptions {
  maxAmount?: DecimalAmount;
  /** Upper bound on subscriptions pulled per `processDue` run. */
  batchLimit?: number;
  clock?: () => Date;
  logger?: BillingLogger;
}

export class BillingScheduler {
  private logger: BillingLogger;
  private maxAmount: DecimalAmount;
  private batchLimit?: number;
  private clock: () => Date;
  // Subscriptions with a charge outstanding in this process
  private inFlight: Set<string> = new Set();

  constructor(
    private store: SubscriptionStore,
    private gateway: PaymentGateway,
    options: BillingSchedulerOptions = {}
  ) {
    this.logger = options.logger ?? new BillingLogger(undefined, 'BillingScheduler');
    this.maxAmount = options.maxAmount ?? DEFAULT_MAX_AMOUNT;
    this.batchLimit = options.batchLimit;
    this.clock = options.clock ?? (() => new Date());
  }

  async createSubscription(input: CreateSubscriptionInput): Promise<ActiveSubscription> {
    const data = parseOrThrow(createSubscriptionSchema(this.maxAmount), input, 'Invalid subscription');
    const createdAt = this.clock();

    const subscription: NewSubscription = {
      uuid: uuidv4(),
      customerId: data.customerId,
      amount: data.amount,
      currency: data.currency,
      status: SubscriptionStatus.ACTIVE,
      frequency: data.frequency,
      createdAt,
      nextBillingAt: addBillingInterval(createdAt, data.frequency),
      lastBillingAt: null,
      cancelledAt: null,
      billingCycle: 0,
      metadata: data.metadata ?? null
    };

    const created = await this.store.create(subscription);

    this.logger.info('Subscription created', {
      subscriptionId: created.uuid,
      customerId: created.customerId,
      amount: created.amount,
      currency: created.currency,
      frequency: created.frequency,
      nextBillingAt: created.nextBillingAt
    });

    return created;
  }

  /** Returns false when the subscription is unknown or already cancelled. */
  async cancelSubscription(uuid: string): Promise<boolean> {
    validateUuid(uuid, 'subscriptionId');

    const cancelled = await this.store.cancel(uuid, this.clock());
    if (!cancelled) {
      this.logger.warn('Subscription not cancelled: missing or already cancelled', { subscriptionId: uuid });
      return false;
    }

    this.logger.info('Subscription cancelled', {
      subscriptionId: uuid,
      cancelledAt: cancelled.cancelledAt
    });
    return true;
  }

  /**
   * Bills every active subscription due at `asOf`, earliest first. Each one is
   * processed on its own; a failure is reported in its result and the batch
   * carries on.
   */
  async processDue(asOf: Date = this.clock()): Promise<BillingResult[]> {
    const due = await this.store.findDueForBilling(asOf, this.batchLimit);
    this.logger.info('Processing due subscriptions', { asOf, count: due.length });

    const results: BillingResult[] = [];
    for (const subscription of due) {
      results.push(await this.processOne(subscription));
    }

    const succeeded = results.filter(result => result.status === 'success').length;
    this.logger.info('Finished processing due subscriptions', {
      asOf,
      processed: results.length,
      succeeded,
      failed: results.length - succeeded,
      retryable: results.filter(result => isRetryableResult(result)).length
    });

    return results;
  }

  /**
   * Charges one subscription and advances its schedule. A subscription that is
   * already being charged in this process is skipped; the processor
   * idempotency key covers concurrent runs elsewhere.
   */
  async processOne(subscription: Subscription): Promise<BillingResult> {
    const subscriptionId = subscription.uuid;
    const customerId = subscription.customerId;

    if (this.inFlight.has(subscriptionId)) {
      this.logger.warn('Subscription is already being billed, skipping', { subscriptionId });
      return {
        ...failed(ErrorCode.BILLING_IN_PROGRESS, 'billing already in progress', false),
        subscriptionId,
        customerId,
        billingCycle: subscription.billingCycle
      };
    }

    this.inFlight.add(subscriptionId);
    try {
      const current = await this.store.findByUuid(subscriptionId);
      if (!current || !isActive(current)) {
        return {
          ...failed(ErrorCode.SUBSCRIPTION_INACTIVE, 'not active', false),
          subscriptionId,
          customerId,
          billingCycle: current ? current.billingCycle : subscription.billingCycle
        };
      }

      const billingCycle = current.billingCycle + 1;
      const result = await this.gateway.chargeCustomer({
        customerRef: current.customerId,
        amount: current.amount,
        currency: current.currency,
        idempotencyKey: `subscription:${subscriptionId}:cycle:${billingCycle}`,
        metadata: { subscriptionId, billingCycle }
      });

      if (!isSuccess(result)) {
        this.logger.warn('Subscription charge not approved', {
          subscriptionId,
          status: result.status,
          code: result.code,
          message: result.message,
          retryable: isRetryableResult(result)
        });
        return { ...result, subscriptionId, customerId, billingCycle: current.billingCycle };
      }

      const billedAt = this.clock();
      const advanced = await this.store.recordSuccessfulBilling(subscriptionId, {
        expectedCycle: current.billingCycle,
        billedAt,
        nextBillingAt: addBillingInterval(billedAt, current.frequency)
      });

      if (!advanced) {
        // The charge went through; the record moved on underneath us
        this.logger.error('Charge succeeded but billing advance was not applied', {
          subscriptionId,
          transactionId: result.transactionId,
          expectedCycle: current.billingCycle
        });
        return { ...result, subscriptionId, customerId, billingCycle };
      }

      this.logger.info('Subscription billed', {
        subscriptionId,
        transactionId: result.transactionId,
        billingCycle: advanced.billingCycle,
        nextBillingAt: advanced.nextBillingAt
      });

      return { ...result, subscriptionId, customerId, billingCycle: advanced.billingCycle };
    } catch (error) {
      this.logger.error('Subscription billing failed', { subscriptionId, error });
      return { ...failureFromError(error), subscriptionId, customerId, billingCycle: subscription.billingCycle };
    } finally {
      this.inFlight.delete(subscriptionId);
    }
  }

  async getStatistics(): Promise<SubscriptionStatistics> {
    return this.store.getStatistics();
  }

  async getSubscription(uuid: string): Promise<Subscription | null> {
    return this.store.findByUuid(validateUuid(uuid, 'subscriptionId'));
  }

  async getCustomerSubscriptions(customerId: string): Promise<ActiveSubscription[]> {
    return this.store.findActiveByCustomer(validateCustomerId(customerId));
  }
}
