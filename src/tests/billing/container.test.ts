// src/tests/billing/container.test.ts
import { createApp } from '../../app';
import { loadConfig } from '../../lib/billing/config/billing.config';
import { createBillingContainer } from '../../lib/billing/container';
import { InMemoryRateLimiter } from '../../lib/billing/rate-limit/memory-rate-limiter';
import { InMemorySubscriptionStore } from '../../lib/billing/subscription/subscription.store';
import { BillingFrequency } from '../../lib/billing/subscription/types';
import { FakeGateway, approvedCharge } from '../helpers';

describe('createBillingContainer', () => {
  beforeEach(() => {
    // Spy on logger methods to avoid console output
    jest.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  const memoryConfig = () =>
    loadConfig({ GATEWAY_API_KEY: 'sk_test_placeholder', STORAGE: 'memory', MAX_CHARGE_AMOUNT: '100' });

  it('wires in-memory stores and the Stripe gateway', () => {
    const container = createBillingContainer(memoryConfig());

    expect(container.database).toBeNull();
    expect(container.subscriptionStore).toBeInstanceOf(InMemorySubscriptionStore);
    expect(container.gateway.name).toBe('stripe');
    expect(container.rateLimiter).toBeInstanceOf(InMemoryRateLimiter);
    expect(container.jobRunner.isStarted()).toBe(false);
  });

  it('shares one gateway and clock between the services', async () => {
    const gateway = new FakeGateway();
    gateway.chargeCustomer.mockResolvedValue(approvedCharge('pi_test_001', '20.00'));
    let now = new Date(2025, 0, 1);
    const container = createBillingContainer(memoryConfig(), { gateway, clock: () => now });

    const subscription = await container.scheduler.createSubscription({
      customerId: 'cust_001',
      amount: '20',
      currency: 'USD',
      frequency: BillingFrequency.DAILY
    });
    now = new Date(2025, 0, 2);
    const [result] = await container.scheduler.processDue();

    expect(result.subscriptionId).toBe(subscription.uuid);
    expect(result.status).toBe('success');
    await expect(
      container.scheduler.createSubscription({
        customerId: 'cust_001',
        amount: '100.01',
        currency: 'USD',
        frequency: BillingFrequency.DAILY
      })
    ).rejects.toThrow('Invalid subscription: amount');
  });

  it('builds an express application around the container', () => {
    const app = createApp(createBillingContainer(memoryConfig(), { gateway: new FakeGateway() }));

    expect(typeof app.listen).toBe('function');
  });
});
