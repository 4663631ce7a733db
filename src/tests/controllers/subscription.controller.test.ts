// src/tests/controllers/subscription.controller.test.ts
import { SubscriptionController } from '../../api/controllers/subscription.controller';
import { ChargeResult } from '../../lib/billing/gateway/types';
import { BillingJobRunner } from '../../lib/billing/jobs/billing-job.runner';
import { BillingScheduler } from '../../lib/billing/subscription/billing.scheduler';
import { InMemorySubscriptionStore } from '../../lib/billing/subscription/subscription.store';
import { ErrorCode, ValidationError } from '../../lib/billing/utils/error';
import { VaultManager } from '../../lib/billing/vault/vault.manager';
import { InMemoryVaultStore } from '../../lib/billing/vault/vault.store';
import { FakeGateway, approvedCharge, jsonBody, mockRequest, mockResponse } from '../helpers';

describe('SubscriptionController', () => {
  let gateway: FakeGateway;
  let scheduler: BillingScheduler;
  let controller: SubscriptionController;
  let now: Date;

  beforeEach(() => {
    gateway = new FakeGateway();
    now = new Date('2025-01-31T10:00:00.000Z');
    scheduler = new BillingScheduler(new InMemorySubscriptionStore(), gateway, { clock: () => now });
    const jobRunner = new BillingJobRunner(scheduler, new VaultManager(new InMemoryVaultStore(), gateway));
    controller = new SubscriptionController(scheduler, jobRunner, '1000.00');

    // Spy on logger methods to avoid console output
    jest.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  const create = async (customerId: string = 'cust_001') => {
    const res = mockResponse();
    await controller.createSubscription(
      mockRequest({}, { customerId, amount: 29.99, currency: 'USD', frequency: 'monthly' }),
      res
    );
    return jsonBody(res).data;
  };

  describe('createSubscription', () => {
    it('responds 201 with the created subscription', async () => {
      const res = mockResponse();

      await controller.createSubscription(
        mockRequest({}, { customerId: 'cust_001', amount: 29.99, currency: 'USD', frequency: 'monthly' }),
        res
      );

      expect(res.status).toHaveBeenCalledWith(201);
      expect(jsonBody(res)).toEqual({
        success: true,
        data: expect.objectContaining({
          customerId: 'cust_001',
          amount: '29.99',
          status: 'active',
          billingCycle: 0
        })
      });
    });

    it('enforces the configured amount ceiling', async () => {
      await expect(
        controller.createSubscription(
          mockRequest({}, { customerId: 'cust_001', amount: '1000.01', currency: 'USD', frequency: 'monthly' }),
          mockResponse()
        )
      ).rejects.toThrow(ValidationError);
    });
  });

  describe('getSubscription', () => {
    it('returns a stored subscription', async () => {
      const created = await create();
      const res = mockResponse();

      await controller.getSubscription(mockRequest({ id: created.uuid }), res);

      expect(res.status).toHaveBeenCalledWith(200);
      expect(jsonBody(res).data.uuid).toBe(created.uuid);
    });

    it('reports an unknown subscription as not found', async () => {
      await expect(
        controller.getSubscription(mockRequest({ id: '4f8a7c3e-2b1d-4e5f-9a6b-7c8d9e0f1a2b' }), mockResponse())
      ).rejects.toMatchObject({ code: ErrorCode.SUBSCRIPTION_NOT_FOUND, httpStatus: 404 });
    });

    it('rejects a malformed id', async () => {
      await expect(controller.getSubscription(mockRequest({ id: '42' }), mockResponse())).rejects.toThrow(
        ValidationError
      );
    });
  });

  it('lists active subscriptions of the customer in the query', async () => {
    await create('cust_001');
    await create('cust_002');
    const res = mockResponse();

    await controller.listCustomerSubscriptions(mockRequest({}, {}, { customerId: 'cust_002' }), res);

    const { data } = jsonBody(res);
    expect(data).toHaveLength(1);
    expect(data[0].customerId).toBe('cust_002');
  });

  it('cancels once and reports a conflict afterwards', async () => {
    const created = await create();
    const res = mockResponse();

    await controller.cancelSubscription(mockRequest({ id: created.uuid }), res);

    expect(jsonBody(res)).toEqual({ success: true, data: { subscriptionId: created.uuid, cancelled: true } });
    await expect(controller.cancelSubscription(mockRequest({ id: created.uuid }), mockResponse())).rejects.toMatchObject(
      { code: ErrorCode.SUBSCRIPTION_INACTIVE, httpStatus: 409 }
    );
  });

  it('processes due subscriptions and summarizes the run', async () => {
    await create();
    gateway.chargeCustomer.mockResolvedValue(approvedCharge('pi_test_001', '29.99'));
    now = new Date('2025-03-05T00:00:00.000Z');
    const res = mockResponse();

    await controller.processDue(mockRequest(), res);

    const { data } = jsonBody(res);
    expect(data.processed).toBe(1);
    expect(data.succeeded).toBe(1);
    expect(data.results[0].billingCycle).toBe(1);
  });

  it('refuses a manual run while another billing run is in progress', async () => {
    await create();
    let release: (result: ChargeResult) => void = () => undefined;
    gateway.chargeCustomer.mockReturnValue(
      new Promise<ChargeResult>(resolve => {
        release = resolve;
      })
    );
    now = new Date('2025-03-05T00:00:00.000Z');
    const firstRes = mockResponse();

    const first = controller.processDue(mockRequest(), firstRes);
    await expect(controller.processDue(mockRequest(), mockResponse())).rejects.toMatchObject({
      code: ErrorCode.BILLING_IN_PROGRESS,
      httpStatus: 409
    });

    release(approvedCharge('pi_test_002', '29.99'));
    await first;

    expect(gateway.chargeCustomer).toHaveBeenCalledTimes(1);
    expect(jsonBody(firstRes).data.succeeded).toBe(1);
  });

  it('returns statistics', async () => {
    await create();
    const res = mockResponse();

    await controller.getStatistics(mockRequest(), res);

    expect(jsonBody(res)).toEqual({ success: true, data: { total: 1, active: 1, cancelled: 0 } });
  });
});
