// src/tests/controllers/vault.controller.test.ts
import { VaultController } from '../../api/controllers/vault.controller';
import { ErrorCode, ValidationError } from '../../lib/billing/utils/error';
import { createRequestContext } from '../../lib/billing/utils/request-context';
import { VaultManager } from '../../lib/billing/vault/vault.manager';
import { InMemoryVaultStore } from '../../lib/billing/vault/vault.store';
import { FakeGateway, approvedCharge, jsonBody, mockRequest, mockResponse } from '../helpers';

describe('VaultController', () => {
  let gateway: FakeGateway;
  let controller: VaultController;

  beforeEach(() => {
    gateway = new FakeGateway();
    controller = new VaultController(
      new VaultManager(new InMemoryVaultStore(), gateway, { clock: () => new Date(2025, 2, 15) })
    );

    // Spy on logger methods to avoid console output
    jest.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  const store = async (token: string = 'pm_test_1') => {
    const res = mockResponse();
    await controller.storePaymentMethod(
      mockRequest(
        {},
        {
          customerId: 'cust_001',
          gatewayCustomerRef: 'cus_gw_1',
          paymentMethodToken: token,
          details: { last4: '4242', brand: 'visa', expMonth: '08', expYear: '2029' }
        }
      ),
      res
    );
    return { res, entry: jsonBody(res).data };
  };

  it('stores a payment method without echoing its token', async () => {
    const { res, entry } = await store();

    expect(res.status).toHaveBeenCalledWith(201);
    expect(entry).toMatchObject({ customerId: 'cust_001', last4Digits: '4242', isDefault: true });
    expect(entry).not.toHaveProperty('paymentMethodToken');
    expect(entry).not.toHaveProperty('id');
  });

  it('rejects a body without a token', async () => {
    await expect(
      controller.storePaymentMethod(
        mockRequest({}, { customerId: 'cust_001', gatewayCustomerRef: 'cus_gw_1' }),
        mockResponse()
      )
    ).rejects.toThrow(ValidationError);
  });

  it('lists the customer entries and their default', async () => {
    const { entry: first } = await store('pm_test_1');
    await store('pm_test_2');

    const listRes = mockResponse();
    await controller.listCustomerPaymentMethods(mockRequest({ customerId: 'cust_001' }), listRes);
    expect(jsonBody(listRes).data).toHaveLength(2);

    const defaultRes = mockResponse();
    await controller.getDefaultPaymentMethod(mockRequest({ customerId: 'cust_001' }), defaultRes);
    expect(jsonBody(defaultRes).data.uuid).toBe(first.uuid);
  });

  it('reports a customer without a default as not found', async () => {
    await expect(
      controller.getDefaultPaymentMethod(mockRequest({ customerId: 'cust_009' }), mockResponse())
    ).rejects.toMatchObject({ code: ErrorCode.VAULT_NOT_FOUND });
  });

  it('switches the default and deactivates entries', async () => {
    await store('pm_test_1');
    const { entry: second } = await store('pm_test_2');

    const defaultRes = mockResponse();
    await controller.setDefault(mockRequest({ id: second.uuid }), defaultRes);
    expect(jsonBody(defaultRes)).toEqual({ success: true, data: { vaultId: second.uuid, isDefault: true } });

    const deleteRes = mockResponse();
    await controller.deactivate(mockRequest({ id: second.uuid }), deleteRes);
    expect(jsonBody(deleteRes)).toEqual({ success: true, data: { vaultId: second.uuid, isActive: false } });

    await expect(controller.deactivate(mockRequest({ id: second.uuid }), mockResponse())).rejects.toMatchObject({
      code: ErrorCode.VAULT_NOT_FOUND,
      httpStatus: 404
    });
  });

  describe('charge', () => {
    it('returns the approved charge', async () => {
      const { entry } = await store();
      gateway.chargeCustomer.mockResolvedValue(approvedCharge('pi_test_001', '15.00'));
      const res = mockResponse();

      await controller.charge(mockRequest({ id: entry.uuid }, { amount: 15, currency: 'USD' }), res);

      expect(res.status).toHaveBeenCalledWith(200);
      expect(jsonBody(res)).toEqual({ success: true, data: approvedCharge('pi_test_001', '15.00') });
    });

    it('answers a decline with 402', async () => {
      const { entry } = await store();
      gateway.chargeCustomer.mockResolvedValue({ status: 'declined', code: 'do_not_honor', message: 'Declined' });
      const res = mockResponse();
      res.locals.requestContext = createRequestContext('req-12345678');

      await controller.charge(mockRequest({ id: entry.uuid }, { amount: 15, currency: 'USD' }), res);

      expect(res.status).toHaveBeenCalledWith(402);
      expect(jsonBody(res)).toEqual({
        success: false,
        error: { code: 'do_not_honor', message: 'Declined', retryable: false, requestId: 'req-12345678' }
      });
    });

    it('answers a processor failure with 502', async () => {
      const { entry } = await store();
      gateway.chargeCustomer.mockResolvedValue({
        status: 'error',
        code: 'unexpected_status',
        message: 'Odd',
        retryable: true
      });
      const res = mockResponse();

      await controller.charge(mockRequest({ id: entry.uuid }, { amount: 15, currency: 'USD' }), res);

      expect(res.status).toHaveBeenCalledWith(502);
      expect(jsonBody(res).error.retryable).toBe(true);
    });
  });

  it('reports cleanup and statistics', async () => {
    await store();

    const cleanupRes = mockResponse();
    await controller.cleanupExpired(mockRequest(), cleanupRes);
    expect(jsonBody(cleanupRes)).toEqual({ success: true, data: { deactivated: 0 } });

    const statsRes = mockResponse();
    await controller.getStatistics(mockRequest(), statsRes);
    expect(jsonBody(statsRes)).toEqual({ success: true, data: { total: 1, active: 1, expired: 0 } });
  });
});
