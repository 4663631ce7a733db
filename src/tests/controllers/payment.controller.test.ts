// src/tests/controllers/payment.controller.test.ts
import { PaymentController } from '../../api/controllers/payment.controller';
import { ValidationError } from '../../lib/billing/utils/error';
import { FakeGateway, approvedCharge, jsonBody, mockRequest, mockResponse } from '../helpers';

describe('PaymentController', () => {
  let gateway: FakeGateway;
  let controller: PaymentController;

  beforeEach(() => {
    gateway = new FakeGateway();
    controller = new PaymentController(gateway);
  });

  it('initializes a hosted charge with 201', async () => {
    gateway.initializeCharge.mockResolvedValue({
      status: 'success',
      formUrl: 'https://checkout.example.com/cs_test_001',
      sessionId: 'cs_test_001'
    });
    const res = mockResponse();

    await controller.initializeCharge(
      mockRequest(
        {},
        {
          amount: '49.50',
          currency: 'EUR',
          redirectUrl: 'https://shop.example.com/return',
          billingInfo: { email: 'buyer@example.com' }
        }
      ),
      res
    );

    expect(gateway.initializeCharge).toHaveBeenCalledWith({
      amount: '49.50',
      currency: 'EUR',
      redirectUrl: 'https://shop.example.com/return',
      billingInfo: { email: 'buyer@example.com' }
    });
    expect(res.status).toHaveBeenCalledWith(201);
    expect(jsonBody(res).data.sessionId).toBe('cs_test_001');
  });

  it('completes a charge from its token', async () => {
    gateway.completeCharge.mockResolvedValue({
      status: 'success',
      transactionId: 'pi_test_002',
      approvedAmount: '49.50',
      currency: 'EUR',
      maskedCardLast4: '1881'
    });
    const res = mockResponse();

    await controller.completeCharge(mockRequest({}, { token: 'cs_test_001' }), res);

    expect(gateway.completeCharge).toHaveBeenCalledWith('cs_test_001');
    expect(res.status).toHaveBeenCalledWith(200);
  });

  it('passes refunds through', async () => {
    gateway.refund.mockResolvedValue({ status: 'success', transactionId: 're_test_001', amount: '10.00', currency: 'USD' });
    const res = mockResponse();

    await controller.refund(mockRequest({}, { originalTransactionId: 'pi_test_001', amount: 10 }), res);

    expect(gateway.refund).toHaveBeenCalledWith('pi_test_001', 10);
    expect(jsonBody(res).data.transactionId).toBe('re_test_001');
  });

  it('charges a customer', async () => {
    gateway.chargeCustomer.mockResolvedValue(approvedCharge('pi_test_003', '20.00'));
    const res = mockResponse();

    await controller.chargeCustomer(
      mockRequest({}, { customerRef: 'cus_gw_1', amount: 20, currency: 'USD', metadata: { orderId: 'order-9' } }),
      res
    );

    expect(gateway.chargeCustomer).toHaveBeenCalledWith({
      customerRef: 'cus_gw_1',
      amount: 20,
      currency: 'USD',
      metadata: { orderId: 'order-9' }
    });
    expect(jsonBody(res)).toEqual({ success: true, data: approvedCharge('pi_test_003', '20.00') });
  });

  it('rejects bodies of the wrong shape before reaching the gateway', async () => {
    await expect(controller.completeCharge(mockRequest({}, {}), mockResponse())).rejects.toThrow(ValidationError);
    await expect(
      controller.refund(mockRequest({}, { originalTransactionId: 'pi_test_001' }), mockResponse())
    ).rejects.toThrow(ValidationError);

    expect(gateway.completeCharge).not.toHaveBeenCalled();
    expect(gateway.refund).not.toHaveBeenCalled();
  });
});
