// src/tests/helpers.ts
import { Request, Response } from 'express';
import {
  ChargeCompletion,
  ChargeCustomerInput,
  ChargeInitialization,
  ChargeResult,
  GatewayConfig,
  GatewayResult,
  InitializeChargeInput,
  PaymentGateway,
  RefundReceipt
} from '../lib/billing/gateway/types';
import { AmountInput } from '../lib/billing/utils/money';

export const testGatewayConfig: GatewayConfig = {
  apiKey: 'sk_test_placeholder',
  environment: 'sandbox',
  timeoutMs: 30000,
  defaultCurrency: 'USD',
  maxAmount: '999999.99'
};

/** Gateway double whose every operation is a jest mock. */
export class FakeGateway implements PaymentGateway {
  readonly name = 'fake';
  initializeCharge = jest.fn<Promise<GatewayResult<ChargeInitialization>>, [InitializeChargeInput]>();
  completeCharge = jest.fn<Promise<GatewayResult<ChargeCompletion>>, [string]>();
  refund = jest.fn<Promise<GatewayResult<RefundReceipt>>, [string, AmountInput]>();
  chargeCustomer = jest.fn<Promise<ChargeResult>, [ChargeCustomerInput]>();
}

export function approvedCharge(transactionId: string, amount: string, currency: string = 'USD'): ChargeResult {
  return { status: 'success', transactionId, amount, currency };
}

// Helper to create a mock express request
export const mockRequest = (params: any = {}, body: any = {}, query: any = {}) => {
  return {
    params,
    body,
    query,
    headers: {}
  } as Request;
};

// Helper to create a mock express response
export const mockResponse = () => {
  const res: any = { locals: {} };
  res.status = jest.fn().mockReturnValue(res);
  res.json = jest.fn().mockReturnValue(res);
  res.setHeader = jest.fn().mockReturnValue(res);
  return res as Response;
};

/** Body passed to the last `res.json` call. */
export function jsonBody(res: Response): any {
  const json = res.json as jest.Mock;
  return json.mock.calls[json.mock.calls.length - 1][0];
}
