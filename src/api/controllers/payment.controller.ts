// src/api/controllers/payment.controller.ts
import { Request, Response } from 'express';
import { PaymentGateway } from '../../lib/billing/gateway/types';
import { parseOrThrow } from '../../lib/billing/utils/validation';
import {
  chargeCustomerBodySchema,
  completeChargeBodySchema,
  initializeChargeBodySchema,
  refundBodySchema
} from '../validation/request-schemas';
import { sendGatewayResult } from '../responses';

/** One-off payments straight against the gateway. */
export class PaymentController {
  constructor(private gateway: PaymentGateway) {}

  initializeCharge = async (req: Request, res: Response): Promise<void> => {
    const body = parseOrThrow(initializeChargeBodySchema, req.body, 'Invalid charge request');
    sendGatewayResult(res, await this.gateway.initializeCharge(body), 201);
  };

  completeCharge = async (req: Request, res: Response): Promise<void> => {
    const { token } = parseOrThrow(completeChargeBodySchema, req.body, 'Invalid completion request');
    sendGatewayResult(res, await this.gateway.completeCharge(token));
  };

  refund = async (req: Request, res: Response): Promise<void> => {
    const body = parseOrThrow(refundBodySchema, req.body, 'Invalid refund request');
    sendGatewayResult(res, await this.gateway.refund(body.originalTransactionId, body.amount));
  };

  chargeCustomer = async (req: Request, res: Response): Promise<void> => {
    const body = parseOrThrow(chargeCustomerBodySchema, req.body, 'Invalid charge request');
    sendGatewayResult(res, await this.gateway.chargeCustomer(body));
  };
}
