// src/api/validation/request-schemas.ts
import { z } from 'zod';
import {
  amountSchema,
  currencySchema,
  customerIdSchema,
  metadataSchema,
  uuidSchema
} from '../../lib/billing/utils/validation';

export const idParamsSchema = z.object({ id: uuidSchema });

export const customerParamsSchema = z.object({ customerId: customerIdSchema });

export const customerQuerySchema = z.object({ customerId: customerIdSchema });

const addressSchema = z.record(z.string());

export const vaultChargeBodySchema = z.object({
  amount: amountSchema(),
  currency: currencySchema,
  metadata: metadataSchema.optional(),
  idempotencyKey: z.string().min(1).max(200).optional()
});

export const initializeChargeBodySchema = z.object({
  amount: z.union([z.number(), z.string()]),
  currency: z.string(),
  redirectUrl: z.string(),
  billingInfo: addressSchema.optional(),
  shippingInfo: addressSchema.optional()
});

export const completeChargeBodySchema = z.object({
  token: z.string({ required_error: 'Completion token is required' })
});

export const refundBodySchema = z.object({
  originalTransactionId: z.string({ required_error: 'Original transaction ID is required' }),
  amount: z.union([z.number(), z.string()])
});

export const chargeCustomerBodySchema = z.object({
  customerRef: z.string({ required_error: 'Customer reference is required' }),
  amount: z.union([z.number(), z.string()]),
  currency: z.string(),
  paymentMethodToken: z.string().optional(),
  metadata: metadataSchema.optional(),
  idempotencyKey: z.string().optional()
});
