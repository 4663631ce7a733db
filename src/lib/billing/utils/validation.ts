// src/lib/billing/utils/validation.ts
import { z } from 'zod';
import { BillingFrequency } from '../subscription/types';
import { PaymentMethodType } from '../vault/types';
import { ValidationError, FieldErrors } from './error';
import { DecimalAmount, fitsCurrency, normalizeAmount, toCents } from './money';

export const DEFAULT_MAX_AMOUNT: DecimalAmount = '999999.99';

const IDENTIFIER_PATTERN = /^[a-zA-Z0-9_-]+$/;

// Basic schemas for reuse
export const customerIdSchema = z
  .string({ required_error: 'Customer ID is required', invalid_type_error: 'Customer ID must be a string' })
  .min(3, 'Customer ID must be at least 3 characters')
  .max(255, 'Customer ID must be at most 255 characters')
  .regex(IDENTIFIER_PATTERN, 'Customer ID can only contain letters, numbers, underscores, and hyphens');

export const currencySchema = z
  .string({ required_error: 'Currency is required', invalid_type_error: 'Currency must be a string' })
  .regex(/^[A-Z]{3}$/, 'Currency must be 3 uppercase letters');

export const frequencySchema = z.nativeEnum(BillingFrequency, {
  errorMap: () => ({ message: 'Frequency must be one of: daily, weekly, monthly, yearly' })
});

export const uuidSchema = z
  .string({ required_error: 'ID is required', invalid_type_error: 'ID must be a string' })
  .uuid('ID must be a valid UUID');

export const transactionIdSchema = z
  .string({ required_error: 'Transaction ID is required', invalid_type_error: 'Transaction ID must be a string' })
  .min(5, 'Transaction ID must be at least 5 characters')
  .max(100, 'Transaction ID must be at most 100 characters')
  .regex(IDENTIFIER_PATTERN, 'Transaction ID contains invalid characters');

export const metadataSchema = z.record(z.unknown());

/**
 * Accepts a number or decimal string and yields the normalized two-digit
 * decimal, rejecting zero, negatives and anything above the ceiling.
 */
export function amountSchema(maxAmount: DecimalAmount = DEFAULT_MAX_AMOUNT) {
  return z
    .union([z.number(), z.string()], {
      errorMap: () => ({ message: 'Amount must be a number or decimal string' })
    })
    .transform((value, ctx): DecimalAmount => {
      const amount = normalizeAmount(value);
      if (amount === null) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'Amount must be a decimal with at most two fraction digits'
        });
        return z.NEVER;
      }
      if (toCents(amount) <= 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Amount must be positive' });
        return z.NEVER;
      }
      if (toCents(amount) > toCents(maxAmount)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Amount must not exceed ${maxAmount}` });
        return z.NEVER;
      }
      return amount;
    });
}

/** Flags an amount whose fraction the currency has no minor unit for (e.g. 100.50 JPY). */
export function refineCurrencyPrecision(data: { amount: DecimalAmount; currency: string }, ctx: z.RefinementCtx): void {
  if (!fitsCurrency(data.amount, data.currency)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['amount'],
      message: `${data.currency} amounts cannot have fraction digits`
    });
  }
}

const expiryMonthSchema = z.union([z.number(), z.string()]).transform((value, ctx): string => {
  const month = typeof value === 'number' ? value : /^\d{1,2}$/.test(value) ? Number(value) : NaN;
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expiry month must be between 1 and 12' });
    return z.NEVER;
  }
  return String(month).padStart(2, '0');
});

const expiryYearSchema = z.union([z.number(), z.string()]).transform((value, ctx): string => {
  const raw = String(value);
  if (!/^(\d{2}|\d{4})$/.test(raw)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expiry year must have 2 or 4 digits' });
    return z.NEVER;
  }
  return raw.length === 2 ? `20${raw}` : raw;
});

export const paymentMethodDetailsSchema = z.object({
  type: z
    .nativeEnum(PaymentMethodType, {
      errorMap: () => ({ message: 'Invalid payment method type' })
    })
    .optional(),
  last4: z.string().regex(/^\d{4}$/, 'Last 4 digits must be exactly 4 digits').optional(),
  brand: z.string().min(1, 'Card brand cannot be empty').max(50, 'Card brand must be at most 50 characters').optional(),
  expMonth: expiryMonthSchema.optional(),
  expYear: expiryYearSchema.optional(),
  billingName: z.string().max(255, 'Billing name must be at most 255 characters').optional(),
  billingAddress: z.record(z.unknown()).optional(),
  metadata: metadataSchema.optional()
});


export const storePaymentMethodSchema = z.object({
  customerId: customerIdSchema,
  gatewayCustomerRef: z
    .string({ required_error: 'Gateway customer reference is required' })
    .min(1, 'Gateway customer reference is required')
    .max(255, 'Gateway customer reference must be at most 255 characters'),
  paymentMethodToken: z
    .string({ required_error: 'Payment method token is required' })
    .min(1, 'Payment method token is required')
    .max(255, 'Payment method token must be at most 255 characters'),
  details: paymentMethodDetailsSchema.default({})
});

export type StorePaymentMethodInput = z.input<typeof storePaymentMethodSchema>;

export function createSubscriptionSchema(maxAmount: DecimalAmount = DEFAULT_MAX_AMOUNT) {
  return z.object({
    customerId: customerIdSchema,
    amount: amountSchema(maxAmount),
    currency: currencySchema,
    frequency: frequencySchema,
    metadata: metadataSchema.optional()
  }).superRefine(refineCurrencyPrecision);
}

export function chargeSchema(maxAmount: DecimalAmount = DEFAULT_MAX_AMOUNT) {
  return z.object({
    amount: amountSchema(maxAmount),
    currency: currencySchema,
    idempotencyKey: z
      .string()
      .min(1, 'Idempotency key cannot be empty')
      .max(200, 'Idempotency key must be at most 200 characters')
      .optional()
  }).superRefine(refineCurrencyPrecision);
}

export function initializeChargeSchema(maxAmount: DecimalAmount = DEFAULT_MAX_AMOUNT) {
  return z.object({
    amount: amountSchema(maxAmount),
    currency: currencySchema,
    redirectUrl: z
      .string({ required_error: 'Redirect URL is required' })
      .url('Redirect URL must be an absolute URL')
  }).superRefine(refineCurrencyPrecision);
}

export function chargeCustomerSchema(maxAmount: DecimalAmount = DEFAULT_MAX_AMOUNT) {
  return z.object({
    customerRef: z
      .string({ required_error: 'Customer reference is required' })
      .min(1, 'Customer reference is required')
      .max(255, 'Customer reference must be at most 255 characters'),
    amount: amountSchema(maxAmount),
    currency: currencySchema,
    paymentMethodToken: z.string().min(1, 'Payment method token cannot be empty').optional(),
    idempotencyKey: z
      .string()
      .min(1, 'Idempotency key cannot be empty')
      .max(255, 'Idempotency key must be at most 255 characters')
      .optional(),
    metadata: metadataSchema.optional()
  }).superRefine(refineCurrencyPrecision);
}

export const completionTokenSchema = z
  .string({ required_error: 'Completion token is required', invalid_type_error: 'Completion token must be a string' })
  .min(1, 'Completion token is required')
  .max(255, 'Completion token must be at most 255 characters');

export function refundSchema(maxAmount: DecimalAmount = DEFAULT_MAX_AMOUNT) {
  return z.object({
    originalTransactionId: transactionIdSchema,
    amount: amountSchema(maxAmount)
  });
}

/**
 * Flattens every issue into a field → messages map; nothing is dropped, so
 * callers see all violations at once.
 */
export function formatZodIssues(error: z.ZodError): FieldErrors {
  const fields: FieldErrors = {};

  for (const issue of error.issues) {
    const path = issue.path.length > 0 ? issue.path.join('.') : '_root';

    if (!fields[path]) {
      fields[path] = [];
    }
    fields[path].push(issue.message);
  }

  return fields;
}

export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, input: unknown, message: string): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const fields = formatZodIssues(result.error);
    throw new ValidationError(`${message}: ${Object.keys(fields).join(', ')}`, fields);
  }
  return result.data;
}

export function validateCustomerId(customerId: unknown): string {
  return parseOrThrow(z.object({ customerId: customerIdSchema }), { customerId }, 'Invalid customer ID').customerId;
}

export function validateUuid(id: unknown, field: string = 'id'): string {
  const result = uuidSchema.safeParse(id);
  if (!result.success) {
    throw new ValidationError(`Invalid identifier: ${field}`, {
      [field]: result.error.issues.map(issue => issue.message)
    });
  }
  return result.data;
}
