// src/lib/billing/gateway/types.ts
import { AmountInput, DecimalAmount } from '../utils/money';

export type GatewayEnvironment = 'sandbox' | 'production';

export interface GatewayConfig {
  apiKey: string;
  environment: GatewayEnvironment;
  /** Upper bound for a single processor round-trip. */
  timeoutMs: number;
  defaultCurrency: string;
  maxAmount: DecimalAmount;
  options?: Record<string, unknown>;
}

export interface GatewaySuccess {
  status: 'success';
}

/** The processor looked at the request and refused it. Never retried. */
export interface GatewayDecline {
  status: 'declined';
  code: string;
  message: string;
}

/** The processor answered with something we could not interpret. */
export interface GatewayFailure {
  status: 'error';
  code: string;
  message: string;
  retryable: boolean;
}

export type GatewayResult<T> = (GatewaySuccess & T) | GatewayDecline | GatewayFailure;

export type GatewayStatus = GatewayResult<object>['status'];

export interface AddressInfo {
  [field: string]: string | undefined;
}

export interface InitializeChargeInput {
  amount: AmountInput;
  currency: string;
  redirectUrl: string;
  billingInfo?: AddressInfo;
  shippingInfo?: AddressInfo;
}

export interface ChargeInitialization {
  formUrl: string;
  sessionId: string;
}

export interface ChargeCompletion {
  transactionId: string;
  approvedAmount: DecimalAmount;
  currency: string;
  maskedCardLast4: string;
}

export interface RefundReceipt {
  transactionId: string;
  amount: DecimalAmount;
  currency: string;
}

export interface ChargeCustomerInput {
  /** Customer identifier or the processor-side customer reference. */
  customerRef: string;
  amount: AmountInput;
  currency: string;
  /** Vaulted payment-method token; the customer's default method otherwise. */
  paymentMethodToken?: string;
  /** Repeating a call with the same key returns the first charge instead of a new one. */
  idempotencyKey?: string;
  metadata?: Record<string, unknown>;
}

export interface ChargeReceipt {
  transactionId: string;
  amount: DecimalAmount;
  currency: string;
}

export type ChargeResult = GatewayResult<ChargeReceipt>;

export interface PaymentGateway {
  readonly name: string;
  initializeCharge(input: InitializeChargeInput): Promise<GatewayResult<ChargeInitialization>>;
  completeCharge(completionToken: string): Promise<GatewayResult<ChargeCompletion>>;
  refund(originalTransactionId: string, amount: AmountInput): Promise<GatewayResult<RefundReceipt>>;
  chargeCustomer(input: ChargeCustomerInput): Promise<ChargeResult>;
}
