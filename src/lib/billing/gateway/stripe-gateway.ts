// src/lib/billing/gateway/stripe-gateway.ts
import { Stripe } from 'stripe';
import { PaymentStatus, TransactionKind } from '../transaction/types';
import { BillingError, GatewayCommunicationError, ValidationError, getErrorMessage } from '../utils/error';
import { AmountInput, fitsCurrency, fromMinorUnits, toMinorUnits } from '../utils/money';
import { BasePaymentGateway, GatewayDependencies } from './base-gateway';
import { declined, failed } from './result';
import {
  ChargeCompletion,
  ChargeCustomerInput,
  ChargeInitialization,
  ChargeResult,
  GatewayConfig,
  GatewayDecline,
  GatewayFailure,
  GatewayResult,
  InitializeChargeInput,
  RefundReceipt
} from './types';

// Structural views of the Stripe objects this adapter reads. The real SDK
// responses satisfy them, and so do plain objects in tests.

export interface StripeCheckoutSessionView {
  id: string;
  url: string | null;
  payment_intent: string | { id: string } | null;
}

export interface StripeChargeView {
  id: string;
  payment_method_details: { card?: { last4: string | null } } | null;
}

export interface StripePaymentIntentView {
  id: string;
  status: string;
  amount: number;
  currency: string;
  latest_charge: string | StripeChargeView | null;
  last_payment_error: { code?: string; decline_code?: string; message?: string } | null;
}

export interface StripeRefundView {
  id: string;
  status: string | null;
  amount: number;
  currency: string;
}

export interface StripeCustomerView {
  id: string;
  deleted?: unknown;
  invoice_settings?: { default_payment_method: string | { id: string } | null };
}

/** The slice of the Stripe SDK the adapter calls. */
export interface StripeClient {
  checkout: {
    sessions: {
      create(params: Stripe.Checkout.SessionCreateParams): Promise<StripeCheckoutSessionView>;
      retrieve(id: string, params?: Stripe.Checkout.SessionRetrieveParams): Promise<StripeCheckoutSessionView>;
    };
  };
  paymentIntents: {
    create(params: Stripe.PaymentIntentCreateParams, options?: Stripe.RequestOptions): Promise<StripePaymentIntentView>;
    retrieve(id: string, params?: Stripe.PaymentIntentRetrieveParams): Promise<StripePaymentIntentView>;
  };
  refunds: {
    create(params: Stripe.RefundCreateParams): Promise<StripeRefundView>;
  };
  customers: {
    retrieve(id: string, params?: Stripe.CustomerRetrieveParams): Promise<StripeCustomerView>;
  };
}

export interface StripeGatewayDependencies extends GatewayDependencies {
  client?: StripeClient;
}

const STRIPE_API_VERSION = '2023-10-16';

// Stripe error types that mean the request never got a usable answer
const TRANSPORT_ERROR_TYPES = new Set(['StripeConnectionError']);
const TRANSPORT_ERROR_CODES = new Set(['ETIMEDOUT', 'ECONNRESET', 'ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN']);
// Worth another attempt later; everything else is our own request being wrong
const RETRYABLE_ERROR_TYPES = new Set(['StripeAPIError', 'StripeRateLimitError', 'StripeIdempotencyError']);

export function createStripeClient(config: GatewayConfig): StripeClient {
  return new Stripe(config.apiKey, {
    apiVersion: STRIPE_API_VERSION,
    timeout: config.timeoutMs,
    maxNetworkRetries: 0
  });
}

function readString(source: object, key: string): string | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'string' ? value : undefined;
}

function toStripeMetadata(metadata: Record<string, unknown> | undefined): Record<string, string> {
  const result: Record<string, string> = {};
  if (!metadata) {
    return result;
  }

  for (const [key, value] of Object.entries(metadata)) {
    if (value === undefined || value === null) {
      continue;
    }
    result[key] = typeof value === 'string' ? value : JSON.stringify(value);
  }
  return result;
}

function cardLast4(intent: StripePaymentIntentView): string | null {
  const charge = intent.latest_charge;
  if (!charge || typeof charge === 'string') {
    return null;
  }
  return charge.payment_method_details?.card?.last4 ?? null;
}

export class StripeGateway extends BasePaymentGateway {
  readonly name = 'stripe';
  private client: StripeClient;

  constructor(config: GatewayConfig, deps: StripeGatewayDependencies) {
    super(config, deps);
    this.client = deps.client ?? createStripeClient(config);

    if (config.environment === 'production' && config.apiKey.startsWith('sk_test_')) {
      this.logger.warn('Production environment configured with a test API key');
    }
  }

  async initializeCharge(input: InitializeChargeInput): Promise<GatewayResult<ChargeInitialization>> {
    const data = this.validateInitializeCharge(input);
    const separator = data.redirectUrl.includes('?') ? '&' : '?';

    this.logger.info('Initializing hosted charge', { amount: data.amount, currency: data.currency });

    let session: StripeCheckoutSessionView;
    try {
      session = await this.client.checkout.sessions.create({
        mode: 'payment',
        line_items: [
          {
            quantity: 1,
            price_data: {
              currency: data.currency.toLowerCase(),
              unit_amount: toMinorUnits(data.amount, data.currency),
              product_data: { name: 'Payment' }
            }
          }
        ],
        success_url: `${data.redirectUrl}${separator}session_id={CHECKOUT_SESSION_ID}`,
        cancel_url: data.redirectUrl,
        customer_email: input.billingInfo?.email,
        payment_intent_data: {
          metadata: {
            ...this.prefixed('billing', input.billingInfo),
            ...this.prefixed('shipping', input.shippingInfo)
          }
        }
      });
    } catch (error) {
      return this.handleStripeError(error, 'initializeCharge');
    }

    if (!session.url) {
      return failed('missing_form_url', 'Processor returned a session without a form URL');
    }

    return { status: 'success', formUrl: session.url, sessionId: session.id };
  }

  async completeCharge(completionToken: string): Promise<GatewayResult<ChargeCompletion>> {
    const sessionId = this.validateCompletionToken(completionToken);

    let intent: StripePaymentIntentView;
    try {
      const session = await this.client.checkout.sessions.retrieve(sessionId);
      if (!session.payment_intent) {
        return failed('incomplete_session', 'Checkout session has no payment yet');
      }

      const intentId = typeof session.payment_intent === 'string' ? session.payment_intent : session.payment_intent.id;
      intent = await this.client.paymentIntents.retrieve(intentId, { expand: ['latest_charge'] });
    } catch (error) {
      return this.handleStripeError(error, 'completeCharge');
    }

    const verdict = this.intentVerdict(intent);
    if (verdict) {
      return verdict;
    }

    const currency = intent.currency.toUpperCase();
    const approvedAmount = fromMinorUnits(intent.amount, currency);
    const maskedCardLast4 = cardLast4(intent) ?? '****';

    await this.recordTransaction({
      gatewayTransactionId: intent.id,
      kind: TransactionKind.COMPLETION,
      status: PaymentStatus.APPROVED,
      amount: approvedAmount,
      currency,
      maskedIdentifier: maskedCardLast4,
      metadata: { sessionId }
    });

    this.logger.info('Hosted charge completed', { transactionId: intent.id, amount: approvedAmount, currency });

    return { status: 'success', transactionId: intent.id, approvedAmount, currency, maskedCardLast4 };
  }

  async refund(originalTransactionId: string, amount: AmountInput): Promise<GatewayResult<RefundReceipt>> {
    const data = this.validateRefund(originalTransactionId, amount);
    const original = await this.transactionStore.findByGatewayTransactionId(data.originalTransactionId);
    const currency = original ? original.currency : this.config.defaultCurrency;

    if (!fitsCurrency(data.amount, currency)) {
      throw new ValidationError('Invalid refund request: amount', {
        amount: [`${currency} amounts cannot have fraction digits`]
      });
    }

    let refund: StripeRefundView;
    try {
      refund = await this.client.refunds.create({
        payment_intent: data.originalTransactionId,
        amount: toMinorUnits(data.amount, currency)
      });
    } catch (error) {
      return this.handleStripeError(error, 'refund');
    }

    if (refund.status === 'failed' || refund.status === 'canceled') {
      return declined(`refund_${refund.status}`, `Refund ${refund.status} by processor`);
    }

    const refundedAmount = fromMinorUnits(refund.amount, currency);

    await this.recordTransaction({
      gatewayTransactionId: refund.id,
      kind: TransactionKind.REFUND,
      status: PaymentStatus.REFUNDED,
      amount: refundedAmount,
      currency,
      maskedIdentifier: original ? original.maskedIdentifier : null,
      customerRef: original ? original.customerRef : null,
      metadata: { originalTransactionId: data.originalTransactionId, processorStatus: refund.status }
    });

    const refunded = await this.transactionStore.recordRefund(data.originalTransactionId, refundedAmount);
    if (!refunded) {
      this.logger.warn('Refunded transaction has no local record', {
        originalTransactionId: data.originalTransactionId
      });
    }

    this.logger.info('Refund processed', {
      transactionId: refund.id,
      originalTransactionId: data.originalTransactionId,
      amount: refundedAmount,
      currency
    });

    return { status: 'success', transactionId: refund.id, amount: refundedAmount, currency };
  }

  async chargeCustomer(input: ChargeCustomerInput): Promise<ChargeResult> {
    const data = this.validateChargeCustomer(input);

    this.logger.info('Charging customer', {
      customerRef: data.customerRef,
      amount: data.amount,
      currency: data.currency,
      explicitPaymentMethod: data.paymentMethodToken !== undefined
    });

    let intent: StripePaymentIntentView;
    try {
      const paymentMethod = data.paymentMethodToken ?? (await this.defaultPaymentMethod(data.customerRef));
      if (!paymentMethod) {
        return failed('no_default_payment_method', 'Customer has no default payment method', false);
      }

      intent = await this.client.paymentIntents.create(
        {
          amount: toMinorUnits(data.amount, data.currency),
          currency: data.currency.toLowerCase(),
          customer: data.customerRef,
          payment_method: paymentMethod,
          off_session: true,
          confirm: true,
          metadata: toStripeMetadata(data.metadata),
          expand: ['latest_charge']
        },
        data.idempotencyKey ? { idempotencyKey: data.idempotencyKey } : undefined
      );
    } catch (error) {
      return this.handleStripeError(error, 'chargeCustomer');
    }

    const verdict = this.intentVerdict(intent);
    if (verdict) {
      return verdict;
    }

    const currency = intent.currency.toUpperCase();
    const charged = fromMinorUnits(intent.amount, currency);

    await this.recordTransaction({
      gatewayTransactionId: intent.id,
      kind: TransactionKind.CHARGE,
      status: PaymentStatus.APPROVED,
      amount: charged,
      currency,
      maskedIdentifier: cardLast4(intent),
      customerRef: data.customerRef,
      metadata: data.metadata ?? null
    });

    this.logger.info('Customer charged', { transactionId: intent.id, amount: charged, currency });

    return { status: 'success', transactionId: intent.id, amount: charged, currency };
  }

  private async defaultPaymentMethod(customerRef: string): Promise<string | null> {
    const customer = await this.client.customers.retrieve(customerRef);
    if (customer.deleted) {
      return null;
    }

    const method = customer.invoice_settings?.default_payment_method ?? null;
    if (!method) {
      return null;
    }
    return typeof method === 'string' ? method : method.id;
  }

  /** Null when the intent succeeded; the matching non-success result otherwise. */
  private intentVerdict(intent: StripePaymentIntentView): GatewayDecline | GatewayFailure | null {
    if (intent.status === 'succeeded') {
      return null;
    }

    const lastError = intent.last_payment_error;
    if (lastError && (intent.status === 'requires_payment_method' || intent.status === 'canceled')) {
      return declined(
        lastError.decline_code ?? lastError.code ?? 'card_declined',
        lastError.message ?? 'Payment declined by processor'
      );
    }

    // Off-session charges cannot complete a customer authentication step
    if (intent.status === 'requires_action') {
      return declined('authentication_required', 'Payment requires customer authentication');
    }

    // Still settling at the processor; charging again would double bill
    if (intent.status === 'processing') {
      this.logger.warn('Payment intent still processing', { intentId: intent.id });
      return failed('payment_pending', `Payment intent ${intent.id} is still processing`, false);
    }

    this.logger.warn('Unexpected payment intent status', { intentId: intent.id, status: intent.status });
    return failed('unexpected_status', `Payment intent ended in status "${intent.status}"`);
  }

  /**
   * Maps an SDK failure to a result. Transport failures are thrown as
   * GatewayCommunicationError; card refusals become declines.
   */
  private handleStripeError(error: unknown, operation: string): GatewayDecline | GatewayFailure {
    if (error instanceof BillingError) {
      throw error;
    }

    const type = error instanceof Error ? readString(error, 'type') : undefined;
    const code = error instanceof Error ? readString(error, 'code') : undefined;
    const message = getErrorMessage(error);

    if ((type && TRANSPORT_ERROR_TYPES.has(type)) || (code && TRANSPORT_ERROR_CODES.has(code))) {
      this.logger.error('Gateway communication failed', { operation, type, code, message });
      throw new GatewayCommunicationError(`Gateway communication failed: ${message}`, error, {
        gateway: this.name,
        operation
      });
    }

    if (type === 'StripeCardError') {
      const declineCode = (error instanceof Error ? readString(error, 'decline_code') : undefined) ?? code;
      this.logger.warn('Processor declined request', { operation, code: declineCode });
      return declined(declineCode ?? 'card_declined', message);
    }

    this.logger.error('Processor rejected request', { operation, type, code, message });
    return failed(code ?? 'processor_error', message, type !== undefined && RETRYABLE_ERROR_TYPES.has(type));
  }

  private prefixed(prefix: string, info: Record<string, string | undefined> | undefined): Record<string, string> {
    const result: Record<string, string> = {};
    if (!info) {
      return result;
    }

    for (const [key, value] of Object.entries(info)) {
      if (value !== undefined) {
        result[`${prefix}_${key}`] = value;
      }
    }
    return result;
  }
}
