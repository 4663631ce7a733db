// src/lib/billing/gateway/base-gateway.ts
import { v4 as uuidv4 } from 'uuid';
import { wrapDatabaseError } from '../database/connection';
import { TransactionStore } from '../transaction/transaction.store';
import { PaymentStatus, PaymentTransaction, TransactionKind } from '../transaction/types';
import { ConfigurationError } from '../utils/error';
import { BillingLogger } from '../utils/logger';
import { AmountInput, DecimalAmount, normalizeAmount } from '../utils/money';
import {
  chargeCustomerSchema,
  completionTokenSchema,
  currencySchema,
  initializeChargeSchema,
  parseOrThrow,
  refundSchema
} from '../utils/validation';
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
} from './types';

export interface GatewayDependencies {
  transactionStore: TransactionStore;
  clock?: () => Date;
  logger?: BillingLogger;
}

export interface TransactionRecordInput {
  gatewayTransactionId: string;
  kind: TransactionKind;
  status: PaymentStatus;
  amount: DecimalAmount;
  currency: string;
  maskedIdentifier?: string | null;
  customerRef?: string | null;
  metadata?: Record<string, unknown> | null;
}

/**
 * Shared plumbing for gateway adapters: configuration checks, input
 * validation ahead of any network call, and the durable transaction record
 * written before a success is reported.
 */
export abstract class BasePaymentGateway implements PaymentGateway {
  abstract readonly name: string;

  protected config: GatewayConfig;
  protected logger: BillingLogger;
  protected transactionStore: TransactionStore;
  protected clock: () => Date;

  constructor(config: GatewayConfig, deps: GatewayDependencies) {
    this.validateConfig(config);

    this.config = config;
    this.transactionStore = deps.transactionStore;
    this.clock = deps.clock ?? (() => new Date());
    this.logger = deps.logger ?? new BillingLogger(undefined, this.constructor.name);
  }

  protected validateConfig(config: GatewayConfig): void {
    if (!config.apiKey) {
      throw new ConfigurationError('API key is required in gateway configuration');
    }

    if (!['sandbox', 'production'].includes(config.environment)) {
      throw new ConfigurationError('Valid environment (sandbox or production) is required', {
        providedEnvironment: config.environment
      });
    }

    if (!Number.isInteger(config.timeoutMs) || config.timeoutMs <= 0) {
      throw new ConfigurationError('Gateway timeout must be a positive number of milliseconds', {
        timeoutMs: config.timeoutMs
      });
    }

    if (!currencySchema.safeParse(config.defaultCurrency).success) {
      throw new ConfigurationError('Default currency must be 3 uppercase letters', {
        defaultCurrency: config.defaultCurrency
      });
    }

    if (normalizeAmount(config.maxAmount) === null) {
      throw new ConfigurationError('Maximum amount must be a decimal with at most two fraction digits', {
        maxAmount: config.maxAmount
      });
    }
  }

  protected validateInitializeCharge(input: InitializeChargeInput) {
    return parseOrThrow(initializeChargeSchema(this.config.maxAmount), input, 'Invalid charge request');
  }

  protected validateCompletionToken(token: string): string {
    return parseOrThrow(completionTokenSchema, token, 'Invalid completion token');
  }

  protected validateRefund(originalTransactionId: string, amount: AmountInput) {
    return parseOrThrow(refundSchema(this.config.maxAmount), { originalTransactionId, amount }, 'Invalid refund request');
  }

  protected validateChargeCustomer(input: ChargeCustomerInput) {
    return parseOrThrow(chargeCustomerSchema(this.config.maxAmount), input, 'Invalid charge request');
  }

  /**
   * Persists a successful processor response. Throws when the write fails so
   * the caller never reports a success that has no local record. A processor
   * transaction that is already on record is not stored twice.
   */
  protected async recordTransaction(input: TransactionRecordInput): Promise<PaymentTransaction> {
    const transaction: PaymentTransaction = {
      uuid: uuidv4(),
      gatewayTransactionId: input.gatewayTransactionId,
      kind: input.kind,
      status: input.status,
      amount: input.amount,
      refundedAmount: '0.00',
      currency: input.currency,
      maskedIdentifier: input.maskedIdentifier || '****',
      customerRef: input.customerRef ?? null,
      metadata: input.metadata ?? null,
      createdAt: this.clock()
    };

    try {
      return await this.transactionStore.save(transaction);
    } catch (error) {
      this.logger.error('Failed to record gateway transaction', {
        gatewayTransactionId: input.gatewayTransactionId,
        kind: input.kind,
        error
      });
      throw wrapDatabaseError(error, 'Failed to record gateway transaction', {
        gatewayTransactionId: input.gatewayTransactionId
      });
    }
  }

  abstract initializeCharge(input: InitializeChargeInput): Promise<GatewayResult<ChargeInitialization>>;
  abstract completeCharge(completionToken: string): Promise<GatewayResult<ChargeCompletion>>;
  abstract refund(originalTransactionId: string, amount: AmountInput): Promise<GatewayResult<RefundReceipt>>;
  abstract chargeCustomer(input: ChargeCustomerInput): Promise<ChargeResult>;
}
