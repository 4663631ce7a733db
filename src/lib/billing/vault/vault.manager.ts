// src/lib/billing/vault/vault.manager.ts
import { v4 as uuidv4 } from 'uuid';
import { isSuccess } from '../gateway/result';
import { ChargeResult, PaymentGateway } from '../gateway/types';
import { PaymentMethodExpiredError, PaymentProcessingError, VaultNotFoundError, getErrorMessage } from '../utils/error';
import { BillingLogger } from '../utils/logger';
import { DecimalAmount } from '../utils/money';
import {
  DEFAULT_MAX_AMOUNT,
  StorePaymentMethodInput,
  chargeSchema,
  parseOrThrow,
  storePaymentMethodSchema,
  validateCustomerId,
  validateUuid
} from '../utils/validation';
import {
  ChargeWithVaultInput,
  NewVaultEntry,
  PaymentMethodType,
  PaymentVaultEntry,
  VaultStatistics
} from './types';
import { formatExpiry, isExpired } from './vault-entry';
import { VaultStore } from './vault.store';

export interface VaultManagerOptions {
  maxAmount?: DecimalAmount;
  clock?: () => Date;
  logger?: BillingLogger;
}

const gatewayTokenSchema = storePaymentMethodSchema.pick({ gatewayCustomerRef: true, paymentMethodToken: true });

export class VaultManager {
  private logger: BillingLogger;
  private maxAmount: DecimalAmount;
  private clock: () => Date;

  constructor(
    private store: VaultStore,
    private gateway: PaymentGateway,
    options: VaultManagerOptions = {}
  ) {
    this.logger = options.logger ?? new BillingLogger(undefined, 'VaultManager');
    this.maxAmount = options.maxAmount ?? DEFAULT_MAX_AMOUNT;
    this.clock = options.clock ?? (() => new Date());
  }

  async storePaymentMethod(input: StorePaymentMethodInput): Promise<PaymentVaultEntry> {
    const data = parseOrThrow(storePaymentMethodSchema, input, 'Invalid payment method');
    const { details } = data;
    const now = this.clock();

    const entry: NewVaultEntry = {
      uuid: uuidv4(),
      customerId: data.customerId,
      gatewayCustomerRef: data.gatewayCustomerRef,
      paymentMethodToken: data.paymentMethodToken,
      paymentMethodType: details.type ?? PaymentMethodType.CREDIT_CARD,
      last4Digits: details.last4 ?? null,
      cardBrand: details.brand ?? null,
      expiryMonth: details.expMonth ?? null,
      expiryYear: details.expYear ?? null,
      billingName: details.billingName ?? null,
      billingAddress: details.billingAddress ?? null,
      isActive: true,
      createdAt: now,
      updatedAt: now,
      lastUsedAt: null,
      metadata: details.metadata ?? null
    };

    const stored = await this.store.insert(entry);

    this.logger.info('Payment method stored', {
      vaultId: stored.uuid,
      customerId: stored.customerId,
      type: stored.paymentMethodType,
      isDefault: stored.isDefault
    });

    return stored;
  }

  async listActive(customerId: string): Promise<PaymentVaultEntry[]> {
    return this.store.findActiveByCustomer(validateCustomerId(customerId));
  }

  async getDefault(customerId: string): Promise<PaymentVaultEntry | null> {
    return this.store.findDefaultByCustomer(validateCustomerId(customerId));
  }

  async getPaymentMethod(uuid: string): Promise<PaymentVaultEntry | null> {
    return this.store.findByUuid(validateUuid(uuid, 'vaultId'));
  }

  async findByGatewayToken(gatewayCustomerRef: string, paymentMethodToken: string): Promise<PaymentVaultEntry | null> {
    const data = parseOrThrow(gatewayTokenSchema, { gatewayCustomerRef, paymentMethodToken }, 'Invalid gateway token');
    return this.store.findByGatewayToken(data.gatewayCustomerRef, data.paymentMethodToken);
  }

  /** Returns false when the entry is unknown or inactive. */
  async setDefault(uuid: string): Promise<boolean> {
    validateUuid(uuid, 'vaultId');

    const updated = await this.store.setDefault(uuid, this.clock());
    if (!updated) {
      this.logger.warn('Cannot set default: payment method missing or inactive', { vaultId: uuid });
      return false;
    }

    this.logger.info('Default payment method changed', { vaultId: uuid, customerId: updated.customerId });
    return true;
  }

  /**
   * Soft-deletes the entry. When it was the default, the newest remaining
   * active entry of the customer takes over.
   */
  async deactivate(uuid: string): Promise<boolean> {
    validateUuid(uuid, 'vaultId');

    const outcome = await this.store.deactivate(uuid, this.clock());
    if (!outcome) {
      this.logger.warn('Cannot deactivate: payment method missing or inactive', { vaultId: uuid });
      return false;
    }

    this.logger.info('Payment method deactivated', {
      vaultId: uuid,
      customerId: outcome.deactivated.customerId,
      promotedDefault: outcome.promoted ? outcome.promoted.uuid : null
    });
    return true;
  }

  async chargeWithVault(uuid: string, input: ChargeWithVaultInput): Promise<ChargeResult> {
    validateUuid(uuid, 'vaultId');
    const charge = parseOrThrow(chargeSchema(this.maxAmount), input, 'Invalid charge');

    const entry = await this.store.findByUuid(uuid);
    if (!entry || !entry.isActive) {
      throw new VaultNotFoundError(uuid);
    }

    if (isExpired(entry, this.clock())) {
      throw new PaymentMethodExpiredError(uuid, formatExpiry(entry));
    }

    let result: ChargeResult;
    try {
      result = await this.gateway.chargeCustomer({
        customerRef: entry.gatewayCustomerRef,
        amount: charge.amount,
        currency: charge.currency,
        paymentMethodToken: entry.paymentMethodToken,
        idempotencyKey: charge.idempotencyKey ? `vault:${uuid}:${charge.idempotencyKey}` : undefined,
        metadata: { ...input.metadata, vaultId: uuid }
      });
    } catch (error) {
      this.logger.error('Vault charge failed', { vaultId: uuid, error });
      throw new PaymentProcessingError(`Payment processing failed: ${getErrorMessage(error)}`, uuid, error);
    }

    if (!isSuccess(result)) {
      this.logger.warn('Vault charge not approved', {
        vaultId: uuid,
        status: result.status,
        code: result.code
      });
      return result;
    }

    await this.store.markUsed(uuid, this.clock());
    this.logger.info('Vault charge approved', {
      vaultId: uuid,
      transactionId: result.transactionId,
      amount: result.amount,
      currency: result.currency
    });

    return result;
  }

  /**
   * Deactivates every active card whose expiry month has passed, handing the
   * default on as `deactivate` does. Running it again finds nothing new.
   */
  async cleanupExpired(): Promise<number> {
    const asOf = this.clock();
    const expired = await this.store.findExpired(asOf);

    let deactivated = 0;
    for (const entry of expired) {
      const outcome = await this.store.deactivate(entry.uuid, asOf);
      if (outcome) {
        deactivated++;
      }
    }

    this.logger.info('Expired payment methods cleaned up', { found: expired.length, deactivated });
    return deactivated;
  }

  async getStatistics(): Promise<VaultStatistics> {
    return this.store.getStatistics(this.clock());
  }
}
