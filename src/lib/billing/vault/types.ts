// src/lib/billing/vault/types.ts
export enum PaymentMethodType {
  CREDIT_CARD = 'credit_card',
  DEBIT_CARD = 'debit_card',
  BANK_ACCOUNT = 'bank_account',
  DIGITAL_WALLET = 'digital_wallet'
}

export interface PaymentVaultEntry {
  id: number;
  uuid: string;
  customerId: string;
  gatewayCustomerRef: string;
  paymentMethodToken: string;
  paymentMethodType: PaymentMethodType;
  last4Digits: string | null;
  cardBrand: string | null;
  /** Two digits, "01" through "12". */
  expiryMonth: string | null;
  /** Four digits. */
  expiryYear: string | null;
  billingName: string | null;
  billingAddress: Record<string, unknown> | null;
  isActive: boolean;
  isDefault: boolean;
  createdAt: Date;
  updatedAt: Date;
  lastUsedAt: Date | null;
  metadata: Record<string, unknown> | null;
}

/** An entry before the store assigns its key and decides whether it is the default. */
export type NewVaultEntry = Omit<PaymentVaultEntry, 'id' | 'isDefault'>;

export interface DeactivationOutcome {
  deactivated: PaymentVaultEntry;
  /** The entry that inherited the default, if the deactivated one held it. */
  promoted: PaymentVaultEntry | null;
}

export interface VaultStatistics {
  total: number;
  active: number;
  expired: number;
}

export interface ChargeWithVaultInput {
  amount: number | string;
  currency: string;
  /** Caller's key for this charge; a repeat with the same key is not charged again. */
  idempotencyKey?: string;
  metadata?: Record<string, unknown>;
}
