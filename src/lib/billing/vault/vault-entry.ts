// src/lib/billing/vault/vault-entry.ts
import { endOfMonth, isAfter } from 'date-fns';
import { PaymentMethodType, PaymentVaultEntry } from './types';

type ExpiryFields = Pick<PaymentVaultEntry, 'expiryMonth' | 'expiryYear'>;

const CARD_TYPES: readonly PaymentMethodType[] = [PaymentMethodType.CREDIT_CARD, PaymentMethodType.DEBIT_CARD];

export function isCardType(type: PaymentMethodType): boolean {
  return CARD_TYPES.includes(type);
}

/**
 * True once `now` is past the last day of the expiry month. Entries without
 * a complete expiry never expire.
 */
export function isExpired(entry: ExpiryFields, now: Date = new Date()): boolean {
  if (!entry.expiryMonth || !entry.expiryYear) {
    return false;
  }

  const month = parseInt(entry.expiryMonth, 10);
  const year = parseInt(entry.expiryYear, 10);
  if (Number.isNaN(month) || Number.isNaN(year)) {
    return false;
  }

  return isAfter(now, endOfMonth(new Date(year, month - 1, 1)));
}

export function formatExpiry(entry: ExpiryFields): string {
  return entry.expiryMonth && entry.expiryYear ? `${entry.expiryMonth}/${entry.expiryYear}` : 'none';
}

/** Card entries eligible for the expiry sweep at `asOf`. */
export function isExpiredCard(entry: PaymentVaultEntry, asOf: Date): boolean {
  return entry.isActive && isCardType(entry.paymentMethodType) && isExpired(entry, asOf);
}

// State transitions. Stores apply these inside their atomic update path.

export function markDefault(entry: PaymentVaultEntry, at: Date): PaymentVaultEntry {
  return { ...entry, isDefault: true, updatedAt: at };
}

export function clearDefault(entry: PaymentVaultEntry, at: Date): PaymentVaultEntry {
  return { ...entry, isDefault: false, updatedAt: at };
}

export function markUsed(entry: PaymentVaultEntry, at: Date): PaymentVaultEntry {
  return { ...entry, lastUsedAt: at, updatedAt: at };
}

export function deactivate(entry: PaymentVaultEntry, at: Date): PaymentVaultEntry {
  return { ...entry, isActive: false, isDefault: false, updatedAt: at };
}

/** Newest first; ties on creation time fall back to the later key. */
export function compareNewestFirst(a: PaymentVaultEntry, b: PaymentVaultEntry): number {
  return b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id;
}

/** Default first, then newest first. */
export function compareForListing(a: PaymentVaultEntry, b: PaymentVaultEntry): number {
  if (a.isDefault !== b.isDefault) {
    return a.isDefault ? -1 : 1;
  }
  return compareNewestFirst(a, b);
}
