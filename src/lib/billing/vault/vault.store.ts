// src/lib/billing/vault/vault.store.ts
import { DeactivationOutcome, NewVaultEntry, PaymentVaultEntry, VaultStatistics } from './types';
import {
  clearDefault,
  compareForListing,
  compareNewestFirst,
  deactivate as deactivateEntry,
  isExpiredCard,
  markDefault,
  markUsed as markEntryUsed
} from './vault-entry';

/**
 * Persistence seam for vaulted payment methods. Implementations keep at most
 * one active default per customer through every operation below.
 */
export abstract class VaultStore {
  /** Stores the entry, making it the default iff the customer has no other active entry. */
  abstract insert(entry: NewVaultEntry): Promise<PaymentVaultEntry>;
  abstract findByUuid(uuid: string): Promise<PaymentVaultEntry | null>;
  /** Default first, then newest first. */
  abstract findActiveByCustomer(customerId: string): Promise<PaymentVaultEntry[]>;
  abstract findDefaultByCustomer(customerId: string): Promise<PaymentVaultEntry | null>;
  abstract findByGatewayToken(gatewayCustomerRef: string, paymentMethodToken: string): Promise<PaymentVaultEntry | null>;
  /** Null when the entry is missing or inactive. */
  abstract setDefault(uuid: string, at: Date): Promise<PaymentVaultEntry | null>;
  /** Null when the entry is missing or inactive. */
  abstract deactivate(uuid: string, at: Date): Promise<DeactivationOutcome | null>;
  abstract markUsed(uuid: string, at: Date): Promise<PaymentVaultEntry | null>;
  /** Active card entries whose expiry month lies before the month of `asOf`. */
  abstract findExpired(asOf: Date): Promise<PaymentVaultEntry[]>;
  abstract getStatistics(asOf: Date): Promise<VaultStatistics>;
}

function cloneEntry(entry: PaymentVaultEntry): PaymentVaultEntry {
  return {
    ...entry,
    billingAddress: entry.billingAddress ? structuredClone(entry.billingAddress) : null,
    metadata: entry.metadata ? structuredClone(entry.metadata) : null,
    createdAt: new Date(entry.createdAt.getTime()),
    updatedAt: new Date(entry.updatedAt.getTime()),
    lastUsedAt: entry.lastUsedAt ? new Date(entry.lastUsedAt.getTime()) : null
  };
}

// No method awaits between reading and writing the map, so each call is a
// single atomic step for other callers on the event loop.
export class InMemoryVaultStore extends VaultStore {
  private entries: Map<string, PaymentVaultEntry> = new Map();
  private nextId = 1;

  async insert(entry: NewVaultEntry): Promise<PaymentVaultEntry> {
    const hasActive = this.activeFor(entry.customerId).length > 0;
    const stored = cloneEntry({ ...entry, id: this.nextId++, isDefault: entry.isActive && !hasActive });
    this.entries.set(stored.uuid, stored);
    return cloneEntry(stored);
  }

  async findByUuid(uuid: string): Promise<PaymentVaultEntry | null> {
    const entry = this.entries.get(uuid);
    return entry ? cloneEntry(entry) : null;
  }

  async findActiveByCustomer(customerId: string): Promise<PaymentVaultEntry[]> {
    return this.activeFor(customerId).sort(compareForListing).map(cloneEntry);
  }

  async findDefaultByCustomer(customerId: string): Promise<PaymentVaultEntry | null> {
    const entry = this.activeFor(customerId).find(candidate => candidate.isDefault);
    return entry ? cloneEntry(entry) : null;
  }

  async findByGatewayToken(gatewayCustomerRef: string, paymentMethodToken: string): Promise<PaymentVaultEntry | null> {
    const matches = Array.from(this.entries.values())
      .filter(entry => entry.gatewayCustomerRef === gatewayCustomerRef && entry.paymentMethodToken === paymentMethodToken)
      .sort(compareNewestFirst);
    return matches.length > 0 ? cloneEntry(matches[0]) : null;
  }

  async setDefault(uuid: string, at: Date): Promise<PaymentVaultEntry | null> {
    const target = this.entries.get(uuid);
    if (!target || !target.isActive) {
      return null;
    }

    for (const entry of this.activeFor(target.customerId)) {
      if (entry.isDefault && entry.uuid !== uuid) {
        this.entries.set(entry.uuid, clearDefault(entry, at));
      }
    }

    const updated = markDefault(target, at);
    this.entries.set(uuid, updated);
    return cloneEntry(updated);
  }

  async deactivate(uuid: string, at: Date): Promise<DeactivationOutcome | null> {
    const target = this.entries.get(uuid);
    if (!target || !target.isActive) {
      return null;
    }

    const deactivated = deactivateEntry(target, at);
    this.entries.set(uuid, deactivated);

    let promoted: PaymentVaultEntry | null = null;
    if (target.isDefault) {
      const [successor] = this.activeFor(target.customerId).sort(compareNewestFirst);
      if (successor) {
        promoted = markDefault(successor, at);
        this.entries.set(successor.uuid, promoted);
      }
    }

    return {
      deactivated: cloneEntry(deactivated),
      promoted: promoted ? cloneEntry(promoted) : null
    };
  }

  async markUsed(uuid: string, at: Date): Promise<PaymentVaultEntry | null> {
    const entry = this.entries.get(uuid);
    if (!entry) {
      return null;
    }

    const updated = markEntryUsed(entry, at);
    this.entries.set(uuid, updated);
    return cloneEntry(updated);
  }

  async findExpired(asOf: Date): Promise<PaymentVaultEntry[]> {
    return Array.from(this.entries.values())
      .filter(entry => isExpiredCard(entry, asOf))
      .sort((a, b) => a.id - b.id)
      .map(cloneEntry);
  }

  async getStatistics(asOf: Date): Promise<VaultStatistics> {
    const all = Array.from(this.entries.values());
    return {
      total: all.length,
      active: all.filter(entry => entry.isActive).length,
      expired: all.filter(entry => isExpiredCard(entry, asOf)).length
    };
  }

  private activeFor(customerId: string): PaymentVaultEntry[] {
    return Array.from(this.entries.values()).filter(entry => entry.customerId === customerId && entry.isActive);
  }
}
