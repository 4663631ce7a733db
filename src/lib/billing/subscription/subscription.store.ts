// src/lib/billing/subscription/subscription.store.ts
import {
  ActiveSubscription,
  BillingAdvance,
  CancelledSubscription,
  NewSubscription,
  Subscription,
  SubscriptionStatistics,
  SubscriptionStatus,
  isActive
} from './types';

/**
 * Persistence seam for subscriptions. The two mutating operations are
 * conditional: `cancel` only applies to an active record and
 * `recordSuccessfulBilling` only to an active record still at the expected
 * cycle. Both return null when the condition does not hold.
 */
export abstract class SubscriptionStore {
  abstract create(subscription: NewSubscription): Promise<ActiveSubscription>;
  abstract findByUuid(uuid: string): Promise<Subscription | null>;
  /** Active subscriptions with `nextBillingAt <= asOf`, earliest first. */
  abstract findDueForBilling(asOf: Date, limit?: number): Promise<ActiveSubscription[]>;
  /** Active subscriptions of one customer, newest first. */
  abstract findActiveByCustomer(customerId: string): Promise<ActiveSubscription[]>;
  abstract cancel(uuid: string, cancelledAt: Date): Promise<CancelledSubscription | null>;
  abstract recordSuccessfulBilling(uuid: string, advance: BillingAdvance): Promise<ActiveSubscription | null>;
  abstract getStatistics(): Promise<SubscriptionStatistics>;
}

function copyFields(subscription: Subscription) {
  return {
    createdAt: new Date(subscription.createdAt.getTime()),
    nextBillingAt: new Date(subscription.nextBillingAt.getTime()),
    lastBillingAt: subscription.lastBillingAt ? new Date(subscription.lastBillingAt.getTime()) : null,
    metadata: subscription.metadata ? structuredClone(subscription.metadata) : null
  };
}

function cloneActive(subscription: ActiveSubscription): ActiveSubscription {
  return { ...subscription, ...copyFields(subscription) };
}

function cloneSubscription(subscription: Subscription): Subscription {
  if (isActive(subscription)) {
    return cloneActive(subscription);
  }
  return {
    ...subscription,
    ...copyFields(subscription),
    cancelledAt: new Date(subscription.cancelledAt.getTime())
  };
}

// Every method reads and writes without awaiting in between, so each
// operation is atomic with respect to other callers on the event loop.
export class InMemorySubscriptionStore extends SubscriptionStore {
  private subscriptions: Map<string, Subscription> = new Map();
  private nextId = 1;

  async create(subscription: NewSubscription): Promise<ActiveSubscription> {
    const stored: ActiveSubscription = cloneActive({ ...subscription, id: this.nextId++ });
    this.subscriptions.set(stored.uuid, stored);
    return cloneActive(stored);
  }

  async findByUuid(uuid: string): Promise<Subscription | null> {
    const subscription = this.subscriptions.get(uuid);
    return subscription ? cloneSubscription(subscription) : null;
  }

  async findDueForBilling(asOf: Date, limit?: number): Promise<ActiveSubscription[]> {
    const due = Array.from(this.subscriptions.values())
      .filter(isActive)
      .filter(sub => sub.nextBillingAt.getTime() <= asOf.getTime())
      .sort((a, b) => a.nextBillingAt.getTime() - b.nextBillingAt.getTime() || a.id - b.id);

    return (limit ? due.slice(0, limit) : due).map(cloneActive);
  }

  async findActiveByCustomer(customerId: string): Promise<ActiveSubscription[]> {
    return Array.from(this.subscriptions.values())
      .filter(isActive)
      .filter(sub => sub.customerId === customerId)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id)
      .map(cloneActive);
  }

  async cancel(uuid: string, cancelledAt: Date): Promise<CancelledSubscription | null> {
    const existing = this.subscriptions.get(uuid);
    if (!existing || !isActive(existing)) {
      return null;
    }

    const cancelled: CancelledSubscription = {
      ...existing,
      status: SubscriptionStatus.CANCELLED,
      cancelledAt: new Date(cancelledAt.getTime())
    };
    this.subscriptions.set(uuid, cancelled);

    return { ...cancelled, ...copyFields(cancelled), cancelledAt: new Date(cancelledAt.getTime()) };
  }

  async recordSuccessfulBilling(uuid: string, advance: BillingAdvance): Promise<ActiveSubscription | null> {
    const existing = this.subscriptions.get(uuid);
    if (!existing || !isActive(existing) || existing.billingCycle !== advance.expectedCycle) {
      return null;
    }

    const updated: ActiveSubscription = {
      ...existing,
      lastBillingAt: new Date(advance.billedAt.getTime()),
      nextBillingAt: new Date(advance.nextBillingAt.getTime()),
      billingCycle: existing.billingCycle + 1
    };
    this.subscriptions.set(uuid, updated);

    return cloneActive(updated);
  }

  async getStatistics(): Promise<SubscriptionStatistics> {
    let active = 0;
    for (const subscription of this.subscriptions.values()) {
      if (isActive(subscription)) {
        active++;
      }
    }

    return {
      total: this.subscriptions.size,
      active,
      cancelled: this.subscriptions.size - active
    };
  }
}
