// src/lib/billing/subscription/types.ts
import { DecimalAmount } from '../utils/money';
import { ChargeResult } from '../gateway/types';

export enum SubscriptionStatus {
  ACTIVE = 'active',
  CANCELLED = 'cancelled'
}

export enum BillingFrequency {
  DAILY = 'daily',
  WEEKLY = 'weekly',
  MONTHLY = 'monthly',
  YEARLY = 'yearly'
}

interface SubscriptionFields {
  id: number;
  uuid: string;
  customerId: string;
  amount: DecimalAmount;
  currency: string;
  frequency: BillingFrequency;
  createdAt: Date;
  nextBillingAt: Date;
  lastBillingAt: Date | null;
  billingCycle: number;
  metadata: Record<string, unknown> | null;
}

export interface ActiveSubscription extends SubscriptionFields {
  status: SubscriptionStatus.ACTIVE;
  cancelledAt: null;
}

export interface CancelledSubscription extends SubscriptionFields {
  status: SubscriptionStatus.CANCELLED;
  cancelledAt: Date;
}

export type Subscription = ActiveSubscription | CancelledSubscription;

/** A subscription before the store has assigned its surrogate key. */
export type NewSubscription = Omit<ActiveSubscription, 'id'>;

export interface BillingAdvance {
  expectedCycle: number;
  billedAt: Date;
  nextBillingAt: Date;
}

export interface SubscriptionStatistics {
  total: number;
  active: number;
  cancelled: number;
}

export interface CreateSubscriptionInput {
  customerId: string;
  amount: number | string;
  currency: string;
  frequency: BillingFrequency | string;
  metadata?: Record<string, unknown>;
}

/** The gateway's verdict for one subscription, tagged with what was billed. */
export type BillingResult = ChargeResult & {
  subscriptionId: string;
  customerId: string;
  billingCycle: number;
};

export function isActive(subscription: Subscription): subscription is ActiveSubscription {
  return subscription.status === SubscriptionStatus.ACTIVE;
}
