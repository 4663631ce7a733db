// src/lib/billing/subscription/database-subscription.store.ts
import { Queryable, wrapDatabaseError } from '../database/connection';
import { DatabaseError } from '../utils/error';
import { BillingLogger } from '../utils/logger';
import { normalizeAmount } from '../utils/money';
import { SubscriptionStore } from './subscription.store';
import {
  ActiveSubscription,
  BillingAdvance,
  BillingFrequency,
  CancelledSubscription,
  NewSubscription,
  Subscription,
  SubscriptionStatistics,
  SubscriptionStatus,
  isActive
} from './types';

export interface SubscriptionRow {
  id: number;
  uuid: string;
  customer_id: string;
  amount: string;
  currency: string;
  status: string;
  frequency: string;
  created_at: Date;
  next_billing_at: Date;
  last_billing_at: Date | null;
  cancelled_at: Date | null;
  billing_cycle: number;
  metadata: Record<string, unknown> | null;
}

interface StatisticsRow {
  total: number;
  active: number;
  cancelled: number;
}

const FREQUENCIES: readonly string[] = Object.values(BillingFrequency);

function isFrequency(value: string): value is BillingFrequency {
  return FREQUENCIES.includes(value);
}

/**
 * Builds the status-discriminated record from a row. Rows that break the
 * status/cancelled_at pairing are rejected rather than coerced.
 */
export function mapSubscriptionRow(row: SubscriptionRow): Subscription {
  if (!isFrequency(row.frequency)) {
    throw new DatabaseError('Unrecognized subscription frequency', null, { uuid: row.uuid, frequency: row.frequency });
  }

  const fields = {
    id: row.id,
    uuid: row.uuid,
    customerId: row.customer_id,
    amount: normalizeAmount(row.amount) ?? row.amount,
    currency: row.currency,
    frequency: row.frequency,
    createdAt: new Date(row.created_at),
    nextBillingAt: new Date(row.next_billing_at),
    lastBillingAt: row.last_billing_at ? new Date(row.last_billing_at) : null,
    billingCycle: row.billing_cycle,
    metadata: row.metadata
  };

  if (row.status === SubscriptionStatus.ACTIVE && row.cancelled_at === null) {
    return { ...fields, status: SubscriptionStatus.ACTIVE, cancelledAt: null };
  }

  if (row.status === SubscriptionStatus.CANCELLED && row.cancelled_at !== null) {
    return { ...fields, status: SubscriptionStatus.CANCELLED, cancelledAt: new Date(row.cancelled_at) };
  }

  throw new DatabaseError('Inconsistent subscription row', null, { uuid: row.uuid, status: row.status });
}

export class DatabaseSubscriptionStore extends SubscriptionStore {
  private logger: BillingLogger;

  constructor(private db: Queryable) {
    super();
    this.logger = new BillingLogger(undefined, 'DatabaseSubscriptionStore');
  }

  async create(subscription: NewSubscription): Promise<ActiveSubscription> {
    try {
      const result = await this.db.query<SubscriptionRow>(
        `INSERT INTO subscriptions (
          uuid, customer_id, amount, currency, status, frequency, created_at,
          next_billing_at, last_billing_at, cancelled_at, billing_cycle, metadata
        ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, NULL, $10, $11)
        RETURNING *`,
        [
          subscription.uuid,
          subscription.customerId,
          subscription.amount,
          subscription.currency,
          subscription.status,
          subscription.frequency,
          subscription.createdAt,
          subscription.nextBillingAt,
          subscription.lastBillingAt,
          subscription.billingCycle,
          subscription.metadata ? JSON.stringify(subscription.metadata) : null
        ]
      );

      const created = mapSubscriptionRow(result.rows[0]);
      if (!isActive(created)) {
        throw new DatabaseError('Created subscription is not active', null, { uuid: subscription.uuid });
      }

      this.logger.debug('Subscription inserted', { uuid: created.uuid, id: created.id });
      return created;
    } catch (error) {
      this.logger.error('Failed to create subscription', { error, uuid: subscription.uuid });
      throw wrapDatabaseError(error, 'Failed to create subscription', { uuid: subscription.uuid });
    }
  }

  async findByUuid(uuid: string): Promise<Subscription | null> {
    try {
      const result = await this.db.query<SubscriptionRow>('SELECT * FROM subscriptions WHERE uuid = $1', [uuid]);
      return result.rows.length > 0 ? mapSubscriptionRow(result.rows[0]) : null;
    } catch (error) {
      throw wrapDatabaseError(error, 'Failed to get subscription', { uuid });
    }
  }

  async findDueForBilling(asOf: Date, limit?: number): Promise<ActiveSubscription[]> {
    let query = `
      SELECT * FROM subscriptions
      WHERE status = 'active' AND next_billing_at <= $1
      ORDER BY next_billing_at ASC, id ASC`;
    const params: unknown[] = [asOf];

    if (limit) {
      query += ' LIMIT $2';
      params.push(limit);
    }

    try {
      const result = await this.db.query<SubscriptionRow>(query, params);
      return result.rows.map(mapSubscriptionRow).filter(isActive);
    } catch (error) {
      throw wrapDatabaseError(error, 'Failed to load due subscriptions', { asOf });
    }
  }

  async findActiveByCustomer(customerId: string): Promise<ActiveSubscription[]> {
    try {
      const result = await this.db.query<SubscriptionRow>(
        `SELECT * FROM subscriptions
         WHERE customer_id = $1 AND status = 'active'
         ORDER BY created_at DESC, id DESC`,
        [customerId]
      );
      return result.rows.map(mapSubscriptionRow).filter(isActive);
    } catch (error) {
      throw wrapDatabaseError(error, 'Failed to load customer subscriptions', { customerId });
    }
  }

  async cancel(uuid: string, cancelledAt: Date): Promise<CancelledSubscription | null> {
    try {
      const result = await this.db.query<SubscriptionRow>(
        `UPDATE subscriptions
         SET status = 'cancelled', cancelled_at = $2
         WHERE uuid = $1 AND status = 'active'
         RETURNING *`,
        [uuid, cancelledAt]
      );

      if (result.rows.length === 0) {
        return null;
      }

      const cancelled = mapSubscriptionRow(result.rows[0]);
      return cancelled.status === SubscriptionStatus.CANCELLED ? cancelled : null;
    } catch (error) {
      this.logger.error('Failed to cancel subscription', { error, uuid });
      throw wrapDatabaseError(error, 'Failed to cancel subscription', { uuid });
    }
  }

  async recordSuccessfulBilling(uuid: string, advance: BillingAdvance): Promise<ActiveSubscription | null> {
    try {
      const result = await this.db.query<SubscriptionRow>(
        `UPDATE subscriptions
         SET last_billing_at = $2,
             next_billing_at = $3,
             billing_cycle = billing_cycle + 1
         WHERE uuid = $1 AND status = 'active' AND billing_cycle = $4
         RETURNING *`,
        [uuid, advance.billedAt, advance.nextBillingAt, advance.expectedCycle]
      );

      if (result.rows.length === 0) {
        return null;
      }

      const updated = mapSubscriptionRow(result.rows[0]);
      return isActive(updated) ? updated : null;
    } catch (error) {
      this.logger.error('Failed to record billing', { error, uuid });
      throw wrapDatabaseError(error, 'Failed to record billing', { uuid });
    }
  }

  async getStatistics(): Promise<SubscriptionStatistics> {
    try {
      const result = await this.db.query<StatisticsRow>(
        `SELECT
           COUNT(*)::int AS total,
           COUNT(*) FILTER (WHERE status = 'active')::int AS active,
           COUNT(*) FILTER (WHERE status = 'cancelled')::int AS cancelled
         FROM subscriptions`
      );
      const row = result.rows[0];
      return { total: row.total, active: row.active, cancelled: row.cancelled };
    } catch (error) {
      throw wrapDatabaseError(error, 'Failed to load subscription statistics');
    }
  }
}
