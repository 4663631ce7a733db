// src/lib/billing/vault/database-vault.store.ts
import { Database, Queryable, isUniqueViolation, wrapDatabaseError } from '../database/connection';
import { DatabaseError } from '../utils/error';
import { BillingLogger } from '../utils/logger';
import { DeactivationOutcome, NewVaultEntry, PaymentMethodType, PaymentVaultEntry, VaultStatistics } from './types';
import { compareNewestFirst, deactivate as deactivateEntry, markDefault, clearDefault } from './vault-entry';
import { VaultStore } from './vault.store';

export interface VaultRow {
  id: number;
  uuid: string;
  customer_id: string;
  gateway_customer_ref: string;
  payment_method_token: string;
  payment_method_type: string;
  last4_digits: string | null;
  card_brand: string | null;
  expiry_month: string | null;
  expiry_year: string | null;
  billing_name: string | null;
  billing_address: Record<string, unknown> | null;
  is_active: boolean;
  is_default: boolean;
  created_at: Date;
  updated_at: Date;
  last_used_at: Date | null;
  metadata: Record<string, unknown> | null;
}

interface StatisticsRow {
  total: number;
  active: number;
  expired: number;
}

const METHOD_TYPES: readonly string[] = Object.values(PaymentMethodType);

function isMethodType(value: string): value is PaymentMethodType {
  return METHOD_TYPES.includes(value);
}

// Card entries whose expiry month lies before ($1 year, $2 month)
const EXPIRED_CARD_CONDITION = `
  is_active
  AND payment_method_type IN ('${PaymentMethodType.CREDIT_CARD}', '${PaymentMethodType.DEBIT_CARD}')
  AND expiry_year IS NOT NULL AND expiry_month IS NOT NULL
  AND (expiry_year::int < $1 OR (expiry_year::int = $1 AND expiry_month::int < $2))`;

export function mapVaultRow(row: VaultRow): PaymentVaultEntry {
  if (!isMethodType(row.payment_method_type)) {
    throw new DatabaseError('Unrecognized payment method type', null, {
      uuid: row.uuid,
      paymentMethodType: row.payment_method_type
    });
  }

  return {
    id: row.id,
    uuid: row.uuid,
    customerId: row.customer_id,
    gatewayCustomerRef: row.gateway_customer_ref,
    paymentMethodToken: row.payment_method_token,
    paymentMethodType: row.payment_method_type,
    last4Digits: row.last4_digits,
    cardBrand: row.card_brand,
    expiryMonth: row.expiry_month,
    expiryYear: row.expiry_year,
    billingName: row.billing_name,
    billingAddress: row.billing_address,
    isActive: row.is_active,
    isDefault: row.is_default,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
    lastUsedAt: row.last_used_at ? new Date(row.last_used_at) : null,
    metadata: row.metadata
  };
}

/** Year and 1-based month of `asOf`, in local time. */
function yearMonth(asOf: Date): [number, number] {
  return [asOf.getFullYear(), asOf.getMonth() + 1];
}

export class DatabaseVaultStore extends VaultStore {
  private logger: BillingLogger;

  constructor(private db: Database) {
    super();
    this.logger = new BillingLogger(undefined, 'DatabaseVaultStore');
  }

  /**
   * The default flag is decided inside the INSERT itself. Two concurrent first
   * inserts can both see no active entry; the partial unique index rejects the
   * second, which is then stored as a non-default entry.
   */
  async insert(entry: NewVaultEntry): Promise<PaymentVaultEntry> {
    try {
      return await this.insertRow(entry, true);
    } catch (error) {
      if (!isUniqueViolation(error)) {
        this.logger.error('Failed to store payment method', { error, uuid: entry.uuid });
        throw wrapDatabaseError(error, 'Failed to store payment method', { uuid: entry.uuid });
      }
    }

    this.logger.warn('Concurrent default assignment detected, storing as non-default', {
      customerId: entry.customerId,
      uuid: entry.uuid
    });

    try {
      return await this.insertRow(entry, false);
    } catch (error) {
      throw wrapDatabaseError(error, 'Failed to store payment method', { uuid: entry.uuid });
    }
  }

  async findByUuid(uuid: string): Promise<PaymentVaultEntry | null> {
    try {
      const result = await this.db.query<VaultRow>('SELECT * FROM payment_vault WHERE uuid = $1', [uuid]);
      return result.rows.length > 0 ? mapVaultRow(result.rows[0]) : null;
    } catch (error) {
      throw wrapDatabaseError(error, 'Failed to get payment method', { uuid });
    }
  }

  async findActiveByCustomer(customerId: string): Promise<PaymentVaultEntry[]> {
    try {
      const result = await this.db.query<VaultRow>(
        `SELECT * FROM payment_vault
         WHERE customer_id = $1 AND is_active
         ORDER BY is_default DESC, created_at DESC, id DESC`,
        [customerId]
      );
      return result.rows.map(mapVaultRow);
    } catch (error) {
      throw wrapDatabaseError(error, 'Failed to list payment methods', { customerId });
    }
  }

  async findDefaultByCustomer(customerId: string): Promise<PaymentVaultEntry | null> {
    try {
      const result = await this.db.query<VaultRow>(
        'SELECT * FROM payment_vault WHERE customer_id = $1 AND is_active AND is_default',
        [customerId]
      );
      return result.rows.length > 0 ? mapVaultRow(result.rows[0]) : null;
    } catch (error) {
      throw wrapDatabaseError(error, 'Failed to get default payment method', { customerId });
    }
  }

  async findByGatewayToken(gatewayCustomerRef: string, paymentMethodToken: string): Promise<PaymentVaultEntry | null> {
    try {
      const result = await this.db.query<VaultRow>(
        `SELECT * FROM payment_vault
         WHERE gateway_customer_ref = $1 AND payment_method_token = $2
         ORDER BY created_at DESC, id DESC
         LIMIT 1`,
        [gatewayCustomerRef, paymentMethodToken]
      );
      return result.rows.length > 0 ? mapVaultRow(result.rows[0]) : null;
    } catch (error) {
      throw wrapDatabaseError(error, 'Failed to find payment method by token', { gatewayCustomerRef });
    }
  }

  async setDefault(uuid: string, at: Date): Promise<PaymentVaultEntry | null> {
    try {
      return await this.withCustomerLock(uuid, async (client, target, active) => {
        for (const entry of active) {
          if (entry.isDefault && entry.uuid !== uuid) {
            await this.writeState(client, clearDefault(entry, at));
          }
        }

        const updated = markDefault(target, at);
        await this.writeState(client, updated);
        return updated;
      });
    } catch (error) {
      this.logger.error('Failed to set default payment method', { error, uuid });
      throw wrapDatabaseError(error, 'Failed to set default payment method', { uuid });
    }
  }

  async deactivate(uuid: string, at: Date): Promise<DeactivationOutcome | null> {
    try {
      return await this.withCustomerLock(uuid, async (client, target, active) => {
        const deactivated = deactivateEntry(target, at);
        await this.writeState(client, deactivated);

        let promoted: PaymentVaultEntry | null = null;
        if (target.isDefault) {
          const [successor] = active.filter(entry => entry.uuid !== uuid).sort(compareNewestFirst);
          if (successor) {
            promoted = markDefault(successor, at);
            await this.writeState(client, promoted);
          }
        }

        return { deactivated, promoted };
      });
    } catch (error) {
      this.logger.error('Failed to deactivate payment method', { error, uuid });
      throw wrapDatabaseError(error, 'Failed to deactivate payment method', { uuid });
    }
  }

  async markUsed(uuid: string, at: Date): Promise<PaymentVaultEntry | null> {
    try {
      const result = await this.db.query<VaultRow>(
        'UPDATE payment_vault SET last_used_at = $2, updated_at = $2 WHERE uuid = $1 RETURNING *',
        [uuid, at]
      );
      return result.rows.length > 0 ? mapVaultRow(result.rows[0]) : null;
    } catch (error) {
      throw wrapDatabaseError(error, 'Failed to mark payment method used', { uuid });
    }
  }

  async findExpired(asOf: Date): Promise<PaymentVaultEntry[]> {
    try {
      const result = await this.db.query<VaultRow>(
        `SELECT * FROM payment_vault WHERE ${EXPIRED_CARD_CONDITION} ORDER BY id ASC`,
        yearMonth(asOf)
      );
      return result.rows.map(mapVaultRow);
    } catch (error) {
      throw wrapDatabaseError(error, 'Failed to load expired payment methods', { asOf });
    }
  }

  async getStatistics(asOf: Date): Promise<VaultStatistics> {
    try {
      const result = await this.db.query<StatisticsRow>(
        `SELECT
           COUNT(*)::int AS total,
           COUNT(*) FILTER (WHERE is_active)::int AS active,
           COUNT(*) FILTER (WHERE ${EXPIRED_CARD_CONDITION})::int AS expired
         FROM payment_vault`,
        yearMonth(asOf)
      );
      const row = result.rows[0];
      return { total: row.total, active: row.active, expired: row.expired };
    } catch (error) {
      throw wrapDatabaseError(error, 'Failed to load vault statistics');
    }
  }

  private async insertRow(entry: NewVaultEntry, mayBeDefault: boolean): Promise<PaymentVaultEntry> {
    const result = await this.db.query<VaultRow>(
      `INSERT INTO payment_vault (
         uuid, customer_id, gateway_customer_ref, payment_method_token, payment_method_type,
         last4_digits, card_brand, expiry_month, expiry_year, billing_name, billing_address,
         is_active, is_default, created_at, updated_at, last_used_at, metadata
       )
       SELECT
         $1::uuid, $2::varchar, $3::varchar, $4::varchar, $5::varchar,
         $6::varchar, $7::varchar, $8::varchar, $9::varchar, $10::varchar, $11::jsonb,
         $12::boolean,
         $12::boolean AND $13::boolean AND NOT EXISTS (
           SELECT 1 FROM payment_vault WHERE customer_id = $2::varchar AND is_active
         ),
         $14::timestamptz, $15::timestamptz, $16::timestamptz, $17::jsonb
       RETURNING *`,
      [
        entry.uuid,
        entry.customerId,
        entry.gatewayCustomerRef,
        entry.paymentMethodToken,
        entry.paymentMethodType,
        entry.last4Digits,
        entry.cardBrand,
        entry.expiryMonth,
        entry.expiryYear,
        entry.billingName,
        entry.billingAddress ? JSON.stringify(entry.billingAddress) : null,
        entry.isActive,
        mayBeDefault,
        entry.createdAt,
        entry.updatedAt,
        entry.lastUsedAt,
        entry.metadata ? JSON.stringify(entry.metadata) : null
      ]
    );

    return mapVaultRow(result.rows[0]);
  }

  /**
   * Runs `work` in one transaction holding row locks on every active entry of
   * the target's customer, locked in key order. Yields null without calling
   * `work` when the target is missing or inactive.
   */
  private async withCustomerLock<T>(
    uuid: string,
    work: (client: Queryable, target: PaymentVaultEntry, active: PaymentVaultEntry[]) => Promise<T>
  ): Promise<T | null> {
    return this.db.withTransaction<T | null>(async client => {
      const owner = await client.query<Pick<VaultRow, 'customer_id'>>(
        'SELECT customer_id FROM payment_vault WHERE uuid = $1',
        [uuid]
      );
      if (owner.rows.length === 0) {
        return null;
      }

      const locked = await client.query<VaultRow>(
        `SELECT * FROM payment_vault
         WHERE customer_id = $1 AND is_active
         ORDER BY id ASC
         FOR UPDATE`,
        [owner.rows[0].customer_id]
      );
      const active = locked.rows.map(mapVaultRow);
      const target = active.find(entry => entry.uuid === uuid);

      if (!target) {
        return null;
      }
      return await work(client, target, active);
    });
  }

  /** Writes the mutable flags and timestamps of a transitioned entry. */
  private async writeState(client: Queryable, entry: PaymentVaultEntry): Promise<void> {
    await client.query(
      `UPDATE payment_vault
       SET is_active = $2, is_default = $3, updated_at = $4, last_used_at = $5
       WHERE id = $1`,
      [entry.id, entry.isActive, entry.isDefault, entry.updatedAt, entry.lastUsedAt]
    );
  }
}
