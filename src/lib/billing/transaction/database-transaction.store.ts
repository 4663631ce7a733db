// src/lib/billing/transaction/database-transaction.store.ts
import { Queryable, wrapDatabaseError } from '../database/connection';
import { DatabaseError } from '../utils/error';
import { BillingLogger } from '../utils/logger';
import { DecimalAmount, normalizeAmount } from '../utils/money';
import { TransactionStore } from './transaction.store';
import { PaymentStatus, PaymentTransaction, TransactionKind } from './types';

export interface TransactionRow {
  id: number;
  uuid: string;
  gateway_transaction_id: string;
  kind: string;
  status: string;
  amount: string;
  refunded_amount: string;
  currency: string;
  masked_identifier: string;
  customer_ref: string | null;
  metadata: Record<string, unknown> | null;
  created_at: Date;
}

const KINDS: readonly string[] = Object.values(TransactionKind);
const STATUSES: readonly string[] = Object.values(PaymentStatus);

function isKind(value: string): value is TransactionKind {
  return KINDS.includes(value);
}

function isStatus(value: string): value is PaymentStatus {
  return STATUSES.includes(value);
}

export function mapTransactionRow(row: TransactionRow): PaymentTransaction {
  if (!isKind(row.kind) || !isStatus(row.status)) {
    throw new DatabaseError('Unrecognized transaction row', null, { id: row.id, kind: row.kind, status: row.status });
  }

  return {
    uuid: row.uuid,
    gatewayTransactionId: row.gateway_transaction_id,
    kind: row.kind,
    status: row.status,
    amount: normalizeAmount(row.amount) ?? row.amount,
    refundedAmount: normalizeAmount(row.refunded_amount) ?? row.refunded_amount,
    currency: row.currency,
    maskedIdentifier: row.masked_identifier,
    customerRef: row.customer_ref,
    metadata: row.metadata,
    createdAt: new Date(row.created_at)
  };
}

export class DatabaseTransactionStore extends TransactionStore {
  private logger: BillingLogger;

  constructor(private db: Queryable) {
    super();
    this.logger = new BillingLogger(undefined, 'DatabaseTransactionStore');
  }

  async save(transaction: PaymentTransaction): Promise<PaymentTransaction> {
    try {
      const inserted = await this.db.query<TransactionRow>(
        `INSERT INTO payment_transactions (
          uuid, gateway_transaction_id, kind, status, amount, refunded_amount, currency,
          masked_identifier, customer_ref, metadata, created_at
        ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
        ON CONFLICT (gateway_transaction_id) DO NOTHING
        RETURNING *`,
        [
          transaction.uuid,
          transaction.gatewayTransactionId,
          transaction.kind,
          transaction.status,
          transaction.amount,
          transaction.refundedAmount,
          transaction.currency,
          transaction.maskedIdentifier,
          transaction.customerRef,
          transaction.metadata ? JSON.stringify(transaction.metadata) : null,
          transaction.createdAt
        ]
      );

      if (inserted.rows.length > 0) {
        this.logger.debug('Transaction saved', {
          transactionId: transaction.uuid,
          gatewayTransactionId: transaction.gatewayTransactionId
        });
        return mapTransactionRow(inserted.rows[0]);
      }

      // Already recorded by an earlier call for the same processor transaction
      const existing = await this.findByGatewayTransactionId(transaction.gatewayTransactionId);
      if (!existing) {
        throw new DatabaseError('Transaction conflict without a stored row', null, {
          gatewayTransactionId: transaction.gatewayTransactionId
        });
      }
      return existing;
    } catch (error) {
      this.logger.error('Failed to save transaction', { error, transactionId: transaction.uuid });
      throw wrapDatabaseError(error, 'Failed to save transaction', { transactionId: transaction.uuid });
    }
  }

  async findByGatewayTransactionId(gatewayTransactionId: string): Promise<PaymentTransaction | null> {
    try {
      const result = await this.db.query<TransactionRow>(
        'SELECT * FROM payment_transactions WHERE gateway_transaction_id = $1',
        [gatewayTransactionId]
      );
      return result.rows.length > 0 ? mapTransactionRow(result.rows[0]) : null;
    } catch (error) {
      throw wrapDatabaseError(error, 'Failed to find transaction', { gatewayTransactionId });
    }
  }

  async recordRefund(gatewayTransactionId: string, amount: DecimalAmount): Promise<PaymentTransaction | null> {
    try {
      const result = await this.db.query<TransactionRow>(
        `UPDATE payment_transactions
            SET refunded_amount = refunded_amount + $2,
                status = CASE WHEN refunded_amount + $2 >= amount THEN $3 ELSE $4 END
          WHERE gateway_transaction_id = $1
          RETURNING *`,
        [gatewayTransactionId, amount, PaymentStatus.REFUNDED, PaymentStatus.PARTIALLY_REFUNDED]
      );
      return result.rows.length > 0 ? mapTransactionRow(result.rows[0]) : null;
    } catch (error) {
      this.logger.error('Failed to record refund', { error, gatewayTransactionId });
      throw wrapDatabaseError(error, 'Failed to record refund', { gatewayTransactionId });
    }
  }
}
