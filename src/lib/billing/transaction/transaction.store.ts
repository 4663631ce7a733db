// src/lib/billing/transaction/transaction.store.ts
import { DecimalAmount, compareAmounts, fromCents, toCents } from '../utils/money';
import { PaymentStatus, PaymentTransaction } from './types';

export abstract class TransactionStore {
  /**
   * Stores a processor transaction once. Saving a gateway transaction id that
   * is already on record keeps the first record and returns it.
   */
  abstract save(transaction: PaymentTransaction): Promise<PaymentTransaction>;
  abstract findByGatewayTransactionId(gatewayTransactionId: string): Promise<PaymentTransaction | null>;
  /**
   * Adds `amount` to the refunded total of the original transaction and moves
   * it to REFUNDED or PARTIALLY_REFUNDED. Null when the original is unknown.
   */
  abstract recordRefund(gatewayTransactionId: string, amount: DecimalAmount): Promise<PaymentTransaction | null>;
}

export function refundStatus(amount: DecimalAmount, refundedAmount: DecimalAmount): PaymentStatus {
  return compareAmounts(refundedAmount, amount) >= 0 ? PaymentStatus.REFUNDED : PaymentStatus.PARTIALLY_REFUNDED;
}

export class InMemoryTransactionStore extends TransactionStore {
  private transactions: Map<string, PaymentTransaction> = new Map();

  async save(transaction: PaymentTransaction): Promise<PaymentTransaction> {
    const existing = this.transactions.get(transaction.gatewayTransactionId);
    if (existing) {
      return { ...existing };
    }

    this.transactions.set(transaction.gatewayTransactionId, { ...transaction });
    return { ...transaction };
  }

  async findByGatewayTransactionId(gatewayTransactionId: string): Promise<PaymentTransaction | null> {
    const transaction = this.transactions.get(gatewayTransactionId);
    return transaction ? { ...transaction } : null;
  }

  async recordRefund(gatewayTransactionId: string, amount: DecimalAmount): Promise<PaymentTransaction | null> {
    const transaction = this.transactions.get(gatewayTransactionId);
    if (!transaction) {
      return null;
    }

    transaction.refundedAmount = fromCents(toCents(transaction.refundedAmount) + toCents(amount));
    transaction.status = refundStatus(transaction.amount, transaction.refundedAmount);
    return { ...transaction };
  }
}
