// src/lib/billing/transaction/types.ts
import { DecimalAmount } from '../utils/money';

export enum PaymentStatus {
  APPROVED = 'Approved',
  REFUNDED = 'Refunded',
  PARTIALLY_REFUNDED = 'Partially Refunded'
}

export enum TransactionKind {
  CHARGE = 'charge',
  COMPLETION = 'completion',
  REFUND = 'refund'
}

export interface PaymentTransaction {
  uuid: string;
  gatewayTransactionId: string;
  kind: TransactionKind;
  status: PaymentStatus;
  amount: DecimalAmount;
  /** Sum of the refunds issued against this transaction so far. */
  refundedAmount: DecimalAmount;
  currency: string;
  /** Last four digits, or "****" when the processor does not disclose them. */
  maskedIdentifier: string;
  customerRef: string | null;
  metadata: Record<string, unknown> | null;
  createdAt: Date;
}
