// src/api/responses.ts
import { Response } from 'express';
import { GatewayResult } from '../lib/billing/gateway/types';
import { PaymentVaultEntry } from '../lib/billing/vault/types';
import { getRequestId } from './middleware/request-context.middleware';

export function sendData(res: Response, data: unknown, statusCode: number = 200): void {
  res.status(statusCode).json({ success: true, data });
}

/**
 * Renders a gateway result: 200 on success, 402 for a decline and 502 when
 * the processor answer could not be used.
 */
export function sendGatewayResult<T>(res: Response, result: GatewayResult<T>, successStatus: number = 200): void {
  if (result.status === 'success') {
    sendData(res, result, successStatus);
    return;
  }

  res.status(result.status === 'declined' ? 402 : 502).json({
    success: false,
    error: {
      code: result.code,
      message: result.message,
      retryable: result.status === 'error' && result.retryable,
      requestId: getRequestId(res)
    }
  });
}

/** A vault entry as returned over HTTP; the processor token never leaves the service. */
export type VaultEntryView = Omit<PaymentVaultEntry, 'paymentMethodToken' | 'id'>;

export function toVaultEntryView(entry: PaymentVaultEntry): VaultEntryView {
  const { paymentMethodToken: _token, id: _id, ...view } = entry;
  return view;
}
