// src/lib/billing/gateway/result.ts
import { BillingError, ErrorCode, GatewayDeclinedError, GatewayProtocolError, errorHandler } from '../utils/error';
import { GatewayDecline, GatewayFailure, GatewayResult, GatewaySuccess } from './types';

export function isSuccess<T>(result: GatewayResult<T>): result is GatewaySuccess & T {
  return result.status === 'success';
}

export function declined(code: string, message: string): GatewayDecline {
  return { status: 'declined', code, message };
}

export function failed(code: string, message: string, retryable: boolean = true): GatewayFailure {
  return { status: 'error', code, message, retryable };
}

/** Only malformed or unexpected processor answers are worth another attempt. */
export function isRetryableResult<T>(result: GatewayResult<T>): boolean {
  return result.status === 'error' && result.retryable;
}

/** Converts a thrown error into an `error` result, keeping its code. */
export function failureFromError(error: unknown): GatewayFailure {
  if (error instanceof BillingError) {
    return failed(error.code, error.message, errorHandler.isRetryableError(error));
  }
  return failed(ErrorCode.INTERNAL_ERROR, error instanceof Error ? error.message : 'Unknown error', false);
}

/**
 * Turns a non-success result into the matching typed error, for callers that
 * prefer exceptions over inspecting the result.
 */
export function toGatewayError(
  result: GatewayDecline | GatewayFailure,
  context?: Record<string, unknown>
): GatewayDeclinedError | GatewayProtocolError {
  if (result.status === 'declined') {
    return new GatewayDeclinedError(result.message, result.code, context);
  }
  return new GatewayProtocolError(result.message, {
    ...context,
    processorCode: result.code,
    retryable: result.retryable
  });
}
