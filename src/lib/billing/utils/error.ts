// src/lib/billing/utils/error.ts
import { BillingLogger } from './logger';

export enum ErrorCode {
  // Input errors
  VALIDATION_ERROR = 'validation_error',

  // Gateway errors
  GATEWAY_COMMUNICATION_ERROR = 'gateway_communication_error',
  GATEWAY_DECLINED = 'gateway_declined',
  GATEWAY_PROTOCOL_ERROR = 'gateway_protocol_error',

  // Vault errors
  VAULT_NOT_FOUND = 'vault_not_found',
  PAYMENT_METHOD_EXPIRED = 'payment_method_expired',
  PAYMENT_PROCESSING_ERROR = 'payment_processing_error',

  // Subscription errors
  SUBSCRIPTION_NOT_FOUND = 'subscription_not_found',
  SUBSCRIPTION_INACTIVE = 'subscription_inactive',
  INVALID_FREQUENCY = 'invalid_frequency',
  BILLING_IN_PROGRESS = 'billing_in_progress',

  // Boundary errors
  RATE_LIMIT_EXCEEDED = 'rate_limit_exceeded',

  // System errors
  CONFIGURATION_ERROR = 'configuration_error',
  DATABASE_ERROR = 'database_error',
  INTERNAL_ERROR = 'internal_error'
}

export type ErrorContext = Record<string, unknown>;

export type FieldErrors = Record<string, string[]>;

export interface ErrorResponse {
  statusCode: number;
  body: {
    success: false;
    error: {
      code: string;
      message: string;
      details?: unknown;
      requestId?: string;
    };
  };
}

export class BillingError extends Error {
  readonly code: ErrorCode;
  readonly context?: ErrorContext;
  readonly originalError?: unknown;
  readonly isOperational: boolean;
  readonly httpStatus: number;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.INTERNAL_ERROR,
    context?: ErrorContext,
    originalError?: unknown,
    isOperational: boolean = true,
    httpStatus?: number
  ) {
    super(message);
    this.name = 'BillingError';
    this.code = code;
    this.context = context;
    this.originalError = originalError;
    this.isOperational = isOperational;
    this.httpStatus = httpStatus ?? determineHttpStatus(code);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /** Structured details a boundary layer can render without re-deriving context. */
  get details(): unknown {
    return this.context;
  }

  toResponse(requestId?: string): ErrorResponse['body'] {
    return {
      success: false,
      error: {
        code: this.code,
        message: this.message,
        details: this.details,
        requestId
      }
    };
  }
}

export class ValidationError extends BillingError {
  readonly fields: FieldErrors;

  constructor(message: string, fields: FieldErrors, context?: ErrorContext) {
    super(message, ErrorCode.VALIDATION_ERROR, { ...context, fields });
    this.name = 'ValidationError';
    this.fields = fields;
  }

  get details(): unknown {
    return this.fields;
  }
}

export class GatewayCommunicationError extends BillingError {
  constructor(message: string, originalError: unknown, context?: ErrorContext) {
    super(message, ErrorCode.GATEWAY_COMMUNICATION_ERROR, context, originalError);
    this.name = 'GatewayCommunicationError';
  }
}

export class GatewayDeclinedError extends BillingError {
  readonly declineCode: string;

  constructor(message: string, declineCode: string, context?: ErrorContext) {
    super(message, ErrorCode.GATEWAY_DECLINED, { ...context, declineCode });
    this.name = 'GatewayDeclinedError';
    this.declineCode = declineCode;
  }
}

export class GatewayProtocolError extends BillingError {
  constructor(message: string, context?: ErrorContext) {
    super(message, ErrorCode.GATEWAY_PROTOCOL_ERROR, context);
    this.name = 'GatewayProtocolError';
  }
}

export class VaultNotFoundError extends BillingError {
  constructor(entryId: string) {
    super('Payment method not found or inactive', ErrorCode.VAULT_NOT_FOUND, { vaultId: entryId });
    this.name = 'VaultNotFoundError';
  }
}

export class PaymentMethodExpiredError extends BillingError {
  constructor(entryId: string, expiry: string) {
    super('Payment method has expired', ErrorCode.PAYMENT_METHOD_EXPIRED, { vaultId: entryId, expiry });
    this.name = 'PaymentMethodExpiredError';
  }
}

export class PaymentProcessingError extends BillingError {
  constructor(message: string, entryId: string, originalError: unknown) {
    super(message, ErrorCode.PAYMENT_PROCESSING_ERROR, { vaultId: entryId }, originalError);
    this.name = 'PaymentProcessingError';
  }
}

/**
 * Raised when a frequency outside the closed set reaches the billing calendar.
 * Input is validated long before this point, so it signals a broken invariant
 * (corrupt row, unchecked cast) rather than a user mistake.
 */
export class InvalidFrequencyError extends BillingError {
  constructor(frequency: string) {
    super(`Invalid frequency: ${frequency}`, ErrorCode.INVALID_FREQUENCY, { frequency }, undefined, false);
    this.name = 'InvalidFrequencyError';
  }
}

export class ConfigurationError extends BillingError {
  constructor(message: string, context?: ErrorContext) {
    super(message, ErrorCode.CONFIGURATION_ERROR, context, undefined, false);
    this.name = 'ConfigurationError';
  }
}

export class DatabaseError extends BillingError {
  constructor(message: string, originalError: unknown, context?: ErrorContext) {
    super(message, ErrorCode.DATABASE_ERROR, context, originalError);
    this.name = 'DatabaseError';
  }
}

function determineHttpStatus(code: ErrorCode): number {
  switch (code) {
    case ErrorCode.VALIDATION_ERROR:
      return 400;
    case ErrorCode.GATEWAY_DECLINED:
      return 402;
    case ErrorCode.VAULT_NOT_FOUND:
    case ErrorCode.SUBSCRIPTION_NOT_FOUND:
      return 404;
    case ErrorCode.SUBSCRIPTION_INACTIVE:
    case ErrorCode.BILLING_IN_PROGRESS:
      return 409;
    case ErrorCode.PAYMENT_METHOD_EXPIRED:
      return 422;
    case ErrorCode.RATE_LIMIT_EXCEEDED:
      return 429;
    case ErrorCode.GATEWAY_COMMUNICATION_ERROR:
    case ErrorCode.GATEWAY_PROTOCOL_ERROR:
    case ErrorCode.PAYMENT_PROCESSING_ERROR:
      return 502;
    default:
      return 500;
  }
}

export class ErrorHandler {
  private static instance: ErrorHandler;
  private logger: BillingLogger;

  private constructor() {
    this.logger = new BillingLogger(undefined, 'ErrorHandler');
  }

  static getInstance(): ErrorHandler {
    if (!ErrorHandler.instance) {
      ErrorHandler.instance = new ErrorHandler();
    }
    return ErrorHandler.instance;
  }

  handleError(error: unknown): void {
    if (error instanceof BillingError && error.isOperational) {
      this.logger.error(error.message, {
        code: error.code,
        context: error.context
      });
      return;
    }

    this.logger.error('Critical error occurred', {
      message: getErrorMessage(error),
      stack: error instanceof Error ? error.stack : undefined
    });
  }

  createError(
    message: string,
    code: ErrorCode = ErrorCode.INTERNAL_ERROR,
    context?: ErrorContext,
    originalError?: unknown,
    isOperational: boolean = true
  ): BillingError {
    return new BillingError(message, code, context, originalError, isOperational);
  }

  /**
   * Categorizes an error for metrics and monitoring
   */
  categorizeError(error: unknown): string {
    if (error instanceof BillingError) {
      return error.code;
    }
    return error instanceof Error ? error.name : 'UnknownError';
  }

  /**
   * Transport failures and malformed processor responses may be retried by a
   * supervisor; explicit declines never are.
   */
  isRetryableError(error: unknown): boolean {
    if (error instanceof BillingError) {
      if (
        error.code === ErrorCode.GATEWAY_COMMUNICATION_ERROR ||
        error.code === ErrorCode.GATEWAY_PROTOCOL_ERROR
      ) {
        return true;
      }
      return error.context?.retryable === true;
    }

    return error instanceof Error && (error.name === 'NetworkError' || error.name === 'TimeoutError');
  }
}

export const errorHandler = ErrorHandler.getInstance();

/**
 * Helper function to safely extract error message from any error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  if (typeof error === 'object' && error !== null && 'message' in error) {
    return String(error.message);
  }

  return 'Unknown error';
}

/**
 * Helper function to create a standardized error response for API endpoints
 */
export function createErrorResponse(error: unknown, requestId?: string): ErrorResponse {
  if (error instanceof BillingError) {
    return {
      statusCode: error.httpStatus,
      body: error.toResponse(requestId)
    };
  }

  return {
    statusCode: 500,
    body: {
      success: false,
      error: {
        code: ErrorCode.INTERNAL_ERROR,
        message:
          process.env.NODE_ENV === 'production' ? 'An unexpected error occurred' : getErrorMessage(error),
        requestId
      }
    }
  };
}
