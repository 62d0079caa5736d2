import type { OrderRejection } from '@orderdesk/types';

export class ExchangeError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number = 500,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ExchangeError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      error: {
        code: this.code,
        message: this.message,
        details: this.details,
      },
    };
  }
}

/**
 * A business-rule rejection raised at a front-end boundary. The order core
 * itself returns rejections as values; this wraps one for `throw`.
 */
export class OrderValidationError extends ExchangeError {
  constructor(public readonly rejection: OrderRejection) {
    super(rejection.message, rejection.code, 422, { ...rejection.details });
    this.name = 'OrderValidationError';
  }
}

export class NotFoundError extends ExchangeError {
  constructor(resource: string, id?: string) {
    const message = id ? `${resource} with id ${id} not found` : `${resource} not found`;
    super(message, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

export enum GatewayErrorCode {
  NETWORK_ERROR = 'NETWORK_ERROR',
  TIMEOUT = 'TIMEOUT',
  RATE_LIMITED = 'RATE_LIMITED',
  AUTH_FAILED = 'AUTH_FAILED',
  EXCHANGE_REJECTED = 'EXCHANGE_REJECTED',
  PRICE_UNAVAILABLE = 'PRICE_UNAVAILABLE',
  SERVER_ERROR = 'SERVER_ERROR',
  INVALID_RESPONSE = 'INVALID_RESPONSE',
}

export interface GatewayErrorOptions {
  venueCode?: number;
  venueMessage?: string;
  httpStatus?: number;
  retryable?: boolean;
}

const GATEWAY_STATUS: Record<GatewayErrorCode, number> = {
  [GatewayErrorCode.NETWORK_ERROR]: 502,
  [GatewayErrorCode.TIMEOUT]: 504,
  [GatewayErrorCode.RATE_LIMITED]: 429,
  [GatewayErrorCode.AUTH_FAILED]: 502,
  [GatewayErrorCode.EXCHANGE_REJECTED]: 400,
  [GatewayErrorCode.PRICE_UNAVAILABLE]: 503,
  [GatewayErrorCode.SERVER_ERROR]: 502,
  [GatewayErrorCode.INVALID_RESPONSE]: 502,
};

/**
 * Failure talking to the venue: transport, authentication, or the venue
 * refusing a request. Kept apart from `OrderValidationError`.
 */
export class GatewayError extends ExchangeError {
  public readonly gatewayCode: GatewayErrorCode;
  public readonly venueCode?: number;
  public readonly venueMessage?: string;
  public readonly httpStatus?: number;
  public readonly retryable: boolean;

  constructor(message: string, gatewayCode: GatewayErrorCode, options: GatewayErrorOptions = {}) {
    super(message, gatewayCode, GATEWAY_STATUS[gatewayCode], {
      venueCode: options.venueCode,
      venueMessage: options.venueMessage,
    });
    this.name = 'GatewayError';
    this.gatewayCode = gatewayCode;
    this.venueCode = options.venueCode;
    this.venueMessage = options.venueMessage;
    this.httpStatus = options.httpStatus;
    this.retryable = options.retryable ?? false;
  }
}

export class RateLimitError extends GatewayError {
  public readonly retryAfter: number;

  constructor(retryAfter: number, venueCode?: number) {
    super('Rate limit exceeded', GatewayErrorCode.RATE_LIMITED, {
      venueCode,
      httpStatus: 429,
      retryable: true,
    });
    this.name = 'RateLimitError';
    this.retryAfter = retryAfter;
  }
}

export function isExchangeError(error: unknown): error is ExchangeError {
  return error instanceof ExchangeError;
}

export function isGatewayError(error: unknown): error is GatewayError {
  return error instanceof GatewayError;
}
