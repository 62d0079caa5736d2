import { GatewayError, GatewayErrorCode, RateLimitError } from '@orderdesk/errors';
import { venueErrorSchema } from './venue-types.js';

const RATE_LIMIT_CODES = new Set([-1003]);
const AUTH_CODES = new Set([-1002, -1022, -2014, -2015]);

function retryAfterMs(header: string | null): number {
  const seconds = Number(header);
  return header && Number.isFinite(seconds) && seconds > 0 ? seconds * 1000 : 0;
}

/**
 * Maps a non-success venue response to a `GatewayError`. Only rate limits
 * and 5xx responses come back retryable.
 */
export function fromVenueResponse(
  httpStatus: number,
  body: unknown,
  retryAfterHeader: string | null = null
): GatewayError {
  const parsed = venueErrorSchema.safeParse(body);
  const venueCode = parsed.success ? parsed.data.code : undefined;
  const venueMessage = parsed.success ? parsed.data.msg : undefined;

  if (httpStatus === 429 || httpStatus === 418 || (venueCode !== undefined && RATE_LIMIT_CODES.has(venueCode))) {
    return new RateLimitError(retryAfterMs(retryAfterHeader), venueCode);
  }

  if (httpStatus === 401 || (venueCode !== undefined && AUTH_CODES.has(venueCode))) {
    return new GatewayError(venueMessage ?? 'Authentication failed', GatewayErrorCode.AUTH_FAILED, {
      venueCode,
      venueMessage,
      httpStatus,
    });
  }

  if (httpStatus >= 500) {
    return new GatewayError(venueMessage ?? `HTTP ${httpStatus}`, GatewayErrorCode.SERVER_ERROR, {
      venueCode,
      venueMessage,
      httpStatus,
      retryable: true,
    });
  }

  return new GatewayError(venueMessage ?? `HTTP ${httpStatus}`, GatewayErrorCode.EXCHANGE_REJECTED, {
    venueCode,
    venueMessage,
    httpStatus,
  });
}

/** Failures raised by `fetch` itself, before any response arrived. */
export function fromTransportFailure(error: unknown, endpoint: string): GatewayError {
  if (error instanceof GatewayError) {
    return error;
  }
  if (error instanceof Error && error.name === 'AbortError') {
    return new GatewayError(`Request to ${endpoint} timed out`, GatewayErrorCode.TIMEOUT, {
      retryable: true,
    });
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new GatewayError(`Request to ${endpoint} failed: ${reason}`, GatewayErrorCode.NETWORK_ERROR, {
    retryable: true,
  });
}
