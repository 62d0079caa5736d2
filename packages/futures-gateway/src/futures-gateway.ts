import { Decimal } from 'decimal.js';
import type { z } from 'zod';
import type { GatewayConfig } from '@orderdesk/config';
import { GatewayError, GatewayErrorCode, RateLimitError } from '@orderdesk/errors';
import { createServiceLogger, type Logger } from '@orderdesk/logger';
import type {
  AssetBalance,
  CancelAllAck,
  ExchangeGateway,
  NormalizedOrder,
  OrderAck,
  SymbolFilters,
} from '@orderdesk/types';
import { parseSymbolFilters } from './filters.js';
import { toOrderParams } from './order-params.js';
import { RequestSigner, type QueryParams } from './signer.js';
import { fromTransportFailure, fromVenueResponse } from './venue-errors.js';
import {
  cancelAllResponseSchema,
  exchangeInfoSchema,
  tickerPriceSchema,
  venueBalanceListSchema,
  venueErrorSchema,
  venueOrderListSchema,
  venueOrderSchema,
  type VenueOrder,
} from './venue-types.js';

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface FuturesGatewayOptions {
  fetch?: FetchFn;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  logger?: Logger;
}

type HttpMethod = 'GET' | 'POST' | 'DELETE';

/**
 * `transient` retries network failures, timeouts, 5xx and rate limits.
 * `rate-limit` retries rate limits only; order placement uses it so a
 * request the venue may already have accepted is never sent twice.
 */
type RetryPolicy = 'transient' | 'rate-limit';

interface RequestOptions {
  params?: QueryParams;
  signed?: boolean;
  retry?: RetryPolicy;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function isNonZero(value: string | undefined): value is string {
  if (value === undefined) {
    return false;
  }
  try {
    return !new Decimal(value).isZero();
  } catch {
    return false;
  }
}

/**
 * REST client for USDT-margined futures, implementing the desk's
 * `ExchangeGateway` contract.
 *
 * Endpoints:
 * - Mainnet: https://fapi.binance.com
 * - Testnet: https://testnet.binancefuture.com
 */
export class FuturesGateway implements ExchangeGateway {
  readonly #config: GatewayConfig;
  readonly #signer: RequestSigner;
  readonly #fetch: FetchFn;
  readonly #sleep: (ms: number) => Promise<void>;
  readonly #now: () => number;
  readonly #logger: Logger;

  constructor(config: GatewayConfig, options: FuturesGatewayOptions = {}) {
    this.#config = config;
    this.#signer = new RequestSigner(config.apiKey, config.apiSecret);
    this.#fetch = options.fetch ?? fetch;
    this.#sleep = options.sleep ?? defaultSleep;
    this.#now = options.now ?? Date.now;
    this.#logger = options.logger ?? createServiceLogger('futures-gateway');
  }

  get baseUrl(): string {
    return this.#config.baseUrl;
  }

  // -------------------------------------------------------------------------
  // Market data
  // -------------------------------------------------------------------------

  async fetchAllSymbolFilters(): Promise<SymbolFilters[]> {
    const info = await this.request('GET', '/fapi/v1/exchangeInfo', exchangeInfoSchema);
    return info.symbols.map((symbol) => parseSymbolFilters(symbol));
  }

  async fetchSymbolFilters(symbol: string): Promise<SymbolFilters | null> {
    const info = await this.request('GET', '/fapi/v1/exchangeInfo', exchangeInfoSchema);
    const entry = info.symbols.find((s) => s.symbol === symbol);
    return entry ? parseSymbolFilters(entry) : null;
  }

  async fetchMarketPrice(symbol: string): Promise<Decimal> {
    let raw: string;
    try {
      const ticker = await this.request('GET', '/fapi/v1/ticker/price', tickerPriceSchema, {
        params: { symbol },
      });
      raw = ticker.price;
    } catch (error) {
      const cause = error instanceof GatewayError ? error : fromTransportFailure(error, 'ticker');
      throw new GatewayError(
        `Market price for ${symbol} is unavailable: ${cause.message}`,
        GatewayErrorCode.PRICE_UNAVAILABLE,
        { venueCode: cause.venueCode, venueMessage: cause.venueMessage, httpStatus: cause.httpStatus }
      );
    }

    if (!isNonZero(raw) || new Decimal(raw).isNegative()) {
      throw new GatewayError(
        `Market price for ${symbol} is unavailable: venue returned ${raw}`,
        GatewayErrorCode.PRICE_UNAVAILABLE
      );
    }
    return new Decimal(raw);
  }

  // -------------------------------------------------------------------------
  // Orders
  // -------------------------------------------------------------------------

  async submitOrder(order: NormalizedOrder): Promise<OrderAck> {
    const data = await this.request('POST', '/fapi/v1/order', venueOrderSchema, {
      params: toOrderParams(order),
      signed: true,
      retry: 'rate-limit',
    });
    return this.mapOrder(data);
  }

  async cancelOrder(symbol: string, orderId: string): Promise<OrderAck> {
    const data = await this.request('DELETE', '/fapi/v1/order', venueOrderSchema, {
      params: { symbol, orderId },
      signed: true,
    });
    return this.mapOrder(data);
  }

  async cancelAllOrders(symbol: string): Promise<CancelAllAck> {
    const data = await this.request('DELETE', '/fapi/v1/allOpenOrders', cancelAllResponseSchema, {
      params: { symbol },
      signed: true,
    });
    this.#logger.info({ symbol }, 'Cancelled all open orders');
    return { symbol, message: data.msg };
  }

  async getOrder(symbol: string, orderId: string): Promise<OrderAck> {
    const data = await this.request('GET', '/fapi/v1/order', venueOrderSchema, {
      params: { symbol, orderId },
      signed: true,
    });
    return this.mapOrder(data);
  }

  async getOpenOrders(symbol?: string): Promise<OrderAck[]> {
    const data = await this.request('GET', '/fapi/v1/openOrders', venueOrderListSchema, {
      params: { symbol },
      signed: true,
    });
    return data.map((order) => this.mapOrder(order));
  }

  // -------------------------------------------------------------------------
  // Account
  // -------------------------------------------------------------------------

  async getBalance(asset: string): Promise<AssetBalance> {
    const wanted = asset.toUpperCase();
    const balances = await this.request('GET', '/fapi/v2/balance', venueBalanceListSchema, {
      signed: true,
    });
    const entry = balances.find((b) => b.asset === wanted);

    if (!entry) {
      this.#logger.warn({ asset: wanted }, 'Asset not found in futures account');
      return { asset: wanted, available: '0', total: '0' };
    }
    return { asset: entry.asset, available: entry.availableBalance, total: entry.balance };
  }

  // -------------------------------------------------------------------------
  // Private Helpers
  // -------------------------------------------------------------------------

  private async request<T>(
    method: HttpMethod,
    endpoint: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: RequestOptions = {}
  ): Promise<T> {
    const { params = {}, signed = false, retry = 'transient' } = options;

    for (let attempt = 0; ; attempt++) {
      try {
        return await this.attempt(method, endpoint, schema, params, signed);
      } catch (error) {
        if (!(error instanceof GatewayError) || !this.shouldRetry(error, retry, attempt)) {
          throw error;
        }
        const delay = this.backoff(error, attempt);
        this.#logger.warn(
          { method, endpoint, attempt: attempt + 1, delay, code: error.gatewayCode },
          'Retrying futures request'
        );
        await this.#sleep(delay);
      }
    }
  }

  private async attempt<T>(
    method: HttpMethod,
    endpoint: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    params: QueryParams,
    signed: boolean
  ): Promise<T> {
    const url = signed
      ? this.#signer.buildSignedUrl(this.#config.baseUrl, endpoint, params, this.#config.recvWindow, this.#now())
      : this.plainUrl(endpoint, params);

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.#config.timeoutMs);

    let response: Response;
    let text: string;
    try {
      response = await this.#fetch(url, {
        method,
        headers: signed ? this.#signer.getHeaders() : {},
        signal: controller.signal,
      });
      text = await response.text();
    } catch (error) {
      throw fromTransportFailure(error, endpoint);
    } finally {
      clearTimeout(timeout);
    }

    let body: unknown = null;
    let malformed = false;
    if (text) {
      try {
        body = JSON.parse(text);
      } catch {
        malformed = true;
      }
    }

    const venueError = venueErrorSchema.safeParse(body);
    if (!response.ok || (venueError.success && venueError.data.code < 0)) {
      throw fromVenueResponse(response.status, body, response.headers.get('retry-after'));
    }
    if (malformed) {
      throw new GatewayError(`Malformed JSON from ${endpoint}`, GatewayErrorCode.INVALID_RESPONSE, {
        httpStatus: response.status,
      });
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new GatewayError(
        `Unexpected response from ${endpoint}: ${parsed.error.issues[0]?.message ?? 'invalid body'}`,
        GatewayErrorCode.INVALID_RESPONSE,
        { httpStatus: response.status }
      );
    }

    this.#logger.debug({ method, endpoint, status: response.status }, 'Futures request completed');
    return parsed.data;
  }

  private plainUrl(endpoint: string, params: QueryParams): string {
    const query = this.#signer.buildQueryString(params);
    return query ? `${this.#config.baseUrl}${endpoint}?${query}` : `${this.#config.baseUrl}${endpoint}`;
  }

  private shouldRetry(error: GatewayError, policy: RetryPolicy, attempt: number): boolean {
    if (attempt >= this.#config.maxRetries) {
      return false;
    }
    return policy === 'rate-limit' ? error instanceof RateLimitError : error.retryable;
  }

  private backoff(error: GatewayError, attempt: number): number {
    if (error instanceof RateLimitError && error.retryAfter > 0) {
      return error.retryAfter;
    }
    return this.#config.retryBaseDelayMs * 2 ** attempt;
  }

  private mapOrder(order: VenueOrder): OrderAck {
    return {
      orderId: String(order.orderId),
      clientOrderId: order.clientOrderId,
      symbol: order.symbol,
      side: order.side,
      type: order.type,
      status: order.status,
      ...(isNonZero(order.price) ? { price: order.price } : {}),
      ...(isNonZero(order.stopPrice) ? { stopPrice: order.stopPrice } : {}),
      quantity: order.origQty,
      executedQty: order.executedQty,
      reduceOnly: order.reduceOnly,
      updatedAt: new Date(order.updateTime).toISOString(),
    };
  }
}
