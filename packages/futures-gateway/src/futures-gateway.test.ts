import { beforeEach, describe, expect, it, vi } from 'vitest';
import { Decimal } from 'decimal.js';
import type { GatewayConfig } from '@orderdesk/config';
import { GatewayError, GatewayErrorCode } from '@orderdesk/errors';
import { createLogger } from '@orderdesk/logger';
import type { NormalizedOrder } from '@orderdesk/types';
import { FuturesGateway } from './futures-gateway.js';

const config: GatewayConfig = {
  baseUrl: 'https://futures.test',
  testnet: true,
  apiKey: 'test-key',
  apiSecret: 'test-secret',
  recvWindow: 5000,
  timeoutMs: 1000,
  maxRetries: 2,
  retryBaseDelayMs: 100,
};

const exchangeInfo = {
  timezone: 'UTC',
  symbols: [
    {
      symbol: 'BTCUSDT',
      status: 'TRADING',
      pricePrecision: 2,
      filters: [
        { filterType: 'PRICE_FILTER', minPrice: '261.10', maxPrice: '809484', tickSize: '0.10' },
        { filterType: 'LOT_SIZE', minQty: '0.001', maxQty: '1000', stepSize: '0.001' },
        { filterType: 'MIN_NOTIONAL', notional: '100' },
        { filterType: 'PERCENT_PRICE', multiplierUp: '1.1', multiplierDown: '0.9', multiplierDecimal: '4' },
      ],
    },
    {
      symbol: 'ETHUSDT',
      status: 'SETTLING',
      filters: [
        { filterType: 'PRICE_FILTER', minPrice: '39.86', maxPrice: '306177', tickSize: '0.01' },
        { filterType: 'LOT_SIZE', minQty: '0.001', maxQty: '10000', stepSize: '0.001' },
      ],
    },
  ],
};

const venueOrder = {
  orderId: 4001,
  clientOrderId: 'desk-1',
  symbol: 'BTCUSDT',
  side: 'SELL',
  type: 'STOP',
  status: 'NEW',
  price: '118900',
  stopPrice: '119000',
  origQty: '0.002',
  executedQty: '0',
  avgPrice: '0.00',
  reduceOnly: false,
  updateTime: 1767225600000,
};

function json(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
    ...init,
  });
}

const stopLimit: NormalizedOrder = {
  symbol: 'BTCUSDT',
  side: 'SELL',
  type: 'STOP_LIMIT',
  quantity: new Decimal('0.002'),
  price: new Decimal('118900'),
  stopPrice: new Decimal('119000'),
  timeInForce: 'GTC',
  reduceOnly: false,
  clientOrderId: 'desk-1',
  notional: new Decimal('237.8'),
};

describe('FuturesGateway', () => {
  const fetchMock = vi.fn<(url: string, init: RequestInit) => Promise<Response>>();
  const sleep = vi.fn(async (_ms: number) => {});
  let gateway: FuturesGateway;

  beforeEach(() => {
    fetchMock.mockReset();
    sleep.mockClear();
    gateway = new FuturesGateway(config, {
      fetch: fetchMock,
      sleep,
      now: () => 1700000000000,
      logger: createLogger({ level: 'silent' }),
    });
  });

  function requestedUrl(call = 0): URL {
    const url = fetchMock.mock.calls[call]?.[0];
    if (!url) throw new Error(`no request #${call}`);
    return new URL(url);
  }

  describe('symbol filters', () => {
    it('parses the filters of a listed symbol', async () => {
      fetchMock.mockImplementation(async () => json(exchangeInfo));

      const filters = await gateway.fetchSymbolFilters('BTCUSDT');

      expect(filters?.tickSize.toFixed()).toBe('0.1');
      expect(filters?.minNotional.toFixed()).toBe('100');
      expect(requestedUrl().pathname).toBe('/fapi/v1/exchangeInfo');
      expect(fetchMock.mock.calls[0]?.[1].method).toBe('GET');
    });

    it('returns null for a symbol the venue does not list', async () => {
      fetchMock.mockImplementation(async () => json(exchangeInfo));
      await expect(gateway.fetchSymbolFilters('DOGEUSDT')).resolves.toBeNull();
    });

    it('loads every symbol at once', async () => {
      fetchMock.mockImplementation(async () => json(exchangeInfo));

      const all = await gateway.fetchAllSymbolFilters();

      expect(all.map((f) => [f.symbol, f.status])).toEqual([
        ['BTCUSDT', 'TRADING'],
        ['ETHUSDT', 'SETTLING'],
      ]);
    });
  });

  describe('fetchMarketPrice', () => {
    it('returns the ticker price as a decimal', async () => {
      fetchMock.mockImplementation(async () => json({ symbol: 'BTCUSDT', price: '121000.50', time: 1 }));

      const price = await gateway.fetchMarketPrice('BTCUSDT');

      expect(price.toFixed()).toBe('121000.5');
      expect(requestedUrl().search).toBe('?symbol=BTCUSDT');
    });

    it('reports any failure as PRICE_UNAVAILABLE', async () => {
      fetchMock.mockImplementation(async () =>
        json({ code: -1121, msg: 'Invalid symbol.' }, { status: 400 })
      );

      await expect(gateway.fetchMarketPrice('NOPE')).rejects.toMatchObject({
        gatewayCode: GatewayErrorCode.PRICE_UNAVAILABLE,
        venueCode: -1121,
        message: 'Market price for NOPE is unavailable: Invalid symbol.',
      });
    });

    it('rejects a zero price', async () => {
      fetchMock.mockImplementation(async () => json({ symbol: 'BTCUSDT', price: '0' }));
      await expect(gateway.fetchMarketPrice('BTCUSDT')).rejects.toMatchObject({
        gatewayCode: GatewayErrorCode.PRICE_UNAVAILABLE,
      });
    });
  });

  describe('submitOrder', () => {
    it('sends a signed STOP order and maps the acknowledgement', async () => {
      fetchMock.mockImplementation(async () => json(venueOrder));

      const ack = await gateway.submitOrder(stopLimit);

      const url = requestedUrl();
      expect(url.pathname).toBe('/fapi/v1/order');
      expect(url.searchParams.get('type')).toBe('STOP');
      expect(url.searchParams.get('stopPrice')).toBe('119000');
      expect(url.searchParams.get('timestamp')).toBe('1700000000000');
      expect(url.searchParams.get('recvWindow')).toBe('5000');
      expect(url.searchParams.get('signature')).toMatch(/^[0-9a-f]{64}$/);
      expect(url.searchParams.has('reduceOnly')).toBe(false);

      const init = fetchMock.mock.calls[0]?.[1];
      expect(init?.method).toBe('POST');
      expect(init?.headers).toMatchObject({ 'X-MBX-APIKEY': 'test-key' });

      expect(ack).toEqual({
        orderId: '4001',
        clientOrderId: 'desk-1',
        symbol: 'BTCUSDT',
        side: 'SELL',
        type: 'STOP',
        status: 'NEW',
        price: '118900',
        stopPrice: '119000',
        quantity: '0.002',
        executedQty: '0',
        reduceOnly: false,
        updatedAt: '2026-01-01T00:00:00.000Z',
      });
    });

    it('surfaces a venue rejection without retrying', async () => {
      fetchMock.mockImplementation(async () =>
        json({ code: -2010, msg: 'Order would immediately trigger.' }, { status: 400 })
      );

      const error = await gateway.submitOrder(stopLimit).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(GatewayError);
      expect(error).toMatchObject({
        gatewayCode: GatewayErrorCode.EXCHANGE_REJECTED,
        venueCode: -2010,
      });
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('does not resend after a network failure', async () => {
      fetchMock.mockRejectedValue(new TypeError('fetch failed'));

      await expect(gateway.submitOrder(stopLimit)).rejects.toMatchObject({
        gatewayCode: GatewayErrorCode.NETWORK_ERROR,
      });
      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(sleep).not.toHaveBeenCalled();
    });

    it('retries a rate-limited submission after the advertised wait', async () => {
      fetchMock
        .mockResolvedValueOnce(
          json({ code: -1003, msg: 'Too many requests.' }, { status: 429, headers: { 'Retry-After': '2' } })
        )
        .mockResolvedValueOnce(json(venueOrder));

      const ack = await gateway.submitOrder(stopLimit);

      expect(ack.orderId).toBe('4001');
      expect(fetchMock).toHaveBeenCalledTimes(2);
      expect(sleep).toHaveBeenCalledWith(2000);
      expect(requestedUrl(1).searchParams.get('type')).toBe('STOP');
    });
  });

  describe('retries', () => {
    it('backs off exponentially on network errors and gives up after maxRetries', async () => {
      fetchMock.mockRejectedValue(new TypeError('fetch failed'));

      await expect(gateway.getOpenOrders()).rejects.toMatchObject({
        gatewayCode: GatewayErrorCode.NETWORK_ERROR,
      });
      expect(fetchMock).toHaveBeenCalledTimes(3);
      expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
    });

    it('recovers from a server error', async () => {
      fetchMock
        .mockResolvedValueOnce(new Response('Bad Gateway', { status: 502 }))
        .mockResolvedValueOnce(json([venueOrder]));

      const orders = await gateway.getOpenOrders('BTCUSDT');

      expect(orders).toHaveLength(1);
      expect(requestedUrl(1).searchParams.get('symbol')).toBe('BTCUSDT');
    });

    it('does not retry authentication failures', async () => {
      fetchMock.mockImplementation(async () =>
        json({ code: -2015, msg: 'Invalid API-key, IP, or permissions for action.' }, { status: 401 })
      );

      await expect(gateway.getOpenOrders()).rejects.toMatchObject({
        gatewayCode: GatewayErrorCode.AUTH_FAILED,
      });
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('reports a body that is not JSON', async () => {
      fetchMock.mockImplementation(async () => new Response('<html>', { status: 200 }));

      await expect(gateway.getOpenOrders()).rejects.toMatchObject({
        gatewayCode: GatewayErrorCode.INVALID_RESPONSE,
      });
    });
  });

  describe('order queries', () => {
    it('omits a zero price from market orders', async () => {
      fetchMock.mockImplementation(async () =>
        json({ ...venueOrder, type: 'MARKET', price: '0', stopPrice: '0', status: 'FILLED' })
      );

      const ack = await gateway.getOrder('BTCUSDT', '4001');

      expect(ack).not.toHaveProperty('price');
      expect(ack).not.toHaveProperty('stopPrice');
      expect(ack.status).toBe('FILLED');
      expect(requestedUrl().searchParams.get('orderId')).toBe('4001');
    });

    it('cancels by order id', async () => {
      fetchMock.mockImplementation(async () => json({ ...venueOrder, status: 'CANCELED' }));

      const ack = await gateway.cancelOrder('BTCUSDT', '4001');

      expect(ack.status).toBe('CANCELED');
      expect(fetchMock.mock.calls[0]?.[1].method).toBe('DELETE');
    });

    it('cancels every open order on a symbol', async () => {
      fetchMock.mockImplementation(async () =>
        json({ code: 200, msg: 'The operation of cancel all open order is done.' })
      );

      await expect(gateway.cancelAllOrders('BTCUSDT')).resolves.toEqual({
        symbol: 'BTCUSDT',
        message: 'The operation of cancel all open order is done.',
      });

      const url = requestedUrl();
      expect(url.pathname).toBe('/fapi/v1/allOpenOrders');
      expect(url.searchParams.get('symbol')).toBe('BTCUSDT');
      expect(url.searchParams.get('signature')).toMatch(/^[0-9a-f]{64}$/);
      expect(fetchMock.mock.calls[0]?.[1].method).toBe('DELETE');
    });

    it('maps newer and unlisted order statuses', async () => {
      fetchMock.mockImplementation(async () => json({ ...venueOrder, status: 'EXPIRED_IN_MATCH' }));
      await expect(gateway.getOrder('BTCUSDT', '4001')).resolves.toMatchObject({
        status: 'EXPIRED_IN_MATCH',
      });

      fetchMock.mockImplementation(async () => json({ ...venueOrder, status: 'PENDING_NEW_STATE' }));
      await expect(gateway.getOrder('BTCUSDT', '4001')).resolves.toMatchObject({ status: 'UNKNOWN' });
    });
  });

  describe('getBalance', () => {
    const balances = [
      { accountAlias: 'x', asset: 'USDT', balance: '1500.5', availableBalance: '1200.25' },
      { accountAlias: 'x', asset: 'BNB', balance: '0', availableBalance: '0' },
    ];

    it('returns the requested asset', async () => {
      fetchMock.mockImplementation(async () => json(balances));

      await expect(gateway.getBalance('usdt')).resolves.toEqual({
        asset: 'USDT',
        available: '1200.25',
        total: '1500.5',
      });
      expect(requestedUrl().pathname).toBe('/fapi/v2/balance');
    });

    it('reports zero for an asset the account does not hold', async () => {
      fetchMock.mockImplementation(async () => json(balances));

      await expect(gateway.getBalance('ETH')).resolves.toEqual({
        asset: 'ETH',
        available: '0',
        total: '0',
      });
    });
  });
});
