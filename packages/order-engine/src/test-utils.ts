import { vi } from 'vitest';
import { Decimal } from 'decimal.js';
import type {
  ExchangeGateway,
  LimitOrderIntent,
  MarketOrderIntent,
  NormalizedOrder,
  OrderAck,
  StopLimitOrderIntent,
  SymbolFilters,
} from '@orderdesk/types';

export interface FilterOverrides {
  symbol?: string;
  status?: SymbolFilters['status'];
  tickSize?: string;
  stepSize?: string;
  minPrice?: string;
  maxPrice?: string;
  minQty?: string;
  maxQty?: string;
  minNotional?: string;
  multiplierUp?: string;
  multiplierDown?: string;
}

export function makeFilters(overrides: FilterOverrides = {}): SymbolFilters {
  return {
    symbol: overrides.symbol ?? 'BTCUSDT',
    status: overrides.status ?? 'TRADING',
    tickSize: new Decimal(overrides.tickSize ?? '0.1'),
    stepSize: new Decimal(overrides.stepSize ?? '0.001'),
    minPrice: new Decimal(overrides.minPrice ?? '261.10'),
    maxPrice: new Decimal(overrides.maxPrice ?? '809484'),
    minQty: new Decimal(overrides.minQty ?? '0.001'),
    maxQty: new Decimal(overrides.maxQty ?? '1000'),
    minNotional: new Decimal(overrides.minNotional ?? '100'),
    multiplierUp: new Decimal(overrides.multiplierUp ?? '1.1'),
    multiplierDown: new Decimal(overrides.multiplierDown ?? '0.9'),
  };
}

interface IntentFields {
  symbol?: string;
  side?: 'BUY' | 'SELL';
  quantity: string;
  reduceOnly?: boolean;
}

export function marketIntent(fields: IntentFields): MarketOrderIntent {
  return {
    type: 'MARKET',
    symbol: fields.symbol ?? 'BTCUSDT',
    side: fields.side ?? 'BUY',
    quantity: new Decimal(fields.quantity),
    reduceOnly: fields.reduceOnly ?? false,
  };
}

export function limitIntent(fields: IntentFields & { price: string }): LimitOrderIntent {
  return {
    ...marketIntent(fields),
    type: 'LIMIT',
    price: new Decimal(fields.price),
    timeInForce: 'GTC',
  };
}

export function stopLimitIntent(
  fields: IntentFields & { price: string; stopPrice: string }
): StopLimitOrderIntent {
  return {
    ...marketIntent(fields),
    type: 'STOP_LIMIT',
    price: new Decimal(fields.price),
    stopPrice: new Decimal(fields.stopPrice),
    timeInForce: 'GTC',
  };
}

export function makeAck(overrides: Partial<OrderAck> = {}): OrderAck {
  return {
    orderId: '4001',
    clientOrderId: 'test-client-id',
    symbol: 'BTCUSDT',
    side: 'SELL',
    type: 'LIMIT',
    status: 'NEW',
    price: '122000',
    quantity: '0.002',
    executedQty: '0',
    reduceOnly: false,
    updatedAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

/**
 * In-process stand-in for the exchange gateway. Every method is a `vi.fn`
 * so tests can script responses and assert calls.
 */
export function createFakeGateway(
  filters: SymbolFilters[] = [makeFilters()],
  marketPrice = '121000'
) {
  const bySymbol = new Map<string, SymbolFilters>(filters.map((f) => [f.symbol, f]));
  const gateway = {
    fetchSymbolFilters: vi.fn(async (symbol: string) => bySymbol.get(symbol) ?? null),
    fetchAllSymbolFilters: vi.fn(async () => [...bySymbol.values()]),
    fetchMarketPrice: vi.fn(async (_symbol: string) => new Decimal(marketPrice)),
    submitOrder: vi.fn(async (_order: NormalizedOrder) => makeAck()),
    cancelOrder: vi.fn(async (_symbol: string, orderId: string) =>
      makeAck({ orderId, status: 'CANCELED' })
    ),
    cancelAllOrders: vi.fn(async (symbol: string) => ({
      symbol,
      message: 'The operation of cancel all open order is done.',
    })),
    getOpenOrders: vi.fn(async (_symbol?: string) => [makeAck()]),
    getOrder: vi.fn(async (_symbol: string, orderId: string) => makeAck({ orderId })),
    getBalance: vi.fn(async (asset: string) => ({ asset, available: '1000', total: '1500' })),
  } satisfies ExchangeGateway;
  return gateway;
}
