import { describe, expect, it } from 'vitest';
import { GatewayError, GatewayErrorCode } from '@orderdesk/errors';
import { parseSymbolFilters } from './filters.js';
import type { VenueFilter, VenueSymbol } from './venue-types.js';

const priceFilter: VenueFilter = {
  filterType: 'PRICE_FILTER',
  minPrice: '261.10',
  maxPrice: '809484',
  tickSize: '0.10',
};

const lotSize: VenueFilter = {
  filterType: 'LOT_SIZE',
  minQty: '0.001',
  maxQty: '1000',
  stepSize: '0.001',
};

function symbol(filters: VenueFilter[]): VenueSymbol {
  return { symbol: 'BTCUSDT', status: 'TRADING', filters };
}

describe('parseSymbolFilters', () => {
  it('reads every filter the desk needs', () => {
    const filters = parseSymbolFilters(
      symbol([
        priceFilter,
        lotSize,
        { filterType: 'MARKET_LOT_SIZE', minQty: '0.001', maxQty: '120', stepSize: '0.001' },
        { filterType: 'MIN_NOTIONAL', notional: '100' },
        { filterType: 'PERCENT_PRICE', multiplierUp: '1.0500', multiplierDown: '0.9500' },
      ])
    );

    expect(filters.symbol).toBe('BTCUSDT');
    expect(filters.status).toBe('TRADING');
    expect(filters.tickSize.toFixed()).toBe('0.1');
    expect(filters.minPrice.toFixed()).toBe('261.1');
    expect(filters.maxPrice.toFixed()).toBe('809484');
    expect(filters.stepSize.toFixed()).toBe('0.001');
    expect(filters.maxQty.toFixed()).toBe('1000');
    expect(filters.minNotional.toFixed()).toBe('100');
    expect(filters.multiplierUp.toFixed()).toBe('1.05');
    expect(filters.multiplierDown.toFixed()).toBe('0.95');
  });

  it('accepts the older minNotional field name', () => {
    const filters = parseSymbolFilters(
      symbol([priceFilter, lotSize, { filterType: 'MIN_NOTIONAL', minNotional: '5' }])
    );
    expect(filters.minNotional.toFixed()).toBe('5');
  });

  it('defaults the optional filters to zero', () => {
    const filters = parseSymbolFilters(symbol([priceFilter, lotSize]));
    expect(filters.minNotional.isZero()).toBe(true);
    expect(filters.multiplierUp.isZero()).toBe(true);
    expect(filters.multiplierDown.isZero()).toBe(true);
  });

  it('fails when the lot size filter is missing', () => {
    expect(() => parseSymbolFilters(symbol([priceFilter]))).toThrow(
      'Invalid filters for BTCUSDT: LOT_SIZE is missing'
    );
  });

  it('fails on a value that is not a number', () => {
    let caught: unknown;
    try {
      parseSymbolFilters(symbol([{ ...priceFilter, tickSize: 'n/a' }, lotSize]));
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(GatewayError);
    expect(caught).toMatchObject({
      gatewayCode: GatewayErrorCode.INVALID_RESPONSE,
      message: 'Invalid filters for BTCUSDT: PRICE_FILTER.tickSize is not a number: n/a',
    });
  });
});
