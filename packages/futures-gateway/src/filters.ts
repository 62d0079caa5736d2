import { Decimal } from 'decimal.js';
import { GatewayError, GatewayErrorCode } from '@orderdesk/errors';
import type { SymbolFilters } from '@orderdesk/types';
import type { VenueFilter, VenueSymbol } from './venue-types.js';

function invalid(symbol: string, message: string): GatewayError {
  return new GatewayError(`Invalid filters for ${symbol}: ${message}`, GatewayErrorCode.INVALID_RESPONSE);
}

function decimalField(symbol: string, filter: VenueFilter, field: keyof VenueFilter): Decimal {
  const raw = filter[field];
  if (raw === undefined) {
    throw invalid(symbol, `${filter.filterType}.${field} is missing`);
  }
  try {
    return new Decimal(raw);
  } catch {
    throw invalid(symbol, `${filter.filterType}.${field} is not a number: ${raw}`);
  }
}

function optionalDecimalField(
  symbol: string,
  filter: VenueFilter | undefined,
  fields: (keyof VenueFilter)[]
): Decimal {
  if (!filter) {
    return new Decimal(0);
  }
  const field = fields.find((name) => filter[name] !== undefined);
  return field ? decimalField(symbol, filter, field) : new Decimal(0);
}

/**
 * Converts one exchange-info symbol entry into `SymbolFilters`.
 *
 * PRICE_FILTER and LOT_SIZE are required. A missing MIN_NOTIONAL means no
 * minimum notional and a missing PERCENT_PRICE means no deviation band.
 */
export function parseSymbolFilters(info: VenueSymbol): SymbolFilters {
  const byType = new Map<string, VenueFilter>(info.filters.map((f) => [f.filterType, f]));

  const priceFilter = byType.get('PRICE_FILTER');
  const lotSize = byType.get('LOT_SIZE');
  if (!priceFilter) {
    throw invalid(info.symbol, 'PRICE_FILTER is missing');
  }
  if (!lotSize) {
    throw invalid(info.symbol, 'LOT_SIZE is missing');
  }

  const percentPrice = byType.get('PERCENT_PRICE');

  return {
    symbol: info.symbol,
    status: info.status,
    tickSize: decimalField(info.symbol, priceFilter, 'tickSize'),
    minPrice: decimalField(info.symbol, priceFilter, 'minPrice'),
    maxPrice: decimalField(info.symbol, priceFilter, 'maxPrice'),
    stepSize: decimalField(info.symbol, lotSize, 'stepSize'),
    minQty: decimalField(info.symbol, lotSize, 'minQty'),
    maxQty: decimalField(info.symbol, lotSize, 'maxQty'),
    minNotional: optionalDecimalField(info.symbol, byType.get('MIN_NOTIONAL'), [
      'notional',
      'minNotional',
    ]),
    multiplierUp: optionalDecimalField(info.symbol, percentPrice, ['multiplierUp']),
    multiplierDown: optionalDecimalField(info.symbol, percentPrice, ['multiplierDown']),
  };
}
