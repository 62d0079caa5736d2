import type { Decimal } from 'decimal.js';
import { OrderRejectionCode, type OrderRejection, type SymbolFilters } from '@orderdesk/types';
import { floorToIncrement, roundHalfUpToIncrement } from './decimal.js';
import { reject } from './rejection.js';

export type Normalized =
  | { ok: true; value: Decimal }
  | { ok: false; rejection: OrderRejection };

export type PriceField = 'price' | 'stopPrice';

/**
 * Rounds a quantity down to the symbol's step size. Never rounds up: the
 * result must not exceed what the operator asked for.
 */
export function normalizeQuantity(raw: Decimal, filters: SymbolFilters): Normalized {
  const quantity = floorToIncrement(raw, filters.stepSize);
  const details = {
    symbol: filters.symbol,
    field: 'quantity',
    value: quantity.toFixed(),
  };

  if (quantity.lte(0) || quantity.lt(filters.minQty)) {
    return {
      ok: false,
      rejection: reject(
        OrderRejectionCode.BELOW_MINIMUM_QUANTITY,
        `Quantity ${raw.toFixed()} rounds down to ${quantity.toFixed()} with step size ` +
          `${filters.stepSize.toFixed()}, below the minimum ${filters.minQty.toFixed()} for ${filters.symbol}`,
        { ...details, bound: filters.minQty.toFixed() }
      ),
    };
  }

  if (!filters.maxQty.isZero() && quantity.gt(filters.maxQty)) {
    return {
      ok: false,
      rejection: reject(
        OrderRejectionCode.ABOVE_MAXIMUM_QUANTITY,
        `Quantity ${quantity.toFixed()} exceeds the maximum ${filters.maxQty.toFixed()} for ${filters.symbol}`,
        { ...details, bound: filters.maxQty.toFixed() }
      ),
    };
  }

  return { ok: true, value: quantity };
}

/**
 * Rounds a price to the nearest tick, ties going up, and checks it against
 * the symbol's price bounds.
 */
export function normalizePrice(
  raw: Decimal,
  filters: SymbolFilters,
  field: PriceField = 'price'
): Normalized {
  const price = roundHalfUpToIncrement(raw, filters.tickSize);
  const label = field === 'price' ? 'Price' : 'Stop price';
  const details = { symbol: filters.symbol, field, value: price.toFixed() };

  if (price.lte(0) || price.lt(filters.minPrice)) {
    return {
      ok: false,
      rejection: reject(
        OrderRejectionCode.PRICE_OUT_OF_RANGE,
        `${label} ${price.toFixed()} is below the minimum ${filters.minPrice.toFixed()} for ${filters.symbol}`,
        { ...details, bound: filters.minPrice.toFixed() }
      ),
    };
  }

  if (!filters.maxPrice.isZero() && price.gt(filters.maxPrice)) {
    return {
      ok: false,
      rejection: reject(
        OrderRejectionCode.PRICE_OUT_OF_RANGE,
        `${label} ${price.toFixed()} is above the maximum ${filters.maxPrice.toFixed()} for ${filters.symbol}`,
        { ...details, bound: filters.maxPrice.toFixed() }
      ),
    };
  }

  return { ok: true, value: price };
}
