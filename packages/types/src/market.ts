import type { Decimal } from 'decimal.js';

export const SYMBOL_STATUSES = [
  'TRADING',
  'PENDING_TRADING',
  'PRE_DELIVERING',
  'DELIVERING',
  'DELIVERED',
  'PRE_SETTLE',
  'SETTLING',
  'CLOSE',
  'BREAK',
  'HALT',
] as const;

export type SymbolStatus = (typeof SYMBOL_STATUSES)[number];

/**
 * Trading rules for one futures contract. A zero `maxPrice` or `maxQty`
 * means the venue publishes no upper bound.
 */
export interface SymbolFilters {
  readonly symbol: string;
  readonly status: SymbolStatus;
  readonly tickSize: Decimal;
  readonly stepSize: Decimal;
  readonly minPrice: Decimal;
  readonly maxPrice: Decimal;
  readonly minQty: Decimal;
  readonly maxQty: Decimal;
  readonly minNotional: Decimal;
  readonly multiplierUp: Decimal;
  readonly multiplierDown: Decimal;
}

export interface SymbolFiltersResponse {
  symbol: string;
  status: SymbolStatus;
  tickSize: string;
  stepSize: string;
  minPrice: string;
  maxPrice: string;
  minQty: string;
  maxQty: string;
  minNotional: string;
  multiplierUp: string;
  multiplierDown: string;
}

export interface MarketPrice {
  symbol: string;
  price: string;
  timestamp: number;
}

export interface AssetBalance {
  asset: string;
  available: string;
  total: string;
}
