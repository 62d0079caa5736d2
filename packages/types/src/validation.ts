import type { NormalizedOrder } from './order.js';

export enum OrderRejectionCode {
  UNKNOWN_SYMBOL = 'UnknownSymbol',
  MALFORMED_INPUT = 'MalformedInput',
  INVALID_SYMBOL_OR_SIDE = 'InvalidSymbolOrSide',
  BELOW_MINIMUM_QUANTITY = 'BelowMinimumQuantity',
  ABOVE_MAXIMUM_QUANTITY = 'AboveMaximumQuantity',
  PRICE_OUT_OF_RANGE = 'PriceOutOfRange',
  INVALID_STOP_PRICE_DIRECTION = 'InvalidStopPriceDirection',
  NOTIONAL_TOO_SMALL = 'NotionalTooSmall',
  PRICE_DEVIATION_EXCEEDED = 'PriceDeviationExceeded',
}

export interface RejectionDetails {
  symbol?: string;
  field?: string;
  value?: string;
  bound?: string;
}

export interface OrderRejection {
  readonly code: OrderRejectionCode;
  readonly message: string;
  readonly details: RejectionDetails;
}

export interface ApprovedOrder {
  readonly outcome: 'APPROVED';
  readonly order: NormalizedOrder;
  readonly warnings: readonly string[];
}

export interface RejectedOrder {
  readonly outcome: 'REJECTED';
  readonly rejection: OrderRejection;
}

export type ValidationResult = ApprovedOrder | RejectedOrder;
