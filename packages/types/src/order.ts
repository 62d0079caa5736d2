import type { Decimal } from 'decimal.js';

export const ORDER_SIDES = ['BUY', 'SELL'] as const;
export const ORDER_TYPES = ['MARKET', 'LIMIT', 'STOP_LIMIT'] as const;
export const TIME_IN_FORCE = ['GTC', 'IOC', 'FOK', 'GTX'] as const;

export type OrderSide = (typeof ORDER_SIDES)[number];
export type OrderType = (typeof ORDER_TYPES)[number];
export type TimeInForce = (typeof TIME_IN_FORCE)[number];

interface OrderIntentBase {
  symbol: string;
  side: OrderSide;
  quantity: Decimal;
  reduceOnly: boolean;
  clientOrderId?: string;
}

export interface MarketOrderIntent extends OrderIntentBase {
  type: 'MARKET';
}

export interface LimitOrderIntent extends OrderIntentBase {
  type: 'LIMIT';
  price: Decimal;
  timeInForce: TimeInForce;
}

export interface StopLimitOrderIntent extends OrderIntentBase {
  type: 'STOP_LIMIT';
  price: Decimal;
  stopPrice: Decimal;
  timeInForce: TimeInForce;
}

export type OrderIntent = MarketOrderIntent | LimitOrderIntent | StopLimitOrderIntent;

interface NormalizedOrderBase {
  readonly symbol: string;
  readonly side: OrderSide;
  readonly quantity: Decimal;
  readonly reduceOnly: boolean;
  readonly clientOrderId?: string;
  /** price × quantity, or market price × quantity for MARKET orders */
  readonly notional: Decimal;
}

export interface NormalizedMarketOrder extends NormalizedOrderBase {
  readonly type: 'MARKET';
}

export interface NormalizedLimitOrder extends NormalizedOrderBase {
  readonly type: 'LIMIT';
  readonly price: Decimal;
  readonly timeInForce: TimeInForce;
}

export interface NormalizedStopLimitOrder extends NormalizedOrderBase {
  readonly type: 'STOP_LIMIT';
  readonly price: Decimal;
  readonly stopPrice: Decimal;
  readonly timeInForce: TimeInForce;
}

export type NormalizedOrder =
  | NormalizedMarketOrder
  | NormalizedLimitOrder
  | NormalizedStopLimitOrder;

/**
 * Untyped order arguments as they arrive from a command line or a request body.
 */
export interface RawOrderArgs {
  symbol?: unknown;
  side?: unknown;
  type?: unknown;
  quantity?: unknown;
  price?: unknown;
  stopPrice?: unknown;
  reduceOnly?: unknown;
  timeInForce?: unknown;
  clientOrderId?: unknown;
}

export const EXCHANGE_ORDER_STATUSES = [
  'NEW',
  'PARTIALLY_FILLED',
  'FILLED',
  'CANCELED',
  'REJECTED',
  'EXPIRED',
  'EXPIRED_IN_MATCH',
  /** A status the venue reports that this client does not know yet. */
  'UNKNOWN',
] as const;

export type ExchangeOrderStatus = (typeof EXCHANGE_ORDER_STATUSES)[number];

export interface OrderAck {
  orderId: string;
  clientOrderId: string;
  symbol: string;
  side: OrderSide;
  /** Venue order type; a stop-limit order is reported as `STOP`. */
  type: string;
  status: ExchangeOrderStatus;
  price?: string;
  stopPrice?: string;
  quantity: string;
  executedQty: string;
  reduceOnly: boolean;
  updatedAt: string;
}

/** The venue's answer to cancelling every open order on a symbol. */
export interface CancelAllAck {
  symbol: string;
  message: string;
}

/** A normalized order with its decimals rendered as plain strings. */
export interface OrderResponse {
  clientOrderId?: string;
  symbol: string;
  side: OrderSide;
  type: OrderType;
  price?: string;
  stopPrice?: string;
  quantity: string;
  notional: string;
  reduceOnly: boolean;
  timeInForce?: TimeInForce;
}
