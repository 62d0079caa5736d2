import { Decimal } from 'decimal.js';
import {
  ORDER_SIDES,
  OrderRejectionCode,
  type ApprovedOrder,
  type LimitOrderIntent,
  type MarketOrderIntent,
  type NormalizedOrder,
  type OrderIntent,
  type OrderRejection,
  type OrderSide,
  type StopLimitOrderIntent,
  type SymbolFilters,
  type ValidationResult,
} from '@orderdesk/types';
import { normalizePrice, normalizeQuantity } from './normalizer.js';
import { malformed, reject, rejected } from './rejection.js';

/** A stop closer to the market than this fraction triggers a warning. */
export const STOP_PROXIMITY_RATIO = new Decimal('0.001');

function isOrderSide(value: unknown): value is OrderSide {
  return ORDER_SIDES.some((side) => side === value);
}

function approved(order: NormalizedOrder, warnings: string[] = []): ApprovedOrder {
  return { outcome: 'APPROVED', order, warnings };
}

function assertNever(value: never): never {
  throw new Error(`Unhandled order type: ${JSON.stringify(value)}`);
}

function checkNotional(
  filters: SymbolFilters,
  notional: Decimal,
  reduceOnly: boolean
): OrderRejection | null {
  if (reduceOnly || notional.gte(filters.minNotional)) {
    return null;
  }
  return reject(
    OrderRejectionCode.NOTIONAL_TOO_SMALL,
    `Order notional ${notional.toFixed()} is below the minimum ${filters.minNotional.toFixed()} ` +
      `for ${filters.symbol}`,
    {
      symbol: filters.symbol,
      field: 'notional',
      value: notional.toFixed(),
      bound: filters.minNotional.toFixed(),
    }
  );
}

/**
 * Percent-price band around the market. Both multipliers zero means the
 * venue publishes no band.
 */
export function deviationBand(
  filters: SymbolFilters,
  marketPrice: Decimal
): { lower: Decimal; upper: Decimal } | null {
  if (filters.multiplierUp.isZero() && filters.multiplierDown.isZero()) {
    return null;
  }
  return {
    lower: marketPrice.mul(filters.multiplierDown),
    upper: marketPrice.mul(filters.multiplierUp),
  };
}

function validateMarket(
  intent: MarketOrderIntent,
  quantity: Decimal,
  filters: SymbolFilters,
  marketPrice: Decimal
): ValidationResult {
  const notional = marketPrice.mul(quantity);
  const tooSmall = checkNotional(filters, notional, intent.reduceOnly);
  if (tooSmall) return rejected(tooSmall);

  return approved({
    type: 'MARKET',
    symbol: intent.symbol,
    side: intent.side,
    quantity,
    reduceOnly: intent.reduceOnly,
    clientOrderId: intent.clientOrderId,
    notional,
  });
}

function validateLimit(
  intent: LimitOrderIntent,
  quantity: Decimal,
  filters: SymbolFilters,
  marketPrice: Decimal
): ValidationResult {
  const price = normalizePrice(intent.price, filters);
  if (!price.ok) return rejected(price.rejection);

  const notional = price.value.mul(quantity);
  const tooSmall = checkNotional(filters, notional, intent.reduceOnly);
  if (tooSmall) return rejected(tooSmall);

  const band = deviationBand(filters, marketPrice);
  if (band && (price.value.lt(band.lower) || price.value.gt(band.upper))) {
    const bound = price.value.lt(band.lower) ? band.lower : band.upper;
    return rejected(
      reject(
        OrderRejectionCode.PRICE_DEVIATION_EXCEEDED,
        `LIMIT price ${price.value.toFixed()} is outside the allowed band ` +
          `[${band.lower.toFixed()}, ${band.upper.toFixed()}] around market price ${marketPrice.toFixed()}`,
        {
          symbol: filters.symbol,
          field: 'price',
          value: price.value.toFixed(),
          bound: bound.toFixed(),
        }
      )
    );
  }

  return approved({
    type: 'LIMIT',
    symbol: intent.symbol,
    side: intent.side,
    quantity,
    price: price.value,
    timeInForce: intent.timeInForce,
    reduceOnly: intent.reduceOnly,
    clientOrderId: intent.clientOrderId,
    notional,
  });
}

function validateStopLimit(
  intent: StopLimitOrderIntent,
  quantity: Decimal,
  filters: SymbolFilters,
  marketPrice: Decimal
): ValidationResult {
  const price = normalizePrice(intent.price, filters);
  if (!price.ok) return rejected(price.rejection);

  const stop = normalizePrice(intent.stopPrice, filters, 'stopPrice');
  if (!stop.ok) return rejected(stop.rejection);

  const stopPrice = stop.value;
  const details = {
    symbol: filters.symbol,
    field: 'stopPrice',
    value: stopPrice.toFixed(),
    bound: marketPrice.toFixed(),
  };

  // A sell stop triggers on the way down, a buy stop on the way up.
  if (intent.side === 'SELL' && stopPrice.gte(marketPrice)) {
    return rejected(
      reject(
        OrderRejectionCode.INVALID_STOP_PRICE_DIRECTION,
        `SELL stop price ${stopPrice.toFixed()} must be below the current price ${marketPrice.toFixed()}`,
        details
      )
    );
  }
  if (intent.side === 'BUY' && stopPrice.lte(marketPrice)) {
    return rejected(
      reject(
        OrderRejectionCode.INVALID_STOP_PRICE_DIRECTION,
        `BUY stop price ${stopPrice.toFixed()} must be above the current price ${marketPrice.toFixed()}`,
        details
      )
    );
  }

  const limitBeyondStop =
    intent.side === 'BUY' ? price.value.lt(stopPrice) : price.value.gt(stopPrice);
  if (limitBeyondStop) {
    const relation = intent.side === 'BUY' ? 'at or above' : 'at or below';
    return rejected(
      reject(
        OrderRejectionCode.INVALID_STOP_PRICE_DIRECTION,
        `${intent.side} limit price ${price.value.toFixed()} must be ${relation} the stop price ${stopPrice.toFixed()}`,
        {
          symbol: filters.symbol,
          field: 'price',
          value: price.value.toFixed(),
          bound: stopPrice.toFixed(),
        }
      )
    );
  }

  const notional = price.value.mul(quantity);
  const tooSmall = checkNotional(filters, notional, intent.reduceOnly);
  if (tooSmall) return rejected(tooSmall);

  const warnings: string[] = [];
  const distance = stopPrice.minus(marketPrice).abs();
  if (distance.lt(marketPrice.mul(STOP_PROXIMITY_RATIO))) {
    warnings.push(
      `Stop price ${stopPrice.toFixed()} is within ${STOP_PROXIMITY_RATIO.mul(100).toFixed()}% ` +
        `of the current price ${marketPrice.toFixed()} and may trigger immediately`
    );
  }

  return approved(
    {
      type: 'STOP_LIMIT',
      symbol: intent.symbol,
      side: intent.side,
      quantity,
      price: price.value,
      stopPrice,
      timeInForce: intent.timeInForce,
      reduceOnly: intent.reduceOnly,
      clientOrderId: intent.clientOrderId,
      notional,
    },
    warnings
  );
}

/**
 * Checks an order intent against its symbol's filters and the live market
 * price. Pure: the same inputs always give the same result.
 */
export function validateOrder(
  intent: OrderIntent,
  filters: SymbolFilters,
  currentMarketPrice: Decimal
): ValidationResult {
  if (
    filters.symbol !== intent.symbol ||
    filters.status !== 'TRADING' ||
    !isOrderSide(intent.side)
  ) {
    const symbolProblem =
      filters.symbol !== intent.symbol
        ? `filters are for ${filters.symbol}`
        : filters.status !== 'TRADING'
          ? `symbol status is ${filters.status}`
          : null;
    const reason = symbolProblem ?? `side must be one of ${ORDER_SIDES.join(', ')}`;
    return rejected(
      reject(
        OrderRejectionCode.INVALID_SYMBOL_OR_SIDE,
        `Cannot trade ${String(intent.side)} ${intent.symbol}: ${reason}`,
        symbolProblem
          ? { symbol: intent.symbol, field: 'symbol', value: intent.symbol }
          : { symbol: intent.symbol, field: 'side', value: String(intent.side) }
      )
    );
  }

  if (!currentMarketPrice.isFinite() || currentMarketPrice.lte(0)) {
    return rejected(
      malformed(`Market price ${currentMarketPrice.toString()} is not a positive number`, {
        symbol: intent.symbol,
        field: 'marketPrice',
        value: currentMarketPrice.toString(),
      })
    );
  }

  const quantity = normalizeQuantity(intent.quantity, filters);
  if (!quantity.ok) return rejected(quantity.rejection);

  switch (intent.type) {
    case 'MARKET':
      return validateMarket(intent, quantity.value, filters, currentMarketPrice);
    case 'LIMIT':
      return validateLimit(intent, quantity.value, filters, currentMarketPrice);
    case 'STOP_LIMIT':
      return validateStopLimit(intent, quantity.value, filters, currentMarketPrice);
    default:
      return assertNever(intent);
  }
}
