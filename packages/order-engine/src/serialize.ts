import type {
  NormalizedOrder,
  OrderResponse,
  SymbolFilters,
  SymbolFiltersResponse,
} from '@orderdesk/types';

export function toOrderResponse(order: NormalizedOrder): OrderResponse {
  const base = {
    symbol: order.symbol,
    side: order.side,
    type: order.type,
    quantity: order.quantity.toFixed(),
    notional: order.notional.toFixed(),
    reduceOnly: order.reduceOnly,
    ...(order.clientOrderId ? { clientOrderId: order.clientOrderId } : {}),
  };

  switch (order.type) {
    case 'MARKET':
      return base;
    case 'LIMIT':
      return { ...base, price: order.price.toFixed(), timeInForce: order.timeInForce };
    case 'STOP_LIMIT':
      return {
        ...base,
        price: order.price.toFixed(),
        stopPrice: order.stopPrice.toFixed(),
        timeInForce: order.timeInForce,
      };
  }
}

export function toFiltersResponse(filters: SymbolFilters): SymbolFiltersResponse {
  return {
    symbol: filters.symbol,
    status: filters.status,
    tickSize: filters.tickSize.toFixed(),
    stepSize: filters.stepSize.toFixed(),
    minPrice: filters.minPrice.toFixed(),
    maxPrice: filters.maxPrice.toFixed(),
    minQty: filters.minQty.toFixed(),
    maxQty: filters.maxQty.toFixed(),
    minNotional: filters.minNotional.toFixed(),
    multiplierUp: filters.multiplierUp.toFixed(),
    multiplierDown: filters.multiplierDown.toFixed(),
  };
}
