import type { NormalizedOrder } from '@orderdesk/types';
import type { QueryParams } from './signer.js';

/**
 * Request parameters for `POST /fapi/v1/order`. Stop-limit orders go out as
 * the venue's `STOP` type.
 */
export function toOrderParams(order: NormalizedOrder): QueryParams {
  const params: QueryParams = {
    symbol: order.symbol,
    side: order.side,
    quantity: order.quantity.toFixed(),
    newClientOrderId: order.clientOrderId,
  };

  if (order.reduceOnly) {
    params['reduceOnly'] = 'true';
  }

  switch (order.type) {
    case 'MARKET':
      return { ...params, type: 'MARKET' };
    case 'LIMIT':
      return {
        ...params,
        type: 'LIMIT',
        price: order.price.toFixed(),
        timeInForce: order.timeInForce,
      };
    case 'STOP_LIMIT':
      return {
        ...params,
        type: 'STOP',
        price: order.price.toFixed(),
        stopPrice: order.stopPrice.toFixed(),
        timeInForce: order.timeInForce,
      };
  }
}
