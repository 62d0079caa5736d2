import { describe, expect, it } from 'vitest';
import { OrderRejectionCode } from '@orderdesk/types';
import { buildOrderIntent, type BuildResult } from './builder.js';

function rejectionOf(result: BuildResult) {
  if (result.ok) throw new Error('expected a rejection');
  return result.rejection;
}

describe('buildOrderIntent', () => {
  it('parses a limit order from strings', () => {
    const result = buildOrderIntent({
      symbol: ' btcusdt ',
      side: 'sell',
      type: 'limit',
      quantity: '0.002',
      price: '122000.03',
    });

    expect(result.ok).toBe(true);
    if (!result.ok || result.intent.type !== 'LIMIT') return;
    expect(result.intent.symbol).toBe('BTCUSDT');
    expect(result.intent.side).toBe('SELL');
    expect(result.intent.quantity.toFixed()).toBe('0.002');
    expect(result.intent.price.toFixed()).toBe('122000.03');
    expect(result.intent.timeInForce).toBe('GTC');
    expect(result.intent.reduceOnly).toBe(false);
  });

  it('accepts numbers and the dashed stop-limit spelling', () => {
    const result = buildOrderIntent({
      symbol: 'ETHUSDT',
      side: 'BUY',
      type: 'stop-limit',
      quantity: 0.5,
      price: 3210.5,
      stopPrice: 3200,
      timeInForce: 'ioc',
      reduceOnly: 'true',
    });

    expect(result.ok).toBe(true);
    if (!result.ok || result.intent.type !== 'STOP_LIMIT') return;
    expect(result.intent.quantity.toFixed()).toBe('0.5');
    expect(result.intent.price.toFixed()).toBe('3210.5');
    expect(result.intent.stopPrice.toFixed()).toBe('3200');
    expect(result.intent.timeInForce).toBe('IOC');
    expect(result.intent.reduceOnly).toBe(true);
  });

  it('builds a market order without price fields', () => {
    const result = buildOrderIntent({
      symbol: 'BTCUSDT',
      side: 'BUY',
      type: 'MARKET',
      quantity: '0.01',
      clientOrderId: 'desk-001',
    });

    expect(result).toMatchObject({
      ok: true,
      intent: { type: 'MARKET', symbol: 'BTCUSDT', clientOrderId: 'desk-001' },
    });
  });

  it('rejects an unknown side', () => {
    const rejection = rejectionOf(
      buildOrderIntent({ symbol: 'BTCUSDT', side: 'HOLD', type: 'MARKET', quantity: '1' })
    );
    expect(rejection.code).toBe(OrderRejectionCode.MALFORMED_INPUT);
    expect(rejection.details).toEqual({ field: 'side', value: 'HOLD' });
  });

  it('rejects a quantity that is not a number', () => {
    const rejection = rejectionOf(
      buildOrderIntent({ symbol: 'BTCUSDT', side: 'BUY', type: 'MARKET', quantity: 'abc' })
    );
    expect(rejection.message).toBe('Invalid quantity: "abc" is not a number');
    expect(rejection.details).toEqual({ field: 'quantity', value: 'abc' });
  });

  it.each(['0x10', '0b1', '0o7', '1e', ''])('rejects the quantity %j', (quantity) => {
    const rejection = rejectionOf(
      buildOrderIntent({ symbol: 'BTCUSDT', side: 'BUY', type: 'MARKET', quantity })
    );
    expect(rejection.code).toBe(OrderRejectionCode.MALFORMED_INPUT);
    expect(rejection.message).toBe(`Invalid quantity: "${quantity}" is not a number`);
  });

  it('reads plain and exponent decimals', () => {
    const result = buildOrderIntent({
      symbol: 'BTCUSDT',
      side: 'BUY',
      type: 'LIMIT',
      quantity: ' 1.5e-3 ',
      price: '.5',
    });
    expect(result.ok && result.intent.quantity.toFixed()).toBe('0.0015');
    expect(result.ok && result.intent.type === 'LIMIT' && result.intent.price.toFixed()).toBe('0.5');
  });

  it('rejects a quantity that is not positive', () => {
    const rejection = rejectionOf(
      buildOrderIntent({ symbol: 'BTCUSDT', side: 'BUY', type: 'MARKET', quantity: '-1' })
    );
    expect(rejection.message).toBe('Invalid quantity: must be a positive number');
  });

  it('rejects a missing quantity', () => {
    const rejection = rejectionOf(buildOrderIntent({ symbol: 'BTCUSDT', side: 'BUY', type: 'MARKET' }));
    expect(rejection.details).toEqual({ field: 'quantity', value: 'undefined' });
  });

  it('rejects a limit order without a price', () => {
    const rejection = rejectionOf(
      buildOrderIntent({ symbol: 'BTCUSDT', side: 'BUY', type: 'LIMIT', quantity: '1' })
    );
    expect(rejection).toEqual({
      code: OrderRejectionCode.MALFORMED_INPUT,
      message: 'LIMIT orders require a price',
      details: { symbol: 'BTCUSDT', field: 'price' },
    });
  });

  it('rejects a market order that carries a price', () => {
    const rejection = rejectionOf(
      buildOrderIntent({ symbol: 'BTCUSDT', side: 'BUY', type: 'MARKET', quantity: '1', price: '100' })
    );
    expect(rejection.message).toBe('MARKET orders take no price or stop price');
  });

  it('rejects a stop-limit order without a stop price', () => {
    const rejection = rejectionOf(
      buildOrderIntent({
        symbol: 'BTCUSDT',
        side: 'SELL',
        type: 'STOP_LIMIT',
        quantity: '1',
        price: '100',
      })
    );
    expect(rejection.details.field).toBe('stopPrice');
  });

  it('rejects an unsupported order type', () => {
    const rejection = rejectionOf(
      buildOrderIntent({ symbol: 'BTCUSDT', side: 'SELL', type: 'OCO', quantity: '1' })
    );
    expect(rejection.details).toEqual({ field: 'type', value: 'OCO' });
  });
});
