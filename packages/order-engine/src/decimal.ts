import { Decimal } from 'decimal.js';

export { Decimal };

/**
 * Snaps `value` to a multiple of `increment` using the given rounding mode.
 * A zero increment leaves the value untouched.
 */
export function snapToIncrement(
  value: Decimal,
  increment: Decimal,
  rounding: Decimal.Rounding
): Decimal {
  if (increment.isZero()) {
    return value;
  }
  return value.toNearest(increment, rounding);
}

export function floorToIncrement(value: Decimal, increment: Decimal): Decimal {
  return snapToIncrement(value, increment, Decimal.ROUND_DOWN);
}

export function roundHalfUpToIncrement(value: Decimal, increment: Decimal): Decimal {
  return snapToIncrement(value, increment, Decimal.ROUND_HALF_UP);
}

export function isMultipleOf(value: Decimal, increment: Decimal): boolean {
  if (increment.isZero()) {
    return true;
  }
  return value.mod(increment).isZero();
}
