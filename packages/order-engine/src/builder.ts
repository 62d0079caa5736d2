import { z } from 'zod';
import { Decimal } from 'decimal.js';
import {
  ORDER_SIDES,
  ORDER_TYPES,
  TIME_IN_FORCE,
  type OrderIntent,
  type OrderRejection,
  type RawOrderArgs,
} from '@orderdesk/types';
import { malformed } from './rejection.js';

export type BuildResult =
  | { ok: true; intent: OrderIntent }
  | { ok: false; rejection: OrderRejection };

// decimal.js would also read 0x, 0b and 0o literals
const DECIMAL_PATTERN = /^-?(\d+(\.\d*)?|\.\d+)([eE][-+]?\d+)?$/;

const positiveDecimal = z.union([z.string(), z.number()]).transform((value, ctx) => {
  const text = typeof value === 'string' ? value.trim() : value;
  if (typeof text === 'string' && !DECIMAL_PATTERN.test(text)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${value}" is not a number` });
    return z.NEVER;
  }
  let parsed: Decimal;
  try {
    parsed = new Decimal(text);
  } catch {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${value}" is not a number` });
    return z.NEVER;
  }
  if (!parsed.isFinite() || !parsed.isPositive() || parsed.isZero()) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a positive number' });
    return z.NEVER;
  }
  return parsed;
});

const upper = (value: string) => value.trim().toUpperCase();

const rawOrderSchema = z.object({
  symbol: z
    .string()
    .transform(upper)
    .pipe(z.string().regex(/^[A-Z0-9]{2,32}$/, 'must be letters and digits only')),
  side: z.string().transform(upper).pipe(z.enum(ORDER_SIDES)),
  type: z
    .string()
    .transform((value) => upper(value).replace('-', '_'))
    .pipe(z.enum(ORDER_TYPES)),
  quantity: positiveDecimal,
  price: positiveDecimal.optional(),
  stopPrice: positiveDecimal.optional(),
  reduceOnly: z
    .union([z.boolean(), z.enum(['true', 'false'])])
    .transform((value) => value === true || value === 'true')
    .default(false),
  timeInForce: z.string().transform(upper).pipe(z.enum(TIME_IN_FORCE)).default('GTC'),
  clientOrderId: z
    .string()
    .regex(/^[.A-Z:/a-z0-9_-]{1,36}$/, 'must be 1-36 characters of [.A-Za-z0-9:/_-]')
    .optional(),
});

function display(value: unknown): string {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean'
    ? String(value)
    : JSON.stringify(value) ?? 'undefined';
}

/**
 * Parses raw order arguments into a typed intent. Structural only: filters,
 * market price and notional rules are the validator's concern.
 */
export function buildOrderIntent(rawArgs: RawOrderArgs): BuildResult {
  const parsed = rawOrderSchema.safeParse(rawArgs);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.') || 'order';
    const raw = Object.entries(rawArgs).find(([key]) => key === issue?.path[0])?.[1];
    return {
      ok: false,
      rejection: malformed(`Invalid ${field}: ${issue?.message ?? 'unparseable input'}`, {
        field,
        value: display(raw),
      }),
    };
  }

  const data = parsed.data;
  const base = {
    symbol: data.symbol,
    side: data.side,
    quantity: data.quantity,
    reduceOnly: data.reduceOnly,
    clientOrderId: data.clientOrderId,
  };

  switch (data.type) {
    case 'MARKET':
      if (data.price !== undefined || data.stopPrice !== undefined) {
        return {
          ok: false,
          rejection: malformed('MARKET orders take no price or stop price', {
            symbol: data.symbol,
            field: data.price !== undefined ? 'price' : 'stopPrice',
          }),
        };
      }
      return { ok: true, intent: { ...base, type: 'MARKET' } };

    case 'LIMIT':
      if (data.price === undefined) {
        return {
          ok: false,
          rejection: malformed('LIMIT orders require a price', { symbol: data.symbol, field: 'price' }),
        };
      }
      if (data.stopPrice !== undefined) {
        return {
          ok: false,
          rejection: malformed('LIMIT orders take no stop price; use STOP_LIMIT', {
            symbol: data.symbol,
            field: 'stopPrice',
          }),
        };
      }
      return {
        ok: true,
        intent: { ...base, type: 'LIMIT', price: data.price, timeInForce: data.timeInForce },
      };

    case 'STOP_LIMIT':
      if (data.price === undefined || data.stopPrice === undefined) {
        const field = data.price === undefined ? 'price' : 'stopPrice';
        return {
          ok: false,
          rejection: malformed('STOP_LIMIT orders require both a price and a stop price', {
            symbol: data.symbol,
            field,
          }),
        };
      }
      return {
        ok: true,
        intent: {
          ...base,
          type: 'STOP_LIMIT',
          price: data.price,
          stopPrice: data.stopPrice,
          timeInForce: data.timeInForce,
        },
      };
  }
}
