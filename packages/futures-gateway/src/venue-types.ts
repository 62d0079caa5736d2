import { z } from 'zod';
import { EXCHANGE_ORDER_STATUSES, ORDER_SIDES, SYMBOL_STATUSES } from '@orderdesk/types';

// Wire shapes of the futures REST API. Only the fields the desk reads are
// declared; zod strips the rest.

export const venueErrorSchema = z.object({
  code: z.number(),
  msg: z.string(),
});

export type VenueErrorBody = z.infer<typeof venueErrorSchema>;

export const venueFilterSchema = z.object({
  filterType: z.string(),
  minPrice: z.string().optional(),
  maxPrice: z.string().optional(),
  tickSize: z.string().optional(),
  minQty: z.string().optional(),
  maxQty: z.string().optional(),
  stepSize: z.string().optional(),
  notional: z.string().optional(),
  minNotional: z.string().optional(),
  multiplierUp: z.string().optional(),
  multiplierDown: z.string().optional(),
});

export type VenueFilter = z.infer<typeof venueFilterSchema>;

export const venueSymbolSchema = z.object({
  symbol: z.string(),
  // statuses added by the venue later are treated as not tradable
  status: z.enum(SYMBOL_STATUSES).catch('HALT'),
  filters: z.array(venueFilterSchema),
});

export type VenueSymbol = z.infer<typeof venueSymbolSchema>;

export const exchangeInfoSchema = z.object({
  symbols: z.array(venueSymbolSchema),
});

export const tickerPriceSchema = z.object({
  symbol: z.string(),
  price: z.string(),
});

export const venueOrderSchema = z.object({
  orderId: z.union([z.number(), z.string()]),
  clientOrderId: z.string(),
  symbol: z.string(),
  side: z.enum(ORDER_SIDES),
  type: z.string(),
  status: z.enum(EXCHANGE_ORDER_STATUSES).catch('UNKNOWN'),
  price: z.string().optional(),
  stopPrice: z.string().optional(),
  origQty: z.string(),
  executedQty: z.string(),
  reduceOnly: z.boolean().default(false),
  updateTime: z.number(),
});

export type VenueOrder = z.infer<typeof venueOrderSchema>;

export const venueOrderListSchema = z.array(venueOrderSchema);

export const cancelAllResponseSchema = z.object({
  code: z.number(),
  msg: z.string(),
});

export const venueBalanceListSchema = z.array(
  z.object({
    asset: z.string(),
    balance: z.string(),
    availableBalance: z.string(),
  })
);
