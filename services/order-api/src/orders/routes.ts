import { Router } from 'express';
import { z } from 'zod';
import { OrderValidationError } from '@orderdesk/errors';
import { toOrderResponse, type OrderDesk } from '@orderdesk/order-engine';
import type { ExchangeGateway } from '@orderdesk/types';
import { asyncHandler } from '../middleware/errorHandler.js';

// Field values stay unparsed here; the order builder owns their rules.
const orderBodySchema = z.object({
  symbol: z.unknown(),
  side: z.unknown(),
  type: z.unknown(),
  quantity: z.unknown(),
  price: z.unknown(),
  stopPrice: z.unknown(),
  reduceOnly: z.unknown(),
  timeInForce: z.unknown(),
  clientOrderId: z.unknown(),
});

const symbolQuerySchema = z.object({
  symbol: z.string().min(1).transform((s) => s.toUpperCase()),
});

const openOrdersQuerySchema = z.object({
  symbol: z
    .string()
    .min(1)
    .transform((s) => s.toUpperCase())
    .optional(),
});

export function createOrdersRouter(desk: OrderDesk, gateway: ExchangeGateway) {
  const router = Router();

  router.post(
    '/validate',
    asyncHandler(async (req, res) => {
      const result = await desk.prepare(orderBodySchema.parse(req.body));

      if (result.outcome === 'REJECTED') {
        throw new OrderValidationError(result.rejection);
      }

      res.json({
        outcome: result.outcome,
        order: toOrderResponse(result.order),
        warnings: result.warnings,
      });
    })
  );

  router.post(
    '/',
    asyncHandler(async (req, res) => {
      const result = await desk.submit(orderBodySchema.parse(req.body));

      if (result.outcome === 'REJECTED') {
        throw new OrderValidationError(result.rejection);
      }

      res.status(201).json({
        order: toOrderResponse(result.order),
        ack: result.ack,
        warnings: result.warnings,
      });
    })
  );

  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const { symbol } = openOrdersQuerySchema.parse(req.query);
      const orders = await gateway.getOpenOrders(symbol);
      res.json({ orders });
    })
  );

  router.delete(
    '/',
    asyncHandler(async (req, res) => {
      const { symbol } = symbolQuerySchema.parse(req.query);
      const result = await gateway.cancelAllOrders(symbol);
      res.json(result);
    })
  );

  router.get(
    '/:orderId',
    asyncHandler(async (req, res) => {
      const { symbol } = symbolQuerySchema.parse(req.query);
      const order = await gateway.getOrder(symbol, req.params['orderId'] ?? '');
      res.json(order);
    })
  );

  router.delete(
    '/:orderId',
    asyncHandler(async (req, res) => {
      const { symbol } = symbolQuerySchema.parse(req.query);
      const order = await gateway.cancelOrder(symbol, req.params['orderId'] ?? '');
      res.json(order);
    })
  );

  return router;
}
