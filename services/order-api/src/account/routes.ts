import { Router } from 'express';
import { z } from 'zod';
import type { ExchangeGateway } from '@orderdesk/types';
import { asyncHandler } from '../middleware/errorHandler.js';

const balanceQuerySchema = z.object({
  asset: z
    .string()
    .regex(/^[A-Za-z0-9]{2,12}$/)
    .transform((a) => a.toUpperCase())
    .default('USDT'),
});

export function createAccountRouter(gateway: ExchangeGateway) {
  const router = Router();

  router.get(
    '/balance',
    asyncHandler(async (req, res) => {
      const { asset } = balanceQuerySchema.parse(req.query);
      const balance = await gateway.getBalance(asset);
      res.json(balance);
    })
  );

  return router;
}
