import { Router } from 'express';
import { NotFoundError, OrderValidationError } from '@orderdesk/errors';
import { toFiltersResponse, type OrderDesk } from '@orderdesk/order-engine';
import { OrderRejectionCode, type SymbolFilters } from '@orderdesk/types';
import { asyncHandler } from '../middleware/errorHandler.js';

async function lookup(symbol: string, load: () => Promise<SymbolFilters>): Promise<SymbolFilters> {
  try {
    return await load();
  } catch (error) {
    if (error instanceof OrderValidationError && error.rejection.code === OrderRejectionCode.UNKNOWN_SYMBOL) {
      throw new NotFoundError('Symbol', symbol);
    }
    throw error;
  }
}

export function createMarketsRouter(desk: OrderDesk) {
  const router = Router();

  router.get(
    '/:symbol/filters',
    asyncHandler(async (req, res) => {
      const symbol = (req.params['symbol'] ?? '').toUpperCase();
      const filters = await lookup(symbol, () => desk.filters(symbol));
      res.json(toFiltersResponse(filters));
    })
  );

  router.post(
    '/:symbol/refresh',
    asyncHandler(async (req, res) => {
      const symbol = (req.params['symbol'] ?? '').toUpperCase();
      const filters = await lookup(symbol, () => desk.refreshFilters(symbol));
      res.json(toFiltersResponse(filters));
    })
  );

  return router;
}
