import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import type { OrderDesk } from '@orderdesk/order-engine';
import type { ExchangeGateway } from '@orderdesk/types';
import { errorHandler } from './middleware/errorHandler.js';
import { createAccountRouter } from './account/routes.js';
import { createOrdersRouter } from './orders/routes.js';
import { createMarketsRouter } from './markets/routes.js';

export interface AppDependencies {
  desk: OrderDesk;
  gateway: ExchangeGateway;
  /** Requests per minute per client on /api. */
  rateLimitPerMinute?: number;
}

export function createApp({ desk, gateway, rateLimitPerMinute = 100 }: AppDependencies): Express {
  const app = express();

  app.use(helmet());
  app.use(cors());
  app.use(express.json());

  const limiter = rateLimit({
    windowMs: 60 * 1000,
    max: rateLimitPerMinute,
    message: { error: { code: 'RATE_LIMIT', message: 'Too many requests' } },
  });
  app.use('/api', limiter);

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use('/api/v1/orders', createOrdersRouter(desk, gateway));
  app.use('/api/v1/markets', createMarketsRouter(desk));
  app.use('/api/v1/account', createAccountRouter(gateway));

  app.use(errorHandler);

  return app;
}
