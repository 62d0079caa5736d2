import { gatewayConfig, logConfig, type Env } from '@orderdesk/config';
import { FuturesGateway, type FetchFn } from '@orderdesk/futures-gateway';
import { createLogger, type Logger } from '@orderdesk/logger';
import { OrderDesk, SymbolFilterCache } from '@orderdesk/order-engine';

export interface OrderServices {
  logger: Logger;
  gateway: FuturesGateway;
  cache: SymbolFilterCache;
  desk: OrderDesk;
}

/** Wires the gateway, filter cache and desk from validated settings. */
export function createServices(config: Env, options: { fetch?: FetchFn } = {}): OrderServices {
  const logger = createLogger({ ...logConfig(config), name: 'order-api' });
  const gateway = new FuturesGateway(gatewayConfig(config), {
    fetch: options.fetch,
    logger: logger.child({ service: 'futures-gateway' }),
  });
  const cache = new SymbolFilterCache(gateway, logger.child({ service: 'filter-cache' }));
  const desk = new OrderDesk(gateway, cache, { logger: logger.child({ service: 'order-desk' }) });

  return { logger, gateway, cache, desk };
}
