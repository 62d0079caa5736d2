import { apiConfig, gatewayConfig, loadConfig } from '@orderdesk/config';
import { createServiceLogger } from '@orderdesk/logger';
import { createApp } from './app.js';
import { createServices } from './services.js';

async function main() {
  const config = loadConfig();
  const { logger, gateway, cache, desk } = createServices(config);
  logger.info('Starting Order API...');

  await cache.preload();

  const app = createApp({ desk, gateway });
  const { port, host } = apiConfig(config);
  const { testnet } = gatewayConfig(config);

  const server = app.listen(port, host, () => {
    logger.info({ port, host, futures: gateway.baseUrl, testnet }, 'Order API started');
  });

  const shutdown = () => {
    logger.info('Shutting down Order API...');
    server.close(() => process.exit(0));
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((err) => {
  createServiceLogger('order-api').error({ error: err }, 'Failed to start Order API');
  process.exit(1);
});
