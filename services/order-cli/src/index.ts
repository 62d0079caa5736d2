#!/usr/bin/env -S npx tsx
import { gatewayConfig, loadConfig, logConfig } from '@orderdesk/config';
import { FuturesGateway } from '@orderdesk/futures-gateway';
import { createLogger } from '@orderdesk/logger';
import { OrderDesk, SymbolFilterCache } from '@orderdesk/order-engine';
import { EXIT_FAILURE, answerWithoutExchange, runCli, type CliOutput } from './cli.js';
import { runInteractive } from './interactive.js';

async function main(): Promise<number> {
  const argv = process.argv.slice(2);
  const output: CliOutput = {
    stdout: (line) => process.stdout.write(`${line}\n`),
    stderr: (line) => process.stderr.write(`${line}\n`),
  };

  const early = answerWithoutExchange(argv, output);
  if (early !== null) {
    return early;
  }

  const config = loadConfig();
  const logger = createLogger({ ...logConfig(config), name: 'order-cli', destination: 'stderr' });

  const venue = gatewayConfig(config);
  const gateway = new FuturesGateway(venue, {
    logger: logger.child({ service: 'futures-gateway' }),
  });
  logger.debug({ futures: venue.baseUrl, testnet: venue.testnet }, 'Exchange gateway ready');
  const cache = new SymbolFilterCache(gateway, logger.child({ service: 'filter-cache' }));
  const desk = new OrderDesk(gateway, cache, { logger: logger.child({ service: 'order-desk' }) });

  const deps = { desk, gateway, ...output };
  return argv[0] === 'interactive' ? runInteractive(process.stdin, deps) : runCli(argv, deps);
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    process.stderr.write(`Unexpected error: ${err instanceof Error ? err.stack ?? err.message : String(err)}\n`);
    process.exitCode = EXIT_FAILURE;
  });
