import { parseArgs } from 'node:util';
import { isGatewayError, OrderValidationError } from '@orderdesk/errors';
import { toFiltersResponse, toOrderResponse, type OrderDesk } from '@orderdesk/order-engine';
import type { ExchangeGateway, RawOrderArgs } from '@orderdesk/types';
import {
  formatAck,
  formatAckLine,
  formatFields,
  formatGatewayError,
  formatRejection,
  formatWarnings,
} from './format.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_REJECTED = 2;

export interface CliOutput {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

export interface CliDependencies extends CliOutput {
  desk: OrderDesk;
  gateway: ExchangeGateway;
}

export const USAGE = `Usage: order-desk <command> [options]

Commands:
  market      --symbol S --side BUY|SELL --quantity Q [--reduce-only]
  limit       --symbol S --side BUY|SELL --quantity Q --price P [--tif GTC|IOC|FOK|GTX] [--reduce-only]
  stop-limit  --symbol S --side BUY|SELL --quantity Q --price P --stop-price SP [--tif ...] [--reduce-only]
  validate    --type MARKET|LIMIT|STOP_LIMIT ...   Validate and normalize without placing the order
  cancel      --symbol S --order-id ID
  cancel-all  --symbol S                           Cancel every open order on the symbol
  orders      [--symbol S]
  status      --symbol S --order-id ID
  filters     --symbol S [--refresh]
  account     [--asset USDT]
  interactive                                      Read commands line by line until quit

Options:
  --client-order-id ID   Client order id (generated when omitted)
  -h, --help             Show this help`;

const options = {
  symbol: { type: 'string' },
  side: { type: 'string' },
  type: { type: 'string' },
  quantity: { type: 'string' },
  price: { type: 'string' },
  'stop-price': { type: 'string' },
  tif: { type: 'string' },
  'reduce-only': { type: 'boolean' },
  'client-order-id': { type: 'string' },
  'order-id': { type: 'string' },
  refresh: { type: 'boolean' },
  asset: { type: 'string' },
  help: { type: 'boolean', short: 'h' },
} as const;

const parse = (argv: string[]) => parseArgs({ args: argv, options, allowPositionals: true });

type Values = ReturnType<typeof parse>['values'];

const ORDER_COMMANDS: Record<string, string> = {
  market: 'MARKET',
  limit: 'LIMIT',
  'stop-limit': 'STOP_LIMIT',
};

function orderArgs(values: Values, type: unknown): RawOrderArgs {
  return {
    symbol: values.symbol,
    side: values.side,
    type,
    quantity: values.quantity,
    price: values.price,
    stopPrice: values['stop-price'],
    timeInForce: values.tif,
    reduceOnly: values['reduce-only'] ?? false,
    clientOrderId: values['client-order-id'],
  };
}

class UsageError extends Error {}

function required(value: string | undefined, flag: string): string {
  if (!value) {
    throw new UsageError(`Missing required option --${flag}`);
  }
  return value;
}

type ParsedArgs =
  | { done: true; code: number }
  | { done: false; command: string; values: Values };

function parseCommand(argv: string[], io: CliOutput): ParsedArgs {
  let command: string | undefined;
  let values: Values;
  try {
    const parsed = parse(argv);
    command = parsed.positionals[0];
    values = parsed.values;
  } catch (error) {
    io.stderr(error instanceof Error ? error.message : String(error));
    io.stderr(USAGE);
    return { done: true, code: EXIT_REJECTED };
  }

  if (values.help) {
    io.stdout(USAGE);
    return { done: true, code: EXIT_OK };
  }
  if (!command) {
    io.stderr(USAGE);
    return { done: true, code: EXIT_REJECTED };
  }
  return { done: false, command, values };
}

/**
 * Answers help requests and argument errors without touching the exchange.
 * Resolves to an exit code, or null when the command needs the desk.
 */
export function answerWithoutExchange(
  argv: string[],
  io: CliOutput
): number | null {
  const parsed = parseCommand(argv, io);
  return parsed.done ? parsed.code : null;
}

/**
 * Runs one command and resolves to the process exit code: 0 on success,
 * 2 for a rejected order or bad arguments, 1 when the exchange fails.
 */
export async function runCli(argv: string[], deps: CliDependencies): Promise<number> {
  const { stderr } = deps;

  const parsed = parseCommand(argv, deps);
  if (parsed.done) {
    return parsed.code;
  }
  const { command, values } = parsed;

  try {
    return await dispatch(command, values, deps);
  } catch (error) {
    if (error instanceof UsageError) {
      stderr(error.message);
      return EXIT_REJECTED;
    }
    if (error instanceof OrderValidationError) {
      formatRejection(error.rejection).forEach((line) => stderr(line));
      return EXIT_REJECTED;
    }
    if (isGatewayError(error)) {
      stderr(formatGatewayError(error));
      return EXIT_FAILURE;
    }
    throw error;
  }
}

async function dispatch(command: string, values: Values, deps: CliDependencies): Promise<number> {
  const { desk, gateway, stdout, stderr } = deps;

  const orderType = ORDER_COMMANDS[command];
  if (orderType) {
    const result = await desk.submit(orderArgs(values, orderType));
    if (result.outcome === 'REJECTED') {
      formatRejection(result.rejection).forEach((line) => stderr(line));
      return EXIT_REJECTED;
    }
    stdout('Order submitted');
    formatAck(result.ack).forEach((line) => stdout(line));
    formatWarnings(result.warnings).forEach((line) => stdout(line));
    return EXIT_OK;
  }

  switch (command) {
    case 'validate': {
      const result = await desk.prepare(orderArgs(values, required(values.type, 'type')));
      if (result.outcome === 'REJECTED') {
        formatRejection(result.rejection).forEach((line) => stderr(line));
        return EXIT_REJECTED;
      }
      stdout('Order approved (not submitted)');
      formatFields({ ...toOrderResponse(result.order) }).forEach((line) => stdout(line));
      formatWarnings(result.warnings).forEach((line) => stdout(line));
      return EXIT_OK;
    }

    case 'cancel': {
      const symbol = required(values.symbol, 'symbol').toUpperCase();
      const ack = await gateway.cancelOrder(symbol, required(values['order-id'], 'order-id'));
      stdout('Order canceled');
      formatAck(ack).forEach((line) => stdout(line));
      return EXIT_OK;
    }

    case 'cancel-all': {
      const symbol = required(values.symbol, 'symbol').toUpperCase();
      const result = await gateway.cancelAllOrders(symbol);
      stdout(`All open orders on ${result.symbol} canceled`);
      stdout(result.message);
      return EXIT_OK;
    }

    case 'status': {
      const symbol = required(values.symbol, 'symbol').toUpperCase();
      const ack = await gateway.getOrder(symbol, required(values['order-id'], 'order-id'));
      formatAck(ack).forEach((line) => stdout(line));
      return EXIT_OK;
    }

    case 'orders': {
      const orders = await gateway.getOpenOrders(values.symbol?.toUpperCase());
      if (orders.length === 0) {
        stdout('No open orders');
      }
      orders.forEach((ack) => stdout(formatAckLine(ack)));
      return EXIT_OK;
    }

    case 'filters': {
      const symbol = required(values.symbol, 'symbol');
      const filters = values.refresh ? await desk.refreshFilters(symbol) : await desk.filters(symbol);
      formatFields({ ...toFiltersResponse(filters) }).forEach((line) => stdout(line));
      return EXIT_OK;
    }

    case 'account': {
      const balance = await gateway.getBalance((values.asset ?? 'USDT').toUpperCase());
      formatFields({ ...balance }).forEach((line) => stdout(line));
      return EXIT_OK;
    }

    default:
      throw new UsageError(`Unknown command: ${command}\n\n${USAGE}`);
  }
}
