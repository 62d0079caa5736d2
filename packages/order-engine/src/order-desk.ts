import { v4 as uuidv4 } from 'uuid';
import { OrderValidationError } from '@orderdesk/errors';
import { createServiceLogger, type Logger } from '@orderdesk/logger';
import type {
  ExchangeGateway,
  NormalizedOrder,
  OrderAck,
  OrderRejection,
  RawOrderArgs,
  SymbolFilters,
  ValidationResult,
} from '@orderdesk/types';
import { buildOrderIntent } from './builder.js';
import { SymbolFilterCache } from './filter-cache.js';
import { rejected } from './rejection.js';
import { validateOrder } from './validator.js';

export type SubmissionResult =
  | {
      outcome: 'SUBMITTED';
      order: NormalizedOrder;
      ack: OrderAck;
      warnings: readonly string[];
    }
  | { outcome: 'REJECTED'; rejection: OrderRejection };

export interface OrderDeskOptions {
  logger?: Logger;
  generateClientOrderId?: () => string;
}

export class OrderDesk {
  private readonly logger: Logger;
  private readonly generateClientOrderId: () => string;

  constructor(
    private readonly gateway: ExchangeGateway,
    private readonly cache: SymbolFilterCache,
    options: OrderDeskOptions = {}
  ) {
    this.logger = options.logger ?? createServiceLogger('order-desk');
    this.generateClientOrderId = options.generateClientOrderId ?? uuidv4;
  }

  /**
   * Builds and validates an order without sending it. Gateway failures while
   * fetching filters or the market price are thrown, not turned into
   * rejections.
   */
  async prepare(rawArgs: RawOrderArgs): Promise<ValidationResult> {
    const built = buildOrderIntent(rawArgs);
    if (!built.ok) {
      return this.rejectWith(built.rejection);
    }
    const intent = built.intent;

    let filters: SymbolFilters;
    try {
      filters = await this.cache.get(intent.symbol);
    } catch (error) {
      if (error instanceof OrderValidationError) {
        return this.rejectWith(error.rejection);
      }
      throw error;
    }

    const marketPrice = await this.gateway.fetchMarketPrice(intent.symbol);
    const result = validateOrder(intent, filters, marketPrice);

    if (result.outcome === 'REJECTED') {
      return this.rejectWith(result.rejection);
    }

    this.logger.debug(
      { symbol: intent.symbol, type: intent.type, marketPrice: marketPrice.toFixed() },
      'Order approved'
    );
    return result;
  }

  /**
   * Validates and, when approved, submits the order exactly once. Exchange
   * rejections propagate unchanged as gateway errors.
   */
  async submit(rawArgs: RawOrderArgs): Promise<SubmissionResult> {
    const result = await this.prepare(rawArgs);
    if (result.outcome === 'REJECTED') {
      return result;
    }

    const order: NormalizedOrder = {
      ...result.order,
      clientOrderId: result.order.clientOrderId ?? this.generateClientOrderId(),
    };

    const ack = await this.gateway.submitOrder(order);

    this.logger.info(
      {
        orderId: ack.orderId,
        clientOrderId: ack.clientOrderId,
        symbol: order.symbol,
        side: order.side,
        type: order.type,
        quantity: order.quantity.toFixed(),
        status: ack.status,
      },
      'Order submitted'
    );

    return { outcome: 'SUBMITTED', order, ack, warnings: result.warnings };
  }

  filters(symbol: string): Promise<SymbolFilters> {
    return this.cache.get(symbol);
  }

  refreshFilters(symbol: string): Promise<SymbolFilters> {
    return this.cache.refresh(symbol);
  }

  private rejectWith(rejection: OrderRejection): ValidationResult {
    this.logger.warn(
      { code: rejection.code, ...rejection.details },
      `Order rejected: ${rejection.message}`
    );
    return rejected(rejection);
  }
}
