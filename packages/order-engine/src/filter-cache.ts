import { OrderValidationError } from '@orderdesk/errors';
import { createServiceLogger, type Logger } from '@orderdesk/logger';
import {
  OrderRejectionCode,
  type SymbolFilterSource,
  type SymbolFilters,
} from '@orderdesk/types';
import { reject } from './rejection.js';

/**
 * Per-symbol trading rules, fetched once and replaced wholesale on refresh.
 * Entries never expire; concurrent loads of one symbol share a single fetch.
 */
export class SymbolFilterCache {
  private readonly entries = new Map<string, SymbolFilters>();
  private readonly inflight = new Map<string, Promise<SymbolFilters>>();

  constructor(
    private readonly source: SymbolFilterSource,
    private readonly logger: Logger = createServiceLogger('filter-cache')
  ) {}

  get size(): number {
    return this.entries.size;
  }

  peek(symbol: string): SymbolFilters | undefined {
    return this.entries.get(symbol.toUpperCase());
  }

  async get(symbol: string): Promise<SymbolFilters> {
    const key = symbol.toUpperCase();
    const cached = this.entries.get(key);
    if (cached) {
      return cached;
    }
    return this.load(key);
  }

  refresh(symbol: string): Promise<SymbolFilters> {
    return this.load(symbol.toUpperCase());
  }

  async preload(): Promise<number> {
    const all = await this.source.fetchAllSymbolFilters();
    for (const filters of all) {
      this.entries.set(filters.symbol.toUpperCase(), filters);
    }
    this.logger.info({ symbols: all.length }, 'Symbol filters preloaded');
    return all.length;
  }

  private load(key: string): Promise<SymbolFilters> {
    const pending = this.inflight.get(key);
    if (pending) {
      return pending;
    }

    const fetching = this.source
      .fetchSymbolFilters(key)
      .then((filters) => {
        if (!filters) {
          this.entries.delete(key);
          throw new OrderValidationError(
            reject(OrderRejectionCode.UNKNOWN_SYMBOL, `Symbol ${key} is not listed on the exchange`, {
              symbol: key,
              field: 'symbol',
              value: key,
            })
          );
        }
        this.entries.set(key, filters);
        this.logger.debug({ symbol: key }, 'Symbol filters cached');
        return filters;
      })
      .finally(() => {
        this.inflight.delete(key);
      });

    this.inflight.set(key, fetching);
    return fetching;
  }
}
