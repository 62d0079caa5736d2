import type { Decimal } from 'decimal.js';
import type { AssetBalance, SymbolFilters } from './market.js';
import type { CancelAllAck, NormalizedOrder, OrderAck } from './order.js';

/**
 * Source of per-symbol trading rules. `null` means the venue lists no such
 * contract.
 */
export interface SymbolFilterSource {
  fetchSymbolFilters(symbol: string): Promise<SymbolFilters | null>;
  fetchAllSymbolFilters(): Promise<SymbolFilters[]>;
}

export interface ExchangeGateway extends SymbolFilterSource {
  fetchMarketPrice(symbol: string): Promise<Decimal>;
  submitOrder(order: NormalizedOrder): Promise<OrderAck>;
  cancelOrder(symbol: string, orderId: string): Promise<OrderAck>;
  cancelAllOrders(symbol: string): Promise<CancelAllAck>;
  getOpenOrders(symbol?: string): Promise<OrderAck[]>;
  getOrder(symbol: string, orderId: string): Promise<OrderAck>;
  getBalance(asset: string): Promise<AssetBalance>;
}
