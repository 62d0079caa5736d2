export { buildOrderIntent, type BuildResult } from './builder.js';
export {
  Decimal,
  floorToIncrement,
  isMultipleOf,
  roundHalfUpToIncrement,
} from './decimal.js';
export { SymbolFilterCache } from './filter-cache.js';
export { normalizePrice, normalizeQuantity, type Normalized, type PriceField } from './normalizer.js';
export { OrderDesk, type OrderDeskOptions, type SubmissionResult } from './order-desk.js';
export { reject, rejected } from './rejection.js';
export { toFiltersResponse, toOrderResponse } from './serialize.js';
export { deviationBand, STOP_PROXIMITY_RATIO, validateOrder } from './validator.js';
