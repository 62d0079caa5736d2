export { parseSymbolFilters } from './filters.js';
export { FuturesGateway, type FetchFn, type FuturesGatewayOptions } from './futures-gateway.js';
export { toOrderParams } from './order-params.js';
export { RequestSigner, type QueryParams, type QueryValue } from './signer.js';
export { fromTransportFailure, fromVenueResponse } from './venue-errors.js';
