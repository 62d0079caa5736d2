export * from './order.js';
export * from './market.js';
export * from './validation.js';
export * from './gateway.js';
