import type { GatewayError } from '@orderdesk/errors';
import type { OrderAck, OrderRejection } from '@orderdesk/types';

type FieldValue = string | number | boolean | undefined;

/** Aligned `label: value` lines; undefined values are skipped. */
export function formatFields(fields: Record<string, FieldValue>): string[] {
  const entries = Object.entries(fields).filter(
    (entry): entry is [string, string | number | boolean] => entry[1] !== undefined
  );
  const width = Math.max(0, ...entries.map(([label]) => label.length)) + 2;

  return entries.map(([label, value]) => {
    const shown = typeof value === 'boolean' ? (value ? 'yes' : 'no') : String(value);
    return `${`${label}:`.padEnd(width)}${shown}`;
  });
}

export function formatRejection(rejection: OrderRejection): string[] {
  const lines = [`Rejected [${rejection.code}]: ${rejection.message}`];
  const { field, value, bound } = rejection.details;
  if (field !== undefined) {
    lines.push(...formatFields({ field, value, bound }).map((line) => `  ${line}`));
  }
  return lines;
}

export function formatWarnings(warnings: readonly string[]): string[] {
  return warnings.map((warning) => `Warning: ${warning}`);
}

export function formatGatewayError(error: GatewayError): string {
  const code = error.venueCode !== undefined ? `${error.gatewayCode} ${error.venueCode}` : error.gatewayCode;
  return `Exchange error [${code}]: ${error.message}`;
}

export function formatAck(ack: OrderAck): string[] {
  return formatFields({
    orderId: ack.orderId,
    clientOrderId: ack.clientOrderId,
    symbol: ack.symbol,
    side: ack.side,
    type: ack.type,
    status: ack.status,
    price: ack.price,
    stopPrice: ack.stopPrice,
    quantity: ack.quantity,
    executedQty: ack.executedQty,
    reduceOnly: ack.reduceOnly,
    updatedAt: ack.updatedAt,
  });
}

/** One line per order for listings. */
export function formatAckLine(ack: OrderAck): string {
  const price = ack.price ?? 'MARKET';
  const stop = ack.stopPrice ? ` stop ${ack.stopPrice}` : '';
  return `${ack.orderId}  ${ack.symbol} ${ack.side} ${ack.type} ${ack.quantity} @ ${price}${stop}  ${ack.status}`;
}
