import {
  OrderRejectionCode,
  type OrderRejection,
  type RejectedOrder,
  type RejectionDetails,
} from '@orderdesk/types';

export function reject(
  code: OrderRejectionCode,
  message: string,
  details: RejectionDetails = {}
): OrderRejection {
  return { code, message, details };
}

export function rejected(rejection: OrderRejection): RejectedOrder {
  return { outcome: 'REJECTED', rejection };
}

export function malformed(message: string, details: RejectionDetails = {}): OrderRejection {
  return reject(OrderRejectionCode.MALFORMED_INPUT, message, details);
}
