import { PaymentErrorKind, PaymentFailure } from '../common/payment-error';
import { GatewayReply } from './types/gateway.types';

const DUPLICATE_INDICATORS = ['duplicate', 'already processed', 'already exists', 'already initiated'];

const RETRYABLE_INDICATORS = ['retry', 'timeout', 'temporarily', 'service unavailable'];

const text = (value: unknown): string => {
  if (value === undefined || value === null) {
    return '';
  }
  return (typeof value === 'string' ? value : JSON.stringify(value)).trim();
};

/** error_desc, then error, then message. */
export function errorDescriptionOf(reply: GatewayReply): string {
  for (const field of [reply.error_desc, reply.error, reply.message]) {
    if (field !== undefined && field !== null) {
      return text(field);
    }
  }
  return '';
}

/**
 * Maps a refused initiation onto the error taxonomy. The duplicate check looks at both the
 * description and `data` and runs first; the retry check only reads the description.
 */
export function classifyGatewayError(reply: GatewayReply): PaymentFailure {
  const description = errorDescriptionOf(reply);
  const data = text(reply.data);
  const combined = `${description} ${data}`.toLowerCase();

  if (DUPLICATE_INDICATORS.some(indicator => combined.includes(indicator))) {
    return {
      kind: PaymentErrorKind.DUPLICATE_TRANSACTION,
      message: 'Transaction id was already used with the payment gateway',
      details: [description, data].filter(Boolean).join(' | '),
    };
  }

  const lowered = description.toLowerCase();
  if (RETRYABLE_INDICATORS.some(indicator => lowered.includes(indicator))) {
    return {
      kind: PaymentErrorKind.GATEWAY_RETRY,
      message: 'Payment gateway temporary error. Please retry your transaction.',
      details: description,
    };
  }

  return {
    kind: PaymentErrorKind.GATEWAY_ERROR,
    message: toUserMessage(description),
    details: data || undefined,
  };
}

export function toUserMessage(description: string): string {
  if (!description) {
    return 'Payment initiation failed. Please try again later.';
  }

  let message = description
    .replace(/^kindly /i, 'Please ')
    .replace(/^please /i, 'Please ')
    .replace(/your transaction/g, 'your payment');

  message = message.charAt(0).toUpperCase() + message.slice(1);
  return message.endsWith('.') ? message : `${message}.`;
}
