import {
  BadRequestException,
  ConflictException,
  HttpException,
  HttpStatus,
  InternalServerErrorException,
  UnauthorizedException,
} from '@nestjs/common';

export enum PaymentErrorKind {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  HASH_MISMATCH = 'HASH_MISMATCH',
  DUPLICATE_TRANSACTION = 'DUPLICATE_TRANSACTION',
  GATEWAY_RETRY = 'GATEWAY_RETRY',
  GATEWAY_ERROR = 'GATEWAY_ERROR',
  UNAUTHORIZED = 'UNAUTHORIZED',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export interface PaymentFailure {
  kind: PaymentErrorKind;
  message: string;
  details?: string;
}

export type Outcome<T> = { ok: true; value: T } | { ok: false; failure: PaymentFailure };

export const succeed = <T>(value: T): Outcome<T> => ({ ok: true, value });

export const fail = <T = never>(
  kind: PaymentErrorKind,
  message: string,
  details?: string,
): Outcome<T> => ({ ok: false, failure: { kind, message, details } });

export const isRetryable = (kind: PaymentErrorKind): boolean =>
  kind === PaymentErrorKind.GATEWAY_RETRY;

/**
 * Translates a failure into the HTTP exception the REST surface answers with.
 * The switch is exhaustive over PaymentErrorKind.
 */
export function toHttpException(failure: PaymentFailure): HttpException {
  const body = {
    success: false,
    error_type: failure.kind,
    message: failure.message,
    details: failure.details,
    retryable: isRetryable(failure.kind),
  };

  switch (failure.kind) {
    case PaymentErrorKind.VALIDATION_ERROR:
      return new BadRequestException(body);
    case PaymentErrorKind.HASH_MISMATCH:
    case PaymentErrorKind.UNAUTHORIZED:
      return new UnauthorizedException(body);
    case PaymentErrorKind.DUPLICATE_TRANSACTION:
      return new ConflictException(body);
    case PaymentErrorKind.GATEWAY_RETRY:
      return new HttpException(body, HttpStatus.SERVICE_UNAVAILABLE);
    case PaymentErrorKind.GATEWAY_ERROR:
      return new HttpException(body, HttpStatus.BAD_GATEWAY);
    case PaymentErrorKind.INTERNAL_ERROR:
      return new InternalServerErrorException(body);
  }
}
