import { normalizeAmount } from '../hashing/amount';
import { UdfTuple, udfsFrom } from '../hashing/types/hash.types';

export type CallbackParams = Record<string, unknown>;

/**
 * The gateway's form fields, flattened to strings. Repeated keys keep their first value.
 */
export interface CallbackPayload {
  txnid: string | null;
  status: string | null;
  amount: string | null;
  hash: string | null;
  udfs: UdfTuple;
  email: string | null;
  firstName: string | null;
  phone: string | null;
  productInfo: string | null;
  gatewayTxnId: string | null;
  bankRefNum: string | null;
  bankCode: string | null;
  bankName: string | null;
  issuingBank: string | null;
  cardType: string | null;
  paymentMode: string | null;
  paymentSource: string | null;
  authCode: string | null;
  errorMessage: string | null;
}

function field(params: CallbackParams, ...names: string[]): string | null {
  for (const name of names) {
    const value = params[name];
    const first = Array.isArray(value) ? value[0] : value;
    if (typeof first === 'string' && first !== '') {
      return first;
    }
    if (typeof first === 'number') {
      return String(first);
    }
  }
  return null;
}

export function parseCallbackPayload(params: CallbackParams): CallbackPayload {
  const flattened: Record<string, unknown> = {};
  for (let slot = 1; slot <= 10; slot++) {
    flattened[`udf${slot}`] = field(params, `udf${slot}`) ?? undefined;
  }

  return {
    txnid: field(params, 'txnid')?.trim() || null,
    status: field(params, 'status'),
    amount: field(params, 'amount'),
    hash: field(params, 'hash'),
    udfs: udfsFrom(flattened),
    email: field(params, 'email'),
    firstName: field(params, 'firstname'),
    phone: field(params, 'phone'),
    productInfo: field(params, 'productinfo'),
    gatewayTxnId: field(params, 'easepayid'),
    bankRefNum: field(params, 'bank_ref_num'),
    bankCode: field(params, 'bankcode'),
    bankName: field(params, 'bank_name'),
    issuingBank: field(params, 'issuing_bank'),
    cardType: field(params, 'card_type'),
    paymentMode: field(params, 'mode'),
    paymentSource: field(params, 'payment_source'),
    authCode: field(params, 'auth_code'),
    errorMessage: field(params, 'error_Message', 'error'),
  };
}

export const storedAmountOf = (payload: CallbackPayload): string | null => normalizeAmount(payload.amount);

/** Verbatim audit copy; the hash is kept since it is what failed or passed verification. */
export const rawResponseOf = (params: CallbackParams): string => JSON.stringify(params);
