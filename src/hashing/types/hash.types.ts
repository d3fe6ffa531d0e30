export const UDF_SLOT_COUNT = 10;

export type UdfValue = string | null | undefined;

/**
 * The ten user-defined field slots in wire order: index 0 is udf1, index 9 is udf10.
 * udf1 carries the merchant id and udf2 the order id; the rest pass through untouched.
 */
export type UdfTuple = [
  UdfValue,
  UdfValue,
  UdfValue,
  UdfValue,
  UdfValue,
  UdfValue,
  UdfValue,
  UdfValue,
  UdfValue,
  UdfValue,
];

export enum HashLayout {
  STANDARD = 'STANDARD', // udf1..udf10 all carried
  LEGACY = 'LEGACY', // udf1..udf5 carried, slots 6..10 always blank
}

export interface ForwardHashFields {
  key: string;
  txnid: string;
  amount: string | number;
  productInfo?: string | null;
  firstName?: string | null;
  email?: string | null;
  udfs?: ReadonlyArray<UdfValue>;
  salt: string;
}

export interface ReverseHashFields {
  salt: string;
  status?: string | null;
  udfs?: ReadonlyArray<UdfValue>;
  email?: string | null;
  firstName?: string | null;
  productInfo?: string | null;
  amount?: string | number | null;
  txnid?: string | null;
  key: string;
}

export interface HashVerification {
  verified: boolean;
  layout: HashLayout | null;
  expected: string;
}

export function emptyUdfs(): UdfTuple {
  return [undefined, undefined, undefined, undefined, undefined, undefined, undefined, undefined, undefined, undefined];
}

export function udfsFrom(source: Record<string, unknown>): UdfTuple {
  const udfs = emptyUdfs();
  for (let slot = 0; slot < UDF_SLOT_COUNT; slot++) {
    const value = source[`udf${slot + 1}`];
    udfs[slot] = typeof value === 'string' ? value : undefined;
  }
  return udfs;
}
