/**
 * Body of the gateway's initiateLink reply. `status` is 1 on success with the access key in
 * `data`; on failure `data` often carries the detailed reason.
 */
export interface GatewayReply {
  status?: unknown;
  data?: unknown;
  error_desc?: unknown;
  error?: unknown;
  message?: unknown;
}

export type GatewayCallResult =
  | { kind: 'reply'; httpStatus: number; body: GatewayReply }
  | { kind: 'timeout'; timeoutMs: number }
  | { kind: 'unreachable'; reason: string };

export type InitiationForm = {
  key: string;
  txnid: string;
  amount: string;
  productinfo: string;
  firstname: string;
  phone: string;
  email: string;
  surl: string;
  furl: string;
  hash: string;
  udf1: string;
  udf2: string;
  udf3: string;
  udf4: string;
  udf5: string;
  udf6: string;
  udf7: string;
  udf8: string;
  udf9: string;
  udf10: string;
};

export interface InitiatedPayment {
  txnid: string;
  accessKey: string;
  paymentUrl: string;
}
