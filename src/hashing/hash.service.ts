import { Inject, Injectable } from '@nestjs/common';
import { createHash, timingSafeEqual } from 'crypto';
import { gatewayConfig, GatewayConfig } from '../config/configuration';
import { normalizeAmount } from './amount';
import {
  ForwardHashFields,
  HashLayout,
  HashVerification,
  ReverseHashFields,
  UDF_SLOT_COUNT,
  UdfValue,
} from './types/hash.types';

const SEPARATOR = '|';
const LEGACY_SLOT_COUNT = 5;

export class MissingGatewayCredentialsError extends Error {
  constructor(missing: string[]) {
    super(`Gateway credentials not configured: ${missing.join(', ')}`);
    this.name = 'MissingGatewayCredentialsError';
  }
}

type GatewayForwardFields = Omit<ForwardHashFields, 'key' | 'salt'>;
type GatewayReverseFields = Omit<ReverseHashFields, 'key' | 'salt'>;

@Injectable()
export class HashService {
  constructor(
    @Inject(gatewayConfig.KEY)
    private readonly gateway: GatewayConfig,
  ) {}

  /**
   * key|txnid|amount|productinfo|firstname|email|udf1|...|udf10|salt
   */
  buildForwardDigest(fields: ForwardHashFields, layout: HashLayout = HashLayout.STANDARD): string {
    const sequence = [
      fields.key,
      fields.txnid,
      this.renderAmount(fields.amount),
      fields.productInfo,
      fields.firstName,
      fields.email,
      ...this.renderUdfs(fields.udfs, layout),
      fields.salt,
    ];

    return this.sha512(this.join(sequence));
  }

  /**
   * salt|status|udf10|...|udf1|email|firstname|productinfo|amount|txnid|key
   *
   * This is the layout the gateway signs its replies with, so it has to match byte for byte.
   */
  buildReverseDigest(fields: ReverseHashFields, layout: HashLayout = HashLayout.STANDARD): string {
    const sequence = [
      fields.salt,
      fields.status,
      ...this.renderUdfs(fields.udfs, layout).reverse(),
      fields.email,
      fields.firstName,
      fields.productInfo,
      this.renderAmount(fields.amount),
      fields.txnid,
      fields.key,
    ];

    return this.sha512(this.join(sequence));
  }

  verify(candidate: string | null | undefined, expected: string): boolean {
    if (!candidate) {
      return false;
    }

    const left = Buffer.from(candidate.trim().toLowerCase(), 'utf8');
    const right = Buffer.from(expected.toLowerCase(), 'utf8');

    return left.length === right.length && timingSafeEqual(left, right);
  }

  /**
   * Merchant request signature: SHA-256 over merchantId, orderId, amount and salt concatenated
   * with no separator. The amount is rendered with two fraction digits.
   */
  buildRequestSignature(
    merchantId: string,
    orderId: string,
    amount: string | number,
    merchantSalt: string,
  ): string {
    const input = [merchantId, orderId, this.renderAmount(amount), merchantSalt].join('');
    return createHash('sha256').update(input, 'utf8').digest('hex');
  }

  signInitiation(fields: GatewayForwardFields): string {
    const { key, salt } = this.credentials();
    return this.buildForwardDigest({ ...fields, key, salt });
  }

  /**
   * Re-derives the reverse digest with the configured credentials and compares it with the
   * digest the gateway sent. The legacy five-slot layout is only tried when the canonical
   * layout does not match and legacy verification is enabled.
   */
  verifyGatewayReply(fields: GatewayReverseFields, candidate: string | null | undefined): HashVerification {
    const { key, salt } = this.credentials();
    const expected = this.buildReverseDigest({ ...fields, key, salt }, HashLayout.STANDARD);

    if (this.verify(candidate, expected)) {
      return { verified: true, layout: HashLayout.STANDARD, expected };
    }

    if (this.gateway.acceptLegacyHash) {
      const legacy = this.buildReverseDigest({ ...fields, key, salt }, HashLayout.LEGACY);
      if (this.verify(candidate, legacy)) {
        return { verified: true, layout: HashLayout.LEGACY, expected: legacy };
      }
    }

    return { verified: false, layout: null, expected };
  }

  private credentials(): { key: string; salt: string } {
    const missing: string[] = [];
    if (!this.gateway.key) missing.push('GATEWAY_KEY');
    if (!this.gateway.salt) missing.push('GATEWAY_SALT');

    if (missing.length > 0) {
      throw new MissingGatewayCredentialsError(missing);
    }

    return { key: this.gateway.key, salt: this.gateway.salt };
  }

  private renderUdfs(udfs: ReadonlyArray<UdfValue> | undefined, layout: HashLayout): string[] {
    const carried = layout === HashLayout.LEGACY ? LEGACY_SLOT_COUNT : UDF_SLOT_COUNT;
    const rendered: string[] = [];

    for (let slot = 0; slot < UDF_SLOT_COUNT; slot++) {
      rendered.push(slot < carried ? (udfs?.[slot] ?? '') : '');
    }

    return rendered;
  }

  private renderAmount(amount: string | number | null | undefined): string {
    if (amount === null || amount === undefined) {
      return '';
    }
    // Unparseable amounts are hashed as received so a tampered value still yields a mismatch
    return normalizeAmount(amount) ?? String(amount);
  }

  private join(fields: ReadonlyArray<string | null | undefined>): string {
    return fields.map(field => field ?? '').join(SEPARATOR);
  }

  private sha512(input: string): string {
    try {
      return createHash('sha512').update(input, 'utf8').digest('hex');
    } catch (error) {
      throw new Error('SHA-512 digest algorithm is not available', { cause: error });
    }
  }
}
