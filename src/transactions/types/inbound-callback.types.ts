import { UdfTuple } from '../../hashing/types/hash.types';
import { CustomerDetails, GatewayMetadata } from './transaction.types';

/**
 * A gateway callback after parsing and hash verification, ready to be merged into the stored row.
 * `amount` is already normalised to two fraction digits, or null when the gateway sent
 * something unparseable.
 */
export interface InboundCallback extends GatewayMetadata, CustomerDetails {
  txnid: string;
  udfs: UdfTuple;
  amount: string | null;
  hash: string | null;
  hashVerified: boolean;
}
