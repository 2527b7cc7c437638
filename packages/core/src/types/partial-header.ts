import type { OaepAlgorithm } from '../enums/oaep-algorithm.js';
import type { RsaKeySpec } from '../enums/rsa-key-spec.js';

export type PartialPrefixLength = 16 | 32 | 35 | 36;

/**
 * Fields recoverable from the leading bytes of a header. A 16-byte prefix
 * yields only `keyId`; each longer prefix adds the next field in layout order.
 */
export interface PartialHeaderView {
	readonly prefixLength: PartialPrefixLength;
	readonly keyId: string;
	readonly account?: string;
	readonly region?: string;
	readonly algorithm?: OaepAlgorithm;
	readonly keySpec?: RsaKeySpec;
}
