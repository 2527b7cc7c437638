import type { PartialHeaderView, PartialPrefixLength } from '@kms-header/core';
import { decodeAlgorithmByte } from './algorithm.js';
import { InvalidPrefixLengthError } from './errors.js';
import {
	ACCOUNT_LENGTH,
	KEY_ID_LENGTH,
	KEY_REFERENCE_LENGTH,
	decodeAccount,
	decodeKeyId,
	decodeRegion,
} from './key-reference.js';

export const PARTIAL_PREFIX_LENGTHS: readonly PartialPrefixLength[] = [16, 32, 35, 36];

const ACCOUNT_END = KEY_ID_LENGTH + ACCOUNT_LENGTH;

export function isPartialPrefixLength(length: number): length is PartialPrefixLength {
	return (PARTIAL_PREFIX_LENGTHS as readonly number[]).includes(length);
}

/**
 * Read what the leading bytes of a stored blob reveal without loading the
 * rest of it:
 * - 16 bytes: key id (enough to check key rotation)
 * - 32 bytes: + account
 * - 35 bytes: + region
 * - 36 bytes: + algorithm and key spec
 *
 * A zero nibble in the algorithm byte is reported as absent. `KmsHeader.fromBytes`
 * fills a zero algorithm nibble with the SHA-256 default instead, so the two
 * disagree on `algorithm` for such bytes only.
 */
export function inspectPrefix(prefix: Uint8Array): PartialHeaderView {
	const prefixLength = prefix.length;
	if (!isPartialPrefixLength(prefixLength)) {
		throw new InvalidPrefixLengthError(prefixLength);
	}

	const keyId = decodeKeyId(prefix.subarray(0, KEY_ID_LENGTH));
	if (prefixLength === 16) {
		return { prefixLength, keyId };
	}

	const account = decodeAccount(prefix.subarray(KEY_ID_LENGTH, ACCOUNT_END));
	if (prefixLength === 32) {
		return { prefixLength, keyId, account };
	}

	const region = decodeRegion(prefix.subarray(ACCOUNT_END, KEY_REFERENCE_LENGTH));
	if (prefixLength === 35) {
		return { prefixLength, keyId, account, region };
	}

	const { algorithm, keySpec } = decodeAlgorithmByte(prefix[KEY_REFERENCE_LENGTH] ?? 0);
	return { prefixLength, keyId, account, region, algorithm, keySpec };
}
