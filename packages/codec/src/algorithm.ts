import { OaepAlgorithm, RsaKeySpec } from '@kms-header/core';
import {
	UnrecognizedCodeError,
	UnsupportedAlgorithmError,
	UnsupportedKeySizeError,
} from './errors.js';

// ---------------------------------------------------------------------------
// Tables
// ---------------------------------------------------------------------------

const ALGORITHM_MASK = 0xf0;
const KEY_SPEC_MASK = 0x0f;

/** Upper-nibble code of each OAEP algorithm. */
const ALGORITHM_CODES: Readonly<Record<OaepAlgorithm, number>> = {
	[OaepAlgorithm.RSAES_OAEP_SHA_1]: 0x1,
	[OaepAlgorithm.RSAES_OAEP_SHA_256]: 0x2,
};

/** Lower-nibble code of each key spec. */
const KEY_SPEC_CODES: Readonly<Record<RsaKeySpec, number>> = {
	[RsaKeySpec.RSA_2048]: 0x1,
	[RsaKeySpec.RSA_3072]: 0x2,
	[RsaKeySpec.RSA_4096]: 0x3,
};

const ALGORITHMS_BY_CODE: ReadonlyMap<number, OaepAlgorithm> = new Map(
	Object.values(OaepAlgorithm).map((algorithm): [number, OaepAlgorithm] => [ALGORITHM_CODES[algorithm], algorithm]),
);

const KEY_SPECS_BY_CODE: ReadonlyMap<number, RsaKeySpec> = new Map(
	Object.values(RsaKeySpec).map((keySpec): [number, RsaKeySpec] => [KEY_SPEC_CODES[keySpec], keySpec]),
);

/** Bytes of OAEP padding each algorithm consumes from the RSA block. */
const OAEP_OVERHEAD: Readonly<Record<OaepAlgorithm, number>> = {
	[OaepAlgorithm.RSAES_OAEP_SHA_1]: 42,
	[OaepAlgorithm.RSAES_OAEP_SHA_256]: 66,
};

const OAEP_HASH: Readonly<Record<OaepAlgorithm, 'sha1' | 'sha256'>> = {
	[OaepAlgorithm.RSAES_OAEP_SHA_1]: 'sha1',
	[OaepAlgorithm.RSAES_OAEP_SHA_256]: 'sha256',
};

const CIPHER_LENGTH: Readonly<Record<RsaKeySpec, number>> = {
	[RsaKeySpec.RSA_2048]: 256,
	[RsaKeySpec.RSA_3072]: 384,
	[RsaKeySpec.RSA_4096]: 512,
};

// ---------------------------------------------------------------------------
// Guards
// ---------------------------------------------------------------------------

export function isOaepAlgorithm(value: unknown): value is OaepAlgorithm {
	return typeof value === 'string' && Object.hasOwn(ALGORITHM_CODES, value);
}

export function isRsaKeySpec(value: unknown): value is RsaKeySpec {
	return typeof value === 'string' && Object.hasOwn(KEY_SPEC_CODES, value);
}

// ---------------------------------------------------------------------------
// Algorithm byte
// ---------------------------------------------------------------------------

export interface AlgorithmByteFields {
	readonly algorithm?: OaepAlgorithm;
	readonly keySpec?: RsaKeySpec;
}

/**
 * `(algorithm << 4) | keySpec`; an omitted half packs as zero. Names are
 * checked at run time, so plain strings from flags or JSON are accepted.
 */
export function encodeAlgorithmByte(algorithm?: string, keySpec?: string): number {
	let byte = 0;
	if (algorithm !== undefined) {
		if (!isOaepAlgorithm(algorithm)) throw new UnsupportedAlgorithmError(algorithm);
		byte |= ALGORITHM_CODES[algorithm] << 4;
	}
	if (keySpec !== undefined) {
		if (!isRsaKeySpec(keySpec)) throw new UnsupportedKeySizeError(keySpec);
		byte |= KEY_SPEC_CODES[keySpec];
	}
	return byte;
}

/**
 * Split the algorithm byte into its two halves. A zero nibble means the half
 * was never set; a non-zero nibble with no table entry is rejected.
 */
export function decodeAlgorithmByte(byte: number): AlgorithmByteFields {
	if (!Number.isInteger(byte) || byte < 0 || byte > 0xff) {
		throw new UnrecognizedCodeError(`Algorithm byte must be 0-255, got ${byte}`);
	}

	const algorithmCode = (byte & ALGORITHM_MASK) >> 4;
	const keySpecCode = byte & KEY_SPEC_MASK;

	let algorithm: OaepAlgorithm | undefined;
	if (algorithmCode !== 0) {
		algorithm = ALGORITHMS_BY_CODE.get(algorithmCode);
		if (algorithm === undefined) {
			throw new UnrecognizedCodeError(`Unknown algorithm code 0x${algorithmCode.toString(16)}`);
		}
	}

	let keySpec: RsaKeySpec | undefined;
	if (keySpecCode !== 0) {
		keySpec = KEY_SPECS_BY_CODE.get(keySpecCode);
		if (keySpec === undefined) {
			throw new UnrecognizedCodeError(`Unknown key spec code 0x${keySpecCode.toString(16)}`);
		}
	}

	return { algorithm, keySpec };
}

// ---------------------------------------------------------------------------
// Sizes
// ---------------------------------------------------------------------------

export function cipherLength(keySpec: RsaKeySpec): number {
	return CIPHER_LENGTH[keySpec];
}

export function oaepOverhead(algorithm: OaepAlgorithm): number {
	return OAEP_OVERHEAD[algorithm];
}

export function oaepHash(algorithm: OaepAlgorithm): 'sha1' | 'sha256' {
	return OAEP_HASH[algorithm];
}

/** Largest plaintext one RSA-OAEP block can carry. */
export function maxPlaintextLength(keySpec: RsaKeySpec, algorithm: OaepAlgorithm): number {
	return cipherLength(keySpec) - oaepOverhead(algorithm);
}

export function keySpecFromBits(bits: number): RsaKeySpec {
	const keySpec = `RSA_${bits}`;
	if (!isRsaKeySpec(keySpec)) {
		throw new UnsupportedKeySizeError(bits);
	}
	return keySpec;
}
