import type { KeyObject } from 'node:crypto';
import {
	HeaderState,
	type IEncryptionProvider,
	type KeyReference,
	type KmsClientFactory,
	OaepAlgorithm,
	type RsaKeySpec,
} from '@kms-header/core';
import {
	cipherLength,
	decodeAlgorithmByte,
	encodeAlgorithmByte,
	isOaepAlgorithm,
	isRsaKeySpec,
	maxPlaintextLength,
} from './algorithm.js';
import {
	CipherLengthMismatchError,
	DecryptionFailedError,
	EncryptionFailedError,
	IncompleteHeaderError,
	KeySpecMismatchError,
	MalformedReferenceError,
	PlaintextTooLargeError,
	TooShortError,
	UnsupportedAlgorithmError,
	UnsupportedKeySizeError,
} from './errors.js';
import {
	KEY_REFERENCE_LENGTH,
	decodeKeyReference,
	encodeKeyReference,
	formatKeyArn,
	parseKeyArn,
} from './key-reference.js';
import { type PublicKeyInput, loadPublicKey } from './public-key.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const DEFAULT_ALGORITHM = OaepAlgorithm.RSAES_OAEP_SHA_256;

/** Offset of the algorithm byte; cipher data starts one byte later. */
const ALGORITHM_OFFSET = KEY_REFERENCE_LENGTH;
const CIPHER_OFFSET = ALGORITHM_OFFSET + 1;

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

export interface KmsHeaderOptions {
	readonly arn?: string;
	readonly algorithm?: OaepAlgorithm;
	readonly keySpec?: RsaKeySpec;
}

export interface DecryptOptions {
	readonly signal?: AbortSignal;
}

export interface KmsHeaderSummary {
	readonly arn: string | null;
	readonly keyId: string | null;
	readonly account: string | null;
	readonly region: string | null;
	readonly algorithm: OaepAlgorithm;
	readonly keySpec: RsaKeySpec | null;
	readonly cipherDataLength: number;
	readonly length: number;
	readonly state: HeaderState;
}

interface HeaderFields {
	keyReference?: KeyReference;
	algorithm: OaepAlgorithm;
	keySpec?: RsaKeySpec;
	cipherData?: Uint8Array;
	publicKey?: KeyObject;
}

// ---------------------------------------------------------------------------
// Header
// ---------------------------------------------------------------------------

/**
 * Binary header written in front of symmetrically encrypted data.
 *
 * ```
 * [keyId 16][account 16][region 3][algorithm 1][cipher data 256 | 384 | 512]
 * ```
 *
 * Fields fill in layout order and `toBytes()` stops at the first absent one,
 * so `length` is always 0, 35, 36, 292, 420 or 548. Everything after `length`
 * bytes of a blob is symmetric payload.
 *
 * Setters validate before they assign; a failed call leaves the header as it
 * was.
 */
export class KmsHeader {
	private fields: HeaderFields;

	constructor(options: KmsHeaderOptions = {}) {
		const algorithm = options.algorithm ?? DEFAULT_ALGORITHM;
		if (!isOaepAlgorithm(algorithm)) {
			throw new UnsupportedAlgorithmError(algorithm);
		}
		if (options.keySpec !== undefined && !isRsaKeySpec(options.keySpec)) {
			throw new UnsupportedKeySizeError(options.keySpec);
		}

		this.fields = { algorithm, keySpec: options.keySpec };

		if (options.arn !== undefined) {
			this.setArn(options.arn);
		}
	}

	// -----------------------------------------------------------------------
	// Construction
	// -----------------------------------------------------------------------

	static fromArn(arn: string, options: Omit<KmsHeaderOptions, 'arn'> = {}): KmsHeader {
		return new KmsHeader({ ...options, arn });
	}

	/**
	 * Parse as much header as `data` holds. Bytes past the header (the
	 * symmetric payload) are ignored.
	 */
	static fromBytes(data: Uint8Array): KmsHeader {
		if (data.length < KEY_REFERENCE_LENGTH) {
			throw new TooShortError(data.length, KEY_REFERENCE_LENGTH);
		}

		const header = new KmsHeader();
		const keyReference = decodeKeyReference(data.subarray(0, KEY_REFERENCE_LENGTH));
		let { algorithm } = header.fields;
		let keySpec: RsaKeySpec | undefined;
		let cipherData: Uint8Array | undefined;

		const algorithmByte = data[ALGORITHM_OFFSET];
		if (algorithmByte !== undefined) {
			const decoded = decodeAlgorithmByte(algorithmByte);
			algorithm = decoded.algorithm ?? algorithm;
			keySpec = decoded.keySpec;
		}

		if (keySpec !== undefined) {
			const end = CIPHER_OFFSET + cipherLength(keySpec);
			if (data.length >= end) {
				cipherData = new Uint8Array(data.subarray(CIPHER_OFFSET, end));
			}
		}

		header.fields = { keyReference, algorithm, keySpec, cipherData };
		return header;
	}

	static fromBase64(encoded: string): KmsHeader {
		const compact = encoded.replace(/\s+/g, '');
		if (compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
			throw new MalformedReferenceError('Header is not valid base64');
		}
		return KmsHeader.fromBytes(new Uint8Array(Buffer.from(compact, 'base64')));
	}

	/** Split a stored blob into its header and the symmetric payload after it. */
	static split(blob: Uint8Array): { header: KmsHeader; payload: Uint8Array } {
		const header = KmsHeader.fromBytes(blob);
		return { header, payload: blob.subarray(header.length) };
	}

	// -----------------------------------------------------------------------
	// Getters
	// -----------------------------------------------------------------------

	get arn(): string | undefined {
		const ref = this.fields.keyReference;
		return ref ? formatKeyArn(ref) : undefined;
	}

	get keyReference(): KeyReference | undefined {
		return this.fields.keyReference;
	}

	get algorithm(): OaepAlgorithm {
		return this.fields.algorithm;
	}

	get keySpec(): RsaKeySpec | undefined {
		return this.fields.keySpec;
	}

	get cipherData(): Uint8Array | undefined {
		const { cipherData } = this.fields;
		return cipherData ? new Uint8Array(cipherData) : undefined;
	}

	get publicKey(): KeyObject | undefined {
		return this.fields.publicKey;
	}

	/**
	 * Current size of the binary header:
	 * - 0: no ARN
	 * - 35: ARN only
	 * - 36: ARN and key spec
	 * - 292 / 420 / 548: ARN, key spec and RSA_2048 / RSA_3072 / RSA_4096 cipher data
	 */
	get length(): number {
		const { keyReference, keySpec, cipherData } = this.fields;
		if (!keyReference) return 0;
		if (!keySpec) return KEY_REFERENCE_LENGTH;
		if (!cipherData) return CIPHER_OFFSET;
		return CIPHER_OFFSET + cipherLength(keySpec);
	}

	get state(): HeaderState {
		switch (this.length) {
			case 0:
				return HeaderState.EMPTY;
			case KEY_REFERENCE_LENGTH:
				return HeaderState.HAS_REFERENCE;
			case CIPHER_OFFSET:
				return HeaderState.HAS_ALGORITHM;
			default:
				return HeaderState.HAS_CIPHER_DATA;
		}
	}

	// -----------------------------------------------------------------------
	// Setters
	// -----------------------------------------------------------------------

	setArn(arn: string): void {
		this.fields = { ...this.fields, keyReference: parseKeyArn(arn) };
	}

	setKeyReference(ref: KeyReference): void {
		this.setArn(formatKeyArn(ref));
	}

	/** Accepts either an OAEP algorithm or an RSA key spec name. */
	setAlgorithm(name: OaepAlgorithm | RsaKeySpec | string): void {
		if (isOaepAlgorithm(name)) {
			this.fields = { ...this.fields, algorithm: name };
			return;
		}
		if (isRsaKeySpec(name)) {
			this.setKeySpec(name);
			return;
		}
		throw new UnsupportedAlgorithmError(name);
	}

	/** Refused when it contradicts a loaded public key or stored cipher data. */
	setKeySpec(keySpec: RsaKeySpec): void {
		this.assertKeySpecFitsCipherData(keySpec);
		if (this.fields.publicKey && keySpec !== this.fields.keySpec) {
			throw new KeySpecMismatchError(keySpec, this.fields.keySpec ?? 'unknown');
		}
		this.fields = { ...this.fields, keySpec };
	}

	setCipherData(cipherData: Uint8Array): void {
		const { keySpec } = this.fields;
		if (!keySpec) {
			throw new IncompleteHeaderError('A key spec must be set before cipher data');
		}
		const expected = cipherLength(keySpec);
		if (cipherData.length !== expected) {
			throw new CipherLengthMismatchError(cipherData.length, expected, keySpec);
		}
		this.fields = { ...this.fields, cipherData: new Uint8Array(cipherData) };
	}

	/**
	 * Load the RSA public key used by {@link encrypt}. The key spec follows the
	 * key's modulus length.
	 */
	setPublicKey(input: PublicKeyInput): void {
		const { key, keySpec } = loadPublicKey(input);
		this.assertKeySpecFitsCipherData(keySpec);
		this.fields = { ...this.fields, publicKey: key, keySpec };
	}

	// -----------------------------------------------------------------------
	// Export
	// -----------------------------------------------------------------------

	toBytes(): Uint8Array {
		const { keyReference, algorithm, keySpec, cipherData } = this.fields;
		if (!keyReference) return new Uint8Array(0);

		const parts: Uint8Array[] = [encodeKeyReference(keyReference)];
		if (keySpec) {
			parts.push(Uint8Array.of(encodeAlgorithmByte(algorithm, keySpec)));
			if (cipherData) parts.push(cipherData);
		}
		return new Uint8Array(Buffer.concat(parts));
	}

	toBase64(): string {
		return Buffer.from(this.toBytes()).toString('base64');
	}

	toJSON(): KmsHeaderSummary {
		const ref = this.fields.keyReference;
		return {
			arn: this.arn ?? null,
			keyId: ref?.keyId ?? null,
			account: ref?.account ?? null,
			region: ref?.region ?? null,
			algorithm: this.fields.algorithm,
			keySpec: this.fields.keySpec ?? null,
			cipherDataLength: this.fields.cipherData?.length ?? 0,
			length: this.length,
			state: this.state,
		};
	}

	// -----------------------------------------------------------------------
	// Crypto
	// -----------------------------------------------------------------------

	/** Wrap `plaintext` with the loaded public key and store it as cipher data. */
	encrypt(plaintext: Uint8Array, provider: IEncryptionProvider): void {
		const { publicKey, algorithm, keySpec } = this.fields;
		if (!publicKey || !keySpec) {
			throw new IncompleteHeaderError('A public key has not been added. Cannot encrypt.');
		}

		const maximum = maxPlaintextLength(keySpec, algorithm);
		if (plaintext.length > maximum) {
			throw new PlaintextTooLargeError(plaintext.length, maximum, keySpec, algorithm);
		}

		let cipherData: Uint8Array;
		try {
			cipherData = provider.encrypt({ publicKey, plaintext, algorithm });
		} catch (err: unknown) {
			throw new EncryptionFailedError(provider.name, err);
		}
		this.setCipherData(cipherData);
	}

	/**
	 * Unwrap the cipher data through KMS in the region named by the ARN.
	 * Whatever the client throws surfaces as {@link DecryptionFailedError}.
	 */
	async decrypt(createClient: KmsClientFactory, options: DecryptOptions = {}): Promise<Uint8Array> {
		const { keyReference, algorithm, keySpec, cipherData } = this.fields;
		if (!keyReference || !keySpec || !cipherData) {
			throw new IncompleteHeaderError('ARN, key spec, and cipher data need to be loaded');
		}

		const keyArn = formatKeyArn(keyReference);
		try {
			const client = createClient(keyReference.region);
			return await client.decrypt({
				keyArn,
				ciphertext: new Uint8Array(cipherData),
				algorithm,
				signal: options.signal,
			});
		} catch (err: unknown) {
			throw new DecryptionFailedError(keyArn, err);
		}
	}

	// -----------------------------------------------------------------------
	// Internal
	// -----------------------------------------------------------------------

	private assertKeySpecFitsCipherData(keySpec: RsaKeySpec): void {
		if (!isRsaKeySpec(keySpec)) {
			throw new UnsupportedKeySizeError(keySpec);
		}
		const { cipherData } = this.fields;
		if (cipherData && cipherData.length !== cipherLength(keySpec)) {
			throw new CipherLengthMismatchError(cipherData.length, cipherLength(keySpec), keySpec);
		}
	}
}
