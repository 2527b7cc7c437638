import type { KeyObject } from 'node:crypto';
import type { OaepAlgorithm } from '../enums/oaep-algorithm.js';

export interface EncryptRequest {
	readonly publicKey: KeyObject;
	readonly plaintext: Uint8Array;
	readonly algorithm: OaepAlgorithm;
}

export interface IEncryptionProvider {
	readonly name: string;

	/** RSA-OAEP encrypt; the result is exactly `modulus bits / 8` bytes. */
	encrypt(request: EncryptRequest): Uint8Array;
}
