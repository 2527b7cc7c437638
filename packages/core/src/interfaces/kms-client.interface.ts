import type { OaepAlgorithm } from '../enums/oaep-algorithm.js';

export interface KmsDecryptRequest {
	readonly keyArn: string;
	readonly ciphertext: Uint8Array;
	readonly algorithm: OaepAlgorithm;
	readonly signal?: AbortSignal;
}

export interface IKmsClient {
	readonly name: string;

	decrypt(request: KmsDecryptRequest): Promise<Uint8Array>;
}

/** Builds a client bound to a region, e.g. `us-east-1`. */
export type KmsClientFactory = (region: string) => IKmsClient;
