import { constants, publicEncrypt } from 'node:crypto';
import { oaepHash } from '@kms-header/codec';
import type { EncryptRequest, IEncryptionProvider } from '@kms-header/core';

/** RSA-OAEP with MGF1 over the same hash, no label. */
export class NodeRsaOaepProvider implements IEncryptionProvider {
	readonly name = 'node-rsa-oaep';

	encrypt({ publicKey, plaintext, algorithm }: EncryptRequest): Uint8Array {
		const encrypted = publicEncrypt(
			{
				key: publicKey,
				padding: constants.RSA_PKCS1_OAEP_PADDING,
				oaepHash: oaepHash(algorithm),
			},
			plaintext,
		);
		return new Uint8Array(encrypted);
	}
}
