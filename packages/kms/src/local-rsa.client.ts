import { constants, createPrivateKey, privateDecrypt } from 'node:crypto';
import type { KeyObject } from 'node:crypto';
import { readFileSync } from 'node:fs';
import { oaepHash } from '@kms-header/codec';
import type { IKmsClient, KmsClientFactory, KmsDecryptRequest } from '@kms-header/core';
import { Logger } from '@nestjs/common';

export interface LocalRsaKmsClientOptions {
	/** PEM-encoded RSA private key. */
	readonly privateKeyPath: string;
	/** When set, only this ARN is accepted. */
	readonly keyArn?: string;
}

/**
 * Unwraps cipher data with a private key held on disk, standing in for KMS
 * in development and tests.
 */
export class LocalRsaKmsClient implements IKmsClient {
	readonly name = 'local-rsa';
	private readonly logger = new Logger(LocalRsaKmsClient.name);
	private readonly privateKey: KeyObject;

	constructor(private readonly options: LocalRsaKmsClientOptions) {
		const pem = readFileSync(options.privateKeyPath, 'utf-8');
		this.privateKey = createPrivateKey(pem);
		if (this.privateKey.asymmetricKeyType !== 'rsa') {
			throw new Error(
				`Private key must be RSA, got ${this.privateKey.asymmetricKeyType ?? 'unknown'}`,
			);
		}

		if (process.env.NODE_ENV === 'production') {
			this.logger.warn(
				'LocalRsaKmsClient keeps the private key in process memory. ' +
					'Use AwsKmsClient for production.',
			);
		}

		this.logger.log('Private key loaded from file');
	}

	async decrypt({ keyArn, ciphertext, algorithm, signal }: KmsDecryptRequest): Promise<Uint8Array> {
		signal?.throwIfAborted();

		if (this.options.keyArn !== undefined && keyArn !== this.options.keyArn) {
			throw new Error(`Key ${keyArn} is not held by this client`);
		}

		const plaintext = privateDecrypt(
			{
				key: this.privateKey,
				padding: constants.RSA_PKCS1_OAEP_PADDING,
				oaepHash: oaepHash(algorithm),
			},
			ciphertext,
		);
		return new Uint8Array(plaintext);
	}
}

/** Every region resolves to the same local key. */
export function createLocalRsaKmsClientFactory(options: LocalRsaKmsClientOptions): KmsClientFactory {
	const client = new LocalRsaKmsClient(options);
	return () => client;
}
