import { DecryptCommand, EncryptionAlgorithmSpec, KMSClient } from '@aws-sdk/client-kms';
import type { IKmsClient, KmsClientFactory, KmsDecryptRequest } from '@kms-header/core';
import { OaepAlgorithm } from '@kms-header/core';
import { Logger } from '@nestjs/common';

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_MAX_ATTEMPTS = 3;

const ENCRYPTION_ALGORITHMS: Readonly<Record<OaepAlgorithm, EncryptionAlgorithmSpec>> = {
	[OaepAlgorithm.RSAES_OAEP_SHA_1]: EncryptionAlgorithmSpec.RSAES_OAEP_SHA_1,
	[OaepAlgorithm.RSAES_OAEP_SHA_256]: EncryptionAlgorithmSpec.RSAES_OAEP_SHA_256,
};

export interface AwsKmsClientOptions {
	readonly region: string;
	/** Alternate endpoint, e.g. a local KMS emulator. */
	readonly endpoint?: string;
	/** Per-call deadline; combined with the caller's signal. */
	readonly timeoutMs?: number;
	/** Handed to the SDK retry strategy. 1 disables retries. */
	readonly maxAttempts?: number;
	/** Use a preconfigured SDK client instead of building one. */
	readonly client?: KMSClient;
}

export class AwsKmsClient implements IKmsClient {
	readonly name = 'aws-kms';
	private readonly logger = new Logger(AwsKmsClient.name);
	private readonly client: KMSClient;
	private readonly timeoutMs: number;

	constructor(private readonly options: AwsKmsClientOptions) {
		this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
		this.client =
			options.client ??
			new KMSClient({
				region: options.region,
				endpoint: options.endpoint,
				maxAttempts: options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
			});
	}

	async decrypt({ keyArn, ciphertext, algorithm, signal }: KmsDecryptRequest): Promise<Uint8Array> {
		const timeout = AbortSignal.timeout(this.timeoutMs);
		const abortSignal = signal ? AbortSignal.any([signal, timeout]) : timeout;

		const command = new DecryptCommand({
			KeyId: keyArn,
			CiphertextBlob: ciphertext,
			EncryptionAlgorithm: ENCRYPTION_ALGORITHMS[algorithm],
		});

		const out = await this.client.send(command, { abortSignal });
		if (!out.Plaintext) {
			throw new Error('KMS Decrypt returned empty Plaintext');
		}

		this.logger.log(`Decrypted ${ciphertext.length}-byte cipher data [region=${this.options.region}]`);
		return out.Plaintext;
	}

	destroy(): void {
		this.client.destroy();
	}
}

/**
 * Factory for {@link KmsHeader.decrypt}: one client per region, reused across
 * calls.
 */
export function createAwsKmsClientFactory(
	options: Omit<AwsKmsClientOptions, 'region' | 'client'> = {},
): KmsClientFactory {
	const clients = new Map<string, AwsKmsClient>();
	return (region: string) => {
		let client = clients.get(region);
		if (!client) {
			client = new AwsKmsClient({ ...options, region });
			clients.set(region, client);
		}
		return client;
	};
}
