import { generateKeyPairSync, randomBytes } from 'node:crypto';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DecryptionFailedError, KmsHeader } from '@kms-header/codec';
import { OaepAlgorithm } from '@kms-header/core';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import {
	LocalRsaKmsClient,
	NodeRsaOaepProvider,
	createLocalRsaKmsClientFactory,
} from '../index.js';

const ARN = 'arn:aws:kms:eu-central-1:111122223333:key/1234abcd-12ab-34cd-56ef-1234567890ab';
const OTHER_ARN = 'arn:aws:kms:eu-central-1:111122223333:key/0f0e0d0c-0b0a-0908-0706-050403020100';

describe('LocalRsaKmsClient', () => {
	let tempDir: string;
	let privateKeyPath: string;
	let publicPem: string;

	beforeAll(() => {
		tempDir = mkdtempSync(join(tmpdir(), 'kms-local-test-'));
		privateKeyPath = join(tempDir, 'private.pem');

		const { publicKey, privateKey } = generateKeyPairSync('rsa', {
			modulusLength: 2048,
			publicKeyEncoding: { type: 'spki', format: 'pem' },
			privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
		});
		writeFileSync(privateKeyPath, privateKey);
		publicPem = publicKey;
	});

	afterAll(() => {
		rmSync(tempDir, { recursive: true, force: true });
	});

	function encryptedHeader(plaintext: Uint8Array, algorithm: OaepAlgorithm): KmsHeader {
		const header = KmsHeader.fromArn(ARN, { algorithm });
		header.setPublicKey(publicPem);
		header.encrypt(plaintext, new NodeRsaOaepProvider());
		return header;
	}

	it('round-trips a data key through encrypt and decrypt', async () => {
		for (const algorithm of Object.values(OaepAlgorithm)) {
			const dataKey = new Uint8Array(randomBytes(32));
			const stored = encryptedHeader(dataKey, algorithm).toBytes();

			const header = KmsHeader.fromBytes(stored);
			const decrypted = await header.decrypt(createLocalRsaKmsClientFactory({ privateKeyPath }));

			expect(Buffer.from(decrypted).toString('hex')).toBe(Buffer.from(dataKey).toString('hex'));
		}
	});

	it('produces fresh cipher data on every encryption', () => {
		const dataKey = new Uint8Array(32).fill(3);
		const first = encryptedHeader(dataKey, OaepAlgorithm.RSAES_OAEP_SHA_256).cipherData;
		const second = encryptedHeader(dataKey, OaepAlgorithm.RSAES_OAEP_SHA_256).cipherData;
		expect(first?.length).toBe(256);
		expect(first).not.toEqual(second);
	});

	it('fails when the hash does not match the one used to encrypt', async () => {
		const stored = encryptedHeader(new Uint8Array(16).fill(1), OaepAlgorithm.RSAES_OAEP_SHA_1);
		const client = new LocalRsaKmsClient({ privateKeyPath });

		await expect(
			client.decrypt({
				keyArn: ARN,
				ciphertext: stored.cipherData ?? new Uint8Array(0),
				algorithm: OaepAlgorithm.RSAES_OAEP_SHA_256,
			}),
		).rejects.toThrow();
	});

	it('rejects ARNs it was not configured for', async () => {
		const header = encryptedHeader(new Uint8Array(16).fill(2), OaepAlgorithm.RSAES_OAEP_SHA_256);
		header.setArn(OTHER_ARN);
		const factory = createLocalRsaKmsClientFactory({ privateKeyPath, keyArn: ARN });

		await expect(header.decrypt(factory)).rejects.toThrow(
			`KMS decrypt failed for ${OTHER_ARN}: Key ${OTHER_ARN} is not held by this client`,
		);
	});

	it('honours an aborted signal', async () => {
		const header = encryptedHeader(new Uint8Array(16).fill(4), OaepAlgorithm.RSAES_OAEP_SHA_256);
		const controller = new AbortController();
		controller.abort();

		const error: unknown = await header
			.decrypt(createLocalRsaKmsClientFactory({ privateKeyPath }), { signal: controller.signal })
			.catch((err: unknown) => err);

		expect(error).toBeInstanceOf(DecryptionFailedError);
	});

	it('returns the same client for every region', () => {
		const factory = createLocalRsaKmsClientFactory({ privateKeyPath });
		expect(factory('us-east-1')).toBe(factory('ap-south-1'));
		expect(factory('us-east-1').name).toBe('local-rsa');
	});

	it('refuses a non-RSA private key', () => {
		const ecPath = join(tempDir, 'ec.pem');
		const { privateKey } = generateKeyPairSync('ec', {
			namedCurve: 'prime256v1',
			publicKeyEncoding: { type: 'spki', format: 'pem' },
			privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
		});
		writeFileSync(ecPath, privateKey);

		expect(() => new LocalRsaKmsClient({ privateKeyPath: ecPath })).toThrow(
			'Private key must be RSA, got ec',
		);
	});
});
