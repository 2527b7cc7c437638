import { KeyObject, createPublicKey } from 'node:crypto';
import { existsSync, readFileSync } from 'node:fs';
import type { RsaKeySpec } from '@kms-header/core';
import { keySpecFromBits } from './algorithm.js';
import { InvalidPublicKeyError, UnsupportedKeySizeError } from './errors.js';

/** A loaded key object, PEM text, or a path to a PEM file. */
export type PublicKeyInput = KeyObject | string;

export interface LoadedPublicKey {
	readonly key: KeyObject;
	readonly keySpec: RsaKeySpec;
}

const PEM_MARKER = '-----BEGIN ';

export function loadPublicKey(input: PublicKeyInput): LoadedPublicKey {
	const key = toKeyObject(input);

	if (key.type !== 'public') {
		throw new InvalidPublicKeyError(`Expected a public key, got a ${key.type} key`);
	}
	if (key.asymmetricKeyType !== 'rsa') {
		throw new UnsupportedKeySizeError(key.asymmetricKeyType ?? 'unknown key type');
	}

	const bits = key.asymmetricKeyDetails?.modulusLength;
	if (bits === undefined) {
		throw new InvalidPublicKeyError('Could not determine RSA modulus length');
	}

	return { key, keySpec: keySpecFromBits(bits) };
}

function toKeyObject(input: PublicKeyInput): KeyObject {
	if (input instanceof KeyObject) return input;

	if (input.includes(PEM_MARKER)) {
		return parsePem(input, 'PEM text');
	}
	if (existsSync(input)) {
		return parsePem(readFileSync(input, 'utf-8'), input);
	}
	throw new InvalidPublicKeyError('Public key does not appear to contain a PEM encoded public key');
}

function parsePem(pem: string, source: string): KeyObject {
	try {
		return createPublicKey(pem);
	} catch (err: unknown) {
		throw new InvalidPublicKeyError(
			`Failed to parse public key from ${source}: ${err instanceof Error ? err.message : String(err)}`,
			err,
		);
	}
}
