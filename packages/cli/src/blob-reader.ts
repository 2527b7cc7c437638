import { open } from 'node:fs/promises';
import { KmsHeader, isPartialPrefixLength } from '@kms-header/codec';
import type { PartialPrefixLength } from '@kms-header/core';

/** ARN + algorithm byte + RSA_4096 cipher data. */
export const MAX_HEADER_LENGTH = 548;

/**
 * Read at most `length` leading bytes of a file with a single positioned read.
 * Shorter files return what they hold.
 */
export async function readPrefix(path: string, length: number): Promise<Uint8Array> {
	const handle = await open(path, 'r');
	try {
		const buffer = Buffer.alloc(length);
		const { bytesRead } = await handle.read(buffer, 0, length, 0);
		return new Uint8Array(buffer.subarray(0, bytesRead));
	} finally {
		await handle.close();
	}
}

/** Parse the header at the start of a stored blob without reading its payload. */
export async function readHeader(path: string): Promise<KmsHeader> {
	return KmsHeader.fromBytes(await readPrefix(path, MAX_HEADER_LENGTH));
}

export function parsePrefixLength(value: string): PartialPrefixLength {
	const length = Number(value);
	if (!isPartialPrefixLength(length)) {
		throw new Error(`--bytes must be 16, 32, 35, or 36 (got ${value})`);
	}
	return length;
}
