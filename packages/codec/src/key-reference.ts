import type { KeyReference } from '@kms-header/core';
import {
	InvalidReferenceError,
	MalformedReferenceError,
	RegionNumberOutOfRangeError,
} from './errors.js';

// ---------------------------------------------------------------------------
// Layout
// ---------------------------------------------------------------------------

export const KEY_ID_LENGTH = 16;
export const ACCOUNT_LENGTH = 16;
export const REGION_LENGTH = 3;
/** keyId (16) + account (16) + region (3). */
export const KEY_REFERENCE_LENGTH = KEY_ID_LENGTH + ACCOUNT_LENGTH + REGION_LENGTH;

const ACCOUNT_OFFSET = KEY_ID_LENGTH;
const REGION_OFFSET = KEY_ID_LENGTH + ACCOUNT_LENGTH;

const MAX_ACCOUNT = (1n << BigInt(ACCOUNT_LENGTH * 8)) - 1n;
const MAX_REGION_NUMBER = 0xff;
/** Decoded accounts are rendered with at least this many digits. */
export const ACCOUNT_DIGITS = 12;

// ---------------------------------------------------------------------------
// Region tables (index = byte code)
// ---------------------------------------------------------------------------

export const MAJOR_REGIONS = ['af', 'ap', 'ca', 'eu', 'il', 'me', 'sa', 'us', 'us-gov'] as const;
export type MajorRegion = (typeof MAJOR_REGIONS)[number];

export const CARDINAL_DIRECTIONS = [
	'north',
	'east',
	'south',
	'west',
	'central',
	'northeast',
	'southeast',
	'southwest',
	'northwest',
] as const;
export type CardinalDirection = (typeof CARDINAL_DIRECTIONS)[number];

const MAJOR_REGION_CODES: ReadonlyMap<string, number> = new Map(
	MAJOR_REGIONS.map((name, code): [string, number] => [name, code]),
);
const CARDINAL_DIRECTION_CODES: ReadonlyMap<string, number> = new Map(
	CARDINAL_DIRECTIONS.map((name, code): [string, number] => [name, code]),
);

// ---------------------------------------------------------------------------
// String form
// ---------------------------------------------------------------------------

export const KEY_ARN_PATTERN =
	/^arn:aws:kms:([^:]+):([^:]+):key\/([0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12})$/;
const KEY_ID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;
/** Region number without zero padding. */
const REGION_PATTERN = /^(.+)-([a-z]+)-(0|[1-9][0-9]*)$/;
/** Twelve digits, or a wider value with no leading zero. */
const ACCOUNT_PATTERN = /^(?:[0-9]{12}|[1-9][0-9]{12,})$/;
const KEY_REFERENCE_HEX_PATTERN = /^[0-9a-f]{70}$/;

export function isKeyArn(value: string): boolean {
	return KEY_ARN_PATTERN.test(value);
}

/**
 * Parse `arn:aws:kms:<region>:<account>:key/<keyId>` and validate that every
 * part can be packed into the 35-byte binary form.
 */
export function parseKeyArn(arn: string): KeyReference {
	const match = KEY_ARN_PATTERN.exec(arn);
	if (!match) {
		throw new InvalidReferenceError(
			`ARN format does not match. It must match: ${KEY_ARN_PATTERN.source}`,
		);
	}
	const [, region = '', account = '', keyId = ''] = match;
	const ref: KeyReference = { region, account, keyId };
	// Packing runs every field check.
	encodeKeyReference(ref);
	return ref;
}

export function formatKeyArn(ref: KeyReference): string {
	return `arn:aws:kms:${ref.region}:${ref.account}:key/${ref.keyId}`;
}

// ---------------------------------------------------------------------------
// Encode
// ---------------------------------------------------------------------------

export function encodeKeyReference(ref: KeyReference | string): Uint8Array {
	const parsed = typeof ref === 'string' ? parseKeyArn(ref) : ref;
	const out = Buffer.alloc(KEY_REFERENCE_LENGTH);

	encodeKeyId(parsed.keyId).copy(out, 0);
	encodeAccount(parsed.account).copy(out, ACCOUNT_OFFSET);
	encodeRegion(parsed.region).copy(out, REGION_OFFSET);

	return new Uint8Array(out);
}

export function keyReferenceToHex(ref: KeyReference | string): string {
	return Buffer.from(encodeKeyReference(ref)).toString('hex');
}

function encodeKeyId(keyId: string): Buffer {
	if (!KEY_ID_PATTERN.test(keyId)) {
		throw new InvalidReferenceError(
			`An invalid key id was provided in the ARN: ${keyId} (expected xxxxxxxx-xxxx-xxxx-xxxx-xxxxxxxxxxxx)`,
		);
	}
	return Buffer.from(keyId.replaceAll('-', ''), 'hex');
}

function encodeAccount(account: string): Buffer {
	if (!ACCOUNT_PATTERN.test(account)) {
		throw new InvalidReferenceError(`An invalid account number was provided in the ARN: ${account}`);
	}
	const value = BigInt(account);
	if (value > MAX_ACCOUNT) {
		throw new InvalidReferenceError(
			`Account number ${account} does not fit in ${ACCOUNT_LENGTH} bytes`,
		);
	}
	return Buffer.from(value.toString(16).padStart(ACCOUNT_LENGTH * 2, '0'), 'hex');
}

function encodeRegion(region: string): Buffer {
	const match = REGION_PATTERN.exec(region);
	if (!match) {
		throw new InvalidReferenceError(`An invalid region was provided in the ARN: ${region}`);
	}
	const [, major = '', direction = '', digits = ''] = match;

	const majorCode = MAJOR_REGION_CODES.get(major);
	const directionCode = CARDINAL_DIRECTION_CODES.get(direction);
	if (majorCode === undefined || directionCode === undefined) {
		throw new InvalidReferenceError(`An invalid region was provided in the ARN: ${region}`);
	}

	const regionNumber = Number.parseInt(digits, 10);
	if (regionNumber > MAX_REGION_NUMBER) {
		throw new RegionNumberOutOfRangeError(regionNumber);
	}

	return Buffer.from([majorCode, directionCode, regionNumber]);
}

// ---------------------------------------------------------------------------
// Decode
// ---------------------------------------------------------------------------

export function decodeKeyReference(bytes: Uint8Array): KeyReference {
	if (bytes.length !== KEY_REFERENCE_LENGTH) {
		throw new MalformedReferenceError(
			`${KEY_REFERENCE_LENGTH}-byte key reference expected, got ${bytes.length} bytes`,
		);
	}
	return {
		region: decodeRegion(bytes.subarray(REGION_OFFSET, KEY_REFERENCE_LENGTH)),
		account: decodeAccount(bytes.subarray(ACCOUNT_OFFSET, REGION_OFFSET)),
		keyId: decodeKeyId(bytes.subarray(0, ACCOUNT_OFFSET)),
	};
}

export function keyReferenceFromHex(hex: string): KeyReference {
	if (!KEY_REFERENCE_HEX_PATTERN.test(hex)) {
		throw new MalformedReferenceError(
			`${KEY_REFERENCE_LENGTH}-byte key reference hex expected (${KEY_REFERENCE_LENGTH * 2} chars)`,
		);
	}
	return decodeKeyReference(new Uint8Array(Buffer.from(hex, 'hex')));
}

/** 16 raw bytes to `xxxxxxxx-xxxx-xxxx-xxxx-xxxxxxxxxxxx`. */
export function decodeKeyId(bytes: Uint8Array): string {
	if (bytes.length !== KEY_ID_LENGTH) {
		throw new MalformedReferenceError(
			`${KEY_ID_LENGTH}-byte key id expected, got ${bytes.length} bytes`,
		);
	}
	const hex = Buffer.from(bytes).toString('hex');
	return [
		hex.slice(0, 8),
		hex.slice(8, 12),
		hex.slice(12, 16),
		hex.slice(16, 20),
		hex.slice(20),
	].join('-');
}

export function decodeAccount(bytes: Uint8Array): string {
	if (bytes.length !== ACCOUNT_LENGTH) {
		throw new MalformedReferenceError(
			`${ACCOUNT_LENGTH}-byte account expected, got ${bytes.length} bytes`,
		);
	}
	return BigInt(`0x${Buffer.from(bytes).toString('hex')}`)
		.toString(10)
		.padStart(ACCOUNT_DIGITS, '0');
}

export function decodeRegion(bytes: Uint8Array): string {
	if (bytes.length !== REGION_LENGTH) {
		throw new MalformedReferenceError(
			`${REGION_LENGTH}-byte region expected, got ${bytes.length} bytes`,
		);
	}
	const [majorCode = 0, directionCode = 0, regionNumber = 0] = bytes;

	const major = MAJOR_REGIONS[majorCode];
	if (major === undefined) {
		throw new MalformedReferenceError(`Unknown major region code: 0x${hexByte(majorCode)}`);
	}
	const direction = CARDINAL_DIRECTIONS[directionCode];
	if (direction === undefined) {
		throw new MalformedReferenceError(
			`Unknown cardinal direction code: 0x${hexByte(directionCode)}`,
		);
	}

	return `${major}-${direction}-${regionNumber}`;
}

function hexByte(value: number): string {
	return value.toString(16).padStart(2, '0');
}
