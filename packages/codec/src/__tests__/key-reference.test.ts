import { describe, expect, it } from 'vitest';
import {
	InvalidReferenceError,
	MalformedReferenceError,
	RegionNumberOutOfRangeError,
} from '../errors.js';
import {
	KEY_REFERENCE_LENGTH,
	decodeKeyReference,
	encodeKeyReference,
	formatKeyArn,
	keyReferenceFromHex,
	keyReferenceToHex,
	parseKeyArn,
} from '../key-reference.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const ARN = 'arn:aws:kms:us-east-1:111122223333:key/1234abcd-12ab-34cd-56ef-1234567890ab';
const ARN_HEX =
	'1234abcd12ab34cd56ef1234567890ab' + '000000000000000000000019df6690e5' + '070101';

function arnFor(region: string, account = '111122223333'): string {
	return `arn:aws:kms:${region}:${account}:key/1234abcd-12ab-34cd-56ef-1234567890ab`;
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('key-reference codec', () => {
	describe('parseKeyArn', () => {
		it('splits an ARN into region, account and key id', () => {
			expect(parseKeyArn(ARN)).toEqual({
				region: 'us-east-1',
				account: '111122223333',
				keyId: '1234abcd-12ab-34cd-56ef-1234567890ab',
			});
		});

		it('rejects strings that are not KMS key ARNs', () => {
			for (const bad of [
				'',
				'arn:aws:s3:::bucket',
				'arn:aws:kms:us-east-1:111122223333:alias/my-key',
				'arn:aws:kms:us-east-1:111122223333:key/1234ABCD-12AB-34CD-56EF-1234567890AB',
				`${ARN} `,
			]) {
				expect(() => parseKeyArn(bad)).toThrow(InvalidReferenceError);
			}
		});

		it('rejects unknown major regions and directions', () => {
			expect(() => parseKeyArn(arnFor('mars-east-1'))).toThrow(InvalidReferenceError);
			expect(() => parseKeyArn(arnFor('us-up-1'))).toThrow(InvalidReferenceError);
			expect(() => parseKeyArn(arnFor('useast1'))).toThrow(InvalidReferenceError);
		});

		it('rejects non-decimal accounts', () => {
			expect(() => parseKeyArn(arnFor('us-east-1', '1111-2222'))).toThrow(InvalidReferenceError);
		});

		it('rejects key ids that are not 32 hex characters without hyphens', () => {
			const arn = 'arn:aws:kms:us-east-1:111122223333:key/1234abcd-12ab-34cd-56ef-1234567890-a';
			expect(() => parseKeyArn(arn)).toThrow(InvalidReferenceError);
		});

		it('rejects key ids with hyphens out of place', () => {
			for (const keyId of [
				'1234abcd12ab34cd56ef1234567890ab----',
				'1234abcd-12ab34cd-56ef-1234-567890ab',
			]) {
				const arn = `arn:aws:kms:us-east-1:111122223333:key/${keyId}`;
				expect(() => parseKeyArn(arn)).toThrow(InvalidReferenceError);
			}
			expect(() =>
				encodeKeyReference({
					region: 'us-east-1',
					account: '111122223333',
					keyId: '1234abcd12ab34cd56ef1234567890ab----',
				}),
			).toThrow(InvalidReferenceError);
		});

		it('rejects zero-padded region numbers', () => {
			expect(() => parseKeyArn(arnFor('us-east-01'))).toThrow(InvalidReferenceError);
			expect(() => parseKeyArn(arnFor('us-east-00'))).toThrow(InvalidReferenceError);
			expect(() => parseKeyArn(arnFor('us-east-0'))).not.toThrow();
		});

		it('rejects accounts that are not twelve digits or a wider unpadded value', () => {
			for (const account of ['0', '12345678901', '0111122223333', '0000000000001234']) {
				expect(() => parseKeyArn(arnFor('us-east-1', account))).toThrow(InvalidReferenceError);
			}
			expect(() => parseKeyArn(arnFor('us-east-1', '1111222233334'))).not.toThrow();
		});

		it('rejects region numbers above 255', () => {
			expect(() => parseKeyArn(arnFor('us-east-256'))).toThrow(RegionNumberOutOfRangeError);
			expect(() => parseKeyArn(arnFor('us-east-255'))).not.toThrow();
		});

		it('rejects accounts wider than 16 bytes', () => {
			const tooWide = (1n << 128n).toString();
			expect(() => parseKeyArn(arnFor('us-east-1', tooWide))).toThrow(InvalidReferenceError);
			expect(() => parseKeyArn(arnFor('us-east-1', ((1n << 128n) - 1n).toString()))).not.toThrow();
		});
	});

	describe('encodeKeyReference', () => {
		it('packs key id, account and region into 35 bytes', () => {
			const bytes = encodeKeyReference(ARN);
			expect(bytes.length).toBe(KEY_REFERENCE_LENGTH);
			expect(Buffer.from(bytes).toString('hex')).toBe(ARN_HEX);
		});

		it('uses the region table codes', () => {
			const bytes = encodeKeyReference(arnFor('us-gov-northwest-12'));
			expect([...bytes.subarray(32)]).toEqual([0x08, 0x08, 12]);

			const af = encodeKeyReference(arnFor('af-south-1'));
			expect([...af.subarray(32)]).toEqual([0x00, 0x02, 1]);
		});

		it('accepts a structured reference', () => {
			const bytes = encodeKeyReference(parseKeyArn(ARN));
			expect(keyReferenceToHex(ARN)).toBe(Buffer.from(bytes).toString('hex'));
		});
	});

	describe('decodeKeyReference', () => {
		it('round-trips every region combination', () => {
			for (const region of [
				'af-south-1',
				'ap-northeast-3',
				'ca-central-1',
				'eu-west-2',
				'il-central-1',
				'me-south-1',
				'sa-east-1',
				'us-west-2',
				'us-gov-east-1',
				'ap-southeast-4',
				'eu-north-0',
				'us-east-255',
			]) {
				const arn = arnFor(region);
				expect(formatKeyArn(decodeKeyReference(encodeKeyReference(arn)))).toBe(arn);
			}
		});

		it('round-trips a zero account', () => {
			const arn = arnFor('eu-west-1', '000000000000');
			expect(formatKeyArn(decodeKeyReference(encodeKeyReference(arn)))).toBe(arn);
		});

		it('keeps leading zeros of a twelve-digit account', () => {
			const arn = arnFor('us-east-1', '012345678901');
			const ref = decodeKeyReference(encodeKeyReference(arn));
			expect(ref.account).toBe('012345678901');
			expect(formatKeyArn(ref)).toBe(arn);
		});

		it('renders accounts wider than twelve digits in full', () => {
			const account = ((1n << 128n) - 1n).toString();
			const ref = decodeKeyReference(encodeKeyReference(arnFor('us-east-1', account)));
			expect(ref.account).toBe('340282366920938463463374607431768211455');
		});

		it('rejects unknown region codes', () => {
			const bytes = encodeKeyReference(ARN);
			bytes[32] = 0x09;
			expect(() => decodeKeyReference(bytes)).toThrow(MalformedReferenceError);

			const direction = encodeKeyReference(ARN);
			direction[33] = 0xff;
			expect(() => decodeKeyReference(direction)).toThrow('Unknown cardinal direction code: 0xff');
		});

		it('requires exactly 35 bytes', () => {
			expect(() => decodeKeyReference(new Uint8Array(34))).toThrow(MalformedReferenceError);
			expect(() => decodeKeyReference(new Uint8Array(36))).toThrow(MalformedReferenceError);
		});
	});

	describe('hex form', () => {
		it('reads the 70-character hex form', () => {
			expect(formatKeyArn(keyReferenceFromHex(ARN_HEX))).toBe(ARN);
		});

		it('rejects hex of the wrong length or case', () => {
			expect(() => keyReferenceFromHex(ARN_HEX.slice(2))).toThrow(MalformedReferenceError);
			expect(() => keyReferenceFromHex(ARN_HEX.toUpperCase())).toThrow(MalformedReferenceError);
		});
	});
});
