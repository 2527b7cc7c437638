// ---------------------------------------------------------------------------
// Error codes
// ---------------------------------------------------------------------------

export type KmsHeaderErrorCode =
	| 'INVALID_REFERENCE'
	| 'MALFORMED_REFERENCE'
	| 'REGION_NUMBER_OUT_OF_RANGE'
	| 'UNSUPPORTED_ALGORITHM'
	| 'UNSUPPORTED_KEY_SIZE'
	| 'UNRECOGNIZED_CODE'
	| 'TOO_SHORT'
	| 'INVALID_PREFIX_LENGTH'
	| 'CIPHER_LENGTH_MISMATCH'
	| 'PLAINTEXT_TOO_LARGE'
	| 'INCOMPLETE_HEADER'
	| 'KEY_SPEC_MISMATCH'
	| 'ENCRYPTION_FAILED'
	| 'DECRYPTION_FAILED'
	| 'INVALID_PUBLIC_KEY';

// ---------------------------------------------------------------------------
// Base
// ---------------------------------------------------------------------------

export class KmsHeaderError extends Error {
	constructor(
		public readonly code: KmsHeaderErrorCode,
		message: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = 'KmsHeaderError';
	}
}

export function isKmsHeaderError(value: unknown): value is KmsHeaderError {
	return value instanceof KmsHeaderError;
}

// ---------------------------------------------------------------------------
// Key reference
// ---------------------------------------------------------------------------

/** The ARN string does not follow `arn:aws:kms:<region>:<account>:key/<id>`. */
export class InvalidReferenceError extends KmsHeaderError {
	constructor(message: string) {
		super('INVALID_REFERENCE', message);
		this.name = 'InvalidReferenceError';
	}
}

/** Binary or hex key reference maps to no known region, direction or key id. */
export class MalformedReferenceError extends KmsHeaderError {
	constructor(message: string) {
		super('MALFORMED_REFERENCE', message);
		this.name = 'MalformedReferenceError';
	}
}

export class RegionNumberOutOfRangeError extends KmsHeaderError {
	constructor(public readonly regionNumber: number) {
		super(
			'REGION_NUMBER_OUT_OF_RANGE',
			`Region number ${regionNumber} does not fit in one byte (0-255)`,
		);
		this.name = 'RegionNumberOutOfRangeError';
	}
}

// ---------------------------------------------------------------------------
// Algorithm byte
// ---------------------------------------------------------------------------

export class UnsupportedAlgorithmError extends KmsHeaderError {
	constructor(public readonly algorithm: unknown) {
		super(
			'UNSUPPORTED_ALGORITHM',
			`Unsupported algorithm: ${String(algorithm)}. Expected one of: RSAES_OAEP_SHA_1, RSAES_OAEP_SHA_256, RSA_2048, RSA_3072, RSA_4096`,
		);
		this.name = 'UnsupportedAlgorithmError';
	}
}

export class UnsupportedKeySizeError extends KmsHeaderError {
	constructor(public readonly keySize: unknown) {
		super(
			'UNSUPPORTED_KEY_SIZE',
			`Unsupported RSA key size: ${String(keySize)}. Expected one of: RSA_2048, RSA_3072, RSA_4096`,
		);
		this.name = 'UnsupportedKeySizeError';
	}
}

export class UnrecognizedCodeError extends KmsHeaderError {
	constructor(message: string) {
		super('UNRECOGNIZED_CODE', message);
		this.name = 'UnrecognizedCodeError';
	}
}

// ---------------------------------------------------------------------------
// Input length
// ---------------------------------------------------------------------------

export class TooShortError extends KmsHeaderError {
	constructor(
		public readonly actual: number,
		public readonly minimum: number,
	) {
		super('TOO_SHORT', `Header data is ${actual} bytes; at least ${minimum} bytes are required`);
		this.name = 'TooShortError';
	}
}

export class InvalidPrefixLengthError extends KmsHeaderError {
	constructor(public readonly actual: number) {
		super(
			'INVALID_PREFIX_LENGTH',
			`Partial header must be 16, 32, 35, or 36 bytes; got ${actual} bytes`,
		);
		this.name = 'InvalidPrefixLengthError';
	}
}

// ---------------------------------------------------------------------------
// Cipher data
// ---------------------------------------------------------------------------

export class CipherLengthMismatchError extends KmsHeaderError {
	constructor(
		public readonly actual: number,
		public readonly expected: number,
		keySpec: string,
	) {
		super(
			'CIPHER_LENGTH_MISMATCH',
			`Cipher data was ${actual} bytes but must be exactly ${expected} bytes because key spec is ${keySpec}`,
		);
		this.name = 'CipherLengthMismatchError';
	}
}

export class PlaintextTooLargeError extends KmsHeaderError {
	constructor(
		public readonly actual: number,
		public readonly maximum: number,
		keySpec: string,
		algorithm: string,
	) {
		super(
			'PLAINTEXT_TOO_LARGE',
			`Attempted to encrypt ${actual} bytes but cannot encrypt more than ${maximum} bytes with ${keySpec} ${algorithm}`,
		);
		this.name = 'PlaintextTooLargeError';
	}
}

export class IncompleteHeaderError extends KmsHeaderError {
	constructor(message: string) {
		super('INCOMPLETE_HEADER', message);
		this.name = 'IncompleteHeaderError';
	}
}

/** The key spec disagrees with the modulus of the loaded public key. */
export class KeySpecMismatchError extends KmsHeaderError {
	constructor(
		public readonly requested: string,
		public readonly publicKeySpec: string,
	) {
		super(
			'KEY_SPEC_MISMATCH',
			`Key spec ${requested} does not match the loaded public key, which is ${publicKeySpec}`,
		);
		this.name = 'KeySpecMismatchError';
	}
}

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

export class EncryptionFailedError extends KmsHeaderError {
	constructor(providerName: string, cause: unknown) {
		const reason = cause instanceof Error ? cause.message : String(cause);
		super('ENCRYPTION_FAILED', `Encryption with ${providerName} failed: ${reason}`, { cause });
		this.name = 'EncryptionFailedError';
	}
}

export class DecryptionFailedError extends KmsHeaderError {
	constructor(keyArn: string, cause: unknown) {
		const reason = cause instanceof Error ? cause.message : String(cause);
		super('DECRYPTION_FAILED', `KMS decrypt failed for ${keyArn}: ${reason}`, { cause });
		this.name = 'DecryptionFailedError';
	}
}

export class InvalidPublicKeyError extends KmsHeaderError {
	constructor(message: string, cause?: unknown) {
		super('INVALID_PUBLIC_KEY', message, { cause });
		this.name = 'InvalidPublicKeyError';
	}
}
