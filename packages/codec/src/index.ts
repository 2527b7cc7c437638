// Header model
export { DEFAULT_ALGORITHM, KmsHeader } from './kms-header.js';
export type { DecryptOptions, KmsHeaderOptions, KmsHeaderSummary } from './kms-header.js';

// Partial inspection
export { PARTIAL_PREFIX_LENGTHS, inspectPrefix, isPartialPrefixLength } from './partial-inspector.js';

// Key-reference codec
export {
	CARDINAL_DIRECTIONS,
	KEY_ARN_PATTERN,
	KEY_REFERENCE_LENGTH,
	MAJOR_REGIONS,
	decodeAccount,
	decodeKeyId,
	decodeKeyReference,
	decodeRegion,
	encodeKeyReference,
	formatKeyArn,
	isKeyArn,
	keyReferenceFromHex,
	keyReferenceToHex,
	parseKeyArn,
} from './key-reference.js';
export type { CardinalDirection, MajorRegion } from './key-reference.js';

// Algorithm codec
export {
	cipherLength,
	decodeAlgorithmByte,
	encodeAlgorithmByte,
	isOaepAlgorithm,
	isRsaKeySpec,
	keySpecFromBits,
	maxPlaintextLength,
	oaepHash,
	oaepOverhead,
} from './algorithm.js';
export type { AlgorithmByteFields } from './algorithm.js';

// Public keys
export { loadPublicKey } from './public-key.js';
export type { LoadedPublicKey, PublicKeyInput } from './public-key.js';

// Errors
export {
	CipherLengthMismatchError,
	DecryptionFailedError,
	EncryptionFailedError,
	IncompleteHeaderError,
	InvalidPrefixLengthError,
	InvalidPublicKeyError,
	InvalidReferenceError,
	KeySpecMismatchError,
	KmsHeaderError,
	MalformedReferenceError,
	PlaintextTooLargeError,
	RegionNumberOutOfRangeError,
	TooShortError,
	UnrecognizedCodeError,
	UnsupportedAlgorithmError,
	UnsupportedKeySizeError,
	isKmsHeaderError,
} from './errors.js';
export type { KmsHeaderErrorCode } from './errors.js';
