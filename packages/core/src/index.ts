export { HeaderState, OaepAlgorithm, RsaKeySpec } from './enums/index.js';
export type { KeyReference, PartialHeaderView, PartialPrefixLength } from './types/index.js';
export type {
	EncryptRequest,
	IEncryptionProvider,
	IKmsClient,
	KmsClientFactory,
	KmsDecryptRequest,
} from './interfaces/index.js';
