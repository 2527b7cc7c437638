export type { EncryptRequest, IEncryptionProvider } from './encryption-provider.interface.js';
export type {
	IKmsClient,
	KmsClientFactory,
	KmsDecryptRequest,
} from './kms-client.interface.js';
