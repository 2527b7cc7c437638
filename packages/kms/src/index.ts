import 'reflect-metadata';

export { NodeRsaOaepProvider } from './rsa-oaep.provider.js';
export { AwsKmsClient, createAwsKmsClientFactory } from './aws-kms.client.js';
export type { AwsKmsClientOptions } from './aws-kms.client.js';
export { LocalRsaKmsClient, createLocalRsaKmsClientFactory } from './local-rsa.client.js';
export type { LocalRsaKmsClientOptions } from './local-rsa.client.js';
