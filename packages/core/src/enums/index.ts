export { HeaderState } from './header-state.js';
export { OaepAlgorithm } from './oaep-algorithm.js';
export { RsaKeySpec } from './rsa-key-spec.js';
