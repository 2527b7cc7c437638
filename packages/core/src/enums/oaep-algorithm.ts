export enum OaepAlgorithm {
	RSAES_OAEP_SHA_1 = 'RSAES_OAEP_SHA_1',
	RSAES_OAEP_SHA_256 = 'RSAES_OAEP_SHA_256',
}
