/** Progress of a header through its byte layout. Only ever moves forward. */
export enum HeaderState {
	EMPTY = 'empty',
	HAS_REFERENCE = 'has-reference',
	HAS_ALGORITHM = 'has-algorithm',
	HAS_CIPHER_DATA = 'has-cipher-data',
}
