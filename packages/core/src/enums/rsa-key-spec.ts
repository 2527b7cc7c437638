export enum RsaKeySpec {
	RSA_2048 = 'RSA_2048',
	RSA_3072 = 'RSA_3072',
	RSA_4096 = 'RSA_4096',
}
