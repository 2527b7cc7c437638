import { KmsHeader } from '@kms-header/codec';
import { Command } from 'commander';
import { readHeader } from '../blob-reader.js';
import { bold, dim, failMark, field, errorMessage } from '../theme.js';

export const decodeCommand = new Command('decode')
	.description('Decode the full KMS header at the start of a file or from base64')
	.argument('[file]', 'Encrypted blob starting with a KMS header')
	.option('--base64 <value>', 'Base64-encoded header instead of a file')
	.option('--json', 'Print JSON')
	.action(async (file: string | undefined, options: { base64?: string; json?: boolean }) => {
		try {
			let header: KmsHeader;
			if (options.base64 !== undefined) {
				header = KmsHeader.fromBase64(options.base64);
			} else if (file !== undefined) {
				header = await readHeader(file);
			} else {
				throw new Error('Provide a file or --base64 <value>');
			}

			const summary = header.toJSON();
			if (options.json) {
				console.log(JSON.stringify(summary, null, 2));
				return;
			}

			console.log('');
			console.log(`  ${bold('KMS header')} ${dim(`${summary.length} bytes, ${summary.state}`)}`);
			console.log('');
			field('ARN', summary.arn);
			field('Key ID', summary.keyId);
			field('Account', summary.account);
			field('Region', summary.region);
			field('Algorithm', summary.algorithm);
			field('Key spec', summary.keySpec);
			field('Cipher data', summary.cipherDataLength ? `${summary.cipherDataLength} bytes` : null);
			console.log('');
		} catch (error: unknown) {
			console.error(`\n  ${failMark(errorMessage(error))}\n`);
			process.exitCode = 1;
		}
	});
