import { inspectPrefix } from '@kms-header/codec';
import { Command } from 'commander';
import { parsePrefixLength, readPrefix } from '../blob-reader.js';
import { bold, dim, failMark, field, errorMessage } from '../theme.js';

export const inspectCommand = new Command('inspect')
	.description('Show which key, account and region produced a blob from its first bytes')
	.argument('<file>', 'Encrypted blob starting with a KMS header')
	.option('-b, --bytes <n>', 'Bytes to read: 16, 32, 35, or 36', '36')
	.option('--json', 'Print JSON')
	.action(async (file: string, options: { bytes: string; json?: boolean }) => {
		try {
			const length = parsePrefixLength(options.bytes);
			const prefix = await readPrefix(file, length);
			const view = inspectPrefix(prefix);

			if (options.json) {
				console.log(JSON.stringify(view, null, 2));
				return;
			}

			console.log('');
			console.log(`  ${bold(file)} ${dim(`(first ${view.prefixLength} bytes)`)}`);
			console.log('');
			field('Key ID', view.keyId);
			if (view.prefixLength >= 32) field('Account', view.account);
			if (view.prefixLength >= 35) field('Region', view.region);
			if (view.prefixLength === 36) {
				field('Algorithm', view.algorithm);
				field('Key spec', view.keySpec);
			}
			console.log('');
		} catch (error: unknown) {
			console.error(`\n  ${failMark(errorMessage(error))}\n`);
			process.exitCode = 1;
		}
	});
