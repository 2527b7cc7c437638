import { writeFile } from 'node:fs/promises';
import { Command } from 'commander';
import ora from 'ora';
import { readHeader } from '../blob-reader.js';
import { createKmsClientFactory, loadConfig } from '../config.js';
import { dim, errorMessage } from '../theme.js';

export const decryptCommand = new Command('decrypt')
	.description('Unwrap the key material in a blob header through KMS')
	.argument('<file>', 'Encrypted blob starting with a KMS header')
	.option('-o, --out <file>', 'Write the key material to a file instead of printing base64')
	.action(async (file: string, options: { out?: string }) => {
		const spinner = ora({ text: 'Loading configuration...', indent: 2 }).start();

		let plaintext: Uint8Array | undefined;
		try {
			const config = loadConfig();

			spinner.text = 'Reading header...';
			const header = await readHeader(file);

			spinner.text = `Decrypting with ${config.kmsProvider} KMS...`;
			plaintext = await header.decrypt(createKmsClientFactory(config));

			if (options.out) {
				await writeFile(options.out, plaintext, { mode: 0o600 });
				spinner.succeed(`Wrote ${plaintext.length} bytes to ${options.out}`);
			} else {
				spinner.succeed(`Decrypted ${dim(header.arn ?? '')}`);
				console.log(Buffer.from(plaintext).toString('base64'));
			}
			console.log(dim(`  Payload starts at byte ${header.length}`));
		} catch (error: unknown) {
			spinner.fail(`Decryption failed: ${errorMessage(error)}`);
			process.exitCode = 1;
		} finally {
			plaintext?.fill(0);
		}
	});
