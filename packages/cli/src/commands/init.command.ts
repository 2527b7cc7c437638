import { Command } from 'commander';
import { type KmshConfigInput, parseConfig, saveConfig } from '../config.js';
import { failMark, successMark, errorMessage } from '../theme.js';

interface InitOptions {
	provider: string;
	endpoint?: string;
	privateKey?: string;
	timeout: string;
	maxAttempts: string;
}

export const initCommand = new Command('init')
	.description('Write ~/.kmsh/config.json')
	.option('--provider <name>', 'KMS provider: aws or local', 'aws')
	.option('--endpoint <url>', 'Alternate AWS KMS endpoint')
	.option('--private-key <pem>', 'Private key PEM file (local provider)')
	.option('--timeout <ms>', 'Per-call KMS timeout in milliseconds', '30000')
	.option('--max-attempts <n>', 'KMS attempts including retries', '3')
	.action((options: InitOptions) => {
		try {
			if (options.provider !== 'local' && options.provider !== 'aws') {
				throw new Error(`--provider must be aws or local (got ${options.provider})`);
			}

			const input: KmshConfigInput =
				options.provider === 'local'
					? { version: 1, kmsProvider: 'local', privateKeyPath: options.privateKey ?? '' }
					: {
							version: 1,
							kmsProvider: 'aws',
							endpoint: options.endpoint,
							timeoutMs: Number(options.timeout),
							maxAttempts: Number(options.maxAttempts),
						};

			const path = saveConfig(parseConfig(input));
			console.log(`\n  ${successMark(`Configuration written to ${path}`)}\n`);
		} catch (error: unknown) {
			console.error(`\n  ${failMark(errorMessage(error))}\n`);
			process.exitCode = 1;
		}
	});
