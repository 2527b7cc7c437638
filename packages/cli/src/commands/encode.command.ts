import { readFile, writeFile } from 'node:fs/promises';
import { KmsHeader } from '@kms-header/codec';
import { NodeRsaOaepProvider } from '@kms-header/kms';
import { Command } from 'commander';
import ora from 'ora';
import { dim, errorMessage } from '../theme.js';

interface EncodeOptions {
	algorithm: string;
	keySpec?: string;
	publicKey?: string;
	in?: string;
	out?: string;
}

export const encodeCommand = new Command('encode')
	.description('Build a KMS header for an ARN, optionally wrapping key material')
	.argument('<arn>', 'KMS key ARN')
	.option('-a, --algorithm <name>', 'RSAES_OAEP_SHA_1 or RSAES_OAEP_SHA_256', 'RSAES_OAEP_SHA_256')
	.option('-k, --key-spec <spec>', 'RSA_2048, RSA_3072, or RSA_4096 (implied by --public-key)')
	.option('-p, --public-key <pem>', 'PEM file of the RSA public key')
	.option('-i, --in <file>', 'Key material to wrap (requires --public-key)')
	.option('-o, --out <file>', 'Write the binary header to a file instead of printing base64')
	.action(async (arn: string, options: EncodeOptions) => {
		const spinner = ora({ text: 'Building header...', indent: 2 }).start();

		try {
			const header = KmsHeader.fromArn(arn);
			header.setAlgorithm(options.algorithm);
			if (options.keySpec) header.setAlgorithm(options.keySpec);
			if (options.publicKey) header.setPublicKey(options.publicKey);

			if (options.in) {
				if (!options.publicKey) {
					throw new Error('--in requires --public-key');
				}
				const material = new Uint8Array(await readFile(options.in));
				try {
					header.encrypt(material, new NodeRsaOaepProvider());
				} finally {
					material.fill(0);
				}
			}

			if (options.out) {
				await writeFile(options.out, header.toBytes());
				spinner.succeed(`Wrote ${header.length}-byte header to ${options.out}`);
				return;
			}

			spinner.succeed(`Header built ${dim(`(${header.length} bytes, ${header.state})`)}`);
			console.log(header.toBase64());
		} catch (error: unknown) {
			spinner.fail(`Encoding failed: ${errorMessage(error)}`);
			process.exitCode = 1;
		}
	});
