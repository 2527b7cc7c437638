import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { Command } from 'commander';
import { auditCommand } from './commands/audit.command.js';
import { decodeCommand } from './commands/decode.command.js';
import { decryptCommand } from './commands/decrypt.command.js';
import { encodeCommand } from './commands/encode.command.js';
import { initCommand } from './commands/init.command.js';
import { inspectCommand } from './commands/inspect.command.js';
import { dim } from './theme.js';

export function createProgram(): Command {
	const program = new Command();

	program
		.name('kmsh')
		.description('Build, inspect and unwrap KMS headers on encrypted blobs')
		.version('0.1.0')
		.option('--verbose', 'Show KMS client logs')
		.hook('preAction', (command) => {
			if (!command.opts<{ verbose?: boolean }>().verbose) {
				Logger.overrideLogger(['warn', 'error']);
			}
		})
		.addHelpText(
			'after',
			`
${dim('Examples:')}
  $ kmsh inspect blob.bin --bytes 16     Which key wrapped this blob?
  $ kmsh audit ./objects --by account    Blob counts per AWS account
  $ kmsh decrypt blob.bin -o key.bin     Unwrap the symmetric key via KMS
`,
		);

	program.addCommand(inspectCommand);
	program.addCommand(decodeCommand);
	program.addCommand(encodeCommand);
	program.addCommand(decryptCommand);
	program.addCommand(auditCommand);
	program.addCommand(initCommand);

	return program;
}

export async function runCli(argv: readonly string[] = process.argv): Promise<void> {
	await createProgram().parseAsync(argv);
}
