import { Command } from 'commander';
import ora from 'ora';
import { AUDIT_GROUP_BY, auditDirectory, isAuditGroupBy } from '../audit.js';
import { parsePrefixLength } from '../blob-reader.js';
import { bold, dim, errorMessage, warn } from '../theme.js';

interface AuditCommandOptions {
	by: string;
	bytes?: string;
	list?: boolean;
}

export const auditCommand = new Command('audit')
	.description('Count blobs per key, account or region by reading only header prefixes')
	.argument('<dir>', 'Directory of encrypted blobs (searched recursively)')
	.option('--by <field>', `Group by: ${AUDIT_GROUP_BY.join(', ')}`, 'key')
	.option('-b, --bytes <n>', 'Bytes to read per file: 16, 32, 35, or 36')
	.option('-l, --list', 'List files in each group')
	.action(async (dir: string, options: AuditCommandOptions) => {
		const spinner = ora({ text: `Scanning ${dir}...`, indent: 2 }).start();

		try {
			if (!isAuditGroupBy(options.by)) {
				throw new Error(`--by must be one of: ${AUDIT_GROUP_BY.join(', ')}`);
			}
			const report = await auditDirectory(dir, {
				groupBy: options.by,
				prefixLength: options.bytes ? parsePrefixLength(options.bytes) : undefined,
			});

			spinner.succeed(
				`Scanned ${report.scanned} file(s) ${dim(`(first ${report.prefixLength} bytes each)`)}`,
			);
			console.log('');
			console.log(`  ${bold(report.groupBy.padEnd(40))} ${bold('Files')}`);
			console.log(dim(`  ${'-'.repeat(48)}`));
			for (const group of report.groups) {
				console.log(`  ${group.value.padEnd(40)} ${group.files.length}`);
				if (options.list) {
					for (const path of group.files) console.log(dim(`    ${path}`));
				}
			}

			if (report.skipped.length > 0) {
				console.log('');
				console.log(warn(`  ${report.skipped.length} file(s) skipped`));
				for (const skip of report.skipped) {
					console.log(dim(`    ${skip.path}: ${skip.reason}`));
				}
			}
			console.log('');
		} catch (error: unknown) {
			spinner.fail(`Audit failed: ${errorMessage(error)}`);
			process.exitCode = 1;
		}
	});
