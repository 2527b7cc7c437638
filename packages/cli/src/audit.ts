import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { inspectPrefix, isKmsHeaderError } from '@kms-header/codec';
import type { PartialHeaderView, PartialPrefixLength } from '@kms-header/core';
import { readPrefix } from './blob-reader.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type AuditGroupBy = 'key' | 'account' | 'region';

export interface AuditOptions {
	readonly groupBy: AuditGroupBy;
	/** Defaults to the shortest prefix that holds the grouped field. */
	readonly prefixLength?: PartialPrefixLength;
}

export interface AuditGroup {
	readonly value: string;
	readonly files: string[];
}

export interface AuditSkip {
	readonly path: string;
	readonly reason: string;
}

export interface AuditReport {
	readonly groupBy: AuditGroupBy;
	readonly prefixLength: PartialPrefixLength;
	readonly scanned: number;
	/** Largest group first. */
	readonly groups: AuditGroup[];
	readonly skipped: AuditSkip[];
}

const MIN_PREFIX: Readonly<Record<AuditGroupBy, PartialPrefixLength>> = {
	key: 16,
	account: 32,
	region: 35,
};

export const AUDIT_GROUP_BY: readonly AuditGroupBy[] = ['key', 'account', 'region'];

export function isAuditGroupBy(value: string): value is AuditGroupBy {
	return (AUDIT_GROUP_BY as readonly string[]).includes(value);
}

// ---------------------------------------------------------------------------
// Audit
// ---------------------------------------------------------------------------

/**
 * Group every file under `dir` by the key, account or region named in its
 * header, reading only the leading bytes of each file.
 */
export async function auditDirectory(dir: string, options: AuditOptions): Promise<AuditReport> {
	const { groupBy } = options;
	const minimum = MIN_PREFIX[groupBy];
	const prefixLength = options.prefixLength ?? minimum;
	if (prefixLength < minimum) {
		throw new Error(`Grouping by ${groupBy} needs at least ${minimum} bytes, got ${prefixLength}`);
	}

	const byValue = new Map<string, string[]>();
	const skipped: AuditSkip[] = [];
	let scanned = 0;

	for (const path of await listFiles(dir)) {
		scanned++;
		const prefix = await readPrefix(path, prefixLength);
		if (prefix.length < prefixLength) {
			skipped.push({ path, reason: `only ${prefix.length} bytes` });
			continue;
		}

		let view: PartialHeaderView;
		try {
			view = inspectPrefix(prefix);
		} catch (error: unknown) {
			if (!isKmsHeaderError(error)) throw error;
			skipped.push({ path, reason: error.message });
			continue;
		}

		const value = groupValue(view, groupBy);
		const files = byValue.get(value);
		if (files) {
			files.push(path);
		} else {
			byValue.set(value, [path]);
		}
	}

	const groups = [...byValue.entries()]
		.map(([value, files]) => ({ value, files }))
		.sort((a, b) => b.files.length - a.files.length || a.value.localeCompare(b.value));

	return { groupBy, prefixLength, scanned, groups, skipped };
}

function groupValue(view: PartialHeaderView, groupBy: AuditGroupBy): string {
	switch (groupBy) {
		case 'key':
			return view.keyId;
		case 'account':
			return view.account ?? '';
		case 'region':
			return view.region ?? '';
	}
}

/** Regular files under `dir`, depth first, sorted by name at each level. */
async function listFiles(dir: string): Promise<string[]> {
	const entries = await readdir(dir, { withFileTypes: true });
	entries.sort((a, b) => a.name.localeCompare(b.name));

	const files: string[] = [];
	for (const entry of entries) {
		const path = join(dir, entry.name);
		if (entry.isDirectory()) {
			files.push(...(await listFiles(path)));
		} else if (entry.isFile()) {
			files.push(path);
		}
	}
	return files;
}
