import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import type { KmsClientFactory } from '@kms-header/core';
import { createAwsKmsClientFactory, createLocalRsaKmsClientFactory } from '@kms-header/kms';
import { z } from 'zod';

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const awsConfigSchema = z.object({
	version: z.literal(1),
	kmsProvider: z.literal('aws'),
	endpoint: z.string().url().optional(),
	timeoutMs: z.number().int().positive().default(30_000),
	maxAttempts: z.number().int().min(1).max(10).default(3),
});

const localConfigSchema = z.object({
	version: z.literal(1),
	kmsProvider: z.literal('local'),
	privateKeyPath: z.string().min(1, 'privateKeyPath is required for the local provider'),
});

export const kmshConfigSchema = z.discriminatedUnion('kmsProvider', [
	awsConfigSchema,
	localConfigSchema,
]);

export type KmshConfig = z.infer<typeof kmshConfigSchema>;
export type KmshConfigInput = z.input<typeof kmshConfigSchema>;

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

export type Env = Readonly<Record<string, string | undefined>>;

export function getConfigDir(env: Env = process.env): string {
	return env.KMSH_CONFIG_DIR || join(homedir(), '.kmsh');
}

export function getConfigPath(env: Env = process.env): string {
	return join(getConfigDir(env), 'config.json');
}

// ---------------------------------------------------------------------------
// Load / save
// ---------------------------------------------------------------------------

/**
 * Read `config.json` (if any), apply `KMSH_*` environment overrides, and
 * validate. With no file and no overrides the AWS provider defaults apply.
 */
export function loadConfig(env: Env = process.env): KmshConfig {
	const path = getConfigPath(env);
	let fromFile: Record<string, unknown> = {};

	if (existsSync(path)) {
		let parsed: unknown;
		try {
			parsed = JSON.parse(readFileSync(path, 'utf-8'));
		} catch {
			throw new Error(`Invalid config file at ${path}. Run \`kmsh init\` to recreate.`);
		}
		if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
			throw new Error(`Config file at ${path} must contain a JSON object.`);
		}
		fromFile = { ...parsed };
	}

	const merged: Record<string, unknown> = {
		version: 1,
		...fromFile,
		kmsProvider: env.KMSH_KMS_PROVIDER ?? fromFile.kmsProvider ?? 'aws',
	};
	if (env.KMSH_KMS_ENDPOINT) merged.endpoint = env.KMSH_KMS_ENDPOINT;
	if (env.KMSH_PRIVATE_KEY) merged.privateKeyPath = env.KMSH_PRIVATE_KEY;

	return parseConfig(merged);
}

export function parseConfig(value: unknown): KmshConfig {
	const result = kmshConfigSchema.safeParse(value);
	if (!result.success) {
		const issues = result.error.issues
			.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
			.join('; ');
		throw new Error(`Invalid configuration: ${issues}`);
	}
	return result.data;
}

export function saveConfig(config: KmshConfig, env: Env = process.env): string {
	const dir = getConfigDir(env);
	if (!existsSync(dir)) {
		mkdirSync(dir, { recursive: true, mode: 0o700 });
	}

	// Temp file with restrictive permissions, then atomic rename.
	const path = getConfigPath(env);
	const tmpPath = `${path}.tmp`;
	writeFileSync(tmpPath, JSON.stringify(config, null, '\t'), { encoding: 'utf-8', mode: 0o600 });
	renameSync(tmpPath, path);
	return path;
}

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

export function createKmsClientFactory(config: KmshConfig): KmsClientFactory {
	switch (config.kmsProvider) {
		case 'aws':
			return createAwsKmsClientFactory({
				endpoint: config.endpoint,
				timeoutMs: config.timeoutMs,
				maxAttempts: config.maxAttempts,
			});
		case 'local':
			return createLocalRsaKmsClientFactory({ privateKeyPath: config.privateKeyPath });
	}
}
