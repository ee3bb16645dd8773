import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { ArgumentError, ConfigError, SaltPolicy } from '@sealfile/core';
import { z } from 'zod';

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

export const DEFAULT_PROGRESS_THRESHOLD = 1024 * 1024;

export const configSchema = z
	.object({
		/** Salt policy for `encrypt-dir` when `--per-file-salt` is not given. */
		saltPolicy: z.nativeEnum(SaltPolicy).default(SaltPolicy.BATCH),
		/** Files at least this large get a byte progress display. */
		progressThreshold: z.number().int().nonnegative().default(DEFAULT_PROGRESS_THRESHOLD),
	})
	.strict();

export type SealfileConfig = z.infer<typeof configSchema>;
export type ConfigKey = keyof SealfileConfig;

export const CONFIG_KEYS: readonly ConfigKey[] = ['saltPolicy', 'progressThreshold'];

/** How `config set` turns a command-line string into a value. */
const settableValues = {
	saltPolicy: z.nativeEnum(SaltPolicy),
	progressThreshold: z
		.string()
		.regex(/^\d+$/, 'Expected a whole number of bytes')
		.transform(Number),
} satisfies Record<ConfigKey, z.ZodTypeAny>;

export function defaultConfig(): SealfileConfig {
	return configSchema.parse({});
}

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

export const HOME_ENV = 'SEALFILE_HOME';

export function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
	const override = env[HOME_ENV];
	return override && override.length > 0 ? override : join(homedir(), '.sealfile');
}

export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
	return join(getConfigDir(env), 'config.json');
}

// ---------------------------------------------------------------------------
// I/O
// ---------------------------------------------------------------------------

/** Missing file → defaults. Anything unreadable or invalid is a {@link ConfigError}. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SealfileConfig {
	const path = getConfigPath(env);
	if (!existsSync(path)) {
		return defaultConfig();
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(readFileSync(path, 'utf-8'));
	} catch (err: unknown) {
		throw new ConfigError(path, 'not valid JSON', { cause: err });
	}

	return validateConfig(parsed, path);
}

export function saveConfig(config: SealfileConfig, env: NodeJS.ProcessEnv = process.env): string {
	const dir = getConfigDir(env);
	if (!existsSync(dir)) {
		mkdirSync(dir, { recursive: true, mode: 0o700 });
	}

	const path = getConfigPath(env);
	const tmpPath = `${path}.tmp`;
	writeFileSync(tmpPath, `${JSON.stringify(config, null, '\t')}\n`, {
		encoding: 'utf-8',
		mode: 0o600,
	});
	renameSync(tmpPath, path);
	return path;
}

// ---------------------------------------------------------------------------
// Updates
// ---------------------------------------------------------------------------

export function isConfigKey(key: string): key is ConfigKey {
	return CONFIG_KEYS.some((k) => k === key);
}

/** Apply `sealfile config set <key> <value>` to `config`. */
export function setConfigValue(config: SealfileConfig, key: string, raw: string): SealfileConfig {
	if (!isConfigKey(key)) {
		throw new ArgumentError(`Unknown config key: ${key}. Expected one of: ${CONFIG_KEYS.join(', ')}`);
	}

	const result = settableValues[key].safeParse(raw);
	if (!result.success) {
		throw new ArgumentError(`Invalid value for ${key}: ${formatIssues(result.error)}`);
	}

	return configSchema.parse({ ...config, [key]: result.data });
}

function validateConfig(value: unknown, path: string): SealfileConfig {
	const result = configSchema.safeParse(value);
	if (!result.success) {
		throw new ConfigError(path, formatIssues(result.error));
	}
	return result.data;
}

function formatIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
		.join('; ');
}
