import * as path from 'node:path';

import type { LogLevel } from 'chess-perspective-core';
import { z } from 'zod';

/**
 * Host configuration.
 *
 * Precedence: CLI options > CPE_* environment variables > defaults.
 */
export type HostConfig = {
	rawDir: string;
	processedDir: string;

	/** Canonical dataset file name (inside processedDir). */
	outputFile: string;

	/** Perspective dataset file name (inside processedDir). */
	perspectiveFile: string;

	logLevel: LogLevel;
	timeZone: string;
	requestDelayMs: number;
	userAgent: string;
};

export const DEFAULT_HOST_CONFIG: HostConfig = {
	rawDir: 'data/raw',
	processedDir: 'data/processed',
	outputFile: 'processed.csv',
	perspectiveFile: 'perspective.csv',
	logLevel: 'INFO',
	timeZone: 'UTC',
	requestDelayMs: 1000,
	userAgent: 'chess-perspective-etl (data pipeline)',
};

const HOST_CONFIG_KEYS = [
	'rawDir',
	'processedDir',
	'outputFile',
	'perspectiveFile',
	'logLevel',
	'timeZone',
	'requestDelayMs',
	'userAgent',
] as const satisfies readonly (keyof HostConfig)[];

const ENV_KEYS: Record<keyof HostConfig, string> = {
	rawDir: 'CPE_RAW_DIR',
	processedDir: 'CPE_PROCESSED_DIR',
	outputFile: 'CPE_OUTPUT_FILE',
	perspectiveFile: 'CPE_PERSPECTIVE_FILE',
	logLevel: 'CPE_LOG_LEVEL',
	timeZone: 'CPE_TIME_ZONE',
	requestDelayMs: 'CPE_REQUEST_DELAY_MS',
	userAgent: 'CPE_USER_AGENT',
};

const HostConfigSchema = z.object({
	rawDir: z.string().min(1),
	processedDir: z.string().min(1),
	outputFile: z.string().min(1),
	perspectiveFile: z.string().min(1),
	logLevel: z.preprocess(
		(v) => (typeof v === 'string' ? v.trim().toUpperCase() : v),
		z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR']),
	),
	timeZone: z.string().min(1),
	requestDelayMs: z.coerce.number().int().nonnegative(),
	userAgent: z.string().min(1),
});

export type HostConfigOverrides = Partial<Record<keyof HostConfig, string | number | undefined>>;

/**
 * Resolve the host configuration.
 * Throws with every invalid key listed when a value does not validate.
 */
export function loadConfig(
	overrides: HostConfigOverrides = {},
	env: NodeJS.ProcessEnv = process.env,
): HostConfig {
	const merged: Record<string, string | number> = {};

	for (const key of HOST_CONFIG_KEYS) {
		const fromEnv = env[ENV_KEYS[key]];
		merged[key] = overrides[key] ?? (fromEnv ? fromEnv : DEFAULT_HOST_CONFIG[key]);
	}

	const parsed = HostConfigSchema.safeParse(merged);
	if (!parsed.success) {
		const problems = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
		throw new Error(`Invalid configuration: ${problems.join('; ')}`);
	}

	return parsed.data;
}

export function canonicalDatasetPath(config: HostConfig): string {
	return path.join(config.processedDir, config.outputFile);
}

export function perspectiveDatasetPath(config: HostConfig): string {
	return path.join(config.processedDir, config.perspectiveFile);
}
