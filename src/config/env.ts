/**
 * Environment variable schema and validation using zod
 */

import { z } from 'zod';
import { ConfigError } from '../shared/errors.js';
import { formatZodError } from './validate.js';

export const envSchema = z.object({
	// === Pipeline ===
	PIPELINE_CONFIG: z.string().optional(),
	CHUNK_SIZE: z.coerce.number().int().positive().optional(),
	CHUNK_OVERLAP: z.coerce.number().int().nonnegative().optional(),
	MIN_CHUNK_SIZE: z.coerce.number().int().nonnegative().optional(),

	// === Voyage AI ===
	VOYAGE_API_KEY: z.string().optional(),
	VOYAGE_EMBED_MODEL: z.string().default('voyage-3'),
	VOYAGE_RPM_LIMIT: z.coerce.number().int().positive().default(2000),
	VOYAGE_TPM_LIMIT: z.coerce.number().int().positive().default(3000000),

	// === Qdrant ===
	QDRANT_URL: z.string().url('QDRANT_URL must be a valid URL').default('http://localhost:6333'),
	QDRANT_API_KEY: z.string().optional(),
	QDRANT_COLLECTION: z.string().min(1).default('technical_books'),
	BATCH_SIZE: z.coerce.number().int().positive().default(64),

	// === Logging ===
	LOG_LEVEL: z.preprocess(
		(v) => (typeof v === 'string' ? v.toLowerCase() : v),
		z.enum(['debug', 'info', 'warn', 'error']).default('info'),
	),
});

export type Env = z.infer<typeof envSchema>;

let cachedEnv: Env | null = null;

/**
 * Parse and validate environment variables (cached after the first success)
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): Env {
	if (cachedEnv) {
		return cachedEnv;
	}

	const result = envSchema.safeParse(env);
	if (!result.success) {
		throw new ConfigError(`Environment validation failed:\n${formatZodError(result.error)}`);
	}

	cachedEnv = result.data;
	return cachedEnv;
}

export function getEnv(): Env {
	return parseEnv();
}

/** For tests */
export function clearEnvCache(): void {
	cachedEnv = null;
}
