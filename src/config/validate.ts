/**
 * Construction-time validation: bad sizes are rejected before any document is chunked
 */

import { z } from 'zod';
import { ConfigError } from '../shared/errors.js';
import type { ChunkingConfig, ContextualConfig } from '../document/types.js';
import { chunkingConfigSchema, contextualConfigSchema } from './types.js';

export function formatZodError(error: z.ZodError): string {
	return error.errors
		.map((e) => `  ${e.path.join('.') || '(root)'}: ${e.message}`)
		.join('\n');
}

export function parseChunkingConfig(input: unknown): ChunkingConfig {
	const result = chunkingConfigSchema.safeParse(input);
	if (!result.success) {
		throw new ConfigError(`Invalid chunking config:\n${formatZodError(result.error)}`);
	}
	return result.data;
}

export function parseContextualConfig(input: unknown): ContextualConfig {
	const result = contextualConfigSchema.safeParse(input);
	if (!result.success) {
		throw new ConfigError(`Invalid contextual prefix config:\n${formatZodError(result.error)}`);
	}
	return result.data;
}

/**
 * Case-insensitive alternation of command keyword fragments
 */
export function compileCommandPattern(keywords: readonly string[]): RegExp {
	try {
		return new RegExp(keywords.map((k) => `(?:${k})`).join('|'), 'i');
	} catch (err) {
		throw new ConfigError(
			`Invalid command_keywords: ${err instanceof Error ? err.message : String(err)}`,
			err instanceof Error ? err : undefined,
		);
	}
}
