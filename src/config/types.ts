/**
 * Configuration schemas for the chunking pipeline
 */

import { z } from 'zod';
import type { ChunkingConfig, ContextualConfig, SourceType } from '../document/types.js';

/** Approximate characters per token */
export const CHARS_PER_TOKEN = 4;

export const DEFAULT_CHUNKING_CONFIG: Readonly<ChunkingConfig> = {
	chunk_size: 512,
	chunk_overlap: 100,
	min_chunk_size: 100,
};

/** Chunking sizes, in tokens */
export const chunkingConfigSchema = z.object({
	chunk_size: z.number().int().positive(),
	chunk_overlap: z.number().int().nonnegative(),
	min_chunk_size: z.number().int().nonnegative(),
}).superRefine((config, ctx) => {
	if (config.chunk_overlap >= config.chunk_size) {
		ctx.addIssue({
			code: z.ZodIssueCode.custom,
			path: ['chunk_overlap'],
			message: `chunk_overlap (${config.chunk_overlap}) must be less than chunk_size (${config.chunk_size})`,
		});
	}
	if (config.min_chunk_size > config.chunk_size) {
		ctx.addIssue({
			code: z.ZodIssueCode.custom,
			path: ['min_chunk_size'],
			message: `min_chunk_size (${config.min_chunk_size}) must not exceed chunk_size (${config.chunk_size})`,
		});
	}
});

export const contextualConfigSchema = z.object({
	include_source: z.boolean(),
	include_chapter: z.boolean(),
	include_section: z.boolean(),
	include_page: z.boolean(),
	separator: z.string().min(1),
	/** must leave room for the ellipsis */
	max_prefix_length: z.number().int().min(4),
});

/** Raw pipeline YAML (every key optional, defaults filled by the loader) */
export const pipelineYamlSchema = z.object({
	chunking: z.object({
		chunk_size: z.number(),
		chunk_overlap: z.number(),
		min_chunk_size: z.number(),
	}).partial().optional(),
	contextual: z.object({
		include_source: z.boolean(),
		include_chapter: z.boolean(),
		include_section: z.boolean(),
		include_page: z.boolean(),
		separator: z.string(),
		max_prefix_length: z.number(),
	}).partial().optional(),
	source_type: z.enum(['book', 'doc', 'org', 'procedure']).optional(),
	/** Regex fragments for command-like text, joined case-insensitively */
	command_keywords: z.array(z.string().min(1)).optional(),
});

export type PipelineYaml = z.infer<typeof pipelineYamlSchema>;

/**
 * Chunking config converted to character budgets
 */
export interface CharBudget {
	chunkSizeChars: number;
	overlapChars: number;
	minChunkChars: number;
}

export function toCharBudget(config: ChunkingConfig): CharBudget {
	return {
		chunkSizeChars: config.chunk_size * CHARS_PER_TOKEN,
		overlapChars: config.chunk_overlap * CHARS_PER_TOKEN,
		minChunkChars: config.min_chunk_size * CHARS_PER_TOKEN,
	};
}

/**
 * Fully resolved pipeline configuration
 */
export interface PipelineConfig {
	chunking: ChunkingConfig;
	contextual: ContextualConfig;
	source_type: SourceType;
	command_pattern?: RegExp;
}
