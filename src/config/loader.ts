/**
 * Pipeline configuration loader
 * Reads the YAML file, fills defaults, applies env overrides, validates
 */

import { readFile } from 'node:fs/promises';
import { resolve, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parse as parseYaml } from 'yaml';
import { ConfigError } from '../shared/errors.js';
import { DEFAULT_CONTEXTUAL_CONFIG } from '../document/prefix.js';
import type { Env } from './env.js';
import {
	DEFAULT_CHUNKING_CONFIG,
	pipelineYamlSchema,
	type PipelineConfig,
	type PipelineYaml,
} from './types.js';
import {
	compileCommandPattern,
	formatZodError,
	parseChunkingConfig,
	parseContextualConfig,
} from './validate.js';

const __dirname = fileURLToPath(new URL('.', import.meta.url));
const PROJECT_ROOT = resolve(__dirname, '../..');
const DEFAULT_CONFIG_PATH = join(PROJECT_ROOT, 'config', 'pipeline.yaml');

type EnvOverrides = Pick<Env, 'CHUNK_SIZE' | 'CHUNK_OVERLAP' | 'MIN_CHUNK_SIZE'>;

async function loadYaml(filePath: string): Promise<PipelineYaml> {
	let content: string;
	try {
		content = await readFile(filePath, 'utf-8');
	} catch (err) {
		throw new ConfigError(
			`Cannot read config ${filePath}`,
			err instanceof Error ? err : undefined,
		);
	}

	let raw: unknown;
	try {
		raw = parseYaml(content);
	} catch (err) {
		throw new ConfigError(
			`Invalid YAML in ${filePath}`,
			err instanceof Error ? err : undefined,
		);
	}

	// an empty file parses to null: all defaults
	const result = pipelineYamlSchema.safeParse(raw ?? {});
	if (!result.success) {
		throw new ConfigError(`Invalid config ${filePath}:\n${formatZodError(result.error)}`);
	}
	return result.data;
}

/**
 * Merge raw YAML with defaults and env overrides into a validated config
 */
export function resolvePipelineConfig(raw: PipelineYaml, env: Partial<EnvOverrides> = {}): PipelineConfig {
	const chunking = parseChunkingConfig({
		...DEFAULT_CHUNKING_CONFIG,
		...raw.chunking,
		...(env.CHUNK_SIZE !== undefined && { chunk_size: env.CHUNK_SIZE }),
		...(env.CHUNK_OVERLAP !== undefined && { chunk_overlap: env.CHUNK_OVERLAP }),
		...(env.MIN_CHUNK_SIZE !== undefined && { min_chunk_size: env.MIN_CHUNK_SIZE }),
	});

	const contextual = parseContextualConfig({
		...DEFAULT_CONTEXTUAL_CONFIG,
		...raw.contextual,
	});

	return {
		chunking,
		contextual,
		source_type: raw.source_type ?? 'book',
		...(raw.command_keywords && raw.command_keywords.length > 0 && {
			command_pattern: compileCommandPattern(raw.command_keywords),
		}),
	};
}

const configCache = new Map<string, PipelineConfig>();

/**
 * Load the pipeline config (cached per resolved path)
 */
export async function loadPipelineConfig(
	configPath: string = DEFAULT_CONFIG_PATH,
	env: Partial<EnvOverrides> = {},
): Promise<PipelineConfig> {
	const filePath = resolve(configPath);
	const cacheKey = `${filePath}|${env.CHUNK_SIZE ?? ''}|${env.CHUNK_OVERLAP ?? ''}|${env.MIN_CHUNK_SIZE ?? ''}`;
	const cached = configCache.get(cacheKey);
	if (cached) {
		return cached;
	}

	const raw = await loadYaml(filePath);
	const config = resolvePipelineConfig(raw, env);
	configCache.set(cacheKey, config);
	return config;
}

/** For tests */
export function clearConfigCache(): void {
	configCache.clear();
}

export function getDefaultConfigPath(): string {
	return DEFAULT_CONFIG_PATH;
}

export function getProjectRoot(): string {
	return PROJECT_ROOT;
}
