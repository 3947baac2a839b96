/**
 * Chunker factory
 */

import type { PipelineConfig } from '../config/types.js';
import type { Logger } from '../shared/logger.js';
import { HierarchicalChunker } from './chunkers/hierarchical.js';

export function createChunker(config: PipelineConfig, logger?: Logger): HierarchicalChunker {
	return new HierarchicalChunker({
		chunking: config.chunking,
		contextual: config.contextual,
		sourceType: config.source_type,
		commandPattern: config.command_pattern,
		logger,
	});
}

export { BaseChunker, chunkIdFor } from './chunkers/base.js';
export type { ChunkerOptions } from './chunkers/base.js';
export { HierarchicalChunker } from './chunkers/hierarchical.js';
export type { HierarchicalChunkerOptions } from './chunkers/hierarchical.js';
export * from './types.js';
export * from './loader.js';
