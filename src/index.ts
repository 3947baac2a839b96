/**
 * techdoc-chunker public API
 */

// Pipeline
export { createChunker, BaseChunker, HierarchicalChunker, chunkIdFor } from './document/chunker.js';
export type { ChunkerOptions, HierarchicalChunkerOptions } from './document/chunker.js';
export * from './document/types.js';

// Stages
export { protect, restore, restoredLength, placeholderFor, PLACEHOLDER_PATTERN, CODE_BLOCK_PATTERN } from './document/protector.js';
export type { ProtectedBlocks, ProtectedKind, ProtectedText } from './document/protector.js';
export { splitRecursive, hardSplit, overlapTail, DEFAULT_SEPARATORS } from './document/splitter.js';
export type { Measure } from './document/splitter.js';
export {
	extractMetadata,
	advanceContext,
	estimatePage,
	estimatePageMarkers,
	detectChapters,
	DEFAULT_COMMAND_PATTERN,
} from './document/metadata.js';
export {
	ContextualPrefixBuilder,
	ContextualPreprocessor,
	BatchPreprocessor,
	DEFAULT_CONTEXTUAL_CONFIG,
	sourceLabel,
} from './document/prefix.js';
export type { PrefixFields, PreprocessStats } from './document/prefix.js';
export { validateChunk, validateChunks, QUALITY_PENALTIES, MIN_PASSING_SCORE } from './document/quality.js';
export { DocumentLoader, cleanHtmlFromMarkdown, parsePageMap } from './document/loader.js';
export type { LoadOptions } from './document/loader.js';

// Config
export { loadPipelineConfig, resolvePipelineConfig, clearConfigCache } from './config/loader.js';
export { parseChunkingConfig, parseContextualConfig } from './config/validate.js';
export { getEnv, parseEnv, clearEnvCache } from './config/env.js';
export type { Env } from './config/env.js';
export { CHARS_PER_TOKEN, DEFAULT_CHUNKING_CONFIG, toCharBudget } from './config/types.js';
export type { CharBudget, PipelineConfig } from './config/types.js';

// Indexing hand-off
export { ChunkIndexer, createIndexer, chunkPayload } from './rag/indexer.js';
export type { IndexerConfig, IndexStats } from './rag/indexer.js';
export {
	VoyageEmbedder,
	createVoyageEmbedder,
	estimateTokens,
	planBatches,
	isRetryableError,
	retryDelayMs,
	MAX_BATCH_TOKENS,
} from './rag/embedder.js';
export type { ChunkEmbedder, EmbedResult, EmbeddingsClient, EmbedderConfig } from './rag/embedder.js';
export { QdrantClient, stringToUuid, BM25_MODEL } from './rag/qdrant-client.js';
export type { UpsertPoint, VectorStore, QdrantApi, QdrantClientOptions } from './rag/qdrant-client.js';

// Shared
export { Logger, LogLevel, createDefaultLogger, parseLogLevel } from './shared/logger.js';
export type { LoggerOptions, LogStream } from './shared/logger.js';
export { ConfigError, ApiError, RateLimitError } from './shared/errors.js';
export { RateLimiter, createVoyageRateLimiter } from './shared/rate-limiter.js';
