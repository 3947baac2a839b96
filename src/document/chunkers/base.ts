/**
 * Base chunker: configuration validation and Chunk record construction
 * shared by chunking strategies
 */

import { DEFAULT_CHUNKING_CONFIG, toCharBudget, type CharBudget } from '../../config/types.js';
import { parseChunkingConfig, parseContextualConfig } from '../../config/validate.js';
import { Logger } from '../../shared/logger.js';
import { ContextualPrefixBuilder, DEFAULT_CONTEXTUAL_CONFIG } from '../prefix.js';
import type {
	Chunk,
	ChunkingConfig,
	ContextualConfig,
	Document,
	DocumentContext,
	ExtractedContent,
	SourceType,
} from '../types.js';

export interface ChunkerOptions {
	chunking?: Partial<ChunkingConfig>;
	contextual?: Partial<ContextualConfig>;
	/** Tag written on every chunk, default 'book' */
	sourceType?: SourceType;
	logger?: Logger;
}

/** Zero-padded width of the sequence number in chunk ids */
const CHUNK_ID_PAD = 4;

export function chunkIdFor(title: string, chunkIndex: number): string {
	const slug = title.trim().toLowerCase().replace(/\s+/g, '_');
	return `${slug}_${String(chunkIndex).padStart(CHUNK_ID_PAD, '0')}`;
}

export abstract class BaseChunker {
	readonly config: Readonly<ChunkingConfig>;
	protected readonly budget: Readonly<CharBudget>;
	protected readonly prefixBuilder: ContextualPrefixBuilder;
	protected readonly sourceType: SourceType;
	protected readonly logger: Logger;

	/**
	 * @throws ConfigError for invalid sizes (e.g. overlap >= chunk size)
	 */
	constructor(options: ChunkerOptions = {}) {
		this.config = parseChunkingConfig({ ...DEFAULT_CHUNKING_CONFIG, ...options.chunking });
		this.budget = toCharBudget(this.config);
		this.prefixBuilder = new ContextualPrefixBuilder(
			parseContextualConfig({ ...DEFAULT_CONTEXTUAL_CONFIG, ...options.contextual }),
		);
		this.sourceType = options.sourceType ?? 'book';
		this.logger = options.logger ?? new Logger();
	}

	/**
	 * Chunk one document. Each call returns a fresh, deterministic sequence.
	 */
	abstract chunkContent(content: ExtractedContent): Generator<Chunk>;

	/**
	 * Build an immutable Chunk carrying the running context
	 */
	protected createChunk(
		doc: Document,
		chunkIndex: number,
		content: string,
		context: DocumentContext,
		page: number | undefined,
	): Chunk {
		const contextualPrefix = this.prefixBuilder.build({
			source: doc.title,
			chapter: context.chapter,
			section: context.section,
			page,
			sourceType: this.sourceType,
		});

		return Object.freeze({
			chunk_id: chunkIdFor(doc.title, chunkIndex),
			content,
			contextual_prefix: contextualPrefix,
			source_type: this.sourceType,
			book_title: doc.title,
			...(context.chapter !== undefined && { chapter: context.chapter }),
			...(context.section !== undefined && { section: context.section }),
			...(page !== undefined && { page }),
			chunk_index: chunkIndex,
		});
	}

	/**
	 * Batch chunk documents; indices restart at 0 for each document
	 */
	public chunkContents(contents: readonly ExtractedContent[]): Chunk[] {
		const chunks: Chunk[] = [];
		for (const content of contents) {
			for (const chunk of this.chunkContent(content)) {
				chunks.push(chunk);
			}
		}
		return chunks;
	}
}
