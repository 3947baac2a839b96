/**
 * Contextual prefixes
 *
 * A short header (source, chapter, section, page) prepended to chunk content
 * before embedding, so each vector carries document-level context.
 */

import type { Chunk, ContextualConfig, SourceType } from './types.js';

export const DEFAULT_CONTEXTUAL_CONFIG: Readonly<ContextualConfig> = {
	include_source: true,
	include_chapter: true,
	include_section: true,
	include_page: false,
	separator: '---',
	max_prefix_length: 200,
};

const SOURCE_LABELS: Record<SourceType, string> = {
	book: 'Source',
	doc: 'Document',
	org: 'Organization Knowledge',
	procedure: 'Procedure',
};

const ELLIPSIS = '...';

export interface PrefixFields {
	source?: string;
	chapter?: string;
	section?: string;
	page?: number;
	sourceType?: SourceType;
}

export class ContextualPrefixBuilder {
	readonly config: Readonly<ContextualConfig>;

	constructor(config: Partial<ContextualConfig> = {}) {
		this.config = { ...DEFAULT_CONTEXTUAL_CONFIG, ...config };
	}

	/**
	 * Newline-joined `Label: value` lines followed by the separator line,
	 * or '' when no field is both enabled and present
	 */
	build(fields: PrefixFields): string {
		const { config } = this;
		const lines: string[] = [];

		if (config.include_source && fields.source) {
			lines.push(`${sourceLabel(fields.sourceType)}: ${fields.source}`);
		}
		if (config.include_chapter && fields.chapter) {
			lines.push(`Chapter: ${fields.chapter}`);
		}
		if (config.include_section && fields.section) {
			lines.push(`Section: ${fields.section}`);
		}
		if (config.include_page && fields.page) {
			lines.push(`Page: ${fields.page}`);
		}

		if (lines.length === 0) return '';

		let prefix = lines.join('\n');
		if (prefix.length > config.max_prefix_length) {
			prefix = prefix.slice(0, config.max_prefix_length - ELLIPSIS.length) + ELLIPSIS;
		}

		return `${prefix}\n${config.separator}\n`;
	}

	/** Prefix computed from a chunk's own fields */
	buildForChunk(chunk: Chunk): string {
		return this.build({
			source: chunk.book_title,
			chapter: chunk.chapter,
			section: chunk.section,
			page: chunk.page,
			sourceType: chunk.source_type,
		});
	}
}

export function sourceLabel(sourceType: SourceType | undefined): string {
	return (sourceType && SOURCE_LABELS[sourceType]) ?? SOURCE_LABELS.book;
}

/**
 * Chunk-level helpers on top of the builder
 */
export class ContextualPreprocessor {
	readonly builder: ContextualPrefixBuilder;

	constructor(builder: ContextualPrefixBuilder = new ContextualPrefixBuilder()) {
		this.builder = builder;
	}

	/** Same chunk if it already has a prefix, otherwise a new chunk carrying one */
	preprocessChunk(chunk: Chunk): Chunk {
		if (chunk.contextual_prefix) {
			return chunk;
		}
		return { ...chunk, contextual_prefix: this.builder.buildForChunk(chunk) };
	}

	*preprocessChunks(chunks: Iterable<Chunk>): Generator<Chunk> {
		for (const chunk of chunks) {
			yield this.preprocessChunk(chunk);
		}
	}

	/** Prefix + content, the literal text handed to the embedder */
	getTextForEmbedding(chunk: Chunk): string {
		const prefix = chunk.contextual_prefix || this.builder.buildForChunk(chunk);
		return `${prefix}${chunk.content}`;
	}
}

export interface PreprocessStats {
	totalProcessed: number;
	withExistingPrefix: number;
	prefixAdded: number;
}

function emptyStats(): PreprocessStats {
	return { totalProcessed: 0, withExistingPrefix: 0, prefixAdded: 0 };
}

/**
 * Array-at-a-time preprocessing with running counters
 */
export class BatchPreprocessor {
	private stats: PreprocessStats = emptyStats();

	constructor(readonly preprocessor: ContextualPreprocessor = new ContextualPreprocessor()) {}

	processBatch(chunks: readonly Chunk[], updateStats = true): Chunk[] {
		return chunks.map((chunk) => {
			const hadPrefix = chunk.contextual_prefix !== '';
			const processed = this.preprocessor.preprocessChunk(chunk);

			if (updateStats) {
				this.stats.totalProcessed++;
				if (hadPrefix) {
					this.stats.withExistingPrefix++;
				} else {
					this.stats.prefixAdded++;
				}
			}
			return processed;
		});
	}

	getEmbeddingTexts(chunks: readonly Chunk[]): string[] {
		return chunks.map((chunk) => this.preprocessor.getTextForEmbedding(chunk));
	}

	getStats(): PreprocessStats {
		return { ...this.stats };
	}

	resetStats(): void {
		this.stats = emptyStats();
	}
}
