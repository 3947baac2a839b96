/**
 * Document and chunk types for the ingestion pipeline
 */

/** Source documents are tagged so the contextual prefix can label them */
export type SourceType = 'book' | 'doc' | 'org' | 'procedure';

/**
 * A source document (an extracted book or manual)
 */
export interface Document {
	title: string;
	file_path?: string;
	total_pages: number;
	/** Level-1 header titles found by the extractor */
	chapters: string[];
}

/**
 * Extraction output handed to the chunker
 */
export interface ExtractedContent {
	document: Document;
	/** Full markdown-like text of the document */
	markdown_content: string;
	/** page number -> character offset where the page begins (advisory) */
	page_markers: ReadonlyMap<number, number>;
}

/**
 * A unit of document text ready for embedding.
 * Created once by the pipeline, never mutated afterwards.
 */
export interface Chunk {
	readonly chunk_id: string;
	readonly content: string;
	/** Empty when the prefix is computed on demand */
	readonly contextual_prefix: string;
	readonly source_type: SourceType;
	readonly book_title: string;
	readonly chapter?: string;
	readonly section?: string;
	readonly page?: number;
	readonly chunk_index: number;
}

/**
 * Per-segment structure detected by the metadata extractor (transient)
 */
export interface ChunkMetadata {
	chapter?: string;
	section?: string;
	subsection?: string;
	has_code: boolean;
	has_table: boolean;
	has_command: boolean;
}

/**
 * Running chapter/section state threaded through one document
 */
export interface DocumentContext {
	chapter?: string;
	section?: string;
}

/**
 * Chunk sizes in approximate tokens (4 characters ≈ 1 token)
 */
export interface ChunkingConfig {
	chunk_size: number;
	chunk_overlap: number;
	min_chunk_size: number;
}

/**
 * Contextual prefix options
 */
export interface ContextualConfig {
	include_source: boolean;
	include_chapter: boolean;
	include_section: boolean;
	include_page: boolean;
	separator: string;
	/** Characters, before the separator line */
	max_prefix_length: number;
}

/**
 * Per-chunk quality assessment (transient)
 */
export interface ChunkQualityMetrics {
	isCompleteSentence: boolean;
	hasSplitCodeBlock: boolean;
	hasSplitTable: boolean;
	hasGarbageChars: boolean;
	/** 0.0 - 1.0 */
	qualityScore: number;
	issues: string[];
}

export interface ChunkIssueEntry {
	chunkId: string;
	issues: string[];
	score: number;
}

export interface QualityReport {
	totalChunks: number;
	averageQualityScore: number;
	chunksWithIssues: number;
	/** Percent of chunks with at least one issue */
	issueRate: number;
	/** First entries only */
	issues: ChunkIssueEntry[];
	passed: boolean;
}
