/**
 * Hierarchical chunker for extracted technical books
 *
 * Strategy:
 * 1. Protect code blocks and tables (placeholders)
 * 2. Split along the separator hierarchy h2 > h3 > h4 > fence > paragraph > line > word,
 *    hard split as last resort, with overlap between segments
 * 3. Restore protected spans, drop segments below the minimum size
 * 4. Carry chapter/section forward and build the contextual prefix
 */

import { BaseChunker, type ChunkerOptions } from './base.js';
import { protect, restore, restoredLength } from '../protector.js';
import { DEFAULT_SEPARATORS, splitRecursive } from '../splitter.js';
import {
	DEFAULT_COMMAND_PATTERN,
	advanceContext,
	estimatePage,
	extractMetadata,
} from '../metadata.js';
import type { Chunk, DocumentContext, ExtractedContent } from '../types.js';

/** Characters of a chunk used to find it again in the source text */
const LOCATE_PREFIX_LENGTH = 100;

export interface HierarchicalChunkerOptions extends ChunkerOptions {
	/** Separator hierarchy, most significant first */
	separators?: readonly string[];
	/** Pattern flagging command-like text in chunk metadata */
	commandPattern?: RegExp;
}

export class HierarchicalChunker extends BaseChunker {
	private readonly separators: readonly string[];
	private readonly commandPattern: RegExp;

	constructor(options: HierarchicalChunkerOptions = {}) {
		super(options);
		this.separators = options.separators ?? DEFAULT_SEPARATORS;
		this.commandPattern = options.commandPattern ?? DEFAULT_COMMAND_PATTERN;
	}

	public *chunkContent(content: ExtractedContent): Generator<Chunk> {
		const { document } = content;
		const text = content.markdown_content;

		if (!text.trim()) {
			this.logger.debug(`Empty document: ${document.title}`);
			return;
		}

		const { text: protectedText, blocks } = protect(text);
		const segments = splitRecursive(
			protectedText,
			this.budget.chunkSizeChars,
			this.budget.overlapChars,
			this.separators,
			restoredLength(blocks),
		);

		let context: DocumentContext = {};
		let chunkIndex = 0;
		let dropped = 0;
		let searchFrom = 0;

		for (const segment of segments) {
			const restored = restore(segment, blocks);
			const trimmed = restored.trim();

			// headers of a dropped segment still open a chapter/section
			const metadata = extractMetadata(restored, this.commandPattern);
			context = advanceContext(context, metadata);

			if (trimmed.length === 0 || trimmed.length < this.budget.minChunkChars) {
				dropped++;
				continue;
			}

			const offset = locate(text, trimmed, searchFrom);
			searchFrom = offset;

			yield this.createChunk(
				document,
				chunkIndex,
				trimmed,
				context,
				estimatePage(offset, content.page_markers),
			);
			chunkIndex++;
		}

		this.logger.info(`Created ${chunkIndex} chunks from ${document.title}`, {
			segments: segments.length,
			protected_blocks: blocks.size,
			dropped,
		});
	}
}

/**
 * Approximate offset of a chunk in the source text. Searches forward from the
 * previous chunk first, since chunks are emitted in document order.
 */
function locate(text: string, chunk: string, searchFrom: number): number {
	const head = chunk.slice(0, LOCATE_PREFIX_LENGTH);
	const forward = text.indexOf(head, searchFrom);
	if (forward >= 0) return forward;
	const anywhere = text.indexOf(head);
	return anywhere >= 0 ? anywhere : searchFrom;
}
