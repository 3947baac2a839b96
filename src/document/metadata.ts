/**
 * Structural metadata for restored segments, the running chapter/section
 * context, and page estimation
 */

import { CODE_BLOCK_PATTERN } from './protector.js';
import type { ChunkMetadata, DocumentContext } from './types.js';

const CHAPTER_PATTERN = /^#[ \t]+(.+?)[ \t]*$/m;
const SECTION_PATTERN = /^##[ \t]+(.+?)[ \t]*$/m;
const SUBSECTION_PATTERN = /^###[ \t]+(.+?)[ \t]*$/m;

/** Markdown table header-separator row, e.g. `|---|:--:|` */
export const TABLE_SEPARATOR_PATTERN = /^\|[ \t]*:?-+:?[ \t]*(?:\|[ \t]*:?-+:?[ \t]*)*\|?[ \t]*$/m;

/** Memory forensics tool invocations (Volatility 2 / 3) */
export const DEFAULT_COMMAND_PATTERN = /vol\.py|vol\s+-f|volatility/i;

/** Chapter titles longer than this are treated as body text */
const MAX_CHAPTER_TITLE_LENGTH = 100;
const MAX_DETECTED_CHAPTERS = 50;

/** Default page size used when the extractor provides no page markers */
export const DEFAULT_CHARS_PER_PAGE = 3000;

function firstHeader(pattern: RegExp, text: string): string | undefined {
	const title = pattern.exec(text)?.[1]?.trim();
	return title ? title : undefined;
}

/**
 * Detect the first h1/h2/h3 titles and content-type flags of one segment.
 * Lines inside fenced code (shell comments, preprocessor directives) are not headers.
 */
export function extractMetadata(
	segment: string,
	commandPattern: RegExp = DEFAULT_COMMAND_PATTERN,
): ChunkMetadata {
	const prose = segment.replace(CODE_BLOCK_PATTERN, '');
	return {
		chapter: firstHeader(CHAPTER_PATTERN, prose),
		section: firstHeader(SECTION_PATTERN, prose),
		subsection: firstHeader(SUBSECTION_PATTERN, prose),
		has_code: segment.includes('```'),
		has_table: TABLE_SEPARATOR_PATTERN.test(segment),
		has_command: commandPattern.test(segment),
	};
}

/**
 * Fold one segment's headers into the running context.
 *
 * A new chapter without its own section clears the inherited section,
 * since that section belonged to the previous chapter.
 */
export function advanceContext(previous: DocumentContext, metadata: ChunkMetadata): DocumentContext {
	const chapterChanged = metadata.chapter !== undefined && metadata.chapter !== previous.chapter;
	return {
		chapter: metadata.chapter ?? previous.chapter,
		section: metadata.section ?? (chapterChanged ? undefined : previous.section),
	};
}

/**
 * Page containing `offset`: the highest page whose start offset is <= offset.
 * Page 1 when the offset precedes every marker, undefined without markers.
 */
export function estimatePage(offset: number, pageMarkers: ReadonlyMap<number, number>): number | undefined {
	if (pageMarkers.size === 0) return undefined;

	const sorted = [...pageMarkers.entries()].sort(([a], [b]) => a - b);
	let current = 1;
	for (const [page, start] of sorted) {
		if (offset < start) break;
		current = page;
	}
	return current;
}

/**
 * Synthetic page markers: page N begins at (N - 1) * charsPerPage
 */
export function estimatePageMarkers(text: string, charsPerPage = DEFAULT_CHARS_PER_PAGE): Map<number, number> {
	const markers = new Map<number, number>();
	for (let pos = 0, page = 1; pos < text.length; pos += charsPerPage, page++) {
		markers.set(page, pos);
	}
	return markers;
}

/**
 * Level-1 header titles, as a document's chapter list
 */
export function detectChapters(text: string): string[] {
	const chapters: string[] = [];
	for (const match of text.matchAll(/^#[ \t]+(.+?)[ \t]*$/gm)) {
		const title = match[1].trim();
		if (title.length < MAX_CHAPTER_TITLE_LENGTH) {
			chapters.push(title);
		}
	}
	return chapters.slice(0, MAX_DETECTED_CHAPTERS);
}
