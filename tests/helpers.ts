/**
 * Test fixtures shared across suites
 */

import { Logger, LogLevel } from '../src/shared/logger.js';
import type { Chunk, ExtractedContent } from '../src/document/types.js';

/** Logger that discards everything */
export function silentLogger(): Logger {
	return new Logger({ level: LogLevel.ERROR, stream: { write: () => true } });
}

/** Logger that records JSON lines */
export function capturingLogger(level: LogLevel = LogLevel.DEBUG): { logger: Logger; entries: () => Array<Record<string, unknown>> } {
	const lines: string[] = [];
	const logger = new Logger({ level, stream: { write: (chunk: string) => lines.push(chunk) } });
	return {
		logger,
		entries: () => lines.map((line): Record<string, unknown> => JSON.parse(line)),
	};
}

export function makeContent(
	text: string,
	title = 'Test Manual',
	pageMarkers: ReadonlyMap<number, number> = new Map(),
): ExtractedContent {
	return {
		document: { title, total_pages: pageMarkers.size, chapters: [] },
		markdown_content: text,
		page_markers: pageMarkers,
	};
}

export function makeChunk(content: string, overrides: Partial<Chunk> = {}): Chunk {
	return {
		chunk_id: 'test_manual_0000',
		content,
		contextual_prefix: '',
		source_type: 'book',
		book_title: 'Test Manual',
		chunk_index: 0,
		...overrides,
	};
}

/** n-character paragraph without spaces or newlines, ending in a period */
export function paragraph(letter: string, length = 150): string {
	return letter.repeat(length - 1) + '.';
}
