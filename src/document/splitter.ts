/**
 * Recursive boundary splitter
 *
 * Splits on the most significant separator first and only falls back to
 * finer separators for text that separator cannot divide or for segments
 * that still exceed the budget. All functions are pure: the remaining
 * separator list is the only state carried between calls.
 *
 * Sizes go through a `Measure`, so placeholders count as the blocks they
 * stand for (see `restoredLength`).
 */

import { PLACEHOLDER_PATTERN } from './protector.js';

/** Size of a piece of text in characters */
export type Measure = (text: string) => number;

const plainLength: Measure = (text) => text.length;

/** Separators in priority order (most structurally significant first) */
export const DEFAULT_SEPARATORS: readonly string[] = [
	'\n## ',    // h2
	'\n### ',   // h3
	'\n#### ',  // h4
	'\n```',    // code fence boundary
	'\n\n',     // paragraph
	'\n',       // line
	' ',        // word (last resort before hard split)
];

/**
 * Split `text` into segments measuring at most `chunkSize`, or at most
 * `chunkSize` plus the one protected block a segment holds.
 *
 * Pieces between separator occurrences are merged greedily; when the next
 * piece does not fit, the current segment is closed (recursing with the
 * remaining separators if it is itself too large) and the next segment is
 * seeded with the overlap tail of the previous one.
 */
export function splitRecursive(
	text: string,
	chunkSize: number,
	overlap: number,
	separators: readonly string[] = DEFAULT_SEPARATORS,
	measure: Measure = plainLength,
): string[] {
	if (separators.length === 0) {
		return hardSplit(text, chunkSize, overlap, measure);
	}

	const [separator, ...remaining] = separators;
	const pieces = text.split(separator);

	if (pieces.length === 1) {
		return splitRecursive(text, chunkSize, overlap, remaining, measure);
	}

	const segments: string[] = [];
	const close = (segment: string, size: number): void => {
		if (!withinBudget(segment, size, chunkSize, measure)) {
			segments.push(...splitRecursive(segment, chunkSize, overlap, remaining, measure));
		} else {
			segments.push(segment);
		}
	};

	let current = '';
	let currentSize = 0;
	pieces.forEach((raw, i) => {
		const piece = i > 0 ? separator + raw : raw;
		const pieceSize = measure(piece);

		if (currentSize + pieceSize <= chunkSize) {
			current += piece;
			currentSize += pieceSize;
			return;
		}

		if (current) {
			close(current, currentSize);
		}

		const previous = segments[segments.length - 1];
		const tail = overlap > 0 && previous !== undefined ? overlapTail(previous, overlap, measure) : '';
		current = tail + piece;
		currentSize = measure(tail) + pieceSize;
	});

	if (current) {
		close(current, currentSize);
	}

	return segments;
}

/**
 * Last-resort split by size.
 *
 * Cuts where the budget runs out, backing off to the nearest preceding space
 * when that falls inside a word. A placeholder is never cut: the piece ends
 * before it, or, when it opens the piece, holds it alone past the budget.
 * The next piece starts with the overlap tail of the previous one.
 */
export function hardSplit(
	text: string,
	chunkSize: number,
	overlap: number,
	measure: Measure = plainLength,
): string[] {
	const pieces: string[] = [];
	let start = 0;

	while (start < text.length) {
		const cut = fitWithin(text, start, chunkSize, measure);
		const end = cut.end < text.length && !cut.atPlaceholder
			? backOffToSpace(text, start, cut.end)
			: cut.end;

		pieces.push(text.slice(start, end));

		if (end >= text.length) break;

		if (cut.atPlaceholder) {
			// nothing before a protected block is worth repeating next to it
			start = end;
			continue;
		}

		// progress guard: a backoff may leave less than `overlap` behind
		const next = overlap > 0 ? tailStart(text, start, end, overlap, measure) : end;
		start = next > start && next < end ? next : end;
	}

	return pieces;
}

/** Trailing part of a segment measuring at most `overlap`, never starting mid-placeholder */
export function overlapTail(segment: string, overlap: number, measure: Measure = plainLength): string {
	if (measure(segment) <= overlap) return segment;
	return segment.slice(tailStart(segment, 0, segment.length, overlap, measure));
}

/** Fits the budget, or exceeds it by no more than its single protected block */
function withinBudget(segment: string, size: number, chunkSize: number, measure: Measure): boolean {
	if (size <= chunkSize) return true;
	const placeholders = [...segment.matchAll(PLACEHOLDER_PATTERN)];
	return placeholders.length === 1 && size - measure(placeholders[0][0]) <= chunkSize;
}

interface Cut {
	end: number;
	/** the cut sits on a placeholder boundary */
	atPlaceholder: boolean;
}

/** Furthest end from `start` whose slice fits `budget` */
function fitWithin(text: string, start: number, budget: number, measure: Measure): Cut {
	let pos = start;
	let remaining = budget;

	for (const match of placeholdersFrom(text, start)) {
		const matchStart = match.index;
		const matchEnd = matchStart + match[0].length;
		if (matchStart - pos >= remaining) break;

		remaining -= matchStart - pos;
		const blockSize = measure(match[0]);
		if (blockSize > remaining) {
			return { end: matchStart > start ? matchStart : matchEnd, atPlaceholder: true };
		}
		remaining -= blockSize;
		pos = matchEnd;
	}

	return { end: Math.min(pos + remaining, text.length), atPlaceholder: false };
}

function backOffToSpace(text: string, start: number, end: number): number {
	const insideWord = text[end - 1] !== ' ' && text[end] !== ' ';
	if (insideWord) {
		const lastSpace = text.lastIndexOf(' ', end - 1);
		if (lastSpace > start) {
			return lastSpace;
		}
	}
	return end;
}

/**
 * Start of the overlap tail of text[from, to): about `overlap` characters,
 * moved past any placeholder it would start in or could not fit
 */
function tailStart(text: string, from: number, to: number, overlap: number, measure: Measure): number {
	let index = skipPlaceholderAt(text, Math.max(from, to - overlap));

	while (index < to && measure(text.slice(index, to)) > overlap) {
		const next = nextPlaceholderEnd(text, index, to);
		if (next === undefined) break;
		index = next;
	}
	return Math.min(index, to);
}

function* placeholdersFrom(text: string, start: number): Generator<RegExpExecArray> {
	const pattern = new RegExp(PLACEHOLDER_PATTERN.source, 'g');
	pattern.lastIndex = start;

	let match: RegExpExecArray | null;
	while ((match = pattern.exec(text)) !== null) {
		yield match;
	}
}

/** If `index` falls strictly inside a placeholder, move it past the placeholder */
function skipPlaceholderAt(text: string, index: number): number {
	for (const match of text.matchAll(PLACEHOLDER_PATTERN)) {
		const matchStart = match.index ?? 0;
		const matchEnd = matchStart + match[0].length;
		if (matchStart >= index) break;
		if (index < matchEnd) return matchEnd;
	}
	return index;
}

function nextPlaceholderEnd(text: string, from: number, to: number): number | undefined {
	for (const match of placeholdersFrom(text, from)) {
		const matchEnd = match.index + match[0].length;
		return matchEnd <= to ? matchEnd : undefined;
	}
	return undefined;
}
