/**
 * Protected spans: fenced code blocks and markdown tables are swapped for
 * placeholder tokens before splitting and swapped back afterwards, so the
 * splitter treats each of them as one indivisible word.
 */

export type ProtectedKind = 'CODE_BLOCK' | 'TABLE';

/** placeholder -> original text, scoped to one document */
export type ProtectedBlocks = ReadonlyMap<string, string>;

export interface ProtectedText {
	text: string;
	blocks: ProtectedBlocks;
}

/** A fenced code block, fences included */
export const CODE_BLOCK_PATTERN = /```[\s\S]*?```/g;

/** Consecutive lines that start and end with a pipe (trailing newline excluded) */
const TABLE_PATTERN = /^\|[^\n]*\|[ \t]*(?:\n\|[^\n]*\|[ \t]*)*$/gm;

/** Matches every placeholder produced by {@link protect} */
export const PLACEHOLDER_PATTERN = /__(CODE_BLOCK|TABLE)_(\d+)__/g;

export function placeholderFor(kind: ProtectedKind, index: number): string {
	return `__${kind}_${index}__`;
}

/**
 * Replace protected spans with placeholders.
 * Code blocks go first so pipe-delimited lines inside code are never read as a table.
 */
export function protect(text: string): ProtectedText {
	const blocks = new Map<string, string>();

	const substitute = (kind: ProtectedKind) => (match: string): string => {
		const placeholder = placeholderFor(kind, blocks.size);
		// a table row may hold an inline fenced span that is already a placeholder
		blocks.set(placeholder, restore(match, blocks));
		return placeholder;
	};

	const withoutCode = text.replace(CODE_BLOCK_PATTERN, substitute('CODE_BLOCK'));
	const withoutTables = withoutCode.replace(TABLE_PATTERN, substitute('TABLE'));

	return { text: withoutTables, blocks };
}

/**
 * Length of `text` once its placeholders are restored
 */
export function restoredLength(blocks: ProtectedBlocks): (text: string) => number {
	return (text) => {
		let length = text.length;
		for (const match of text.matchAll(PLACEHOLDER_PATTERN)) {
			const original = blocks.get(match[0]);
			if (original !== undefined) {
				length += original.length - match[0].length;
			}
		}
		return length;
	};
}

/**
 * Put original spans back. Placeholders not in the map are left untouched,
 * and restored text is never rescanned.
 */
export function restore(text: string, blocks: ProtectedBlocks): string {
	if (blocks.size === 0) return text;
	return text.replace(PLACEHOLDER_PATTERN, (placeholder) => blocks.get(placeholder) ?? placeholder);
}
