/**
 * Post-hoc chunk quality checks
 *
 * Issues are reported as values; nothing here throws.
 */

import { TABLE_SEPARATOR_PATTERN } from './metadata.js';
import type { Chunk, ChunkIssueEntry, ChunkQualityMetrics, QualityReport } from './types.js';

const TERMINAL_ENDINGS = ['.', '!', '?', ':', '```', '|'];
const CODE_FENCE = '```';
const GARBAGE_PATTERN = /[\x00-\x08\x0b\x0c\x0e-\x1f\x7f-\x9f]/;

/** Score deductions per issue */
export const QUALITY_PENALTIES = {
	incompleteSentence: 0.1,
	splitCodeBlock: 0.3,
	splitTable: 0.2,
	garbageChars: 0.2,
} as const;

/** Minimum average score for a batch to pass */
export const MIN_PASSING_SCORE = 0.9;

/** Issue listings in a report are capped to this many entries */
export const MAX_REPORTED_ISSUES = 20;

function round(value: number, digits: number): number {
	const factor = 10 ** digits;
	return Math.round(value * factor) / factor;
}

function countOccurrences(text: string, needle: string): number {
	return text.split(needle).length - 1;
}

export function validateChunk(chunk: Chunk): ChunkQualityMetrics {
	const content = chunk.content;
	const issues: string[] = [];

	const trimmedEnd = content.trimEnd();
	const isCompleteSentence = trimmedEnd === '' || TERMINAL_ENDINGS.some((ending) => trimmedEnd.endsWith(ending));
	if (!isCompleteSentence) {
		issues.push('Chunk may end mid-sentence');
	}

	const hasSplitCodeBlock = countOccurrences(content, CODE_FENCE) % 2 !== 0;
	if (hasSplitCodeBlock) {
		issues.push('Code block may be split');
	}

	const hasSplitTable = content.trim().startsWith('|') && !TABLE_SEPARATOR_PATTERN.test(content);
	if (hasSplitTable) {
		issues.push('Table may be split');
	}

	const hasGarbageChars = GARBAGE_PATTERN.test(content);
	if (hasGarbageChars) {
		issues.push('Contains garbage characters');
	}

	let score = 1.0;
	if (!isCompleteSentence) score -= QUALITY_PENALTIES.incompleteSentence;
	if (hasSplitCodeBlock) score -= QUALITY_PENALTIES.splitCodeBlock;
	if (hasSplitTable) score -= QUALITY_PENALTIES.splitTable;
	if (hasGarbageChars) score -= QUALITY_PENALTIES.garbageChars;

	return {
		isCompleteSentence,
		hasSplitCodeBlock,
		hasSplitTable,
		hasGarbageChars,
		qualityScore: round(Math.max(0, score), 3),
		issues,
	};
}

/**
 * Batch report: mean score, chunks with issues, pass/fail
 */
export function validateChunks(chunks: readonly Chunk[]): QualityReport {
	const total = chunks.length;
	const issues: ChunkIssueEntry[] = [];
	let totalScore = 0;

	for (const chunk of chunks) {
		const metrics = validateChunk(chunk);
		totalScore += metrics.qualityScore;

		if (metrics.issues.length > 0) {
			issues.push({
				chunkId: chunk.chunk_id,
				issues: metrics.issues,
				score: metrics.qualityScore,
			});
		}
	}

	const average = total > 0 ? round(totalScore / total, 3) : 0;

	return {
		totalChunks: total,
		averageQualityScore: average,
		chunksWithIssues: issues.length,
		issueRate: total > 0 ? round((issues.length / total) * 100, 1) : 0,
		issues: issues.slice(0, MAX_REPORTED_ISSUES),
		passed: average >= MIN_PASSING_SCORE,
	};
}
