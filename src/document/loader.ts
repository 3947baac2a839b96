/**
 * Loads extraction output (markdown + optional page map) from disk
 *
 * Layout for a book `windows-internals.md`:
 *   windows-internals.md          extracted markdown
 *   windows-internals.pages.json  optional { "<page>": <char offset> }
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ConfigError } from '../shared/errors.js';
import { createDefaultLogger, type Logger } from '../shared/logger.js';
import { formatZodError } from '../config/validate.js';
import { protect, restore } from './protector.js';
import { DEFAULT_CHARS_PER_PAGE, detectChapters, estimatePageMarkers } from './metadata.js';
import type { ExtractedContent } from './types.js';

const PAGE_MAP_SUFFIX = '.pages.json';

const pageMapSchema = z.record(
	z.string().regex(/^\d+$/, 'page keys must be positive integers'),
	z.number().int().nonnegative(),
);

/**
 * Strip HTML residue left by PDF-to-markdown converters.
 * Code blocks and tables are protected, so their contents are kept verbatim.
 */
export function cleanHtmlFromMarkdown(content: string): string {
	const { text, blocks } = protect(content);
	let cleaned = text;

	// nested spans (several passes)
	const MAX_NESTED_SPAN_PASSES = 5;
	for (let i = 0; i < MAX_NESTED_SPAN_PASSES; i++) {
		const prev = cleaned;
		cleaned = cleaned.replace(/<span[^>]*>([^<]*)<\/span>/g, '$1');
		if (cleaned === prev) break;
	}

	cleaned = cleaned.replace(/<\/?span[^>]*>/g, '');
	cleaned = cleaned.replace(/<br\s*\/?>/g, '\n');
	cleaned = cleaned.replace(/\s*style="[^"]*"/g, '');
	cleaned = cleaned.replace(/\s*class="[^"]*"/g, '');

	cleaned = cleaned.replace(/\n{3,}/g, '\n\n');
	cleaned = cleaned.replace(/ {2,}/g, ' ');

	return restore(cleaned, blocks).trim();
}

/**
 * Parse a page map object; pages must start at increasing offsets
 */
export function parsePageMap(raw: unknown, source = 'page map'): Map<number, number> {
	const result = pageMapSchema.safeParse(raw);
	if (!result.success) {
		throw new ConfigError(`Invalid ${source}:\n${formatZodError(result.error)}`);
	}

	const markers = new Map(
		Object.entries(result.data)
			.map(([page, offset]): [number, number] => [Number(page), offset])
			.sort(([a], [b]) => a - b),
	);

	let previous = -1;
	for (const [page, offset] of markers) {
		if (offset < previous) {
			throw new ConfigError(`Invalid ${source}: page ${page} starts before the previous page`);
		}
		previous = offset;
	}
	return markers;
}

export interface LoadOptions {
	/** Defaults to the file name without extension */
	title?: string;
	/** Explicit page map file, otherwise `<name>.pages.json` next to the markdown */
	pageMapPath?: string;
	/** Used when no page map exists */
	charsPerPage?: number;
	cleanHtml?: boolean;
}

export class DocumentLoader {
	private readonly logger: Logger;

	constructor(logger?: Logger) {
		this.logger = logger ?? createDefaultLogger('document:loader');
	}

	async loadFile(filePath: string, options: LoadOptions = {}): Promise<ExtractedContent> {
		let content = await fs.readFile(filePath, 'utf-8');
		if (options.cleanHtml) {
			content = cleanHtmlFromMarkdown(content);
		}

		const title = options.title ?? path.basename(filePath, path.extname(filePath));
		const pageMarkers = await this.loadPageMarkers(filePath, content, options);

		return {
			document: {
				title,
				file_path: filePath,
				total_pages: pageMarkers.size,
				chapters: detectChapters(content),
			},
			markdown_content: content,
			page_markers: pageMarkers,
		};
	}

	private async loadPageMarkers(
		filePath: string,
		content: string,
		options: LoadOptions,
	): Promise<Map<number, number>> {
		const explicit = options.pageMapPath !== undefined;
		const mapPath = options.pageMapPath ?? sidecarPath(filePath);

		let raw: string;
		try {
			raw = await fs.readFile(mapPath, 'utf-8');
		} catch (err) {
			if (explicit) {
				throw new ConfigError(
					`Cannot read page map ${mapPath}`,
					err instanceof Error ? err : undefined,
				);
			}
			this.logger.debug(`No page map for ${filePath}, estimating pages`);
			return estimatePageMarkers(content, options.charsPerPage ?? DEFAULT_CHARS_PER_PAGE);
		}

		let parsed: unknown;
		try {
			parsed = JSON.parse(raw);
		} catch (err) {
			throw new ConfigError(
				`Page map ${mapPath} is not valid JSON`,
				err instanceof Error ? err : undefined,
			);
		}
		return parsePageMap(parsed, `page map ${mapPath}`);
	}

	/**
	 * Load every `.md` file under a directory (recursive, sorted for determinism)
	 */
	public async *loadDirectory(dir: string, options: Omit<LoadOptions, 'title' | 'pageMapPath'> = {}): AsyncGenerator<ExtractedContent> {
		const files = await this.findFiles(dir, '.md');
		for (const filePath of files) {
			yield await this.loadFile(filePath, options);
		}
	}

	private async findFiles(dir: string, ext: string): Promise<string[]> {
		const files: string[] = [];
		const entries = await fs.readdir(dir, { withFileTypes: true });

		for (const entry of entries) {
			const fullPath = path.join(dir, entry.name);

			if (entry.isDirectory()) {
				files.push(...await this.findFiles(fullPath, ext));
			} else if (entry.isFile() && entry.name.endsWith(ext)) {
				files.push(fullPath);
			}
		}

		return files.sort();
	}
}

function sidecarPath(filePath: string): string {
	const ext = path.extname(filePath);
	return filePath.slice(0, filePath.length - ext.length) + PAGE_MAP_SUFFIX;
}
