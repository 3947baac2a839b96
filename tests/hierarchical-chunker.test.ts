import { describe, it, expect } from 'vitest';
import { HierarchicalChunker } from '../src/document/chunkers/hierarchical.js';
import { chunkIdFor, createChunker } from '../src/document/chunker.js';
import { resolvePipelineConfig } from '../src/config/loader.js';
import { ConfigError } from '../src/shared/errors.js';
import { capturingLogger, makeContent, paragraph, silentLogger } from './helpers.js';

/** 200-char segments, no overlap, 20-char minimum */
function smallChunker(overrides: { chunk_overlap?: number; min_chunk_size?: number } = {}): HierarchicalChunker {
	return new HierarchicalChunker({
		chunking: { chunk_size: 50, chunk_overlap: 0, min_chunk_size: 5, ...overrides },
		logger: silentLogger(),
	});
}

const A = paragraph('a');
const B = paragraph('b');
const C = paragraph('c');
const BOOK = `# Chapter One\n\n## Alpha\n\n${A}\n\n${B}\n## Beta\n\n${C}`;

describe('HierarchicalChunker', () => {
	it('yields nothing for empty or whitespace-only content', () => {
		const chunker = smallChunker();
		expect([...chunker.chunkContent(makeContent(''))]).toEqual([]);
		expect([...chunker.chunkContent(makeContent('  \n\n\t '))]).toEqual([]);
	});

	it('splits along headers and paragraphs with the running context', () => {
		const chunks = [...smallChunker().chunkContent(makeContent(BOOK))];

		expect(chunks.map(c => c.content)).toEqual([`## Alpha\n\n${A}`, B, `## Beta\n\n${C}`]);
		expect(chunks.map(c => [c.chapter, c.section])).toEqual([
			['Chapter One', 'Alpha'],
			['Chapter One', 'Alpha'],
			['Chapter One', 'Beta'],
		]);
		expect(chunks.map(c => c.chunk_id)).toEqual(['test_manual_0000', 'test_manual_0001', 'test_manual_0002']);
		expect(chunks.map(c => c.chunk_index)).toEqual([0, 1, 2]);
	});

	it('builds the contextual prefix from the running context', () => {
		const [first] = smallChunker().chunkContent(makeContent(BOOK, 'Windows Internals'));
		expect(first.contextual_prefix).toBe('Source: Windows Internals\nChapter: Chapter One\nSection: Alpha\n---\n');
		expect(first.book_title).toBe('Windows Internals');
		expect(first.source_type).toBe('book');
	});

	it('leaves chapter and section undefined without headers', () => {
		const text = `${A}\n\n${B}\n\n${C}`;
		const chunks = [...smallChunker().chunkContent(makeContent(text))];

		expect(chunks).toHaveLength(3);
		for (const chunk of chunks) {
			expect(chunk.chapter).toBeUndefined();
			expect(chunk.section).toBeUndefined();
			expect(chunk.contextual_prefix).toBe('Source: Test Manual\n---\n');
		}
	});

	it('estimates pages from page markers', () => {
		const markers = new Map([[1, 0], [2, BOOK.indexOf('## Beta')]]);
		const chunks = [...smallChunker().chunkContent(makeContent(BOOK, 'Test Manual', markers))];
		expect(chunks.map(c => c.page)).toEqual([1, 1, 2]);
	});

	it('omits the page without page markers', () => {
		const chunks = [...smallChunker().chunkContent(makeContent(BOOK))];
		expect(chunks.every(c => c.page === undefined)).toBe(true);
	});

	it('adds the page to the prefix when enabled', () => {
		const chunker = new HierarchicalChunker({
			chunking: { chunk_size: 50, chunk_overlap: 0, min_chunk_size: 5 },
			contextual: { include_page: true },
			logger: silentLogger(),
		});
		const markers = new Map([[1, 0], [2, BOOK.indexOf('## Beta')]]);
		const chunks = [...chunker.chunkContent(makeContent(BOOK, 'Test Manual', markers))];

		expect(chunks[2].contextual_prefix).toBe('Source: Test Manual\nChapter: Chapter One\nSection: Beta\nPage: 2\n---\n');
	});

	it('drops segments below the minimum size', () => {
		expect([...smallChunker().chunkContent(makeContent('# T\n\nshort'))]).toEqual([]);
	});

	it('keeps a code block larger than the budget in one chunk', () => {
		const code = '```bash\n' + Array.from({ length: 10 }, (_, i) => `vol.py -f mem.raw windows.pslist --pid ${1000 + i}`).join('\n') + '\n```';
		const P1 = paragraph('p');
		const P2 = paragraph('q');
		const text = `# Guide\n\n${P1}\n\n${code}\n\n${P2}`;

		const chunks = [...smallChunker({ chunk_overlap: 10 }).chunkContent(makeContent(text))];

		expect(chunks.map(c => c.content)).toEqual([
			`# Guide\n\n${P1}`,
			`${P1.slice(-40)}\n\n${code}`,
			P2,
		]);
		for (const chunk of chunks) {
			expect((chunk.content.split('```').length - 1) % 2).toBe(0);
			expect(chunk.content).not.toContain('__CODE_BLOCK_');
		}
	});

	it('keeps a table in one chunk', () => {
		const table = '| Plugin | Purpose |\n|---|---|\n| pslist | processes |\n| psscan | pool scanning |';
		const P1 = paragraph('p');
		const P2 = paragraph('q');
		const text = `# Guide\n\n${P1}\n\n${table}\n\n${P2}`;

		const chunks = [...smallChunker().chunkContent(makeContent(text))];

		expect(chunks.map(c => c.content)).toEqual([`# Guide\n\n${P1}`, table, P2]);
	});

	it('budgets protected blocks at their full length', () => {
		const blocks = ['x', 'y', 'z'].map(ch => '```\n' + ch.repeat(72) + '\n```');
		const chunks = [...smallChunker().chunkContent(makeContent(blocks.join('\n\n')))];

		expect(chunks.map(c => c.content)).toEqual([`${blocks[0]}\n\n${blocks[1]}`, blocks[2]]);
		expect(chunks.every(c => c.content.length <= 200)).toBe(true);
	});

	it('gives each oversized block its own chunk', () => {
		const blocks = ['1', '2', '3', '4'].map(ch => '```bash\n' + ch.repeat(280) + '\n```');
		const chunks = [...smallChunker().chunkContent(makeContent(blocks.join('\n\n')))];

		expect(chunks.map(c => c.content)).toEqual(blocks);
		expect(chunks.every(c => c.content.length <= 200 + 292)).toBe(true);
	});

	it('does not read comments inside code as chapter headers', () => {
		const code = '```bash\n# list processes\nvol.py -f mem.raw windows.pslist\n```';
		const P1 = paragraph('p');
		const P2 = paragraph('q');
		const text = `# Memory Analysis\n\n${P1}\n\n${code}\n\n${P2}`;

		const chunks = [...smallChunker().chunkContent(makeContent(text))];

		expect(chunks.map(c => c.content)).toEqual([`# Memory Analysis\n\n${P1}`, code, P2]);
		expect(chunks.map(c => c.chapter)).toEqual(['Memory Analysis', 'Memory Analysis', 'Memory Analysis']);
		expect(chunks[1].contextual_prefix).toBe('Source: Test Manual\nChapter: Memory Analysis\n---\n');
	});

	it('hard-splits text without any separator', () => {
		const text = Array.from({ length: 1000 }, (_, i) => String.fromCharCode(97 + (i % 26))).join('');
		const chunker = new HierarchicalChunker({
			chunking: { chunk_size: 25, chunk_overlap: 5, min_chunk_size: 1 },
			logger: silentLogger(),
		});
		const chunks = [...chunker.chunkContent(makeContent(text))];

		expect(chunks).toHaveLength(13);
		expect(chunks.every(c => c.content.length <= 100)).toBe(true);
		expect(chunks[12].content).toBe(text.slice(960));
	});

	it('is deterministic and restartable', () => {
		const chunker = smallChunker({ chunk_overlap: 10 });
		const content = makeContent(BOOK);

		const first = [...chunker.chunkContent(content)];
		const second = [...chunker.chunkContent(content)];
		expect(second).toEqual(first);

		const generator = chunker.chunkContent(content);
		expect(generator.next().value).toEqual(first[0]);
	});

	it('returns frozen chunks', () => {
		const [chunk] = smallChunker().chunkContent(makeContent(BOOK));
		expect(Object.isFrozen(chunk)).toBe(true);
	});

	it('restarts indices for each document in a batch', () => {
		const chunker = smallChunker();
		const chunks = chunker.chunkContents([makeContent(BOOK, 'First Book'), makeContent(BOOK, 'Second Book')]);

		expect(chunks).toHaveLength(6);
		expect(chunks[3].chunk_id).toBe('second_book_0000');
		expect(chunks[3].chunk_index).toBe(0);
	});

	it('logs a summary of the run', () => {
		const { logger, entries } = capturingLogger();
		const chunker = new HierarchicalChunker({
			chunking: { chunk_size: 50, chunk_overlap: 0, min_chunk_size: 5 },
			logger,
		});
		[...chunker.chunkContent(makeContent(BOOK))];

		expect(entries()).toContainEqual(expect.objectContaining({
			level: 'INFO',
			msg: 'Created 3 chunks from Test Manual',
			segments: 4,
			protected_blocks: 0,
			dropped: 1,
		}));
	});

	it('rejects overlap not smaller than the chunk size', () => {
		expect(() => new HierarchicalChunker({ chunking: { chunk_size: 100, chunk_overlap: 100 } }))
			.toThrow(ConfigError);
	});

	it('rejects a minimum larger than the chunk size', () => {
		expect(() => new HierarchicalChunker({ chunking: { chunk_size: 50, chunk_overlap: 10, min_chunk_size: 60 } }))
			.toThrow(/min_chunk_size/);
	});

	it('rejects non-integer sizes', () => {
		expect(() => new HierarchicalChunker({ chunking: { chunk_size: 12.5 } })).toThrow(ConfigError);
	});

	it('rejects a prefix length with no room for the ellipsis', () => {
		expect(() => new HierarchicalChunker({ contextual: { max_prefix_length: 2 } })).toThrow(ConfigError);
	});
});

describe('createChunker', () => {
	it('applies the resolved pipeline config', () => {
		const config = resolvePipelineConfig({
			chunking: { chunk_size: 50, chunk_overlap: 0, min_chunk_size: 5 },
			source_type: 'doc',
		});
		const chunker = createChunker(config, silentLogger());
		const [first] = chunker.chunkContent(makeContent(BOOK, 'Admin Guide'));

		expect(chunker.config).toEqual({ chunk_size: 50, chunk_overlap: 0, min_chunk_size: 5 });
		expect(first.source_type).toBe('doc');
		expect(first.contextual_prefix).toBe('Document: Admin Guide\nChapter: Chapter One\nSection: Alpha\n---\n');
	});
});

describe('chunkIdFor', () => {
	it('slugs the title and pads the index', () => {
		expect(chunkIdFor('Windows Internals', 0)).toBe('windows_internals_0000');
		expect(chunkIdFor(' The  Art of Memory\tForensics ', 42)).toBe('the_art_of_memory_forensics_0042');
		expect(chunkIdFor('Big', 12345)).toBe('big_12345');
	});
});
