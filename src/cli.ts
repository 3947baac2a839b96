#!/usr/bin/env node
/**
 * Chunk one extracted book, write chunks as JSON Lines, optionally index them
 *
 * Usage:
 *   techdoc-chunk --input book.md                       # chunks to stdout
 *   techdoc-chunk --input book.md --out chunks.jsonl --report
 *   techdoc-chunk --input book.md --pages book.pages.json --title "Windows Internals"
 *   techdoc-chunk --input book.md --index [--force]     # embed + upsert into Qdrant
 */

import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { parseCliArgs } from './cli-args.js';
import { getEnv } from './config/env.js';
import { getDefaultConfigPath, getProjectRoot, loadPipelineConfig } from './config/loader.js';
import { createChunker } from './document/chunker.js';
import { DocumentLoader } from './document/loader.js';
import { ContextualPreprocessor, ContextualPrefixBuilder } from './document/prefix.js';
import { validateChunks } from './document/quality.js';
import { createVoyageEmbedder } from './rag/embedder.js';
import { createIndexer } from './rag/indexer.js';
import { Logger, parseLogLevel } from './shared/logger.js';
import { createVoyageRateLimiter } from './shared/rate-limiter.js';
import type { Chunk } from './document/types.js';

async function indexChunks(
	chunks: Chunk[],
	preprocessor: ContextualPreprocessor,
	force: boolean,
	logger: Logger,
): Promise<void> {
	const env = getEnv();
	const embedder = createVoyageEmbedder({
		apiKey: env.VOYAGE_API_KEY,
		model: env.VOYAGE_EMBED_MODEL,
		rateLimiter: createVoyageRateLimiter(env.VOYAGE_RPM_LIMIT, env.VOYAGE_TPM_LIMIT, logger),
		logger,
	});

	const indexer = createIndexer({
		qdrantUrl: env.QDRANT_URL,
		qdrantApiKey: env.QDRANT_API_KEY,
		collection: env.QDRANT_COLLECTION,
		embedder,
		batchSize: env.BATCH_SIZE,
		preprocessor,
		checkpointPath: join(getProjectRoot(), 'checkpoints', `checkpoint-${env.QDRANT_COLLECTION}.json`),
		logger,
	});

	await indexer.initCollection(force);
	const stats = await indexer.indexChunks(chunks);
	logger.info(
		`Indexed ${stats.successCount} chunks, ${stats.skippedCount} skipped ` +
		`(${(stats.durationMs / 1000).toFixed(1)}s)`,
	);
}

async function main(): Promise<void> {
	const env = getEnv();
	const logger = new Logger({ level: parseLogLevel(env.LOG_LEVEL), prefix: 'CHUNK' });
	const args = parseCliArgs(process.argv.slice(2));

	const config = await loadPipelineConfig(args.config ?? env.PIPELINE_CONFIG ?? getDefaultConfigPath(), env);
	const loader = new DocumentLoader(logger.withPrefix('loader'));
	const content = await loader.loadFile(args.input, {
		title: args.title,
		pageMapPath: args.pages,
		cleanHtml: args.cleanHtml,
	});

	const chunker = createChunker(config, logger.withPrefix('chunker'));
	const chunks = [...chunker.chunkContent(content)];

	const jsonl = chunks.map(c => JSON.stringify(c)).join('\n') + (chunks.length > 0 ? '\n' : '');
	if (args.out) {
		await writeFile(args.out, jsonl, 'utf-8');
		logger.info(`Wrote ${chunks.length} chunks to ${args.out}`);
	} else {
		process.stdout.write(jsonl);
	}

	if (args.report) {
		const report = validateChunks(chunks);
		const log = report.passed ? logger.info.bind(logger) : logger.warn.bind(logger);
		log(`Quality ${report.passed ? 'passed' : 'failed'}: average ${report.averageQualityScore}`, { ...report });
	}

	if (args.index) {
		const preprocessor = new ContextualPreprocessor(new ContextualPrefixBuilder(config.contextual));
		await indexChunks(chunks, preprocessor, args.force, logger.withPrefix('indexer'));
	}
}

main().catch((err: unknown) => {
	const logger = new Logger({ prefix: 'CHUNK' });
	logger.error(err instanceof Error ? err.message : String(err), {
		...(err instanceof Error && { name: err.name }),
	});
	process.exit(1);
});
