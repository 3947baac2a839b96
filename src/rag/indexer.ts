/**
 * Chunk indexer
 *
 * Embeds prefix + content of each chunk and upserts it with its citation
 * metadata. Checkpointing lets an interrupted run resume after the last
 * stored batch.
 */

import { promises as fs } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import { ContextualPreprocessor } from '../document/prefix.js';
import type { Chunk } from '../document/types.js';
import { Logger } from '../shared/logger.js';
import type { ChunkEmbedder } from './embedder.js';
import { BM25_MODEL, QdrantClient, type UpsertPoint, type VectorStore } from './qdrant-client.js';

export interface IndexerConfig {
	store: VectorStore;
	collection: string;
	embedder: ChunkEmbedder;
	batchSize: number;
	/** Points per upsert call (payloads carry full text) */
	upsertBatchSize?: number;
	preprocessor?: ContextualPreprocessor;
	checkpointPath?: string;
	logger?: Logger;
}

export interface IndexStats {
	totalChunks: number;
	successCount: number;
	skippedCount: number;
	durationMs: number;
}

const checkpointSchema = z.object({
	lastProcessedId: z.string().nullable(),
	timestamp: z.number(),
});

export type CheckpointData = z.infer<typeof checkpointSchema>;

const EMPTY_CHECKPOINT: CheckpointData = { lastProcessedId: null, timestamp: 0 };

/**
 * Payload stored with each point; mirrors the Chunk fields used for citation
 */
export function chunkPayload(chunk: Chunk): Record<string, unknown> {
	return {
		content: chunk.content,
		contextual_prefix: chunk.contextual_prefix,
		source_type: chunk.source_type,
		book_title: chunk.book_title,
		chapter: chunk.chapter ?? null,
		section: chunk.section ?? null,
		page: chunk.page ?? null,
		chunk_index: chunk.chunk_index,
	};
}

export class ChunkIndexer {
	private readonly store: VectorStore;
	private readonly embedder: ChunkEmbedder;
	private readonly collection: string;
	private readonly batchSize: number;
	private readonly upsertBatchSize: number;
	private readonly preprocessor: ContextualPreprocessor;
	private readonly checkpointPath: string | undefined;
	private readonly logger: Logger;

	constructor(config: IndexerConfig) {
		this.store = config.store;
		this.embedder = config.embedder;
		this.collection = config.collection;
		this.batchSize = config.batchSize;
		this.upsertBatchSize = config.upsertBatchSize ?? 32;
		this.preprocessor = config.preprocessor ?? new ContextualPreprocessor();
		this.checkpointPath = config.checkpointPath;
		this.logger = config.logger ?? new Logger();
	}

	async initCollection(forceRecreate = false): Promise<void> {
		const exists = await this.store.collectionExists(this.collection);

		if (exists && forceRecreate) {
			this.logger.warn(`Recreating collection: ${this.collection}`);
			await this.store.deleteCollection(this.collection);
		}

		if (!exists || forceRecreate) {
			this.logger.info(`Creating collection: ${this.collection}`);
			await this.store.createCollection(this.collection, this.embedder.getEmbeddingDim());
		}
	}

	async indexChunks(chunks: readonly Chunk[]): Promise<IndexStats> {
		const startTime = Date.now();

		const checkpoint = await this.loadCheckpoint();
		let resumeFrom = 0;

		if (checkpoint.lastProcessedId) {
			const idx = chunks.findIndex(c => c.chunk_id === checkpoint.lastProcessedId);
			if (idx >= 0) {
				resumeFrom = idx + 1;
				this.logger.info(`Resuming from chunk ${resumeFrom} (${checkpoint.lastProcessedId})`);
			}
		}

		let successCount = 0;
		const remaining = chunks.length - resumeFrom;
		const totalBatches = Math.ceil(remaining / this.batchSize);

		for (let i = resumeFrom; i < chunks.length; i += this.batchSize) {
			const batch = chunks.slice(i, i + this.batchSize);
			const batchNum = Math.floor((i - resumeFrom) / this.batchSize) + 1;

			try {
				await this.indexBatch(batch);
			} catch (error) {
				this.logger.error(`Failed to index batch starting at ${i}`, {
					error: error instanceof Error ? error.message : String(error),
				});
				throw error;
			}

			successCount += batch.length;
			await this.saveCheckpoint(batch[batch.length - 1].chunk_id);

			const progress = ((i - resumeFrom + batch.length) / remaining * 100).toFixed(1);
			this.logger.info(
				`[${progress}%] batch ${batchNum}/${totalBatches} ` +
				`(${i + batch.length}/${chunks.length} chunks)`,
			);
		}

		await this.clearCheckpoint();

		return {
			totalChunks: chunks.length,
			successCount,
			skippedCount: resumeFrom,
			durationMs: Date.now() - startTime,
		};
	}

	/**
	 * Dense vector from prefix + content; BM25 over the content alone
	 */
	private async indexBatch(chunks: readonly Chunk[]): Promise<void> {
		if (chunks.length === 0) return;

		const texts = chunks.map(c => this.preprocessor.getTextForEmbedding(c));
		const embedResults = await this.embedder.embedBatch(texts);

		const points: UpsertPoint[] = embedResults.map((er, idx) => {
			const chunk = chunks[idx];
			return {
				id: chunk.chunk_id,
				vector: {
					dense: er.embedding,
					bm25: { text: chunk.content, model: BM25_MODEL },
				},
				payload: chunkPayload(chunk),
			};
		});

		for (let j = 0; j < points.length; j += this.upsertBatchSize) {
			await this.store.upsert(this.collection, points.slice(j, j + this.upsertBatchSize));
		}
	}

	private async loadCheckpoint(): Promise<CheckpointData> {
		if (!this.checkpointPath) {
			return EMPTY_CHECKPOINT;
		}

		let content: string;
		try {
			content = await fs.readFile(this.checkpointPath, 'utf-8');
		} catch {
			// no checkpoint yet
			return EMPTY_CHECKPOINT;
		}

		const parsed = checkpointSchema.safeParse(safeJsonParse(content));
		if (!parsed.success) {
			this.logger.warn(`Ignoring unreadable checkpoint ${this.checkpointPath}`);
			return EMPTY_CHECKPOINT;
		}
		return parsed.data;
	}

	private async saveCheckpoint(chunkId: string): Promise<void> {
		if (!this.checkpointPath) return;

		const data: CheckpointData = { lastProcessedId: chunkId, timestamp: Date.now() };
		await fs.mkdir(dirname(this.checkpointPath), { recursive: true });
		await fs.writeFile(this.checkpointPath, JSON.stringify(data, null, 2));
	}

	private async clearCheckpoint(): Promise<void> {
		if (!this.checkpointPath) return;
		await fs.rm(this.checkpointPath, { force: true });
	}

	async getStats(): Promise<{ pointsCount?: number }> {
		const info = await this.store.getCollectionInfo(this.collection);
		return { pointsCount: info.pointsCount ?? undefined };
	}

	/** Remove every point of one book */
	async deleteByBook(bookTitle: string): Promise<void> {
		await this.store.deleteByPayload(this.collection, 'book_title', bookTitle);
		this.logger.info(`Deleted chunks of ${bookTitle}`);
	}
}

function safeJsonParse(content: string): unknown {
	try {
		return JSON.parse(content);
	} catch {
		return undefined;
	}
}

export interface CreateIndexerOptions {
	qdrantUrl: string;
	qdrantApiKey?: string;
	collection: string;
	embedder: ChunkEmbedder;
	batchSize?: number;
	preprocessor?: ContextualPreprocessor;
	checkpointPath?: string;
	logger?: Logger;
}

export function createIndexer(options: CreateIndexerOptions): ChunkIndexer {
	return new ChunkIndexer({
		store: new QdrantClient({ url: options.qdrantUrl, apiKey: options.qdrantApiKey }),
		collection: options.collection,
		embedder: options.embedder,
		batchSize: options.batchSize ?? 64,
		preprocessor: options.preprocessor,
		checkpointPath: options.checkpointPath,
		logger: options.logger,
	});
}
