/**
 * Qdrant client wrapper
 *
 * Based on @qdrant/js-client-rest. Points carry a named dense vector plus
 * a BM25 text vector inferred server-side.
 */

import { QdrantClient as QdrantSdk } from '@qdrant/js-client-rest';
import { createHash } from 'node:crypto';

/** Qdrant built-in BM25 inference model */
export const BM25_MODEL = 'Qdrant/bm25';

/** Payload fields filtered on, indexed as keywords */
const KEYWORD_INDEX_FIELDS = ['book_title', 'chapter', 'source_type'] as const;

/** String id -> deterministic UUID (MD5) */
export function stringToUuid(str: string): string {
	const hex = createHash('md5').update(str).digest('hex');
	return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20, 32)}`;
}

export interface UpsertPoint {
	/** chunk_id; converted to a UUID on write */
	id: string;
	vector: {
		dense: number[];
		bm25: { text: string; model: string };
	};
	payload: Record<string, unknown>;
}

/**
 * What the indexer needs from a vector store
 */
export interface VectorStore {
	collectionExists(collection: string): Promise<boolean>;
	createCollection(collection: string, denseVectorSize: number): Promise<void>;
	deleteCollection(collection: string): Promise<void>;
	upsert(collection: string, points: UpsertPoint[]): Promise<void>;
	deleteByPayload(collection: string, key: string, value: string): Promise<void>;
	getCollectionInfo(collection: string): Promise<{ pointsCount?: number | null }>;
}

interface CollectionSpec {
	vectors: Record<string, { size: number; distance: 'Cosine'; hnsw_config: { m: number; ef_construct: number } }>;
	sparse_vectors: Record<string, { modifier: 'idf' }>;
}

interface PayloadFilter {
	must: Array<{ key: string; match: { value: string } }>;
}

/**
 * The calls made on the REST SDK; `QdrantClient` from @qdrant/js-client-rest satisfies it
 */
export interface QdrantApi {
	collectionExists(collection: string): Promise<{ exists: boolean }>;
	createCollection(collection: string, spec: CollectionSpec): Promise<unknown>;
	createPayloadIndex(collection: string, index: { field_name: string; field_schema: 'keyword'; wait: boolean }): Promise<unknown>;
	deleteCollection(collection: string): Promise<unknown>;
	getCollection(collection: string): Promise<{ points_count?: number | null }>;
	upsert(collection: string, request: {
		wait: boolean;
		points: Array<{ id: string; vector: Record<string, number[]>; payload: Record<string, unknown> }>;
	}): Promise<unknown>;
	delete(collection: string, request: { wait: boolean; filter: PayloadFilter }): Promise<unknown>;
}

export interface QdrantClientOptions {
	url?: string;
	apiKey?: string;
	/** Used instead of an SDK client built from url/apiKey */
	api?: QdrantApi;
	/** Attempts per upsert */
	maxRetries?: number;
	/** Delay before the n-th retry is n * retryDelay ms */
	retryDelay?: number;
}

export class QdrantClient implements VectorStore {
	private readonly sdk: QdrantApi;
	private readonly maxRetries: number;
	private readonly retryDelay: number;

	constructor(options: QdrantClientOptions = {}) {
		this.sdk = options.api ?? new QdrantSdk({ url: options.url, apiKey: options.apiKey });
		this.maxRetries = options.maxRetries ?? 3;
		this.retryDelay = options.retryDelay ?? 1000;
	}

	// ── Collections ────────────────────────────────────────

	async createCollection(collection: string, denseVectorSize: number): Promise<void> {
		await this.sdk.createCollection(collection, {
			vectors: {
				dense: {
					size: denseVectorSize,
					distance: 'Cosine',
					hnsw_config: { m: 16, ef_construct: 100 },
				},
			},
			sparse_vectors: {
				bm25: { modifier: 'idf' },
			},
		});

		for (const field of KEYWORD_INDEX_FIELDS) {
			await this.sdk.createPayloadIndex(collection, {
				field_name: field,
				field_schema: 'keyword',
				wait: true,
			});
		}
	}

	async collectionExists(collection: string): Promise<boolean> {
		const { exists } = await this.sdk.collectionExists(collection);
		return exists;
	}

	async deleteCollection(collection: string): Promise<void> {
		await this.sdk.deleteCollection(collection);
	}

	async getCollectionInfo(collection: string): Promise<{ pointsCount?: number | null }> {
		const info = await this.sdk.getCollection(collection);
		return { pointsCount: info.points_count };
	}

	// ── Points ─────────────────────────────────────────────

	async upsert(collection: string, points: UpsertPoint[]): Promise<void> {
		if (points.length === 0) return;
		await this.withRetry(() => this.sdk.upsert(collection, {
			wait: true,
			points: points.map(p => ({
				id: stringToUuid(p.id),
				// the SDK typings predate server-side inference documents
				vector: p.vector as unknown as Record<string, number[]>,
				payload: { ...p.payload, chunk_id: p.id },
			})),
		}));
	}

	async deleteByPayload(collection: string, key: string, value: string): Promise<void> {
		await this.sdk.delete(collection, {
			wait: true,
			filter: { must: [{ key, match: { value } }] },
		});
	}

	private async withRetry<T>(fn: () => Promise<T>): Promise<T> {
		for (let attempt = 1; ; attempt++) {
			try {
				return await fn();
			} catch (err) {
				if (attempt >= this.maxRetries) throw err;
				await new Promise(r => setTimeout(r, this.retryDelay * attempt));
			}
		}
	}
}
