/**
 * Voyage AI embedding wrapper
 *
 * - token-aware batching
 * - rate limiting
 * - retry with exponential backoff (at least the limiter's retry-after)
 */

import { VoyageAIClient, VoyageAIError } from 'voyageai';
import { CHARS_PER_TOKEN } from '../config/types.js';
import { ApiError, RateLimitError } from '../shared/errors.js';
import { Logger } from '../shared/logger.js';
import { RateLimiter } from '../shared/rate-limiter.js';

export interface EmbedResult {
	text: string;
	embedding: number[];
	/** Estimated */
	tokens: number;
}

/**
 * What the indexer needs from an embedding backend
 */
export interface ChunkEmbedder {
	embedBatch(texts: string[]): Promise<EmbedResult[]>;
	getEmbeddingDim(): number;
}

/**
 * The part of the Voyage client the embedder calls; `VoyageAIClient` satisfies it
 */
export interface EmbeddingsClient {
	embed(request: { input: string[]; model: string; inputType: 'document' }): Promise<{
		data?: Array<{ embedding?: number[]; index?: number }>;
	}>;
}

export interface EmbedderConfig {
	/** Used to build a `VoyageAIClient` when no client is given */
	apiKey?: string;
	client?: EmbeddingsClient;
	model: string;
	embeddingDim: number;
	/** Max texts per API call */
	batchSize: number;
	maxRetries?: number;
	/** Initial retry delay in ms */
	retryDelay?: number;
	rateLimiter?: RateLimiter;
	logger?: Logger;
}

/** Voyage caps a request at 120k tokens; half of it leaves room for estimation error */
export const MAX_BATCH_TOKENS = 60_000;

/** Same ratio the chunker sizes with */
export function estimateTokens(text: string): number {
	return Math.ceil(text.length / CHARS_PER_TOKEN);
}

const MODEL_DIMENSIONS: Record<string, number> = {
	'voyage-3': 1024,
	'voyage-3-lite': 512,
	'voyage-3-large': 1024,
	'voyage-code-3': 1024,
	'voyage-multilingual-2': 1024,
	'voyage-2': 1024,
};

const NETWORK_ERROR_MARKERS = ['timeout', 'econnreset', 'econnrefused', 'etimedout', 'socket hang up'];

/**
 * Group texts into API calls, in order, by count and estimated tokens.
 * A text over the token cap on its own still gets a call of its own.
 */
export function planBatches(texts: string[], maxCount: number, maxTokens = MAX_BATCH_TOKENS): string[][] {
	const batches: string[][] = [];
	let batch: string[] = [];
	let batchTokens = 0;

	for (const text of texts) {
		const tokens = estimateTokens(text);

		if (batch.length > 0 && (batchTokens + tokens > maxTokens || batch.length >= maxCount)) {
			batches.push(batch);
			batch = [];
			batchTokens = 0;
		}

		batch.push(text);
		batchTokens += tokens;
	}

	if (batch.length > 0) {
		batches.push(batch);
	}
	return batches;
}

/**
 * Quota, throttling, server and network failures are worth another attempt;
 * bad requests and bad responses are not
 */
export function isRetryableError(error: unknown): boolean {
	if (error instanceof RateLimitError) return true;
	if (error instanceof ApiError) return false;
	if (error instanceof VoyageAIError) {
		const status = error.statusCode;
		return status === undefined || status === 429 || status >= 500;
	}
	if (error instanceof Error) {
		const message = error.message.toLowerCase();
		return NETWORK_ERROR_MARKERS.some(marker => message.includes(marker));
	}
	return false;
}

/** Exponential backoff, never shorter than a rate limit's retry-after */
export function retryDelayMs(error: unknown, attempt: number, baseDelay: number): number {
	const backoff = baseDelay * Math.pow(2, attempt - 1);
	if (error instanceof RateLimitError && error.retryAfter !== undefined) {
		return Math.max(backoff, error.retryAfter * 1000);
	}
	return backoff;
}

function sleep(ms: number): Promise<void> {
	return new Promise(resolve => setTimeout(resolve, ms));
}

function toApiError(error: unknown, attempts: number): Error {
	if (error instanceof RateLimitError || error instanceof ApiError) {
		return error;
	}
	const message = error instanceof Error ? error.message : String(error);
	return new ApiError(
		`Failed to embed texts after ${attempts} attempts: ${message}`,
		error instanceof VoyageAIError ? error.statusCode : undefined,
		error instanceof Error ? error : undefined,
	);
}

export class VoyageEmbedder implements ChunkEmbedder {
	private readonly client: EmbeddingsClient;
	private readonly config: Required<Pick<EmbedderConfig, 'model' | 'embeddingDim' | 'batchSize' | 'maxRetries' | 'retryDelay'>>;
	private readonly rateLimiter: RateLimiter | undefined;
	private readonly logger: Logger;

	constructor(config: EmbedderConfig) {
		this.client = config.client ?? new VoyageAIClient({ apiKey: config.apiKey });
		this.config = {
			model: config.model,
			embeddingDim: config.embeddingDim,
			batchSize: config.batchSize,
			maxRetries: config.maxRetries ?? 3,
			retryDelay: config.retryDelay ?? 1000,
		};
		this.rateLimiter = config.rateLimiter;
		this.logger = config.logger ?? new Logger();
	}

	/**
	 * Embed texts in order, splitting into API calls by count and estimated tokens
	 */
	async embedBatch(texts: string[]): Promise<EmbedResult[]> {
		const allResults: EmbedResult[] = [];
		for (const batch of planBatches(texts, this.config.batchSize)) {
			allResults.push(...await this.embedWithRetry(batch));
		}
		return allResults;
	}

	private async embedWithRetry(texts: string[]): Promise<EmbedResult[]> {
		for (let attempt = 1; ; attempt++) {
			try {
				return await this.callApi(texts);
			} catch (error) {
				if (attempt >= this.config.maxRetries || !isRetryableError(error)) {
					throw toApiError(error, attempt);
				}

				const delay = retryDelayMs(error, attempt, this.config.retryDelay);
				this.logger.warn(`Embed failed (attempt ${attempt}), retrying in ${delay}ms`, {
					error: error instanceof Error ? error.message : String(error),
				});
				await sleep(delay);
			}
		}
	}

	private async callApi(texts: string[]): Promise<EmbedResult[]> {
		const totalTokens = texts.reduce((sum, text) => sum + estimateTokens(text), 0);
		this.rateLimiter?.checkAndRecord(totalTokens);

		this.logger.debug(`Embedding ${texts.length} texts, ~${totalTokens} tokens`);

		const response = await this.client.embed({
			input: texts,
			model: this.config.model,
			inputType: 'document',
		});

		const data = [...(response.data ?? [])].sort((a, b) => (a.index ?? 0) - (b.index ?? 0));
		if (data.length !== texts.length) {
			throw new ApiError(`Expected ${texts.length} embeddings, got ${data.length}`);
		}

		return texts.map((text, idx) => {
			const embedding = data[idx].embedding ?? [];
			if (embedding.length !== this.config.embeddingDim) {
				throw new ApiError(
					`Embedding dimension mismatch: expected ${this.config.embeddingDim}, got ${embedding.length}`,
				);
			}
			return { text, embedding, tokens: estimateTokens(text) };
		});
	}

	getEmbeddingDim(): number {
		return this.config.embeddingDim;
	}
}

export interface CreateVoyageEmbedderOptions {
	apiKey?: string;
	client?: EmbeddingsClient;
	model?: string;
	embeddingDim?: number;
	batchSize?: number;
	maxRetries?: number;
	retryDelay?: number;
	rateLimiter?: RateLimiter;
	logger?: Logger;
}

export function createVoyageEmbedder(options: CreateVoyageEmbedderOptions = {}): VoyageEmbedder {
	const apiKey = options.apiKey ?? process.env.VOYAGE_API_KEY;
	if (!apiKey && !options.client) {
		throw new ApiError('VOYAGE_API_KEY is required');
	}

	const model = options.model ?? 'voyage-3';
	const embeddingDim = options.embeddingDim ?? MODEL_DIMENSIONS[model];
	if (embeddingDim === undefined) {
		throw new ApiError(`Unknown Voyage model: ${model} (pass embeddingDim explicitly)`);
	}

	return new VoyageEmbedder({
		apiKey,
		client: options.client,
		model,
		embeddingDim,
		batchSize: options.batchSize ?? 128,
		maxRetries: options.maxRetries,
		retryDelay: options.retryDelay,
		rateLimiter: options.rateLimiter,
		logger: options.logger,
	});
}
