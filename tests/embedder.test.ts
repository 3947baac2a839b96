import { describe, it, expect, afterEach, vi } from 'vitest';
import { VoyageAIError } from 'voyageai';
import {
	VoyageEmbedder,
	createVoyageEmbedder,
	estimateTokens,
	isRetryableError,
	planBatches,
	retryDelayMs,
	type EmbedderConfig,
	type EmbeddingsClient,
} from '../src/rag/embedder.js';
import { ApiError, RateLimitError } from '../src/shared/errors.js';
import { RateLimiter } from '../src/shared/rate-limiter.js';
import { silentLogger } from './helpers.js';

type EmbedRequest = Parameters<EmbeddingsClient['embed']>[0];
type EmbedResponse = Awaited<ReturnType<EmbeddingsClient['embed']>>;

/** Answers with [position, 0, 0] per input, in reverse order with indices */
function vectors(request: EmbedRequest, dim = 3): EmbedResponse {
	const data = request.input.map((_, index) => ({
		index,
		embedding: [index, ...new Array<number>(dim - 1).fill(0)],
	}));
	return { data: data.reverse() };
}

class FakeVoyage implements EmbeddingsClient {
	requests: EmbedRequest[] = [];

	constructor(private readonly respond: (request: EmbedRequest, call: number) => EmbedResponse = r => vectors(r)) {}

	async embed(request: EmbedRequest): Promise<EmbedResponse> {
		this.requests.push(request);
		return this.respond(request, this.requests.length);
	}
}

function embedder(client: EmbeddingsClient, overrides: Partial<EmbedderConfig> = {}): VoyageEmbedder {
	return new VoyageEmbedder({
		client,
		model: 'voyage-3',
		embeddingDim: 3,
		batchSize: 2,
		retryDelay: 0,
		logger: silentLogger(),
		...overrides,
	});
}

describe('estimateTokens', () => {
	it('rounds characters / 4 up', () => {
		expect(estimateTokens('')).toBe(0);
		expect(estimateTokens('abcd')).toBe(1);
		expect(estimateTokens('abcde')).toBe(2);
	});
});

describe('planBatches', () => {
	it('starts a new batch when the count is reached', () => {
		expect(planBatches(['a', 'b', 'c', 'd', 'e'], 2)).toEqual([['a', 'b'], ['c', 'd'], ['e']]);
	});

	it('starts a new batch when the token estimate would overflow', () => {
		expect(planBatches(['a'.repeat(8), 'b'.repeat(8), 'c'.repeat(4)], 10, 3)).toEqual([
			['a'.repeat(8)],
			['b'.repeat(8), 'c'.repeat(4)],
		]);
	});

	it('gives a text over the token cap a batch of its own', () => {
		expect(planBatches(['x'.repeat(40), 'y'], 10, 3)).toEqual([['x'.repeat(40)], ['y']]);
	});

	it('plans nothing for no texts', () => {
		expect(planBatches([], 2)).toEqual([]);
	});
});

describe('VoyageEmbedder', () => {
	it('embeds in count-limited calls and keeps input order', async () => {
		const client = new FakeVoyage();
		const results = await embedder(client).embedBatch(['t0', 't1', 't2', 't3', 't4']);

		expect(client.requests.map(r => r.input)).toEqual([['t0', 't1'], ['t2', 't3'], ['t4']]);
		expect(client.requests[0]).toMatchObject({ model: 'voyage-3', inputType: 'document' });
		expect(results.map(r => r.text)).toEqual(['t0', 't1', 't2', 't3', 't4']);
		expect(results.map(r => r.embedding)).toEqual([[0, 0, 0], [1, 0, 0], [0, 0, 0], [1, 0, 0], [0, 0, 0]]);
		expect(results[0].tokens).toBe(1);
	});

	it('makes no call for no texts', async () => {
		const client = new FakeVoyage();
		expect(await embedder(client).embedBatch([])).toEqual([]);
		expect(client.requests).toHaveLength(0);
	});

	it('retries a network failure', async () => {
		const client = new FakeVoyage((request, call) => {
			if (call === 1) throw new Error('read ECONNRESET');
			return vectors(request);
		});

		const results = await embedder(client).embedBatch(['t0']);

		expect(client.requests).toHaveLength(2);
		expect(results).toHaveLength(1);
	});

	it('does not retry a rejected request', async () => {
		const client = new FakeVoyage(() => {
			throw new VoyageAIError({ message: 'invalid input', statusCode: 400 });
		});

		await expect(embedder(client).embedBatch(['t0'])).rejects.toMatchObject({ name: 'ApiError', statusCode: 400 });
		expect(client.requests).toHaveLength(1);
	});

	it('gives up on a server error after the last attempt', async () => {
		const client = new FakeVoyage(() => {
			throw new VoyageAIError({ message: 'unavailable', statusCode: 503 });
		});

		const error = await embedder(client).embedBatch(['t0']).catch((err: unknown) => err);

		expect(error).toBeInstanceOf(ApiError);
		expect(error).toMatchObject({ statusCode: 503 });
		expect(client.requests).toHaveLength(3);
	});

	it('rejects vectors of the wrong dimension without retrying', async () => {
		const client = new FakeVoyage(request => vectors(request, 2));

		await expect(embedder(client).embedBatch(['t0'])).rejects.toThrow('Embedding dimension mismatch: expected 3, got 2');
		expect(client.requests).toHaveLength(1);
	});

	it('rejects a response with missing vectors', async () => {
		const client = new FakeVoyage(() => ({ data: [{ index: 0, embedding: [1, 2, 3] }] }));

		await expect(embedder(client).embedBatch(['t0', 't1'])).rejects.toThrow('Expected 2 embeddings, got 1');
	});

	it('surfaces the rate limit error once attempts run out', async () => {
		const client = new FakeVoyage();
		const rateLimiter = new RateLimiter({ requestsPerMinute: 1, tokensPerMinute: 1_000_000, now: () => 0 });

		const pending = embedder(client, { batchSize: 1, maxRetries: 1, rateLimiter }).embedBatch(['t0', 't1']);

		await expect(pending).rejects.toBeInstanceOf(RateLimitError);
		expect(client.requests).toHaveLength(1);
	});
});

describe('isRetryableError', () => {
	it('retries quota, throttling, server and network failures', () => {
		expect(isRetryableError(new RateLimitError('slow down', 5))).toBe(true);
		expect(isRetryableError(new VoyageAIError({ statusCode: 429 }))).toBe(true);
		expect(isRetryableError(new VoyageAIError({ statusCode: 502 }))).toBe(true);
		expect(isRetryableError(new VoyageAIError({ message: 'no response' }))).toBe(true);
		expect(isRetryableError(new Error('connect ETIMEDOUT'))).toBe(true);
	});

	it('does not retry client errors or bad responses', () => {
		expect(isRetryableError(new VoyageAIError({ statusCode: 401 }))).toBe(false);
		expect(isRetryableError(new ApiError('Embedding dimension mismatch: expected 3, got 2'))).toBe(false);
		expect(isRetryableError(new Error('status 500 in message only'))).toBe(false);
		expect(isRetryableError('timeout')).toBe(false);
	});
});

describe('retryDelayMs', () => {
	it('doubles the base delay per attempt', () => {
		expect(retryDelayMs(new Error('timeout'), 1, 1000)).toBe(1000);
		expect(retryDelayMs(new Error('timeout'), 3, 1000)).toBe(4000);
	});

	it('waits at least the retry-after of a rate limit', () => {
		expect(retryDelayMs(new RateLimitError('slow down', 30), 1, 1000)).toBe(30_000);
		expect(retryDelayMs(new RateLimitError('slow down', 1), 3, 1000)).toBe(4000);
		expect(retryDelayMs(new RateLimitError('slow down'), 2, 1000)).toBe(2000);
	});
});

describe('createVoyageEmbedder', () => {
	afterEach(() => {
		vi.unstubAllEnvs();
	});

	it('requires an API key', () => {
		vi.stubEnv('VOYAGE_API_KEY', '');
		expect(() => createVoyageEmbedder()).toThrow(ApiError);
	});

	it('accepts a client instead of a key', async () => {
		vi.stubEnv('VOYAGE_API_KEY', '');
		const client = new FakeVoyage(request => vectors(request, 512));
		const voyage = createVoyageEmbedder({ client, model: 'voyage-3-lite', logger: silentLogger() });

		const [result] = await voyage.embedBatch(['t0']);
		expect(result.embedding).toHaveLength(512);
	});

	it('knows the dimension of built-in models', () => {
		expect(createVoyageEmbedder({ apiKey: 'test-key' }).getEmbeddingDim()).toBe(1024);
		expect(createVoyageEmbedder({ apiKey: 'test-key', model: 'voyage-3-lite' }).getEmbeddingDim()).toBe(512);
	});

	it('needs an explicit dimension for unknown models', () => {
		expect(() => createVoyageEmbedder({ apiKey: 'test-key', model: 'custom-model' })).toThrow(/Unknown Voyage model/);
		expect(createVoyageEmbedder({ apiKey: 'test-key', model: 'custom-model', embeddingDim: 256 }).getEmbeddingDim()).toBe(256);
	});
});
