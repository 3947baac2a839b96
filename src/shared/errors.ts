/**
 * Shared error types
 *
 * Chunking itself never throws for document content; only configuration
 * and downstream (embedding / vector store) failures surface as errors.
 */

/**
 * Invalid chunking, prefix or environment configuration
 */
export class ConfigError extends Error {
	constructor(message: string, public readonly cause?: Error) {
		super(message);
		this.name = 'ConfigError';
		Error.captureStackTrace?.(this, ConfigError);
	}
}

/**
 * Embedding or vector store call failed
 */
export class ApiError extends Error {
	constructor(
		message: string,
		public readonly statusCode?: number,
		public readonly cause?: Error,
	) {
		super(message);
		this.name = 'ApiError';
		Error.captureStackTrace?.(this, ApiError);
	}
}

/**
 * Request or token quota exceeded; `retryAfter` is in seconds
 */
export class RateLimitError extends Error {
	constructor(
		message: string,
		public readonly retryAfter?: number,
	) {
		super(message);
		this.name = 'RateLimitError';
		Error.captureStackTrace?.(this, RateLimitError);
	}
}
