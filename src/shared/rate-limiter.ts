/**
 * Sliding-window limiter for request and token quotas (RPM / TPM)
 * of the embedding API
 */

import { RateLimitError } from './errors.js';
import { Logger, LogLevel } from './logger.js';

export interface RateLimiterConfig {
	requestsPerMinute: number;
	tokensPerMinute: number;
	/** Window size in ms, default 60s */
	windowMs?: number;
	/** Clock, overridable in tests */
	now?: () => number;
	logger?: Logger;
}

interface WindowEntry {
	timestamp: number;
	weight: number;
}

/**
 * Weighted sliding window (weight 1 per request for RPM, token count for TPM)
 */
class SlidingWindow {
	private entries: WindowEntry[] = [];

	constructor(
		readonly windowMs: number,
		private readonly now: () => number,
	) {}

	private cleanup(): void {
		const cutoff = this.now() - this.windowMs;
		this.entries = this.entries.filter(e => e.timestamp > cutoff);
	}

	add(weight: number): void {
		this.cleanup();
		this.entries.push({ timestamp: this.now(), weight });
	}

	total(): number {
		this.cleanup();
		return this.entries.reduce((sum, e) => sum + e.weight, 0);
	}

	/** Seconds until the oldest entry leaves the window */
	retryAfter(): number {
		this.cleanup();
		const earliest = this.entries[0]?.timestamp;
		if (earliest === undefined) return 0;
		const waitMs = earliest + this.windowMs - this.now();
		return Math.max(0, Math.ceil(waitMs / 1000));
	}
}

export class RateLimiter {
	private readonly rpm: SlidingWindow;
	private readonly tpm: SlidingWindow;
	private readonly rpmLimit: number;
	private readonly tpmLimit: number;
	private readonly logger: Logger;

	constructor(config: RateLimiterConfig) {
		const windowMs = config.windowMs ?? 60_000;
		const now = config.now ?? Date.now;
		this.rpmLimit = config.requestsPerMinute;
		this.tpmLimit = config.tokensPerMinute;
		this.rpm = new SlidingWindow(windowMs, now);
		this.tpm = new SlidingWindow(windowMs, now);
		this.logger = config.logger ?? new Logger({ level: LogLevel.ERROR });
	}

	/**
	 * @throws RateLimitError when the request would exceed either quota
	 */
	check(tokenCount: number): void {
		const currentRpm = this.rpm.total();
		const currentTpm = this.tpm.total();

		if (currentRpm >= this.rpmLimit) {
			throw new RateLimitError(
				`Rate limit exceeded: ${currentRpm}/${this.rpmLimit} requests per minute`,
				this.rpm.retryAfter(),
			);
		}

		if (currentTpm + tokenCount > this.tpmLimit) {
			throw new RateLimitError(
				`Rate limit exceeded: ${currentTpm + tokenCount}/${this.tpmLimit} tokens per minute`,
				this.tpm.retryAfter(),
			);
		}

		this.logger.debug('rate limiter usage', {
			rpm: currentRpm,
			rpmLimit: this.rpmLimit,
			tpm: currentTpm,
			tpmLimit: this.tpmLimit,
		});
	}

	record(tokenCount: number): void {
		this.rpm.add(1);
		this.tpm.add(tokenCount);
	}

	checkAndRecord(tokenCount: number): void {
		this.check(tokenCount);
		this.record(tokenCount);
	}

	getStats(): { rpm: number; tpm: number } {
		return {
			rpm: this.rpm.total(),
			tpm: this.tpm.total(),
		};
	}
}

export function createVoyageRateLimiter(
	requestsPerMinute: number,
	tokensPerMinute: number,
	logger?: Logger,
): RateLimiter {
	return new RateLimiter({
		requestsPerMinute,
		tokensPerMinute,
		logger,
	});
}
