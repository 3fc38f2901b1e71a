/**
 * Backoff for callers of the connection cache.
 *
 * The cache never waits for a rebuild, it fails fast. A caller that wants to
 * outlast a reconnect runs its request through a RetryStrategy, which waits
 * longer after each failed attempt.
 */

import { ConnectionErrorUtils } from '../errors/connection-errors.js';
import { RetryExhaustedError, type RetryAttemptRecord } from '../errors/recovery-errors.js';
import { sleep } from '../utils/timing.js';

/**
 * Waits of step, 2 x step, ... never longer than maxDelayMs
 */
export interface LinearBackoff {
	stepMs: number;
	maxDelayMs: number;
}

export interface RetryOptions {
	/** Total attempts, the first one included */
	maxAttempts: number;
	backoff: LinearBackoff;
	/** Defaults to ConnectionErrorUtils.isRecoverable */
	isRetryable?: (error: Error) => boolean;
	/** Aborting ends the current wait with AbortedError */
	signal?: AbortSignal;
}

/**
 * Wait after the given failed attempt (1-based)
 */
export function backoffDelay(backoff: LinearBackoff, failedAttempt: number): number {
	return Math.min(backoff.stepMs * failedAttempt, backoff.maxDelayMs);
}

function assertValidBackoff(backoff: LinearBackoff): void {
	if (!Number.isFinite(backoff.stepMs) || backoff.stepMs < 0) {
		throw new RangeError('stepMs must be a non-negative number');
	}
	if (backoff.maxDelayMs < backoff.stepMs) {
		throw new RangeError('maxDelayMs must not be below stepMs');
	}
}

const asError = (value: unknown): Error => (value instanceof Error ? value : new Error(String(value)));

export class RetryStrategy {
	private history: RetryAttemptRecord[] = [];

	constructor(
		private readonly serverName: string,
		private readonly options: RetryOptions
	) {
		if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
			throw new RangeError('maxAttempts must be a positive integer');
		}
		assertValidBackoff(options.backoff);
	}

	/**
	 * Run `operation` until it succeeds, fails with something not retryable, or
	 * uses up its attempts. The attempt number (1-based) is passed in.
	 *
	 * @throws RetryExhaustedError carrying the last failure and the attempt history
	 * @throws AbortedError when the signal fires during a wait
	 */
	async execute<T>(operation: (attempt: number) => Promise<T>): Promise<T> {
		this.history = [];
		let attempt = 0;

		while (true) {
			attempt++;
			let outcome: { ok: true; value: T } | { ok: false; error: Error };
			try {
				outcome = { ok: true, value: await operation(attempt) };
			} catch (caught) {
				outcome = { ok: false, error: asError(caught) };
			}
			if (outcome.ok) {
				return outcome.value;
			}

			const failure = outcome.error;

			const record: RetryAttemptRecord = { attempt, timestamp: new Date(), error: failure };
			this.history.push(record);

			if (!this.isRetryable(failure)) {
				throw this.exhausted(`Non-retryable error for server '${this.serverName}': ${failure.message}`, failure);
			}
			if (attempt >= this.options.maxAttempts) {
				throw this.exhausted(
					`Max retry attempts (${this.options.maxAttempts}) exceeded for server '${this.serverName}'`,
					failure
				);
			}

			record.delayMs = backoffDelay(this.options.backoff, attempt);
			if (record.delayMs > 0) {
				await sleep(record.delayMs, this.options.signal);
			}
		}
	}

	getAttemptHistory(): RetryAttemptRecord[] {
		return [...this.history];
	}

	private isRetryable(error: Error): boolean {
		if (this.options.signal?.aborted) {
			return false;
		}
		return (this.options.isRetryable ?? ConnectionErrorUtils.isRecoverable)(error);
	}

	private exhausted(message: string, lastError: Error): RetryExhaustedError {
		return new RetryExhaustedError(message, this.serverName, this.history.length, lastError, this.getAttemptHistory());
	}

	/**
	 * Waits of step, 2 x step, ... capped at ten steps
	 */
	static linear(serverName: string, maxAttempts: number, stepMs: number): RetryStrategy {
		return new RetryStrategy(serverName, {
			maxAttempts,
			backoff: { stepMs, maxDelayMs: stepMs * 10 },
		});
	}
}
