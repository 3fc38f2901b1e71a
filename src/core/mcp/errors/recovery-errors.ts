/**
 * Recovery Errors - raised by the backoff layer above the connection cache.
 */

export interface RetryAttemptRecord {
	attempt: number;
	timestamp: Date;
	error: Error;
	delayMs?: number;
}

/**
 * Error thrown when all retry attempts have been exhausted, or the first failure
 * was not retryable.
 */
export class RetryExhaustedError extends Error {
	public readonly serverName: string;
	public readonly attempts: number;
	public readonly lastError: Error;
	public readonly attemptHistory: RetryAttemptRecord[];

	constructor(
		message: string,
		serverName: string,
		attempts: number,
		lastError: Error,
		attemptHistory: RetryAttemptRecord[]
	) {
		super(message, { cause: lastError });
		this.name = 'RetryExhaustedError';
		this.serverName = serverName;
		this.attempts = attempts;
		this.lastError = lastError;
		this.attemptHistory = attemptHistory;

		Object.setPrototypeOf(this, new.target.prototype);
	}

	/**
	 * One line per attempt, with the wait that followed it
	 */
	getAttemptSummary(): string {
		return this.attemptHistory
			.map(record => {
				const delay = record.delayMs ? ` (retried after ${record.delayMs}ms)` : '';
				return `Attempt ${record.attempt}${delay}: ${record.error.message}`;
			})
			.join('\n');
	}
}
