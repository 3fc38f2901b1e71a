/**
 * Timer helpers for background work. Every timer is unref'd so pending waits
 * never keep the process alive.
 */

/**
 * Thrown when an abortable wait is cancelled
 */
export class AbortedError extends Error {
	constructor(message = 'Operation aborted') {
		super(message);
		this.name = 'AbortedError';
	}
}

/**
 * Resolve after `ms`, or reject with AbortedError as soon as `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise<void>((resolve, reject) => {
		if (signal?.aborted) {
			reject(new AbortedError('Sleep aborted before it started'));
			return;
		}

		const onAbort = (): void => {
			clearTimeout(timer);
			reject(new AbortedError('Sleep aborted'));
		};

		const timer = setTimeout(() => {
			signal?.removeEventListener('abort', onAbort);
			resolve();
		}, ms);
		timer.unref();

		signal?.addEventListener('abort', onAbort, { once: true });
	});
}

/**
 * Race `promise` against a deadline. The losing promise keeps running; its
 * eventual rejection is absorbed by the race.
 */
export function withTimeout<T>(
	promise: Promise<T>,
	timeoutMs: number,
	createError: () => Error
): Promise<T> {
	let timer: NodeJS.Timeout | undefined;
	const deadline = new Promise<never>((_, reject) => {
		timer = setTimeout(() => reject(createError()), timeoutMs);
		timer.unref();
	});

	return Promise.race([promise, deadline]).finally(() => {
		if (timer) {
			clearTimeout(timer);
		}
	});
}
