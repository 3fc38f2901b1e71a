/**
 * WorkerPool - Background Task Execution
 *
 * Runs async tasks off the caller's turn of the event loop. `execute` only
 * enqueues; the task body starts on a later macrotask, so a caller never runs
 * connection work inline. Modelled as an executor service: it can be shut down
 * (no new work), awaited, and forced down (running tasks see their abort signal,
 * queued ones are dropped).
 */

import { LOG_PREFIXES } from '../constants.js';
import { logger as defaultLogger, type Logger } from '../../logger/index.js';

/**
 * A unit of background work. The signal aborts when the pool is forced down.
 */
export type PoolTask = (signal: AbortSignal) => Promise<void>;

export interface WorkerPoolConfig {
	/** Pool name, used for task ids and logs */
	name: string;
	/** Maximum number of tasks running at once (0 = unlimited) */
	maxConcurrency?: number;
	logger?: Logger;
}

interface QueuedTask {
	id: string;
	task: PoolTask;
}

export class WorkerPool {
	readonly name: string;
	private readonly maxConcurrency: number;
	private readonly logger: Logger;
	private readonly abortController = new AbortController();
	private readonly queue: QueuedTask[] = [];
	private readonly terminationWaiters: Array<() => void> = [];
	private running = 0;
	private taskCounter = 0;
	private shutdownRequested = false;
	private drainScheduled = false;

	constructor(config: WorkerPoolConfig) {
		this.name = config.name;
		this.maxConcurrency = config.maxConcurrency ?? 0;
		this.logger = config.logger ?? defaultLogger;
	}

	/**
	 * Submit a task. Returns false, without running anything, once the pool has
	 * been shut down.
	 */
	execute(task: PoolTask, taskId?: string): boolean {
		if (this.shutdownRequested) {
			this.logger.debug(`${LOG_PREFIXES.POOL} Pool '${this.name}' rejected task: shut down`, {
				taskId,
			});
			return false;
		}

		const id = taskId ?? `${this.name}-${++this.taskCounter}`;
		this.queue.push({ id, task });
		this.scheduleDrain();
		return true;
	}

	/**
	 * Abort signal handed to every task
	 */
	get signal(): AbortSignal {
		return this.abortController.signal;
	}

	/**
	 * Stop accepting tasks. Queued and running tasks still complete.
	 */
	shutdown(): void {
		if (this.shutdownRequested) {
			return;
		}
		this.shutdownRequested = true;
		this.logger.debug(`${LOG_PREFIXES.POOL} Pool '${this.name}' shutting down`, {
			running: this.running,
			queued: this.queue.length,
		});
		this.notifyIfTerminated();
	}

	/**
	 * Shut down, drop queued tasks and abort running ones.
	 *
	 * @returns Number of queued tasks that never started
	 */
	shutdownNow(): number {
		this.shutdownRequested = true;
		const dropped = this.queue.splice(0, this.queue.length).length;
		this.abortController.abort(new Error(`Pool '${this.name}' was shut down`));
		this.logger.debug(`${LOG_PREFIXES.POOL} Pool '${this.name}' forced down`, {
			dropped,
			running: this.running,
		});
		this.notifyIfTerminated();
		return dropped;
	}

	/**
	 * Wait until every accepted task has finished, up to `timeoutMs`.
	 *
	 * @returns True if the pool terminated within the bound
	 */
	async awaitTermination(timeoutMs: number): Promise<boolean> {
		if (this.isTerminated()) {
			return true;
		}

		return new Promise<boolean>(resolve => {
			const onTerminated = (): void => {
				clearTimeout(timer);
				resolve(true);
			};
			const timer = setTimeout(() => {
				const index = this.terminationWaiters.indexOf(onTerminated);
				if (index >= 0) {
					this.terminationWaiters.splice(index, 1);
				}
				resolve(this.isTerminated());
			}, timeoutMs);
			timer.unref();
			this.terminationWaiters.push(onTerminated);
		});
	}

	isShutdown(): boolean {
		return this.shutdownRequested;
	}

	isTerminated(): boolean {
		return this.shutdownRequested && this.running === 0 && this.queue.length === 0;
	}

	getActiveCount(): number {
		return this.running;
	}

	getQueuedCount(): number {
		return this.queue.length;
	}

	private scheduleDrain(): void {
		if (this.drainScheduled) {
			return;
		}
		this.drainScheduled = true;
		setImmediate(() => {
			this.drainScheduled = false;
			this.drain();
		});
	}

	private drain(): void {
		while (
			this.queue.length > 0 &&
			(this.maxConcurrency === 0 || this.running < this.maxConcurrency)
		) {
			const next = this.queue.shift();
			if (next) {
				this.running++;
				void this.runTask(next);
			}
		}
	}

	/**
	 * Never rejects: a failing task is logged and the pool carries on.
	 */
	private async runTask({ id, task }: QueuedTask): Promise<void> {
		try {
			if (this.abortController.signal.aborted) {
				return;
			}
			await task(this.abortController.signal);
		} catch (error) {
			this.logger.error(
				`${LOG_PREFIXES.POOL} Task '${id}' failed in pool '${this.name}': ${error instanceof Error ? error.message : String(error)}`
			);
		} finally {
			this.running--;
			if (this.queue.length > 0) {
				this.scheduleDrain();
			}
			this.notifyIfTerminated();
		}
	}

	private notifyIfTerminated(): void {
		if (!this.isTerminated()) {
			return;
		}
		const waiters = this.terminationWaiters.splice(0, this.terminationWaiters.length);
		for (const waiter of waiters) {
			waiter();
		}
	}
}
