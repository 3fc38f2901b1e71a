/**
 * Fixed-delay scheduling on top of a WorkerPool. The next run is armed only
 * after the previous one finishes, so runs of one task never overlap.
 */

import type { WorkerPool } from './worker-pool.js';

export interface ScheduledTask {
	readonly id: string;
	cancel(): void;
	isCancelled(): boolean;
}

class FixedDelayTask implements ScheduledTask {
	private timer: NodeJS.Timeout | undefined;
	private cancelled = false;

	constructor(
		readonly id: string,
		private readonly pool: WorkerPool,
		private readonly run: () => Promise<void>,
		private readonly delayMs: number
	) {}

	arm(delayMs: number): void {
		if (this.cancelled) {
			return;
		}
		this.timer = setTimeout(() => this.fire(), delayMs);
		this.timer.unref();
	}

	cancel(): void {
		this.cancelled = true;
		if (this.timer) {
			clearTimeout(this.timer);
			this.timer = undefined;
		}
	}

	isCancelled(): boolean {
		return this.cancelled;
	}

	private fire(): void {
		this.timer = undefined;
		if (this.cancelled) {
			return;
		}
		const accepted = this.pool.execute(async () => {
			try {
				if (!this.cancelled) {
					await this.run();
				}
			} finally {
				this.arm(this.delayMs);
			}
		}, this.id);
		if (!accepted) {
			this.cancelled = true;
		}
	}
}

export class FixedDelayScheduler {
	constructor(private readonly pool: WorkerPool) {}

	/**
	 * Run `task` after `initialDelayMs`, then again `delayMs` after each run ends.
	 * A run that throws is logged by the pool and does not stop the schedule.
	 */
	scheduleWithFixedDelay(
		task: () => Promise<void>,
		initialDelayMs: number,
		delayMs: number,
		id: string
	): ScheduledTask {
		const scheduled = new FixedDelayTask(id, this.pool, task, delayMs);
		scheduled.arm(initialDelayMs);
		return scheduled;
	}
}
