/**
 * A lock with no waiting acquire. Whoever loses the race backs off, so at most
 * one holder runs a critical section that spans await points, and nobody queues
 * behind it.
 */
export class TryLock {
	private owner: string | null = null;
	private acquiredAt = 0;

	/**
	 * @returns True if the caller now holds the lock
	 */
	tryAcquire(owner = 'anonymous'): boolean {
		if (this.owner !== null) {
			return false;
		}
		this.owner = owner;
		this.acquiredAt = Date.now();
		return true;
	}

	release(): void {
		if (this.owner === null) {
			throw new Error('Cannot release a lock that is not acquired');
		}
		this.owner = null;
		this.acquiredAt = 0;
	}

	isLocked(): boolean {
		return this.owner !== null;
	}

	/**
	 * Current holder and how long it has held the lock, or null when free
	 */
	getHolder(): { owner: string; heldForMs: number } | null {
		if (this.owner === null) {
			return null;
		}
		return { owner: this.owner, heldForMs: Date.now() - this.acquiredAt };
	}

	/**
	 * Run `fn` under the lock if it is free. Never waits.
	 */
	async runIfFree<T>(fn: () => Promise<T>, owner?: string): Promise<{ ran: true; value: T } | { ran: false }> {
		if (!this.tryAcquire(owner)) {
			return { ran: false };
		}
		try {
			return { ran: true, value: await fn() };
		} finally {
			this.release();
		}
	}
}
