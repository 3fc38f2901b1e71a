/**
 * Single-cell state holders with compare-and-set semantics.
 *
 * The event loop runs one callback at a time, so a read-compare-write with no
 * await in between is atomic. These classes keep that discipline in one place:
 * a transition applies only if the cell still holds the expected value.
 */

export class AtomicReference<T> {
	constructor(private value: T) {}

	get(): T {
		return this.value;
	}

	set(value: T): void {
		this.value = value;
	}

	/**
	 * Replace the value only if it currently equals `expected`.
	 *
	 * @returns True when the swap happened; false leaves the value untouched
	 */
	compareAndSet(expected: T, update: T): boolean {
		if (this.value !== expected) {
			return false;
		}
		this.value = update;
		return true;
	}

	getAndSet(value: T): T {
		const previous = this.value;
		this.value = value;
		return previous;
	}
}

/**
 * A counter that never goes below zero
 */
export class AtomicCounter {
	private value = 0;

	get(): number {
		return this.value;
	}

	incrementAndGet(): number {
		this.value += 1;
		return this.value;
	}

	/**
	 * Decrement unless already at zero; an unmatched decrement is ignored.
	 */
	decrementAndGet(): number {
		if (this.value > 0) {
			this.value -= 1;
		}
		return this.value;
	}
}
