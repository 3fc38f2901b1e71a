import { describe, it, expect } from 'vitest';
import { AtomicCounter, AtomicReference } from '../atomic.js';
import { TryLock } from '../try-lock.js';
import { AbortedError, sleep, withTimeout } from '../timing.js';

describe('AtomicReference', () => {
	it('swaps only from the expected value', () => {
		const ref = new AtomicReference<string>('CLOSED');

		expect(ref.compareAndSet('CONNECTED', 'CLOSED')).toBe(false);
		expect(ref.get()).toBe('CLOSED');

		expect(ref.compareAndSet('CLOSED', 'RECONNECTING')).toBe(true);
		expect(ref.get()).toBe('RECONNECTING');
		expect(ref.getAndSet('CONNECTED')).toBe('RECONNECTING');
		expect(ref.get()).toBe('CONNECTED');
	});
});

describe('AtomicCounter', () => {
	it('counts up and down without going negative', () => {
		const counter = new AtomicCounter();

		expect(counter.incrementAndGet()).toBe(1);
		expect(counter.incrementAndGet()).toBe(2);
		expect(counter.decrementAndGet()).toBe(1);
		expect(counter.decrementAndGet()).toBe(0);
		expect(counter.decrementAndGet()).toBe(0);
		expect(counter.get()).toBe(0);
	});
});

describe('TryLock', () => {
	it('lets only one caller through', () => {
		const lock = new TryLock();

		expect(lock.tryAcquire('rebuild-alpha')).toBe(true);
		expect(lock.tryAcquire('rebuild-alpha')).toBe(false);
		expect(lock.isLocked()).toBe(true);
		expect(lock.getHolder()?.owner).toBe('rebuild-alpha');

		lock.release();
		expect(lock.isLocked()).toBe(false);
		expect(lock.getHolder()).toBeNull();
		expect(lock.tryAcquire()).toBe(true);
	});

	it('skips work while another run holds the lock', async () => {
		const lock = new TryLock();
		let finishFirst: () => void = () => {};
		const first = lock.runIfFree(
			() =>
				new Promise<string>(resolve => {
					finishFirst = () => resolve('first');
				})
		);

		const second = await lock.runIfFree(async () => 'second');
		expect(second).toEqual({ ran: false });

		finishFirst();
		await expect(first).resolves.toEqual({ ran: true, value: 'first' });
		expect(lock.isLocked()).toBe(false);
	});

	it('releases the lock when the work throws', async () => {
		const lock = new TryLock();

		await expect(
			lock.runIfFree(async () => {
				throw new Error('rebuild failed');
			})
		).rejects.toThrow('rebuild failed');
		expect(lock.isLocked()).toBe(false);
	});

	it('refuses to release a free lock', () => {
		expect(() => new TryLock().release()).toThrow('Cannot release a lock that is not acquired');
	});
});

describe('timing', () => {
	it('rejects an aborted sleep', async () => {
		const controller = new AbortController();
		const pending = sleep(10000, controller.signal);

		controller.abort();

		await expect(pending).rejects.toBeInstanceOf(AbortedError);
	});

	it('rejects at once when the signal is already aborted', async () => {
		const controller = new AbortController();
		controller.abort();

		await expect(sleep(10, controller.signal)).rejects.toThrow('Sleep aborted before it started');
	});

	it('returns the value when the promise beats the deadline', async () => {
		await expect(withTimeout(Promise.resolve('fast'), 100, () => new Error('late'))).resolves.toBe(
			'fast'
		);
	});

	it('rejects with the supplied error when the deadline passes', async () => {
		const never = new Promise<string>(() => {});

		await expect(withTimeout(never, 5, () => new Error('deadline passed'))).rejects.toThrow(
			'deadline passed'
		);
	});
});
