export { TryLock } from './try-lock.js';
export { AtomicReference, AtomicCounter } from './atomic.js';
export { WorkerPool } from './worker-pool.js';
export type { PoolTask, WorkerPoolConfig } from './worker-pool.js';
export { FixedDelayScheduler } from './scheduler.js';
export type { ScheduledTask } from './scheduler.js';
export { sleep, withTimeout, AbortedError } from './timing.js';
