/**
 * Health Check Scheduler
 *
 * One recurring check per server, armed when the server's connection reaches
 * CONNECTED. A tick demotes a connected wrapper whose handle is gone or that looks
 * stuck (too many requests in flight) and nudges closed wrappers into a rebuild.
 */

import { CONNECTION_STATES, LOG_PREFIXES } from '../constants.js';
import type { ConnectionWrapper } from '../registry/index.js';
import type { ConnectionHandle, HealthCheckOutcome } from '../types.js';
import type { FixedDelayScheduler, ScheduledTask } from '../utils/index.js';
import { logger as defaultLogger, type Logger } from '../../logger/index.js';

/**
 * What the scheduler needs from the owner of the registry
 */
export interface HealthCheckTarget<H extends ConnectionHandle> {
	getWrapper(serverName: string): ConnectionWrapper<H> | undefined;
	triggerRebuild(serverName: string): void;
}

export interface HealthCheckOptions {
	intervalMs: number;
	/** In-flight request count above which a connection is treated as stuck */
	maxPendingRequests: number;
}

export class HealthCheckScheduler<H extends ConnectionHandle> {
	private readonly tasks = new Map<string, ScheduledTask>();
	private readonly logger: Logger;

	constructor(
		private readonly target: HealthCheckTarget<H>,
		private readonly scheduler: FixedDelayScheduler,
		private readonly options: HealthCheckOptions,
		logger?: Logger
	) {
		this.logger = logger ?? defaultLogger;
	}

	/**
	 * Arm the periodic check for a server, replacing any existing schedule.
	 */
	schedule(serverName: string): void {
		this.cancel(serverName);
		const task = this.scheduler.scheduleWithFixedDelay(
			async () => {
				this.check(serverName);
			},
			this.options.intervalMs,
			this.options.intervalMs,
			`health-${serverName}`
		);
		this.tasks.set(serverName, task);
		this.logger.debug(`${LOG_PREFIXES.HEALTH} Scheduled health check for server: ${serverName}`, {
			intervalMs: this.options.intervalMs,
		});
	}

	cancel(serverName: string): void {
		const task = this.tasks.get(serverName);
		if (task) {
			task.cancel();
			this.tasks.delete(serverName);
		}
	}

	cancelAll(): void {
		for (const task of this.tasks.values()) {
			task.cancel();
		}
		this.tasks.clear();
	}

	isScheduled(serverName: string): boolean {
		const task = this.tasks.get(serverName);
		return task !== undefined && !task.isCancelled();
	}

	get scheduledCount(): number {
		return this.tasks.size;
	}

	/**
	 * Usable right now: connected, with an open handle, and not overloaded.
	 */
	isHealthy(wrapper: ConnectionWrapper<H>): boolean {
		if (!wrapper.isConnected()) {
			return false;
		}
		const handle = wrapper.getHandle();
		if (!handle || !handle.isOpen()) {
			return false;
		}
		return wrapper.pendingRequests.get() <= this.options.maxPendingRequests;
	}

	/**
	 * Run one tick for a server.
	 */
	check(serverName: string): HealthCheckOutcome {
		const wrapper = this.target.getWrapper(serverName);
		if (!wrapper) {
			this.cancel(serverName);
			this.logger.debug(
				`${LOG_PREFIXES.HEALTH} Server ${serverName} no longer registered, health check cancelled`
			);
			return 'removed';
		}

		const state = wrapper.getState();
		if (state === CONNECTION_STATES.RECONNECTING) {
			return 'reconnecting';
		}

		if (state === CONNECTION_STATES.CLOSED || state === CONNECTION_STATES.CLOSING) {
			this.logger.debug(
				`${LOG_PREFIXES.HEALTH} Server ${serverName} is ${state}, triggering rebuild`
			);
			this.target.triggerRebuild(serverName);
			return 'rebuild-triggered';
		}

		const handle = wrapper.getHandle();
		if (!handle || !handle.isOpen()) {
			this.logger.warn(
				`${LOG_PREFIXES.HEALTH} Connection for server ${serverName} has no usable handle, marking closed`
			);
			this.demote(wrapper);
			return 'invalid-handle';
		}

		const pending = wrapper.pendingRequests.get();
		if (pending > this.options.maxPendingRequests) {
			this.logger.warn(
				`${LOG_PREFIXES.HEALTH} Server ${serverName} has ${pending} pending requests (limit ${this.options.maxPendingRequests}), marking closed`
			);
			this.demote(wrapper);
			return 'overloaded';
		}

		return 'healthy';
	}

	private demote(wrapper: ConnectionWrapper<H>): void {
		if (wrapper.compareAndSetState(CONNECTION_STATES.CONNECTED, CONNECTION_STATES.CLOSED)) {
			this.target.triggerRebuild(wrapper.serverName);
		}
	}
}
