/**
 * MCP Cache Manager - Fail-fast Connection Cache
 *
 * Owns one ConnectionWrapper per configured server and keeps it alive in the
 * background. Reads never wait: a caller asking for a connection that is not
 * CONNECTED gets nothing back right away, while creation or rebuild runs on a
 * worker pool. Health checks demote stuck or dead connections, and
 * executeWithRetry turns connection faults into rebuilds.
 */

import { resolveMcpProperties, type McpProperties, type McpPropertiesInput, type ServerConfig } from '../config.js';
import { CONNECTION_STATES, ERROR_MESSAGES, LOG_PREFIXES, POOL_NAMES } from '../constants.js';
import { closeHandleSafely, type ClosePolicy } from '../connection/close-policy.js';
import { HealthCheckScheduler } from '../connection/health-check.js';
import {
	ConfigurationError,
	ConnectionErrorUtils,
	ConnectionUnavailableError,
	MCPExecutionError,
} from '../errors/index.js';
import { ConnectionWrapper, ServerConfigCache } from '../registry/index.js';
import type {
	ConfigRepository,
	ConnectionFactory,
	ConnectionHandle,
	ConnectionStats,
	PoolTerminationReport,
	ShutdownReport,
} from '../types.js';
import { AbortedError, FixedDelayScheduler, sleep, WorkerPool } from '../utils/index.js';
import { logger as defaultLogger, type Logger } from '../../logger/index.js';

export interface MCPCacheManagerOptions<H extends ConnectionHandle> {
	connectionFactory: ConnectionFactory<H>;
	configRepository: ConfigRepository;
	properties?: McpPropertiesInput;
	logger?: Logger;
}

export class MCPCacheManager<H extends ConnectionHandle> {
	readonly properties: McpProperties;

	private readonly connections = new Map<string, ConnectionWrapper<H>>();
	private readonly configCache: ServerConfigCache;
	private readonly connectionFactory: ConnectionFactory<H>;
	private readonly logger: Logger;

	private readonly connectionPool: WorkerPool;
	private readonly rebuildPool: WorkerPool;
	private readonly healthCheckPool: WorkerPool;
	private readonly healthChecks: HealthCheckScheduler<H>;
	private readonly closePolicy: ClosePolicy;

	private shuttingDown = false;
	private shutdownPromise: Promise<ShutdownReport> | null = null;

	constructor(options: MCPCacheManagerOptions<H>) {
		this.properties = resolveMcpProperties(options.properties);
		this.connectionFactory = options.connectionFactory;
		this.logger = options.logger ?? defaultLogger;
		this.configCache = new ServerConfigCache(options.configRepository, this.logger);

		this.connectionPool = new WorkerPool({ name: POOL_NAMES.CONNECTION, logger: this.logger });
		this.rebuildPool = new WorkerPool({ name: POOL_NAMES.REBUILD, logger: this.logger });
		this.healthCheckPool = new WorkerPool({
			name: POOL_NAMES.HEALTH_CHECK,
			maxConcurrency: this.properties.healthCheckPoolSize,
			logger: this.logger,
		});

		this.healthChecks = new HealthCheckScheduler<H>(
			{
				getWrapper: serverName => this.connections.get(serverName),
				triggerRebuild: serverName => this.triggerBackgroundRebuild(serverName),
			},
			new FixedDelayScheduler(this.healthCheckPool),
			{
				intervalMs: this.properties.healthCheckIntervalMs,
				maxPendingRequests: this.properties.maxPendingRequests,
			},
			this.logger
		);

		this.closePolicy = {
			gracefulTimeoutMs: this.properties.gracefulCloseTimeoutMs,
			settleMs: this.properties.closeSettleMs,
			forcedSettleMs: this.properties.forcedCloseSettleMs,
		};
	}

	/**
	 * Load the enabled server configurations. Connections are created lazily on
	 * first use, never here.
	 */
	async initialize(): Promise<void> {
		this.logger.info(`${LOG_PREFIXES.CACHE} Initializing MCP cache manager with fail-fast design`);
		await this.configCache.initialize();
	}

	// ======================================================
	// Registry Reads
	// ======================================================

	/**
	 * Return the server's wrapper if it is CONNECTED, otherwise null right away.
	 * A missing connection is created, and a closed one rebuilt while its config
	 * exists, in the background.
	 */
	getConnection(serverName: string): ConnectionWrapper<H> | null {
		if (this.shuttingDown) {
			return null;
		}

		const wrapper = this.connections.get(serverName);
		if (wrapper) {
			const state = wrapper.getState();
			if (state === CONNECTION_STATES.CONNECTED) {
				return wrapper;
			}
			if (state === CONNECTION_STATES.CLOSED || state === CONNECTION_STATES.CLOSING) {
				this.triggerBackgroundRebuild(serverName);
			}
			return null;
		}

		this.triggerBackgroundCreation(serverName);
		return null;
	}

	/**
	 * Handles of every configured server that is connected right now. Servers
	 * still connecting are left out, and get a nudge to connect.
	 *
	 * @param scope - Caller context, only used for logging
	 */
	getOrLoadServices(scope?: string): Map<string, H> {
		const services = new Map<string, H>();
		for (const serverName of this.configCache.names()) {
			const handle = this.getConnection(serverName)?.getConnectedHandle();
			if (handle) {
				services.set(serverName, handle);
			}
		}
		this.logger.debug(
			`${LOG_PREFIXES.CACHE} ${services.size}/${this.configCache.size} MCP services available`,
			scope ? { scope } : undefined
		);
		return services;
	}

	getServiceHandles(scope?: string): H[] {
		return Array.from(this.getOrLoadServices(scope).values());
	}

	getConfiguredServers(): string[] {
		return this.configCache.names();
	}

	// ======================================================
	// Request Execution
	// ======================================================

	/**
	 * Run `remoteCall` against the server's connected handle. A connection-related
	 * failure closes the connection, starts a rebuild and tries again at once, up to
	 * `requestRetryCount` retries; an attempt that finds no connection fails without
	 * waiting. Any other failure is rethrown wrapped, without a retry.
	 *
	 * @throws ConfigurationError when the server has no enabled configuration
	 * @throws MCPExecutionError on an application failure or when attempts run out
	 */
	async executeWithRetry<T>(serverName: string, remoteCall: (handle: H) => Promise<T>): Promise<T> {
		if (this.shuttingDown) {
			throw new MCPExecutionError(ERROR_MESSAGES.MANAGER_SHUT_DOWN, serverName, 0, false);
		}
		// A wrapper left behind by a removed config does not count
		if (!this.configCache.has(serverName)) {
			throw new ConfigurationError(`${ERROR_MESSAGES.CONFIG_NOT_FOUND}: ${serverName}`, serverName);
		}

		const maxAttempts = this.properties.requestRetryCount + 1;
		let lastError: unknown;

		for (let attempt = 1; attempt <= maxAttempts; attempt++) {
			const wrapper = this.getConnection(serverName);
			const handle = wrapper?.getConnectedHandle();
			if (!wrapper || !handle) {
				lastError = new ConnectionUnavailableError(serverName, this.connections.get(serverName)?.getState());
				this.logger.debug(
					`${LOG_PREFIXES.CACHE} No connection for server ${serverName} (attempt ${attempt}/${maxAttempts})`
				);
				continue;
			}

			wrapper.pendingRequests.incrementAndGet();
			try {
				return await remoteCall(handle);
			} catch (error) {
				lastError = error;
				if (!ConnectionErrorUtils.isConnectionError(error)) {
					throw new MCPExecutionError(
						`${ERROR_MESSAGES.EXECUTION_FAILED} for server ${serverName}: ${ConnectionErrorUtils.describe(error)}`,
						serverName,
						attempt,
						false,
						error
					);
				}
				this.logger.warn(
					`${LOG_PREFIXES.CACHE} Connection error during execution for server: ${serverName} (attempt ${attempt}/${maxAttempts}): ${ConnectionErrorUtils.describe(error)}`
				);
				this.handleConnectionError(serverName);
			} finally {
				wrapper.pendingRequests.decrementAndGet();
			}
		}

		throw new MCPExecutionError(
			`Failed to execute after ${maxAttempts} attempts for server: ${serverName}`,
			serverName,
			maxAttempts,
			true,
			lastError
		);
	}

	/**
	 * Report a connection fault detected outside executeWithRetry. A connected
	 * wrapper is closed and rebuilt; an unknown server gets a creation attempt.
	 */
	handleConnectionError(serverName: string): void {
		const wrapper = this.connections.get(serverName);
		if (!wrapper) {
			this.triggerBackgroundCreation(serverName);
			return;
		}
		if (wrapper.compareAndSetState(CONNECTION_STATES.CONNECTED, CONNECTION_STATES.CLOSED)) {
			this.logger.warn(
				`${LOG_PREFIXES.CACHE} Connection error detected for server: ${serverName}, marking as closed and triggering background rebuild`
			);
			this.triggerBackgroundRebuild(serverName);
		}
	}

	// ======================================================
	// Administration
	// ======================================================

	/**
	 * Close and rebuild one server's connection, or every connection when no name
	 * is given.
	 *
	 * @returns Number of wrappers invalidated
	 */
	invalidateCache(serverName?: string): number {
		const targets = serverName
			? [this.connections.get(serverName)].filter((w): w is ConnectionWrapper<H> => w !== undefined)
			: Array.from(this.connections.values());

		this.logger.info(
			`${LOG_PREFIXES.CACHE} Cache invalidation requested for ${serverName ?? 'all servers'}, rebuilding ${targets.length} connection(s)`
		);
		for (const wrapper of targets) {
			this.healthChecks.cancel(wrapper.serverName);
			wrapper.compareAndSetState(CONNECTION_STATES.CONNECTED, CONNECTION_STATES.CLOSED);
			this.triggerBackgroundRebuild(wrapper.serverName);
		}
		return targets.length;
	}

	/**
	 * Reload configurations from the repository, then rebuild every connection.
	 */
	async invalidateAllCache(): Promise<void> {
		this.logger.info(`${LOG_PREFIXES.CACHE} All cache invalidation requested`);
		await this.configCache.reload();
		this.invalidateCache();
	}

	async triggerCacheReload(): Promise<void> {
		this.logger.info(`${LOG_PREFIXES.CACHE} Triggering cache reload`);
		await this.invalidateAllCache();
	}

	checkConnectionHealth(serverName: string): boolean {
		const wrapper = this.connections.get(serverName);
		return wrapper !== undefined && this.healthChecks.isHealthy(wrapper);
	}

	getConnectionStats(): Map<string, ConnectionStats> {
		const stats = new Map<string, ConnectionStats>();
		for (const [serverName, wrapper] of this.connections) {
			stats.set(serverName, wrapper.toStats());
		}
		return stats;
	}

	isShutdown(): boolean {
		return this.shuttingDown;
	}

	/**
	 * Close every live handle, clear the registry, cancel health checks and stop
	 * the worker pools. Calling it again returns the first call's report.
	 */
	shutdown(): Promise<ShutdownReport> {
		if (!this.shutdownPromise) {
			this.shuttingDown = true;
			this.shutdownPromise = this.performShutdown();
		}
		return this.shutdownPromise;
	}

	// ======================================================
	// Background Work
	// ======================================================

	private triggerBackgroundCreation(serverName: string): void {
		if (this.connections.has(serverName)) {
			return;
		}
		if (!this.configCache.has(serverName)) {
			this.logger.warn(`${LOG_PREFIXES.CACHE} ${ERROR_MESSAGES.CONFIG_NOT_FOUND}: ${serverName}`);
			return;
		}

		// The placeholder is the claim: later readers see RECONNECTING and back off.
		const placeholder = new ConnectionWrapper<H>(serverName);
		this.connections.set(serverName, placeholder);

		const accepted = this.connectionPool.execute(
			signal => this.createConnection(placeholder, signal),
			`create-${serverName}`
		);
		if (!accepted) {
			placeholder.compareAndSetState(CONNECTION_STATES.RECONNECTING, CONNECTION_STATES.CLOSED);
		}
	}

	private triggerBackgroundRebuild(serverName: string): void {
		const wrapper = this.connections.get(serverName);
		if (!wrapper) {
			this.triggerBackgroundCreation(serverName);
			return;
		}

		const state = wrapper.getState();
		if (state === CONNECTION_STATES.RECONNECTING || state === CONNECTION_STATES.CONNECTED) {
			return;
		}
		if (!this.configCache.has(serverName)) {
			this.retireConnection(wrapper);
			return;
		}
		if (!wrapper.compareAndSetState(state, CONNECTION_STATES.RECONNECTING)) {
			return;
		}

		const accepted = this.rebuildPool.execute(
			signal => this.rebuildConnection(wrapper, signal),
			`rebuild-${serverName}`
		);
		if (!accepted) {
			wrapper.compareAndSetState(CONNECTION_STATES.RECONNECTING, CONNECTION_STATES.CLOSED);
		}
	}

	/**
	 * Close the handle of a server whose configuration is gone. The wrapper stays
	 * CLOSED; nothing is rebuilt until the config comes back.
	 */
	private retireConnection(wrapper: ConnectionWrapper<H>): void {
		const serverName = wrapper.serverName;
		this.logger.debug(`${LOG_PREFIXES.CACHE} ${ERROR_MESSAGES.CONFIG_NOT_FOUND}, not rebuilding: ${serverName}`);
		if (wrapper.getHandle() === null) {
			return;
		}

		// Left in place when refused; shutdown closes it
		this.rebuildPool.execute(async () => {
			const stale = wrapper.takeHandle();
			if (stale) {
				await closeHandleSafely(stale, serverName, this.closePolicy, this.logger);
			}
		}, `retire-${serverName}`);
	}

	private async createConnection(wrapper: ConnectionWrapper<H>, signal: AbortSignal): Promise<void> {
		const serverName = wrapper.serverName;
		const config = this.configCache.get(serverName);
		if (!config) {
			this.logger.warn(
				`${LOG_PREFIXES.CACHE} MCP server configuration not found for background creation: ${serverName}`
			);
			if (this.connections.get(serverName) === wrapper) {
				this.connections.delete(serverName);
			}
			return;
		}

		await this.establish(wrapper, config, signal);
	}

	private async rebuildConnection(wrapper: ConnectionWrapper<H>, signal: AbortSignal): Promise<void> {
		const outcome = await wrapper.rebuildLock.runIfFree(
			() => this.rebuildLocked(wrapper, signal),
			`rebuild-${wrapper.serverName}`
		);
		if (!outcome.ran) {
			this.logger.debug(
				`${LOG_PREFIXES.CACHE} Connection rebuild already in progress for server: ${wrapper.serverName}`,
				{ holder: wrapper.rebuildLock.getHolder() }
			);
		}
	}

	/**
	 * Body of a rebuild; runs only while holding the wrapper's rebuild lock.
	 */
	private async rebuildLocked(wrapper: ConnectionWrapper<H>, signal: AbortSignal): Promise<void> {
		const serverName = wrapper.serverName;
		if (wrapper.isConnected()) {
			this.logger.debug(`${LOG_PREFIXES.CACHE} Connection already rebuilt for server: ${serverName}`);
			return;
		}
		if (wrapper.isClosed()) {
			wrapper.compareAndSetState(wrapper.getState(), CONNECTION_STATES.RECONNECTING);
		}

		this.logger.info(`${LOG_PREFIXES.CACHE} Rebuilding connection for server: ${serverName}`);

		const stale = wrapper.takeHandle();
		if (stale) {
			await closeHandleSafely(stale, serverName, this.closePolicy, this.logger);
		}

		const delayMs = this.properties.connectionRebuildDelayMs;
		if (delayMs > 0) {
			try {
				await sleep(delayMs, signal);
			} catch (error) {
				if (!(error instanceof AbortedError)) {
					throw error;
				}
				this.logger.warn(`${LOG_PREFIXES.CACHE} Rebuild interrupted for server: ${serverName}`);
				wrapper.compareAndSetState(CONNECTION_STATES.RECONNECTING, CONNECTION_STATES.CLOSED);
				return;
			}
		}

		const config = this.configCache.get(serverName);
		if (!config) {
			this.logger.error(`${LOG_PREFIXES.CACHE} MCP server configuration not found for rebuild: ${serverName}`);
			wrapper.compareAndSetState(CONNECTION_STATES.RECONNECTING, CONNECTION_STATES.CLOSED);
			return;
		}

		await this.establish(wrapper, config, signal);
	}

	/**
	 * Ask the factory for a handle and install it. Never throws; failures end in
	 * CLOSED so the next read or health check starts a rebuild.
	 */
	private async establish(
		wrapper: ConnectionWrapper<H>,
		config: ServerConfig,
		signal: AbortSignal
	): Promise<void> {
		const serverName = wrapper.serverName;
		let handle: H | null;
		try {
			handle = await this.connectionFactory.createConnection(config);
		} catch (error) {
			this.logger.error(
				`${LOG_PREFIXES.CACHE} Failed to create connection for server ${serverName}: ${ConnectionErrorUtils.describe(error)}`
			);
			wrapper.compareAndSetState(CONNECTION_STATES.RECONNECTING, CONNECTION_STATES.CLOSED);
			return;
		}

		if (!handle) {
			this.logger.error(`${LOG_PREFIXES.CACHE} Connection factory returned no handle for server: ${serverName}`);
			wrapper.compareAndSetState(CONNECTION_STATES.RECONNECTING, CONNECTION_STATES.CLOSED);
			return;
		}

		const wanted =
			!this.shuttingDown && !signal.aborted && this.connections.get(serverName) === wrapper;
		if (
			!wanted ||
			!wrapper.compareAndSetState(CONNECTION_STATES.RECONNECTING, CONNECTION_STATES.CONNECTED)
		) {
			this.logger.debug(
				`${LOG_PREFIXES.CACHE} Discarding connection for server ${serverName}: no longer wanted`
			);
			await closeHandleSafely(handle, serverName, this.closePolicy, this.logger);
			return;
		}

		wrapper.setHandle(handle);
		this.logger.info(`${LOG_PREFIXES.CACHE} Connection established for server: ${serverName}`);
		this.healthChecks.schedule(serverName);
	}

	private async performShutdown(): Promise<ShutdownReport> {
		this.logger.info(`${LOG_PREFIXES.CACHE} Shutting down MCP cache manager`);

		const handles = Array.from(this.connections.values())
			.map(wrapper => wrapper.takeHandle())
			.filter((handle): handle is H => handle !== null);
		const results = await Promise.all(
			handles.map(handle => closeHandleSafely(handle, handle.serverName, this.closePolicy, this.logger))
		);
		const closedCount = results.filter(Boolean).length;

		this.connections.clear();
		this.configCache.clear();
		this.healthChecks.cancelAll();

		const pools = [this.healthCheckPool, this.rebuildPool, this.connectionPool];
		for (const pool of pools) {
			pool.shutdown();
		}

		const poolReports: Record<string, PoolTerminationReport> = {};
		for (const pool of pools) {
			const terminated = await pool.awaitTermination(this.properties.shutdownTimeoutMs);
			if (!terminated) {
				const dropped = pool.shutdownNow();
				this.logger.warn(
					`${LOG_PREFIXES.CACHE} Pool '${pool.name}' did not terminate in time, forced down (${dropped} queued task(s) dropped)`
				);
			}
			poolReports[pool.name] = { terminated: terminated || pool.isTerminated(), forced: !terminated };
		}

		const report: ShutdownReport = {
			closedCount,
			failedCount: results.length - closedCount,
			pools: poolReports,
		};
		this.logger.info(
			`${LOG_PREFIXES.CACHE} MCP cache manager shutdown completed. Closed ${closedCount} MCP client(s).`
		);
		return report;
	}
}
