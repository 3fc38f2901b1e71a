/**
 * Core types for the MCP connection cache.
 *
 * The cache manager is written against three capabilities it does not implement
 * itself: a connection factory, a configuration repository and the connection
 * handles the factory produces.
 */

import type { ServerConfig } from './config.js';
import { CONNECTION_STATES } from './constants.js';

// ======================================================
// Connection State
// ======================================================

export type ConnectionState = (typeof CONNECTION_STATES)[keyof typeof CONNECTION_STATES];

// ======================================================
// External Capabilities
// ======================================================

/**
 * A live transport session to one MCP server.
 */
export interface ConnectionHandle {
	readonly serverName: string;

	/**
	 * False once the underlying transport is known to be gone. The health check
	 * demotes a connected wrapper whose handle reports false.
	 */
	isOpen(): boolean;

	/**
	 * Orderly shutdown of the session. May hang; callers bound it with a timeout.
	 */
	closeGracefully(): Promise<void>;

	/**
	 * Immediate teardown, used when the graceful close fails or times out.
	 */
	close(): Promise<void>;
}

/**
 * Establishes a session for a server configuration. Only background workers call
 * this, so implementations are free to take as long as the network does.
 * Resolving to null counts as a failed attempt.
 */
export interface ConnectionFactory<H extends ConnectionHandle> {
	createConnection(config: ServerConfig): Promise<H | null>;
}

/**
 * Source of persisted server configurations.
 */
export interface ConfigRepository {
	findEnabledConfigs(): Promise<ServerConfig[]>;
}

// ======================================================
// Observability
// ======================================================

export interface ConnectionStats {
	state: ConnectionState;
	pendingRequests: number;
	hasHandle: boolean;
}

export interface PoolTerminationReport {
	terminated: boolean;
	/** True when the bounded wait ran out and running work was aborted */
	forced: boolean;
}

export interface ShutdownReport {
	/** Handles closed, gracefully or by force */
	closedCount: number;
	/** Handles whose forced close also failed */
	failedCount: number;
	pools: Record<string, PoolTerminationReport>;
}

/**
 * Outcome of one health-check tick for a server.
 */
export type HealthCheckOutcome =
	| 'removed'
	| 'healthy'
	| 'invalid-handle'
	| 'overloaded'
	| 'rebuild-triggered'
	| 'reconnecting';
