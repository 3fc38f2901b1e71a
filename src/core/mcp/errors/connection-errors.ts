/**
 * Connection Errors - MCP Connection Specific Errors
 *
 * Error classes raised by the connection cache, plus the heuristic that decides
 * whether an arbitrary failure should invalidate a cached connection.
 */

import {
	CONNECTION_ERROR_MESSAGE_MARKERS,
	CONNECTION_ERROR_TYPE_MARKERS,
	ERROR_MESSAGES,
	IO_ERROR_CODES,
	IO_ERROR_MESSAGE_MARKERS,
	READ_TIMEOUT_TYPE_MARKERS,
} from '../constants.js';
import type { ConnectionState } from '../types.js';

/**
 * Base class for all MCP connection-related errors
 */
export abstract class MCPConnectionError extends Error {
	public readonly serverName: string;
	public readonly recoverable: boolean;
	public readonly timestamp: Date;
	public readonly errorCode: string;

	constructor(
		message: string,
		serverName: string,
		recoverable = true,
		errorCode = 'MCP_CONNECTION_ERROR',
		cause?: unknown
	) {
		super(message, cause === undefined ? undefined : { cause });
		this.name = new.target.name;
		this.serverName = serverName;
		this.recoverable = recoverable;
		this.timestamp = new Date();
		this.errorCode = errorCode;

		Object.setPrototypeOf(this, new.target.prototype);
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			serverName: this.serverName,
			recoverable: this.recoverable,
			timestamp: this.timestamp.toISOString(),
			errorCode: this.errorCode,
		};
	}
}

/**
 * No usable connection right now. The registry read that produced this has
 * already scheduled creation or rebuild in the background.
 */
export class ConnectionUnavailableError extends MCPConnectionError {
	public readonly state?: ConnectionState;

	constructor(serverName: string, state?: ConnectionState) {
		const stateText = state ? ` (state: ${state})` : '';
		super(
			`${ERROR_MESSAGES.CONNECTION_UNAVAILABLE}: ${serverName}${stateText}`,
			serverName,
			true,
			'CONNECTION_UNAVAILABLE'
		);
		this.state = state;
	}
}

/**
 * An operation against a server exceeded its time bound
 */
export class ConnectionTimeoutError extends MCPConnectionError {
	public readonly timeoutMs: number;

	constructor(message: string, serverName: string, timeoutMs: number) {
		super(message, serverName, true, 'CONNECTION_TIMEOUT');
		this.timeoutMs = timeoutMs;
	}
}

/**
 * Establishing a session failed
 */
export class ConnectionFailureError extends MCPConnectionError {
	public readonly attempt: number;

	constructor(message: string, serverName: string, attempt = 1, cause?: unknown) {
		super(message, serverName, true, 'CONNECTION_FAILURE', cause);
		this.attempt = attempt;
	}
}

/**
 * The server has no enabled configuration, or the configuration is invalid.
 * Never retried: only a config reload can fix it.
 */
export class ConfigurationError extends MCPConnectionError {
	public readonly configField?: string;

	constructor(message: string, serverName: string, configField?: string) {
		super(message, serverName, false, 'CONFIGURATION_ERROR');
		this.configField = configField;
	}
}

/**
 * Thrown by executeWithRetry. Carries the attempt count, the server and the last
 * underlying failure as `cause`.
 */
export class MCPExecutionError extends MCPConnectionError {
	public readonly attempts: number;
	public readonly connectionRelated: boolean;

	constructor(
		message: string,
		serverName: string,
		attempts: number,
		connectionRelated: boolean,
		cause?: unknown
	) {
		super(message, serverName, connectionRelated, 'EXECUTION_FAILED', cause);
		this.attempts = attempts;
		this.connectionRelated = connectionRelated;
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			attempts: this.attempts,
			connectionRelated: this.connectionRelated,
			cause: this.cause instanceof Error ? this.cause.message : undefined,
		};
	}
}

// ======================================================
// Classification
// ======================================================

const lowerMessage = (error: Error): string => (error.message || '').toLowerCase();

const typeNames = (error: Error): string[] => {
	const names = [error.name];
	const ctorName = error.constructor?.name;
	if (ctorName && ctorName !== error.name) {
		names.push(ctorName);
	}
	return names;
};

const typeNameMatches = (error: Error, markers: readonly string[]): boolean =>
	typeNames(error).some(name => markers.some(marker => name.includes(marker)));

const errorCode = (error: Error): string | undefined => {
	const code: unknown = Reflect.get(error, 'code');
	return typeof code === 'string' ? code : undefined;
};

const hasIoErrorCode = (error: Error): boolean => {
	const code = errorCode(error);
	return code !== undefined && IO_ERROR_CODES.includes(code);
};

/**
 * Other system errors (an unlisted code on a failed syscall) only count when the
 * message says so.
 */
const isSyscallError = (error: Error): boolean => typeof Reflect.get(error, 'syscall') === 'string';

const isTimeoutError = (error: Error): boolean =>
	error instanceof ConnectionTimeoutError ||
	error.name === 'TimeoutError' ||
	errorCode(error) === 'ETIMEDOUT';

/**
 * Utility functions for working with connection errors
 */
export class ConnectionErrorUtils {
	/**
	 * Decide whether a failure should invalidate the connection and trigger a
	 * rebuild, as opposed to being an application-level error surfaced as-is.
	 *
	 * This is a best-effort match over heterogeneous transport failures: it looks at
	 * type names and message text, so an application error whose message happens to
	 * mention "connection" is classified as connection-related too.
	 */
	static isConnectionError(error: unknown): boolean {
		if (!(error instanceof Error)) {
			return false;
		}

		if (isTimeoutError(error)) {
			return true;
		}

		if (typeNameMatches(error, READ_TIMEOUT_TYPE_MARKERS)) {
			return true;
		}

		if (error.cause instanceof Error && typeNameMatches(error.cause, READ_TIMEOUT_TYPE_MARKERS)) {
			return true;
		}

		// Node's messages for these ("write EPIPE", "connect ECONNREFUSED ...") carry no connection words
		if (hasIoErrorCode(error)) {
			return true;
		}

		if (isSyscallError(error)) {
			const message = lowerMessage(error);
			if (message) {
				return IO_ERROR_MESSAGE_MARKERS.some(marker => message.includes(marker));
			}
			return true;
		}

		if (typeNameMatches(error, CONNECTION_ERROR_TYPE_MARKERS)) {
			return true;
		}

		const message = lowerMessage(error);
		return CONNECTION_ERROR_MESSAGE_MARKERS.some(marker => message.includes(marker));
	}

	/**
	 * Check if an error is worth retrying at all
	 */
	static isRecoverable(error: unknown): boolean {
		if (error instanceof MCPConnectionError) {
			return error.recoverable;
		}
		return ConnectionErrorUtils.isConnectionError(error);
	}

	static getServerName(error: unknown): string | undefined {
		return error instanceof MCPConnectionError ? error.serverName : undefined;
	}

	static getErrorCode(error: unknown): string {
		return error instanceof MCPConnectionError ? error.errorCode : 'UNKNOWN_ERROR';
	}

	static describe(error: unknown): string {
		return error instanceof Error ? error.message : String(error);
	}
}
