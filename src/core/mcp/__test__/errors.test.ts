import { describe, it, expect } from 'vitest';
import {
	ConfigurationError,
	ConnectionErrorUtils,
	ConnectionFailureError,
	ConnectionTimeoutError,
	ConnectionUnavailableError,
	MCPExecutionError,
	RetryExhaustedError,
} from '../errors/index.js';

const systemError = (message: string, code: string) => Object.assign(new Error(message), { code });

describe('ConnectionErrorUtils.isConnectionError', () => {
	it('treats timeouts as connection-related', () => {
		const named = new Error('operation took too long');
		named.name = 'TimeoutError';

		expect(ConnectionErrorUtils.isConnectionError(new ConnectionTimeoutError('slow', 'alpha', 50))).toBe(
			true
		);
		expect(ConnectionErrorUtils.isConnectionError(named)).toBe(true);
		expect(ConnectionErrorUtils.isConnectionError(systemError('connect ETIMEDOUT', 'ETIMEDOUT'))).toBe(true);
	});

	it('recognises a read timeout by type name, also when it is the cause', () => {
		const readTimeout = new Error('no data');
		readTimeout.name = 'ReadTimeoutException';

		expect(ConnectionErrorUtils.isConnectionError(readTimeout)).toBe(true);
		expect(
			ConnectionErrorUtils.isConnectionError(new Error('request failed', { cause: readTimeout }))
		).toBe(true);
	});

	it('treats listed socket error codes as connection-related whatever the message', () => {
		expect(ConnectionErrorUtils.isConnectionError(systemError('read ECONNRESET', 'ECONNRESET'))).toBe(true);
		expect(ConnectionErrorUtils.isConnectionError(systemError('', 'EPIPE'))).toBe(true);
		expect(ConnectionErrorUtils.isConnectionError(systemError('write EPIPE', 'EPIPE'))).toBe(true);
		expect(
			ConnectionErrorUtils.isConnectionError(systemError('connect ECONNREFUSED 127.0.0.1:8080', 'ECONNREFUSED'))
		).toBe(true);
		expect(
			ConnectionErrorUtils.isConnectionError(systemError('connect EHOSTUNREACH 10.0.0.9:443', 'EHOSTUNREACH'))
		).toBe(true);
	});

	it('checks the message of other failed syscalls', () => {
		const syscallError = (message: string, code: string) =>
			Object.assign(new Error(message), { code, syscall: 'open' });

		expect(ConnectionErrorUtils.isConnectionError(syscallError("open '/tmp/x': ENOENT", 'ENOENT'))).toBe(false);
		expect(ConnectionErrorUtils.isConnectionError(syscallError('pipe broken by peer', 'EIO'))).toBe(true);
		expect(ConnectionErrorUtils.isConnectionError(syscallError('', 'EIO'))).toBe(true);
	});

	it('matches connection words in type names and messages', () => {
		class StreamClosedError extends Error {}

		expect(ConnectionErrorUtils.isConnectionError(new StreamClosedError('gone'))).toBe(true);
		expect(ConnectionErrorUtils.isConnectionError(new Error('Connection refused by upstream'))).toBe(true);
		expect(ConnectionErrorUtils.isConnectionError(new Error('request timed out'))).toBe(true);
	});

	it('leaves application errors and non-errors alone', () => {
		expect(ConnectionErrorUtils.isConnectionError(new Error('invalid argument: path'))).toBe(false);
		expect(ConnectionErrorUtils.isConnectionError(new TypeError('x is not a function'))).toBe(false);
		expect(ConnectionErrorUtils.isConnectionError('connection lost')).toBe(false);
		expect(ConnectionErrorUtils.isConnectionError(undefined)).toBe(false);
	});
});

describe('ConnectionErrorUtils.isRecoverable', () => {
	it('follows the recoverable flag of cache errors', () => {
		expect(ConnectionErrorUtils.isRecoverable(new ConnectionUnavailableError('alpha'))).toBe(true);
		expect(ConnectionErrorUtils.isRecoverable(new ConfigurationError('missing', 'alpha'))).toBe(false);
		expect(ConnectionErrorUtils.isRecoverable(new MCPExecutionError('boom', 'alpha', 1, false))).toBe(false);
		expect(ConnectionErrorUtils.isRecoverable(new MCPExecutionError('boom', 'alpha', 3, true))).toBe(true);
	});

	it('falls back to classification for other errors', () => {
		expect(ConnectionErrorUtils.isRecoverable(new Error('connection closed'))).toBe(true);
		expect(ConnectionErrorUtils.isRecoverable(new Error('bad input'))).toBe(false);
	});
});

describe('cache errors', () => {
	it('describe the server and state they refer to', () => {
		const unavailable = new ConnectionUnavailableError('alpha', 'RECONNECTING');

		expect(unavailable.message).toBe('Failed to get valid connection for server: alpha (state: RECONNECTING)');
		expect(unavailable.name).toBe('ConnectionUnavailableError');
		expect(unavailable).toBeInstanceOf(Error);
		expect(ConnectionErrorUtils.getServerName(unavailable)).toBe('alpha');
		expect(ConnectionErrorUtils.getErrorCode(unavailable)).toBe('CONNECTION_UNAVAILABLE');
	});

	it('keep the underlying failure as cause', () => {
		const cause = new Error('spawn ENOENT');
		const failure = new ConnectionFailureError('could not connect', 'alpha', 3, cause);

		expect(failure.cause).toBe(cause);
		expect(failure.attempt).toBe(3);
		expect(failure.errorCode).toBe('CONNECTION_FAILURE');
	});

	it('serialise execution errors with attempts and cause', () => {
		const error = new MCPExecutionError('failed', 'alpha', 2, true, new Error('socket hang up'));

		expect(error.toJSON()).toMatchObject({
			name: 'MCPExecutionError',
			message: 'failed',
			serverName: 'alpha',
			recoverable: true,
			errorCode: 'EXECUTION_FAILED',
			attempts: 2,
			connectionRelated: true,
			cause: 'socket hang up',
		});
	});

	it('fall back to generic values for foreign errors', () => {
		expect(ConnectionErrorUtils.getServerName(new Error('x'))).toBeUndefined();
		expect(ConnectionErrorUtils.getErrorCode(new Error('x'))).toBe('UNKNOWN_ERROR');
		expect(ConnectionErrorUtils.describe(42)).toBe('42');
	});
});

describe('RetryExhaustedError', () => {
	it('summarises every attempt', () => {
		const first = new Error('connection reset');
		const second = new Error('connection closed');
		const error = new RetryExhaustedError('gave up', 'alpha', 2, second, [
			{ attempt: 1, timestamp: new Date(), error: first, delayMs: 100 },
			{ attempt: 2, timestamp: new Date(), error: second },
		]);

		expect(error.lastError).toBe(second);
		expect(error.cause).toBe(second);
		expect(error.getAttemptSummary()).toBe(
			'Attempt 1 (retried after 100ms): connection reset\nAttempt 2: connection closed'
		);
	});
});
