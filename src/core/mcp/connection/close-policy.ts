import { LOG_PREFIXES } from '../constants.js';
import { ConnectionTimeoutError } from '../errors/index.js';
import type { ConnectionHandle } from '../types.js';
import { sleep, withTimeout } from '../utils/index.js';
import type { Logger } from '../../logger/index.js';

export interface ClosePolicy {
	gracefulTimeoutMs: number;
	/** Pause after a graceful close so the remote side can settle */
	settleMs: number;
	/** Pause after a forced close */
	forcedSettleMs: number;
}

/**
 * Two-phase close: a graceful close bounded by a timeout, then a forced close if
 * the graceful one failed or hung. Never throws.
 *
 * @returns True if either phase closed the handle
 */
export async function closeHandleSafely(
	handle: ConnectionHandle,
	serverName: string,
	policy: ClosePolicy,
	logger: Logger
): Promise<boolean> {
	try {
		await withTimeout(
			handle.closeGracefully(),
			policy.gracefulTimeoutMs,
			() =>
				new ConnectionTimeoutError(
					`Graceful close timed out after ${policy.gracefulTimeoutMs}ms`,
					serverName,
					policy.gracefulTimeoutMs
				)
		);
		logger.debug(`${LOG_PREFIXES.CACHE} Closed connection gracefully for server: ${serverName}`);
		await sleep(policy.settleMs);
		return true;
	} catch (gracefulError) {
		logger.warn(
			`${LOG_PREFIXES.CACHE} Graceful close failed for server ${serverName}, forcing close: ${gracefulError instanceof Error ? gracefulError.message : String(gracefulError)}`
		);
	}

	try {
		await handle.close();
		logger.debug(`${LOG_PREFIXES.CACHE} Force-closed connection for server: ${serverName}`);
		await sleep(policy.forcedSettleMs);
		return true;
	} catch (forcedError) {
		logger.error(
			`${LOG_PREFIXES.CACHE} Forced close failed for server ${serverName}: ${forcedError instanceof Error ? forcedError.message : String(forcedError)}`
		);
		return false;
	}
}
