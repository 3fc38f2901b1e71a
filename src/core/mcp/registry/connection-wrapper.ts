import { CONNECTION_STATES } from '../constants.js';
import type { ConnectionHandle, ConnectionState, ConnectionStats } from '../types.js';
import { AtomicCounter, AtomicReference, TryLock } from '../utils/index.js';

/**
 * The registry's record for one server: current state, the live handle, the
 * in-flight request count and the gate that admits one rebuild at a time.
 *
 * A wrapper created without a handle starts as a RECONNECTING placeholder, which
 * doubles as the claim that a creation task is already on its way.
 */
export class ConnectionWrapper<H extends ConnectionHandle> {
	readonly serverName: string;
	readonly pendingRequests = new AtomicCounter();
	readonly rebuildLock = new TryLock();
	private readonly state: AtomicReference<ConnectionState>;
	private handle: H | null;

	constructor(serverName: string, handle: H | null = null) {
		this.serverName = serverName;
		this.handle = handle;
		this.state = new AtomicReference<ConnectionState>(
			handle ? CONNECTION_STATES.CONNECTED : CONNECTION_STATES.RECONNECTING
		);
	}

	getState(): ConnectionState {
		return this.state.get();
	}

	/**
	 * Transition only if the wrapper is still in `expected`; otherwise a no-op and
	 * the caller should re-read the state.
	 */
	compareAndSetState(expected: ConnectionState, update: ConnectionState): boolean {
		return this.state.compareAndSet(expected, update);
	}

	isConnected(): boolean {
		return this.state.get() === CONNECTION_STATES.CONNECTED;
	}

	/**
	 * CLOSING is never assigned, but a wrapper found in it is handled as CLOSED.
	 */
	isClosed(): boolean {
		const state = this.state.get();
		return state === CONNECTION_STATES.CLOSED || state === CONNECTION_STATES.CLOSING;
	}

	getHandle(): H | null {
		return this.handle;
	}

	setHandle(handle: H | null): void {
		this.handle = handle;
	}

	/**
	 * Detach and return the current handle, leaving the wrapper without one.
	 */
	takeHandle(): H | null {
		const handle = this.handle;
		this.handle = null;
		return handle;
	}

	/**
	 * The handle, but only while the wrapper is CONNECTED
	 */
	getConnectedHandle(): H | null {
		return this.isConnected() ? this.handle : null;
	}

	toStats(): ConnectionStats {
		return {
			state: this.state.get(),
			pendingRequests: this.pendingRequests.get(),
			hasHandle: this.handle !== null,
		};
	}
}
