export {
	MCPConnectionError,
	ConnectionUnavailableError,
	ConnectionTimeoutError,
	ConnectionFailureError,
	ConfigurationError,
	MCPExecutionError,
	ConnectionErrorUtils,
} from './connection-errors.js';
export { RetryExhaustedError } from './recovery-errors.js';
export type { RetryAttemptRecord } from './recovery-errors.js';
