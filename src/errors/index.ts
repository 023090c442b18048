/**
 * Library error types.
 *
 * @module errors
 */

export {
	type ErrorCategory,
	isRecoverableError,
	isStructuredError,
	StructuredError,
} from './structured-error.js'
export {
	DEFAULT_TIMEOUT_ERROR_NAMES,
	isTimeoutError,
	TimeoutError,
	withTimeout,
} from './timeout.js'
