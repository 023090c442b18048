/**
 * Timeout error kind and a helper to bound database calls.
 *
 * The transient classifier recognises timeouts by error kind only: an
 * instance of {@link TimeoutError}, or any `Error` whose `name` is one of the
 * configured timeout names (`AbortSignal.timeout()` rejects with a
 * `DOMException` named "TimeoutError", for instance).
 *
 * @module errors/timeout
 */

/** Error names treated as timeouts when no other names are configured. */
export const DEFAULT_TIMEOUT_ERROR_NAMES: readonly string[] = ['TimeoutError']

/**
 * Raised when a bounded operation does not settle in time.
 */
export class TimeoutError extends Error {
	/**
	 * @param message - Error description
	 * @param timeoutMs - Limit that was exceeded
	 */
	constructor(
		message: string,
		public readonly timeoutMs: number,
	) {
		super(message)
		this.name = 'TimeoutError'
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, TimeoutError)
		}
	}
}

/**
 * Check whether a value is an error of timeout kind.
 *
 * The message is never inspected: `new Error("timed out")` is not a timeout.
 *
 * @param value - Any caught value
 * @param names - Error names that denote a timeout
 */
export function isTimeoutError(
	value: unknown,
	names: readonly string[] = DEFAULT_TIMEOUT_ERROR_NAMES,
): boolean {
	if (value instanceof TimeoutError) {
		return true
	}
	return value instanceof Error && names.includes(value.name)
}

/**
 * Reject with a {@link TimeoutError} when `promise` takes longer than
 * `timeoutMs`. The timer is cleared once the race settles.
 *
 * The underlying operation is not cancelled; drivers that support
 * cancellation should be given their own signal.
 *
 * @example
 * ```typescript
 * const rows = await withTimeout(pool.request().query(sql), 5000)
 * ```
 */
export async function withTimeout<T>(
	promise: Promise<T>,
	timeoutMs: number,
	message?: string,
): Promise<T> {
	let timer: NodeJS.Timeout | undefined
	const timeout = new Promise<never>((_, reject) => {
		timer = setTimeout(() => {
			reject(
				new TimeoutError(
					message ?? `Operation timed out after ${timeoutMs}ms`,
					timeoutMs,
				),
			)
		}, timeoutMs)
	})

	try {
		return await Promise.race([promise, timeout])
	} finally {
		clearTimeout(timer)
	}
}
