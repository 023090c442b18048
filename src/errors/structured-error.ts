/**
 * Structured errors raised by this library.
 *
 * Classification and decoding never throw; these errors only surface from
 * invalid construction of the driver error model and from loading
 * classifier configuration.
 *
 * @module errors/structured-error
 */

/**
 * Categories of errors raised by the library itself.
 */
export type ErrorCategory =
	| 'VALIDATION' // A value handed to a constructor or parser is malformed
	| 'CONFIGURATION' // Classifier configuration is missing or invalid
	| 'TIMEOUT' // A bounded operation exceeded its limit
	| 'INTERNAL' // Unexpected state
	| 'UNKNOWN'

/**
 * Error with a category, a machine-readable code, a recoverability flag and
 * free-form context.
 *
 * @example
 * ```typescript
 * throw new StructuredError(
 *   "Classifier config not found",
 *   "CONFIGURATION",
 *   "CONFIG_NOT_FOUND",
 *   false,
 *   { filePath },
 * );
 * ```
 */
export class StructuredError extends Error {
	public readonly category: ErrorCategory

	/** Machine-readable code, e.g. "CONFIG_INVALID". */
	public readonly code: string

	/** Whether repeating the failed call could succeed. */
	public readonly recoverable: boolean

	public readonly context: Record<string, unknown>

	public override readonly cause?: Error

	constructor(
		message: string,
		category: ErrorCategory,
		code: string,
		recoverable: boolean,
		context: Record<string, unknown> = {},
		cause?: Error,
	) {
		super(message)
		this.name = 'StructuredError'
		this.category = category
		this.code = code
		this.recoverable = recoverable
		this.context = context
		this.cause = cause

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, StructuredError)
		}
	}

	/**
	 * Plain-object form for structured log records.
	 */
	toJSON(): {
		name: string
		message: string
		category: ErrorCategory
		code: string
		recoverable: boolean
		context: Record<string, unknown>
		cause?: { name: string; message: string }
	} {
		return {
			name: this.name,
			message: this.message,
			category: this.category,
			code: this.code,
			recoverable: this.recoverable,
			context: this.context,
			...(this.cause && {
				cause: { name: this.cause.name, message: this.cause.message },
			}),
		}
	}
}

export function isStructuredError(error: unknown): error is StructuredError {
	return error instanceof StructuredError
}

/**
 * True when the value is a StructuredError flagged as recoverable.
 */
export function isRecoverableError(error: unknown): boolean {
	return isStructuredError(error) && error.recoverable
}
