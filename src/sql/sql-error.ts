/**
 * Driver error model for SQL Server and Azure SQL Database.
 *
 * A server response can carry several errors at once; {@link SqlException}
 * keeps them in the order they were received. Errors thrown by Node drivers
 * (mssql, tedious) are converted with {@link toSqlException}.
 *
 * @module sql/sql-error
 */

import { z } from 'zod'
import { StructuredError } from '../errors/structured-error.js'

/**
 * One error or warning returned by the server.
 */
export interface SqlError {
	/** Server error number, e.g. 40501 */
	readonly number: number
	readonly message: string
	readonly state?: number
	/** Severity class (0-25) */
	readonly class?: number
	readonly serverName?: string
	readonly procName?: string
	readonly lineNumber?: number
}

/**
 * Error raised for a failed database request.
 *
 * `data` holds auxiliary values attached by consumers; the transient
 * classifier stores decoded throttling information there.
 */
export class SqlException extends Error {
	/** Sub-errors in the order the server returned them. Never empty. */
	public readonly errors: readonly SqlError[]

	/** Number of the first sub-error. */
	public readonly number: number

	public readonly data: Map<string, unknown> = new Map()

	constructor(
		errors: readonly SqlError[],
		message?: string,
		options?: { cause?: unknown },
	) {
		const [first] = errors
		if (!first) {
			throw new StructuredError(
				'SqlException requires at least one SqlError',
				'VALIDATION',
				'SQL_ERRORS_EMPTY',
				false,
			)
		}
		super(
			message ?? errors.map((error) => error.message).join('\n'),
			options,
		)
		this.name = 'SqlException'
		this.errors = Object.freeze(errors.map((error) => Object.freeze({ ...error })))
		this.number = first.number

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, SqlException)
		}
	}
}

export function isSqlException(value: unknown): value is SqlException {
	return value instanceof SqlException
}

const sqlErrorSchema = z.object({
	number: z.number().int(),
	message: z.string(),
	state: z.number().optional(),
	class: z.number().optional(),
	serverName: z.string().optional(),
	procName: z.string().optional(),
	lineNumber: z.number().optional(),
})

// { errors: [...] } as produced by batch runners and test doubles
const errorListSchema = z.object({
	errors: z.array(sqlErrorSchema).min(1),
})

// mssql RequestError / tedious RequestError
const requestErrorSchema = sqlErrorSchema.extend({
	precedingErrors: z.array(sqlErrorSchema).optional(),
})

/**
 * Convert an error thrown by a SQL Server driver into a {@link SqlException}.
 *
 * Accepted shapes, checked in order:
 * 1. an existing `SqlException` (returned as is)
 * 2. an object with a non-empty `errors` array of `{ number, message }`
 * 3. a request error with numeric `number`, string `message` and optional
 *    `precedingErrors`; sub-errors become `[...precedingErrors, error]`
 *
 * @param value - Any caught value
 * @returns The converted exception, or undefined for anything else
 *
 * @example
 * ```typescript
 * try {
 *   await pool.request().query(sql)
 * } catch (error) {
 *   const sqlException = toSqlException(error)
 *   if (sqlException && isTransient(sqlException)) retry()
 * }
 * ```
 */
export function toSqlException(value: unknown): SqlException | undefined {
	if (value instanceof SqlException) {
		return value
	}

	const cause = value instanceof Error ? value : undefined

	const list = errorListSchema.safeParse(value)
	if (list.success) {
		return new SqlException(list.data.errors, cause?.message, { cause })
	}

	const request = requestErrorSchema.safeParse(value)
	if (request.success) {
		const { precedingErrors = [], ...last } = request.data
		return new SqlException([...precedingErrors, last], undefined, { cause })
	}

	return undefined
}
