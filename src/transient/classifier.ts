/**
 * Transient error detection for SQL Server and Azure SQL Database.
 *
 * A retry layer calls {@link isTransient} (or a configured
 * {@link TransientErrorClassifier}) with whatever its database call threw
 * and retries only when the answer is true.
 *
 * - **SqlException**: the first sub-error whose number is in
 *   {@link TRANSIENT_ERROR_NUMBERS} decides; 40501 also yields a decoded
 *   {@link ThrottlingCondition}
 * - **Other errors**: transient only when they are of timeout kind
 * - **null/undefined**: never transient
 *
 * @module transient/classifier
 */

import type { Logger } from '@logtape/logtape'
import {
	DEFAULT_TIMEOUT_ERROR_NAMES,
	isTimeoutError,
} from '../errors/timeout.js'
import { getFaultLogger } from '../logging/configure.js'
import { isSqlException, type SqlException } from '../sql/sql-error.js'
import {
	THROTTLING_ERROR_NUMBER,
	ThrottlingCondition,
} from '../throttling/condition.js'
import type { ThrottlingMode } from '../throttling/types.js'
import { TRANSIENT_ERROR_NUMBERS } from './codes.js'

/** `SqlException.data` key holding the decoded throttling mode. */
export const THROTTLING_MODE_DATA_KEY = 'ThrottlingMode'

/** `SqlException.data` key holding the decoded {@link ThrottlingCondition}. */
export const THROTTLING_CONDITION_DATA_KEY = 'ThrottlingCondition'

/**
 * Outcome of classifying one error.
 */
export interface TransientClassification {
	transient: boolean

	/** Sub-error number that matched the transient table. */
	errorNumber?: number

	/** Present when the matching sub-error was 40501. */
	throttling?: ThrottlingCondition
}

export interface TransientErrorClassifierOptions {
	/** Extra error numbers to treat as transient, on top of the built-in table. */
	additionalTransientNumbers?: readonly number[]

	/**
	 * Error names that count as timeouts for non-SQL errors.
	 * Defaults to `["TimeoutError"]`.
	 */
	timeoutErrorNames?: readonly string[]

	/**
	 * Whether {@link TransientErrorClassifier.isTransient} stores the decoded
	 * throttling mode and condition in `SqlException.data`. Defaults to true.
	 */
	attachThrottlingData?: boolean

	logger?: Logger
}

/**
 * Throttling data previously attached to a SqlException.
 */
export interface AttachedThrottlingData {
	mode: ThrottlingMode
	condition: ThrottlingCondition
}

const NOT_TRANSIENT: TransientClassification = Object.freeze({ transient: false })

/**
 * Decides whether a caught database error is worth retrying.
 *
 * @example
 * ```typescript
 * const classifier = new TransientErrorClassifier({
 *   additionalTransientNumbers: [1205], // deadlock victim
 * })
 *
 * const { transient, throttling } = classifier.classify(error)
 * if (throttling?.isThrottledOnWorkerThreads) shedLoad()
 * ```
 */
export class TransientErrorClassifier {
	private readonly transientNumbers: ReadonlySet<number>
	private readonly timeoutErrorNames: readonly string[]
	private readonly attachThrottlingData: boolean
	private readonly logger: Logger

	constructor(options: TransientErrorClassifierOptions = {}) {
		this.transientNumbers = new Set([
			...TRANSIENT_ERROR_NUMBERS,
			...(options.additionalTransientNumbers ?? []),
		])
		this.timeoutErrorNames =
			options.timeoutErrorNames ?? DEFAULT_TIMEOUT_ERROR_NAMES
		this.attachThrottlingData = options.attachThrottlingData ?? true
		this.logger = options.logger ?? getFaultLogger('classifier')
	}

	/**
	 * Classify an error without touching it.
	 *
	 * Never throws. Sub-errors are scanned in order and unmatched numbers are
	 * skipped; the first match decides.
	 */
	classify(error: unknown): TransientClassification {
		if (error == null) {
			return NOT_TRANSIENT
		}

		if (!isSqlException(error)) {
			const transient = isTimeoutError(error, this.timeoutErrorNames)
			if (transient) {
				this.logger.debug('Timeout classified as transient', {
					errorName: error instanceof Error ? error.name : undefined,
				})
			}
			return transient ? { transient } : NOT_TRANSIENT
		}

		const match = error.errors.find((sqlError) =>
			this.transientNumbers.has(sqlError.number),
		)
		if (!match) {
			this.logger.debug('No transient error number found', {
				errorNumbers: error.errors.map((sqlError) => sqlError.number),
			})
			return NOT_TRANSIENT
		}

		if (match.number !== THROTTLING_ERROR_NUMBER) {
			this.logger.debug('Error {errorNumber} classified as transient', {
				errorNumber: match.number,
			})
			return { transient: true, errorNumber: match.number }
		}

		const throttling = ThrottlingCondition.fromError(match)
		this.logger.debug('Throttling error {errorNumber} decoded: {condition}', {
			errorNumber: match.number,
			mode: throttling.mode,
			condition: throttling.toString(),
		})
		return { transient: true, errorNumber: match.number, throttling }
	}

	/**
	 * Classify an error and report whether it is transient.
	 *
	 * For a 40501 match, and unless `attachThrottlingData` is off, the decoded
	 * mode and condition are written to `error.data` under
	 * {@link THROTTLING_MODE_DATA_KEY} and {@link THROTTLING_CONDITION_DATA_KEY}
	 * (overwriting earlier values).
	 */
	isTransient(error: unknown): boolean {
		const classification = this.classify(error)

		if (
			this.attachThrottlingData &&
			classification.throttling &&
			isSqlException(error)
		) {
			error.data.set(THROTTLING_MODE_DATA_KEY, classification.throttling.mode)
			error.data.set(THROTTLING_CONDITION_DATA_KEY, classification.throttling)
		}

		return classification.transient
	}
}

/**
 * Read the throttling data {@link TransientErrorClassifier.isTransient}
 * attached to an exception.
 */
export function getThrottlingData(
	exception: SqlException,
): AttachedThrottlingData | undefined {
	const condition = exception.data.get(THROTTLING_CONDITION_DATA_KEY)
	if (!(condition instanceof ThrottlingCondition)) {
		return undefined
	}
	return { mode: condition.mode, condition }
}

const defaultClassifier = new TransientErrorClassifier()

/**
 * Classify with the built-in table and default options.
 */
export function classifyTransientError(error: unknown): TransientClassification {
	return defaultClassifier.classify(error)
}

/**
 * Report whether an error is transient using the built-in table and default
 * options, attaching throttling data to 40501 exceptions.
 *
 * @example
 * ```typescript
 * try {
 *   await runQuery()
 * } catch (error) {
 *   if (!isTransient(error)) throw error
 *   await sleep(backoff.next())
 * }
 * ```
 */
export function isTransient(error: unknown): boolean {
	return defaultClassifier.isTransient(error)
}
