/**
 * Decoded throttling condition reported by Azure SQL Database.
 *
 * When a database exceeds a governed resource the server rejects work with
 * error 40501 and a message such as
 * "The service is currently busy. Retry the request after 10 seconds.
 * Incident ID: ... Code: 11514". The code packs the throttling mode and the
 * severity applied to each resource; {@link ThrottlingCondition} is its
 * decoded, immutable form.
 *
 * @module throttling/condition
 */

import type { SqlError, SqlException } from '../sql/sql-error.js'
import { decodeReasonCode, extractReasonCode } from './reason-code.js'
import type {
	ThrottledResource,
	ThrottledResourceType,
	ThrottlingMode,
	ThrottlingType,
} from './types.js'

// Culture-aware, case-insensitive at the primary level: "DatabaseSize"
// sorts before "DataReadIoDelay".
const collator = new Intl.Collator('en')

/** Server error number for resource-governance throttling. */
export const THROTTLING_ERROR_NUMBER = 40501

function freezeResources(
	resources: readonly ThrottledResource[],
): readonly ThrottledResource[] {
	return Object.freeze(
		resources.map((resource) => Object.freeze({ ...resource })),
	)
}

/**
 * Throttling mode plus the severity applied to each governed resource.
 *
 * Instances are frozen. A decoded condition has exactly nine resource
 * entries in reason-code order; {@link ThrottlingCondition.Unknown} has a
 * single `Unknown: Unknown` entry.
 *
 * @example
 * ```typescript
 * const condition = ThrottlingCondition.fromReasonCode(11514)
 * condition.mode // "RejectAllWrites"
 * condition.isThrottledOnLogWrite // true
 * String(condition)
 * // "Mode: RejectAllWrites | Cpu: None, DatabaseSize: None, ..."
 * ```
 */
export class ThrottlingCondition {
	/**
	 * Condition used when the reason code is absent or cannot be decoded.
	 * Compare with {@link ThrottlingCondition.equals} or `isUnknown`, not `===`.
	 */
	static readonly Unknown: ThrottlingCondition = new ThrottlingCondition(
		'Unknown',
		[{ resourceType: 'Unknown', throttlingType: 'Unknown' }],
	)

	readonly mode: ThrottlingMode

	/** Resource entries in construction order. */
	readonly resources: readonly ThrottledResource[]

	private constructor(
		mode: ThrottlingMode,
		resources: readonly ThrottledResource[],
	) {
		this.mode = mode
		this.resources = freezeResources(resources)
		Object.freeze(this)
	}

	/**
	 * Decode a numeric reason code. Codes `<= 0` (and anything outside the
	 * signed 32-bit range) yield {@link ThrottlingCondition.Unknown}.
	 */
	static fromReasonCode(code: number): ThrottlingCondition {
		const decoded = decodeReasonCode(code)
		if (!decoded) {
			return ThrottlingCondition.Unknown
		}
		return new ThrottlingCondition(decoded.mode, decoded.resources)
	}

	/**
	 * Decode the reason code found in a server error's message.
	 *
	 * The error number is not checked; use {@link fromException} to pick the
	 * 40501 entry out of a multi-error response.
	 */
	static fromError(error: SqlError | null | undefined): ThrottlingCondition {
		if (error == null) {
			return ThrottlingCondition.Unknown
		}

		const code = extractReasonCode(error.message)
		return code === undefined
			? ThrottlingCondition.Unknown
			: ThrottlingCondition.fromReasonCode(code)
	}

	/**
	 * Decode the first 40501 sub-error of an exception.
	 */
	static fromException(
		exception: SqlException | null | undefined,
	): ThrottlingCondition {
		const throttlingError = exception?.errors.find(
			(error) => error.number === THROTTLING_ERROR_NUMBER,
		)
		return throttlingError
			? ThrottlingCondition.fromError(throttlingError)
			: ThrottlingCondition.Unknown
	}

	/** True when the condition could not be determined. */
	get isUnknown(): boolean {
		return this.mode === 'Unknown'
	}

	get isThrottledOnDataSpace(): boolean {
		return this.isThrottledOn('PhysicalDatabaseSpace')
	}

	get isThrottledOnLogSpace(): boolean {
		return this.isThrottledOn('PhysicalLogSpace')
	}

	/** Transaction log write activity. */
	get isThrottledOnLogWrite(): boolean {
		return this.isThrottledOn('LogWriteIoDelay')
	}

	get isThrottledOnDataRead(): boolean {
		return this.isThrottledOn('DataReadIoDelay')
	}

	get isThrottledOnCpu(): boolean {
		return this.isThrottledOn('Cpu')
	}

	get isThrottledOnDatabaseSize(): boolean {
		return this.isThrottledOn('DatabaseSize')
	}

	/** Concurrent requests (worker threads). */
	get isThrottledOnWorkerThreads(): boolean {
		return this.isThrottledOn('WorkerThreads')
	}

	/**
	 * Severity of the first entry for `resourceType`, or undefined when the
	 * condition has no such entry.
	 */
	throttlingTypeOf(
		resourceType: ThrottledResourceType,
	): ThrottlingType | undefined {
		return this.resources.find(
			(resource) => resource.resourceType === resourceType,
		)?.throttlingType
	}

	/**
	 * A resource counts as throttled when its entry is present with any
	 * severity other than `None`.
	 */
	private isThrottledOn(resourceType: ThrottledResourceType): boolean {
		return this.resources.some(
			(resource) =>
				resource.resourceType === resourceType &&
				resource.throttlingType !== 'None',
		)
	}

	/**
	 * Compare by content: same mode and same entries in the same order.
	 */
	equals(other: ThrottlingCondition): boolean {
		return (
			this.mode === other.mode &&
			this.resources.length === other.resources.length &&
			this.resources.every((resource, index) => {
				const otherResource = other.resources[index]
				return (
					otherResource !== undefined &&
					resource.resourceType === otherResource.resourceType &&
					resource.throttlingType === otherResource.throttlingType
				)
			})
		)
	}

	/**
	 * Render as `Mode: <mode> | <Resource>: <Severity>, ...`.
	 *
	 * `Internal` entries are left out and the rest are sorted by their
	 * rendered text (English collation), independent of construction order.
	 */
	toString(): string {
		const resources = this.resources
			.filter((resource) => resource.resourceType !== 'Internal')
			.map((resource) => `${resource.resourceType}: ${resource.throttlingType}`)
			.sort(collator.compare)

		return `Mode: ${this.mode} | ${resources.join(', ')}`
	}

	toJSON(): { mode: ThrottlingMode; resources: ThrottledResource[] } {
		return {
			mode: this.mode,
			resources: this.resources.map((resource) => ({ ...resource })),
		}
	}
}
