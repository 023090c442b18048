/**
 * Vocabulary of Azure SQL Database resource governance.
 *
 * @module throttling/types
 */

/**
 * Resource dimension reported in a throttling reason code.
 *
 * `Unknown` only appears in {@link ThrottlingCondition.Unknown}.
 */
export type ThrottledResourceType =
	| 'PhysicalDatabaseSpace'
	| 'PhysicalLogSpace'
	| 'LogWriteIoDelay'
	| 'DataReadIoDelay'
	| 'Cpu'
	| 'DatabaseSize'
	| 'Internal'
	| 'WorkerThreads'
	| 'Unknown'

/**
 * Severity applied to a resource, in increasing order: None, Soft, Hard.
 * `Unknown` is the fourth 2-bit value and is distinct from `None`.
 */
export type ThrottlingType = 'None' | 'Soft' | 'Hard' | 'Unknown'

/**
 * Server-wide posture implied by the reason code.
 */
export type ThrottlingMode =
	| 'NoThrottling'
	| 'RejectUpdateInsert' // updates and inserts are rejected
	| 'RejectAllWrites' // inserts, updates, deletes and DDL are rejected
	| 'RejectAll' // reads are rejected too
	| 'Unknown'

/**
 * One (resource, severity) entry of a throttling condition.
 */
export interface ThrottledResource {
	readonly resourceType: ThrottledResourceType
	readonly throttlingType: ThrottlingType
}
