/**
 * Server error numbers that denote a transient failure.
 *
 * @module transient/codes
 */

import { THROTTLING_ERROR_NUMBER } from '../throttling/condition.js'

/**
 * Error numbers for which retrying the request may succeed.
 *
 * Read-only by type only: the value is a plain `Set`. Classifiers copy it
 * at construction, so later changes do not reach existing instances.
 */
export const TRANSIENT_ERROR_NUMBERS: ReadonlySet<number> = new Set([
	THROTTLING_ERROR_NUMBER, // service busy, resource governance (carries a reason code)
	40540, // service encountered an error processing the request
	40613, // database not currently available
	10928, // resource limit reached
	10929, // minimum guarantee not available for the database
	40143, // service encountered an error processing the request
	40197, // error processing the request, e.g. during failover
	233, // connection established but the login process failed
	10053, // transport-level error, connection aborted by host software
	10054, // transport-level error, connection reset by peer
	10060, // network-related error, connection attempt timed out
	20, // instance does not support encryption
	64, // connection established but an error occurred during login
])

export function isTransientErrorNumber(number: number): boolean {
	return TRANSIENT_ERROR_NUMBERS.has(number)
}
