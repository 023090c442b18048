/**
 * Bit layout of the reason code carried by error 40501.
 *
 * ```
 * bits 0-1    throttling mode
 * bits 2-7    unused
 * bits 8-25   nine 2-bit severity fields, one per entry of RESOURCE_LAYOUT
 * ```
 *
 * @module throttling/reason-code
 */

import type {
	ThrottledResource,
	ThrottledResourceType,
	ThrottlingMode,
	ThrottlingType,
} from './types.js'

/** Bit offset of the first resource field. */
export const RESOURCE_FIELD_OFFSET = 8

/** Width in bits of the mode and of each resource field. */
export const FIELD_WIDTH = 2

const FIELD_MASK = (1 << FIELD_WIDTH) - 1

const INT32_MAX = 0x7fffffff

/**
 * Resources in the order their fields appear, lowest bits first.
 * `Internal` occupies two slots.
 */
export const RESOURCE_LAYOUT: readonly ThrottledResourceType[] = Object.freeze([
	'PhysicalDatabaseSpace',
	'PhysicalLogSpace',
	'LogWriteIoDelay',
	'DataReadIoDelay',
	'Cpu',
	'DatabaseSize',
	'Internal',
	'WorkerThreads',
	'Internal',
])

// Locates "Code: <digits>" anywhere in a server message. No g/y flag, so the
// instance carries no lastIndex state and is safe to share.
const REASON_CODE_PATTERN = /Code:\s*(\d+)/i

export interface DecodedReasonCode {
	mode: ThrottlingMode
	resources: ThrottledResource[]
}

function modeFromBits(bits: number): ThrottlingMode {
	switch (bits) {
		case 0:
			return 'NoThrottling'
		case 1:
			return 'RejectUpdateInsert'
		case 2:
			return 'RejectAllWrites'
		default:
			return 'RejectAll'
	}
}

function throttlingTypeFromBits(bits: number): ThrottlingType {
	switch (bits) {
		case 0:
			return 'None'
		case 1:
			return 'Soft'
		case 2:
			return 'Hard'
		default:
			return 'Unknown'
	}
}

/**
 * Decode a reason code into its mode and nine resource entries.
 *
 * @returns undefined when `code` is not a positive signed 32-bit integer
 *
 * @example
 * ```typescript
 * decodeReasonCode(11514)
 * // mode "RejectAllWrites"; PhysicalLogSpace "Unknown", LogWriteIoDelay "Hard",
 * // every other resource "None"
 * ```
 */
export function decodeReasonCode(code: number): DecodedReasonCode | undefined {
	if (!Number.isInteger(code) || code <= 0 || code > INT32_MAX) {
		return undefined
	}

	return {
		mode: modeFromBits(code & FIELD_MASK),
		resources: RESOURCE_LAYOUT.map((resourceType, index) => ({
			resourceType,
			throttlingType: throttlingTypeFromBits(
				(code >> (RESOURCE_FIELD_OFFSET + index * FIELD_WIDTH)) & FIELD_MASK,
			),
		})),
	}
}

/**
 * Find the reason code embedded in a 40501 message ("... Code: 11514 ...").
 *
 * @returns The code, or undefined when the marker is missing or the digits
 *   do not fit a signed 32-bit integer
 */
export function extractReasonCode(message: string): number | undefined {
	const digits = REASON_CODE_PATTERN.exec(message)?.[1]
	if (digits === undefined) {
		return undefined
	}

	const code = Number(digits)
	return code <= INT32_MAX ? code : undefined
}
