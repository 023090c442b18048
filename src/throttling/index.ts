/**
 * Throttling condition decoding for error 40501.
 *
 * @module throttling
 */

export { THROTTLING_ERROR_NUMBER, ThrottlingCondition } from './condition.js'
export {
	type DecodedReasonCode,
	decodeReasonCode,
	extractReasonCode,
	FIELD_WIDTH,
	RESOURCE_FIELD_OFFSET,
	RESOURCE_LAYOUT,
} from './reason-code.js'
export type {
	ThrottledResource,
	ThrottledResourceType,
	ThrottlingMode,
	ThrottlingType,
} from './types.js'
