/**
 * Transient error classification.
 *
 * @module transient
 */

export {
	type AttachedThrottlingData,
	classifyTransientError,
	getThrottlingData,
	isTransient,
	THROTTLING_CONDITION_DATA_KEY,
	THROTTLING_MODE_DATA_KEY,
	type TransientClassification,
	TransientErrorClassifier,
	type TransientErrorClassifierOptions,
} from './classifier.js'
export { isTransientErrorNumber, TRANSIENT_ERROR_NUMBERS } from './codes.js'
