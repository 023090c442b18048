/**
 * Classifier configuration.
 *
 * @module config
 */

export { createClassifierFromConfig, loadClassifierConfig } from './load.js'
export {
	type ClassifierConfig,
	classifierConfigSchema,
	parseClassifierConfig,
} from './schema.js'
