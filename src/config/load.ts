/**
 * Load classifier configuration from a JSON file.
 *
 * @module config/load
 */

import { readFile } from 'node:fs/promises'
import type { Logger } from '@logtape/logtape'
import { StructuredError } from '../errors/structured-error.js'
import { getFaultLogger } from '../logging/configure.js'
import { TransientErrorClassifier } from '../transient/classifier.js'
import { type ClassifierConfig, parseClassifierConfig } from './schema.js'

const logger = getFaultLogger('config')

function isMissingFileError(error: unknown): boolean {
	return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

/**
 * Read and validate a classifier configuration file.
 *
 * @param filePath - Path to a JSON file
 * @throws {StructuredError} CONFIG_NOT_FOUND when the file does not exist,
 *   CONFIG_INVALID when it is not JSON or fails validation
 *
 * @example
 * ```typescript
 * const config = await loadClassifierConfig("./classifier.json")
 * const classifier = createClassifierFromConfig(config)
 * ```
 */
export async function loadClassifierConfig(
	filePath: string,
): Promise<ClassifierConfig> {
	let text: string
	try {
		text = await readFile(filePath, 'utf8')
	} catch (error: unknown) {
		if (isMissingFileError(error)) {
			throw new StructuredError(
				`Classifier configuration not found: ${filePath}`,
				'CONFIGURATION',
				'CONFIG_NOT_FOUND',
				false,
				{ filePath },
				error instanceof Error ? error : undefined,
			)
		}
		throw error
	}

	let raw: unknown
	try {
		raw = JSON.parse(text)
	} catch (error: unknown) {
		logger.warning('Classifier configuration is not valid JSON', { filePath })
		throw new StructuredError(
			`Classifier configuration is not valid JSON: ${filePath}`,
			'CONFIGURATION',
			'CONFIG_INVALID',
			false,
			{ filePath },
			error instanceof Error ? error : undefined,
		)
	}

	try {
		const config = parseClassifierConfig(raw, { filePath })
		logger.info('Classifier configuration loaded', { filePath, ...config })
		return config
	} catch (error: unknown) {
		logger.warning('Classifier configuration rejected', {
			filePath,
			error: error instanceof Error ? error.message : String(error),
		})
		throw error
	}
}

/**
 * Build a classifier from validated configuration.
 */
export function createClassifierFromConfig(
	config: ClassifierConfig,
	classifierLogger?: Logger,
): TransientErrorClassifier {
	return new TransientErrorClassifier({
		additionalTransientNumbers: config.additionalTransientNumbers,
		timeoutErrorNames: config.timeoutErrorNames,
		attachThrottlingData: config.attachThrottlingData,
		logger: classifierLogger,
	})
}
