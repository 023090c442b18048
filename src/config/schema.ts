/**
 * Classifier configuration schema.
 *
 * @module config/schema
 */

import { z } from 'zod'
import { StructuredError } from '../errors/structured-error.js'
import { DEFAULT_TIMEOUT_ERROR_NAMES } from '../errors/timeout.js'

/**
 * Configuration accepted by {@link parseClassifierConfig}.
 *
 * ```json
 * {
 *   "additionalTransientNumbers": [1205],
 *   "timeoutErrorNames": ["TimeoutError", "RequestTimeoutError"],
 *   "attachThrottlingData": true
 * }
 * ```
 */
export const classifierConfigSchema = z
	.object({
		additionalTransientNumbers: z.array(z.number().int()).default([]),
		timeoutErrorNames: z
			.array(z.string().min(1))
			.default([...DEFAULT_TIMEOUT_ERROR_NAMES]),
		attachThrottlingData: z.boolean().default(true),
	})
	.strict()

export type ClassifierConfig = z.infer<typeof classifierConfigSchema>

/**
 * Validate a raw value (usually parsed JSON) as classifier configuration.
 *
 * @throws {StructuredError} CONFIGURATION / CONFIG_INVALID with the zod
 *   issues in `context.issues`
 */
export function parseClassifierConfig(
	raw: unknown,
	context: Record<string, unknown> = {},
): ClassifierConfig {
	const result = classifierConfigSchema.safeParse(raw)
	if (!result.success) {
		throw new StructuredError(
			'Invalid classifier configuration',
			'CONFIGURATION',
			'CONFIG_INVALID',
			false,
			{
				...context,
				issues: result.error.issues.map(
					(issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
				),
			},
			result.error,
		)
	}
	return result.data
}
