/**
 * Test fixtures for consumers of the classifier.
 *
 * @example
 * ```ts
 * import { sqlException } from "sql-transient-faults/testing";
 *
 * const error = sqlException(
 *   [40501, "The service is currently busy. Code: 11514"],
 *   2627,
 * );
 * ```
 */

import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { type SqlError, SqlException } from '../sql/sql-error.js'

/**
 * Build a SqlError with a placeholder message when none is given.
 */
export function sqlError(number: number, message?: string): SqlError {
	return { number, message: message ?? `Error ${number}` }
}

/**
 * Build a SqlException from error numbers or `[number, message]` pairs,
 * in the order given.
 */
export function sqlException(
	...entries: Array<number | readonly [number, string]>
): SqlException {
	return new SqlException(
		entries.map((entry) =>
			typeof entry === 'number' ? sqlError(entry) : sqlError(entry[0], entry[1]),
		),
	)
}

/**
 * Create a unique directory under the system temp directory.
 */
export function createTempDir(prefix = 'sql-transient-faults-'): string {
	return fs.mkdtempSync(path.join(os.tmpdir(), prefix))
}

/**
 * Write a file below `dir`, creating parent directories as needed.
 *
 * @returns Absolute path of the written file
 */
export function writeTestFile(
	dir: string,
	relativePath: string,
	content: string,
): string {
	const fullPath = path.join(dir, relativePath)
	fs.mkdirSync(path.dirname(fullPath), { recursive: true })
	fs.writeFileSync(fullPath, content, 'utf8')
	return fullPath
}

export function cleanupTestDir(dir: string): void {
	fs.rmSync(dir, { recursive: true, force: true })
}
