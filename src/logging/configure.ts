/**
 * Route the library's log records to sinks owned by the host.
 *
 * The library itself only calls `getLogger()`; records are dropped until
 * LogTape is configured. Hosts that already configure LogTape can add the
 * library's categories to their own setup instead.
 */

import {
	configure,
	getLogger,
	type Logger,
	type Sink,
} from "@logtape/logtape";
import {
	DEFAULT_LOG_LEVEL,
	FAULT_SUBSYSTEMS,
	type FaultSubsystem,
	LOG_CATEGORY,
	type LogLevel,
} from "./config.js";

export interface FaultLoggingOptions {
	/** Sinks every enabled subsystem writes to, keyed by sink name */
	sinks: Record<string, Sink>;

	lowestLevel?: LogLevel;

	/** Defaults to every subsystem */
	subsystems?: readonly FaultSubsystem[];

	/** Replace an existing LogTape configuration */
	reset?: boolean;
}

/** Logger for one of the library's subsystems. */
export function getFaultLogger(subsystem: FaultSubsystem): Logger {
	return getLogger([LOG_CATEGORY, subsystem]);
}

/**
 * Configure LogTape for the library's categories.
 *
 * Resolves to `false`, leaving the host's configuration in place, when
 * LogTape is already configured and `reset` is not set.
 *
 * @example
 * ```typescript
 * import { getConsoleSink } from "@logtape/logtape";
 *
 * await configureFaultLogging({
 *   sinks: { console: getConsoleSink() },
 *   lowestLevel: "info",
 * });
 * ```
 */
export async function configureFaultLogging(
	options: FaultLoggingOptions,
): Promise<boolean> {
	const {
		sinks,
		lowestLevel = DEFAULT_LOG_LEVEL,
		subsystems = FAULT_SUBSYSTEMS,
		reset = false,
	} = options;
	const sinkNames = Object.keys(sinks);

	try {
		await configure({
			sinks,
			loggers: [
				...subsystems.map((subsystem) => ({
					category: [LOG_CATEGORY, subsystem],
					sinks: sinkNames,
					lowestLevel,
				})),
				{
					category: ["logtape", "meta"],
					sinks: sinkNames,
					lowestLevel: "error" as const,
				},
			],
			reset,
		});
	} catch (error: unknown) {
		if (
			!reset &&
			error instanceof Error &&
			error.message.includes("Already configured")
		) {
			return false;
		}
		throw error;
	}

	return true;
}
