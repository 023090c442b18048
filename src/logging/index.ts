/**
 * Logging for sql-transient-faults.
 *
 * Library modules log through LogTape categories under
 * `["sql-transient-faults", <subsystem>]`. Hosts that already configure
 * LogTape receive those records through their own sinks; others can call
 * {@link configureFaultLogging} with the sinks they want.
 *
 * @example
 * ```typescript
 * import { getConsoleSink } from "@logtape/logtape";
 * import { configureFaultLogging } from "sql-transient-faults/logging";
 *
 * await configureFaultLogging({ sinks: { console: getConsoleSink() } });
 * ```
 *
 * @packageDocumentation
 */

export {
	DEFAULT_LOG_LEVEL,
	FAULT_SUBSYSTEMS,
	type FaultSubsystem,
	LOG_CATEGORY,
	type LogLevel,
} from "./config.js";
export {
	configureFaultLogging,
	type FaultLoggingOptions,
	getFaultLogger,
} from "./configure.js";
