/**
 * Logging defaults.
 */

/** Root LogTape category of every logger in this library */
export const LOG_CATEGORY = "sql-transient-faults";

/** Subsystems that log under {@link LOG_CATEGORY} */
export const FAULT_SUBSYSTEMS = ["classifier", "config"] as const;

export type FaultSubsystem = (typeof FAULT_SUBSYSTEMS)[number];

/**
 * Levels used by the library. LogTape spells the third one "warning".
 *
 * - debug: classification decisions, decoded throttling conditions
 * - info: configuration loaded
 * - warning: configuration rejected
 * - error: unused by the library; available to hosts
 */
export type LogLevel = "debug" | "info" | "warning" | "error";

export const DEFAULT_LOG_LEVEL: LogLevel = "debug";
