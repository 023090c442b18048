/**
 * sql-transient-faults
 *
 * Transient error detection and throttling reason-code decoding for
 * SQL Server and Azure SQL Database drivers.
 *
 * Subpath exports are available per module:
 *   import { isTransient } from "sql-transient-faults/transient";
 *   import { ThrottlingCondition } from "sql-transient-faults/throttling";
 *
 * @packageDocumentation
 */

export const VERSION = '0.1.0'

export * from './config/index.js'
export * from './errors/index.js'
export * from './sql/index.js'
export * from './throttling/index.js'
export * from './transient/index.js'
