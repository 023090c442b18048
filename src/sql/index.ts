/**
 * SQL Server driver error model.
 *
 * @module sql
 */

export {
	isSqlException,
	type SqlError,
	SqlException,
	toSqlException,
} from './sql-error.js'
