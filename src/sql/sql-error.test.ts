import { describe, expect, test } from 'vitest'
import { StructuredError } from '../errors/structured-error.js'
import { sqlError } from '../testing/index.js'
import { isSqlException, SqlException, toSqlException } from './sql-error.js'

describe('SqlException', () => {
	test('keeps sub-errors in order and exposes the first number', () => {
		const exception = new SqlException([
			sqlError(4060, 'Cannot open database'),
			sqlError(18456, 'Login failed'),
		])

		expect(exception.name).toBe('SqlException')
		expect(exception.number).toBe(4060)
		expect(exception.errors.map((error) => error.number)).toEqual([4060, 18456])
		expect(exception.message).toBe('Cannot open database\nLogin failed')
		expect(exception.data.size).toBe(0)
	})

	test('uses an explicit message', () => {
		const exception = new SqlException([sqlError(20)], 'Request failed')
		expect(exception.message).toBe('Request failed')
	})

	test('freezes the sub-error list', () => {
		const source = [sqlError(64)]
		const exception = new SqlException(source)
		source.push(sqlError(233))

		expect(exception.errors).toHaveLength(1)
		expect(Object.isFrozen(exception.errors)).toBe(true)
		expect(Object.isFrozen(exception.errors[0])).toBe(true)
	})

	test('rejects an empty sub-error list', () => {
		expect(() => new SqlException([])).toThrow(StructuredError)
		try {
			new SqlException([])
		} catch (error) {
			expect(error).toBeInstanceOf(StructuredError)
			if (error instanceof StructuredError) {
				expect(error.category).toBe('VALIDATION')
				expect(error.code).toBe('SQL_ERRORS_EMPTY')
			}
		}
	})
})

describe('isSqlException', () => {
	test('narrows instances only', () => {
		expect(isSqlException(new SqlException([sqlError(20)]))).toBe(true)
		expect(isSqlException({ errors: [sqlError(20)] })).toBe(false)
		expect(isSqlException(new Error('x'))).toBe(false)
		expect(isSqlException(null)).toBe(false)
	})
})

describe('toSqlException', () => {
	test('returns an existing SqlException unchanged', () => {
		const exception = new SqlException([sqlError(20)])
		expect(toSqlException(exception)).toBe(exception)
	})

	test('converts an object with an errors list', () => {
		const converted = toSqlException({
			errors: [
				{ number: 40613, message: 'Database unavailable', state: 1 },
				{ number: 18456, message: 'Login failed' },
			],
		})

		expect(converted?.errors).toEqual([
			{ number: 40613, message: 'Database unavailable', state: 1 },
			{ number: 18456, message: 'Login failed' },
		])
	})

	test('converts a driver request error with preceding errors', () => {
		const driverError = Object.assign(new Error('Resource ID : 1. Code: 11514'), {
			name: 'RequestError',
			number: 40501,
			state: 1,
			class: 20,
			precedingErrors: [{ number: 3621, message: 'The statement has been terminated.' }],
		})

		const converted = toSqlException(driverError)

		expect(converted?.errors.map((error) => error.number)).toEqual([3621, 40501])
		expect(converted?.errors[1]).toEqual({
			number: 40501,
			message: 'Resource ID : 1. Code: 11514',
			state: 1,
			class: 20,
		})
		expect(converted?.cause).toBe(driverError)
		expect(converted?.number).toBe(3621)
	})

	test('converts a request error without preceding errors', () => {
		const converted = toSqlException(
			Object.assign(new Error('Transport-level error'), { number: 10054 }),
		)
		expect(converted?.errors).toEqual([
			{ number: 10054, message: 'Transport-level error' },
		])
	})

	test('returns undefined for other values', () => {
		expect(toSqlException(new Error('boom'))).toBeUndefined()
		expect(toSqlException({ number: '40501', message: 'x' })).toBeUndefined()
		expect(toSqlException({ errors: [] })).toBeUndefined()
		expect(toSqlException(new AggregateError([new Error('a')]))).toBeUndefined()
		expect(toSqlException(null)).toBeUndefined()
		expect(toSqlException('40501')).toBeUndefined()
	})
})
