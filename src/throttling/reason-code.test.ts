import { describe, expect, test } from 'vitest'
import {
	decodeReasonCode,
	extractReasonCode,
	RESOURCE_LAYOUT,
} from './reason-code.js'

describe('decodeReasonCode', () => {
	test('decodes 11512 field by field', () => {
		// 11512 = 0b10_1100_1111_1000: mode bits 00, resource region 0b101100
		expect(11512 & 0b11).toBe(0)
		expect(11512 >> 8).toBe(44)

		const decoded = decodeReasonCode(11512)

		expect(decoded?.mode).toBe('NoThrottling')
		expect(decoded?.resources).toEqual([
			{ resourceType: 'PhysicalDatabaseSpace', throttlingType: 'None' },
			{ resourceType: 'PhysicalLogSpace', throttlingType: 'Unknown' },
			{ resourceType: 'LogWriteIoDelay', throttlingType: 'Hard' },
			{ resourceType: 'DataReadIoDelay', throttlingType: 'None' },
			{ resourceType: 'Cpu', throttlingType: 'None' },
			{ resourceType: 'DatabaseSize', throttlingType: 'None' },
			{ resourceType: 'Internal', throttlingType: 'None' },
			{ resourceType: 'WorkerThreads', throttlingType: 'None' },
			{ resourceType: 'Internal', throttlingType: 'None' },
		])
	})

	test('matches manual shifting for every field', () => {
		const code = 11512
		const severities = ['None', 'Soft', 'Hard', 'Unknown']
		const decoded = decodeReasonCode(code)

		let shifted = code >> 8
		for (const [index, resourceType] of RESOURCE_LAYOUT.entries()) {
			expect(decoded?.resources[index]).toEqual({
				resourceType,
				throttlingType: severities[shifted & 0b11],
			})
			shifted >>= 2
		}
	})

	test('reads each mode from the two low bits', () => {
		expect(decodeReasonCode(256)?.mode).toBe('NoThrottling')
		expect(decodeReasonCode(1)?.mode).toBe('RejectUpdateInsert')
		expect(decodeReasonCode(11514)?.mode).toBe('RejectAllWrites')
		expect(decodeReasonCode(3)?.mode).toBe('RejectAll')
	})

	test('ignores bits 2-7', () => {
		expect(decodeReasonCode(0b1111_1100 | 2)).toEqual(decodeReasonCode(2))
	})

	test('reads the highest field at bits 24-25', () => {
		const decoded = decodeReasonCode(2 << 24)
		expect(decoded?.resources[8]).toEqual({
			resourceType: 'Internal',
			throttlingType: 'Hard',
		})
		expect(decoded?.resources[7]).toEqual({
			resourceType: 'WorkerThreads',
			throttlingType: 'None',
		})
	})

	test('decodes soft CPU and hard worker thread throttling', () => {
		// Cpu is field 4 (bits 16-17), WorkerThreads field 7 (bits 22-23)
		const decoded = decodeReasonCode((1 << 16) | (2 << 22) | 1)

		expect(decoded?.mode).toBe('RejectUpdateInsert')
		expect(decoded?.resources[4]).toEqual({ resourceType: 'Cpu', throttlingType: 'Soft' })
		expect(decoded?.resources[7]).toEqual({
			resourceType: 'WorkerThreads',
			throttlingType: 'Hard',
		})
	})

	test('rejects zero, negative, fractional and out-of-range codes', () => {
		expect(decodeReasonCode(0)).toBeUndefined()
		expect(decodeReasonCode(-5)).toBeUndefined()
		expect(decodeReasonCode(1.5)).toBeUndefined()
		expect(decodeReasonCode(Number.NaN)).toBeUndefined()
		expect(decodeReasonCode(2 ** 31)).toBeUndefined()
	})

	test('is deterministic', () => {
		expect(decodeReasonCode(11512)).toEqual(decodeReasonCode(11512))
	})
})

describe('extractReasonCode', () => {
	test('finds the code after the marker', () => {
		expect(
			extractReasonCode(
				'The service is currently busy. Retry the request after 10 seconds. Code: 11512',
			),
		).toBe(11512)
	})

	test('is case-insensitive and tolerates missing whitespace', () => {
		expect(extractReasonCode('reason CODE:42 here')).toBe(42)
		expect(extractReasonCode('code:   7')).toBe(7)
	})

	test('takes the first marker', () => {
		expect(extractReasonCode('Code: 1 then Code: 2')).toBe(1)
	})

	test('returns undefined without a marker or digits', () => {
		expect(extractReasonCode('The service is currently busy.')).toBeUndefined()
		expect(extractReasonCode('Code: none')).toBeUndefined()
		expect(extractReasonCode('')).toBeUndefined()
	})

	test('returns undefined for digits past the signed 32-bit range', () => {
		expect(extractReasonCode('Code: 2147483647')).toBe(2147483647)
		expect(extractReasonCode('Code: 2147483648')).toBeUndefined()
		expect(extractReasonCode('Code: 99999999999999999999')).toBeUndefined()
	})
})
