import { describe, it, expect } from 'vitest';
import { constraintViolationOf, expectRow, PersistenceError, sqlStateOf } from '../errors.js';

describe('sqlStateOf', () => {
	it('should read the code of a driver error', () => {
		expect(sqlStateOf({ code: '23505', message: 'duplicate key' })).toBe('23505');
	});

	it('should follow the cause chain of a wrapped error', () => {
		const driverError = Object.assign(new Error('insert or update violates foreign key'), { code: '23503' });
		const wrapped = new Error('Failed query', { cause: driverError });

		expect(sqlStateOf(wrapped)).toBe('23503');
	});

	it('should return undefined for errors without a code', () => {
		expect(sqlStateOf(new Error('boom'))).toBeUndefined();
		expect(sqlStateOf('boom')).toBeUndefined();
		expect(sqlStateOf(null)).toBeUndefined();
	});
});

describe('constraintViolationOf', () => {
	it.each([
		['23502', 'not_null_violation'],
		['23503', 'foreign_key_violation'],
		['23505', 'unique_violation'],
		['23514', 'check_violation'],
	])('should classify SQLSTATE %s as %s', (code, violation) => {
		expect(constraintViolationOf({ code })).toBe(violation);
	});

	it('should ignore other SQLSTATEs', () => {
		expect(constraintViolationOf({ code: '42703' })).toBeUndefined();
		expect(constraintViolationOf({ code: 'toString' })).toBeUndefined();
	});
});

describe('expectRow', () => {
	it('should return the first row', () => {
		expect(expectRow([{ id: 1 }], 'orders')).toEqual({ id: 1 });
	});

	it('should throw a PersistenceError naming the table when no row came back', () => {
		expect(() => expectRow([], 'orders')).toThrow(PersistenceError);
		expect(() => expectRow([], 'orders')).toThrow('Write to orders returned no row');
	});
});
