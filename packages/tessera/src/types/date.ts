import { Temporal } from 'temporal-polyfill';
import type { ScalarValue } from '../common/types.js';
import { InvariantViolationError } from '../common/errors.js';

const EPOCH = Temporal.PlainDate.from('1970-01-01');

/**
 * DATE values are day counts since 1970-01-01.
 * Accepts a day count, or an ISO 8601 date string (YYYY-MM-DD) parsed with Temporal.PlainDate.
 */
export function toEpochDay(value: ScalarValue): bigint {
	if (typeof value === 'bigint') {
		return value;
	}
	if (typeof value === 'number' && Number.isInteger(value)) {
		return BigInt(value);
	}
	if (typeof value === 'string') {
		let date: Temporal.PlainDate;
		try {
			date = Temporal.PlainDate.from(value);
		} catch (e) {
			throw new InvariantViolationError(`Cannot convert '${value}' to DATE: ${e instanceof Error ? e.message : String(e)}`, 'date');
		}
		return BigInt(EPOCH.until(date, { largestUnit: 'days' }).days);
	}
	throw new InvariantViolationError(`Cannot convert ${typeof value} to DATE`, 'date');
}
