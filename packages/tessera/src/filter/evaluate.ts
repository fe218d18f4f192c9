import type { ScalarValue } from '../common/types.js';
import type { Filter, OpenRange } from './filter.js';

function asBigint(value: ScalarValue): bigint | undefined {
	if (typeof value === 'bigint') return value;
	if (typeof value === 'number' && Number.isInteger(value)) return BigInt(value);
	return undefined;
}

function inOpenRange<T extends number | string>(range: OpenRange<string, T>, value: T): boolean {
	if (!range.lowerUnbounded) {
		if (range.lowerExclusive ? value <= range.lower : value < range.lower) return false;
	}
	if (!range.upperUnbounded) {
		if (range.upperExclusive ? value >= range.upper : value > range.upper) return false;
	}
	return true;
}

/**
 * Evaluates a compiled filter against one value.
 * Values of the wrong kind for the filter are rejected.
 */
export function filterAccepts(filter: Filter, value: ScalarValue): boolean {
	if (value === null) {
		switch (filter.kind) {
			case 'isNull':
				return true;
			case 'isNotNull':
			case 'alwaysFalse':
				return false;
			default:
				return filter.nullAllowed;
		}
	}

	switch (filter.kind) {
		case 'isNull':
		case 'alwaysFalse':
			return false;
		case 'isNotNull':
			return true;
		case 'bigintRange':
		case 'negatedBigintRange': {
			const v = asBigint(value);
			if (v === undefined) return false;
			const inside = v >= filter.lower && v <= filter.upper;
			return filter.kind === 'bigintRange' ? inside : !inside;
		}
		case 'bigintValues':
		case 'negatedBigintValues': {
			const v = asBigint(value);
			if (v === undefined) return false;
			return filter.values.has(v) === (filter.kind === 'bigintValues');
		}
		case 'bigintMultiRange': {
			const v = asBigint(value);
			return v !== undefined && filter.ranges.some(r => v >= r.lower && v <= r.upper);
		}
		case 'doubleRange':
		case 'floatRange':
			return typeof value === 'number' && !Number.isNaN(value) && inOpenRange(filter, value);
		case 'bytesRange':
			return typeof value === 'string' && inOpenRange(filter, value);
		case 'negatedBytesRange':
			return typeof value === 'string' && !inOpenRange(filter, value);
		case 'bytesValues':
			return typeof value === 'string' && filter.values.has(value);
		case 'negatedBytesValues':
			return typeof value === 'string' && !filter.values.has(value);
		case 'boolValue':
			return value === filter.value;
		case 'multiRange':
			if (typeof value === 'number' && Number.isNaN(value)) {
				return filter.nanAllowed;
			}
			return filter.filters.some(f => filterAccepts(f, value));
	}
}
