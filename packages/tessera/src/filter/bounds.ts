import type { BoundKind, Marker, Range } from '../protocol/domain.js';
import type { ScalarValue } from '../common/types.js';
import { INT32_MAX, INT32_MIN, INT64_MAX, INT64_MIN } from '../common/types.js';
import { invariant, InvariantViolationError } from '../common/errors.js';
import type { OpenRange } from './filter.js';

export interface Bound<T> {
	readonly value: T;
	readonly exclusive: boolean;
}

/** One side is `null` when unbounded */
export interface Interval<T> {
	readonly lower: Bound<T> | null;
	readonly upper: Bound<T> | null;
}

function readMarker<T>(marker: Marker, exclusiveBound: BoundKind, decode: (valueBlock: string) => T): Bound<T> | null {
	if (marker.valueBlock === undefined) {
		return null;
	}
	invariant(
		marker.bound === 'EXACTLY' || marker.bound === exclusiveBound,
		`Marker bound ${marker.bound} is on the wrong side of its range`,
		marker.bound,
	);
	return { value: decode(marker.valueBlock), exclusive: marker.bound === exclusiveBound };
}

/** Reads both markers of a wire range, decoding bounded values */
export function readInterval<T>(range: Range, decode: (valueBlock: string) => T): Interval<T> {
	return {
		lower: readMarker(range.low, 'ABOVE', decode),
		upper: readMarker(range.high, 'BELOW', decode),
	};
}

export function isUnboundedRange(range: Range): boolean {
	return range.low.valueBlock === undefined && range.high.valueBlock === undefined;
}

/** A finite, totally ordered integer domain */
export interface DiscreteDomain {
	readonly name: string;
	readonly min: bigint;
	readonly max: bigint;
}

export const INT64_DOMAIN: DiscreteDomain = { name: 'int64', min: INT64_MIN, max: INT64_MAX };
/** DATE day counts */
export const DATE_DOMAIN: DiscreteDomain = { name: 'date', min: INT32_MIN, max: INT32_MAX };

/**
 * Normalizes an interval over a discrete domain to closed bounds.
 * Unbounded sides take the domain's extremes; exclusive bounds step inward by one.
 */
export function toClosed(interval: Interval<bigint>, domain: DiscreteDomain): { lower: bigint; upper: bigint } {
	const { lower, upper } = interval;
	return {
		lower: lower === null ? domain.min : lower.exclusive ? lower.value + 1n : lower.value,
		upper: upper === null ? domain.max : upper.exclusive ? upper.value - 1n : upper.value,
	};
}

/**
 * Normalizes an interval over a continuous or variable-length domain.
 * Unbounded sides are marked exclusive and carry the placeholder value.
 */
export function toOpenRange<K extends string, T>(
	kind: K,
	interval: Interval<T>,
	placeholders: { lower: T; upper: T },
	nullAllowed: boolean,
): OpenRange<K, T> {
	const { lower, upper } = interval;
	return {
		kind,
		lower: lower === null ? placeholders.lower : lower.value,
		lowerUnbounded: lower === null,
		lowerExclusive: lower === null || lower.exclusive,
		upper: upper === null ? placeholders.upper : upper.value,
		upperUnbounded: upper === null,
		upperExclusive: upper === null || upper.exclusive,
		nullAllowed,
	};
}

export function expectBigint(value: ScalarValue, typeName: string): bigint {
	if (typeof value === 'bigint') return value;
	if (typeof value === 'number' && Number.isInteger(value)) return BigInt(value);
	throw new InvariantViolationError(`Expected an integer ${typeName} literal, got ${typeof value}`, typeName);
}

export function expectNumber(value: ScalarValue, typeName: string): number {
	if (typeof value === 'number') return value;
	if (typeof value === 'bigint') return Number(value);
	throw new InvariantViolationError(`Expected a numeric ${typeName} literal, got ${typeof value}`, typeName);
}

export function expectString(value: ScalarValue, typeName: string): string {
	if (typeof value === 'string') return value;
	throw new InvariantViolationError(`Expected a ${typeName} literal string, got ${typeof value}`, typeName);
}

export function expectBoolean(value: ScalarValue, typeName: string): boolean {
	if (typeof value === 'boolean') return value;
	throw new InvariantViolationError(`Expected a ${typeName} literal boolean, got ${typeof value}`, typeName);
}
