import type { Domain, EquatableValueSet, Range, SortedRangeSet } from '../protocol/domain.js';
import type { ExpressionConverter } from '../lowering/expression-converter.js';
import { parseTypeSignature, formatSqlType, isIntegerType, type SqlType } from '../types/sql-type.js';
import { toEpochDay } from '../types/date.js';
import { INT64_MAX, INT64_MIN } from '../common/types.js';
import { invariant, InvariantViolationError, tagOf, unsupported } from '../common/errors.js';
import { createLogger } from '../common/logger.js';
import {
	ALWAYS_FALSE, IS_NOT_NULL, IS_NULL,
	bigintRange, formatFilter, isBytesSingleValue, isSingleValue,
	type BigintRange, type BytesRange, type Filter,
} from './filter.js';
import {
	DATE_DOMAIN, INT64_DOMAIN,
	expectBigint, expectBoolean, expectNumber, expectString,
	isUnboundedRange, readInterval, toClosed, toOpenRange,
} from './bounds.js';

const log = createLogger('filter');

/** Largest finite single-precision value */
const FLOAT_MAX = 3.4028234663852886e38;

/**
 * Compiles a column's value domain into a runtime filter.
 *
 * @throws UnsupportedConstructError for equatable sets with entries, all-or-none sets,
 *   and column types without a range filter
 * @throws InvariantViolationError for contradictory domains
 */
export function compileDomain(domain: Domain, converter: ExpressionConverter): Filter {
	const values = domain.values;
	switch (values['@type']) {
		case 'sortable': {
			const filter = compileRangeSet(values, domain.nullAllowed, converter);
			log('Compiled %d range(s) of %s to %s', values.ranges.length, values.type, formatFilter(filter));
			return filter;
		}
		case 'equatable':
			return compileEquatableSet(values, domain.nullAllowed);
		case 'allOrNone':
			return unsupported('All-or-none value sets cannot be compiled to a filter', 'allOrNone');
		default:
			return unsupported(`Unsupported value set: ${tagOf(values)}`, tagOf(values));
	}
}

function compileEquatableSet(values: EquatableValueSet, nullAllowed: boolean): Filter {
	if (values.entries.length === 0) {
		return nullAllowed ? IS_NULL : IS_NOT_NULL;
	}
	return unsupported(
		`Equatable value sets with entries cannot be compiled to a filter (type ${values.type})`,
		'equatable',
	);
}

function compileRangeSet(set: SortedRangeSet, nullAllowed: boolean, converter: ExpressionConverter): Filter {
	const type = parseTypeSignature(set.type);
	const ranges = set.ranges;

	if (ranges.length === 0) {
		invariant(nullAllowed, 'Unexpected always-false filter', 'sortable');
		return IS_NULL;
	}

	if (ranges.length === 1) {
		// IS NOT NULL arrives as a fully unbounded range that rejects nulls
		if (isUnboundedRange(ranges[0]) && !nullAllowed) {
			return IS_NOT_NULL;
		}
		return compileRange(type, ranges[0], nullAllowed, converter);
	}

	if (isIntegerType(type)) {
		return combineIntegerRanges(ranges.map(r => integerRange(type, r, nullAllowed, converter)), nullAllowed);
	}

	if (type.kind === 'varchar') {
		return combineBytesRanges(ranges.map(r => bytesRange(type, r, nullAllowed, converter)), nullAllowed);
	}

	if (type.kind === 'boolean') {
		return combineBooleanRanges(type, ranges, nullAllowed, converter);
	}

	return {
		kind: 'multiRange',
		filters: ranges.map(r => compileRange(type, r, nullAllowed, converter)),
		nullAllowed,
		nanAllowed: false,
	};
}

/** Single-range filter for a column type */
function compileRange(type: SqlType, range: Range, nullAllowed: boolean, converter: ExpressionConverter): Filter {
	switch (type.kind) {
		case 'tinyint':
		case 'smallint':
		case 'integer':
		case 'bigint':
			return integerRange(type, range, nullAllowed, converter);
		case 'double': {
			const interval = readInterval(range, block => expectNumber(converter.constantValueOf(type, block), 'double'));
			return toOpenRange('doubleRange', interval, { lower: -Number.MAX_VALUE, upper: Number.MAX_VALUE }, nullAllowed);
		}
		case 'real': {
			const interval = readInterval(range, block => Math.fround(expectNumber(converter.constantValueOf(type, block), 'real')));
			return toOpenRange('floatRange', interval, { lower: -FLOAT_MAX, upper: FLOAT_MAX }, nullAllowed);
		}
		case 'varchar':
			return bytesRange(type, range, nullAllowed, converter);
		case 'boolean':
			return booleanRange(type, range, nullAllowed, converter);
		case 'date': {
			const interval = readInterval(range, block => toEpochDay(converter.constantValueOf(type, block)));
			const { lower, upper } = toClosed(interval, DATE_DOMAIN);
			return bigintRange(lower, upper, nullAllowed);
		}
		default:
			return unsupported(`Unsupported range type: ${formatSqlType(type)}`, formatSqlType(type));
	}
}

function integerRange(type: SqlType, range: Range, nullAllowed: boolean, converter: ExpressionConverter): BigintRange {
	const typeName = formatSqlType(type);
	const interval = readInterval(range, block => expectBigint(converter.constantValueOf(type, block), typeName));
	const { lower, upper } = toClosed(interval, INT64_DOMAIN);
	return bigintRange(lower, upper, nullAllowed);
}

function bytesRange(type: SqlType, range: Range, nullAllowed: boolean, converter: ExpressionConverter): BytesRange {
	const interval = readInterval(range, block => expectString(converter.constantValueOf(type, block), 'varchar'));
	return toOpenRange('bytesRange', interval, { lower: '', upper: '' }, nullAllowed);
}

/**
 * Boolean ranges reach us already simplified, so only a handful of shapes are
 * legal: a single point, or one side bounded.
 */
function booleanRange(type: SqlType, range: Range, nullAllowed: boolean, converter: ExpressionConverter): Filter {
	const { lower, upper } = readInterval(range, block => expectBoolean(converter.constantValueOf(type, block), 'boolean'));

	if (lower !== null && upper !== null) {
		invariant(
			lower.value === upper.value,
			'Boolean range should not be [FALSE, TRUE] after coordinator optimization',
			'boolean',
		);
		return { kind: 'boolValue', value: lower.value, nullAllowed };
	}

	if (lower !== null) {
		// (TRUE, +inf) matches no value
		if (lower.exclusive && lower.value) {
			return nullAllowed ? IS_NULL : ALWAYS_FALSE;
		}
		invariant(lower.exclusive || lower.value, 'Boolean range [FALSE, +inf) is not expected', 'boolean');
		return { kind: 'boolValue', value: true, nullAllowed };
	}

	if (upper !== null) {
		// (-inf, FALSE) matches no value
		if (upper.exclusive && !upper.value) {
			return nullAllowed ? IS_NULL : ALWAYS_FALSE;
		}
		invariant(upper.exclusive || !upper.value, 'Boolean range (-inf, TRUE] is not expected', 'boolean');
		return { kind: 'boolValue', value: false, nullAllowed };
	}

	throw new InvariantViolationError('Boolean range can only have one side bounded', 'boolean');
}

function combineBooleanRanges(type: SqlType, ranges: readonly Range[], nullAllowed: boolean, converter: ExpressionConverter): Filter {
	invariant(ranges.length === 2, `Multi bool ranges size can only be 2, got ${ranges.length}`, 'boolean');
	let result: Filter | undefined;
	for (const range of ranges) {
		const filter = booleanRange(type, range, nullAllowed, converter);
		if (filter.kind === 'alwaysFalse' || filter.kind === 'isNull') {
			continue;
		}
		invariant(result === undefined, 'More than one boolean range survives simplification', 'boolean');
		result = filter;
	}
	invariant(result !== undefined, 'No boolean range survives simplification', 'boolean');
	return result;
}

/**
 * Combines closed integer ranges (ascending, disjoint) into the cheapest equivalent filter.
 */
export function combineIntegerRanges(ranges: readonly BigintRange[], nullAllowed: boolean): Filter {
	if (ranges.every(isSingleValue)) {
		return { kind: 'bigintValues', values: new Set(ranges.map(r => r.lower)), nullAllowed };
	}

	const first = ranges[0];
	const last = ranges[ranges.length - 1];

	// Everything except one gap
	if (ranges.length === 2 && first.lower === INT64_MIN && last.upper === INT64_MAX) {
		return { kind: 'negatedBigintRange', lower: first.upper + 1n, upper: last.lower - 1n, nullAllowed };
	}

	const multi = (): Filter => ({ kind: 'bigintMultiRange', ranges, nullAllowed });

	// Everything except isolated points: the ranges tile the domain with single-value gaps
	const rejected: bigint[] = [];
	if (first.lower === INT64_MIN + 1n) {
		rejected.push(INT64_MIN);
	}
	if (first.lower > INT64_MIN + 1n) {
		return multi();
	}
	rejected.push(first.upper + 1n);

	let tiled = true;
	let foundMaximum = false;
	for (let i = 1; i < ranges.length; i++) {
		if (ranges[i].lower !== ranges[i - 1].upper + 2n) {
			tiled = false;
			break;
		}
		if (ranges[i].upper === INT64_MAX) {
			foundMaximum = true;
			break;
		}
		rejected.push(ranges[i].upper + 1n);
		// The final rejected point is the maximum itself
		if (ranges[i].upper === INT64_MAX - 1n) {
			foundMaximum = true;
			break;
		}
	}

	if (tiled && foundMaximum) {
		return { kind: 'negatedBigintValues', values: new Set(rejected), nullAllowed };
	}
	return multi();
}

/**
 * Combines byte-string ranges into the cheapest equivalent filter.
 * The negated-values shape is only recognized when every bound is exclusive
 * and the bounded ends pair up exactly.
 */
export function combineBytesRanges(ranges: readonly BytesRange[], nullAllowed: boolean): Filter {
	if (ranges.every(isBytesSingleValue)) {
		return { kind: 'bytesValues', values: new Set(ranges.map(r => r.lower)), nullAllowed };
	}

	if (ranges.every(r => r.lowerExclusive && r.upperExclusive)) {
		let lowerUnbounded = 0;
		let upperUnbounded = 0;
		const unmatched = new Set<string>();
		const rejected: string[] = [];
		const pair = (value: string): void => {
			if (unmatched.has(value)) {
				unmatched.delete(value);
				rejected.push(value);
			} else {
				unmatched.add(value);
			}
		};
		for (const range of ranges) {
			if (range.lowerUnbounded) {
				lowerUnbounded++;
			} else {
				pair(range.lower);
			}
			if (range.upperUnbounded) {
				upperUnbounded++;
			} else {
				pair(range.upper);
			}
		}
		if (lowerUnbounded === 1 && upperUnbounded === 1 && unmatched.size === 0) {
			return { kind: 'negatedBytesValues', values: new Set(rejected), nullAllowed };
		}
	}

	if (ranges.length === 2 && ranges[0].lowerUnbounded && ranges[1].upperUnbounded) {
		const [below, above] = ranges;
		return {
			kind: 'negatedBytesRange',
			lower: below.upper,
			lowerUnbounded: false,
			lowerExclusive: !below.upperExclusive,
			upper: above.lower,
			upperUnbounded: false,
			upperExclusive: !above.lowerExclusive,
			nullAllowed,
		};
	}

	return { kind: 'multiRange', filters: ranges, nullAllowed, nanAllowed: false };
}
