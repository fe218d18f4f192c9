/**
 * Compiled column filters. Created once per column per table scan and never
 * mutated afterwards; the table handle that owns them hands them to the reader.
 */

export interface BigintRange {
	readonly kind: 'bigintRange';
	/** Inclusive */
	readonly lower: bigint;
	/** Inclusive */
	readonly upper: bigint;
	readonly nullAllowed: boolean;
}

/** Accepts everything outside [lower, upper] */
export interface NegatedBigintRange {
	readonly kind: 'negatedBigintRange';
	readonly lower: bigint;
	readonly upper: bigint;
	readonly nullAllowed: boolean;
}

export interface BigintValues {
	readonly kind: 'bigintValues';
	readonly values: ReadonlySet<bigint>;
	readonly nullAllowed: boolean;
}

export interface NegatedBigintValues {
	readonly kind: 'negatedBigintValues';
	readonly values: ReadonlySet<bigint>;
	readonly nullAllowed: boolean;
}

/** Ordered, disjoint ranges; the first match wins */
export interface BigintMultiRange {
	readonly kind: 'bigintMultiRange';
	readonly ranges: readonly BigintRange[];
	readonly nullAllowed: boolean;
}

/**
 * A range over an ordered continuous or variable-length domain. Each side is
 * unbounded, or bounded inclusively or exclusively.
 */
export interface OpenRange<K extends string, T> {
	readonly kind: K;
	readonly lower: T;
	readonly lowerUnbounded: boolean;
	readonly lowerExclusive: boolean;
	readonly upper: T;
	readonly upperUnbounded: boolean;
	readonly upperExclusive: boolean;
	readonly nullAllowed: boolean;
}

export type DoubleRange = OpenRange<'doubleRange', number>;
export type FloatRange = OpenRange<'floatRange', number>;
export type BytesRange = OpenRange<'bytesRange', string>;
/** Accepts everything outside the described range */
export type NegatedBytesRange = OpenRange<'negatedBytesRange', string>;

export interface BytesValues {
	readonly kind: 'bytesValues';
	readonly values: ReadonlySet<string>;
	readonly nullAllowed: boolean;
}

export interface NegatedBytesValues {
	readonly kind: 'negatedBytesValues';
	readonly values: ReadonlySet<string>;
	readonly nullAllowed: boolean;
}

export interface BoolValue {
	readonly kind: 'boolValue';
	readonly value: boolean;
	readonly nullAllowed: boolean;
}

export interface IsNull {
	readonly kind: 'isNull';
}

export interface IsNotNull {
	readonly kind: 'isNotNull';
}

export interface AlwaysFalse {
	readonly kind: 'alwaysFalse';
}

/** Disjunction of sub-filters over one column */
export interface MultiRange {
	readonly kind: 'multiRange';
	readonly filters: readonly Filter[];
	readonly nullAllowed: boolean;
	readonly nanAllowed: boolean;
}

export type Filter =
	| BigintRange
	| NegatedBigintRange
	| BigintValues
	| NegatedBigintValues
	| BigintMultiRange
	| DoubleRange
	| FloatRange
	| BytesRange
	| NegatedBytesRange
	| BytesValues
	| NegatedBytesValues
	| BoolValue
	| IsNull
	| IsNotNull
	| AlwaysFalse
	| MultiRange;

export function bigintRange(lower: bigint, upper: bigint, nullAllowed: boolean): BigintRange {
	return { kind: 'bigintRange', lower, upper, nullAllowed };
}

export function isSingleValue(range: BigintRange): boolean {
	return range.lower === range.upper;
}

export function isBytesSingleValue(range: BytesRange): boolean {
	return !range.lowerUnbounded && !range.upperUnbounded
		&& !range.lowerExclusive && !range.upperExclusive
		&& range.lower === range.upper;
}

export const IS_NULL: IsNull = { kind: 'isNull' };
export const IS_NOT_NULL: IsNotNull = { kind: 'isNotNull' };
export const ALWAYS_FALSE: AlwaysFalse = { kind: 'alwaysFalse' };

function formatOpen<T>(r: OpenRange<string, T>, show: (v: T) => string): string {
	const low = r.lowerUnbounded ? '(-inf' : `${r.lowerExclusive ? '(' : '['}${show(r.lower)}`;
	const high = r.upperUnbounded ? '+inf)' : `${show(r.upper)}${r.upperExclusive ? ')' : ']'}`;
	return `${low}, ${high}`;
}

function nulls(nullAllowed: boolean): string {
	return nullAllowed ? ' with nulls' : '';
}

/** Short human-readable rendering, used by the plan formatter and in logs */
export function formatFilter(filter: Filter): string {
	const quote = (s: string): string => `'${s}'`;
	switch (filter.kind) {
		case 'bigintRange':
			return `BigintRange[${filter.lower}, ${filter.upper}]${nulls(filter.nullAllowed)}`;
		case 'negatedBigintRange':
			return `NOT BigintRange[${filter.lower}, ${filter.upper}]${nulls(filter.nullAllowed)}`;
		case 'bigintValues':
			return `BigintValues{${[...filter.values].join(', ')}}${nulls(filter.nullAllowed)}`;
		case 'negatedBigintValues':
			return `NOT BigintValues{${[...filter.values].join(', ')}}${nulls(filter.nullAllowed)}`;
		case 'bigintMultiRange':
			return `BigintMultiRange(${filter.ranges.map(r => `[${r.lower}, ${r.upper}]`).join(' OR ')})${nulls(filter.nullAllowed)}`;
		case 'doubleRange':
			return `DoubleRange${formatOpen(filter, String)}${nulls(filter.nullAllowed)}`;
		case 'floatRange':
			return `FloatRange${formatOpen(filter, String)}${nulls(filter.nullAllowed)}`;
		case 'bytesRange':
			return `BytesRange${formatOpen(filter, quote)}${nulls(filter.nullAllowed)}`;
		case 'negatedBytesRange':
			return `NOT BytesRange${formatOpen(filter, quote)}${nulls(filter.nullAllowed)}`;
		case 'bytesValues':
			return `BytesValues{${[...filter.values].map(quote).join(', ')}}${nulls(filter.nullAllowed)}`;
		case 'negatedBytesValues':
			return `NOT BytesValues{${[...filter.values].map(quote).join(', ')}}${nulls(filter.nullAllowed)}`;
		case 'boolValue':
			return `BoolValue(${filter.value})${nulls(filter.nullAllowed)}`;
		case 'isNull':
			return 'IS NULL';
		case 'isNotNull':
			return 'IS NOT NULL';
		case 'alwaysFalse':
			return 'FALSE';
		case 'multiRange':
			return `MultiRange(${filter.filters.map(formatFilter).join(' OR ')})${nulls(filter.nullAllowed)}`;
	}
}
