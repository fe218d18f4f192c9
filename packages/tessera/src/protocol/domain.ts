/**
 * Column value constraints pushed down by the coordinator.
 */

/**
 * ABOVE excludes the value, BELOW excludes it from the other side, EXACTLY includes it.
 * A marker without a value block is unbounded on its side.
 */
export type BoundKind = 'ABOVE' | 'EXACTLY' | 'BELOW';

export interface Marker {
	readonly type: string;
	readonly valueBlock?: string;
	readonly bound: BoundKind;
}

export interface Range {
	readonly low: Marker;
	readonly high: Marker;
}

/** Ascending, non-overlapping ranges */
export interface SortedRangeSet {
	readonly '@type': 'sortable';
	readonly type: string;
	readonly ranges: readonly Range[];
}

export interface EquatableValueSet {
	readonly '@type': 'equatable';
	readonly type: string;
	readonly whiteList: boolean;
	readonly entries: readonly { readonly valueBlock: string }[];
}

export interface AllOrNoneValueSet {
	readonly '@type': 'allOrNone';
	readonly type: string;
	readonly all: boolean;
}

export type ValueSet = SortedRangeSet | EquatableValueSet | AllOrNoneValueSet;

export interface Domain {
	readonly values: ValueSet;
	readonly nullAllowed: boolean;
}

/**
 * Per-column domains keyed by column (subfield) name.
 * A missing `domains` map is the "none" tuple domain: no row can match.
 */
export interface TupleDomain {
	readonly domains?: Readonly<Record<string, Domain>>;
}
