import type * as wire from '../protocol/index.js';
import { field, type FieldAccessExpr } from '../plan/expressions.js';
import {
	ASC_NULLS_FIRST, ASC_NULLS_LAST, DESC_NULLS_FIRST, DESC_NULLS_LAST, type SortOrder,
} from '../plan/nodes/plan-node.js';
import { parseTypeSignature } from '../types/sql-type.js';
import { invariant, unsupported } from '../common/errors.js';

/** A wire variable as a typed field access */
export function toFieldAccess(variable: wire.Variable): FieldAccessExpr {
	return field(variable.name, parseTypeSignature(variable.type));
}

export function toFieldAccesses(variables: readonly wire.Variable[]): FieldAccessExpr[] {
	return variables.map(toFieldAccess);
}

/**
 * A row count from the wire. A JSON number past 2^53 has already lost precision
 * and is rejected.
 */
export function toRowCount(value: wire.WireInt64, nodeId: string): bigint {
	if (typeof value === 'string') {
		invariant(/^\d+$/.test(value), `Row count '${value}' of node ${nodeId} is not a non-negative integer`);
		return BigInt(value);
	}
	invariant(Number.isSafeInteger(value) && value >= 0, `Row count ${value} of node ${nodeId} is not a non-negative safe integer`);
	return BigInt(value);
}

export function toSortOrder(sortOrder: wire.SortOrder): SortOrder {
	switch (sortOrder) {
		case 'ASC_NULLS_FIRST': return ASC_NULLS_FIRST;
		case 'ASC_NULLS_LAST': return ASC_NULLS_LAST;
		case 'DESC_NULLS_FIRST': return DESC_NULLS_FIRST;
		case 'DESC_NULLS_LAST': return DESC_NULLS_LAST;
		default: return unsupported(`Unsupported sort order: ${String(sortOrder)}`, String(sortOrder));
	}
}

export interface SortingKeys {
	readonly keys: FieldAccessExpr[];
	readonly orders: SortOrder[];
}

export function toSortingKeys(scheme: wire.OrderingScheme | undefined): SortingKeys {
	const orderBy = scheme?.orderBy ?? [];
	return {
		keys: orderBy.map(o => toFieldAccess(o.variable)),
		orders: orderBy.map(o => toSortOrder(o.sortOrder)),
	};
}
