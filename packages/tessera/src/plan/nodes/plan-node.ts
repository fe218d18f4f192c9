import type { PlanNodeType } from './plan-node-type.js';
import type { RowType } from '../../types/row-type.js';
import type { FieldAccessExpr } from '../expressions.js';
import { formatExpr } from '../expressions.js';

/** Sort direction and null placement of one sorting key */
export interface SortOrder {
	readonly ascending: boolean;
	readonly nullsFirst: boolean;
}

export const ASC_NULLS_FIRST: SortOrder = { ascending: true, nullsFirst: true };
export const ASC_NULLS_LAST: SortOrder = { ascending: true, nullsFirst: false };
export const DESC_NULLS_FIRST: SortOrder = { ascending: false, nullsFirst: true };
export const DESC_NULLS_LAST: SortOrder = { ascending: false, nullsFirst: false };

export function formatSortOrder(order: SortOrder): string {
	return `${order.ascending ? 'ASC' : 'DESC'} NULLS ${order.nullsFirst ? 'FIRST' : 'LAST'}`;
}

export function formatSortKeys(keys: readonly FieldAccessExpr[], orders: readonly SortOrder[]): string {
	return keys.map((k, i) => `${formatExpr(k)} ${formatSortOrder(orders[i])}`).join(', ');
}

/**
 * Base class for all nodes of the executable plan.
 * PlanNodes are immutable once constructed; ids are carried over from the
 * wire plan so that runtime statistics can be matched back to it.
 */
export abstract class PlanNode {
	abstract readonly nodeType: PlanNodeType;
	abstract readonly outputType: RowType;

	constructor(public readonly id: string) {}

	abstract getSources(): readonly PlanNode[];

	/**
	 * Node-specific properties shown by the plan formatter.
	 * Override in subclasses; the default has none.
	 */
	getLogicalProperties(): Record<string, unknown> {
		return {};
	}

	toString(): string {
		return `${this.nodeType}[${this.id}]`;
	}
}

/** Node with exactly one input */
export abstract class UnaryPlanNode extends PlanNode {
	constructor(id: string, public readonly source: PlanNode) {
		super(id);
	}

	getSources(): readonly PlanNode[] {
		return [this.source];
	}
}

/** Node that reads no other plan node (scans, remote sources, literals) */
export abstract class LeafPlanNode extends PlanNode {
	getSources(): readonly PlanNode[] {
		return [];
	}
}
