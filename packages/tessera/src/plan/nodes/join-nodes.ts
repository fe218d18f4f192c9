import { PlanNodeType } from './plan-node-type.js';
import { PlanNode } from './plan-node.js';
import type { RowType } from '../../types/row-type.js';
import { formatExpr, type FieldAccessExpr, type TypedExpr } from '../expressions.js';

export type JoinType = 'inner' | 'left' | 'right' | 'full' | 'leftSemiFilter' | 'leftSemiProject' | 'anti';

abstract class BinaryPlanNode extends PlanNode {
	constructor(
		id: string,
		public readonly left: PlanNode,
		public readonly right: PlanNode,
	) {
		super(id);
	}

	getSources(): readonly PlanNode[] {
		return [this.left, this.right];
	}
}

/**
 * Equi-join that builds a hash table over the right input.
 * `nullAware` only applies to anti joins: a null build key rejects every probe row.
 */
export class HashJoinNode extends BinaryPlanNode {
	override readonly nodeType = PlanNodeType.HashJoin;

	constructor(
		id: string,
		public readonly joinType: JoinType,
		public readonly nullAware: boolean,
		public readonly leftKeys: readonly FieldAccessExpr[],
		public readonly rightKeys: readonly FieldAccessExpr[],
		public readonly filter: TypedExpr | undefined,
		left: PlanNode,
		right: PlanNode,
		public readonly outputType: RowType,
	) {
		super(id, left, right);
	}

	override getLogicalProperties(): Record<string, unknown> {
		return {
			joinType: this.joinType,
			nullAware: this.nullAware,
			on: this.leftKeys.map((k, i) => `${formatExpr(k)} = ${formatExpr(this.rightKeys[i])}`),
			filter: this.filter && formatExpr(this.filter),
		};
	}
}

/** Join of pre-sorted inputs on equal keys */
export class MergeJoinNode extends BinaryPlanNode {
	override readonly nodeType = PlanNodeType.MergeJoin;

	constructor(
		id: string,
		public readonly joinType: JoinType,
		public readonly leftKeys: readonly FieldAccessExpr[],
		public readonly rightKeys: readonly FieldAccessExpr[],
		public readonly filter: TypedExpr | undefined,
		left: PlanNode,
		right: PlanNode,
		public readonly outputType: RowType,
	) {
		super(id, left, right);
	}

	override getLogicalProperties(): Record<string, unknown> {
		return {
			joinType: this.joinType,
			on: this.leftKeys.map((k, i) => `${formatExpr(k)} = ${formatExpr(this.rightKeys[i])}`),
			filter: this.filter && formatExpr(this.filter),
		};
	}
}

/** Cross product of its inputs, optionally filtered */
export class NestedLoopJoinNode extends BinaryPlanNode {
	override readonly nodeType = PlanNodeType.NestedLoopJoin;

	constructor(
		id: string,
		public readonly joinType: JoinType,
		public readonly joinCondition: TypedExpr | undefined,
		left: PlanNode,
		right: PlanNode,
		public readonly outputType: RowType,
	) {
		super(id, left, right);
	}

	override getLogicalProperties(): Record<string, unknown> {
		return { joinType: this.joinType, condition: this.joinCondition && formatExpr(this.joinCondition) };
	}
}
