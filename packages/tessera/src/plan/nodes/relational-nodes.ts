import { PlanNodeType } from './plan-node-type.js';
import { UnaryPlanNode, type PlanNode } from './plan-node.js';
import { rowType, type RowType } from '../../types/row-type.js';
import { BIGINT } from '../../types/sql-type.js';
import { formatExpr, type FieldAccessExpr, type TypedExpr } from '../expressions.js';

export class FilterNode extends UnaryPlanNode {
	override readonly nodeType = PlanNodeType.Filter;

	constructor(id: string, public readonly filter: TypedExpr, source: PlanNode) {
		super(id, source);
	}

	get outputType(): RowType {
		return this.source.outputType;
	}

	override getLogicalProperties(): Record<string, unknown> {
		return { predicate: formatExpr(this.filter) };
	}
}

/** Computes one output column per projection, named positionally by `names` */
export class ProjectNode extends UnaryPlanNode {
	override readonly nodeType = PlanNodeType.Project;
	readonly outputType: RowType;

	constructor(
		id: string,
		public readonly names: readonly string[],
		public readonly projections: readonly TypedExpr[],
		source: PlanNode,
	) {
		super(id, source);
		this.outputType = rowType(names, projections.map(p => p.type));
	}

	override getLogicalProperties(): Record<string, unknown> {
		return Object.fromEntries(this.names.map((n, i) => [n, formatExpr(this.projections[i])]));
	}
}

/**
 * Expands array and map columns into rows.
 * Output: replicated columns, then the unnested columns, then the optional ordinality.
 */
export class UnnestNode extends UnaryPlanNode {
	override readonly nodeType = PlanNodeType.Unnest;

	constructor(
		id: string,
		public readonly replicateVariables: readonly FieldAccessExpr[],
		public readonly unnestVariables: readonly FieldAccessExpr[],
		public readonly outputType: RowType,
		public readonly ordinalityName: string | undefined,
		source: PlanNode,
	) {
		super(id, source);
	}

	override getLogicalProperties(): Record<string, unknown> {
		return {
			replicate: this.replicateVariables.map(formatExpr),
			unnest: this.unnestVariables.map(formatExpr),
			ordinality: this.ordinalityName,
		};
	}
}

/** Fails at run time if the source produces more than one row */
export class EnforceSingleRowNode extends UnaryPlanNode {
	override readonly nodeType = PlanNodeType.EnforceSingleRow;

	get outputType(): RowType {
		return this.source.outputType;
	}
}

/** Appends a bigint column unique across all tasks of the query */
export class AssignUniqueIdNode extends UnaryPlanNode {
	override readonly nodeType = PlanNodeType.AssignUniqueId;
	readonly outputType: RowType;

	constructor(
		id: string,
		public readonly idName: string,
		public readonly taskUniqueId: number,
		source: PlanNode,
	) {
		super(id, source);
		this.outputType = rowType(
			[...source.outputType.names, idName],
			[...source.outputType.types, BIGINT],
		);
	}

	override getLogicalProperties(): Record<string, unknown> {
		return { idName: this.idName, taskUniqueId: this.taskUniqueId };
	}
}
