import { PlanNodeType } from './plan-node-type.js';
import { LeafPlanNode } from './plan-node.js';
import type { RowType } from '../../types/row-type.js';
import type { ColumnHandle, TableHandle } from '../handles.js';
import type { ScalarValue } from '../../common/types.js';
import { formatFilter } from '../../filter/filter.js';

/**
 * Reads a connector table. Output columns are bound to connector columns by
 * name through `assignments`.
 */
export class TableScanNode extends LeafPlanNode {
	override readonly nodeType = PlanNodeType.TableScan;

	constructor(
		id: string,
		public readonly outputType: RowType,
		public readonly tableHandle: TableHandle,
		public readonly assignments: ReadonlyMap<string, ColumnHandle>,
	) {
		super(id);
	}

	override getLogicalProperties(): Record<string, unknown> {
		const props: Record<string, unknown> = {
			table: this.tableHandle.kind === 'hive' ? this.tableHandle.tableName : this.tableHandle.table,
			columns: [...this.assignments.keys()],
		};
		if (this.tableHandle.kind === 'hive' && this.tableHandle.subfieldFilters.size > 0) {
			props.filters = Object.fromEntries(
				[...this.tableHandle.subfieldFilters].map(([name, filter]) => [name, formatFilter(filter)])
			);
		}
		return props;
	}
}

/** Literal rows, already resolved to scalar values */
export class ValuesNode extends LeafPlanNode {
	override readonly nodeType = PlanNodeType.Values;

	constructor(
		id: string,
		public readonly outputType: RowType,
		public readonly rows: readonly (readonly ScalarValue[])[],
	) {
		super(id);
	}

	override getLogicalProperties(): Record<string, unknown> {
		return { rows: this.rows.length };
	}
}
