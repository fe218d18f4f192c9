import { PlanNodeType } from './plan-node-type.js';
import { UnaryPlanNode, type PlanNode } from './plan-node.js';
import { rowType, type RowType } from '../../types/row-type.js';
import { formatSqlType, type SqlType } from '../../types/sql-type.js';
import { formatExpr, type TypedExpr } from '../expressions.js';
import { GATHER, formatPartitionFunction, type PartitionFunctionSpec } from '../partition-function.js';
import type { InsertTableHandle } from '../handles.js';

export type PartitionedOutputKind = 'partitioned' | 'broadcast';

/**
 * Root of a fragment that sends its rows to downstream tasks.
 * Keys are field accesses into the source or constants.
 */
export class PartitionedOutputNode extends UnaryPlanNode {
	override readonly nodeType = PlanNodeType.PartitionedOutput;

	constructor(
		id: string,
		public readonly kind: PartitionedOutputKind,
		public readonly keys: readonly TypedExpr[],
		public readonly numPartitions: number,
		public readonly replicateNullsAndAny: boolean,
		public readonly partitionFunctionSpec: PartitionFunctionSpec,
		public readonly outputType: RowType,
		source: PlanNode,
	) {
		super(id, source);
	}

	/** One consumer; no partition function is evaluated */
	static single(id: string, outputType: RowType, source: PlanNode): PartitionedOutputNode {
		return new PartitionedOutputNode(id, 'partitioned', [], 1, false, GATHER, outputType, source);
	}

	static broadcast(id: string, numPartitions: number, outputType: RowType, source: PlanNode): PartitionedOutputNode {
		return new PartitionedOutputNode(id, 'broadcast', [], numPartitions, false, GATHER, outputType, source);
	}

	get isBroadcast(): boolean {
		return this.kind === 'broadcast';
	}

	override getLogicalProperties(): Record<string, unknown> {
		return {
			kind: this.kind,
			numPartitions: this.numPartitions,
			keys: this.keys.map(formatExpr),
			partitionFunction: formatPartitionFunction(this.partitionFunctionSpec),
			replicateNullsAndAny: this.replicateNullsAndAny,
		};
	}
}

const VARBINARY: SqlType = { kind: 'varbinary' };
const INTEGER: SqlType = { kind: 'integer' };

/**
 * Computes a partition number per row and serializes the row.
 * Output: (partition integer, data varbinary).
 */
export class PartitionAndSerializeNode extends UnaryPlanNode {
	override readonly nodeType = PlanNodeType.PartitionAndSerialize;
	readonly outputType: RowType = rowType(['partition', 'data'], [INTEGER, VARBINARY]);

	constructor(
		id: string,
		public readonly keys: readonly TypedExpr[],
		public readonly numPartitions: number,
		/** Layout of the serialized rows */
		public readonly serializedRowType: RowType,
		public readonly partitionFunctionSpec: PartitionFunctionSpec,
		source: PlanNode,
	) {
		super(id, source);
	}

	override getLogicalProperties(): Record<string, unknown> {
		return {
			numPartitions: this.numPartitions,
			keys: this.keys.map(formatExpr),
			partitionFunction: formatPartitionFunction(this.partitionFunctionSpec),
		};
	}
}

/** Writes serialized partitions to the named shuffle; produces no rows */
export class ShuffleWriteNode extends UnaryPlanNode {
	override readonly nodeType = PlanNodeType.ShuffleWrite;
	readonly outputType: RowType = rowType([], []);

	constructor(
		id: string,
		public readonly shuffleName: string,
		public readonly serializedShuffleWriteInfo: string,
		source: PlanNode,
	) {
		super(id, source);
	}

	override getLogicalProperties(): Record<string, unknown> {
		return { shuffle: this.shuffleName };
	}
}

export type CommitStrategy = 'noCommit' | 'taskCommit';

/** Writes the source rows to a connector table */
export class TableWriteNode extends UnaryPlanNode {
	override readonly nodeType = PlanNodeType.TableWrite;

	constructor(
		id: string,
		/** Input columns, in the order the writer consumes them */
		public readonly columns: RowType,
		public readonly columnNames: readonly string[],
		public readonly insertTableHandle: InsertTableHandle,
		public readonly outputType: RowType,
		public readonly commitStrategy: CommitStrategy,
		source: PlanNode,
	) {
		super(id, source);
	}

	override getLogicalProperties(): Record<string, unknown> {
		return {
			connector: this.insertTableHandle.connectorId,
			columns: this.columnNames.map((n, i) => `${n}:${formatSqlType(this.columns.types[i])}`),
			commitStrategy: this.commitStrategy,
		};
	}
}
