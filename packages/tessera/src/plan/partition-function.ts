import type { ScalarValue } from '../common/types.js';
import type { RowType } from '../types/row-type.js';
import { formatSqlType, type SqlType } from '../types/sql-type.js';

/** A one-row column holding a literal partition key */
export interface ConstantVector {
	readonly type: SqlType;
	readonly values: readonly [ScalarValue];
}

/**
 * Where a partition key comes from: an input column, or a literal that every
 * producer hashes identically.
 */
export type KeyChannel =
	| { readonly kind: 'column'; readonly channel: number }
	| { readonly kind: 'constant'; readonly vector: ConstantVector };

/** How output rows are bucketed into consumer partitions */
export type PartitionFunctionSpec =
	| { readonly kind: 'gather' }
	| { readonly kind: 'roundRobin' }
	| {
		readonly kind: 'hash';
		readonly inputType: RowType;
		readonly keyChannels: readonly KeyChannel[];
	}
	| {
		readonly kind: 'hiveBucket';
		readonly bucketCount: number;
		readonly bucketToPartition: readonly number[];
		readonly keyChannels: readonly KeyChannel[];
	};

export const GATHER: PartitionFunctionSpec = { kind: 'gather' };
export const ROUND_ROBIN: PartitionFunctionSpec = { kind: 'roundRobin' };

function formatChannel(channel: KeyChannel): string {
	return channel.kind === 'column'
		? `#${channel.channel}`
		: `const(${String(channel.vector.values[0])}:${formatSqlType(channel.vector.type)})`;
}

export function formatPartitionFunction(spec: PartitionFunctionSpec): string {
	switch (spec.kind) {
		case 'gather':
			return 'GATHER';
		case 'roundRobin':
			return 'ROUND_ROBIN';
		case 'hash':
			return `HASH(${spec.keyChannels.map(formatChannel).join(', ')})`;
		case 'hiveBucket':
			return `HIVE(${spec.bucketCount} buckets; ${spec.keyChannels.map(formatChannel).join(', ')})`;
	}
}
