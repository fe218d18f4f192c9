import type { RowExpression, Variable } from './expressions.js';

export type SystemPartitioning = 'SINGLE' | 'FIXED' | 'SOURCE' | 'SCALED' | 'COORDINATOR_ONLY' | 'ARBITRARY';

export type SystemPartitionFunction = 'SINGLE' | 'HASH' | 'ROUND_ROBIN' | 'BROADCAST' | 'UNKNOWN';

export interface SystemPartitioningHandle {
	readonly '@type': '$remote';
	readonly partitioning: SystemPartitioning;
	readonly function: SystemPartitionFunction;
}

export type BucketFunctionType = 'HIVE_COMPATIBLE' | 'ENGINE_NATIVE';

export interface HivePartitioningHandle {
	readonly '@type': 'hive';
	readonly bucketCount: number;
	readonly maxCompatibleBucketCount?: number;
	readonly bucketFunctionType: BucketFunctionType;
}

export type ConnectorPartitioningHandle = SystemPartitioningHandle | HivePartitioningHandle;

export interface PartitioningHandle {
	readonly connectorId?: string;
	readonly connectorHandle: ConnectorPartitioningHandle;
}

export interface Partitioning {
	readonly handle: PartitioningHandle;
	readonly arguments: readonly RowExpression[];
}

export interface PartitioningScheme {
	readonly partitioning: Partitioning;
	readonly outputLayout: readonly Variable[];
	readonly hashColumn?: Variable;
	readonly replicateNullsAndAny: boolean;
	/** Bucket index → consumer partition; absent for partitionings that have no buckets */
	readonly bucketToPartition?: readonly number[];
}
