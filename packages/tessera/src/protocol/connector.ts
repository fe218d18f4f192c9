/**
 * Connector-specific handles: a storage-file-based connector ("hive") and a
 * synthetic benchmark-data connector ("tpch").
 */
import type { RowExpression } from './expressions.js';
import type { TupleDomain } from './domain.js';

export type HiveColumnType = 'PARTITION_KEY' | 'REGULAR' | 'SYNTHESIZED' | 'AGGREGATED';

export interface HiveColumnHandle {
	readonly '@type': 'hive';
	readonly name: string;
	readonly hiveType: string;
	readonly typeSignature: string;
	readonly hiveColumnIndex: number;
	readonly columnType: HiveColumnType;
	readonly requiredSubfields: readonly string[];
}

export interface TpchColumnHandle {
	readonly '@type': 'tpch';
	readonly columnName: string;
	readonly type: string;
}

export type ColumnHandle = HiveColumnHandle | TpchColumnHandle;

export interface HiveTableHandle {
	readonly '@type': 'hive';
	readonly schemaName: string;
	readonly tableName: string;
}

export interface TpchTableHandle {
	readonly '@type': 'tpch';
	readonly tableName: string;
	readonly scaleFactor: number;
}

export type ConnectorTableHandle = HiveTableHandle | TpchTableHandle;

export interface HiveTableLayoutHandle {
	readonly '@type': 'hive';
	readonly schemaTableName: { readonly schema: string; readonly table: string };
	readonly pushdownFilterEnabled: boolean;
	readonly partitionColumns: readonly HiveColumnHandle[];
	readonly domainPredicate: TupleDomain;
	readonly remainingPredicate: RowExpression;
}

export interface TpchTableLayoutHandle {
	readonly '@type': 'tpch';
	readonly table: TpchTableHandle;
}

export type ConnectorTableLayoutHandle = HiveTableLayoutHandle | TpchTableLayoutHandle;

export interface TableHandle {
	readonly connectorId: string;
	readonly connectorHandle: ConnectorTableHandle;
	readonly connectorTableLayout?: ConnectorTableLayoutHandle;
}

export type TableType = 'NEW' | 'EXISTING' | 'TEMPORARY';

export interface LocationHandle {
	readonly targetPath: string;
	readonly writePath: string;
	readonly tableType: TableType;
}

export interface HiveOutputTableHandle {
	readonly '@type': 'hive';
	readonly schemaName: string;
	readonly tableName: string;
	readonly inputColumns: readonly HiveColumnHandle[];
	readonly locationHandle: LocationHandle;
}

export interface HiveInsertTableHandle {
	readonly '@type': 'hive';
	readonly schemaName: string;
	readonly tableName: string;
	readonly inputColumns: readonly HiveColumnHandle[];
	readonly locationHandle: LocationHandle;
}

export interface CreateHandle {
	readonly '@type': 'CreateHandle';
	readonly handle: { readonly connectorId: string; readonly connectorHandle: HiveOutputTableHandle };
	readonly schemaTableName: { readonly schema: string; readonly table: string };
}

export interface InsertHandle {
	readonly '@type': 'InsertHandle';
	readonly handle: { readonly connectorId: string; readonly connectorHandle: HiveInsertTableHandle };
	readonly schemaTableName: { readonly schema: string; readonly table: string };
}

/** Deletes are executed by the coordinator; workers reject them as a write target */
export interface DeleteHandle {
	readonly '@type': 'DeleteHandle';
	readonly handle: { readonly connectorId: string };
	readonly schemaTableName: { readonly schema: string; readonly table: string };
}

export type WriterTarget = CreateHandle | InsertHandle | DeleteHandle;

/** Read once per TableWriter node; never mutated by the translator */
export interface TableWriteInfo {
	readonly writerTarget?: WriterTarget;
}
