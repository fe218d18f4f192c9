import type { Filter } from '../filter/filter.js';
import type { SqlType } from '../types/sql-type.js';
import type { TypedExpr } from './expressions.js';

export type HiveColumnKind = 'partitionKey' | 'regular' | 'synthesized' | 'aggregated';

export interface HiveColumn {
	readonly kind: 'hive';
	readonly name: string;
	readonly columnType: HiveColumnKind;
	readonly dataType: SqlType;
	/** Storage type name as recorded in the metastore */
	readonly hiveType: string;
	readonly requiredSubfields: readonly string[];
}

export interface TpchColumn {
	readonly kind: 'tpch';
	readonly name: string;
}

export type ColumnHandle = HiveColumn | TpchColumn;

export interface HiveTable {
	readonly kind: 'hive';
	readonly connectorId: string;
	/** `schema.table`, or the bare table name when there is no schema */
	readonly tableName: string;
	readonly filterPushdownEnabled: boolean;
	/** Compiled filters keyed by column (subfield) name */
	readonly subfieldFilters: ReadonlyMap<string, Filter>;
	readonly remainingFilter?: TypedExpr;
}

export const TPCH_TABLES = [
	'customer', 'lineitem', 'nation', 'orders', 'part', 'partsupp', 'region', 'supplier',
] as const;

export type TpchTableName = typeof TPCH_TABLES[number];

const TPCH_TABLE_SET: ReadonlySet<string> = new Set(TPCH_TABLES);

export function isTpchTableName(name: string): name is TpchTableName {
	return TPCH_TABLE_SET.has(name);
}

export interface TpchTable {
	readonly kind: 'tpch';
	readonly connectorId: string;
	readonly table: TpchTableName;
	readonly scaleFactor: number;
}

export type TableHandle = HiveTable | TpchTable;

export type LocationTableType = 'new' | 'existing';

export interface LocationHandle {
	readonly targetPath: string;
	readonly writePath: string;
	readonly tableType: LocationTableType;
}

export interface HiveInsertTable {
	readonly kind: 'hive';
	readonly inputColumns: readonly HiveColumn[];
	readonly locationHandle: LocationHandle;
}

/** Write target of a TableWrite node; creates and inserts both lower to this */
export interface InsertTableHandle {
	readonly connectorId: string;
	readonly connectorInsertTableHandle: HiveInsertTable;
}
