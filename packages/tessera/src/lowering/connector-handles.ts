import type * as wire from '../protocol/index.js';
import type { ExpressionConverter } from './expression-converter.js';
import type {
	ColumnHandle, HiveColumn, HiveColumnKind, HiveTable, InsertTableHandle, LocationHandle,
	LocationTableType, TableHandle, TpchTable,
} from '../plan/handles.js';
import { isTpchTableName } from '../plan/handles.js';
import type { Filter } from '../filter/filter.js';
import type { TypedExpr } from '../plan/expressions.js';
import { compileDomain } from '../filter/compiler.js';
import { parseTypeSignature } from '../types/sql-type.js';
import { invariant, InvariantViolationError, tagOf, unsupported } from '../common/errors.js';
import { createLogger } from '../common/logger.js';

const log = createLogger('lowering', 'handles');

function toHiveColumnKind(columnType: wire.HiveColumnType): HiveColumnKind {
	switch (columnType) {
		case 'PARTITION_KEY': return 'partitionKey';
		case 'REGULAR': return 'regular';
		case 'SYNTHESIZED': return 'synthesized';
		case 'AGGREGATED': return 'aggregated';
		default: return unsupported(`Unsupported Hive column type: ${String(columnType)}`, String(columnType));
	}
}

export function toHiveColumn(column: wire.HiveColumnHandle): HiveColumn {
	return {
		kind: 'hive',
		name: column.name,
		columnType: toHiveColumnKind(column.columnType),
		dataType: parseTypeSignature(column.typeSignature),
		hiveType: column.hiveType,
		requiredSubfields: [...column.requiredSubfields],
	};
}

/** @throws UnsupportedConstructError for column handles of an unknown connector */
export function toColumnHandle(column: wire.ColumnHandle): ColumnHandle {
	switch (column['@type']) {
		case 'hive':
			return toHiveColumn(column);
		case 'tpch':
			return { kind: 'tpch', name: column.columnName };
		default:
			return unsupported(`Unsupported column handle: ${tagOf(column)}`, tagOf(column));
	}
}

export interface TranslatedTable {
	readonly tableHandle: TableHandle;
	/** Partition columns of the layout, keyed by column name */
	readonly partitionColumns: ReadonlyMap<string, ColumnHandle>;
}

/**
 * Translates a scan's table handle, compiling the layout's pushed-down domains
 * into per-column filters.
 *
 * @throws UnsupportedConstructError when the layout disabled filter pushdown, or
 *   for an unknown connector layout
 * @throws InvariantViolationError for an always-false predicate
 */
export function toTableHandle(table: wire.TableHandle, converter: ExpressionConverter): TranslatedTable {
	const layout = table.connectorTableLayout;
	if (layout === undefined) {
		return unsupported(`Table handle for connector ${table.connectorId} has no layout`, 'tableHandle');
	}
	switch (layout['@type']) {
		case 'hive':
			return toHiveTable(table, layout, converter);
		case 'tpch':
			return { tableHandle: toTpchTable(table.connectorId, layout), partitionColumns: new Map() };
		default:
			return unsupported(`Unsupported table layout: ${tagOf(layout)}`, tagOf(layout));
	}
}

function toHiveTable(table: wire.TableHandle, layout: wire.HiveTableLayoutHandle, converter: ExpressionConverter): TranslatedTable {
	if (!layout.pushdownFilterEnabled) {
		return unsupported('Table scan with filter pushdown disabled is not supported', 'hive');
	}

	const partitionColumns = new Map<string, ColumnHandle>();
	for (const column of layout.partitionColumns) {
		partitionColumns.set(column.name, toHiveColumn(column));
	}

	const domains = layout.domainPredicate.domains;
	if (domains === undefined) {
		throw new InvariantViolationError('Unexpected always-false domain predicate', 'hive');
	}
	const subfieldFilters = new Map<string, Filter>();
	for (const [subfield, domain] of Object.entries(domains)) {
		subfieldFilters.set(subfield, compileDomain(domain, converter));
	}

	const remainingFilter = toRemainingFilter(converter.toInternalExpr(layout.remainingPredicate));

	const connectorHandle = table.connectorHandle;
	if (connectorHandle['@type'] !== 'hive') {
		throw new InvariantViolationError(
			`Hive layout paired with a ${connectorHandle['@type']} table handle`,
			connectorHandle['@type'],
		);
	}
	const tableName = connectorHandle.schemaName === ''
		? connectorHandle.tableName
		: `${connectorHandle.schemaName}.${connectorHandle.tableName}`;

	log('Hive table %s: %d filter(s), remaining filter %s', tableName, subfieldFilters.size, remainingFilter ? 'present' : 'none');

	const tableHandle: HiveTable = {
		kind: 'hive',
		connectorId: table.connectorId,
		tableName,
		filterPushdownEnabled: true,
		subfieldFilters,
		remainingFilter,
	};
	return { tableHandle, partitionColumns };
}

/** A constant residual must be TRUE, and is then dropped */
function toRemainingFilter(expr: TypedExpr): TypedExpr | undefined {
	if (expr.kind !== 'constant') {
		return expr;
	}
	invariant(expr.value === true, 'Unexpected always-false remaining predicate', 'remainingPredicate');
	return undefined;
}

function toTpchTable(connectorId: string, layout: wire.TpchTableLayoutHandle): TpchTable {
	const name = layout.table.tableName;
	if (!isTpchTableName(name)) {
		return unsupported(`Unknown benchmark table: ${name}`, name);
	}
	return { kind: 'tpch', connectorId, table: name, scaleFactor: layout.table.scaleFactor };
}

function toTableType(tableType: wire.TableType): LocationTableType {
	switch (tableType) {
		case 'NEW': return 'new';
		case 'EXISTING': return 'existing';
		default: return unsupported(`Unsupported table type: ${tableType}`, tableType);
	}
}

export function toLocationHandle(location: wire.LocationHandle): LocationHandle {
	return {
		targetPath: location.targetPath,
		writePath: location.writePath,
		tableType: toTableType(location.tableType),
	};
}

/**
 * Builds the write target of a TableWriter node.
 * Create and insert targets both become an insert into the (new or existing) location.
 *
 * @throws InvariantViolationError when no write info accompanies the fragment
 * @throws UnsupportedConstructError for other write targets
 */
export function toInsertTableHandle(writeInfo: wire.TableWriteInfo | undefined): InsertTableHandle {
	const target = writeInfo?.writerTarget;
	if (target === undefined) {
		throw new InvariantViolationError('Table writer requires table write info', 'tableWriter');
	}
	switch (target['@type']) {
		case 'CreateHandle':
		case 'InsertHandle': {
			const handle = target.handle.connectorHandle;
			return {
				connectorId: target.handle.connectorId,
				connectorInsertTableHandle: {
					kind: 'hive',
					inputColumns: handle.inputColumns.map(toHiveColumn),
					locationHandle: toLocationHandle(handle.locationHandle),
				},
			};
		}
		default:
			return unsupported(`Unsupported table writer handle: ${tagOf(target)}`, tagOf(target));
	}
}
