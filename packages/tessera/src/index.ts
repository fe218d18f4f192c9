/**
 * Tessera - lowering of distributed query plan fragments
 *
 * This module translates the plan fragments a coordinator ships to a worker
 * into an executable plan: node by node, with table-scan domains compiled into
 * column filters and the fragment's partitioning compiled into an output stage.
 */

// Wire protocol model (what the coordinator sends)
export * as wire from './protocol/index.js';

// Executable plan
export * from './plan/nodes/index.js';
export {
	type TypedExpr,
	type FieldAccessExpr,
	type ConstantExpr,
	type CallExpr,
	field,
	constant,
	isFieldAccess,
	isConstant,
	formatExpr,
} from './plan/expressions.js';
export {
	type KeyChannel,
	type ConstantVector,
	type PartitionFunctionSpec,
	GATHER,
	ROUND_ROBIN,
	formatPartitionFunction,
} from './plan/partition-function.js';
export type {
	ColumnHandle,
	HiveColumn,
	HiveColumnKind,
	HiveTable,
	TpchColumn,
	TpchTable,
	TableHandle,
	LocationHandle,
	InsertTableHandle,
} from './plan/handles.js';
export { TPCH_TABLES, isTpchTableName } from './plan/handles.js';
export type { PlanFragment, ExecutionStrategy } from './plan/fragment.js';

// Column filters
export * from './filter/index.js';

// Types
export * from './types/index.js';

// Lowering
export * from './lowering/index.js';

// Configuration
export * from './config/index.js';

// Errors, logging and shared definitions
export { StatusCode, type ScalarValue } from './common/types.js';
export {
	TesseraError,
	UnsupportedConstructError,
	InvariantViolationError,
	ConfigError,
	unsupported,
	invariant,
} from './common/errors.js';
export { createLogger, enableLogging, disableLogging, isLoggingEnabled, type LogArea } from './common/logger.js';

// Plan formatting
export { formatPlan, visitPlan, type FormatPlanOptions } from './util/plan-formatter.js';
