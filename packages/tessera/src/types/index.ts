// SQL types resolved from wire type signatures
export {
	type SqlType,
	BOOLEAN,
	BIGINT,
	VARCHAR,
	isIntegerType,
	parseTypeSignature,
	formatSqlType,
	sameType,
} from './sql-type.js';

// Row types
export { type RowType, rowType, toRowType, indexOfField, formatRowType } from './row-type.js';

// Dates as day counts
export { toEpochDay } from './date.js';
