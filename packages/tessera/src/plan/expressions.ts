import type { ScalarValue } from '../common/types.js';
import { formatSqlType, type SqlType } from '../types/sql-type.js';

export interface FieldAccessExpr {
	readonly kind: 'field';
	readonly name: string;
	readonly type: SqlType;
}

export interface ConstantExpr {
	readonly kind: 'constant';
	readonly type: SqlType;
	readonly value: ScalarValue;
}

export interface CallExpr {
	readonly kind: 'call';
	readonly name: string;
	readonly type: SqlType;
	readonly inputs: readonly TypedExpr[];
}

/** An engine-ready expression with a resolved result type */
export type TypedExpr = FieldAccessExpr | ConstantExpr | CallExpr;

export function field(name: string, type: SqlType): FieldAccessExpr {
	return { kind: 'field', name, type };
}

export function constant(type: SqlType, value: ScalarValue): ConstantExpr {
	return { kind: 'constant', type, value };
}

export function isFieldAccess(expr: TypedExpr): expr is FieldAccessExpr {
	return expr.kind === 'field';
}

export function isConstant(expr: TypedExpr): expr is ConstantExpr {
	return expr.kind === 'constant';
}

function formatValue(value: ScalarValue): string {
	if (value === null) return 'null';
	if (typeof value === 'string') return `'${value}'`;
	if (value instanceof Uint8Array) return `X'${Buffer.from(value).toString('hex')}'`;
	return String(value);
}

export function formatExpr(expr: TypedExpr): string {
	switch (expr.kind) {
		case 'field':
			return `"${expr.name}"`;
		case 'constant':
			return `${formatValue(expr.value)}:${formatSqlType(expr.type)}`;
		case 'call':
			return `${expr.name}(${expr.inputs.map(formatExpr).join(', ')})`;
	}
}
