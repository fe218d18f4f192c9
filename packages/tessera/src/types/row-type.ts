import type { Variable } from '../protocol/expressions.js';
import { InvariantViolationError } from '../common/errors.js';
import { formatSqlType, parseTypeSignature, type SqlType } from './sql-type.js';

/**
 * Ordered, named columns of a relation.
 * Names are unique within a row type; positions are channels.
 */
export interface RowType {
	readonly names: readonly string[];
	readonly types: readonly SqlType[];
}

export function rowType(names: readonly string[], types: readonly SqlType[]): RowType {
	if (names.length !== types.length) {
		throw new InvariantViolationError(`Row type has ${names.length} names but ${types.length} types`);
	}
	return { names, types };
}

/** Builds a row type from wire variables, resolving their type signatures */
export function toRowType(variables: readonly Variable[]): RowType {
	return {
		names: variables.map(v => v.name),
		types: variables.map(v => parseTypeSignature(v.type)),
	};
}

/** Channel of a named field; fails if the row type has no such field */
export function indexOfField(type: RowType, name: string): number {
	const index = type.names.indexOf(name);
	if (index < 0) {
		throw new InvariantViolationError(`Field '${name}' not found in row(${type.names.join(', ')})`, name);
	}
	return index;
}

export function formatRowType(type: RowType): string {
	return `ROW<${type.names.map((n, i) => `${n}:${formatSqlType(type.types[i])}`).join(',')}>`;
}
