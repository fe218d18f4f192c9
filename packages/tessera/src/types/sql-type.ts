import { unsupported, InvariantViolationError } from '../common/errors.js';

/** Scalar kinds that carry no parameters */
export type SimpleTypeKind =
	| 'boolean'
	| 'tinyint'
	| 'smallint'
	| 'integer'
	| 'bigint'
	| 'real'
	| 'double'
	| 'varbinary'
	| 'date'
	| 'timestamp'
	| 'json'
	| 'unknown';

/**
 * A resolved column type.
 * The wire plan encodes these as type signatures such as `varchar(15)` or `array(bigint)`.
 */
export type SqlType =
	| { readonly kind: SimpleTypeKind }
	| { readonly kind: 'varchar'; readonly length?: number }
	| { readonly kind: 'char'; readonly length: number }
	| { readonly kind: 'decimal'; readonly precision: number; readonly scale: number }
	| { readonly kind: 'array'; readonly element: SqlType }
	| { readonly kind: 'map'; readonly key: SqlType; readonly value: SqlType }
	| { readonly kind: 'row'; readonly fields: readonly RowField[] };

export interface RowField {
	readonly name?: string;
	readonly type: SqlType;
}

const SIMPLE_KINDS: ReadonlySet<string> = new Set<SimpleTypeKind>([
	'boolean', 'tinyint', 'smallint', 'integer', 'bigint', 'real', 'double',
	'varbinary', 'date', 'timestamp', 'json', 'unknown',
]);

/** Aliases the coordinator may emit for the canonical names above */
const ALIASES: Readonly<Record<string, string>> = {
	int: 'integer',
	float: 'real',
};

export const BOOLEAN: SqlType = { kind: 'boolean' };
export const BIGINT: SqlType = { kind: 'bigint' };
export const VARCHAR: SqlType = { kind: 'varchar' };

function isSimpleKind(name: string): name is SimpleTypeKind {
	return SIMPLE_KINDS.has(name);
}

/** Integer family: ranges over these compile to 64-bit integer filters */
export function isIntegerType(type: SqlType): boolean {
	switch (type.kind) {
		case 'tinyint':
		case 'smallint':
		case 'integer':
		case 'bigint':
			return true;
		default:
			return false;
	}
}

class SignatureReader {
	private pos = 0;

	constructor(private readonly text: string) {}

	get done(): boolean {
		this.skipSpace();
		return this.pos >= this.text.length;
	}

	peek(): string {
		this.skipSpace();
		return this.text[this.pos] ?? '';
	}

	expect(ch: string): void {
		if (this.peek() !== ch) {
			throw new InvariantViolationError(`Malformed type signature '${this.text}': expected '${ch}' at ${this.pos}`, this.text);
		}
		this.pos++;
	}

	word(): string {
		this.skipSpace();
		const start = this.pos;
		if (this.text[this.pos] === '"') {
			const end = this.text.indexOf('"', start + 1);
			if (end < 0) {
				throw new InvariantViolationError(`Malformed type signature '${this.text}': unterminated quoted name`, this.text);
			}
			this.pos = end + 1;
			return this.text.slice(start + 1, end);
		}
		while (this.pos < this.text.length && /[A-Za-z0-9_$]/.test(this.text[this.pos])) {
			this.pos++;
		}
		if (start === this.pos) {
			throw new InvariantViolationError(`Malformed type signature '${this.text}': expected a name at ${this.pos}`, this.text);
		}
		return this.text.slice(start, this.pos);
	}

	integer(): number {
		const w = this.word();
		if (!/^\d+$/.test(w)) {
			throw new InvariantViolationError(`Malformed type signature '${this.text}': expected a number, got '${w}'`, this.text);
		}
		return Number.parseInt(w, 10);
	}

	private skipSpace(): void {
		while (this.pos < this.text.length && /\s/.test(this.text[this.pos])) {
			this.pos++;
		}
	}
}

function readType(reader: SignatureReader): SqlType {
	return readTypeNamed(reader, reader.word());
}

function readTypeNamed(reader: SignatureReader, word: string): SqlType {
	const raw = word.toLowerCase();
	const name = ALIASES[raw] ?? raw;

	if (isSimpleKind(name)) {
		return { kind: name };
	}

	switch (name) {
		case 'varchar': {
			if (reader.peek() !== '(') {
				return { kind: 'varchar' };
			}
			reader.expect('(');
			const length = reader.integer();
			reader.expect(')');
			return { kind: 'varchar', length };
		}
		case 'char': {
			let length = 1;
			if (reader.peek() === '(') {
				reader.expect('(');
				length = reader.integer();
				reader.expect(')');
			}
			return { kind: 'char', length };
		}
		case 'decimal': {
			reader.expect('(');
			const precision = reader.integer();
			let scale = 0;
			if (reader.peek() === ',') {
				reader.expect(',');
				scale = reader.integer();
			}
			reader.expect(')');
			return { kind: 'decimal', precision, scale };
		}
		case 'array': {
			reader.expect('(');
			const element = readType(reader);
			reader.expect(')');
			return { kind: 'array', element };
		}
		case 'map': {
			reader.expect('(');
			const key = readType(reader);
			reader.expect(',');
			const value = readType(reader);
			reader.expect(')');
			return { kind: 'map', key, value };
		}
		case 'row':
			return { kind: 'row', fields: readRowFields(reader) };
		default:
			return unsupported(`Unsupported type: ${raw}`, raw);
	}
}

function readRowFields(reader: SignatureReader): RowField[] {
	const fields: RowField[] = [];
	reader.expect('(');
	do {
		if (fields.length > 0) {
			reader.expect(',');
		}
		// A field is either "name type" or a bare type
		const first = reader.word();
		const next = reader.peek();
		if (next === ',' || next === ')' || next === '(') {
			fields.push({ type: readTypeNamed(reader, first) });
		} else {
			fields.push({ name: first, type: readType(reader) });
		}
	} while (reader.peek() === ',');
	reader.expect(')');
	return fields;
}

/**
 * Resolves a string-encoded type signature.
 * Case-insensitive; unknown base names fail with UnsupportedConstructError.
 */
export function parseTypeSignature(signature: string): SqlType {
	const reader = new SignatureReader(signature);
	const type = readType(reader);
	if (!reader.done) {
		throw new InvariantViolationError(`Malformed type signature '${signature}': trailing input`, signature);
	}
	return type;
}

export function formatSqlType(type: SqlType): string {
	switch (type.kind) {
		case 'varchar':
			return type.length === undefined ? 'varchar' : `varchar(${type.length})`;
		case 'char':
			return `char(${type.length})`;
		case 'decimal':
			return `decimal(${type.precision},${type.scale})`;
		case 'array':
			return `array(${formatSqlType(type.element)})`;
		case 'map':
			return `map(${formatSqlType(type.key)},${formatSqlType(type.value)})`;
		case 'row':
			return `row(${type.fields.map(f => f.name === undefined ? formatSqlType(f.type) : `${f.name} ${formatSqlType(f.type)}`).join(',')})`;
		default:
			return type.kind;
	}
}

export function sameType(a: SqlType, b: SqlType): boolean {
	return formatSqlType(a) === formatSqlType(b);
}
