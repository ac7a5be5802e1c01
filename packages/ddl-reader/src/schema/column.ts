import type { ColumnReference, ColumnSize, ColumnSpec, ReferenceSpec } from '../parser/ast.js';
import { sizingParams, type TypeNode } from '../parser/type-parser.js';

const INTEGER = /^-?\d+$/;
const WORD = /^[A-Za-z_][A-Za-z0-9_]*$/;
const QUOTED = /^'((?:[^']|'')*)'$/;

/** A column-level clause introduced by `CONSTRAINT name`; recorded on the table's constraints. */
export type NamedColumnConstraint =
	| { kind: 'primaryKey'; constraintName: string }
	| { kind: 'unique'; constraintName: string }
	| { kind: 'check'; constraintName: string; statement: string }
	| { kind: 'references'; constraintName: string; references: ReferenceSpec };

/**
 * Accumulates the clauses of one column definition. Clauses arrive in any order;
 * `build()` produces the column record.
 */
export class ColumnBuilder {
	readonly name: string;
	type: TypeNode | null = null;
	nullable = true;
	unique = false;
	primaryKey = false;
	defaultValue: string | null = null;
	references: ColumnReference | null = null;
	comment?: string;
	collate?: string;
	autoincrement?: boolean;
	generatedAs?: string;
	onUpdate?: string;
	readonly namedConstraints: NamedColumnConstraint[] = [];
	private readonly checks: string[] = [];

	constructor(name: string) {
		this.name = name;
	}

	addCheck(expression: string): void {
		this.checks.push(expression);
	}

	build(): ColumnSpec {
		const params = this.type ? sizingParams(this.type) : [];
		const column: ColumnSpec = {
			name: this.name,
			type: this.type,
			size: sizeFromParams(params),
			nullable: this.nullable,
			unique: this.unique,
			default: this.defaultValue,
			check: this.checks.length > 0 ? this.checks.join(' AND ') : null,
			references: this.references,
		};
		if (this.comment !== undefined) column.comment = this.comment;
		if (this.collate !== undefined) column.collate = this.collate;
		if (this.autoincrement) column.autoincrement = true;
		if (this.generatedAs !== undefined) column.generatedAs = this.generatedAs;
		if (this.onUpdate !== undefined) column.onUpdate = this.onUpdate;
		const values = enumValues(params);
		if (values) column.values = values;
		return column;
	}
}

/**
 * `VARCHAR(50)` → 50, `DECIMAL(10,2)` → [10, 2], `NVARCHAR(MAX)` → 'MAX'.
 * Anything else (enum members, `10 CHAR`) leaves the size unset.
 */
export function sizeFromParams(params: readonly string[]): ColumnSize {
	if (params.length === 1) {
		const [only] = params;
		if (INTEGER.test(only)) return Number(only);
		if (WORD.test(only)) return only;
	}
	if (params.length === 2 && INTEGER.test(params[0]) && INTEGER.test(params[1])) {
		return [Number(params[0]), Number(params[1])];
	}
	return null;
}

function enumValues(params: readonly string[]): string[] | undefined {
	if (params.length === 0) return undefined;
	const values: string[] = [];
	for (const param of params) {
		const match = QUOTED.exec(param);
		if (!match) return undefined;
		values.push(match[1].replace(/''/g, '\''));
	}
	return values;
}

/** A column record created outside a CREATE TABLE, e.g. a MODIFY on an unknown table. */
export function minimalColumn(name: string, type: TypeNode | null = null): ColumnSpec {
	const builder = new ColumnBuilder(name);
	builder.type = type;
	return builder.build();
}
