import { ParseError } from '../common/errors.js';
import { createLogger } from '../common/logger.js';
import { StatusCode } from '../common/types.js';
import type {
	AlterMap,
	AlterTableStatement,
	CheckSpec,
	ColumnSpec,
	DefaultSpec,
	ForeignKeySpec,
	KeySpec,
	QualifiedName,
} from '../parser/ast.js';
import type { Token } from '../parser/lexer.js';
import { minimalColumn } from './column.js';
import { columnReference, sameName, type TableBuilder } from './table.js';

const log = createLogger('schema:alter');

/** Table state an ALTER may touch, captured so a failed statement can be undone. */
interface TableSnapshot {
	columns: ColumnSpec[];
	primaryKey: string[];
	alterLengths: Map<keyof AlterMap, number>;
}

/**
 * Applies ALTER TABLE actions. When the target table was declared earlier in the same
 * input, actions amend that table and are recorded in its `alter` map; otherwise they
 * are only recorded, on a standalone unresolved statement. A statement that fails part
 * way is undone with {@link rollback}, leaving the table as it was before the ALTER.
 */
export class AlterTableBuilder {
	readonly target: QualifiedName;
	readonly statementIndex: number;
	private readonly table: TableBuilder | undefined;
	private readonly ownAlter: AlterMap = {};
	private readonly snapshot: TableSnapshot | undefined;

	constructor(target: QualifiedName, table: TableBuilder | undefined, statementIndex: number) {
		this.target = target;
		this.table = table;
		this.statementIndex = statementIndex;
		if (table) {
			const alterLengths = new Map<keyof AlterMap, number>();
			for (const key of alterKeys(table.alter)) {
				alterLengths.set(key, table.alter[key]?.length ?? 0);
			}
			this.snapshot = {
				columns: table.columns.map(column => ({ ...column })),
				primaryKey: [...table.primaryKey],
				alterLengths,
			};
		}
	}

	get resolved(): boolean {
		return this.table !== undefined;
	}

	private get alter(): AlterMap {
		return this.table?.alter ?? this.ownAlter;
	}

	addColumn(column: ColumnSpec): void {
		(this.alter.columns ??= []).push({ kind: 'column', column: { ...column } });
		if (this.table && !this.table.findColumn(column.name)) {
			this.table.columns.push(column);
		}
	}

	addForeignKey(foreignKey: ForeignKeySpec): void {
		const entries = (this.alter.columns ??= []);
		foreignKey.columns.forEach((name, position) => {
			const references = columnReference(foreignKey.references, position);
			entries.push({ kind: 'foreignKey', name, constraintName: foreignKey.constraintName, references });
			const column = this.table?.findColumn(name);
			if (column) column.references = references;
		});
	}

	addCheck(check: CheckSpec): void {
		(this.alter.checks ??= []).push(check);
	}

	addUnique(key: KeySpec): void {
		(this.alter.uniques ??= []).push(key);
		for (const name of key.columns) {
			const column = this.table?.findColumn(name);
			if (column) column.unique = true;
		}
	}

	/** @throws ParseError when the table is known and a key column is not one of its columns */
	addPrimaryKey(key: KeySpec, token: Token): void {
		const table = this.table;
		const missing = table ? key.columns.find(name => !table.findColumn(name)) : undefined;
		if (table && missing !== undefined) {
			throw new ParseError(
				`Primary key column '${missing}' is not a column of table '${table.tableName}'`,
				token,
				StatusCode.CONSTRAINT,
			);
		}
		(this.alter.primaryKeys ??= []).push(key);
		if (!this.table) return;
		for (const name of key.columns) {
			if (!this.table.primaryKey.some(existing => sameName(existing, name))) {
				this.table.primaryKey.push(name);
			}
			const column = this.table.findColumn(name);
			if (column) column.nullable = false;
		}
	}

	addDefault(spec: DefaultSpec): void {
		(this.alter.defaults ??= []).push(spec);
		const column = this.table?.findColumn(spec.column);
		if (column) column.default = spec.value;
	}

	/** @throws ParseError when the table already has a different column named `to` */
	renameColumn(from: string, to: string, token: Token): void {
		if (this.table && !sameName(from, to) && this.table.findColumn(to)) {
			throw new ParseError(
				`Cannot rename column '${from}' to '${to}': table '${this.table.tableName}' already has that column`,
				token,
				StatusCode.SCHEMA,
			);
		}
		(this.alter.renamedColumns ??= []).push({ from, to });
		if (!this.table) return;
		const column = this.table.findColumn(from);
		if (column) column.name = to;
		const keyIndex = this.table.primaryKey.findIndex(name => sameName(name, from));
		if (keyIndex >= 0) this.table.primaryKey[keyIndex] = to;
	}

	dropColumn(name: string): void {
		(this.alter.droppedColumns ??= []).push(name);
		if (!this.table) return;
		const index = this.table.columns.findIndex(column => sameName(column.name, name));
		if (index >= 0) {
			this.table.columns.splice(index, 1);
		} else {
			log('DROP COLUMN %s: no such column on %s', name, this.table.tableName);
		}
		const keyIndex = this.table.primaryKey.findIndex(key => sameName(key, name));
		if (keyIndex >= 0) this.table.primaryKey.splice(keyIndex, 1);
	}

	/** Replaces a column definition in place (MODIFY / CHANGE). */
	modifyColumn(column: ColumnSpec): void {
		if (this.table) {
			const index = this.table.columns.findIndex(existing => sameName(existing.name, column.name));
			if (index >= 0) {
				if (this.table.primaryKey.some(key => sameName(key, column.name))) {
					column.nullable = false;
				}
				this.table.columns[index] = column;
			} else {
				this.table.columns.push(column);
			}
		}
		(this.alter.modifiedColumns ??= []).push({ ...column });
	}

	/** Changes one attribute of an existing column (ALTER COLUMN ... SET / DROP / TYPE). */
	changeColumn(name: string, change: (column: ColumnSpec) => void): void {
		const column = this.table?.findColumn(name) ?? minimalColumn(name);
		change(column);
		(this.alter.modifiedColumns ??= []).push({ ...column });
	}

	/** Restores the table to its state before this statement's first action. */
	rollback(): void {
		const { table, snapshot } = this;
		if (!table || !snapshot) return;
		table.columns.splice(0, table.columns.length, ...snapshot.columns);
		table.primaryKey.splice(0, table.primaryKey.length, ...snapshot.primaryKey);
		for (const key of alterKeys(table.alter)) {
			const length = snapshot.alterLengths.get(key);
			const entries: unknown[] | undefined = table.alter[key];
			if (length === undefined) {
				delete table.alter[key];
			} else if (entries) {
				entries.length = length;
			}
		}
		log('ALTER TABLE %s rolled back', table.tableName);
	}

	/** The standalone record for an alter whose table is unknown. */
	build(): AlterTableStatement {
		return {
			kind: 'alterTable',
			statementIndex: this.statementIndex,
			tableName: this.target.name,
			schema: this.target.schema,
			alter: this.ownAlter,
		};
	}
}

function alterKeys(alter: AlterMap): (keyof AlterMap)[] {
	return ALTER_KEYS.filter(key => alter[key] !== undefined);
}

const ALTER_KEYS: readonly (keyof AlterMap)[] = [
	'columns', 'checks', 'uniques', 'primaryKeys', 'defaults', 'renamedColumns', 'droppedColumns', 'modifiedColumns',
];
