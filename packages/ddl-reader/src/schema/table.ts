import { ParseError } from '../common/errors.js';
import { StatusCode } from '../common/types.js';
import type { Token } from '../parser/lexer.js';
import type { ColumnBuilder } from './column.js';
import type {
	AlterMap,
	CheckSpec,
	ColumnReference,
	ColumnSpec,
	CreateTableStatement,
	ForeignKeySpec,
	HiveProperties,
	IndexSpec,
	KeySpec,
	PartitionColumn,
	QualifiedName,
	ReferenceSpec,
	TableConstraints,
} from '../parser/ast.js';

export function sameName(a: string, b: string): boolean {
	return a.toLowerCase() === b.toLowerCase();
}

export function columnReference(reference: ReferenceSpec, position: number): ColumnReference {
	return {
		table: reference.table,
		schema: reference.schema,
		column: reference.columns?.[position] ?? null,
		onDelete: reference.onDelete,
		onUpdate: reference.onUpdate,
		deferrableInitially: reference.deferrableInitially,
	};
}

/**
 * Builder for one CREATE TABLE. Every collection starts empty so each table record
 * has the same keys whichever clauses the source used. After `finalize()` the builder
 * stays registered in the catalog and later ALTER statements keep amending it.
 */
export class TableBuilder {
	readonly tableName: string;
	readonly schema: string | null;
	readonly statementIndex: number;
	readonly columns: ColumnSpec[] = [];
	readonly primaryKey: string[] = [];
	readonly indexes: IndexSpec[] = [];
	readonly checks: CheckSpec[] = [];
	readonly alter: AlterMap = {};
	readonly partitionedBy: PartitionColumn[] = [];
	readonly constraints: TableConstraints = { primaryKeys: [], uniques: [], checks: [], references: [] };
	readonly tableProperties: Record<string, string> = {};
	readonly hive: HiveProperties = {
		external: false,
		storedAs: null,
		location: null,
		rowFormat: null,
		fieldsTerminatedBy: null,
		collectionItemsTerminatedBy: null,
		mapKeysTerminatedBy: null,
		linesTerminatedBy: null,
		serde: null,
		tblproperties: null,
	};
	ifNotExists?: boolean;
	replace?: boolean;
	temporary?: boolean;
	like?: QualifiedName;
	comment?: string;
	tablespace?: string;
	partitionBy?: { type: string; columns: string[] };

	// Table-level keys applied to their columns by finalize()
	private readonly uniqueKeys: KeySpec[] = [];
	private readonly foreignKeys: ForeignKeySpec[] = [];
	private primaryKeyToken?: Token;

	constructor(name: QualifiedName, statementIndex: number) {
		this.tableName = name.name;
		this.schema = name.schema;
		this.statementIndex = statementIndex;
	}

	findColumn(name: string): ColumnSpec | undefined {
		return this.columns.find(column => sameName(column.name, name));
	}

	/** @throws ParseError when the table already has a column of that name */
	addColumn(column: ColumnSpec, token: Token): void {
		if (this.findColumn(column.name)) {
			throw new ParseError(`Duplicate column '${column.name}' in table '${this.tableName}'`, token, StatusCode.SCHEMA);
		}
		this.columns.push(column);
	}

	/** Adds a parsed column definition along with the keys and named constraints it declares. */
	addColumnDefinition(builder: ColumnBuilder, token: Token): ColumnSpec {
		const column = builder.build();
		this.addColumn(column, token);
		if (builder.primaryKey) {
			this.addPrimaryKey([column.name], null, token);
		}
		for (const constraint of builder.namedConstraints) {
			switch (constraint.kind) {
				case 'primaryKey':
					this.constraints.primaryKeys.push({ constraintName: constraint.constraintName, columns: [column.name] });
					break;
				case 'unique':
					this.constraints.uniques.push({ constraintName: constraint.constraintName, columns: [column.name] });
					break;
				case 'check':
					this.constraints.checks.push({ constraintName: constraint.constraintName, statement: constraint.statement });
					break;
				case 'references':
					this.constraints.references.push({
						constraintName: constraint.constraintName,
						columns: [column.name],
						references: constraint.references,
					});
					break;
			}
		}
		return column;
	}

	addPrimaryKey(columns: readonly string[], constraintName: string | null, token: Token): void {
		for (const column of columns) {
			if (!this.primaryKey.some(existing => sameName(existing, column))) {
				this.primaryKey.push(column);
			}
		}
		if (constraintName !== null) {
			this.constraints.primaryKeys.push({ constraintName, columns: [...columns] });
		}
		this.primaryKeyToken ??= token;
	}

	addUnique(key: KeySpec): void {
		this.uniqueKeys.push(key);
		if (key.constraintName !== null || key.columns.length > 1) {
			this.constraints.uniques.push(key);
		}
	}

	addCheck(check: CheckSpec): void {
		this.checks.push(check);
		if (check.constraintName !== null) {
			this.constraints.checks.push(check);
		}
	}

	addForeignKey(foreignKey: ForeignKeySpec): void {
		this.foreignKeys.push(foreignKey);
		this.constraints.references.push(foreignKey);
	}

	/**
	 * Checks the table invariants and applies table-level keys to their columns:
	 * primary-key columns become NOT NULL, single-column UNIQUE keys mark the column,
	 * table-level foreign keys set each local column's reference.
	 * @throws ParseError when a primary-key column was never declared
	 */
	finalize(): void {
		for (const name of this.primaryKey) {
			const column = this.findColumn(name);
			if (!column) {
				const token = this.primaryKeyToken;
				const message = `Primary key column '${name}' is not a column of table '${this.tableName}'`;
				if (token) {
					throw new ParseError(message, token, StatusCode.CONSTRAINT);
				}
				continue;
			}
			column.nullable = false;
		}

		for (const key of this.uniqueKeys) {
			if (key.columns.length !== 1) continue;
			const column = this.findColumn(key.columns[0]);
			if (column) column.unique = true;
		}

		for (const foreignKey of this.foreignKeys) {
			foreignKey.columns.forEach((name, position) => {
				const column = this.findColumn(name);
				if (column) column.references = columnReference(foreignKey.references, position);
			});
		}
	}

	build(): CreateTableStatement {
		const statement: CreateTableStatement = {
			kind: 'createTable',
			statementIndex: this.statementIndex,
			tableName: this.tableName,
			schema: this.schema,
			columns: this.columns,
			primaryKey: this.primaryKey,
			indexes: this.indexes,
			checks: this.checks,
			alter: this.alter,
			partitionedBy: this.partitionedBy,
			constraints: this.constraints,
			tableProperties: this.tableProperties,
			hive: this.hive,
		};
		if (this.ifNotExists) statement.ifNotExists = true;
		if (this.replace) statement.replace = true;
		if (this.temporary) statement.temporary = true;
		if (this.like) statement.like = this.like;
		if (this.comment !== undefined) statement.comment = this.comment;
		if (this.tablespace !== undefined) statement.tablespace = this.tablespace;
		if (this.partitionBy) statement.partitionBy = this.partitionBy;
		return statement;
	}
}
