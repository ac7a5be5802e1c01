import type { TypeNode } from './type-parser.js';

/**
 * Statement records produced by the builders, before the output normalizer
 * shapes them. Field names are camelCase here; the emitted records use snake_case.
 */

/** `null` | length | `[precision, scale]` | a keyword size such as `MAX` */
export type ColumnSize = number | [number, number] | string | null;

export interface ReferenceSpec {
	table: string;
	schema: string | null;
	/** Referenced columns; null when the clause names no column list */
	columns: string[] | null;
	onDelete: string | null;
	onUpdate: string | null;
	deferrableInitially: string | null;
}

export interface ColumnReference {
	table: string;
	schema: string | null;
	column: string | null;
	onDelete: string | null;
	onUpdate: string | null;
	deferrableInitially: string | null;
}

export interface ColumnSpec {
	name: string;
	type: TypeNode | null;
	size: ColumnSize;
	nullable: boolean;
	unique: boolean;
	default: string | null;
	check: string | null;
	references: ColumnReference | null;
	comment?: string;
	collate?: string;
	autoincrement?: boolean;
	generatedAs?: string;
	onUpdate?: string;
	/** ENUM / SET member list */
	values?: string[];
}

export interface CheckSpec {
	constraintName: string | null;
	statement: string;
}

export interface KeySpec {
	constraintName: string | null;
	columns: string[];
}

export interface ForeignKeySpec {
	constraintName: string | null;
	columns: string[];
	references: ReferenceSpec;
}

export interface TableConstraints {
	primaryKeys: KeySpec[];
	uniques: KeySpec[];
	checks: CheckSpec[];
	references: ForeignKeySpec[];
}

export type SortOrder = 'ASC' | 'DESC';

export interface IndexColumn {
	name: string;
	order: SortOrder;
	nullsLast?: boolean;
}

export interface IndexSpec {
	indexName: string | null;
	unique: boolean;
	columns: string[];
	detailedColumns: IndexColumn[];
	using?: string;
	where?: string;
}

export interface PartitionColumn {
	name: string;
	type: TypeNode | null;
	size: ColumnSize;
	comment?: string;
}

export interface HiveProperties {
	external: boolean;
	storedAs: string | null;
	location: string | null;
	rowFormat: string | null;
	fieldsTerminatedBy: string | null;
	collectionItemsTerminatedBy: string | null;
	mapKeysTerminatedBy: string | null;
	linesTerminatedBy: string | null;
	serde: string | null;
	tblproperties: Record<string, string> | null;
}

export interface DefaultSpec {
	constraintName: string | null;
	column: string;
	value: string;
}

export interface RenameSpec {
	from: string;
	to: string;
}

export type AlterColumnEntry =
	| { kind: 'column'; column: ColumnSpec }
	| { kind: 'foreignKey'; name: string; constraintName: string | null; references: ColumnReference };

/** Changes recorded against a table by ALTER statements; keys appear on first use. */
export interface AlterMap {
	columns?: AlterColumnEntry[];
	checks?: CheckSpec[];
	uniques?: KeySpec[];
	primaryKeys?: KeySpec[];
	defaults?: DefaultSpec[];
	renamedColumns?: RenameSpec[];
	droppedColumns?: string[];
	modifiedColumns?: ColumnSpec[];
}

export interface QualifiedName {
	schema: string | null;
	name: string;
}

export interface CreateTableStatement {
	kind: 'createTable';
	statementIndex: number;
	tableName: string;
	schema: string | null;
	columns: ColumnSpec[];
	primaryKey: string[];
	indexes: IndexSpec[];
	checks: CheckSpec[];
	alter: AlterMap;
	partitionedBy: PartitionColumn[];
	constraints: TableConstraints;
	tableProperties: Record<string, string>;
	hive: HiveProperties;
	ifNotExists?: boolean;
	replace?: boolean;
	temporary?: boolean;
	like?: QualifiedName;
	comment?: string;
	tablespace?: string;
	partitionBy?: { type: string; columns: string[] };
}

/** An ALTER TABLE whose target table was not declared earlier in the same input. */
export interface AlterTableStatement {
	kind: 'alterTable';
	statementIndex: number;
	tableName: string;
	schema: string | null;
	alter: AlterMap;
}

/** A CREATE INDEX whose table was not declared earlier in the same input. */
export interface CreateIndexStatement {
	kind: 'createIndex';
	statementIndex: number;
	tableName: string;
	schema: string | null;
	index: IndexSpec;
}

export type SequenceValue = number | string;

export interface SequenceProperties {
	increment?: SequenceValue;
	start?: SequenceValue;
	minvalue?: SequenceValue | false;
	maxvalue?: SequenceValue | false;
	cache?: SequenceValue | false;
	cycle?: boolean;
	dataType?: string;
	ownedBy?: string;
}

export interface CreateSequenceStatement {
	kind: 'createSequence';
	statementIndex: number;
	sequenceName: string;
	schema: string | null;
	ifNotExists?: boolean;
	properties: SequenceProperties;
}

export type Statement =
	| CreateTableStatement
	| AlterTableStatement
	| CreateIndexStatement
	| CreateSequenceStatement;
