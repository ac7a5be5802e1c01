import type { ColumnSize, SequenceValue, SortOrder } from '../parser/ast.js';

/*
 * Emitted record shapes. Keys are snake_case, the wire format downstream tools read.
 * Optional keys are present only when the source had the clause (or, for Hive-only
 * keys, when the output mode is 'hql').
 */

export interface ReferenceRecord {
	table: string;
	schema: string | null;
	column: string | null;
	on_delete: string | null;
	on_update: string | null;
	deferrable_initially?: string | null;
}

export interface ColumnRecord {
	name: string;
	type: string | null;
	size: ColumnSize;
	references: ReferenceRecord | null;
	unique: boolean;
	nullable: boolean;
	default: string | null;
	check: string | null;
	comment?: string;
	collate?: string;
	autoincrement?: boolean;
	generated_as?: string;
	on_update?: string;
	values?: string[];
}

export interface CheckRecord {
	constraint_name: string | null;
	statement: string;
}

export interface KeyRecord {
	constraint_name: string | null;
	columns: string[];
}

export interface ForeignKeyRecord {
	constraint_name: string | null;
	columns: string[];
	references: {
		table: string;
		schema: string | null;
		columns: string[] | null;
		on_delete: string | null;
		on_update: string | null;
		deferrable_initially?: string | null;
	};
}

export interface ConstraintsRecord {
	primary_keys?: KeyRecord[];
	uniques?: KeyRecord[];
	checks?: CheckRecord[];
	references?: ForeignKeyRecord[];
}

export interface IndexColumnRecord {
	name: string;
	order: SortOrder;
	nulls_last?: boolean;
}

export interface IndexRecord {
	index_name: string | null;
	unique: boolean;
	columns: string[];
	detailed_columns: IndexColumnRecord[];
	using?: string;
	where?: string;
}

export interface PartitionColumnRecord {
	name: string;
	type: string | null;
	size: ColumnSize;
	comment?: string;
}

/** A foreign key added by ALTER TABLE, one entry per local column */
export interface AlterForeignKeyRecord {
	name: string;
	constraint_name: string | null;
	references: ReferenceRecord;
}

export interface AlterRecord {
	columns?: Array<ColumnRecord | AlterForeignKeyRecord>;
	checks?: CheckRecord[];
	uniques?: KeyRecord[];
	primary_keys?: KeyRecord[];
	defaults?: Array<{ constraint_name: string | null; column: string; value: string }>;
	renamed_columns?: Array<{ from: string; to: string }>;
	dropped_columns?: string[];
	modified_columns?: ColumnRecord[];
}

export interface HiveRecordFields {
	external?: boolean;
	stored_as?: string | null;
	location?: string | null;
	row_format?: string | null;
	fields_terminated_by?: string | null;
	collection_items_terminated_by?: string | null;
	map_keys_terminated_by?: string | null;
	lines_terminated_by?: string | null;
	serde?: string | null;
	tblproperties?: Record<string, string> | null;
}

export interface TableRecord extends HiveRecordFields {
	table_name: string;
	schema: string | null;
	columns: ColumnRecord[];
	primary_key: string[];
	index: IndexRecord[];
	checks: CheckRecord[];
	alter: AlterRecord;
	partitioned_by: PartitionColumnRecord[];
	if_not_exists?: boolean;
	replace?: boolean;
	temporary?: boolean;
	like?: { schema: string | null; table_name: string };
	comment?: string;
	tablespace?: string;
	partition_by?: { type: string; columns: string[] };
	constraints?: ConstraintsRecord;
	table_properties?: Record<string, string>;
}

export interface SequenceRecord {
	sequence_name: string;
	schema: string | null;
	if_not_exists?: boolean;
	increment?: SequenceValue;
	start?: SequenceValue;
	minvalue?: SequenceValue | false;
	maxvalue?: SequenceValue | false;
	cache?: SequenceValue | false;
	cycle?: boolean;
	data_type?: string;
	owned_by?: string;
}

/** ALTER TABLE against a table the input never declared */
export interface UnresolvedAlterRecord {
	alter_table_name: string;
	schema: string | null;
	unresolved: true;
	alter: AlterRecord;
}

/** CREATE INDEX against a table the input never declared */
export interface UnresolvedIndexRecord extends IndexRecord {
	table: string;
	schema: string | null;
	unresolved: true;
}

export type DdlRecord = TableRecord | SequenceRecord | UnresolvedAlterRecord | UnresolvedIndexRecord;

export function isTableRecord(record: DdlRecord): record is TableRecord {
	return 'table_name' in record;
}

export function isSequenceRecord(record: DdlRecord): record is SequenceRecord {
	return 'sequence_name' in record;
}

export function isAlterRecord(record: DdlRecord): record is UnresolvedAlterRecord {
	return 'alter_table_name' in record;
}

export function isIndexRecord(record: DdlRecord): record is UnresolvedIndexRecord {
	return 'index_name' in record;
}

export interface GroupedRecords {
	tables: TableRecord[];
	sequences: SequenceRecord[];
	alters: UnresolvedAlterRecord[];
	indexes: UnresolvedIndexRecord[];
}
