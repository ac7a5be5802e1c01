import type { OutputMode } from '../common/types.js';
import type {
	AlterMap,
	CheckSpec,
	ColumnReference,
	ColumnSpec,
	CreateIndexStatement,
	CreateSequenceStatement,
	CreateTableStatement,
	ForeignKeySpec,
	IndexSpec,
	KeySpec,
	PartitionColumn,
	Statement,
	AlterTableStatement,
} from '../parser/ast.js';
import { columnTypeText } from '../parser/type-parser.js';
import {
	isAlterRecord,
	isIndexRecord,
	isSequenceRecord,
	isTableRecord,
	type AlterRecord,
	type CheckRecord,
	type ColumnRecord,
	type ConstraintsRecord,
	type DdlRecord,
	type ForeignKeyRecord,
	type GroupedRecords,
	type IndexRecord,
	type KeyRecord,
	type PartitionColumnRecord,
	type ReferenceRecord,
	type SequenceRecord,
	type TableRecord,
	type UnresolvedAlterRecord,
	type UnresolvedIndexRecord,
} from './records.js';

/**
 * Output policy. Pure post-processing over finished statements: decides which
 * dialect-specific keys a record carries and gives every record of a kind the same
 * key set. Holds no parsing logic.
 */
export class OutputNormalizer {
	readonly mode: OutputMode;

	constructor(mode: OutputMode = 'sql') {
		this.mode = mode;
	}

	normalizeAll(statements: readonly Statement[]): DdlRecord[] {
		return statements.map(statement => this.normalize(statement));
	}

	normalize(statement: Statement): DdlRecord {
		switch (statement.kind) {
			case 'createTable': return this.table(statement);
			case 'createSequence': return this.sequence(statement);
			case 'alterTable': return this.unresolvedAlter(statement);
			case 'createIndex': return this.unresolvedIndex(statement);
		}
	}

	private table(statement: CreateTableStatement): TableRecord {
		const record: TableRecord = {
			table_name: statement.tableName,
			schema: statement.schema,
			columns: statement.columns.map(column => this.column(column)),
			primary_key: [...statement.primaryKey],
			index: statement.indexes.map(index => this.index(index)),
			checks: statement.checks.map(check),
			alter: this.alter(statement.alter),
			partitioned_by: statement.partitionedBy.map(partitionColumn),
		};
		if (statement.ifNotExists) record.if_not_exists = true;
		if (statement.replace) record.replace = true;
		if (statement.temporary) record.temporary = true;
		if (statement.like) record.like = { schema: statement.like.schema, table_name: statement.like.name };
		if (statement.comment !== undefined) record.comment = statement.comment;
		if (statement.tablespace !== undefined) record.tablespace = statement.tablespace;
		if (statement.partitionBy) record.partition_by = { ...statement.partitionBy, columns: [...statement.partitionBy.columns] };

		const constraints = this.constraints(statement);
		if (constraints) record.constraints = constraints;
		if (Object.keys(statement.tableProperties).length > 0) {
			record.table_properties = { ...statement.tableProperties };
		}

		if (this.mode === 'hql') {
			const hive = statement.hive;
			record.external = hive.external;
			record.stored_as = hive.storedAs;
			record.location = hive.location;
			record.row_format = hive.rowFormat;
			record.fields_terminated_by = hive.fieldsTerminatedBy;
			record.collection_items_terminated_by = hive.collectionItemsTerminatedBy;
			record.map_keys_terminated_by = hive.mapKeysTerminatedBy;
			record.lines_terminated_by = hive.linesTerminatedBy;
			record.serde = hive.serde;
			record.tblproperties = hive.tblproperties ? { ...hive.tblproperties } : null;
		}
		return record;
	}

	private column(column: ColumnSpec): ColumnRecord {
		const record: ColumnRecord = {
			name: column.name,
			type: column.type ? columnTypeText(column.type) : null,
			size: Array.isArray(column.size) ? [column.size[0], column.size[1]] : column.size,
			references: column.references ? this.reference(column.references) : null,
			unique: column.unique,
			nullable: column.nullable,
			default: column.default,
			check: column.check,
		};
		if (column.comment !== undefined) record.comment = column.comment;
		if (column.collate !== undefined) record.collate = column.collate;
		if (column.autoincrement) record.autoincrement = true;
		if (column.generatedAs !== undefined) record.generated_as = column.generatedAs;
		if (column.onUpdate !== undefined) record.on_update = column.onUpdate;
		if (column.values) record.values = [...column.values];
		return record;
	}

	private reference(reference: ColumnReference): ReferenceRecord {
		const record: ReferenceRecord = {
			table: reference.table,
			schema: reference.schema,
			column: reference.column,
			on_delete: reference.onDelete,
			on_update: reference.onUpdate,
		};
		if (this.mode === 'hql' || reference.deferrableInitially !== null) {
			record.deferrable_initially = reference.deferrableInitially;
		}
		return record;
	}

	private foreignKey(foreignKey: ForeignKeySpec): ForeignKeyRecord {
		const { references } = foreignKey;
		const record: ForeignKeyRecord = {
			constraint_name: foreignKey.constraintName,
			columns: [...foreignKey.columns],
			references: {
				table: references.table,
				schema: references.schema,
				columns: references.columns ? [...references.columns] : null,
				on_delete: references.onDelete,
				on_update: references.onUpdate,
			},
		};
		if (this.mode === 'hql' || references.deferrableInitially !== null) {
			record.references.deferrable_initially = references.deferrableInitially;
		}
		return record;
	}

	private constraints(statement: CreateTableStatement): ConstraintsRecord | undefined {
		const { primaryKeys, uniques, checks, references } = statement.constraints;
		const record: ConstraintsRecord = {};
		if (primaryKeys.length > 0) record.primary_keys = primaryKeys.map(key);
		if (uniques.length > 0) record.uniques = uniques.map(key);
		if (checks.length > 0) record.checks = checks.map(check);
		if (references.length > 0) record.references = references.map(fk => this.foreignKey(fk));
		return Object.keys(record).length > 0 ? record : undefined;
	}

	private index(index: IndexSpec): IndexRecord {
		const record: IndexRecord = {
			index_name: index.indexName,
			unique: index.unique,
			columns: [...index.columns],
			detailed_columns: index.detailedColumns.map(column => {
				const detailed: IndexRecord['detailed_columns'][number] = { name: column.name, order: column.order };
				if (column.nullsLast !== undefined) detailed.nulls_last = column.nullsLast;
				return detailed;
			}),
		};
		if (index.using !== undefined) record.using = index.using;
		if (index.where !== undefined) record.where = index.where;
		return record;
	}

	private alter(alter: AlterMap): AlterRecord {
		const record: AlterRecord = {};
		if (alter.columns) {
			record.columns = alter.columns.map(entry => entry.kind === 'column'
				? this.column(entry.column)
				: { name: entry.name, constraint_name: entry.constraintName, references: this.reference(entry.references) });
		}
		if (alter.checks) record.checks = alter.checks.map(check);
		if (alter.uniques) record.uniques = alter.uniques.map(key);
		if (alter.primaryKeys) record.primary_keys = alter.primaryKeys.map(key);
		if (alter.defaults) {
			record.defaults = alter.defaults.map(d => ({ constraint_name: d.constraintName, column: d.column, value: d.value }));
		}
		if (alter.renamedColumns) record.renamed_columns = alter.renamedColumns.map(r => ({ from: r.from, to: r.to }));
		if (alter.droppedColumns) record.dropped_columns = [...alter.droppedColumns];
		if (alter.modifiedColumns) record.modified_columns = alter.modifiedColumns.map(column => this.column(column));
		return record;
	}

	private sequence(statement: CreateSequenceStatement): SequenceRecord {
		const { properties } = statement;
		const record: SequenceRecord = { sequence_name: statement.sequenceName, schema: statement.schema };
		if (statement.ifNotExists) record.if_not_exists = true;
		if (properties.increment !== undefined) record.increment = properties.increment;
		if (properties.start !== undefined) record.start = properties.start;
		if (properties.minvalue !== undefined) record.minvalue = properties.minvalue;
		if (properties.maxvalue !== undefined) record.maxvalue = properties.maxvalue;
		if (properties.cache !== undefined) record.cache = properties.cache;
		if (properties.cycle !== undefined) record.cycle = properties.cycle;
		if (properties.dataType !== undefined) record.data_type = properties.dataType;
		if (properties.ownedBy !== undefined) record.owned_by = properties.ownedBy;
		return record;
	}

	private unresolvedAlter(statement: AlterTableStatement): UnresolvedAlterRecord {
		return {
			alter_table_name: statement.tableName,
			schema: statement.schema,
			unresolved: true,
			alter: this.alter(statement.alter),
		};
	}

	private unresolvedIndex(statement: CreateIndexStatement): UnresolvedIndexRecord {
		return {
			...this.index(statement.index),
			table: statement.tableName,
			schema: statement.schema,
			unresolved: true,
		};
	}
}

function check(spec: CheckSpec): CheckRecord {
	return { constraint_name: spec.constraintName, statement: spec.statement };
}

function key(spec: KeySpec): KeyRecord {
	return { constraint_name: spec.constraintName, columns: [...spec.columns] };
}

function partitionColumn(column: PartitionColumn): PartitionColumnRecord {
	const record: PartitionColumnRecord = {
		name: column.name,
		type: column.type ? columnTypeText(column.type) : null,
		size: column.size,
	};
	if (column.comment !== undefined) record.comment = column.comment;
	return record;
}

/** Splits records by kind, keeping source order within each group. */
export function groupByType(records: readonly DdlRecord[]): GroupedRecords {
	const grouped: GroupedRecords = { tables: [], sequences: [], alters: [], indexes: [] };
	for (const record of records) {
		if (isTableRecord(record)) grouped.tables.push(record);
		else if (isSequenceRecord(record)) grouped.sequences.push(record);
		else if (isAlterRecord(record)) grouped.alters.push(record);
		else if (isIndexRecord(record)) grouped.indexes.push(record);
	}
	return grouped;
}
