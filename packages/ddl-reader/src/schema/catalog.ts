import { createLogger } from '../common/logger.js';
import type { QualifiedName } from '../parser/ast.js';
import type { TableBuilder } from './table.js';

const log = createLogger('schema:catalog');

function tableKey(schema: string | null, name: string): string {
	return `${(schema ?? '').toLowerCase()}.${name.toLowerCase()}`;
}

/**
 * Tables declared so far in one parse call, keyed by case-insensitive (schema, name).
 * ALTER TABLE and CREATE INDEX resolve their target here.
 */
export class SchemaCatalog {
	private readonly tables = new Map<string, TableBuilder>();

	register(table: TableBuilder): void {
		const key = tableKey(table.schema, table.tableName);
		if (this.tables.has(key)) {
			log('Table %s redeclared; later declaration wins for alters', key);
		}
		this.tables.set(key, table);
	}

	/**
	 * Finds a declared table. An unqualified name also matches a schema-qualified table
	 * when exactly one table carries that name.
	 */
	resolve(name: QualifiedName): TableBuilder | undefined {
		const exact = this.tables.get(tableKey(name.schema, name.name));
		if (exact || name.schema !== null) {
			return exact;
		}
		const candidates = [...this.tables.values()].filter(table => table.tableName.toLowerCase() === name.name.toLowerCase());
		return candidates.length === 1 ? candidates[0] : undefined;
	}
}
