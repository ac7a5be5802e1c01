import { createLogger } from '../common/logger.js';
import type { ParseWarning, StatementFailure, WarningKind } from '../common/types.js';
import type { Token } from '../parser/lexer.js';
import type {
	AlterTableStatement,
	CreateIndexStatement,
	CreateSequenceStatement,
	Statement,
} from '../parser/ast.js';
import { SchemaCatalog } from '../schema/catalog.js';
import type { TableBuilder } from '../schema/table.js';

const warnLog = createLogger('parser').extend('warn');

/** One emitted statement, in source order. Tables stay builders until the end of the call. */
export type ParseEntry =
	| { kind: 'table'; table: TableBuilder }
	| { kind: 'statement'; statement: CreateSequenceStatement | AlterTableStatement | CreateIndexStatement };

/**
 * All mutable state of one parse call. A fresh context is created per call and
 * passed down the reducer and builders; nothing is kept at module scope.
 */
export class ParseContext {
	readonly catalog = new SchemaCatalog();
	readonly warnings: ParseWarning[] = [];
	readonly failures: StatementFailure[] = [];
	readonly entries: ParseEntry[] = [];
	statementIndex = 0;

	warn(kind: WarningKind, message: string, token: Token, text: string): void {
		warnLog('statement %d: %s', this.statementIndex, message);
		this.warnings.push({
			kind,
			message,
			text,
			statementIndex: this.statementIndex,
			line: token.startLine,
			column: token.startColumn,
			offset: token.startOffset,
		});
	}

	addTable(table: TableBuilder): void {
		this.catalog.register(table);
		this.entries.push({ kind: 'table', table });
	}

	addStatement(statement: CreateSequenceStatement | AlterTableStatement | CreateIndexStatement): void {
		this.entries.push({ kind: 'statement', statement });
	}

	/** Builds the statements in source order, with every alter already applied. */
	statements(): Statement[] {
		return this.entries.map(entry => entry.kind === 'table' ? entry.table.build() : entry.statement);
	}
}
