import { ParseError, StructuralError } from '../common/errors.js';
import { createLogger } from '../common/logger.js';
import { StatusCode } from '../common/types.js';
import type { ParseContext } from '../core/parse-context.js';
import { AlterTableBuilder } from '../schema/alter.js';
import { ColumnBuilder, sizeFromParams } from '../schema/column.js';
import { SequenceBuilder, sequenceValue } from '../schema/sequence.js';
import { TableBuilder, columnReference } from '../schema/table.js';
import type {
	IndexColumn,
	IndexSpec,
	KeySpec,
	PartitionColumn,
	QualifiedName,
	ReferenceSpec,
} from './ast.js';
import { readParenthesized, readValueExpression, renderTokens } from './expression.js';
import { isTypeName } from './keywords.js';
import { TokenKind, isNameToken, isWordToken, type Token } from './lexer.js';
import { TokenStream } from './token-stream.js';
import { formatType, parseType, sizingParams } from './type-parser.js';

const log = createLogger('parser');

/**
 * A clause handler consumes exactly the tokens of its clause. It returns false when
 * the introducing word turns out not to start that clause (e.g. `NOT` not followed
 * by `NULL`); the dispatcher then rewinds and treats the clause as unknown.
 */
type ClauseHandler<T> = (stream: TokenStream, target: T) => boolean;

interface DispatchOptions<T> {
	/** Clause kind named in warnings */
	what: string;
	/** Where skipping an unknown clause stops, besides `,` and `)` */
	isClauseStart: (stream: TokenStream) => boolean;
	/** Tried when no handler is keyed on the introducing word */
	fallback?: ClauseHandler<T>;
	/** Dispatch one clause only */
	single?: boolean;
}

interface ColumnState {
	column: ColumnBuilder;
	/** Name given by a preceding `CONSTRAINT name`, consumed by the next clause */
	pendingConstraint: string | null;
}

interface CreateFlags {
	replace: boolean;
	temporary: boolean;
	external: boolean;
	unique: boolean;
}

const REFERENTIAL_ACTIONS: readonly string[][] = [
	['CASCADE'],
	['RESTRICT'],
	['SET', 'NULL'],
	['SET', 'DEFAULT'],
	['NO', 'ACTION'],
];

/** MySQL table options that may be written without `=` */
const TABLE_OPTION_WORDS = new Set(['ENGINE', 'CHARSET', 'COLLATE', 'AUTO_INCREMENT', 'CHARACTER']);

/**
 * Grammar reducer. Classifies each statement span from its leading keywords and feeds
 * its clauses to the matching builder. Inside a statement, clauses are dispatched by
 * their introducing keyword, so they may appear in any order.
 */
export class Parser {
	private readonly context: ParseContext;
	private readonly columnClauses: ReadonlyMap<string, ClauseHandler<ColumnState>>;
	private readonly tableClauses: ReadonlyMap<string, ClauseHandler<TableBuilder>>;
	private readonly alterActions: ReadonlyMap<string, ClauseHandler<AlterTableBuilder>>;
	private readonly sequenceClauses: ReadonlyMap<string, ClauseHandler<SequenceBuilder>>;

	constructor(context: ParseContext) {
		this.context = context;
		this.columnClauses = this.buildColumnClauses();
		this.tableClauses = this.buildTableClauses();
		this.alterActions = this.buildAlterActions();
		this.sequenceClauses = this.buildSequenceClauses();
	}

	/**
	 * Reduces one statement span into the context.
	 * @throws StructuralError when the span cannot be classified or misses a required part
	 */
	parseStatement(span: readonly Token[], statementIndex: number): void {
		const stream = new TokenStream(span);
		this.context.statementIndex = statementIndex;
		try {
			const first = stream.peek();
			if (stream.matchWord('CREATE')) {
				this.createStatement(stream, statementIndex);
			} else if (stream.matchWord('ALTER')) {
				this.alterStatement(stream, statementIndex);
			} else {
				throw new ParseError(`Unrecognized statement starting with '${first.raw}'`, first, StatusCode.UNSUPPORTED);
			}
		} catch (e) {
			if (e instanceof StructuralError) throw e;
			if (e instanceof ParseError) {
				throw new StructuralError(e.reason, e.token, statementIndex, e.code);
			}
			throw e;
		}
	}

	// --- statement classification ---

	private createStatement(stream: TokenStream, statementIndex: number): void {
		const flags: CreateFlags = { replace: false, temporary: false, external: false, unique: false };
		for (;;) {
			if (stream.matchWords('OR', 'REPLACE')) flags.replace = true;
			else if (stream.matchWord('TEMP', 'TEMPORARY')) flags.temporary = true;
			else if (stream.matchWord('EXTERNAL')) flags.external = true;
			else if (stream.matchWord('UNIQUE')) flags.unique = true;
			else if (!stream.matchWord('GLOBAL', 'LOCAL', 'UNLOGGED', 'CLUSTERED', 'NONCLUSTERED')) break;
		}

		const kindToken = stream.peek();
		if (stream.matchWord('TABLE')) {
			this.createTable(stream, statementIndex, flags);
		} else if (stream.matchWord('INDEX')) {
			this.createIndex(stream, statementIndex, flags.unique);
		} else if (stream.matchWord('SEQUENCE')) {
			this.createSequence(stream, statementIndex);
		} else {
			throw new ParseError(`Unsupported statement: CREATE ${kindToken.raw}`, kindToken, StatusCode.UNSUPPORTED);
		}
	}

	// --- CREATE TABLE ---

	private createTable(stream: TokenStream, statementIndex: number, flags: CreateFlags): void {
		const ifNotExists = stream.matchWords('IF', 'NOT', 'EXISTS');
		const name = this.qualifiedName(stream);
		const table = new TableBuilder(name, statementIndex);
		if (ifNotExists) table.ifNotExists = true;
		if (flags.replace) table.replace = true;
		if (flags.temporary) table.temporary = true;
		table.hive.external = flags.external;
		log('CREATE TABLE %s', name.name);

		const next = stream.peek();
		if (stream.checkSymbol('(')) {
			this.tableElements(stream, table);
		} else if (!stream.checkWord('LIKE')) {
			throw new ParseError(`CREATE TABLE ${name.name} has no column list`, next);
		}

		this.dispatchClauses(stream, table, this.tableClauses, {
			what: 'table',
			isClauseStart: s => this.isTableClauseStart(s),
			fallback: (s, t) => s.peek(1).raw === '=' && this.tableOption(s, t),
		});
		this.skipTrailing(stream);

		table.finalize();
		this.context.addTable(table);
	}

	private tableElements(stream: TokenStream, table: TableBuilder): void {
		const open = stream.advance();
		if (stream.matchSymbol(')')) return;
		do {
			this.tableElement(stream, table);
		} while (stream.matchSymbol(','));
		if (!stream.matchSymbol(')')) {
			throw new ParseError(`Expected ')' to close the column list of '${table.tableName}'`, open);
		}
	}

	private tableElement(stream: TokenStream, table: TableBuilder): void {
		const start = stream.peek();
		let constraintName: string | null = null;
		if (stream.matchWord('CONSTRAINT')) {
			constraintName = this.name(stream);
		}

		if (this.startsKeyClause(stream)) {
			this.tableConstraint(stream, table, constraintName, start);
		} else if (constraintName !== null) {
			this.skipUnknown(stream, 'table constraint', () => false);
		} else if (stream.peek().kind === TokenKind.KEYWORD && stream.checkWord('LIKE')) {
			stream.advance();
			table.like = this.qualifiedName(stream);
			while (stream.matchWord('INCLUDING', 'EXCLUDING')) {
				stream.advance();
			}
		} else if (this.startsInlineIndex(stream)) {
			this.inlineIndex(stream, table);
		} else {
			const column = this.columnDefinition(stream);
			table.addColumnDefinition(column, start);
		}
		this.skipToElementEnd(stream);
	}

	/** PRIMARY KEY, UNIQUE, CHECK or FOREIGN KEY in keyword position */
	private startsKeyClause(stream: TokenStream): boolean {
		const token = stream.peek();
		if (token.kind !== TokenKind.KEYWORD) return false;
		return stream.checkWords('PRIMARY', 'KEY')
			|| stream.checkWords('FOREIGN', 'KEY')
			|| (stream.checkWord('CHECK') && stream.peek(1).raw === '(')
			|| (stream.checkWord('UNIQUE') && !this.looksLikeColumn(stream));
	}

	/** `KEY idx (a)`, `INDEX (a)`, `FULLTEXT KEY ft (body)`; a column named `key` has a type instead */
	private startsInlineIndex(stream: TokenStream): boolean {
		if (stream.peek().kind !== TokenKind.KEYWORD) return false;
		if (stream.checkWord('FULLTEXT', 'SPATIAL')) return true;
		return stream.checkWord('KEY', 'INDEX') && !this.looksLikeColumn(stream);
	}

	/** True when the word at the cursor is followed by a data type rather than a name or column list */
	private looksLikeColumn(stream: TokenStream): boolean {
		const next = stream.peek(1);
		if (next.raw === '(' || next.kind === TokenKind.EOF) return false;
		if (next.kind === TokenKind.IDENTIFIER && isTypeName(next.raw)) return true;
		if (next.kind === TokenKind.KEYWORD && (next.normalized === 'KEY' || next.normalized === 'INDEX')) return false;
		return stream.peek(2).raw !== '(';
	}

	private tableConstraint(stream: TokenStream, table: TableBuilder, constraintName: string | null, start: Token): void {
		if (stream.matchWords('PRIMARY', 'KEY')) {
			stream.matchWord('CLUSTERED', 'NONCLUSTERED');
			const columns = this.indexColumns(stream).map(c => c.name);
			table.addPrimaryKey(columns, constraintName, start);
		} else if (stream.matchWord('UNIQUE')) {
			table.addUnique(this.uniqueKey(stream, constraintName));
		} else if (stream.matchWord('CHECK')) {
			table.addCheck({ constraintName, statement: renderTokens(readParenthesized(stream)) });
		} else if (stream.matchWords('FOREIGN', 'KEY')) {
			if (isNameToken(stream.peek()) && !stream.checkSymbol('(')) {
				constraintName ??= this.name(stream);
			}
			const columns = this.nameList(stream);
			const referencesToken = stream.peek();
			if (!stream.matchWord('REFERENCES')) {
				throw new ParseError(`Expected REFERENCES after FOREIGN KEY, found '${referencesToken.raw}'`, referencesToken);
			}
			table.addForeignKey({ constraintName, columns, references: this.reference(stream) });
		}
	}

	/** After UNIQUE: `[KEY|INDEX] [name] (cols)` */
	private uniqueKey(stream: TokenStream, constraintName: string | null): KeySpec {
		stream.matchWord('KEY', 'INDEX');
		stream.matchWord('CLUSTERED', 'NONCLUSTERED');
		let name = constraintName;
		if (!stream.checkSymbol('(') && isNameToken(stream.peek())) {
			const indexName = this.name(stream);
			name ??= indexName;
		}
		return { constraintName: name, columns: this.indexColumns(stream).map(c => c.name) };
	}

	private inlineIndex(stream: TokenStream, table: TableBuilder): void {
		stream.matchWord('FULLTEXT', 'SPATIAL');
		stream.matchWord('KEY', 'INDEX');
		const indexName = stream.checkSymbol('(') ? null : this.name(stream);
		const detailedColumns = this.indexColumns(stream);
		table.indexes.push({
			indexName,
			unique: false,
			columns: detailedColumns.map(c => c.name),
			detailedColumns,
		});
	}

	/** Consumes leftovers of a table element up to its `,` or `)`, with a warning. */
	private skipToElementEnd(stream: TokenStream): void {
		if (stream.checkSymbol(',') || stream.checkSymbol(')') || stream.isAtEnd()) return;
		this.skipUnknown(stream, 'table element', () => false);
	}

	// --- column definitions ---

	private columnDefinition(stream: TokenStream): ColumnBuilder {
		const column = new ColumnBuilder(this.name(stream));
		if (this.startsType(stream)) {
			column.type = parseType(stream);
		}
		const state: ColumnState = { column, pendingConstraint: null };
		this.dispatchClauses(stream, state, this.columnClauses, {
			what: 'column',
			isClauseStart: s => this.isColumnClauseStart(s),
		});
		return column;
	}

	private startsType(stream: TokenStream): boolean {
		const token = stream.peek();
		if (!isNameToken(token)) return false;
		return token.kind !== TokenKind.KEYWORD || !this.columnClauses.has(token.normalized);
	}

	private isColumnClauseStart(stream: TokenStream): boolean {
		const token = stream.peek();
		return token.kind === TokenKind.KEYWORD && this.columnClauses.has(token.normalized);
	}

	private buildColumnClauses(): Map<string, ClauseHandler<ColumnState>> {
		const takeConstraintName = (state: ColumnState): string | null => {
			const name = state.pendingConstraint;
			state.pendingConstraint = null;
			return name;
		};

		return new Map<string, ClauseHandler<ColumnState>>([
			['NOT', (stream, { column }) => {
				if (stream.matchWords('NOT', 'NULL')) {
					column.nullable = false;
					return true;
				}
				return stream.matchWords('NOT', 'DEFERRABLE');
			}],
			['NULL', (stream, { column }) => {
				stream.advance();
				column.nullable = true;
				return true;
			}],
			['PRIMARY', (stream, state) => {
				if (!stream.matchWords('PRIMARY', 'KEY')) return false;
				stream.matchWord('ASC', 'DESC');
				state.column.primaryKey = true;
				state.column.nullable = false;
				const constraintName = takeConstraintName(state);
				if (constraintName !== null) {
					state.column.namedConstraints.push({ kind: 'primaryKey', constraintName });
				}
				return true;
			}],
			['UNIQUE', (stream, state) => {
				stream.advance();
				stream.matchWord('KEY');
				state.column.unique = true;
				const constraintName = takeConstraintName(state);
				if (constraintName !== null) {
					state.column.namedConstraints.push({ kind: 'unique', constraintName });
				}
				return true;
			}],
			['DEFAULT', (stream, { column }) => {
				stream.advance();
				column.defaultValue = renderTokens(readValueExpression(stream));
				return true;
			}],
			['CHECK', (stream, state) => {
				stream.advance();
				const statement = renderTokens(readParenthesized(stream));
				state.column.addCheck(statement);
				const constraintName = takeConstraintName(state);
				if (constraintName !== null) {
					state.column.namedConstraints.push({ kind: 'check', constraintName, statement });
				}
				return true;
			}],
			['REFERENCES', (stream, state) => {
				stream.advance();
				const references = this.reference(stream);
				state.column.references = columnReference(references, 0);
				const constraintName = takeConstraintName(state);
				if (constraintName !== null) {
					state.column.namedConstraints.push({ kind: 'references', constraintName, references });
				}
				return true;
			}],
			['DEFERRABLE', (stream, { column }) => {
				stream.advance();
				const initially = this.initially(stream);
				if (initially !== null && column.references) {
					column.references.deferrableInitially = initially;
				}
				return true;
			}],
			['INITIALLY', (stream, { column }) => {
				const initially = this.initially(stream);
				if (initially === null) return false;
				if (column.references) column.references.deferrableInitially = initially;
				return true;
			}],
			['CONSTRAINT', (stream, state) => {
				stream.advance();
				state.pendingConstraint = this.name(stream);
				return true;
			}],
			['COMMENT', (stream, { column }) => {
				stream.advance();
				stream.matchSymbol('=');
				column.comment = this.stringValue(stream);
				return true;
			}],
			['COLLATE', (stream, { column }) => {
				stream.advance();
				const token = stream.advance();
				column.collate = token.raw;
				return true;
			}],
			['AUTO_INCREMENT', (stream, { column }) => {
				stream.advance();
				column.autoincrement = true;
				return true;
			}],
			['AUTOINCREMENT', (stream, { column }) => {
				stream.advance();
				column.autoincrement = true;
				return true;
			}],
			['IDENTITY', (stream, { column }) => {
				stream.advance();
				if (stream.checkSymbol('(')) readParenthesized(stream);
				column.autoincrement = true;
				return true;
			}],
			['GENERATED', (stream, { column }) => {
				stream.advance();
				if (!stream.matchWord('ALWAYS') && !stream.matchWords('BY', 'DEFAULT')) return false;
				stream.matchWords('ON', 'NULL');
				if (!stream.matchWord('AS')) return false;
				if (stream.matchWord('IDENTITY')) {
					if (stream.checkSymbol('(')) readParenthesized(stream);
					column.autoincrement = true;
				} else {
					column.generatedAs = renderTokens(readParenthesized(stream));
					stream.matchWord('STORED', 'VIRTUAL');
				}
				return true;
			}],
			['AS', (stream, { column }) => {
				if (stream.peek(1).raw !== '(') return false;
				stream.advance();
				column.generatedAs = renderTokens(readParenthesized(stream));
				stream.matchWord('STORED', 'VIRTUAL');
				return true;
			}],
			['ON', (stream, { column }) => {
				if (!stream.matchWords('ON', 'UPDATE')) return false;
				column.onUpdate = renderTokens(readValueExpression(stream));
				return true;
			}],
		]);
	}

	/** `INITIALLY DEFERRED | IMMEDIATE` at the cursor, or null */
	private initially(stream: TokenStream): string | null {
		if (!stream.checkWord('INITIALLY')) return null;
		const value = stream.peek(1);
		if (!isWordToken(value) || (value.normalized !== 'DEFERRED' && value.normalized !== 'IMMEDIATE')) {
			return null;
		}
		stream.advance();
		stream.advance();
		return value.normalized;
	}

	/** After REFERENCES: `table [(cols)] [ON DELETE ..] [ON UPDATE ..] [MATCH ..] [[NOT] DEFERRABLE] [INITIALLY ..]` */
	private reference(stream: TokenStream): ReferenceSpec {
		const target = this.qualifiedName(stream);
		const reference: ReferenceSpec = {
			table: target.name,
			schema: target.schema,
			columns: stream.checkSymbol('(') ? this.nameList(stream) : null,
			onDelete: null,
			onUpdate: null,
			deferrableInitially: null,
		};

		for (;;) {
			if (stream.checkWords('ON', 'DELETE') || stream.checkWords('ON', 'UPDATE')) {
				const action = this.referentialAction(stream, 2);
				if (action === null) break;
				if (stream.peek(1).normalized === 'DELETE') reference.onDelete = action.text;
				else reference.onUpdate = action.text;
				for (let i = 0; i < action.length + 2; i++) stream.advance();
			} else if (stream.matchWord('MATCH')) {
				stream.matchWord('FULL', 'PARTIAL', 'SIMPLE');
			} else if (stream.matchWords('NOT', 'DEFERRABLE') || stream.matchWord('DEFERRABLE')) {
				continue;
			} else if (stream.checkWord('INITIALLY')) {
				const initially = this.initially(stream);
				if (initially === null) break;
				reference.deferrableInitially = initially;
			} else {
				break;
			}
		}
		return reference;
	}

	/** Referential action starting `offset` tokens ahead, without consuming it */
	private referentialAction(stream: TokenStream, offset: number): { text: string; length: number } | null {
		for (const words of REFERENTIAL_ACTIONS) {
			const matches = words.every((word, i) => {
				const token = stream.peek(offset + i);
				return isWordToken(token) && token.normalized === word;
			});
			if (matches) {
				return { text: words.join(' '), length: words.length };
			}
		}
		return null;
	}

	// --- table clauses after the element list ---

	private isTableClauseStart(stream: TokenStream): boolean {
		const token = stream.peek();
		if (!isWordToken(token)) return false;
		return this.tableClauses.has(token.normalized) || stream.peek(1).raw === '=';
	}

	private buildTableClauses(): Map<string, ClauseHandler<TableBuilder>> {
		const option: ClauseHandler<TableBuilder> = (stream, table) => this.tableOption(stream, table);
		const clauses = new Map<string, ClauseHandler<TableBuilder>>([
			['PARTITIONED', (stream, table) => {
				if (!stream.matchWords('PARTITIONED', 'BY')) return false;
				table.partitionedBy.push(...this.partitionColumns(stream));
				return true;
			}],
			['PARTITION', (stream, table) => {
				if (!stream.matchWords('PARTITION', 'BY')) return false;
				const typeToken = stream.advance();
				table.partitionBy = { type: typeToken.normalized, columns: this.indexColumns(stream).map(c => c.name) };
				return true;
			}],
			['LOCATION', (stream, table) => {
				stream.advance();
				table.hive.location = this.stringValue(stream);
				return true;
			}],
			['ROW', (stream, table) => {
				if (!stream.matchWords('ROW', 'FORMAT')) return false;
				this.rowFormat(stream, table);
				return true;
			}],
			['STORED', (stream, table) => {
				if (!stream.matchWords('STORED', 'AS')) return false;
				if (stream.matchWord('INPUTFORMAT')) {
					table.hive.storedAs = this.stringValue(stream);
					if (stream.matchWord('OUTPUTFORMAT')) this.stringValue(stream);
				} else {
					table.hive.storedAs = stream.advance().raw;
				}
				return true;
			}],
			['LIKE', (stream, table) => {
				stream.advance();
				table.like = this.qualifiedName(stream);
				return true;
			}],
			['COMMENT', (stream, table) => {
				stream.advance();
				stream.matchSymbol('=');
				table.comment = this.stringValue(stream);
				return true;
			}],
			['TBLPROPERTIES', (stream, table) => {
				stream.advance();
				table.hive.tblproperties = { ...table.hive.tblproperties, ...this.propertyList(stream) };
				return true;
			}],
			['TABLESPACE', (stream, table) => {
				stream.advance();
				table.tablespace = this.name(stream);
				return true;
			}],
			['WITH', (stream, table) => {
				if (stream.peek(1).raw !== '(') return false;
				stream.advance();
				Object.assign(table.tableProperties, this.propertyList(stream));
				return true;
			}],
			['DEFAULT', (stream, table) => {
				stream.advance();
				return this.tableOption(stream, table);
			}],
		]);
		for (const word of TABLE_OPTION_WORDS) {
			clauses.set(word, option);
		}
		return clauses;
	}

	/** MySQL-style `name [=] value`; CHARACTER SET counts as one name */
	private tableOption(stream: TokenStream, table: TableBuilder): boolean {
		const first = stream.peek();
		if (!isWordToken(first)) return false;
		const words = [stream.advance().normalized];
		if (words[0] === 'CHARACTER' && stream.matchWord('SET')) words.push('SET');
		const hasEquals = stream.matchSymbol('=');
		if (!hasEquals && !TABLE_OPTION_WORDS.has(words[0])) return false;
		const value = stream.peek();
		if (value.kind === TokenKind.EOF || value.kind === TokenKind.PUNCTUATION) return false;
		stream.advance();
		table.tableProperties[words.join('_').toLowerCase()] = value.raw;
		return true;
	}

	/** `ROW FORMAT DELIMITED [FIELDS TERMINATED BY ..] ...` or `ROW FORMAT SERDE 'class' [WITH SERDEPROPERTIES (..)]` */
	private rowFormat(stream: TokenStream, table: TableBuilder): void {
		if (stream.matchWord('SERDE')) {
			table.hive.rowFormat = 'SERDE';
			table.hive.serde = this.stringValue(stream);
			if (stream.matchWords('WITH', 'SERDEPROPERTIES')) {
				this.propertyList(stream);
			}
			return;
		}

		const format = stream.peek();
		if (!stream.matchWord('DELIMITED')) {
			throw new ParseError(`Expected DELIMITED or SERDE after ROW FORMAT, found '${format.raw}'`, format);
		}
		table.hive.rowFormat = 'DELIMITED';
		for (;;) {
			if (stream.matchWords('FIELDS', 'TERMINATED', 'BY')) {
				table.hive.fieldsTerminatedBy = this.stringValue(stream);
				if (stream.matchWords('ESCAPED', 'BY')) this.stringValue(stream);
			} else if (stream.matchWords('COLLECTION', 'ITEMS', 'TERMINATED', 'BY')) {
				table.hive.collectionItemsTerminatedBy = this.stringValue(stream);
			} else if (stream.matchWords('MAP', 'KEYS', 'TERMINATED', 'BY')) {
				table.hive.mapKeysTerminatedBy = this.stringValue(stream);
			} else if (stream.matchWords('LINES', 'TERMINATED', 'BY')) {
				table.hive.linesTerminatedBy = this.stringValue(stream);
			} else if (stream.matchWords('NULL', 'DEFINED', 'AS')) {
				this.stringValue(stream);
			} else {
				break;
			}
		}
	}

	/** `(name [type] [COMMENT '..'], ...)`; Hive gives types, Spark-style lists give names only */
	private partitionColumns(stream: TokenStream): PartitionColumn[] {
		const open = stream.peek();
		if (!stream.matchSymbol('(')) {
			throw new ParseError(`Expected '(' after PARTITIONED BY, found '${open.raw}'`, open);
		}
		const columns: PartitionColumn[] = [];
		do {
			const name = this.name(stream);
			const type = !stream.checkSymbol(',') && !stream.checkSymbol(')') && !stream.checkWord('COMMENT')
				? parseType(stream)
				: null;
			const column: PartitionColumn = { name, type, size: sizeFromParams(type ? sizingParams(type) : []) };
			if (stream.matchWord('COMMENT')) column.comment = this.stringValue(stream);
			columns.push(column);
		} while (stream.matchSymbol(','));
		const close = stream.peek();
		if (!stream.matchSymbol(')')) {
			throw new ParseError(`Expected ')' to close PARTITIONED BY, found '${close.raw}'`, close);
		}
		return columns;
	}

	/** `('key' = 'value', name = value, ...)` */
	private propertyList(stream: TokenStream): Record<string, string> {
		const properties: Record<string, string> = {};
		const inner = new TokenStream(readParenthesized(stream));
		while (!inner.isAtEnd()) {
			const key = inner.advance();
			let value = 'true';
			if (inner.matchSymbol('=')) {
				const valueTokens: Token[] = [];
				while (!inner.isAtEnd() && !inner.checkSymbol(',')) {
					valueTokens.push(inner.advance());
				}
				value = valueTokens.length === 1 ? valueTokens[0].raw : renderTokens(valueTokens);
			}
			properties[key.raw] = value;
			if (!inner.matchSymbol(',')) break;
		}
		return properties;
	}

	// --- CREATE INDEX ---

	private createIndex(stream: TokenStream, statementIndex: number, unique: boolean): void {
		stream.matchWord('CONCURRENTLY');
		stream.matchWords('IF', 'NOT', 'EXISTS');
		const indexName = stream.checkWord('ON') ? null : this.qualifiedName(stream).name;
		const onToken = stream.peek();
		if (!stream.matchWord('ON')) {
			throw new ParseError(`Expected ON after CREATE INDEX ${indexName ?? ''}, found '${onToken.raw}'`, onToken);
		}
		stream.matchWord('ONLY');
		const tableToken = stream.peek();
		const target = this.qualifiedName(stream);
		const index: IndexSpec = { indexName, unique, columns: [], detailedColumns: [] };
		if (stream.matchWord('USING')) {
			index.using = stream.advance().raw;
		}
		index.detailedColumns = this.indexColumns(stream);
		index.columns = index.detailedColumns.map(c => c.name);

		while (!stream.isAtEnd()) {
			if (stream.matchWord('INCLUDE')) {
				readParenthesized(stream);
			} else if (stream.matchWords('NULLS', 'NOT', 'DISTINCT') || stream.matchWords('NULLS', 'DISTINCT')) {
				continue;
			} else if (stream.checkWord('WITH') && stream.peek(1).raw === '(') {
				stream.advance();
				readParenthesized(stream);
			} else if (stream.matchWord('TABLESPACE')) {
				this.name(stream);
			} else if (stream.matchWord('WHERE')) {
				const start = stream.index;
				while (!stream.isAtEnd()) stream.advance();
				index.where = renderTokens(stream.slice(start));
			} else {
				this.skipUnknown(stream, 'index', s => s.checkWord('WHERE', 'INCLUDE', 'TABLESPACE', 'WITH'));
				if (stream.checkSymbol(',') || stream.checkSymbol(')')) stream.advance();
			}
		}

		const table = this.context.catalog.resolve(target);
		if (table) {
			table.indexes.push(index);
		} else {
			this.context.warn(
				'unresolvedIndexTarget',
				`CREATE INDEX ${indexName ?? ''} references table '${target.name}', which is not declared earlier in the input`,
				tableToken,
				target.schema ? `${target.schema}.${target.name}` : target.name,
			);
			this.context.addStatement({ kind: 'createIndex', statementIndex, tableName: target.name, schema: target.schema, index });
		}
	}

	/** `(col [ASC|DESC] [NULLS FIRST|LAST], lower(expr), ...)` */
	private indexColumns(stream: TokenStream): IndexColumn[] {
		const inner = readParenthesized(stream);
		const columns: IndexColumn[] = [];
		let part: Token[] = [];
		let depth = 0;
		const flush = (): void => {
			if (part.length > 0) columns.push(this.indexColumn(part));
			part = [];
		};
		for (const token of inner) {
			if (token.kind === TokenKind.PUNCTUATION) {
				if (token.raw === '(') depth++;
				else if (token.raw === ')') depth--;
				else if (token.raw === ',' && depth === 0) {
					flush();
					continue;
				}
			}
			part.push(token);
		}
		flush();
		return columns;
	}

	private indexColumn(tokens: Token[]): IndexColumn {
		let end = tokens.length;
		const wordAt = (i: number): string | undefined => {
			const token = tokens[i];
			return token !== undefined && isWordToken(token) ? token.normalized : undefined;
		};

		let nullsLast: boolean | undefined;
		if (end >= 2 && wordAt(end - 2) === 'NULLS' && (wordAt(end - 1) === 'FIRST' || wordAt(end - 1) === 'LAST')) {
			nullsLast = wordAt(end - 1) === 'LAST';
			end -= 2;
		}
		let order: IndexColumn['order'] = 'ASC';
		const direction = wordAt(end - 1);
		if (end > 1 && (direction === 'ASC' || direction === 'DESC')) {
			order = direction;
			end--;
		}

		const body = tokens.slice(0, end);
		// MySQL prefix length: name(10)
		const first = body[0];
		const isPrefixed = body.length === 4 && body[1].raw === '(' && body[2].kind === TokenKind.NUMBER && body[3].raw === ')';
		const name = first !== undefined && isNameToken(first) && (body.length === 1 || isPrefixed)
			? first.raw
			: renderTokens(body);

		const column: IndexColumn = { name, order };
		if (nullsLast !== undefined) column.nullsLast = nullsLast;
		return column;
	}

	// --- CREATE SEQUENCE ---

	private createSequence(stream: TokenStream, statementIndex: number): void {
		const ifNotExists = stream.matchWords('IF', 'NOT', 'EXISTS');
		const sequence = new SequenceBuilder(this.qualifiedName(stream), statementIndex);
		if (ifNotExists) sequence.ifNotExists = true;
		this.dispatchClauses(stream, sequence, this.sequenceClauses, {
			what: 'sequence',
			isClauseStart: s => this.isSequenceClauseStart(s),
		});
		this.skipTrailing(stream);
		this.context.addStatement(sequence.build());
	}

	private isSequenceClauseStart(stream: TokenStream): boolean {
		const token = stream.peek();
		return isWordToken(token) && this.sequenceClauses.has(token.normalized);
	}

	private buildSequenceClauses(): Map<string, ClauseHandler<SequenceBuilder>> {
		const numeric = (key: 'increment' | 'start' | 'minvalue' | 'maxvalue' | 'cache', ...noise: string[]): ClauseHandler<SequenceBuilder> =>
			(stream, sequence) => {
				stream.advance();
				stream.matchWord(...noise);
				sequence.set(key, sequenceValue(this.numberValue(stream)));
				return true;
			};
		const disabled = (key: 'minvalue' | 'maxvalue' | 'cache' | 'cycle'): ClauseHandler<SequenceBuilder> =>
			(stream, sequence) => {
				stream.advance();
				sequence.set(key, false);
				return true;
			};

		return new Map<string, ClauseHandler<SequenceBuilder>>([
			['INCREMENT', numeric('increment', 'BY')],
			['START', numeric('start', 'WITH')],
			['MINVALUE', numeric('minvalue')],
			['MAXVALUE', numeric('maxvalue')],
			['CACHE', numeric('cache')],
			['NOMINVALUE', disabled('minvalue')],
			['NOMAXVALUE', disabled('maxvalue')],
			['NOCACHE', disabled('cache')],
			['NOCYCLE', disabled('cycle')],
			['CYCLE', (stream, sequence) => {
				stream.advance();
				sequence.set('cycle', true);
				return true;
			}],
			['NO', (stream, sequence) => {
				const word = stream.peek(1);
				const keys: Record<string, 'minvalue' | 'maxvalue' | 'cycle' | 'cache'> = {
					MINVALUE: 'minvalue',
					MAXVALUE: 'maxvalue',
					CYCLE: 'cycle',
					CACHE: 'cache',
				};
				const key = isWordToken(word) ? keys[word.normalized] : undefined;
				if (key === undefined) return false;
				stream.advance();
				stream.advance();
				sequence.set(key, false);
				return true;
			}],
			['AS', (stream, sequence) => {
				stream.advance();
				sequence.set('dataType', formatType(parseType(stream)));
				return true;
			}],
			['OWNED', (stream, sequence) => {
				if (!stream.matchWords('OWNED', 'BY')) return false;
				const start = stream.index;
				if (!stream.matchWord('NONE')) {
					this.qualifiedName(stream, 3);
				}
				sequence.set('ownedBy', stream.slice(start).map(t => t.raw).join(''));
				return true;
			}],
		]);
	}

	// --- ALTER TABLE ---

	private alterStatement(stream: TokenStream, statementIndex: number): void {
		const kindToken = stream.peek();
		if (!stream.matchWord('TABLE')) {
			throw new ParseError(`Unsupported statement: ALTER ${kindToken.raw}`, kindToken, StatusCode.UNSUPPORTED);
		}
		stream.matchWords('IF', 'EXISTS');
		stream.matchWord('ONLY');
		const nameToken = stream.peek();
		const target = this.qualifiedName(stream);
		const builder = new AlterTableBuilder(target, this.context.catalog.resolve(target), statementIndex);
		log('ALTER TABLE %s (%s)', target.name, builder.resolved ? 'resolved' : 'unresolved');

		if (!builder.resolved) {
			this.context.warn(
				'unresolvedAlterTarget',
				`ALTER TABLE references table '${target.name}', which is not declared earlier in the input`,
				nameToken,
				target.schema ? `${target.schema}.${target.name}` : target.name,
			);
		}

		try {
			do {
				this.dispatchClauses(stream, builder, this.alterActions, {
					what: 'alter action',
					isClauseStart: () => false,
					single: true,
				});
				if (!stream.isAtEnd() && !stream.checkSymbol(',')) {
					this.skipUnknown(stream, 'alter action', () => false);
				}
			} while (stream.matchSymbol(','));
			this.skipTrailing(stream);
		} catch (e) {
			builder.rollback();
			throw e;
		}

		if (!builder.resolved) {
			this.context.addStatement(builder.build());
		}
	}

	private buildAlterActions(): Map<string, ClauseHandler<AlterTableBuilder>> {
		return new Map<string, ClauseHandler<AlterTableBuilder>>([
			['ADD', (stream, alter) => {
				stream.advance();
				let constraintName: string | null = null;
				if (stream.matchWord('CONSTRAINT')) constraintName = this.name(stream);
				return this.alterAdd(stream, alter, constraintName);
			}],
			['DROP', (stream, alter) => {
				stream.advance();
				const hasColumnWord = stream.matchWord('COLUMN');
				if (!hasColumnWord && stream.peek().kind === TokenKind.KEYWORD) return false;
				stream.matchWords('IF', 'EXISTS');
				alter.dropColumn(this.name(stream));
				stream.matchWord('CASCADE', 'RESTRICT');
				return true;
			}],
			['RENAME', (stream, alter) => {
				if (!stream.matchWords('RENAME', 'COLUMN')) return false;
				const from = this.name(stream);
				const toToken = stream.peek();
				if (!stream.matchWord('TO')) {
					throw new ParseError(`Expected TO in RENAME COLUMN, found '${toToken.raw}'`, toToken);
				}
				const nameToken = stream.peek();
				alter.renameColumn(from, this.name(stream), nameToken);
				return true;
			}],
			['MODIFY', (stream, alter) => {
				stream.advance();
				stream.matchWord('COLUMN');
				alter.modifyColumn(this.columnDefinition(stream).build());
				return true;
			}],
			['CHANGE', (stream, alter) => {
				stream.advance();
				stream.matchWord('COLUMN');
				const from = this.name(stream);
				const nameToken = stream.peek();
				const column = this.columnDefinition(stream).build();
				if (from.toLowerCase() !== column.name.toLowerCase()) {
					alter.renameColumn(from, column.name, nameToken);
				}
				alter.modifyColumn(column);
				return true;
			}],
			['ALTER', (stream, alter) => {
				stream.advance();
				stream.matchWord('COLUMN');
				const name = this.name(stream);
				return this.alterColumn(stream, alter, name);
			}],
		]);
	}

	private alterAdd(stream: TokenStream, alter: AlterTableBuilder, constraintName: string | null): boolean {
		const keyToken = stream.peek();
		if (stream.matchWords('PRIMARY', 'KEY')) {
			alter.addPrimaryKey({ constraintName, columns: this.indexColumns(stream).map(c => c.name) }, keyToken);
		} else if (stream.checkWord('UNIQUE') && stream.peek().kind === TokenKind.KEYWORD) {
			stream.advance();
			alter.addUnique(this.uniqueKey(stream, constraintName));
		} else if (stream.checkWord('CHECK') && stream.peek(1).raw === '(') {
			stream.advance();
			alter.addCheck({ constraintName, statement: renderTokens(readParenthesized(stream)) });
		} else if (stream.matchWords('FOREIGN', 'KEY')) {
			const columns = this.nameList(stream);
			const referencesToken = stream.peek();
			if (!stream.matchWord('REFERENCES')) {
				throw new ParseError(`Expected REFERENCES after FOREIGN KEY, found '${referencesToken.raw}'`, referencesToken);
			}
			alter.addForeignKey({ constraintName, columns, references: this.reference(stream) });
		} else if (stream.matchWord('DEFAULT')) {
			const value = renderTokens(readValueExpression(stream));
			const forToken = stream.peek();
			if (!stream.matchWord('FOR')) {
				throw new ParseError(`Expected FOR after ADD DEFAULT value, found '${forToken.raw}'`, forToken);
			}
			alter.addDefault({ constraintName, column: this.name(stream), value });
		} else if (constraintName !== null) {
			return false;
		} else {
			if (stream.peek().kind === TokenKind.KEYWORD && stream.checkWord('INDEX', 'KEY')) return false;
			stream.matchWord('COLUMN');
			stream.matchWords('IF', 'NOT', 'EXISTS');
			const column = this.columnDefinition(stream);
			alter.addColumn(column.build());
			if (column.primaryKey) {
				alter.addPrimaryKey({ constraintName: null, columns: [column.name] }, keyToken);
			}
		}
		return true;
	}

	private alterColumn(stream: TokenStream, alter: AlterTableBuilder, name: string): boolean {
		if (stream.matchWords('SET', 'DEFAULT')) {
			const value = renderTokens(readValueExpression(stream));
			alter.changeColumn(name, column => { column.default = value; });
		} else if (stream.matchWords('DROP', 'DEFAULT')) {
			alter.changeColumn(name, column => { column.default = null; });
		} else if (stream.matchWords('SET', 'NOT', 'NULL')) {
			alter.changeColumn(name, column => { column.nullable = false; });
		} else if (stream.matchWords('DROP', 'NOT', 'NULL')) {
			alter.changeColumn(name, column => { column.nullable = true; });
		} else if (stream.matchWords('SET', 'DATA', 'TYPE') || stream.matchWord('TYPE')) {
			const type = parseType(stream);
			if (stream.matchWord('USING')) readValueExpression(stream);
			alter.changeColumn(name, column => {
				column.type = type;
				column.size = sizeFromParams(sizingParams(type));
			});
		} else {
			return false;
		}
		return true;
	}

	// --- dispatch and recovery ---

	/**
	 * The clause-dispatch loop: peeks the introducing word, hands the stream to its
	 * handler, and skips unrecognized clauses with a warning. Runs to the end of the
	 * enclosing element (`,` or `)`) or of the statement.
	 */
	private dispatchClauses<T>(
		stream: TokenStream,
		target: T,
		handlers: ReadonlyMap<string, ClauseHandler<T>>,
		options: DispatchOptions<T>,
	): void {
		while (!stream.isAtEnd() && !stream.checkSymbol(',') && !stream.checkSymbol(')')) {
			const token = stream.peek();
			const handler = (isWordToken(token) ? handlers.get(token.normalized) : undefined) ?? options.fallback;
			if (handler) {
				stream.mark();
				if (handler(stream, target)) {
					stream.commit();
					if (options.single) return;
					continue;
				}
				stream.rewind();
			}
			this.skipUnknown(stream, options.what, options.isClauseStart);
			if (options.single) return;
		}
	}

	/** Anything left once a statement's clauses are exhausted (a stray `)` or `,`) */
	private skipTrailing(stream: TokenStream): void {
		if (stream.isAtEnd()) return;
		const first = stream.peek();
		const start = stream.index;
		while (!stream.isAtEnd()) stream.advance();
		const text = renderTokens(stream.slice(start));
		this.context.warn('unknownClause', `Unexpected trailing text '${text}'`, first, text);
	}

	/**
	 * Skips an unrecognized clause: at least one token, then up to the next depth-0
	 * clause start, `,` or `)`. Parenthesized groups are skipped whole.
	 */
	private skipUnknown(stream: TokenStream, what: string, isClauseStart: (stream: TokenStream) => boolean): void {
		const first = stream.peek();
		const start = stream.index;
		do {
			if (stream.checkSymbol('(')) {
				readParenthesized(stream);
			} else {
				stream.advance();
			}
		} while (!stream.isAtEnd()
			&& !stream.checkSymbol(',')
			&& !stream.checkSymbol(')')
			&& !isClauseStart(stream));

		const text = renderTokens(stream.slice(start));
		this.context.warn('unknownClause', `Unrecognized ${what} clause '${text}'`, first, text);
	}

	// --- small readers ---

	private name(stream: TokenStream): string {
		const token = stream.peek();
		if (!isNameToken(token)) {
			throw new ParseError(`Expected a name, found '${token.raw || 'end of statement'}'`, token);
		}
		stream.advance();
		return token.raw;
	}

	/** `name`, `schema.name` or `db.schema.name`; keeps the last two parts */
	private qualifiedName(stream: TokenStream, maxParts = 3): QualifiedName {
		const parts = [this.name(stream)];
		while (parts.length < maxParts && stream.checkSymbol('.') && isNameToken(stream.peek(1))) {
			stream.advance();
			parts.push(this.name(stream));
		}
		const name = parts[parts.length - 1];
		return { schema: parts.length > 1 ? parts[parts.length - 2] : null, name };
	}

	/** `(a, b, c)` */
	private nameList(stream: TokenStream): string[] {
		const open = stream.peek();
		if (!stream.matchSymbol('(')) {
			throw new ParseError(`Expected '(', found '${open.raw || 'end of statement'}'`, open);
		}
		const names: string[] = [];
		do {
			names.push(this.name(stream));
		} while (stream.matchSymbol(','));
		const close = stream.peek();
		if (!stream.matchSymbol(')')) {
			throw new ParseError(`Expected ')', found '${close.raw || 'end of statement'}'`, close);
		}
		return names;
	}

	private stringValue(stream: TokenStream): string {
		const token = stream.peek();
		if (token.kind !== TokenKind.STRING) {
			throw new ParseError(`Expected a string literal, found '${token.raw || 'end of statement'}'`, token);
		}
		stream.advance();
		return token.raw;
	}

	private numberValue(stream: TokenStream): string {
		const token = stream.peek();
		if (token.kind !== TokenKind.NUMBER) {
			throw new ParseError(`Expected a number, found '${token.raw || 'end of statement'}'`, token);
		}
		stream.advance();
		return token.raw;
	}
}
