import { LexError, StructuralError, toStatementFailure } from '../common/errors.js';
import { createLogger } from '../common/logger.js';
import { isOutputMode, type OutputMode, type ParseOptions, type ParseWarning, type StatementFailure } from '../common/types.js';
import { Lexer, splitStatements, type Token } from '../parser/lexer.js';
import { Parser } from '../parser/parser.js';
import { OutputNormalizer } from '../output/normalizer.js';
import type { DdlRecord } from '../output/records.js';
import { ParseContext } from './parse-context.js';

const log = createLogger('core:ddl-parser');
const errorLog = log.extend('error');

export interface ParseResult {
	/** Records in source order; tables already carry the alters and indexes applied to them */
	statements: DdlRecord[];
	warnings: ParseWarning[];
	failures: StatementFailure[];
	/** True when any statement, or the whole input, hit a fatal error */
	failed: boolean;
}

/**
 * Parses DDL text into normalized records. The instance holds only options;
 * every `parse()` call builds its own context, so one parser may serve concurrent callers.
 */
export class DdlParser {
	readonly outputMode: OutputMode;
	readonly strict: boolean;

	constructor(options: ParseOptions = {}) {
		this.outputMode = options.outputMode ?? 'sql';
		this.strict = options.strict ?? false;
	}

	/**
	 * @throws LexError or StructuralError only in strict mode; otherwise fatal
	 *   conditions are reported through `failures`
	 */
	parse(ddl: string): ParseResult {
		const context = new ParseContext();

		let tokens: Token[];
		try {
			tokens = new Lexer(ddl).scanTokens();
		} catch (e) {
			if (e instanceof LexError && !this.strict) {
				errorLog('%s', e.message);
				return { statements: [], warnings: [], failures: [toStatementFailure(e)], failed: true };
			}
			throw e;
		}

		const spans = splitStatements(tokens);
		log('Parsing %d statement(s) in %s mode', spans.length, this.outputMode);
		const parser = new Parser(context);
		spans.forEach((span, index) => {
			try {
				parser.parseStatement(span, index);
			} catch (e) {
				if (e instanceof StructuralError && !this.strict) {
					errorLog('statement %d: %s', index, e.message);
					context.failures.push(toStatementFailure(e));
					return;
				}
				throw e;
			}
		});

		const normalizer = new OutputNormalizer(this.outputMode);
		return {
			statements: normalizer.normalizeAll(context.statements()),
			warnings: [...context.warnings],
			failures: [...context.failures],
			failed: context.failures.length > 0,
		};
	}
}

/**
 * Parses DDL text. The second argument is an output mode or a full options object.
 *
 * @example
 * const { statements } = parse('CREATE TABLE t (id INT PRIMARY KEY);');
 * // statements[0].primary_key → ['id']
 */
export function parse(ddl: string, options: OutputMode | ParseOptions = {}): ParseResult {
	const resolved: ParseOptions = isOutputMode(options) ? { outputMode: options } : options;
	return new DdlParser(resolved).parse(ddl);
}
