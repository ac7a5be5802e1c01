import { LexError } from '../common/errors.js';
import { createLogger } from '../common/logger.js';
import { isKeyword } from './keywords.js';

const log = createLogger('lexer');

export enum TokenKind {
	KEYWORD = 'keyword',
	IDENTIFIER = 'identifier',
	QUOTED_IDENTIFIER = 'quotedIdentifier',
	STRING = 'string',
	NUMBER = 'number',
	PUNCTUATION = 'punctuation',
	OPERATOR = 'operator',
	EOF = 'eof',
}

/** Opening delimiter of a quoted token. */
export type QuoteChar = '\'' | '"' | '`' | '[';

export interface Token {
	readonly kind: TokenKind;
	/** Source text; quoted tokens hold their unescaped contents without delimiters */
	readonly raw: string;
	/** Upper-cased form of word tokens, used for keyword comparison; `raw` for everything else */
	readonly normalized: string;
	readonly quote?: QuoteChar;
	readonly startOffset: number;
	readonly endOffset: number;
	readonly startLine: number;
	readonly startColumn: number;
	readonly endLine: number;
	readonly endColumn: number;
}

const PUNCTUATION = new Set(['(', ')', ',', '.', ';', ':', '[', ']']);

const TWO_CHAR_OPERATORS = new Set(['::', '<=', '>=', '<>', '!=', '||', '=>']);

/** Single characters emitted as operators; `<` and `>` stay single so `>>` closes two nested types */
const ONE_CHAR_OPERATORS = new Set(['+', '-', '*', '/', '%', '=', '<', '>', '~', '&', '|', '^', '!', '@', '?']);

/** Prefixes that turn a following single-quoted span into a plain string literal */
const STRING_PREFIXES = new Set(['N', 'E']);

/**
 * Tokenizer for DDL text.
 * Strips `--`, `#` and `/* *\/` comments outside quoted spans and classifies words
 * through the dialect keyword table.
 */
export class Lexer {
	private readonly source: string;
	private tokens: Token[] = [];
	private start = 0;
	private current = 0;
	private line = 1;
	private column = 1;
	private startLine = 1;
	private startColumn = 1;

	constructor(source: string) {
		this.source = source;
	}

	/**
	 * Scans the input and returns all tokens, ending with an EOF token.
	 * @throws LexError on an unterminated quoted span or block comment
	 */
	scanTokens(): Token[] {
		this.tokens = [];
		while (!this.isAtEnd()) {
			this.start = this.current;
			this.startLine = this.line;
			this.startColumn = this.column;
			this.scanToken();
		}

		this.tokens.push(Object.freeze({
			kind: TokenKind.EOF,
			raw: '',
			normalized: '',
			startOffset: this.source.length,
			endOffset: this.source.length,
			startLine: this.line,
			startColumn: this.column,
			endLine: this.line,
			endColumn: this.column,
		}));

		log('Scanned %d tokens', this.tokens.length);
		return this.tokens;
	}

	private isAtEnd(): boolean {
		return this.current >= this.source.length;
	}

	private scanToken(): void {
		const c = this.advance();

		switch (c) {
			case ' ':
			case '\r':
			case '\t':
			case '\n':
			case '\f':
				break;

			case '-':
				if (this.peek() === '-') {
					this.lineComment();
				} else if (this.isDigit(this.peek()) && this.inOperandPosition()) {
					this.number();
				} else {
					this.addToken(TokenKind.OPERATOR, c);
				}
				break;
			case '+':
				if (this.isDigit(this.peek()) && this.inOperandPosition()) {
					this.number();
				} else {
					this.addToken(TokenKind.OPERATOR, c);
				}
				break;
			case '#':
				this.lineComment();
				break;
			case '/':
				if (this.match('*')) {
					this.blockComment();
				} else {
					this.addToken(TokenKind.OPERATOR, c);
				}
				break;

			case '\'': this.quoted('\'', '\'', TokenKind.STRING); break;
			case '"': this.quoted('"', '"', TokenKind.QUOTED_IDENTIFIER); break;
			case '`': this.quoted('`', '`', TokenKind.QUOTED_IDENTIFIER); break;
			case '[':
				if (this.opensArrayDimension()) {
					this.addToken(TokenKind.PUNCTUATION, c);
				} else {
					this.quoted('[', ']', TokenKind.QUOTED_IDENTIFIER);
				}
				break;

			case '.':
				if (this.isDigit(this.peek()) && !this.followsName()) {
					this.number();
				} else {
					this.addToken(TokenKind.PUNCTUATION, c);
				}
				break;

			case ';':
				this.addToken(TokenKind.PUNCTUATION, c);
				break;

			default:
				if (PUNCTUATION.has(c)) {
					if (c === ':' && this.match(':')) {
						this.addToken(TokenKind.OPERATOR, '::');
					} else {
						this.addToken(TokenKind.PUNCTUATION, c);
					}
				} else if (this.isDigit(c)) {
					this.number();
				} else if (this.isAlpha(c)) {
					this.word();
				} else if (TWO_CHAR_OPERATORS.has(c + this.peek())) {
					this.advance();
					this.addToken(TokenKind.OPERATOR, c + this.source.charAt(this.current - 1));
				} else if (ONE_CHAR_OPERATORS.has(c)) {
					this.addToken(TokenKind.OPERATOR, c);
				} else {
					// Unknown characters pass through for the reducer to skip
					this.addToken(TokenKind.OPERATOR, c);
				}
				break;
		}
	}

	private advance(): string {
		const char = this.source.charAt(this.current);
		this.current++;
		if (char === '\n') {
			this.line++;
			this.column = 1;
		} else {
			this.column++;
		}
		return char;
	}

	private match(expected: string): boolean {
		if (this.isAtEnd()) return false;
		if (this.source.charAt(this.current) !== expected) return false;
		this.advance();
		return true;
	}

	private peek(offset = 0): string {
		const index = this.current + offset;
		if (index >= this.source.length) return '\0';
		return this.source.charAt(index);
	}

	private lineComment(): void {
		while (this.peek() !== '\n' && !this.isAtEnd()) {
			this.advance();
		}
	}

	private blockComment(): void {
		let nesting = 1;

		while (nesting > 0 && !this.isAtEnd()) {
			if (this.peek() === '/' && this.peek(1) === '*') {
				this.advance();
				this.advance();
				nesting++;
			} else if (this.peek() === '*' && this.peek(1) === '/') {
				this.advance();
				this.advance();
				nesting--;
			} else {
				this.advance();
			}
		}

		if (nesting > 0) {
			throw this.lexError('Unterminated block comment');
		}
	}

	/**
	 * Reads a quoted span. A doubled closing delimiter stands for itself; inside
	 * single-quoted strings a backslash also escapes the following character.
	 */
	private quoted(open: QuoteChar, close: string, kind: TokenKind): void {
		let value = '';

		for (;;) {
			if (this.isAtEnd()) {
				const what = kind === TokenKind.STRING ? 'string literal' : 'quoted identifier';
				throw this.lexError(`Unterminated ${what}`);
			}
			const c = this.advance();
			if (c === close) {
				if (this.peek() === close) {
					value += this.advance();
					continue;
				}
				break;
			}
			if (c === '\\' && open === '\'' && !this.isAtEnd()) {
				const next = this.advance();
				// \' resolves to a quote; other escapes are kept as written
				value += next === '\'' ? next : c + next;
				continue;
			}
			value += c;
		}

		this.addToken(kind, value, open);
	}

	private number(): void {
		while (this.isDigit(this.peek())) {
			this.advance();
		}

		if (this.peek() === '.' && this.isDigit(this.peek(1))) {
			this.advance();
			while (this.isDigit(this.peek())) {
				this.advance();
			}
		}

		const exponentSign = this.peek(1) === '+' || this.peek(1) === '-';
		if ((this.peek() === 'e' || this.peek() === 'E')
			&& (this.isDigit(this.peek(1)) || (exponentSign && this.isDigit(this.peek(2))))) {
			this.advance();
			if (exponentSign) this.advance();
			while (this.isDigit(this.peek())) {
				this.advance();
			}
		}

		// A digit-led word such as 3rd_party is a name, not a number
		if (this.isAlpha(this.peek())) {
			this.word();
			return;
		}

		this.addToken(TokenKind.NUMBER, this.source.substring(this.start, this.current));
	}

	private word(): void {
		for (;;) {
			const c = this.peek();
			if (this.isAlphaNumeric(c)) {
				this.advance();
			} else if (c === '-' && this.peek(1) === '-' && this.isAlphaNumeric(this.peek(2))) {
				// table--name: the marker continues the word instead of starting a comment
				this.advance();
				this.advance();
			} else if (c === '#' && this.isAlphaNumeric(this.peek(1))) {
				this.advance();
			} else {
				break;
			}
		}

		const text = this.source.substring(this.start, this.current);
		if (this.peek() === '\'' && STRING_PREFIXES.has(text.toUpperCase())) {
			this.advance();
			this.quoted('\'', '\'', TokenKind.STRING);
			return;
		}

		this.addToken(isKeyword(text) ? TokenKind.KEYWORD : TokenKind.IDENTIFIER, text);
	}

	/** `[]`, `[12]` and the bracket after ARRAY are punctuation; anything else quotes an identifier. */
	private opensArrayDimension(): boolean {
		let index = this.current;
		while (index < this.source.length && this.isDigit(this.source.charAt(index))) {
			index++;
		}
		if (this.source.charAt(index) === ']') {
			return true;
		}
		const previous = this.lastToken();
		return previous !== undefined && isWordToken(previous) && previous.normalized === 'ARRAY';
	}

	/** A sign folds into a number only where an operand is expected. */
	private inOperandPosition(): boolean {
		const previous = this.lastToken();
		if (!previous) return true;
		switch (previous.kind) {
			case TokenKind.OPERATOR:
			case TokenKind.KEYWORD:
				return true;
			case TokenKind.PUNCTUATION:
				return previous.raw !== ')' && previous.raw !== ']';
			default:
				return false;
		}
	}

	private followsName(): boolean {
		const previous = this.lastToken();
		return previous?.kind === TokenKind.IDENTIFIER || previous?.kind === TokenKind.QUOTED_IDENTIFIER;
	}

	private lastToken(): Token | undefined {
		return this.tokens[this.tokens.length - 1];
	}

	private isDigit(c: string): boolean {
		return c >= '0' && c <= '9';
	}

	private isAlpha(c: string): boolean {
		return (c >= 'a' && c <= 'z') ||
			(c >= 'A' && c <= 'Z') ||
			c === '_' ||
			c > '\x7f';
	}

	private isAlphaNumeric(c: string): boolean {
		return this.isAlpha(c) || this.isDigit(c) || c === '$';
	}

	private addToken(kind: TokenKind, raw: string, quote?: QuoteChar): void {
		const isWord = kind === TokenKind.KEYWORD || kind === TokenKind.IDENTIFIER;
		const token: Token = {
			kind,
			raw,
			normalized: isWord ? raw.toUpperCase() : raw,
			...(quote ? { quote } : {}),
			startOffset: this.start,
			endOffset: this.current,
			startLine: this.startLine,
			startColumn: this.startColumn,
			endLine: this.line,
			endColumn: this.column - 1,
		};
		this.tokens.push(Object.freeze(token));
	}

	private lexError(message: string): LexError {
		return new LexError(
			message,
			{ line: this.startLine, column: this.startColumn, offset: this.start },
			openStatementIndex(this.tokens),
		);
	}
}

/** Convenience wrapper: tokenizes the whole text. */
export function tokenize(source: string): Token[] {
	return new Lexer(source).scanTokens();
}

export function isWordToken(token: Token): boolean {
	return token.kind === TokenKind.KEYWORD || token.kind === TokenKind.IDENTIFIER;
}

/** True for any token that can stand as a name: words, keywords and quoted identifiers. */
export function isNameToken(token: Token): boolean {
	return isWordToken(token) || token.kind === TokenKind.QUOTED_IDENTIFIER;
}

const ALTERABLE_OBJECTS = new Set(['TABLE', 'SEQUENCE', 'INDEX']);

function opensStatement(tokens: readonly Token[], i: number): boolean {
	const token = tokens[i];
	if (token.kind !== TokenKind.KEYWORD) return false;
	if (token.normalized === 'CREATE') return true;
	const next = tokens[i + 1];
	return token.normalized === 'ALTER' && next !== undefined && isWordToken(next) && ALTERABLE_OBJECTS.has(next.normalized);
}

/**
 * Splits a token sequence into statement spans at depth-0 semicolons. A depth-0
 * CREATE, or ALTER TABLE / SEQUENCE / INDEX, also starts a new span, for scripts that
 * omit semicolons.
 */
export function splitStatements(tokens: readonly Token[]): Token[][] {
	const spans: Token[][] = [];
	let current: Token[] = [];
	let depth = 0;

	const flush = (): void => {
		if (current.length > 0) {
			spans.push(current);
			current = [];
		}
	};

	tokens.forEach((token, i) => {
		if (token.kind === TokenKind.EOF) return;
		if (token.kind === TokenKind.PUNCTUATION) {
			if (token.raw === '(') depth++;
			else if (token.raw === ')') depth = Math.max(0, depth - 1);
			else if (token.raw === ';' && depth === 0) {
				flush();
				return;
			}
		}
		if (depth === 0 && current.length > 0 && opensStatement(tokens, i)) {
			flush();
		}
		current.push(token);
	});
	flush();
	return spans;
}

/** Index of the statement span that a token following `tokens` would fall into. */
function openStatementIndex(tokens: readonly Token[]): number {
	const spans = splitStatements(tokens);
	const lastSpan = spans[spans.length - 1];
	const last = tokens[tokens.length - 1];
	if (lastSpan === undefined || last === undefined) return 0;
	// a trailing depth-0 `;` closed the last span
	return lastSpan[lastSpan.length - 1] === last ? spans.length - 1 : spans.length;
}
