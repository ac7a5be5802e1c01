import { ParseError } from '../common/errors.js';
import { TokenKind, isWordToken, type Token } from './lexer.js';
import type { TokenStream } from './token-stream.js';
import { parseType, quoteString } from './type-parser.js';

/** Keywords after which `(` opens a group rather than an argument list. */
const DETACHED_BEFORE_PAREN = new Set([
	'AND', 'OR', 'NOT', 'IN', 'IS', 'BETWEEN', 'LIKE', 'ILIKE', 'EXISTS', 'WHEN', 'THEN',
	'ELSE', 'CASE', 'AS', 'ON', 'ANY', 'ALL', 'SOME',
]);

const NO_SPACE_BEFORE = new Set([')', ',', '.', ']', '::', '[']);
const NO_SPACE_AFTER = new Set(['(', '.', '[', '::']);

const CLOSING_QUOTE: Record<string, string> = { '"': '"', '`': '`', '[': ']' };

/** Source-like text for one token: keywords upper-cased, quoted tokens re-quoted. */
export function tokenText(token: Token): string {
	switch (token.kind) {
		case TokenKind.KEYWORD:
			return token.normalized;
		case TokenKind.STRING:
			return quoteString(token.raw);
		case TokenKind.QUOTED_IDENTIFIER: {
			const open = token.quote ?? '"';
			const close = CLOSING_QUOTE[open] ?? open;
			return `${open}${token.raw.split(close).join(close + close)}${close}`;
		}
		default:
			return token.raw;
	}
}

/**
 * Renders an expression token span with normalized spacing, e.g.
 * `price>0 and  status IN('a')` → `price > 0 AND status IN ('a')`.
 */
export function renderTokens(tokens: readonly Token[]): string {
	let text = '';
	let previous: Token | undefined;
	for (const token of tokens) {
		if (token.kind === TokenKind.EOF) break;
		if (previous && needsSpace(previous, token)) {
			text += ' ';
		}
		text += tokenText(token);
		previous = token;
	}
	return text;
}

function needsSpace(previous: Token, token: Token): boolean {
	if (isSymbol(previous) && NO_SPACE_AFTER.has(previous.raw)) return false;
	if (isSymbol(token) && NO_SPACE_BEFORE.has(token.raw)) return false;
	if (isSymbol(token) && token.raw === '(') {
		if (previous.kind === TokenKind.KEYWORD) {
			return DETACHED_BEFORE_PAREN.has(previous.normalized);
		}
		return !(previous.kind === TokenKind.IDENTIFIER || previous.kind === TokenKind.QUOTED_IDENTIFIER);
	}
	return true;
}

function isSymbol(token: Token): boolean {
	return token.kind === TokenKind.PUNCTUATION || token.kind === TokenKind.OPERATOR;
}

/**
 * Consumes a balanced `( ... )` group at the cursor and returns the tokens inside it.
 */
export function readParenthesized(stream: TokenStream): Token[] {
	const open = stream.peek();
	if (!stream.matchSymbol('(')) {
		throw new ParseError(`Expected '(', found '${open.raw || 'end of statement'}'`, open);
	}
	const start = stream.index;
	let depth = 1;
	for (;;) {
		const token = stream.peek();
		if (token.kind === TokenKind.EOF) {
			throw new ParseError('Unbalanced parentheses', open);
		}
		if (token.kind === TokenKind.PUNCTUATION) {
			if (token.raw === '(') depth++;
			else if (token.raw === ')') depth--;
		}
		if (depth === 0) {
			const inner = stream.slice(start);
			stream.advance();
			return inner;
		}
		stream.advance();
	}
}

/**
 * Reads a value expression such as a DEFAULT: `term (operator term)*`, where a term is a
 * token with any call parentheses, a parenthesized group, and trailing `::type` casts.
 * Stops before the first token that cannot continue the expression.
 */
export function readValueExpression(stream: TokenStream): Token[] {
	const start = stream.index;
	readTerm(stream);
	while (isBinaryOperator(stream.peek())) {
		stream.advance();
		readTerm(stream);
	}
	return stream.slice(start);
}

function readTerm(stream: TokenStream): void {
	const token = stream.peek();
	if (token.kind === TokenKind.EOF || (token.kind === TokenKind.PUNCTUATION && token.raw !== '(')) {
		throw new ParseError(`Expected a value, found '${token.raw || 'end of statement'}'`, token);
	}
	if (stream.checkSymbol('(')) {
		readParenthesized(stream);
	} else {
		stream.advance();
		// Multi-word constants such as CURRENT_TIMESTAMP ON UPDATE stay out; only calls attach
		if (isWordToken(token) || token.kind === TokenKind.QUOTED_IDENTIFIER) {
			while (stream.checkSymbol('.') && stream.peek(1).kind !== TokenKind.EOF) {
				stream.advance();
				stream.advance();
			}
			if (stream.checkSymbol('(')) {
				readParenthesized(stream);
			}
			if (isWordToken(token) && token.normalized === 'ARRAY' && stream.checkSymbol('[')) {
				readBracketed(stream);
			}
		}
	}
	while (stream.matchSymbol('::')) {
		parseType(stream);
	}
}

function readBracketed(stream: TokenStream): void {
	const open = stream.advance();
	let depth = 1;
	while (depth > 0) {
		const token = stream.advance();
		if (token.kind === TokenKind.EOF) {
			throw new ParseError('Unclosed array literal', open);
		}
		if (token.kind === TokenKind.PUNCTUATION) {
			if (token.raw === '[') depth++;
			else if (token.raw === ']') depth--;
		}
	}
}

function isBinaryOperator(token: Token): boolean {
	return token.kind === TokenKind.OPERATOR && token.raw !== '::';
}
