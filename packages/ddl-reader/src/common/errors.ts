import { StatusCode, type ParseWarning, type SourceLocation, type StatementFailure } from './types.js';
import type { Token } from '../parser/lexer.js';

/**
 * Base class for ddl-reader errors
 * Provides location information and status code support
 */
export class DdlError extends Error {
	public code: number;
	/** The message without the location suffix */
	public readonly reason: string;
	public cause?: Error;
	public line?: number;
	public column?: number;
	public offset?: number;

	constructor(message: string, code: number = StatusCode.ERROR, cause?: Error, location?: SourceLocation) {
		super(message);
		this.code = code;
		this.reason = message;
		this.name = 'DdlError';
		this.cause = cause;
		this.line = location?.line;
		this.column = location?.column;
		this.offset = location?.offset;

		// Enhance message with location if available
		if (location) {
			this.message = `${message} (at line ${location.line}, column ${location.column})`;
		}

		// Maintain stack trace in V8
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, DdlError);
		}
	}
}

/**
 * Unterminated quoted span or block comment.
 * Fatal for the whole parse call.
 */
export class LexError extends DdlError {
	public readonly statementIndex: number;

	constructor(message: string, location: SourceLocation, statementIndex: number) {
		super(message, StatusCode.SYNTAX, undefined, location);
		this.name = 'LexError';
		this.statementIndex = statementIndex;
	}
}

/**
 * Reducer error that includes token information
 */
export class ParseError extends DdlError {
	public token: Token;

	constructor(message: string, token: Token, code: number = StatusCode.SYNTAX) {
		super(message, code, undefined, { line: token.startLine, column: token.startColumn, offset: token.startOffset });
		this.token = token;
		this.name = 'ParseError';
	}
}

/**
 * A statement that cannot be classified, or that misses a required sub-clause
 * or breaks a table invariant. Fatal for that statement only.
 */
export class StructuralError extends ParseError {
	public readonly statementIndex: number;

	constructor(message: string, token: Token, statementIndex: number, code: number = StatusCode.SYNTAX) {
		super(message, token, code);
		this.name = 'StructuralError';
		this.statementIndex = statementIndex;
	}
}

/** Converts a fatal error into the failure record stored on a parse result. */
export function toStatementFailure(error: LexError | StructuralError): StatementFailure {
	return {
		kind: error instanceof LexError ? 'lex' : 'structural',
		message: error.message,
		statementIndex: error.statementIndex,
		line: error.line ?? 0,
		column: error.column ?? 0,
		offset: error.offset ?? 0,
	};
}

/**
 * Renders a warning or failure as one line of diagnostic text, e.g.
 * `statement 2, offset 118: Unrecognized column clause 'ENCODE' (warning)`.
 */
export function formatDiagnostic(diagnostic: ParseWarning | StatementFailure): string {
	const severity = diagnostic.kind === 'lex' || diagnostic.kind === 'structural' ? 'error' : 'warning';
	return `statement ${diagnostic.statementIndex}, offset ${diagnostic.offset}: ${diagnostic.message} (${severity})`;
}
