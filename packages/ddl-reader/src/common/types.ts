/**
 * Status codes carried by every DdlError.
 * Numbering follows the SQLite result codes the codes are named after.
 */
export enum StatusCode {
	OK = 0,
	ERROR = 1,
	INTERNAL = 2,
	NOTFOUND = 12,
	SCHEMA = 17,
	CONSTRAINT = 19,
	MISUSE = 21,
	FORMAT = 24,
	SYNTAX = 29,
	UNSUPPORTED = 30,
}

/**
 * Output policy applied to finished records.
 * 'sql' hides Hive-only fields; 'hql' always includes them.
 */
export type OutputMode = 'sql' | 'hql';

export const OUTPUT_MODES: readonly OutputMode[] = ['sql', 'hql'];

export function isOutputMode(value: unknown): value is OutputMode {
	return OUTPUT_MODES.some(mode => mode === value);
}

export interface ParseOptions {
	/** Field exposure policy for emitted records. Defaults to 'sql'. */
	outputMode?: OutputMode;
	/** Throw the first fatal error instead of collecting it in the result. */
	strict?: boolean;
}

/** A position in the DDL source text. Lines and columns are 1-based, offsets 0-based. */
export interface SourceLocation {
	line: number;
	column: number;
	offset: number;
}

export type WarningKind = 'unknownClause' | 'unresolvedAlterTarget' | 'unresolvedIndexTarget';

/** A recoverable condition; the statement it belongs to is still returned. */
export interface ParseWarning extends SourceLocation {
	kind: WarningKind;
	message: string;
	/** Offending source text (the skipped clause, or the unresolved table name) */
	text: string;
	statementIndex: number;
}

export type FailureKind = 'lex' | 'structural';

/** A fatal condition, local to one statement ('structural') or to the whole call ('lex'). */
export interface StatementFailure extends SourceLocation {
	kind: FailureKind;
	message: string;
	statementIndex: number;
}
