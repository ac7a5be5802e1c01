/**
 * ddl-reader - multi-dialect SQL DDL parser
 *
 * Reads CREATE TABLE / ALTER TABLE / CREATE INDEX / CREATE SEQUENCE statements written
 * for ANSI SQL, PostgreSQL, MySQL and Hive, and emits plain records describing them.
 */

// Entry points
export { parse, DdlParser } from './core/ddl-parser.js';
export type { ParseResult } from './core/ddl-parser.js';

// Common types and errors
export { StatusCode, OUTPUT_MODES, isOutputMode } from './common/types.js';
export type {
	OutputMode,
	ParseOptions,
	ParseWarning,
	WarningKind,
	StatementFailure,
	FailureKind,
	SourceLocation,
} from './common/types.js';
export { DdlError, LexError, ParseError, StructuralError, formatDiagnostic } from './common/errors.js';
export { createLogger, enableLogging, disableLogging, isLoggingEnabled } from './common/logger.js';

// Tokenizer and keyword tables
export { Lexer, TokenKind, tokenize } from './parser/lexer.js';
export type { Token, QuoteChar } from './parser/lexer.js';
export { TokenStream } from './parser/token-stream.js';
export { DIALECTS, classifyWord, isKeyword, isTypeName, dialectWords } from './parser/keywords.js';
export type { Dialect, KeywordCategory } from './parser/keywords.js';

// Types
export { parseTypeString, formatType } from './parser/type-parser.js';
export type { TypeNode, SimpleType, ArrayType, StructType, StructField, MapType } from './parser/type-parser.js';

// Statement trees (before output normalization)
export type * from './parser/ast.js';

// Output
export { OutputNormalizer, groupByType } from './output/normalizer.js';
export { isTableRecord, isSequenceRecord, isAlterRecord, isIndexRecord } from './output/records.js';
export type * from './output/records.js';
