import { ParseError } from '../common/errors.js';
import { StatusCode } from '../common/types.js';
import { TokenKind, isNameToken, tokenize, type Token } from './lexer.js';
import { TokenStream } from './token-stream.js';

/** Named scalar type, possibly multi-word (`DOUBLE PRECISION`) and parameterized (`DECIMAL(10,2)`). */
export interface SimpleType {
	kind: 'simple';
	name: string;
	params: string[];
}

/**
 * Array type. `angle` is `ARRAY<T>`; `suffix` covers `T[]`, `T[n]`, `T ARRAY` and `T ARRAY[n]`,
 * which all serialize as `T[]` / `T[n]`.
 */
export interface ArrayType {
	kind: 'array';
	notation: 'angle' | 'suffix';
	/** Spelling of ARRAY as written, for angle notation */
	keyword: string;
	element: TypeNode;
	dimension: string | null;
}

export interface StructField {
	name: string;
	type: TypeNode;
}

export interface StructType {
	kind: 'struct';
	keyword: string;
	fields: StructField[];
}

export interface MapType {
	kind: 'map';
	keyword: string;
	key: TypeNode;
	value: TypeNode;
}

export type TypeNode = SimpleType | ArrayType | StructType | MapType;

/** Words that extend the preceding type word into one multi-word name */
const NAME_CONTINUATIONS = new Set(['PRECISION', 'VARYING']);

const MODIFIERS = new Set(['UNSIGNED', 'SIGNED', 'ZEROFILL']);

const TIME_ZONE_FORMS: readonly string[][] = [
	['WITH', 'TIME', 'ZONE'],
	['WITHOUT', 'TIME', 'ZONE'],
	['WITH', 'LOCAL', 'TIME', 'ZONE'],
];

const PLAIN_NAME = /^[A-Za-z_][A-Za-z0-9_$]*$/;

/**
 * Recursive-descent parser for one data type, starting at the stream cursor.
 * Nested angle types push a frame per `<` and pop it on the matching `>`.
 */
export function parseType(stream: TokenStream): TypeNode {
	let node = parseBaseType(stream);

	// Postgres array suffixes, repeatable: INT[][], INT ARRAY[4]
	for (;;) {
		if (stream.checkSymbol('[')) {
			stream.advance();
			node = { kind: 'array', notation: 'suffix', keyword: 'ARRAY', element: node, dimension: readDimension(stream) };
		} else if (stream.checkWord('ARRAY') && !stream.peek(1).raw.startsWith('<')) {
			const keyword = stream.advance().raw;
			let dimension: string | null = null;
			if (stream.matchSymbol('[')) {
				dimension = readDimension(stream);
			}
			node = { kind: 'array', notation: 'suffix', keyword, element: node, dimension };
		} else {
			break;
		}
	}
	return node;
}

function parseBaseType(stream: TokenStream): TypeNode {
	const first = stream.peek();
	if (!isNameToken(first)) {
		throw new ParseError(`Expected a data type, found '${first.raw}'`, first);
	}

	if (isAngleOpen(stream.peek(1))) {
		switch (first.normalized) {
			case 'ARRAY': return parseAngleArray(stream);
			case 'STRUCT': return parseStruct(stream);
			case 'MAP': return parseMap(stream);
		}
	}

	const words: string[] = [stream.advance().raw];
	// Schema-qualified user types: public.address
	while (stream.checkSymbol('.') && isNameToken(stream.peek(1))) {
		stream.advance();
		words[words.length - 1] += '.' + stream.advance().raw;
	}
	while (stream.peek().kind !== TokenKind.EOF && NAME_CONTINUATIONS.has(stream.peek().normalized)) {
		words.push(stream.advance().raw);
	}

	const params = stream.checkSymbol('(') ? readParams(stream) : [];

	for (;;) {
		const zone = TIME_ZONE_FORMS.find(form => stream.checkWords(...form));
		if (zone) {
			for (let i = 0; i < zone.length; i++) {
				words.push(stream.advance().raw);
			}
		} else if (stream.peek().kind !== TokenKind.QUOTED_IDENTIFIER && MODIFIERS.has(stream.peek().normalized)) {
			words.push(stream.advance().raw);
		} else {
			break;
		}
	}

	return { kind: 'simple', name: words.join(' '), params };
}

function parseAngleArray(stream: TokenStream): ArrayType {
	const keyword = stream.advance().raw;
	expectAngleOpen(stream);
	const element = parseType(stream);
	expectAngleClose(stream);
	return { kind: 'array', notation: 'angle', keyword, element, dimension: null };
}

function parseStruct(stream: TokenStream): StructType {
	const keyword = stream.advance().raw;
	expectAngleOpen(stream);
	const fields: StructField[] = [];
	if (!isAngleClose(stream.peek())) {
		do {
			const nameToken = stream.peek();
			if (!isNameToken(nameToken)) {
				throw new ParseError(`Expected a struct field name, found '${nameToken.raw}'`, nameToken);
			}
			stream.advance();
			stream.matchSymbol(':');
			const type = parseType(stream);
			// Hive field comments carry no type information
			if (stream.matchWord('COMMENT') && stream.peek().kind === TokenKind.STRING) {
				stream.advance();
			}
			fields.push({ name: nameToken.raw, type });
		} while (stream.matchSymbol(','));
	}
	expectAngleClose(stream);
	return { kind: 'struct', keyword, fields };
}

function parseMap(stream: TokenStream): MapType {
	const keyword = stream.advance().raw;
	expectAngleOpen(stream);
	const key = parseType(stream);
	const comma = stream.peek();
	if (!stream.matchSymbol(',')) {
		throw new ParseError(`Expected ',' between map key and value types, found '${comma.raw}'`, comma);
	}
	const value = parseType(stream);
	expectAngleClose(stream);
	return { kind: 'map', keyword, key, value };
}

function isAngleOpen(token: Token): boolean {
	return token.kind === TokenKind.OPERATOR && token.raw === '<';
}

function isAngleClose(token: Token): boolean {
	return token.kind === TokenKind.OPERATOR && token.raw === '>';
}

function expectAngleOpen(stream: TokenStream): void {
	const token = stream.peek();
	if (!isAngleOpen(token)) {
		throw new ParseError(`Expected '<', found '${token.raw}'`, token);
	}
	stream.advance();
}

function expectAngleClose(stream: TokenStream): void {
	const token = stream.peek();
	if (!isAngleClose(token)) {
		throw new ParseError(`Unclosed nested type: expected '>', found '${token.raw || 'end of statement'}'`, token);
	}
	stream.advance();
}

/** Reads after `[` through `]`, returning the digits between, or null for `[]`. */
function readDimension(stream: TokenStream): string | null {
	let dimension: string | null = null;
	if (stream.peek().kind === TokenKind.NUMBER) {
		dimension = stream.advance().raw;
	}
	const close = stream.peek();
	if (!stream.matchSymbol(']')) {
		throw new ParseError(`Expected ']' after array dimension, found '${close.raw}'`, close);
	}
	return dimension;
}

/** Reads a parenthesized, comma-separated parameter list: `(10, 2)`, `(MAX)`, `('a', 'b')`. */
function readParams(stream: TokenStream): string[] {
	const open = stream.advance();
	const params: string[] = [];
	let current: string[] = [];
	for (;;) {
		const token = stream.peek();
		if (token.kind === TokenKind.EOF) {
			throw new ParseError('Unclosed type parameter list', open, StatusCode.SYNTAX);
		}
		stream.advance();
		if (token.kind === TokenKind.PUNCTUATION && (token.raw === ',' || token.raw === ')')) {
			if (current.length > 0) {
				params.push(current.join(' '));
			}
			current = [];
			if (token.raw === ')') break;
			continue;
		}
		current.push(token.kind === TokenKind.STRING ? quoteString(token.raw) : token.raw);
	}
	return params;
}

export function quoteString(value: string): string {
	return `'${value.replace(/'/g, '\'\'')}'`;
}

/** Canonical text of a type tree: no spaces inside angle brackets, source casing kept. */
export function formatType(node: TypeNode): string {
	switch (node.kind) {
		case 'simple':
			return node.params.length > 0 ? `${node.name}(${node.params.join(',')})` : node.name;
		case 'array':
			return node.notation === 'angle'
				? `${node.keyword}<${formatType(node.element)}>`
				: `${formatType(node.element)}[${node.dimension ?? ''}]`;
		case 'struct':
			return `${node.keyword}<${node.fields.map(f => `${formatFieldName(f.name)}:${formatType(f.type)}`).join(',')}>`;
		case 'map':
			return `${node.keyword}<${formatType(node.key)},${formatType(node.value)}>`;
	}
}

/**
 * Type text for a column's `type` field. Parameters of a top-level simple type are
 * reported through `size` instead, so `VARCHAR(50)` reads `VARCHAR` and `INT[]` stays `INT[]`.
 */
export function columnTypeText(node: TypeNode): string {
	if (node.kind === 'simple') {
		return node.name;
	}
	if (node.kind === 'array' && node.notation === 'suffix') {
		return `${columnTypeText(node.element)}[${node.dimension ?? ''}]`;
	}
	return formatType(node);
}

/** Parameters that size the column: those of a simple type, or of the innermost suffix-array element. */
export function sizingParams(node: TypeNode): string[] {
	if (node.kind === 'simple') {
		return node.params;
	}
	if (node.kind === 'array' && node.notation === 'suffix') {
		return sizingParams(node.element);
	}
	return [];
}

function formatFieldName(name: string): string {
	return PLAIN_NAME.test(name) ? name : `\`${name.replace(/`/g, '``')}\``;
}

/** Re-reads a type string, e.g. one produced by formatType. */
export function parseTypeString(text: string): TypeNode {
	const stream = new TokenStream(tokenize(text));
	const node = parseType(stream);
	const rest = stream.peek();
	if (rest.kind !== TokenKind.EOF) {
		throw new ParseError(`Unexpected '${rest.raw}' after type`, rest);
	}
	return node;
}
