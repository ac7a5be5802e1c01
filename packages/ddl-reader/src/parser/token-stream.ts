import { TokenKind, type Token } from './lexer.js';

/**
 * Restartable cursor over a token span.
 * The span always ends with an EOF token, so peeking past the end is safe.
 */
export class TokenStream {
	private readonly tokens: readonly Token[];
	private position = 0;
	private readonly marks: number[] = [];

	constructor(tokens: readonly Token[]) {
		const last = tokens[tokens.length - 1];
		if (last && last.kind === TokenKind.EOF) {
			this.tokens = tokens;
		} else {
			const end = last?.endOffset ?? 0;
			this.tokens = [...tokens, Object.freeze({
				kind: TokenKind.EOF,
				raw: '',
				normalized: '',
				startOffset: end,
				endOffset: end,
				startLine: last?.endLine ?? 1,
				startColumn: (last?.endColumn ?? 0) + 1,
				endLine: last?.endLine ?? 1,
				endColumn: (last?.endColumn ?? 0) + 1,
			})];
		}
	}

	/** Token `offset` places ahead of the cursor (0 = current). */
	peek(offset = 0): Token {
		const index = Math.min(this.position + offset, this.tokens.length - 1);
		return this.tokens[index];
	}

	advance(): Token {
		const token = this.peek();
		if (!this.isAtEnd()) {
			this.position++;
		}
		return token;
	}

	isAtEnd(): boolean {
		return this.peek().kind === TokenKind.EOF;
	}

	/** True when the current token is a keyword or word with one of the given upper-case spellings. */
	checkWord(...words: string[]): boolean {
		const token = this.peek();
		return (token.kind === TokenKind.KEYWORD || token.kind === TokenKind.IDENTIFIER)
			&& words.includes(token.normalized);
	}

	/** Checks a sequence of words starting at the cursor, e.g. checkWords('NOT', 'NULL'). */
	checkWords(...words: string[]): boolean {
		return words.every((word, i) => {
			const token = this.peek(i);
			return (token.kind === TokenKind.KEYWORD || token.kind === TokenKind.IDENTIFIER)
				&& token.normalized === word;
		});
	}

	matchWord(...words: string[]): boolean {
		if (this.checkWord(...words)) {
			this.advance();
			return true;
		}
		return false;
	}

	matchWords(...words: string[]): boolean {
		if (this.checkWords(...words)) {
			this.position += words.length;
			return true;
		}
		return false;
	}

	/** True when the current token is the given punctuation or operator text. */
	checkSymbol(symbol: string): boolean {
		const token = this.peek();
		return (token.kind === TokenKind.PUNCTUATION || token.kind === TokenKind.OPERATOR) && token.raw === symbol;
	}

	matchSymbol(symbol: string): boolean {
		if (this.checkSymbol(symbol)) {
			this.advance();
			return true;
		}
		return false;
	}

	mark(): void {
		this.marks.push(this.position);
	}

	/** Returns to the most recent mark and drops it. */
	rewind(): void {
		const mark = this.marks.pop();
		if (mark !== undefined) {
			this.position = mark;
		}
	}

	/** Drops the most recent mark, keeping the current position. */
	commit(): void {
		this.marks.pop();
	}

	/** Back to the first token, with every mark dropped. */
	reset(): void {
		this.position = 0;
		this.marks.length = 0;
	}

	get index(): number {
		return this.position;
	}

	/** Tokens from `from` up to (not including) the cursor. */
	slice(from: number, to: number = this.position): Token[] {
		return this.tokens.slice(from, to);
	}
}
