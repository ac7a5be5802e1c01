import keywordData from './keywords.json' with { type: 'json' };

export type Dialect = 'ansi' | 'postgres' | 'mysql' | 'hive';

export const DIALECTS: readonly Dialect[] = ['ansi', 'postgres', 'mysql', 'hive'];

/**
 * Category of a word as far as the tokenizer and reducer care.
 * - reservedWord: statement and clause vocabulary shared by every dialect
 * - typeName: data type names; lexed as identifiers
 * - dialectClauseWord: vocabulary of one dialect's extension clauses
 * - none: plain identifier
 */
export type KeywordCategory = 'reservedWord' | 'typeName' | 'dialectClauseWord' | 'none';

interface DialectWords {
	reservedWords: string[];
	typeNames: string[];
	clauseWords: string[];
}

const CATEGORY_RANK: Record<KeywordCategory, number> = {
	none: 0,
	typeName: 1,
	dialectClauseWord: 2,
	reservedWord: 3,
};

function buildTable(data: Record<Dialect, DialectWords>): ReadonlyMap<string, KeywordCategory> {
	const table = new Map<string, KeywordCategory>();
	const put = (word: string, category: KeywordCategory): void => {
		const key = word.toUpperCase();
		const existing = table.get(key) ?? 'none';
		if (CATEGORY_RANK[category] > CATEGORY_RANK[existing]) {
			table.set(key, category);
		}
	};
	for (const dialect of DIALECTS) {
		const words = data[dialect];
		words.reservedWords.forEach(word => put(word, 'reservedWord'));
		words.typeNames.forEach(word => put(word, 'typeName'));
		words.clauseWords.forEach(word => put(word, 'dialectClauseWord'));
	}
	return table;
}

// Merged across dialects; read-only and shared by every parse call
const KEYWORD_TABLE = buildTable(keywordData);

/** Classifies a word (any casing) against the merged dialect tables. */
export function classifyWord(word: string): KeywordCategory {
	return KEYWORD_TABLE.get(word.toUpperCase()) ?? 'none';
}

/** True for reserved words and dialect clause words; type names lex as identifiers. */
export function isKeyword(word: string): boolean {
	const category = classifyWord(word);
	return category === 'reservedWord' || category === 'dialectClauseWord';
}

export function isTypeName(word: string): boolean {
	return classifyWord(word) === 'typeName';
}

/** Words the given dialect contributes, mostly useful for diagnostics and tests. */
export function dialectWords(dialect: Dialect): readonly string[] {
	const words = keywordData[dialect];
	return [...words.reservedWords, ...words.typeNames, ...words.clauseWords];
}
