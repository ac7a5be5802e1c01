import type { CreateSequenceStatement, QualifiedName, SequenceProperties, SequenceValue } from '../parser/ast.js';

/**
 * Sequence builder. Each property is independent and recorded only when its
 * clause appears; nothing is defaulted.
 */
export class SequenceBuilder {
	readonly name: QualifiedName;
	readonly statementIndex: number;
	ifNotExists?: boolean;
	private readonly properties: SequenceProperties = {};

	constructor(name: QualifiedName, statementIndex: number) {
		this.name = name;
		this.statementIndex = statementIndex;
	}

	set<K extends keyof SequenceProperties>(key: K, value: SequenceProperties[K]): void {
		this.properties[key] = value;
	}

	build(): CreateSequenceStatement {
		const statement: CreateSequenceStatement = {
			kind: 'createSequence',
			statementIndex: this.statementIndex,
			sequenceName: this.name.name,
			schema: this.name.schema,
			properties: { ...this.properties },
		};
		if (this.ifNotExists) statement.ifNotExists = true;
		return statement;
	}
}

/** Numbers stay numbers while they fit a safe integer; larger values keep their digits. */
export function sequenceValue(text: string): SequenceValue {
	const value = Number(text);
	if (!Number.isFinite(value)) {
		return text;
	}
	if (Number.isInteger(value) && !Number.isSafeInteger(value)) {
		return text.startsWith('+') ? text.slice(1) : text;
	}
	return value;
}
