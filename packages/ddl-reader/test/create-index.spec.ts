import { expect } from 'chai';
import { isIndexRecord, isTableRecord, parse } from '../src/index.js';

describe('CREATE INDEX', () => {
	it('attaches an index to the table it names', () => {
		const result = parse('CREATE TABLE t (a INT, b TEXT);\nCREATE UNIQUE INDEX idx_ab ON t (a DESC, b);');
		expect(result.statements).to.have.length(1);
		const [table] = result.statements.filter(isTableRecord);
		expect(table.index).to.deep.equal([{
			index_name: 'idx_ab',
			unique: true,
			columns: ['a', 'b'],
			detailed_columns: [{ name: 'a', order: 'DESC' }, { name: 'b', order: 'ASC' }],
		}]);
	});

	it('reads USING, NULLS LAST and a partial-index WHERE', () => {
		const result = parse([
			'CREATE TABLE t (a INT, deleted_at TIMESTAMP);',
			'CREATE INDEX idx_live ON t USING btree (a NULLS LAST) WHERE deleted_at IS NULL;',
		].join('\n'));
		const [table] = result.statements.filter(isTableRecord);
		expect(table.index).to.deep.equal([{
			index_name: 'idx_live',
			unique: false,
			columns: ['a'],
			detailed_columns: [{ name: 'a', order: 'ASC', nulls_last: true }],
			using: 'btree',
			where: 'deleted_at IS NULL',
		}]);
	});

	it('keeps only the name of a prefix-length column', () => {
		const result = parse('CREATE TABLE posts (title VARCHAR(200));\nCREATE INDEX idx_title ON posts (title(10));');
		const [table] = result.statements.filter(isTableRecord);
		expect(table.index[0].columns).to.deep.equal(['title']);
	});

	it('keeps an index on an undeclared table as its own record', () => {
		const result = parse('CREATE INDEX idx_lower ON t (lower(email));');
		expect(result.statements).to.deep.equal([{
			index_name: 'idx_lower',
			unique: false,
			columns: ['lower(email)'],
			detailed_columns: [{ name: 'lower(email)', order: 'ASC' }],
			table: 't',
			schema: null,
			unresolved: true,
		}]);
		void expect(isIndexRecord(result.statements[0])).to.be.true;
		expect(result.warnings.map(w => [w.kind, w.text])).to.deep.equal([['unresolvedIndexTarget', 't']]);
	});

	it('fails an index without ON', () => {
		const result = parse('CREATE INDEX idx_a (a);');
		expect(result.failures).to.have.length(1);
		expect(result.failures[0].message).to.match(/^Expected ON after CREATE INDEX idx_a/);
	});
});
