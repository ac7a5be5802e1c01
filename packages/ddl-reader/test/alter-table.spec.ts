import { expect } from 'chai';
import { isAlterRecord, isTableRecord, parse, type ParseResult, type TableRecord } from '../src/index.js';

function tableAfter(ddl: string): TableRecord {
	const result = parse(ddl);
	expect(result.warnings).to.deep.equal([]);
	const found = result.statements.filter(isTableRecord);
	expect(found).to.have.length(1);
	return found[0];
}

describe('ALTER TABLE', () => {
	it('adds a column to a table declared earlier', () => {
		const table = tableAfter('CREATE TABLE t (id INT);\nALTER TABLE t ADD COLUMN email VARCHAR(100) NOT NULL;');
		const email = {
			name: 'email', type: 'VARCHAR', size: 100, references: null,
			unique: false, nullable: false, default: null, check: null,
		};
		expect(table.columns.map(c => c.name)).to.deep.equal(['id', 'email']);
		expect(table.columns[1]).to.deep.equal(email);
		expect(table.alter).to.deep.equal({ columns: [email] });
	});

	it('records a foreign key per local column', () => {
		const table = tableAfter(
			'CREATE TABLE orders (id INT, customer_id INT);\n'
			+ 'ALTER TABLE orders ADD CONSTRAINT fk_customer FOREIGN KEY (customer_id) REFERENCES customers (id);'
		);
		const references = { table: 'customers', schema: null, column: 'id', on_delete: null, on_update: null };
		expect(table.alter).to.deep.equal({
			columns: [{ name: 'customer_id', constraint_name: 'fk_customer', references }],
		});
		expect(table.columns[1].references).to.deep.equal(references);
	});

	it('applies several comma-separated actions', () => {
		const table = tableAfter(
			'CREATE TABLE t (a INT, b INT);\n'
			+ 'ALTER TABLE t ADD CONSTRAINT chk_a CHECK (a > 0), ADD UNIQUE (b), ADD PRIMARY KEY (a);'
		);
		expect(table.alter).to.deep.equal({
			checks: [{ constraint_name: 'chk_a', statement: 'a > 0' }],
			uniques: [{ constraint_name: null, columns: ['b'] }],
			primary_keys: [{ constraint_name: null, columns: ['a'] }],
		});
		expect(table.primary_key).to.deep.equal(['a']);
		void expect(table.columns[0].nullable).to.be.false;
		void expect(table.columns[1].unique).to.be.true;
		expect(table.checks).to.deep.equal([]);
	});

	it('renames and drops columns', () => {
		const table = tableAfter([
			'CREATE TABLE t (id INT PRIMARY KEY, old_name TEXT, legacy TEXT);',
			'ALTER TABLE t RENAME COLUMN old_name TO new_name;',
			'ALTER TABLE t DROP COLUMN legacy;',
		].join('\n'));
		expect(table.columns.map(c => c.name)).to.deep.equal(['id', 'new_name']);
		expect(table.alter).to.deep.equal({
			renamed_columns: [{ from: 'old_name', to: 'new_name' }],
			dropped_columns: ['legacy'],
		});
	});

	it('replaces a column in place with MODIFY', () => {
		const table = tableAfter('CREATE TABLE t (id INT PRIMARY KEY, name VARCHAR(20));\nALTER TABLE t MODIFY name VARCHAR(50) NOT NULL;');
		const name = {
			name: 'name', type: 'VARCHAR', size: 50, references: null,
			unique: false, nullable: false, default: null, check: null,
		};
		expect(table.columns[1]).to.deep.equal(name);
		expect(table.alter).to.deep.equal({ modified_columns: [name] });
	});

	it('renames and redefines a column with CHANGE', () => {
		const table = tableAfter('CREATE TABLE t (id INT, name VARCHAR(20));\nALTER TABLE t CHANGE name full_name VARCHAR(80);');
		expect(table.columns.map(c => [c.name, c.size])).to.deep.equal([['id', null], ['full_name', 80]]);
		expect(table.alter.renamed_columns).to.deep.equal([{ from: 'name', to: 'full_name' }]);
	});

	it('changes defaults and types with ALTER COLUMN', () => {
		const table = tableAfter(
			'CREATE TABLE t (qty INT, note VARCHAR(10));\n'
			+ 'ALTER TABLE t ALTER COLUMN qty SET DEFAULT 1, ALTER COLUMN note TYPE VARCHAR(200);'
		);
		expect(table.columns[0].default).to.equal('1');
		expect(table.columns[1].size).to.equal(200);
		expect(table.alter.modified_columns?.map(c => [c.name, c.default, c.size])).to.deep.equal([
			['qty', '1', null],
			['note', null, 200],
		]);
	});

	it('keeps an alter on an undeclared table as its own record', () => {
		const result = parse('ALTER TABLE missing ADD COLUMN x INT;');
		expect(result.statements).to.deep.equal([{
			alter_table_name: 'missing',
			schema: null,
			unresolved: true,
			alter: {
				columns: [{
					name: 'x', type: 'INT', size: null, references: null,
					unique: false, nullable: true, default: null, check: null,
				}],
			},
		}]);
		void expect(isAlterRecord(result.statements[0])).to.be.true;
		expect(result.warnings).to.deep.equal([{
			kind: 'unresolvedAlterTarget',
			message: 'ALTER TABLE references table \'missing\', which is not declared earlier in the input',
			text: 'missing',
			statementIndex: 0,
			line: 1,
			column: 13,
			offset: 12,
		}]);
	});

	it('resolves the target table case-insensitively', () => {
		const table = tableAfter('CREATE TABLE Users (id INT);\nALTER TABLE users ADD name TEXT;');
		expect(table.columns.map(c => c.name)).to.deep.equal(['id', 'name']);
	});

	it('skips an unknown action with a warning', () => {
		const result = parse('CREATE TABLE t (a INT);\nALTER TABLE t OWNER TO admin;');
		expect(result.warnings.map(w => [w.kind, w.text, w.statementIndex])).to.deep.equal([
			['unknownClause', 'OWNER TO admin', 1],
		]);
		const [table] = result.statements.filter(isTableRecord);
		expect(table.alter).to.deep.equal({});
	});

	it('copies an added column into the alter record', () => {
		const table = tableAfter([
			'CREATE TABLE t (a INT);',
			'ALTER TABLE t ADD COLUMN c INT;',
			'ALTER TABLE t ALTER COLUMN c SET NOT NULL;',
			'ALTER TABLE t RENAME COLUMN c TO d;',
		].join('\n'));
		expect(table.columns.map(c => [c.name, c.nullable])).to.deep.equal([['a', true], ['d', false]]);
		expect(table.alter.columns).to.deep.equal([{
			name: 'c', type: 'INT', size: null, references: null,
			unique: false, nullable: true, default: null, check: null,
		}]);
	});

	describe('failures', () => {
		function onlyTable(result: ParseResult): TableRecord {
			const found = result.statements.filter(isTableRecord);
			expect(found).to.have.length(1);
			return found[0];
		}

		it('leaves the table untouched when a later action fails', () => {
			const result = parse('CREATE TABLE t (a INT);\nALTER TABLE t ADD COLUMN x INT, RENAME COLUMN a b;');
			expect(result.failures.map(f => [f.kind, f.statementIndex, f.message])).to.deep.equal([
				['structural', 1, 'Expected TO in RENAME COLUMN, found \'b\' (at line 2, column 49)'],
			]);
			const table = onlyTable(result);
			expect(table.columns.map(c => c.name)).to.deep.equal(['a']);
			expect(table.alter).to.deep.equal({});
		});

		it('keeps earlier alters when a later statement is undone', () => {
			const result = parse([
				'CREATE TABLE t (a INT);',
				'ALTER TABLE t ADD COLUMN x INT;',
				'ALTER TABLE t DROP COLUMN x, ALTER COLUMN a SET NOT NULL, ADD PRIMARY KEY (zz);',
			].join('\n'));
			expect(result.failures.map(f => f.statementIndex)).to.deep.equal([2]);
			const table = onlyTable(result);
			expect(table.columns.map(c => [c.name, c.nullable])).to.deep.equal([['a', true], ['x', true]]);
			expect(table.alter).to.deep.equal({
				columns: [{
					name: 'x', type: 'INT', size: null, references: null,
					unique: false, nullable: true, default: null, check: null,
				}],
			});
		});

		it('rejects a rename onto an existing column', () => {
			const result = parse('CREATE TABLE t (a INT, b INT);\nALTER TABLE t RENAME COLUMN a TO b;');
			expect(result.failures.map(f => f.message)).to.deep.equal([
				'Cannot rename column \'a\' to \'b\': table \'t\' already has that column (at line 2, column 34)',
			]);
			const table = onlyTable(result);
			expect(table.columns.map(c => c.name)).to.deep.equal(['a', 'b']);
			expect(table.alter).to.deep.equal({});
		});

		it('rejects a CHANGE that renames onto an existing column', () => {
			const result = parse('CREATE TABLE t (a INT, b INT);\nALTER TABLE t CHANGE a b BIGINT;');
			expect(result.failures.map(f => f.statementIndex)).to.deep.equal([1]);
			expect(onlyTable(result).columns.map(c => [c.name, c.type])).to.deep.equal([['a', 'INT'], ['b', 'INT']]);
		});

		it('rejects a primary key on an undeclared column', () => {
			const result = parse('CREATE TABLE t (a INT);\nALTER TABLE t ADD PRIMARY KEY (zz);');
			expect(result.failures.map(f => f.message)).to.deep.equal([
				'Primary key column \'zz\' is not a column of table \'t\' (at line 2, column 19)',
			]);
			const table = onlyTable(result);
			expect(table.primary_key).to.deep.equal([]);
			expect(table.alter).to.deep.equal({});
		});

		it('accepts a primary key on an unresolved table', () => {
			const result = parse('ALTER TABLE missing ADD PRIMARY KEY (zz);');
			expect(result.failures).to.deep.equal([]);
			const [record] = result.statements.filter(isAlterRecord);
			expect(record.alter).to.deep.equal({ primary_keys: [{ constraint_name: null, columns: ['zz'] }] });
		});
	});
});
