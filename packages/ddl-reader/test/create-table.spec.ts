import { expect } from 'chai';
import { StructuralError, isTableRecord, parse, type OutputMode, type TableRecord } from '../src/index.js';

function tables(ddl: string, mode: OutputMode = 'sql'): TableRecord[] {
	return parse(ddl, mode).statements.filter(isTableRecord);
}

function onlyTable(ddl: string, mode: OutputMode = 'sql'): TableRecord {
	const found = tables(ddl, mode);
	expect(found).to.have.length(1);
	return found[0];
}

describe('CREATE TABLE', () => {
	it('parses the employees example', () => {
		const result = parse('CREATE TABLE employees (id SERIAL PRIMARY KEY, first_name VARCHAR(50));');
		void expect(result.failed).to.be.false;
		expect(result.warnings).to.deep.equal([]);
		expect(result.statements).to.deep.equal([{
			table_name: 'employees',
			schema: null,
			columns: [
				{ name: 'id', type: 'SERIAL', size: null, references: null, unique: false, nullable: false, default: null, check: null },
				{ name: 'first_name', type: 'VARCHAR', size: 50, references: null, unique: false, nullable: true, default: null, check: null },
			],
			primary_key: ['id'],
			index: [],
			checks: [],
			alter: {},
			partitioned_by: [],
		}]);
	});

	it('gives the same result for column-level and table-level primary keys', () => {
		const inline = onlyTable('CREATE TABLE t (id INT PRIMARY KEY, name TEXT);');
		const separate = onlyTable('CREATE TABLE t (id INT, name TEXT, PRIMARY KEY (id));');
		expect(inline.primary_key).to.deep.equal(['id']);
		expect(separate.primary_key).to.deep.equal(['id']);
		expect(separate.columns).to.deep.equal(inline.columns);
		void expect(separate.columns[0].nullable).to.be.false;
	});

	it('keeps the same key set whichever clauses appear', () => {
		const records = tables(`
			CREATE TABLE a (x INT);
			CREATE TABLE b (x INT, CONSTRAINT ck CHECK (x > 0)) ENGINE=InnoDB;
			CREATE TABLE c LIKE a;
		`);
		expect(records).to.have.length(3);
		for (const record of records) {
			expect(record).to.include.all.keys('table_name', 'schema', 'columns', 'primary_key', 'index', 'checks', 'alter');
		}
	});

	it('ignores keyword case', () => {
		const upper = parse('CREATE TABLE Orders (Id INT NOT NULL PRIMARY KEY, Total DECIMAL(10,2) DEFAULT 0 CHECK (Total >= 0), Note TEXT NULL);');
		const lower = parse('create table Orders (Id INT not null primary key, Total DECIMAL(10,2) default 0 check (Total >= 0), Note TEXT null);');
		expect(lower.statements).to.deep.equal(upper.statements);
		const [total] = upper.statements.filter(isTableRecord)[0].columns.slice(1);
		expect(total.check).to.equal('Total >= 0');
		expect(total.size).to.deep.equal([10, 2]);
	});

	it('ignores comments at statement boundaries and after clauses', () => {
		const plain = parse('CREATE TABLE t (id INT NOT NULL, name VARCHAR(20) DEFAULT \'x\');');
		const commented = parse([
			'-- leading comment',
			'CREATE TABLE t ( /* block */ id INT NOT NULL, # hash comment',
			'  name VARCHAR(20) -- after the type',
			'  DEFAULT \'x\' );',
			'/* trailing */',
		].join('\n'));
		expect(commented.statements).to.deep.equal(plain.statements);
		expect(commented.warnings).to.deep.equal([]);
	});

	it('keeps -- inside quoted names', () => {
		const table = onlyTable('CREATE TABLE "table--name" ("col--a" INT);');
		expect(table.table_name).to.equal('table--name');
		expect(table.columns.map(c => c.name)).to.deep.equal(['col--a']);
	});

	it('splits statements written without semicolons', () => {
		expect(tables('CREATE TABLE a (x INT)\nCREATE TABLE b (y INT)').map(t => t.table_name)).to.deep.equal(['a', 'b']);
	});

	describe('constraints', () => {
		it('records a bare CHECK without a constraint name', () => {
			const table = onlyTable('CREATE TABLE t (price INT, CHECK (price > 0));');
			expect(table.checks).to.deep.equal([{ constraint_name: null, statement: 'price > 0' }]);
			expect(table).to.not.have.property('constraints');
		});

		it('records a named CHECK under constraints as well', () => {
			const table = onlyTable('CREATE TABLE t (price INT, CONSTRAINT positive_price CHECK (price > 0));');
			expect(table.checks).to.deep.equal([{ constraint_name: 'positive_price', statement: 'price > 0' }]);
			expect(table.constraints).to.deep.equal({
				checks: [{ constraint_name: 'positive_price', statement: 'price > 0' }],
			});
		});

		it('joins several column checks with AND', () => {
			const table = onlyTable('CREATE TABLE t (a INT CHECK (a > 0) CHECK (a < 10));');
			expect(table.columns[0].check).to.equal('a > 0 AND a < 10');
		});

		it('applies a bare FOREIGN KEY to its column', () => {
			const table = onlyTable(
				'CREATE TABLE orders (id INT, customer_id INT, FOREIGN KEY (customer_id) REFERENCES customers (id) ON DELETE CASCADE);'
			);
			expect(table.columns[1].references).to.deep.equal({
				table: 'customers',
				schema: null,
				column: 'id',
				on_delete: 'CASCADE',
				on_update: null,
			});
			expect(table.constraints).to.deep.equal({
				references: [{
					constraint_name: null,
					columns: ['customer_id'],
					references: { table: 'customers', schema: null, columns: ['id'], on_delete: 'CASCADE', on_update: null },
				}],
			});
		});

		it('leaves the referenced column null when REFERENCES names no column', () => {
			const table = onlyTable('CREATE TABLE a (b_id INT REFERENCES b);');
			expect(table.columns[0].references).to.deep.equal({
				table: 'b',
				schema: null,
				column: null,
				on_delete: null,
				on_update: null,
			});
		});

		it('records named column constraints', () => {
			const table = onlyTable('CREATE TABLE t (id INT CONSTRAINT pk_t PRIMARY KEY, email TEXT CONSTRAINT uq_email UNIQUE);');
			expect(table.primary_key).to.deep.equal(['id']);
			void expect(table.columns[1].unique).to.be.true;
			expect(table.constraints).to.deep.equal({
				primary_keys: [{ constraint_name: 'pk_t', columns: ['id'] }],
				uniques: [{ constraint_name: 'uq_email', columns: ['email'] }],
			});
		});

		it('marks single-column unique keys on the column only', () => {
			const table = onlyTable('CREATE TABLE t (a INT, b INT, UNIQUE (a), CONSTRAINT uq_ab UNIQUE (a, b));');
			expect(table.columns.map(c => c.unique)).to.deep.equal([true, false]);
			expect(table.constraints).to.deep.equal({
				uniques: [{ constraint_name: 'uq_ab', columns: ['a', 'b'] }],
			});
		});
	});

	describe('column types', () => {
		it('serializes T ARRAY as T[] and T ARRAY[n] as T[n]', () => {
			const table = onlyTable('CREATE TABLE t (tags TEXT ARRAY, grid INT ARRAY[3]);');
			expect(table.columns.map(c => [c.type, c.size])).to.deep.equal([['TEXT[]', null], ['INT[3]', null]]);
		});

		it('reads PostgreSQL columns', () => {
			const table = onlyTable(`CREATE TABLE IF NOT EXISTS public.accounts (
				id BIGSERIAL PRIMARY KEY,
				created_at TIMESTAMP WITH TIME ZONE DEFAULT now(),
				balance NUMERIC(12, 2) NOT NULL DEFAULT 0.00,
				owner_id INT REFERENCES public.users (id) ON DELETE SET NULL DEFERRABLE INITIALLY DEFERRED,
				label VARCHAR(10) DEFAULT 'x'::character varying NOT NULL
			);`);
			expect(table.schema).to.equal('public');
			expect(table.table_name).to.equal('accounts');
			void expect(table.if_not_exists).to.be.true;
			const [, createdAt, balance, owner, label] = table.columns;
			expect(createdAt.type).to.equal('TIMESTAMP WITH TIME ZONE');
			expect(createdAt.default).to.equal('now()');
			expect(balance).to.deep.equal({
				name: 'balance', type: 'NUMERIC', size: [12, 2], references: null,
				unique: false, nullable: false, default: '0.00', check: null,
			});
			expect(owner.references).to.deep.equal({
				table: 'users',
				schema: 'public',
				column: 'id',
				on_delete: 'SET NULL',
				on_update: null,
				deferrable_initially: 'DEFERRED',
			});
			expect(label.default).to.equal('\'x\'::character varying');
			void expect(label.nullable).to.be.false;
		});

		it('reads MySQL columns, inline keys and table options', () => {
			const result = parse(`CREATE TABLE users (
				id INT UNSIGNED NOT NULL AUTO_INCREMENT,
				status ENUM('active','banned') DEFAULT 'active' COMMENT 'account state',
				updated TIMESTAMP DEFAULT CURRENT_TIMESTAMP ON UPDATE CURRENT_TIMESTAMP,
				PRIMARY KEY (id),
				KEY idx_status (status)
			) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4;`);
			expect(result.warnings).to.deep.equal([]);
			const [table] = result.statements.filter(isTableRecord);
			expect(table.columns[0]).to.deep.equal({
				name: 'id', type: 'INT UNSIGNED', size: null, references: null,
				unique: false, nullable: false, default: null, check: null, autoincrement: true,
			});
			expect(table.columns[1]).to.deep.equal({
				name: 'status', type: 'ENUM', size: null, references: null,
				unique: false, nullable: true, default: '\'active\'', check: null,
				comment: 'account state', values: ['active', 'banned'],
			});
			expect(table.columns[2].default).to.equal('CURRENT_TIMESTAMP');
			expect(table.columns[2].on_update).to.equal('CURRENT_TIMESTAMP');
			expect(table.index).to.deep.equal([{
				index_name: 'idx_status',
				unique: false,
				columns: ['status'],
				detailed_columns: [{ name: 'status', order: 'ASC' }],
			}]);
			expect(table.table_properties).to.deep.equal({ engine: 'InnoDB', charset: 'utf8mb4' });
		});

		it('reads generated and identity columns', () => {
			const table = onlyTable(
				'CREATE TABLE t (id INT GENERATED ALWAYS AS IDENTITY, total INT GENERATED ALWAYS AS (price * qty) STORED);'
			);
			void expect(table.columns[0].autoincrement).to.be.true;
			expect(table.columns[1].generated_as).to.equal('price * qty');
		});
	});

	describe('table clauses', () => {
		it('reads CREATE TABLE ... LIKE', () => {
			const table = onlyTable('CREATE TABLE t2 LIKE t1;');
			expect(table.like).to.deep.equal({ schema: null, table_name: 't1' });
			expect(table.columns).to.deep.equal([]);
		});

		it('reads PARTITION BY', () => {
			const table = onlyTable('CREATE TABLE m (d DATE) PARTITION BY RANGE (d);');
			expect(table.partition_by).to.deep.equal({ type: 'RANGE', columns: ['d'] });
		});

		it('reads OR REPLACE and TEMPORARY', () => {
			const table = onlyTable('CREATE OR REPLACE TEMPORARY TABLE t (a INT);');
			void expect(table.replace).to.be.true;
			void expect(table.temporary).to.be.true;
		});
	});

	describe('recovery', () => {
		it('skips an unknown column clause with a warning', () => {
			const result = parse('CREATE TABLE t (id INT ENCODE zstd, name TEXT);');
			void expect(result.failed).to.be.false;
			expect(result.warnings).to.deep.equal([{
				kind: 'unknownClause',
				message: 'Unrecognized column clause \'ENCODE zstd\'',
				text: 'ENCODE zstd',
				statementIndex: 0,
				line: 1,
				column: 24,
				offset: 23,
			}]);
			const [table] = result.statements.filter(isTableRecord);
			expect(table.columns.map(c => [c.name, c.type])).to.deep.equal([['id', 'INT'], ['name', 'TEXT']]);
		});

		it('fails a statement with a duplicate column and keeps going', () => {
			const result = parse('CREATE TABLE t (a INT, a TEXT);\nCREATE TABLE u (x INT);');
			void expect(result.failed).to.be.true;
			expect(result.failures).to.deep.equal([{
				kind: 'structural',
				message: 'Duplicate column \'a\' in table \'t\' (at line 1, column 24)',
				statementIndex: 0,
				line: 1,
				column: 24,
				offset: 23,
			}]);
			expect(result.statements.filter(isTableRecord).map(t => t.table_name)).to.deep.equal(['u']);
		});

		it('fails a table whose primary key names an undeclared column', () => {
			const result = parse('CREATE TABLE t (a INT, PRIMARY KEY (b));');
			expect(result.statements).to.deep.equal([]);
			expect(result.failures).to.have.length(1);
			expect(result.failures[0].message).to.match(/^Primary key column 'b' is not a column of table 't'/);
		});

		it('fails a CREATE TABLE without a column list', () => {
			const result = parse('CREATE TABLE t;');
			expect(result.failures.map(f => f.message)).to.deep.equal(['CREATE TABLE t has no column list (at line 1, column 15)']);
		});

		it('fails unsupported statements only', () => {
			const result = parse('DROP TABLE t;\nCREATE TABLE u (x INT);');
			expect(result.failures.map(f => [f.kind, f.statementIndex])).to.deep.equal([['structural', 0]]);
			expect(result.failures[0].message).to.match(/^Unrecognized statement starting with 'DROP'/);
			expect(result.statements).to.have.length(1);
		});

		it('marks the whole call failed on a lexical error', () => {
			const result = parse('CREATE TABLE t (a TEXT DEFAULT \'x);');
			void expect(result.failed).to.be.true;
			expect(result.statements).to.deep.equal([]);
			expect(result.failures.map(f => f.kind)).to.deep.equal(['lex']);
		});

		it('throws in strict mode', () => {
			expect(() => parse('CREATE TABLE t (a INT, a INT);', { strict: true })).to.throw(StructuralError, 'Duplicate column');
		});
	});
});
