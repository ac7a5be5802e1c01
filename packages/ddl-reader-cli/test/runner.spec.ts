import { expect } from 'chai';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { parse } from 'ddl-reader';
import { DEFAULT_EXTENSIONS, diagnosticsTable, run, type Output, type RunOptions } from '../src/index.js';

class CollectingOutput implements Output {
  readonly logs: string[] = [];
  readonly errors: string[] = [];

  log(line: string): void {
    this.logs.push(line);
  }

  error(line: string): void {
    this.errors.push(line);
  }
}

describe('CLI runner', () => {
  let dir: string;
  let input: string;
  let target: string;

  const options = (overrides: Partial<RunOptions> = {}): RunOptions => ({
    target,
    verbose: false,
    dump: true,
    outputMode: 'sql',
    groupByType: false,
    color: false,
    extensions: DEFAULT_EXTENSIONS,
    ...overrides,
  });

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'ddl-reader-run-'));
    input = path.join(dir, 'ddl');
    target = path.join(dir, 'schemas');
    await fs.mkdir(input);
    await fs.writeFile(path.join(input, 'bad.sql'), 'CREATE TABLE t;');
    await fs.writeFile(path.join(input, 'good.sql'), 'CREATE TABLE g (id INT, note TEXT ENCODE lzo);');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('parses every file, reports status and dumps schemas', async () => {
    const out = new CollectingOutput();
    const summary = await run([input], options(), out);

    void expect(summary.failed).to.be.true;
    expect(summary.files.map(f => path.basename(f.file))).to.deep.equal(['bad.sql', 'good.sql']);
    expect(out.errors.slice(0, 4)).to.deep.equal([
      `${path.join(input, 'bad.sql')}: 0 statement(s), failed`,
      `  wrote ${path.join(target, 'bad_schema.json')}`,
      `${path.join(input, 'good.sql')}: 1 statement(s), ok`,
      `  wrote ${path.join(target, 'good_schema.json')}`,
    ]);
    expect(out.logs).to.deep.equal([]);

    const dumped: unknown = JSON.parse(await fs.readFile(path.join(target, 'good_schema.json'), 'utf-8'));
    expect(dumped).to.have.nested.property('[0].table_name', 'g');
  });

  it('ends with a diagnostics table', async () => {
    const out = new CollectingOutput();
    await run([input], options({ dump: false }), out);
    expect(out.errors).to.have.length(3);
    const table = out.errors[2];
    expect(table).to.contain('CREATE TABLE t has no column list (at line 1, column 15)');
    expect(table).to.contain("Unrecognized column clause 'ENCODE lzo'");
  });

  it('echoes grouped records in verbose mode', async () => {
    const out = new CollectingOutput();
    await run([path.join(input, 'good.sql')], options({ dump: false, verbose: true, groupByType: true }), out);
    expect(out.logs).to.have.length(1);
    const echoed: unknown = JSON.parse(out.logs[0]);
    expect(echoed).to.have.nested.property('tables[0].table_name', 'g');
    expect(echoed).to.have.property('sequences').that.deep.equals([]);
  });

  it('reports an empty input', async () => {
    const empty = path.join(dir, 'empty');
    await fs.mkdir(empty);
    const out = new CollectingOutput();
    const summary = await run([empty], options(), out);
    expect(summary).to.deep.equal({ files: [], failed: false });
    expect(out.errors).to.deep.equal(['No DDL files found (looked for .sql, .ddl, .hql)']);
  });

  describe('diagnosticsTable', () => {
    it('is null without diagnostics', () => {
      const result = parse('CREATE TABLE t (a INT);');
      void expect(diagnosticsTable([{ file: 'ok.sql', result }], false)).to.be.null;
    });

    it('lists failures before warnings', () => {
      const result = parse('CREATE TABLE w (a INT ENCODE lzo); CREATE TABLE t;');
      const table = diagnosticsTable([{ file: 'mixed.sql', result }], false);
      expect(table).to.be.a('string');
      const text = String(table);
      expect(text.indexOf('error')).to.be.lessThan(text.indexOf('warning'));
      expect(text).to.contain('1:50');
      expect(text).to.contain('1:23');
    });
  });
});
