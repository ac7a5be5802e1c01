import { expect } from 'chai';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
  DEFAULT_EXTENSIONS,
  loadConfig,
  resolveConfigPath,
  resolveRunOptions,
  validateConfig,
} from '../src/index.js';

describe('CLI config', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'ddl-reader-config-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('validateConfig', () => {
    it('accepts a full config', () => {
      void expect(validateConfig({
        outputMode: 'hql',
        target: 'out',
        dump: false,
        groupByType: true,
        extensions: ['.sql', '.hql'],
      })).to.be.true;
    });

    it('accepts an empty object', () => {
      void expect(validateConfig({})).to.be.true;
    });

    it('rejects bad values', () => {
      void expect(validateConfig(null)).to.be.false;
      void expect(validateConfig([])).to.be.false;
      void expect(validateConfig({ outputMode: 'xml' })).to.be.false;
      void expect(validateConfig({ dump: 'yes' })).to.be.false;
      void expect(validateConfig({ extensions: ['sql'] })).to.be.false;
      void expect(validateConfig({ extensions: '.sql' })).to.be.false;
    });
  });

  describe('resolveRunOptions', () => {
    it('falls back to the defaults', () => {
      expect(resolveRunOptions({ dump: true, color: false })).to.deep.equal({
        target: 'schemas',
        verbose: false,
        dump: true,
        outputMode: 'sql',
        groupByType: false,
        color: false,
        extensions: DEFAULT_EXTENSIONS,
      });
    });

    it('prefers explicit options, then the config file', () => {
      const options = resolveRunOptions(
        { dump: true, color: true, outputMode: 'hql' },
        { outputMode: 'sql', target: 'out', dump: false, extensions: ['.sql'] },
        key => key === 'outputMode'
      );
      expect(options.outputMode).to.equal('hql');
      expect(options.target).to.equal('out');
      void expect(options.dump).to.be.false;
      expect(options.extensions).to.deep.equal(['.sql']);
    });

    it('lets an explicit --no-dump win over the config file', () => {
      const options = resolveRunOptions({ dump: false, color: true }, { dump: true }, key => key === 'dump');
      void expect(options.dump).to.be.false;
    });

    it('rejects an unknown output mode', () => {
      expect(() => resolveRunOptions({ dump: true, color: false, outputMode: 'xml' }))
        .to.throw("Invalid output mode 'xml' (expected sql or hql)");
    });
  });

  describe('resolveConfigPath', () => {
    it('takes the --config option first', async () => {
      const resolved = await resolveConfigPath('custom.json', { cwd: dir, env: { DDL_READER_CONFIG: 'env.json' } });
      expect(resolved).to.equal(path.resolve(dir, 'custom.json'));
    });

    it('then the environment variable', async () => {
      const resolved = await resolveConfigPath(undefined, { cwd: dir, env: { DDL_READER_CONFIG: 'env.json' } });
      expect(resolved).to.equal(path.resolve(dir, 'env.json'));
    });

    it('then the working directory, then the home directory', async () => {
      const home = path.join(dir, 'home');
      const work = path.join(dir, 'work');
      await fs.mkdir(path.join(home, '.ddl-reader'), { recursive: true });
      await fs.mkdir(work);
      const homeConfig = path.join(home, '.ddl-reader', 'config.json');
      await fs.writeFile(homeConfig, '{}');

      expect(await resolveConfigPath(undefined, { cwd: work, env: {}, homeDir: home })).to.equal(homeConfig);

      const workConfig = path.join(work, 'ddl-reader.config.json');
      await fs.writeFile(workConfig, '{}');
      expect(await resolveConfigPath(undefined, { cwd: work, env: {}, homeDir: home })).to.equal(workConfig);
    });

    it('returns null when nothing is found', async () => {
      void expect(await resolveConfigPath(undefined, { cwd: dir, env: {}, homeDir: dir })).to.be.null;
    });
  });

  describe('loadConfig', () => {
    it('loads a valid file', async () => {
      const file = path.join(dir, 'ddl-reader.config.json');
      await fs.writeFile(file, JSON.stringify({ outputMode: 'hql', target: 'out' }));
      expect(await loadConfig(undefined, { cwd: dir, env: {}, homeDir: dir })).to.deep.equal({
        path: file,
        config: { outputMode: 'hql', target: 'out' },
      });
    });

    it('rejects a file that does not validate', async () => {
      const file = path.join(dir, 'bad.json');
      await fs.writeFile(file, JSON.stringify({ outputMode: 'xml' }));
      try {
        await loadConfig(file, { cwd: dir, env: {}, homeDir: dir });
        expect.fail('Expected loadConfig to reject');
      } catch (error) {
        expect(error).to.be.instanceOf(Error).with.property('message', `Invalid config file at ${file}`);
      }
    });

    it('rejects a file that is not JSON', async () => {
      const file = path.join(dir, 'broken.json');
      await fs.writeFile(file, '{ outputMode: ');
      try {
        await loadConfig(file, { cwd: dir, env: {}, homeDir: dir });
        expect.fail('Expected loadConfig to reject');
      } catch (error) {
        expect(String(error)).to.contain(`Failed to load config from '${file}'`);
      }
    });
  });
});
