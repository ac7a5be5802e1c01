#!/usr/bin/env -S node --import tsx

import { Command, Option } from 'commander';
import chalk from 'chalk';
import { enableLogging, OUTPUT_MODES } from 'ddl-reader';
import { loadConfig, resolveRunOptions, type CliOptions, type DdlReaderConfig } from '../config.js';
import { run } from '../runner.js';

const program = new Command();

program
  .name('ddl-reader')
  .description('Parse SQL DDL files (ANSI, PostgreSQL, MySQL, Hive) into JSON schema records')
  .version('0.1.0')
  .argument('<paths...>', 'DDL files, or directories to search for them')
  .option('-t, --target <dir>', 'directory for the <name>_schema.json dumps (default: schemas)')
  .option('-v, --verbose', 'print the parsed records to stdout')
  .option('--no-dump', 'do not write schema files')
  .addOption(new Option('-o, --output-mode <mode>', 'field exposure policy').choices(OUTPUT_MODES))
  .option('--group-by-type', 'group records into tables, sequences, alters and indexes')
  .option('--config <path>', 'load configuration from file')
  .option('--no-color', 'disable colored output')
  .option('--debug', 'enable ddl-reader debug logging on stderr')
  .action(async (paths: string[], options: CliOptions) => {
    try {
      if (options.debug) {
        enableLogging();
      }

      let config: DdlReaderConfig = {};
      try {
        const loaded = await loadConfig(options.config);
        if (loaded) {
          config = loaded.config;
          console.error(chalk.gray(`Loaded config from ${loaded.path}`));
        }
      } catch (error) {
        console.warn(chalk.yellow(`Warning: ${error instanceof Error ? error.message : 'Failed to load config'}`));
      }

      const runOptions = resolveRunOptions(options, config, key => program.getOptionValueSource(key) === 'cli');
      const summary = await run(paths, runOptions);
      if (summary.failed) {
        process.exitCode = 1;
      }
    } catch (error) {
      console.error(chalk.red('Error:'), error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

await program.parseAsync();
