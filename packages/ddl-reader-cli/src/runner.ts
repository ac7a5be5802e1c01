import * as fs from 'fs/promises';
import chalk, { Chalk, type ChalkInstance } from 'chalk';
import Table from 'cli-table3';
import {
  createLogger,
  groupByType,
  parse,
  type ParseResult,
  type ParseWarning,
  type StatementFailure,
} from 'ddl-reader';
import type { RunOptions } from './config.js';
import { collectInputFiles, dumpSchema } from './files.js';

const log = createLogger('cli:runner');

/** Where the runner prints. Defaults to the console; tests pass a collector. */
export interface Output {
  log(line: string): void;
  error(line: string): void;
}

const consoleOutput: Output = {
  log: line => console.log(line),
  error: line => console.error(line),
};

export interface FileOutcome {
  file: string;
  result: ParseResult;
  /** Path of the written schema dump, when dumping is on */
  dumpedTo?: string;
}

export interface RunSummary {
  files: FileOutcome[];
  failed: boolean;
}

/** What gets dumped and echoed for one file */
export function outputPayload(result: ParseResult, options: Pick<RunOptions, 'groupByType'>): unknown {
  return options.groupByType ? groupByType(result.statements) : result.statements;
}

export async function parseFile(file: string, options: RunOptions): Promise<FileOutcome> {
  const ddl = await fs.readFile(file, 'utf-8');
  log('Parsing %s (%d chars)', file, ddl.length);
  const result = parse(ddl, { outputMode: options.outputMode });
  const outcome: FileOutcome = { file, result };
  if (options.dump) {
    outcome.dumpedTo = await dumpSchema(options.target, file, outputPayload(result, options));
  }
  return outcome;
}

/**
 * Parses every DDL file under `paths`, dumping and echoing as the options say,
 * then prints a diagnostics table. `failed` is set when any file had a fatal error.
 */
export async function run(paths: readonly string[], options: RunOptions, out: Output = consoleOutput): Promise<RunSummary> {
  const paint: ChalkInstance = options.color ? chalk : new Chalk({ level: 0 });
  const files = await collectInputFiles(paths, options.extensions);
  if (files.length === 0) {
    out.error(paint.yellow(`No DDL files found (looked for ${options.extensions.join(', ')})`));
    return { files: [], failed: false };
  }

  const outcomes: FileOutcome[] = [];
  for (const file of files) {
    const outcome = await parseFile(file, options);
    outcomes.push(outcome);

    const { result } = outcome;
    const status = result.failed ? paint.red('failed') : paint.green('ok');
    out.error(`${file}: ${result.statements.length} statement(s), ${status}`);
    if (outcome.dumpedTo) {
      out.error(paint.gray(`  wrote ${outcome.dumpedTo}`));
    }
    if (options.verbose) {
      out.log(JSON.stringify(outputPayload(result, options), null, 2));
    }
  }

  const table = diagnosticsTable(outcomes, options.color);
  if (table) {
    out.error(table);
  }
  return { files: outcomes, failed: outcomes.some(outcome => outcome.result.failed) };
}

interface DiagnosticRow {
  file: string;
  severity: 'error' | 'warning';
  diagnostic: ParseWarning | StatementFailure;
}

/** Renders every warning and failure as one table, or null when there are none. */
export function diagnosticsTable(outcomes: readonly FileOutcome[], color: boolean): string | null {
  const rows: DiagnosticRow[] = [];
  for (const { file, result } of outcomes) {
    for (const failure of result.failures) rows.push({ file, severity: 'error', diagnostic: failure });
    for (const warning of result.warnings) rows.push({ file, severity: 'warning', diagnostic: warning });
  }
  if (rows.length === 0) return null;

  const paint: ChalkInstance = color ? chalk : new Chalk({ level: 0 });
  const table = new Table({
    head: ['file', 'statement', 'position', 'severity', 'message'].map(col => color ? chalk.cyan(col) : col),
    style: {
      head: color ? ['cyan'] : [],
      border: color ? ['grey'] : [],
    },
  });
  for (const { file, severity, diagnostic } of rows) {
    table.push([
      file,
      String(diagnostic.statementIndex),
      `${diagnostic.line}:${diagnostic.column}`,
      severity === 'error' ? paint.red(severity) : paint.yellow(severity),
      diagnostic.message,
    ]);
  }
  return table.toString();
}
