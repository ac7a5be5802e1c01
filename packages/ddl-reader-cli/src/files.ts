import * as fs from 'fs/promises';
import * as path from 'path';
import type { Stats } from 'fs';

/**
 * Expands the given paths into DDL files. Directories are walked recursively and
 * contribute only files with one of `extensions`; files named directly are always kept.
 * The result is de-duplicated and, per directory, sorted by name.
 */
export async function collectInputFiles(paths: readonly string[], extensions: readonly string[]): Promise<string[]> {
  const wanted = new Set(extensions.map(ext => ext.toLowerCase()));
  const files: string[] = [];
  for (const input of paths) {
    let stat: Stats;
    try {
      stat = await fs.stat(input);
    } catch (error) {
      throw new Error(`Cannot read '${input}': ${error instanceof Error ? error.message : error}`);
    }
    if (stat.isDirectory()) {
      files.push(...await walk(input, wanted));
    } else {
      files.push(input);
    }
  }
  return [...new Set(files)];
}

async function walk(dir: string, extensions: ReadonlySet<string>): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));
  const files: string[] = [];
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...await walk(full, extensions));
    } else if (entry.isFile() && extensions.has(path.extname(entry.name).toLowerCase())) {
      files.push(full);
    }
  }
  return files;
}

/** `sales/orders.sql` → `orders_schema.json` */
export function schemaFileName(inputPath: string): string {
  const base = path.basename(inputPath, path.extname(inputPath));
  return `${base}_schema.json`;
}

/** Writes the parsed records for one input file into `targetDir`, creating it if needed. */
export async function dumpSchema(targetDir: string, inputPath: string, data: unknown): Promise<string> {
  await fs.mkdir(targetDir, { recursive: true });
  const output = path.join(targetDir, schemaFileName(inputPath));
  await fs.writeFile(output, JSON.stringify(data, null, 1) + '\n', 'utf-8');
  return output;
}
