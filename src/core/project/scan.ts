import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import fg from 'fast-glob';
import type { ScanError } from '../report/reportTypes.js';
import { FileReadError } from '../../util/errors.js';

/** Outcome of running a per-file analyzer over a set of files. */
export interface ScanResult<T> {
  readonly items: readonly T[];
  readonly errors: readonly ScanError[];
  readonly filesScanned: number;
}

/**
 * List files under `root` matching any of `patterns`, relative to `root`
 * with forward slashes and sorted.
 */
export async function listFiles(root: string, patterns: readonly string[]): Promise<readonly string[]> {
  const files = await fg([...patterns], {
    cwd: root,
    onlyFiles: true,
    ignore: ['**/node_modules/**'],
  });
  return [...new Set(files)].sort();
}

/**
 * Read every matching file and run `analyze` on its content.
 * A file that cannot be read is recorded in `errors` and skipped.
 */
export async function scanFiles<T>(
  root: string,
  patterns: readonly string[],
  analyze: (file: string, content: string) => readonly T[],
): Promise<ScanResult<T>> {
  const items: T[] = [];
  const errors: ScanError[] = [];
  const files = await listFiles(root, patterns);

  for (const file of files) {
    let content: string;
    try {
      content = await readFile(join(root, file), 'utf-8');
    } catch (error: unknown) {
      const readError = new FileReadError(file, error);
      errors.push({ file: readError.filePath, code: readError.code, message: readError.message });
      continue;
    }
    items.push(...analyze(file, content));
  }

  return { items, errors, filesScanned: files.length - errors.length };
}
