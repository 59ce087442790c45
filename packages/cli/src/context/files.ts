import { readFileSync } from 'node:fs';
import { basename, resolve } from 'node:path';

export interface ContextFile {
  path: string;
  name: string;
  content: string;
}

export class ContextFileError extends Error {
  constructor(
    readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(`Failed to read context file: ${path}`, options);
    this.name = 'ContextFileError';
  }
}

/**
 * Read every context file up front, in the order given. Any unreadable
 * file aborts the whole set.
 */
export function readContextFiles(paths: readonly string[], cwd: string = process.cwd()): ContextFile[] {
  return paths.map(path => {
    const fullPath = resolve(cwd, path);
    let content: string;
    try {
      content = readFileSync(fullPath, 'utf-8');
    } catch (error) {
      throw new ContextFileError(path, { cause: error });
    }
    return { path: fullPath, name: basename(fullPath), content };
  });
}
