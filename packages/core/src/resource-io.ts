/**
 * Named document reads and writes used by the pipeline
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { logger } from '@brushgen/logger';

const log = logger.io;

export interface ResourceIO {
  read(path: string): Promise<string>;
  write(path: string, content: string): Promise<void>;
}

/**
 * File system backed IO. Parent directories are created on write.
 */
export const fileResourceIO: ResourceIO = {
  async read(path) {
    return readFile(path, 'utf8');
  },
  async write(path, content) {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content, 'utf8');
    log.debug(`Wrote ${content.length} chars to ${path}`);
  },
};

/**
 * Whether a failed read means the document does not exist
 */
export function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export interface MemoryResourceIO extends ResourceIO {
  readonly files: Map<string, string>;
  /** Paths in the order they were written */
  readonly writes: string[];
}

/**
 * In-memory IO. Reading a path that was never stored rejects with an
 * ENOENT-coded error like the file system would.
 */
export function createMemoryResourceIO(initial: Record<string, string> = {}): MemoryResourceIO {
  const files = new Map(Object.entries(initial));
  const writes: string[] = [];

  return {
    files,
    writes,
    async read(path) {
      const content = files.get(path);
      if (content === undefined) {
        throw Object.assign(new Error(`ENOENT: no such file or directory, open '${path}'`), { code: 'ENOENT' });
      }
      return content;
    },
    async write(path, content) {
      files.set(path, content);
      writes.push(path);
    },
  };
}
