import { statSync } from 'node:fs';
import { join, resolve, dirname } from 'node:path';
import { logger } from '@brushgen/logger';

const log = logger.projectRoot;

function isDirectory(path: string): boolean {
  return statSync(path, { throwIfNoEntry: false })?.isDirectory() ?? false;
}

/**
 * Find the repository root by walking up from startDir until a directory
 * contains the marker directory
 *
 * @param startDir - The directory to start searching from (defaults to process.cwd())
 * @param markerDir - The directory to look for (a plain file with that name does not count)
 * @returns The repository root directory, or null if not found
 */
export function findRepoRoot(startDir: string = process.cwd(), markerDir: string = '.git'): string | null {
  let currentDir = resolve(startDir);

  // Walk up the directory tree
  while (true) {
    if (isDirectory(join(currentDir, markerDir))) {
      log.debug(`Repo root: ${currentDir}`);
      return currentDir;
    }

    // Check if we've reached the filesystem root
    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }

    currentDir = parentDir;
  }
}
