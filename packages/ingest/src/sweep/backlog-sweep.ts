import { isAbsolute, relative } from 'node:path';
import fg from 'fast-glob';

export interface SweepOptions {
  recursive: boolean;
  /** Extension including the dot, matched case-insensitively */
  extension: string;
  /** Absolute directories skipped during enumeration */
  exclude?: readonly string[];
}

/**
 * Files already present under `root`, as absolute paths in sorted order.
 */
export async function sweepBacklog(root: string, options: SweepOptions): Promise<string[]> {
  const pattern = `${options.recursive ? '**/' : ''}*${fg.escapePath(options.extension)}`;

  const files = await fg(pattern, {
    cwd: root,
    absolute: true,
    onlyFiles: true,
    dot: true,
    caseSensitiveMatch: false,
    followSymbolicLinks: false,
    ignore: excludePatterns(root, options.exclude ?? []),
  });

  return files.sort();
}

/**
 * Ignore patterns, relative to `root`, for excluded directories inside it.
 */
function excludePatterns(root: string, directories: readonly string[]): string[] {
  return directories
    .map((dir) => relative(root, dir))
    .filter((rel) => rel !== '' && !rel.startsWith('..') && !isAbsolute(rel))
    .map((rel) => `${fg.convertPathToPattern(rel)}/**`);
}
