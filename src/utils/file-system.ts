/**
 * File access for the CLI and the config loader.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import fg from 'fast-glob';

export const SOURCE_EXTENSIONS = ['.ts', '.tsx'] as const;

export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * True when a regular file exists at the path. Errors other than a missing
 * path are rethrown.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(filePath);
    return stat.isFile();
  } catch (error) {
    if (isMissingPathError(error)) {
      return false;
    }
    throw error;
  }
}

function isMissingPathError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

/** Analyzable source file: `.ts` or `.tsx`, declaration files excluded. */
export function isSourceFile(filePath: string): boolean {
  return !filePath.endsWith('.d.ts') && SOURCE_EXTENSIONS.some(ext => filePath.endsWith(ext));
}

export interface FindSourceFilesOptions {
  cwd: string;
  /** Glob patterns removed from glob matches; named files are never excluded */
  exclude?: string[];
}

/**
 * Expand file paths and glob patterns to unique absolute source file paths,
 * sorted so reports come out in a stable order.
 */
export async function findSourceFiles(
  patterns: string[],
  options: FindSourceFilesOptions
): Promise<string[]> {
  const files = new Set<string>();
  const globs: string[] = [];

  for (const pattern of patterns) {
    if (fg.isDynamicPattern(pattern)) {
      globs.push(pattern);
    } else {
      files.add(path.resolve(options.cwd, pattern));
    }
  }

  if (globs.length > 0) {
    const matches = await fg(globs, {
      cwd: options.cwd,
      ignore: options.exclude ?? [],
      absolute: true,
      onlyFiles: true,
    });
    for (const match of matches) {
      files.add(path.resolve(match));
    }
  }

  return [...files].filter(isSourceFile).sort();
}
