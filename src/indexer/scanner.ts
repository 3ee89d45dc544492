/**
 * File Scanner
 *
 * Enumerates local documentation files with fast-glob. The result is
 * sorted by absolute path, and batch resumption depends on that order
 * being the same on every call.
 */

import { stat } from 'node:fs/promises';
import { basename, extname, relative, resolve } from 'node:path';
import fg from 'fast-glob';

import { FileNotFoundError, ValidationError } from '../errors/index.js';
import { DEFAULT_FILE_EXTENSIONS, type FileInfo, type ScanOptions, type ScanResult } from './types.js';

/** Directories never worth scanning for documentation */
const IGNORED_DIRECTORIES = ['**/node_modules/**', '**/.git/**'];

/**
 * Parse a comma-separated extension list: ".md, txt" -> ['.md', '.txt'].
 * Blank input yields the defaults.
 */
export function parseExtensions(list: string | undefined): string[] {
  const extensions = (list ?? '')
    .split(',')
    .map((ext) => ext.trim().toLowerCase())
    .filter((ext) => ext.length > 0)
    .map((ext) => (ext.startsWith('.') ? ext : `.${ext}`));

  return extensions.length > 0 ? [...new Set(extensions)] : [...DEFAULT_FILE_EXTENSIONS];
}

/** Code unit order, independent of locale */
export function comparePaths(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function matchesExtension(path: string, extensions: string[]): boolean {
  const lower = path.toLowerCase();
  return extensions.some((ext) => lower.endsWith(ext));
}

function toFileInfo(absolutePath: string, rootPath: string, size: number): FileInfo {
  return {
    path: absolutePath,
    relativePath: relative(rootPath, absolutePath) || basename(absolutePath),
    name: basename(absolutePath),
    extension: extname(absolutePath).toLowerCase(),
    size,
  };
}

/**
 * Scan a file or directory for documentation files.
 *
 * @throws FileNotFoundError when the path does not exist
 * @throws ValidationError when a single file has an unsupported extension
 *
 * @example
 * ```ts
 * const { files } = await scanPath('./docs', { extensions: ['.md'], recursive: true });
 * ```
 */
export async function scanPath(path: string, options: ScanOptions = {}): Promise<ScanResult> {
  const rootPath = resolve(path);
  const extensions = options.extensions ?? DEFAULT_FILE_EXTENSIONS;
  const recursive = options.recursive ?? true;

  const rootStat = await stat(rootPath).catch(() => undefined);
  if (!rootStat) {
    throw new FileNotFoundError(path);
  }

  if (rootStat.isFile()) {
    if (!matchesExtension(rootPath, extensions)) {
      throw new ValidationError(
        `File extension not supported. Supported: ${extensions.join(', ')}`
      );
    }
    return {
      rootPath,
      isFile: true,
      files: [toFileInfo(rootPath, rootPath, rootStat.size)],
    };
  }

  if (!rootStat.isDirectory()) {
    throw new ValidationError(`Path is neither a file nor a directory: ${path}`);
  }

  const patterns = extensions.map((ext) => `**/*${ext}`);
  const entries = await fg(patterns, {
    cwd: rootPath,
    absolute: true,
    onlyFiles: true,
    dot: false,
    stats: true,
    caseSensitiveMatch: false,
    deep: recursive ? Infinity : 1,
    followSymbolicLinks: options.followSymlinks ?? false,
    ignore: IGNORED_DIRECTORIES,
    suppressErrors: true,
  });

  const files = entries
    .map((entry) => toFileInfo(resolve(entry.path), rootPath, entry.stats?.size ?? 0))
    .sort((a, b) => comparePaths(a.path, b.path));

  return { rootPath, isFile: false, files };
}
