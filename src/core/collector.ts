/**
 * Local project collector: turns a file or directory on disk into an
 * analysis input.
 */

import { readFile, stat } from 'node:fs/promises';
import { basename, extname, resolve, sep } from 'node:path';
import { InvalidInputError } from './errors.js';
import { DEFAULT_EXCLUDES, walkFiles } from './walker.js';
import type { AnalysisInput, SourceFile } from '../types/analysis.js';
import { createChildLogger } from '../utils/logger.js';

/** Directories that are never analyzed, nor anything below them */
export const SYSTEM_DIRECTORIES = ['/etc', '/sys', '/proc', '/dev', '/boot'];

export interface CollectOptions {
  /** Project name (defaults to the directory name or file stem) */
  name?: string;
  excludes?: string[];
  maxFiles?: number;
  maxDepth?: number;
  maxFileSize?: number;
}

export interface CollectedProject {
  input: AnalysisInput;
  /** Absolute path that was collected */
  root: string;
  /** Files skipped for size */
  oversized: string[];
  /** Whether maxFiles cut the collection short */
  truncated: boolean;
}

export function isSystemPath(absolutePath: string): boolean {
  return SYSTEM_DIRECTORIES.some(dir => absolutePath === dir || absolutePath.startsWith(`${dir}${sep}`));
}

/**
 * Collect the Python sources under `target` (a directory or a single file).
 *
 * @throws InvalidInputError for missing paths and system directories
 */
export async function collectProject(
  target: string,
  options: CollectOptions = {}
): Promise<CollectedProject> {
  const root = resolve(target);
  const log = createChildLogger('collector');

  if (isSystemPath(root)) {
    throw new InvalidInputError(`Refusing to analyze system directory: ${root}`);
  }

  const info = await stat(root).catch(() => null);
  if (!info) {
    throw new InvalidInputError(`Path does not exist: ${root}`);
  }

  if (info.isFile()) {
    if (options.maxFileSize !== undefined && info.size > options.maxFileSize) {
      throw new InvalidInputError(`File exceeds the size limit of ${options.maxFileSize} bytes: ${root}`);
    }
    const content = await readFile(root);
    const fileName = basename(root);
    return {
      input: {
        projectName: options.name ?? basename(root, extname(root)),
        files: [{ path: fileName, content: new Uint8Array(content) }],
      },
      root,
      oversized: [],
      truncated: false,
    };
  }

  if (!info.isDirectory()) {
    throw new InvalidInputError(`Not a file or directory: ${root}`);
  }

  const walk = await walkFiles(root, {
    excludes: options.excludes ?? DEFAULT_EXCLUDES,
    maxFiles: options.maxFiles,
    maxDepth: options.maxDepth,
    maxFileSize: options.maxFileSize,
  });

  const files: SourceFile[] = [];
  for (const file of walk.files) {
    const content = await readFile(file.absolutePath);
    files.push({ path: file.relativePath, content: new Uint8Array(content) });
  }

  if (walk.truncated) {
    log.warn({ root, maxFiles: options.maxFiles }, 'File limit reached; remaining files skipped');
  }
  if (walk.oversized.length > 0) {
    log.warn({ root, files: walk.oversized }, 'Oversized files skipped');
  }

  return {
    input: { projectName: options.name ?? basename(root), files },
    root,
    oversized: walk.oversized,
    truncated: walk.truncated,
  };
}
