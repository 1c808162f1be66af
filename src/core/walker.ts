import { readdir, stat, readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join, relative, extname } from 'node:path';
import ignore, { type Ignore } from 'ignore';

/**
 * Result from walking a single file.
 */
export interface WalkResult {
  /** Absolute path to the file */
  absolutePath: string;
  /** Path relative to the walk root, with forward slashes */
  relativePath: string;
  /** File size in bytes */
  size: number;
}

/**
 * Outcome of a walk
 */
export interface WalkSummary {
  files: WalkResult[];
  /** Relative paths skipped for exceeding maxFileSize */
  oversized: string[];
  /** Whether maxFiles stopped the walk early */
  truncated: boolean;
}

/**
 * Options for file walking.
 */
export interface WalkOptions {
  /** Patterns to exclude (directories and files) */
  excludes?: string[];
  /** File extensions to collect (default: .py) */
  extensions?: string[];
  /** Maximum file size in bytes */
  maxFileSize?: number;
  /** Maximum number of files collected */
  maxFiles?: number;
  /** Maximum directory depth below the root (root is depth 0) */
  maxDepth?: number;
  /** Whether to include hidden files (default: false) */
  includeHidden?: boolean;
  /** Whether to respect .gitignore files (default: true) */
  respectGitignore?: boolean;
  /** Whether to respect .gui2webignore files (default: true) */
  respectProjectIgnore?: boolean;
}

export const PROJECT_IGNORE_FILE = '.gui2webignore';

/**
 * Default directories and file patterns to exclude.
 */
export const DEFAULT_EXCLUDES: string[] = [
  // Version control
  '.git',
  '.hg',
  '.svn',

  // Python environments and caches
  '.venv',
  'venv',
  'env',
  '__pycache__',
  '*.egg-info',
  '.eggs',
  'site-packages',
  '.pytest_cache',
  '.mypy_cache',
  '.ruff_cache',
  '.tox',
  '.nox',
  '.hypothesis',

  // JavaScript tooling that ships alongside
  'node_modules',

  // Build outputs
  'dist',
  'build',
  '_build',

  // Coverage
  'htmlcov',
  'coverage',

  // Temporary
  'tmp',
  'temp',
];

/**
 * Check if a path should be excluded based on patterns.
 */
export function shouldExclude(name: string, excludes: string[]): boolean {
  for (const pattern of excludes) {
    // Exact match
    if (name === pattern) {
      return true;
    }

    // Glob pattern matching
    if (pattern.includes('*')) {
      const regex = globToRegex(pattern);
      if (regex.test(name)) {
        return true;
      }
    }
  }

  return false;
}

/**
 * Convert a simple glob pattern to a regex.
 */
function globToRegex(pattern: string): RegExp {
  // Escape special regex characters except *
  const regexStr = pattern
    .replace(/[.+^${}()|[\]\\]/g, '\\$&')
    .replace(/\*/g, '.*');

  // Anchor the pattern
  return new RegExp(`^${regexStr}$`);
}

/**
 * Read and parse an ignore file (.gitignore or .gui2webignore).
 * Returns the patterns as an array of strings.
 */
async function readIgnoreFile(filePath: string): Promise<string[]> {
  if (!existsSync(filePath)) {
    return [];
  }
  const content = await readFile(filePath, 'utf-8');
  return content
    .split('\n')
    .map(line => line.trim())
    .filter(line => line && !line.startsWith('#'));
}

/**
 * Create an ignore instance from gitignore and project ignore files.
 */
async function createIgnoreFilter(
  rootPath: string,
  options: { respectGitignore?: boolean; respectProjectIgnore?: boolean }
): Promise<Ignore> {
  const ig = ignore();

  if (options.respectGitignore !== false) {
    const gitignorePatterns = await readIgnoreFile(join(rootPath, '.gitignore'));
    if (gitignorePatterns.length > 0) {
      ig.add(gitignorePatterns);
    }
  }

  // Project ignore patterns are added last so they take precedence
  if (options.respectProjectIgnore !== false) {
    const projectPatterns = await readIgnoreFile(join(rootPath, PROJECT_IGNORE_FILE));
    if (projectPatterns.length > 0) {
      ig.add(projectPatterns);
    }
  }

  return ig;
}

/**
 * Walk a directory and collect source files, in path order.
 */
export async function walkFiles(
  rootPath: string,
  options: WalkOptions = {}
): Promise<WalkSummary> {
  const {
    excludes = DEFAULT_EXCLUDES,
    extensions = ['.py'],
    maxFileSize = Infinity,
    maxFiles = Infinity,
    maxDepth = Infinity,
    includeHidden = false,
    respectGitignore = true,
    respectProjectIgnore = true,
  } = options;

  const wanted = new Set(extensions.map(ext => ext.toLowerCase()));
  const files: WalkResult[] = [];
  const oversized: string[] = [];
  let truncated = false;

  const ignoreFilter = await createIgnoreFilter(rootPath, {
    respectGitignore,
    respectProjectIgnore,
  });

  async function walk(currentPath: string, depth: number): Promise<void> {
    const entries = await readdir(currentPath, { withFileTypes: true });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      if (truncated) return;

      const name = entry.name;
      const fullPath = join(currentPath, name);
      const relativePath = relative(rootPath, fullPath).replace(/\\/g, '/');

      // Skip hidden files/directories unless explicitly included
      if (!includeHidden && name.startsWith('.')) {
        continue;
      }

      if (shouldExclude(name, excludes)) {
        continue;
      }

      const ignorePath = entry.isDirectory() ? `${relativePath}/` : relativePath;
      if (ignoreFilter.ignores(ignorePath)) {
        continue;
      }

      if (entry.isDirectory()) {
        if (depth < maxDepth) {
          await walk(fullPath, depth + 1);
        }
      } else if (entry.isFile() && wanted.has(extname(name).toLowerCase())) {
        const stats = await stat(fullPath);
        if (stats.size > maxFileSize) {
          oversized.push(relativePath);
          continue;
        }
        if (files.length >= maxFiles) {
          truncated = true;
          return;
        }

        files.push({
          absolutePath: fullPath,
          relativePath,
          size: stats.size,
        });
      }
    }
  }

  await walk(rootPath, 0);
  return { files, oversized, truncated };
}
