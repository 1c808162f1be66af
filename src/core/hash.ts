import { createHash } from 'node:crypto';
import type { AnalysisInput } from '../types/analysis.js';

/**
 * Generate a SHA-256 hash of string or buffer content.
 */
export function hashContent(content: string | Uint8Array): string {
  const hash = createHash('sha256');
  hash.update(content);
  return hash.digest('hex');
}

/**
 * Job identifier for an analysis input.
 * Depends only on the project name and the path/content pairs, never on their
 * order, so identical inputs share cached results.
 */
export function createJobId(input: AnalysisInput): string {
  const hash = createHash('sha256');
  hash.update(`project:${input.projectName}\0`);

  const files = [...input.files].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  for (const file of files) {
    hash.update(`path:${file.path}\0`);
    hash.update(hashContent(file.content));
    hash.update('\0');
  }

  return hash.digest('hex');
}
