import { mkdir, readFile, readdir, rm, stat, writeFile, rename } from 'node:fs/promises';
import { join } from 'node:path';
import type { ProjectAnalysisResult } from '../types/analysis.js';

const ENTRY_SUFFIX = '.json';
const CACHE_VERSION = 1;

/**
 * Result cache handle. Completed results are stored one JSON file per job.
 */
export interface ResultCache {
  path: string;
}

/**
 * Cache statistics.
 */
export interface CacheStats {
  count: number;
  /** Total size of the stored entries in bytes */
  bytes: number;
}

interface CacheEntry {
  version: number;
  jobId: string;
  result: ProjectAnalysisResult;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isProjectResult(value: unknown): value is ProjectAnalysisResult {
  return (
    isRecord(value) &&
    typeof value['projectName'] === 'string' &&
    Array.isArray(value['files']) &&
    isRecord(value['summary']) &&
    typeof value['webReadyPercentage'] === 'number' &&
    isRecord(value['guide'])
  );
}

function isCacheEntry(value: unknown): value is CacheEntry {
  return (
    isRecord(value) &&
    value['version'] === CACHE_VERSION &&
    typeof value['jobId'] === 'string' &&
    isProjectResult(value['result'])
  );
}

function entryPath(cache: ResultCache, jobId: string): string {
  if (!/^[a-f0-9]{64}$/.test(jobId)) {
    throw new Error(`Invalid job id: ${jobId}`);
  }
  return join(cache.path, `${jobId}${ENTRY_SUFFIX}`);
}

/**
 * Open or create a result cache at the specified path.
 */
export async function openResultCache(cachePath: string): Promise<ResultCache> {
  await mkdir(cachePath, { recursive: true });
  return { path: cachePath };
}

/**
 * Get a cached result by job id. Missing, stale or unreadable entries are
 * misses.
 */
export async function getResult(
  cache: ResultCache,
  jobId: string
): Promise<ProjectAnalysisResult | null> {
  let content: string;
  try {
    content = await readFile(entryPath(cache, jobId), 'utf-8');
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    return null;
  }

  return isCacheEntry(parsed) && parsed.jobId === jobId ? parsed.result : null;
}

/**
 * Store a completed result in the cache.
 */
export async function setResult(
  cache: ResultCache,
  jobId: string,
  result: ProjectAnalysisResult
): Promise<void> {
  const target = entryPath(cache, jobId);
  const entry: CacheEntry = { version: CACHE_VERSION, jobId, result };

  // Write then rename so readers never see a partial entry
  const temp = `${target}.${process.pid}.tmp`;
  await writeFile(temp, JSON.stringify(entry), 'utf-8');
  await rename(temp, target);
}

async function listEntries(cache: ResultCache): Promise<string[]> {
  try {
    const names = await readdir(cache.path);
    return names.filter(name => name.endsWith(ENTRY_SUFFIX));
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }
}

/**
 * Get cache statistics.
 */
export async function getCacheStats(cache: ResultCache): Promise<CacheStats> {
  const entries = await listEntries(cache);
  let bytes = 0;
  for (const name of entries) {
    const info = await stat(join(cache.path, name));
    bytes += info.size;
  }
  return { count: entries.length, bytes };
}

/**
 * Clear all cached results. Returns the number of entries removed.
 */
export async function clearCache(cache: ResultCache): Promise<number> {
  const entries = await listEntries(cache);
  for (const name of entries) {
    await rm(join(cache.path, name), { force: true });
  }
  return entries.length;
}

/**
 * Type guard for Node.js errors with code property.
 */
function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
