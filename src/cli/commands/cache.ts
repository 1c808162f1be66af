/**
 * Cache CLI command - inspect or clear stored analysis results
 */

import { clearCache, getCacheStats, openResultCache } from '../../storage/cache.js';
import { getResultsPath } from '../utils/paths.js';
import { formatAsJson } from './json-formatter.js';

export type CacheAction = 'stats' | 'clear';

export function isCacheAction(action: string): action is CacheAction {
  return action === 'stats' || action === 'clear';
}

function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

/**
 * Run the cache command.
 *
 * @returns Output string to display
 */
export async function runCacheCommand(action: string, json?: boolean): Promise<string> {
  if (!isCacheAction(action)) {
    throw new Error(`Unknown cache action: ${action}. Valid actions: stats, clear`);
  }

  const cache = await openResultCache(getResultsPath());

  if (action === 'stats') {
    const stats = await getCacheStats(cache);
    return json
      ? formatAsJson({ command: 'cache', action, count: stats.count, bytes: stats.bytes })
      : `Cached results: ${stats.count} (${formatBytes(stats.bytes)})`;
  }

  const removed = await clearCache(cache);
  return json
    ? formatAsJson({ command: 'cache', action, count: removed })
    : `Removed ${removed} cached result${removed === 1 ? '' : 's'}`;
}
