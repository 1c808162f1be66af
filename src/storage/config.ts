import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { getConfigPath } from '../cli/utils/paths.js';
import { DEFAULT_EXCLUDES } from '../core/walker.js';

/**
 * Configuration schema. Classification thresholds are not configurable; they
 * live in DEFAULT_THRESHOLDS.
 */
export const configSchema = z.object({
  /** Patterns to exclude when collecting a project */
  excludes: z.array(z.string()),
  /** Maximum number of files collected per project */
  maxFiles: z.number().int().positive(),
  /** Maximum directory depth below the project root */
  maxDepth: z.number().int().nonnegative(),
  /** Maximum file size to analyze in bytes */
  maxFileSize: z.number().int().positive(),
  /** Whether completed results are cached */
  cacheResults: z.boolean(),
  /** Run timeout in milliseconds (0 = none) */
  timeoutMs: z.number().int().nonnegative(),
});

export type Gui2WebConfig = z.infer<typeof configSchema>;

export type ConfigKey = keyof Gui2WebConfig;

export const CONFIG_KEYS: readonly ConfigKey[] = configSchema.keyof().options;

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: Gui2WebConfig = {
  excludes: [...DEFAULT_EXCLUDES],
  maxFiles: 1000,
  maxDepth: 10,
  maxFileSize: 5 * 1024 * 1024, // 5MB
  cacheResults: true,
  timeoutMs: 0,
};

/**
 * Raised when config.json or a value being set does not match the schema
 */
export class ConfigError extends Error {
  readonly code = 'INVALID_CONFIG';

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some(known => known === key);
}

/**
 * Load configuration from file, merging with defaults.
 */
export async function loadConfig(): Promise<Gui2WebConfig> {
  const configPath = getConfigPath();

  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (error) {
    // If file doesn't exist, return defaults
    if (isNodeError(error) && error.code === 'ENOENT') {
      return { ...DEFAULT_CONFIG, excludes: [...DEFAULT_CONFIG.excludes] };
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new ConfigError(`${configPath} is not valid JSON`);
  }

  const parsed = configSchema.partial().safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`${configPath}: ${describeIssues(parsed.error)}`);
  }

  // Merge with defaults (parsed values override defaults)
  return {
    ...DEFAULT_CONFIG,
    ...parsed.data,
  };
}

/**
 * Save configuration to file.
 */
export async function saveConfig(config: Gui2WebConfig): Promise<void> {
  const configPath = getConfigPath();

  const checked = configSchema.safeParse(config);
  if (!checked.success) {
    throw new ConfigError(describeIssues(checked.error));
  }

  await mkdir(dirname(configPath), { recursive: true });
  await writeFile(configPath, JSON.stringify(checked.data, null, 2), 'utf-8');
}

/**
 * Get a specific configuration value.
 */
export async function getConfigValue<K extends ConfigKey>(key: K): Promise<Gui2WebConfig[K]> {
  const config = await loadConfig();
  return config[key];
}

/**
 * Set a specific configuration value.
 */
export async function setConfigValue<K extends ConfigKey>(key: K, value: Gui2WebConfig[K]): Promise<void> {
  const config = await loadConfig();
  config[key] = value;
  await saveConfig(config);
}

/**
 * Convert a command-line string into a typed value for `key`.
 * Arrays take JSON or a comma-separated list.
 */
export function parseConfigValue(key: ConfigKey, input: string): Gui2WebConfig[ConfigKey] {
  let candidate: unknown = input;
  const expected = configSchema.shape[key];

  if (expected instanceof z.ZodArray) {
    if (input.trim().startsWith('[')) {
      try {
        candidate = JSON.parse(input);
      } catch {
        throw new ConfigError(`${key}: expected a JSON array`);
      }
    } else {
      candidate = input
        .split(',')
        .map(part => part.trim())
        .filter(part => part.length > 0);
    }
  } else if (expected instanceof z.ZodBoolean) {
    if (input !== 'true' && input !== 'false') {
      throw new ConfigError(`${key}: expected true or false`);
    }
    candidate = input === 'true';
  } else if (expected instanceof z.ZodNumber) {
    candidate = Number(input);
  }

  const parsed = expected.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigError(`${key}: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Type guard for Node.js errors with code property.
 */
function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
