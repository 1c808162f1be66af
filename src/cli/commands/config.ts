import {
  CONFIG_KEYS,
  getConfigValue,
  isConfigKey,
  loadConfig,
  parseConfigValue,
  setConfigValue,
  type Gui2WebConfig,
} from '../../storage/config.js';
import { formatAsJson } from './json-formatter.js';

/**
 * Run the config command.
 *
 * @param key - Optional config key to get or set
 * @param value - Optional value to set (requires key)
 * @param json - Output as JSON if true
 * @returns Output string to display
 */
export async function runConfigCommand(key?: string, value?: string, json?: boolean): Promise<string> {
  // Show all config
  if (!key) {
    const config = await loadConfig();
    return json ? formatAsJson({ command: 'config', config }) : formatConfig(config);
  }

  if (!isConfigKey(key)) {
    throw new Error(`Unknown config key: ${key}. Valid keys: ${CONFIG_KEYS.join(', ')}`);
  }

  // Get single value
  if (value === undefined) {
    const current = await getConfigValue(key);
    return json ? formatAsJson({ command: 'config', config: { [key]: current } }) : formatValue(current);
  }

  const parsed = parseConfigValue(key, value);
  await setConfigValue(key, parsed);

  return json
    ? formatAsJson({ command: 'config', config: { [key]: parsed }, updated: key })
    : `Set ${key} = ${formatValue(parsed)}`;
}

/**
 * Format a config value for display.
 */
function formatValue(value: unknown): string {
  if (Array.isArray(value)) {
    return value.join(', ');
  }
  return String(value);
}

/**
 * Format the entire config for display.
 */
function formatConfig(config: Gui2WebConfig): string {
  return CONFIG_KEYS.map(key => `${key}: ${formatValue(config[key])}`).join('\n');
}
