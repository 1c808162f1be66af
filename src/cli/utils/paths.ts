import { homedir } from 'node:os';
import { join } from 'node:path';

const APP_DIR = 'gui2web';

/**
 * Get the gui2web data directory based on platform conventions.
 *
 * Priority:
 * 1. GUI2WEB_HOME environment variable (override)
 * 2. Platform-specific:
 *    - Linux: $XDG_DATA_HOME/gui2web or ~/.local/share/gui2web
 *    - macOS: ~/Library/Application Support/gui2web
 *    - Windows: %APPDATA%/gui2web
 */
export function getDataHome(env: NodeJS.ProcessEnv = process.env, platform: NodeJS.Platform = process.platform): string {
  const envHome = env['GUI2WEB_HOME'];
  if (envHome) {
    return envHome;
  }

  const home = homedir();

  switch (platform) {
    case 'darwin':
      return join(home, 'Library', 'Application Support', APP_DIR);

    case 'win32': {
      const appData = env['APPDATA'];
      if (appData) {
        return join(appData, APP_DIR);
      }
      // Fallback for Windows if APPDATA not set
      return join(home, 'AppData', 'Roaming', APP_DIR);
    }

    default: {
      const xdgDataHome = env['XDG_DATA_HOME'];
      if (xdgDataHome) {
        return join(xdgDataHome, APP_DIR);
      }
      return join(home, '.local', 'share', APP_DIR);
    }
  }
}

/**
 * Get the path to the config file.
 */
export function getConfigPath(): string {
  return join(getDataHome(), 'config.json');
}

/**
 * Get the directory holding cached analysis results.
 */
export function getResultsPath(): string {
  return join(getDataHome(), 'results');
}
