import { pino, type Logger, type LevelWithSilent } from 'pino';

let rootLogger: Logger | null = null;

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLevel(value: string): value is LevelWithSilent {
  return LEVELS.some(level => level === value);
}

/**
 * Resolve the log level from the environment.
 *
 * GUI2WEB_LOG_LEVEL wins; tests are silent unless they ask otherwise.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LevelWithSilent {
  const requested = env['GUI2WEB_LOG_LEVEL'];
  if (requested && isLevel(requested)) {
    return requested;
  }
  return env['NODE_ENV'] === 'test' ? 'silent' : 'info';
}

/**
 * Process-wide logger, created on first use.
 * Writes JSON lines to stderr so stdout stays free for reports and --json output.
 */
export function getLogger(): Logger {
  if (!rootLogger) {
    rootLogger = pino(
      {
        name: 'gui2web',
        level: resolveLogLevel(),
        base: { pid: process.pid },
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.destination(2)
    );
  }
  return rootLogger;
}

/**
 * Child logger bound to a component name.
 */
export function createChildLogger(component: string, bindings: Record<string, unknown> = {}): Logger {
  return getLogger().child({ component, ...bindings });
}
