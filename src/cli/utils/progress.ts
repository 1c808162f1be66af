import ora from 'ora';
import type { ProgressEvent, ProgressSink } from '../../types/analysis.js';

/**
 * Terminal status indicator for a running analysis.
 */
export interface Spinner {
  start(): Spinner;
  stop(): Spinner;
  succeed(message?: string): Spinner;
  fail(message?: string): Spinner;
  update(message: string): Spinner;
}

/**
 * Line-per-change indicator for pipes and CI logs. Writes to stderr so a
 * report on stdout stays parseable.
 */
function createLineSpinner(initial: string): Spinner {
  let current = initial;
  const spinner: Spinner = {
    start: () => {
      console.error(current);
      return spinner;
    },
    stop: () => spinner,
    succeed: message => {
      if (message) console.error(`✓ ${message}`);
      return spinner;
    },
    fail: message => {
      if (message) console.error(`✗ ${message}`);
      return spinner;
    },
    update: message => {
      if (message !== current) {
        current = message;
        console.error(message);
      }
      return spinner;
    },
  };
  return spinner;
}

/**
 * Create a spinner: ora on an interactive stderr, plain lines otherwise.
 */
export function createSpinner(text: string): Spinner {
  if (!process.stderr.isTTY) {
    return createLineSpinner(text);
  }

  const indicator = ora({ text, color: 'cyan', stream: process.stderr });
  const spinner: Spinner = {
    start: () => {
      indicator.start();
      return spinner;
    },
    stop: () => {
      indicator.stop();
      return spinner;
    },
    succeed: message => {
      indicator.succeed(message);
      return spinner;
    },
    fail: message => {
      indicator.fail(message);
      return spinner;
    },
    update: message => {
      indicator.text = message;
      return spinner;
    },
  };
  return spinner;
}

/**
 * Render a progress event as one status line
 */
export function formatProgress(event: ProgressEvent): string {
  return `[${String(event.percent).padStart(3)}%] ${event.message}`;
}

/**
 * Progress sink that drives a spinner: running events update its text,
 * the terminal event settles it.
 */
export function createProgressSink(spinner: Spinner): ProgressSink {
  return event => {
    switch (event.status) {
      case 'running':
        spinner.update(formatProgress(event));
        break;
      case 'completed':
        spinner.succeed(event.message);
        break;
      case 'failed':
        spinner.fail(event.message);
        break;
    }
  };
}
