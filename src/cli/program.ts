import { Command, InvalidArgumentError, Option } from 'commander';
import { runAnalyzeCommand } from './commands/analyze.js';
import { runCacheCommand } from './commands/cache.js';
import { runConfigCommand } from './commands/config.js';
import { formatCsv } from './commands/csv-formatter.js';
import { runExtractCommand } from './commands/extract.js';
import { formatAsJson, formatErrorJson } from './commands/json-formatter.js';
import { formatReport } from './commands/report.js';
import { createProgressSink, createSpinner } from './utils/progress.js';
import { errorMessage } from '../core/errors.js';

export const VERSION = '0.1.0';

type OutputFormat = 'text' | 'json' | 'csv';

function parseTimeout(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Timeout must be a non-negative integer (milliseconds).');
  }
  return parsed;
}

/**
 * Print an error at the command boundary and flag a failing exit status.
 */
function reportError(err: unknown, json?: boolean): void {
  if (json) {
    console.log(formatAsJson(formatErrorJson(err)));
  } else {
    console.error(`Error: ${errorMessage(err)}`);
  }
  process.exitCode = 1;
}

/**
 * Build the gui2web command-line program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('gui2web')
    .description('Measure how much of a desktop GUI Python project can move to a web architecture unchanged')
    .version(VERSION);

  program
    .command('analyze <path>')
    .description('Analyze a project directory or a single Python file')
    .option('-n, --name <name>', 'Project name (defaults to the directory name)')
    .addOption(new Option('-f, --format <format>', 'Output format').choices(['text', 'json', 'csv']).default('text'))
    .option('-j, --json', 'Output as JSON (same as --format json)')
    .option('-o, --output <file>', 'Also write the JSON result to a file')
    .option('--no-cache', 'Ignore cached results')
    .option('--timeout <ms>', 'Fail the run after this many milliseconds', parseTimeout)
    .action(
      async (
        path: string,
        options: {
          name?: string;
          format: OutputFormat;
          json?: boolean;
          output?: string;
          cache: boolean;
          timeout?: number;
        }
      ) => {
        const format: OutputFormat = options.json ? 'json' : options.format;
        const spinner = format === 'text' ? createSpinner('Analyzing project...') : null;
        try {
          spinner?.start();
          const outcome = await runAnalyzeCommand(path, {
            name: options.name,
            output: options.output,
            cache: options.cache,
            timeout: options.timeout,
            onProgress: spinner ? createProgressSink(spinner) : undefined,
          });

          if (format === 'json') {
            console.log(
              formatAsJson({
                command: 'analyze',
                jobId: outcome.jobId,
                cached: outcome.cached,
                result: outcome.result,
              })
            );
            return;
          }
          if (format === 'csv') {
            process.stdout.write(formatCsv(outcome.result));
            return;
          }

          if (outcome.truncated) {
            console.error('Warning: file limit reached; some files were not analyzed (see `gui2web config maxFiles`).');
          }
          if (outcome.oversized.length > 0) {
            console.error(`Warning: skipped ${outcome.oversized.length} file(s) over the size limit.`);
          }
          console.log(formatReport(outcome.result));
          if (options.output) {
            console.log(`\nJSON result written to ${options.output}`);
          }
        } catch (err) {
          spinner?.stop();
          reportError(err, format === 'json');
        }
      }
    );

  program
    .command('extract <path>')
    .description('Write the pure functions of a project as web-ready Python modules')
    .requiredOption('-o, --out-dir <dir>', 'Directory to write the modules to')
    .option('-n, --name <name>', 'Project name (defaults to the directory name)')
    .option('-j, --json', 'Output as JSON')
    .option('--no-cache', 'Ignore cached results')
    .option('--timeout <ms>', 'Fail the run after this many milliseconds', parseTimeout)
    .action(
      async (
        path: string,
        options: { outDir: string; name?: string; json?: boolean; cache: boolean; timeout?: number }
      ) => {
        try {
          const outcome = await runExtractCommand(path, {
            outDir: options.outDir,
            name: options.name,
            cache: options.cache,
            timeout: options.timeout,
          });
          if (options.json) {
            console.log(formatAsJson({ command: 'extract', ...outcome }));
            return;
          }
          console.log(`Extracted ${outcome.functionCount} functions into ${outcome.outDir}`);
          for (const file of outcome.files) {
            console.log(`  ${file}`);
          }
        } catch (err) {
          reportError(err, options.json);
        }
      }
    );

  program
    .command('config [key] [value]')
    .description('Get or set configuration values')
    .option('-j, --json', 'Output as JSON')
    .action(async (key: string | undefined, value: string | undefined, options: { json?: boolean }) => {
      try {
        console.log(await runConfigCommand(key, value, options.json));
      } catch (err) {
        reportError(err, options.json);
      }
    });

  program
    .command('cache <action>')
    .description('Inspect or clear cached analysis results (stats | clear)')
    .option('-j, --json', 'Output as JSON')
    .action(async (action: string, options: { json?: boolean }) => {
      try {
        console.log(await runCacheCommand(action, options.json));
      } catch (err) {
        reportError(err, options.json);
      }
    });

  return program;
}
