#!/usr/bin/env node

/**
 * Sensor Triage
 *
 * Reads a sensor telemetry log, classifies every reporting sensor as
 * healthy or faulty and prints a summary with the fault reason of each
 * faulty sensor.
 *
 * Usage:
 *   sensor-triage                     # Read app.log (or input.path from triage.yml)
 *   sensor-triage ./logs/app_2.log    # Read a specific log file
 *   sensor-triage --config ./my.yml   # Use a specific config file
 *   sensor-triage --json              # Print the summary as JSON
 *   sensor-triage --stats             # Include line counters in the report
 *   sensor-triage --verbose           # Enable debug logging
 */

import * as path from 'path';
import { performance } from 'perf_hooks';
import { Config, DEFAULT_LOG_FILE, loadConfig } from './config';
import { initLogger } from './logger';
import { formatConsoleReport, formatJsonReport } from './report-formatter';
import { triageFile } from './telemetry';

export interface CliOptions {
  logFile?: string;
  configPath?: string;
  json: boolean;
  stats: boolean;
  timing: boolean;
  verbose: boolean;
  help: boolean;
}

export interface CliIO {
  out: (text: string) => void;
  err: (text: string) => void;
}

const CONSOLE_IO: CliIO = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

const HELP_TEXT = [
  '',
  '  Sensor Triage',
  '  Classify sensors in a telemetry log as healthy or faulty',
  '',
  '  Usage: sensor-triage [logFile] [options]',
  '',
  '  Options:',
  '    --config, -c <path>   Path to config YAML file (default ./triage.yml)',
  '    --json                Print the summary as JSON',
  '    --stats               Include line counters in the text report',
  '    --no-timing           Omit the timing line',
  '    --verbose, -v         Enable debug logging',
  '    --help, -h            Show this help',
  '',
].join('\n');

/** Parse CLI arguments; argv is process.argv (node and script first) */
export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = {
    json: false,
    stats: false,
    timing: true,
    verbose: false,
    help: false,
  };

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--config':
      case '-c': {
        const value = argv[++i];
        if (!value) {
          throw new Error('[CLI] --config requires a file path (e.g. --config ./triage.yml)');
        }
        options.configPath = value;
        break;
      }
      case '--json':
        options.json = true;
        break;
      case '--stats':
        options.stats = true;
        break;
      case '--no-timing':
        options.timing = false;
        break;
      case '--verbose':
      case '-v':
        options.verbose = true;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        if (arg.startsWith('-')) {
          throw new Error(`[CLI] Unknown option: ${arg}`);
        }
        if (options.logFile) {
          throw new Error(`[CLI] Unexpected argument: ${arg}`);
        }
        options.logFile = arg;
    }
  }

  return options;
}

/** Apply CLI flags on top of the file config */
export function applyOverrides(config: Config, options: CliOptions): Config {
  return {
    input: {
      ...config.input,
      path: options.logFile ?? config.input.path ?? path.join(process.cwd(), DEFAULT_LOG_FILE),
    },
    report: {
      format: options.json ? 'json' : config.report.format,
      stats: options.stats || config.report.stats,
      timing: options.timing && config.report.timing,
    },
    logging: {
      ...config.logging,
      level: options.verbose ? 'debug' : config.logging.level,
    },
  };
}

/** Run the CLI and resolve with the process exit code */
export async function run(argv: string[], io: CliIO = CONSOLE_IO): Promise<number> {
  try {
    const options = parseArgs(argv);
    if (options.help) {
      io.out(HELP_TEXT);
      return 0;
    }

    const config = applyOverrides(loadConfig(options.configPath), options);
    initLogger(config.logging);

    const logFile = config.input.path ?? DEFAULT_LOG_FILE;
    const start = performance.now();
    const result = await triageFile(logFile, config.input.encoding);
    const durationMs = config.report.timing ? performance.now() - start : undefined;

    if (config.report.format === 'json') {
      io.out(formatJsonReport(result, durationMs));
    } else {
      io.out(formatConsoleReport(result.summary, {
        stats: config.report.stats ? result.stats : undefined,
        durationMs,
      }));
    }
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.err(`[Error] ${message}`);
    return 1;
  }
}

// Only run when this file is the entry point (not when imported for testing)
if (require.main === module) {
  run(process.argv).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    },
  );
}
