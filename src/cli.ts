// cli.ts - Command-line front end for the health snapshot
import { Command, InvalidArgumentError, Option } from 'commander';
import { HealthMonitorConfig, loadConfig } from './config/config';
import { Logger, parseLogLevel } from './common/logger';
import { isPermissionError } from './common/errors';
import { createSystemProbe } from './monitoring/probe-factory';
import { SystemProbe } from './monitoring/system-probe';
import { HealthCollector } from './service/health-collector';

export const VERSION = '1.0.0';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

type CliOptions = {
  outputDir?: string;
  format?: 'json' | 'text';
  topProcesses?: number;
  allConnections?: boolean;
  config?: string;
  logLevel?: 'debug' | 'info' | 'warn' | 'error';
  logDir?: string;
};

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

export interface CliDeps {
  probe?: SystemProbe;
  io?: CliIO;
  cwd?: string;
}

const consoleIO: CliIO = {
  out: line => console.log(line),
  err: line => console.error(line)
};

function parseTopProcesses(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

export function buildProgram(): Command {
  return new Command()
    .name('health-monitor')
    .description('System Health & Integrity Monitor - collect a one-shot snapshot of host health')
    .version(VERSION, '-v, --version')
    .option('-o, --output-dir <path>', 'Directory to write the report to (default: current directory)')
    .addOption(new Option('-f, --format <format>', 'Output format (default: json)').choices(['json', 'text']))
    .option('-t, --top-processes <count>', 'Number of top processes to include (default: 20)', parseTopProcesses)
    .option('-a, --all-connections', 'Include every network connection, not just the summary')
    .option('-c, --config <path>', 'Path to a JSON config file')
    .addOption(new Option('-l, --log-level <level>', 'Diagnostic log level').choices(['debug', 'info', 'warn', 'error']))
    .option('--log-dir <path>', 'Also append diagnostic logs to <path>/health-monitor.log')
    .exitOverride()
    .addHelpText('after', `
Examples:
  $ health-monitor
  $ health-monitor --format text
  $ health-monitor --output-dir /var/log/health --top-processes 50
  $ health-monitor --all-connections
  $ health-monitor --format text --output-dir ./logs --top-processes 30`);
}

export function resolveConfig(opts: CliOptions, cwd?: string): HealthMonitorConfig {
  return loadConfig(
    {
      outputDir: opts.outputDir,
      format: opts.format,
      topProcesses: opts.topProcesses,
      includeAllConnections: opts.allConnections,
      logLevel: opts.logLevel,
      logDir: opts.logDir
    },
    opts.config,
    cwd
  );
}

/**
 * Parse argv, run one snapshot and return the process exit code.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const io = deps.io ?? consoleIO;
  const program = buildProgram().configureOutput({
    writeOut: str => io.out(str.trimEnd()),
    writeErr: str => io.err(str.trimEnd())
  });

  try {
    program.parse(argv, { from: 'user' });
  } catch (error) {
    // commander throws on --help/--version too, with exitCode 0
    if (typeof error === 'object' && error !== null && 'exitCode' in error && typeof error.exitCode === 'number') {
      return error.exitCode;
    }
    throw error;
  }

  try {
    const config = resolveConfig(program.opts<CliOptions>(), deps.cwd);
    const logger = new Logger('health-monitor', {
      minLevel: parseLogLevel(config.logLevel),
      logDir: config.logDir
    });
    const collector = new HealthCollector(deps.probe ?? createSystemProbe(), logger);

    const logFile = await collector.run(config);

    io.out('');
    io.out('Summary:');
    io.out(`  Format: ${config.format.toUpperCase()}`);
    io.out(`  Top Processes: ${config.topProcesses}`);
    io.out(`  All Connections: ${config.includeAllConnections ? 'Yes' : 'No'}`);
    io.out(`  Log File: ${logFile}`);
    return EXIT_OK;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    if (isPermissionError(error)) {
      io.err(`Permission Error: ${message}`);
      io.err('Note: Some metrics may require elevated privileges (run with sudo/admin).');
    } else {
      io.err(`Error: ${message}`);
    }
    return EXIT_FAILURE;
  }
}
