import { Command } from 'commander';
import { getIntervalMs, loadConfig, toEntities } from '../../config/config.js';
import { EventBus } from '../../kernel/event-bus.js';
import { MonitorLoop } from '../../monitor/monitor-loop.js';
import { StatusClassifier } from '../../monitor/status-classifier.js';
import type { AlertSink, SessionGateway } from '../../monitor/contracts.js';
import { PrtgGateway } from '../../integrations/browser/prtg-gateway.js';
import { SmtpAlertSink } from '../../integrations/email/smtp-alert-sink.js';
import type { Config } from '../../types/index.js';
import { createLogger, formatError, redact, setLogLevel } from '../../utils/logger.js';
import { attachConsoleReporter, formatBanner } from '../formatters.js';

const log = createLogger('cli');

export const EXIT_CODES = {
  ok: 0,
  config: 1,
  auth: 2,
  failure: 3,
} as const;

export interface RunCommandOptions {
  config?: string;
  once?: boolean;
  interval?: string;
}

export interface CommandDeps {
  createGateway?: (config: Config) => SessionGateway;
  createSink?: (config: Config) => AlertSink;
  /** Cancellation from the caller; defaults to SIGINT/SIGTERM */
  signal?: AbortSignal;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
}

const defaultStdout = (line: string): void => {
  process.stdout.write(`${line}\n`);
};
const defaultStderr = (line: string): void => {
  process.stderr.write(`${line}\n`);
};

export function loadCommandConfig(path: string | undefined, stderr: (line: string) => void): Config | null {
  const loaded = loadConfig(path);
  if (!loaded.success) {
    stderr(`Error: ${loaded.error.message}`);
    return null;
  }
  setLogLevel(loaded.data.logging.level);
  log.debug({ config: redact(loaded.data) }, 'Configuration loaded');
  return loaded.data;
}

function parseInterval(value: string | undefined): number | null | undefined {
  if (value === undefined) return undefined;
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds > 0 ? Math.round(seconds * 1000) : null;
}

/**
 * Run the monitor until cancelled, or a single cycle with `once`.
 * Resolves to the process exit code.
 */
export async function runMonitor(options: RunCommandOptions, deps: CommandDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? defaultStdout;
  const stderr = deps.stderr ?? defaultStderr;

  const config = loadCommandConfig(options.config, stderr);
  if (!config) return EXIT_CODES.config;

  const override = parseInterval(options.interval);
  if (override === null) {
    stderr(`Error: --interval must be a positive number of seconds, got "${options.interval ?? ''}"`);
    return EXIT_CODES.config;
  }
  const intervalMs = override ?? getIntervalMs(config);
  const entities = toEntities(config);

  const eventBus = new EventBus();
  const detach = attachConsoleReporter(eventBus, stdout);

  const controller = new AbortController();
  const abort = (): void => controller.abort();
  const forwardAbort = (): void => controller.abort(deps.signal?.reason);
  if (deps.signal) {
    if (deps.signal.aborted) controller.abort(deps.signal.reason);
    else deps.signal.addEventListener('abort', forwardAbort, { once: true });
  } else {
    process.once('SIGINT', abort);
    process.once('SIGTERM', abort);
  }

  const loop = new MonitorLoop({
    gateway: (deps.createGateway ?? ((c: Config) => new PrtgGateway({ config: c.prtg })))(config),
    sink: (deps.createSink ?? ((c: Config) => new SmtpAlertSink({ smtp: c.smtp, email: c.email })))(config),
    entities,
    intervalMs,
    classifier: new StatusClassifier({
      errorColor: config.monitoring.errorColor,
      warningColor: config.monitoring.warningColor,
      normalColor: config.monitoring.normalColor,
    }),
    eventBus,
  });

  stdout(formatBanner(entities, intervalMs));

  try {
    const result = await loop.run({ signal: controller.signal, once: options.once ?? false });
    if (!result.success) {
      stderr(`Authentication failed: ${result.error.message}`);
      return EXIT_CODES.auth;
    }
    stdout(result.data.reason === 'cancelled' ? 'Monitor stopped.' : 'Check complete.');
    return EXIT_CODES.ok;
  } catch (error) {
    log.fatal({ err: formatError(error) }, 'Monitor crashed');
    stderr(`Error: ${formatError(error).message}`);
    return EXIT_CODES.failure;
  } finally {
    detach();
    deps.signal?.removeEventListener('abort', forwardAbort);
    process.removeListener('SIGINT', abort);
    process.removeListener('SIGTERM', abort);
  }
}

export function registerRunCommands(program: Command, deps: CommandDeps = {}): void {
  program
    .command('run')
    .description('Monitor the configured dashboards until interrupted')
    .option('-c, --config <path>', 'Path to the config file', 'config.json')
    .option('--once', 'Run a single check cycle and exit', false)
    .option('-i, --interval <seconds>', 'Override monitoring.checkIntervalSeconds')
    .action(async (options: RunCommandOptions) => {
      process.exitCode = await runMonitor(options, deps);
    });

  program
    .command('check')
    .description('Run a single check cycle and exit (same as run --once)')
    .option('-c, --config <path>', 'Path to the config file', 'config.json')
    .action(async (options: { config?: string }) => {
      process.exitCode = await runMonitor({ config: options.config, once: true }, deps);
    });
}
