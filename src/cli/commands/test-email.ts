import { Command } from 'commander';
import { SmtpAlertSink } from '../../integrations/email/smtp-alert-sink.js';
import type { Alert } from '../../types/index.js';
import { EXIT_CODES, loadCommandConfig, type CommandDeps } from './run.js';

export function sampleAlert(now: Date = new Date()): Alert {
  return {
    entityDisplayName: 'Test entity',
    dashboardURL: 'https://example.com/test',
    statusLabel: 'Test',
    firedAt: now,
  };
}

/**
 * Send one sample alert through the configured sink. Exit 0 only when the
 * email actually went out.
 */
export async function sendTestEmail(options: { config?: string }, deps: CommandDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? ((line: string) => void process.stdout.write(`${line}\n`));
  const stderr = deps.stderr ?? ((line: string) => void process.stderr.write(`${line}\n`));

  const config = loadCommandConfig(options.config, stderr);
  if (!config) return EXIT_CODES.config;

  const sink = (deps.createSink ?? ((c) => new SmtpAlertSink({ smtp: c.smtp, email: c.email })))(config);
  const result = await sink.deliver(sampleAlert());

  if (!result.success) {
    stderr(`Test email failed: ${result.error.message}`);
    return EXIT_CODES.failure;
  }
  if (result.data.status === 'disabled') {
    stderr(`Email alerts are disabled: ${result.data.reason}`);
    return EXIT_CODES.config;
  }

  stdout(`Test email sent to ${config.email.recipients.join(', ')}`);
  return EXIT_CODES.ok;
}

export function registerTestEmailCommand(program: Command, deps: CommandDeps = {}): void {
  program
    .command('test-email')
    .description('Send a sample alert email using the SMTP settings')
    .option('-c, --config <path>', 'Path to the config file', 'config.json')
    .action(async (options: { config?: string }) => {
      process.exitCode = await sendTestEmail(options, deps);
    });
}
