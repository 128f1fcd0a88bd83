/**
 * SMTP alert sink
 *
 * Delivers alerts as multipart (text + HTML) email through nodemailer.
 * With no SMTP server or no recipients configured the sink is disabled:
 * deliveries succeed as a no-op with status `disabled`.
 */

import { createTransport, type Transporter } from 'nodemailer';
import { ok, err, type Alert, type EmailConfig, type Result, type SmtpConfig } from '../../types/index.js';
import type { AlertSink, DeliveryOutcome } from '../../monitor/contracts.js';
import { DeliveryError, describeError } from '../../monitor/errors.js';
import { createLogger } from '../../utils/logger.js';
import { alertHtml, alertSubject, alertText } from './alert-template.js';

const log = createLogger('smtp-alert-sink');

export class SmtpAlertSink implements AlertSink {
  private readonly smtp: SmtpConfig;
  private readonly email: EmailConfig;
  private transporter: Transporter | null = null;

  constructor(params: { smtp: SmtpConfig; email: EmailConfig }) {
    this.smtp = params.smtp;
    this.email = params.email;

    const reason = this.disabledReason();
    if (reason) {
      log.warn({ reason }, 'Email alerts disabled');
    }
  }

  isEnabled(): boolean {
    return this.disabledReason() === null;
  }

  async deliver(alert: Alert): Promise<Result<DeliveryOutcome, DeliveryError>> {
    const reason = this.disabledReason();
    if (reason) {
      log.warn({ entity: alert.entityDisplayName, reason }, 'Email alerts disabled, skipping delivery');
      return ok({ status: 'disabled', reason });
    }

    try {
      const to = this.email.recipients.join(', ');
      await this.getTransporter().sendMail({
        from: this.email.sender,
        to,
        subject: alertSubject(alert),
        text: alertText(alert),
        html: alertHtml(alert),
      });
      log.info({ entity: alert.entityDisplayName, to }, 'Alert email sent');
      return ok({ status: 'delivered' });
    } catch (error) {
      return err(new DeliveryError(`SMTP delivery failed: ${describeError(error)}`, { cause: error }));
    }
  }

  private disabledReason(): string | null {
    if (!this.smtp.server) return 'smtp.server is not set';
    if (this.email.recipients.length === 0) return 'email.recipients is empty';
    return null;
  }

  private getTransporter(): Transporter {
    if (!this.transporter) {
      const { server, port, useTls, username, password } = this.smtp;
      this.transporter = createTransport({
        host: server,
        port,
        secure: port === 465,
        requireTLS: useTls && port !== 465,
        ignoreTLS: !useTls,
        ...(username && password ? { auth: { user: username, pass: password } } : {}),
      });
    }
    return this.transporter;
  }
}
