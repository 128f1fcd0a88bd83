import type { Alert } from '../../types/index.js';
import { escapeHtml, formatTimestamp } from '../../utils/format.js';

const ALERT_RED = '#e30613';

export function alertSubject(alert: Alert): string {
  return `[ALERT] Dashboard error - ${alert.entityDisplayName}`;
}

export function alertText(alert: Alert): string {
  return [
    'Dashboard error detected',
    '',
    `Entity:     ${alert.entityDisplayName}`,
    `Dashboard:  ${alert.dashboardURL}`,
    `Detected:   ${formatTimestamp(alert.firedAt)}`,
    `Status:     ${alert.statusLabel}`,
    '',
    'Log in to the dashboard and check the affected entity.',
    '',
    '--',
    'Sent automatically by statuswatch',
    '',
  ].join('\n');
}

export function alertHtml(alert: Alert): string {
  const name = escapeHtml(alert.entityDisplayName);
  const url = escapeHtml(alert.dashboardURL);
  const status = escapeHtml(alert.statusLabel);
  const detected = escapeHtml(formatTimestamp(alert.firedAt));
  const cell = 'padding: 10px; border-bottom: 1px solid #eee;';

  return `<!DOCTYPE html>
<html>
<head><meta charset="utf-8"></head>
<body style="font-family: Arial, sans-serif; padding: 20px; background-color: #f5f5f5;">
  <div style="max-width: 600px; margin: 0 auto; background-color: #fff; border-radius: 10px; overflow: hidden;">
    <div style="background-color: ${ALERT_RED}; color: #fff; padding: 20px; text-align: center;">
      <h1 style="margin: 0;">Dashboard error</h1>
    </div>
    <table style="width: 100%; border-collapse: collapse; margin: 20px 0;">
      <tr><td style="${cell} font-weight: bold; width: 120px;">Entity</td><td style="${cell} color: ${ALERT_RED}; font-weight: bold;">${name}</td></tr>
      <tr><td style="${cell} font-weight: bold;">Dashboard</td><td style="${cell}"><a href="${url}">${url}</a></td></tr>
      <tr><td style="${cell} font-weight: bold;">Detected</td><td style="${cell}">${detected}</td></tr>
      <tr><td style="${cell} font-weight: bold;">Status</td><td style="${cell}"><span style="background-color: ${ALERT_RED}; color: #fff; padding: 3px 10px; border-radius: 3px;">${status}</span></td></tr>
    </table>
    <div style="background-color: #f8f9fa; padding: 15px; text-align: center; font-size: 12px; color: #666;">
      Sent automatically by statuswatch
    </div>
  </div>
</body>
</html>
`;
}
