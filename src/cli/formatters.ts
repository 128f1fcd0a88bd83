import type { EventBus, EventMap } from '../kernel/event-bus.js';
import type { Severity } from '../types/index.js';
import { formatClock } from '../utils/format.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CONSOLE FORMATTERS
// ═══════════════════════════════════════════════════════════════════════════════

const COLORS = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
};

function color(text: string, c: keyof typeof COLORS): string {
  return `${COLORS[c]}${text}${COLORS.reset}`;
}

const SEVERITY_STYLE: Record<Severity, { label: string; color: keyof typeof COLORS }> = {
  error: { label: 'ERROR', color: 'red' },
  warning: { label: 'WARNING', color: 'yellow' },
  normal: { label: 'OK', color: 'green' },
  unknown: { label: 'UNKNOWN', color: 'dim' },
};

const ALERT_NOTE: Record<EventMap['monitor:entity_checked']['alert'], string> = {
  none: '',
  suppressed: ' (alert already sent)',
  delivered: ' (alert sent)',
  disabled: ' (alerts disabled)',
  failed: ' (alert FAILED)',
};

export function formatEntityLine(event: EventMap['monitor:entity_checked']): string {
  const style = SEVERITY_STYLE[event.severity];
  return color(`[${event.displayName}] ${style.label} - ${event.summary}${ALERT_NOTE[event.alert]}`, style.color);
}

export function formatCycleHeader(event: EventMap['monitor:cycle_started']): string {
  return `\n--- Cycle ${event.cycle} (${formatClock(event.startedAt)}) ---`;
}

export function formatCycleFooter(event: EventMap['monitor:cycle_complete']): string {
  const parts = [`${event.checked} checked`, `${event.alerts} alerts`];
  if (event.unknown > 0) parts.push(`${event.unknown} failed`);
  return color(`Cycle ${event.cycle} done: ${parts.join(', ')} in ${event.duration}ms`, 'dim');
}

export function formatBanner(entities: ReadonlyArray<{ displayName: string; dashboardRef: string }>, intervalMs: number): string {
  const rule = '='.repeat(50);
  const lines = [
    '',
    rule,
    color('statuswatch - dashboard monitor', 'bold'),
    rule,
    `Interval: ${intervalMs / 1000}s`,
    'Targets:',
    ...entities.map((entity) => `  - ${entity.displayName} (map ${entity.dashboardRef})`),
    rule,
  ];
  return lines.join('\n');
}

/**
 * Print monitor progress to a stream. Returns a detach function.
 */
export function attachConsoleReporter(eventBus: EventBus, write: (line: string) => void): () => void {
  const unsubscribers = [
    eventBus.on('monitor:cycle_started', (event) => write(formatCycleHeader(event))),
    eventBus.on('monitor:entity_checked', (event) => write(formatEntityLine(event))),
    eventBus.on('monitor:cycle_complete', (event) => write(formatCycleFooter(event))),
  ];
  return () => {
    for (const unsubscribe of unsubscribers) unsubscribe();
  };
}
