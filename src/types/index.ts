/**
 * statuswatch — Core Type Definitions
 *
 * Schemas and types shared by the monitor, its collaborators and the CLI.
 * Uses Zod for runtime validation with TypeScript inference.
 *
 * @module types
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════
// ENUMS & CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

export const SeveritySchema = z.enum(['normal', 'warning', 'error', 'unknown']);
export type Severity = z.infer<typeof SeveritySchema>;

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const CHECK_FAILED_SUMMARY = 'check failed';

// ═══════════════════════════════════════════════════════════════════════════
// ENTITIES
// ═══════════════════════════════════════════════════════════════════════════

export interface Entity {
  /** Stable identifier used as the state store key */
  readonly id: string;
  readonly displayName: string;
  /** Opaque locator handed to the session gateway */
  readonly dashboardRef: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// STATUS FRAGMENTS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * What the gateway extracted from one dashboard page: the text of every
 * indicator element per severity class, and any raw color swatches.
 */
export const StatusFragmentSchema = z.object({
  errorIndicators: z.array(z.string()),
  warningIndicators: z.array(z.string()),
  okIndicators: z.array(z.string()),
  swatchColors: z.array(z.string()).default([]),
});
export type StatusFragment = z.input<typeof StatusFragmentSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// VERDICTS & ALERTS
// ═══════════════════════════════════════════════════════════════════════════

export interface Verdict {
  severity: Severity;
  errorCount: number;
  warningCount: number;
  okCount: number;
  summary: string;
  observedAt: Date;
}

export interface Alert {
  entityDisplayName: string;
  dashboardURL: string;
  statusLabel: string;
  firedAt: Date;
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════

export const DashboardConfigSchema = z.object({
  baseUrl: z.string().url(),
  username: z.string(),
  password: z.string(),
  loginTimeoutMs: z.number().int().positive(),
  settleDelayMs: z.number().int().nonnegative(),
  navigationTimeoutMs: z.number().int().positive(),
  ignoreHttpsErrors: z.boolean(),
  executablePath: z.string().optional(),
});
export type DashboardConfig = z.infer<typeof DashboardConfigSchema>;

export const MonitoringConfigSchema = z.object({
  checkIntervalSeconds: z.number().positive(),
  errorColor: z.string(),
  warningColor: z.string(),
  normalColor: z.string(),
});
export type MonitoringConfig = z.infer<typeof MonitoringConfigSchema>;

export const ServerConfigSchema = z.object({
  name: z.string().min(1),
  mapId: z.union([z.number().int(), z.string().min(1)]),
});
export type ServerConfig = z.infer<typeof ServerConfigSchema>;

export const SmtpConfigSchema = z.object({
  server: z.string().optional(),
  port: z.number().int().min(1).max(65535),
  useTls: z.boolean(),
  username: z.string().optional(),
  password: z.string().optional(),
});
export type SmtpConfig = z.infer<typeof SmtpConfigSchema>;

export const EmailConfigSchema = z.object({
  sender: z.string(),
  recipients: z.array(z.string()),
});
export type EmailConfig = z.infer<typeof EmailConfigSchema>;

export const ConfigSchema = z
  .object({
    prtg: DashboardConfigSchema,
    monitoring: MonitoringConfigSchema,
    servers: z.array(ServerConfigSchema).min(1),
    smtp: SmtpConfigSchema,
    email: EmailConfigSchema,
    logging: z.object({ level: LogLevelSchema }),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.servers.forEach((server, index) => {
      const id = String(server.mapId);
      if (seen.has(id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['servers', index, 'mapId'],
          message: `Duplicate mapId: ${id}`,
        });
      }
      seen.add(id);
    });
  });
export type Config = z.infer<typeof ConfigSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// RESULT TYPE (Functional Error Handling)
// ═══════════════════════════════════════════════════════════════════════════

export type Result<T, E = Error> = { success: true; data: T } | { success: false; error: E };

export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

export function err<E>(error: E): Result<never, E> {
  return { success: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is { success: true; data: T } {
  return result.success;
}

export function isErr<T, E>(result: Result<T, E>): result is { success: false; error: E } {
  return !result.success;
}
