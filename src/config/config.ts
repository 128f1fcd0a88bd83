/**
 * statuswatch — Configuration Management
 *
 * Loads the JSON config file, merges it over defaults, applies environment
 * overrides for credentials and validates the result.
 *
 * @module config
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { type Config, type Entity, type Result, ConfigSchema, ok, err } from '../types/index.js';
import { normalizeColor } from '../monitor/status-classifier.js';

// ═══════════════════════════════════════════════════════════════════════════
// DEFAULT CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════

export const DEFAULT_CONFIG_PATH = 'config.json';

/** Everything except the dashboard address, credentials and server list. */
export const DEFAULT_CONFIG = {
  prtg: {
    loginTimeoutMs: 15_000,
    settleDelayMs: 3_000,
    navigationTimeoutMs: 30_000,
    ignoreHttpsErrors: true,
  },
  monitoring: {
    checkIntervalSeconds: 60,
    errorColor: '#e30613',
    warningColor: '#ffcb05',
    normalColor: '#b4cc38',
  },
  smtp: {
    port: 587,
    useTls: true,
  },
  email: {
    sender: '',
    recipients: [],
  },
  logging: {
    level: 'info',
  },
} satisfies Record<string, Record<string, unknown>>;

// ═══════════════════════════════════════════════════════════════════════════
// PATH UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

export function expandPath(inputPath: string): string {
  if (inputPath.startsWith('~/')) {
    return path.join(os.homedir(), inputPath.slice(2));
  }
  if (inputPath === '~') {
    return os.homedir();
  }
  return inputPath;
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION LOADING
// ═══════════════════════════════════════════════════════════════════════════

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = target[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Credentials may come from the environment so they stay out of the file.
 */
export function applyEnvOverrides(raw: Record<string, unknown>, env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};

  const prtg: Record<string, unknown> = {};
  if (env.PRTG_USERNAME) prtg.username = env.PRTG_USERNAME;
  if (env.PRTG_PASSWORD) prtg.password = env.PRTG_PASSWORD;
  if (Object.keys(prtg).length > 0) overrides.prtg = prtg;

  if (env.SMTP_PASSWORD) overrides.smtp = { password: env.SMTP_PASSWORD };
  if (env.STATUSWATCH_LOG_LEVEL) overrides.logging = { level: env.STATUSWATCH_LOG_LEVEL };

  return deepMerge(raw, overrides);
}

/**
 * Validate an already-parsed config object (defaults + env applied).
 */
export function parseConfig(userConfig: unknown, env: NodeJS.ProcessEnv = process.env): Result<Config, Error> {
  if (!isRecord(userConfig)) {
    return err(new Error('Invalid configuration: expected a JSON object'));
  }

  const merged = applyEnvOverrides(deepMerge(DEFAULT_CONFIG, userConfig), env);
  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    return err(new Error(`Invalid configuration: ${result.error.message}`));
  }

  const config = result.data;
  config.prtg.baseUrl = config.prtg.baseUrl.replace(/\/+$/, '');
  config.monitoring.errorColor = normalizeColor(config.monitoring.errorColor);
  config.monitoring.warningColor = normalizeColor(config.monitoring.warningColor);
  config.monitoring.normalColor = normalizeColor(config.monitoring.normalColor);

  return ok(config);
}

/**
 * Load configuration from file. A missing file is an error: there is no
 * usable default for the dashboard address or the server list.
 */
export function loadConfig(customPath?: string, env: NodeJS.ProcessEnv = process.env): Result<Config, Error> {
  const expandedPath = path.resolve(expandPath(customPath ?? DEFAULT_CONFIG_PATH));

  try {
    if (!fs.existsSync(expandedPath)) {
      return err(new Error(`Config file not found: ${expandedPath}`));
    }

    const content = fs.readFileSync(expandedPath, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    return parseConfig(parsed, env);
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// DERIVED VALUES
// ═══════════════════════════════════════════════════════════════════════════

export function toEntities(config: Config): Entity[] {
  return config.servers.map((server) => {
    const ref = String(server.mapId);
    return { id: ref, displayName: server.name, dashboardRef: ref };
  });
}

export function getIntervalMs(config: Config): number {
  return Math.round(config.monitoring.checkIntervalSeconds * 1000);
}
