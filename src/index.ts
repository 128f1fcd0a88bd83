/**
 * statuswatch — public API
 *
 * @module statuswatch
 */

export * from './types/index.js';
export * from './monitor/index.js';
export { EventBus, type EventMap } from './kernel/event-bus.js';
export {
  loadConfig,
  parseConfig,
  applyEnvOverrides,
  deepMerge,
  expandPath,
  toEntities,
  getIntervalMs,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_PATH,
} from './config/config.js';
export { createLogger, setLogLevel, redact, formatError } from './utils/logger.js';
export {
  PrtgGateway,
  PrtgSession,
  mapOnlyUrl,
  mapShowUrl,
  isLoggedIn,
  SELECTORS,
  LOGIN_PATH,
  type BrowserLauncher,
} from './integrations/browser/prtg-gateway.js';
export {
  launchChromium,
  wrapBrowser,
  wrapPage,
  type BrowserDriver,
  type MapPage,
} from './integrations/browser/playwright-driver.js';
export { SmtpAlertSink } from './integrations/email/smtp-alert-sink.js';
export { alertSubject, alertText, alertHtml } from './integrations/email/alert-template.js';
export { createProgram } from './cli/index.js';
