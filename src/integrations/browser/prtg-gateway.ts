/**
 * PRTG GATEWAY — authenticated headless-browser session for map dashboards
 *
 * Logs in through the PRTG login form once, then opens each map's
 * `maponly.htm` page (no iframes) and extracts the text of every sensor
 * indicator plus the background colors of the map objects.
 *
 * One page, one caller at a time: the monitor loop serializes fetches.
 */

import { ok, err, type DashboardConfig, type Result, type StatusFragment } from '../../types/index.js';
import type { Session, SessionGateway } from '../../monitor/contracts.js';
import { AuthError, FetchError, describeError } from '../../monitor/errors.js';
import { createLogger, formatError } from '../../utils/logger.js';
import { launchChromium, type BrowserDriver, type MapPage } from './playwright-driver.js';

const log = createLogger('prtg-gateway');

// ─── Selectors ──────────────────────────────────────────────────────────────

export const LOGIN_PATH = '/public/login.htm';
export const SELECTORS = {
  username: '#loginusername',
  password: '#loginpassword',
  submit: 'button.loginbutton',
  error: '.sensr',
  warning: '.sensy',
  ok: '.sensg',
  swatch: '.map_object',
} as const;

export function mapOnlyUrl(baseUrl: string, dashboardRef: string): string {
  return `${baseUrl}/controls/maponly.htm?id=${encodeURIComponent(dashboardRef)}`;
}

export function mapShowUrl(baseUrl: string, dashboardRef: string): string {
  return `${baseUrl}/mapshow.htm?id=${encodeURIComponent(dashboardRef)}`;
}

/** Still on the login page after submitting means the credentials were rejected. */
export function isLoggedIn(currentUrl: string): boolean {
  return !currentUrl.toLowerCase().includes('login');
}

export type BrowserLauncher = (config: DashboardConfig) => Promise<BrowserDriver>;

// ─── Gateway ────────────────────────────────────────────────────────────────

export class PrtgGateway implements SessionGateway {
  private readonly config: DashboardConfig;
  private readonly launch: BrowserLauncher;
  /** Pending or finished browser launch; shared by every login. */
  private launching: Promise<BrowserDriver> | null = null;
  private closed = false;

  constructor(params: { config: DashboardConfig; launch?: BrowserLauncher }) {
    this.config = params.config;
    this.launch = params.launch ?? launchChromium;
  }

  async authenticate(): Promise<Result<Session, AuthError>> {
    if (this.closed) {
      return err(new AuthError('Gateway is closed'));
    }

    const loginUrl = `${this.config.baseUrl}${LOGIN_PATH}`;
    log.info({ baseUrl: this.config.baseUrl }, 'Logging in to dashboard');

    let driver: BrowserDriver;
    try {
      if (!this.launching) {
        this.launching = this.launch(this.config);
      }
      driver = await this.launching;
    } catch (error) {
      this.launching = null;
      return err(new AuthError(`Browser could not be started: ${describeError(error)}`, { cause: error }));
    }

    // close() ran while the browser was starting; it owns the driver now
    if (this.closed) {
      return err(new AuthError('Gateway closed while the browser was starting'));
    }

    let page: MapPage;
    try {
      page = await driver.openPage();
    } catch (error) {
      return err(new AuthError(`Browser could not be started: ${describeError(error)}`, { cause: error }));
    }

    try {
      await page.goto(loginUrl, this.config.navigationTimeoutMs);
      await page.waitForSelector(SELECTORS.username, this.config.loginTimeoutMs);

      await page.fill(SELECTORS.username, this.config.username);
      await page.fill(SELECTORS.password, this.config.password);
      await page.submit(SELECTORS.submit, this.config.loginTimeoutMs);
      await page.pause(this.config.settleDelayMs);
    } catch (error) {
      return err(new AuthError(`Login page unreachable: ${describeError(error)}`, { cause: error }));
    }

    if (!isLoggedIn(page.url())) {
      return err(new AuthError('Login rejected, check username and password'));
    }

    log.info('Login succeeded');
    return ok(new PrtgSession(page, this.config));
  }

  /**
   * Shut the browser down, waiting for a launch still in progress so the
   * browser it produces is closed too. Later logins are refused.
   */
  async close(): Promise<void> {
    this.closed = true;
    const launching = this.launching;
    this.launching = null;
    if (!launching) return;

    let driver: BrowserDriver;
    try {
      driver = await launching;
    } catch (error) {
      log.debug({ err: formatError(error) }, 'Browser never started, nothing to close');
      return;
    }
    await driver.close();
    log.info('Browser closed');
  }
}

// ─── Session ────────────────────────────────────────────────────────────────

export class PrtgSession implements Session {
  constructor(
    private readonly page: MapPage,
    private readonly config: DashboardConfig,
  ) {}

  dashboardUrl(dashboardRef: string): string {
    return mapShowUrl(this.config.baseUrl, dashboardRef);
  }

  async fetchEntityFragment(dashboardRef: string): Promise<Result<StatusFragment, FetchError>> {
    const url = mapOnlyUrl(this.config.baseUrl, dashboardRef);

    try {
      await this.page.goto(url, this.config.navigationTimeoutMs);
      await this.page.pause(this.config.settleDelayMs);

      if (!isLoggedIn(this.page.url())) {
        return err(new FetchError(`Session expired while opening map ${dashboardRef}`));
      }

      const errorIndicators = await this.page.texts(SELECTORS.error);
      const warningIndicators = await this.page.texts(SELECTORS.warning);
      const okIndicators = await this.page.texts(SELECTORS.ok);
      const swatchColors = await this.page.backgroundColors(SELECTORS.swatch);

      log.debug(
        { dashboardRef, errors: errorIndicators.length, warnings: warningIndicators.length, ok: okIndicators.length },
        'Map fragment extracted',
      );
      return ok({ errorIndicators, warningIndicators, okIndicators, swatchColors });
    } catch (error) {
      return err(new FetchError(`Could not read map ${dashboardRef}: ${describeError(error)}`, { cause: error }));
    }
  }
}
