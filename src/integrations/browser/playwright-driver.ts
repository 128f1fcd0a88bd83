/**
 * Thin playwright-core adapter. The gateway talks to `MapPage` only, so the
 * browser can be swapped for a fake in tests.
 *
 * playwright-core ships no browser: point `prtg.executablePath` at a local
 * Chromium, or leave it unset to use an installed Playwright browser.
 */

import { chromium, type Browser, type Page } from 'playwright-core';
import type { DashboardConfig } from '../../types/index.js';

export interface MapPage {
  goto(url: string, timeoutMs: number): Promise<void>;
  waitForSelector(selector: string, timeoutMs: number): Promise<void>;
  fill(selector: string, value: string): Promise<void>;
  /** Click and wait for the resulting navigation to settle. */
  submit(selector: string, timeoutMs: number): Promise<void>;
  pause(ms: number): Promise<void>;
  url(): string;
  /** Text content of every element matching `selector`. */
  texts(selector: string): Promise<string[]>;
  /** Computed background color of every element matching `selector`. */
  backgroundColors(selector: string): Promise<string[]>;
}

export interface BrowserDriver {
  openPage(): Promise<MapPage>;
  close(): Promise<void>;
}

const LAUNCH_ARGS = ['--no-sandbox', '--disable-dev-shm-usage', '--disable-gpu', '--window-size=1920,1080'];

export function wrapPage(page: Page): MapPage {
  return {
    async goto(url, timeoutMs) {
      await page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs });
    },
    async waitForSelector(selector, timeoutMs) {
      await page.waitForSelector(selector, { timeout: timeoutMs });
    },
    async fill(selector, value) {
      await page.fill(selector, value);
    },
    async submit(selector, timeoutMs) {
      await Promise.all([
        page.waitForLoadState('domcontentloaded', { timeout: timeoutMs }),
        page.click(selector, { timeout: timeoutMs }),
      ]);
    },
    async pause(ms) {
      await page.waitForTimeout(ms);
    },
    url() {
      return page.url();
    },
    texts(selector) {
      return page.$$eval(selector, (elements) => elements.map((element) => element.textContent ?? ''));
    },
    backgroundColors(selector) {
      return page.$$eval(selector, (elements) =>
        elements.map((element) => getComputedStyle(element).backgroundColor),
      );
    },
  };
}

export function wrapBrowser(browser: Browser, config: Pick<DashboardConfig, 'ignoreHttpsErrors'>): BrowserDriver {
  return {
    async openPage() {
      const context = await browser.newContext({
        ignoreHTTPSErrors: config.ignoreHttpsErrors,
        viewport: { width: 1920, height: 1080 },
      });
      return wrapPage(await context.newPage());
    },
    async close() {
      await browser.close();
    },
  };
}

export async function launchChromium(config: DashboardConfig): Promise<BrowserDriver> {
  const browser = await chromium.launch({
    headless: true,
    args: LAUNCH_ARGS,
    ...(config.executablePath ? { executablePath: config.executablePath } : {}),
  });
  return wrapBrowser(browser, config);
}
