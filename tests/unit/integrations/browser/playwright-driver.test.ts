import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';

vi.mock('playwright-core', () => ({
  chromium: { launch: vi.fn() },
}));

import { chromium } from 'playwright-core';
import { launchChromium } from '../../../../src/integrations/browser/playwright-driver.js';
import type { DashboardConfig } from '../../../../src/types/index.js';

const config: DashboardConfig = {
  baseUrl: 'https://prtg.example.test',
  username: 'monitor',
  password: 'test-secret',
  loginTimeoutMs: 1000,
  settleDelayMs: 0,
  navigationTimeoutMs: 2000,
  ignoreHttpsErrors: true,
};

describe('launchChromium', () => {
  let page: Record<string, Mock>;
  let context: { newPage: Mock };
  let browser: { newContext: Mock; close: Mock };

  beforeEach(() => {
    page = {
      goto: vi.fn().mockResolvedValue(null),
      waitForLoadState: vi.fn().mockResolvedValue(undefined),
      click: vi.fn().mockResolvedValue(undefined),
      url: vi.fn().mockReturnValue('https://prtg.example.test/welcome.htm'),
      $$eval: vi.fn().mockResolvedValue(['3']),
    };
    context = { newPage: vi.fn().mockResolvedValue(page) };
    browser = { newContext: vi.fn().mockResolvedValue(context), close: vi.fn().mockResolvedValue(undefined) };
    (chromium.launch as Mock).mockResolvedValue(browser);
  });

  it('launches headless with a custom executable', async () => {
    await launchChromium({ ...config, executablePath: '/usr/bin/chromium' });

    expect(chromium.launch).toHaveBeenCalledWith(
      expect.objectContaining({ headless: true, executablePath: '/usr/bin/chromium' }),
    );
  });

  it('opens pages in a context that honors the TLS setting', async () => {
    const driver = await launchChromium(config);

    await driver.openPage();

    expect(browser.newContext).toHaveBeenCalledWith({
      ignoreHTTPSErrors: true,
      viewport: { width: 1920, height: 1080 },
    });
  });

  it('maps page calls onto playwright', async () => {
    const driver = await launchChromium(config);
    const mapPage = await driver.openPage();

    await mapPage.goto('https://prtg.example.test/controls/maponly.htm?id=1', 2000);
    await mapPage.submit('button.loginbutton', 1000);
    const texts = await mapPage.texts('.sensr');

    expect(page.goto).toHaveBeenCalledWith('https://prtg.example.test/controls/maponly.htm?id=1', {
      waitUntil: 'domcontentloaded',
      timeout: 2000,
    });
    expect(page.click).toHaveBeenCalledWith('button.loginbutton', { timeout: 1000 });
    expect(texts).toEqual(['3']);
    expect(mapPage.url()).toBe('https://prtg.example.test/welcome.htm');
  });

  it('closes the browser', async () => {
    const driver = await launchChromium(config);

    await driver.close();

    expect(browser.close).toHaveBeenCalledTimes(1);
  });
});
