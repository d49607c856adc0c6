import type { Browser } from 'playwright-core';
import type { BrowserLaunchSettings } from '../config.js';
import type { BrowserSession, SessionOpener } from '../types/types.js';
import { chromium } from 'playwright-core';
import { DriverError } from './errors.js';

/**
 * The part of a Playwright `Locator` the session uses.
 */
export interface PageLocator {
  count(): Promise<number>;
  first(): PageLocator;
  fill(value: string): Promise<void>;
  click(): Promise<void>;
  getAttribute(name: string): Promise<string | null>;
}

/**
 * The part of a Playwright `Page` the session uses.
 */
export interface PageHandle {
  goto(url: string, options: { waitUntil: 'domcontentloaded' }): Promise<unknown>;
  locator(selector: string): PageLocator;
  waitForLoadState(state: 'domcontentloaded'): Promise<void>;
  url(): string;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Browser session on a single Chromium page. Every lookup is immediate:
 * an element that is not on the page right now counts as absent. Any
 * Playwright failure surfaces as DriverError.
 */
export class PlaywrightBrowserSession implements BrowserSession {
  private readonly page: PageHandle;
  private readonly release: () => Promise<void>;

  constructor(page: PageHandle, release: () => Promise<void>) {
    this.page = page;
    this.release = release;
  }

  public static async launch(settings: BrowserLaunchSettings): Promise<PlaywrightBrowserSession> {
    let browser: Browser;
    try {
      browser = await chromium.launch({
        headless: settings.headless,
        channel: settings.channel,
        executablePath: settings.executablePath,
        timeout: settings.timeoutMs,
      });
    }
    catch (error) {
      throw new DriverError(`Could not start the browser: ${messageOf(error)}`);
    }

    try {
      const page = await browser.newPage();
      page.setDefaultTimeout(settings.timeoutMs);
      return new PlaywrightBrowserSession(page, async () => await browser.close());
    }
    catch (error) {
      await browser.close();
      throw new DriverError(`Could not open a browser page: ${messageOf(error)}`);
    }
  }

  public async navigate(url: string): Promise<void> {
    await this.attempt(`Could not load ${url}`, async () => {
      await this.page.goto(url, { waitUntil: 'domcontentloaded' });
    });
  }

  public async hasElement(selector: string): Promise<boolean> {
    return await this.attempt(`Looking up ${selector} failed`, async () => {
      return (await this.page.locator(selector).count()) > 0;
    });
  }

  public async typeInto(selector: string, text: string): Promise<void> {
    await this.requireElement(selector);
    await this.attempt(`Typing into ${selector} failed`, async () => {
      await this.page.locator(selector).first().fill(text);
    });
  }

  public async click(selector: string): Promise<void> {
    await this.requireElement(selector);
    await this.attempt(`Clicking ${selector} failed`, async () => {
      await this.page.locator(selector).first().click();
      await this.page.waitForLoadState('domcontentloaded');
    });
  }

  public async readAttribute(selector: string, name: string): Promise<string | null> {
    await this.requireElement(selector);
    return await this.attempt(`Reading ${name} from ${selector} failed`, async () => {
      return await this.page.locator(selector).first().getAttribute(name);
    });
  }

  public async close(): Promise<void> {
    await this.release();
  }

  private async requireElement(selector: string): Promise<void> {
    if (!(await this.hasElement(selector))) {
      throw new DriverError(`No element matches ${selector} on ${this.page.url()}`);
    }
  }

  private async attempt<T>(failure: string, action: () => Promise<T>): Promise<T> {
    try {
      return await action();
    }
    catch (error) {
      if (error instanceof DriverError) {
        throw error;
      }
      throw new DriverError(`${failure}: ${messageOf(error)}`);
    }
  }
}

export function playwrightSessionOpener(settings: BrowserLaunchSettings): SessionOpener {
  return async () => await PlaywrightBrowserSession.launch(settings);
}

/**
 * Opens a session, hands it to `work` and closes it exactly once on every
 * exit path. A failure to close is logged, never thrown over `work`'s own
 * outcome.
 */
export async function withBrowserSession<T>(
  open: SessionOpener,
  work: (session: BrowserSession) => Promise<T>,
): Promise<T> {
  const session = await open();
  try {
    return await work(session);
  }
  finally {
    try {
      await session.close();
    }
    catch (error) {
      console.error('[RiceXPro] Failed to close the browser session', error);
    }
  }
}

export interface SessionTracker {
  open: SessionOpener;
  openCount(): number;
  closeAll(): Promise<void>;
}

/**
 * Wraps an opener so sessions still open at shutdown can be closed.
 * Sessions closed through `closeAll` are closed only once.
 */
export function trackSessions(open: SessionOpener): SessionTracker {
  const live = new Set<BrowserSession>();

  const closeOnce = async (session: BrowserSession): Promise<void> => {
    if (!live.delete(session)) {
      return;
    }
    await session.close();
  };

  return {
    open: async () => {
      const session = await open();
      live.add(session);
      const tracked: BrowserSession = {
        navigate: async url => await session.navigate(url),
        hasElement: async selector => await session.hasElement(selector),
        typeInto: async (selector, text) => await session.typeInto(selector, text),
        click: async selector => await session.click(selector),
        readAttribute: async (selector, name) => await session.readAttribute(selector, name),
        close: async () => await closeOnce(session),
      };
      return tracked;
    },
    openCount: () => live.size,
    closeAll: async () => {
      for (const session of [...live]) {
        try {
          await closeOnce(session);
        }
        catch (error) {
          console.error('[RiceXPro] Failed to close the browser session', error);
        }
      }
    },
  };
}
