import type { BrowserContext, ElementHandle, Page } from 'playwright';
import { createStealthContext } from '../core/browser.js';

/** A matched DOM element, reduced to what post extraction reads. */
export interface PostElement {
  innerText(): Promise<string>;
  getAttribute(name: string): Promise<string | null>;
  query(selector: string): Promise<PostElement | null>;
  isVisible(): Promise<boolean>;
  click(): Promise<void>;
}

/** The page operations the ingestion loop needs from a browser session. */
export interface FeedDriver {
  url(): string;
  goto(url: string): Promise<void>;
  waitForSelector(selector: string): Promise<void>;
  fill(selector: string, value: string): Promise<void>;
  click(selector: string): Promise<void>;
  queryAll(selector: string): Promise<PostElement[]>;
  scrollByViewport(): Promise<void>;
  screenshot(filePath: string): Promise<void>;
}

export interface DriverSession {
  driver: FeedDriver;
  close(): Promise<void>;
}

export type SessionFactory = () => Promise<DriverSession>;

class PlaywrightElement implements PostElement {
  constructor(private handle: ElementHandle<SVGElement | HTMLElement>) {}

  innerText(): Promise<string> {
    return this.handle.innerText();
  }

  getAttribute(name: string): Promise<string | null> {
    return this.handle.getAttribute(name);
  }

  async query(selector: string): Promise<PostElement | null> {
    const child = await this.handle.$(selector);
    return child ? new PlaywrightElement(child) : null;
  }

  isVisible(): Promise<boolean> {
    return this.handle.isVisible();
  }

  click(): Promise<void> {
    return this.handle.click();
  }
}

export class PlaywrightDriver implements FeedDriver {
  constructor(private page: Page) {}

  url(): string {
    return this.page.url();
  }

  async goto(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: 'domcontentloaded' });
  }

  async waitForSelector(selector: string): Promise<void> {
    await this.page.waitForSelector(selector, { state: 'visible' });
  }

  fill(selector: string, value: string): Promise<void> {
    return this.page.fill(selector, value);
  }

  click(selector: string): Promise<void> {
    return this.page.click(selector);
  }

  async queryAll(selector: string): Promise<PostElement[]> {
    const handles = await this.page.$$(selector);
    return handles.map(handle => new PlaywrightElement(handle));
  }

  async scrollByViewport(): Promise<void> {
    await this.page.evaluate(() => window.scrollBy(0, window.innerHeight));
  }

  async screenshot(filePath: string): Promise<void> {
    await this.page.screenshot({ path: filePath, fullPage: true });
  }
}

/** One fresh browser context and page per query run. */
export function playwrightSessions(options: { headless?: boolean; timeoutMs: number }): SessionFactory {
  return async () => {
    const context: BrowserContext = await createStealthContext(options);
    const page = await context.newPage();
    return {
      driver: new PlaywrightDriver(page),
      close: async () => {
        await page.close().catch(() => {});
        await context.close().catch(() => {});
      },
    };
  };
}
