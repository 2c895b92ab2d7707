import { chromium, Browser, BrowserContext, BrowserContextOptions } from 'playwright';
import { config } from '../config.js';
import { logger } from './logger.js';

let browserInstance: Browser | null = null;
let isClosing = false;

// Launch browser with stealth settings
export async function getBrowser(options: { headless?: boolean } = {}): Promise<Browser> {
  if (browserInstance && browserInstance.isConnected()) {
    return browserInstance;
  }

  if (isClosing) {
    throw new Error('Browser is currently closing, cannot launch new instance');
  }

  const headless = options.headless ?? config.browser.headless;
  logger.info(`Launching browser (headless: ${headless})`);

  try {
    browserInstance = await chromium.launch({
      headless,
      slowMo: config.browser.slowMo || 0,
      args: [
        '--disable-blink-features=AutomationControlled',
        '--disable-dev-shm-usage',
        '--window-size=1280,800',
      ],
    });

    browserInstance.on('disconnected', () => {
      logger.warn('Browser disconnected');
      browserInstance = null;
    });

    return browserInstance;
  } catch (error) {
    logger.error('Failed to launch browser', { error });
    throw error;
  }
}

// Create a stealth context
export async function createStealthContext(options: {
  headless?: boolean;
  timeoutMs: number;
}): Promise<BrowserContext> {
  const browser = await getBrowser({ headless: options.headless });

  // Random user agent
  const userAgents = [
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  ];
  const userAgent = userAgents[Math.floor(Math.random() * userAgents.length)];
  const platformValue = userAgent.includes('Windows') ? 'Win32' : 'MacIntel';

  const contextOptions: BrowserContextOptions = {
    viewport: { width: 1280, height: 800 },
    userAgent,
    locale: 'en-US',
    colorScheme: 'light',
  };

  const context = await browser.newContext(contextOptions);
  context.setDefaultTimeout(options.timeoutMs);
  context.setDefaultNavigationTimeout(options.timeoutMs);

  // Add stealth scripts to every page
  await context.addInitScript(
    ({ platformValue }) => {
      Object.defineProperty(navigator, 'webdriver', {
        get: () => undefined,
      });

      Object.defineProperty(navigator, 'languages', {
        get: () => ['en-US', 'en'],
      });

      Object.defineProperty(navigator, 'platform', {
        get: () => platformValue,
      });
    },
    { platformValue }
  );

  return context;
}

// Close browser
export async function closeBrowser(): Promise<void> {
  if (browserInstance) {
    isClosing = true;
    try {
      await browserInstance.close();
      logger.info('Browser closed');
    } catch (error) {
      logger.error('Error closing browser', { error });
    } finally {
      browserInstance = null;
      isClosing = false;
    }
  }
}
