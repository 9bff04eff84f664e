import { chromium, type Browser } from 'playwright';

import { PlaywrightPageFetcher } from './crawler/pageFetcher';
import type { PageFetcher } from './crawler/types';
import { SessionError, errorMessage } from './errors';
import type { Logger } from './logger';

export type CrawlSession = {
  fetcher: PageFetcher;
  close(): Promise<void>;
};

export type SessionOptions = {
  headless: boolean;
  fetchTimeoutMs: number;
};

const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122 Safari/537.36';

export async function openBrowserSession(opts: SessionOptions, logger: Logger): Promise<CrawlSession> {
  let browser: Browser | undefined;
  try {
    browser = await chromium.launch({ headless: opts.headless });
    const context = await browser.newContext({ locale: 'en-US', userAgent: USER_AGENT });
    const page = await context.newPage();

    // Image cells are read from their src attribute; the bytes are never needed.
    await page.route('**/*', (route) => {
      const t = route.request().resourceType();
      if (['image', 'media', 'font'].includes(t)) return route.abort();
      return route.continue();
    });

    const opened = browser;
    logger.info('Browser session ready.', { headless: opts.headless });
    return {
      fetcher: new PlaywrightPageFetcher(page, opts.fetchTimeoutMs, logger.child('fetch')),
      close: async () => {
        await opened.close();
        logger.info('Browser closed.');
      },
    };
  } catch (err) {
    if (browser) {
      await browser.close().catch((closeErr: unknown) =>
        logger.warn('Browser close after failed start also failed', { error: errorMessage(closeErr) })
      );
    }
    throw new SessionError(errorMessage(err), { cause: err });
  }
}
