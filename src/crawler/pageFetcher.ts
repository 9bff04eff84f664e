import { errors, type Page } from 'playwright';

import { FetchError, FetchTimeout, SessionError, errorMessage } from '../errors';
import type { Logger } from '../logger';
import { silentLogger } from '../logger';

import { toSnapshot } from './snapshot';
import type { DocumentSnapshot, FetchOptions, PageFetcher } from './types';

/**
 * Fetches pages through the one Playwright page it owns. Callers must not
 * overlap: a second fetch while one is in flight is rejected.
 */
export class PlaywrightPageFetcher implements PageFetcher {
  private busy = false;

  constructor(
    private readonly page: Page,
    private readonly timeoutMs: number,
    private readonly logger: Logger = silentLogger
  ) {}

  async fetch(url: string, opts: FetchOptions): Promise<DocumentSnapshot> {
    if (this.page.isClosed()) throw new SessionError('browser page was closed');
    if (this.busy) throw new FetchError(url, 'session busy');
    this.busy = true;

    try {
      await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.timeoutMs });

      if (opts.submit) {
        this.logger.debug('Clicking launch control', { url, selector: opts.submit });
        await this.page.locator(opts.submit).first().click({ timeout: this.timeoutMs });
      }

      await this.waitUntilReady(opts);

      const html = await this.page.content();
      return toSnapshot(html, this.page.url(), url);
    } catch (err) {
      if (err instanceof errors.TimeoutError) {
        throw new FetchTimeout(url, this.timeoutMs, { cause: err });
      }
      if (this.page.isClosed()) throw new SessionError('browser page was closed', { cause: err });
      throw new FetchError(url, errorMessage(err), { cause: err });
    } finally {
      this.busy = false;
    }
  }

  private async waitUntilReady({ ready }: FetchOptions) {
    // Locators keep waiting across the navigation a launch click triggers.
    await this.page
      .locator(ready.selector)
      .first()
      .waitFor({ state: 'attached', timeout: this.timeoutMs });
  }
}
