import { errorMessage } from '../errors';
import type { Logger } from '../logger';
import { silentLogger } from '../logger';

import { normalizeUrl } from './identity';
import { RetriesExhausted, withRetry, type RetryPolicy } from './retry';
import { collapseWhitespace } from './text';
import type { DocumentSnapshot, ListingError, ListingPage, PageFetcher } from './types';

export type ListingSelectors = {
  listingContainer: string;
  listingReady: string;
  detailLinkText: string;
  nextPage: string;
};

export type ListingWalkerOptions = {
  startUrl: string;
  launchSelector?: string;
  maxPages: number;
  selectors: ListingSelectors;
  retry: RetryPolicy;
};

export type ListingWalkerHooks = {
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  onError?: (error: ListingError) => void;
};

const sameHost = (a: string, b: string) => new URL(a).host === new URL(b).host;

/**
 * Detail links on one result page: anchors under the listing container whose
 * text reads like the detail link. Anything unusable is skipped.
 */
export function extractDetailUrls(
  document: Document,
  pageUrl: string,
  selectors: Pick<ListingSelectors, 'listingContainer' | 'detailLinkText'>,
  logger: Logger = silentLogger
): string[] {
  const urls: string[] = [];
  const wanted = collapseWhitespace(selectors.detailLinkText);

  for (const container of Array.from(document.querySelectorAll(selectors.listingContainer))) {
    for (const a of Array.from(container.querySelectorAll('a'))) {
      if (collapseWhitespace(a.textContent ?? '') !== wanted) continue;

      const href = a.getAttribute('href');
      const url = href ? normalizeUrl(href, pageUrl) : null;
      if (!url || !sameHost(url, pageUrl)) {
        logger.debug('Skipping unusable detail link', { pageUrl, href });
        continue;
      }
      if (!urls.includes(url)) urls.push(url);
    }
  }

  return urls;
}

export function findNextPageUrl(document: Document, pageUrl: string, nextSelector: string) {
  const control = document.querySelector(nextSelector);
  if (!control) return null;
  const href = control.getAttribute('href') ?? control.querySelector('a[href]')?.getAttribute('href');
  return href ? normalizeUrl(href, pageUrl) : null;
}

/**
 * Walks result pages by following the next-page control. Every call to
 * `pages()` starts a new walk from the first page.
 */
export class ListingWalker {
  private readonly logger: Logger;

  constructor(
    private readonly fetcher: PageFetcher,
    private readonly opts: ListingWalkerOptions,
    private readonly hooks: ListingWalkerHooks = {}
  ) {
    this.logger = hooks.logger ?? silentLogger;
  }

  async *pages(): AsyncGenerator<ListingPage> {
    const { selectors, maxPages } = this.opts;
    const walked = new Set<string>();
    const seenDetails = new Set<string>();
    let nextUrl: string | null = this.opts.startUrl;
    let submit = this.opts.launchSelector;

    for (let index = 1; nextUrl; index++) {
      if (index > maxPages) {
        this.logger.warn(`Reached max pages (${maxPages}), stopping pagination.`, { nextUrl });
        return;
      }

      const url: string = nextUrl;
      const launch = submit;
      let snapshot: DocumentSnapshot;
      try {
        ({ value: snapshot } = await withRetry(
          () => this.fetcher.fetch(url, { ready: { selector: selectors.listingReady }, submit: launch }),
          this.opts.retry,
          {
            sleep: this.hooks.sleep,
            onRetry: ({ attempt, delayMs, error }) =>
              this.logger.warn(`Listing page ${index} attempt ${attempt} failed, retrying in ${delayMs}ms`, {
                url,
                error: errorMessage(error),
              }),
          }
        ));
      } catch (err) {
        if (!(err instanceof RetriesExhausted)) throw err;
        this.logger.error(`Listing page ${index} could not be loaded, ending walk.`, { url, error: err.message });
        this.hooks.onError?.({ pageIndex: index, url, message: err.message });
        return;
      }

      const pageUrl = normalizeUrl(snapshot.url) ?? snapshot.url;
      walked.add(pageUrl);
      walked.add(normalizeUrl(url) ?? url);

      const detailUrls = extractDetailUrls(snapshot.document, snapshot.url, selectors, this.logger).filter(
        (u) => !seenDetails.has(u)
      );
      for (const u of detailUrls) seenDetails.add(u);

      this.logger.info(`Listing page ${index}: ${detailUrls.length} detail link(s).`, { url: pageUrl });
      yield { index, url: pageUrl, detailUrls };

      nextUrl = findNextPageUrl(snapshot.document, snapshot.url, selectors.nextPage);
      if (nextUrl && walked.has(nextUrl)) {
        this.logger.warn('Next-page control points at a page already walked, stopping.', { nextUrl });
        return;
      }
      submit = undefined;
    }
  }
}
