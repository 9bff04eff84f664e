import { errorMessage } from '../errors';
import type { Logger } from '../logger';
import { silentLogger } from '../logger';

import { identityKey } from './identity';
import { ListingWalker, type ListingWalkerOptions } from './listingWalker';
import { RetriesExhausted, withRetry, type RetryPolicy } from './retry';
import type {
  CrawlPhase,
  CrawlResult,
  CrawlState,
  CrawlSummary,
  DocumentSnapshot,
  ExtractionResult,
  PageFetcher,
  ReadinessCondition,
  ServiceRecord,
  SkippedPage,
} from './types';

export interface Extractor {
  extract(snapshot: DocumentSnapshot, url: string): ExtractionResult;
}

export type CrawlOptions = {
  listing: Omit<ListingWalkerOptions, 'retry'>;
  detailReady: ReadinessCondition;
  retry: RetryPolicy;
  idField?: string;
  maxRecords?: number;
};

export type CrawlDeps = {
  fetcher: PageFetcher;
  extractor: Extractor;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
};

export const createCrawlState = (): CrawlState => ({
  phase: 'init',
  visited: new Set(),
  records: new Map(),
  skipped: [],
  listingErrors: [],
  pagesWalked: 0,
  duplicates: 0,
});

export const summarize = (state: CrawlState): CrawlSummary => ({
  pagesWalked: state.pagesWalked,
  recordsExtracted: state.records.size,
  duplicates: state.duplicates,
  skipped: [...state.skipped],
  listingErrors: [...state.listingErrors],
});

/**
 * Drives one crawl: listing pages in order, each detail page fetched and
 * extracted in turn. Page-level failures end up in the summary; only
 * session-level errors escape `run()`.
 */
export class CrawlOrchestrator {
  private readonly logger: Logger;

  constructor(
    private readonly deps: CrawlDeps,
    private readonly opts: CrawlOptions
  ) {
    this.logger = deps.logger ?? silentLogger;
  }

  async run(): Promise<CrawlResult> {
    const state = createCrawlState();
    const walker = new ListingWalker(
      this.deps.fetcher,
      { ...this.opts.listing, retry: this.opts.retry },
      {
        logger: this.logger.child('listing'),
        sleep: this.deps.sleep,
        onError: (e) => state.listingErrors.push(e),
      }
    );

    this.transition(state, 'listing');
    walk: for await (const page of walker.pages()) {
      state.pagesWalked++;
      for (const url of page.detailUrls) {
        if (this.opts.maxRecords !== undefined && state.records.size >= this.opts.maxRecords) {
          this.logger.info(`Reached max records (${this.opts.maxRecords}), stopping.`);
          break walk;
        }
        if (state.visited.has(url)) {
          this.logger.debug('Already visited, skipping', { url });
          continue;
        }
        state.visited.add(url);
        await this.processDetail(state, page.index, url);
      }
      this.transition(state, 'listing');
    }

    this.transition(state, 'done');
    const summary = summarize(state);
    this.logger.info(
      `Crawl done: ${summary.pagesWalked} page(s), ${summary.recordsExtracted} record(s), ${summary.skipped.length} skipped.`
    );
    return { records: [...state.records.values()], summary };
  }

  private async processDetail(state: CrawlState, pageIndex: number, url: string) {
    // Pass 2 refetches once when the first render was missing required fields.
    for (let pass = 1; pass <= 2; pass++) {
      this.transition(state, 'fetching');
      let fetched: { value: DocumentSnapshot; attempts: number };
      try {
        fetched = await withRetry(
          () => this.deps.fetcher.fetch(url, { ready: this.opts.detailReady }),
          this.opts.retry,
          {
            sleep: this.deps.sleep,
            onRetry: ({ attempt, delayMs, error }) => {
              this.transition(state, 'retry');
              this.logger.warn(`Fetch attempt ${attempt} failed, retrying in ${delayMs}ms`, {
                url,
                error: errorMessage(error),
              });
            },
          }
        );
      } catch (err) {
        if (!(err instanceof RetriesExhausted)) throw err;
        this.skip(state, { url, stage: 'fetch', reason: errorMessage(err.lastError), attempts: err.attempts });
        return;
      }

      this.transition(state, 'extracting');
      const result = this.deps.extractor.extract(fetched.value, url);
      if (result.ok) {
        this.accumulate(state, url, result.record);
        this.logger.info(`Scraped page ${pageIndex}, service ${state.records.size}.`, { url });
        return;
      }

      const reason = `missing required fields: ${result.failure.missingFields.join(', ')}`;
      if (pass === 1) {
        this.transition(state, 'retry');
        this.logger.warn(`Extraction incomplete, refetching once (${reason})`, { url });
        continue;
      }
      this.skip(state, { url, stage: 'extract', reason, attempts: pass });
    }
  }

  private accumulate(state: CrawlState, url: string, record: ServiceRecord) {
    this.transition(state, 'accumulate');
    const key = identityKey(record, url, this.opts.idField);
    if (state.records.has(key)) {
      state.duplicates++;
      this.logger.debug('Duplicate identity key, keeping latest content', { key, url });
    }
    // Map#set on an existing key keeps its original position.
    state.records.set(key, record);
  }

  private skip(state: CrawlState, entry: SkippedPage) {
    this.transition(state, 'skip');
    state.skipped.push(entry);
    this.logger.warn(`Skipping ${entry.url} after ${entry.attempts} attempt(s): ${entry.reason}`);
  }

  private transition(state: CrawlState, phase: CrawlPhase) {
    if (state.phase === phase) return;
    this.logger.debug(`${state.phase} -> ${phase}`);
    state.phase = phase;
  }
}
