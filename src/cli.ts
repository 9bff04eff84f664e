import { openBrowserSession, type CrawlSession, type SessionOptions } from './browser';
import type { CrawlerConfig } from './config';
import { CrawlOrchestrator } from './crawler/orchestrator';
import { RecordExtractor } from './crawler/recordExtractor';
import type { CrawlSummary, ServiceRecord } from './crawler/types';
import { errorMessage } from './errors';
import type { Logger } from './logger';
import { writeRecords } from './output';

export type CliDeps = {
  config: CrawlerConfig;
  logger: Logger;
  openSession?: (opts: SessionOptions, logger: Logger) => Promise<CrawlSession>;
  write?: (file: string, records: ServiceRecord[]) => Promise<string>;
  sleep?: (ms: number) => Promise<void>;
};

export function formatSummary(summary: CrawlSummary): string {
  const lines = [
    `Pages walked:      ${summary.pagesWalked}`,
    `Records extracted: ${summary.recordsExtracted}`,
    `Duplicates merged: ${summary.duplicates}`,
    `Records skipped:   ${summary.skipped.length}`,
    ...summary.skipped.map((s) => `  - [${s.stage}] ${s.url}: ${s.reason}`),
  ];
  if (summary.listingErrors.length > 0) {
    lines.push(`Listing errors:    ${summary.listingErrors.length}`);
    lines.push(...summary.listingErrors.map((e) => `  - page ${e.pageIndex} ${e.url}: ${e.message}`));
  }
  return lines.join('\n');
}

/** Runs one crawl and writes the output. Resolves to the process exit code. */
export async function runCli(deps: CliDeps): Promise<number> {
  const { config, logger } = deps;
  const openSession = deps.openSession ?? openBrowserSession;
  const write = deps.write ?? writeRecords;

  let session: CrawlSession;
  try {
    session = await openSession(
      { headless: config.headless, fetchTimeoutMs: config.fetchTimeoutMs },
      logger.child('browser')
    );
  } catch (err) {
    logger.error(`Could not start browser session: ${errorMessage(err)}`);
    return 1;
  }

  try {
    const orchestrator = new CrawlOrchestrator(
      {
        fetcher: session.fetcher,
        extractor: new RecordExtractor({
          requiredFields: config.requiredFields,
          keepUnlistedFields: config.keepUnlistedFields,
        }),
        logger: logger.child('crawl'),
        sleep: deps.sleep,
      },
      {
        listing: {
          startUrl: config.baseUrl,
          launchSelector: config.launchSelector,
          maxPages: config.maxPages,
          selectors: config.selectors,
        },
        detailReady: { selector: config.selectors.detailReady },
        retry: {
          retries: config.retryCount,
          baseMs: config.backoffBaseMs,
          capMs: config.backoffCapMs,
        },
        idField: config.idField,
        maxRecords: config.maxRecords,
      }
    );

    const { records, summary } = await orchestrator.run();
    if (summary.listingErrors.length > 0) {
      // A partial listing walk would truncate the previous output.
      logger.error(`Listing walk incomplete, keeping previous output at ${config.outputFile}.`);
      console.log(formatSummary(summary));
      return 1;
    }
    const file = await write(config.outputFile, records);
    logger.info(`Data successfully saved to ${file}!`);
    console.log(formatSummary(summary));
    return 0;
  } catch (err) {
    logger.error(`Crawl failed, no output written: ${errorMessage(err)}`);
    return 1;
  } finally {
    await session.close().catch((err: unknown) =>
      logger.warn('Browser did not close cleanly', { error: errorMessage(err) })
    );
  }
}
