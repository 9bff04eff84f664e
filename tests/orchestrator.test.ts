import { describe, it, expect, vi } from 'vitest';

import { identityKey } from '../src/crawler/identity';
import { CrawlOrchestrator, type CrawlOptions } from '../src/crawler/orchestrator';
import { RecordExtractor, isEmptyValue } from '../src/crawler/recordExtractor';
import { FetchTimeout, SessionError } from '../src/errors';

import { FakeFetcher, ORIGIN, SELECTORS, buildSite, detailHtml, listingHtml, serviceFields } from './helpers/fakeSite';

const required = ['Service Name', 'Agency Name'];

const crawler = (fetcher: FakeFetcher, startUrl: string, overrides: Partial<CrawlOptions> = {}) => {
  const sleep = vi.fn(async (_ms: number) => {});
  const orchestrator = new CrawlOrchestrator(
    { fetcher, extractor: new RecordExtractor({ requiredFields: required }), sleep },
    {
      listing: { startUrl, maxPages: 20, selectors: SELECTORS },
      detailReady: { selector: SELECTORS.detailReady },
      retry: { retries: 3, baseMs: 10, capMs: 100 },
      ...overrides,
    }
  );
  return { orchestrator, sleep };
};

describe('CrawlOrchestrator', () => {
  it('collects 5 records and 1 skip from 3 pages of 2 when one detail lacks a required field', async () => {
    const site = buildSite(3, 2, { 4: { 'Agency Name': 'Agency 4', Phone: '555-0104' } });
    const fetcher = new FakeFetcher(site.pages);

    const { records, summary } = await crawler(fetcher, site.startUrl).orchestrator.run();

    expect(records.map((r) => r['Service Name'])).toEqual([
      'Service 1',
      'Service 2',
      'Service 3',
      'Service 5',
      'Service 6',
    ]);
    expect(summary).toEqual({
      pagesWalked: 3,
      recordsExtracted: 5,
      duplicates: 0,
      skipped: [
        {
          url: `${ORIGIN}/details?id=4`,
          stage: 'extract',
          reason: 'missing required fields: Service Name',
          attempts: 2,
        },
      ],
      listingErrors: [],
    });
    expect(fetcher.callsTo(`${ORIGIN}/details?id=4`)).toBe(2);
  });

  it('keeps the record when the fetch times out twice and then succeeds', async () => {
    const site = buildSite(1, 2);
    const target = `${ORIGIN}/details?id=2`;
    const fetcher = new FakeFetcher(site.pages).failNext(
      target,
      new FetchTimeout(target, 50),
      new FetchTimeout(target, 50)
    );
    const { orchestrator, sleep } = crawler(fetcher, site.startUrl);

    const { records, summary } = await orchestrator.run();

    expect(records.map((r) => r['Service Name'])).toEqual(['Service 1', 'Service 2']);
    expect(summary.skipped).toEqual([]);
    expect(fetcher.callsTo(target)).toBe(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([10, 20]);
  });

  it('skips a page that keeps timing out and carries on', async () => {
    const site = buildSite(1, 2);
    const target = `${ORIGIN}/details?id=1`;
    const timeouts = Array.from({ length: 4 }, () => new FetchTimeout(target, 50));
    const fetcher = new FakeFetcher(site.pages).failNext(target, ...timeouts);

    const { records, summary } = await crawler(fetcher, site.startUrl).orchestrator.run();

    expect(records.map((r) => r['Service Name'])).toEqual(['Service 2']);
    expect(summary.skipped).toEqual([
      {
        url: target,
        stage: 'fetch',
        reason: `Timed out after 50ms waiting for ${target}`,
        attempts: 4,
      },
    ]);
  });

  it('refetches once when the first render is incomplete', async () => {
    const target = `${ORIGIN}/details?id=1`;
    const fetcher = new FakeFetcher({
      [`${ORIGIN}/results`]: listingHtml(['/details?id=1']),
      [target]: (visit) => detailHtml(visit === 1 ? { 'Agency Name': 'Agency 1' } : serviceFields(1)),
    });

    const { records, summary } = await crawler(fetcher, `${ORIGIN}/results`).orchestrator.run();

    expect(records).toHaveLength(1);
    expect(records[0]['Service Name']).toBe('Service 1');
    expect(summary.skipped).toEqual([]);
    expect(fetcher.callsTo(target)).toBe(2);
  });

  it('merges records sharing a site-provided id, last content in first position', async () => {
    const fetcher = new FakeFetcher({
      [`${ORIGIN}/results`]: listingHtml(['/details?id=1', '/details?id=2', '/details?id=3']),
      [`${ORIGIN}/details?id=1`]: detailHtml({ ...serviceFields(1), 'Service ID': 'S-1' }),
      [`${ORIGIN}/details?id=2`]: detailHtml({ ...serviceFields(1), 'Service Name': 'Second', 'Service ID': 'S-1' }),
      [`${ORIGIN}/details?id=3`]: detailHtml({ ...serviceFields(3), 'Service ID': 'S-3' }),
    });

    const { records, summary } = await crawler(fetcher, `${ORIGIN}/results`, { idField: 'Service ID' }).orchestrator.run();

    expect(records.map((r) => [r['Service ID'], r['Service Name']])).toEqual([
      ['S-1', 'Second'],
      ['S-3', 'Service 3'],
    ]);
    expect(summary.duplicates).toBe(1);
    expect(summary.recordsExtracted).toBe(2);
  });

  it('never outputs two records with one identity key or an empty required field', async () => {
    const site = buildSite(4, 3, { 2: { 'Service Name': 'No agency' }, 7: { 'Agency Name': '  ' } });
    const { records } = await crawler(new FakeFetcher(site.pages), site.startUrl).orchestrator.run();

    const keys = records.map((r) => identityKey(r, '', 'Service Name'));
    expect(new Set(keys).size).toBe(records.length);
    expect(records).toHaveLength(10);
    for (const r of records) {
      for (const f of required) expect(isEmptyValue(r[f])).toBe(false);
    }
  });

  it('gives identical records when run twice against an unchanged site', async () => {
    const site = buildSite(3, 2);

    const first = await crawler(new FakeFetcher(site.pages), site.startUrl).orchestrator.run();
    const second = await crawler(new FakeFetcher(site.pages), site.startUrl).orchestrator.run();

    expect(second.records).toEqual(first.records);
    expect(first.records).toHaveLength(6);
  });

  it('stops once maxRecords is reached', async () => {
    const site = buildSite(2, 2);
    const fetcher = new FakeFetcher(site.pages);

    const { records } = await crawler(fetcher, site.startUrl, { maxRecords: 2 }).orchestrator.run();

    expect(records).toHaveLength(2);
    expect(fetcher.callsTo(`${ORIGIN}/details?id=3`)).toBe(0);
  });

  it('lets a session error escape the run', async () => {
    const site = buildSite(1, 2);
    const target = `${ORIGIN}/details?id=1`;
    const fetcher = new FakeFetcher(site.pages).failNext(target, new SessionError('browser page was closed'));

    await expect(crawler(fetcher, site.startUrl).orchestrator.run()).rejects.toBeInstanceOf(SessionError);
  });

  it('reports listing pages that could not be loaded', async () => {
    const fetcher = new FakeFetcher({
      [`${ORIGIN}/results`]: listingHtml(['/details?id=1'], '/results?page=2'),
      [`${ORIGIN}/details?id=1`]: detailHtml(serviceFields(1)),
    });

    const { records, summary } = await crawler(fetcher, `${ORIGIN}/results`, {
      retry: { retries: 0, baseMs: 0, capMs: 0 },
    }).orchestrator.run();

    expect(records).toHaveLength(1);
    expect(summary.pagesWalked).toBe(1);
    expect(summary.listingErrors).toEqual([
      {
        pageIndex: 2,
        url: `${ORIGIN}/results?page=2`,
        message: `Gave up after 1 attempt(s): Failed to load ${ORIGIN}/results?page=2: HTTP 404`,
      },
    ]);
  });
});
