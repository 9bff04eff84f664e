import { z } from 'zod';

import { ConfigError } from './errors';
import type { LogLevel } from './logger';

const emptyToUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const envInt = (fallback: number, min = 0) =>
  z.preprocess(emptyToUndefined, z.coerce.number().int().min(min).default(fallback));

const envBool = (fallback: boolean) =>
  z.preprocess(
    (v) => (typeof v === 'string' && v.trim() !== '' ? v.trim().toLowerCase() !== 'false' : undefined),
    z.boolean().default(fallback)
  );

const envList = (fallback: string[]) =>
  z.preprocess(
    (v) =>
      typeof v === 'string' && v.trim() !== ''
        ? v
            .split(',')
            .map((s) => s.trim())
            .filter(Boolean)
        : undefined,
    z.array(z.string().min(1)).default(fallback)
  );

const envString = (fallback: string) => z.preprocess(emptyToUndefined, z.string().default(fallback));

const EnvSchema = z
  .object({
    BASE_URL: z.preprocess(
      emptyToUndefined,
      z.string().url().default('https://ucassist.org/search-launch/')
    ),
    LAUNCH_SELECTOR: z.string().optional(),
    MAX_PAGES: envInt(100, 1),
    MAX_RECORDS: z.preprocess(emptyToUndefined, z.coerce.number().int().min(1).optional()),
    FETCH_TIMEOUT_MS: envInt(30_000, 1),
    RETRY_COUNT: envInt(3),
    BACKOFF_BASE_MS: envInt(500),
    BACKOFF_CAP_MS: envInt(8_000),
    REQUIRED_FIELDS: envList(['Service Name', 'Agency Name']),
    ID_FIELD: z.preprocess(emptyToUndefined, z.string().optional()),
    KEEP_UNLISTED_FIELDS: envBool(true),
    HEADLESS: envBool(true),
    OUTPUT_FILE: envString('ucassist_data.json'),
    LOG_LEVEL: z.preprocess(
      emptyToUndefined,
      z.enum(['debug', 'info', 'warn', 'error']).default('info')
    ),
    LISTING_CONTAINER_SELECTOR: envString('body'),
    LISTING_READY_SELECTOR: envString('.cbResultSetTable a'),
    DETAIL_LINK_TEXT: envString('View Details'),
    NEXT_PAGE_SELECTOR: envString('[data-cb-name="JumpToNext"]'),
    DETAIL_READY_SELECTOR: envString('.cbFormLabelCell'),
  })
  .refine((env) => env.BACKOFF_CAP_MS >= env.BACKOFF_BASE_MS, {
    message: 'must be >= BACKOFF_BASE_MS',
    path: ['BACKOFF_CAP_MS'],
  });

export type CrawlerConfig = {
  baseUrl: string;
  /** Clicked on the landing page to open the first result page. */
  launchSelector?: string;
  maxPages: number;
  maxRecords?: number;
  fetchTimeoutMs: number;
  retryCount: number;
  backoffBaseMs: number;
  backoffCapMs: number;
  requiredFields: string[];
  idField?: string;
  keepUnlistedFields: boolean;
  headless: boolean;
  outputFile: string;
  logLevel: LogLevel;
  selectors: {
    listingContainer: string;
    listingReady: string;
    detailLinkText: string;
    nextPage: string;
    detailReady: string;
  };
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): CrawlerConfig => {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  const e = parsed.data;

  // An explicitly empty LAUNCH_SELECTOR turns the search launch off.
  const launchSelector =
    e.LAUNCH_SELECTOR === undefined ? 'input[name="searchID"]' : e.LAUNCH_SELECTOR.trim() || undefined;

  return {
    baseUrl: e.BASE_URL,
    launchSelector,
    maxPages: e.MAX_PAGES,
    maxRecords: e.MAX_RECORDS,
    fetchTimeoutMs: e.FETCH_TIMEOUT_MS,
    retryCount: e.RETRY_COUNT,
    backoffBaseMs: e.BACKOFF_BASE_MS,
    backoffCapMs: e.BACKOFF_CAP_MS,
    requiredFields: e.REQUIRED_FIELDS,
    idField: e.ID_FIELD,
    keepUnlistedFields: e.KEEP_UNLISTED_FIELDS,
    headless: e.HEADLESS,
    outputFile: e.OUTPUT_FILE,
    logLevel: e.LOG_LEVEL,
    selectors: {
      listingContainer: e.LISTING_CONTAINER_SELECTOR,
      listingReady: e.LISTING_READY_SELECTOR,
      detailLinkText: e.DETAIL_LINK_TEXT,
      nextPage: e.NEXT_PAGE_SELECTOR,
      detailReady: e.DETAIL_READY_SELECTOR,
    },
  };
};
