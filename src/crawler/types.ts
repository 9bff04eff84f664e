export type FieldValue = string | string[] | null;

export type ServiceRecord = Record<string, FieldValue>;

/** A rendered page, parsed into a static document the extractor can read at leisure. */
export type DocumentSnapshot = {
  /** Final URL after redirects and any launch click. */
  url: string;
  requestedUrl: string;
  html: string;
  document: Document;
};

export type ReadinessCondition = {
  selector: string;
};

export type FetchOptions = {
  ready: ReadinessCondition;
  /** Selector clicked once the page has loaded, before readiness is checked. */
  submit?: string;
};

export interface PageFetcher {
  fetch(url: string, opts: FetchOptions): Promise<DocumentSnapshot>;
}

export type ListingPage = {
  index: number;
  url: string;
  detailUrls: string[];
};

export type ExtractionFailure = {
  url: string;
  missingFields: string[];
};

export type ExtractionResult =
  | { ok: true; record: ServiceRecord }
  | { ok: false; failure: ExtractionFailure };

export type CrawlPhase =
  | 'init'
  | 'listing'
  | 'fetching'
  | 'extracting'
  | 'accumulate'
  | 'retry'
  | 'skip'
  | 'done';

export type SkippedPage = {
  url: string;
  stage: 'fetch' | 'extract';
  reason: string;
  attempts: number;
};

export type ListingError = {
  pageIndex: number;
  url: string;
  message: string;
};

export type CrawlState = {
  phase: CrawlPhase;
  visited: Set<string>;
  records: Map<string, ServiceRecord>;
  skipped: SkippedPage[];
  listingErrors: ListingError[];
  pagesWalked: number;
  duplicates: number;
};

export type CrawlSummary = {
  pagesWalked: number;
  recordsExtracted: number;
  duplicates: number;
  skipped: SkippedPage[];
  listingErrors: ListingError[];
};

export type CrawlResult = {
  records: ServiceRecord[];
  summary: CrawlSummary;
};
