export type CrawlerErrorCode =
  | 'FETCH_TIMEOUT'
  | 'FETCH_ERROR'
  | 'SESSION_ERROR'
  | 'CONFIG_ERROR';

export class CrawlerError extends Error {
  constructor(
    readonly code: CrawlerErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The page did not reach its readiness condition in time. */
export class FetchTimeout extends CrawlerError {
  constructor(readonly url: string, readonly timeoutMs: number, options?: { cause?: unknown }) {
    super('FETCH_TIMEOUT', `Timed out after ${timeoutMs}ms waiting for ${url}`, options);
  }
}

/** Navigation or network failure while loading a page. */
export class FetchError extends CrawlerError {
  constructor(readonly url: string, reason: string, options?: { cause?: unknown }) {
    super('FETCH_ERROR', `Failed to load ${url}: ${reason}`, options);
  }
}

/** The browser session could not be established. Fatal. */
export class SessionError extends CrawlerError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super('SESSION_ERROR', `Browser session unavailable: ${reason}`, options);
  }
}

export class ConfigError extends CrawlerError {
  constructor(readonly issues: string[]) {
    super('CONFIG_ERROR', `Invalid configuration:\n  ${issues.join('\n  ')}`);
  }
}

export const isTransientFetchError = (err: unknown): err is FetchTimeout | FetchError =>
  err instanceof FetchTimeout || err instanceof FetchError;

export const errorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);
