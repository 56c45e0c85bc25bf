import axios from 'axios';
import { MAX_RETRY_ATTEMPTS, REQUEST_TIMEOUT_MS, SCRAPING_HEADERS } from '../utils/constants';
import { errorMessage } from '../utils/errors';
import { buildPageUrl, withRetry } from '../utils/helper';
import { FetchOutcome } from '../utils/types';

export interface PageFetcher {
  fetch(pageIndex: number): Promise<FetchOutcome>;
}

export interface HttpPageFetcherOptions {
  timeout?: number;
  retryAttempts?: number;
  retryDelayMs?: number;
  headers?: Record<string, string>;
}

/**
 * Requests `<listingUrl>?page=N`. Any HTTP status other than 200 is reported as a
 * failed outcome. Transport errors and 429 responses are retried, then reported
 * with their error code or status.
 */
export class HttpPageFetcher implements PageFetcher {
  private readonly opts: HttpPageFetcherOptions;

  constructor(private readonly listingUrl: string, options: HttpPageFetcherOptions = {}) {
    this.opts = {
      timeout: REQUEST_TIMEOUT_MS,
      retryAttempts: MAX_RETRY_ATTEMPTS,
      headers: SCRAPING_HEADERS,
      ...options,
    };
  }

  async fetch(pageIndex: number): Promise<FetchOutcome> {
    const url = buildPageUrl(this.listingUrl, pageIndex);

    try {
      const response = await withRetry(
        () =>
          axios.get<string>(url, {
            headers: this.opts.headers,
            timeout: this.opts.timeout,
            responseType: 'text',
            // 429 throws so withRetry backs off; every other status is returned as-is
            validateStatus: status => status !== 429,
          }),
        this.opts.retryAttempts ?? MAX_RETRY_ATTEMPTS,
        this.opts.retryDelayMs
      );

      if (response.status !== 200) {
        return { ok: false, status: response.status };
      }
      return { ok: true, status: response.status, body: response.data };
    } catch (error) {
      let status: number | string = 'NETWORK_ERROR';
      if (axios.isAxiosError(error)) {
        status = error.response?.status ?? error.code ?? status;
      }
      console.error(`Error fetching ${url}: ${errorMessage(error)}`);
      return { ok: false, status };
    }
  }
}
