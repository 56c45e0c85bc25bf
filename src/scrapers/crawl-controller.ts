import { GrantSink } from '../storage/grant-store';
import { MAX_PAGES } from '../utils/constants';
import { DuplicateKeyError, FetchFailure, RecordExtractionError } from '../utils/errors';
import { resolveReadMoreLink } from '../utils/helper';
import {
  CrawlResult,
  CrawlState,
  CrawlSummary,
  Grant,
  RawGrantFields,
  TerminationReason,
} from '../utils/types';
import { PageFetcher } from './page-fetcher';
import { RecordExtractor } from './record-extractor';

const REQUIRED_FIELDS = [
  'issuer',
  'title',
  'cashPrize',
  'entryFee',
  'deadline',
  'genres',
  'description',
] as const;

/**
 * Turns one extracted field-set into a canonical Grant.
 * @throws RecordExtractionError when a required field is missing, or issuer/title is blank
 */
export function buildGrant(raw: RawGrantFields, baseOrigin: string, pageIndex: number): Grant {
  const missing: string[] = REQUIRED_FIELDS.filter(field => raw[field] === undefined);
  for (const field of ['issuer', 'title'] as const) {
    if (raw[field]?.trim() === '') {
      missing.push(field);
    }
  }

  const {
    issuer,
    title,
    cashPrize,
    entryFee,
    deadline,
    genres,
    description,
  } = raw;
  if (
    missing.length > 0 ||
    issuer === undefined ||
    title === undefined ||
    cashPrize === undefined ||
    entryFee === undefined ||
    deadline === undefined ||
    genres === undefined ||
    description === undefined
  ) {
    throw new RecordExtractionError(pageIndex, missing, raw.title?.trim() || undefined);
  }

  const readMoreLink = resolveReadMoreLink(raw.readMoreLink, baseOrigin);
  if (readMoreLink === null && raw.readMoreLink?.trim()) {
    console.warn(
      `Dropping unusable read-more link "${raw.readMoreLink.trim()}" on page ${pageIndex} ("${title.trim()}")`
    );
  }

  const grant: Grant = {
    issuer: issuer.trim(),
    title: title.trim(),
    cashPrize: cashPrize.trim(),
    entryFee: entryFee.trim(),
    deadline: deadline.trim(),
    genres: genres.trim(),
    description: description.trim(),
    readMoreLink,
  };
  if (raw.extraInfo !== undefined && raw.extraInfo.trim() !== '') {
    grant.extraInfo = raw.extraInfo.trim();
  }
  return grant;
}

export interface CrawlControllerOptions {
  fetcher: PageFetcher;
  extractor: RecordExtractor;
  sink: GrantSink;
  baseOrigin: string;
  /** Hard stop for listings that never run out of pages. */
  maxPages?: number;
}

/**
 * Walks the listing from page 0 until a page comes back empty or cannot be
 * fetched, storing each page's grants before requesting the next one.
 *
 * Termination relies on the fetcher: it must eventually return a failure or a
 * page without records. `maxPages` bounds the run if it never does.
 */
export class CrawlController {
  private state: CrawlState = 'CRAWLING';
  private readonly maxPages: number;

  constructor(private readonly options: CrawlControllerOptions) {
    const maxPages = options.maxPages ?? MAX_PAGES;
    if (!Number.isInteger(maxPages) || maxPages < 1) {
      throw new Error(`maxPages must be a positive integer, got ${maxPages}`);
    }
    this.maxPages = maxPages;
  }

  get currentState(): CrawlState {
    return this.state;
  }

  async run(): Promise<CrawlResult> {
    if (this.state === 'DONE') {
      throw new Error('Crawl already finished; create a new controller to crawl again');
    }

    const { fetcher, extractor, sink, baseOrigin } = this.options;
    const grants: Grant[] = [];
    const extractionErrors: RecordExtractionError[] = [];
    const duplicates: DuplicateKeyError[] = [];
    const summary: CrawlSummary = {
      pagesCrawled: 0,
      recordsFetched: 0,
      recordsInserted: 0,
      duplicatesSkipped: 0,
      malformedSkipped: 0,
    };
    let fetchFailure: FetchFailure | undefined;
    let terminationReason: TerminationReason;
    let pageIndex = 0;

    while (true) {
      if (pageIndex >= this.maxPages) {
        console.warn(`Reached the page limit (${this.maxPages}) without an empty page. Stopping.`);
        terminationReason = 'page-limit';
        break;
      }

      const outcome = await fetcher.fetch(pageIndex);
      if (!outcome.ok) {
        fetchFailure = new FetchFailure(pageIndex, outcome.status);
        console.warn(fetchFailure.message);
        terminationReason = 'fetch-failure';
        break;
      }

      const records = extractor.extract(outcome.body);
      summary.pagesCrawled++;
      if (records.length === 0) {
        console.log(`No more grants found on page ${pageIndex}. Stopping.`);
        terminationReason = 'end-of-results';
        break;
      }

      console.log(`Number of grants found on page ${pageIndex}: ${records.length}`);
      summary.recordsFetched += records.length;

      for (const raw of records) {
        let grant: Grant;
        try {
          grant = buildGrant(raw, baseOrigin, pageIndex);
        } catch (error) {
          if (!(error instanceof RecordExtractionError)) throw error;
          console.warn(error.message);
          extractionErrors.push(error);
          summary.malformedSkipped++;
          continue;
        }

        grants.push(grant);
        const result = await sink.insert(grant);
        if (result.ok) {
          summary.recordsInserted++;
        } else {
          console.warn(result.error.message);
          duplicates.push(result.error);
          summary.duplicatesSkipped++;
        }
      }

      pageIndex++;
    }

    this.state = 'DONE';
    return {
      terminationReason,
      grants,
      fetchFailure,
      extractionErrors,
      duplicates,
      summary,
    };
  }
}
