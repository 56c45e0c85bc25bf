import type { DuplicateKeyError, FetchFailure, RecordExtractionError } from './errors';

export interface Grant {
  issuer: string;
  title: string;
  cashPrize: string;
  entryFee: string;
  deadline: string; // free-form, as shown on the listing
  genres: string; // raw comma-separated tag names
  description: string;
  readMoreLink: string | null; // absolute URL
  extraInfo?: string;
}

export interface StoredGrant extends Grant {
  id: number;
  genreNames: string[];
}

export type RawGrantField =
  | 'issuer'
  | 'title'
  | 'cashPrize'
  | 'entryFee'
  | 'deadline'
  | 'genres'
  | 'description'
  | 'readMoreLink'
  | 'extraInfo';

export type RawGrantFields = Partial<Record<RawGrantField, string>>;

export type FetchOutcome =
  | { ok: true; status: number; body: string }
  | { ok: false; status: number | string };

export type InsertResult =
  | { ok: true; id: number }
  | { ok: false; error: DuplicateKeyError };

export type CrawlState = 'CRAWLING' | 'DONE';

export type TerminationReason = 'end-of-results' | 'fetch-failure' | 'page-limit';

export interface CrawlSummary {
  /** Pages fetched and parsed, including the empty page that ends the listing. */
  pagesCrawled: number;
  recordsFetched: number;
  recordsInserted: number;
  duplicatesSkipped: number;
  malformedSkipped: number;
}

export interface CrawlResult {
  terminationReason: TerminationReason;
  grants: Grant[];
  fetchFailure?: FetchFailure;
  extractionErrors: RecordExtractionError[];
  duplicates: DuplicateKeyError[];
  summary: CrawlSummary;
}

export interface FieldSelectors {
  row: string;
  issuer: string;
  title: string;
  cashPrize: string;
  entryFee: string;
  deadline: string;
  genres: string;
  description: string;
  readMoreLink: string;
  extraInfo?: string;
}

export interface WebsiteConfig {
  name: string;
  listingUrl: string;
  baseOrigin: string;
  selectors: FieldSelectors;
}

export interface ScrapingConfig {
  websites: WebsiteConfig[];
}
