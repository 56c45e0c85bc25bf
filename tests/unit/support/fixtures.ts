import { PageFetcher } from '../../../src/scrapers/page-fetcher';
import { RecordExtractor } from '../../../src/scrapers/record-extractor';
import { FetchOutcome, Grant, RawGrantFields } from '../../../src/utils/types';

export function rawGrant(overrides: RawGrantFields = {}): RawGrantFields {
  return {
    issuer: 'Test Arts Council',
    title: 'Emerging Poets Award',
    cashPrize: '$1,000',
    entryFee: '$25',
    deadline: 'March 1, 2027',
    genres: 'Poetry',
    description: 'An award for a first collection of poems.',
    readMoreLink: '/grants/123',
    ...overrides,
  };
}

export function grant(overrides: Partial<Grant> = {}): Grant {
  return {
    issuer: 'Test Arts Council',
    title: 'Emerging Poets Award',
    cashPrize: '$1,000',
    entryFee: '$25',
    deadline: 'March 1, 2027',
    genres: 'Poetry',
    description: 'An award for a first collection of poems.',
    readMoreLink: 'https://example.org/grants/123',
    ...overrides,
  };
}

/**
 * Serves a fixed list of pages. Each page is either a list of field-sets or a
 * failed fetch status; asking past the end returns an empty page.
 */
export class ScriptedListing implements PageFetcher, RecordExtractor {
  readonly requested: number[] = [];

  constructor(private readonly pages: (RawGrantFields[] | { status: number | string })[]) {}

  async fetch(pageIndex: number): Promise<FetchOutcome> {
    this.requested.push(pageIndex);
    const page = this.pages[pageIndex];
    if (page !== undefined && !Array.isArray(page)) {
      return { ok: false, status: page.status };
    }
    return { ok: true, status: 200, body: String(pageIndex) };
  }

  extract(body: string): RawGrantFields[] {
    const page = this.pages[Number(body)];
    return Array.isArray(page) ? page : [];
  }
}
