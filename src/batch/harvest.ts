import { CrawlController } from '../scrapers/crawl-controller';
import { HttpPageFetcher, PageFetcher } from '../scrapers/page-fetcher';
import { ListingRecordExtractor, RecordExtractor } from '../scrapers/record-extractor';
import { GrantStore } from '../storage/grant-store';
import { errorMessage } from '../utils/errors';
import { SqlExecutor } from '../utils/mysql-config';
import { CrawlResult, StoredGrant, WebsiteConfig } from '../utils/types';

export interface HarvestOptions {
  website: WebsiteConfig;
  db: SqlExecutor;
  fetcher?: PageFetcher;
  extractor?: RecordExtractor;
  maxPages?: number;
}

export interface HarvestReport {
  crawl: CrawlResult;
  stored: StoredGrant[];
}

/**
 * One full run: open the store, crawl into it, read everything back, close.
 * The store is closed on every exit path, including a StorageFault mid-crawl.
 */
export async function harvest(options: HarvestOptions): Promise<HarvestReport> {
  const { website, db } = options;
  const store = new GrantStore(db);
  let aborted = false;

  try {
    await store.initialize();

    const controller = new CrawlController({
      fetcher: options.fetcher ?? new HttpPageFetcher(website.listingUrl),
      extractor: options.extractor ?? new ListingRecordExtractor(website.selectors),
      sink: store,
      baseOrigin: website.baseOrigin,
      maxPages: options.maxPages,
    });

    const crawl = await controller.run();
    const stored = await store.fetchAll();
    return { crawl, stored };
  } catch (error) {
    aborted = true;
    throw error;
  } finally {
    try {
      await store.close();
    } catch (closeError) {
      // the error that aborted the run is the one to report
      if (!aborted) throw closeError;
      console.error(errorMessage(closeError));
    }
  }
}

export function formatGrant(grant: StoredGrant): string {
  const lines = [
    `#${grant.id} ${grant.title}`,
    `  Issuer: ${grant.issuer}`,
    `  Cash prize: ${grant.cashPrize}`,
    `  Entry fee: ${grant.entryFee}`,
    `  Deadline: ${grant.deadline}`,
    `  Description: ${grant.description}`,
    `  Read more: ${grant.readMoreLink ?? 'n/a'}`,
  ];
  if (grant.extraInfo !== undefined) {
    lines.push(`  Extra info: ${grant.extraInfo}`);
  }
  lines.push(`Genres: ${grant.genreNames.join(', ')}`);
  return lines.join('\n');
}

export function formatSummary(crawl: CrawlResult): string {
  const { summary } = crawl;
  return [
    `Crawl finished (${crawl.terminationReason}) after ${summary.pagesCrawled} page(s)`,
    `Fetched: ${summary.recordsFetched}`,
    `Inserted: ${summary.recordsInserted}`,
    `Skipped as duplicates: ${summary.duplicatesSkipped}`,
    `Skipped as malformed: ${summary.malformedSkipped}`,
  ].join('\n');
}
