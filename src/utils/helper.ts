import { RETRY_DELAY_MS } from './constants';

export function buildPageUrl(listingUrl: string, pageIndex: number): string {
  const url = new URL(listingUrl);
  url.searchParams.set('page', String(pageIndex));
  return url.toString();
}

export async function withRetry<T>(
  operation: () => Promise<T>,
  retries: number,
  baseDelayMs: number = RETRY_DELAY_MS
): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    if (retries > 0) {
      console.log(`Retrying operation, ${retries} attempts left`);

      // Exponential backoff for throttling and timeout errors
      let delay = baseDelayMs;
      if (isThrottlingError(error)) {
        delay = Math.pow(2, 4 - retries) * baseDelayMs;
        console.log(`Waiting ${delay}ms before retry (throttling detected)`);
      } else if (isTimeoutError(error)) {
        delay = Math.pow(2, 5 - retries) * baseDelayMs;
        console.log(`Waiting ${delay}ms before retry (timeout detected)`);
      } else {
        console.log(`Waiting ${delay}ms before retry`);
      }

      await new Promise(resolve => setTimeout(resolve, delay));
      return withRetry(operation, retries - 1, baseDelayMs);
    }
    throw error;
  }
}

/**
 * Checks if an error is a timeout error
 */
export function isTimeoutError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;

  const errorMessage = error.message.toLowerCase();
  return errorMessage.includes('timeout') ||
         errorMessage.includes('timed out') ||
         errorMessage.includes('request timeout');
}

/**
 * Checks if an error is a throttling error
 */
export function isThrottlingError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;

  const errorMessage = error.message.toLowerCase();
  return errorMessage.includes('too many requests') ||
         errorMessage.includes('rate exceeded') ||
         errorMessage.includes('status code 429');
}

/**
 * Trims text and collapses runs of whitespace left over from HTML markup
 * @param text - The text to clean
 * @returns Cleaned text, or '' for missing input
 */
export function cleanText(text: string | undefined | null): string {
  if (!text) return '';
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Splits a raw comma-separated genre list into distinct, trimmed, non-empty names.
 * First occurrence wins, so the order follows the listing.
 */
export function splitGenres(genres: string): string[] {
  const names = genres
    .split(',')
    .map(genre => genre.trim())
    .filter(genre => genre.length > 0);
  return [...new Set(names)];
}

/**
 * Resolves a listing link against the site's origin. Absolute http(s) links are kept as-is.
 * @returns The absolute link, or null when the row had no link or it does not form a URL
 */
export function resolveReadMoreLink(link: string | undefined, baseOrigin: string): string | null {
  const trimmed = link?.trim();
  if (!trimmed) return null;
  if (/^https?:\/\//i.test(trimmed)) return trimmed;
  try {
    return new URL(trimmed, baseOrigin).toString();
  } catch (error) {
    if (error instanceof TypeError) return null;
    throw error;
  }
}
