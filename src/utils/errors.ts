import type { Grant } from './types';

export type HarvestErrorKind =
  | 'fetch-failure'
  | 'record-extraction'
  | 'duplicate-key'
  | 'storage-fault';

export abstract class HarvestError extends Error {
  abstract readonly kind: HarvestErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The listing page could not be retrieved; ends the crawl without touching stored data. */
export class FetchFailure extends HarvestError {
  readonly kind = 'fetch-failure';

  constructor(
    public readonly pageIndex: number,
    public readonly status: number | string
  ) {
    super(`Failed to retrieve page ${pageIndex}: ${status}`);
  }
}

export class RecordExtractionError extends HarvestError {
  readonly kind = 'record-extraction';

  constructor(
    public readonly pageIndex: number,
    public readonly missingFields: string[],
    public readonly partialTitle?: string
  ) {
    super(
      `Skipping malformed grant on page ${pageIndex}` +
        `${partialTitle ? ` ("${partialTitle}")` : ''}: missing ${missingFields.join(', ')}`
    );
  }
}

export class DuplicateKeyError extends HarvestError {
  readonly kind = 'duplicate-key';

  constructor(public readonly grant: Pick<Grant, 'issuer' | 'title' | 'deadline'>) {
    super(`Grant already exists: ${grant.title} by ${grant.issuer} with deadline ${grant.deadline}`);
  }
}

/**
 * Any persistence error other than a natural-key collision. Fatal: callers let it
 * propagate to the entry point, which closes the store and exits non-zero.
 */
export class StorageFault extends HarvestError {
  readonly kind = 'storage-fault';

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
