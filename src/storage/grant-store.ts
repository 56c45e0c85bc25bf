import { DuplicateKeyError, StorageFault, errorMessage } from '../utils/errors';
import { splitGenres } from '../utils/helper';
import { SqlExecutor, SqlRow } from '../utils/mysql-config';
import { Grant, InsertResult, StoredGrant } from '../utils/types';
import {
  INSERT_GRANT,
  NATURAL_KEY_INDEX,
  SELECT_ALL_GRANTS,
  ensureSchema,
  readNullableString,
  readNumber,
  readString,
} from './schema';
import { VocabularyStore } from './vocabulary-store';

/** Where the crawl hands canonical grants. GrantStore is the persistent implementation. */
export interface GrantSink {
  insert(grant: Grant): Promise<InsertResult>;
}

function isNaturalKeyCollision(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    error.code === 'ER_DUP_ENTRY' &&
    error.message.includes(NATURAL_KEY_INDEX)
  );
}

export class GrantStore implements GrantSink {
  private readonly vocabulary: VocabularyStore;
  private closed = false;

  constructor(private readonly db: SqlExecutor, vocabulary?: VocabularyStore) {
    this.vocabulary = vocabulary ?? new VocabularyStore(db);
  }

  async initialize(): Promise<void> {
    this.assertOpen();
    await ensureSchema(this.db);
  }

  /**
   * Persists a grant and links its genres. A natural-key collision comes back as
   * a DuplicateKeyError result; every other failure throws StorageFault.
   */
  async insert(grant: Grant): Promise<InsertResult> {
    this.assertOpen();

    let grantId: number;
    try {
      const result = await this.db.execute(INSERT_GRANT, [
        grant.issuer,
        grant.title,
        grant.cashPrize,
        grant.entryFee,
        grant.deadline,
        grant.genres,
        grant.description,
        grant.readMoreLink,
        grant.extraInfo ?? null,
      ]);
      grantId = result.insertId;
    } catch (error) {
      if (isNaturalKeyCollision(error)) {
        return { ok: false, error: new DuplicateKeyError(grant) };
      }
      throw new StorageFault(`Failed to insert grant "${grant.title}": ${errorMessage(error)}`, error);
    }

    for (const genre of splitGenres(grant.genres)) {
      await this.vocabulary.ensureGenre(genre);
      const genreId = await this.vocabulary.lookupGenreId(genre);
      if (genreId === null) {
        throw new StorageFault(`Genre "${genre}" is missing right after it was registered`);
      }
      await this.vocabulary.link(grantId, genreId);
    }

    return { ok: true, id: grantId };
  }

  async fetchAll(): Promise<StoredGrant[]> {
    this.assertOpen();

    let rows: SqlRow[];
    try {
      rows = await this.db.query(SELECT_ALL_GRANTS);
    } catch (error) {
      throw new StorageFault(`Failed to load grants: ${errorMessage(error)}`, error);
    }

    const grants: StoredGrant[] = [];
    for (const row of rows) {
      const id = readNumber(row, 'id');
      const grant: StoredGrant = {
        id,
        issuer: readString(row, 'issuer'),
        title: readString(row, 'title'),
        cashPrize: readString(row, 'cash_prize'),
        entryFee: readString(row, 'entry_fee'),
        deadline: readString(row, 'deadline'),
        genres: readString(row, 'genres'),
        description: readString(row, 'description'),
        readMoreLink: readNullableString(row, 'read_more_link'),
        genreNames: await this.vocabulary.genresFor(id),
      };
      const extraInfo = readNullableString(row, 'extra_info');
      if (extraInfo !== null) {
        grant.extraInfo = extraInfo;
      }
      grants.push(grant);
    }
    return grants;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      await this.db.disconnect();
    } catch (error) {
      throw new StorageFault(`Failed to close grant store: ${errorMessage(error)}`, error);
    }
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new StorageFault('Grant store is closed');
    }
  }
}
