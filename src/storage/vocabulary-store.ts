import { StorageFault, errorMessage } from '../utils/errors';
import { SqlExecutor } from '../utils/mysql-config';
import {
  INSERT_GENRE,
  INSERT_GRANT_GENRE,
  SELECT_GENRES_FOR_GRANT,
  SELECT_GENRE_ID,
  readNumber,
  readString,
} from './schema';

/**
 * Owns the genre vocabulary and the grant-to-genre links. Every write is
 * idempotent, so replaying a grant's genres never duplicates rows.
 */
export class VocabularyStore {
  constructor(private readonly db: SqlExecutor) {}

  async ensureGenre(name: string): Promise<void> {
    const genre = name.trim();
    if (!genre) return;
    await this.run(`register genre "${genre}"`, () => this.db.execute(INSERT_GENRE, [genre]));
  }

  async lookupGenreId(name: string): Promise<number | null> {
    const rows = await this.run(`look up genre "${name}"`, () =>
      this.db.query(SELECT_GENRE_ID, [name.trim()])
    );
    return rows.length > 0 ? readNumber(rows[0], 'id') : null;
  }

  /** Both ids must already exist; the foreign keys reject anything else as a StorageFault. */
  async link(grantId: number, genreId: number): Promise<void> {
    await this.run(`link grant ${grantId} to genre ${genreId}`, () =>
      this.db.execute(INSERT_GRANT_GENRE, [grantId, genreId])
    );
  }

  async genresFor(grantId: number): Promise<string[]> {
    const rows = await this.run(`load genres for grant ${grantId}`, () =>
      this.db.query(SELECT_GENRES_FOR_GRANT, [grantId])
    );
    return rows.map(row => readString(row, 'name'));
  }

  private async run<T>(action: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (error instanceof StorageFault) throw error;
      throw new StorageFault(`Failed to ${action}: ${errorMessage(error)}`, error);
    }
  }
}
