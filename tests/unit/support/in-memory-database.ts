import {
  CREATE_GENRES_TABLE,
  CREATE_GRANTS_TABLE,
  CREATE_GRANT_GENRE_TABLE,
  INSERT_GENRE,
  INSERT_GRANT,
  INSERT_GRANT_GENRE,
  NATURAL_KEY_INDEX,
  SELECT_ALL_GRANTS,
  SELECT_GENRES_FOR_GRANT,
  SELECT_GENRE_ID,
} from '../../../src/storage/schema';
import { SqlExecutor, SqlRow, SqlValue, WriteResult } from '../../../src/utils/mysql-config';

type GrantRow = {
  id: number;
  issuer: string;
  title: string;
  cash_prize: string;
  entry_fee: string;
  deadline: string;
  genres: string;
  description: string;
  read_more_link: string | null;
  extra_info: string | null;
};

export function mysqlError(code: string, errno: number, message: string): Error {
  return Object.assign(new Error(message), { code, errno, sqlMessage: message });
}

function text(value: SqlValue | undefined): string {
  if (typeof value !== 'string') throw new Error(`expected string parameter, got ${String(value)}`);
  return value;
}

function nullableText(value: SqlValue | undefined): string | null {
  return value === null ? null : text(value);
}

function int(value: SqlValue | undefined): number {
  if (typeof value !== 'number') throw new Error(`expected number parameter, got ${String(value)}`);
  return value;
}

/**
 * Stand-in for MySQL that understands exactly the statements the stores issue,
 * with the same unique and foreign-key behaviour as the real schema.
 */
export class InMemoryDatabase implements SqlExecutor {
  readonly grants: GrantRow[] = [];
  readonly genres: { id: number; name: string }[] = [];
  readonly links: { grantId: number; genreId: number }[] = [];
  readonly tablesCreated: string[] = [];
  closed = false;
  disconnectCalls = 0;

  private nextGrantId = 1;
  private nextGenreId = 1;
  private failures = new Map<string, Error>();

  /** Makes the next run of `sql` throw `error`. */
  failOn(sql: string, error: Error): void {
    this.failures.set(sql, error);
  }

  async query(sql: string, params: SqlValue[] = []): Promise<SqlRow[]> {
    this.check(sql);

    switch (sql) {
      case SELECT_ALL_GRANTS:
        return [...this.grants].sort((a, b) => a.id - b.id).map(row => ({ ...row }));
      case SELECT_GENRE_ID:
        return this.genres.filter(g => g.name === text(params[0])).map(g => ({ id: g.id }));
      case SELECT_GENRES_FOR_GRANT: {
        const grantId = int(params[0]);
        return this.genres
          .filter(g => this.links.some(l => l.grantId === grantId && l.genreId === g.id))
          .sort((a, b) => a.id - b.id)
          .map(g => ({ name: g.name }));
      }
      default:
        throw new Error(`Unexpected query: ${sql}`);
    }
  }

  async execute(sql: string, params: SqlValue[] = []): Promise<WriteResult> {
    this.check(sql);

    switch (sql) {
      case CREATE_GRANTS_TABLE:
      case CREATE_GENRES_TABLE:
      case CREATE_GRANT_GENRE_TABLE:
        this.tablesCreated.push(sql);
        return { insertId: 0, affectedRows: 0 };
      case INSERT_GRANT:
        return this.insertGrant(params);
      case INSERT_GENRE: {
        const name = text(params[0]);
        const existing = this.genres.find(g => g.name === name);
        if (existing) return { insertId: existing.id, affectedRows: 0 };
        const id = this.nextGenreId++;
        this.genres.push({ id, name });
        return { insertId: id, affectedRows: 1 };
      }
      case INSERT_GRANT_GENRE: {
        const grantId = int(params[0]);
        const genreId = int(params[1]);
        if (!this.grants.some(g => g.id === grantId) || !this.genres.some(g => g.id === genreId)) {
          throw mysqlError('ER_NO_REFERENCED_ROW_2', 1452, 'Cannot add or update a child row: a foreign key constraint fails');
        }
        if (this.links.some(l => l.grantId === grantId && l.genreId === genreId)) {
          return { insertId: 0, affectedRows: 0 };
        }
        this.links.push({ grantId, genreId });
        return { insertId: 0, affectedRows: 1 };
      }
      default:
        throw new Error(`Unexpected statement: ${sql}`);
    }
  }

  async disconnect(): Promise<void> {
    this.disconnectCalls++;
    this.closed = true;
  }

  private insertGrant(params: SqlValue[]): WriteResult {
    const row: GrantRow = {
      id: 0,
      issuer: text(params[0]),
      title: text(params[1]),
      cash_prize: text(params[2]),
      entry_fee: text(params[3]),
      deadline: text(params[4]),
      genres: text(params[5]),
      description: text(params[6]),
      read_more_link: nullableText(params[7]),
      extra_info: nullableText(params[8]),
    };
    const clash = this.grants.some(
      g => g.issuer === row.issuer && g.title === row.title && g.deadline === row.deadline
    );
    if (clash) {
      throw mysqlError(
        'ER_DUP_ENTRY',
        1062,
        `Duplicate entry '${row.issuer}-${row.title}-${row.deadline}' for key 'grants.${NATURAL_KEY_INDEX}'`
      );
    }
    row.id = this.nextGrantId++;
    this.grants.push(row);
    return { insertId: row.id, affectedRows: 1 };
  }

  private check(sql: string): void {
    if (this.closed) throw new Error("Can't add new command when connection is in closed state");
    const failure = this.failures.get(sql);
    if (failure) {
      this.failures.delete(sql);
      throw failure;
    }
  }
}
