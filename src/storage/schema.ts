import { StorageFault } from '../utils/errors';
import { SqlExecutor, SqlRow } from '../utils/mysql-config';

export const NATURAL_KEY_INDEX = 'uq_grants_natural_key';

// Key columns are binary-collated TEXT, so the natural key compares exact text of any
// length. The unique index sits on a hash of the three, since TEXT cannot be indexed whole.
export const CREATE_GRANTS_TABLE = `
  CREATE TABLE IF NOT EXISTS grants (
    id INT UNSIGNED NOT NULL AUTO_INCREMENT PRIMARY KEY,
    issuer TEXT COLLATE utf8mb4_bin NOT NULL,
    title TEXT COLLATE utf8mb4_bin NOT NULL,
    cash_prize TEXT NOT NULL,
    entry_fee TEXT NOT NULL,
    deadline TEXT COLLATE utf8mb4_bin NOT NULL,
    genres TEXT NOT NULL,
    description TEXT NOT NULL,
    read_more_link TEXT NULL,
    extra_info TEXT NULL,
    natural_key CHAR(64) AS (
      SHA2(CONCAT_WS(CHAR(31 USING utf8mb4), issuer, title, deadline), 256)
    ) STORED,
    UNIQUE KEY ${NATURAL_KEY_INDEX} (natural_key)
  ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4
`;

// utf8mb4_bin keeps genre names case-sensitive
export const CREATE_GENRES_TABLE = `
  CREATE TABLE IF NOT EXISTS genres (
    id INT UNSIGNED NOT NULL AUTO_INCREMENT PRIMARY KEY,
    name VARCHAR(255) NOT NULL COLLATE utf8mb4_bin,
    UNIQUE KEY uq_genres_name (name)
  ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4
`;

export const CREATE_GRANT_GENRE_TABLE = `
  CREATE TABLE IF NOT EXISTS grant_genre (
    grant_id INT UNSIGNED NOT NULL,
    genre_id INT UNSIGNED NOT NULL,
    PRIMARY KEY (grant_id, genre_id),
    CONSTRAINT fk_grant_genre_grant FOREIGN KEY (grant_id) REFERENCES grants (id),
    CONSTRAINT fk_grant_genre_genre FOREIGN KEY (genre_id) REFERENCES genres (id)
  ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4
`;

export const INSERT_GRANT = `
  INSERT INTO grants
    (issuer, title, cash_prize, entry_fee, deadline, genres, description, read_more_link, extra_info)
  VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
`;

export const SELECT_ALL_GRANTS = `
  SELECT id, issuer, title, cash_prize, entry_fee, deadline, genres, description, read_more_link, extra_info
  FROM grants
  ORDER BY id
`;

// The no-op update turns a duplicate name into "0 rows affected" instead of an error
export const INSERT_GENRE = 'INSERT INTO genres (name) VALUES (?) ON DUPLICATE KEY UPDATE id = id';

export const SELECT_GENRE_ID = 'SELECT id FROM genres WHERE name = ?';

export const INSERT_GRANT_GENRE =
  'INSERT INTO grant_genre (grant_id, genre_id) VALUES (?, ?) ON DUPLICATE KEY UPDATE grant_id = grant_id';

export const SELECT_GENRES_FOR_GRANT = `
  SELECT g.name FROM genres g
  JOIN grant_genre gg ON g.id = gg.genre_id
  WHERE gg.grant_id = ?
  ORDER BY g.id
`;

/**
 * Creates the three tables if they are missing. Parents first, so the
 * association table's foreign keys resolve.
 */
export async function ensureSchema(db: SqlExecutor): Promise<void> {
  for (const ddl of [CREATE_GRANTS_TABLE, CREATE_GENRES_TABLE, CREATE_GRANT_GENRE_TABLE]) {
    try {
      await db.execute(ddl);
    } catch (error) {
      throw new StorageFault('Failed to create grant tables', error);
    }
  }
}

export function readNumber(row: SqlRow, column: string): number {
  const value = row[column];
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && /^\d+$/.test(value)) return Number(value);
  throw new StorageFault(`Expected numeric column ${column}, got ${typeof value}`);
}

export function readString(row: SqlRow, column: string): string {
  const value = row[column];
  if (typeof value === 'string') return value;
  throw new StorageFault(`Expected text column ${column}, got ${value === null ? 'null' : typeof value}`);
}

export function readNullableString(row: SqlRow, column: string): string | null {
  const value = row[column];
  if (value === null || value === undefined) return null;
  return readString(row, column);
}
