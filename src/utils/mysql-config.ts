import { createPool, Pool, PoolOptions, ResultSetHeader, RowDataPacket } from 'mysql2/promise';
import {
  MYSQL_CONNECTION_LIMIT,
  MYSQL_DATABASE,
  MYSQL_HOST,
  MYSQL_PASSWORD,
  MYSQL_PORT,
  MYSQL_SSL,
  MYSQL_USER,
} from './constants';

export interface MySQLConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  ssl?: boolean;
  connectionLimit?: number;
}

export type SqlValue = string | number | null;

export type SqlRow = Record<string, unknown>;

export interface WriteResult {
  insertId: number;
  affectedRows: number;
}

/**
 * The statement runner the stores are written against. MySQLDatabase is the
 * production implementation; tests substitute an in-process fake.
 */
export interface SqlExecutor {
  query(sql: string, params?: SqlValue[]): Promise<SqlRow[]>;
  execute(sql: string, params?: SqlValue[]): Promise<WriteResult>;
  disconnect(): Promise<void>;
}

export class MySQLDatabase implements SqlExecutor {
  private pool: Pool;
  private closed = false;

  constructor(config: MySQLConfig) {
    const poolConfig: PoolOptions = {
      host: config.host,
      port: config.port,
      user: config.user,
      password: config.password,
      database: config.database,
      waitForConnections: true,
      connectionLimit: config.connectionLimit ?? 5,
      queueLimit: 0,
      connectTimeout: 60000,
    };

    if (config.ssl) {
      poolConfig.ssl = { rejectUnauthorized: false };
    }

    this.pool = createPool(poolConfig);
  }

  async connect(): Promise<void> {
    try {
      const connection = await this.pool.getConnection();
      connection.release();
      console.log('✅ MySQL connection established');
    } catch (error) {
      console.error('❌ MySQL connection failed:', error);
      throw error;
    }
  }

  async disconnect(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.pool.end();
    console.log('🔌 MySQL connection closed');
  }

  async query(sql: string, params: SqlValue[] = []): Promise<SqlRow[]> {
    try {
      const [rows] = await this.pool.execute<RowDataPacket[]>(sql, params);
      return rows;
    } catch (error) {
      console.error('❌ MySQL query error:', error);
      console.error('SQL:', sql);
      throw error;
    }
  }

  async execute(sql: string, params: SqlValue[] = []): Promise<WriteResult> {
    const [result] = await this.pool.execute<ResultSetHeader>(sql, params);
    return { insertId: result.insertId, affectedRows: result.affectedRows };
  }
}

export function createDatabaseFromEnv(): MySQLDatabase {
  const config: MySQLConfig = {
    host: MYSQL_HOST,
    port: MYSQL_PORT,
    user: MYSQL_USER,
    password: MYSQL_PASSWORD,
    database: MYSQL_DATABASE,
    ssl: MYSQL_SSL,
    connectionLimit: MYSQL_CONNECTION_LIMIT,
  };

  console.log(`✅ Using MySQL config from environment variables (${config.host}:${config.port}/${config.database})`);
  return new MySQLDatabase(config);
}
