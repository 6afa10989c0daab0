import mysql, { type Pool, type PoolConnection, type RowDataPacket } from 'mysql2/promise';
import { ConnectionConfig } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import { IDbConnection, IDbSession, MetadataRow, QueryParam } from '../interfaces.js';

export class MysqlConnection implements IDbConnection {
  private pool: Pool;
  readonly database: string;

  constructor(config: ConnectionConfig) {
    this.database = config.database;
    this.pool = mysql.createPool({
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password: config.password,
      charset: 'utf8mb4',
      connectionLimit: 4,
      connectTimeout: 10000,
    });
  }

  async query(text: string, params?: QueryParam[]): Promise<MetadataRow[]> {
    const start = Date.now();
    try {
      const [rows] = await this.pool.query<RowDataPacket[]>(text, params);
      const duration = Date.now() - start;
      logger.debug({ query: text, duration, rows: rows.length }, 'Executed query');
      return rows.map(row => ({ ...row }));
    } catch (error) {
      logger.debug({ query: text, error }, 'Query execution failed');
      throw error;
    }
  }

  async withSession<T>(work: (session: IDbSession) => Promise<T>): Promise<T> {
    const conn: PoolConnection = await this.pool.getConnection();
    try {
      return await work({
        execute: async (statement: string) => {
          await conn.query(statement);
        },
      });
    } finally {
      conn.release();
    }
  }

  async close() {
    await this.pool.end();
    logger.info({ database: this.database }, 'Database connection pool closed');
  }
}
