import { IDbConnection, IMetadataCatalog, MetadataRow } from '../interfaces.js';
import { quoteIdentifier } from './MysqlDDLGenerator.js';

export class MysqlCatalog implements IMetadataCatalog {
  constructor(private db: IDbConnection) {}

  async currentDatabase(): Promise<string | null> {
    const rows = await this.db.query('SELECT DATABASE() AS current_db');
    const value = rows[0]?.current_db;
    return typeof value === 'string' && value.length > 0 ? value : null;
  }

  async listBaseTables(database: string): Promise<MetadataRow[]> {
    return this.db.query(`
      SELECT
        TABLE_NAME,
        ENGINE,
        TABLE_COLLATION,
        TABLE_ROWS,
        DATA_LENGTH,
        TABLE_COMMENT
      FROM INFORMATION_SCHEMA.TABLES
      WHERE TABLE_SCHEMA = ?
      AND TABLE_TYPE = 'BASE TABLE'
      ORDER BY TABLE_NAME
    `, [database]);
  }

  async getCreateStatement(database: string, table: string): Promise<MetadataRow[]> {
    return this.db.query(`SHOW CREATE TABLE ${quoteIdentifier(database)}.${quoteIdentifier(table)}`);
  }

  async getColumns(database: string, table: string): Promise<MetadataRow[]> {
    return this.db.query(`
      SELECT
        COLUMN_NAME,
        COLUMN_TYPE,
        IS_NULLABLE,
        COLUMN_DEFAULT,
        EXTRA,
        COLUMN_COMMENT,
        ORDINAL_POSITION,
        COLUMN_KEY
      FROM INFORMATION_SCHEMA.COLUMNS
      WHERE TABLE_SCHEMA = ?
      AND TABLE_NAME = ?
      ORDER BY ORDINAL_POSITION
    `, [database, table]);
  }

  async getIndexes(database: string, table: string): Promise<MetadataRow[]> {
    return this.db.query(`SHOW INDEX FROM ${quoteIdentifier(table)} FROM ${quoteIdentifier(database)}`);
  }

  async getForeignKeys(database: string, table: string): Promise<MetadataRow[]> {
    return this.db.query(`
      SELECT
        kcu.CONSTRAINT_NAME,
        kcu.COLUMN_NAME,
        kcu.REFERENCED_TABLE_NAME,
        kcu.REFERENCED_COLUMN_NAME,
        COALESCE(rc.UPDATE_RULE, 'RESTRICT') AS UPDATE_RULE,
        COALESCE(rc.DELETE_RULE, 'RESTRICT') AS DELETE_RULE
      FROM INFORMATION_SCHEMA.KEY_COLUMN_USAGE kcu
      LEFT JOIN INFORMATION_SCHEMA.REFERENTIAL_CONSTRAINTS rc
        ON kcu.CONSTRAINT_NAME = rc.CONSTRAINT_NAME
        AND kcu.TABLE_SCHEMA = rc.CONSTRAINT_SCHEMA
      WHERE kcu.TABLE_SCHEMA = ?
      AND kcu.TABLE_NAME = ?
      AND kcu.REFERENCED_TABLE_NAME IS NOT NULL
      ORDER BY kcu.CONSTRAINT_NAME, kcu.ORDINAL_POSITION
    `, [database, table]);
  }

  // Older MariaDB servers lack REFERENTIAL_CONSTRAINTS
  async getForeignKeysWithoutRules(database: string, table: string): Promise<MetadataRow[]> {
    return this.db.query(`
      SELECT
        CONSTRAINT_NAME,
        COLUMN_NAME,
        REFERENCED_TABLE_NAME,
        REFERENCED_COLUMN_NAME,
        'RESTRICT' AS UPDATE_RULE,
        'RESTRICT' AS DELETE_RULE
      FROM INFORMATION_SCHEMA.KEY_COLUMN_USAGE
      WHERE TABLE_SCHEMA = ?
      AND TABLE_NAME = ?
      AND REFERENCED_TABLE_NAME IS NOT NULL
      ORDER BY CONSTRAINT_NAME, ORDINAL_POSITION
    `, [database, table]);
  }
}
