import { ColumnDef } from '../types/index.js';

export type MetadataRow = Record<string, unknown>;

export type QueryParam = string | number | boolean | null;

export interface IDbSession {
  execute(statement: string): Promise<void>;
}

export interface IDbConnection {
  readonly database: string;
  query(text: string, params?: QueryParam[]): Promise<MetadataRow[]>;
  // One pinned connection: USE and transactions carry across statements
  withSession<T>(work: (session: IDbSession) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

export interface IMetadataCatalog {
  currentDatabase(): Promise<string | null>;
  listBaseTables(database: string): Promise<MetadataRow[]>;
  getCreateStatement(database: string, table: string): Promise<MetadataRow[]>;
  getColumns(database: string, table: string): Promise<MetadataRow[]>;
  getIndexes(database: string, table: string): Promise<MetadataRow[]>;
  getForeignKeys(database: string, table: string): Promise<MetadataRow[]>;
  getForeignKeysWithoutRules(database: string, table: string): Promise<MetadataRow[]>;
}

export interface IDDLGenerator {
  quoteIdentifier(name: string): string;
  formatColumn(column: ColumnDef): string;
  generateUseDatabase(database: string): string;
  generateDisableForeignKeyChecks(): string;
  generateEnableForeignKeyChecks(): string;
  generateDropTable(table: string): string;
  generateCreateTable(createStatement: string): string;
  generateAddColumn(table: string, column: ColumnDef): string;
  generateDropColumn(table: string, columnName: string): string;
  generateModifyColumn(table: string, column: ColumnDef): string;
  generateTruncate(table: string): string;
  generateInsertHeader(table: string, columns: readonly string[]): string;
}
