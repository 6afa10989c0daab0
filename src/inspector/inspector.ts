import { z } from 'zod';
import { describeError, ExtractionError } from '../core/errors.js';
import { IMetadataCatalog, MetadataRow } from '../engines/interfaces.js';
import {
  ColumnDef,
  ForeignKeyDef,
  IndexDef,
  KeyRole,
  MetadataPart,
  SchemaModel,
  SyncWarning,
  TableModel,
} from '../types/index.js';
import { logger } from '../utils/logger.js';
import {
  columnRowSchema,
  createTableRowSchema,
  ForeignKeyRow,
  foreignKeyRowSchema,
  IndexRow,
  indexRowSchema,
  TableRow,
  tableRowSchema,
} from './rows.js';

export interface ExtractionResult {
  schema: SchemaModel;
  warnings: SyncWarning[];
}

const PART_LABELS: Record<MetadataPart, string> = {
  createStatement: 'CREATE statement',
  columns: 'columns',
  indexes: 'indexes',
  foreignKeys: 'foreign keys',
};

function parseRows<T extends z.ZodTypeAny>(schema: T, rows: MetadataRow[]): z.infer<T>[] {
  return z.array(schema).parse(rows);
}

function toKeyRole(columnKey: string | null | undefined): KeyRole {
  switch (columnKey) {
    case 'PRI':
      return 'primary';
    case 'UNI':
      return 'unique';
    case 'MUL':
      return 'indexed';
    default:
      return 'none';
  }
}

export class SchemaInspector {
  constructor(
    private catalog: IMetadataCatalog,
    private clock: () => Date = () => new Date()
  ) {}

  async extract(database?: string): Promise<ExtractionResult> {
    const name = database || (await this.resolveDatabase());

    let tableRows: TableRow[];
    try {
      tableRows = parseRows(tableRowSchema, await this.catalog.listBaseTables(name));
    } catch (error) {
      throw new ExtractionError(`Could not list tables of database "${name}": ${describeError(error)}`, { cause: error });
    }

    logger.info({ database: name, tables: tableRows.length }, 'Analyzing database');

    const warnings: SyncWarning[] = [];
    const tables = new Map<string, TableModel>();

    for (const row of tableRows) {
      tables.set(row.TABLE_NAME, await this.inspectTable(name, row, warnings));
    }

    return {
      schema: { database: name, extractedAt: this.clock(), tables },
      warnings,
    };
  }

  private async resolveDatabase(): Promise<string> {
    let current: string | null;
    try {
      current = await this.catalog.currentDatabase();
    } catch (error) {
      throw new ExtractionError(`Could not determine the current database: ${describeError(error)}`, { cause: error });
    }

    if (!current) {
      throw new ExtractionError('No database selected on the connection and none was supplied');
    }
    return current;
  }

  private async inspectTable(database: string, info: TableRow, warnings: SyncWarning[]): Promise<TableModel> {
    const table = info.TABLE_NAME;
    const incomplete: MetadataPart[] = [];
    logger.debug(`Inspecting metadata for table: ${database}.${table}`);

    const attempt = async <T>(part: MetadataPart, load: () => Promise<T>): Promise<T | null> => {
      try {
        return await load();
      } catch (error) {
        incomplete.push(part);
        const message = `Could not read ${PART_LABELS[part]} of table "${table}": ${describeError(error)}`;
        warnings.push({ kind: 'PARTIAL_METADATA', table, message });
        logger.warn({ table, part, error: describeError(error) }, 'Partial metadata; table kept with best-effort data');
        return null;
      }
    };

    const createStatement = await attempt('createStatement', () => this.loadCreateStatement(database, table));
    const columns = await attempt('columns', () => this.loadColumns(database, table));
    const indexes = await attempt('indexes', () => this.loadIndexes(database, table));
    const foreignKeys = await attempt('foreignKeys', () => this.loadForeignKeys(database, table, warnings));

    return {
      name: table,
      createStatement,
      engine: info.ENGINE ?? null,
      collation: info.TABLE_COLLATION ?? null,
      approximateRows: info.TABLE_ROWS ?? 0,
      comment: info.TABLE_COMMENT ?? '',
      columns: columns ?? [],
      indexes: indexes ?? [],
      foreignKeys: foreignKeys ?? [],
      incomplete,
    };
  }

  private async loadCreateStatement(database: string, table: string): Promise<string> {
    const rows = parseRows(createTableRowSchema, await this.catalog.getCreateStatement(database, table));
    if (rows.length === 0) {
      throw new Error('SHOW CREATE TABLE returned no rows');
    }
    return rows[0]['Create Table'];
  }

  private async loadColumns(database: string, table: string): Promise<ColumnDef[]> {
    const rows = parseRows(columnRowSchema, await this.catalog.getColumns(database, table));
    const seen = new Set<string>();

    const columns = rows.map((row): ColumnDef => {
      if (seen.has(row.COLUMN_NAME)) {
        throw new Error(`Duplicate column "${row.COLUMN_NAME}" in catalog output`);
      }
      seen.add(row.COLUMN_NAME);

      return {
        name: row.COLUMN_NAME,
        type: row.COLUMN_TYPE,
        nullable: row.IS_NULLABLE === 'YES',
        defaultValue: row.COLUMN_DEFAULT ?? null,
        extra: row.EXTRA ?? '',
        ordinalPosition: row.ORDINAL_POSITION,
        keyRole: toKeyRole(row.COLUMN_KEY),
        comment: row.COLUMN_COMMENT ?? '',
      };
    });

    return columns.sort((a, b) => a.ordinalPosition - b.ordinalPosition);
  }

  private async loadIndexes(database: string, table: string): Promise<IndexDef[]> {
    const rows = parseRows(indexRowSchema, await this.catalog.getIndexes(database, table));
    const grouped = new Map<string, IndexRow[]>();

    for (const row of rows) {
      const parts = grouped.get(row.Key_name) ?? [];
      parts.push(row);
      grouped.set(row.Key_name, parts);
    }

    return Array.from(grouped, ([name, parts]) => ({
      name,
      columns: [...parts]
        .sort((a, b) => a.Seq_in_index - b.Seq_in_index)
        .map(part => part.Column_name ?? `(${part.Expression ?? 'expression'})`),
      unique: parts[0].Non_unique === 0,
    }));
  }

  private async loadForeignKeys(database: string, table: string, warnings: SyncWarning[]): Promise<ForeignKeyDef[]> {
    let rows: ForeignKeyRow[];
    try {
      rows = parseRows(foreignKeyRowSchema, await this.catalog.getForeignKeys(database, table));
    } catch (error) {
      const message = `Could not read foreign key rules of table "${table}"; assuming RESTRICT: ${describeError(error)}`;
      warnings.push({ kind: 'FOREIGN_KEY_RULES_DEGRADED', table, message });
      logger.warn({ table, error: describeError(error) }, 'Falling back to foreign keys without rules');
      rows = parseRows(foreignKeyRowSchema, await this.catalog.getForeignKeysWithoutRules(database, table));
    }

    return rows.map(row => ({
      name: row.CONSTRAINT_NAME,
      column: row.COLUMN_NAME,
      referencedTable: row.REFERENCED_TABLE_NAME,
      referencedColumn: row.REFERENCED_COLUMN_NAME,
      updateRule: row.UPDATE_RULE,
      deleteRule: row.DELETE_RULE,
    }));
  }
}
