import { IMetadataCatalog, MetadataRow } from '../src/engines/interfaces.js';
import { ColumnDef, SchemaModel, TableModel } from '../src/types/index.js';

export function column(name: string, type: string, overrides: Partial<ColumnDef> = {}): ColumnDef {
  return {
    name,
    type,
    nullable: true,
    defaultValue: null,
    extra: '',
    ordinalPosition: 1,
    keyRole: 'none',
    comment: '',
    ...overrides,
  };
}

export function table(name: string, columns: readonly ColumnDef[], overrides: Partial<TableModel> = {}): TableModel {
  return {
    name,
    createStatement: `CREATE TABLE \`${name}\` (\n  \`id\` int(11) NOT NULL\n) ENGINE=InnoDB`,
    engine: 'InnoDB',
    collation: 'utf8mb4_general_ci',
    approximateRows: 0,
    comment: '',
    columns: columns.map((col, index) => ({ ...col, ordinalPosition: index + 1 })),
    indexes: [],
    foreignKeys: [],
    incomplete: [],
    ...overrides,
  };
}

export function schema(database: string, tables: TableModel[]): SchemaModel {
  return {
    database,
    extractedAt: new Date(2026, 9, 18, 9, 30, 0),
    tables: new Map(tables.map(t => [t.name, t])),
  };
}

type CatalogTables = Record<
  string,
  {
    table?: MetadataRow;
    create?: string;
    columns?: MetadataRow[];
    indexes?: MetadataRow[];
    foreignKeys?: MetadataRow[];
  }
>;

/** In-memory catalog. Any method listed in `failures` rejects for the named table (or every table with '*'). */
export class FakeCatalog implements IMetadataCatalog {
  calls: string[] = [];

  constructor(
    private tables: CatalogTables,
    private options: { current?: string | null; failures?: Partial<Record<keyof IMetadataCatalog, string>> } = {}
  ) {}

  private fail(method: keyof IMetadataCatalog, tableName?: string) {
    const target = this.options.failures?.[method];
    if (target !== undefined && (target === '*' || target === tableName)) {
      throw new Error(`${method} failed for ${tableName ?? 'catalog'}`);
    }
  }

  async currentDatabase(): Promise<string | null> {
    this.calls.push('currentDatabase');
    this.fail('currentDatabase');
    return this.options.current ?? null;
  }

  async listBaseTables(database: string): Promise<MetadataRow[]> {
    this.calls.push(`listBaseTables:${database}`);
    this.fail('listBaseTables');
    return Object.entries(this.tables).map(([name, t]) => ({
      TABLE_NAME: name,
      ENGINE: 'InnoDB',
      TABLE_COLLATION: 'utf8mb4_general_ci',
      TABLE_ROWS: 0,
      TABLE_COMMENT: '',
      ...t.table,
    }));
  }

  async getCreateStatement(_database: string, name: string): Promise<MetadataRow[]> {
    this.fail('getCreateStatement', name);
    const create = this.tables[name]?.create;
    return create === undefined ? [] : [{ Table: name, 'Create Table': create }];
  }

  async getColumns(_database: string, name: string): Promise<MetadataRow[]> {
    this.fail('getColumns', name);
    return this.tables[name]?.columns ?? [];
  }

  async getIndexes(_database: string, name: string): Promise<MetadataRow[]> {
    this.fail('getIndexes', name);
    return this.tables[name]?.indexes ?? [];
  }

  async getForeignKeys(_database: string, name: string): Promise<MetadataRow[]> {
    this.fail('getForeignKeys', name);
    return this.tables[name]?.foreignKeys ?? [];
  }

  async getForeignKeysWithoutRules(_database: string, name: string): Promise<MetadataRow[]> {
    this.fail('getForeignKeysWithoutRules', name);
    return (this.tables[name]?.foreignKeys ?? []).map(row => ({ ...row, UPDATE_RULE: 'RESTRICT', DELETE_RULE: 'RESTRICT' }));
  }
}

export function columnRow(name: string, type: string, position: number, overrides: MetadataRow = {}): MetadataRow {
  return {
    COLUMN_NAME: name,
    COLUMN_TYPE: type,
    IS_NULLABLE: 'YES',
    COLUMN_DEFAULT: null,
    EXTRA: '',
    COLUMN_COMMENT: '',
    ORDINAL_POSITION: position,
    COLUMN_KEY: '',
    ...overrides,
  };
}
