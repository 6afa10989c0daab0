export type DbType = 'mysql' | 'mariadb';

export interface ConnectionConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password?: string;
}

export type KeyRole = 'primary' | 'unique' | 'indexed' | 'none';

export interface ColumnDef {
  readonly name: string;
  readonly type: string;
  readonly nullable: boolean;
  /** `null` means the column has no default; the string `'NULL'` is an explicit NULL default. */
  readonly defaultValue: string | null;
  readonly extra: string;
  readonly ordinalPosition: number;
  readonly keyRole: KeyRole;
  readonly comment: string;
}

export interface IndexDef {
  readonly name: string;
  readonly columns: readonly string[];
  readonly unique: boolean;
}

export const REFERENTIAL_RULES = ['RESTRICT', 'CASCADE', 'SET NULL', 'NO ACTION', 'SET DEFAULT'] as const;

export type ReferentialRule = (typeof REFERENTIAL_RULES)[number];

export interface ForeignKeyDef {
  readonly name: string;
  readonly column: string;
  readonly referencedTable: string;
  readonly referencedColumn: string;
  readonly updateRule: ReferentialRule;
  readonly deleteRule: ReferentialRule;
}

export type MetadataPart = 'createStatement' | 'columns' | 'indexes' | 'foreignKeys';

export interface TableModel {
  readonly name: string;
  readonly createStatement: string | null;
  readonly engine: string | null;
  readonly collation: string | null;
  // InnoDB estimate, display only
  readonly approximateRows: number;
  readonly comment: string;
  readonly columns: readonly ColumnDef[];
  readonly indexes: readonly IndexDef[];
  readonly foreignKeys: readonly ForeignKeyDef[];
  readonly incomplete: readonly MetadataPart[];
}

export interface SchemaModel {
  readonly database: string;
  readonly extractedAt: Date;
  readonly tables: ReadonlyMap<string, TableModel>;
}

export type WarningKind =
  | 'PARTIAL_METADATA'
  | 'FOREIGN_KEY_RULES_DEGRADED'
  | 'INVALID_SELECTION'
  | 'UNSAFE_COLUMN_CHANGE';

export interface SyncWarning {
  kind: WarningKind;
  table?: string;
  column?: string;
  message: string;
}
