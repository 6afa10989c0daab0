import { ForeignKeyDef, IndexDef, SyncWarning } from './index.js';

export type TableStatus = 'NEW' | 'REMOVED' | 'MODIFIED' | 'IDENTICAL';

export interface Classification {
  readonly newTables: readonly string[];
  readonly removedTables: readonly string[];
  readonly modifiedTables: readonly string[];
  readonly identicalTables: readonly string[];
}

export type ColumnField = 'type' | 'nullable' | 'default' | 'extra';

// from = target value, to = source value
export interface FieldDelta {
  field: ColumnField;
  from: string;
  to: string;
}

export interface ColumnChange {
  column: string;
  deltas: FieldDelta[];
}

export interface ColumnDiff {
  added: string[];
  removed: string[];
  changed: ColumnChange[];
}

export interface IndexDiff {
  added: IndexDef[];
  removed: IndexDef[];
}

export interface ForeignKeyDiff {
  added: ForeignKeyDef[];
  removed: ForeignKeyDef[];
}

export interface TableDetail {
  table: string;
  status: TableStatus;
  sourceRows: number | null;
  targetRows: number | null;
  columns: ColumnDiff;
  indexes: IndexDiff;
  foreignKeys: ForeignKeyDiff;
  warnings: SyncWarning[];
}

export interface ComparisonResult {
  sourceDatabase: string;
  targetDatabase: string;
  classification: Classification;
  details: ReadonlyMap<string, TableDetail>;
  warnings: SyncWarning[];
}
