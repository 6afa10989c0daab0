import {
  Classification,
  ColumnChange,
  ColumnDiff,
  ComparisonResult,
  FieldDelta,
  ForeignKeyDiff,
  IndexDiff,
  TableDetail,
  TableStatus,
} from '../types/comparison.js';
import { ColumnDef, ForeignKeyDef, IndexDef, SchemaModel, SyncWarning, TableModel } from '../types/index.js';

const TIMESTAMP_DEFAULT = /^(?:current_timestamp|now)\s*(?:\(\s*(\d*)\s*\))?$/i;

const compareNames = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

export function normalizeType(type: string): string {
  return type.trim().replace(/\s+/g, ' ');
}

export function normalizeDefault(value: string | null): string {
  if (value === null) return '';
  const trimmed = value.trim();
  const timestamp = TIMESTAMP_DEFAULT.exec(trimmed);
  if (timestamp) {
    return timestamp[1] ? `CURRENT_TIMESTAMP(${timestamp[1]})` : 'CURRENT_TIMESTAMP';
  }
  return trimmed;
}

export function normalizeExtra(extra: string): string {
  return extra
    .replace(/\bDEFAULT_GENERATED\b/gi, '')
    .toLowerCase()
    .replace(/current_timestamp\(\)/g, 'current_timestamp')
    .replace(/\s+/g, ' ')
    .trim();
}

const describeNullable = (nullable: boolean) => (nullable ? 'NULL' : 'NOT NULL');
const describeDefault = (value: string | null) => (value === null ? '(none)' : value);
const describeExtra = (extra: string) => extra.trim() || '(none)';

export function compareColumns(source: ColumnDef, target: ColumnDef): FieldDelta[] {
  const deltas: FieldDelta[] = [];

  if (normalizeType(source.type) !== normalizeType(target.type)) {
    deltas.push({ field: 'type', from: target.type, to: source.type });
  }
  if (source.nullable !== target.nullable) {
    deltas.push({ field: 'nullable', from: describeNullable(target.nullable), to: describeNullable(source.nullable) });
  }
  if (normalizeDefault(source.defaultValue) !== normalizeDefault(target.defaultValue)) {
    deltas.push({ field: 'default', from: describeDefault(target.defaultValue), to: describeDefault(source.defaultValue) });
  }
  if (normalizeExtra(source.extra) !== normalizeExtra(target.extra)) {
    deltas.push({ field: 'extra', from: describeExtra(target.extra), to: describeExtra(source.extra) });
  }

  return deltas;
}

export function columnsEqual(a: ColumnDef, b: ColumnDef): boolean {
  return compareColumns(a, b).length === 0;
}

function indexesEqual(a: IndexDef, b: IndexDef): boolean {
  return a.name === b.name && a.columns.length === b.columns.length && a.columns.every((c, i) => c === b.columns[i]);
}

const foreignKeyId = (fk: ForeignKeyDef) => `${fk.name}\u0000${fk.column}`;

function foreignKeysEqual(a: ForeignKeyDef, b: ForeignKeyDef): boolean {
  return (
    a.name === b.name &&
    a.column === b.column &&
    a.referencedTable === b.referencedTable &&
    a.referencedColumn === b.referencedColumn &&
    a.updateRule === b.updateRule &&
    a.deleteRule === b.deleteRule
  );
}

const compareForeignKeys = (a: ForeignKeyDef, b: ForeignKeyDef) => compareNames(a.name, b.name) || compareNames(a.column, b.column);

// Index and foreign key differences are reported but never mark a table modified
export class SchemaComparator {
  classify(source: SchemaModel, target: SchemaModel): Classification {
    const newTables: string[] = [];
    const removedTables: string[] = [];
    const modifiedTables: string[] = [];
    const identicalTables: string[] = [];

    for (const name of [...source.tables.keys()].sort(compareNames)) {
      if (!target.tables.has(name)) {
        newTables.push(name);
      } else if (this.tableHasDifferences(name, source, target)) {
        modifiedTables.push(name);
      } else {
        identicalTables.push(name);
      }
    }

    for (const name of [...target.tables.keys()].sort(compareNames)) {
      if (!source.tables.has(name)) removedTables.push(name);
    }

    return { newTables, removedTables, modifiedTables, identicalTables };
  }

  columnDiff(table: string, source: SchemaModel, target: SchemaModel): ColumnDiff {
    const sourceCols = new Map((source.tables.get(table)?.columns ?? []).map(c => [c.name, c]));
    const targetCols = new Map((target.tables.get(table)?.columns ?? []).map(c => [c.name, c]));

    const added = [...sourceCols.keys()].filter(name => !targetCols.has(name)).sort(compareNames);
    const removed = [...targetCols.keys()].filter(name => !sourceCols.has(name)).sort(compareNames);
    const changed: ColumnChange[] = [];

    for (const name of [...sourceCols.keys()].sort(compareNames)) {
      const sCol = sourceCols.get(name);
      const tCol = targetCols.get(name);
      if (!sCol || !tCol) continue;

      const deltas = compareColumns(sCol, tCol);
      if (deltas.length > 0) changed.push({ column: name, deltas });
    }

    return { added, removed, changed };
  }

  indexDiff(table: string, source: SchemaModel, target: SchemaModel): IndexDiff {
    const sourceIdx = new Map((source.tables.get(table)?.indexes ?? []).map(i => [i.name, i]));
    const targetIdx = new Map((target.tables.get(table)?.indexes ?? []).map(i => [i.name, i]));
    const byName = (a: IndexDef, b: IndexDef) => compareNames(a.name, b.name);

    const added = [...sourceIdx.values()].filter(idx => {
      const other = targetIdx.get(idx.name);
      return !other || !indexesEqual(idx, other);
    });
    const removed = [...targetIdx.values()].filter(idx => {
      const other = sourceIdx.get(idx.name);
      return !other || !indexesEqual(idx, other);
    });

    return { added: added.sort(byName), removed: removed.sort(byName) };
  }

  foreignKeyDiff(table: string, source: SchemaModel, target: SchemaModel): ForeignKeyDiff {
    const sourceFks = new Map((source.tables.get(table)?.foreignKeys ?? []).map(fk => [foreignKeyId(fk), fk]));
    const targetFks = new Map((target.tables.get(table)?.foreignKeys ?? []).map(fk => [foreignKeyId(fk), fk]));

    const added = [...sourceFks.entries()]
      .filter(([id, fk]) => {
        const other = targetFks.get(id);
        return !other || !foreignKeysEqual(fk, other);
      })
      .map(([, fk]) => fk);
    const removed = [...targetFks.entries()]
      .filter(([id, fk]) => {
        const other = sourceFks.get(id);
        return !other || !foreignKeysEqual(fk, other);
      })
      .map(([, fk]) => fk);

    return { added: added.sort(compareForeignKeys), removed: removed.sort(compareForeignKeys) };
  }

  describeTable(table: string, source: SchemaModel, target: SchemaModel): TableDetail {
    const sTable = source.tables.get(table);
    const tTable = target.tables.get(table);
    const columns = this.columnDiff(table, source, target);

    let status: TableStatus;
    if (sTable && tTable) {
      status = this.tableHasDifferences(table, source, target) ? 'MODIFIED' : 'IDENTICAL';
    } else if (sTable) {
      status = 'NEW';
    } else if (tTable) {
      status = 'REMOVED';
    } else {
      throw new Error(`Table "${table}" exists in neither schema`);
    }

    return {
      table,
      status,
      sourceRows: sTable ? sTable.approximateRows : null,
      targetRows: tTable ? tTable.approximateRows : null,
      columns,
      indexes: this.indexDiff(table, source, target),
      foreignKeys: this.foreignKeyDiff(table, source, target),
      warnings: status === 'MODIFIED' && sTable && tTable ? this.assessRisks(sTable, tTable, columns) : [],
    };
  }

  analyze(source: SchemaModel, target: SchemaModel): ComparisonResult {
    const classification = this.classify(source, target);
    const details = new Map<string, TableDetail>();

    const ordered = [
      ...classification.newTables,
      ...classification.modifiedTables,
      ...classification.removedTables,
      ...classification.identicalTables,
    ];
    for (const table of ordered) {
      details.set(table, this.describeTable(table, source, target));
    }

    return {
      sourceDatabase: source.database,
      targetDatabase: target.database,
      classification,
      details,
      warnings: classification.modifiedTables.flatMap(table => details.get(table)?.warnings ?? []),
    };
  }

  private tableHasDifferences(table: string, source: SchemaModel, target: SchemaModel): boolean {
    const sTable = source.tables.get(table);
    const tTable = target.tables.get(table);
    if (!sTable || !tTable) return true;

    // Missing metadata forces a manual review instead of passing as identical
    if (sTable.incomplete.length > 0 || tTable.incomplete.length > 0) return true;

    const diff = this.columnDiff(table, source, target);
    return diff.added.length > 0 || diff.removed.length > 0 || diff.changed.length > 0;
  }

  private assessRisks(sTable: TableModel, tTable: TableModel, columns: ColumnDiff): SyncWarning[] {
    const table = sTable.name;
    const warnings: SyncWarning[] = [];

    const incomplete = [...new Set([...sTable.incomplete, ...tTable.incomplete])];
    if (incomplete.length > 0) {
      warnings.push({
        kind: 'PARTIAL_METADATA',
        table,
        message: `Table "${table}" is marked modified because its ${incomplete.join(', ')} metadata is incomplete; review it manually`,
      });
    }

    for (const column of columns.removed) {
      warnings.push({
        kind: 'UNSAFE_COLUMN_CHANGE',
        table,
        column,
        message: `Dropping column "${table}.${column}" discards its data`,
      });
    }

    for (const change of columns.changed) {
      for (const delta of change.deltas) {
        const column = change.column;
        if (delta.field === 'nullable' && delta.to === 'NOT NULL') {
          warnings.push({
            kind: 'UNSAFE_COLUMN_CHANGE',
            table,
            column,
            message: `Column "${table}.${column}" becomes NOT NULL; existing NULL values in the target will block or be coerced by the change`,
          });
        } else if (delta.field === 'type') {
          warnings.push({
            kind: 'UNSAFE_COLUMN_CHANGE',
            table,
            column,
            message: `Column "${table}.${column}" changes type from ${delta.from} to ${delta.to}; values may be converted or truncated`,
          });
        } else if (
          delta.field === 'extra' &&
          normalizeExtra(delta.to).includes('auto_increment') &&
          !normalizeExtra(delta.from).includes('auto_increment')
        ) {
          warnings.push({
            kind: 'UNSAFE_COLUMN_CHANGE',
            table,
            column,
            message: `Column "${table}.${column}" gains auto_increment; it must be indexed and hold unique values`,
          });
        }
      }
    }

    return warnings;
  }
}
