import { Classification } from '../types/comparison.js';
import { SchemaModel, SyncWarning } from '../types/index.js';
import { AlterClause, DataSyncMarker, PlanResult, Selection, StructureOperation, SyncAction } from '../types/plan.js';
import { logger } from '../utils/logger.js';
import { SchemaComparator } from './comparator.js';

export class PlanBuilder {
  constructor(private comparator: SchemaComparator = new SchemaComparator()) {}

  build(classification: Classification, selection: Selection, source: SchemaModel, target: SchemaModel): PlanResult {
    const warnings: SyncWarning[] = [];
    const removed = new Set(classification.removedTables);
    const syncable = new Set([...classification.newTables, ...classification.modifiedTables]);

    const drops: string[] = [];
    const structureOnly: string[] = [];
    const structureAndData: string[] = [];

    const reject = (table: string, action: SyncAction, reason: string) => {
      const message = `Ignoring "${action}" for table "${table}": ${reason}`;
      warnings.push({ kind: 'INVALID_SELECTION', table, message });
      logger.warn({ table, action }, message);
    };

    for (const [table, action] of selection) {
      if (!source.tables.has(table) && !target.tables.has(table)) {
        if (action !== 'skip') reject(table, action, 'table exists in neither database');
        continue;
      }

      switch (action) {
        case 'skip':
          break;
        case 'drop':
          if (removed.has(table)) drops.push(table);
          else reject(table, action, 'only tables that exist solely in the target can be dropped');
          break;
        case 'structure_only':
        case 'structure_and_data':
          if (!syncable.has(table)) {
            reject(table, action, 'only new or modified tables can be synchronized');
          } else if (action === 'structure_only') {
            structureOnly.push(table);
          } else {
            structureAndData.push(table);
          }
          break;
      }
    }

    const structure: StructureOperation[] = drops.map(table => ({ kind: 'DROP_TABLE', table }));

    for (const table of [...structureOnly, ...structureAndData]) {
      const operation = this.planTable(table, source, target, warnings);
      if (operation) structure.push(operation);
    }

    const dataSync: DataSyncMarker[] = structureAndData.flatMap(table => {
      const sTable = source.tables.get(table);
      if (!sTable) return [];
      return [{ table, columns: sTable.columns.map(c => c.name), approximateRows: sTable.approximateRows }];
    });

    return { plan: { structure, dataSync }, warnings };
  }

  private planTable(table: string, source: SchemaModel, target: SchemaModel, warnings: SyncWarning[]): StructureOperation | null {
    const sTable = source.tables.get(table);
    if (!sTable) return null;

    const tTable = target.tables.get(table);

    if (!tTable) {
      if (sTable.createStatement === null) {
        warnings.push({
          kind: 'PARTIAL_METADATA',
          table,
          message: `No CREATE statement captured for new table "${table}"; it was left out of the structure script`,
        });
        return null;
      }
      return { kind: 'CREATE_TABLE', table, createStatement: sTable.createStatement };
    }

    if (sTable.incomplete.includes('columns') || tTable.incomplete.includes('columns')) {
      warnings.push({
        kind: 'PARTIAL_METADATA',
        table,
        message: `Column metadata of "${table}" is incomplete; no ALTER statements were generated for it`,
      });
      return null;
    }

    const diff = this.comparator.columnDiff(table, source, target);
    const sourceColumns = new Map(sTable.columns.map(c => [c.name, c]));
    const clauses: AlterClause[] = [];

    for (const name of diff.added) {
      const column = sourceColumns.get(name);
      if (column) clauses.push({ action: 'ADD_COLUMN', column });
    }
    for (const name of diff.removed) {
      clauses.push({ action: 'DROP_COLUMN', columnName: name });
    }
    for (const change of diff.changed) {
      const column = sourceColumns.get(change.column);
      if (column) clauses.push({ action: 'MODIFY_COLUMN', column, deltas: change.deltas });
    }

    return { kind: 'ALTER_TABLE', table, clauses };
  }
}
