import { FieldDelta } from './comparison.js';
import { ColumnDef, SyncWarning } from './index.js';

export const SYNC_ACTIONS = ['structure_only', 'structure_and_data', 'skip', 'drop'] as const;

export type SyncAction = (typeof SYNC_ACTIONS)[number];

export type Selection = ReadonlyMap<string, SyncAction>;

export type AlterClause =
  | { action: 'ADD_COLUMN'; column: ColumnDef }
  | { action: 'DROP_COLUMN'; columnName: string }
  | { action: 'MODIFY_COLUMN'; column: ColumnDef; deltas: FieldDelta[] };

export type StructureOperation =
  | { kind: 'DROP_TABLE'; table: string }
  | { kind: 'CREATE_TABLE'; table: string; createStatement: string }
  | { kind: 'ALTER_TABLE'; table: string; clauses: AlterClause[] };

export interface DataSyncMarker {
  table: string;
  columns: string[];
  approximateRows: number;
}

export interface Plan {
  readonly structure: readonly StructureOperation[];
  readonly dataSync: readonly DataSyncMarker[];
}

export interface PlanResult {
  plan: Plan;
  warnings: SyncWarning[];
}
