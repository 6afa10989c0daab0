import dayjs from 'dayjs';
import { IDDLGenerator } from '../engines/interfaces.js';
import { MysqlDDLGenerator } from '../engines/mysql/MysqlDDLGenerator.js';
import { AlterClause, DataSyncMarker, Plan, StructureOperation } from '../types/plan.js';

export interface RenderContext {
  sourceDatabase: string;
  targetDatabase: string;
  generatedAt: Date;
  sourceConnection?: { host: string; port: number; user: string };
}

const formatCount = (n: number) => n.toLocaleString('en-US');

export class ScriptGenerator {
  constructor(private ddl: IDDLGenerator = new MysqlDDLGenerator()) {}

  renderStructure(plan: Plan, context: RenderContext): string[] {
    const body = plan.structure.flatMap(operation => [...this.renderOperation(operation), '']);
    return this.wrap('Structure Synchronization Script', context, body);
  }

  renderDataPlan(plan: Plan, context: RenderContext): string[] {
    if (plan.dataSync.length === 0) return [];

    const body = plan.dataSync.flatMap(marker => [...this.renderDataMarker(marker, context), '']);
    return this.wrap('Data Synchronization Script', context, body);
  }

  private wrap(title: string, context: RenderContext, body: string[]): string[] {
    return [
      `-- ${title}`,
      `-- Generated on: ${dayjs(context.generatedAt).format('YYYY-MM-DD HH:mm:ss')}`,
      `-- Source: ${context.sourceDatabase} → Target: ${context.targetDatabase}`,
      '',
      this.ddl.generateUseDatabase(context.targetDatabase),
      this.ddl.generateDisableForeignKeyChecks(),
      '',
      ...body,
      this.ddl.generateEnableForeignKeyChecks(),
    ];
  }

  private renderOperation(operation: StructureOperation): string[] {
    switch (operation.kind) {
      case 'DROP_TABLE':
        return [`-- Removing table ${operation.table}`, this.ddl.generateDropTable(operation.table)];
      case 'CREATE_TABLE':
        return [`-- Creating table ${operation.table}`, this.ddl.generateCreateTable(operation.createStatement)];
      case 'ALTER_TABLE':
        if (operation.clauses.length === 0) {
          return [`-- Modifying table structure ${operation.table}`, `-- No column changes for ${operation.table}`];
        }
        return [
          `-- Modifying table structure ${operation.table}`,
          ...operation.clauses.map(clause => this.renderClause(operation.table, clause)),
        ];
    }
  }

  private renderClause(table: string, clause: AlterClause): string {
    switch (clause.action) {
      case 'ADD_COLUMN':
        return this.ddl.generateAddColumn(table, clause.column);
      case 'DROP_COLUMN':
        return this.ddl.generateDropColumn(table, clause.columnName);
      case 'MODIFY_COLUMN':
        return this.ddl.generateModifyColumn(table, clause.column);
    }
  }

  private renderDataMarker(marker: DataSyncMarker, context: RenderContext): string[] {
    const source = context.sourceConnection;
    const dumpCommand = source
      ? `mysqldump -h ${source.host} -P ${source.port} -u ${source.user} -p ${context.sourceDatabase} ${marker.table} --no-create-info`
      : `mysqldump -p ${context.sourceDatabase} ${marker.table} --no-create-info`;

    return [
      `-- Synchronizing data for table ${marker.table} (approximately ${formatCount(marker.approximateRows)} records)`,
      this.ddl.generateTruncate(marker.table),
      `-- ${this.ddl.generateInsertHeader(marker.table, marker.columns)}`,
      `-- WARNING: Data for table ${marker.table} must be exported separately`,
      `-- Use: ${dumpCommand}`,
    ];
  }
}
