import Table from 'cli-table3';
import pc from 'picocolors';
import { ComparisonResult, TableDetail } from '../types/comparison.js';
import { SchemaModel, SyncWarning } from '../types/index.js';
import { Selection, SyncAction } from '../types/plan.js';

const RULE = '='.repeat(80);
const IDENTICAL_LISTED = 10;

const count = (n: number | null) => (n ?? 0).toLocaleString('en-US');

export function printAnalysis(result: ComparisonResult) {
  const { classification, details } = result;

  console.log(`\n${RULE}\n${pc.bold('DATABASE DIFFERENCES ANALYSIS')}  ${pc.dim(`${result.sourceDatabase} → ${result.targetDatabase}`)}\n${RULE}`);

  const summary = new Table({ head: ['New', 'Removed', 'Modified', 'Identical'] });
  summary.push([
    classification.newTables.length,
    classification.removedTables.length,
    classification.modifiedTables.length,
    classification.identicalTables.length,
  ]);
  console.log(summary.toString());

  if (classification.newTables.length > 0) {
    console.log(`\n${pc.green(`NEW TABLES (${classification.newTables.length})`)} ${pc.dim('exist only in source')}`);
    for (const table of classification.newTables) {
      console.log(`   • ${table} (${count(details.get(table)?.sourceRows ?? 0)} records)`);
    }
  }

  if (classification.removedTables.length > 0) {
    console.log(`\n${pc.red(`TABLES TO REMOVE (${classification.removedTables.length})`)} ${pc.dim('exist only in target')}`);
    for (const table of classification.removedTables) {
      console.log(`   • ${table} (${count(details.get(table)?.targetRows ?? 0)} records)`);
    }
  }

  if (classification.modifiedTables.length > 0) {
    console.log(`\n${pc.yellow(`MODIFIED TABLES (${classification.modifiedTables.length})`)}`);
    for (const table of classification.modifiedTables) {
      const detail = details.get(table);
      if (!detail) continue;
      console.log(`   • ${table} (source: ${count(detail.sourceRows)} → target: ${count(detail.targetRows)} records)`);
      printChangeList(detail);
    }
  }

  if (classification.identicalTables.length > 0) {
    console.log(`\n${pc.cyan(`IDENTICAL TABLES (${classification.identicalTables.length})`)}`);
    classification.identicalTables.slice(0, IDENTICAL_LISTED).forEach(table => console.log(`   • ${table}`));
    if (classification.identicalTables.length > IDENTICAL_LISTED) {
      console.log(`   • ... and ${classification.identicalTables.length - IDENTICAL_LISTED} more tables`);
    }
  }
}

function printChangeList(detail: TableDetail) {
  const { columns } = detail;
  if (columns.added.length > 0) console.log(`     → New columns: ${columns.added.join(', ')}`);
  if (columns.removed.length > 0) console.log(`     → Removed columns: ${columns.removed.join(', ')}`);
  if (columns.changed.length > 0) console.log(`     → Modified columns: ${columns.changed.map(c => c.column).join(', ')}`);
}

export function printTableDetail(detail: TableDetail, source: SchemaModel, target: SchemaModel) {
  console.log(`\n${'='.repeat(60)}\n${pc.bold(`TABLE DETAILS: ${detail.table}`)}\n${'='.repeat(60)}`);

  if (detail.status === 'NEW' || detail.status === 'REMOVED') {
    const model = detail.status === 'NEW' ? source.tables.get(detail.table) : target.tables.get(detail.table);
    if (!model) return;

    console.log(detail.status === 'NEW' ? pc.green('NEW TABLE (does not exist in target)') : pc.red('TABLE EXISTS ONLY IN TARGET'));
    console.log(`   Engine: ${model.engine ?? 'N/A'}`);
    console.log(`   Records: ${count(model.approximateRows)}`);

    const structure = new Table({ head: ['Column', 'Type', 'Null', 'Default', 'Extra'] });
    for (const col of model.columns) {
      structure.push([col.name, col.type, col.nullable ? 'YES' : 'NO', col.defaultValue ?? '', col.extra]);
    }
    console.log(structure.toString());
    return;
  }

  console.log(`RECORDS: Source ${count(detail.sourceRows)} → Target ${count(detail.targetRows)}`);

  const sourceTable = source.tables.get(detail.table);
  const targetTable = target.tables.get(detail.table);
  const changes = new Table({ head: ['Change', 'Column/Index', 'Target (Actual)', 'Source (Expected)'], wordWrap: true });

  for (const name of detail.columns.added) {
    const col = sourceTable?.columns.find(c => c.name === name);
    changes.push(['+ column', name, '-', col ? `${col.type} ${col.nullable ? 'NULL' : 'NOT NULL'}` : '-']);
  }
  for (const name of detail.columns.removed) {
    const col = targetTable?.columns.find(c => c.name === name);
    changes.push(['- column', name, col?.type ?? '-', '-']);
  }
  for (const change of detail.columns.changed) {
    for (const delta of change.deltas) {
      changes.push([`~ ${delta.field}`, change.column, delta.from, delta.to]);
    }
  }
  for (const idx of detail.indexes.added) changes.push(['+ index', idx.name, '-', `(${idx.columns.join(', ')})`]);
  for (const idx of detail.indexes.removed) changes.push(['- index', idx.name, `(${idx.columns.join(', ')})`, '-']);
  for (const fk of detail.foreignKeys.added) changes.push(['+ foreign key', fk.name, '-', `${fk.column} → ${fk.referencedTable}.${fk.referencedColumn}`]);
  for (const fk of detail.foreignKeys.removed) changes.push(['- foreign key', fk.name, `${fk.column} → ${fk.referencedTable}.${fk.referencedColumn}`, '-']);

  if (changes.length === 0) {
    console.log(pc.green('\nIdentical structures (difference only in data)'));
  } else {
    console.log(changes.toString());
  }

  printWarnings(detail.warnings);
}

export function printWarnings(warnings: readonly SyncWarning[]) {
  for (const warning of warnings) {
    console.log(`   ${pc.yellow('⚠')} ${pc.dim(`[${warning.kind}]`)} ${warning.message}`);
  }
}

const ACTION_LABELS: Record<SyncAction, string> = {
  structure_only: 'STRUCTURE ONLY',
  structure_and_data: 'STRUCTURE + DATA',
  drop: 'TABLES TO REMOVE',
  skip: 'SKIPPED TABLES',
};

export function printSelectionSummary(selection: Selection) {
  console.log(`\n${RULE}\n${pc.bold('SELECTION SUMMARY')}\n${RULE}`);

  for (const action of ['structure_only', 'structure_and_data', 'drop', 'skip'] as const) {
    const tables = [...selection].filter(([, chosen]) => chosen === action).map(([table]) => table);
    if (tables.length === 0) continue;
    console.log(`\n${ACTION_LABELS[action]} (${tables.length} tables):`);
    tables.forEach(table => console.log(`   • ${table}`));
  }
}

export function printPreview(statements: readonly string[], limit = 10) {
  console.log(`\n${pc.bold(`Structure SQL preview (${statements.length} commands):`)}`);
  console.log('-'.repeat(60));
  statements.slice(0, limit).forEach(statement => console.log(statement));
  if (statements.length > limit) {
    console.log(pc.dim(`... and ${statements.length - limit} more commands`));
  }
}
