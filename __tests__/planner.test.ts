import { describe, expect, it } from 'vitest';
import { SchemaComparator } from '../src/core/comparator.js';
import { PlanBuilder } from '../src/core/planner.js';
import { Selection } from '../src/types/plan.js';
import { column, schema, table } from './fixtures.js';

const comparator = new SchemaComparator();
const planner = new PlanBuilder(comparator);

const source = schema('app_dev', [
  table('users', [column('id', 'int(11)', { nullable: false }), column('name', 'varchar(50)', { nullable: false })]),
  table('orders', [
    column('id', 'int(11)', { nullable: false }),
    column('status', 'varchar(20)', { nullable: false, defaultValue: 'pending' }),
    column('note', 'text'),
    column('created_at', 'datetime'),
  ]),
  table('products', [column('id', 'int(11)', { nullable: false }), column('sku', 'varchar(32)')], { approximateRows: 5000 }),
  table('settings', [column('key', 'varchar(64)')]),
]);

const target = schema('app_prod', [
  table('orders', [
    column('id', 'int(11)', { nullable: false }),
    column('status', 'varchar(10)', { nullable: false, defaultValue: 'pending' }),
    column('legacy_flag', 'tinyint(1)'),
    column('archived', 'tinyint(1)'),
  ]),
  table('products', [column('id', 'int(11)', { nullable: false })], { approximateRows: 4800 }),
  table('settings', [column('key', 'varchar(64)')]),
  table('legacy_logs', [column('id', 'int(11)')]),
]);

const classification = comparator.classify(source, target);

describe('PlanBuilder', () => {
  it('puts drops before every create or alter', () => {
    const selection: Selection = new Map([
      ['users', 'structure_only'],
      ['legacy_logs', 'drop'],
    ]);

    const { plan } = planner.build(classification, selection, source, target);

    expect(plan.structure.map(op => [op.kind, op.table])).toEqual([
      ['DROP_TABLE', 'legacy_logs'],
      ['CREATE_TABLE', 'users'],
    ]);
  });

  it('processes structure_only tables before structure_and_data tables', () => {
    const selection: Selection = new Map([
      ['products', 'structure_and_data'],
      ['orders', 'structure_only'],
      ['users', 'structure_only'],
    ]);

    const { plan } = planner.build(classification, selection, source, target);

    expect(plan.structure.map(op => op.table)).toEqual(['orders', 'users', 'products']);
  });

  it('carries the captured CREATE statement verbatim', () => {
    const { plan } = planner.build(classification, new Map([['users', 'structure_only']]), source, target);

    expect(plan.structure).toEqual([
      { kind: 'CREATE_TABLE', table: 'users', createStatement: source.tables.get('users')?.createStatement },
    ]);
  });

  it('orders alter clauses add, drop, then modify, each by name', () => {
    const { plan } = planner.build(classification, new Map([['orders', 'structure_only']]), source, target);
    const [operation] = plan.structure;

    if (operation.kind !== 'ALTER_TABLE') throw new Error(`expected ALTER_TABLE, got ${operation.kind}`);
    expect(
      operation.clauses.map(clause => (clause.action === 'DROP_COLUMN' ? `${clause.action} ${clause.columnName}` : `${clause.action} ${clause.column.name}`))
    ).toEqual([
      'ADD_COLUMN created_at',
      'ADD_COLUMN note',
      'DROP_COLUMN archived',
      'DROP_COLUMN legacy_flag',
      'MODIFY_COLUMN status',
    ]);
  });

  it('modifies columns toward the source definition', () => {
    const { plan } = planner.build(classification, new Map([['orders', 'structure_only']]), source, target);
    const [operation] = plan.structure;

    if (operation.kind !== 'ALTER_TABLE') throw new Error(`expected ALTER_TABLE, got ${operation.kind}`);
    const modify = operation.clauses.find(clause => clause.action === 'MODIFY_COLUMN');
    expect(modify).toMatchObject({
      column: { name: 'status', type: 'varchar(20)', nullable: false, defaultValue: 'pending' },
      deltas: [{ field: 'type', from: 'varchar(10)', to: 'varchar(20)' }],
    });
  });

  it('emits one data marker per structure_and_data table in selection order', () => {
    const selection: Selection = new Map([
      ['products', 'structure_and_data'],
      ['users', 'structure_and_data'],
      ['orders', 'structure_only'],
    ]);

    const { plan } = planner.build(classification, selection, source, target);

    expect(plan.dataSync).toEqual([
      { table: 'products', columns: ['id', 'sku'], approximateRows: 5000 },
      { table: 'users', columns: ['id', 'name'], approximateRows: 0 },
    ]);
  });

  it('ignores selections that break the contract and warns', () => {
    const selection: Selection = new Map([
      ['settings', 'structure_and_data'],
      ['orders', 'drop'],
      ['ghost', 'structure_only'],
      ['phantom', 'skip'],
      ['legacy_logs', 'structure_only'],
    ]);

    const { plan, warnings } = planner.build(classification, selection, source, target);

    expect(plan).toEqual({ structure: [], dataSync: [] });
    expect(warnings).toEqual([
      {
        kind: 'INVALID_SELECTION',
        table: 'settings',
        message: 'Ignoring "structure_and_data" for table "settings": only new or modified tables can be synchronized',
      },
      {
        kind: 'INVALID_SELECTION',
        table: 'orders',
        message: 'Ignoring "drop" for table "orders": only tables that exist solely in the target can be dropped',
      },
      {
        kind: 'INVALID_SELECTION',
        table: 'ghost',
        message: 'Ignoring "structure_only" for table "ghost": table exists in neither database',
      },
      {
        kind: 'INVALID_SELECTION',
        table: 'legacy_logs',
        message: 'Ignoring "structure_only" for table "legacy_logs": only new or modified tables can be synchronized',
      },
    ]);
  });

  it('skips the ALTER of a table whose columns could not be read', () => {
    const partialTarget = schema('app_prod', [table('orders', [], { incomplete: ['columns'] })]);
    const partialClassification = comparator.classify(source, partialTarget);

    const { plan, warnings } = planner.build(partialClassification, new Map([['orders', 'structure_only']]), source, partialTarget);

    expect(plan.structure).toEqual([]);
    expect(warnings).toEqual([
      {
        kind: 'PARTIAL_METADATA',
        table: 'orders',
        message: 'Column metadata of "orders" is incomplete; no ALTER statements were generated for it',
      },
    ]);
  });

  it('leaves out a new table without a captured CREATE statement', () => {
    const noCreate = schema('app_dev', [table('users', [column('id', 'int')], { createStatement: null, incomplete: ['createStatement'] })]);
    const empty = schema('app_prod', []);

    const { plan, warnings } = planner.build(comparator.classify(noCreate, empty), new Map([['users', 'structure_only']]), noCreate, empty);

    expect(plan.structure).toEqual([]);
    expect(warnings.map(w => w.kind)).toEqual(['PARTIAL_METADATA']);
  });

  it('is deterministic for identical inputs', () => {
    const selection: Selection = new Map([
      ['legacy_logs', 'drop'],
      ['orders', 'structure_only'],
      ['products', 'structure_and_data'],
      ['users', 'structure_only'],
    ]);

    const first = planner.build(classification, selection, source, target);
    const second = planner.build(classification, selection, source, target);

    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
  });
});
