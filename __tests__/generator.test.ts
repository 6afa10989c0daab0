import { describe, expect, it } from 'vitest';
import { SchemaComparator } from '../src/core/comparator.js';
import { PlanBuilder } from '../src/core/planner.js';
import { formatDefault, MysqlDDLGenerator } from '../src/engines/mysql/MysqlDDLGenerator.js';
import { RenderContext, ScriptGenerator } from '../src/generator/generator.js';
import { Plan, Selection } from '../src/types/plan.js';
import { column, schema, table } from './fixtures.js';

const USERS_DDL = [
  'CREATE TABLE `users` (',
  '  `id` int(11) NOT NULL,',
  '  `name` varchar(50) NOT NULL,',
  '  PRIMARY KEY (`id`)',
  ') ENGINE=InnoDB DEFAULT CHARSET=utf8mb4',
].join('\n');

const source = schema('app_dev', [
  table('users', [column('id', 'int(11)', { nullable: false }), column('name', 'varchar(50)', { nullable: false })], {
    createStatement: USERS_DDL,
  }),
  table('orders', [
    column('id', 'int(11)', { nullable: false }),
    column('status', 'varchar(20)', { nullable: false, defaultValue: 'pending' }),
  ]),
  table('products', [column('id', 'int(11)', { nullable: false }), column('sku', 'varchar(32)')], { approximateRows: 5000 }),
]);

const target = schema('app_prod', [
  table('orders', [
    column('id', 'int(11)', { nullable: false }),
    column('status', 'varchar(10)', { nullable: false, defaultValue: 'pending' }),
  ]),
  table('products', [column('id', 'int(11)', { nullable: false })]),
  table('legacy_logs', [column('id', 'int(11)')]),
]);

const context: RenderContext = {
  sourceDatabase: 'app_dev',
  targetDatabase: 'app_prod',
  generatedAt: new Date(2026, 9, 18, 9, 30, 0),
  sourceConnection: { host: 'db.internal', port: 3306, user: 'reader' },
};

const comparator = new SchemaComparator();
const planner = new PlanBuilder(comparator);
const generator = new ScriptGenerator();

function planFor(selection: Selection): Plan {
  return planner.build(comparator.classify(source, target), selection, source, target).plan;
}

describe('ScriptGenerator.renderStructure', () => {
  it('wraps the body in a header and a foreign-key-check window', () => {
    const lines = generator.renderStructure(planFor(new Map([['legacy_logs', 'drop']])), context);

    expect(lines).toEqual([
      '-- Structure Synchronization Script',
      '-- Generated on: 2026-10-18 09:30:00',
      '-- Source: app_dev → Target: app_prod',
      '',
      'USE `app_prod`;',
      'SET FOREIGN_KEY_CHECKS = 0;',
      '',
      '-- Removing table legacy_logs',
      'DROP TABLE IF EXISTS `legacy_logs`;',
      '',
      'SET FOREIGN_KEY_CHECKS = 1;',
    ]);
  });

  it('emits a new table as exactly one verbatim CREATE', () => {
    const lines = generator.renderStructure(planFor(new Map([['users', 'structure_only']])), context);

    expect(lines.filter(line => line.startsWith('CREATE TABLE'))).toEqual([`${USERS_DDL};`]);
    expect(lines.some(line => line.startsWith('DROP') || line.startsWith('ALTER'))).toBe(false);
  });

  it('widens the orders status column with its source definition', () => {
    const lines = generator.renderStructure(planFor(new Map([['orders', 'structure_only']])), context);

    expect(lines.slice(7, 9)).toEqual([
      '-- Modifying table structure orders',
      "ALTER TABLE `orders` MODIFY COLUMN `status` varchar(20) NOT NULL DEFAULT 'pending';",
    ]);
  });

  it('puts the drop of legacy_logs before every CREATE and ALTER', () => {
    const selection: Selection = new Map([
      ['users', 'structure_only'],
      ['orders', 'structure_only'],
      ['legacy_logs', 'drop'],
    ]);
    const lines = generator.renderStructure(planFor(selection), context);

    const dropAt = lines.indexOf('DROP TABLE IF EXISTS `legacy_logs`;');
    const firstChange = lines.findIndex(line => line.startsWith('CREATE TABLE') || line.startsWith('ALTER TABLE'));
    expect(dropAt).toBeGreaterThan(-1);
    expect(dropAt).toBeLessThan(firstChange);
  });

  it('notes an ALTER without column clauses', () => {
    const plan: Plan = { structure: [{ kind: 'ALTER_TABLE', table: 'orders', clauses: [] }], dataSync: [] };

    expect(generator.renderStructure(plan, context).slice(7, 10)).toEqual([
      '-- Modifying table structure orders',
      '-- No column changes for orders',
      '',
    ]);
  });

  it('renders identical lines for identical input', () => {
    const selection: Selection = new Map([
      ['legacy_logs', 'drop'],
      ['orders', 'structure_only'],
      ['products', 'structure_and_data'],
    ]);

    expect(generator.renderStructure(planFor(selection), context)).toEqual(generator.renderStructure(planFor(selection), context));
  });
});

describe('ScriptGenerator.renderDataPlan', () => {
  it('truncates products and defers the row export', () => {
    const lines = generator.renderDataPlan(planFor(new Map([['products', 'structure_and_data']])), context);

    expect(lines).toEqual([
      '-- Data Synchronization Script',
      '-- Generated on: 2026-10-18 09:30:00',
      '-- Source: app_dev → Target: app_prod',
      '',
      'USE `app_prod`;',
      'SET FOREIGN_KEY_CHECKS = 0;',
      '',
      '-- Synchronizing data for table products (approximately 5,000 records)',
      'TRUNCATE TABLE `products`;',
      '-- INSERT INTO `products` (`id`, `sku`) VALUES',
      '-- WARNING: Data for table products must be exported separately',
      '-- Use: mysqldump -h db.internal -P 3306 -u reader -p app_dev products --no-create-info',
      '',
      'SET FOREIGN_KEY_CHECKS = 1;',
    ]);
  });

  it('omits connection flags from the dump hint when the source is unknown', () => {
    const lines = generator.renderDataPlan(planFor(new Map([['products', 'structure_and_data']])), {
      ...context,
      sourceConnection: undefined,
    });

    expect(lines).toContain('-- Use: mysqldump -p app_dev products --no-create-info');
  });

  it('is empty when no table is selected for data', () => {
    expect(generator.renderDataPlan(planFor(new Map([['orders', 'structure_only']])), context)).toEqual([]);
  });
});

describe('MysqlDDLGenerator', () => {
  const ddl = new MysqlDDLGenerator();

  it('formats a column without empty segments', () => {
    expect(ddl.formatColumn(column('note', 'text'))).toBe('`note` text NULL');
    expect(ddl.formatColumn(column('id', 'int(11) unsigned', { nullable: false, extra: 'auto_increment' }))).toBe(
      '`id` int(11) unsigned NOT NULL auto_increment'
    );
  });

  it('keeps expression defaults and strips DEFAULT_GENERATED', () => {
    const createdAt = column('created_at', 'timestamp', {
      nullable: false,
      defaultValue: 'CURRENT_TIMESTAMP',
      extra: 'DEFAULT_GENERATED on update CURRENT_TIMESTAMP',
    });

    expect(ddl.formatColumn(createdAt)).toBe('`created_at` timestamp NOT NULL DEFAULT CURRENT_TIMESTAMP on update CURRENT_TIMESTAMP');
  });

  it('quotes bare string defaults and passes literals through', () => {
    expect(formatDefault('pending')).toBe("'pending'");
    expect(formatDefault("it's")).toBe("'it''s'");
    expect(formatDefault("'active'")).toBe("'active'");
    expect(formatDefault('0.00')).toBe('0.00');
    expect(formatDefault('NULL')).toBe('NULL');
  });

  it('parenthesises MySQL expression defaults flagged DEFAULT_GENERATED', () => {
    const id = column('id', 'char(36)', { nullable: false, defaultValue: 'uuid()', extra: 'DEFAULT_GENERATED' });

    expect(ddl.generateModifyColumn('t', id)).toBe('ALTER TABLE `t` MODIFY COLUMN `id` char(36) NOT NULL DEFAULT (uuid());');
    expect(formatDefault('(rand() * 10)', { type: 'double', extra: 'DEFAULT_GENERATED' })).toBe('(rand() * 10)');
  });

  it('quotes numeric-looking defaults of MySQL string columns', () => {
    const code = column('code', 'varchar(5)', { defaultValue: '007' });

    expect(ddl.generateAddColumn('t', code)).toBe("ALTER TABLE `t` ADD COLUMN `code` varchar(5) NULL DEFAULT '007';");
    expect(formatDefault('7', { type: 'int(11)' })).toBe('7');
    expect(formatDefault('small', { type: "enum('small','large')" })).toBe("'small'");
  });

  it('keeps MariaDB defaults as the catalog reports them', () => {
    const mariadb = new MysqlDDLGenerator('mariadb');

    expect(mariadb.formatColumn(column('id', 'char(36)', { defaultValue: 'uuid()' }))).toBe('`id` char(36) NULL DEFAULT uuid()');
    expect(mariadb.formatColumn(column('code', 'varchar(5)', { defaultValue: "'007'" }))).toBe("`code` varchar(5) NULL DEFAULT '007'");
  });

  it('escapes backticks inside identifiers', () => {
    expect(ddl.generateDropColumn('odd`table', 'col')).toBe('ALTER TABLE `odd``table` DROP COLUMN `col`;');
  });
});
