import { ColumnDef, DbType } from '../../types/index.js';
import { IDDLGenerator } from '../interfaces.js';

const NUMERIC_LITERAL = /^-?\d+(\.\d+)?([eE][-+]?\d+)?$/;
const QUOTED_LITERAL = /^'(?:[^']|'')*'$/s;
const BIT_OR_HEX_LITERAL = /^[bBxX]'[0-9a-fA-F]*'$/;
const TIMESTAMP_DEFAULT = /^(current_timestamp|localtimestamp|localtime|now|current_date|current_time)(\(\s*\d*\s*\))?$/i;
const FUNCTION_CALL = /^[A-Za-z_][A-Za-z0-9_]*\(.*\)$/s;
const PARENTHESISED = /^\(.*\)$/s;
const STRING_TYPE = /^(?:(?:var)?char|(?:var)?binary|(?:tiny|medium|long)?text|enum|set)\b/i;
const DEFAULT_GENERATED = /\bDEFAULT_GENERATED\b/i;

export interface DefaultContext {
  type?: string;
  extra?: string;
  dialect?: DbType;
}

export function quoteIdentifier(name: string): string {
  return `\`${name.replace(/`/g, '``')}\``;
}

const quoteLiteral = (value: string) => `'${value.replace(/\\/g, '\\\\').replace(/'/g, "''")}'`;

// MariaDB quotes string literals and leaves expressions bare. MySQL 8 leaves
// literals bare and flags expressions with DEFAULT_GENERATED in EXTRA.
export function formatDefault(value: string, context: DefaultContext = {}): string {
  const trimmed = value.trim();
  if (trimmed.toUpperCase() === 'NULL' || QUOTED_LITERAL.test(trimmed)) {
    return trimmed;
  }

  if (context.dialect !== 'mariadb') {
    if (DEFAULT_GENERATED.test(context.extra ?? '')) {
      return TIMESTAMP_DEFAULT.test(trimmed) || PARENTHESISED.test(trimmed) ? trimmed : `(${trimmed})`;
    }
    if (STRING_TYPE.test((context.type ?? '').trim())) {
      return quoteLiteral(value);
    }
  }

  if (
    TIMESTAMP_DEFAULT.test(trimmed) ||
    NUMERIC_LITERAL.test(trimmed) ||
    BIT_OR_HEX_LITERAL.test(trimmed) ||
    FUNCTION_CALL.test(trimmed) ||
    PARENTHESISED.test(trimmed)
  ) {
    return trimmed;
  }
  return quoteLiteral(value);
}

export function formatExtra(extra: string): string {
  return extra
    .replace(/\bDEFAULT_GENERATED\b/gi, '')
    .replace(/\s+/g, ' ')
    .trim();
}

export class MysqlDDLGenerator implements IDDLGenerator {
  constructor(private dialect: DbType = 'mysql') {}

  quoteIdentifier(name: string): string {
    return quoteIdentifier(name);
  }

  formatColumn(column: ColumnDef): string {
    const parts = [
      quoteIdentifier(column.name),
      column.type.trim(),
      column.nullable ? 'NULL' : 'NOT NULL',
      column.defaultValue !== null ? `DEFAULT ${formatDefault(column.defaultValue, { type: column.type, extra: column.extra, dialect: this.dialect })}` : '',
      formatExtra(column.extra),
    ];

    return parts.filter(part => part.length > 0).join(' ');
  }

  generateUseDatabase(database: string): string {
    return `USE ${quoteIdentifier(database)};`;
  }

  generateDisableForeignKeyChecks(): string {
    return 'SET FOREIGN_KEY_CHECKS = 0;';
  }

  generateEnableForeignKeyChecks(): string {
    return 'SET FOREIGN_KEY_CHECKS = 1;';
  }

  generateDropTable(table: string): string {
    return `DROP TABLE IF EXISTS ${quoteIdentifier(table)};`;
  }

  generateCreateTable(createStatement: string): string {
    const statement = createStatement.trim();
    return statement.endsWith(';') ? statement : `${statement};`;
  }

  generateAddColumn(table: string, column: ColumnDef): string {
    return `ALTER TABLE ${quoteIdentifier(table)} ADD COLUMN ${this.formatColumn(column)};`;
  }

  generateDropColumn(table: string, columnName: string): string {
    return `ALTER TABLE ${quoteIdentifier(table)} DROP COLUMN ${quoteIdentifier(columnName)};`;
  }

  generateModifyColumn(table: string, column: ColumnDef): string {
    return `ALTER TABLE ${quoteIdentifier(table)} MODIFY COLUMN ${this.formatColumn(column)};`;
  }

  generateTruncate(table: string): string {
    return `TRUNCATE TABLE ${quoteIdentifier(table)};`;
  }

  generateInsertHeader(table: string, columns: readonly string[]): string {
    return `INSERT INTO ${quoteIdentifier(table)} (${columns.map(quoteIdentifier).join(', ')}) VALUES`;
  }
}
