import { z } from 'zod';
import { REFERENTIAL_RULES } from '../types/index.js';

const optionalText = z.string().nullable().optional();

export const tableRowSchema = z.object({
  TABLE_NAME: z.string().min(1),
  ENGINE: optionalText,
  TABLE_COLLATION: optionalText,
  TABLE_ROWS: z.coerce.number().nonnegative().nullable().optional(),
  TABLE_COMMENT: optionalText,
});

export const createTableRowSchema = z.object({
  'Create Table': z.string().min(1),
});

export const columnRowSchema = z.object({
  COLUMN_NAME: z.string().min(1),
  COLUMN_TYPE: z.string().min(1),
  IS_NULLABLE: z.enum(['YES', 'NO']),
  COLUMN_DEFAULT: optionalText,
  EXTRA: optionalText,
  COLUMN_COMMENT: optionalText,
  ORDINAL_POSITION: z.coerce.number().int().positive(),
  COLUMN_KEY: optionalText,
});

export const indexRowSchema = z.object({
  Key_name: z.string().min(1),
  Column_name: z.string().nullable(),
  Seq_in_index: z.coerce.number().int().positive(),
  Non_unique: z.coerce.number().int(),
  // MySQL 8 functional key parts have no column name
  Expression: optionalText,
});

export const foreignKeyRowSchema = z.object({
  CONSTRAINT_NAME: z.string().min(1),
  COLUMN_NAME: z.string().min(1),
  REFERENCED_TABLE_NAME: z.string().min(1),
  REFERENCED_COLUMN_NAME: z.string().min(1),
  UPDATE_RULE: z.enum(REFERENTIAL_RULES).catch('RESTRICT'),
  DELETE_RULE: z.enum(REFERENTIAL_RULES).catch('RESTRICT'),
});

export type TableRow = z.infer<typeof tableRowSchema>;
export type ColumnRow = z.infer<typeof columnRowSchema>;
export type IndexRow = z.infer<typeof indexRowSchema>;
export type ForeignKeyRow = z.infer<typeof foreignKeyRowSchema>;
