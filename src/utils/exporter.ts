import ExcelJS from 'exceljs';
import fs from 'fs-extra';
import path from 'path';
import { ComparisonResult, TableDetail } from '../types/comparison.js';
import { ForeignKeyDef } from '../types/index.js';
import { logger } from './logger.js';

export interface ExportRow {
  table: string;
  status: string;
  change: string;
  item: string;
  expected: string;
  actual: string;
}

const describeForeignKey = (fk: ForeignKeyDef) =>
  `${fk.column} -> ${fk.referencedTable}.${fk.referencedColumn} (ON UPDATE ${fk.updateRule}, ON DELETE ${fk.deleteRule})`;

export class SchemaExporter {
  static async exportToSheet(result: ComparisonResult, outputPath: string) {
    fs.ensureDirSync(path.dirname(outputPath));
    const ext = path.extname(outputPath).toLowerCase();

    if (ext === '.csv') {
      await this.exportToCSV(result, outputPath);
    } else {
      await this.exportToExcel(result, outputPath);
    }
  }

  static toRows(result: ComparisonResult): ExportRow[] {
    return [...result.details.values()].flatMap(detail => this.detailRows(detail));
  }

  private static detailRows(detail: TableDetail): ExportRow[] {
    const row = (change: string, item: string, expected: string, actual: string): ExportRow => ({
      table: detail.table,
      status: detail.status,
      change,
      item,
      expected,
      actual,
    });

    switch (detail.status) {
      case 'NEW':
        return [row('TABLE ADDED', '-', `${detail.sourceRows ?? 0} rows`, '-')];
      case 'REMOVED':
        return [row('TABLE REMOVED', '-', '-', `${detail.targetRows ?? 0} rows`)];
      case 'IDENTICAL':
        return [row('NONE', '-', '-', '-')];
      case 'MODIFIED':
        break;
    }

    return [
      ...detail.columns.added.map(name => row('COLUMN ADDED', name, 'present', 'missing')),
      ...detail.columns.removed.map(name => row('COLUMN REMOVED', name, 'missing', 'present')),
      ...detail.columns.changed.flatMap(change =>
        change.deltas.map(delta => row(`COLUMN ${delta.field.toUpperCase()}`, change.column, delta.to, delta.from))
      ),
      ...detail.indexes.added.map(idx => row('INDEX ADDED', idx.name, idx.columns.join(', '), '-')),
      ...detail.indexes.removed.map(idx => row('INDEX REMOVED', idx.name, '-', idx.columns.join(', '))),
      ...detail.foreignKeys.added.map(fk => row('FOREIGN KEY ADDED', fk.name, describeForeignKey(fk), '-')),
      ...detail.foreignKeys.removed.map(fk => row('FOREIGN KEY REMOVED', fk.name, '-', describeForeignKey(fk))),
    ];
  }

  private static async exportToExcel(result: ComparisonResult, outputPath: string) {
    const workbook = new ExcelJS.Workbook();
    const sheet = workbook.addWorksheet('Schema Comparison');

    sheet.columns = [
      { header: 'Table', key: 'table', width: 30 },
      { header: 'Status', key: 'status', width: 12 },
      { header: 'Change', key: 'change', width: 22 },
      { header: 'Column/Index', key: 'item', width: 30 },
      { header: 'Source (Expected)', key: 'expected', width: 50 },
      { header: 'Target (Actual)', key: 'actual', width: 50 },
    ];

    sheet.getRow(1).font = { bold: true };
    sheet.getRow(1).fill = {
      type: 'pattern',
      pattern: 'solid',
      fgColor: { argb: 'FFE0E0E0' }
    };

    this.toRows(result).forEach(row => sheet.addRow(row));

    await workbook.xlsx.writeFile(outputPath);
    logger.info(`Comparison results exported to Excel: ${outputPath}`);
  }

  private static async exportToCSV(result: ComparisonResult, outputPath: string) {
    const workbook = new ExcelJS.Workbook();
    const sheet = workbook.addWorksheet('Schema Comparison');

    sheet.columns = [
      { header: 'Table', key: 'table' },
      { header: 'Status', key: 'status' },
      { header: 'Change', key: 'change' },
      { header: 'Column/Index', key: 'item' },
      { header: 'Source (Expected)', key: 'expected' },
      { header: 'Target (Actual)', key: 'actual' },
    ];

    this.toRows(result).forEach(row => sheet.addRow(row));

    await workbook.csv.writeFile(outputPath);
    logger.info(`Comparison results exported to CSV: ${outputPath}`);
  }
}
