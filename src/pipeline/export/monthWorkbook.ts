import fs from 'node:fs';
import path from 'node:path';
import ExcelJS from 'exceljs';
import type { CellValue as ExcelCellValue, Workbook, Worksheet } from 'exceljs';
import { format } from 'date-fns';
import { logger } from '../../logger.js';
import type { NormalizedTable, WeekEntry, WeekMergeResult } from '../../types.js';

export const DATE_KEY_COLUMN = 'Time';
/** Empty columns left between two daily blocks. */
export const BLOCK_GAP = 2;

export const COLUMN_NUMBER_FORMATS: Readonly<Record<string, string>> = {
  '%Change': '0.00%',
  Time: 'h:mm AM/PM',
  Latest: '0.00',
  Change: '0.00',
  Open: '0.00',
  High: '0.00',
  Low: '0.00',
  Volume: '0',
};

const WEEK_SHEET_PATTERN = /^Week(\d+)$/;

export interface MonthWorkbook {
  month: string;
  filePath: string;
  workbook: Workbook;
  created: boolean;
}

export function weekSheetName(week: number): string {
  return `Week${week}`;
}

export function weekNumberOf(sheetName: string): number | null {
  const match = WEEK_SHEET_PATTERN.exec(sheetName);
  return match ? Number(match[1]) : null;
}

export function cellText(value: ExcelCellValue): string {
  if (value == null) {
    return '';
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value !== 'object') {
    return String(value);
  }
  if ('richText' in value) {
    return value.richText.map((run) => run.text).join('');
  }
  if ('text' in value) {
    return String(value.text);
  }
  if ('result' in value) {
    return cellText(value.result);
  }
  return '';
}

export function findExistingDateKeys(sheet: Worksheet): Set<string> {
  const keys = new Set<string>();
  const header = sheet.getRow(1);
  const firstData = sheet.getRow(2);

  header.eachCell((cell, colNumber) => {
    if (cellText(cell.value).trim() !== DATE_KEY_COLUMN) {
      return;
    }
    const key = cellText(firstData.getCell(colNumber).value).trim();
    if (key) {
      keys.add(key);
    }
  });

  return keys;
}

export function lastUsedColumn(sheet: Worksheet): number {
  let last = 0;
  sheet.eachRow((row) => {
    row.eachCell((cell, colNumber) => {
      if (colNumber > last && cellText(cell.value) !== '') {
        last = colNumber;
      }
    });
  });
  return last;
}

export function nextFreeColumn(sheet: Worksheet): number {
  const last = lastUsedColumn(sheet);
  return last === 0 ? 1 : last + BLOCK_GAP + 1;
}

export function dateKeyFor(entry: WeekEntry): string {
  const { table } = entry;
  const timeIdx = table.columns.indexOf(DATE_KEY_COLUMN);
  const first = timeIdx >= 0 && table.rows.length > 0 ? table.rows[0][timeIdx] : null;
  const key = first == null ? '' : String(first).trim();
  return key || format(entry.date, 'yyyy-MM-dd');
}

export function writeBlock(sheet: Worksheet, startColumn: number, table: NormalizedTable): void {
  table.columns.forEach((column, offset) => {
    const headerCell = sheet.getCell(1, startColumn + offset);
    headerCell.value = column;
    headerCell.font = { bold: true };
  });

  table.rows.forEach((row, rowOffset) => {
    row.forEach((value, offset) => {
      const cell = sheet.getCell(rowOffset + 2, startColumn + offset);
      cell.value = value;
      const numFmt = COLUMN_NUMBER_FORMATS[table.columns[offset]];
      if (numFmt) {
        cell.numFmt = numFmt;
      }
    });
  });
}

/** Orders WeekN sheets by N; any other sheet keeps its relative position after them. */
export function sortWeekSheets(workbook: Workbook): string[] {
  const ordered = workbook.worksheets
    .map((sheet, position) => ({ sheet, position, week: weekNumberOf(sheet.name) }))
    .sort((a, b) => {
      if (a.week === null || b.week === null) {
        if (a.week === b.week) {
          return a.position - b.position;
        }
        return a.week === null ? 1 : -1;
      }
      return a.week - b.week || a.position - b.position;
    });

  ordered.forEach(({ sheet }, index) => {
    sheet.orderNo = index;
  });
  return ordered.map(({ sheet }) => sheet.name);
}

export class MonthWorkbookRepository {
  constructor(readonly baseDir: string) {}

  filePathFor(month: string): string {
    return path.join(this.baseDir, `${month.toLowerCase()}.xlsx`);
  }

  async load(month: string): Promise<MonthWorkbook> {
    const filePath = this.filePathFor(month);
    const workbook = new ExcelJS.Workbook();
    const created = !fs.existsSync(filePath);

    if (!created) {
      await workbook.xlsx.readFile(filePath);
    }

    return { month, filePath, workbook, created };
  }

  mergeWeek(book: MonthWorkbook, week: number, entries: WeekEntry[]): WeekMergeResult {
    const sheetName = weekSheetName(week);
    const sheet = book.workbook.getWorksheet(sheetName) ?? book.workbook.addWorksheet(sheetName);
    const seen = findExistingDateKeys(sheet);
    let column = nextFreeColumn(sheet);

    const result: WeekMergeResult = { week, sheetName, written: [], skipped: [] };

    for (const entry of entries) {
      if (!entry.table.rows.length) {
        continue;
      }

      const key = dateKeyFor(entry);
      if (seen.has(key)) {
        result.skipped.push(key);
        continue;
      }

      writeBlock(sheet, column, entry.table);
      column += entry.table.columns.length + BLOCK_GAP;
      seen.add(key);
      result.written.push(key);
    }

    logger.info({ file: book.filePath, sheet: sheetName, written: result.written, skipped: result.skipped }, 'Week sheet merged');
    return result;
  }

  async save(book: MonthWorkbook): Promise<void> {
    sortWeekSheets(book.workbook);
    fs.mkdirSync(path.dirname(book.filePath), { recursive: true });
    await book.workbook.xlsx.writeFile(book.filePath);
    logger.info({ file: book.filePath }, book.created ? 'Created month workbook' : 'Updated month workbook');
  }
}
