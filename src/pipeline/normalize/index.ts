import { logger } from '../../logger.js';
import type { CellValue, NormalizedTable, RecapTable } from '../../types.js';
import { parsePercentFraction, parseQuoteNumber } from '../../utils/numbers.js';

export const SYMBOL_COLUMN = 'Symbol';
export const PERCENT_COLUMN = '%Change';
export const NUMERIC_COLUMNS: readonly string[] = ['Latest', 'Change', 'Open', 'High', 'Low', 'Volume'];

export function cleanSymbol(value: string): string {
  return value.replace(/[$^]/g, '');
}

function converterFor(column: string): ((raw: string) => CellValue) | null {
  if (column === SYMBOL_COLUMN) {
    return cleanSymbol;
  }
  if (column === PERCENT_COLUMN) {
    return parsePercentFraction;
  }
  if (NUMERIC_COLUMNS.includes(column)) {
    return parseQuoteNumber;
  }
  return null;
}

function typeRows(table: RecapTable): CellValue[][] {
  const rows: CellValue[][] = table.rows.map((row) => [...row]);

  table.columns.forEach((column, idx) => {
    const convert = converterFor(column);
    if (!convert) {
      return;
    }

    const raw = table.rows.map((row) => row[idx]);
    const converted = raw.map((value) => convert(value));
    converted.forEach((value, rowIdx) => {
      rows[rowIdx][idx] = value;
    });

    if (column === SYMBOL_COLUMN) {
      return;
    }
    logger.debug({ column, raw, converted }, 'Converted column values');

    const unparsed = raw.filter((_, rowIdx) => converted[rowIdx] === null);
    if (unparsed.length) {
      logger.warn({ column, recapDate: table.recapDate, values: unparsed }, 'Unparseable numeric cells left blank');
    }
  });

  return rows;
}

export function normalizeRecapTable(table: RecapTable): NormalizedTable {
  try {
    return {
      recapDate: table.recapDate,
      columns: [...table.columns],
      rows: typeRows(table),
    };
  } catch (error) {
    logger.error({ err: error, recapDate: table.recapDate }, 'Conversion error, keeping raw rows');
    return {
      recapDate: table.recapDate,
      columns: [...table.columns],
      rows: table.rows.map((row) => [...row]),
    };
  }
}

export function normalizeRecapTables(tables: RecapTable[]): NormalizedTable[] {
  return tables.map((table) => normalizeRecapTable(table));
}
