import { logger } from '../../logger.js';
import type { RecapTable } from '../../types.js';
import { END_OF_DAY_RECAP_LAYOUT, isRowStart, type RecapLayout } from './layout.js';

export interface RecapTitle {
  lineIndex: number;
  recapDate: string | null;
}

function escapeRegExp(input: string): string {
  return input.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function splitLines(text: string): string[] {
  return text.split(/\r\n|\r|\n/);
}

export function findRecapTitle(lines: string[], layout: RecapLayout = END_OF_DAY_RECAP_LAYOUT): RecapTitle | null {
  const datePattern = new RegExp(`${escapeRegExp(layout.datePrefix)}(.+)$`);

  for (let i = 0; i < lines.length; i += 1) {
    const line = lines[i];
    if (!line.includes(layout.titleMarker) || !line.includes(layout.datePrefix)) {
      continue;
    }
    const match = datePattern.exec(line);
    const recapDate = match ? match[1].trim() : '';
    return { lineIndex: i, recapDate: recapDate || null };
  }

  return null;
}

export function readHeader(
  lines: string[],
  from: number,
  layout: RecapLayout = END_OF_DAY_RECAP_LAYOUT,
): { columns: string[]; next: number } | null {
  let headerIdx = -1;
  for (let i = from; i < lines.length; i += 1) {
    if (lines[i].trim() === layout.headerStart) {
      headerIdx = i;
      break;
    }
  }
  if (headerIdx < 0) {
    return null;
  }

  const columns = [layout.headerStart];
  let i = headerIdx + 1;
  while (i < lines.length) {
    const name = lines[i].trim();
    if (!name || isRowStart(name, layout) || columns.includes(name)) {
      break;
    }
    columns.push(name);
    i += 1;
  }

  return { columns, next: i };
}

export function readRows(lines: string[], from: number, width: number, layout: RecapLayout = END_OF_DAY_RECAP_LAYOUT): string[][] {
  const rows: string[][] = [];
  let current: string[] = [];

  for (let i = from; i < lines.length; i += 1) {
    const cell = lines[i].trim();
    if (!cell) {
      continue;
    }

    if (current.length === width) {
      rows.push(current);
      current = [];
    }
    current.push(cell);

    if (current.length === width && layout.terminalSymbol !== null && current[0] === layout.terminalSymbol) {
      rows.push(current);
      break;
    }
  }

  const last = rows[rows.length - 1];
  const alreadyCaptured = last !== undefined && last.length === current.length && last.every((cell, idx) => cell === current[idx]);
  if (current.length > 0 && current.length === width && !alreadyCaptured) {
    rows.push(current);
  }

  return rows;
}

export function parseRecapMessage(text: string, layout: RecapLayout = END_OF_DAY_RECAP_LAYOUT): RecapTable {
  const lines = splitLines(text);
  const title = findRecapTitle(lines, layout);
  if (!title) {
    logger.warn({ lines: lines.length }, 'Message has no recap title line');
    return { recapDate: null, columns: [], rows: [] };
  }

  const header = readHeader(lines, title.lineIndex + 1, layout);
  if (!header) {
    logger.warn({ recapDate: title.recapDate }, 'Recap message has no column header');
    return { recapDate: title.recapDate, columns: [], rows: [] };
  }

  const rows = readRows(lines, header.next, header.columns.length, layout);
  if (!rows.length) {
    return { recapDate: title.recapDate, columns: [], rows: [] };
  }

  logger.debug({ recapDate: title.recapDate, columns: header.columns, rows }, 'Parsed rows');
  return { recapDate: title.recapDate, columns: header.columns, rows };
}
