export type CellValue = string | number | null;

export interface RecapTable {
  recapDate: string | null;
  columns: string[];
  rows: string[][];
}

export interface NormalizedTable {
  recapDate: string | null;
  columns: string[];
  rows: CellValue[][];
}

export interface WeekEntry {
  recapDate: string;
  date: Date;
  table: NormalizedTable;
}

export interface WeekBucket {
  month: string;
  week: number;
  entries: WeekEntry[];
}

export interface MonthGroup {
  month: string;
  monthIndex: number;
  weeks: WeekBucket[];
}

export interface GroupingResult {
  months: MonthGroup[];
  dropped: number;
}

export interface WeekMergeResult {
  week: number;
  sheetName: string;
  written: string[];
  skipped: string[];
}

export type MonthRunStatus = 'saved' | 'failed';

export interface MonthRunResult {
  month: string;
  filePath: string;
  status: MonthRunStatus;
  created: boolean;
  weeks: WeekMergeResult[];
  error?: string;
}

export type RecapRunStatus = 'no_input' | 'no_messages' | 'completed';

export interface RecapRunSummary {
  status: RecapRunStatus;
  messages: number;
  tables: number;
  dropped: number;
  months: MonthRunResult[];
}
