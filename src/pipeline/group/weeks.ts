import { format, isValid, parse } from 'date-fns';
import { logger } from '../../logger.js';
import type { GroupingResult, MonthGroup, NormalizedTable, WeekBucket, WeekEntry } from '../../types.js';

// "Tue, January 27, 2026"; the weekday is checked for shape only.
const RECAP_DATE_PATTERN = /^(?:Mon|Tue|Wed|Thu|Fri|Sat|Sun),\s*([A-Za-z]+)\s+(\d{1,2}),\s*(\d{4})$/i;
const REFERENCE_DATE = new Date(2000, 0, 1);

export function parseRecapDate(label: string): Date | null {
  const match = RECAP_DATE_PATTERN.exec(label.trim());
  if (!match) {
    return null;
  }
  const [, monthName, day, year] = match;
  const parsed = parse(`${monthName} ${day}, ${year}`, 'MMMM d, yyyy', REFERENCE_DATE);
  // date-fns also takes abbreviated month names; only the full name is accepted here.
  if (!isValid(parsed) || format(parsed, 'MMMM').toLowerCase() !== monthName.toLowerCase()) {
    return null;
  }
  return parsed;
}

/** Days 1-7 are week 1, 8-14 week 2, and so on up to week 5. */
export function weekOfMonth(dayOfMonth: number): number {
  return Math.floor((dayOfMonth - 1) / 7) + 1;
}

export function groupByMonthAndWeek(tables: NormalizedTable[]): GroupingResult {
  const months = new Map<number, { month: string; weeks: Map<number, WeekEntry[]> }>();
  let dropped = 0;

  for (const table of tables) {
    if (!table.recapDate || !table.rows.length) {
      logger.warn({ recapDate: table.recapDate, rows: table.rows.length }, 'Table without recap date or rows dropped');
      dropped += 1;
      continue;
    }

    const date = parseRecapDate(table.recapDate);
    if (!date) {
      logger.warn({ recapDate: table.recapDate }, 'Date parse error, table dropped');
      dropped += 1;
      continue;
    }

    const monthIndex = date.getMonth();
    const month = months.get(monthIndex) ?? { month: format(date, 'MMMM'), weeks: new Map<number, WeekEntry[]>() };
    months.set(monthIndex, month);

    const week = weekOfMonth(date.getDate());
    const entries = month.weeks.get(week) ?? [];
    entries.push({ recapDate: table.recapDate, date, table });
    month.weeks.set(week, entries);
  }

  const grouped: MonthGroup[] = [...months.entries()]
    .sort(([a], [b]) => a - b)
    .map(([monthIndex, { month, weeks }]) => ({
      month,
      monthIndex,
      weeks: [...weeks.entries()]
        .sort(([a], [b]) => a - b)
        .map(
          ([week, entries]): WeekBucket => ({
            month,
            week,
            entries: [...entries].sort((a, b) => a.date.getTime() - b.date.getTime()),
          }),
        ),
    }));

  return { months: grouped, dropped };
}
