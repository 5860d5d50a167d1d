import { logger } from '../logger.js';
import type { MonthGroup, MonthRunResult, NormalizedTable, RecapRunSummary } from '../types.js';
import { MonthWorkbookRepository } from './export/monthWorkbook.js';
import { END_OF_DAY_RECAP_LAYOUT, type RecapLayout } from './extract/layout.js';
import { parseRecapMessage } from './extract/recapText.js';
import { groupByMonthAndWeek } from './group/weeks.js';
import { normalizeRecapTable } from './normalize/index.js';
import { splitMessages } from './segment/index.js';

export class RecapProcessingService {
  constructor(
    private readonly repository: MonthWorkbookRepository,
    private readonly layout: RecapLayout = END_OF_DAY_RECAP_LAYOUT,
  ) {}

  parseMessages(messages: string[]): NormalizedTable[] {
    return messages.map((message) => normalizeRecapTable(parseRecapMessage(message, this.layout)));
  }

  async process(input: string): Promise<RecapRunSummary> {
    if (!input.trim()) {
      logger.warn('No input received; no messages found.');
      return { status: 'no_input', messages: 0, tables: 0, dropped: 0, months: [] };
    }

    const messages = splitMessages(input);
    if (!messages.length) {
      logger.warn('No messages after splitting; exiting.');
      return { status: 'no_messages', messages: 0, tables: 0, dropped: 0, months: [] };
    }

    const tables = this.parseMessages(messages);
    const grouping = groupByMonthAndWeek(tables);

    // One month at a time: each workbook is loaded, merged and written before the next.
    const months: MonthRunResult[] = [];
    for (const group of grouping.months) {
      months.push(await this.processMonth(group));
    }

    return {
      status: 'completed',
      messages: messages.length,
      tables: tables.filter((table) => table.rows.length > 0).length,
      dropped: grouping.dropped,
      months,
    };
  }

  async processMonth(group: MonthGroup): Promise<MonthRunResult> {
    const filePath = this.repository.filePathFor(group.month);
    const result: MonthRunResult = { month: group.month, filePath, status: 'failed', created: false, weeks: [] };

    try {
      const book = await this.repository.load(group.month);
      result.created = book.created;
      for (const bucket of group.weeks) {
        result.weeks.push(this.repository.mergeWeek(book, bucket.week, bucket.entries));
      }
      await this.repository.save(book);
      result.status = 'saved';
    } catch (error) {
      logger.error({ err: error, month: group.month, filePath }, 'Month workbook failed');
      result.error = error instanceof Error ? error.message : String(error);
    }

    return result;
  }
}
