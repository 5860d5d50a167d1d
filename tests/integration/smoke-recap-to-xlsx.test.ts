import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import ExcelJS from 'exceljs';
import type { Worksheet } from 'exceljs';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { MonthWorkbookRepository } from '../../src/pipeline/export/monthWorkbook.js';
import { RecapProcessingService } from '../../src/pipeline/processRecaps.js';

const fixture = (name: string): string => fs.readFileSync(path.join(process.cwd(), 'tests/fixtures', name), 'utf8');

async function openSheet(filePath: string, sheetName: string): Promise<Worksheet> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.readFile(filePath);
  const sheet = workbook.getWorksheet(sheetName);
  if (!sheet) {
    throw new Error(`Missing sheet ${sheetName}`);
  }
  return sheet;
}

describe('smoke recap text -> month workbooks', () => {
  let tempDir: string;
  let service: RecapProcessingService;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'recap-smoke-'));
    service = new RecapProcessingService(new MonthWorkbookRepository(tempDir));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('writes two daily blocks of one week side by side in date order', async () => {
    const summary = await service.process(fixture('recaps_january.txt'));

    expect(summary).toMatchObject({ status: 'completed', messages: 3, tables: 2, dropped: 1 });
    expect(summary.months).toHaveLength(1);
    expect(summary.months[0]).toMatchObject({
      month: 'January',
      status: 'saved',
      created: true,
      filePath: path.join(tempDir, 'january.xlsx'),
    });
    expect(summary.months[0].weeks).toEqual([
      { week: 4, sheetName: 'Week4', written: ['01/27/26', '01/28/26'], skipped: [] },
    ]);

    const sheet = await openSheet(path.join(tempDir, 'january.xlsx'), 'Week4');
    const header = ['Symbol', 'Latest', 'Change', '%Change', 'Open', 'High', 'Low', 'Volume', 'Time'];
    expect(header.map((_, idx) => sheet.getCell(1, idx + 1).value)).toEqual(header);
    expect(header.map((_, idx) => sheet.getCell(1, idx + 12).value)).toEqual(header);
    expect(sheet.getCell(1, 10).value).toBeNull();
    expect(sheet.getCell(1, 11).value).toBeNull();

    expect(sheet.getCell(2, 1).value).toBe('SPX');
    expect(sheet.getCell(2, 2).value).toBe(6012.45);
    expect(sheet.getCell(2, 3).value).toBe(15.2);
    expect(sheet.getCell(2, 4).value).toBeCloseTo(0.025, 10);
    expect(sheet.getCell(2, 8).value).toBeNull();
    expect(sheet.getCell(2, 9).value).toBe('01/27/26');
    expect(sheet.getCell(3, 1).value).toBe('AAPL');
    expect(sheet.getCell(3, 3).value).toBe(0);
    expect(sheet.getCell(3, 4).value).toBe(0);
    expect(sheet.getCell(3, 8).value).toBe(45210300);
    expect(sheet.getCell(4, 1).value).toBe('USDCHF');

    expect(sheet.getCell(2, 12).value).toBe('SPX');
    expect(sheet.getCell(2, 13).value).toBe(6030.1);
    expect(sheet.getCell(2, 20).value).toBe('01/28/26');
    expect(sheet.getCell(3, 15).value).toBe(-0.56);

    expect(sheet.getCell(2, 4).numFmt).toBe('0.00%');
    expect(sheet.getCell(2, 2).numFmt).toBe('0.00');
    expect(sheet.getCell(2, 9).numFmt).toBe('h:mm AM/PM');
    expect(sheet.getCell(3, 8).numFmt).toBe('0');

    expect(sheet.getCell(2, 13).numFmt).toBe('0.00');
    expect(sheet.getCell(3, 15).numFmt).toBe('0.00%');
    expect(sheet.getCell(3, 19).value).toBe(51004200);
    expect(sheet.getCell(3, 19).numFmt).toBe('0');
    expect(sheet.getCell(2, 20).numFmt).toBe('h:mm AM/PM');
  });

  it('does not duplicate blocks when the same input is merged twice', async () => {
    const input = fixture('recaps_january.txt');
    await service.process(input);
    const second = await service.process(input);

    expect(second.months[0]).toMatchObject({ status: 'saved', created: false });
    expect(second.months[0].weeks[0].written).toEqual([]);
    expect(second.months[0].weeks[0].skipped).toEqual(['01/27/26', '01/28/26']);

    const sheet = await openSheet(path.join(tempDir, 'january.xlsx'), 'Week4');
    expect(sheet.getCell(1, 12).value).toBe('Symbol');
    expect(sheet.getCell(1, 23).value).toBeNull();
    expect(sheet.getCell(2, 23).value).toBeNull();
  });

  it('appends a block without a Time column again on a later run', async () => {
    const input = [
      'End-of-Day Recap - Price quotes for Mon, February 2, 2026',
      'Symbol',
      'Latest',
      '$SPX',
      '6,101.00',
      '^USDCHF',
      '0.9010',
    ].join('\n');

    const first = await service.process(input);
    const second = await service.process(input);

    expect(first.months[0].weeks[0].written).toEqual(['2026-02-02']);
    expect(second.months[0].weeks[0]).toEqual({ week: 1, sheetName: 'Week1', written: ['2026-02-02'], skipped: [] });

    const sheet = await openSheet(path.join(tempDir, 'february.xlsx'), 'Week1');
    expect(sheet.getCell(1, 1).value).toBe('Symbol');
    expect(sheet.getCell(1, 5).value).toBe('Symbol');
    expect(sheet.getCell(2, 6).value).toBe(6101);
  });

  it('keeps going when one month file cannot be opened', async () => {
    const februaryPath = path.join(tempDir, 'february.xlsx');
    fs.writeFileSync(februaryPath, 'not a workbook');

    const summary = await service.process(`${fixture('recaps_january.txt')}\n---MSG---\n${fixture('recap_february.txt')}`);

    expect(summary.months.map((month) => [month.month, month.status])).toEqual([
      ['January', 'saved'],
      ['February', 'failed'],
    ]);
    expect(summary.months[1].error).toBeTruthy();
    expect(fs.readFileSync(februaryPath, 'utf8')).toBe('not a workbook');
    expect(fs.existsSync(path.join(tempDir, 'january.xlsx'))).toBe(true);
  });

  it('writes a month with a single block into its own file', async () => {
    const summary = await service.process(fixture('recap_february.txt'));

    expect(summary.months[0].weeks).toEqual([{ week: 1, sheetName: 'Week1', written: ['02/02/26'], skipped: [] }]);
    const sheet = await openSheet(path.join(tempDir, 'february.xlsx'), 'Week1');
    expect(sheet.getCell(2, 1).value).toBe('SPX');
    expect(sheet.getCell(3, 3).value).toBe(0);
    expect(sheet.getCell(2, 2).numFmt).toBe('0.00');
  });

  it('reports blank input and input without messages', async () => {
    expect(await service.process('  \n')).toEqual({ status: 'no_input', messages: 0, tables: 0, dropped: 0, months: [] });
    expect(await service.process('---MSG---\n---MSG---')).toEqual({
      status: 'no_messages',
      messages: 0,
      tables: 0,
      dropped: 0,
      months: [],
    });
    expect(fs.readdirSync(tempDir)).toEqual([]);
  });
});
