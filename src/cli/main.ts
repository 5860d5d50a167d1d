#!/usr/bin/env node
import path from 'node:path';
import { Command } from 'commander';
import { config } from '../config.js';
import { logger } from '../logger.js';
import { MonthWorkbookRepository } from '../pipeline/export/monthWorkbook.js';
import { RecapProcessingService } from '../pipeline/processRecaps.js';

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf8');
}

const program = new Command();
program
  .name('recap-watchlist')
  .description('Merge End-of-Day Recap messages from stdin into per-month weekly workbooks')
  .version('0.1.0')
  .option('-o, --out <out>', 'output xlsx path; month workbooks are written to its directory', config.outputPath)
  .action(async (opts: { out: string }) => {
    const out = path.resolve(opts.out);
    const input = await readStdin();

    const service = new RecapProcessingService(new MonthWorkbookRepository(path.dirname(out)));
    const summary = await service.process(input);
    if (summary.status !== 'completed') {
      return;
    }

    const failed = summary.months.filter((month) => month.status === 'failed');
    if (failed.length) {
      process.exitCode = 1;
    }

    logger.info(
      { months: summary.months.length, failed: failed.map((month) => month.month), dropped: summary.dropped },
      `Wrote ${summary.messages} message(s) to ${out}`,
    );
  });

program.parseAsync().catch((error) => {
  logger.error({ err: error }, 'CLI failed');
  process.exitCode = 1;
});
