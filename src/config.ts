import os from 'node:os';
import path from 'node:path';
import dotenv from 'dotenv';

dotenv.config();

function asString(value: string | undefined, fallback: string): string {
  if (value == null) {
    return fallback;
  }
  const trimmed = value.trim();
  return trimmed ? trimmed : fallback;
}

export const config = {
  outputPath: asString(process.env.RECAP_OUTPUT_PATH, path.join(os.homedir(), 'Documents', 'watchlist_summary.xlsx')),
  logLevel: asString(process.env.LOG_LEVEL, 'info'),
};
