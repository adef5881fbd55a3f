import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { logger } from '../utils/logger.js';

const log = logger.createContext('failure-report');

export interface FailureReport {
  'Failed Pages': number[];
}

export async function writeFailureReport(path: string, failedPages: readonly number[]): Promise<FailureReport> {
  const report: FailureReport = { 'Failed Pages': [...failedPages] };

  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, JSON.stringify(report), 'utf8');
    log.debug(`Wrote ${failedPages.length} failed pages to ${path}`);
    return report;
  } catch (error) {
    log.error(`Failed to write failure report ${path}`, { error });
    throw error;
  }
}
