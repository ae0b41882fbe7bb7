import { promises as fs } from 'fs';
import path from 'path';
import { formatBtc } from './amounts.js';
import { DemoError, errorMessage } from './errors.js';
import type { ReconciliationResult } from './reconciler.js';

// Positional format: consumers read fields by line number.
export function reportLines(result: ReconciliationResult): string[] {
  return [
    result.txid,
    result.inputAddress,
    formatBtc(result.inputAmount),
    result.outputAddress,
    formatBtc(result.outputAmount),
    result.changeAddress,
    formatBtc(result.changeAmount),
    formatBtc(result.fee),
    String(result.blockHeight),
    result.blockHash,
  ];
}

export async function writeReport(reportPath: string, result: ReconciliationResult): Promise<void> {
  const contents = reportLines(result).map((line) => `${line}\n`).join('');
  try {
    await fs.mkdir(path.dirname(reportPath), { recursive: true });
    await fs.writeFile(reportPath, contents);
  } catch (error) {
    throw new DemoError({
      message: `Could not write report to ${reportPath}: ${errorMessage(error)}`,
      kind: 'io',
      cause: error,
    });
  }
}
