import type { RunRecord } from '@conclave/core';
import type { OutputFormatter } from './formatter.js';

export class PlainFormatter implements OutputFormatter {
  formatComplete(record: RunRecord): string {
    return record.stage3.response;
  }

  formatError(error: string): string {
    return `Error: ${error}`;
  }
}
