import { reconstructRunMetadata, type RunRecord } from '@conclave/core';
import type { OutputFormatter } from './formatter.js';

/** The stored record plus the label map and rankings derived from it. */
export class JsonFormatter implements OutputFormatter {
  formatComplete(record: RunRecord): string {
    return JSON.stringify({ ...record, metadata: reconstructRunMetadata(record) }, null, 2);
  }

  formatError(error: string): string {
    return JSON.stringify({ error });
  }
}
