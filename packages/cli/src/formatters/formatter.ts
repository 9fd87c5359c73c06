import type { RunRecord } from '@conclave/core';
import { JsonFormatter } from './json.js';
import { MarkdownFormatter } from './markdown.js';
import { PlainFormatter } from './plain.js';

export interface OutputFormatter {
  formatComplete(record: RunRecord): string;
  formatError(error: string): string;
}

export const OUTPUT_FORMATS = ['json', 'plain', 'md'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: unknown): value is OutputFormat {
  return typeof value === 'string' && OUTPUT_FORMATS.some((f) => f === value);
}

export function createFormatter(format: OutputFormat): OutputFormatter {
  switch (format) {
    case 'json':
      return new JsonFormatter();
    case 'plain':
      return new PlainFormatter();
    case 'md':
      return new MarkdownFormatter();
  }
}
