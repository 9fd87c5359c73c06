import { formatAggregateTable, reconstructRunMetadata, type RunRecord } from '@conclave/core';
import type { OutputFormatter } from './formatter.js';

export class MarkdownFormatter implements OutputFormatter {
  formatComplete(record: RunRecord): string {
    const { aggregateRankings } = reconstructRunMetadata(record);
    const sections = [
      '# Conclave Deliberation',
      `**Prompt:** ${record.prompt}`,
      `**Date:** ${record.createdAt}`,
    ];

    if (aggregateRankings.length > 0) {
      sections.push('## Rankings', formatAggregateTable(aggregateRankings));
    }
    sections.push(`## Synthesis (${record.stage3.model})`, record.stage3.response);
    if (record.notes && record.notes.length > 0) {
      sections.push('## Notes', record.notes.map((n) => `- ${n}`).join('\n'));
    }
    return sections.join('\n\n');
  }

  formatError(error: string): string {
    return `## Error\n\n${error}`;
  }
}
