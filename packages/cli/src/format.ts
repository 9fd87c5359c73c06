import type { CouncilTokenUsage, OpenRouterModelInfo, RunRecord } from '@conclave/core';

/** Format a token count with k/M suffixes for readability. */
export function formatTokens(count: number): string {
  if (count >= 1_000_000) return `${(count / 1_000_000).toFixed(1)}M tok`;
  if (count >= 1_000) return `${(count / 1_000).toFixed(1)}k tok`;
  return `${count} tok`;
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  const seconds = ms / 1000;
  if (seconds < 60) return `${seconds.toFixed(1)}s`;
  const minutes = Math.floor(seconds / 60);
  return `${minutes}m ${Math.round(seconds - minutes * 60)}s`;
}

/** Sums the usage every stage reported. Calls without usage count as zero. */
export function totalUsage(record: RunRecord): CouncilTokenUsage {
  const usages = [
    ...record.stage1.map((r) => r.usage),
    ...record.stage2.map((r) => r.usage),
    record.stage3.usage,
  ];
  const total: CouncilTokenUsage = { promptTokens: 0, completionTokens: 0, totalTokens: 0 };
  for (const usage of usages) {
    if (!usage) continue;
    total.promptTokens += usage.promptTokens;
    total.completionTokens += usage.completionTokens;
    total.totalTokens += usage.totalTokens;
  }
  return total;
}

function formatPerMillion(usd: number): string {
  if (usd === 0) return 'free';
  return `$${usd.toFixed(usd < 1 ? 3 : 2)}`;
}

/** Prompt and completion price per million tokens, e.g. `$3.00 in / $15.00 out`. */
export function formatModelPrice(pricing: OpenRouterModelInfo['pricing']): string {
  return `${formatPerMillion(pricing.prompt)} in / ${formatPerMillion(pricing.completion)} out`;
}

/** The vendor segment of a model id (`anthropic/claude-3.5-sonnet` gives `anthropic`). */
export function modelVendor(modelId: string): string {
  const slash = modelId.indexOf('/');
  return slash > 0 ? modelId.slice(0, slash) : '-';
}
