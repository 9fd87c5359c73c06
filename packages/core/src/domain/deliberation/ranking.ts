import type { AggregateRanking, Label, Stage2Result } from '../council/stage-results.js';
import type { LabelMap } from './anonymize.js';

export const RANKING_ANCHOR = 'FINAL RANKING:';

const ANCHOR_PATTERN = /FINAL RANKING:/gi;
const NUMBERED_LINE = /^\s*\d+\.\s*\**\s*[Rr]esponse\s+([A-Z])\b/;
const RESPONSE_TOKEN = /\b[Rr]esponse\s+([A-Z])\b/g;

function dedupeAndFilter(labels: Label[], validLabels: ReadonlySet<Label>): Label[] {
  const seen = new Set<Label>();
  const out: Label[] = [];
  for (const label of labels) {
    if (seen.has(label)) continue;
    seen.add(label);
    if (validLabels.has(label)) out.push(label);
  }
  return out;
}

function findAnchorEnd(text: string): number {
  let end = -1;
  for (const match of text.matchAll(ANCHOR_PATTERN)) {
    end = (match.index ?? 0) + match[0].length;
  }
  return end;
}

function scanNumberedLines(section: string): Label[] {
  const labels: Label[] = [];
  for (const line of section.split(/\r?\n/)) {
    const match = NUMBERED_LINE.exec(line);
    if (match) {
      labels.push(match[1]);
      continue;
    }
    if (labels.length === 0 && line.trim() === '') continue;
    break;
  }
  return labels;
}

function scanResponseTokens(text: string): Label[] {
  return [...text.matchAll(RESPONSE_TOKEN)].map((m) => m[1]);
}

/**
 * Extracts an evaluator's ordering of labels from free text.
 *
 * Tiers, first non-empty result wins:
 * 1. numbered `N. Response X` lines directly after the last `FINAL RANKING:` anchor
 * 2. any `Response X` after that anchor
 * 3. any `Response X` in the whole text, only when there is no anchor at all
 *
 * Labels outside `validLabels` are dropped and repeats keep their first position.
 */
export function parseRankingFromText(rankingText: string, validLabels: Iterable<Label>): Label[] {
  const valid = new Set(validLabels);
  const anchorEnd = findAnchorEnd(rankingText);

  if (anchorEnd === -1) {
    return dedupeAndFilter(scanResponseTokens(rankingText), valid);
  }

  const section = rankingText.slice(anchorEnd);
  const strict = dedupeAndFilter(scanNumberedLines(section), valid);
  if (strict.length > 0) return strict;

  return dedupeAndFilter(scanResponseTokens(section), valid);
}

/**
 * Average 1-indexed position per model across every non-empty parsed ranking.
 * Ties go to the model with more votes, then to the earlier stage-one position,
 * so the result never depends on the order evaluators finished in.
 */
export function calculateAggregateRankings(
  stage2Results: readonly Stage2Result[],
  labelMap: LabelMap,
): AggregateRanking[] {
  const positions = new Map<string, number[]>();

  for (const result of stage2Results) {
    result.parsedRanking.forEach((label, i) => {
      const model = labelMap.modelFor(label);
      if (!model) return;
      const observed = positions.get(model) ?? [];
      observed.push(i + 1);
      positions.set(model, observed);
    });
  }

  const aggregate: AggregateRanking[] = [];
  for (const [model, observed] of positions) {
    const sum = observed.reduce((a, b) => a + b, 0);
    aggregate.push({ model, averageRank: sum / observed.length, voteCount: observed.length });
  }

  aggregate.sort(
    (a, b) =>
      a.averageRank - b.averageRank ||
      b.voteCount - a.voteCount ||
      labelMap.positionOf(a.model) - labelMap.positionOf(b.model),
  );
  return aggregate;
}
