import type { AggregateRanking, Label } from '../council/stage-results.js';
import { anonymize } from '../deliberation/anonymize.js';
import { calculateAggregateRankings, parseRankingFromText } from '../deliberation/ranking.js';
import type { RunRecord } from './run-record.js';

export interface RunMetadata {
  labelToModel: Record<Label, string>;
  aggregateRankings: AggregateRanking[];
}

/**
 * Rebuilds the label map and aggregate rankings of a stored run. Rankings are
 * re-parsed from the raw evaluator text so records written before a parser
 * change are scored the same way as fresh ones.
 */
export function reconstructRunMetadata(record: RunRecord): RunMetadata {
  const { labelMap } = anonymize(record.stage1);
  const stage2 = record.stage2.map((r) => ({
    ...r,
    parsedRanking: parseRankingFromText(r.ranking, labelMap.labels),
  }));
  return {
    labelToModel: labelMap.toRecord(),
    aggregateRankings: calculateAggregateRankings(stage2, labelMap),
  };
}
