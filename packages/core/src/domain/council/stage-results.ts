import type { GatewayFailureKind } from '../../ports/llm-gateway.js';

export interface CouncilTokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface Stage1Result {
  model: string;
  response: string;
  usage?: CouncilTokenUsage | null;
}

/** A single upper-case letter standing in for a model during peer review. */
export type Label = string;

export interface Stage2Result {
  model: string;
  /** Raw evaluator text, kept even when nothing could be parsed from it. */
  ranking: string;
  parsedRanking: Label[];
  usage?: CouncilTokenUsage | null;
}

export const SYNTHESIS_UNAVAILABLE =
  'Synthesis unavailable: the chairman model did not return an answer.';

export interface Stage3Result {
  model: string;
  response: string;
  available: boolean;
  failure?: GatewayFailureKind;
  usage?: CouncilTokenUsage | null;
}

export interface AggregateRanking {
  model: string;
  averageRank: number;
  voteCount: number;
}
