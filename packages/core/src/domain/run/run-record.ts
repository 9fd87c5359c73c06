import { MAX_COUNCIL_SIZE } from '../council/council-config.js';
import type { Stage1Result, Stage2Result, Stage3Result } from '../council/stage-results.js';

/**
 * The persisted transcript of one run. The label map and aggregate rankings
 * are derived data and are rebuilt with `reconstructRunMetadata`; `stage1` is
 * stored in the success-filtered order that produced the labels.
 */
export interface RunRecord {
  id: string;
  createdAt: string;
  prompt: string;
  councilModels: string[];
  chairmanModel: string;
  stage1: Stage1Result[];
  stage2: Stage2Result[];
  stage3: Stage3Result;
  notes?: string[];
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function isStage1Result(value: unknown): value is Stage1Result {
  return isObject(value) && typeof value.model === 'string' && typeof value.response === 'string';
}

/** Stage one must be labelable: distinct models, no more than there are labels. */
function isLabelableStage1(value: unknown): value is Stage1Result[] {
  if (!Array.isArray(value) || value.length > MAX_COUNCIL_SIZE || !value.every(isStage1Result)) {
    return false;
  }
  return new Set(value.map((r) => r.model)).size === value.length;
}

function isStage2Result(value: unknown): value is Stage2Result {
  return (
    isObject(value) &&
    typeof value.model === 'string' &&
    typeof value.ranking === 'string' &&
    isStringArray(value.parsedRanking)
  );
}

function isStage3Result(value: unknown): value is Stage3Result {
  return (
    isObject(value) &&
    typeof value.model === 'string' &&
    typeof value.response === 'string' &&
    typeof value.available === 'boolean'
  );
}

export function isRunRecord(value: unknown): value is RunRecord {
  return (
    isObject(value) &&
    typeof value.id === 'string' &&
    typeof value.createdAt === 'string' &&
    typeof value.prompt === 'string' &&
    isStringArray(value.councilModels) &&
    typeof value.chairmanModel === 'string' &&
    isLabelableStage1(value.stage1) &&
    Array.isArray(value.stage2) &&
    value.stage2.every(isStage2Result) &&
    isStage3Result(value.stage3) &&
    (value.notes === undefined || isStringArray(value.notes))
  );
}
