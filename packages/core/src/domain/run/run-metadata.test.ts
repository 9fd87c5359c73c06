import { describe, it, expect } from 'vitest';
import { reconstructRunMetadata } from './run-metadata.js';
import { isRunRecord, type RunRecord } from './run-record.js';

const record: RunRecord = {
  id: 'run-1',
  createdAt: '2026-01-02T03:04:05.000Z',
  prompt: 'What is 2+2?',
  councilModels: ['m1', 'm2', 'm3'],
  chairmanModel: 'chair',
  stage1: [
    { model: 'm1', response: '4' },
    { model: 'm3', response: 'four' },
  ],
  stage2: [
    { model: 'm1', ranking: 'FINAL RANKING:\n1. Response B\n2. Response A', parsedRanking: [] },
    { model: 'm3', ranking: 'FINAL RANKING:\n1. Response B\n2. Response A', parsedRanking: ['B', 'A'] },
  ],
  stage3: { model: 'chair', response: '4', available: true },
};

describe('reconstructRunMetadata', () => {
  it('rebuilds labels from the stored stage-one order', () => {
    expect(reconstructRunMetadata(record).labelToModel).toEqual({ A: 'm1', B: 'm3' });
  });

  it('re-parses rankings from the raw evaluator text', () => {
    expect(reconstructRunMetadata(record).aggregateRankings).toEqual([
      { model: 'm3', averageRank: 1, voteCount: 2 },
      { model: 'm1', averageRank: 2, voteCount: 2 },
    ]);
  });
});

describe('isRunRecord', () => {
  it('accepts a complete record', () => {
    expect(isRunRecord(record)).toBe(true);
    expect(isRunRecord(JSON.parse(JSON.stringify(record)))).toBe(true);
  });

  it('rejects records with missing or mistyped fields', () => {
    expect(isRunRecord(null)).toBe(false);
    expect(isRunRecord({ ...record, stage3: undefined })).toBe(false);
    expect(isRunRecord({ ...record, councilModels: 'm1' })).toBe(false);
    expect(isRunRecord({ ...record, stage2: [{ model: 'm1', ranking: 'x' }] })).toBe(false);
    expect(isRunRecord({ ...record, notes: [1] })).toBe(false);
  });

  it('rejects records whose stage one cannot be labeled', () => {
    const repeated = { ...record, stage1: [...record.stage1, { model: 'm1', response: 'again' }] };
    const oversized = {
      ...record,
      stage1: Array.from({ length: 27 }, (_, i) => ({ model: `m${i}`, response: 'x' })),
    };
    expect(isRunRecord(repeated)).toBe(false);
    expect(isRunRecord(oversized)).toBe(false);
  });
});
