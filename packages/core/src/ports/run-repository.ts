import type { RunRecord } from '../domain/run/run-record.js';

export type RunStatus = 'complete' | 'synthesis_unavailable';

export interface RunSummary {
  id: string;
  createdAt: string;
  promptPreview: string;
  status: RunStatus;
}

export interface RunRepository {
  save(run: RunRecord): Promise<string>;
  load(id: string): Promise<RunRecord>;
  list(): Promise<RunSummary[]>;
}
