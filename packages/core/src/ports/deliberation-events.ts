import type { PipelineTransition } from '../domain/deliberation/pipeline-state.js';
import type { RunRecord } from '../domain/run/run-record.js';

export type StageNumber = 1 | 2 | 3;
export type ModelCallStatus = 'running' | 'success' | 'error';

export interface DeliberationEvents {
  onTransition(event: PipelineTransition): void;
  onModelStatus(stage: StageNumber, model: string, status: ModelCallStatus): void;
  /** Leave unset unless chunks are shown; gateway calls only stream when it is present. */
  onModelChunk?(stage: StageNumber, model: string, chunk: string): void;
  onComplete(record: RunRecord): void;
  onError(error: string): void;
}

export const noopDeliberationEvents: DeliberationEvents = {
  onTransition: () => {},
  onModelStatus: () => {},
  onComplete: () => {},
  onError: () => {},
};
