import type {
  DeliberationEvents,
  ModelCallStatus,
  PipelineState,
  PipelineTransition,
  RunRecord,
  StageNumber,
} from '@conclave/core';

export type EventHandler = {
  onStageChange?: (stage: StageNumber, summary: string) => void;
  onTransition?: (event: PipelineTransition) => void;
  onModelStatus?: (stage: StageNumber, model: string, status: ModelCallStatus) => void;
  onModelChunk?: (stage: StageNumber, model: string, chunk: string) => void;
  onComplete?: (record: RunRecord) => void;
  onError?: (error: string) => void;
};

const STAGE_STARTS: Partial<Record<PipelineState, [StageNumber, string]>> = {
  stage1_running: [1, 'Council members answer independently'],
  stage2_running: [2, 'Peer review of anonymized answers'],
  stage3_running: [3, 'Chairman writes the final answer'],
};

export function createCallbackEventBridge(handlers: EventHandler): DeliberationEvents {
  const { onModelChunk } = handlers;
  return {
    onTransition: (event) => {
      handlers.onTransition?.(event);
      const start = STAGE_STARTS[event.state];
      if (start) handlers.onStageChange?.(start[0], start[1]);
    },
    onModelStatus: (stage, model, status) => handlers.onModelStatus?.(stage, model, status),
    ...(onModelChunk && {
      onModelChunk: (stage: StageNumber, model: string, chunk: string) => onModelChunk(stage, model, chunk),
    }),
    onComplete: (record) => handlers.onComplete?.(record),
    onError: (error) => handlers.onError?.(error),
  };
}
