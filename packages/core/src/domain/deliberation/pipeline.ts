import { randomUUID } from 'node:crypto';
import type { CouncilConfig } from '../council/council-config.js';
import type { LlmGateway } from '../../ports/llm-gateway.js';
import type {
  DeliberationEvents,
  ModelCallStatus,
  StageNumber,
} from '../../ports/deliberation-events.js';
import { AllModelsFailedError, PipelineCancelledError } from '../../shared/errors.js';
import { createLogger } from '../../shared/logger.js';
import { anonymize } from './anonymize.js';
import { PipelineStateMachine, type CouncilRunResult } from './pipeline-state.js';
import { calculateAggregateRankings } from './ranking.js';
import { runStage1, runStage2, runStage3 } from './stages.js';

const log = createLogger('pipeline');

export interface CouncilPipelineOptions {
  config: CouncilConfig;
  query: string;
  gateway: LlmGateway;
  events?: Partial<Pick<DeliberationEvents, 'onTransition' | 'onModelStatus' | 'onModelChunk'>>;
  signal?: AbortSignal;
  runId?: string;
}

/**
 * Runs answer → peer ranking → synthesis as a strict barrier chain.
 * Only AllModelsFailedError (stage 1) and PipelineCancelledError escape;
 * every other failure is folded into the result and its notes.
 */
export async function runCouncilPipeline(options: CouncilPipelineOptions): Promise<CouncilRunResult> {
  const { config, query, gateway, events, signal } = options;
  const runId = options.runId ?? randomUUID();
  const machine = new PipelineStateMachine(runId, (event) => events?.onTransition?.(event));
  const notes: string[] = [];
  const stageCtx = {
    gateway,
    timeoutMs: config.timeoutMs,
    signal,
    notes,
    callbacks: {
      onModelStatus: (stage: StageNumber, model: string, status: ModelCallStatus) =>
        events?.onModelStatus?.(stage, model, status),
      // Only stream when somebody listens for chunks.
      onModelChunk: events?.onModelChunk
        ? (stage: StageNumber, model: string, chunk: string) => events?.onModelChunk?.(stage, model, chunk)
        : undefined,
    },
  };

  log.info(`runCouncilPipeline: starting ${runId} with ${config.councilModels.length} council models`);
  log.debug('runCouncilPipeline: chairman model:', config.chairmanModel);

  try {
    machine.transition({ state: 'stage1_running' });
    const stage1 = await runStage1({ ...stageCtx, models: config.councilModels, query });
    machine.transition({ state: 'stage1_done', stage1 });

    const { labelMap, transcript } = anonymize(stage1);
    machine.transition({ state: 'stage2_running' });
    const stage2 = await runStage2({
      ...stageCtx,
      evaluators: labelMap.models,
      query,
      transcript,
      labelMap,
    });
    const aggregateRankings = calculateAggregateRankings(stage2, labelMap);
    if (stage2.length === 0) {
      notes.push('All Stage 2 ranking calls failed; synthesis uses Stage 1 answers only.');
    }
    log.debug('runCouncilPipeline: aggregate rankings:', aggregateRankings);
    machine.transition({
      state: 'stage2_done',
      stage2,
      labelToModel: labelMap.toRecord(),
      aggregateRankings,
    });

    machine.transition({ state: 'stage3_running' });
    const stage3 = await runStage3({
      ...stageCtx,
      chairmanModel: config.chairmanModel,
      query,
      stage1,
      stage2,
      aggregate: aggregateRankings,
    });
    machine.transition({ state: 'stage3_done', stage3 });

    const result: CouncilRunResult = { stage1, stage2, stage3, labelMap, aggregateRankings, notes };
    machine.transition({ state: 'completed', result });
    log.info(`runCouncilPipeline: ${runId} complete`);
    return result;
  } catch (err) {
    if (err instanceof AllModelsFailedError) {
      machine.transition({ state: 'failed', error: err });
    } else if (err instanceof PipelineCancelledError) {
      log.warn(`runCouncilPipeline: ${runId} cancelled in stage ${err.stage}`);
      machine.transition({ state: 'cancelled', error: err });
    }
    throw err;
  }
}
