import type {
  AggregateRanking,
  Stage1Result,
  Stage2Result,
  Stage3Result,
} from '../council/stage-results.js';
import { SYNTHESIS_UNAVAILABLE } from '../council/stage-results.js';
import { queryModelsParallel, type FanOutEntry } from '../council/fan-out.js';
import type { GatewayFailureKind, LlmGateway } from '../../ports/llm-gateway.js';
import type { ModelCallStatus, StageNumber } from '../../ports/deliberation-events.js';
import { AllModelsFailedError, PipelineCancelledError } from '../../shared/errors.js';
import { createLogger } from '../../shared/logger.js';
import type { LabelMap } from './anonymize.js';
import { buildRankingPrompt, buildStage1Messages, buildSynthesisPrompt } from './prompts.js';
import { parseRankingFromText } from './ranking.js';

const log = createLogger('stages');

export interface StageCallbacks {
  onModelStatus?: (stage: StageNumber, model: string, status: ModelCallStatus) => void;
  onModelChunk?: (stage: StageNumber, model: string, chunk: string) => void;
}

interface StageContext {
  gateway: LlmGateway;
  timeoutMs: number;
  signal?: AbortSignal;
  callbacks?: StageCallbacks;
  /** Absorbed failures are appended here as readable notes. */
  notes?: string[];
}

function fanOut(
  stage: StageNumber,
  ctx: StageContext,
  models: readonly string[],
  content: string,
): Promise<FanOutEntry[]> {
  const { callbacks } = ctx;
  return queryModelsParallel(ctx.gateway, models, [{ role: 'user', content }], {
    timeoutMs: ctx.timeoutMs,
    signal: ctx.signal,
    onModelStart: (model) => callbacks?.onModelStatus?.(stage, model, 'running'),
    onModelChunk: callbacks?.onModelChunk
      ? (model, chunk) => callbacks.onModelChunk?.(stage, model, chunk)
      : undefined,
    onModelComplete: (model, result) =>
      callbacks?.onModelStatus?.(stage, model, result.ok ? 'success' : 'error'),
  });
}

function throwIfCancelled(stage: StageNumber, signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new PipelineCancelledError(stage);
  }
}

/** Stage 1: every council member answers the query independently. */
export async function runStage1(
  ctx: StageContext & { models: readonly string[]; query: string },
): Promise<Stage1Result[]> {
  throwIfCancelled(1, ctx.signal);
  log.info(`runStage1: querying ${ctx.models.length} council models`);

  const [message] = buildStage1Messages(ctx.query);
  const entries = await fanOut(1, ctx, ctx.models, message.content);
  throwIfCancelled(1, ctx.signal);

  const results: Stage1Result[] = [];
  const failures: Record<string, GatewayFailureKind> = {};
  for (const { model, result } of entries) {
    if (result.ok) {
      results.push({ model, response: result.content, usage: result.usage ?? null });
    } else {
      log.warn(`runStage1: ${model} failed (${result.kind}): ${result.message}`);
      ctx.notes?.push(`Stage 1 model failed: ${model} (${result.kind})`);
      failures[model] = result.kind;
    }
  }

  if (results.length === 0) {
    log.error('runStage1: every council model failed');
    throw new AllModelsFailedError(failures);
  }
  log.info(`runStage1: ${results.length}/${ctx.models.length} models answered`);
  return results;
}

/** Stage 2: the surviving models rank the anonymized answers. */
export async function runStage2(
  ctx: StageContext & {
    evaluators: readonly string[];
    query: string;
    transcript: string;
    labelMap: LabelMap;
  },
): Promise<Stage2Result[]> {
  throwIfCancelled(2, ctx.signal);
  log.info(`runStage2: collecting rankings from ${ctx.evaluators.length} evaluators`);
  log.debug('runStage2: label mapping:', ctx.labelMap.toRecord());

  const prompt = buildRankingPrompt(ctx.query, ctx.transcript);
  const entries = await fanOut(2, ctx, ctx.evaluators, prompt);
  throwIfCancelled(2, ctx.signal);

  const results: Stage2Result[] = [];
  for (const { model, result } of entries) {
    if (!result.ok) {
      log.warn(`runStage2: evaluator ${model} failed (${result.kind}): ${result.message}`);
      ctx.notes?.push(`Ranking model failed: ${model} (${result.kind})`);
      continue;
    }
    const parsedRanking = parseRankingFromText(result.content, ctx.labelMap.labels);
    if (parsedRanking.length === 0) {
      log.warn(`runStage2: no ranking could be parsed from ${model}`);
      ctx.notes?.push(`Ranking from ${model} could not be parsed; it casts no votes.`);
    }
    log.debug(`runStage2: ${model} ranking parsed:`, parsedRanking);
    results.push({
      model,
      ranking: result.content,
      parsedRanking,
      usage: result.usage ?? null,
    });
  }

  log.info(`runStage2: ${results.length} successful rankings out of ${ctx.evaluators.length} evaluators`);
  return results;
}

/** Stage 3: the chairman writes the final answer. Failure is reported, not thrown. */
export async function runStage3(
  ctx: StageContext & {
    chairmanModel: string;
    query: string;
    stage1: readonly Stage1Result[];
    stage2: readonly Stage2Result[];
    aggregate: readonly AggregateRanking[];
  },
): Promise<Stage3Result> {
  throwIfCancelled(3, ctx.signal);
  log.info(`runStage3: requesting synthesis from ${ctx.chairmanModel}`);

  const prompt = buildSynthesisPrompt(ctx.query, ctx.stage1, ctx.stage2, ctx.aggregate);
  log.debug(`runStage3: synthesis prompt length: ${prompt.length} chars`);

  const [{ result }] = await fanOut(3, ctx, [ctx.chairmanModel], prompt);
  throwIfCancelled(3, ctx.signal);

  if (!result.ok) {
    log.error(`runStage3: chairman ${ctx.chairmanModel} failed (${result.kind}): ${result.message}`);
    ctx.notes?.push(`Chairman synthesis failed: ${ctx.chairmanModel} (${result.kind})`);
    return {
      model: ctx.chairmanModel,
      response: SYNTHESIS_UNAVAILABLE,
      available: false,
      failure: result.kind,
    };
  }

  log.info(`runStage3: synthesis complete, length: ${result.content.length} chars`);
  return {
    model: ctx.chairmanModel,
    response: result.content,
    available: true,
    usage: result.usage ?? null,
  };
}
