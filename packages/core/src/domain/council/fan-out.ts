import type { ChatMessage, GatewayResult, LlmGateway } from '../../ports/llm-gateway.js';
import { createLogger } from '../../shared/logger.js';

const log = createLogger('fan-out');

export interface FanOutOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  onModelStart?: (model: string) => void;
  onModelChunk?: (model: string, chunk: string) => void;
  onModelComplete?: (model: string, result: GatewayResult) => void;
}

export interface FanOutEntry {
  model: string;
  result: GatewayResult;
}

/** Runs a progress listener; a listener that throws never changes a call's result. */
function notify(event: string, model: string, listener: () => void): void {
  try {
    listener();
  } catch (err) {
    log.warn(`queryModelsParallel: ${event} listener for ${model} threw:`, err);
  }
}

/**
 * Queries every model concurrently and resolves once all calls have settled.
 * Entries come back in the order of `models`, whatever order the calls finish in.
 * Each call gets its own AbortController chained to `options.signal`.
 */
export async function queryModelsParallel(
  gateway: LlmGateway,
  models: readonly string[],
  messages: ChatMessage[],
  options: FanOutOptions,
): Promise<FanOutEntry[]> {
  log.debug(`queryModelsParallel: starting ${models.length} queries:`, models);

  const controllers = models.map(() => new AbortController());
  const abortAll = () => {
    for (const controller of controllers) controller.abort();
  };
  if (options.signal?.aborted) abortAll();
  options.signal?.addEventListener('abort', abortAll, { once: true });

  try {
    const settled = await Promise.allSettled(
      models.map(async (model, i) => {
        const { onModelStart, onModelChunk, onModelComplete } = options;
        if (onModelStart) notify('start', model, () => onModelStart(model));
        const result = await gateway.query(model, messages, {
          timeoutMs: options.timeoutMs,
          signal: controllers[i].signal,
          onChunk: onModelChunk ? (chunk) => notify('chunk', model, () => onModelChunk(model, chunk)) : undefined,
        });
        if (onModelComplete) notify('complete', model, () => onModelComplete(model, result));
        return result;
      }),
    );

    const entries = settled.map((outcome, i): FanOutEntry => {
      if (outcome.status === 'fulfilled') {
        return { model: models[i], result: outcome.value };
      }
      // The gateway contract says query never rejects; a rejection still only costs that model.
      log.error(`queryModelsParallel: query for ${models[i]} rejected:`, outcome.reason);
      const message = outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason);
      return { model: models[i], result: { ok: false, kind: 'transport', message } };
    });

    const successCount = entries.filter((e) => e.result.ok).length;
    log.info(`queryModelsParallel: completed - ${successCount} success, ${entries.length - successCount} failed`);
    return entries;
  } finally {
    options.signal?.removeEventListener('abort', abortAll);
  }
}
