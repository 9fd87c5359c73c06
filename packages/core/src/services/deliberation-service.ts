import { randomUUID } from 'node:crypto';
import type { CouncilConfig } from '../domain/council/council-config.js';
import { runCouncilPipeline } from '../domain/deliberation/pipeline.js';
import type { CouncilRunResult } from '../domain/deliberation/pipeline-state.js';
import type { RunRecord } from '../domain/run/run-record.js';
import type { ConfigStore } from '../ports/config-store.js';
import type { DeliberationEvents } from '../ports/deliberation-events.js';
import type { LlmGateway } from '../ports/llm-gateway.js';
import type { RunRepository } from '../ports/run-repository.js';
import type { SecretStore } from '../ports/secret-store.js';
import { ConfigService, type ConfigEnv } from './config-service.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('deliberation-service');

export interface DeliberationInput {
  prompt: string;
  signal?: AbortSignal;
  /** Overrides the configuration resolved from the config store. */
  config?: CouncilConfig;
}

export interface DeliberationDeps {
  /** Built per run so the gateway always sees the resolved API key. */
  createGateway: (config: CouncilConfig) => LlmGateway;
  configStore: ConfigStore;
  secretStore: SecretStore;
  runRepository: RunRepository;
  events: DeliberationEvents;
  env?: ConfigEnv;
}

export interface DeliberationOutcome {
  record: RunRecord;
  result: CouncilRunResult;
}

export class DeliberationService {
  private activeControllers = new Map<string, AbortController>();
  private configService: ConfigService;

  constructor(private deps: DeliberationDeps) {
    this.configService = new ConfigService(deps.configStore, deps.secretStore, deps.env);
  }

  get activeRunIds(): string[] {
    return [...this.activeControllers.keys()];
  }

  async run(input: DeliberationInput): Promise<DeliberationOutcome> {
    const runId = randomUUID();
    log.info(`run: starting ${runId}`);

    const controller = new AbortController();
    const onCallerAbort = () => controller.abort();
    if (input.signal?.aborted) controller.abort();
    input.signal?.addEventListener('abort', onCallerAbort, { once: true });
    this.activeControllers.set(runId, controller);

    try {
      const config = input.config ?? (await this.configService.resolve());

      const result = await runCouncilPipeline({
        config,
        query: input.prompt,
        gateway: this.deps.createGateway(config),
        events: this.deps.events,
        signal: controller.signal,
        runId,
      });

      const record: RunRecord = {
        id: runId,
        createdAt: new Date().toISOString(),
        prompt: input.prompt,
        councilModels: [...config.councilModels],
        chairmanModel: config.chairmanModel,
        stage1: result.stage1,
        stage2: result.stage2,
        stage3: result.stage3,
        notes: result.notes.length > 0 ? result.notes : undefined,
      };

      await this.deps.runRepository.save(record);
      log.info(`run: run ${runId} saved successfully`);
      this.deps.events.onComplete(record);

      return { record, result };
    } catch (err) {
      const message = err instanceof Error ? err.message : 'Unknown error';
      log.error(`run: pipeline error for ${runId}:`, message);
      this.deps.events.onError(message);
      throw err;
    } finally {
      input.signal?.removeEventListener('abort', onCallerAbort);
      this.activeControllers.delete(runId);
    }
  }

  cancel(runId: string): boolean {
    const controller = this.activeControllers.get(runId);
    if (!controller) return false;
    controller.abort();
    return true;
  }

  cancelAll(): void {
    for (const [, controller] of this.activeControllers) {
      controller.abort();
    }
  }
}
