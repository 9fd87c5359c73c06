import {
  DeliberationService,
  OpenRouterGateway,
  JsonRunRepository,
  JsonConfigStore,
  PlaintextSecretStore,
  ConfigService,
  createCouncilConfig,
  noopDeliberationEvents,
  type RunRecord,
} from '@conclave/core';
import { createCallbackEventBridge, type EventHandler } from './adapters/callback-event-bridge.js';
import { NullRunRepository } from './adapters/null-run-repository.js';
import { getConfigDir, getDataDir } from './adapters/xdg-paths.js';

export interface ConclaveOptions {
  prompt: string;
  councilModels?: string[];
  chairmanModel?: string;
  apiKey?: string;
  timeoutMs?: number;
  onProgress?: EventHandler;
  save?: boolean;
  signal?: AbortSignal;
}

/**
 * High-level convenience function for running a deliberation.
 * Suitable for use as a programmatic API.
 */
export async function deliberate(options: ConclaveOptions): Promise<RunRecord> {
  const secretStore = new PlaintextSecretStore();
  const configStore = new JsonConfigStore(getConfigDir());
  const resolved = await new ConfigService(configStore, secretStore).resolve();

  const config = createCouncilConfig({
    ...resolved,
    apiKey: options.apiKey ?? resolved.apiKey,
    councilModels: options.councilModels ?? resolved.councilModels,
    chairmanModel: options.chairmanModel ?? resolved.chairmanModel,
    timeoutMs: options.timeoutMs ?? resolved.timeoutMs,
  });

  const service = new DeliberationService({
    createGateway: (c) => new OpenRouterGateway(c.apiKey, c.apiUrl),
    configStore,
    secretStore,
    runRepository: options.save !== false ? new JsonRunRepository(getDataDir()) : new NullRunRepository(),
    events: options.onProgress ? createCallbackEventBridge(options.onProgress) : noopDeliberationEvents,
  });

  const { record } = await service.run({ prompt: options.prompt, config, signal: options.signal });
  return record;
}

export { createCallbackEventBridge, type EventHandler } from './adapters/callback-event-bridge.js';

// Re-export everything from core for advanced usage
export * from '@conclave/core';
