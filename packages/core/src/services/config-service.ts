import type { CouncilConfig } from '../domain/council/council-config.js';
import {
  DEFAULT_COUNCIL_MODELS,
  DEFAULT_CHAIRMAN_MODEL,
  DEFAULT_TIMEOUT_MS,
  OPENROUTER_API_URL,
  createCouncilConfig,
} from '../domain/council/council-config.js';
import type { ConfigStore, CouncilConfigPrefs } from '../ports/config-store.js';
import type { SecretStore } from '../ports/secret-store.js';
import { ConfigError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('config-service');

export type ConfigEnv = Readonly<Record<string, string | undefined>>;

function parseModelList(value: string): string[] {
  return value.split(',').map((s) => s.trim()).filter(Boolean);
}

function parseTimeout(value: string): number {
  const timeoutMs = Number(value);
  if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
    throw new ConfigError(`COUNCIL_TIMEOUT_MS must be a positive integer, got "${value}".`);
  }
  return timeoutMs;
}

/**
 * Resolves the council configuration. Environment variables win over stored
 * preferences, which win over the built-in defaults.
 */
export class ConfigService {
  constructor(
    private configStore: ConfigStore,
    private secretStore: SecretStore,
    private env: ConfigEnv = process.env,
  ) {}

  async resolve(): Promise<CouncilConfig> {
    const envApiKey = this.env.OPENROUTER_API_KEY ?? '';
    const envCouncilModels = this.env.COUNCIL_MODELS ?? '';
    const envChairmanModel = this.env.CHAIRMAN_MODEL ?? '';
    const envApiUrl = this.env.OPENROUTER_API_URL ?? '';
    const envTimeout = this.env.COUNCIL_TIMEOUT_MS ?? '';

    const prefs = await this.configStore.getCouncilConfigPrefs();

    let prefApiKey = '';
    if (prefs.apiKeyEncrypted && !envApiKey) {
      try {
        prefApiKey = this.secretStore.decrypt(prefs.apiKeyEncrypted);
      } catch (err) {
        log.warn('resolve: stored API key could not be decoded:', err instanceof Error ? err.message : err);
      }
    }

    let councilModels: readonly string[];
    if (envCouncilModels) {
      councilModels = parseModelList(envCouncilModels);
    } else if (prefs.councilModels && prefs.councilModels.length > 0) {
      councilModels = prefs.councilModels;
    } else {
      councilModels = DEFAULT_COUNCIL_MODELS;
    }

    return createCouncilConfig({
      apiKey: envApiKey || prefApiKey,
      apiUrl: envApiUrl || OPENROUTER_API_URL,
      councilModels,
      chairmanModel: envChairmanModel || prefs.chairmanModel || DEFAULT_CHAIRMAN_MODEL,
      timeoutMs: envTimeout ? parseTimeout(envTimeout) : prefs.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    });
  }

  async saveApiKey(key: string): Promise<void> {
    await this.saveCouncilConfig({ apiKey: key });
  }

  /** Merges the given values into the stored preferences. */
  async saveCouncilConfig(update: {
    chairmanModel?: string;
    councilModels?: string[];
    timeoutMs?: number;
    apiKey?: string;
  }): Promise<void> {
    const current = await this.configStore.getCouncilConfigPrefs();
    const next: CouncilConfigPrefs = { ...current };
    if (update.chairmanModel) next.chairmanModel = update.chairmanModel;
    if (update.councilModels) next.councilModels = update.councilModels;
    if (update.timeoutMs) next.timeoutMs = update.timeoutMs;
    if (update.apiKey) next.apiKeyEncrypted = this.secretStore.encrypt(update.apiKey);

    // Validate the merged preferences before persisting them.
    createCouncilConfig({
      councilModels: next.councilModels ?? DEFAULT_COUNCIL_MODELS,
      chairmanModel: next.chairmanModel ?? DEFAULT_CHAIRMAN_MODEL,
      timeoutMs: next.timeoutMs,
    });
    await this.configStore.saveCouncilConfigPrefs(next);
  }
}
