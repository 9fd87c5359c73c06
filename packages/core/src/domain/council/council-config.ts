import { ConfigError } from '../../shared/errors.js';

export interface CouncilConfig {
  readonly apiKey: string;
  readonly apiUrl: string;
  /** Ordered; the order decides stage-one labels and aggregate tie-breaks. */
  readonly councilModels: readonly string[];
  readonly chairmanModel: string;
  /** Per-call timeout for every gateway request. */
  readonly timeoutMs: number;
}

export const DEFAULT_COUNCIL_MODELS: readonly string[] = [
  'openai/gpt-4o',
  'google/gemini-1.5-pro',
  'anthropic/claude-3.5-sonnet',
];

export const DEFAULT_CHAIRMAN_MODEL = 'google/gemini-1.5-pro';
export const OPENROUTER_API_URL = 'https://openrouter.ai/api/v1/chat/completions';
export const DEFAULT_TIMEOUT_MS = 120_000;

/** Labels are single letters, so a council cannot outgrow the alphabet. */
export const MAX_COUNCIL_SIZE = 26;

/** Largest delay a timer accepts; anything above fires immediately. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export function createCouncilConfig(input: {
  apiKey?: string;
  apiUrl?: string;
  councilModels: readonly string[];
  chairmanModel: string;
  timeoutMs?: number;
}): CouncilConfig {
  const councilModels = input.councilModels.map((m) => m.trim());

  if (councilModels.length === 0) {
    throw new ConfigError('At least one council model is required.');
  }
  if (councilModels.length > MAX_COUNCIL_SIZE) {
    throw new ConfigError(
      `Council has ${councilModels.length} models; at most ${MAX_COUNCIL_SIZE} are supported.`,
    );
  }
  if (councilModels.some((m) => m === '')) {
    throw new ConfigError('Council model identifiers must not be empty.');
  }
  const duplicate = councilModels.find((m, i) => councilModels.indexOf(m) !== i);
  if (duplicate) {
    throw new ConfigError(`Council model listed twice: ${duplicate}`);
  }

  const chairmanModel = input.chairmanModel.trim();
  if (!chairmanModel) {
    throw new ConfigError('A chairman model is required.');
  }

  const timeoutMs = input.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
    throw new ConfigError(`Timeout must be a positive integer of milliseconds, got ${timeoutMs}.`);
  }
  if (timeoutMs > MAX_TIMEOUT_MS) {
    throw new ConfigError(`Timeout must be at most ${MAX_TIMEOUT_MS}ms, got ${timeoutMs}.`);
  }

  return Object.freeze({
    apiKey: input.apiKey ?? '',
    apiUrl: input.apiUrl || OPENROUTER_API_URL,
    councilModels: Object.freeze(councilModels),
    chairmanModel,
    timeoutMs,
  });
}
