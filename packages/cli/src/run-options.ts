import { createCouncilConfig, type CouncilConfig } from '@conclave/core';

/** Raw `--council`, `--chairman` and `--timeout` values as commander hands them over. */
export interface ConfigOverrides {
  council?: string;
  chairman?: string;
  timeout?: string;
}

export function parseModelList(value: string): string[] {
  return value.split(',').map((s) => s.trim()).filter(Boolean);
}

/** Applies command-line overrides on top of the resolved configuration and re-validates it. */
export function applyRunOverrides(config: CouncilConfig, overrides: ConfigOverrides): CouncilConfig {
  return createCouncilConfig({
    ...config,
    councilModels: overrides.council ? parseModelList(overrides.council) : config.councilModels,
    chairmanModel: overrides.chairman ?? config.chairmanModel,
    timeoutMs: overrides.timeout !== undefined ? Number(overrides.timeout) : config.timeoutMs,
  });
}
