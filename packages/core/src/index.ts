// Domain types
export type { CouncilConfig } from './domain/council/council-config.js';
export {
  createCouncilConfig,
  DEFAULT_COUNCIL_MODELS,
  DEFAULT_CHAIRMAN_MODEL,
  DEFAULT_TIMEOUT_MS,
  MAX_COUNCIL_SIZE,
  MAX_TIMEOUT_MS,
  OPENROUTER_API_URL,
} from './domain/council/council-config.js';
export type {
  Label,
  Stage1Result,
  Stage2Result,
  Stage3Result,
  AggregateRanking,
  CouncilTokenUsage,
} from './domain/council/stage-results.js';
export { SYNTHESIS_UNAVAILABLE } from './domain/council/stage-results.js';
export type { OpenRouterModelInfo } from './domain/council/model-info.js';
export { queryModelsParallel } from './domain/council/fan-out.js';
export type { FanOutEntry, FanOutOptions } from './domain/council/fan-out.js';

export { anonymize, LabelMap, labelForIndex } from './domain/deliberation/anonymize.js';
export type { AnonymizedTranscript } from './domain/deliberation/anonymize.js';
export { parseRankingFromText, calculateAggregateRankings, RANKING_ANCHOR } from './domain/deliberation/ranking.js';
export { buildRankingPrompt, buildSynthesisPrompt, formatAggregateTable } from './domain/deliberation/prompts.js';
export { runStage1, runStage2, runStage3 } from './domain/deliberation/stages.js';
export type { StageCallbacks } from './domain/deliberation/stages.js';
export { runCouncilPipeline } from './domain/deliberation/pipeline.js';
export type { CouncilPipelineOptions } from './domain/deliberation/pipeline.js';
export { PipelineStateMachine, canTransition, isTerminalState } from './domain/deliberation/pipeline-state.js';
export type {
  PipelineState,
  PipelineStep,
  PipelineTransition,
  CouncilRunResult,
} from './domain/deliberation/pipeline-state.js';

export type { RunRecord } from './domain/run/run-record.js';
export { isRunRecord } from './domain/run/run-record.js';
export type { RunMetadata } from './domain/run/run-metadata.js';
export { reconstructRunMetadata } from './domain/run/run-metadata.js';

// Port interfaces
export type {
  LlmGateway,
  ChatMessage,
  QueryOptions,
  GatewayResult,
  GatewaySuccess,
  GatewayFailure,
  GatewayFailureKind,
} from './ports/llm-gateway.js';
export type { RunRepository, RunSummary, RunStatus } from './ports/run-repository.js';
export type { ConfigStore, CouncilConfigPrefs } from './ports/config-store.js';
export type { SecretStore } from './ports/secret-store.js';
export type { DeliberationEvents, ModelCallStatus, StageNumber } from './ports/deliberation-events.js';
export { noopDeliberationEvents } from './ports/deliberation-events.js';

// Adapters
export { OpenRouterGateway } from './adapters/openrouter-gateway.js';
export { JsonRunRepository } from './adapters/json-run-repository.js';
export { JsonConfigStore } from './adapters/json-config-store.js';
export { PlaintextSecretStore } from './adapters/plaintext-secret-store.js';

// Application services
export { DeliberationService } from './services/deliberation-service.js';
export type { DeliberationInput, DeliberationDeps, DeliberationOutcome } from './services/deliberation-service.js';
export { ConfigService } from './services/config-service.js';
export type { ConfigEnv } from './services/config-service.js';

// Shared
export { createLogger, setLogLevel, getLogLevel, isLogLevel } from './shared/logger.js';
export type { Logger, LogLevel } from './shared/logger.js';
export {
  ConclaveError,
  ConfigError,
  PipelineError,
  AllModelsFailedError,
  PipelineCancelledError,
  GatewayError,
} from './shared/errors.js';
