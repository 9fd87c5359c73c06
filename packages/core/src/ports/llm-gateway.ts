import type { CouncilTokenUsage } from '../domain/council/stage-results.js';
import type { OpenRouterModelInfo } from '../domain/council/model-info.js';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export type GatewayFailureKind =
  | 'timeout'
  | 'transport'
  | 'http'
  | 'malformed'
  | 'cancelled'
  | 'unauthorized';

export interface GatewaySuccess {
  ok: true;
  content: string;
  usage?: CouncilTokenUsage;
  /** Provider-specific extras (upstream provider name, response id). */
  providerMetadata?: Record<string, string>;
}

export interface GatewayFailure {
  ok: false;
  kind: GatewayFailureKind;
  message: string;
}

export type GatewayResult = GatewaySuccess | GatewayFailure;

export interface QueryOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  /** When present the response is streamed and each content delta is forwarded. */
  onChunk?: (text: string) => void;
}

/**
 * Single-model chat gateway. `query` never rejects: every failure comes back
 * as a `GatewayFailure`.
 */
export interface LlmGateway {
  query(model: string, messages: ChatMessage[], options: QueryOptions): Promise<GatewayResult>;
  fetchModels(): Promise<OpenRouterModelInfo[]>;
}
