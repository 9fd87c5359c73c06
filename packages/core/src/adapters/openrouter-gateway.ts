import type { CouncilTokenUsage } from '../domain/council/stage-results.js';
import type { OpenRouterModelInfo } from '../domain/council/model-info.js';
import { OPENROUTER_API_URL } from '../domain/council/council-config.js';
import type {
  ChatMessage,
  GatewayFailure,
  GatewayFailureKind,
  GatewayResult,
  LlmGateway,
  QueryOptions,
} from '../ports/llm-gateway.js';
import { GatewayError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('openrouter');

const CACHE_TTL_MS = 60 * 60 * 1000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function failure(kind: GatewayFailureKind, message: string): GatewayFailure {
  return { ok: false, kind, message };
}

function normalizeUsage(raw: unknown): CouncilTokenUsage | undefined {
  if (!isRecord(raw)) return undefined;
  const num = (v: unknown) => (typeof v === 'number' ? v : 0);
  return {
    promptTokens: num(raw.prompt_tokens),
    completionTokens: num(raw.completion_tokens),
    totalTokens: num(raw.total_tokens),
  };
}

function extractMetadata(raw: Record<string, unknown>): Record<string, string> | undefined {
  const metadata: Record<string, string> = {};
  if (typeof raw.provider === 'string') metadata.provider = raw.provider;
  if (typeof raw.id === 'string') metadata.responseId = raw.id;
  return Object.keys(metadata).length > 0 ? metadata : undefined;
}

function firstChoice(raw: Record<string, unknown>): Record<string, unknown> | undefined {
  const choices = raw.choices;
  if (!Array.isArray(choices) || choices.length === 0) return undefined;
  const first: unknown = choices[0];
  return isRecord(first) ? first : undefined;
}

function extractMessageContent(raw: Record<string, unknown>): string | undefined {
  const message = firstChoice(raw)?.message;
  return isRecord(message) && typeof message.content === 'string' ? message.content : undefined;
}

function extractDeltaContent(raw: Record<string, unknown>): string | undefined {
  const delta = firstChoice(raw)?.delta;
  return isRecord(delta) && typeof delta.content === 'string' ? delta.content : undefined;
}

function toModelInfo(raw: unknown): OpenRouterModelInfo | null {
  if (!isRecord(raw) || typeof raw.id !== 'string' || !raw.id) return null;
  const pricing = isRecord(raw.pricing) ? raw.pricing : {};
  // OpenRouter reports USD per token, often as strings.
  const perMillion = (v: unknown) => (Number(v) || 0) * 1_000_000;
  return {
    id: raw.id,
    name: typeof raw.name === 'string' && raw.name ? raw.name : raw.id,
    description: typeof raw.description === 'string' ? raw.description : undefined,
    context_length: Number(raw.context_length) || 4096,
    pricing: {
      prompt: perMillion(pricing.prompt),
      completion: perMillion(pricing.completion),
    },
  };
}

/** OpenRouter chat-completions client. Normalizes every provider reply into a GatewayResult. */
export class OpenRouterGateway implements LlmGateway {
  private cachedModels: OpenRouterModelInfo[] | null = null;
  private cacheTimestamp = 0;

  constructor(
    private readonly apiKey: string,
    private readonly apiUrl: string = OPENROUTER_API_URL,
  ) {}

  async query(model: string, messages: ChatMessage[], options: QueryOptions): Promise<GatewayResult> {
    const { timeoutMs, signal, onChunk } = options;
    log.debug(`query: starting request to ${model} (timeout: ${timeoutMs}ms, stream: ${!!onChunk})`);

    if (!this.apiKey) {
      log.error('query: OPENROUTER_API_KEY is missing!');
      return failure('unauthorized', 'OpenRouter API key is not configured');
    }
    if (signal?.aborted) {
      return failure('cancelled', `Request to ${model} cancelled before it started`);
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const body = onChunk
        ? { model, messages, stream: true, stream_options: { include_usage: true } }
        : { model, messages };
      const response = await fetch(this.apiUrl, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(body),
        signal: controller.signal,
      });

      if (!response.ok) {
        const errorText = await response.text().catch(() => 'could not read response body');
        log.error(`query: HTTP ${response.status} ${response.statusText} for ${model}`, errorText);
        return failure('http', `HTTP ${response.status}: ${errorText.slice(0, 200)}`);
      }

      const result = onChunk
        ? await this.readStream(model, response, onChunk)
        : await this.readJson(model, response);
      if (result.ok) {
        log.info(`query: success for ${model}, content length: ${result.content.length} chars`);
      }
      return result;
    } catch (err) {
      if (timedOut) {
        log.warn(`query: ${model} timed out after ${timeoutMs}ms`);
        return failure('timeout', `No response from ${model} within ${timeoutMs}ms`);
      }
      if (signal?.aborted) {
        log.debug(`query: ${model} cancelled`);
        return failure('cancelled', `Request to ${model} cancelled`);
      }
      const message = err instanceof Error ? err.message : String(err);
      log.error(`query: exception for ${model}:`, message);
      return failure('transport', message);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private async readJson(model: string, response: Response): Promise<GatewayResult> {
    const text = await response.text();
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch {
      log.warn(`query: invalid JSON from ${model}`, text.slice(0, 500));
      return failure('malformed', `Invalid JSON from ${model}`);
    }
    if (!isRecord(data)) {
      return failure('malformed', `Unexpected payload from ${model}`);
    }
    if (isRecord(data.error)) {
      const message = typeof data.error.message === 'string' ? data.error.message : 'unknown provider error';
      log.warn(`query: provider error for ${model}: ${message}`);
      return failure('http', message);
    }

    const content = extractMessageContent(data);
    if (!content) {
      log.warn(`query: no content in response for ${model}`, text.slice(0, 500));
      return failure('malformed', `No message content from ${model}`);
    }
    return { ok: true, content, usage: normalizeUsage(data.usage), providerMetadata: extractMetadata(data) };
  }

  private async readStream(
    model: string,
    response: Response,
    onChunk: (text: string) => void,
  ): Promise<GatewayResult> {
    if (!response.body) {
      log.error(`query: no response body for ${model}`);
      return failure('malformed', `Empty stream from ${model}`);
    }

    const reader = response.body.getReader();
    const decoder = new TextDecoder();
    let accumulated = '';
    let lineBuffer = '';
    let usage: CouncilTokenUsage | undefined;
    let metadata: Record<string, string> | undefined;

    const processLine = (line: string) => {
      const trimmed = line.trim();
      if (!trimmed.startsWith('data: ') || trimmed === 'data: [DONE]') return;
      let json: unknown;
      try {
        json = JSON.parse(trimmed.slice(6));
      } catch {
        log.debug(`query: skipping malformed stream line from ${model}`);
        return;
      }
      if (!isRecord(json)) return;
      usage = normalizeUsage(json.usage) ?? usage;
      metadata ??= extractMetadata(json);
      const delta = extractDeltaContent(json);
      if (delta) {
        accumulated += delta;
        onChunk(delta);
      }
    };

    let streamDone = false;
    while (!streamDone) {
      const { done, value } = await reader.read();
      streamDone = done;
      if (!value) continue;
      lineBuffer += decoder.decode(value, { stream: !done });
      const lines = lineBuffer.split('\n');
      lineBuffer = lines.pop() ?? '';
      for (const line of lines) processLine(line);
    }
    lineBuffer += decoder.decode();
    if (lineBuffer) processLine(lineBuffer);

    if (!accumulated) {
      return failure('malformed', `Stream from ${model} carried no content`);
    }
    return { ok: true, content: accumulated, usage, providerMetadata: metadata };
  }

  private get modelsUrl(): string {
    return this.apiUrl.replace(/\/chat\/completions\/?$/, '/models');
  }

  async fetchModels(): Promise<OpenRouterModelInfo[]> {
    const now = Date.now();
    if (this.cachedModels && now - this.cacheTimestamp < CACHE_TTL_MS) {
      return this.cachedModels;
    }

    const response = await fetch(this.modelsUrl, {
      headers: this.apiKey ? { Authorization: `Bearer ${this.apiKey}` } : {},
    });
    if (!response.ok) {
      throw new GatewayError(`OpenRouter API error: ${response.status}`, response.status);
    }

    const data: unknown = await response.json();
    if (!isRecord(data) || !Array.isArray(data.data)) {
      throw new GatewayError('OpenRouter returned an unexpected model list');
    }

    const models = data.data
      .map(toModelInfo)
      .filter((m): m is OpenRouterModelInfo => m !== null)
      .sort((a, b) => a.name.localeCompare(b.name));

    this.cachedModels = models;
    this.cacheTimestamp = now;
    return models;
  }

  clearModelCache(): void {
    this.cachedModels = null;
    this.cacheTimestamp = 0;
  }
}
