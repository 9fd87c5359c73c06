import type { OpenRouterModelInfo } from '../domain/council/model-info.js';
import type {
  ChatMessage,
  GatewayFailureKind,
  GatewayResult,
  LlmGateway,
  QueryOptions,
} from '../ports/llm-gateway.js';

export type FakeReply =
  | string
  | { fail: GatewayFailureKind }
  /** Never answers; resolves as cancelled once the call's signal aborts. */
  | { hang: true }
  | ((messages: ChatMessage[], options: QueryOptions) => GatewayResult | Promise<GatewayResult>);

export interface RecordedCall {
  model: string;
  messages: ChatMessage[];
  options: QueryOptions;
}

/** In-process gateway for tests: replies are scripted per model, calls are recorded. */
export class FakeLlmGateway implements LlmGateway {
  readonly calls: RecordedCall[] = [];

  constructor(private readonly replies: Record<string, FakeReply | FakeReply[]>) {}

  callsFor(model: string): RecordedCall[] {
    return this.calls.filter((c) => c.model === model);
  }

  private nextReply(model: string): FakeReply | undefined {
    const scripted = this.replies[model];
    if (!Array.isArray(scripted)) return scripted;
    const index = this.callsFor(model).length - 1;
    return scripted[Math.min(index, scripted.length - 1)];
  }

  async query(model: string, messages: ChatMessage[], options: QueryOptions): Promise<GatewayResult> {
    this.calls.push({ model, messages, options });
    const reply = this.nextReply(model);

    if (reply === undefined) {
      return { ok: false, kind: 'http', message: `HTTP 404: unknown model ${model}` };
    }
    if (typeof reply === 'string') {
      options.onChunk?.(reply);
      return { ok: true, content: reply };
    }
    if (typeof reply === 'function') {
      return reply(messages, options);
    }
    if ('fail' in reply) {
      return { ok: false, kind: reply.fail, message: `scripted ${reply.fail} failure` };
    }
    return new Promise<GatewayResult>((resolve) => {
      const cancelled = (): void => resolve({ ok: false, kind: 'cancelled', message: 'aborted' });
      if (options.signal?.aborted) {
        cancelled();
        return;
      }
      options.signal?.addEventListener('abort', cancelled, { once: true });
    });
  }

  async fetchModels(): Promise<OpenRouterModelInfo[]> {
    return [];
  }
}
