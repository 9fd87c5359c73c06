import { describe, it, expect, vi } from 'vitest';
import { queryModelsParallel } from './fan-out.js';
import { FakeLlmGateway } from '../../testing/fake-llm-gateway.js';
import type { GatewayResult, LlmGateway } from '../../ports/llm-gateway.js';

const messages = [{ role: 'user' as const, content: 'hi' }];

function delayed(ms: number, content: string): () => Promise<GatewayResult> {
  return () => new Promise((resolve) => setTimeout(() => resolve({ ok: true, content }), ms));
}

describe('queryModelsParallel', () => {
  it('returns entries in model order, not completion order', async () => {
    const gateway = new FakeLlmGateway({
      slow: delayed(30, 'slow answer'),
      fast: delayed(1, 'fast answer'),
    });
    const completed: string[] = [];
    const entries = await queryModelsParallel(gateway, ['slow', 'fast'], messages, {
      timeoutMs: 1000,
      onModelComplete: (model) => completed.push(model),
    });
    expect(completed).toEqual(['fast', 'slow']);
    expect(entries.map((e) => e.model)).toEqual(['slow', 'fast']);
    expect(entries[0].result).toEqual({ ok: true, content: 'slow answer' });
  });

  it('starts every call before any finishes', async () => {
    const gateway = new FakeLlmGateway({ a: delayed(5, 'a'), b: delayed(5, 'b') });
    const started: string[] = [];
    const promise = queryModelsParallel(gateway, ['a', 'b'], messages, {
      timeoutMs: 1000,
      onModelStart: (model) => started.push(model),
    });
    expect(started).toEqual(['a', 'b']);
    await promise;
  });

  it('passes the timeout to every call', async () => {
    const gateway = new FakeLlmGateway({ a: 'x', b: 'y' });
    await queryModelsParallel(gateway, ['a', 'b'], messages, { timeoutMs: 4321 });
    expect(gateway.calls.map((c) => c.options.timeoutMs)).toEqual([4321, 4321]);
  });

  it('keeps failures as entries', async () => {
    const gateway = new FakeLlmGateway({ a: 'ok', b: { fail: 'timeout' } });
    const entries = await queryModelsParallel(gateway, ['a', 'b'], messages, { timeoutMs: 10 });
    expect(entries[1]).toEqual({ model: 'b', result: { ok: false, kind: 'timeout', message: 'scripted timeout failure' } });
  });

  it('turns a rejected query into a transport failure', async () => {
    const gateway: LlmGateway = {
      query: vi.fn().mockRejectedValue(new Error('socket hang up')),
      fetchModels: vi.fn().mockResolvedValue([]),
    };
    const entries = await queryModelsParallel(gateway, ['a'], messages, { timeoutMs: 10 });
    expect(entries).toEqual([{ model: 'a', result: { ok: false, kind: 'transport', message: 'socket hang up' } }]);
  });

  it('aborts every in-flight call when the parent signal aborts', async () => {
    const gateway = new FakeLlmGateway({ a: { hang: true }, b: { hang: true } });
    const parent = new AbortController();
    const promise = queryModelsParallel(gateway, ['a', 'b'], messages, { timeoutMs: 1000, signal: parent.signal });
    parent.abort();
    const entries = await promise;
    expect(entries.map((e) => e.result.ok ? 'ok' : e.result.kind)).toEqual(['cancelled', 'cancelled']);
  });

  it('forwards chunks tagged with their model', async () => {
    const gateway = new FakeLlmGateway({ a: 'alpha', b: 'beta' });
    const chunks: string[] = [];
    await queryModelsParallel(gateway, ['a', 'b'], messages, {
      timeoutMs: 10,
      onModelChunk: (model, chunk) => chunks.push(`${model}:${chunk}`),
    });
    expect(chunks).toEqual(['a:alpha', 'b:beta']);
  });

  it('keeps a successful answer when a progress listener throws', async () => {
    const gateway = new FakeLlmGateway({ a: 'answer', b: 'other' });
    const entries = await queryModelsParallel(gateway, ['a', 'b'], messages, {
      timeoutMs: 10,
      onModelStart: (model) => {
        if (model === 'b') throw new Error('listener boom');
      },
      onModelChunk: () => {
        throw new Error('listener boom');
      },
      onModelComplete: () => {
        throw new Error('listener boom');
      },
    });
    expect(entries).toEqual([
      { model: 'a', result: { ok: true, content: 'answer' } },
      { model: 'b', result: { ok: true, content: 'other' } },
    ]);
  });
});
