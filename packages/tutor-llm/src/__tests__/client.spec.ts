import { describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { CancelledError, ProviderError, isProviderError } from '@studyhall/tutor-core';
import { LLMClient } from '../client.js';
import type { LLMCompleteOptions, LLMProvider, ProviderEntry, ProviderSettings } from '../types.js';

const fastSettings: ProviderSettings = { retries: 1, backoffBaseMs: 0, timeoutMs: 1000 };

function scriptedProvider(id: string, script: Array<string | ProviderError | Error>): LLMProvider & { calls: number } {
  const provider = {
    id,
    calls: 0,
    async complete() {
      const step = script[Math.min(provider.calls, script.length - 1)];
      provider.calls += 1;
      if (step instanceof Error) {
        throw step;
      }
      return { text: step ?? '', usage: { promptTokens: 10, completionTokens: 5 } };
    },
  };
  return provider;
}

function entry(provider: LLMProvider, settings: Partial<ProviderSettings> = {}): ProviderEntry {
  return { provider, settings: { ...fastSettings, ...settings } };
}

describe('LLMClient', () => {
  it('returns the primary provider answer without fallback', async () => {
    const primary = scriptedProvider('primary', ['hello']);
    const client = new LLMClient([entry(primary)]);

    const result = await client.complete({ prompt: 'hi' });

    expect(result.value).toBe('hello');
    expect(result.providerId).toBe('primary');
    expect(result.fallbackUsed).toBe(false);
    expect(result.attempts).toEqual([
      expect.objectContaining({ providerId: 'primary', attempt: 1, ok: true }),
    ]);
  });

  it('retries the same provider before succeeding', async () => {
    const primary = scriptedProvider('primary', [
      new ProviderError('rate-limited', 'slow down', { providerId: 'primary' }),
      'ok',
    ]);
    const client = new LLMClient([entry(primary)]);

    const result = await client.complete({ prompt: 'hi' });

    expect(primary.calls).toBe(2);
    expect(result.fallbackUsed).toBe(false);
    expect(result.attempts.map(a => a.ok)).toEqual([false, true]);
    expect(result.attempts[0]?.kind).toBe('rate-limited');
  });

  it('backs off exponentially between retries', async () => {
    const failing = new ProviderError('timeout', 'slow', { providerId: 'primary' });
    const primary = scriptedProvider('primary', [failing, failing, failing, 'ok']);
    const sleep = vi.fn(async (_ms: number) => {});
    const client = new LLMClient([entry(primary, { retries: 3, backoffBaseMs: 100 })], { sleep });

    await client.complete({ prompt: 'hi' });

    expect(sleep.mock.calls.map(call => call[0])).toEqual([100, 200, 400]);
  });

  it('advances to the next provider after exhausting retries', async () => {
    const primary = scriptedProvider('primary', [new Error('connection reset')]);
    const secondary = scriptedProvider('secondary', ['from secondary']);
    const client = new LLMClient([entry(primary), entry(secondary)]);

    const result = await client.complete({ prompt: 'hi' });

    expect(primary.calls).toBe(2);
    expect(result.value).toBe('from secondary');
    expect(result.providerId).toBe('secondary');
    expect(result.fallbackUsed).toBe(true);
    expect(client.getStats().fallbacks).toBe(1);
  });

  it('skips retries for non-retryable failures', async () => {
    const primary = scriptedProvider('primary', [
      new ProviderError('unavailable', 'unauthorized', { providerId: 'primary', status: 401, retryable: false }),
    ]);
    const secondary = scriptedProvider('secondary', ['ok']);
    const client = new LLMClient([entry(primary, { retries: 5 }), entry(secondary)]);

    await client.complete({ prompt: 'hi' });

    expect(primary.calls).toBe(1);
  });

  it('raises unavailable listing every provider when all fail', async () => {
    const primary = scriptedProvider('primary', [new ProviderError('timeout', 'slow', { providerId: 'primary' })]);
    const secondary = scriptedProvider('secondary', [new ProviderError('rate-limited', '429', { providerId: 'secondary' })]);
    const client = new LLMClient([entry(primary), entry(secondary)]);

    const error = await client.complete({ prompt: 'hi' }).catch((e: unknown) => e);

    expect(isProviderError(error)).toBe(true);
    if (isProviderError(error)) {
      expect(error.kind).toBe('unavailable');
      expect(error.providersAttempted).toEqual(['primary', 'secondary']);
      expect(error.attempts).toHaveLength(4);
    }
    expect(client.getStats().failures).toBe(1);
  });

  it('turns a slow attempt into a timeout failure', async () => {
    const hanging: LLMProvider = {
      id: 'hanging',
      complete: () => new Promise(() => {}),
    };
    const backup = scriptedProvider('backup', ['ok']);
    const client = new LLMClient([entry(hanging, { retries: 0, timeoutMs: 10 }), entry(backup)]);

    const result = await client.complete({ prompt: 'hi' });

    expect(result.attempts[0]).toMatchObject({ providerId: 'hanging', ok: false, kind: 'timeout' });
    expect(result.providerId).toBe('backup');
  });

  it('stops immediately on cancellation', async () => {
    const hanging: LLMProvider = { id: 'hanging', complete: () => new Promise(() => {}) };
    const backup = scriptedProvider('backup', ['ok']);
    const client = new LLMClient([entry(hanging), entry(backup)]);
    const controller = new AbortController();

    const promise = client.complete({ prompt: 'hi' }, { signal: controller.signal });
    controller.abort();

    await expect(promise).rejects.toBeInstanceOf(CancelledError);
    expect(backup.calls).toBe(0);
  });

  it('puts the task-routed provider first', async () => {
    const primary = scriptedProvider('primary', ['from primary']);
    const grading = scriptedProvider('grading', ['from grading']);
    const client = new LLMClient([entry(primary), entry(grading)], {
      taskRouting: { grader: 'grading' },
    });

    const graded = await client.complete({ prompt: 'x' }, { task: 'grader' });
    const explained = await client.complete({ prompt: 'x' }, { task: 'content' });

    expect(graded.providerId).toBe('grading');
    expect(graded.fallbackUsed).toBe(false);
    expect(explained.providerId).toBe('primary');
  });

  it('tracks usage per provider', async () => {
    const primary = scriptedProvider('primary', ['a']);
    const client = new LLMClient([entry(primary)]);

    await client.complete({ prompt: 'one' });
    await client.complete({ prompt: 'two' });

    const stats = client.getStats();
    expect(stats.calls).toBe(2);
    expect(stats.tokensIn).toBe(20);
    expect(stats.tokensOut).toBe(10);
    expect(stats.byProvider.primary).toMatchObject({ calls: 2, failures: 0, tokensIn: 20, tokensOut: 10 });

    client.resetStats();
    expect(client.getStats().calls).toBe(0);
  });

  describe('completeStructured', () => {
    const schema = z.object({ score: z.number(), feedback: z.string() });

    it('parses fenced JSON and validates it', async () => {
      const primary = scriptedProvider('primary', ['```json\n{"score": 9, "feedback": "good"}\n```']);
      const client = new LLMClient([entry(primary)]);

      const result = await client.completeStructured({ prompt: 'grade' }, schema);

      expect(result.value).toEqual({ score: 9, feedback: 'good' });
    });

    it('retries invalid output as invalid-response and falls back', async () => {
      const primary = scriptedProvider('primary', ['not json at all', '{"score": "nine"}']);
      const secondary = scriptedProvider('secondary', ['{"score": 7, "feedback": "ok"}']);
      const client = new LLMClient([entry(primary), entry(secondary)]);

      const result = await client.completeStructured({ prompt: 'grade' }, schema);

      expect(result.attempts.slice(0, 2).map(a => a.kind)).toEqual(['invalid-response', 'invalid-response']);
      expect(result.providerId).toBe('secondary');
      expect(result.value.score).toBe(7);
    });

    it('asks for JSON output with the JSON instructions appended', async () => {
      const complete = vi.fn(async (_request: LLMCompleteOptions, _signal: AbortSignal) => ({
        text: '{"score": 1, "feedback": "f"}',
      }));
      const client = new LLMClient([entry({ id: 'p', complete })]);

      await client.completeStructured({ prompt: 'grade', systemPrompt: 'You grade.' }, schema);

      const request = complete.mock.calls[0]?.[0];
      expect(request).toMatchObject({ json: true, temperature: 0.1 });
      expect(request?.systemPrompt).toContain('You grade.');
      expect(request?.systemPrompt).toContain('Respond with valid JSON only');
    });
  });
});
