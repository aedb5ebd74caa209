import { describe, it, expect } from 'vitest';
import { loadConfig } from './config.js';
import { BackendError, ConfigurationError } from './errors.js';
import { parseDesignResponse, parseQAResponse } from './extractor.js';
import { DRY_RUN_RESPONSES, LLMClient, type LLMClientConfig } from './llm-client.js';
import type { ChatMessage } from './types.js';

interface RecordedCall {
  url: string;
  init?: RequestInit;
}

function fakeFetch(body: unknown, status = 200): { calls: RecordedCall[]; impl: typeof fetch } {
  const calls: RecordedCall[] = [];
  const impl: typeof fetch = async (input, init) => {
    calls.push({ url: String(input), init });
    return new Response(JSON.stringify(body), { status });
  };
  return { calls, impl };
}

function sentBody(call: RecordedCall): unknown {
  return JSON.parse(String(call.init?.body));
}

const messages: ChatMessage[] = [
  { role: 'system', content: ' Be terse. ' },
  { role: 'user', content: 'Hello' },
];

const openai: LLMClientConfig = {
  provider: 'openai',
  model: 'test-model',
  apiKey: 'test-secret',
  maxTokens: 16,
  temperature: 0,
  dryRun: false,
};

describe('LLMClient (OpenAI)', () => {
  it('posts a chat completion and returns the first choice', async () => {
    const { calls, impl } = fakeFetch({ choices: [{ message: { content: 'hi there' } }] });
    const client = new LLMClient(openai, impl);

    expect(await client.complete(messages)).toBe('hi there');
    expect(calls).toHaveLength(1);
    expect(calls[0].url).toBe('https://api.openai.com/v1/chat/completions');
    expect(new Headers(calls[0].init?.headers).get('authorization')).toBe('Bearer test-secret');
    expect(sentBody(calls[0])).toEqual({
      model: 'test-model',
      messages,
      max_tokens: 16,
      temperature: 0,
    });
  });

  it('lets per-call options override the defaults', async () => {
    const { calls, impl } = fakeFetch({ choices: [{ message: { content: 'ok' } }] });
    await new LLMClient(openai, impl).complete(messages, { maxTokens: 99, temperature: 0.7 });

    expect(sentBody(calls[0])).toMatchObject({ max_tokens: 99, temperature: 0.7 });
  });

  it('uses a custom base URL without a key', async () => {
    const { calls, impl } = fakeFetch({ choices: [{ message: { content: null } }] });
    const client = new LLMClient(
      { ...openai, apiKey: undefined, baseUrl: 'http://localhost:8000/v1/' },
      impl
    );

    expect(await client.complete(messages)).toBe('');
    expect(calls[0].url).toBe('http://localhost:8000/v1/chat/completions');
    expect(new Headers(calls[0].init?.headers).get('authorization')).toBeNull();
  });

  it('raises BackendError on a non-2xx status', async () => {
    const { impl } = fakeFetch({ error: 'busy' }, 503);
    const client = new LLMClient(openai, impl);

    const error = await client.complete(messages).catch((err: unknown) => err);
    if (!(error instanceof BackendError)) throw new Error('expected a BackendError');
    expect(error.message).toBe('OpenAI error: 503');
    expect(error.status).toBe(503);
  });

  it('raises BackendError on an unexpected body', async () => {
    const { impl } = fakeFetch({ choices: [] });
    await expect(new LLMClient(openai, impl).complete(messages)).rejects.toThrow(
      'OpenAI error: unexpected response shape'
    );
  });
});

describe('LLMClient (Anthropic)', () => {
  const anthropic: LLMClientConfig = { ...openai, provider: 'anthropic' };

  it('moves system messages to the system field and joins text blocks', async () => {
    const { calls, impl } = fakeFetch({
      content: [
        { type: 'text', text: 'part one, ' },
        { type: 'tool_use' },
        { type: 'text', text: 'part two' },
      ],
    });

    expect(await new LLMClient(anthropic, impl).complete(messages)).toBe('part one, part two');

    const headers = new Headers(calls[0].init?.headers);
    expect(calls[0].url).toBe('https://api.anthropic.com/v1/messages');
    expect(headers.get('x-api-key')).toBe('test-secret');
    expect(headers.get('anthropic-version')).toBe('2023-06-01');
    expect(sentBody(calls[0])).toEqual({
      model: 'test-model',
      max_tokens: 16,
      temperature: 0,
      system: 'Be terse.',
      messages: [{ role: 'user', content: 'Hello' }],
    });
  });

  it('raises BackendError on a non-2xx status', async () => {
    const { impl } = fakeFetch({}, 401);
    await expect(new LLMClient(anthropic, impl).complete(messages)).rejects.toThrow(
      'Anthropic error: 401'
    );
  });
});

describe('dry-run', () => {
  const { calls, impl } = fakeFetch({});
  const client = new LLMClient({ ...openai, dryRun: true }, impl);

  it('returns a parseable Q&A payload for the code scene', async () => {
    const text = await client.complete(messages, { scene: 'code' });

    expect(text).toBe(DRY_RUN_RESPONSES.code);
    expect(parseQAResponse(text).map(r => r.question)).toEqual(['Dummy question?']);
  });

  it('returns a parseable plan for the design scene', async () => {
    const text = await client.complete(messages, { scene: 'design' });
    expect(parseDesignResponse(text).map(r => r.feature_title)).toEqual(['Dummy feature']);
  });

  it('never calls fetch', () => {
    expect(calls).toHaveLength(0);
  });

  it('can be switched off per call', async () => {
    const live = fakeFetch({ choices: [{ message: { content: 'live' } }] });
    const dry = new LLMClient({ ...openai, dryRun: true }, live.impl);

    expect(await dry.complete(messages, { dryRun: false })).toBe('live');
  });
});

describe('LLMClient.fromConfig', () => {
  it('requires a key outside dry-run', () => {
    const config = loadConfig({ DRY_RUN: '0' });
    expect(() => LLMClient.fromConfig(config)).toThrow(ConfigurationError);
    expect(() => LLMClient.fromConfig(config)).toThrow('OPENAI_API_KEY is required');
  });

  it('accepts a missing key when dry-run is forced', () => {
    const config = loadConfig({ DRY_RUN: '0' });
    expect(() => LLMClient.fromConfig(config, true)).not.toThrow();
  });

  it('accepts a base URL in place of a key', () => {
    const config = loadConfig({ DRY_RUN: '0', LLM_BASE_URL: 'http://localhost:8000/v1' });
    expect(LLMClient.fromConfig(config)).toBeInstanceOf(LLMClient);
  });
});
