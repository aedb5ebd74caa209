// ============================================================================
// FILE: src/llm-client.ts
// PURPOSE: Text-generation backend: chat messages in, text out
// ============================================================================

import { z } from 'zod';
import { BackendError, ConfigurationError } from './errors.js';
import type { ChatMessage, FactoryConfig, LLMProvider, Scene } from './types.js';

export interface CompletionOptions {
  maxTokens?: number;
  temperature?: number;
  dryRun?: boolean;
  /** Picks the canned payload in dry-run mode */
  scene?: Scene;
}

/**
 * TextGenerationBackend - Anything that can complete a chat
 *
 * Pipelines take one of these as a parameter so they can run against a
 * fake in tests.
 */
export interface TextGenerationBackend {
  complete(messages: ChatMessage[], options?: CompletionOptions): Promise<string>;
}

export interface LLMClientConfig {
  provider: LLMProvider;
  model: string;
  apiKey?: string;
  baseUrl?: string;
  maxTokens: number;
  temperature: number;
  dryRun: boolean;
}

const DEFAULT_BASE_URLS: Record<LLMProvider, string> = {
  openai: 'https://api.openai.com/v1',
  anthropic: 'https://api.anthropic.com/v1',
};

// ----------------------------------------------------------------------------
// SECTION 1: DRY-RUN PAYLOADS
// ----------------------------------------------------------------------------

const DRY_RUN_TRACE =
  'This is a dummy thinking trace used to exercise the pipeline without calling a model.';

export const DRY_RUN_RESPONSES: Record<Scene, string> = {
  code: JSON.stringify(
    {
      samples: [
        { question: 'Dummy question?', thinking_trace: DRY_RUN_TRACE, answer: 'Dummy answer.' },
      ],
    },
    null,
    2
  ),
  design: JSON.stringify(
    {
      plans: [
        {
          feature_title: 'Dummy feature',
          thinking_trace: DRY_RUN_TRACE,
          design_spec: 'Dummy design specification.',
        },
      ],
    },
    null,
    2
  ),
};

// ----------------------------------------------------------------------------
// SECTION 2: RESPONSE SHAPES
// ----------------------------------------------------------------------------

const openAIResponse = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
    .min(1),
});

const anthropicResponse = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
});

// ----------------------------------------------------------------------------
// SECTION 3: CLIENT
// ----------------------------------------------------------------------------

/**
 * LLMClient - Chat completions over the OpenAI or Anthropic HTTP APIs
 *
 * Constructed explicitly and passed to the pipelines; there is no
 * process-wide instance. In dry-run mode no request is made and a fixed
 * valid payload for the requested scene is returned.
 */
export class LLMClient implements TextGenerationBackend {
  constructor(
    private readonly config: LLMClientConfig,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  static fromConfig(config: FactoryConfig, dryRun?: boolean): LLMClient {
    const effectiveDryRun = dryRun ?? config.dryRun;
    if (!effectiveDryRun && !config.apiKey && !config.baseUrl) {
      const key = config.provider === 'anthropic' ? 'ANTHROPIC_API_KEY' : 'OPENAI_API_KEY';
      throw new ConfigurationError(`${key} is required unless DRY_RUN=1 or --dry-run is set`);
    }
    return new LLMClient({
      provider: config.provider,
      model: config.model,
      apiKey: config.apiKey,
      baseUrl: config.baseUrl,
      maxTokens: config.maxNewTokens,
      temperature: config.temperature,
      dryRun: effectiveDryRun,
    });
  }

  async complete(messages: ChatMessage[], options: CompletionOptions = {}): Promise<string> {
    if (options.dryRun ?? this.config.dryRun) {
      return DRY_RUN_RESPONSES[options.scene ?? 'code'];
    }

    const maxTokens = options.maxTokens ?? this.config.maxTokens;
    const temperature = options.temperature ?? this.config.temperature;

    return this.config.provider === 'anthropic'
      ? this.callAnthropic(messages, maxTokens, temperature)
      : this.callOpenAI(messages, maxTokens, temperature);
  }

  private baseUrl(): string {
    return (this.config.baseUrl ?? DEFAULT_BASE_URLS[this.config.provider]).replace(/\/$/, '');
  }

  private async callOpenAI(
    messages: ChatMessage[],
    maxTokens: number,
    temperature: number
  ): Promise<string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.config.apiKey) headers.Authorization = `Bearer ${this.config.apiKey}`;

    const response = await this.fetchImpl(`${this.baseUrl()}/chat/completions`, {
      method: 'POST',
      headers,
      body: JSON.stringify({
        model: this.config.model,
        messages,
        max_tokens: maxTokens,
        temperature,
      }),
    });

    if (!response.ok) {
      throw new BackendError(`OpenAI error: ${response.status}`, response.status);
    }

    const parsed = openAIResponse.safeParse(await response.json());
    if (!parsed.success) {
      throw new BackendError('OpenAI error: unexpected response shape');
    }
    return parsed.data.choices[0].message.content ?? '';
  }

  private async callAnthropic(
    messages: ChatMessage[],
    maxTokens: number,
    temperature: number
  ): Promise<string> {
    const system = messages
      .filter(m => m.role === 'system')
      .map(m => m.content.trim())
      .join('\n\n');
    const conversation = messages.filter(m => m.role !== 'system');

    const response = await this.fetchImpl(`${this.baseUrl()}/messages`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'x-api-key': this.config.apiKey ?? '',
        'anthropic-version': '2023-06-01',
      },
      body: JSON.stringify({
        model: this.config.model,
        max_tokens: maxTokens,
        temperature,
        ...(system ? { system } : {}),
        messages: conversation,
      }),
    });

    if (!response.ok) {
      throw new BackendError(`Anthropic error: ${response.status}`, response.status);
    }

    const parsed = anthropicResponse.safeParse(await response.json());
    if (!parsed.success) {
      throw new BackendError('Anthropic error: unexpected response shape');
    }
    return parsed.data.content
      .filter(block => block.type === 'text')
      .map(block => block.text ?? '')
      .join('');
  }
}
