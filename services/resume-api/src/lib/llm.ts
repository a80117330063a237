/**
 * Generation Service Clients
 *
 * Sends the resume prompt to a text-generation service and returns its raw,
 * loosely-typed answer. One attempt per call, bounded by the configured
 * timeout. Every failure surfaces as GenerationFailure.
 *
 * - Ollama: POST /api/generate, answer in the envelope's `response` field
 * - OpenAI-compatible: chat completions, answer in the first choice's content
 */

import OpenAI from 'openai';
import {
  logger,
  classifyRawResponse,
  isGenerationEnvelope,
  describeEnvelopeErrors,
  llmRequestsCounter,
  llmRequestDurationHistogram,
  ConfigError,
  GenerationFailure,
  type Config,
  type GenerationProvider,
  type RawModelResponse,
} from '@resume-parser/shared';

export interface GenerationClient {
  readonly provider: GenerationProvider;
  readonly model: string;
  generate(prompt: string): Promise<RawModelResponse>;
}

export interface GenerationSettings {
  model: string;
  timeoutMs: number;
  maxTokens: number;
}

export interface OllamaSettings extends GenerationSettings {
  url: string;
}

export interface OpenAiSettings extends GenerationSettings {
  apiKey: string;
  baseUrl?: string;
}

/**
 * The slice of the OpenAI SDK's chat completions API this client calls.
 */
export interface ChatCompletionsApi {
  create(body: {
    model: string;
    messages: Array<{ role: 'user'; content: string }>;
    max_tokens: number;
    response_format: { type: 'json_object' };
  }): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// fetch rejects with a DOMException named TimeoutError when AbortSignal.timeout fires
function isTimeoutError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'name' in error && error.name === 'TimeoutError';
}

/**
 * Record request count and duration around a generation call
 */
async function instrumented<T>(
  provider: GenerationProvider,
  model: string,
  call: () => Promise<T>
): Promise<T> {
  const startTime = Date.now();

  try {
    const result = await call();
    const duration = (Date.now() - startTime) / 1000;
    llmRequestDurationHistogram.observe({ provider, model }, duration);
    llmRequestsCounter.inc({ provider, model, status: 'success' });

    logger.info('Generation request complete', {
      provider,
      model,
      duration_seconds: duration,
    });

    return result;
  } catch (error) {
    const duration = (Date.now() - startTime) / 1000;
    llmRequestDurationHistogram.observe({ provider, model }, duration);
    llmRequestsCounter.inc({ provider, model, status: 'error' });

    logger.warn('Generation request failed', {
      provider,
      model,
      duration_seconds: duration,
      error: errorMessage(error),
    });

    throw error;
  }
}

export class OllamaGenerationClient implements GenerationClient {
  readonly provider = 'ollama';

  constructor(private readonly settings: OllamaSettings) {}

  get model(): string {
    return this.settings.model;
  }

  generate(prompt: string): Promise<RawModelResponse> {
    return instrumented(this.provider, this.model, () => this.request(prompt));
  }

  private async request(prompt: string): Promise<RawModelResponse> {
    const { url, model, timeoutMs, maxTokens } = this.settings;

    logger.info('Sending prompt to generation service', {
      provider: this.provider,
      model,
      prompt_length: prompt.length,
    });

    let body: unknown;
    try {
      // The timeout also bounds reading the body
      const response = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ model, prompt, max_tokens: maxTokens, stream: false }),
        signal: AbortSignal.timeout(timeoutMs),
      });

      if (!response.ok) {
        throw new GenerationFailure(
          `Generation service returned ${response.status} ${response.statusText}`,
          { status: response.status }
        );
      }

      body = await response.json();
    } catch (error) {
      if (error instanceof GenerationFailure) throw error;
      if (isTimeoutError(error)) {
        throw new GenerationFailure(`Generation request timed out after ${timeoutMs}ms`, {
          cause: error,
        });
      }
      throw new GenerationFailure(`Generation request failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (!isGenerationEnvelope(body)) {
      throw new GenerationFailure(
        `Malformed generation reply envelope: ${describeEnvelopeErrors().join('; ')}`
      );
    }

    const raw = classifyRawResponse(body.response);
    logger.debug('Raw generation response', { kind: raw.kind });
    return raw;
  }
}

export class OpenAiGenerationClient implements GenerationClient {
  readonly provider = 'openai';
  private readonly completions: ChatCompletionsApi;

  constructor(
    private readonly settings: OpenAiSettings,
    completions?: ChatCompletionsApi
  ) {
    this.completions =
      completions ??
      new OpenAI({
        apiKey: settings.apiKey,
        baseURL: settings.baseUrl,
        timeout: settings.timeoutMs,
        maxRetries: 0,
      }).chat.completions;
  }

  get model(): string {
    return this.settings.model;
  }

  generate(prompt: string): Promise<RawModelResponse> {
    return instrumented(this.provider, this.model, () => this.request(prompt));
  }

  private async request(prompt: string): Promise<RawModelResponse> {
    const { model, maxTokens } = this.settings;

    logger.info('Sending prompt to generation service', {
      provider: this.provider,
      model,
      prompt_length: prompt.length,
    });

    let completion: Awaited<ReturnType<ChatCompletionsApi['create']>>;
    try {
      completion = await this.completions.create({
        model,
        messages: [{ role: 'user', content: prompt }],
        max_tokens: maxTokens,
        response_format: { type: 'json_object' },
      });
    } catch (error) {
      throw new GenerationFailure(`OpenAI request failed: ${errorMessage(error)}`, {
        cause: error,
        status: error instanceof OpenAI.APIError ? error.status : undefined,
      });
    }

    const raw = classifyRawResponse(completion.choices[0]?.message.content);
    logger.debug('Raw generation response', { kind: raw.kind });
    return raw;
  }
}

/**
 * Build the generation client selected by GENERATION_PROVIDER
 */
export function createGenerationClient(config: Config): GenerationClient {
  const settings: GenerationSettings = {
    model: config.generationModel,
    timeoutMs: config.generationTimeoutMs,
    maxTokens: config.generationMaxTokens,
  };

  switch (config.generationProvider) {
    case 'ollama':
      return new OllamaGenerationClient({ ...settings, url: config.generationUrl });

    case 'openai':
      if (!config.openaiApiKey) {
        throw new ConfigError('OPENAI_API_KEY is required when GENERATION_PROVIDER=openai');
      }
      return new OpenAiGenerationClient({
        ...settings,
        apiKey: config.openaiApiKey,
        baseUrl: config.openaiBaseUrl,
      });
  }
}
