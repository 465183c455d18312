/**
 * Completion service contract and an OpenAI-compatible implementation
 *
 * OpenRouter, Ollama and LM Studio all expose the OpenAI chat completions
 * API, so one client covers every provider; only the base URL and key change.
 */

import OpenAI from 'openai';

/**
 * Synchronous prompt-in, text-out completion. No streaming and no structured
 * output guarantee: callers that need JSON must validate it themselves.
 */
export interface CompletionService {
  complete(prompt: string, signal?: AbortSignal): Promise<string>;
}

/**
 * The slice of the OpenAI SDK this service calls
 */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(
        body: {
          model: string;
          messages: Array<{ role: 'user'; content: string }>;
          temperature: number;
          max_tokens: number;
        },
        options?: { signal?: AbortSignal }
      ): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

export interface CompletionServiceConfig {
  baseURL: string;
  apiKey: string;
  model: string;
  temperature: number;
  maxTokens: number;
  /** Per-call timeout in milliseconds */
  timeoutMs: number;
  /** Retries the SDK performs on connection errors, 408, 429 and 5xx */
  maxRetries: number;
}

export class OpenAICompletionService implements CompletionService {
  private client: ChatCompletionsClient;
  private config: CompletionServiceConfig;

  constructor(config: CompletionServiceConfig, client?: ChatCompletionsClient) {
    this.config = config;
    this.client = client ?? new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      timeout: config.timeoutMs,
      maxRetries: config.maxRetries
    });
  }

  async complete(prompt: string, signal?: AbortSignal): Promise<string> {
    const completion = await this.client.chat.completions.create(
      {
        model: this.config.model,
        messages: [{ role: 'user', content: prompt }],
        temperature: this.config.temperature,
        max_tokens: this.config.maxTokens
      },
      { signal }
    );

    return completion.choices[0]?.message?.content ?? '';
  }
}
