/**
 * Text completion: the single LLM capability the persona user and the judge
 * depend on. Backed by the Anthropic Messages API.
 */

import Anthropic from "@anthropic-ai/sdk";
import { isRetryable, withRetry } from "@convosim/shared";

export interface CompletionRequest {
  system?: string;
  prompt: string;
  maxTokens: number;
  temperature?: number;
}

export interface TextCompletion {
  complete(request: CompletionRequest): Promise<string>;
}

export interface AnthropicCompletionOptions {
  apiKey: string;
  model: string;
  maxRetries?: number;
}

/** 408, 429, 5xx and connection failures are worth another attempt. */
export function isRetryableApiError(error: unknown): boolean {
  if (error instanceof Anthropic.APIConnectionError) return true;
  if (error instanceof Anthropic.APIError) {
    const status = error.status;
    return status === 408 || status === 429 || (status !== undefined && status >= 500);
  }
  return isRetryable(error);
}

export class AnthropicCompletion implements TextCompletion {
  private client: Anthropic;
  private model: string;
  private maxRetries: number;

  constructor(options: AnthropicCompletionOptions) {
    // SDK retries off; withRetry handles them
    this.client = new Anthropic({ apiKey: options.apiKey, maxRetries: 0 });
    this.model = options.model;
    this.maxRetries = options.maxRetries ?? 2;
  }

  async complete(request: CompletionRequest): Promise<string> {
    const response = await withRetry(
      () =>
        this.client.messages.create({
          model: this.model,
          max_tokens: request.maxTokens,
          temperature: request.temperature,
          system: request.system,
          messages: [{ role: "user", content: request.prompt }],
        }),
      { maxRetries: this.maxRetries, label: "anthropic", shouldRetry: isRetryableApiError },
    );

    return response.content
      .map((block) => (block.type === "text" ? block.text : ""))
      .join("");
  }
}
