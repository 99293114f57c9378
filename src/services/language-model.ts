import Anthropic from '@anthropic-ai/sdk';
import { CompletionRequest, LanguageModelService, TaskType } from '../types';

export class LanguageModelError extends Error {
  readonly task: TaskType;

  constructor(message: string, task: TaskType, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LanguageModelError';
    this.task = task;
  }
}

export interface AnthropicModelOptions {
  apiKey: string;
  /** Used for final leak writing. */
  model: string;
  /** Used for analysis and planning. */
  analysisModel: string;
  timeoutMs: number;
  /** SDK-level retries. Defaults to 0. */
  maxRetries?: number;
}

/**
 * LanguageModelService over the Anthropic Messages API.
 * Analysis and planning go to the lighter model; final writing to the main one.
 */
export class AnthropicLanguageModel implements LanguageModelService {
  private client: Anthropic;
  private options: AnthropicModelOptions;

  constructor(options: AnthropicModelOptions, client?: Anthropic) {
    this.options = options;
    this.client =
      client ??
      new Anthropic({
        apiKey: options.apiKey,
        timeout: options.timeoutMs,
        maxRetries: options.maxRetries ?? 0,
      });
  }

  modelFor(task: TaskType): string {
    return task === 'final' ? this.options.model : this.options.analysisModel;
  }

  async complete(request: CompletionRequest): Promise<string> {
    const model = this.modelFor(request.task);
    const started = Date.now();

    try {
      const response = await this.client.messages.create(
        {
          model,
          max_tokens: request.maxTokens,
          temperature: request.temperature,
          messages: [{ role: 'user', content: request.prompt }],
        },
        { signal: request.signal, timeout: this.options.timeoutMs }
      );

      const text = response.content
        .map(block => (block.type === 'text' ? block.text : ''))
        .join('')
        .trim();

      console.log(`[llm] ${request.task} via ${model}: ${text.length} chars in ${Date.now() - started}ms`);
      return text;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new LanguageModelError(`${request.task} completion failed: ${reason}`, request.task, { cause: error });
    }
  }
}

/** Stands in when no API key is configured; every stage then uses its fallback. */
export class DisabledLanguageModel implements LanguageModelService {
  async complete(request: CompletionRequest): Promise<string> {
    throw new LanguageModelError('language model is not configured', request.task);
  }
}
