import { LanguageModelService, Result, TaskType } from '../types';

export interface StageCompletion {
  prompt: string;
  temperature: number;
  maxTokens: number;
  signal?: AbortSignal;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Shared plumbing for the analyze, plan and write stages.
 * Model calls never throw out of a stage; they come back as a Result.
 */
export abstract class LeakStage {
  protected model: LanguageModelService;
  protected abstract readonly task: TaskType;
  protected abstract readonly tag: string;

  constructor(model: LanguageModelService) {
    this.model = model;
  }

  protected async safeCompletion(request: StageCompletion): Promise<Result<string>> {
    try {
      const text = await this.model.complete({ ...request, task: this.task });
      return { ok: true, value: text.trim() };
    } catch (error) {
      const failure = toError(error);
      console.error(`[${this.tag}] AI completion failed:`, failure.message);
      return { ok: false, error: failure };
    }
  }
}
