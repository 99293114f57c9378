import { ChatMessage, CompletionRequest, LanguageModelService } from '../types';

export const BASE_TIME = new Date('2026-03-01T12:00:00.000Z');

export function minutesAfter(base: Date, minutes: number): Date {
  return new Date(base.getTime() + minutes * 60_000);
}

export function hoursAfter(base: Date, hours: number): Date {
  return minutesAfter(base, hours * 60);
}

export function message(authorId: string, content: string, overrides: Partial<ChatMessage> = {}): ChatMessage {
  return {
    authorId,
    authorName: authorId.toUpperCase(),
    authorIsBot: false,
    content,
    createdAt: BASE_TIME,
    channelId: 'general',
    mentions: [],
    ...overrides,
  };
}

/** Small deterministic PRNG (mulberry32). */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Returns the given values in order, repeating the last one once exhausted. */
export function sequenceRandom(values: number[]): () => number {
  let index = 0;
  return () => {
    const value = values[Math.min(index, values.length - 1)];
    index++;
    return value;
  };
}

export type Responder = (request: CompletionRequest) => string | Promise<string>;

/** In-process LanguageModelService that records every request. */
export class FakeModel implements LanguageModelService {
  readonly requests: CompletionRequest[] = [];
  private responder: Responder;

  constructor(responder: Responder) {
    this.responder = responder;
  }

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    return this.responder(request);
  }

  tasks(): string[] {
    return this.requests.map(request => request.task);
  }
}

export function failingModel(reason: string = 'request timed out'): FakeModel {
  return new FakeModel(() => {
    throw new Error(reason);
  });
}
