import {
  Candidate,
  ChatMessage,
  ContentGuidelines,
  GenerateLeakOptions,
  LanguageModelService,
  LeakContent,
  LeakOutcome,
  LeakTarget,
  MessageSource,
  Persona,
  PipelineState,
  Result,
  SelectionStats,
  StrategyName,
} from '../types';
import { CandidateSelector } from './candidate-selector';
import { ContentPlanner } from './content-planner';
import { ContextAnalyzer } from './context-analyzer';
import { LeakStage, toError } from './leak-stage';
import { BACKUP_SOURCE, LeakWriter, cleanLeakText, drawReliability, pickSourceAttribution } from './leak-writer';
import { getPersonaRequirements, getStyleGuide, personaLabel } from './persona-catalog';
import { TemplatedLeakGenerator, pickParticipant } from './templated-leaks';

export interface StrategyRequest {
  target: LeakTarget;
  messages: ChatMessage[];
  /** Sampled messages from selection, when a regular pick was made. */
  targetMessages: string[];
  invokingUserId: string;
  persona: Persona;
  guidelines: ContentGuidelines;
  maxLength: number;
  states: PipelineState[];
  signal?: AbortSignal;
}

export interface LeakStrategy {
  readonly name: StrategyName;
  generate(request: StrategyRequest): Promise<Result<LeakContent>>;
}

function cancelledError(): Error {
  return new Error('generation cancelled');
}

/** Analyze, plan, then write. Each stage absorbs its own model failures. */
export class ReasoningChainStrategy implements LeakStrategy {
  readonly name = 'reasoning-chain' as const;
  private analyzer: ContextAnalyzer;
  private planner: ContentPlanner;
  private writer: LeakWriter;

  constructor(analyzer: ContextAnalyzer, planner: ContentPlanner, writer: LeakWriter) {
    this.analyzer = analyzer;
    this.planner = planner;
    this.writer = writer;
  }

  async generate(request: StrategyRequest): Promise<Result<LeakContent>> {
    const { target, messages, persona, guidelines, states, signal } = request;
    try {
      states.push('analyzing');
      const analysis = await this.analyzer.analyze(target.userId, target.displayName, messages, { persona }, signal);
      if (signal?.aborted) return { ok: false, error: cancelledError() };

      states.push('planning');
      const plan = await this.planner.plan(analysis, persona, guidelines, signal);
      if (signal?.aborted) return { ok: false, error: cancelledError() };

      states.push('writing');
      const leak = await this.writer.write(plan, persona, { maxLength: request.maxLength }, target.displayName, signal);
      return { ok: true, value: leak };
    } catch (error) {
      return { ok: false, error: toError(error) };
    }
  }
}

/** One completion with only the persona voice and a few of the target's lines. */
export class SimplifiedStrategy extends LeakStage implements LeakStrategy {
  readonly name = 'simplified' as const;
  protected readonly task = 'final' as const;
  protected readonly tag = 'simplified';
  private random: () => number;

  constructor(model: LanguageModelService, random: () => number = Math.random) {
    super(model);
    this.random = random;
  }

  async generate(request: StrategyRequest): Promise<Result<LeakContent>> {
    const { target, persona, maxLength, signal } = request;
    request.states.push('writing');

    const requirements = getPersonaRequirements(persona);
    const samples = request.targetMessages.slice(-3);

    const prompt = `Write one short, harmless, obviously fake "leak" about ${target.displayName} in the voice of a ${personaLabel(persona)}.

Tone: ${requirements.tone}
Emojis you may use: ${requirements.emojis.join(' ')}
Maximum length: ${maxLength} characters
${samples.length > 0 ? `\nThings ${target.displayName} said recently:\n${samples.map(line => `- ${line}`).join('\n')}\n` : ''}
${getStyleGuide(persona)}

Write ONLY the leak content itself.`;

    const completion = await this.safeCompletion({ prompt, temperature: 0.9, maxTokens: 300, signal });
    if (!completion.ok) return completion;
    if (completion.value.length < 10) {
      return { ok: false, error: new Error('simplified generation returned no usable text') };
    }

    const content = cleanLeakText(completion.value, maxLength);
    const reliabilityPercentage = drawReliability(this.random);
    return {
      ok: true,
      value: {
        content,
        reliabilityPercentage,
        sourceAttribution: pickSourceAttribution(persona, this.random),
        contentLength: content.length,
        reasoning: `Simplified generation for ${target.displayName} (${content.length} chars, ${reliabilityPercentage}%)`,
      },
    };
  }
}

export class TemplatedStrategy implements LeakStrategy {
  readonly name = 'templated' as const;
  private generator: TemplatedLeakGenerator;

  constructor(generator: TemplatedLeakGenerator) {
    this.generator = generator;
  }

  async generate(request: StrategyRequest): Promise<Result<LeakContent>> {
    request.states.push('writing');
    try {
      const leak = this.generator.generate(
        request.persona,
        request.target,
        request.messages,
        request.invokingUserId,
        request.maxLength
      );
      return { ok: true, value: leak };
    } catch (error) {
      return { ok: false, error: toError(error) };
    }
  }
}

/**
 * Runs one leak request end to end: pick a target, then try each generation
 * strategy in order until one succeeds.
 */
export class LeakOrchestrator {
  private selector: CandidateSelector;
  private strategies: LeakStrategy[];

  constructor(selector: CandidateSelector, strategies: LeakStrategy[]) {
    if (strategies.length === 0) {
      throw new Error('LeakOrchestrator needs at least one strategy');
    }
    this.selector = selector;
    this.strategies = strategies;
  }

  async generateLeak(
    messages: ChatMessage[],
    communityId: string,
    invokingUserId: string,
    persona: Persona,
    guidelines: ContentGuidelines = {},
    options: GenerateLeakOptions = {}
  ): Promise<LeakOutcome> {
    const { signal } = options;
    const states: PipelineState[] = ['selecting'];
    console.log(`[orchestrator] Leak requested in ${communityId} by ${invokingUserId} (${persona})`);

    if (signal?.aborted) return this.cancelled(states);

    let candidate: Candidate | null = null;
    let target: LeakTarget | null = null;
    try {
      candidate = await this.selector.select(messages, invokingUserId, communityId, signal);
      target = candidate;
    } catch (error) {
      console.error('[orchestrator] Target selection failed, picking a participant directly:', error);
      target = pickParticipant(messages, invokingUserId);
    }

    if (signal?.aborted) return this.cancelled(states);
    if (!target) {
      states.push('no_target');
      console.log(`[orchestrator] No eligible target in ${communityId}`);
      return { status: 'no_target', states };
    }

    const request: StrategyRequest = {
      target: { userId: target.userId, displayName: target.displayName },
      messages,
      targetMessages: candidate ? candidate.recentMessages : [],
      invokingUserId,
      persona,
      guidelines,
      maxLength: options.formatRequirements?.maxLength ?? getPersonaRequirements(persona).maxLength,
      states,
      signal,
    };

    for (const strategy of this.strategies) {
      const result = await strategy.generate(request);
      if (signal?.aborted) return this.cancelled(states);

      if (result.ok) {
        states.push('done');
        console.log(`[orchestrator] Leak generated via ${strategy.name} for ${request.target.displayName}`);
        return { status: 'generated', leak: result.value, target: request.target, strategy: strategy.name, states };
      }
      console.warn(`[orchestrator] Strategy ${strategy.name} failed:`, result.error.message);
    }

    // Every strategy failed, which only happens with a custom list that has no templated step
    console.error('[orchestrator] All strategies failed, answering with the safe line');
    const content = cleanLeakText('', request.maxLength);
    states.push('done');
    return {
      status: 'generated',
      leak: {
        content,
        reliabilityPercentage: 15,
        sourceAttribution: BACKUP_SOURCE,
        contentLength: content.length,
        reasoning: 'All generation strategies failed.',
      },
      target: request.target,
      strategy: this.strategies[this.strategies.length - 1].name,
      states,
    };
  }

  async generateLeakForScope(
    source: MessageSource,
    scope: string,
    windowSize: number,
    communityId: string,
    invokingUserId: string,
    persona: Persona,
    guidelines: ContentGuidelines = {},
    options: GenerateLeakOptions = {}
  ): Promise<LeakOutcome> {
    let messages: ChatMessage[];
    try {
      messages = await source.fetchRecent(scope, windowSize);
    } catch (error) {
      console.error(`[orchestrator] Could not read messages for ${scope}:`, error);
      messages = [];
    }
    return this.generateLeak(messages, communityId, invokingUserId, persona, guidelines, options);
  }

  getSelectionStats(communityId: string): SelectionStats {
    return this.selector.getSelectionStats(communityId);
  }

  resetTargetHistory(communityId: string): void {
    this.selector.resetTargetHistory(communityId);
  }

  private cancelled(states: PipelineState[]): LeakOutcome {
    states.push('cancelled');
    console.log('[orchestrator] Leak generation cancelled');
    return { status: 'cancelled', states };
  }
}
