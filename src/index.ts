import { config } from './config';
import { CandidateSelector, SelectorOptions } from './services/candidate-selector';
import { ContentPlanner } from './services/content-planner';
import { ContextAnalyzer } from './services/context-analyzer';
import { AnthropicLanguageModel, DisabledLanguageModel } from './services/language-model';
import {
  LeakOrchestrator,
  LeakStrategy,
  ReasoningChainStrategy,
  SimplifiedStrategy,
  TemplatedStrategy,
} from './services/leak-orchestrator';
import { LeakWriter } from './services/leak-writer';
import { parsePersona } from './services/persona-catalog';
import { Scheduler } from './services/scheduler';
import { RecentTargetRegistry } from './services/target-registry';
import { TemplatedLeakGenerator } from './services/templated-leaks';
import { LanguageModelService, Persona } from './types';

export * from './types';
export { config } from './config';
export type { AppConfig } from './config';
export { CandidateSelector, DEFAULT_SELECTOR_OPTIONS } from './services/candidate-selector';
export type { SelectorOptions } from './services/candidate-selector';
export { ContextAnalyzer } from './services/context-analyzer';
export { ContentPlanner } from './services/content-planner';
export { LeakWriter, BACKUP_SOURCE, cleanLeakText } from './services/leak-writer';
export { LanguageModelError, AnthropicLanguageModel, DisabledLanguageModel } from './services/language-model';
export {
  LeakOrchestrator,
  ReasoningChainStrategy,
  SimplifiedStrategy,
  TemplatedStrategy,
} from './services/leak-orchestrator';
export type { LeakStrategy, StrategyRequest } from './services/leak-orchestrator';
export { PERSONAS, parsePersona, isPersona } from './services/persona-catalog';
export { RecentTargetRegistry } from './services/target-registry';
export { Scheduler } from './services/scheduler';
export { TemplatedLeakGenerator } from './services/templated-leaks';
export { extractScore, matchScore, DEFAULT_SCORE } from './services/score-extractor';

export interface LeakEngineOptions {
  /** Overrides the Anthropic model built from config. */
  model?: LanguageModelService;
  selector?: Partial<SelectorOptions>;
  retentionDays?: number;
  sweepCron?: string;
  defaultPersona?: Persona;
  random?: () => number;
  now?: () => Date;
}

export interface LeakEngine {
  orchestrator: LeakOrchestrator;
  registry: RecentTargetRegistry;
  scheduler: Scheduler;
  model: LanguageModelService;
  defaultPersona: Persona;
  start(): void;
  stop(): void;
}

function buildModel(): LanguageModelService {
  if (!config.anthropic.apiKey) {
    console.warn('[engine] No ANTHROPIC_API_KEY set, leaks will come from templates only');
    return new DisabledLanguageModel();
  }
  return new AnthropicLanguageModel({
    apiKey: config.anthropic.apiKey,
    model: config.anthropic.model,
    analysisModel: config.anthropic.analysisModel,
    timeoutMs: config.anthropic.timeoutMs,
    maxRetries: config.anthropic.maxRetries,
  });
}

/**
 * Wire one long-lived engine. The registry it owns is the only state that
 * outlives a single leak request.
 */
export function createLeakEngine(options: LeakEngineOptions = {}): LeakEngine {
  const random = options.random ?? Math.random;
  const model = options.model ?? buildModel();

  const registry = new RecentTargetRegistry({
    retentionDays: options.retentionDays ?? config.registry.retentionDays,
    now: options.now,
  });
  const selector = new CandidateSelector(
    registry,
    { ...config.selector, ...options.selector },
    random,
    options.now
  );

  const strategies: LeakStrategy[] = [
    new ReasoningChainStrategy(new ContextAnalyzer(model), new ContentPlanner(model), new LeakWriter(model, random)),
    new SimplifiedStrategy(model, random),
    new TemplatedStrategy(new TemplatedLeakGenerator(undefined, undefined, random)),
  ];

  const orchestrator = new LeakOrchestrator(selector, strategies);
  const scheduler = new Scheduler(registry, options.sweepCron ?? config.schedule.registrySweepCron);

  return {
    orchestrator,
    registry,
    scheduler,
    model,
    defaultPersona: options.defaultPersona ?? parsePersona(config.leak.defaultPersona),
    start: () => scheduler.start(),
    stop: () => scheduler.stop(),
  };
}
