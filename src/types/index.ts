export type Persona =
  | 'sassy_reporter'
  | 'investigative_journalist'
  | 'gossip_columnist'
  | 'sports_commentator'
  | 'weather_anchor'
  | 'conspiracy_theorist'
  | 'default';

export interface Mention {
  userId: string;
  displayName: string;
  isBot: boolean;
}

export interface ChatMessage {
  authorId: string;
  authorName: string;
  authorIsBot: boolean;
  content: string;
  createdAt: Date;
  channelId: string;
  mentions: Mention[];
}

export interface Candidate {
  userId: string;
  displayName: string;
  recentMessages: string[];
  messageCount: number;
  averageLength: number;
  channelIds: string[];
  distinctChannels: number;
  lastMessageAt: Date;
  activityScore: number;
}

export type CommunicationStyle =
  | 'expressive'
  | 'inquisitive'
  | 'casual'
  | 'formal'
  | 'energetic'
  | 'neutral';

export type CultureType =
  | 'friendly'
  | 'competitive'
  | 'casual'
  | 'technical'
  | 'creative'
  | 'meme-heavy'
  | 'neutral';

export type ActivityLevel = 'high' | 'moderate' | 'low';

export type RelevanceFactor = 'gaming' | 'social' | 'hobby' | 'meme' | 'personality';

export type RelevanceFactors = Record<RelevanceFactor, number>;

export interface CommunicationStyleProfile {
  style: CommunicationStyle;
  averageMessageLength: number;
  emojiUsage: number;
  expressiveness: number;
  confidence: number;
}

export interface CultureAssessment {
  cultureType: CultureType;
  personaAlignment: Persona;
  activityLevel: ActivityLevel;
  confidence: number;
}

export interface RecentInteraction {
  contentPreview: string;
  mentionedUsers: string[];
  messageLength: number;
  channelId: string;
}

export interface ContextAnalysis {
  communicationStyle: CommunicationStyleProfile;
  activeTopics: string[];
  cultureAssessment: CultureAssessment;
  relevanceFactors: RelevanceFactors;
  userInterests: string[];
  recentInteractions: RecentInteraction[];
  reasoning: string;
}

export interface ContentHooks {
  theme: string;
  hooks: string;
}

export interface ContentConcept {
  id: string;
  description: string;
  relevanceScore: number;
  appropriatenessScore: number;
  serverFitScore: number;
  overallScore: number;
  reasoning: string;
  contentHooks: ContentHooks;
}

export interface PersonaRequirements {
  tone: string;
  style: string;
  emojis: string[];
  phrases: string[];
  maxLength: number;
}

export interface ContentGuidelines {
  /** Topics the community has asked to keep out of leaks. */
  avoidTopics?: string[];
  /** Free-form house rules passed through to the planning prompt. */
  notes?: string[];
}

export interface ContentPlan {
  selectedConcept: ContentConcept | null;
  alternativeConcepts: ContentConcept[];
  personaRequirements: PersonaRequirements;
  guidelines: ContentGuidelines;
  reasoning: string;
}

export interface FormatRequirements {
  maxLength?: number;
}

export interface LeakContent {
  content: string;
  reliabilityPercentage: number;
  sourceAttribution: string;
  contentLength: number;
  reasoning: string;
}

export interface CommunityConfig {
  persona: Persona;
}

export interface SelectionStats {
  totalRecentTargets: number;
  targetsInLast24h: number;
  oldestTargetAgeHours: number;
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: Error };

export type TaskType = 'analysis' | 'planning' | 'final';

export interface CompletionRequest {
  prompt: string;
  temperature: number;
  maxTokens: number;
  task: TaskType;
  signal?: AbortSignal;
}

export interface LanguageModelService {
  complete(request: CompletionRequest): Promise<string>;
}

export interface MessageSource {
  /** Oldest first, at most `limit` messages. */
  fetchRecent(scope: string, limit: number): Promise<ChatMessage[]>;
}

export type PipelineState =
  | 'selecting'
  | 'analyzing'
  | 'planning'
  | 'writing'
  | 'done'
  | 'no_target'
  | 'cancelled';

export type StrategyName = 'reasoning-chain' | 'simplified' | 'templated';

export interface LeakTarget {
  userId: string;
  displayName: string;
}

export type LeakOutcome =
  | {
      status: 'generated';
      leak: LeakContent;
      target: LeakTarget;
      strategy: StrategyName;
      states: PipelineState[];
    }
  | { status: 'no_target'; states: PipelineState[] }
  | { status: 'cancelled'; states: PipelineState[] };

export interface GenerateLeakOptions {
  signal?: AbortSignal;
  formatRequirements?: FormatRequirements;
}
