import {
  ActivityLevel,
  ChatMessage,
  CommunicationStyle,
  CommunicationStyleProfile,
  CommunityConfig,
  ContextAnalysis,
  CultureAssessment,
  CultureType,
  LanguageModelService,
  Persona,
  RecentInteraction,
  RelevanceFactor,
  RelevanceFactors,
} from '../types';
import { LeakStage, toError } from './leak-stage';
import { KeywordTables, countKeywordHits, loadKeywordTables } from './keyword-tables';
import { personaLabel } from './persona-catalog';
import { matchScore, DEFAULT_SCORE } from './score-extractor';

const RELEVANCE_FACTORS: readonly RelevanceFactor[] = ['gaming', 'social', 'hobby', 'meme', 'personality'];

const CULTURE_TYPES: readonly CultureType[] = [
  'friendly',
  'competitive',
  'casual',
  'technical',
  'creative',
  'meme-heavy',
  'neutral',
];

export const DEFAULT_RELEVANCE: RelevanceFactors = {
  gaming: 0.5,
  social: 0.6,
  hobby: 0.5,
  meme: 0.4,
  personality: 0.7,
};

const EMOJI_PATTERN = /\p{Extended_Pictographic}|:[a-z_]+:/gu;
const CAPS_RUN_PATTERN = /[A-Z]{2,}/g;
const PREVIEW_LENGTH = 50;

function isCultureType(value: string): value is CultureType {
  return CULTURE_TYPES.some(type => type === value);
}

function clamp01(value: number): number {
  return Math.min(Math.max(value, 0), 1);
}

function countMatches(text: string, pattern: RegExp): number {
  return text.match(pattern)?.length ?? 0;
}

function countChar(text: string, char: string): number {
  return text.split(char).length - 1;
}

/**
 * First stage of the leak pipeline: works out how the target talks, what the
 * community is into and which kinds of jokes will land.
 */
export class ContextAnalyzer extends LeakStage {
  protected readonly task = 'analysis' as const;
  protected readonly tag = 'analyzer';
  private keywords: KeywordTables;

  constructor(model: LanguageModelService, keywords: KeywordTables = loadKeywordTables()) {
    super(model);
    this.keywords = keywords;
  }

  async analyze(
    targetId: string,
    targetName: string,
    messages: ChatMessage[],
    communityConfig: CommunityConfig,
    signal?: AbortSignal
  ): Promise<ContextAnalysis> {
    try {
      console.log(`[analyzer] Starting context analysis for ${targetName}`);

      const targetMessages = this.extractTargetMessages(messages, targetId);
      const communicationStyle = this.analyzeCommunicationStyle(targetMessages);
      const activeTopics = this.extractActiveTopics(messages);
      const cultureAssessment = this.assessCulture(messages, communityConfig.persona);
      const userInterests = this.identifyUserInterests(targetMessages);
      const recentInteractions = this.analyzeInteractions(messages, targetId);

      const relevanceFactors = await this.calculateRelevanceFactors(
        targetName,
        communicationStyle,
        userInterests,
        activeTopics,
        cultureAssessment,
        signal
      );

      return {
        communicationStyle,
        activeTopics,
        cultureAssessment,
        relevanceFactors,
        userInterests,
        recentInteractions,
        reasoning: this.summarize(targetName, communicationStyle, activeTopics, userInterests, relevanceFactors),
      };
    } catch (error) {
      console.error('[analyzer] Context analysis failed:', toError(error).message);
      return minimalAnalysis(targetName, communityConfig.persona);
    }
  }

  /** The target's last ten substantive messages from the tail of the window. */
  extractTargetMessages(messages: ChatMessage[], targetId: string): string[] {
    return messages
      .slice(-50)
      .filter(message => message.authorId === targetId && message.content.trim().length > 5)
      .map(message => message.content)
      .slice(-10);
  }

  analyzeCommunicationStyle(targetMessages: string[]): CommunicationStyleProfile {
    if (targetMessages.length === 0) {
      return { style: 'neutral', averageMessageLength: 0, emojiUsage: 0, expressiveness: 0, confidence: 0 };
    }

    const count = targetMessages.length;
    const averageLength = targetMessages.reduce((sum, message) => sum + message.length, 0) / count;
    let emojis = 0;
    let capsRuns = 0;
    let questions = 0;
    let exclamations = 0;
    for (const message of targetMessages) {
      emojis += countMatches(message, EMOJI_PATTERN);
      capsRuns += countMatches(message, CAPS_RUN_PATTERN);
      questions += countChar(message, '?');
      exclamations += countChar(message, '!');
    }

    // First indicator that fires wins
    const indicators: Array<[CommunicationStyle, boolean]> = [
      ['expressive', emojis > 5 || exclamations > 3],
      ['inquisitive', questions > 2],
      ['casual', averageLength < 50 && emojis > 2],
      ['formal', averageLength > 100 && capsRuns < 2],
      ['energetic', capsRuns > 3 || exclamations > 5],
    ];
    const style = indicators.find(([, fired]) => fired)?.[0] ?? 'neutral';

    return {
      style,
      averageMessageLength: averageLength,
      emojiUsage: emojis / count,
      expressiveness: (exclamations + questions) / count,
      confidence: Math.min(count / 10, 1),
    };
  }

  extractActiveTopics(messages: ChatMessage[]): string[] {
    const text = messages
      .slice(-30)
      .filter(message => !message.authorIsBot && message.content.trim().length > 10)
      .map(message => message.content.toLowerCase())
      .join(' ');
    if (!text) return ['general chat'];

    const scored = Object.entries(this.keywords.topics)
      .map(([topic, words]) => ({ topic, hits: countKeywordHits(text, words) }))
      .filter(entry => entry.hits > 0)
      .sort((a, b) => b.hits - a.hits);

    return scored.length > 0 ? scored.slice(0, 5).map(entry => entry.topic) : ['general chat'];
  }

  assessCulture(messages: ChatMessage[], persona: Persona): CultureAssessment {
    const contents = messages
      .slice(-20)
      .filter(message => !message.authorIsBot)
      .map(message => message.content.toLowerCase());
    const text = contents.join(' ');

    let cultureType: CultureType = 'neutral';
    let best = 0;
    for (const [culture, words] of Object.entries(this.keywords.culture)) {
      const hits = countKeywordHits(text, words);
      if (hits > best && isCultureType(culture)) {
        best = hits;
        cultureType = culture;
      }
    }

    const activityLevel: ActivityLevel =
      contents.length > 15 ? 'high' : contents.length > 5 ? 'moderate' : 'low';

    return {
      cultureType,
      personaAlignment: persona,
      activityLevel,
      confidence: Math.min(contents.length / 20, 1),
    };
  }

  identifyUserInterests(targetMessages: string[]): string[] {
    const text = targetMessages.join(' ').toLowerCase();
    if (!text) return ['general topics'];

    const interests = Object.entries(this.keywords.interests)
      .filter(([, words]) => words.some(word => text.includes(word)))
      .map(([interest]) => interest);
    return interests.length > 0 ? interests : ['general topics'];
  }

  analyzeInteractions(messages: ChatMessage[], targetId: string): RecentInteraction[] {
    return messages
      .filter(message => message.authorId === targetId)
      .map(message => ({
        message,
        mentioned: message.mentions.filter(mention => !mention.isBot).map(mention => mention.displayName),
      }))
      .filter(({ message, mentioned }) => mentioned.length > 0 || message.content.length > 20)
      .slice(-5)
      .map(({ message, mentioned }) => ({
        contentPreview:
          message.content.length > PREVIEW_LENGTH
            ? `${message.content.slice(0, PREVIEW_LENGTH)}...`
            : message.content,
        mentionedUsers: mentioned,
        messageLength: message.content.length,
        channelId: message.channelId,
      }));
  }

  private async calculateRelevanceFactors(
    targetName: string,
    style: CommunicationStyleProfile,
    interests: string[],
    topics: string[],
    culture: CultureAssessment,
    signal?: AbortSignal
  ): Promise<RelevanceFactors> {
    const prompt = `Analyze the following context to determine relevance factors for generating humorous leak content about ${targetName}.

USER CONTEXT:
- Communication Style: ${style.style} (confidence: ${style.confidence.toFixed(2)})
- Average Message Length: ${style.averageMessageLength.toFixed(1)} characters
- Expressiveness: ${style.expressiveness.toFixed(2)}
- User Interests: ${interests.join(', ')}

COMMUNITY CONTEXT:
- Active Topics: ${topics.join(', ')}
- Community Culture: ${culture.cultureType}
- Activity Level: ${culture.activityLevel}
- Bot Persona: ${personaLabel(culture.personaAlignment)}

Please provide relevance scores (0.0 to 1.0) for different content types:

GAMING_RELEVANCE: [0.0-1.0] - How relevant are gaming references?
SOCIAL_RELEVANCE: [0.0-1.0] - How relevant are social interaction themes?
HOBBY_RELEVANCE: [0.0-1.0] - How relevant are hobby/interest references?
MEME_RELEVANCE: [0.0-1.0] - How relevant is meme culture content?
PERSONALITY_RELEVANCE: [0.0-1.0] - How relevant are personality-based jokes?

Provide brief reasoning for each score.`;

    const completion = await this.safeCompletion({ prompt, temperature: 0.3, maxTokens: 300, signal });
    if (completion.ok) {
      const parsed = parseRelevanceFactors(completion.value);
      if (parsed) return parsed;
      console.warn('[analyzer] No relevance scores found in model output, using heuristic defaults');
    }

    return fallbackRelevance(interests, topics, culture.cultureType, style.style);
  }

  private summarize(
    targetName: string,
    style: CommunicationStyleProfile,
    topics: string[],
    interests: string[],
    factors: RelevanceFactors
  ): string {
    const [topFactor, topScore] = RELEVANCE_FACTORS.map((factor): [RelevanceFactor, number] => [
      factor,
      factors[factor],
    ]).reduce((best, entry) => (entry[1] > best[1] ? entry : best));

    return `Context Analysis for ${targetName}:

User Profile: ${style.style} communicator with ${Math.round(style.confidence * 100)}% confidence
Primary Interests: ${interests.slice(0, 3).join(', ')}
Community Activity: ${topics.slice(0, 3).join(', ')}

Highest Relevance Factor: ${topFactor} (${topScore.toFixed(2)})
Content Strategy: Focus on ${topFactor}-related humor with community culture integration.`;
  }
}

/**
 * Read the five relevance scores from model output. Returns null when none of
 * them can be found; missing individual scores take the extractor default.
 */
export function parseRelevanceFactors(text: string): RelevanceFactors | null {
  let found = 0;
  const factors = { ...DEFAULT_RELEVANCE };
  for (const factor of RELEVANCE_FACTORS) {
    const score = matchScore(text, `${factor}_relevance`);
    if (score !== undefined) found++;
    factors[factor] = score ?? DEFAULT_SCORE;
  }
  return found > 0 ? factors : null;
}

export function fallbackRelevance(
  interests: string[],
  topics: string[],
  cultureType: CultureType,
  style: CommunicationStyle
): RelevanceFactors {
  const factors = { ...DEFAULT_RELEVANCE };
  if (interests.includes('gaming')) {
    factors.gaming = clamp01(factors.gaming + 0.3);
  }
  if (cultureType === 'meme-heavy' || topics.includes('memes')) {
    factors.meme = clamp01(factors.meme + 0.3);
  }
  if (style === 'expressive' || style === 'energetic') {
    factors.personality = clamp01(factors.personality + 0.1);
  }
  return factors;
}

export function minimalAnalysis(targetName: string, persona: Persona): ContextAnalysis {
  return {
    communicationStyle: {
      style: 'neutral',
      averageMessageLength: 0,
      emojiUsage: 0,
      expressiveness: 0,
      confidence: 0.3,
    },
    activeTopics: ['general chat'],
    cultureAssessment: {
      cultureType: 'neutral',
      personaAlignment: persona,
      activityLevel: 'low',
      confidence: 0.1,
    },
    relevanceFactors: { ...DEFAULT_RELEVANCE, hobby: 0.4 },
    userInterests: ['general topics'],
    recentInteractions: [],
    reasoning: `Minimal context available for ${targetName}. Using general content strategy.`,
  };
}
