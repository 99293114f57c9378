import {
  ContentConcept,
  ContentGuidelines,
  ContentPlan,
  ContextAnalysis,
  CultureType,
  Persona,
  RelevanceFactor,
} from '../types';
import { LeakStage, toError } from './leak-stage';
import { getPersonaRequirements, personaLabel } from './persona-catalog';

const CULTURE_BASE_SCORES: Record<CultureType, number> = {
  casual: 0.9,
  friendly: 0.8,
  'meme-heavy': 0.8,
  competitive: 0.7,
  creative: 0.7,
  technical: 0.6,
  neutral: 0.6,
};

const THEME_FACTORS: Array<[keyword: string, factor: RelevanceFactor]> = [
  ['gaming', 'gaming'],
  ['tech', 'gaming'],
  ['social', 'social'],
  ['interaction', 'social'],
  ['hobby', 'hobby'],
  ['interest', 'hobby'],
  ['personality', 'personality'],
  ['quirk', 'personality'],
  ['meme', 'meme'],
];

const MIN_RELEVANCE = 0.3;
const MAX_ALTERNATIVES = 3;
const MAX_CONCEPTS = 4;

const CONCEPT_BLOCK =
  /CONCEPT_(\d+)_THEME:\s*(.+?)\nCONCEPT_\1_DESC:\s*(.+?)\nCONCEPT_\1_HOOKS:\s*(.+?)(?=\n\n|\nCONCEPT_|$)/gis;

function clamp01(value: number): number {
  return Math.min(Math.max(value, 0), 1);
}

export function overallScore(concept: Pick<ContentConcept, 'relevanceScore' | 'appropriatenessScore' | 'serverFitScore'>): number {
  return concept.relevanceScore * 0.4 + concept.appropriatenessScore * 0.3 + concept.serverFitScore * 0.3;
}

function fallbackConcept(
  id: string,
  description: string,
  theme: string,
  hooks: string,
  relevanceScore: number,
  serverFitScore: number
): ContentConcept {
  const concept = {
    id,
    description,
    relevanceScore,
    appropriatenessScore: 1.0,
    serverFitScore,
    reasoning: `Fallback ${theme} concept`,
    contentHooks: { theme, hooks },
  };
  return { ...concept, overallScore: overallScore(concept) };
}

export function fallbackConcepts(): ContentConcept[] {
  return [
    fallbackConcept('fallback_gaming', 'Gaming-related embarrassing moment', 'gaming', 'funny failure', 0.7, 0.6),
    fallbackConcept('fallback_social', 'Social interaction mishap', 'social', 'awkward moment', 0.6, 0.7),
    fallbackConcept('fallback_hobby', 'Obsession with random topic', 'hobby', 'obsessive interest', 0.5, 0.5),
  ];
}

/** Pull `CONCEPT_n_THEME / _DESC / _HOOKS` blocks out of model output. */
export function parseConcepts(text: string): ContentConcept[] {
  const normalized = text.replace(/\r\n/g, '\n');
  const concepts: ContentConcept[] = [];

  for (const match of Array.from(normalized.matchAll(CONCEPT_BLOCK))) {
    const [, num, theme, description, hooks] = match;
    concepts.push({
      id: `concept_${num}`,
      description: description.trim(),
      relevanceScore: 0,
      appropriatenessScore: 1.0,
      serverFitScore: 0,
      overallScore: 0,
      reasoning: `Theme: ${theme.trim()}`,
      contentHooks: { theme: theme.trim(), hooks: hooks.trim() },
    });
  }

  return concepts.slice(0, MAX_CONCEPTS);
}

export function relevanceScore(concept: ContentConcept, analysis: ContextAnalysis): number {
  const theme = concept.contentHooks.theme.toLowerCase();
  const description = concept.description.toLowerCase();

  let relevance = MIN_RELEVANCE;
  for (const [keyword, factor] of THEME_FACTORS) {
    if (theme.includes(keyword)) {
      relevance = Math.max(relevance, analysis.relevanceFactors[factor]);
    }
  }

  const interestMatches = analysis.userInterests.some(interest => {
    const term = interest.toLowerCase();
    return theme.includes(term) || description.includes(term);
  });
  if (interestMatches) {
    relevance += 0.2;
  }

  return clamp01(relevance);
}

export function serverFitScore(concept: ContentConcept, analysis: ContextAnalysis): number {
  const base = CULTURE_BASE_SCORES[analysis.cultureAssessment.cultureType];
  const text = `${concept.description} ${concept.contentHooks.theme} ${concept.contentHooks.hooks}`.toLowerCase();
  const topicHits = analysis.activeTopics.filter(topic => text.includes(topic.toLowerCase())).length;
  return clamp01(base + 0.1 * topicHits);
}

/**
 * Second stage: asks the model for four leak ideas, then ranks them against
 * the context analysis. The ranking itself is deterministic.
 */
export class ContentPlanner extends LeakStage {
  protected readonly task = 'planning' as const;
  protected readonly tag = 'planner';

  async plan(
    analysis: ContextAnalysis,
    persona: Persona,
    guidelines: ContentGuidelines,
    signal?: AbortSignal
  ): Promise<ContentPlan> {
    try {
      console.log('[planner] Starting content planning');

      const generated = await this.generateConcepts(analysis, persona, guidelines, signal);
      const ranked = this.scoreConcepts(generated.length > 0 ? generated : fallbackConcepts(), analysis);

      const selectedConcept = ranked[0] ?? null;
      const alternativeConcepts = ranked.slice(1, 1 + MAX_ALTERNATIVES);

      console.log(`[planner] Selected concept: ${selectedConcept ? selectedConcept.id : 'none'}`);
      return {
        selectedConcept,
        alternativeConcepts,
        personaRequirements: getPersonaRequirements(persona),
        guidelines,
        reasoning: planningReasoning(selectedConcept, alternativeConcepts.length),
      };
    } catch (error) {
      console.error('[planner] Content planning failed:', toError(error).message);
      return fallbackPlan(persona, guidelines);
    }
  }

  /** Score every concept and return them best first. */
  scoreConcepts(concepts: ContentConcept[], analysis: ContextAnalysis): ContentConcept[] {
    return concepts
      .map(concept => {
        const relevance = relevanceScore(concept, analysis);
        const serverFit = serverFitScore(concept, analysis);
        const scored = { ...concept, relevanceScore: relevance, serverFitScore: serverFit };
        const overall = overallScore(scored);
        return {
          ...scored,
          overallScore: overall,
          reasoning: `${concept.reasoning} | Relevance: ${relevance.toFixed(2)}, Server Fit: ${serverFit.toFixed(2)}, Overall: ${overall.toFixed(2)}`,
        };
      })
      .sort((a, b) => b.overallScore - a.overallScore);
  }

  private async generateConcepts(
    analysis: ContextAnalysis,
    persona: Persona,
    guidelines: ContentGuidelines,
    signal?: AbortSignal
  ): Promise<ContentConcept[]> {
    const factors = analysis.relevanceFactors;
    const houseRules = [
      ...(guidelines.avoidTopics?.length ? [`Avoid these topics entirely: ${guidelines.avoidTopics.join(', ')}`] : []),
      ...(guidelines.notes ?? []),
    ];

    const prompt = `Generate 4 different leak content concepts based on the following analysis:

CONTEXT ANALYSIS:
${analysis.reasoning}

USER INTERESTS: ${analysis.userInterests.join(', ')}
ACTIVE TOPICS: ${analysis.activeTopics.join(', ')}
COMMUNICATION STYLE: ${analysis.communicationStyle.style}
COMMUNITY CULTURE: ${analysis.cultureAssessment.cultureType}

RELEVANCE FACTORS:
- Gaming: ${factors.gaming.toFixed(2)}
- Social: ${factors.social.toFixed(2)}
- Hobby: ${factors.hobby.toFixed(2)}
- Meme: ${factors.meme.toFixed(2)}
- Personality: ${factors.personality.toFixed(2)}

PERSONA: ${personaLabel(persona)}

Generate 4 distinct leak concepts, each focused on different themes:

CONCEPT_1_THEME: Gaming/Tech related embarrassment
CONCEPT_1_DESC: [Brief description of the concept]
CONCEPT_1_HOOKS: [Key elements to make it personal and funny]

CONCEPT_2_THEME: Social interaction mishap
CONCEPT_2_DESC: [Brief description of the concept]
CONCEPT_2_HOOKS: [Key elements to make it personal and funny]

CONCEPT_3_THEME: Hobby/Interest obsession
CONCEPT_3_DESC: [Brief description of the concept]
CONCEPT_3_HOOKS: [Key elements to make it personal and funny]

CONCEPT_4_THEME: Personality quirk revelation
CONCEPT_4_DESC: [Brief description of the concept]
CONCEPT_4_HOOKS: [Key elements to make it personal and funny]
${houseRules.length > 0 ? `\nCOMMUNITY RULES:\n${houseRules.map(rule => `- ${rule}`).join('\n')}\n` : ''}
Keep concepts harmless, humorous, and appropriate for an online community.`;

    const completion = await this.safeCompletion({ prompt, temperature: 0.8, maxTokens: 800, signal });
    if (!completion.ok) return [];

    const concepts = parseConcepts(completion.value);
    if (concepts.length === 0) {
      console.warn(`[planner] No concept blocks in model output: ${completion.value.slice(0, 200)}`);
    }
    return concepts;
  }
}

function planningReasoning(selected: ContentConcept | null, alternatives: number): string {
  if (!selected) {
    return 'No suitable concepts generated. Using fallback approach.';
  }

  return `Content Planning Decision:

Selected Concept: ${selected.id}
Theme: ${selected.contentHooks.theme}
Relevance Score: ${selected.relevanceScore.toFixed(2)}
Server Fit Score: ${selected.serverFitScore.toFixed(2)}

Selection Reasoning:
${selected.reasoning}

Alternative concepts considered: ${alternatives}`;
}

export function fallbackPlan(persona: Persona, guidelines: ContentGuidelines): ContentPlan {
  const [selectedConcept, ...alternativeConcepts] = fallbackConcepts();
  return {
    selectedConcept,
    alternativeConcepts,
    personaRequirements: getPersonaRequirements(persona),
    guidelines,
    reasoning: 'Fallback plan due to planning failure. Using generic concepts.',
  };
}
