import { afterEach, describe, it, expect, vi } from 'vitest';
import { FakeModel, failingModel } from '../test/helpers';
import { ContentConcept, ContextAnalysis } from '../types';
import { minimalAnalysis } from './context-analyzer';
import {
  ContentPlanner,
  fallbackConcepts,
  fallbackPlan,
  overallScore,
  parseConcepts,
  relevanceScore,
  serverFitScore,
} from './content-planner';
import { getPersonaRequirements } from './persona-catalog';

const CONCEPT_REPLY = `Here are four ideas.

CONCEPT_1_THEME: Gaming/Tech related embarrassment
CONCEPT_1_DESC: Rage-quit the tutorial level
CONCEPT_1_HOOKS: controller thrown at a beanbag

CONCEPT_2_THEME: Social interaction mishap
CONCEPT_2_DESC: Waved back at someone waving behind them
CONCEPT_2_HOOKS: the wave, the crowd

CONCEPT_3_THEME: Hobby/Interest obsession
CONCEPT_3_DESC: Owns forty houseplants with names
CONCEPT_3_HOOKS: watering schedule spreadsheet

CONCEPT_4_THEME: Personality quirk revelation
CONCEPT_4_DESC: Narrates their own cooking like a show
CONCEPT_4_HOOKS: dramatic whisper`;

function analysisWith(overrides: Partial<ContextAnalysis>): ContextAnalysis {
  return { ...minimalAnalysis('Ada', 'sassy_reporter'), ...overrides };
}

function concept(theme: string, description: string, hooks: string = ''): ContentConcept {
  return {
    id: 'c',
    description,
    relevanceScore: 0,
    appropriatenessScore: 1,
    serverFitScore: 0,
    overallScore: 0,
    reasoning: '',
    contentHooks: { theme, hooks },
  };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('parseConcepts', () => {
  it('reads every concept block', () => {
    const concepts = parseConcepts(CONCEPT_REPLY);

    expect(concepts.map(item => item.id)).toEqual(['concept_1', 'concept_2', 'concept_3', 'concept_4']);
    expect(concepts[0].contentHooks).toEqual({
      theme: 'Gaming/Tech related embarrassment',
      hooks: 'controller thrown at a beanbag',
    });
    expect(concepts[0].description).toBe('Rage-quit the tutorial level');
    expect(concepts[3].contentHooks.hooks).toBe('dramatic whisper');
    expect(concepts[1].reasoning).toBe('Theme: Social interaction mishap');
    expect(concepts[2].appropriatenessScore).toBe(1);
  });

  it('accepts CRLF line endings', () => {
    expect(parseConcepts(CONCEPT_REPLY.replace(/\n/g, '\r\n'))).toHaveLength(4);
  });

  it('keeps at most four concepts', () => {
    const extra = `${CONCEPT_REPLY}\n\nCONCEPT_5_THEME: Bonus\nCONCEPT_5_DESC: One more\nCONCEPT_5_HOOKS: extra`;
    expect(parseConcepts(extra)).toHaveLength(4);
  });

  it('returns nothing for unstructured output', () => {
    expect(parseConcepts('Sorry, I cannot help with that.')).toEqual([]);
  });
});

describe('concept scoring', () => {
  it('takes the best matching relevance factor and adds the interest bonus', () => {
    const analysis = analysisWith({
      relevanceFactors: { gaming: 0.9, social: 0.2, hobby: 0.4, meme: 0.3, personality: 0.7 },
      userInterests: ['gaming'],
    });

    expect(relevanceScore(concept('Gaming/Tech related embarrassment', 'x'), analysis)).toBe(1);
    expect(relevanceScore(concept('Personality quirk revelation', 'x'), analysis)).toBeCloseTo(0.7);
    expect(relevanceScore(concept('Weather', 'x'), analysis)).toBeCloseTo(0.3);
    expect(relevanceScore(concept('Weather', 'loves gaming'), analysis)).toBeCloseTo(0.5);
  });

  it('starts server fit from the culture table and adds active topic hits', () => {
    const technical = analysisWith({
      activeTopics: ['gaming', 'food'],
      cultureAssessment: { cultureType: 'technical', personaAlignment: 'default', activityLevel: 'low', confidence: 0.5 },
    });
    const casual = analysisWith({
      activeTopics: ['gaming', 'food'],
      cultureAssessment: { cultureType: 'casual', personaAlignment: 'default', activityLevel: 'low', confidence: 0.5 },
    });
    const item = concept('Gaming mishap', 'lost a match', 'snack break');

    expect(serverFitScore(item, technical)).toBeCloseTo(0.7);
    expect(serverFitScore(item, casual)).toBeCloseTo(1);
    expect(serverFitScore(concept('Other', 'nothing relevant'), technical)).toBeCloseTo(0.6);
  });

  it('weights the overall score 0.4 / 0.3 / 0.3', () => {
    expect(overallScore({ relevanceScore: 0.5, appropriatenessScore: 1, serverFitScore: 0.6 })).toBeCloseTo(0.68);
  });

  it('ships three scored fallback concepts', () => {
    const concepts = fallbackConcepts();

    expect(concepts.map(item => item.id)).toEqual(['fallback_gaming', 'fallback_social', 'fallback_hobby']);
    expect(concepts[0].overallScore).toBeCloseTo(0.76);
    expect(concepts[1].overallScore).toBeCloseTo(0.75);
    expect(concepts[2].overallScore).toBeCloseTo(0.65);
  });
});

describe('ContentPlanner.plan', () => {
  it('selects the best scored concept and keeps up to three alternatives', async () => {
    const model = new FakeModel(() => CONCEPT_REPLY);
    const analysis = analysisWith({
      relevanceFactors: { gaming: 0.9, social: 0.2, hobby: 0.4, meme: 0.3, personality: 0.7 },
      userInterests: ['gaming'],
    });

    const plan = await new ContentPlanner(model).plan(analysis, 'sports_commentator', {});

    expect(model.requests[0]).toMatchObject({ task: 'planning', temperature: 0.8, maxTokens: 800 });
    expect(plan.selectedConcept?.id).toBe('concept_1');
    expect(plan.alternativeConcepts.map(item => item.id)).toEqual(['concept_4', 'concept_3', 'concept_2']);
    for (const alternative of plan.alternativeConcepts) {
      expect(plan.selectedConcept?.overallScore).toBeGreaterThanOrEqual(alternative.overallScore);
    }
    expect(plan.personaRequirements).toEqual(getPersonaRequirements('sports_commentator'));
  });

  it('passes community rules into the prompt', async () => {
    const model = new FakeModel(() => CONCEPT_REPLY);
    const guidelines = { avoidTopics: ['exams', 'weight'], notes: ['No real names of teachers'] };

    const plan = await new ContentPlanner(model).plan(minimalAnalysis('Ada', 'default'), 'default', guidelines);

    expect(model.requests[0].prompt).toContain(
      'COMMUNITY RULES:\n- Avoid these topics entirely: exams, weight\n- No real names of teachers'
    );
    expect(plan.guidelines).toBe(guidelines);
  });

  it('scores the hardcoded concepts when the model fails', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});

    const plan = await new ContentPlanner(failingModel()).plan(minimalAnalysis('Ada', 'default'), 'default', {});

    expect(plan.selectedConcept?.id).toBe('fallback_social');
    expect(plan.selectedConcept?.overallScore).toBeCloseTo(0.72);
    expect(plan.alternativeConcepts.map(item => item.id)).toEqual(['fallback_gaming', 'fallback_hobby']);
  });

  it('scores the hardcoded concepts when the reply cannot be parsed', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const model = new FakeModel(() => 'Here are some thoughts, but no blocks.');

    const plan = await new ContentPlanner(model).plan(minimalAnalysis('Ada', 'default'), 'default', {});

    expect(plan.selectedConcept?.id).toBe('fallback_social');
  });
});

describe('fallbackPlan', () => {
  it('uses the hardcoded concepts and catalog requirements', () => {
    const plan = fallbackPlan('weather_anchor', {});

    expect(plan.selectedConcept?.id).toBe('fallback_gaming');
    expect(plan.alternativeConcepts).toHaveLength(2);
    expect(plan.personaRequirements.maxLength).toBe(150);
    expect(plan.reasoning).toBe('Fallback plan due to planning failure. Using generic concepts.');
  });
});
