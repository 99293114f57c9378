import { describe, it, expect } from 'vitest';
import {
  PERSONAS,
  getFallbackTemplates,
  getPersonaRequirements,
  getSourceAttributions,
  getStyleGuide,
  isPersona,
  parsePersona,
  personaLabel,
} from './persona-catalog';

describe('parsePersona', () => {
  it('normalizes case, spaces and dashes', () => {
    expect(parsePersona('Sassy-Reporter')).toBe('sassy_reporter');
    expect(parsePersona('  weather anchor ')).toBe('weather_anchor');
    expect(parsePersona('CONSPIRACY_THEORIST')).toBe('conspiracy_theorist');
  });

  it('maps unknown or missing values to default', () => {
    expect(parsePersona('pirate')).toBe('default');
    expect(parsePersona('')).toBe('default');
    expect(parsePersona(undefined)).toBe('default');
  });
});

describe('persona catalog', () => {
  it('covers seven personas', () => {
    expect(PERSONAS).toHaveLength(7);
    expect(isPersona('gossip_columnist')).toBe(true);
    expect(isPersona('gossip')).toBe(false);
  });

  it('has five sources per persona and two for the default', () => {
    for (const persona of PERSONAS) {
      expect(getSourceAttributions(persona)).toHaveLength(persona === 'default' ? 2 : 5);
    }
    expect(getSourceAttributions('default')).toEqual(['Anonymous Source', 'Confidential Tipster']);
  });

  it('carries the persona length limits', () => {
    expect(getPersonaRequirements('investigative_journalist').maxLength).toBe(200);
    expect(getPersonaRequirements('sports_commentator').maxLength).toBe(180);
    expect(getPersonaRequirements('conspiracy_theorist').maxLength).toBe(170);
    expect(getPersonaRequirements('gossip_columnist').maxLength).toBe(160);
    expect(getPersonaRequirements('default').maxLength).toBe(150);
  });

  it('hands out copies of the requirements', () => {
    const requirements = getPersonaRequirements('sassy_reporter');
    requirements.emojis.push('🦆');
    requirements.maxLength = 1;

    expect(getPersonaRequirements('sassy_reporter').emojis).not.toContain('🦆');
    expect(getPersonaRequirements('sassy_reporter').maxLength).toBe(150);
  });

  it('fills the target name into the fallback templates', () => {
    const [shouted] = getFallbackTemplates('sports_commentator', 'Ada');
    expect(shouted.startsWith('LADIES AND GENTLEMEN! ADA WITH THE CHAMPIONSHIP DEDICATION!')).toBe(true);

    for (const persona of PERSONAS) {
      for (const line of getFallbackTemplates(persona, 'Ada')) {
        expect(line).not.toMatch(/\{target\}|\{TARGET\}/);
        expect(line.toLowerCase()).toContain('ada');
      }
    }
  });

  it('keeps dollar signs in names literal', () => {
    const [line] = getFallbackTemplates('sassy_reporter', 'Ca$$h $& Money');
    expect(line.startsWith('Tea Alert! ☕ Sources say Ca$$h $& Money was caught')).toBe(true);

    const [shouted] = getFallbackTemplates('sports_commentator', "$'Ada$`");
    expect(shouted.startsWith("LADIES AND GENTLEMEN! $'ADA$` WITH")).toBe(true);
  });

  it('has a style guide for every persona', () => {
    for (const persona of PERSONAS) {
      expect(getStyleGuide(persona).length).toBeGreaterThan(0);
    }
  });

  it('labels personas for prompts', () => {
    expect(personaLabel('investigative_journalist')).toBe('investigative journalist');
  });
});
