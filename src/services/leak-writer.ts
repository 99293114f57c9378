import { ContentPlan, FormatRequirements, LanguageModelService, LeakContent, Persona } from '../types';
import { LeakStage, toError } from './leak-stage';
import {
  getFallbackTemplates,
  getSourceAttributions,
  getStyleGuide,
  personaLabel,
} from './persona-catalog';

export const DEFAULT_MAX_LENGTH = 150;
export const BACKUP_SOURCE = 'Anonymous Backup Source';
export const SAFE_LINE = 'Sources report suspicious activity involving snacks and questionable life choices. 🤐';

const LEADING_LABELS = ['leak:', 'content:', 'result:', 'output:'];
const MIN_CONTENT_LENGTH = 10;

// Weights sum to 1; 95% of draws land below 75
const RELIABILITY_BANDS: Array<{ min: number; max: number; weight: number }> = [
  { min: 12, max: 30, weight: 0.3 },
  { min: 30, max: 50, weight: 0.4 },
  { min: 50, max: 75, weight: 0.25 },
  { min: 75, max: 99, weight: 0.05 },
];

function randomInt(min: number, max: number, random: () => number): number {
  return min + Math.floor(random() * (max - min + 1));
}

function pick<T>(items: T[], random: () => number): T {
  return items[Math.min(items.length - 1, Math.floor(random() * items.length))];
}

/** Integer percentage in [12, 99) following the weighted bands. */
export function drawReliability(random: () => number = Math.random): number {
  const roll = random();
  let cumulative = 0;
  for (const band of RELIABILITY_BANDS) {
    cumulative += band.weight;
    if (roll < cumulative) {
      return randomInt(band.min, band.max - 1, random);
    }
  }
  return randomInt(23, 67, random);
}

export function backupReliability(random: () => number = Math.random): number {
  return randomInt(15, 55, random);
}

export function pickSourceAttribution(persona: Persona, random: () => number = Math.random): string {
  return pick(getSourceAttributions(persona), random);
}

export function fallbackLeakText(persona: Persona, targetName: string, random: () => number = Math.random): string {
  return pick(getFallbackTemplates(persona, targetName), random);
}

function stripWrapping(text: string): string {
  return text.trim().replace(/^["'`]+/, '').replace(/["'`]+$/, '').trim();
}

function stripLabel(text: string): string {
  const lower = text.toLowerCase();
  const label = LEADING_LABELS.find(prefix => lower.startsWith(prefix));
  return label ? text.slice(label.length).trim() : text;
}

function hardCut(text: string, limit: number): string {
  let cut = text.slice(0, limit);
  const lastSpace = cut.lastIndexOf(' ');
  if (lastSpace > limit / 2) {
    cut = cut.slice(0, lastSpace);
  }
  // Never leave half of a surrogate pair behind
  if (/[\uD800-\uDBFF]$/.test(cut)) {
    cut = cut.slice(0, -1);
  }
  return cut.trimEnd();
}

function resolveMaxLength(plan: ContentPlan, format: FormatRequirements): number {
  return format.maxLength ?? plan.personaRequirements.maxLength ?? DEFAULT_MAX_LENGTH;
}

/**
 * Tidy raw model output into a leak line.
 * The result is never empty and never longer than `maxLength`.
 */
export function cleanLeakText(raw: string, maxLength: number): string {
  let content = stripLabel(stripWrapping(raw));

  if (content.length > maxLength) {
    const budget = Math.max(1, maxLength - 3);
    const sentences = content.split('. ');
    let truncated = sentences[0];
    for (const sentence of sentences.slice(1)) {
      if (`${truncated}. ${sentence}`.length <= budget) {
        truncated += `. ${sentence}`;
      } else {
        break;
      }
    }
    if (truncated.length > budget) {
      truncated = hardCut(truncated, budget);
    }
    content = `${truncated}...`;
  }

  if (content.trim().length < MIN_CONTENT_LENGTH) {
    return SAFE_LINE.length <= maxLength ? SAFE_LINE : `${hardCut(SAFE_LINE, Math.max(1, maxLength - 3))}...`;
  }
  return content;
}

/**
 * Final stage: turns the chosen concept into one persona-voiced line and
 * attaches the mock reliability score and source.
 */
export class LeakWriter extends LeakStage {
  protected readonly task = 'final' as const;
  protected readonly tag = 'writer';
  private random: () => number;

  constructor(model: LanguageModelService, random: () => number = Math.random) {
    super(model);
    this.random = random;
  }

  async write(
    plan: ContentPlan,
    persona: Persona,
    format: FormatRequirements,
    targetName: string,
    signal?: AbortSignal
  ): Promise<LeakContent> {
    try {
      console.log(`[writer] Starting leak writing for ${targetName}`);

      const maxLength = resolveMaxLength(plan, format);
      const concept = plan.selectedConcept;
      if (!concept) {
        console.warn('[writer] Plan has no selected concept, using template');
        return this.fallbackContent(persona, targetName, maxLength, 'No concept selected. Using persona template.');
      }

      const requirements = plan.personaRequirements;

      const prompt = `Write a humorous, harmless "leak" about ${targetName} using the following specifications:

CONTENT CONCEPT:
- Theme: ${concept.contentHooks.theme}
- Description: ${concept.description}
- Content hooks: ${concept.contentHooks.hooks}

PERSONA REQUIREMENTS:
- Tone: ${requirements.tone}
- Style: ${requirements.style}
- Suggested phrases: ${requirements.phrases.join(', ')}
- Emojis to use: ${requirements.emojis.join(', ')}

CONTENT GUIDELINES:
- Maximum length: ${maxLength} characters
- Must be completely harmless and appropriate for all audiences
- Focus on embarrassing but innocent scenarios
- Include specific details that make it feel "leaked" but obviously fake
- Make it community-relevant and friendly
- Use natural language and current slang where appropriate

WRITING STYLE FOR ${personaLabel(persona).toUpperCase()}:
${getStyleGuide(persona)}

Write ONLY the leak content itself. Do not include explanations or metadata.`;

      const completion = await this.safeCompletion({ prompt, temperature: 0.9, maxTokens: 2048, signal });
      if (!completion.ok) {
        return this.fallbackContent(persona, targetName, maxLength, `Model call failed: ${completion.error.message}`);
      }

      const content = cleanLeakText(completion.value, maxLength);
      const reliabilityPercentage = drawReliability(this.random);

      console.log(`[writer] Leak writing completed (${content.length} chars)`);
      return {
        content,
        reliabilityPercentage,
        sourceAttribution: pickSourceAttribution(persona, this.random),
        contentLength: content.length,
        reasoning: `Leak Writing Process:

Selected Concept: ${concept.id}
Theme: ${concept.contentHooks.theme}
Final Content Length: ${content.length} characters
Reliability Score: ${reliabilityPercentage}%`,
      };
    } catch (error) {
      console.error('[writer] Leak writing failed:', toError(error).message);
      return this.fallbackContent(
        persona,
        targetName,
        resolveMaxLength(plan, format),
        'Leak writing failed. Using persona template.'
      );
    }
  }

  fallbackContent(persona: Persona, targetName: string, maxLength: number, reasoning: string): LeakContent {
    const content = cleanLeakText(fallbackLeakText(persona, targetName, this.random), maxLength);
    return {
      content,
      reliabilityPercentage: backupReliability(this.random),
      sourceAttribution: BACKUP_SOURCE,
      contentLength: content.length,
      reasoning,
    };
  }
}
