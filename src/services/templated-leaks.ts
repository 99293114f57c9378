import fs from 'fs';
import path from 'path';
import { ChatMessage, LeakContent, LeakTarget, Persona } from '../types';
import { KeywordTables, countKeywordHits, loadKeywordTables } from './keyword-tables';
import { isPersona } from './persona-catalog';
import { BACKUP_SOURCE, backupReliability, cleanLeakText } from './leak-writer';

export interface LeakTemplate {
  text: string;
  fillers: string[];
}

export interface LeakTemplateBank {
  personas: Partial<Record<Persona, LeakTemplate[]>>;
  fallback: LeakTemplate[];
  topicAsides: Record<string, string>;
  accompliceAsides: string[];
}

const TEMPLATES_PATH = path.resolve(__dirname, '../../data/leak-templates.json');
const SCANNED_MESSAGES = 30;

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function isLeakTemplate(value: unknown): value is LeakTemplate {
  return (
    typeof value === 'object' &&
    value !== null &&
    'text' in value &&
    'fillers' in value &&
    typeof value.text === 'string' &&
    isStringArray(value.fillers) &&
    value.fillers.length > 0
  );
}

function isTemplateList(value: unknown): value is LeakTemplate[] {
  return Array.isArray(value) && value.length > 0 && value.every(isLeakTemplate);
}

export function parseLeakTemplates(raw: unknown): LeakTemplateBank {
  if (
    typeof raw !== 'object' ||
    raw === null ||
    !('personas' in raw) ||
    !('topicAsides' in raw) ||
    !('accompliceAsides' in raw)
  ) {
    throw new Error('template file needs "personas", "topicAsides" and "accompliceAsides"');
  }
  if (typeof raw.personas !== 'object' || raw.personas === null) {
    throw new Error('template file "personas" must be an object');
  }

  const personas: Partial<Record<Persona, LeakTemplate[]>> = {};
  for (const [key, templates] of Object.entries(raw.personas)) {
    if (!isPersona(key)) {
      console.warn(`[templates] Ignoring templates for unknown persona "${key}"`);
      continue;
    }
    if (!isTemplateList(templates)) {
      throw new Error(`templates for "${key}" must be a non-empty list of { text, fillers }`);
    }
    personas[key] = templates;
  }

  const fallback = personas.default;
  if (!fallback) {
    throw new Error('template file needs templates for the "default" persona');
  }

  const { topicAsides, accompliceAsides } = raw;
  if (typeof topicAsides !== 'object' || topicAsides === null) {
    throw new Error('template file "topicAsides" must be an object');
  }
  const asides: Record<string, string> = {};
  for (const [topic, aside] of Object.entries(topicAsides)) {
    if (typeof aside === 'string') asides[topic] = aside;
  }
  if (!isStringArray(accompliceAsides)) {
    throw new Error('template file "accompliceAsides" must be a list of strings');
  }

  return { personas, fallback, topicAsides: asides, accompliceAsides };
}

let cached: LeakTemplateBank | null = null;

export function loadLeakTemplates(): LeakTemplateBank {
  if (!cached) {
    cached = parseLeakTemplates(JSON.parse(fs.readFileSync(TEMPLATES_PATH, 'utf-8')));
  }
  return cached;
}

function pick<T>(items: T[], random: () => number): T {
  return items[Math.min(items.length - 1, Math.floor(random() * items.length))];
}

/**
 * Most talkative human in the window other than the invoker.
 * Used to name a target when regular selection is unavailable.
 */
export function pickParticipant(messages: ChatMessage[], invokingUserId: string): LeakTarget | null {
  const counts: Map<string, { target: LeakTarget; count: number }> = new Map();
  for (const message of messages) {
    if (message.authorIsBot || message.authorId === invokingUserId) continue;
    const entry = counts.get(message.authorId);
    if (entry) {
      entry.count++;
    } else {
      counts.set(message.authorId, {
        target: { userId: message.authorId, displayName: message.authorName || `User-${message.authorId.slice(0, 8)}` },
        count: 1,
      });
    }
  }

  let best: { target: LeakTarget; count: number } | null = null;
  for (const entry of Array.from(counts.values())) {
    if (!best || entry.count > best.count) best = entry;
  }
  return best ? best.target : null;
}

/**
 * Last-resort leak text with no model involved. Picks a persona template,
 * then adds a topic aside and names a bystander when the length budget
 * allows.
 */
export class TemplatedLeakGenerator {
  private bank: LeakTemplateBank;
  private keywords: KeywordTables;
  private random: () => number;

  constructor(
    bank: LeakTemplateBank = loadLeakTemplates(),
    keywords: KeywordTables = loadKeywordTables(),
    random: () => number = Math.random
  ) {
    this.bank = bank;
    this.keywords = keywords;
    this.random = random;
  }

  generate(
    persona: Persona,
    target: LeakTarget,
    messages: ChatMessage[],
    invokingUserId: string,
    maxLength: number
  ): LeakContent {
    const templates = this.bank.personas[persona] ?? this.bank.fallback;
    const template = pick(templates, this.random);
    const days = 2 + Math.floor(this.random() * 29);
    const filler = pick(template.fillers, this.random);

    let content = template.text
      .replace(/\{filler\}/g, () => filler)
      .replace(/\{days\}/g, String(days))
      .replace(/\{TARGET\}/g, () => target.displayName.toUpperCase())
      .replace(/\{target\}/g, () => target.displayName);

    const topic = this.dominantTopic(messages);
    const topicAside = topic ? this.bank.topicAsides[topic] : undefined;
    if (topicAside && content.length + topicAside.length + 1 <= maxLength) {
      content = `${content} ${topicAside}`;
    }

    const accomplice = this.findAccomplice(messages, target.userId, invokingUserId);
    if (accomplice && this.bank.accompliceAsides.length > 0) {
      const aside = pick(this.bank.accompliceAsides, this.random).replace(/\{accomplice\}/g, () => accomplice);
      if (content.length + aside.length + 1 <= maxLength) {
        content = `${content} ${aside}`;
      }
    }

    const cleaned = cleanLeakText(content, maxLength);
    return {
      content: cleaned,
      reliabilityPercentage: backupReliability(this.random),
      sourceAttribution: BACKUP_SOURCE,
      contentLength: cleaned.length,
      reasoning: `Templated leak for ${persona}${topic ? ` (topic: ${topic})` : ''}${accomplice ? ` with ${accomplice}` : ''}`,
    };
  }

  /** Topic with the most keyword hits across the recent human messages. */
  dominantTopic(messages: ChatMessage[]): string | null {
    const text = messages
      .slice(-SCANNED_MESSAGES)
      .filter(message => !message.authorIsBot)
      .map(message => message.content.toLowerCase())
      .join(' ');
    if (!text) return null;

    let best: string | null = null;
    let bestHits = 0;
    for (const [topic, words] of Object.entries(this.keywords.topics)) {
      const hits = countKeywordHits(text, words);
      if (hits > bestHits) {
        best = topic;
        bestHits = hits;
      }
    }
    return best;
  }

  /** Most recent human speaker who is neither the target nor the invoker. */
  findAccomplice(messages: ChatMessage[], targetId: string, invokingUserId: string): string | null {
    for (let i = messages.length - 1; i >= 0; i--) {
      const message = messages[i];
      if (message.authorIsBot || message.authorId === targetId || message.authorId === invokingUserId) continue;
      if (message.authorName) return message.authorName;
    }
    return null;
  }
}
