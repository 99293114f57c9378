import fs from 'fs';
import path from 'path';

export type KeywordTable = Record<string, string[]>;

export interface KeywordTables {
  topics: KeywordTable;
  culture: KeywordTable;
  interests: KeywordTable;
}

const KEYWORDS_PATH = path.resolve(__dirname, '../../data/keywords.json');

function isKeywordTable(value: unknown): value is KeywordTable {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  return Object.values(value).every(
    words => Array.isArray(words) && words.every(word => typeof word === 'string')
  );
}

export function parseKeywordTables(raw: unknown): KeywordTables {
  if (
    typeof raw !== 'object' ||
    raw === null ||
    !('topics' in raw) ||
    !('culture' in raw) ||
    !('interests' in raw)
  ) {
    throw new Error('keyword file needs "topics", "culture" and "interests" tables');
  }
  const { topics, culture, interests } = raw;
  if (!isKeywordTable(topics) || !isKeywordTable(culture) || !isKeywordTable(interests)) {
    throw new Error('keyword file needs "topics", "culture" and "interests" tables of string arrays');
  }
  return { topics, culture, interests };
}

let cached: KeywordTables | null = null;

export function loadKeywordTables(): KeywordTables {
  if (!cached) {
    cached = parseKeywordTables(JSON.parse(fs.readFileSync(KEYWORDS_PATH, 'utf-8')));
  }
  return cached;
}

/** Non-overlapping occurrences of each keyword in `text`, summed. */
export function countKeywordHits(text: string, keywords: string[]): number {
  let hits = 0;
  for (const keyword of keywords) {
    if (!keyword) continue;
    hits += text.split(keyword).length - 1;
  }
  return hits;
}
