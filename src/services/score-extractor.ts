export const DEFAULT_SCORE = 0.5;

const NUMBER = String.raw`(\d+(?:\.\d+)?|\.\d+)`;

function escapeName(name: string): string {
  return name.toLowerCase().replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function clampScore(value: number): number {
  return Math.min(Math.max(value, 0), 1);
}

/**
 * Find a named score in free-form model output.
 *
 * Grammar, tried in order (case-insensitive, `NAME` must start on a word boundary):
 *   1. `NAME[_SCORE]: n/10`   -> n / 10
 *   2. `NAME_SCORE: n`        -> n
 *   3. `NAME: n`              -> n
 *
 * Results are clamped to [0, 1]. Returns `undefined` when nothing matches.
 */
export function matchScore(text: string, name: string): number | undefined {
  const key = escapeName(name);
  const patterns: Array<{ regex: RegExp; outOfTen: boolean }> = [
    { regex: new RegExp(String.raw`\b${key}(?:_score)?\s*:\s*${NUMBER}\s*/\s*10\b`, 'i'), outOfTen: true },
    { regex: new RegExp(String.raw`\b${key}_score\s*:\s*${NUMBER}`, 'i'), outOfTen: false },
    { regex: new RegExp(String.raw`\b${key}\s*:\s*${NUMBER}`, 'i'), outOfTen: false },
  ];

  for (const { regex, outOfTen } of patterns) {
    const match = regex.exec(text);
    if (!match) continue;

    const value = parseFloat(match[1]);
    if (!Number.isFinite(value)) continue;
    return clampScore(outOfTen ? value / 10 : value);
  }

  return undefined;
}

export function extractScore(text: string, name: string, fallback: number = DEFAULT_SCORE): number {
  return matchScore(text, name) ?? fallback;
}
