import { Candidate, ChatMessage, SelectionStats } from '../types';
import { RecentTargetRegistry } from './target-registry';

const HOUR_MS = 60 * 60 * 1000;

export interface SelectorOptions {
  scanWindow: number;
  minRecentMessages: number;
  minMessageLength: number;
  maxCandidates: number;
  fallbackCandidateLimit: number;
  exclusionWindowHours: number;
}

export const DEFAULT_SELECTOR_OPTIONS: SelectorOptions = {
  scanWindow: 200,
  minRecentMessages: 2,
  minMessageLength: 10,
  maxCandidates: 50,
  fallbackCandidateLimit: 10,
  exclusionWindowHours: 24,
};

const PRIMARY_MIN_SCORE = 0.1;
const PRIMARY_MIN_AVG_LENGTH = 15;
const FALLBACK_MIN_SCORE = 0.05;
const FALLBACK_MIN_AVG_LENGTH = 10;
const SAMPLED_MESSAGES = 10;

interface AuthorActivity {
  userId: string;
  displayName: string;
  messages: string[];
  messageCount: number;
  totalChars: number;
  channels: Set<string>;
  lastMessageAt: Date;
}

/**
 * Picks one active participant per request.
 *
 * Activity scores decide which candidates survive filtering, but the final
 * pick is uniform over the survivors.
 */
export class CandidateSelector {
  private registry: RecentTargetRegistry;
  private options: SelectorOptions;
  private random: () => number;
  private now: () => Date;

  constructor(
    registry: RecentTargetRegistry,
    options: Partial<SelectorOptions> = {},
    random: () => number = Math.random,
    now: () => Date = () => new Date()
  ) {
    this.registry = registry;
    this.options = { ...DEFAULT_SELECTOR_OPTIONS, ...options };
    this.random = random;
    this.now = now;
  }

  /**
   * Select a target from the message window and record it for the community.
   * Resolves to null when the window has no eligible author at all.
   */
  async select(
    messages: ChatMessage[],
    invokingUserId: string,
    communityId: string,
    signal?: AbortSignal
  ): Promise<Candidate | null> {
    const pool = this.buildCandidatePool(messages, invokingUserId);
    if (pool.length === 0) {
      console.warn(`[selector] No eligible authors in community ${communityId}`);
      return null;
    }

    return this.registry.withCommunity(communityId, () => {
      if (signal?.aborted) return null;

      let eligible = this.applySelectionFilters(pool, communityId);
      if (eligible.length === 0) {
        console.warn(`[selector] Primary filter removed all ${pool.length} candidates, using fallback`);
        eligible = this.applyFallbackSelection(pool, communityId);
      }

      const selected = eligible[Math.floor(this.random() * eligible.length)] ?? pool[0];
      this.registry.record(communityId, selected.userId);

      console.log(
        `[selector] Selected ${selected.userId} from ${eligible.length}/${pool.length} candidates in ${communityId}`
      );
      return selected;
    });
  }

  getSelectionStats(communityId: string): SelectionStats {
    return this.registry.stats(communityId);
  }

  resetTargetHistory(communityId: string): void {
    this.registry.reset(communityId);
    console.log(`[selector] Reset target history for ${communityId}`);
  }

  /**
   * Aggregate per-author activity over the scan window and keep authors who
   * meet the minimum count and length, best score first.
   */
  buildCandidatePool(messages: ChatMessage[], invokingUserId: string): Candidate[] {
    const { scanWindow, minMessageLength, minRecentMessages, maxCandidates } = this.options;
    const activity: Map<string, AuthorActivity> = new Map();

    const scanned = scanWindow > 0 ? messages.slice(-scanWindow) : [];
    for (const message of scanned) {
      if (message.authorIsBot) continue;
      if (message.authorId === invokingUserId) continue;
      if (message.content.trim().length < minMessageLength) continue;

      let author = activity.get(message.authorId);
      if (!author) {
        author = {
          userId: message.authorId,
          displayName: message.authorName,
          messages: [],
          messageCount: 0,
          totalChars: 0,
          channels: new Set(),
          lastMessageAt: message.createdAt,
        };
        activity.set(message.authorId, author);
      }

      author.messageCount++;
      author.totalChars += message.content.length;
      author.channels.add(message.channelId);
      author.messages.push(message.content);
      if (author.messages.length > SAMPLED_MESSAGES) {
        author.messages.shift();
      }
      if (message.createdAt.getTime() > author.lastMessageAt.getTime()) {
        author.lastMessageAt = message.createdAt;
      }
      if (message.authorName) {
        author.displayName = message.authorName;
      }
    }

    const now = this.now().getTime();
    const candidates: Candidate[] = [];

    for (const author of Array.from(activity.values())) {
      const averageLength = author.totalChars / author.messageCount;
      if (author.messageCount < minRecentMessages || averageLength < minMessageLength) continue;

      const hoursSince = Math.max(0, now - author.lastMessageAt.getTime()) / HOUR_MS;
      const recencyFactor = Math.max(0, 1 - hoursSince / 24);

      candidates.push({
        userId: author.userId,
        displayName: author.displayName || `User-${author.userId.slice(0, 8)}`,
        recentMessages: author.messages,
        messageCount: author.messageCount,
        averageLength,
        channelIds: Array.from(author.channels),
        distinctChannels: author.channels.size,
        lastMessageAt: author.lastMessageAt,
        activityScore: activityScore(author.messageCount, averageLength, author.channels.size, recencyFactor),
      });
    }

    candidates.sort((a, b) => b.activityScore - a.activityScore);
    return candidates.slice(0, maxCandidates);
  }

  private applySelectionFilters(pool: Candidate[], communityId: string): Candidate[] {
    return pool.filter(
      candidate =>
        !this.isExcluded(candidate, communityId) &&
        candidate.activityScore >= PRIMARY_MIN_SCORE &&
        candidate.recentMessages.length > 0 &&
        candidate.averageLength >= PRIMARY_MIN_AVG_LENGTH
    );
  }

  /**
   * Relaxed thresholds without the recency exclusion. Candidates who were not
   * recently targeted still win over those who were, so an excluded user is
   * only returned when everyone in the pool is excluded.
   */
  private applyFallbackSelection(pool: Candidate[], communityId: string): Candidate[] {
    const limit = Math.max(1, this.options.fallbackCandidateLimit);
    const fresh = pool.filter(candidate => !this.isExcluded(candidate, communityId));
    const base = fresh.length > 0 ? fresh : pool;

    let fallback = base.filter(
      candidate =>
        candidate.activityScore >= FALLBACK_MIN_SCORE &&
        candidate.recentMessages.length > 0 &&
        candidate.averageLength >= FALLBACK_MIN_AVG_LENGTH
    );

    if (fallback.length === 0) {
      console.warn('[selector] Relaxed filters found nobody, using top active candidates');
      fallback = base.slice(0, limit);
    }

    const shuffled = shuffle(fallback, this.random).slice(0, limit);
    console.log(`[selector] Fallback selection: ${fallback.length} available, using ${shuffled.length}`);
    return shuffled;
  }

  private isExcluded(candidate: Candidate, communityId: string): boolean {
    return this.registry.wasRecentlyTargeted(communityId, candidate.userId, this.options.exclusionWindowHours);
  }
}

export function activityScore(
  messageCount: number,
  averageLength: number,
  distinctChannels: number,
  recencyFactor: number
): number {
  return messageCount * 0.4 + (averageLength / 100) * 0.2 + distinctChannels * 0.2 + recencyFactor * 0.2;
}

export function shuffle<T>(items: T[], random: () => number): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}
