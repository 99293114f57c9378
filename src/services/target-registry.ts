import { SelectionStats } from '../types';
import { KeyedLock } from './keyed-lock';

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

export interface TargetRegistryOptions {
  retentionDays?: number;
  now?: () => Date;
}

/**
 * Recent leak targets per community, kept in memory.
 *
 * Entries expire `retentionDays` after they were written. Expired entries are
 * pruned on every write to the same community and ignored by every read, so a
 * stale entry is never observed even if no write has happened since.
 */
export class RecentTargetRegistry {
  private targets: Map<string, Map<string, Date>> = new Map();
  private lock = new KeyedLock<string>();
  private retentionMs: number;
  private now: () => Date;

  constructor(options: TargetRegistryOptions = {}) {
    this.retentionMs = (options.retentionDays ?? 7) * DAY_MS;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Run `task` with exclusive access to one community's entries.
   * Checks and the write that follows them must happen inside the same call.
   */
  withCommunity<T>(communityId: string, task: () => T | Promise<T>): Promise<T> {
    return this.lock.run(communityId, task);
  }

  lastTargeted(communityId: string, userId: string): Date | undefined {
    const at = this.targets.get(communityId)?.get(userId);
    if (!at || this.isExpired(at, this.now())) return undefined;
    return at;
  }

  wasRecentlyTargeted(communityId: string, userId: string, windowHours: number): boolean {
    const at = this.lastTargeted(communityId, userId);
    if (!at) return false;
    return this.now().getTime() - at.getTime() < windowHours * HOUR_MS;
  }

  record(communityId: string, userId: string): void {
    const now = this.now();
    let community = this.targets.get(communityId);
    if (!community) {
      community = new Map();
      this.targets.set(communityId, community);
    }
    community.set(userId, now);
    this.pruneCommunity(communityId, now);
  }

  /** Live (unexpired) entries for a community. */
  entries(communityId: string): Array<{ userId: string; targetedAt: Date }> {
    const community = this.targets.get(communityId);
    if (!community) return [];

    const now = this.now();
    return Array.from(community.entries())
      .filter(([, at]) => !this.isExpired(at, now))
      .map(([userId, targetedAt]) => ({ userId, targetedAt }));
  }

  stats(communityId: string): SelectionStats {
    const live = this.entries(communityId);
    if (live.length === 0) {
      return { totalRecentTargets: 0, targetsInLast24h: 0, oldestTargetAgeHours: 0 };
    }

    const now = this.now().getTime();
    const ages = live.map(entry => now - entry.targetedAt.getTime());
    return {
      totalRecentTargets: live.length,
      targetsInLast24h: ages.filter(age => age < DAY_MS).length,
      oldestTargetAgeHours: Math.max(...ages) / HOUR_MS,
    };
  }

  reset(communityId: string): void {
    this.targets.delete(communityId);
  }

  /** Prune every community; returns how many entries were dropped. */
  pruneAll(): number {
    const now = this.now();
    let removed = 0;
    for (const communityId of Array.from(this.targets.keys())) {
      removed += this.pruneCommunity(communityId, now);
    }
    return removed;
  }

  communityCount(): number {
    return this.targets.size;
  }

  private pruneCommunity(communityId: string, now: Date): number {
    const community = this.targets.get(communityId);
    if (!community) return 0;

    let removed = 0;
    for (const [userId, at] of Array.from(community.entries())) {
      if (this.isExpired(at, now)) {
        community.delete(userId);
        removed++;
      }
    }
    if (community.size === 0) {
      this.targets.delete(communityId);
    }
    return removed;
  }

  private isExpired(at: Date, now: Date): boolean {
    return now.getTime() - at.getTime() > this.retentionMs;
  }
}
